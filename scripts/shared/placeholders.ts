export interface Placeholder {
  original: string;
  style: string;
  token: string;
}

// Longer forms come first so that "{{name}}" is not read as "{name}".
const PLACEHOLDER_PATTERNS: Array<{ pattern: string; style: string }> = [
  { pattern: String.raw`\{\{[^}]+\}\}`, style: "handlebars" },
  { pattern: String.raw`%\{[^}]+\}`, style: "ruby" },
  { pattern: String.raw`\$\{[^}]+\}`, style: "template" },
  { pattern: String.raw`<%[^%>]+%>`, style: "mako" },
  { pattern: String.raw`%\([^)]+\)[sd]`, style: "python" },
  { pattern: String.raw`\{[^}]+\}`, style: "icu" },
  { pattern: String.raw`%[sdfi]`, style: "printf" },
];

const PLACEHOLDER_RE = new RegExp(
  PLACEHOLDER_PATTERNS.map(({ pattern }) => `(${pattern})`).join("|"),
  "g",
);

export function extractPlaceholders(text: string): string[] {
  return Array.from(text.matchAll(PLACEHOLDER_RE), (match) => match[0]);
}

/** Replaces every placeholder with an opaque `__PLACEHOLDER_n__` token. */
export function protectPlaceholders(text: string): {
  text: string;
  placeholders: Placeholder[];
} {
  const placeholders: Placeholder[] = [];
  const protectedText = text.replace(PLACEHOLDER_RE, (original, ...groups) => {
    const groupIndex = groups
      .slice(0, PLACEHOLDER_PATTERNS.length)
      .findIndex((group) => group !== undefined);
    const token = `__PLACEHOLDER_${placeholders.length}__`;
    placeholders.push({
      original,
      style: PLACEHOLDER_PATTERNS[groupIndex]?.style ?? "unknown",
      token,
    });
    return token;
  });
  return { text: protectedText, placeholders };
}

export function restorePlaceholders(
  text: string,
  placeholders: readonly Placeholder[],
): string {
  let restored = text;
  for (const { token, original } of placeholders) {
    restored = restored.split(token).join(original);
  }
  return restored;
}

/** Placeholders of `source` that do not survive in `translated`, in source order. */
export function missingPlaceholders(
  source: string,
  translated: string,
): string[] {
  const remaining = extractPlaceholders(translated);
  const missing: string[] = [];
  for (const placeholder of extractPlaceholders(source)) {
    const index = remaining.indexOf(placeholder);
    if (index === -1) {
      missing.push(placeholder);
    } else {
      remaining.splice(index, 1);
    }
  }
  return missing;
}
