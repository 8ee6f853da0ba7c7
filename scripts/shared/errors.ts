export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class TransifexApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, message?: string) {
    super(message ?? `Transifex request failed (${status}): ${body}`);
    this.name = "TransifexApiError";
    this.status = status;
    this.body = body;
  }
}

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class PlaceholderError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Placeholders lost in translation: ${missing.join(", ")}`);
    this.name = "PlaceholderError";
    this.missing = missing;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
