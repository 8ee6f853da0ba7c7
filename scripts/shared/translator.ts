import OpenAI from "openai";
import { ParseError, PlaceholderError } from "./errors.js";
import {
  missingPlaceholders,
  protectPlaceholders,
  restorePlaceholders,
} from "./placeholders.js";
import type { StringRecord } from "./types.js";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

/** The language-model collaborator: one prompt in, one completion out. */
export interface ChatModel {
  complete(messages: ChatMessage[]): Promise<string>;
}

export class OpenAIChatModel implements ChatModel {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(apiKey: string, model: string) {
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
    this.model = model;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: 0.1,
      messages,
    });
    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new ParseError(`${this.model} returned an empty completion`);
    }
    return content;
  }
}

export interface ReviewVerdict {
  approved: boolean;
  explanation: string;
}

const NO_CONTEXT = "No specific context provided";

export function buildTranslationMessages(
  language: string,
  text: string,
  context: string,
): ChatMessage[] {
  return [
    {
      role: "system",
      content: `You are a professional translator. Translate the following text to ${language}.
Maintain the original meaning and context.
IMPORTANT: The text contains special placeholders that must remain EXACTLY as they are.
These placeholders are marked with __PLACEHOLDER_X__ tokens.
Do not translate or modify these tokens in any way.
Reply with the translated text only.`,
    },
    {
      role: "user",
      content: `Text to translate: ${text}\nContext: ${context || NO_CONTEXT}`,
    },
  ];
}

export function buildReviewMessages(
  language: string,
  record: StringRecord,
): ChatMessage[] {
  return [
    {
      role: "system",
      content: `You are a professional translator reviewing translations.
Compare the source text and its translation to ${language}.
Check for:
1. Accuracy of meaning
2. Preservation of placeholders
3. Cultural appropriateness
4. Grammar and spelling

Respond with:
VERDICT: [APPROVE/REJECT]
REASON: [Brief explanation]`,
    },
    {
      role: "user",
      content: `Source: ${record.source}\nTranslation: ${record.translation}\nContext: ${record.context || NO_CONTEXT}`,
    },
  ];
}

export function parseReviewVerdict(reply: string): ReviewVerdict {
  const lines = reply.split("\n").map((line) => line.trim());
  const verdictLine = lines.find((line) => /^VERDICT:/i.test(line));
  if (!verdictLine) {
    throw new ParseError(`Review reply has no VERDICT line: ${reply.slice(0, 80)}`);
  }

  const verdict = verdictLine.replace(/^VERDICT:/i, "").trim().toUpperCase();
  if (!verdict.startsWith("APPROVE") && !verdict.startsWith("REJECT")) {
    throw new ParseError(`Unknown review verdict: ${verdict}`);
  }

  const reasonLine = lines.find((line) => /^REASON:/i.test(line));
  return {
    approved: verdict.startsWith("APPROVE"),
    explanation: reasonLine ? reasonLine.replace(/^REASON:/i, "").trim() : "",
  };
}

export class StringTranslator {
  constructor(
    private readonly model: ChatModel,
    readonly language: string,
  ) {}

  async translate(record: StringRecord): Promise<string> {
    const { text, placeholders } = protectPlaceholders(record.source);

    let context = record.context;
    if (placeholders.length > 0) {
      const info = placeholders
        .map((p) => `${p.token} (${p.style} style)`)
        .join(", ");
      context = `${context}\nPlaceholders found: ${info}`.trim();
    }

    const reply = await this.model.complete(
      buildTranslationMessages(this.language, text, context),
    );
    const translated = restorePlaceholders(reply.trim(), placeholders);

    const missing = missingPlaceholders(record.source, translated);
    if (missing.length > 0) {
      throw new PlaceholderError(missing);
    }
    return translated;
  }

  async review(record: StringRecord): Promise<ReviewVerdict> {
    const reply = await this.model.complete(
      buildReviewMessages(this.language, record),
    );
    return parseReviewVerdict(reply);
  }
}
