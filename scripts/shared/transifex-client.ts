import { z } from "zod";
import { mergeRecords } from "./cache.js";
import type { SyncConfig } from "./config.js";
import { ParseError, TransifexApiError } from "./errors.js";
import type {
  Mode,
  ResourceKey,
  StringRecord,
  TransifexResource,
} from "./types.js";

// --- Response schemas (JSON:API) ---

const LinksSchema = z
  .object({ next: z.string().nullable().optional() })
  .passthrough()
  .optional();

const PluralStringsSchema = z
  .record(z.string().nullable())
  .nullable()
  .optional();

const ResourcesResponseSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      attributes: z.object({
        name: z.string(),
        slug: z.string().optional(),
      }),
    }),
  ),
  links: LinksSchema,
});

const ResourceTranslationsResponseSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      attributes: z.object({ strings: PluralStringsSchema }),
      relationships: z.object({
        resource_string: z.object({
          data: z.object({ id: z.string() }),
        }),
      }),
    }),
  ),
  included: z
    .array(
      z.object({
        id: z.string(),
        type: z.string(),
        attributes: z
          .object({
            key: z.string().optional(),
            context: z.string().nullable().optional(),
            strings: PluralStringsSchema,
          })
          .passthrough(),
      }),
    )
    .optional(),
  links: LinksSchema,
});

type IncludedString = NonNullable<
  z.infer<typeof ResourceTranslationsResponseSchema>["included"]
>[number]["attributes"];

const ResourceStringsResponseSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      attributes: z
        .object({ context: z.string().nullable().optional() })
        .passthrough()
        .optional(),
    }),
  ),
});

const PatchResponseSchema = z.object({
  data: z.object({ id: z.string() }).passthrough(),
});

// --- Collaborator interfaces ---

export interface StringSource {
  listStrings(key: ResourceKey): Promise<StringRecord[]>;
}

/** A string in a resource, told apart from others by key and context. */
export interface StringRef {
  key: string;
  context: string;
}

export interface TranslationSink {
  updateTranslation(
    resource: string,
    language: string,
    ref: StringRef,
    translation: string,
  ): Promise<void>;
  reviewTranslation(
    resource: string,
    language: string,
    ref: StringRef,
  ): Promise<void>;
}

export interface ProjectApi extends StringSource, TranslationSink {
  listResources(): Promise<TransifexResource[]>;
}

export type FetchLike = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;

const MODE_FILTERS: Record<Mode, Record<string, string>> = {
  untranslated: { "filter[translated]": "false" },
  unreviewed: { "filter[reviewed]": "false" },
};

export function resourceSlug(resourceId: string): string {
  const parts = resourceId.split(":");
  return parts[parts.length - 1];
}

export class TransifexClient implements ProjectApi {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly organization: string;
  private readonly project: string;
  private readonly fetchImpl: FetchLike;

  constructor(config: SyncConfig["transifex"], fetchImpl: FetchLike = fetch) {
    this.baseUrl = config.baseUrl;
    this.token = config.apiToken;
    this.organization = config.organization;
    this.project = config.project;
    this.fetchImpl = fetchImpl;
  }

  get projectId(): string {
    return `o:${this.organization}:p:${this.project}`;
  }

  fullResourceId(resource: string): string {
    return `${this.projectId}:r:${resourceSlug(resource)}`;
  }

  async listResources(): Promise<TransifexResource[]> {
    const resources: TransifexResource[] = [];
    let url: string | null = this.url("/resources", {
      "filter[project]": this.projectId,
    });

    while (url) {
      const page: z.infer<typeof ResourcesResponseSchema> = parseWith(
        ResourcesResponseSchema,
        await this.request(url),
        "resources",
      );
      for (const node of page.data) {
        resources.push({
          id: node.id,
          slug: node.attributes.slug ?? resourceSlug(node.id),
          name: node.attributes.name,
        });
      }
      url = page.links?.next ?? null;
    }

    return resources;
  }

  async listStrings(key: ResourceKey): Promise<StringRecord[]> {
    let records: StringRecord[] = [];
    let url: string | null = this.url("/resource_translations", {
      "filter[resource]": this.fullResourceId(key.resource),
      "filter[language]": `l:${key.language}`,
      include: "resource_string",
      ...MODE_FILTERS[key.mode],
    });

    while (url) {
      const pageRecords: StringRecord[] = [];
      const page: z.infer<typeof ResourceTranslationsResponseSchema> =
        parseWith(
          ResourceTranslationsResponseSchema,
          await this.request(url),
          "resource_translations",
        );

      const sources = new Map<string, IncludedString>();
      for (const item of page.included ?? []) {
        if (item.type === "resource_strings") {
          sources.set(item.id, item.attributes);
        }
      }

      for (const translation of page.data) {
        const stringId = translation.relationships.resource_string.data.id;
        const source = sources.get(stringId);
        const sourceText = source?.strings?.other;
        if (!source || !sourceText) {
          console.warn(
            `[transifex] ${translation.id} — skipped (no source string included)`,
          );
          continue;
        }

        pageRecords.push({
          resource: key.resource,
          key: source.key ?? "",
          source: sourceText,
          translation: translation.attributes.strings?.other ?? "",
          context: source.context ?? "",
        });
      }

      // A string can move between pages while they are being read.
      records = mergeRecords(records, pageRecords);
      url = page.links?.next ?? null;
    }

    return records;
  }

  async updateTranslation(
    resource: string,
    language: string,
    ref: StringRef,
    translation: string,
  ): Promise<void> {
    await this.patchTranslation(resource, language, ref, {
      strings: { other: translation },
    });
  }

  async reviewTranslation(
    resource: string,
    language: string,
    ref: StringRef,
  ): Promise<void> {
    await this.patchTranslation(resource, language, ref, { reviewed: true });
  }

  private async patchTranslation(
    resource: string,
    language: string,
    ref: StringRef,
    attributes: Record<string, unknown>,
  ): Promise<void> {
    const stringId = await this.resolveStringId(resource, ref);
    const translationId = `${stringId}:l:${language}`;

    const body = await this.request(
      this.url(`/resource_translations/${translationId}`),
      {
        method: "PATCH",
        body: JSON.stringify({
          data: {
            type: "resource_translations",
            id: translationId,
            attributes,
          },
        }),
      },
    );
    parseWith(PatchResponseSchema, body, "resource_translations PATCH");
  }

  private async resolveStringId(
    resource: string,
    { key, context }: StringRef,
  ): Promise<string> {
    const body = await this.request(
      this.url("/resource_strings", {
        "filter[resource]": this.fullResourceId(resource),
        "filter[key]": key,
      }),
    );
    const { data } = parseWith(
      ResourceStringsResponseSchema,
      body,
      "resource_strings",
    );
    const match = data.find(
      (entry) => (entry.attributes?.context ?? "") === context,
    );
    if (!match) {
      const where = context ? ` and context "${context}"` : "";
      throw new TransifexApiError(
        404,
        "",
        `No resource string with key "${key}"${where} in ${resource}`,
      );
    }
    return match.id;
  }

  private url(path: string, params?: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [name, value] of Object.entries(params ?? {})) {
      url.searchParams.set(name, value);
    }
    return url.toString();
  }

  private async request(url: string, init: RequestInit = {}): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      ...init,
      headers: {
        Authorization: `Bearer ${this.token}`,
        "Content-Type": "application/vnd.api+json",
      },
    });

    if (!response.ok) {
      throw new TransifexApiError(response.status, await response.text());
    }

    try {
      return await response.json();
    } catch {
      throw new ParseError(`Transifex returned a non-JSON body for ${url}`);
    }
  }
}

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  label: string,
): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ParseError(
      `Malformed ${label} response: ${issue.path.join(".") || "(root)"} ${issue.message}`,
    );
  }
  return parsed.data;
}
