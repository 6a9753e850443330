import { z } from "zod";
import { CatalogError, describeError } from "./errors.js";
import type { AvailabilityResult, BookDoc, Logger } from "./types.js";

export const DEFAULT_API_BASE = "http://data4library.kr/api";

export const INTERACTIVE_PAGE_SIZE = 5;
export const RESOLVE_PAGE_SIZE = 1;

const flag = z.enum(["Y", "N"]);

// The catalog sends numbers for some fields depending on the record
const text = z.union([z.string(), z.number()]).transform(String);

const SearchResponseSchema = z.object({
  response: z
    .object({
      docs: z
        .array(
          z.object({
            doc: z.object({
              isbn13: text.default(""),
              bookname: text.default(""),
              authors: text.default(""),
              publisher: text.optional(),
              publication_year: text.optional(),
            }),
          })
        )
        .default([]),
    })
    .default({}),
});

const AvailabilityResponseSchema = z.object({
  response: z
    .object({
      result: z
        .object({
          hasBook: flag,
          loanAvailable: flag,
        })
        .optional(),
    })
    .optional(),
});

export interface CatalogClient {
  searchByTitle(title: string, pageSize?: number): Promise<BookDoc[]>;
  checkAvailability(libraryCode: string, isbn13: string): Promise<AvailabilityResult | null>;
}

export interface CatalogClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

export function createCatalogClient(options: CatalogClientOptions): CatalogClient {
  const baseUrl = (options.baseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? 10_000;
  const fetchImpl = options.fetch ?? fetch;
  const logger = options.logger ?? console;

  async function fetchJson<T>(
    path: string,
    params: Record<string, string | number>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const query = new URLSearchParams({ authKey: options.apiKey, format: "json" });
    for (const [key, value] of Object.entries(params)) {
      query.set(key, String(value));
    }

    let body: unknown;
    try {
      const response = await fetchImpl(`${baseUrl}/${path}?${query.toString()}`, {
        headers: { accept: "application/json" },
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        throw new CatalogError("transport", `${path} answered HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof CatalogError) throw error;
      throw new CatalogError("transport", `${path} request failed: ${describeError(error)}`, { cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new CatalogError("decode", `${path} returned an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  async function searchOnce(title: string, pageSize: number): Promise<BookDoc[]> {
    try {
      const data = await fetchJson("srchBooks", { title, pageSize }, SearchResponseSchema);
      return data.response.docs.map(({ doc }) => ({
        isbn13: doc.isbn13,
        bookname: doc.bookname,
        authors: doc.authors,
        publisher: doc.publisher,
        publicationYear: doc.publication_year,
      }));
    } catch (error) {
      logger.error(`Error searching for book "${title}": ${describeError(error)}`);
      return [];
    }
  }

  return {
    async searchByTitle(title, pageSize = INTERACTIVE_PAGE_SIZE) {
      const docs = await searchOnce(title, pageSize);
      if (docs.length > 0) return docs;

      // Some catalogs index titles without spaces
      const compact = title.replace(/\s+/g, "");
      if (!compact || compact === title) return [];
      return searchOnce(compact, pageSize);
    },

    async checkAvailability(libraryCode, isbn13) {
      try {
        const data = await fetchJson("bookExist", { libCode: libraryCode, isbn13 }, AvailabilityResponseSchema);
        const result = data.response?.result;
        if (!result) return null;
        return {
          hasBook: result.hasBook === "Y",
          loanAvailable: result.loanAvailable === "Y",
        };
      } catch (error) {
        logger.error(`Error checking availability for ISBN ${isbn13} at library ${libraryCode}: ${describeError(error)}`);
        return null;
      }
    },
  };
}
