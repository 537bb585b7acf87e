import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { SearchCapability, SearchQuery, SearchResult } from "./types.js";

const searchResultSchema = z.object({
  url: z.string(),
  snippet: z.string().default(""),
  title: z.string().optional(),
  publishedAt: z.string().optional(),
  contact: z
    .object({
      name: z.string().min(1),
      role: z.string().optional(),
      company: z.string().min(1),
      email: z.string().optional()
    })
    .optional()
});

const fixtureSchema = z.object({
  entries: z.array(
    z.object({
      match: z.string().optional(),
      results: z.array(searchResultSchema)
    })
  )
});

export interface StaticSearchEntry {
  match?: string;
  results: SearchResult[];
}

/** Serves canned results: the first entry whose `match` occurs in the query, or an entry without `match`. */
export class StaticSearch implements SearchCapability {
  readonly name = "static-search";
  readonly received: SearchQuery[] = [];

  constructor(private readonly entries: StaticSearchEntry[] = []) {}

  async search(query: SearchQuery): Promise<SearchResult[]> {
    this.received.push(query);
    const text = query.query.toLowerCase();
    const entry =
      this.entries.find((item) => item.match && text.includes(item.match.toLowerCase())) ??
      this.entries.find((item) => !item.match);
    return (entry?.results ?? []).slice(0, query.limit);
  }
}

export async function loadStaticSearch(path: string): Promise<StaticSearch> {
  const raw = await readFile(path, "utf8");
  const parsed = fixtureSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid search fixture ${path}: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  return new StaticSearch(parsed.data.entries);
}
