import { asArray, asRecord, asString, requestJson } from "./http.js";
import type { SearchCapability, SearchContact, SearchQuery, SearchResult } from "./types.js";

export interface OpenAiSearchOptions {
  apiKey: string;
  model: string;
  maxOutputTokens: number;
  timeoutMs: number;
}

function extractOutputText(payload: unknown): string {
  const root = asRecord(payload);
  const direct = asString(root.output_text);
  if (direct) return direct;

  const chunks: string[] = [];
  for (const item of asArray(root.output)) {
    for (const part of asArray(asRecord(item).content)) {
      const text = asString(asRecord(part).text);
      if (text) chunks.push(text);
    }
  }
  return chunks.join("\n").trim();
}

function extractJsonObject(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) return trimmed;
  const first = trimmed.indexOf("{");
  const last = trimmed.lastIndexOf("}");
  if (first >= 0 && last > first) {
    return trimmed.slice(first, last + 1);
  }
  return trimmed;
}

function buildInput(query: SearchQuery): Array<{ role: string; content: string }> {
  const filters = Object.entries(query.filters)
    .filter(([, value]) => value.trim().length > 0)
    .map(([key, value]) => `${key}: ${value}`);

  return [
    {
      role: "system",
      content:
        "You are a B2B lead researcher. Use web search. Only report people you found on a real page, with that page's URL. Never invent contacts or emails. Return strictly valid JSON."
    },
    {
      role: "user",
      content: [
        `Search: ${query.query}`,
        query.keywords.length > 0 ? `Keywords: ${query.keywords.join(", ")}` : "",
        filters.length > 0 ? `Filters:\n${filters.join("\n")}` : "",
        `Return up to ${query.limit} results as JSON object { results: [...] } where each result has`,
        "url (source page), title, snippet (1-2 sentences quoted or summarized from the page), publishedAt (ISO date or empty),",
        "name, role, company, email (empty string when not published on the page)."
      ]
        .filter((line) => line.length > 0)
        .join("\n")
    }
  ];
}

function buildFormat(): Record<string, unknown> {
  const text = { type: "string" };
  return {
    format: {
      type: "json_schema",
      name: "lead_search_results",
      strict: true,
      schema: {
        type: "object",
        additionalProperties: false,
        properties: {
          results: {
            type: "array",
            items: {
              type: "object",
              additionalProperties: false,
              properties: {
                url: text,
                title: text,
                snippet: text,
                publishedAt: text,
                name: text,
                role: text,
                company: text,
                email: text
              },
              required: ["url", "title", "snippet", "publishedAt", "name", "role", "company", "email"]
            }
          }
        },
        required: ["results"]
      }
    }
  };
}

export function parseSearchResults(payload: unknown, limit: number): SearchResult[] {
  const raw = extractOutputText(payload);
  if (!raw) return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonObject(raw));
  } catch {
    return [];
  }

  const results: SearchResult[] = [];
  for (const item of asArray(asRecord(parsed).results)) {
    const entry = asRecord(item);
    const url = asString(entry.url);
    if (!url) continue;

    const name = asString(entry.name);
    const company = asString(entry.company);
    const contact: SearchContact | undefined =
      name && company
        ? { name, company, role: asString(entry.role), email: asString(entry.email) }
        : undefined;

    results.push({
      url,
      title: asString(entry.title),
      snippet: asString(entry.snippet) ?? "",
      publishedAt: asString(entry.publishedAt),
      contact
    });
    if (results.length >= limit) break;
  }
  return results;
}

export class OpenAiSearch implements SearchCapability {
  readonly name = "openai-web-search";

  constructor(private readonly options: OpenAiSearchOptions) {}

  async search(query: SearchQuery): Promise<SearchResult[]> {
    const payload = await requestJson("Search", "https://api.openai.com/v1/responses", {
      method: "POST",
      timeoutMs: this.options.timeoutMs,
      headers: { Authorization: `Bearer ${this.options.apiKey}` },
      body: {
        model: this.options.model,
        tools: [{ type: "web_search_preview" }],
        max_output_tokens: this.options.maxOutputTokens,
        input: buildInput(query),
        text: buildFormat()
      }
    });

    return parseSearchResults(payload, query.limit);
  }
}
