import { WorkflowError } from "../domain/errors.js";
import type { DatabaseTarget, StoreProperties, StoreProperty, StorePropertyType } from "../domain/types.js";
import { asArray, asRecord, asString, requestJson } from "./http.js";
import type { StoreCapability, StoreFilter, StoreRecord } from "./types.js";

export interface NotionStoreOptions {
  apiKey: string;
  version: string;
  pageSize: number;
  maxPages: number;
  timeoutMs: number;
}

const NOTION_API = "https://api.notion.com/v1";

const knownTypes: StorePropertyType[] = ["title", "rich_text", "email", "url", "select", "status", "phone_number", "number"];

function plainText(items: unknown): string {
  return asArray(items)
    .map((item) => {
      const entry = asRecord(item);
      return typeof entry.plain_text === "string" ? entry.plain_text : asString(asRecord(entry.text).content) ?? "";
    })
    .join("")
    .trim();
}

function richText(value: string): Array<{ text: { content: string } }> {
  return value ? [{ text: { content: value.slice(0, 2000) } }] : [];
}

function toPropertyType(value: unknown): StorePropertyType {
  return knownTypes.find((type) => type === value) ?? "unknown";
}

export function fromNotionProperty(raw: unknown): StoreProperty {
  const entry = asRecord(raw);
  const type = toPropertyType(entry.type);

  switch (type) {
    case "title":
    case "rich_text":
      return { type, value: plainText(entry[type]) };
    case "email":
    case "url":
    case "phone_number":
      return { type, value: asString(entry[type]) ?? "" };
    case "select":
    case "status":
      return { type, value: asString(asRecord(entry[type]).name) ?? "" };
    case "number":
      return { type, value: typeof entry.number === "number" ? String(entry.number) : "" };
    default:
      return { type: "unknown", value: "" };
  }
}

export function toNotionProperty(property: StoreProperty): Record<string, unknown> {
  const value = property.value.trim();

  switch (property.type) {
    case "title":
      return { title: richText(value) };
    case "email":
      return { email: value || null };
    case "url":
      return { url: value || null };
    case "phone_number":
      return { phone_number: value || null };
    case "select":
      return { select: value ? { name: value } : null };
    case "status":
      return { status: value ? { name: value } : null };
    case "number": {
      const parsed = Number(value);
      return { number: value && Number.isFinite(parsed) ? parsed : null };
    }
    case "rich_text":
    case "unknown":
    default:
      return { rich_text: richText(value) };
  }
}

export function toNotionFilter(filter: StoreFilter): Record<string, unknown> {
  if (filter.type === "number") {
    return { property: filter.property, number: { equals: Number(filter.equals) } };
  }
  const type = filter.type === "unknown" ? "rich_text" : filter.type;
  return { property: filter.property, [type]: { equals: filter.equals } };
}

function toRecord(raw: unknown): StoreRecord | undefined {
  const page = asRecord(raw);
  const id = asString(page.id);
  if (!id) return undefined;

  const properties: StoreProperties = {};
  for (const [name, value] of Object.entries(asRecord(page.properties))) {
    properties[name] = fromNotionProperty(value);
  }
  return { id, properties, url: asString(page.url) };
}

function databaseTitle(raw: Record<string, unknown>): string {
  const title = plainText(raw.title);
  if (title) return title;
  for (const value of Object.values(asRecord(raw.properties))) {
    const property = asRecord(value);
    if (property.type === "title") {
      const text = plainText(property.title);
      if (text) return text;
    }
  }
  return "(untitled)";
}

export class NotionStore implements StoreCapability {
  readonly name = "notion";

  constructor(private readonly options: NotionStoreOptions) {}

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.options.apiKey}`,
      "Notion-Version": this.options.version
    };
  }

  private async paginate(url: string, body: Record<string, unknown>): Promise<unknown[]> {
    const results: unknown[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < this.options.maxPages; page += 1) {
      const payload = asRecord(
        await requestJson("Notion", url, {
          method: "POST",
          headers: this.headers(),
          timeoutMs: this.options.timeoutMs,
          body: { ...body, page_size: this.options.pageSize, ...(cursor ? { start_cursor: cursor } : {}) }
        })
      );
      results.push(...asArray(payload.results));
      cursor = asString(payload.next_cursor);
      if (!cursor || payload.has_more === false) break;
    }

    return results;
  }

  async listDatabases(): Promise<DatabaseTarget[]> {
    const results = await this.paginate(`${NOTION_API}/search`, {
      filter: { value: "database", property: "object" }
    });

    return results
      .map((item) => asRecord(item))
      .flatMap((db) => {
        const id = asString(db.id);
        return id ? [{ id, name: databaseTitle(db) }] : [];
      });
  }

  async queryDatabase(databaseId: string, filter?: StoreFilter): Promise<StoreRecord[]> {
    const payload = asRecord(
      await requestJson("Notion", `${NOTION_API}/databases/${encodeURIComponent(databaseId)}/query`, {
        method: "POST",
        headers: this.headers(),
        timeoutMs: this.options.timeoutMs,
        body: {
          page_size: this.options.pageSize,
          ...(filter ? { filter: toNotionFilter(filter) } : {})
        }
      })
    );

    return asArray(payload.results).flatMap((item) => toRecord(item) ?? []);
  }

  async listDatabasePages(databaseId: string): Promise<StoreRecord[]> {
    const results = await this.paginate(`${NOTION_API}/databases/${encodeURIComponent(databaseId)}/query`, {});
    return results.flatMap((item) => toRecord(item) ?? []);
  }

  async fetchPage(pageId: string): Promise<StoreRecord | undefined> {
    let payload: unknown;
    try {
      payload = await requestJson("Notion", `${NOTION_API}/pages/${encodeURIComponent(pageId)}`, {
        method: "GET",
        headers: this.headers(),
        timeoutMs: this.options.timeoutMs
      });
    } catch (error) {
      if (error instanceof WorkflowError && error.details?.httpStatus === 404) return undefined;
      throw error;
    }

    const page = asRecord(payload);
    if (page.archived === true || page.in_trash === true) return undefined;
    return toRecord(page);
  }

  async createPage(databaseId: string, properties: StoreProperties): Promise<string> {
    const payload = asRecord(
      await requestJson("Notion", `${NOTION_API}/pages`, {
        method: "POST",
        headers: this.headers(),
        timeoutMs: this.options.timeoutMs,
        body: {
          parent: { database_id: databaseId },
          properties: Object.fromEntries(
            Object.entries(properties).map(([name, property]) => [name, toNotionProperty(property)])
          )
        }
      })
    );

    const id = asString(payload.id);
    if (!id) throw new Error("Notion create_page response did not include a page id");
    return id;
  }

  async updatePage(pageId: string, properties: StoreProperties): Promise<void> {
    await requestJson("Notion", `${NOTION_API}/pages/${encodeURIComponent(pageId)}`, {
      method: "PATCH",
      headers: this.headers(),
      timeoutMs: this.options.timeoutMs,
      body: {
        properties: Object.fromEntries(
          Object.entries(properties).map(([name, property]) => [name, toNotionProperty(property)])
        )
      }
    });
  }
}
