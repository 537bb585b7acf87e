import { v4 as uuid } from "uuid";
import type { DatabaseTarget, StoreProperties } from "../domain/types.js";
import type { StoreCapability, StoreFilter, StoreRecord } from "./types.js";

export interface MemoryDatabase {
  id: string;
  name: string;
  records?: StoreRecord[];
}

export interface StoreWrite {
  operation: "create_page" | "update_page";
  targetId: string;
  properties: StoreProperties;
}

/** Process-local store used when no Notion credentials are configured. */
export class MemoryStore implements StoreCapability {
  readonly name = "memory-store";
  readonly writes: StoreWrite[] = [];
  readonly queries: Array<{ databaseId: string; filter?: StoreFilter }> = [];
  private readonly databases = new Map<string, { target: DatabaseTarget; records: StoreRecord[] }>();

  constructor(databases: MemoryDatabase[] = []) {
    for (const database of databases) {
      this.databases.set(database.id, {
        target: { id: database.id, name: database.name },
        records: (database.records ?? []).map((record) => ({ ...record, properties: { ...record.properties } }))
      });
    }
  }

  private database(databaseId: string): { target: DatabaseTarget; records: StoreRecord[] } {
    const database = this.databases.get(databaseId);
    if (!database) throw new Error(`Database ${databaseId} not found`);
    return database;
  }

  records(databaseId: string): StoreRecord[] {
    return this.database(databaseId).records.map((record) => ({ ...record, properties: { ...record.properties } }));
  }

  async listDatabases(): Promise<DatabaseTarget[]> {
    return [...this.databases.values()].map((database) => ({ ...database.target }));
  }

  async queryDatabase(databaseId: string, filter?: StoreFilter): Promise<StoreRecord[]> {
    this.queries.push({ databaseId, filter });
    const records = this.records(databaseId);
    if (!filter) return records;
    const wanted = filter.equals.trim().toLowerCase();
    return records.filter((record) => record.properties[filter.property]?.value.trim().toLowerCase() === wanted);
  }

  async listDatabasePages(databaseId: string): Promise<StoreRecord[]> {
    return this.records(databaseId);
  }

  async fetchPage(pageId: string): Promise<StoreRecord | undefined> {
    for (const database of this.databases.values()) {
      const record = database.records.find((item) => item.id === pageId);
      if (record) return { ...record, properties: { ...record.properties } };
    }
    return undefined;
  }

  async createPage(databaseId: string, properties: StoreProperties): Promise<string> {
    const database = this.database(databaseId);
    const id = uuid();
    database.records.push({ id, properties: { ...properties } });
    this.writes.push({ operation: "create_page", targetId: databaseId, properties });
    return id;
  }

  async updatePage(pageId: string, properties: StoreProperties): Promise<void> {
    for (const database of this.databases.values()) {
      const record = database.records.find((item) => item.id === pageId);
      if (!record) continue;
      record.properties = { ...record.properties, ...properties };
      this.writes.push({ operation: "update_page", targetId: pageId, properties });
      return;
    }
    throw new Error(`Page ${pageId} not found`);
  }
}
