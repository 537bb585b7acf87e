import type { AppConfig } from "../config.js";
import { MemoryDelivery } from "./memory-delivery.js";
import { MemoryStore } from "./memory-store.js";
import { NotionStore } from "./notion-store.js";
import { OpenAiSearch } from "./openai-search.js";
import { ResendDelivery } from "./resend-delivery.js";
import { StaticSearch, loadStaticSearch } from "./static-search.js";
import type { Capabilities, SearchCapability } from "./types.js";

async function buildSearch(config: AppConfig): Promise<SearchCapability> {
  if (config.search.openAiApiKey) {
    return new OpenAiSearch({
      apiKey: config.search.openAiApiKey,
      model: config.search.model,
      maxOutputTokens: config.search.maxOutputTokens,
      timeoutMs: config.capabilityTimeoutMs
    });
  }
  if (config.search.fixturePath) {
    return loadStaticSearch(config.search.fixturePath);
  }
  return new StaticSearch();
}

export async function buildCapabilities(config: AppConfig): Promise<Capabilities> {
  if (config.requireCapabilities) {
    const missing = [
      config.search.openAiApiKey ? "" : "OPENAI_API_KEY",
      config.notion.apiKey ? "" : "NOTION_API_KEY",
      config.resend.apiKey ? "" : "RESEND_API_KEY"
    ].filter(Boolean);
    if (missing.length > 0) {
      throw new Error(`REQUIRE_CAPABILITIES is set but ${missing.join(", ")} is not configured`);
    }
  }

  const search = await buildSearch(config);

  const store = config.notion.apiKey
    ? new NotionStore({
        apiKey: config.notion.apiKey,
        version: config.notion.version,
        pageSize: config.notion.pageSize,
        maxPages: config.notion.maxPages,
        timeoutMs: config.capabilityTimeoutMs
      })
    : new MemoryStore([{ id: "local-leads", name: "Leads (local)" }]);

  const delivery = config.resend.apiKey
    ? new ResendDelivery({ apiKey: config.resend.apiKey, timeoutMs: config.capabilityTimeoutMs })
    : new MemoryDelivery();

  if (search instanceof StaticSearch) {
    console.warn("No OPENAI_API_KEY set: lead search uses static results and will not reach the web.");
  }
  if (store instanceof MemoryStore) {
    console.warn("No Notion token set: lead records are kept in process memory.");
  }
  if (delivery instanceof MemoryDelivery) {
    console.warn("No RESEND_API_KEY set: approved emails are recorded but not delivered.");
  }

  return { search, store, delivery };
}
