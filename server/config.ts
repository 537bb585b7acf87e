export type Env = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  corsOrigin: string[] | true;
  sessionStore: "memory" | "file";
  sessionDataPath: string;
  databaseUrl?: string;
  databaseSsl: boolean;
  logLimit: number;
  capabilityTimeoutMs: number;
  requireCapabilities: boolean;
  discovery: {
    minCandidates: number;
    maxCandidates: number;
    maxQueriesPerRound: number;
    staleAfterDays: number;
  };
  search: {
    openAiApiKey?: string;
    model: string;
    maxOutputTokens: number;
    fixturePath?: string;
  };
  notion: {
    apiKey?: string;
    version: string;
    pageSize: number;
    maxPages: number;
  };
  resend: {
    apiKey?: string;
    batchLimit: number;
  };
}

function cleanEnv(value?: string): string {
  if (!value) return "";
  const trimmed = value.trim();
  if ((trimmed.startsWith("\"") && trimmed.endsWith("\"")) || (trimmed.startsWith("'") && trimmed.endsWith("'"))) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}

export function envFlag(env: Env, name: string): boolean {
  const normalized = cleanEnv(env[name]).toLowerCase();
  return normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on";
}

function boundedInt(raw: string | undefined, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number(cleanEnv(raw) || fallback);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, Math.round(parsed)));
}

function optionalSecret(env: Env, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = cleanEnv(env[name]);
    if (value) return value;
  }
  return undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const corsOrigin = cleanEnv(env.CORS_ORIGIN);
  const minCandidates = boundedInt(env.DISCOVERY_MIN_CANDIDATES, 5, 1, 50);

  return {
    port: boundedInt(env.PORT, 8787, 1, 65535),
    corsOrigin: corsOrigin ? corsOrigin.split(",").map((value) => value.trim()) : true,
    sessionStore: cleanEnv(env.SESSION_STORE).toLowerCase() === "file" ? "file" : "memory",
    sessionDataPath: cleanEnv(env.SESSION_DATA_PATH) || "server/data/sessions.json",
    databaseUrl: cleanEnv(env.DATABASE_URL) || undefined,
    databaseSsl: cleanEnv(env.DATABASE_SSL) !== "disable",
    logLimit: boundedInt(env.LOG_LIMIT, 500, 50),
    capabilityTimeoutMs: boundedInt(env.CAPABILITY_TIMEOUT_MS, 30_000, 1000),
    requireCapabilities: envFlag(env, "REQUIRE_CAPABILITIES"),
    discovery: {
      minCandidates,
      maxCandidates: boundedInt(env.DISCOVERY_MAX_CANDIDATES, 10, minCandidates, 100),
      maxQueriesPerRound: boundedInt(env.DISCOVERY_MAX_QUERIES, 3, 1, 10),
      staleAfterDays: boundedInt(env.DISCOVERY_STALE_AFTER_DAYS, 180, 1)
    },
    search: {
      openAiApiKey: optionalSecret(env, "OPENAI_API_KEY"),
      model: cleanEnv(env.OPENAI_SEARCH_MODEL) || "gpt-4.1-mini",
      maxOutputTokens: boundedInt(env.OPENAI_SEARCH_MAX_OUTPUT_TOKENS, 2000, 300),
      fixturePath: cleanEnv(env.SEARCH_FIXTURE_PATH) || undefined
    },
    notion: {
      apiKey: optionalSecret(env, "NOTION_API_KEY", "NOTION_TOKEN", "NOTION_MCP_OAUTH_TOKEN", "NOTION_MCP_TOKEN"),
      version: cleanEnv(env.NOTION_API_VERSION) || "2022-06-28",
      pageSize: boundedInt(env.NOTION_PAGE_SIZE, 10, 1, 100),
      maxPages: boundedInt(env.NOTION_MAX_PAGES, 3, 1, 20)
    },
    resend: {
      apiKey: optionalSecret(env, "RESEND_API_KEY"),
      batchLimit: boundedInt(env.RESEND_BATCH_LIMIT, 100, 1, 100)
    }
  };
}

export function configuredSecrets(config: AppConfig): string[] {
  return [config.search.openAiApiKey, config.notion.apiKey, config.resend.apiKey, config.databaseUrl].filter(
    (value): value is string => typeof value === "string" && value.length > 0
  );
}
