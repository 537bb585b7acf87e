import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "./app.js";
import { MemoryDelivery } from "./capabilities/memory-delivery.js";
import { MemoryStore } from "./capabilities/memory-store.js";
import { StaticSearch } from "./capabilities/static-search.js";
import { loadConfig } from "./config.js";
import { SessionStore } from "./domain/store.js";

const results = [
  {
    url: "https://finly.test/team",
    snippet: "Ana Weber, CTO at Finly",
    contact: { name: "Ana Weber", role: "CTO", company: "Finly", email: "ana@finly.test" }
  },
  {
    url: "https://paylane.test/about",
    snippet: "Ben Ortiz, Chief Technology Officer",
    contact: { name: "Ben Ortiz", role: "Chief Technology Officer", company: "Paylane" }
  },
  {
    url: "https://ledgerly.test/company",
    snippet: "Cara Lind co-founded Ledgerly",
    contact: { name: "Cara Lind", company: "Ledgerly" }
  }
];

function read(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (typeof current !== "object" || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

function names(value: unknown): unknown[] {
  return Array.isArray(value) ? value.map((lead) => read(lead, "name")) : [];
}

const criteria = {
  industry: "fintech",
  geography: "Germany",
  roles: ["CTO"],
  companySize: "50-200",
  exclusions: [],
  fields: ["email"]
};

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const store = new SessionStore({ mode: "memory", dataPath: "unused.json", databaseSsl: false });
    await store.init();
    const app = createApp({
      config: loadConfig({}),
      store,
      capabilities: {
        search: new StaticSearch([{ match: '"CTO"', results }, { results: [] }]),
        store: new MemoryStore([{ id: "local-leads", name: "Leads (local)" }]),
        delivery: new MemoryDelivery()
      }
    });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("Server did not bind a port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  async function newSession(): Promise<string> {
    const created = await call("POST", "/api/sessions");
    return `/api/sessions/${String(read(created.body, "id"))}`;
  }

  async function call(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body)
    });
    const text = await response.text();
    const parsed: unknown = text ? JSON.parse(text) : undefined;
    return { status: response.status, body: parsed };
  }

  it("reports health and the capabilities in use", async () => {
    const response = await call("GET", "/api/health");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      ok: true,
      service: "lead-outreach-workflows",
      capabilities: { search: "static-search", store: "memory-store", delivery: "simulated-delivery" },
      persistence: "memory"
    });
  });

  it("returns 404 for unknown sessions", async () => {
    const response = await call("GET", "/api/sessions/missing");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ kind: "NotFound", message: "Session missing not found" });
  });

  it("rejects malformed bodies with 400", async () => {
    const base = await newSession();
    const response = await call("POST", `${base}/discovery/criteria`, { roles: "CTO" });

    expect(response.status).toBe(400);
    expect(read(response.body, "message", "fieldErrors", "roles")).toEqual(["Expected array, received string"]);
  });

  it("answers incomplete criteria with the missing fields", async () => {
    const base = await newSession();
    const response = await call("POST", `${base}/discovery/criteria`, { industry: "fintech" });

    expect(response.status).toBe(422);
    expect(read(response.body, "kind")).toBe("IncompleteInput");
    expect(read(response.body, "details")).toEqual({ missing: ["geography", "roles", "companySize", "exclusions", "fields"] });
  });

  it("walks from criteria to a confirmed database", async () => {
    const base = await newSession();

    const plan = await call("POST", `${base}/discovery/criteria`, criteria);
    expect(plan.status).toBe(200);
    expect(read(plan.body, "approval", "kind")).toBe("search_plan");

    const list = await call("POST", `${base}/discovery/plan/confirm`, { approvalId: read(plan.body, "approval", "id") });
    expect(list.status).toBe(200);
    expect(names(read(list.body, "payload"))).toEqual(["Ana Weber", "Ben Ortiz", "Cara Lind"]);

    const handoff = await call("POST", `${base}/discovery/leads/approve`, {
      approvalId: read(list.body, "approval", "id"),
      selection: { positions: [1, 2] }
    });
    expect(names(read(handoff.body, "leads"))).toEqual(["Ana Weber", "Ben Ortiz"]);

    const received = await call("POST", `${base}/outreach/handoff`, {});
    expect(received.status).toBe(200);
    expect(received.body).toHaveLength(2);

    const resolution = await call("POST", `${base}/outreach/database/resolve`);
    expect(read(resolution.body, "status")).toBe("pending");

    const wrong = await call("POST", `${base}/outreach/database/confirm`, {
      approvalId: read(resolution.body, "pending", "approval", "id"),
      databaseId: "db_other"
    });
    expect(wrong.status).toBe(422);

    const confirmed = await call("POST", `${base}/outreach/database/confirm`, {
      approvalId: read(resolution.body, "pending", "approval", "id"),
      databaseId: "local-leads"
    });
    expect(confirmed.body).toEqual({ id: "local-leads", name: "Leads (local)" });

    const reused = await call("POST", `${base}/outreach/database/resolve`);
    expect(reused.body).toEqual({ status: "resolved", target: { id: "local-leads", name: "Leads (local)" } });
  });

  it("refuses to confirm a plan with an unknown approval", async () => {
    const base = await newSession();
    await call("POST", `${base}/discovery/criteria`, criteria);

    const response = await call("POST", `${base}/discovery/plan/confirm`, { approvalId: "not-an-approval" });
    expect(response.status).toBe(409);
    expect(read(response.body, "kind")).toBe("MissingApproval");
  });
});
