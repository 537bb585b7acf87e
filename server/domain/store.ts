import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { Pool } from "pg";
import { WorkflowError } from "./errors.js";
import { createSession } from "./session.js";
import type { Session } from "./types.js";

const stateRowId = 1;

export interface SessionStoreOptions {
  mode: "memory" | "file";
  dataPath: string;
  databaseUrl?: string;
  databaseSsl: boolean;
}

export interface SessionSummary {
  id: string;
  createdAt: string;
  updatedAt: string;
  discoveryStage: Session["discovery"]["stage"];
  outreachStage: Session["outreach"]["stage"];
  pendingApprovals: number;
}

interface SessionSnapshot {
  sessions: Session[];
}

function isSessionLike(value: unknown): value is Session {
  if (typeof value !== "object" || value === null) return false;
  return (
    "id" in value &&
    typeof value.id === "string" &&
    "discovery" in value &&
    "outreach" in value &&
    "approvals" in value &&
    Array.isArray(value.approvals) &&
    "logs" in value &&
    Array.isArray(value.logs)
  );
}

function readSnapshot(raw: unknown): SessionSnapshot {
  if (typeof raw !== "object" || raw === null || !("sessions" in raw) || !Array.isArray(raw.sessions)) {
    return { sessions: [] };
  }
  return { sessions: raw.sessions.filter(isSessionLike) };
}

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private pool: Pool | null = null;

  constructor(private readonly options: SessionStoreOptions) {}

  async init(): Promise<void> {
    if (this.options.databaseUrl) {
      await this.initPostgres(this.options.databaseUrl);
      return;
    }
    if (this.options.mode === "memory") return;

    await mkdir(path.dirname(this.options.dataPath), { recursive: true });
    let raw: string | undefined;
    try {
      raw = await readFile(this.options.dataPath, "utf8");
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) throw error;
    }
    if (raw) this.load(readSnapshot(JSON.parse(raw)));
    await this.persist();
  }

  private async initPostgres(connectionString: string): Promise<void> {
    this.pool = new Pool({
      connectionString,
      ssl: this.options.databaseSsl ? { rejectUnauthorized: false } : false
    });

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS app_state (
        id INTEGER PRIMARY KEY,
        payload JSONB NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const result = await this.pool.query<{ payload: unknown }>("SELECT payload FROM app_state WHERE id = $1", [stateRowId]);
    if (result.rows.length > 0) {
      this.load(readSnapshot(result.rows[0].payload));
    }
    await this.persist();
  }

  private load(snapshot: SessionSnapshot): void {
    this.sessions.clear();
    for (const session of snapshot.sessions) {
      this.sessions.set(session.id, session);
    }
  }

  isUsingPostgres(): boolean {
    return Boolean(this.pool);
  }

  create(): Session {
    const session = createSession();
    this.sessions.set(session.id, session);
    return session;
  }

  get(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) throw new WorkflowError("NotFound", `Session ${sessionId} not found`);
    return session;
  }

  list(): SessionSummary[] {
    return [...this.sessions.values()]
      .map((session) => ({
        id: session.id,
        createdAt: session.createdAt,
        updatedAt: session.updatedAt,
        discoveryStage: session.discovery.stage,
        outreachStage: session.outreach.stage,
        pendingApprovals: session.approvals.filter((approval) => approval.status === "pending").length
      }))
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  async persist(): Promise<void> {
    const snapshot: SessionSnapshot = { sessions: [...this.sessions.values()] };
    if (this.pool) {
      await this.pool.query(
        `
          INSERT INTO app_state (id, payload, updated_at)
          VALUES ($1, $2::jsonb, NOW())
          ON CONFLICT (id)
          DO UPDATE SET payload = EXCLUDED.payload, updated_at = NOW()
        `,
        [stateRowId, JSON.stringify(snapshot)]
      );
      return;
    }
    if (this.options.mode === "memory") return;

    await writeFile(this.options.dataPath, JSON.stringify(snapshot, null, 2), "utf8");
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
