import { createHash } from "node:crypto";
import { v4 as uuid } from "uuid";
import { WorkflowError } from "../domain/errors.js";
import type { Approval, ApprovalKind, PendingApproval, Session, SessionLog, WorkflowScope } from "../domain/types.js";
import { redactSecrets } from "../services/redaction.js";

export interface SessionContextOptions {
  logLimit: number;
  secrets: string[];
  clock?: () => string;
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export function fingerprint(payload: unknown): string {
  return createHash("sha256").update(stableStringify(payload)).digest("hex");
}

const inFlight = new Set<string>();

export class SessionContext {
  constructor(
    readonly session: Session,
    private readonly options: SessionContextOptions
  ) {}

  now(): string {
    return this.options.clock ? this.options.clock() : new Date().toISOString();
  }

  redact(text: string): string {
    return redactSecrets(text, this.options.secrets);
  }

  log(scope: WorkflowScope, level: SessionLog["level"], message: string, leadId?: string): void {
    const entry: SessionLog = {
      id: uuid(),
      timestamp: this.now(),
      level,
      scope,
      message: this.redact(message),
      leadId
    };
    this.session.logs.push(entry);
    if (this.session.logs.length > this.options.logLimit) {
      this.session.logs.splice(0, this.session.logs.length - this.options.logLimit);
    }
    this.session.updatedAt = entry.timestamp;
  }

  /** One call at a time per workflow scope; discovery and outreach may overlap. */
  async exclusive<T>(scope: WorkflowScope, task: () => Promise<T>): Promise<T> {
    const key = `${this.session.id}:${scope}`;
    if (inFlight.has(key)) {
      throw new WorkflowError("InvalidState", `The ${scope} workflow is busy with another request for this session`);
    }
    inFlight.add(key);
    try {
      return await task();
    } finally {
      inFlight.delete(key);
      this.session.updatedAt = this.now();
    }
  }

  requestApproval<T>(kind: ApprovalKind, payload: T, summary: string): PendingApproval<T> {
    const approval: Approval = {
      id: uuid(),
      kind,
      fingerprint: fingerprint(payload),
      summary,
      status: "pending",
      requestedAt: this.now()
    };
    this.session.approvals.push(approval);
    return { approval: { ...approval }, summary, payload };
  }

  findApproval(approvalId: string): Approval | undefined {
    return this.session.approvals.find((approval) => approval.id === approvalId);
  }

  private pendingApproval(approvalId: string, kind?: ApprovalKind): Approval {
    const approval = this.findApproval(approvalId);
    if (!approval) {
      throw new WorkflowError("MissingApproval", `No approval request ${approvalId} exists in this session`);
    }
    if (kind && approval.kind !== kind) {
      throw new WorkflowError("MissingApproval", `Approval ${approvalId} covers '${approval.kind}', not '${kind}'`);
    }
    if (approval.status !== "pending") {
      throw new WorkflowError("MissingApproval", `Approval ${approvalId} is already ${approval.status}`);
    }
    return approval;
  }

  /** Checks that `payload` is exactly what was presented, then records the decision. */
  consumeApproval(approvalId: string, kind: ApprovalKind, payload: unknown, decidedBy = "user"): Approval {
    const approval = this.pendingApproval(approvalId, kind);
    if (approval.fingerprint !== fingerprint(payload)) {
      throw new WorkflowError(
        "MissingApproval",
        `Approval ${approvalId} was given for a different ${kind} payload; present it again before proceeding`
      );
    }
    approval.status = "approved";
    approval.decidedAt = this.now();
    approval.decidedBy = decidedBy;
    return { ...approval };
  }

  closeApproval(approvalId: string, status: "canceled" | "superseded", kind?: ApprovalKind): Approval {
    const approval = this.pendingApproval(approvalId, kind);
    approval.status = status;
    approval.decidedAt = this.now();
    return { ...approval };
  }
}
