export type WorkflowErrorKind =
  | "IncompleteInput"
  | "ValidationFailure"
  | "UnresolvedTarget"
  | "CapabilityFailure"
  | "MissingApproval"
  | "InvalidState"
  | "NotFound";

const statusByKind: Record<WorkflowErrorKind, number> = {
  IncompleteInput: 422,
  ValidationFailure: 422,
  UnresolvedTarget: 409,
  CapabilityFailure: 502,
  MissingApproval: 409,
  InvalidState: 409,
  NotFound: 404
};

export class WorkflowError extends Error {
  readonly kind: WorkflowErrorKind;
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(kind: WorkflowErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "WorkflowError";
    this.kind = kind;
    this.status = statusByKind[kind];
    this.details = details;
  }
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === "string" && error.trim()) return error;
  return fallback;
}

export function incompleteInput(missing: string[], message?: string): WorkflowError {
  return new WorkflowError("IncompleteInput", message ?? `Missing required input: ${missing.join(", ")}`, { missing });
}
