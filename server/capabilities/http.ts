import { WorkflowError, errorMessage } from "../domain/errors.js";

export interface JsonRequest {
  method?: "GET" | "POST" | "PATCH" | "DELETE";
  headers: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

export async function requestJson(capability: string, url: string, request: JsonRequest): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

  try {
    const response = await fetch(url, {
      method: request.method ?? "GET",
      signal: controller.signal,
      headers: {
        "Content-Type": "application/json",
        ...request.headers
      },
      body: request.body === undefined ? undefined : JSON.stringify(request.body)
    });

    const raw = await response.text();
    if (!response.ok) {
      throw new WorkflowError("CapabilityFailure", `${capability} request failed (${response.status}): ${raw.slice(0, 500)}`, {
        capability,
        httpStatus: response.status
      });
    }

    if (!raw.trim()) return {};
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    if (error instanceof WorkflowError) throw error;
    const message = controller.signal.aborted ? `timed out after ${request.timeoutMs}ms` : errorMessage(error);
    throw new WorkflowError("CapabilityFailure", `${capability} request failed: ${message}`, { capability });
  } finally {
    clearTimeout(timeout);
  }
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}
