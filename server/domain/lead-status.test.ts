import { describe, expect, it } from "vitest";
import { WorkflowError } from "./errors.js";
import { advanceStatus, canTransition } from "./lead-status.js";
import type { Lead } from "./types.js";

const lead: Lead = {
  id: "lead-1",
  name: "Ana Weber",
  company: "Finly",
  sourceUrl: "https://finly.test",
  confidence: "low",
  notes: [],
  freshness: "",
  status: "proposed",
  foundAt: "2026-03-01T12:00:00.000Z"
};

describe("lead status", () => {
  it("only moves forward", () => {
    expect(canTransition("proposed", "approved")).toBe(true);
    expect(canTransition("approved", "stored")).toBe(true);
    expect(canTransition("stored", "stored")).toBe(true);
    expect(canTransition("stored", "contacted")).toBe(true);
    expect(canTransition("contacted", "approved")).toBe(false);
  });

  it("treats rejected as terminal", () => {
    expect(canTransition("approved", "rejected")).toBe(true);
    expect(canTransition("rejected", "approved")).toBe(false);
  });

  it("returns a new lead or throws InvalidState", () => {
    const approved = advanceStatus(lead, "approved");
    expect(approved.status).toBe("approved");
    expect(lead.status).toBe("proposed");

    const error = (() => {
      try {
        advanceStatus({ ...lead, status: "rejected" }, "stored");
      } catch (caught) {
        return caught;
      }
    })();
    expect(error).toBeInstanceOf(WorkflowError);
    expect(error).toMatchObject({ kind: "InvalidState", status: 409 });
  });
});
