import { describe, expect, it } from "vitest";
import { StaticSearch } from "../capabilities/static-search.js";
import type { SearchCapability, SearchResult } from "../capabilities/types.js";
import { createSession } from "../domain/session.js";
import { LeadDiscoveryWorkflow, buildQueries } from "./discovery-workflow.js";
import { SessionContext } from "./session-context.js";

const now = "2026-03-01T12:00:00.000Z";
const options = { minCandidates: 5, maxCandidates: 10, maxQueriesPerRound: 3, staleAfterDays: 180 };

const criteria = {
  industry: "fintech",
  geography: "Germany",
  roles: ["CTO"],
  companySize: "50-200",
  exclusions: ["Acme"],
  fields: ["email" as const]
};

function result(name: string, company: string, role?: string, email?: string): SearchResult {
  const slug = company.toLowerCase().replace(/[^a-z]+/g, "");
  return {
    url: `https://${slug}.test/team`,
    snippet: `${name} at ${company}`,
    contact: { name, company, role, email }
  };
}

const sevenCandidates: SearchResult[] = [
  result("Ana Weber", "Finly", "CTO", "ana@finly.test"),
  result("Ben Ortiz", "Paylane", "CTO"),
  result("Cara Lind", "Ledgerly"),
  result("Ben Ortiz", "Paylane Inc", "CTO", "ben@paylane.test"),
  result("Eve Stone", "Tallyco", "CMO"),
  result("Gil Marr", "Coinly", "Chief Technology Officer", "gil@coinly.test"),
  result("Hana Ito", "Brightbank", "CTO")
];

function setup<S extends SearchCapability>(search: S) {
  const ctx = new SessionContext(createSession(now, "discovery-session"), {
    logLimit: 500,
    secrets: ["test-secret"],
    clock: () => now
  });
  return { ctx, search, workflow: new LeadDiscoveryWorkflow(search, options) };
}

describe("buildQueries", () => {
  it("builds one query per role, then broader ones", () => {
    expect(buildQueries({ ...criteria, fields: ["name"], keywords: ["payments"] }, 3)).toEqual([
      '"CTO" 50-200 fintech companies Germany payments',
      "fintech Germany leadership team CTO payments",
      "50-200 fintech startups Germany team page"
    ]);
  });
});

describe("LeadDiscoveryWorkflow", () => {
  it("asks for every missing criterion instead of assuming defaults", async () => {
    const { ctx, workflow, search } = setup(new StaticSearch([{ results: sevenCandidates }]));

    await expect(workflow.submitCriteria(ctx, { industry: "fintech" })).rejects.toMatchObject({
      kind: "IncompleteInput",
      details: { missing: ["geography", "roles", "companySize", "exclusions", "fields"] }
    });
    expect(ctx.session.discovery.stage).toBe("ClarifyingCriteria");
    expect(search.received).toEqual([]);
  });

  it("accepts criteria across several turns", async () => {
    const { ctx, workflow } = setup(new StaticSearch([{ results: sevenCandidates }]));
    await expect(workflow.submitCriteria(ctx, { industry: "fintech", roles: ["CTO"] })).rejects.toMatchObject({
      kind: "IncompleteInput"
    });

    const pending = await workflow.submitCriteria(ctx, { ...criteria, industry: undefined, roles: undefined });
    expect(pending.payload.criteria).toEqual({ ...criteria, fields: ["name", "company", "sourceUrl", "email"], keywords: [] });
    expect(pending.approval.kind).toBe("search_plan");
  });

  it("searches, drops a wrong role, merges a duplicate and hands off leads 1, 3 and 5", async () => {
    const { ctx, workflow, search } = setup(new StaticSearch([{ results: sevenCandidates }]));

    const plan = await workflow.submitCriteria(ctx, criteria);
    expect(plan.summary).toContain('1. "CTO" 50-200 fintech companies Germany');
    expect(search.received.length).toBe(0);

    const list = await workflow.confirmPlan(ctx, plan.approval.id);
    expect(ctx.session.discovery.issuedQueries).toEqual(['"CTO" 50-200 fintech companies Germany']);
    expect(list.payload.map((lead) => lead.name)).toEqual(["Ana Weber", "Ben Ortiz", "Cara Lind", "Gil Marr", "Hana Ito"]);
    expect(list.payload.every((lead) => lead.sourceUrl.startsWith("https://"))).toBe(true);
    expect(ctx.session.discovery.dropped.map((item) => item.name)).toEqual(["Ben Ortiz", "Eve Stone"]);
    expect(ctx.session.discovery.dropped[0].reason).toBe("duplicate of Ben Ortiz (merged)");
    expect(ctx.session.discovery.stage).toBe("AwaitingApproval");
    expect(list.summary).toContain("| 1 | Ana Weber | CTO | Finly | ana@finly.test | https://finly.test/team |");

    const handoff = await workflow.approveLeads(ctx, list.approval.id, { positions: [1, 3, 5] });
    expect(handoff.leads.map((lead) => lead.name)).toEqual(["Ana Weber", "Cara Lind", "Hana Ito"]);
    expect(handoff.leads.every((lead) => lead.status === "approved")).toBe(true);
    expect(handoff.queries).toEqual(['"CTO" 50-200 fintech companies Germany']);
    expect(ctx.session.discovery.candidates.map((lead) => lead.status)).toEqual([
      "approved",
      "rejected",
      "approved",
      "rejected",
      "approved"
    ]);
    expect(ctx.session.discovery.stage).toBe("HandedOff");
  });

  it("labels confidence on the presented leads", async () => {
    const { ctx, workflow } = setup(new StaticSearch([{ results: sevenCandidates }]));
    const plan = await workflow.submitCriteria(ctx, criteria);
    const list = await workflow.confirmPlan(ctx, plan.approval.id);

    expect(list.payload.map((lead) => lead.confidence)).toEqual(["high", "high", "low", "high", "medium"]);
    expect(list.payload[1].email).toBe("ben@paylane.test");
  });

  it("rejects selections outside the list and keeps the approval pending", async () => {
    const { ctx, workflow } = setup(new StaticSearch([{ results: sevenCandidates }]));
    const plan = await workflow.submitCriteria(ctx, criteria);
    const list = await workflow.confirmPlan(ctx, plan.approval.id);

    await expect(workflow.approveLeads(ctx, list.approval.id, { positions: [9] })).rejects.toMatchObject({
      kind: "ValidationFailure"
    });
    await expect(workflow.approveLeads(ctx, list.approval.id, { positions: [] })).rejects.toMatchObject({
      kind: "ValidationFailure"
    });
    expect(ctx.findApproval(list.approval.id)?.status).toBe("pending");

    const handoff = await workflow.approveLeads(ctx, list.approval.id, { all: true });
    expect(handoff.leads).toHaveLength(5);
  });

  it("refuses to run a plan without its approval", async () => {
    const { ctx, workflow, search } = setup(new StaticSearch([{ results: sevenCandidates }]));
    await workflow.submitCriteria(ctx, criteria);

    await expect(workflow.confirmPlan(ctx, "not-an-approval")).rejects.toMatchObject({ kind: "MissingApproval" });
    expect(search.received.length).toBe(0);
  });

  it("discards the draft on cancel", async () => {
    const { ctx, workflow } = setup(new StaticSearch([{ results: sevenCandidates }]));
    const plan = await workflow.submitCriteria(ctx, criteria);

    await workflow.cancel(ctx, plan.approval.id);
    expect(ctx.findApproval(plan.approval.id)?.status).toBe("canceled");
    expect(ctx.session.discovery.plan).toBeUndefined();
    await expect(workflow.confirmPlan(ctx, plan.approval.id)).rejects.toMatchObject({ kind: "InvalidState" });
  });

  it("iterates with changed criteria and supersedes the open list", async () => {
    const { ctx, workflow } = setup(new StaticSearch([{ results: sevenCandidates }]));
    const plan = await workflow.submitCriteria(ctx, criteria);
    const list = await workflow.confirmPlan(ctx, plan.approval.id);

    const next = await workflow.iterate(ctx, { roles: ["CTO", "VP Engineering"] });
    expect(ctx.findApproval(list.approval.id)?.status).toBe("superseded");
    expect(next.payload.plan.queries[1]).toBe('"VP Engineering" 50-200 fintech companies Germany');
    expect(ctx.session.discovery.candidates).toEqual([]);
  });

  it("reports search failures without leaking credentials", async () => {
    const failing: SearchCapability = {
      name: "failing",
      search: async () => {
        throw new Error("upstream rejected key test-secret");
      }
    };
    const { ctx, workflow } = setup(failing);
    const plan = await workflow.submitCriteria(ctx, criteria);

    await expect(workflow.confirmPlan(ctx, plan.approval.id)).rejects.toMatchObject({
      kind: "CapabilityFailure",
      message: "Search failed: upstream rejected key [redacted]"
    });
    expect(ctx.session.discovery.stage).toBe("ClarifyingCriteria");
  });

  it("offers the same plan again after a failed search", async () => {
    let calls = 0;
    const recovering: SearchCapability = {
      name: "recovering",
      search: async (query) => {
        calls += 1;
        if (calls === 1) throw new Error("timed out");
        return new StaticSearch([{ results: sevenCandidates }]).search(query);
      }
    };
    const { ctx, workflow } = setup(recovering);
    const plan = await workflow.submitCriteria(ctx, criteria);

    const failure = await workflow.confirmPlan(ctx, plan.approval.id).catch((error: unknown) => error);
    expect(failure).toMatchObject({ kind: "CapabilityFailure" });
    const retryId = ctx.session.discovery.pendingApprovalId;
    expect(retryId).toBeDefined();
    expect(retryId).not.toBe(plan.approval.id);
    expect(failure).toMatchObject({ details: { approvalId: retryId } });

    const list = await workflow.confirmPlan(ctx, retryId ?? "");
    expect(list.payload).toHaveLength(5);
  });

  it("returns to criteria when nothing passes validation", async () => {
    const { ctx, workflow } = setup(new StaticSearch([{ results: [result("Dan Moss", "Acme Payments", "CTO")] }]));
    const plan = await workflow.submitCriteria(ctx, criteria);

    await expect(workflow.confirmPlan(ctx, plan.approval.id)).rejects.toMatchObject({ kind: "ValidationFailure" });
    expect(ctx.session.discovery.stage).toBe("ClarifyingCriteria");
    expect(ctx.session.discovery.plan).toBeUndefined();
    expect(ctx.session.discovery.issuedQueries).toHaveLength(3);
  });
});
