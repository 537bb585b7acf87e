import { v4 as uuid } from "uuid";
import type { SearchCapability, SearchResult } from "../capabilities/types.js";
import { WorkflowError, errorMessage, incompleteInput } from "../domain/errors.js";
import { advanceStatus } from "../domain/lead-status.js";
import type {
  HandoffPayload,
  IdealCustomerProfile,
  Lead,
  LeadField,
  PendingApproval,
  SearchPlan
} from "../domain/types.js";
import { hasSourceUrl } from "../services/lead-normalization.js";
import { type CandidateLead, validateCandidates } from "../services/lead-validation.js";
import { renderLeadTable, renderSearchPlan } from "../services/render.js";
import type { SessionContext } from "./session-context.js";

export interface DiscoveryOptions {
  minCandidates: number;
  maxCandidates: number;
  maxQueriesPerRound: number;
  staleAfterDays: number;
}

export type CriteriaInput = Partial<IdealCustomerProfile>;

export type LeadSelection = { all: true } | { positions: number[] } | { leadIds: string[] };

export interface SearchPlanPayload {
  criteria: IdealCustomerProfile;
  plan: SearchPlan;
}

const requiredFields: LeadField[] = ["name", "company", "sourceUrl"];

function cleanList(values?: string[]): string[] | undefined {
  if (!values) return undefined;
  return [...new Set(values.map((value) => value.trim()).filter((value) => value.length > 0))];
}

function mergeCriteria(base: CriteriaInput, input: CriteriaInput): CriteriaInput {
  const merged: CriteriaInput = { ...base };
  if (input.industry?.trim()) merged.industry = input.industry.trim();
  if (input.geography?.trim()) merged.geography = input.geography.trim();
  if (input.companySize?.trim()) merged.companySize = input.companySize.trim();
  if (input.roles) merged.roles = cleanList(input.roles);
  if (input.exclusions) merged.exclusions = cleanList(input.exclusions);
  if (input.keywords) merged.keywords = cleanList(input.keywords);
  if (input.fields) merged.fields = [...new Set(input.fields)];
  return merged;
}

export function missingCriteria(draft: CriteriaInput): string[] {
  const missing: string[] = [];
  if (!draft.industry) missing.push("industry");
  if (!draft.geography) missing.push("geography");
  if (!draft.roles || draft.roles.length === 0) missing.push("roles");
  if (!draft.companySize) missing.push("companySize");
  // An empty list is an explicit "no exclusions"; an absent one has not been asked yet.
  if (!draft.exclusions) missing.push("exclusions");
  if (!draft.fields || draft.fields.length === 0) missing.push("fields");
  return missing;
}

export function buildQueries(criteria: IdealCustomerProfile, maxQueries: number): string[] {
  const keywords = criteria.keywords.length > 0 ? ` ${criteria.keywords.join(" ")}` : "";
  const queries = [
    ...criteria.roles.map(
      (role) => `"${role}" ${criteria.companySize} ${criteria.industry} companies ${criteria.geography}${keywords}`
    ),
    `${criteria.industry} ${criteria.geography} leadership team ${criteria.roles.join(" ")}${keywords}`,
    `${criteria.companySize} ${criteria.industry} startups ${criteria.geography} team page`
  ];
  return [...new Set(queries.map((query) => query.replace(/\s+/g, " ").trim()))].slice(0, maxQueries);
}

export class LeadDiscoveryWorkflow {
  constructor(
    private readonly search: SearchCapability,
    private readonly options: DiscoveryOptions
  ) {}

  private supersedePending(ctx: SessionContext): void {
    const state = ctx.session.discovery;
    if (!state.pendingApprovalId) return;
    const approval = ctx.findApproval(state.pendingApprovalId);
    if (approval?.status === "pending") {
      ctx.closeApproval(approval.id, "superseded");
    }
    state.pendingApprovalId = undefined;
  }

  async submitCriteria(ctx: SessionContext, input: CriteriaInput): Promise<PendingApproval<SearchPlanPayload>> {
    return ctx.exclusive("discovery", async () => {
      const state = ctx.session.discovery;
      if (state.stage === "Searching" || state.stage === "Validating") {
        throw new WorkflowError("InvalidState", `Criteria cannot change while the workflow is ${state.stage}`);
      }

      this.supersedePending(ctx);
      state.stage = "ClarifyingCriteria";
      state.candidates = [];
      state.dropped = [];
      state.criteriaDraft = mergeCriteria(state.criteriaDraft, input);

      const draft = state.criteriaDraft;
      const missing = missingCriteria(draft);
      if (missing.length > 0 || !draft.industry || !draft.geography || !draft.companySize || !draft.roles || !draft.fields || !draft.exclusions) {
        ctx.log("discovery", "warn", `Criteria incomplete; asking for: ${missing.join(", ")}`);
        throw incompleteInput(missing, `Please provide: ${missing.join(", ")}. I will not assume defaults.`);
      }

      const criteria: IdealCustomerProfile = {
        industry: draft.industry,
        geography: draft.geography,
        roles: draft.roles,
        companySize: draft.companySize,
        exclusions: draft.exclusions,
        fields: [...new Set<LeadField>([...requiredFields, ...draft.fields])],
        keywords: draft.keywords ?? []
      };
      const plan: SearchPlan = {
        queries: buildQueries(criteria, this.options.maxQueriesPerRound),
        minCandidates: this.options.minCandidates,
        maxCandidates: this.options.maxCandidates,
        maxQueries: this.options.maxQueriesPerRound
      };

      state.criteria = criteria;
      state.plan = plan;

      const payload: SearchPlanPayload = { criteria, plan };
      const pending = ctx.requestApproval("search_plan", payload, renderSearchPlan(criteria, plan));
      state.pendingApprovalId = pending.approval.id;
      ctx.log("discovery", "info", `Search plan with ${plan.queries.length} queries awaiting confirmation`);
      return pending;
    });
  }

  async confirmPlan(ctx: SessionContext, approvalId: string): Promise<PendingApproval<Lead[]>> {
    return ctx.exclusive("discovery", async () => {
      const state = ctx.session.discovery;
      const { criteria, plan } = state;
      if (state.stage !== "ClarifyingCriteria" || !criteria || !plan) {
        throw new WorkflowError("InvalidState", "There is no search plan waiting for confirmation");
      }

      ctx.consumeApproval(approvalId, "search_plan", { criteria, plan });
      state.pendingApprovalId = undefined;
      state.stage = "Searching";
      state.round += 1;
      state.issuedQueries = [];

      const collected: CandidateLead[] = [];
      for (const query of plan.queries) {
        if (state.issuedQueries.length >= plan.maxQueries) break;
        if (collected.filter((candidate) => hasSourceUrl(candidate.sourceUrl)).length >= plan.minCandidates) break;

        let results: SearchResult[];
        try {
          results = await this.search.search({
            query,
            keywords: criteria.keywords,
            filters: {
              industry: criteria.industry,
              geography: criteria.geography,
              companySize: criteria.companySize,
              roles: criteria.roles.join(", "),
              exclusions: criteria.exclusions.join(", ")
            },
            limit: plan.maxCandidates
          });
        } catch (error) {
          state.stage = "ClarifyingCriteria";
          const message = ctx.redact(errorMessage(error, "Search failed"));
          ctx.log("discovery", "error", `Search failed for "${query}": ${message}`);
          // The consumed approval is replaced so the same plan can be confirmed again.
          const retry = ctx.requestApproval("search_plan", { criteria, plan }, renderSearchPlan(criteria, plan));
          state.pendingApprovalId = retry.approval.id;
          throw new WorkflowError("CapabilityFailure", `Search failed: ${message}`, { query, approvalId: retry.approval.id });
        }

        state.issuedQueries.push(query);
        let usable = 0;
        for (const result of results) {
          if (!result.contact) continue;
          usable += 1;
          collected.push({
            ...result.contact,
            sourceUrl: result.url,
            snippet: result.snippet,
            publishedAt: result.publishedAt,
            query
          });
        }
        ctx.log("discovery", "info", `Query "${query}" returned ${results.length} results, ${usable} with a contact`);
      }

      if (collected.length < plan.minCandidates) {
        ctx.log(
          "discovery",
          "warn",
          `Only ${collected.length} candidates found after ${state.issuedQueries.length} queries; presenting what was found`
        );
      }

      state.stage = "Validating";
      const { leads, dropped } = validateCandidates(collected.slice(0, plan.maxCandidates), criteria, {
        now: ctx.now(),
        staleAfterDays: this.options.staleAfterDays
      });
      for (const item of dropped) {
        ctx.log("discovery", "info", `Dropped ${item.name} (${item.company}): ${item.reason}`);
      }

      const presentable = leads.filter((lead) => hasSourceUrl(lead.sourceUrl));
      state.candidates = presentable;
      state.dropped = dropped;

      if (presentable.length === 0) {
        state.stage = "ClarifyingCriteria";
        state.plan = undefined;
        throw new WorkflowError("ValidationFailure", "No candidate passed validation; refine the criteria and search again", {
          dropped
        });
      }

      state.stage = "AwaitingApproval";
      const pending = ctx.requestApproval("lead_list", presentable, renderLeadTable(presentable, dropped));
      state.pendingApprovalId = pending.approval.id;
      ctx.log("discovery", "info", `Presenting ${presentable.length} leads for approval`);
      return pending;
    });
  }

  private selectLeadIds(candidates: Lead[], selection: LeadSelection): Set<string> {
    if ("all" in selection) {
      return new Set(candidates.map((lead) => lead.id));
    }

    if ("positions" in selection) {
      const invalid = selection.positions.filter(
        (position) => !Number.isInteger(position) || position < 1 || position > candidates.length
      );
      if (invalid.length > 0) {
        throw new WorkflowError("ValidationFailure", `Lead numbers out of range: ${invalid.join(", ")}`, { invalid });
      }
      return new Set(selection.positions.map((position) => candidates[position - 1].id));
    }

    const known = new Set(candidates.map((lead) => lead.id));
    const unknown = selection.leadIds.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new WorkflowError("ValidationFailure", `Unknown lead ids: ${unknown.join(", ")}`, { unknown });
    }
    return new Set(selection.leadIds);
  }

  async approveLeads(ctx: SessionContext, approvalId: string, selection: LeadSelection): Promise<HandoffPayload> {
    return ctx.exclusive("discovery", async () => {
      const state = ctx.session.discovery;
      if (state.stage !== "AwaitingApproval" || !state.criteria) {
        throw new WorkflowError("InvalidState", "There is no lead list waiting for approval");
      }

      const selected = this.selectLeadIds(state.candidates, selection);
      if (selected.size === 0) {
        throw new WorkflowError("ValidationFailure", "Select at least one lead, or cancel the list");
      }

      ctx.consumeApproval(approvalId, "lead_list", state.candidates);
      state.pendingApprovalId = undefined;
      state.candidates = state.candidates.map((lead) => advanceStatus(lead, selected.has(lead.id) ? "approved" : "rejected"));

      const payload: HandoffPayload = {
        id: uuid(),
        sessionId: ctx.session.id,
        leads: structuredClone(state.candidates.filter((lead) => lead.status === "approved")),
        queries: [...state.issuedQueries],
        criteria: structuredClone(state.criteria),
        createdAt: ctx.now()
      };

      state.handoffs.push(payload);
      state.stage = "HandedOff";
      ctx.log(
        "discovery",
        "info",
        `Handed off ${payload.leads.length} approved leads; ${state.candidates.length - payload.leads.length} rejected`
      );
      return payload;
    });
  }

  async cancel(ctx: SessionContext, approvalId: string): Promise<void> {
    return ctx.exclusive("discovery", async () => {
      const state = ctx.session.discovery;
      if (state.pendingApprovalId !== approvalId) {
        throw new WorkflowError("InvalidState", `Approval ${approvalId} is not the pending discovery decision`);
      }

      const approval = ctx.closeApproval(approvalId, "canceled");
      state.pendingApprovalId = undefined;
      state.candidates = [];
      state.dropped = [];
      if (approval.kind === "search_plan") state.plan = undefined;
      state.stage = "ClarifyingCriteria";
      ctx.log("discovery", "info", `Canceled pending ${approval.kind}; draft discarded`);
    });
  }

  async iterate(ctx: SessionContext, changes: CriteriaInput = {}): Promise<PendingApproval<SearchPlanPayload>> {
    const stage = ctx.session.discovery.stage;
    if (stage !== "AwaitingApproval" && stage !== "HandedOff" && stage !== "ClarifyingCriteria") {
      throw new WorkflowError("InvalidState", `Cannot start a new iteration while ${stage}`);
    }
    ctx.log("discovery", "info", "Starting a new discovery iteration");
    return this.submitCriteria(ctx, changes);
  }
}
