import dayjs from "dayjs";
import { v4 as uuid } from "uuid";
import { z } from "zod";
import type {
  Attachment,
  AttachmentSummary,
  DeliveryCapability,
  EmailEvent,
  EmailParams,
  EmailStatus,
  StoreCapability,
  StoreRecord
} from "../capabilities/types.js";
import { WorkflowError, errorMessage, incompleteInput } from "../domain/errors.js";
import { advanceStatus } from "../domain/lead-status.js";
import type {
  CaptureItem,
  CapturePlan,
  CaptureReport,
  DatabaseTarget,
  HandoffPayload,
  Lead,
  LeadSchemaMapping,
  PendingApproval,
  RecipientDelivery,
  SendAttachment,
  SendMode,
  SendPlan,
  SendRecipient,
  StatusUpdatePlan
} from "../domain/types.js";
import { isSameLead } from "../services/lead-normalization.js";
import { renderCapturePlan, renderDatabaseChoices, renderSendPlan, renderStatusUpdate } from "../services/render.js";
import { buildLeadProperties, dedupeFilters, inferSchema, readRecordIdentity, statusProperties } from "../services/store-schema.js";
import type { SessionContext } from "./session-context.js";

export interface OutreachOptions {
  batchLimit: number;
}

export interface SendDraftInput {
  from?: string;
  to?: string[];
  leadIds?: string[];
  useCapturedLeads?: boolean;
  subject?: string;
  html?: string;
  text?: string;
  mode?: SendMode;
  scheduledAt?: string;
  attachments?: SendAttachment[];
}

export type DatabaseResolution =
  | { status: "resolved"; target: DatabaseTarget }
  | { status: "pending"; pending: PendingApproval<DatabaseTarget[]> };

export interface SendReport {
  planId: string;
  status: SendPlan["status"];
  recipients: SendRecipient[];
}

export interface StatusUpdateReport {
  planId: string;
  updated: Array<{ leadId: string; recordId: string }>;
  failed: Array<{ leadId: string; name: string; error: string }>;
}

const emailSchema = z.string().email();

function sendApprovalPayload(plan: SendPlan) {
  return {
    planId: plan.id,
    from: plan.from,
    to: plan.recipients.map((recipient) => recipient.email),
    subject: plan.subject,
    html: plan.html,
    text: plan.text,
    attachments: plan.attachments,
    mode: plan.mode,
    scheduledAt: plan.scheduledAt
  };
}

function deliveryFromEvent(event: EmailEvent): RecipientDelivery {
  switch (event) {
    case "delivered":
      return "delivered";
    case "bounced":
    case "failed":
      return "failed";
    case "canceled":
      return "canceled";
    default:
      return "pending";
  }
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

export class OutreachWorkflow {
  constructor(
    private readonly store: StoreCapability,
    private readonly delivery: DeliveryCapability,
    private readonly options: OutreachOptions
  ) {}

  private capabilityFailure(ctx: SessionContext, action: string, error: unknown): WorkflowError {
    const message = ctx.redact(errorMessage(error, `${action} failed`));
    ctx.log("outreach", "error", `${action} failed: ${message}`);
    return new WorkflowError("CapabilityFailure", `${action} failed: ${message}`);
  }

  private requireTarget(ctx: SessionContext): { target: DatabaseTarget; schema: LeadSchemaMapping } {
    const { databaseTarget, schema } = ctx.session.outreach;
    if (!databaseTarget) {
      throw new WorkflowError("UnresolvedTarget", "No database has been confirmed for these leads yet");
    }
    if (!schema) {
      throw incompleteInput(["schema"], `The property mapping for ${databaseTarget.name} is not known yet`);
    }
    return { target: databaseTarget, schema };
  }

  private findPlan(ctx: SessionContext, planId: string): SendPlan {
    const plan = ctx.session.outreach.sendPlans.find((item) => item.id === planId);
    if (!plan) throw new WorkflowError("NotFound", `Send plan ${planId} not found`);
    return plan;
  }

  private planForSendId(ctx: SessionContext, sendId: string): SendPlan {
    const plan = ctx.session.outreach.sendPlans.find((item) => item.sendIds.includes(sendId));
    if (!plan || plan.dispatchedAt === undefined) {
      throw new WorkflowError("ValidationFailure", `Send id ${sendId} does not belong to a dispatched plan in this session`);
    }
    return plan;
  }

  private replaceLead(ctx: SessionContext, lead: Lead): void {
    const state = ctx.session.outreach;
    state.leads = state.leads.map((item) => (item.id === lead.id ? lead : item));
  }

  async receiveHandoff(ctx: SessionContext, payload: HandoffPayload): Promise<Lead[]> {
    return ctx.exclusive("outreach", async () => {
      const state = ctx.session.outreach;
      const notApproved = payload.leads.filter((lead) => lead.status !== "approved");
      if (notApproved.length > 0) {
        throw new WorkflowError(
          "ValidationFailure",
          `Only approved leads can be handed off; not approved: ${notApproved.map((lead) => lead.name).join(", ")}`
        );
      }

      let added = 0;
      let refreshed = 0;
      let kept = 0;
      for (const incoming of structuredClone(payload.leads)) {
        const existing = state.leads.find((lead) => isSameLead(lead, incoming));
        if (!existing) {
          state.leads.push(incoming);
          added += 1;
          continue;
        }
        // Rejection is terminal; a later handoff does not revive the lead.
        if (existing.status === "rejected") {
          kept += 1;
          continue;
        }
        refreshed += 1;
        this.replaceLead(ctx, {
          ...incoming,
          id: existing.id,
          email: incoming.email ?? existing.email,
          role: incoming.role ?? existing.role,
          storeRecordId: existing.storeRecordId,
          status: existing.status
        });
      }

      if (!state.receivedHandoffIds.includes(payload.id)) state.receivedHandoffIds.push(payload.id);
      ctx.log(
        "outreach",
        "info",
        `Received handoff ${payload.id}: ${added} new, ${refreshed} refreshed${kept > 0 ? `, ${kept} left rejected` : ""}`
      );
      return state.leads.map((lead) => ({ ...lead }));
    });
  }

  async resolveDatabase(ctx: SessionContext): Promise<DatabaseResolution> {
    return ctx.exclusive("outreach", async () => {
      const state = ctx.session.outreach;
      if (state.databaseTarget) {
        ctx.log("outreach", "info", `Reusing database ${state.databaseTarget.name} (${state.databaseTarget.id})`);
        return { status: "resolved", target: { ...state.databaseTarget } };
      }

      state.stage = "ResolvingDatabase";
      let candidates: DatabaseTarget[];
      try {
        candidates = await this.store.listDatabases();
      } catch (error) {
        state.stage = "Idle";
        throw this.capabilityFailure(ctx, "Listing databases", error);
      }

      state.databaseCandidates = candidates;
      const pending = ctx.requestApproval("database_target", candidates, renderDatabaseChoices(candidates));
      ctx.log("outreach", "info", `Asking which of ${candidates.length} databases should hold the leads`);
      return { status: "pending", pending };
    });
  }

  async confirmDatabase(ctx: SessionContext, approvalId: string, databaseId: string): Promise<DatabaseTarget> {
    return ctx.exclusive("outreach", async () => {
      const state = ctx.session.outreach;
      const target = state.databaseCandidates.find((candidate) => candidate.id === databaseId);
      if (!target) {
        throw new WorkflowError("ValidationFailure", `Database ${databaseId} was not one of the listed choices`, {
          choices: state.databaseCandidates.map((candidate) => candidate.id)
        });
      }

      ctx.consumeApproval(approvalId, "database_target", state.databaseCandidates);
      state.databaseTarget = { ...target };
      state.schema = undefined;
      state.stage = "Idle";
      ctx.log("outreach", "info", `Database ${target.name} (${target.id}) confirmed for this session`);
      return { ...target };
    });
  }

  async resolveSchema(ctx: SessionContext, mapping?: LeadSchemaMapping): Promise<LeadSchemaMapping> {
    return ctx.exclusive("outreach", async () => {
      const state = ctx.session.outreach;
      const target = state.databaseTarget;
      if (!target) {
        throw new WorkflowError("UnresolvedTarget", "Confirm a database before mapping its properties");
      }

      if (mapping) {
        state.schema = mapping;
        ctx.log("outreach", "info", `Using supplied property mapping for ${target.name}`);
        return mapping;
      }

      let sample: StoreRecord[];
      try {
        sample = await this.store.listDatabasePages(target.id);
      } catch (error) {
        throw this.capabilityFailure(ctx, "Reading database pages", error);
      }

      if (sample.length === 0) {
        throw incompleteInput(["schema"], `${target.name} has no records to infer properties from; provide a property mapping`);
      }

      const inferred = inferSchema(sample[0]);
      if ("missing" in inferred) {
        throw incompleteInput(
          inferred.missing,
          `Could not find a property for ${inferred.missing.join(", ")} in ${target.name}; provide a property mapping`
        );
      }

      state.schema = inferred.mapping;
      const bound = Object.entries(inferred.mapping).flatMap(([field, binding]) =>
        binding ? [`${field} → ${binding.property}`] : []
      );
      ctx.log("outreach", "info", `Inferred property mapping: ${bound.join(", ")}`);
      return inferred.mapping;
    });
  }

  private async findStoredRecord(lead: Lead, databaseId: string, schema: LeadSchemaMapping): Promise<StoreRecord | undefined> {
    const seen = new Set<string>();
    for (const filter of dedupeFilters(lead, schema)) {
      const records = await this.store.queryDatabase(databaseId, filter);
      for (const record of records) {
        if (seen.has(record.id)) continue;
        seen.add(record.id);
        if (isSameLead(readRecordIdentity(record, schema), lead)) return record;
      }
    }
    return undefined;
  }

  async prepareCapture(ctx: SessionContext, leadIds?: string[]): Promise<PendingApproval<CapturePlan>> {
    return ctx.exclusive("outreach", async () => {
      const state = ctx.session.outreach;
      const { target, schema } = this.requireTarget(ctx);

      const eligible = state.leads.filter((lead) => lead.status === "approved" || lead.status === "stored");
      const selected = leadIds ? eligible.filter((lead) => leadIds.includes(lead.id)) : eligible;
      if (leadIds) {
        const unknown = leadIds.filter((id) => !selected.some((lead) => lead.id === id));
        if (unknown.length > 0) {
          throw new WorkflowError("ValidationFailure", `Leads not available for capture: ${unknown.join(", ")}`, { unknown });
        }
      }
      if (selected.length === 0) {
        throw new WorkflowError("ValidationFailure", "There are no approved leads to capture");
      }

      if (state.capturePlan) this.dropCapturePlan(ctx);
      state.stage = "Deduping";

      const items: CaptureItem[] = [];
      for (const lead of selected) {
        let match: StoreRecord | undefined;
        let earlier: StoreRecord | undefined;
        try {
          match = await this.findStoredRecord(lead, target.id, schema);
          if (!match && lead.storeRecordId) earlier = await this.store.fetchPage(lead.storeRecordId);
        } catch (error) {
          state.stage = "Idle";
          throw this.capabilityFailure(ctx, `Checking ${target.name} for ${lead.name}`, error);
        }

        const properties = buildLeadProperties(lead, schema, { status: "stored" });
        if (match) {
          const reason =
            lead.storeRecordId && lead.storeRecordId !== match.id
              ? `store match replaces earlier record ${lead.storeRecordId}`
              : "already in the database";
          items.push({ leadId: lead.id, leadName: lead.name, action: "update", recordId: match.id, properties, reason });
        } else if (earlier) {
          items.push({
            leadId: lead.id,
            leadName: lead.name,
            action: "update",
            recordId: earlier.id,
            properties,
            reason: "captured earlier in this session"
          });
        } else {
          const reason = lead.storeRecordId ? `earlier record ${lead.storeRecordId} no longer exists` : "new lead";
          items.push({ leadId: lead.id, leadName: lead.name, action: "create", properties, reason });
        }
      }

      const plan: CapturePlan = { id: uuid(), databaseId: target.id, items, preparedAt: ctx.now() };
      state.capturePlan = plan;
      const pending = ctx.requestApproval("capture", plan, renderCapturePlan(plan, target));
      ctx.log(
        "outreach",
        "info",
        `Capture plan ready: ${items.filter((item) => item.action === "create").length} create, ${
          items.filter((item) => item.action === "update").length
        } update`
      );
      return pending;
    });
  }

  async approveCapture(ctx: SessionContext, approvalId: string): Promise<CaptureReport> {
    return ctx.exclusive("outreach", async () => {
      const state = ctx.session.outreach;
      const plan = state.capturePlan;
      if (!plan) {
        throw new WorkflowError("MissingApproval", "There is no capture plan awaiting approval");
      }
      ctx.consumeApproval(approvalId, "capture", plan);
      state.stage = "Capturing";

      const report: CaptureReport = { planId: plan.id, stored: [], failed: [] };
      for (const item of plan.items) {
        try {
          let recordId: string;
          if (item.action === "update" && item.recordId) {
            await this.store.updatePage(item.recordId, item.properties);
            recordId = item.recordId;
          } else {
            recordId = await this.store.createPage(plan.databaseId, item.properties);
          }

          const lead = state.leads.find((candidate) => candidate.id === item.leadId);
          if (lead) {
            this.replaceLead(ctx, { ...advanceStatus(lead, "stored"), storeRecordId: recordId });
          }
          report.stored.push({ leadId: item.leadId, name: item.leadName, recordId, action: item.action });
          ctx.log("outreach", "info", `${item.action === "create" ? "Created" : "Updated"} record ${recordId}`, item.leadId);
        } catch (error) {
          const message = ctx.redact(errorMessage(error, "Write failed"));
          report.failed.push({ leadId: item.leadId, name: item.leadName, error: message });
          ctx.log("outreach", "error", `Could not store ${item.leadName}: ${message}`, item.leadId);
        }
      }

      state.capturePlan = undefined;
      state.stage = "DraftingSend";
      ctx.log("outreach", "info", `Capture finished: ${report.stored.length} stored, ${report.failed.length} failed`);
      return report;
    });
  }

  private recipientsFor(ctx: SessionContext, input: SendDraftInput): SendRecipient[] {
    const leads = ctx.session.outreach.leads;
    if (input.to && input.to.length > 0) {
      return input.to.map((email): SendRecipient => {
        const lead = leads.find((item) => item.email && item.email.toLowerCase() === email.trim().toLowerCase());
        return { email: email.trim(), leadId: lead?.id, delivery: "pending" };
      });
    }

    let selected: Lead[] = [];
    if (input.leadIds && input.leadIds.length > 0) {
      const ids = input.leadIds;
      const unknown = ids.filter((id) => !leads.some((lead) => lead.id === id));
      if (unknown.length > 0) {
        throw new WorkflowError("ValidationFailure", `Unknown lead ids: ${unknown.join(", ")}`, { unknown });
      }
      selected = leads.filter((lead) => ids.includes(lead.id));
    } else if (input.useCapturedLeads) {
      selected = leads.filter((lead) => lead.status === "stored");
    }

    const withoutEmail = selected.filter((lead) => !lead.email);
    for (const lead of withoutEmail) {
      ctx.log("outreach", "warn", `${lead.name} has no email address and is left out of the send`, lead.id);
    }
    return selected.flatMap((lead) => (lead.email ? [{ email: lead.email, leadId: lead.id, delivery: "pending" as const }] : []));
  }

  private buildSendPlan(ctx: SessionContext, input: SendDraftInput): SendPlan {
    const missing: string[] = [];
    if (!input.from?.trim()) missing.push("from");
    if (!input.subject?.trim()) missing.push("subject");
    if (!input.html?.trim() && !input.text?.trim()) missing.push("html or text");
    const recipients = this.recipientsFor(ctx, input);
    if (recipients.length === 0) missing.push("recipients");
    if (missing.length > 0 || !input.from || !input.subject) {
      throw incompleteInput(missing, `Please provide: ${missing.join(", ")}. Nothing is filled in automatically.`);
    }

    if (input.scheduledAt !== undefined && !dayjs(input.scheduledAt).isValid()) {
      throw new WorkflowError("ValidationFailure", `scheduledAt '${input.scheduledAt}' is not an ISO-8601 date`);
    }
    const mode = input.mode ?? (recipients.length > 1 ? "batch" : "single");
    const attachments = input.attachments ?? [];
    if (mode === "batch" && attachments.length > 0) {
      throw new WorkflowError("ValidationFailure", "Batch sends cannot carry attachments; use a single send");
    }

    return {
      id: uuid(),
      from: input.from.trim(),
      recipients,
      subject: input.subject.trim(),
      html: input.html,
      text: input.text,
      attachments,
      mode,
      scheduledAt: input.scheduledAt,
      status: "drafted",
      sendIds: [],
      draftedAt: ctx.now()
    };
  }

  private presentSend(ctx: SessionContext, plan: SendPlan): PendingApproval<SendPlan> {
    const pending = ctx.requestApproval("send", sendApprovalPayload(plan), renderSendPlan(plan));
    plan.approvalId = pending.approval.id;
    plan.status = "presented";
    ctx.session.outreach.stage = "AwaitingSendApproval";
    return { approval: pending.approval, summary: pending.summary, payload: { ...plan } };
  }

  async draftSend(ctx: SessionContext, input: SendDraftInput): Promise<PendingApproval<SendPlan>> {
    return ctx.exclusive("outreach", async () => {
      ctx.session.outreach.stage = "DraftingSend";
      const plan = this.buildSendPlan(ctx, input);
      ctx.session.outreach.sendPlans.push(plan);
      ctx.log("outreach", "info", `Drafted ${plan.mode} send to ${plan.recipients.length} recipient(s)`);
      return this.presentSend(ctx, plan);
    });
  }

  async reviseSend(ctx: SessionContext, planId: string, changes: SendDraftInput): Promise<PendingApproval<SendPlan>> {
    return ctx.exclusive("outreach", async () => {
      const plan = this.findPlan(ctx, planId);
      if (plan.status !== "drafted" && plan.status !== "presented") {
        throw new WorkflowError("InvalidState", `Send plan ${planId} is already ${plan.status} and cannot be revised`);
      }

      const keepRecipients = !changes.to && !changes.leadIds && !changes.useCapturedLeads;
      const revised = this.buildSendPlan(ctx, {
        from: changes.from ?? plan.from,
        subject: changes.subject ?? plan.subject,
        html: changes.html ?? plan.html,
        text: changes.text ?? plan.text,
        mode: changes.mode ?? plan.mode,
        scheduledAt: changes.scheduledAt ?? plan.scheduledAt,
        attachments: changes.attachments ?? plan.attachments,
        to: keepRecipients ? plan.recipients.map((recipient) => recipient.email) : changes.to,
        leadIds: changes.leadIds,
        useCapturedLeads: changes.useCapturedLeads
      });

      if (plan.approvalId) {
        const approval = ctx.findApproval(plan.approvalId);
        if (approval?.status === "pending") ctx.closeApproval(approval.id, "superseded", "send");
      }

      Object.assign(plan, { ...revised, id: plan.id, draftedAt: plan.draftedAt });
      ctx.log("outreach", "info", `Revised send plan ${plan.id}`);
      return this.presentSend(ctx, plan);
    });
  }

  async approveSend(ctx: SessionContext, approvalId: string): Promise<SendPlan> {
    return ctx.exclusive("outreach", async () => {
      const state = ctx.session.outreach;
      const plan = state.sendPlans.find((item) => item.approvalId === approvalId);
      if (!plan) {
        throw new WorkflowError("MissingApproval", `Approval ${approvalId} does not belong to any send plan`);
      }

      const invalid = plan.recipients.filter((recipient) => !emailSchema.safeParse(recipient.email).success);
      if (invalid.length > 0) {
        const addresses = invalid.map((recipient) => recipient.email);
        throw new WorkflowError("ValidationFailure", `Invalid recipient address(es): ${addresses.join(", ")}`, {
          invalid: addresses
        });
      }

      ctx.consumeApproval(approvalId, "send", sendApprovalPayload(plan));
      plan.status = "approved";
      plan.approvedAt = ctx.now();
      state.stage = "Dispatching";

      const base: Omit<EmailParams, "to"> = {
        from: plan.from,
        subject: plan.subject,
        html: plan.html,
        text: plan.text,
        scheduledAt: plan.scheduledAt,
        attachments: plan.attachments.length > 0 ? plan.attachments : undefined
      };

      try {
        if (plan.mode === "single") {
          const sendId = await this.delivery.sendEmail({ ...base, to: plan.recipients.map((recipient) => recipient.email) });
          plan.sendIds.push(sendId);
          for (const recipient of plan.recipients) recipient.sendId = sendId;
        } else {
          for (const group of chunk(plan.recipients, this.options.batchLimit)) {
            const ids = await this.delivery.sendBatch(group.map((recipient) => ({ ...base, to: [recipient.email] })));
            group.forEach((recipient, index) => {
              recipient.sendId = ids[index];
            });
            plan.sendIds.push(...ids);
          }
        }
      } catch (error) {
        plan.status = "failed";
        plan.resultNote = ctx.redact(errorMessage(error, "Dispatch failed"));
        state.stage = "Reporting";
        if (plan.sendIds.length > 0) plan.dispatchedAt = ctx.now();
        throw this.capabilityFailure(ctx, "Sending email", error);
      }

      plan.status = "dispatched";
      plan.dispatchedAt = ctx.now();
      state.stage = "Reporting";
      ctx.log("outreach", "info", `Dispatched plan ${plan.id} as ${plan.sendIds.length} message(s)`);
      return { ...plan, recipients: plan.recipients.map((recipient) => ({ ...recipient })) };
    });
  }

  async updateSend(ctx: SessionContext, sendId: string, changes: { scheduledAt: string }): Promise<SendPlan> {
    return ctx.exclusive("outreach", async () => {
      const plan = this.planForSendId(ctx, sendId);
      if (!dayjs(changes.scheduledAt).isValid()) {
        throw new WorkflowError("ValidationFailure", `scheduledAt '${changes.scheduledAt}' is not an ISO-8601 date`);
      }
      try {
        await this.delivery.updateEmail(sendId, changes);
      } catch (error) {
        throw this.capabilityFailure(ctx, `Rescheduling ${sendId}`, error);
      }
      plan.scheduledAt = changes.scheduledAt;
      ctx.log("outreach", "info", `Rescheduled ${sendId} to ${changes.scheduledAt}`);
      return { ...plan };
    });
  }

  async cancelSend(ctx: SessionContext, sendId: string): Promise<SendPlan> {
    return ctx.exclusive("outreach", async () => {
      const plan = this.planForSendId(ctx, sendId);
      try {
        await this.delivery.cancelEmail(sendId);
      } catch (error) {
        throw this.capabilityFailure(ctx, `Canceling ${sendId}`, error);
      }
      for (const recipient of plan.recipients) {
        if (recipient.sendId === sendId) recipient.delivery = "canceled";
      }
      if (plan.recipients.every((recipient) => recipient.delivery === "canceled")) plan.status = "canceled";
      ctx.log("outreach", "info", `Canceled scheduled send ${sendId}`);
      return { ...plan };
    });
  }

  async report(ctx: SessionContext, planId: string): Promise<SendReport> {
    return ctx.exclusive("outreach", async () => {
      const plan = this.findPlan(ctx, planId);
      if (plan.sendIds.length === 0) {
        throw new WorkflowError("InvalidState", `Send plan ${planId} has not been dispatched`);
      }
      ctx.session.outreach.stage = "Reporting";

      const statuses = new Map<string, EmailStatus>();
      for (const sendId of plan.sendIds) {
        try {
          statuses.set(sendId, await this.delivery.getEmail(sendId));
        } catch (error) {
          throw this.capabilityFailure(ctx, `Reading status of ${sendId}`, error);
        }
      }

      for (const recipient of plan.recipients) {
        const status = recipient.sendId ? statuses.get(recipient.sendId) : undefined;
        if (!status) continue;
        recipient.delivery = deliveryFromEvent(status.lastEvent);
        recipient.reason = recipient.delivery === "failed" ? status.reason ?? status.lastEvent : undefined;
      }

      const terminal = plan.recipients.every((recipient) => recipient.delivery !== "pending");
      if (terminal) {
        if (plan.recipients.some((recipient) => recipient.delivery === "failed")) plan.status = "failed";
        else if (plan.recipients.every((recipient) => recipient.delivery === "canceled")) plan.status = "canceled";
        else plan.status = "delivered";
      }

      const counts = (delivery: RecipientDelivery) => plan.recipients.filter((recipient) => recipient.delivery === delivery).length;
      plan.resultNote = `${counts("delivered")} delivered, ${counts("failed")} failed, ${counts("pending")} pending, ${counts(
        "canceled"
      )} canceled`;
      ctx.log("outreach", "info", `Report for ${plan.id}: ${plan.resultNote}`);

      return {
        planId: plan.id,
        status: plan.status,
        recipients: plan.recipients.map((recipient) => ({ ...recipient }))
      };
    });
  }

  async prepareStatusUpdate(ctx: SessionContext, planId: string): Promise<PendingApproval<StatusUpdatePlan>> {
    return ctx.exclusive("outreach", async () => {
      const state = ctx.session.outreach;
      const { schema } = this.requireTarget(ctx);
      if (!schema.status) {
        throw incompleteInput(["status"], "The database has no status property to update");
      }
      const plan = this.findPlan(ctx, planId);

      const items = plan.recipients.flatMap((recipient) => {
        if (recipient.delivery !== "delivered" || !recipient.leadId) return [];
        const lead = state.leads.find((item) => item.id === recipient.leadId);
        if (!lead?.storeRecordId || lead.status === "contacted") return [];
        return [{ leadId: lead.id, recordId: lead.storeRecordId, properties: statusProperties(schema, "contacted") }];
      });
      if (items.length === 0) {
        throw new WorkflowError("ValidationFailure", "No delivered, stored leads are waiting for a status update");
      }

      if (state.statusUpdatePlan) this.dropStatusUpdatePlan(ctx);
      const update: StatusUpdatePlan = { id: uuid(), sendPlanId: plan.id, items };
      state.statusUpdatePlan = update;
      return ctx.requestApproval("status_update", update, renderStatusUpdate(update, state.leads));
    });
  }

  async approveStatusUpdate(ctx: SessionContext, approvalId: string): Promise<StatusUpdateReport> {
    return ctx.exclusive("outreach", async () => {
      const state = ctx.session.outreach;
      const update = state.statusUpdatePlan;
      if (!update) {
        throw new WorkflowError("MissingApproval", "There is no status update awaiting approval");
      }
      ctx.consumeApproval(approvalId, "status_update", update);

      const report: StatusUpdateReport = { planId: update.sendPlanId, updated: [], failed: [] };
      for (const item of update.items) {
        const lead = state.leads.find((candidate) => candidate.id === item.leadId);
        const name = lead?.name ?? item.leadId;
        try {
          await this.store.updatePage(item.recordId, item.properties);
          if (lead) this.replaceLead(ctx, advanceStatus(lead, "contacted"));
          report.updated.push({ leadId: item.leadId, recordId: item.recordId });
          ctx.log("outreach", "info", `Marked record ${item.recordId} as contacted`, item.leadId);
        } catch (error) {
          const message = ctx.redact(errorMessage(error, "Update failed"));
          report.failed.push({ leadId: item.leadId, name, error: message });
          ctx.log("outreach", "error", `Could not update ${name}: ${message}`, item.leadId);
        }
      }

      state.statusUpdatePlan = undefined;
      return report;
    });
  }

  private async passThrough<T>(ctx: SessionContext, action: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw this.capabilityFailure(ctx, action, error);
    }
  }

  async listEmails(ctx: SessionContext): Promise<EmailStatus[]> {
    return this.passThrough(ctx, "Listing emails", () => this.delivery.listEmails());
  }

  async getEmail(ctx: SessionContext, sendId: string): Promise<EmailStatus> {
    return this.passThrough(ctx, `Reading email ${sendId}`, () => this.delivery.getEmail(sendId));
  }

  async listAttachments(ctx: SessionContext, emailId: string): Promise<AttachmentSummary[]> {
    return this.passThrough(ctx, `Listing attachments of ${emailId}`, () => this.delivery.listAttachments(emailId));
  }

  async getAttachment(ctx: SessionContext, emailId: string, attachmentId: string): Promise<Attachment> {
    return this.passThrough(ctx, `Reading attachment ${attachmentId}`, () => this.delivery.getAttachment(emailId, attachmentId));
  }

  private dropCapturePlan(ctx: SessionContext): void {
    const state = ctx.session.outreach;
    const pending = ctx.session.approvals.find((approval) => approval.kind === "capture" && approval.status === "pending");
    if (pending) ctx.closeApproval(pending.id, "superseded");
    state.capturePlan = undefined;
  }

  private dropStatusUpdatePlan(ctx: SessionContext): void {
    const pending = ctx.session.approvals.find((approval) => approval.kind === "status_update" && approval.status === "pending");
    if (pending) ctx.closeApproval(pending.id, "superseded");
    ctx.session.outreach.statusUpdatePlan = undefined;
  }

  async cancel(ctx: SessionContext, approvalId: string): Promise<void> {
    return ctx.exclusive("outreach", async () => {
      const state = ctx.session.outreach;
      const approval = ctx.findApproval(approvalId);
      if (!approval || approval.kind === "search_plan" || approval.kind === "lead_list") {
        throw new WorkflowError("MissingApproval", `No pending outreach approval ${approvalId}`);
      }

      ctx.closeApproval(approvalId, "canceled");
      switch (approval.kind) {
        case "capture":
          state.capturePlan = undefined;
          break;
        case "status_update":
          state.statusUpdatePlan = undefined;
          break;
        case "database_target":
          state.databaseCandidates = [];
          break;
        case "send": {
          const plan = state.sendPlans.find((item) => item.approvalId === approvalId);
          if (plan) plan.status = "canceled";
          break;
        }
      }
      state.stage = "Idle";
      ctx.log("outreach", "info", `Canceled pending ${approval.kind}; nothing was written or sent`);
    });
  }
}
