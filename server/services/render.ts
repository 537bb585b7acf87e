import type {
  CapturePlan,
  DatabaseTarget,
  DroppedLead,
  IdealCustomerProfile,
  Lead,
  SearchPlan,
  SendPlan,
  StatusUpdatePlan
} from "../domain/types.js";

function cell(value?: string): string {
  const cleaned = (value ?? "").replace(/\s+/g, " ").replaceAll("|", "\\|").trim();
  return cleaned || "-";
}

export function renderSearchPlan(criteria: IdealCustomerProfile, plan: SearchPlan): string {
  return [
    "Search plan:",
    `- Industry: ${criteria.industry}`,
    `- Geography: ${criteria.geography}`,
    `- Roles: ${criteria.roles.join(", ")}`,
    `- Company size: ${criteria.companySize}`,
    `- Exclusions: ${criteria.exclusions.length > 0 ? criteria.exclusions.join(", ") : "none"}`,
    `- Lead fields: ${criteria.fields.join(", ")}`,
    `- Target: ${plan.minCandidates}-${plan.maxCandidates} leads, up to ${plan.maxQueries} queries`,
    "Queries:",
    ...plan.queries.map((query, index) => `${index + 1}. ${query}`),
    "",
    "Shall I run this search? (approve / revise / cancel)"
  ].join("\n");
}

export function renderLeadTable(leads: Lead[], dropped: DroppedLead[] = []): string {
  const rows = leads.map((lead, index) =>
    [
      String(index + 1),
      cell(lead.name),
      cell(lead.role),
      cell(lead.company),
      cell(lead.email),
      cell(lead.sourceUrl),
      cell([lead.confidence, ...lead.notes, lead.freshness].join("; "))
    ].join(" | ")
  );

  const lines = [
    "| # | Name | Role | Company | Email | Source URL | Confidence / notes |",
    "|---|------|------|---------|-------|------------|--------------------|",
    ...rows.map((row) => `| ${row} |`)
  ];

  if (dropped.length > 0) {
    lines.push("", "Dropped during validation:");
    lines.push(...dropped.map((item) => `- ${item.name} (${item.company}): ${item.reason}`));
  }

  lines.push("", "Which leads should I hand off for capture and outreach? (all / numbers such as 1,3,5 / cancel)");
  return lines.join("\n");
}

export function renderDatabaseChoices(candidates: DatabaseTarget[]): string {
  if (candidates.length === 0) {
    return "No databases are shared with the integration. Share a lead database with it, then ask me to look again.";
  }
  return [
    "Available databases:",
    ...candidates.map((candidate, index) => `${index + 1}. ${candidate.name} (${candidate.id})`),
    "",
    "Which database should hold these leads? Reply with exactly one id."
  ].join("\n");
}

export function renderCapturePlan(plan: CapturePlan, target: DatabaseTarget): string {
  const creates = plan.items.filter((item) => item.action === "create").length;
  const updates = plan.items.length - creates;
  return [
    `Database: ${target.name} (${target.id})`,
    ...plan.items.map((item) =>
      item.action === "create"
        ? `- Create: ${item.leadName}`
        : `- Update: ${item.leadName} (record ${item.recordId ?? "?"}; ${item.reason})`
    ),
    "",
    `Proceed with ${creates} new record(s) and ${updates} update(s)? (approve / cancel)`
  ].join("\n");
}

export function describeSendAction(plan: SendPlan): string {
  const count = plan.recipients.length;
  const base = plan.mode === "single" ? `Send one email to ${count} recipient(s)` : `Send ${count} individual email(s) as a batch`;
  return plan.scheduledAt ? `${base}, scheduled for ${plan.scheduledAt}` : `${base} now`;
}

export function renderSendPlan(plan: SendPlan): string {
  return [
    `- From: ${plan.from}`,
    `- To: ${plan.recipients.map((recipient) => recipient.email).join(", ")}`,
    `- Subject: ${plan.subject}`,
    `- Recipients: ${plan.recipients.length}`,
    `- Action: ${describeSendAction(plan)}`,
    ...(plan.attachments.length > 0 ? [`- Attachments: ${plan.attachments.map((item) => item.filename).join(", ")}`] : []),
    "",
    "Approve sending this email? (approve / revise / cancel)"
  ].join("\n");
}

export function renderStatusUpdate(plan: StatusUpdatePlan, leads: Lead[]): string {
  const names = new Map(leads.map((lead) => [lead.id, lead.name]));
  return [
    "Status updates:",
    ...plan.items.map((item) => `- ${names.get(item.leadId) ?? item.leadId}: record ${item.recordId} → contacted`),
    "",
    `Write ${plan.items.length} status update(s) back to the database? (approve / cancel)`
  ].join("\n");
}
