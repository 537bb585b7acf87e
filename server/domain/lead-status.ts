import { WorkflowError } from "./errors.js";
import type { Lead, LeadStatus } from "./types.js";

const STATUS_ORDER: LeadStatus[] = ["proposed", "approved", "stored", "contacted"];

export function canTransition(from: LeadStatus, to: LeadStatus): boolean {
  if (from === "rejected") return false;
  if (to === "rejected") return true;
  return STATUS_ORDER.indexOf(to) >= STATUS_ORDER.indexOf(from);
}

export function advanceStatus(lead: Lead, to: LeadStatus): Lead {
  if (!canTransition(lead.status, to)) {
    throw new WorkflowError("InvalidState", `Lead ${lead.name} cannot move from '${lead.status}' to '${to}'`, {
      leadId: lead.id
    });
  }
  return { ...lead, status: to };
}
