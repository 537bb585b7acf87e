export type LeadStatus = "proposed" | "approved" | "stored" | "contacted" | "rejected";

export type LeadConfidence = "high" | "medium" | "low";

export type LeadField = "name" | "company" | "role" | "email" | "sourceUrl" | "status" | "notes";

export interface Lead {
  id: string;
  name: string;
  role?: string;
  company: string;
  email?: string;
  sourceUrl: string;
  confidence: LeadConfidence;
  notes: string[];
  freshness: string;
  status: LeadStatus;
  storeRecordId?: string;
  foundAt: string;
  query?: string;
}

export interface DroppedLead {
  name: string;
  company: string;
  sourceUrl?: string;
  reason: string;
}

export interface IdealCustomerProfile {
  industry: string;
  geography: string;
  roles: string[];
  companySize: string;
  exclusions: string[];
  fields: LeadField[];
  keywords: string[];
}

export type DiscoveryStage = "ClarifyingCriteria" | "Searching" | "Validating" | "AwaitingApproval" | "HandedOff";

export interface SearchPlan {
  queries: string[];
  minCandidates: number;
  maxCandidates: number;
  maxQueries: number;
}

export interface HandoffPayload {
  id: string;
  sessionId: string;
  leads: Lead[];
  queries: string[];
  criteria: IdealCustomerProfile;
  createdAt: string;
}

export interface DiscoveryState {
  stage: DiscoveryStage;
  criteriaDraft: Partial<IdealCustomerProfile>;
  criteria?: IdealCustomerProfile;
  plan?: SearchPlan;
  issuedQueries: string[];
  candidates: Lead[];
  dropped: DroppedLead[];
  pendingApprovalId?: string;
  handoffs: HandoffPayload[];
  round: number;
}

export interface DatabaseTarget {
  id: string;
  name: string;
}

export type StorePropertyType =
  | "title"
  | "rich_text"
  | "email"
  | "url"
  | "select"
  | "status"
  | "phone_number"
  | "number"
  | "unknown";

export interface StoreProperty {
  type: StorePropertyType;
  value: string;
}

export type StoreProperties = Record<string, StoreProperty>;

export interface PropertyBinding {
  property: string;
  type: StorePropertyType;
}

export type LeadSchemaMapping = { name: PropertyBinding } & Partial<Record<Exclude<LeadField, "name">, PropertyBinding>>;

export interface CaptureItem {
  leadId: string;
  leadName: string;
  action: "create" | "update";
  recordId?: string;
  properties: StoreProperties;
  reason: string;
}

export interface CapturePlan {
  id: string;
  databaseId: string;
  items: CaptureItem[];
  preparedAt: string;
}

export interface CaptureFailure {
  leadId: string;
  name: string;
  error: string;
}

export interface CaptureReport {
  planId: string;
  stored: Array<{ leadId: string; name: string; recordId: string; action: "create" | "update" }>;
  failed: CaptureFailure[];
}

export type SendMode = "single" | "batch";

export type SendPlanStatus = "drafted" | "presented" | "approved" | "dispatched" | "delivered" | "failed" | "canceled";

export type RecipientDelivery = "pending" | "delivered" | "failed" | "canceled";

export interface SendRecipient {
  email: string;
  leadId?: string;
  sendId?: string;
  delivery: RecipientDelivery;
  reason?: string;
}

export interface SendAttachment {
  filename: string;
  content: string;
  contentType?: string;
}

export interface SendPlan {
  id: string;
  from: string;
  recipients: SendRecipient[];
  subject: string;
  html?: string;
  text?: string;
  attachments: SendAttachment[];
  mode: SendMode;
  scheduledAt?: string;
  status: SendPlanStatus;
  sendIds: string[];
  approvalId?: string;
  draftedAt: string;
  approvedAt?: string;
  dispatchedAt?: string;
  resultNote?: string;
}

export type OutreachStage =
  | "Idle"
  | "ResolvingDatabase"
  | "Deduping"
  | "Capturing"
  | "DraftingSend"
  | "AwaitingSendApproval"
  | "Dispatching"
  | "Reporting";

export interface StatusUpdateItem {
  leadId: string;
  recordId: string;
  properties: StoreProperties;
}

export interface StatusUpdatePlan {
  id: string;
  sendPlanId: string;
  items: StatusUpdateItem[];
}

export interface OutreachState {
  stage: OutreachStage;
  leads: Lead[];
  databaseTarget?: DatabaseTarget;
  databaseCandidates: DatabaseTarget[];
  schema?: LeadSchemaMapping;
  capturePlan?: CapturePlan;
  statusUpdatePlan?: StatusUpdatePlan;
  sendPlans: SendPlan[];
  receivedHandoffIds: string[];
}

export type ApprovalKind = "search_plan" | "lead_list" | "database_target" | "capture" | "send" | "status_update";

export type ApprovalStatus = "pending" | "approved" | "canceled" | "superseded";

export interface Approval {
  id: string;
  kind: ApprovalKind;
  fingerprint: string;
  summary: string;
  status: ApprovalStatus;
  requestedAt: string;
  decidedAt?: string;
  decidedBy?: string;
}

export type WorkflowScope = "discovery" | "outreach";

export interface SessionLog {
  id: string;
  timestamp: string;
  level: "info" | "warn" | "error";
  scope: WorkflowScope;
  message: string;
  leadId?: string;
}

export interface Session {
  id: string;
  createdAt: string;
  updatedAt: string;
  discovery: DiscoveryState;
  outreach: OutreachState;
  approvals: Approval[];
  logs: SessionLog[];
}

export interface PendingApproval<T = unknown> {
  approval: Approval;
  summary: string;
  payload: T;
}
