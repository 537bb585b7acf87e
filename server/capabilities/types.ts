import type { DatabaseTarget, StoreProperties, StorePropertyType } from "../domain/types.js";

export interface SearchQuery {
  query: string;
  keywords: string[];
  filters: Record<string, string>;
  limit: number;
}

export interface SearchContact {
  name: string;
  role?: string;
  company: string;
  email?: string;
}

export interface SearchResult {
  url: string;
  snippet: string;
  title?: string;
  publishedAt?: string;
  contact?: SearchContact;
}

export interface SearchCapability {
  readonly name: string;
  search(query: SearchQuery): Promise<SearchResult[]>;
}

export interface StoreRecord {
  id: string;
  properties: StoreProperties;
  url?: string;
}

export interface StoreFilter {
  property: string;
  type: StorePropertyType;
  equals: string;
}

export interface StoreCapability {
  readonly name: string;
  listDatabases(): Promise<DatabaseTarget[]>;
  queryDatabase(databaseId: string, filter?: StoreFilter): Promise<StoreRecord[]>;
  listDatabasePages(databaseId: string): Promise<StoreRecord[]>;
  /** Resolves to undefined when the page no longer exists or was archived. */
  fetchPage(pageId: string): Promise<StoreRecord | undefined>;
  createPage(databaseId: string, properties: StoreProperties): Promise<string>;
  updatePage(pageId: string, properties: StoreProperties): Promise<void>;
}

export interface EmailAttachmentInput {
  filename: string;
  content: string;
  contentType?: string;
}

export interface EmailParams {
  from: string;
  to: string[];
  subject: string;
  html?: string;
  text?: string;
  scheduledAt?: string;
  attachments?: EmailAttachmentInput[];
}

export type EmailEvent =
  | "queued"
  | "scheduled"
  | "sent"
  | "delivered"
  | "delivery_delayed"
  | "bounced"
  | "complained"
  | "opened"
  | "clicked"
  | "failed"
  | "canceled"
  | "unknown";

export interface EmailStatus {
  id: string;
  to: string[];
  from: string;
  subject: string;
  lastEvent: EmailEvent;
  createdAt?: string;
  scheduledAt?: string;
  reason?: string;
}

export interface AttachmentSummary {
  id: string;
  filename: string;
  contentType?: string;
  size?: number;
}

export interface Attachment extends AttachmentSummary {
  downloadUrl?: string;
  content?: string;
}

export interface DeliveryCapability {
  readonly name: string;
  sendEmail(params: EmailParams): Promise<string>;
  sendBatch(params: EmailParams[]): Promise<string[]>;
  updateEmail(sendId: string, changes: { scheduledAt: string }): Promise<void>;
  cancelEmail(sendId: string): Promise<void>;
  listEmails(): Promise<EmailStatus[]>;
  getEmail(sendId: string): Promise<EmailStatus>;
  listAttachments(emailId: string): Promise<AttachmentSummary[]>;
  getAttachment(emailId: string, attachmentId: string): Promise<Attachment>;
}

export interface Capabilities {
  search: SearchCapability;
  store: StoreCapability;
  delivery: DeliveryCapability;
}
