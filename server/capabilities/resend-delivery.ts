import { asArray, asRecord, asString, requestJson } from "./http.js";
import type {
  Attachment,
  AttachmentSummary,
  DeliveryCapability,
  EmailEvent,
  EmailParams,
  EmailStatus
} from "./types.js";

export interface ResendDeliveryOptions {
  apiKey: string;
  timeoutMs: number;
}

const RESEND_API = "https://api.resend.com";

const knownEvents: EmailEvent[] = [
  "queued",
  "scheduled",
  "sent",
  "delivered",
  "delivery_delayed",
  "bounced",
  "complained",
  "opened",
  "clicked",
  "failed",
  "canceled"
];

function toEvent(value: unknown): EmailEvent {
  return knownEvents.find((event) => event === value) ?? "unknown";
}

function toResendParams(params: EmailParams): Record<string, unknown> {
  return {
    from: params.from,
    to: params.to,
    subject: params.subject,
    ...(params.html ? { html: params.html } : {}),
    ...(params.text ? { text: params.text } : {}),
    ...(params.scheduledAt ? { scheduled_at: params.scheduledAt } : {}),
    ...(params.attachments && params.attachments.length > 0
      ? {
          attachments: params.attachments.map((attachment) => ({
            filename: attachment.filename,
            content: attachment.content,
            ...(attachment.contentType ? { content_type: attachment.contentType } : {})
          }))
        }
      : {})
  };
}

export function toEmailStatus(raw: unknown): EmailStatus {
  const entry = asRecord(raw);
  const to = Array.isArray(entry.to)
    ? entry.to.flatMap((item) => asString(item) ?? [])
    : [asString(entry.to)].flatMap((item) => item ?? []);

  return {
    id: asString(entry.id) ?? "",
    to,
    from: asString(entry.from) ?? "",
    subject: asString(entry.subject) ?? "",
    lastEvent: toEvent(entry.last_event),
    createdAt: asString(entry.created_at),
    scheduledAt: asString(entry.scheduled_at),
    reason: asString(entry.reason) ?? asString(asRecord(entry.bounce).message)
  };
}

function toAttachment(raw: unknown): Attachment {
  const entry = asRecord(raw);
  return {
    id: asString(entry.id) ?? "",
    filename: asString(entry.filename) ?? "(unnamed)",
    contentType: asString(entry.content_type),
    size: typeof entry.size === "number" ? entry.size : undefined,
    downloadUrl: asString(entry.download_url),
    content: asString(entry.content)
  };
}

export class ResendDelivery implements DeliveryCapability {
  readonly name = "resend";

  constructor(private readonly options: ResendDeliveryOptions) {}

  private call(path: string, method: "GET" | "POST" | "PATCH", body?: unknown): Promise<unknown> {
    return requestJson("Resend", `${RESEND_API}${path}`, {
      method,
      body,
      timeoutMs: this.options.timeoutMs,
      headers: { Authorization: `Bearer ${this.options.apiKey}` }
    });
  }

  async sendEmail(params: EmailParams): Promise<string> {
    const payload = asRecord(await this.call("/emails", "POST", toResendParams(params)));
    const id = asString(payload.id);
    if (!id) throw new Error("Resend send_email response did not include an id");
    return id;
  }

  async sendBatch(params: EmailParams[]): Promise<string[]> {
    const payload = asRecord(await this.call("/emails/batch", "POST", params.map(toResendParams)));
    const ids = asArray(payload.data).flatMap((item) => asString(asRecord(item).id) ?? []);
    if (ids.length !== params.length) {
      throw new Error(`Resend send_batch returned ${ids.length} ids for ${params.length} messages`);
    }
    return ids;
  }

  async updateEmail(sendId: string, changes: { scheduledAt: string }): Promise<void> {
    await this.call(`/emails/${encodeURIComponent(sendId)}`, "PATCH", { scheduled_at: changes.scheduledAt });
  }

  async cancelEmail(sendId: string): Promise<void> {
    await this.call(`/emails/${encodeURIComponent(sendId)}/cancel`, "POST");
  }

  async listEmails(): Promise<EmailStatus[]> {
    const payload = asRecord(await this.call("/emails", "GET"));
    return asArray(payload.data).map(toEmailStatus);
  }

  async getEmail(sendId: string): Promise<EmailStatus> {
    return toEmailStatus(await this.call(`/emails/${encodeURIComponent(sendId)}`, "GET"));
  }

  async listAttachments(emailId: string): Promise<AttachmentSummary[]> {
    const payload = asRecord(await this.call(`/emails/${encodeURIComponent(emailId)}/attachments`, "GET"));
    return asArray(payload.data).map((item) => {
      const { id, filename, contentType, size } = toAttachment(item);
      return { id, filename, contentType, size };
    });
  }

  async getAttachment(emailId: string, attachmentId: string): Promise<Attachment> {
    return toAttachment(
      await this.call(`/emails/${encodeURIComponent(emailId)}/attachments/${encodeURIComponent(attachmentId)}`, "GET")
    );
  }
}
