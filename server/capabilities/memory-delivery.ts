import { v4 as uuid } from "uuid";
import type {
  Attachment,
  AttachmentSummary,
  DeliveryCapability,
  EmailEvent,
  EmailParams,
  EmailStatus
} from "./types.js";

interface SimulatedEmail {
  status: EmailStatus;
  params: EmailParams;
  attachments: Attachment[];
}

/** Records messages instead of sending them; used when RESEND_API_KEY is not configured. */
export class MemoryDelivery implements DeliveryCapability {
  readonly name = "simulated-delivery";
  readonly sent: EmailParams[] = [];
  private readonly emails = new Map<string, SimulatedEmail>();

  private record(params: EmailParams): string {
    const id = uuid();
    this.sent.push(params);
    this.emails.set(id, {
      params,
      attachments: (params.attachments ?? []).map((attachment) => ({
        id: uuid(),
        filename: attachment.filename,
        contentType: attachment.contentType,
        size: Buffer.byteLength(attachment.content, "base64"),
        content: attachment.content
      })),
      status: {
        id,
        to: [...params.to],
        from: params.from,
        subject: params.subject,
        lastEvent: params.scheduledAt ? "scheduled" : "sent",
        createdAt: new Date().toISOString(),
        scheduledAt: params.scheduledAt
      }
    });
    return id;
  }

  private email(sendId: string): SimulatedEmail {
    const email = this.emails.get(sendId);
    if (!email) throw new Error(`Email ${sendId} not found`);
    return email;
  }

  /** Moves a simulated email to a later delivery event, as a provider webhook would. */
  setEvent(sendId: string, lastEvent: EmailEvent, reason?: string): void {
    const email = this.email(sendId);
    email.status = { ...email.status, lastEvent, reason };
  }

  async sendEmail(params: EmailParams): Promise<string> {
    return this.record(params);
  }

  async sendBatch(params: EmailParams[]): Promise<string[]> {
    return params.map((item) => this.record(item));
  }

  async updateEmail(sendId: string, changes: { scheduledAt: string }): Promise<void> {
    const email = this.email(sendId);
    if (email.status.lastEvent !== "scheduled") {
      throw new Error(`Email ${sendId} is not scheduled and cannot be updated`);
    }
    email.status = { ...email.status, scheduledAt: changes.scheduledAt };
  }

  async cancelEmail(sendId: string): Promise<void> {
    const email = this.email(sendId);
    if (email.status.lastEvent !== "scheduled") {
      throw new Error(`Email ${sendId} is not scheduled and cannot be canceled`);
    }
    email.status = { ...email.status, lastEvent: "canceled" };
  }

  async listEmails(): Promise<EmailStatus[]> {
    return [...this.emails.values()].map((email) => ({ ...email.status }));
  }

  async getEmail(sendId: string): Promise<EmailStatus> {
    return { ...this.email(sendId).status };
  }

  async listAttachments(emailId: string): Promise<AttachmentSummary[]> {
    return this.email(emailId).attachments.map(({ id, filename, contentType, size }) => ({ id, filename, contentType, size }));
  }

  async getAttachment(emailId: string, attachmentId: string): Promise<Attachment> {
    const attachment = this.email(emailId).attachments.find((item) => item.id === attachmentId);
    if (!attachment) throw new Error(`Attachment ${attachmentId} not found on email ${emailId}`);
    return { ...attachment };
  }
}
