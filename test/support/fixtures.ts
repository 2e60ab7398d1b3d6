import { subDays } from "date-fns";
import { DeliveryChannel } from "../../src/services/smtp.service";
import {
  EmailAccount,
  EmailTemplate,
  OutgoingMessage,
  SendReceipt,
} from "../../src/types";
import { SendError } from "../../src/utils/errors";
import { MemoryStore } from "./memory-store";

/** Monday, October 19 2026, noon local time. */
export const NOW = new Date(2026, 9, 19, 12, 0, 0);
export const clock = () => NOW;

export function daysBefore(days: number): Date {
  return subDays(NOW, days);
}

export function addTemplate(
  store: MemoryStore,
  fields: Partial<
    Pick<
      EmailTemplate,
      "name" | "subject" | "body" | "isFollowup" | "daysAfterPrevious"
    >
  > = {}
): Promise<EmailTemplate> {
  return store.insertTemplate({
    name: "Cold Outreach",
    subject: "Interest in {job_title} at {company}",
    body: "Dear {name},\n\nBest regards,\n{your_name}",
    isFollowup: false,
    daysAfterPrevious: 0,
    ...fields,
  });
}

export function addAccount(store: MemoryStore): Promise<EmailAccount> {
  return store.upsertAccount({
    emailAddress: "me@example.com",
    smtpServer: "smtp.example.com",
    smtpPort: 587,
  });
}

/** Delivery channel that records messages and fails on demand. */
export class FakeChannel implements DeliveryChannel {
  isConnected = false;
  connects = 0;
  disconnects = 0;
  readonly sent: OutgoingMessage[] = [];
  connectError: Error | null = null;
  afterSend: (() => void) | null = null;
  private readonly failures: Error[] = [];

  failSends(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  async connect(): Promise<void> {
    this.connects++;
    if (this.connectError) throw this.connectError;
    this.isConnected = true;
  }

  async sendOne(message: OutgoingMessage): Promise<SendReceipt> {
    if (!this.isConnected) {
      throw new SendError("SMTP connection not established. Call connect first.");
    }
    const failure = this.failures.shift();
    if (failure) throw failure;

    this.sent.push(message);
    this.afterSend?.();
    return { messageId: `<${this.sent.length}@test>`, response: "250 2.0.0 OK" };
  }

  async disconnect(): Promise<void> {
    this.disconnects++;
    this.isConnected = false;
  }
}
