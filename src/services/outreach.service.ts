import { startOfDay } from "date-fns";
import { Store } from "../db/store";
import {
  CampaignSummary,
  Clock,
  Contact,
  EmailAccount,
  EmailTemplate,
  FollowupReminder,
  Job,
  RenderedEmail,
  SendOutcome,
  SendReceipt,
} from "../types";
import { NotFoundError, errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { sleep as defaultSleep } from "../utils/time";
import { createFollowupReminder } from "./calendar.service";
import { applySendTransition } from "./followup.service";
import { DeliveryChannel } from "./smtp.service";
import {
  PlaceholderOverrides,
  renderTemplate,
  validateOverrides,
} from "./template.service";

const log = createLogger("outreach");

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RATE_LIMIT_SECONDS = 5;
export const DEFAULT_DAILY_LIMIT = 50;
export const FALLBACK_REMINDER_DAYS = 7;

export interface OutreachDeps {
  store: Store;
  channel: DeliveryChannel;
  account: EmailAccount;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

export interface SendRequest {
  contact: Contact;
  template: EmailTemplate;
  job?: Job | null;
  senderName: string;
  overrides?: Record<string, string>;
  maxAttempts?: number;
  /** Ask for a reminder even when the template is not a follow-up. */
  reminder?: boolean;
}

function describeContact(contact: Contact): string {
  return `${contact.name} <${contact.email}>`;
}

/**
 * Days until the next reminder, or null when the send does not call for one.
 */
export function reminderDays(
  template: Pick<EmailTemplate, "isFollowup" | "daysAfterPrevious">,
  requested = false
): number | null {
  if (template.isFollowup) return template.daysAfterPrevious;
  if (template.daysAfterPrevious > 0 || requested) return FALLBACK_REMINDER_DAYS;
  return null;
}

/**
 * Sends one message over the already open channel, retrying with
 * exponential backoff (1s, 2s, 4s, ...). Exactly one EmailLog row is written
 * for the final outcome; the contact changes only on success.
 */
export async function sendToOne(
  deps: OutreachDeps,
  request: SendRequest
): Promise<SendOutcome> {
  const { store, channel, account } = deps;
  const clock = deps.clock ?? (() => new Date());
  const sleep = deps.sleep ?? defaultSleep;
  const { contact, template, senderName } = request;
  const job = request.job ?? null;
  const maxAttempts = Math.max(1, request.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const overrides: PlaceholderOverrides = validateOverrides(request.overrides);

  let rendered: RenderedEmail | null = null;
  let receipt: SendReceipt | null = null;
  let lastError = "Unknown error";

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      rendered = renderTemplate({
        template,
        contact,
        job,
        senderName,
        overrides,
        now: clock(),
      });
      receipt = await channel.sendOne({
        ...rendered,
        from: { name: senderName, address: account.emailAddress },
        to: contact.email,
      });
      break;
    } catch (error) {
      lastError = errorMessage(error);
      log.warn(
        `Email send attempt ${attempt + 1}/${maxAttempts} to ${contact.email} failed: ${lastError}`
      );

      if (attempt < maxAttempts - 1) {
        const waitSeconds = 2 ** attempt;
        log.info(`Retrying in ${waitSeconds} seconds...`);
        await sleep(waitSeconds * 1000);
      }
    }
  }

  if (receipt && rendered) {
    const sentAt = clock();
    const sentEmail = rendered;
    const smtpResponse = receipt.response;
    const { log: emailLog, contact: updated } = await store.transaction(
      async (tx) => ({
        log: await tx.insertEmailLog({
          contactId: contact.id,
          templateId: template.id,
          jobId: job?.id ?? null,
          subject: sentEmail.subject,
          body: sentEmail.body,
          status: "sent",
          sentAt,
          smtpResponse,
        }),
        contact: await applySendTransition(tx, contact.id, template, sentAt),
      })
    );
    log.info(`Email sent to ${contact.email}`);

    const days = reminderDays(template, request.reminder);
    const reminder: FollowupReminder | null =
      days === null
        ? null
        : createFollowupReminder(
            contact.name,
            contact.companyName || job?.companyName || "",
            days,
            sentAt
          );

    return {
      status: "delivered",
      message: "Email sent successfully!",
      log: emailLog,
      contact: updated,
      reminder,
    };
  }

  const message = `Failed after ${maxAttempts} attempts: ${lastError}`;
  const failedLog = await store.insertEmailLog({
    contactId: contact.id,
    templateId: template.id,
    jobId: job?.id ?? null,
    subject: rendered?.subject ?? template.subject,
    body: rendered?.body ?? template.body,
    status: "failed",
    sentAt: clock(),
    errorMessage: message,
  });
  log.error(`Giving up on ${describeContact(contact)}: ${message}`);

  return { status: "failed", message, log: failedLog };
}

export interface CampaignRequest {
  contactIds: number[];
  templateId: number;
  job?: Job | null;
  senderName: string;
  /** Per-contact placeholder overrides. */
  overridesFor?: (contact: Contact) => Record<string, string> | undefined;
  rateLimitSeconds?: number;
  maxAttempts?: number;
  dailyLimit?: number;
  reminder?: boolean;
  signal?: AbortSignal;
}

/**
 * Sends one template to many contacts, strictly in order, over a single
 * channel session. Per-contact failures are collected; connection and store
 * failures abort the run. The session is always closed.
 */
export async function sendToMany(
  deps: OutreachDeps,
  request: CampaignRequest
): Promise<CampaignSummary> {
  const { store, channel, account } = deps;
  const clock = deps.clock ?? (() => new Date());
  const sleep = deps.sleep ?? defaultSleep;
  const rateLimitSeconds = request.rateLimitSeconds ?? DEFAULT_RATE_LIMIT_SECONDS;
  const dailyLimit = request.dailyLimit ?? DEFAULT_DAILY_LIMIT;

  const template = await store.findTemplate(request.templateId);
  if (!template) throw new NotFoundError("Template", request.templateId);

  const summary: CampaignSummary = {
    sent: 0,
    failed: 0,
    errors: [],
    reminders: [],
    cancelled: false,
  };

  await channel.connect(account);
  log.info(
    `Campaign "${template.name}" started for ${request.contactIds.length} contact(s)`
  );

  try {
    let attempted = false;

    for (const contactId of request.contactIds) {
      if (request.signal?.aborted) {
        summary.cancelled = true;
        log.warn("Campaign cancelled; stopping before the next contact");
        break;
      }

      const contact = await store.findContact(contactId);
      if (!contact) {
        summary.failed++;
        summary.errors.push(new NotFoundError("Contact", contactId).message);
        continue;
      }

      const sentToday = await store.countEmailLogsSince(
        startOfDay(clock()),
        "sent"
      );
      if (sentToday >= dailyLimit) {
        summary.failed++;
        summary.errors.push(
          `${describeContact(contact)}: Daily send limit of ${dailyLimit} reached`
        );
        continue;
      }

      let overrides: Record<string, string> | undefined;
      try {
        overrides = request.overridesFor?.(contact);
        validateOverrides(overrides);
      } catch (error) {
        summary.failed++;
        summary.errors.push(`${describeContact(contact)}: ${errorMessage(error)}`);
        continue;
      }

      if (attempted && rateLimitSeconds > 0) {
        await sleep(rateLimitSeconds * 1000);
      }
      attempted = true;

      const outcome = await sendToOne(deps, {
        contact,
        template,
        job: request.job,
        senderName: request.senderName,
        overrides,
        maxAttempts: request.maxAttempts,
        reminder: request.reminder,
      });

      if (outcome.status === "delivered") {
        summary.sent++;
        if (outcome.reminder) summary.reminders.push(outcome.reminder);
      } else {
        summary.failed++;
        summary.errors.push(`${describeContact(contact)}: ${outcome.message}`);
      }
    }
  } finally {
    await channel.disconnect();
  }

  log.info(`Campaign "${template.name}" finished`, formatCampaignSummary(summary));
  return summary;
}

export function formatCampaignSummary(
  summary: CampaignSummary,
  maxErrors = 5
): string {
  let text = `Sent: ${summary.sent}, Failed: ${summary.failed}`;
  if (summary.cancelled) text += " (cancelled)";
  if (summary.errors.length > 0) {
    text += "\n\nErrors:\n" + summary.errors.slice(0, maxErrors).join("\n");
    if (summary.errors.length > maxErrors) {
      text += `\n…and ${summary.errors.length - maxErrors} more`;
    }
  }
  return text;
}
