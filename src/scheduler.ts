import { Store } from "./db/store";
import {
  DEFAULT_CANDIDATE_DAYS,
  DEFAULT_REPLY_WINDOW_DAYS,
  DEFAULT_STALE_DAYS,
  getActionableItems,
  getFollowupCandidates,
  markAsReplied,
} from "./services/followup.service";
import { ActionableItems, Clock, Contact, InboundMessage } from "./types";
import { NotFoundError } from "./utils/errors";
import { logger } from "./utils/logger";

export type ReplyFetcher = (
  addresses: string[],
  after: Date
) => Promise<InboundMessage[]>;

export interface ReplySyncResult {
  checked: number;
  replied: number;
}

function earliestReply(
  contact: Contact,
  messages: InboundMessage[]
): InboundMessage | undefined {
  const since = contact.lastContacted;
  if (!since) return undefined;
  const address = contact.email.trim().toLowerCase();

  return messages
    .filter((m) => m.fromAddress === address && new Date(m.date) > since)
    .sort((a, b) => a.date.localeCompare(b.date))[0];
}

/**
 * Marks contacts as replied when their inbox shows a message from them
 * newer than our last email. Contacts never emailed are not checked.
 */
export async function syncReplies(
  store: Store,
  fetchReplies: ReplyFetcher,
  now: Date
): Promise<ReplySyncResult> {
  const waiting = (await store.listContacts()).filter(
    (c) => c.lastContacted !== null && !c.replied
  );
  if (waiting.length === 0) return { checked: 0, replied: 0 };

  const after = new Date(
    Math.min(...waiting.map((c) => c.lastContacted?.getTime() ?? now.getTime()))
  );
  const messages = await fetchReplies(
    waiting.map((c) => c.email),
    after
  );

  let replied = 0;
  for (const contact of waiting) {
    const reply = earliestReply(contact, messages);
    if (!reply) continue;

    try {
      await markAsReplied(store, contact.id, {
        note: `Reply received: ${reply.subject || "(no subject)"}`,
        now: new Date(reply.date),
      });
      replied++;
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      logger.warn(`Contact ${contact.id} disappeared during reply sync`);
    }
  }

  return { checked: waiting.length, replied };
}

export interface SweepDeps {
  store: Store;
  /** Absent when Gmail is not configured; reply sync is then skipped. */
  fetchReplies?: ReplyFetcher;
  clock?: Clock;
  thresholdDays?: number;
  staleDays?: number;
  replyWindowDays?: number;
}

export interface SweepReport {
  replies: ReplySyncResult | null;
  flagged: Contact[];
  actionable: ActionableItems | null;
}

export function formatDigest(items: ActionableItems): string {
  const line = (label: string, contacts: Contact[]) =>
    contacts.length === 0
      ? `${label}: none`
      : `${label}: ${contacts.map((c) => `${c.name} (${c.companyName})`).join(", ")}`;

  return [
    line("Due today", items.dueToday),
    line("Recent replies", items.recentReplies),
    line("Stale", items.stale),
  ].join("\n");
}

/**
 * One pass of the follow-up daemon. A failing step is logged and the
 * following steps still run.
 */
export async function runFollowupSweep(deps: SweepDeps): Promise<SweepReport> {
  const now = (deps.clock ?? (() => new Date()))();
  const report: SweepReport = { replies: null, flagged: [], actionable: null };

  if (deps.fetchReplies) {
    try {
      report.replies = await syncReplies(deps.store, deps.fetchReplies, now);
      logger.info(
        `Reply sync: ${report.replies.replied} of ${report.replies.checked} contact(s) replied`
      );
    } catch (error) {
      logger.error("Reply sync failed", error);
    }
  } else {
    logger.debug("Gmail not configured; skipping reply sync");
  }

  try {
    report.flagged = await getFollowupCandidates(
      deps.store,
      deps.thresholdDays ?? DEFAULT_CANDIDATE_DAYS,
      now
    );
  } catch (error) {
    logger.error("Flagging follow-up candidates failed", error);
  }

  try {
    report.actionable = await getActionableItems(deps.store, now, {
      staleDays: deps.staleDays ?? DEFAULT_STALE_DAYS,
      replyWindowDays: deps.replyWindowDays ?? DEFAULT_REPLY_WINDOW_DAYS,
    });
    logger.info(`Follow-up digest\n${formatDigest(report.actionable)}`);
  } catch (error) {
    logger.error("Building the follow-up digest failed", error);
  }

  logger.info(
    `Sweep complete: ${report.flagged.length} newly flagged, ${report.replies?.replied ?? 0} replies recorded`
  );
  return report;
}
