import { Store } from "../db/store";
import {
  ActionableItems,
  Contact,
  ContactState,
  EmailTemplate,
  FollowupPatch,
} from "../types";
import { NotFoundError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import {
  dateStringInDays,
  daysAgo,
  noteStamp,
  todayString,
} from "../utils/time";

const log = createLogger("followup");

export const DEFAULT_CANDIDATE_DAYS = 7;
export const DEFAULT_STALE_DAYS = 14;
export const DEFAULT_REPLY_WINDOW_DAYS = 7;

/**
 * Lifecycle state of a contact, derived from its stored fields.
 *
 * Checked in order: REPLIED, FOLLOWUP_DUE, FOLLOWUP_SCHEDULED, NEW, STALE,
 * AWAITING_REPLY. A flagged contact therefore reports its follow-up state
 * even when it has also gone stale.
 */
export function deriveContactState(
  contact: Contact,
  now: Date,
  staleDays = DEFAULT_STALE_DAYS
): ContactState {
  if (contact.replied) return "REPLIED";

  if (contact.needsFollowup && contact.followupDate) {
    return contact.followupDate <= todayString(now)
      ? "FOLLOWUP_DUE"
      : "FOLLOWUP_SCHEDULED";
  }

  if (!contact.lastContacted) return "NEW";
  if (contact.lastContacted < daysAgo(now, staleDays)) return "STALE";
  return "AWAITING_REPLY";
}

/**
 * Contact fields after a successful send. A follow-up template schedules the
 * next touch; any other template clears scheduling and restarts the clock.
 */
export function sendTransition(
  template: Pick<EmailTemplate, "isFollowup" | "daysAfterPrevious">,
  now: Date
): FollowupPatch {
  const base: FollowupPatch = {
    lastContacted: now,
    replied: false,
    replyDate: null,
  };

  if (template.isFollowup) {
    return {
      ...base,
      needsFollowup: true,
      followupDate: dateStringInDays(now, template.daysAfterPrevious),
    };
  }
  return { ...base, needsFollowup: false, followupDate: null };
}

/** Applies `sendTransition` to a stored contact. Use inside a transaction. */
export async function applySendTransition(
  tx: Store,
  contactId: number,
  template: Pick<EmailTemplate, "isFollowup" | "daysAfterPrevious">,
  now: Date
): Promise<Contact> {
  const updated = await tx.updateContact(contactId, sendTransition(template, now));
  if (!updated) throw new NotFoundError("Contact", contactId);
  return updated;
}

export function appendNote(
  existing: string | null,
  note: string,
  now: Date
): string {
  const entry = `[${noteStamp(now)}] ${note}`;
  return existing ? `${existing}\n\n${entry}` : entry;
}

export interface MarkRepliedOptions {
  note?: string;
  now: Date;
}

/**
 * Records a reply. Repeating the call on a contact that already replied
 * changes nothing, including the notes.
 */
export async function markAsReplied(
  store: Store,
  contactId: number,
  options: MarkRepliedOptions
): Promise<Contact> {
  const { now } = options;
  const note = options.note?.trim();

  return store.transaction(async (tx) => {
    const contact = await tx.findContact(contactId);
    if (!contact) throw new NotFoundError("Contact", contactId);

    if (contact.replied) {
      log.debug(`${contact.name} <${contact.email}> already marked as replied`);
      return contact;
    }

    const updated = await tx.updateContact(contactId, {
      replied: true,
      replyDate: now,
      needsFollowup: false,
      followupDate: null,
      ...(note ? { notes: appendNote(contact.notes, note, now) } : {}),
    });
    if (!updated) throw new NotFoundError("Contact", contactId);

    log.info(`Marked ${contact.name} <${contact.email}> as replied`);
    return updated;
  });
}

export function isFollowupCandidate(
  contact: Contact,
  cutoff: Date
): boolean {
  return (
    contact.lastContacted !== null &&
    contact.lastContacted <= cutoff &&
    !contact.needsFollowup &&
    !contact.replied
  );
}

/**
 * Contacts that went quiet for `thresholdDays` and have not been flagged yet.
 *
 * This is not a read: every returned contact is flagged `needsFollowup`
 * with today's date in the same transaction, so an immediate second call
 * returns nothing.
 */
export async function getFollowupCandidates(
  store: Store,
  thresholdDays = DEFAULT_CANDIDATE_DAYS,
  now: Date
): Promise<Contact[]> {
  const cutoff = daysAgo(now, thresholdDays);
  const today = todayString(now);

  const flagged = await store.transaction(async (tx) => {
    const candidates = (await tx.listContacts()).filter((c) =>
      isFollowupCandidate(c, cutoff)
    );

    const result: Contact[] = [];
    for (const candidate of candidates) {
      const updated = await tx.updateContact(candidate.id, {
        needsFollowup: true,
        followupDate: today,
      });
      if (updated) result.push(updated);
    }
    return result;
  });

  if (flagged.length > 0) {
    log.info(`Flagged ${flagged.length} contact(s) for follow-up`);
  }
  return flagged;
}

export interface ActionableOptions {
  staleDays?: number;
  replyWindowDays?: number;
}

/**
 * Three independently filtered buckets, without deduplication. Stale means
 * flagged, unanswered, silent past `staleDays` and overdue.
 */
export function classifyActionable(
  contacts: Contact[],
  now: Date,
  options: ActionableOptions = {}
): ActionableItems {
  const today = todayString(now);
  const staleCutoff = daysAgo(now, options.staleDays ?? DEFAULT_STALE_DAYS);
  const replyCutoff = daysAgo(
    now,
    options.replyWindowDays ?? DEFAULT_REPLY_WINDOW_DAYS
  );

  return {
    dueToday: contacts.filter(
      (c) => c.needsFollowup && c.followupDate === today && !c.replied
    ),
    recentReplies: contacts.filter(
      (c) => c.replied && c.replyDate !== null && c.replyDate >= replyCutoff
    ),
    // a follow-up that falls due today is not stale yet
    stale: contacts.filter(
      (c) =>
        c.lastContacted !== null &&
        c.lastContacted < staleCutoff &&
        !c.replied &&
        c.needsFollowup &&
        (c.followupDate === null || c.followupDate < today)
    ),
  };
}

export async function getActionableItems(
  store: Store,
  now: Date,
  options: ActionableOptions = {}
): Promise<ActionableItems> {
  return classifyActionable(await store.listContacts(), now, options);
}
