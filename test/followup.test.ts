import { describe, it, expect, beforeEach } from "vitest";
import {
  classifyActionable,
  deriveContactState,
  getActionableItems,
  getFollowupCandidates,
  markAsReplied,
  sendTransition,
} from "../src/services/followup.service";
import { sendToOne } from "../src/services/outreach.service";
import { Contact } from "../src/types";
import { NotFoundError, StoreError } from "../src/utils/errors";
import { MemoryStore } from "./support/memory-store";
import {
  FakeChannel,
  NOW,
  addAccount,
  addTemplate,
  clock,
  daysBefore,
} from "./support/fixtures";

let store: MemoryStore;

beforeEach(() => {
  store = new MemoryStore();
});

function contact(fields: Partial<Contact> = {}): Contact {
  return store.putContact({ name: "Jane Doe", email: "jane@acme.test", ...fields });
}

describe("deriveContactState", () => {
  it("should derive every state from stored fields", () => {
    expect(deriveContactState(contact(), NOW)).toBe("NEW");
    expect(deriveContactState(contact({ lastContacted: daysBefore(3) }), NOW)).toBe(
      "AWAITING_REPLY"
    );
    expect(deriveContactState(contact({ lastContacted: daysBefore(15) }), NOW)).toBe("STALE");
    expect(
      deriveContactState(
        contact({ lastContacted: daysBefore(3), needsFollowup: true, followupDate: "2026-10-19" }),
        NOW
      )
    ).toBe("FOLLOWUP_DUE");
    expect(
      deriveContactState(
        contact({ lastContacted: daysBefore(1), needsFollowup: true, followupDate: "2026-10-22" }),
        NOW
      )
    ).toBe("FOLLOWUP_SCHEDULED");
    expect(
      deriveContactState(
        contact({ lastContacted: daysBefore(30), replied: true, replyDate: NOW }),
        NOW
      )
    ).toBe("REPLIED");
  });

  it("should prefer the follow-up state over staleness", () => {
    const c = contact({
      lastContacted: daysBefore(20),
      needsFollowup: true,
      followupDate: "2026-10-01",
    });
    expect(deriveContactState(c, NOW)).toBe("FOLLOWUP_DUE");
  });
});

describe("sendTransition", () => {
  it("should schedule the next touch for a follow-up template", () => {
    expect(sendTransition({ isFollowup: true, daysAfterPrevious: 3 }, NOW)).toEqual({
      lastContacted: NOW,
      replied: false,
      replyDate: null,
      needsFollowup: true,
      followupDate: "2026-10-22",
    });
  });

  it("should clear scheduling for a cold template", () => {
    expect(sendTransition({ isFollowup: false, daysAfterPrevious: 5 }, NOW)).toEqual({
      lastContacted: NOW,
      replied: false,
      replyDate: null,
      needsFollowup: false,
      followupDate: null,
    });
  });
});

describe("getFollowupCandidates", () => {
  it("should flag quiet contacts exactly once", async () => {
    const quiet = contact({ lastContacted: daysBefore(10) });

    const first = await getFollowupCandidates(store, 7, NOW);
    expect(first.map((c) => c.id)).toEqual([quiet.id]);
    expect(first[0].needsFollowup).toBe(true);
    expect(first[0].followupDate).toBe("2026-10-19");

    expect(await getFollowupCandidates(store, 7, NOW)).toEqual([]);
  });

  it("should include the threshold day and skip everyone else", async () => {
    const boundary = contact({ lastContacted: daysBefore(7) });
    contact({ email: "recent@acme.test", lastContacted: daysBefore(6) });
    contact({ email: "never@acme.test" });
    contact({
      email: "replied@acme.test",
      lastContacted: daysBefore(20),
      replied: true,
      replyDate: daysBefore(2),
    });
    contact({
      email: "flagged@acme.test",
      lastContacted: daysBefore(20),
      needsFollowup: true,
      followupDate: "2026-10-01",
    });

    const flagged = await getFollowupCandidates(store, 7, NOW);
    expect(flagged.map((c) => c.id)).toEqual([boundary.id]);
  });

  it("should be reset by a later cold send", async () => {
    const quiet = contact({ lastContacted: daysBefore(10) });
    await getFollowupCandidates(store, 7, NOW);

    const cold = await addTemplate(store);
    const account = await addAccount(store);
    const channel = new FakeChannel();
    await channel.connect();

    const outcome = await sendToOne(
      { store, channel, account, clock, sleep: async () => {} },
      { contact: quiet, template: cold, senderName: "Sam" }
    );

    expect(outcome.status).toBe("delivered");
    const after = store.contact(quiet.id);
    expect(after?.needsFollowup).toBe(false);
    expect(after?.followupDate).toBeNull();
    expect(after?.lastContacted).toEqual(NOW);
  });

  it("should roll back every flag when the store fails midway", async () => {
    const a = contact({ lastContacted: daysBefore(10) });
    const b = contact({ email: "raj@globex.test", lastContacted: daysBefore(12) });
    store.failNext("updateContact", new StoreError("Database error during update contact"), 1);

    await expect(getFollowupCandidates(store, 7, NOW)).rejects.toThrow(StoreError);

    expect(store.contact(a.id)?.needsFollowup).toBe(false);
    expect(store.contact(b.id)?.needsFollowup).toBe(false);
    expect(store.rollbacks).toBe(1);
  });
});

describe("markAsReplied", () => {
  it("should record the reply and append a stamped note", async () => {
    const c = contact({
      lastContacted: daysBefore(4),
      needsFollowup: true,
      followupDate: "2026-10-22",
      notes: "Met at the meetup",
    });

    const updated = await markAsReplied(store, c.id, { note: "Phone screen booked", now: NOW });

    expect(updated.replied).toBe(true);
    expect(updated.replyDate).toEqual(NOW);
    expect(updated.needsFollowup).toBe(false);
    expect(updated.followupDate).toBeNull();
    expect(updated.notes).toBe("Met at the meetup\n\n[2026-10-19 12:00] Phone screen booked");
  });

  it("should change nothing the second time", async () => {
    const c = contact({ lastContacted: daysBefore(4) });

    const first = await markAsReplied(store, c.id, { note: "Replied", now: NOW });
    const second = await markAsReplied(store, c.id, { note: "Replied", now: NOW });

    expect(second).toEqual(first);
    expect(second.notes).toBe("[2026-10-19 12:00] Replied");
  });

  it("should not touch notes when no note is given", async () => {
    const c = contact({ lastContacted: daysBefore(4), notes: "keep" });
    const updated = await markAsReplied(store, c.id, { note: "  ", now: NOW });
    expect(updated.notes).toBe("keep");
  });

  it("should fail for an unknown contact", async () => {
    await expect(markAsReplied(store, 404, { now: NOW })).rejects.toThrow(
      new NotFoundError("Contact", 404).message
    );
  });

  it("should leave the contact unchanged when the store fails", async () => {
    const c = contact({
      lastContacted: daysBefore(4),
      needsFollowup: true,
      followupDate: "2026-10-22",
    });
    store.failNext("updateContact");

    await expect(markAsReplied(store, c.id, { note: "x", now: NOW })).rejects.toThrow(StoreError);
    expect(store.contact(c.id)).toEqual(c);
  });
});

describe("actionable items", () => {
  it("should put a follow-up due today in dueToday and not in stale", () => {
    const c = contact({
      lastContacted: daysBefore(20),
      needsFollowup: true,
      followupDate: "2026-10-19",
    });

    const items = classifyActionable([c], NOW);

    expect(items.dueToday.map((x) => x.id)).toEqual([c.id]);
    expect(items.stale).toEqual([]);
  });

  it("should report overdue follow-ups past the stale threshold", () => {
    const overdue = contact({
      lastContacted: daysBefore(20),
      needsFollowup: true,
      followupDate: "2026-10-12",
    });
    const recent = contact({
      lastContacted: daysBefore(10),
      needsFollowup: true,
      followupDate: "2026-10-12",
    });
    const unflagged = contact({ lastContacted: daysBefore(20) });

    const items = classifyActionable([overdue, recent, unflagged], NOW);

    expect(items.stale.map((x) => x.id)).toEqual([overdue.id]);
    expect(items.dueToday).toEqual([]);
  });

  it("should list replies from the last seven days", async () => {
    const fresh = contact({
      lastContacted: daysBefore(10),
      replied: true,
      replyDate: daysBefore(3),
    });
    contact({ lastContacted: daysBefore(30), replied: true, replyDate: daysBefore(8) });

    const items = await getActionableItems(store, NOW);

    expect(items.recentReplies.map((x) => x.id)).toEqual([fresh.id]);
  });

  it("should honour custom thresholds", () => {
    const c = contact({
      lastContacted: daysBefore(10),
      needsFollowup: true,
      followupDate: "2026-10-15",
    });

    expect(classifyActionable([c], NOW, { staleDays: 7 }).stale).toHaveLength(1);
    expect(classifyActionable([c], NOW).stale).toHaveLength(0);
  });
});
