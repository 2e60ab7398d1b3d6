import { describe, it, expect, vi } from "vitest";
import { gmail_v1 } from "googleapis";
import {
  Mailbox,
  extractBody,
  fetchRepliesFrom,
  gmailMailbox,
  gmailReplyFetcher,
  parseMessage,
  parseSenderAddress,
  replyQuery,
  stripHtml,
} from "../src/services/gmail.service";

const encode = (value: string) => Buffer.from(value, "utf-8").toString("base64url");

function gmailMessage(
  id: string,
  from: string,
  fields: Partial<gmail_v1.Schema$Message> = {}
): gmail_v1.Schema$Message {
  return {
    id,
    threadId: `thread-${id}`,
    internalDate: "1792411200000",
    payload: {
      mimeType: "text/plain",
      headers: [
        { name: "From", value: from },
        { name: "Subject", value: "Re: Interest in Backend Engineer" },
      ],
      body: { data: encode("Happy to chat!") },
    },
    ...fields,
  };
}

describe("parseSenderAddress", () => {
  it("should extract and lowercase the address", () => {
    expect(parseSenderAddress("Jane Doe <Jane.Doe@Acme.test>")).toBe("jane.doe@acme.test");
    expect(parseSenderAddress(" raj@globex.test ")).toBe("raj@globex.test");
  });

  it("should reject anything without an address", () => {
    expect(parseSenderAddress("Mailer Daemon")).toBeNull();
    expect(parseSenderAddress("")).toBeNull();
  });
});

describe("extractBody", () => {
  it("should find the first text and html parts", () => {
    const body = extractBody({
      mimeType: "multipart/alternative",
      parts: [
        { mimeType: "text/plain", body: { data: encode("Plain ünïcode") } },
        { mimeType: "text/html", body: { data: encode("<p>Rich</p>") } },
        { mimeType: "text/plain", body: { data: encode("Second") } },
      ],
    });

    expect(body).toEqual({ text: "Plain ünïcode", html: "<p>Rich</p>" });
  });

  it("should return empty strings without a payload", () => {
    expect(extractBody(undefined)).toEqual({ text: "", html: "" });
  });
});

describe("stripHtml", () => {
  it("should keep visible text only", () => {
    expect(
      stripHtml(
        "<html><head><style>p{color:red}</style></head><body><p>Hi  Sam,</p>\n<script>x()</script><p>Let's talk.</p></body></html>"
      )
    ).toBe("Hi Sam, Let's talk.");
  });
});

describe("parseMessage", () => {
  it("should build an inbound message from a Gmail payload", () => {
    expect(parseMessage(gmailMessage("m1", "Jane Doe <jane@acme.test>"))).toEqual({
      id: "m1",
      threadId: "thread-m1",
      from: "Jane Doe <jane@acme.test>",
      fromAddress: "jane@acme.test",
      subject: "Re: Interest in Backend Engineer",
      date: "2026-10-19T12:00:00.000Z",
      body: "Happy to chat!",
    });
  });

  it("should fall back to the Date header and stripped html", () => {
    const parsed = parseMessage(
      gmailMessage("m2", "jane@acme.test", {
        internalDate: null,
        payload: {
          mimeType: "text/html",
          headers: [
            { name: "from", value: "jane@acme.test" },
            { name: "Date", value: "Mon, 19 Oct 2026 08:30:00 +0000" },
          ],
          body: { data: encode("<b>Yes</b> please") },
        },
      })
    );

    expect(parsed?.date).toBe("2026-10-19T08:30:00.000Z");
    expect(parsed?.body).toBe("Yes please");
    expect(parsed?.subject).toBe("");
  });

  it("should skip messages without a sender or id", () => {
    expect(parseMessage(gmailMessage("m3", "undisclosed-recipients"))).toBeNull();
    expect(parseMessage({ ...gmailMessage("m4", "jane@acme.test"), id: null })).toBeNull();
  });
});

describe("fetchRepliesFrom", () => {
  it("should query each unique sender once and follow pages", async () => {
    const mailbox: Mailbox = {
      listMessageIds: vi.fn(async (_query: string, pageToken?: string) =>
        pageToken ? { ids: ["m2", "m3"] } : { ids: ["m1"], nextPageToken: "page-2" }
      ),
      getMessage: vi.fn(async (id: string) =>
        id === "m3" ? gmailMessage(id, "no sender") : gmailMessage(id, "Jane <jane@acme.test>")
      ),
    };
    const after = new Date(Date.UTC(2026, 9, 10));

    const messages = await fetchRepliesFrom(
      mailbox,
      ["Jane@Acme.test", "jane@acme.test", " raj@globex.test"],
      after
    );

    expect(messages.map((m) => m.id)).toEqual(["m1", "m2"]);
    expect(mailbox.listMessageIds).toHaveBeenCalledTimes(2);
    expect(mailbox.listMessageIds).toHaveBeenNthCalledWith(
      1,
      "from:(jane@acme.test OR raj@globex.test) after:1791590400",
      undefined
    );
    expect(mailbox.listMessageIds).toHaveBeenNthCalledWith(
      2,
      "from:(jane@acme.test OR raj@globex.test) after:1791590400",
      "page-2"
    );
  });

  it("should split long sender lists into several queries", async () => {
    const listMessageIds = vi.fn(async (_query: string, _pageToken?: string) => ({
      ids: [] as string[],
    }));
    const mailbox: Mailbox = { listMessageIds, getMessage: vi.fn() };
    const addresses = Array.from({ length: 25 }, (_, i) => `person${i}@acme.test`);

    await fetchRepliesFrom(mailbox, addresses, new Date(Date.UTC(2026, 9, 10)));

    expect(listMessageIds).toHaveBeenCalledTimes(2);
    expect(listMessageIds.mock.calls[1][0]).toBe(
      replyQuery(addresses.slice(20), new Date(Date.UTC(2026, 9, 10)))
    );
  });
});

describe("gmailMailbox", () => {
  it("should require a refresh token", () => {
    expect(() =>
      gmailMailbox({
        clientId: "test-client",
        clientSecret: "test-secret",
        redirectUri: "http://localhost",
      })
    ).toThrow("GMAIL_REFRESH_TOKEN is not set. Run `outreach gmail-auth` first.");
  });

  it("should leave reply sync off until a refresh token exists", () => {
    expect(gmailReplyFetcher(undefined)).toBeUndefined();
    expect(
      gmailReplyFetcher({
        clientId: "test-client",
        clientSecret: "test-secret",
        redirectUri: "http://localhost",
      })
    ).toBeUndefined();
  });
});
