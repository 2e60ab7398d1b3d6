import { google, gmail_v1 } from "googleapis";
import * as cheerio from "cheerio";
import { ReplyFetcher } from "../scheduler";
import { InboundMessage } from "../types";
import { GmailSettings } from "../utils/config";
import { ConnectionError } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("gmail");

const SCOPES = ["https://www.googleapis.com/auth/gmail.readonly"];

// Gmail rejects very long queries; sender lists are split into chunks.
const ADDRESSES_PER_QUERY = 20;

/** The slice of the Gmail API the reply sync reads through. */
export interface Mailbox {
  listMessageIds(
    query: string,
    pageToken?: string
  ): Promise<{ ids: string[]; nextPageToken?: string }>;
  getMessage(id: string): Promise<gmail_v1.Schema$Message>;
}

function oauthClient(settings: GmailSettings) {
  return new google.auth.OAuth2(
    settings.clientId,
    settings.clientSecret,
    settings.redirectUri
  );
}

export function buildAuthUrl(settings: GmailSettings): string {
  return oauthClient(settings).generateAuthUrl({
    access_type: "offline",
    scope: SCOPES,
    prompt: "consent",
  });
}

/** Trades the code from the consent redirect for a refresh token. */
export async function exchangeCode(
  settings: GmailSettings,
  code: string
): Promise<string> {
  const { tokens } = await oauthClient(settings).getToken(
    decodeURIComponent(code.trim())
  );
  if (!tokens.refresh_token) {
    throw new ConnectionError(
      "Google did not return a refresh token; revoke the app's access and try again"
    );
  }
  return tokens.refresh_token;
}

export function gmailMailbox(settings: GmailSettings): Mailbox {
  if (!settings.refreshToken) {
    throw new ConnectionError(
      "GMAIL_REFRESH_TOKEN is not set. Run `outreach gmail-auth` first."
    );
  }

  const auth = oauthClient(settings);
  auth.setCredentials({ refresh_token: settings.refreshToken });
  const gmail = google.gmail({ version: "v1", auth });

  return {
    async listMessageIds(query, pageToken) {
      const response = await gmail.users.messages.list({
        userId: "me",
        q: query,
        maxResults: 50,
        pageToken,
      });
      const ids = (response.data.messages || []).flatMap((m) =>
        m.id ? [m.id] : []
      );
      return { ids, nextPageToken: response.data.nextPageToken ?? undefined };
    },
    async getMessage(id) {
      const response = await gmail.users.messages.get({
        userId: "me",
        id,
        format: "full",
      });
      return response.data;
    },
  };
}

/** Reply lookup for the sweep, or undefined until Gmail is authorized. */
export function gmailReplyFetcher(
  settings: GmailSettings | undefined
): ReplyFetcher | undefined {
  if (!settings?.refreshToken) return undefined;
  const mailbox = gmailMailbox(settings);
  return (addresses, after) => fetchRepliesFrom(mailbox, addresses, after);
}

export function replyQuery(addresses: string[], after: Date): string {
  const epoch = Math.floor(after.getTime() / 1000);
  return `from:(${addresses.join(" OR ")}) after:${epoch}`;
}

/**
 * Messages sent by any of `addresses` after `after`. Messages that cannot be
 * parsed are logged and skipped.
 */
export async function fetchRepliesFrom(
  mailbox: Mailbox,
  addresses: string[],
  after: Date
): Promise<InboundMessage[]> {
  const unique = [...new Set(addresses.map((a) => a.trim().toLowerCase()))];
  const messages: InboundMessage[] = [];

  for (let i = 0; i < unique.length; i += ADDRESSES_PER_QUERY) {
    const query = replyQuery(unique.slice(i, i + ADDRESSES_PER_QUERY), after);
    log.debug("Gmail query", query);

    let pageToken: string | undefined;
    do {
      const page = await mailbox.listMessageIds(query, pageToken);
      for (const id of page.ids) {
        const parsed = parseMessage(await mailbox.getMessage(id));
        if (parsed) messages.push(parsed);
      }
      pageToken = page.nextPageToken;
    } while (pageToken);
  }

  log.info(`Fetched ${messages.length} message(s) from ${unique.length} contact address(es)`);
  return messages;
}

export function parseMessage(
  message: gmail_v1.Schema$Message
): InboundMessage | null {
  const id = message.id;
  if (!id) return null;

  const headers = message.payload?.headers || [];
  const getHeader = (name: string) =>
    headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ||
    "";

  const from = getHeader("From");
  const fromAddress = parseSenderAddress(from);
  const received = message.internalDate
    ? new Date(Number(message.internalDate))
    : new Date(getHeader("Date"));

  if (!fromAddress || Number.isNaN(received.getTime())) {
    log.warn(`Skipping message ${id}: missing sender or date`);
    return null;
  }

  const { text, html } = extractBody(message.payload);

  return {
    id,
    threadId: message.threadId || id,
    from,
    fromAddress,
    subject: getHeader("Subject"),
    date: received.toISOString(),
    body: html && !text ? stripHtml(html) : text,
  };
}

/** `Jane Doe <Jane@Example.com>` → `jane@example.com`. */
export function parseSenderAddress(from: string): string | null {
  const bracketed = from.match(/<([^<>\s]+@[^<>\s]+)>/);
  const address = bracketed ? bracketed[1] : from.trim();
  return /^[^\s@<>]+@[^\s@<>]+$/.test(address) ? address.toLowerCase() : null;
}

export function extractBody(payload?: gmail_v1.Schema$MessagePart): {
  text: string;
  html: string;
} {
  let text = "";
  let html = "";

  if (!payload) return { text, html };

  if (payload.mimeType === "text/plain" && payload.body?.data) {
    text = decodeBase64(payload.body.data);
  } else if (payload.mimeType === "text/html" && payload.body?.data) {
    html = decodeBase64(payload.body.data);
  }

  for (const part of payload.parts || []) {
    const result = extractBody(part);
    if (result.text && !text) text = result.text;
    if (result.html && !html) html = result.html;
  }

  return { text, html };
}

function decodeBase64(data: string): string {
  return Buffer.from(data, "base64url").toString("utf-8");
}

export function stripHtml(html: string): string {
  const $ = cheerio.load(html);
  $("style, script").remove();
  return $("body").text().replace(/\s+/g, " ").trim();
}
