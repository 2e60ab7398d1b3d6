import nodemailer from "nodemailer";
import { EmailAccount, OutgoingMessage, SendReceipt } from "../types";
import { ConnectionError, SendError, errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("smtp");

export interface Credentials {
  username: string;
  secret: string;
}

/** Resolves stored credentials for an account address. */
export type CredentialSource = (
  accountEmail: string
) => Promise<Credentials | undefined>;

/**
 * Credentials from the environment, handed out only for the configured
 * account address.
 */
export function envCredentials(settings: {
  account?: string;
  username?: string;
  password?: string;
}): CredentialSource {
  return async (accountEmail) => {
    const { account, username, password } = settings;
    if (!account || !password) return undefined;
    if (account.toLowerCase() !== accountEmail.toLowerCase()) return undefined;
    return { username: username || account, secret: password };
  };
}

/** One open session to an outbound mail transport. */
export interface DeliveryChannel {
  readonly isConnected: boolean;
  connect(account: EmailAccount): Promise<void>;
  sendOne(message: OutgoingMessage): Promise<SendReceipt>;
  disconnect(): Promise<void>;
}

export interface MailTransport {
  verify(): Promise<true>;
  sendMail(mail: {
    from: { name: string; address: string };
    to: string;
    subject: string;
    text: string;
  }): Promise<{ messageId: string; response: string }>;
  close(): void;
}

export interface TransportSettings {
  host: string;
  port: number;
  credentials: Credentials;
}

/**
 * Pooled transport capped at a single connection, so every message of a
 * campaign travels over the same authenticated SMTP session.
 */
export function createSmtpTransport(settings: TransportSettings): MailTransport {
  return nodemailer.createTransport({
    pool: true,
    maxConnections: 1,
    maxMessages: Infinity,
    host: settings.host,
    port: settings.port,
    secure: settings.port === 465,
    requireTLS: settings.port !== 465,
    auth: {
      user: settings.credentials.username,
      pass: settings.credentials.secret,
    },
  });
}

function responseCode(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "responseCode" in error) {
    return typeof error.responseCode === "number" ? error.responseCode : undefined;
  }
  return undefined;
}

export class SmtpChannel implements DeliveryChannel {
  private transport: MailTransport | null = null;
  private account: EmailAccount | null = null;

  constructor(
    private readonly loadCredentials: CredentialSource,
    private readonly openTransport: (
      settings: TransportSettings
    ) => MailTransport = createSmtpTransport
  ) {}

  get isConnected(): boolean {
    return this.transport !== null;
  }

  async connect(account: EmailAccount): Promise<void> {
    if (this.transport) {
      throw new ConnectionError(
        `A session for ${this.account?.emailAddress ?? "another account"} is already open`
      );
    }

    const credentials = await this.loadCredentials(account.emailAddress);
    if (!credentials) {
      throw new ConnectionError(
        `Credentials not found for ${account.emailAddress}`
      );
    }

    const transport = this.openTransport({
      host: account.smtpServer,
      port: account.smtpPort,
      credentials,
    });

    try {
      await transport.verify();
    } catch (error) {
      transport.close();
      throw new ConnectionError(
        `SMTP connection to ${account.smtpServer}:${account.smtpPort} failed for ${account.emailAddress}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    this.transport = transport;
    this.account = account;
    log.info(`Connected to SMTP server: ${account.smtpServer}`);
  }

  async sendOne(message: OutgoingMessage): Promise<SendReceipt> {
    if (!this.transport) {
      throw new SendError("SMTP connection not established. Call connect first.");
    }

    try {
      const info = await this.transport.sendMail({
        from: message.from,
        to: message.to,
        subject: message.subject,
        text: message.body,
      });
      return { messageId: info.messageId, response: info.response };
    } catch (error) {
      throw new SendError(errorMessage(error), responseCode(error), {
        cause: error,
      });
    }
  }

  async disconnect(): Promise<void> {
    if (!this.transport) return;
    this.transport.close();
    this.transport = null;
    this.account = null;
    log.info("SMTP connection closed");
  }
}
