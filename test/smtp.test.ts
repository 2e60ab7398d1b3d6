import { describe, it, expect, beforeEach, vi, Mock } from "vitest";
import nodemailer from "nodemailer";
import {
  MailTransport,
  SmtpChannel,
  TransportSettings,
  createSmtpTransport,
  envCredentials,
} from "../src/services/smtp.service";
import { EmailAccount } from "../src/types";
import { ConnectionError, SendError } from "../src/utils/errors";

vi.mock("nodemailer", () => ({
  default: { createTransport: vi.fn(() => ({})) },
}));

const account: EmailAccount = {
  id: 1,
  emailAddress: "me@example.com",
  smtpServer: "smtp.example.com",
  smtpPort: 587,
  isActive: true,
  createdAt: new Date(2026, 0, 1),
  updatedAt: new Date(2026, 0, 1),
};

const message = {
  from: { name: "Sam Rivera", address: "me@example.com" },
  to: "jane@acme.test",
  subject: "Hello",
  body: "Hi Jane",
};

function fakeTransport() {
  return {
    verify: vi.fn(async (): Promise<true> => true),
    sendMail: vi.fn(async () => ({ messageId: "<1@test>", response: "250 OK" })),
    close: vi.fn(),
  } satisfies MailTransport;
}

describe("SmtpChannel", () => {
  let transport: ReturnType<typeof fakeTransport>;
  let openTransport: Mock<(settings: TransportSettings) => MailTransport>;

  beforeEach(() => {
    transport = fakeTransport();
    openTransport = vi.fn((_settings: TransportSettings) => transport);
  });

  const credentials = envCredentials({
    account: "me@example.com",
    username: "me@example.com",
    password: "test-secret",
  });

  it("should open one verified session with the account's server", async () => {
    const channel = new SmtpChannel(credentials, openTransport);

    await channel.connect(account);

    expect(channel.isConnected).toBe(true);
    expect(openTransport).toHaveBeenCalledWith({
      host: "smtp.example.com",
      port: 587,
      credentials: { username: "me@example.com", secret: "test-secret" },
    });
    expect(transport.verify).toHaveBeenCalledOnce();
  });

  it("should refuse to connect without credentials", async () => {
    const channel = new SmtpChannel(async () => undefined, openTransport);

    await expect(channel.connect(account)).rejects.toThrow(
      new ConnectionError("Credentials not found for me@example.com")
    );
    expect(openTransport).not.toHaveBeenCalled();
  });

  it("should close the transport when the handshake fails", async () => {
    transport.verify.mockRejectedValueOnce(new Error("535 Authentication failed"));
    const channel = new SmtpChannel(credentials, openTransport);

    await expect(channel.connect(account)).rejects.toThrow(
      "SMTP connection to smtp.example.com:587 failed for me@example.com: 535 Authentication failed"
    );
    expect(transport.close).toHaveBeenCalledOnce();
    expect(channel.isConnected).toBe(false);
  });

  it("should not open a second session", async () => {
    const channel = new SmtpChannel(credentials, openTransport);
    await channel.connect(account);

    await expect(channel.connect(account)).rejects.toThrow(ConnectionError);
    expect(openTransport).toHaveBeenCalledOnce();
  });

  it("should send over the open session", async () => {
    const channel = new SmtpChannel(credentials, openTransport);
    await channel.connect(account);

    const receipt = await channel.sendOne(message);

    expect(receipt).toEqual({ messageId: "<1@test>", response: "250 OK" });
    expect(transport.sendMail).toHaveBeenCalledWith({
      from: { name: "Sam Rivera", address: "me@example.com" },
      to: "jane@acme.test",
      subject: "Hello",
      text: "Hi Jane",
    });
  });

  it("should fail to send without a session", async () => {
    const channel = new SmtpChannel(credentials, openTransport);

    await expect(channel.sendOne(message)).rejects.toThrow(
      "SMTP connection not established. Call connect first."
    );
  });

  it("should wrap transport errors with the SMTP response code", async () => {
    transport.sendMail.mockRejectedValueOnce(
      Object.assign(new Error("Mailbox unavailable"), { responseCode: 550 })
    );
    const channel = new SmtpChannel(credentials, openTransport);
    await channel.connect(account);

    const error = await channel.sendOne(message).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SendError);
    expect(error).toMatchObject({ message: "Mailbox unavailable", responseCode: 550 });
  });

  it("should disconnect idempotently", async () => {
    const channel = new SmtpChannel(credentials, openTransport);
    await channel.connect(account);

    await channel.disconnect();
    await channel.disconnect();

    expect(transport.close).toHaveBeenCalledOnce();
    expect(channel.isConnected).toBe(false);
  });
});

describe("envCredentials", () => {
  it("should only answer for the configured account", async () => {
    const load = envCredentials({ account: "Me@Example.com", password: "test-secret" });

    expect(await load("me@example.com")).toEqual({
      username: "Me@Example.com",
      secret: "test-secret",
    });
    expect(await load("other@example.com")).toBeUndefined();
  });

  it("should return nothing without a password", async () => {
    const load = envCredentials({ account: "me@example.com" });
    expect(await load("me@example.com")).toBeUndefined();
  });
});

describe("createSmtpTransport", () => {
  it("should pool a single connection with STARTTLS on 587", () => {
    createSmtpTransport({
      host: "smtp.example.com",
      port: 587,
      credentials: { username: "me", secret: "test-secret" },
    });

    expect(nodemailer.createTransport).toHaveBeenCalledWith(
      expect.objectContaining({
        pool: true,
        maxConnections: 1,
        host: "smtp.example.com",
        port: 587,
        secure: false,
        requireTLS: true,
        auth: { user: "me", pass: "test-secret" },
      })
    );
  });

  it("should use implicit TLS on 465", () => {
    createSmtpTransport({
      host: "smtp.example.com",
      port: 465,
      credentials: { username: "me", secret: "test-secret" },
    });

    expect(nodemailer.createTransport).toHaveBeenCalledWith(
      expect.objectContaining({ port: 465, secure: true, requireTLS: false })
    );
  });
});
