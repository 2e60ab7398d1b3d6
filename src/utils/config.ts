import dotenv from "dotenv";
import path from "path";

dotenv.config({ path: path.resolve(__dirname, "../../.env") });

function required(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function optional(key: string): string | undefined {
  const value = process.env[key];
  return value ? value : undefined;
}

function integer(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative integer`);
  }
  return value;
}

export interface GmailSettings {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  refreshToken?: string;
}

function gmailSettings(): GmailSettings | undefined {
  const clientId = optional("GMAIL_CLIENT_ID");
  const clientSecret = optional("GMAIL_CLIENT_SECRET");
  if (!clientId || !clientSecret) return undefined;
  return {
    clientId,
    clientSecret,
    redirectUri:
      process.env.GMAIL_REDIRECT_URI || "http://localhost:3000/oauth2callback",
    refreshToken: optional("GMAIL_REFRESH_TOKEN"),
  };
}

export const config = {
  database: {
    url: required("DATABASE_URL"),
  },
  smtp: {
    account: optional("SMTP_ACCOUNT"),
    username: optional("SMTP_USERNAME"),
    password: optional("SMTP_PASSWORD"),
  },
  outreach: {
    senderName: process.env.SENDER_NAME || "Your Name",
    maxAttempts: integer("SEND_MAX_ATTEMPTS", 3),
    rateLimitSeconds: integer("SEND_RATE_LIMIT_SECONDS", 5),
    dailyLimit: integer("SEND_DAILY_LIMIT", 50),
  },
  followup: {
    thresholdDays: integer("FOLLOWUP_THRESHOLD_DAYS", 7),
    staleDays: integer("STALE_THRESHOLD_DAYS", 14),
    replyWindowDays: integer("REPLY_WINDOW_DAYS", 7),
  },
  gmail: gmailSettings(),
  cron: {
    schedule: process.env.CRON_SCHEDULE || "0 8 * * *",
  },
};
