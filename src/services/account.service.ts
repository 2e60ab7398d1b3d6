import { z } from "zod";
import { Store } from "../db/store";
import { EmailAccount } from "../types";
import { NotFoundError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { emailAddress, parseInput } from "../utils/validation";

const log = createLogger("accounts");

export const DEFAULT_SMTP_SERVER = "smtp.gmail.com";
export const DEFAULT_SMTP_PORT = 587;

const accountInput = z.object({
  email: emailAddress,
  smtpServer: z.string().trim().min(1, "is required").default(DEFAULT_SMTP_SERVER),
  smtpPort: z
    .number()
    .int("must be a whole number")
    .min(1, "must be a valid port")
    .max(65535, "must be a valid port")
    .default(DEFAULT_SMTP_PORT),
});

export interface AccountSetup {
  email: string;
  smtpServer?: string;
  smtpPort?: number;
}

/**
 * Registers (or refreshes) a sending account and makes it the only active
 * one.
 */
export async function setupAccount(
  store: Store,
  input: AccountSetup
): Promise<EmailAccount> {
  const data = parseInput(accountInput, input, `account "${input.email}"`);

  const account = await store.transaction(async (tx) => {
    const existing = await tx.findAccountByEmail(data.email);
    await tx.deactivateAccountsExcept(existing?.id ?? null);
    return tx.upsertAccount({
      emailAddress: data.email,
      smtpServer: data.smtpServer,
      smtpPort: data.smtpPort,
    });
  });

  log.info(
    `Account ${account.emailAddress} active via ${account.smtpServer}:${account.smtpPort}`
  );
  return account;
}

export async function getActiveAccount(store: Store): Promise<EmailAccount> {
  const account = await store.findActiveAccount();
  if (!account) throw new NotFoundError("Email account", "(active)");
  return account;
}

export async function deactivateAccount(
  store: Store,
  email: string
): Promise<void> {
  const account = await store.findAccountByEmail(email.trim());
  if (!account) throw new NotFoundError("Email account", email);
  await store.setAccountActive(account.id, false);
  log.info(`Account ${account.emailAddress} deactivated`);
}
