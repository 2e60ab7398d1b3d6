#!/usr/bin/env node
import * as readline from "readline";
import { Command, parseCommand, runCommand, USAGE } from "./commands";
import { applySchema, createPool } from "./db/pool";
import { PgStore } from "./db/pg-store";
import { gmailReplyFetcher } from "./services/gmail.service";
import { SmtpChannel, envCredentials } from "./services/smtp.service";
import { config } from "./utils/config";
import { OutreachError, errorMessage } from "./utils/errors";

function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

async function main(argv: string[]): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(argv);
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 2;
  }

  const pool = createPool(config.database.url);
  const abort = new AbortController();
  process.once("SIGINT", () => {
    console.error("\nStopping after the current contact...");
    abort.abort();
  });

  try {
    await runCommand(command, {
      store: new PgStore(pool),
      settings: {
        senderName: config.outreach.senderName,
        maxAttempts: config.outreach.maxAttempts,
        rateLimitSeconds: config.outreach.rateLimitSeconds,
        dailyLimit: config.outreach.dailyLimit,
        thresholdDays: config.followup.thresholdDays,
        staleDays: config.followup.staleDays,
        replyWindowDays: config.followup.replyWindowDays,
      },
      print: (text) => console.log(text),
      openChannel: () => new SmtpChannel(envCredentials(config.smtp)),
      applySchema: () => applySchema(pool),
      prompt,
      gmail: config.gmail,
      fetchReplies:
        command.name === "sync-replies"
          ? gmailReplyFetcher(config.gmail)
          : undefined,
      signal: abort.signal,
    });
    return 0;
  } catch (error) {
    if (error instanceof OutreachError) {
      console.error(`${error.name}: ${error.message}`);
    } else {
      console.error("Unexpected error:", error);
    }
    return 1;
  } finally {
    await pool.end();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Fatal error", error);
    process.exitCode = 1;
  });
