import fs from "fs";
import { parseArgs } from "util";
import { Store } from "./db/store";
import { ReplyFetcher, formatDigest, syncReplies } from "./scheduler";
import {
  deactivateAccount,
  getActiveAccount,
  setupAccount,
} from "./services/account.service";
import { buildCalendar } from "./services/calendar.service";
import {
  JobStatsFilter,
  formatJobStats,
  getJobStats,
} from "./services/analytics.service";
import {
  ContactEdit,
  createContact,
  deleteContact,
  getContact,
  listContacts,
  listEmailLogs,
  updateContact,
} from "./services/contact.service";
import {
  deriveContactState,
  getActionableItems,
  getFollowupCandidates,
  markAsReplied,
} from "./services/followup.service";
import { buildAuthUrl, exchangeCode } from "./services/gmail.service";
import {
  importContacts,
  importJobs,
  parseCsvFile,
} from "./services/import.service";
import {
  createJob,
  deleteJob,
  getJob,
  listJobs,
  updateJob,
} from "./services/job.service";
import {
  formatCampaignSummary,
  sendToMany,
  sendToOne,
} from "./services/outreach.service";
import { DeliveryChannel } from "./services/smtp.service";
import {
  createTemplate,
  deleteTemplate,
  describeSequence,
  getTemplate,
  seedDefaultTemplates,
  updateTemplate,
} from "./services/template.service";
import {
  CONTACT_TYPES,
  Clock,
  Contact,
  ContactType,
  FollowupReminder,
  JOB_PRIORITIES,
  JOB_STATUSES,
  Job,
  JobPatch,
  JobStatus,
  NewContact,
  NewJob,
  NewTemplate,
  TemplatePatch,
} from "./types";
import { GmailSettings } from "./utils/config";
import { ConnectionError, ValidationError, errorMessage } from "./utils/errors";
import { toDateString } from "./utils/time";

const BARE_COMMANDS = [
  "help",
  "init-db",
  "seed-templates",
  "templates",
  "followups",
  "actionable",
  "sync-replies",
  "gmail-auth",
] as const;
type BareCommand = (typeof BARE_COMMANDS)[number];

export interface SendOptions {
  /** Numeric id or exact template name. */
  template: number | string;
  jobId?: number;
  overrides: Record<string, string>;
  reminder: boolean;
  /** Where to write the follow-up reminder calendar, if anywhere. */
  ics?: string;
}

/** Inline text (with `\n` for line breaks) or a file to read. */
export type TemplateBody = { text: string } | { file: string };

/** A job to add; the application date defaults to today. */
export type JobDraft = Omit<NewJob, "dateApplied"> & { dateApplied?: string };

/** One CLI invocation, fully parsed. */
export type Command =
  | { name: BareCommand }
  | {
      name: "setup-account";
      email: string;
      smtpServer?: string;
      smtpPort?: number;
    }
  | { name: "deactivate-account"; email: string }
  | { name: "import-contacts"; file: string }
  | { name: "import-jobs"; file: string }
  | { name: "contacts"; search?: string; type?: ContactType }
  | { name: "add-contact"; contact: NewContact }
  | { name: "edit-contact"; contactId: number; changes: ContactEdit }
  | { name: "delete-contact"; contactId: number }
  | { name: "jobs"; status?: JobStatus }
  | { name: "add-job"; job: JobDraft }
  | { name: "edit-job"; jobId: number; changes: JobPatch }
  | { name: "delete-job"; jobId: number }
  | {
      name: "add-template";
      template: Omit<NewTemplate, "body">;
      body: TemplateBody;
    }
  | {
      name: "edit-template";
      template: number | string;
      changes: Omit<TemplatePatch, "body">;
      body?: TemplateBody;
    }
  | { name: "delete-template"; template: number | string }
  | { name: "stats"; filter: JobStatsFilter }
  | ({ name: "send"; contactId: number } & SendOptions)
  | ({ name: "campaign"; contactIds: number[] } & SendOptions)
  | { name: "reply"; contactId: number; note?: string }
  | { name: "history"; contactId?: number; limit?: number };

export const USAGE = `Usage: outreach <command> [options]

Commands:
  init-db                     Create the database tables
  setup-account --email <addr> [--server <host>] [--port <n>]
  deactivate-account --email <addr>
  seed-templates              Add the default cold + follow-up sequence
  templates                   List templates
  add-template --name <name> --subject <text> (--body <text> | --body-file <file>)
       [--kind cold|followup] [--days <n>]
  edit-template --template <id|name> [--name <name>] [--subject <text>]
       [--body <text> | --body-file <file>] [--kind cold|followup] [--days <n>]
  delete-template --template <id|name>
  import-contacts --file <csv>
  import-jobs --file <csv>
  contacts [--search <text>] [--type <type>]
  add-contact --name <name> --email <addr> --company <name> [--type <type>]
       [--phone <n>] [--linkedin <url>] [--job <id>]
  edit-contact --contact <id> [--name <name>] [--email <addr>] [--company <name>]
       [--type <type>] [--phone <n>] [--linkedin <url>] [--job <id>] [--note <text>]
  delete-contact --contact <id>
  jobs [--status <status>]
  add-job --company <name> --title <title> [--applied <date>] [--status <status>]
       [--priority <p>] [--location <text>] [--link <url>] [--follow-up <date>]
       [--interview <date>] [--note <text>]
  edit-job --job <id> [--status <status>] [--priority <p>] [--follow-up <date>]
       [--interview <date>] [--note <text>]
  delete-job --job <id>
  stats [--status <s,s,...>] [--priority <p,p,...>] [--from <date>] [--to <date>]
  send --contact <id> --template <id|name> [--job <id>]
       [--set key=value]... [--reminder] [--ics <file>]
  campaign --contact <id,id,...> --template <id|name> [--job <id>]
       [--set key=value]... [--reminder] [--ics <file>]
  reply --contact <id> [--note <text>]
  followups                   Flag contacts that went quiet
  actionable                  Show due, replied and stale contacts
  sync-replies                Check Gmail for replies
  history [--contact <id>] [--limit <n>]
  gmail-auth                  Obtain a Gmail refresh token

An empty value (--phone "") clears an optional field when editing.`;

const OPTIONS = {
  email: { type: "string" },
  server: { type: "string" },
  port: { type: "string" },
  file: { type: "string" },
  search: { type: "string" },
  type: { type: "string" },
  contact: { type: "string", multiple: true },
  template: { type: "string" },
  job: { type: "string" },
  set: { type: "string", multiple: true },
  reminder: { type: "boolean" },
  ics: { type: "string" },
  note: { type: "string" },
  limit: { type: "string" },
  name: { type: "string" },
  company: { type: "string" },
  phone: { type: "string" },
  linkedin: { type: "string" },
  title: { type: "string" },
  applied: { type: "string" },
  status: { type: "string" },
  priority: { type: "string" },
  location: { type: "string" },
  link: { type: "string" },
  "follow-up": { type: "string" },
  interview: { type: "string" },
  subject: { type: "string" },
  body: { type: "string" },
  "body-file": { type: "string" },
  kind: { type: "string" },
  days: { type: "string" },
  from: { type: "string" },
  to: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

function isBareCommand(name: string): name is BareCommand {
  return BARE_COMMANDS.some((command) => command === name);
}

function oneOf<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  flag: string
): T | undefined {
  if (value === undefined) return undefined;
  const wanted = value.trim();
  const match = allowed.find((option) => option === wanted);
  if (!match) {
    throw new ValidationError(`--${flag} must be one of: ${allowed.join(", ")}`, [
      value,
    ]);
  }
  return match;
}

function listOf<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  flag: string
): T[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .filter((item) => item.trim() !== "")
    .map((item) => oneOf(item, allowed, flag))
    .filter((item): item is T => item !== undefined);
}

/** Absent stays absent; an empty value clears the field. */
function clearable(value: string | undefined): string | null | undefined {
  return value === undefined ? undefined : value.trim() || null;
}

function requireChanges(changes: object, command: string): void {
  if (Object.values(changes).every((value) => value === undefined)) {
    throw new ValidationError(`${command} needs at least one field to change`);
  }
}

function positiveInt(value: string, flag: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < 1) {
    throw new ValidationError(`--${flag} must be a positive whole number`, [
      value,
    ]);
  }
  return Number(trimmed);
}

function optionalInt(value: string | undefined, flag: string) {
  return value === undefined ? undefined : positiveInt(value, flag);
}

function optionalDays(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError("--days must be zero or a positive whole number", [
      value,
    ]);
  }
  return Number(value.trim());
}

function templateRef(value: string): number | string {
  return /^\d+$/.test(value) ? positiveInt(value, "template") : value;
}

function requireOption(value: string | undefined, flag: string): string {
  if (!value || !value.trim()) {
    throw new ValidationError(`Missing required option --${flag}`);
  }
  return value.trim();
}

export function parseOverrides(pairs: string[] = []): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    if (separator < 1) {
      throw new ValidationError("--set expects key=value", [pair]);
    }
    overrides[pair.slice(0, separator).trim()] = pair.slice(separator + 1);
  }
  return overrides;
}

export function parseCommand(argv: string[]): Command {
  const { values, positionals } = parseArgs({
    args: argv,
    options: OPTIONS,
    allowPositionals: true,
  });

  const [name, ...extra] = positionals;
  if (values.help || !name) return { name: "help" };
  if (extra.length > 0) {
    throw new ValidationError(`Unexpected arguments: ${extra.join(" ")}`);
  }
  if (isBareCommand(name)) return { name };

  const contactIds = (values.contact ?? [])
    .flatMap((value) => value.split(","))
    .filter((value) => value.trim() !== "")
    .map((value) => positiveInt(value, "contact"));

  const singleContact = (): number => {
    if (contactIds.length !== 1) {
      throw new ValidationError(`${name} takes exactly one --contact`);
    }
    return contactIds[0];
  };

  const jobId = () => positiveInt(requireOption(values.job, "job"), "job");

  const templateKind = (): boolean | undefined => {
    const kind = oneOf(values.kind, ["cold", "followup"], "kind");
    return kind === undefined ? undefined : kind === "followup";
  };

  const templateBody = (): TemplateBody | undefined => {
    const text = values.body;
    const file = values["body-file"];
    if (text !== undefined && file !== undefined) {
      throw new ValidationError("Use either --body or --body-file, not both");
    }
    if (text !== undefined) return { text };
    return file === undefined ? undefined : { file };
  };

  const sendOptions = (): SendOptions => {
    const ref = requireOption(values.template, "template");
    return {
      template: templateRef(ref),
      jobId: optionalInt(values.job, "job"),
      overrides: parseOverrides(values.set),
      reminder: values.reminder ?? false,
      ics: values.ics,
    };
  };

  switch (name) {
    case "setup-account":
      return {
        name: "setup-account",
        email: requireOption(values.email, "email"),
        smtpServer: values.server,
        smtpPort: optionalInt(values.port, "port"),
      };

    case "deactivate-account":
      return {
        name: "deactivate-account",
        email: requireOption(values.email, "email"),
      };

    case "import-contacts":
      return { name: "import-contacts", file: requireOption(values.file, "file") };

    case "import-jobs":
      return { name: "import-jobs", file: requireOption(values.file, "file") };

    case "contacts":
      return {
        name: "contacts",
        search: values.search,
        type: oneOf(values.type, CONTACT_TYPES, "type"),
      };

    case "add-contact":
      return {
        name: "add-contact",
        contact: {
          name: requireOption(values.name, "name"),
          email: requireOption(values.email, "email"),
          companyName: requireOption(values.company, "company"),
          contactType: oneOf(values.type, CONTACT_TYPES, "type"),
          phone: values.phone,
          linkedinUrl: values.linkedin,
          jobId: optionalInt(values.job, "job"),
        },
      };

    case "edit-contact": {
      const changes: ContactEdit = {
        name: values.name,
        email: values.email,
        companyName: values.company,
        contactType: oneOf(values.type, CONTACT_TYPES, "type"),
        phone: clearable(values.phone),
        linkedinUrl: clearable(values.linkedin),
        jobId: optionalInt(values.job, "job"),
        notes: clearable(values.note),
      };
      requireChanges(changes, name);
      return { name: "edit-contact", contactId: singleContact(), changes };
    }

    case "delete-contact":
      return { name: "delete-contact", contactId: singleContact() };

    case "jobs":
      return {
        name: "jobs",
        status: oneOf(values.status, JOB_STATUSES, "status"),
      };

    case "add-job":
      return {
        name: "add-job",
        job: {
          companyName: requireOption(values.company, "company"),
          jobTitle: requireOption(values.title, "title"),
          dateApplied: values.applied,
          status: oneOf(values.status, JOB_STATUSES, "status"),
          priority: oneOf(values.priority, JOB_PRIORITIES, "priority"),
          location: values.location,
          jobLink: values.link,
          followUpDate: values["follow-up"],
          interviewDate: values.interview,
          notes: values.note,
        },
      };

    case "edit-job": {
      const changes: JobPatch = {
        status: oneOf(values.status, JOB_STATUSES, "status"),
        priority: oneOf(values.priority, JOB_PRIORITIES, "priority"),
        followUpDate: clearable(values["follow-up"]),
        interviewDate: clearable(values.interview),
        notes: clearable(values.note),
      };
      requireChanges(changes, name);
      return { name: "edit-job", jobId: jobId(), changes };
    }

    case "delete-job":
      return { name: "delete-job", jobId: jobId() };

    case "add-template": {
      const body = templateBody();
      if (!body) throw new ValidationError("Missing required option --body");
      return {
        name: "add-template",
        template: {
          name: requireOption(values.name, "name"),
          subject: requireOption(values.subject, "subject"),
          isFollowup: templateKind() ?? false,
          daysAfterPrevious: optionalDays(values.days),
        },
        body,
      };
    }

    case "edit-template": {
      const changes: Omit<TemplatePatch, "body"> = {
        name: values.name,
        subject: values.subject,
        isFollowup: templateKind(),
        daysAfterPrevious: optionalDays(values.days),
      };
      const body = templateBody();
      requireChanges({ ...changes, body }, name);
      return {
        name: "edit-template",
        template: templateRef(requireOption(values.template, "template")),
        changes,
        body,
      };
    }

    case "delete-template":
      return {
        name: "delete-template",
        template: templateRef(requireOption(values.template, "template")),
      };

    case "stats":
      return {
        name: "stats",
        filter: {
          statuses: listOf(values.status, JOB_STATUSES, "status"),
          priorities: listOf(values.priority, JOB_PRIORITIES, "priority"),
          from: values.from,
          to: values.to,
        },
      };

    case "send":
      return { name: "send", contactId: singleContact(), ...sendOptions() };

    case "campaign":
      if (contactIds.length === 0) {
        throw new ValidationError("Missing required option --contact");
      }
      return { name: "campaign", contactIds, ...sendOptions() };

    case "reply":
      return { name: "reply", contactId: singleContact(), note: values.note };

    case "history":
      return {
        name: "history",
        contactId: contactIds[0],
        limit: optionalInt(values.limit, "limit"),
      };

    default:
      throw new ValidationError(`Unknown command "${name}". Run \`outreach help\`.`);
  }
}

export interface CommandSettings {
  senderName: string;
  maxAttempts: number;
  rateLimitSeconds: number;
  dailyLimit: number;
  thresholdDays: number;
  staleDays: number;
  replyWindowDays: number;
}

/** Everything a command may touch, handed in by the entry point. */
export interface CommandContext {
  store: Store;
  settings: CommandSettings;
  print: (text: string) => void;
  openChannel: () => DeliveryChannel;
  applySchema: () => Promise<void>;
  prompt: (question: string) => Promise<string>;
  clock?: Clock;
  gmail?: GmailSettings;
  fetchReplies?: ReplyFetcher;
  signal?: AbortSignal;
}

function contactLine(contact: Contact, now: Date, staleDays: number): string {
  const state = deriveContactState(contact, now, staleDays);
  const due = contact.followupDate ? ` due ${contact.followupDate}` : "";
  return `#${contact.id} ${contact.name} <${contact.email}> ${contact.companyName} [${state}${due}]`;
}

function jobLine(job: Job): string {
  const followUp = job.followUpDate ? `, follow up ${job.followUpDate}` : "";
  return `#${job.id} ${job.jobTitle} at ${job.companyName} [${job.status}, ${job.priority}] applied ${job.dateApplied}${followUp}`;
}

function readBody(body: TemplateBody): string {
  if ("text" in body) return body.text.replace(/\\n/g, "\n");
  try {
    return fs.readFileSync(body.file, "utf-8");
  } catch (error) {
    throw new ValidationError(`Cannot read ${body.file}: ${errorMessage(error)}`);
  }
}

function writeReminders(
  ctx: CommandContext,
  reminders: FollowupReminder[],
  file: string | undefined
): void {
  for (const reminder of reminders) {
    ctx.print(
      `Reminder: follow up with ${reminder.contactName} on ${reminder.dueDate}`
    );
  }
  if (file && reminders.length > 0) {
    fs.writeFileSync(file, buildCalendar(reminders));
    ctx.print(`Calendar written to ${file}`);
  }
}

export async function runCommand(
  command: Command,
  ctx: CommandContext
): Promise<void> {
  const { store, settings, print } = ctx;
  const clock = ctx.clock ?? (() => new Date());

  switch (command.name) {
    case "help":
      print(USAGE);
      return;

    case "init-db":
      await ctx.applySchema();
      print("Database schema applied");
      return;

    case "setup-account": {
      const account = await setupAccount(store, {
        email: command.email,
        smtpServer: command.smtpServer,
        smtpPort: command.smtpPort,
      });
      print(
        `Active account: ${account.emailAddress} (${account.smtpServer}:${account.smtpPort})`
      );
      return;
    }

    case "deactivate-account":
      await deactivateAccount(store, command.email);
      print(`Deactivated ${command.email}`);
      return;

    case "seed-templates": {
      const created = await seedDefaultTemplates(store);
      print(
        created.length > 0
          ? `Created ${created.length} default template(s)`
          : "Templates already exist; nothing seeded"
      );
      return;
    }

    case "templates": {
      const templates = await store.listTemplates();
      for (const t of templates) {
        const kind = t.isFollowup
          ? `follow-up after ${t.daysAfterPrevious}d`
          : "cold";
        print(`#${t.id} ${t.name} (${kind})`);
      }
      print(describeSequence(templates).description);
      return;
    }

    case "add-template": {
      const template = await createTemplate(store, {
        ...command.template,
        body: readBody(command.body),
      });
      print(`Added template #${template.id} ${template.name}`);
      return;
    }

    case "edit-template": {
      const current = await getTemplate(store, command.template);
      const template = await updateTemplate(store, current.id, {
        ...command.changes,
        body: command.body ? readBody(command.body) : undefined,
      });
      print(`Updated template #${template.id} ${template.name}`);
      return;
    }

    case "delete-template": {
      const template = await getTemplate(store, command.template);
      await deleteTemplate(store, template.id);
      print(`Deleted template #${template.id} ${template.name}`);
      return;
    }

    case "import-contacts":
    case "import-jobs": {
      const csvData = await parseCsvFile(command.file);
      const result =
        command.name === "import-contacts"
          ? await importContacts(store, csvData)
          : await importJobs(store, csvData);
      print(`Imported ${result.imported} row(s)`);
      for (const error of result.errors) print(error);
      return;
    }

    case "contacts": {
      const now = clock();
      const contacts = await listContacts(store, {
        search: command.search,
        type: command.type,
      });
      for (const contact of contacts) {
        print(contactLine(contact, now, settings.staleDays));
      }
      print(`${contacts.length} contact(s)`);
      return;
    }

    case "add-contact": {
      const contact = await createContact(store, command.contact);
      print(`Added contact #${contact.id} ${contact.name} <${contact.email}>`);
      return;
    }

    case "edit-contact": {
      const contact = await updateContact(
        store,
        command.contactId,
        command.changes
      );
      print(`Updated contact #${contact.id} ${contact.name} <${contact.email}>`);
      return;
    }

    case "delete-contact":
      await deleteContact(store, command.contactId);
      print(`Deleted contact #${command.contactId}`);
      return;

    case "jobs": {
      const jobs = await listJobs(store, command.status);
      for (const job of jobs) print(jobLine(job));
      print(`${jobs.length} job(s)`);
      return;
    }

    case "add-job": {
      const job = await createJob(store, {
        ...command.job,
        dateApplied: command.job.dateApplied ?? toDateString(clock()),
      });
      print(`Added job #${job.id} ${job.jobTitle} at ${job.companyName}`);
      return;
    }

    case "edit-job": {
      const job = await updateJob(store, command.jobId, command.changes);
      print(`Updated ${jobLine(job)}`);
      return;
    }

    case "delete-job":
      await deleteJob(store, command.jobId);
      print(`Deleted job #${command.jobId}`);
      return;

    case "stats": {
      const stats = await getJobStats(store, command.filter, clock());
      print(formatJobStats(stats));
      return;
    }

    case "send": {
      const contact = await getContact(store, command.contactId);
      const template = await getTemplate(store, command.template);
      const job = command.jobId ? await getJob(store, command.jobId) : null;
      const account = await getActiveAccount(store);

      const channel = ctx.openChannel();
      await channel.connect(account);
      try {
        const outcome = await sendToOne(
          { store, channel, account, clock },
          {
            contact,
            template,
            job,
            senderName: settings.senderName,
            overrides: command.overrides,
            maxAttempts: settings.maxAttempts,
            reminder: command.reminder,
          }
        );
        print(outcome.message);
        if (outcome.status === "delivered" && outcome.reminder) {
          writeReminders(ctx, [outcome.reminder], command.ics);
        }
      } finally {
        await channel.disconnect();
      }
      return;
    }

    case "campaign": {
      const template = await getTemplate(store, command.template);
      const job = command.jobId ? await getJob(store, command.jobId) : null;
      const account = await getActiveAccount(store);
      const overrides = command.overrides;

      const summary = await sendToMany(
        { store, channel: ctx.openChannel(), account, clock },
        {
          contactIds: command.contactIds,
          templateId: template.id,
          job,
          senderName: settings.senderName,
          overridesFor: () => overrides,
          rateLimitSeconds: settings.rateLimitSeconds,
          maxAttempts: settings.maxAttempts,
          dailyLimit: settings.dailyLimit,
          reminder: command.reminder,
          signal: ctx.signal,
        }
      );
      print(formatCampaignSummary(summary));
      writeReminders(ctx, summary.reminders, command.ics);
      return;
    }

    case "reply": {
      const contact = await markAsReplied(store, command.contactId, {
        note: command.note,
        now: clock(),
      });
      print(`${contact.name} marked as replied`);
      return;
    }

    case "followups": {
      const flagged = await getFollowupCandidates(
        store,
        settings.thresholdDays,
        clock()
      );
      if (flagged.length === 0) {
        print("No contacts need a follow-up");
        return;
      }
      for (const contact of flagged) {
        const last = contact.lastContacted
          ? toDateString(contact.lastContacted)
          : "never";
        print(`${contact.name} (${contact.companyName}), last contacted ${last}`);
      }
      return;
    }

    case "actionable": {
      const items = await getActionableItems(store, clock(), {
        staleDays: settings.staleDays,
        replyWindowDays: settings.replyWindowDays,
      });
      print(formatDigest(items));
      return;
    }

    case "sync-replies": {
      if (!ctx.fetchReplies) {
        throw new ConnectionError(
          "Gmail is not configured. Set GMAIL_CLIENT_ID, GMAIL_CLIENT_SECRET and GMAIL_REFRESH_TOKEN."
        );
      }
      const result = await syncReplies(store, ctx.fetchReplies, clock());
      print(`Checked ${result.checked} contact(s), ${result.replied} replied`);
      return;
    }

    case "history": {
      const logs = await listEmailLogs(store, {
        contactId: command.contactId,
        limit: command.limit,
      });
      for (const entry of logs) {
        const detail = entry.errorMessage ? ` (${entry.errorMessage})` : "";
        print(
          `${entry.sentAt.toISOString()} ${entry.status.toUpperCase()} #${entry.contactId} "${entry.subject}"${detail}`
        );
      }
      return;
    }

    case "gmail-auth": {
      if (!ctx.gmail) {
        throw new ConnectionError(
          "Set GMAIL_CLIENT_ID and GMAIL_CLIENT_SECRET in .env first"
        );
      }
      print("1. Open this URL in your browser:\n");
      print(buildAuthUrl(ctx.gmail));
      print("\n2. Authorize the app and copy the code from the redirect URL");
      const code = await ctx.prompt("3. Paste the code here: ");
      const token = await exchangeCode(ctx.gmail, code);
      print("\nSuccess! Add this to your .env file:\n");
      print(`GMAIL_REFRESH_TOKEN=${token}`);
      return;
    }
  }
}
