import { z } from "zod";
import { Store } from "../db/store";
import {
  Contact,
  EmailTemplate,
  Job,
  NewTemplate,
  RenderedEmail,
  TemplatePatch,
} from "../types";
import { NotFoundError, ValidationError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { longDate } from "../utils/time";
import { parseInput } from "../utils/validation";

const log = createLogger("templates");

/** Every token a template may use, written `{token}` in subject and body. */
export const PLACEHOLDERS = [
  "your_name",
  "today",
  "name",
  "first_name",
  "company",
  "job_title",
  "contact_role",
  "phone",
  "linkedin",
  // per-campaign extras, normally supplied as overrides
  "recipient_name",
  "recipient_first_name",
  "recipient_role",
  "referral_source",
  "mutual_connection",
  "recent_news",
  "specific_skill",
  "personal_note",
] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];
export type PlaceholderOverrides = Partial<Record<Placeholder, string>>;

const PLACEHOLDER_SET: ReadonlySet<string> = new Set(PLACEHOLDERS);
const TOKEN_PATTERN = /\{([^{}]+)\}/g;

export function isPlaceholder(key: string): key is Placeholder {
  return PLACEHOLDER_SET.has(key);
}

/** Distinct `{...}` tokens in `text`, braces stripped, in order of appearance. */
export function findTokens(text: string): string[] {
  const found = new Set<string>();
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    found.add(match[1]);
  }
  return [...found];
}

/**
 * Reject any token outside the placeholder vocabulary.
 */
export function validateTemplateText(subject: string, body: string): void {
  const unknown = findTokens(`${subject}\n${body}`).filter(
    (token) => !isPlaceholder(token)
  );
  if (unknown.length > 0) {
    throw new ValidationError(
      "Template uses unknown placeholders",
      unknown.map((token) => `{${token}}`)
    );
  }
}

/** Checks caller-supplied override keys; unknown keys are rejected. */
export function validateOverrides(
  overrides: Record<string, string> | undefined
): PlaceholderOverrides {
  const checked: PlaceholderOverrides = {};
  if (!overrides) return checked;

  const unknown: string[] = [];
  for (const [key, value] of Object.entries(overrides)) {
    if (isPlaceholder(key)) {
      checked[key] = value;
    } else {
      unknown.push(key);
    }
  }
  if (unknown.length > 0) {
    throw new ValidationError("Unknown placeholder overrides", unknown);
  }
  return checked;
}

function firstName(fullName: string): string {
  const trimmed = fullName.trim();
  return trimmed ? trimmed.split(/\s+/)[0] : "there";
}

export interface RenderInput {
  template: Pick<EmailTemplate, "subject" | "body">;
  contact: Pick<
    Contact,
    "name" | "companyName" | "contactType" | "phone" | "linkedinUrl"
  >;
  job?: Pick<Job, "companyName" | "jobTitle"> | null;
  senderName: string;
  overrides?: PlaceholderOverrides;
  now: Date;
}

export function buildContext(
  input: Omit<RenderInput, "template">
): Record<Placeholder, string> {
  const { contact, job, senderName, overrides = {}, now } = input;
  const fullName = contact.name.trim();
  const role = contact.contactType || "hiring manager";
  const recipientName = overrides.recipient_name ?? (fullName || "Hiring Team");

  const base: Record<Placeholder, string> = {
    your_name: senderName,
    today: longDate(now),
    name: fullName || "Hiring Team",
    first_name: firstName(fullName),
    company: contact.companyName || job?.companyName || "",
    job_title: job?.jobTitle ?? "",
    contact_role: role,
    phone: contact.phone || "[phone not available]",
    linkedin: contact.linkedinUrl || "[LinkedIn not provided]",
    recipient_name: recipientName,
    recipient_first_name: firstName(overrides.recipient_name ?? fullName),
    recipient_role: role,
    referral_source: "",
    mutual_connection: "",
    recent_news: "",
    specific_skill: "",
    personal_note: "",
  };

  return { ...base, ...overrides };
}

/**
 * Substitutes placeholders in one pass. Values are inserted literally and
 * are never scanned again, so a value containing `{name}` stays as written.
 */
export function substitute(
  text: string,
  context: Record<Placeholder, string>
): string {
  return text.replace(TOKEN_PATTERN, (token: string, key: string) =>
    isPlaceholder(key) ? context[key] : token
  );
}

export function renderTemplate(input: RenderInput): RenderedEmail {
  const context = buildContext(input);
  return {
    subject: substitute(input.template.subject, context),
    body: substitute(input.template.body, context),
  };
}

// ---- template records ----

const templateInput = z.object({
  name: z.string().trim().min(1, "is required"),
  subject: z.string().trim().min(1, "is required"),
  body: z.string().min(1, "is required"),
  isFollowup: z.boolean().default(false),
  daysAfterPrevious: z
    .number()
    .int("must be a whole number")
    .min(0, "must be zero or more")
    .default(7),
});

const templatePatchInput = z.object({
  name: z.string().trim().min(1, "is required").optional(),
  subject: z.string().trim().min(1, "is required").optional(),
  body: z.string().min(1, "is required").optional(),
  isFollowup: z.boolean().optional(),
  daysAfterPrevious: z
    .number()
    .int("must be a whole number")
    .min(0, "must be zero or more")
    .optional(),
});

export async function createTemplate(
  store: Store,
  input: NewTemplate
): Promise<EmailTemplate> {
  const data = parseInput(templateInput, input, `template "${input.name}"`);
  validateTemplateText(data.subject, data.body);

  const created = await store.transaction(async (tx) => {
    if (await tx.findTemplateByName(data.name)) {
      throw new ValidationError(`Template "${data.name}" already exists`);
    }
    return tx.insertTemplate(data);
  });
  log.info(`Template "${created.name}" added`);
  return created;
}

export async function updateTemplate(
  store: Store,
  id: number,
  patch: TemplatePatch
): Promise<EmailTemplate> {
  const data = parseInput(templatePatchInput, patch, `template ${id}`);

  return store.transaction(async (tx) => {
    const current = await tx.findTemplate(id);
    if (!current) throw new NotFoundError("Template", id);

    if (data.name !== undefined && data.name !== current.name) {
      const clash = await tx.findTemplateByName(data.name);
      if (clash) {
        throw new ValidationError(`Template "${data.name}" already exists`);
      }
    }
    validateTemplateText(
      data.subject ?? current.subject,
      data.body ?? current.body
    );

    const updated = await tx.updateTemplate(id, data);
    if (!updated) throw new NotFoundError("Template", id);
    return updated;
  });
}

export async function deleteTemplate(store: Store, id: number): Promise<void> {
  const deleted = await store.deleteTemplate(id);
  if (!deleted) throw new NotFoundError("Template", id);
  log.info(`Template ${id} deleted`);
}

/** Looks a template up by numeric id or by exact name. */
export async function getTemplate(
  store: Store,
  ref: number | string
): Promise<EmailTemplate> {
  const template =
    typeof ref === "number"
      ? await store.findTemplate(ref)
      : await store.findTemplateByName(ref);
  if (!template) throw new NotFoundError("Template", ref);
  return template;
}

export const DEFAULT_TEMPLATES: NewTemplate[] = [
  {
    name: "Cold Outreach",
    subject: "Interest in {job_title} at {company}",
    body:
      "Dear {name},\n\nI'm excited about the {job_title} role at {company}. " +
      "With my background in [relevant skill], I believe I'd be a strong fit.\n\n" +
      "[Personalize why you're interested in {company}]\n\nBest regards,\n{your_name}",
    isFollowup: false,
    daysAfterPrevious: 0,
  },
  {
    name: "Follow-up #1 (3 days)",
    subject: "Following up: {job_title} at {company}",
    body:
      "Hi {name},\n\nI hope you're having a productive week. I wanted to " +
      "gently follow up on my application for the {job_title} position at {company}.\n\n" +
      "I remain very enthusiastic about this opportunity.\n\nThank you for your time!\n\n" +
      "Best regards,\n{your_name}",
    isFollowup: true,
    daysAfterPrevious: 3,
  },
  {
    name: "Follow-up #2 (4 days)",
    subject: "Checking in: {job_title} opportunity",
    body:
      "Hi {name},\n\nI hope this message finds you well. I'm following up " +
      "again regarding my application for the {job_title} role.\n\n" +
      "I'd welcome any updates on the hiring process.\n\nBest regards,\n{your_name}",
    isFollowup: true,
    daysAfterPrevious: 4,
  },
];

/** Creates the default sequence when the store holds no templates yet. */
export async function seedDefaultTemplates(
  store: Store
): Promise<EmailTemplate[]> {
  const existing = await store.listTemplates();
  if (existing.length > 0) return [];

  const created: EmailTemplate[] = [];
  for (const template of DEFAULT_TEMPLATES) {
    created.push(await createTemplate(store, template));
  }
  return created;
}

export interface SequenceStatus {
  complete: boolean;
  description: string;
}

/** A full sequence is one cold template followed by at least two follow-ups. */
export function describeSequence(templates: EmailTemplate[]): SequenceStatus {
  const cold = templates.filter((t) => !t.isFollowup);
  const followups = templates.filter((t) => t.isFollowup);

  if (cold.length > 0 && followups.length >= 2) {
    const steps = followups
      .slice(0, 2)
      .map((t) => `${t.daysAfterPrevious}d`)
      .join(" → ");
    return { complete: true, description: `Cold → ${steps}` };
  }
  return {
    complete: false,
    description: `Incomplete sequence: ${cold.length} cold, ${followups.length} follow-up template(s)`,
  };
}
