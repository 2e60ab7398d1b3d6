import { Pool, PoolClient, QueryResult, QueryResultRow } from "pg";
import {
  Contact,
  ContactPatch,
  ContactType,
  EmailAccount,
  EmailLog,
  EmailStatus,
  EmailTemplate,
  Job,
  JobPatch,
  JobPriority,
  JobStatus,
  NewContact,
  NewEmailAccount,
  NewEmailLog,
  NewJob,
  NewTemplate,
  TemplatePatch,
} from "../types";
import {
  OutreachError,
  StoreError,
  ValidationError,
  errorMessage,
} from "../utils/errors";
import { createLogger } from "../utils/logger";
import { EmailLogFilter, Store } from "./store";

const log = createLogger("store");

interface JobRow {
  id: number;
  company_name: string;
  job_title: string;
  date_applied: string;
  status: JobStatus;
  location: string | null;
  job_link: string | null;
  priority: JobPriority;
  follow_up_date: string | null;
  interview_date: string | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
}

interface ContactRow {
  id: number;
  name: string;
  email: string;
  company_name: string;
  contact_type: ContactType;
  phone: string | null;
  linkedin_url: string | null;
  job_id: number | null;
  last_contacted: Date | null;
  needs_followup: boolean;
  followup_date: string | null;
  replied: boolean;
  reply_date: Date | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
}

interface TemplateRow {
  id: number;
  name: string;
  subject: string;
  body: string;
  is_followup: boolean;
  days_after_previous: number;
  created_at: Date;
  updated_at: Date;
}

interface EmailLogRow {
  id: number;
  contact_id: number;
  template_id: number | null;
  job_id: number | null;
  subject: string;
  body: string;
  sent_at: Date;
  status: EmailStatus;
  error_message: string | null;
  smtp_response: string | null;
}

interface AccountRow {
  id: number;
  email_address: string;
  smtp_server: string;
  smtp_port: number;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

// DATE columns come back as text so calendar dates never shift with the
// server's time zone.
const JOB_COLUMNS = `id, company_name, job_title, date_applied::text AS date_applied,
  status, location, job_link, priority, follow_up_date::text AS follow_up_date,
  interview_date::text AS interview_date, notes, created_at, updated_at`;

const CONTACT_COLUMNS = `id, name, email, company_name, contact_type, phone,
  linkedin_url, job_id, last_contacted, needs_followup,
  followup_date::text AS followup_date, replied, reply_date, notes,
  created_at, updated_at`;

const TEMPLATE_COLUMNS = `id, name, subject, body, is_followup,
  days_after_previous, created_at, updated_at`;

const LOG_COLUMNS = `id, contact_id, template_id, job_id, subject, body,
  sent_at, status, error_message, smtp_response`;

const ACCOUNT_COLUMNS = `id, email_address, smtp_server, smtp_port, is_active,
  created_at, updated_at`;

const JOB_PATCH_COLUMNS = new Map<string, string>(
  Object.entries({
    status: "status",
    followUpDate: "follow_up_date",
    interviewDate: "interview_date",
    notes: "notes",
    priority: "priority",
  } satisfies Record<keyof JobPatch, string>)
);

const CONTACT_PATCH_COLUMNS = new Map<string, string>(
  Object.entries({
    name: "name",
    email: "email",
    companyName: "company_name",
    contactType: "contact_type",
    phone: "phone",
    linkedinUrl: "linkedin_url",
    jobId: "job_id",
    notes: "notes",
    lastContacted: "last_contacted",
    needsFollowup: "needs_followup",
    followupDate: "followup_date",
    replied: "replied",
    replyDate: "reply_date",
  } satisfies Record<keyof ContactPatch, string>)
);

const TEMPLATE_PATCH_COLUMNS = new Map<string, string>(
  Object.entries({
    name: "name",
    subject: "subject",
    body: "body",
    isFollowup: "is_followup",
    daysAfterPrevious: "days_after_previous",
  } satisfies Record<keyof TemplatePatch, string>)
);

function toJob(row: JobRow): Job {
  return {
    id: row.id,
    companyName: row.company_name,
    jobTitle: row.job_title,
    dateApplied: row.date_applied,
    status: row.status,
    location: row.location,
    jobLink: row.job_link,
    priority: row.priority,
    followUpDate: row.follow_up_date,
    interviewDate: row.interview_date,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toContact(row: ContactRow): Contact {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    companyName: row.company_name,
    contactType: row.contact_type,
    phone: row.phone,
    linkedinUrl: row.linkedin_url,
    jobId: row.job_id,
    lastContacted: row.last_contacted,
    needsFollowup: row.needs_followup,
    followupDate: row.followup_date,
    replied: row.replied,
    replyDate: row.reply_date,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toTemplate(row: TemplateRow): EmailTemplate {
  return {
    id: row.id,
    name: row.name,
    subject: row.subject,
    body: row.body,
    isFollowup: row.is_followup,
    daysAfterPrevious: row.days_after_previous,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toEmailLog(row: EmailLogRow): EmailLog {
  return {
    id: row.id,
    contactId: row.contact_id,
    templateId: row.template_id,
    jobId: row.job_id,
    subject: row.subject,
    body: row.body,
    sentAt: row.sent_at,
    status: row.status,
    errorMessage: row.error_message,
    smtpResponse: row.smtp_response,
  };
}

function toAccount(row: AccountRow): EmailAccount {
  return {
    id: row.id,
    emailAddress: row.email_address,
    smtpServer: row.smtp_server,
    smtpPort: row.smtp_port,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function pgCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

function toStoreFailure(error: unknown, operation: string): OutreachError {
  if (error instanceof OutreachError) return error;
  if (pgCode(error) === "23505") {
    const detail =
      typeof error === "object" && error !== null && "detail" in error
        ? String(error.detail)
        : errorMessage(error);
    return new ValidationError(`Duplicate value in ${operation}`, [detail]);
  }
  return new StoreError(`Database error during ${operation}: ${errorMessage(error)}`, {
    cause: error,
  });
}

/**
 * Builds `col = $n` assignments for the defined keys of a patch.
 * `updated_at` is always bumped.
 */
function assignments(
  patch: object,
  columns: Map<string, string>,
  firstParam: number
): { sql: string; values: unknown[] } {
  const sets: string[] = [];
  const values: unknown[] = [];
  for (const [key, value] of Object.entries(patch)) {
    const column = columns.get(key);
    if (!column || value === undefined) continue;
    values.push(value);
    sets.push(`${column} = $${firstParam + values.length - 1}`);
  }
  sets.push("updated_at = now()");
  return { sql: sets.join(", "), values };
}

export class PgStore implements Store {
  constructor(
    private readonly pool: Pool,
    private readonly client: PoolClient | null = null
  ) {}

  private async query<R extends QueryResultRow>(
    operation: string,
    text: string,
    values: unknown[] = []
  ): Promise<QueryResult<R>> {
    try {
      if (this.client) {
        return await this.client.query<R>(text, values);
      }
      return await this.pool.query<R>(text, values);
    } catch (error) {
      throw toStoreFailure(error, operation);
    }
  }

  private get lockClause(): string {
    return this.client ? " FOR UPDATE" : "";
  }

  async transaction<T>(work: (tx: Store) => Promise<T>): Promise<T> {
    if (this.client) return work(this);

    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw toStoreFailure(error, "connect");
    }

    try {
      await client.query("BEGIN");
      const result = await work(new PgStore(this.pool, client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        log.error("Rollback failed", rollbackError);
      }
      throw toStoreFailure(error, "transaction");
    } finally {
      client.release();
    }
  }

  // ---- jobs ----

  async insertJob(input: NewJob): Promise<Job> {
    const result = await this.query<JobRow>(
      "insert job",
      `INSERT INTO jobs (company_name, job_title, date_applied, status, location,
         job_link, priority, follow_up_date, interview_date, notes)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING ${JOB_COLUMNS}`,
      [
        input.companyName,
        input.jobTitle,
        input.dateApplied,
        input.status ?? "Applied",
        input.location ?? null,
        input.jobLink ?? null,
        input.priority ?? "Medium",
        input.followUpDate ?? null,
        input.interviewDate ?? null,
        input.notes ?? null,
      ]
    );
    return toJob(result.rows[0]);
  }

  async findJob(id: number): Promise<Job | null> {
    const result = await this.query<JobRow>(
      "find job",
      `SELECT ${JOB_COLUMNS} FROM jobs WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toJob(result.rows[0]) : null;
  }

  async findJobByLink(link: string): Promise<Job | null> {
    const result = await this.query<JobRow>(
      "find job by link",
      `SELECT ${JOB_COLUMNS} FROM jobs WHERE job_link = $1`,
      [link]
    );
    return result.rows.length > 0 ? toJob(result.rows[0]) : null;
  }

  async listJobs(): Promise<Job[]> {
    const result = await this.query<JobRow>(
      "list jobs",
      `SELECT ${JOB_COLUMNS} FROM jobs ORDER BY date_applied DESC, id DESC`
    );
    return result.rows.map(toJob);
  }

  async updateJob(id: number, patch: JobPatch): Promise<Job | null> {
    const { sql, values } = assignments(patch, JOB_PATCH_COLUMNS, 2);
    const result = await this.query<JobRow>(
      "update job",
      `UPDATE jobs SET ${sql} WHERE id = $1 RETURNING ${JOB_COLUMNS}`,
      [id, ...values]
    );
    return result.rows.length > 0 ? toJob(result.rows[0]) : null;
  }

  async deleteJob(id: number): Promise<boolean> {
    const result = await this.query(
      "delete job",
      "DELETE FROM jobs WHERE id = $1",
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  // ---- contacts ----

  async insertContact(input: NewContact): Promise<Contact> {
    const result = await this.query<ContactRow>(
      "insert contact",
      `INSERT INTO contacts (name, email, company_name, contact_type, phone,
         linkedin_url, job_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${CONTACT_COLUMNS}`,
      [
        input.name,
        input.email,
        input.companyName,
        input.contactType ?? "Other",
        input.phone ?? null,
        input.linkedinUrl ?? null,
        input.jobId ?? null,
      ]
    );
    return toContact(result.rows[0]);
  }

  async findContact(id: number): Promise<Contact | null> {
    const result = await this.query<ContactRow>(
      "find contact",
      `SELECT ${CONTACT_COLUMNS} FROM contacts WHERE id = $1${this.lockClause}`,
      [id]
    );
    return result.rows.length > 0 ? toContact(result.rows[0]) : null;
  }

  async listContacts(): Promise<Contact[]> {
    const result = await this.query<ContactRow>(
      "list contacts",
      `SELECT ${CONTACT_COLUMNS} FROM contacts ORDER BY id${this.lockClause}`
    );
    return result.rows.map(toContact);
  }

  async updateContact(id: number, patch: ContactPatch): Promise<Contact | null> {
    const { sql, values } = assignments(patch, CONTACT_PATCH_COLUMNS, 2);
    const result = await this.query<ContactRow>(
      "update contact",
      `UPDATE contacts SET ${sql} WHERE id = $1 RETURNING ${CONTACT_COLUMNS}`,
      [id, ...values]
    );
    return result.rows.length > 0 ? toContact(result.rows[0]) : null;
  }

  async deleteContact(id: number): Promise<boolean> {
    const result = await this.query(
      "delete contact",
      "DELETE FROM contacts WHERE id = $1",
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  // ---- templates ----

  async insertTemplate(input: NewTemplate): Promise<EmailTemplate> {
    const result = await this.query<TemplateRow>(
      "insert template",
      `INSERT INTO email_templates (name, subject, body, is_followup, days_after_previous)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${TEMPLATE_COLUMNS}`,
      [
        input.name,
        input.subject,
        input.body,
        input.isFollowup ?? false,
        input.daysAfterPrevious ?? 7,
      ]
    );
    return toTemplate(result.rows[0]);
  }

  async findTemplate(id: number): Promise<EmailTemplate | null> {
    const result = await this.query<TemplateRow>(
      "find template",
      `SELECT ${TEMPLATE_COLUMNS} FROM email_templates WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toTemplate(result.rows[0]) : null;
  }

  async findTemplateByName(name: string): Promise<EmailTemplate | null> {
    const result = await this.query<TemplateRow>(
      "find template by name",
      `SELECT ${TEMPLATE_COLUMNS} FROM email_templates WHERE name = $1`,
      [name]
    );
    return result.rows.length > 0 ? toTemplate(result.rows[0]) : null;
  }

  async listTemplates(): Promise<EmailTemplate[]> {
    const result = await this.query<TemplateRow>(
      "list templates",
      `SELECT ${TEMPLATE_COLUMNS} FROM email_templates ORDER BY id`
    );
    return result.rows.map(toTemplate);
  }

  async updateTemplate(
    id: number,
    patch: TemplatePatch
  ): Promise<EmailTemplate | null> {
    const { sql, values } = assignments(patch, TEMPLATE_PATCH_COLUMNS, 2);
    const result = await this.query<TemplateRow>(
      "update template",
      `UPDATE email_templates SET ${sql} WHERE id = $1 RETURNING ${TEMPLATE_COLUMNS}`,
      [id, ...values]
    );
    return result.rows.length > 0 ? toTemplate(result.rows[0]) : null;
  }

  async deleteTemplate(id: number): Promise<boolean> {
    const result = await this.query(
      "delete template",
      "DELETE FROM email_templates WHERE id = $1",
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  // ---- email logs ----

  async insertEmailLog(input: NewEmailLog): Promise<EmailLog> {
    const result = await this.query<EmailLogRow>(
      "insert email log",
      `INSERT INTO email_logs (contact_id, template_id, job_id, subject, body,
         sent_at, status, error_message, smtp_response)
       VALUES ($1, $2, $3, $4, $5, COALESCE($6, now()), $7, $8, $9)
       RETURNING ${LOG_COLUMNS}`,
      [
        input.contactId,
        input.templateId,
        input.jobId,
        input.subject,
        input.body,
        input.sentAt ?? null,
        input.status,
        input.errorMessage ?? null,
        input.smtpResponse ?? null,
      ]
    );
    return toEmailLog(result.rows[0]);
  }

  async listEmailLogs(filter: EmailLogFilter = {}): Promise<EmailLog[]> {
    const limit = filter.limit ?? 50;
    const result =
      filter.contactId === undefined
        ? await this.query<EmailLogRow>(
            "list email logs",
            `SELECT ${LOG_COLUMNS} FROM email_logs ORDER BY sent_at DESC, id DESC LIMIT $1`,
            [limit]
          )
        : await this.query<EmailLogRow>(
            "list email logs",
            `SELECT ${LOG_COLUMNS} FROM email_logs WHERE contact_id = $1
             ORDER BY sent_at DESC, id DESC LIMIT $2`,
            [filter.contactId, limit]
          );
    return result.rows.map(toEmailLog);
  }

  async countEmailLogsSince(since: Date, status: EmailStatus): Promise<number> {
    const result = await this.query<{ count: number }>(
      "count email logs",
      "SELECT count(*)::int AS count FROM email_logs WHERE status = $1 AND sent_at >= $2",
      [status, since]
    );
    return result.rows[0]?.count ?? 0;
  }

  // ---- accounts ----

  async upsertAccount(input: NewEmailAccount): Promise<EmailAccount> {
    const result = await this.query<AccountRow>(
      "upsert account",
      `INSERT INTO email_accounts (email_address, smtp_server, smtp_port, is_active)
       VALUES ($1, $2, $3, true)
       ON CONFLICT (email_address) DO UPDATE
         SET smtp_server = EXCLUDED.smtp_server,
             smtp_port = EXCLUDED.smtp_port,
             is_active = true,
             updated_at = now()
       RETURNING ${ACCOUNT_COLUMNS}`,
      [input.emailAddress, input.smtpServer, input.smtpPort]
    );
    return toAccount(result.rows[0]);
  }

  async findAccountByEmail(email: string): Promise<EmailAccount | null> {
    const result = await this.query<AccountRow>(
      "find account",
      `SELECT ${ACCOUNT_COLUMNS} FROM email_accounts WHERE email_address = $1`,
      [email]
    );
    return result.rows.length > 0 ? toAccount(result.rows[0]) : null;
  }

  async findActiveAccount(): Promise<EmailAccount | null> {
    const result = await this.query<AccountRow>(
      "find active account",
      `SELECT ${ACCOUNT_COLUMNS} FROM email_accounts WHERE is_active ORDER BY id LIMIT 1`
    );
    return result.rows.length > 0 ? toAccount(result.rows[0]) : null;
  }

  async setAccountActive(id: number, active: boolean): Promise<void> {
    await this.query(
      "set account active",
      "UPDATE email_accounts SET is_active = $2, updated_at = now() WHERE id = $1",
      [id, active]
    );
  }

  async deactivateAccountsExcept(id: number | null): Promise<void> {
    await this.query(
      "deactivate accounts",
      `UPDATE email_accounts SET is_active = false, updated_at = now()
       WHERE is_active AND ($1::int IS NULL OR id <> $1)`,
      [id]
    );
  }
}
