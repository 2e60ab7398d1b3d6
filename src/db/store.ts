import {
  Contact,
  ContactPatch,
  EmailAccount,
  EmailLog,
  EmailStatus,
  EmailTemplate,
  Job,
  JobPatch,
  NewContact,
  NewEmailAccount,
  NewEmailLog,
  NewJob,
  NewTemplate,
  TemplatePatch,
} from "../types";

export interface EmailLogFilter {
  contactId?: number;
  limit?: number;
}

/**
 * Persistence boundary for the outreach services.
 *
 * Every method is atomic on its own. `transaction` groups several calls so
 * they commit or roll back together; the `tx` handed to `work` must be used
 * for every call inside it. Failures surface as `StoreError`, unique
 * violations as `ValidationError`.
 */
export interface Store {
  transaction<T>(work: (tx: Store) => Promise<T>): Promise<T>;

  insertJob(input: NewJob): Promise<Job>;
  findJob(id: number): Promise<Job | null>;
  findJobByLink(link: string): Promise<Job | null>;
  listJobs(): Promise<Job[]>;
  updateJob(id: number, patch: JobPatch): Promise<Job | null>;
  /** Contacts and logs keep their rows with the job reference cleared. */
  deleteJob(id: number): Promise<boolean>;

  insertContact(input: NewContact): Promise<Contact>;
  /** Locks the row for the rest of the enclosing transaction. */
  findContact(id: number): Promise<Contact | null>;
  listContacts(): Promise<Contact[]>;
  updateContact(id: number, patch: ContactPatch): Promise<Contact | null>;
  deleteContact(id: number): Promise<boolean>;

  insertTemplate(input: NewTemplate): Promise<EmailTemplate>;
  findTemplate(id: number): Promise<EmailTemplate | null>;
  findTemplateByName(name: string): Promise<EmailTemplate | null>;
  listTemplates(): Promise<EmailTemplate[]>;
  updateTemplate(
    id: number,
    patch: TemplatePatch
  ): Promise<EmailTemplate | null>;
  deleteTemplate(id: number): Promise<boolean>;

  insertEmailLog(input: NewEmailLog): Promise<EmailLog>;
  listEmailLogs(filter?: EmailLogFilter): Promise<EmailLog[]>;
  countEmailLogsSince(since: Date, status: EmailStatus): Promise<number>;

  upsertAccount(input: NewEmailAccount): Promise<EmailAccount>;
  findAccountByEmail(email: string): Promise<EmailAccount | null>;
  findActiveAccount(): Promise<EmailAccount | null>;
  setAccountActive(id: number, active: boolean): Promise<void>;
  deactivateAccountsExcept(id: number | null): Promise<void>;
}
