import { z } from "zod";
import { EmailLogFilter, Store } from "../db/store";
import {
  CONTACT_TYPES,
  Contact,
  ContactPatch,
  ContactType,
  EmailLog,
  NewContact,
} from "../types";
import { NotFoundError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { emailAddress, optionalText, parseInput } from "../utils/validation";

const log = createLogger("contacts");

export const contactInput = z.object({
  name: z.string().trim().min(1, "is required"),
  email: emailAddress,
  companyName: z.string().trim().min(1, "is required"),
  contactType: z.enum(CONTACT_TYPES).default("Other"),
  phone: optionalText,
  linkedinUrl: optionalText,
  jobId: z.number().int().positive().optional(),
});

const contactPatchInput = z.object({
  name: z.string().trim().min(1, "is required").optional(),
  email: emailAddress.optional(),
  companyName: z.string().trim().min(1, "is required").optional(),
  contactType: z.enum(CONTACT_TYPES).optional(),
  phone: z.string().trim().nullable().optional(),
  linkedinUrl: z.string().trim().nullable().optional(),
  jobId: z.number().int().positive().nullable().optional(),
  notes: z.string().nullable().optional(),
});

export type ContactEdit = Pick<
  ContactPatch,
  | "name"
  | "email"
  | "companyName"
  | "contactType"
  | "phone"
  | "linkedinUrl"
  | "jobId"
  | "notes"
>;

export async function createContact(
  store: Store,
  input: NewContact
): Promise<Contact> {
  const data = parseInput(contactInput, input, `contact "${input.name}"`);

  if (data.jobId !== undefined && !(await store.findJob(data.jobId))) {
    throw new NotFoundError("Job", data.jobId);
  }

  const created = await store.insertContact(data);
  log.info(`Contact ${created.name} <${created.email}> added`);
  return created;
}

/**
 * Edits the descriptive fields of a contact. Follow-up state is owned by
 * the follow-up engine and cannot be changed here.
 */
export async function updateContact(
  store: Store,
  id: number,
  patch: ContactEdit
): Promise<Contact> {
  const data = parseInput(contactPatchInput, patch, `contact ${id}`);

  return store.transaction(async (tx) => {
    if (typeof data.jobId === "number" && !(await tx.findJob(data.jobId))) {
      throw new NotFoundError("Job", data.jobId);
    }
    const updated = await tx.updateContact(id, data);
    if (!updated) throw new NotFoundError("Contact", id);
    return updated;
  });
}

export async function deleteContact(store: Store, id: number): Promise<void> {
  const deleted = await store.deleteContact(id);
  if (!deleted) throw new NotFoundError("Contact", id);
  log.info(`Contact ${id} deleted`);
}

export async function getContact(store: Store, id: number): Promise<Contact> {
  const contact = await store.findContact(id);
  if (!contact) throw new NotFoundError("Contact", id);
  return contact;
}

export interface ContactQuery {
  /** Case-insensitive match on name, email or company. */
  search?: string;
  type?: ContactType;
  jobId?: number;
}

export function filterContacts(
  contacts: Contact[],
  query: ContactQuery = {}
): Contact[] {
  const needle = query.search?.trim().toLowerCase();

  return contacts.filter((contact) => {
    if (query.type && contact.contactType !== query.type) return false;
    if (query.jobId !== undefined && contact.jobId !== query.jobId) return false;
    if (!needle) return true;
    return [contact.name, contact.email, contact.companyName].some((field) =>
      field.toLowerCase().includes(needle)
    );
  });
}

export async function listContacts(
  store: Store,
  query: ContactQuery = {}
): Promise<Contact[]> {
  return filterContacts(await store.listContacts(), query);
}

/** Email history, newest first. */
export async function listEmailLogs(
  store: Store,
  filter: EmailLogFilter = {}
): Promise<EmailLog[]> {
  return store.listEmailLogs({ ...filter, limit: filter.limit ?? 50 });
}
