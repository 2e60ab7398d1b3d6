import { z } from "zod";
import { Store } from "../db/store";
import {
  JOB_PRIORITIES,
  JOB_STATUSES,
  Job,
  JobPatch,
  JobStatus,
  NewJob,
} from "../types";
import { NotFoundError, ValidationError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { calendarDate, optionalText, parseInput } from "../utils/validation";

const log = createLogger("jobs");

export const jobInput = z.object({
  companyName: z.string().trim().min(1, "is required"),
  jobTitle: z.string().trim().min(1, "is required"),
  dateApplied: calendarDate,
  status: z.enum(JOB_STATUSES).default("Applied"),
  location: optionalText,
  jobLink: optionalText,
  priority: z.enum(JOB_PRIORITIES).default("Medium"),
  followUpDate: calendarDate.optional(),
  interviewDate: calendarDate.optional(),
  notes: optionalText,
});

const jobPatchInput = z.object({
  status: z.enum(JOB_STATUSES).optional(),
  followUpDate: calendarDate.nullable().optional(),
  interviewDate: calendarDate.nullable().optional(),
  notes: z.string().nullable().optional(),
  priority: z.enum(JOB_PRIORITIES).optional(),
});

export async function createJob(store: Store, input: NewJob): Promise<Job> {
  const data = parseInput(
    jobInput,
    input,
    `job "${input.jobTitle}" at ${input.companyName}`
  );

  const created = await store.transaction(async (tx) => {
    if (data.jobLink && (await tx.findJobByLink(data.jobLink))) {
      throw new ValidationError(`Job link already tracked: ${data.jobLink}`);
    }
    return tx.insertJob(data);
  });
  log.info(`Job ${created.jobTitle} at ${created.companyName} added`);
  return created;
}

export async function updateJob(
  store: Store,
  id: number,
  patch: JobPatch
): Promise<Job> {
  const data = parseInput(jobPatchInput, patch, `job ${id}`);
  const updated = await store.updateJob(id, data);
  if (!updated) throw new NotFoundError("Job", id);
  return updated;
}

export async function deleteJob(store: Store, id: number): Promise<void> {
  const deleted = await store.deleteJob(id);
  if (!deleted) throw new NotFoundError("Job", id);
  log.info(`Job ${id} deleted`);
}

export async function getJob(store: Store, id: number): Promise<Job> {
  const job = await store.findJob(id);
  if (!job) throw new NotFoundError("Job", id);
  return job;
}

export async function listJobs(
  store: Store,
  status?: JobStatus
): Promise<Job[]> {
  const jobs = await store.listJobs();
  return status ? jobs.filter((job) => job.status === status) : jobs;
}
