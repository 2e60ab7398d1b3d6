import { differenceInCalendarDays, parseISO } from "date-fns";
import { z } from "zod";
import { Store } from "../db/store";
import {
  JOB_PRIORITIES,
  JOB_STATUSES,
  Job,
  JobPriority,
  JobStatus,
} from "../types";
import { toDateString } from "../utils/time";
import { calendarDate, parseInput } from "../utils/validation";

const TOP_LIMIT = 10;
const RECENT_LIMIT = 5;

export interface JobStatsFilter {
  /** Empty or absent means every status. */
  statuses?: JobStatus[];
  priorities?: JobPriority[];
  /** Inclusive bounds on the application date, YYYY-MM-DD. */
  from?: string;
  to?: string;
}

export interface Tally {
  label: string;
  count: number;
}

export interface StatusShare {
  status: JobStatus;
  count: number;
  /** Percentage of the filtered applications. */
  rate: number;
}

export interface JobStats {
  total: number;
  uniqueCompanies: number;
  byStatus: Record<JobStatus, number>;
  byPriority: Record<JobPriority, number>;
  conversion: StatusShare[];
  topCompanies: Tally[];
  topTitles: Tally[];
  /** Applications per month (yyyy-MM), oldest first. */
  timeline: Tally[];
  /** Mean days from application to follow-up date, per status. */
  daysToFollowup: Partial<Record<JobStatus, number>>;
  upcomingFollowups: Job[];
  recent: Job[];
}

const filterInput = z
  .object({
    statuses: z.array(z.enum(JOB_STATUSES)).optional(),
    priorities: z.array(z.enum(JOB_PRIORITIES)).optional(),
    from: calendarDate.optional(),
    to: calendarDate.optional(),
  })
  .refine(
    (f) => !f.from || !f.to || f.from <= f.to,
    "start date must not be after the end date"
  );

/** Most frequent values first, ties by label. */
function tally(values: string[], limit = Infinity): Tally[] {
  const counts = new Map<string, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);

  return [...counts.entries()]
    .map(([label, count]) => ({ label, count }))
    .sort((a, b) => b.count - a.count || a.label.localeCompare(b.label))
    .slice(0, limit);
}

export function filterJobs(jobs: Job[], filter: JobStatsFilter): Job[] {
  const { statuses, priorities, from, to } = filter;
  return jobs.filter(
    (job) =>
      (!statuses?.length || statuses.includes(job.status)) &&
      (!priorities?.length || priorities.includes(job.priority)) &&
      (!from || job.dateApplied >= from) &&
      (!to || job.dateApplied <= to)
  );
}

/**
 * Summary metrics over the applications that pass `filter`. `now` decides
 * which follow-up dates are still upcoming.
 */
export function computeJobStats(
  jobs: Job[],
  filter: JobStatsFilter,
  now: Date
): JobStats {
  const data = parseInput(filterInput, filter, "statistics filter");
  const selected = filterJobs(jobs, data);
  const total = selected.length;

  const byStatus: Record<JobStatus, number> = {
    Applied: 0,
    "Interview Scheduled": 0,
    "Offer Received": 0,
    Rejected: 0,
    Ghosted: 0,
  };
  const byPriority: Record<JobPriority, number> = {
    Low: 0,
    Medium: 0,
    High: 0,
  };
  for (const job of selected) {
    byStatus[job.status]++;
    byPriority[job.priority]++;
  }

  const conversion = JOB_STATUSES.filter((status) => byStatus[status] > 0).map(
    (status) => ({
      status,
      count: byStatus[status],
      rate: (byStatus[status] / total) * 100,
    })
  );

  const gaps = new Map<JobStatus, number[]>();
  for (const job of selected) {
    if (!job.followUpDate) continue;
    const days = differenceInCalendarDays(
      parseISO(job.followUpDate),
      parseISO(job.dateApplied)
    );
    gaps.set(job.status, [...(gaps.get(job.status) ?? []), days]);
  }
  const daysToFollowup: Partial<Record<JobStatus, number>> = {};
  for (const [status, days] of gaps) {
    daysToFollowup[status] = days.reduce((sum, d) => sum + d, 0) / days.length;
  }

  const today = toDateString(now);
  const upcomingFollowups = selected
    .filter((job) => job.followUpDate !== null && job.followUpDate >= today)
    .sort(
      (a, b) =>
        (a.followUpDate ?? "").localeCompare(b.followUpDate ?? "") ||
        a.id - b.id
    );

  const recent = [...selected]
    .sort(
      (a, b) => b.dateApplied.localeCompare(a.dateApplied) || b.id - a.id
    )
    .slice(0, RECENT_LIMIT);

  return {
    total,
    uniqueCompanies: new Set(selected.map((job) => job.companyName)).size,
    byStatus,
    byPriority,
    conversion,
    topCompanies: tally(
      selected.map((job) => job.companyName),
      TOP_LIMIT
    ),
    topTitles: tally(
      selected.map((job) => job.jobTitle),
      TOP_LIMIT
    ),
    timeline: tally(selected.map((job) => job.dateApplied.slice(0, 7))).sort(
      (a, b) => a.label.localeCompare(b.label)
    ),
    daysToFollowup,
    upcomingFollowups,
    recent,
  };
}

export async function getJobStats(
  store: Store,
  filter: JobStatsFilter,
  now: Date
): Promise<JobStats> {
  return computeJobStats(await store.listJobs(), filter, now);
}

function joinCounts(entries: Array<[string, number]>): string {
  return entries
    .filter(([, count]) => count > 0)
    .map(([label, count]) => `${label} ${count}`)
    .join(", ");
}

function joinTally(items: Tally[]): string {
  return items.map((item) => `${item.label} (${item.count})`).join(", ");
}

export function formatJobStats(stats: JobStats): string {
  if (stats.total === 0) return "No applications match the filters";

  const lines = [
    `Applications: ${stats.total} across ${stats.uniqueCompanies} compan${
      stats.uniqueCompanies === 1 ? "y" : "ies"
    }`,
    `By status: ${joinCounts(
      JOB_STATUSES.map((s): [string, number] => [s, stats.byStatus[s]])
    )}`,
    `By priority: ${joinCounts(
      JOB_PRIORITIES.map((p): [string, number] => [p, stats.byPriority[p]])
    )}`,
    `Conversion: ${stats.conversion
      .map((share) => `${share.status} ${share.rate.toFixed(1)}%`)
      .join(", ")}`,
    `Top companies: ${joinTally(stats.topCompanies)}`,
    `Top titles: ${joinTally(stats.topTitles)}`,
    `By month: ${joinTally(stats.timeline)}`,
  ];

  const gaps = JOB_STATUSES.flatMap((status) => {
    const days = stats.daysToFollowup[status];
    return days === undefined ? [] : [`${status} ${days.toFixed(1)}d`];
  });
  if (gaps.length > 0) lines.push(`Days to follow-up: ${gaps.join(", ")}`);

  if (stats.upcomingFollowups.length === 0) {
    lines.push("No upcoming follow-ups");
  } else {
    lines.push("Upcoming follow-ups:");
    for (const job of stats.upcomingFollowups) {
      lines.push(`  ${job.followUpDate} ${job.jobTitle} at ${job.companyName}`);
    }
  }

  lines.push("Recent applications:");
  for (const job of stats.recent) {
    lines.push(
      `  ${job.dateApplied} ${job.jobTitle} at ${job.companyName} [${job.status}]`
    );
  }
  return lines.join("\n");
}
