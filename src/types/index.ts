export const JOB_STATUSES = [
  "Applied",
  "Interview Scheduled",
  "Offer Received",
  "Rejected",
  "Ghosted",
] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const JOB_PRIORITIES = ["Low", "Medium", "High"] as const;
export type JobPriority = (typeof JOB_PRIORITIES)[number];

export const CONTACT_TYPES = [
  "Recruiter",
  "HR",
  "Hiring Manager",
  "Networking",
  "Other",
] as const;
export type ContactType = (typeof CONTACT_TYPES)[number];

export const EMAIL_STATUSES = ["sent", "failed", "bounced"] as const;
export type EmailStatus = (typeof EMAIL_STATUSES)[number];

export interface Job {
  id: number;
  companyName: string;
  jobTitle: string;
  dateApplied: string; // YYYY-MM-DD
  status: JobStatus;
  location: string | null;
  jobLink: string | null;
  priority: JobPriority;
  followUpDate: string | null; // YYYY-MM-DD
  interviewDate: string | null; // YYYY-MM-DD
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Contact {
  id: number;
  name: string;
  email: string;
  companyName: string;
  contactType: ContactType;
  phone: string | null;
  linkedinUrl: string | null;
  jobId: number | null;
  lastContacted: Date | null;
  needsFollowup: boolean;
  followupDate: string | null; // YYYY-MM-DD, only meaningful while needsFollowup
  replied: boolean;
  replyDate: Date | null;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface EmailTemplate {
  id: number;
  name: string;
  subject: string;
  body: string;
  isFollowup: boolean;
  daysAfterPrevious: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface EmailLog {
  id: number;
  contactId: number;
  templateId: number | null;
  jobId: number | null;
  subject: string;
  body: string;
  sentAt: Date;
  status: EmailStatus;
  errorMessage: string | null;
  smtpResponse: string | null;
}

export interface EmailAccount {
  id: number;
  emailAddress: string;
  smtpServer: string;
  smtpPort: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type NewJob = Pick<Job, "companyName" | "jobTitle" | "dateApplied"> &
  Partial<
    Pick<
      Job,
      | "status"
      | "location"
      | "jobLink"
      | "priority"
      | "followUpDate"
      | "interviewDate"
      | "notes"
    >
  >;

export type JobPatch = Partial<
  Pick<Job, "status" | "followUpDate" | "interviewDate" | "notes" | "priority">
>;

export type NewContact = Pick<Contact, "name" | "email" | "companyName"> &
  Partial<Pick<Contact, "contactType" | "phone" | "linkedinUrl" | "jobId">>;

/** Fields the follow-up engine owns. Written together in one statement. */
export interface FollowupPatch {
  lastContacted?: Date | null;
  needsFollowup?: boolean;
  followupDate?: string | null;
  replied?: boolean;
  replyDate?: Date | null;
}

export type ContactPatch = Partial<
  Pick<
    Contact,
    | "name"
    | "email"
    | "companyName"
    | "contactType"
    | "phone"
    | "linkedinUrl"
    | "jobId"
    | "notes"
  >
> &
  FollowupPatch;

export type NewTemplate = Pick<EmailTemplate, "name" | "subject" | "body"> &
  Partial<Pick<EmailTemplate, "isFollowup" | "daysAfterPrevious">>;

export type TemplatePatch = Partial<
  Pick<
    EmailTemplate,
    "name" | "subject" | "body" | "isFollowup" | "daysAfterPrevious"
  >
>;

export type NewEmailLog = Pick<
  EmailLog,
  "contactId" | "templateId" | "jobId" | "subject" | "body" | "status"
> &
  Partial<Pick<EmailLog, "errorMessage" | "smtpResponse" | "sentAt">>;

export interface NewEmailAccount {
  emailAddress: string;
  smtpServer: string;
  smtpPort: number;
}

export type ContactState =
  | "NEW"
  | "AWAITING_REPLY"
  | "FOLLOWUP_DUE"
  | "FOLLOWUP_SCHEDULED"
  | "STALE"
  | "REPLIED";

export interface ActionableItems {
  dueToday: Contact[];
  recentReplies: Contact[];
  stale: Contact[];
}

export interface FollowupReminder {
  contactName: string;
  company: string;
  daysUntil: number;
  dueDate: string; // YYYY-MM-DD
  createdAt: Date;
}

export interface RenderedEmail {
  subject: string;
  body: string;
}

export interface OutgoingMessage extends RenderedEmail {
  from: { name: string; address: string };
  to: string;
}

export interface SendReceipt {
  messageId: string;
  response: string;
}

export type SendOutcome =
  | {
      status: "delivered";
      message: string;
      log: EmailLog;
      contact: Contact;
      reminder: FollowupReminder | null;
    }
  | {
      status: "failed";
      message: string;
      log: EmailLog;
    };

export interface CampaignSummary {
  sent: number;
  failed: number;
  errors: string[];
  reminders: FollowupReminder[];
  cancelled: boolean;
}

export interface ImportResult {
  imported: number;
  errors: string[];
}

export interface InboundMessage {
  id: string;
  threadId: string;
  from: string;
  fromAddress: string;
  subject: string;
  date: string; // ISO date
  body: string; // plain text or stripped HTML
}

export type Clock = () => Date;
