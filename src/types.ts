export type PostingView = "active" | "applied" | "ignored";

export type RunStatus = "running" | "completed" | "failed";

export type ChannelKind = "telegram" | "discord";

export type RejectionReason = "exclusion" | "title" | "location" | "seniority";

export interface CandidatePosting {
  title: string;
  url: string; // Absolute, resolved against the target's base URL
  location: string | null; // null = unknown
  description: string | null;
  postedAt: string | null;
}

export interface NewPosting {
  company: string;
  title: string;
  url: string;
  location: string | null;
  description: string | null;
  postedAt: string | null;
}

export interface Posting extends NewPosting {
  id: number;
  scrapedAt: string;
  notified: boolean;
  applied: boolean;
  ignored: boolean;
}

export type InsertResult =
  | { status: "created"; posting: Posting }
  | { status: "duplicate" };

export interface StatusUpdate {
  applied?: boolean;
  ignored?: boolean;
}

export interface FetchResult {
  html: string | null;
  success: boolean;
  error?: string;
  attempts: number;
  responseTimeMs: number;
  statusCode?: number;
}

export interface AlertMessage {
  postingId: number;
  company: string;
  title: string;
  location: string | null;
  url: string;
}

export interface NotifyResult {
  delivered: number;
  failed: number;
  held: number;
  aborted: boolean;
}

export interface TargetRunStats {
  target: string;
  success: boolean;
  candidatesFound: number;
  postingsNew: number;
  postingsDuplicate: number;
  postingsRejected: number;
  postingsKnown: number;
  error?: string;
}

export interface PipelineRunResult {
  runId: number;
  targetsAttempted: number;
  targetsSucceeded: number;
  candidatesFound: number;
  postingsNew: number;
  postingsDuplicate: number;
  postingsRejected: number;
  postingsKnown: number;
  alertsSent: number;
  errors: string[];
  durationMs: number;
}

export interface RunRecord {
  id: number;
  runType: string;
  startedAt: string;
  finishedAt: string | null;
  status: RunStatus;
  targetsAttempted: number;
  targetsSucceeded: number;
  candidatesFound: number;
  postingsNew: number;
  alertsSent: number;
  errors: string[];
  dryRun: boolean;
}
