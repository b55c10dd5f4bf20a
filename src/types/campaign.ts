// ============================================================================
// Campaign Type Definitions
// ============================================================================

/**
 * One person/phone number to call. Produced by the row validator and
 * frozen from then on.
 */
export interface Contact {
  sheet_index: number;
  phone_number: string; // E.164
  patient_name: string;
  provider_name: string;
  appointment_date: string;
  appointment_time: string;
  office_location: string;
}

/**
 * Classified result of an attempt, or of a contact's whole campaign
 */
export enum CallOutcome {
  PENDING = "pending",
  CONFIRMED = "confirmed",
  CANCELLED = "cancelled",
  RESCHEDULED = "rescheduled",
  NOT_AVAILABLE = "not_available",
  WRONG_NUMBER = "wrong_number",
  BUSY_VOICEMAIL = "busy_voicemail",
  FAILED = "failed",
}

export type FinalOutcome = Exclude<CallOutcome, CallOutcome.PENDING>;

/**
 * Outcomes that stop further retries for a contact
 */
export const TERMINAL_OUTCOMES: ReadonlySet<CallOutcome> = new Set([
  CallOutcome.CONFIRMED,
  CallOutcome.CANCELLED,
  CallOutcome.RESCHEDULED,
  CallOutcome.NOT_AVAILABLE,
  CallOutcome.WRONG_NUMBER,
]);

/**
 * Raw result of the latest call attempt
 */
export interface CallAttemptResult {
  success: boolean; // false = call could not be initiated
  call_id?: string;
  error?: string;
  transcript: string;
  duration_seconds: number;
  latency_ms: number;
}

export interface AttemptTracker {
  readonly contact: Readonly<Contact>;
  readonly correlation_id: string;
  readonly max_attempts: number;
  attempts: number;
  outcome: CallOutcome;
  done: boolean;
  last_result: CallAttemptResult | null;
  voicemail_attempted: boolean;
  voicemail_call_id?: string;
  error?: string;
}

export interface CampaignRunConfig {
  max_attempts: number;
  retry_interval_minutes: number;
  concurrency_limit: number;
  batch_size: number;
  batch_delay_seconds: number;
  country_code: string;
}

/**
 * A contact row rejected before it could become a tracker
 */
export interface ValidationFailure {
  sheet_index: number;
  reason: string;
  row: Record<string, unknown>;
}

export type CampaignStatus = "created" | "running" | "completed" | "stopped" | "failed";

/**
 * One execution of a campaign. Trackers are held in `sheet_index` order.
 */
export interface CampaignRun {
  readonly id: string;
  readonly campaign_id: string;
  readonly config: Readonly<CampaignRunConfig>;
  readonly trackers: AttemptTracker[];
  readonly validation_failures: readonly ValidationFailure[];
  status: CampaignStatus;
  round: number;
  started_at?: string;
  finished_at?: string;
}

export interface ContactResult {
  sheet_index: number;
  patient_name: string;
  phone_number: string;
  appointment_date: string;
  appointment_time: string;
  provider_name: string;
  office_location: string;
  status: FinalOutcome;
  attempts: number;
  duration: number;
  transcript: string;
  call_id?: string;
  voicemail_left: boolean;
  error?: string;
}

export type OutcomeCounts = Record<FinalOutcome, number>;

export interface CampaignSummary {
  total_contacts: number;
  attempted_contacts: number;
  validation_failures: number;
  total_attempts: number;
  total_duration: number;
  success_rate: number; // confirmed / attempted contacts, percent
  status_counts: OutcomeCounts;
}

export interface CampaignResult {
  campaign_id: string;
  run_id: string;
  status: CampaignStatus;
  started_at: string;
  finished_at: string;
  summary: CampaignSummary;
  results: ContactResult[];
  validation_failures: ValidationFailure[];
}

export interface Client {
  id: string;
  name: string;
  description: string;
  created_at: string;
}

export interface Campaign {
  id: string;
  name: string;
  client_id: string;
  config: Readonly<CampaignRunConfig>;
  contacts: readonly Readonly<Contact>[];
  validation_failures: ValidationFailure[];
  created_at: string;
  status: CampaignStatus;
  last_run_id?: string;
}
