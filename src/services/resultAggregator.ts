// ============================================================================
// Campaign Result Aggregator
// ============================================================================

import {
  AttemptTracker,
  CallOutcome,
  CampaignResult,
  CampaignRun,
  CampaignSummary,
  ContactResult,
  FinalOutcome,
  OutcomeCounts,
} from "../types/campaign";

export interface CampaignAnalytics {
  campaign_id: string;
  run_id: string;
  status: CampaignResult["status"];
  total_calls: number;
  total_attempts: number;
  total_duration: number;
  success_rate: number;
  status_counts: OutcomeCounts;
  validation_failures: number;
  calls: Array<
    Pick<
      ContactResult,
      "sheet_index" | "patient_name" | "phone_number" | "status" | "attempts" | "duration" | "transcript"
    >
  >;
}

export interface DashboardMetrics {
  total_clients: number;
  total_campaigns: number;
  total_calls: number;
  success_rate: number;
}

export function emptyOutcomeCounts(): OutcomeCounts {
  return {
    [CallOutcome.CONFIRMED]: 0,
    [CallOutcome.CANCELLED]: 0,
    [CallOutcome.RESCHEDULED]: 0,
    [CallOutcome.NOT_AVAILABLE]: 0,
    [CallOutcome.WRONG_NUMBER]: 0,
    [CallOutcome.BUSY_VOICEMAIL]: 0,
    [CallOutcome.FAILED]: 0,
  };
}

function toFinalOutcome(outcome: CallOutcome): FinalOutcome {
  // A tracker still pending here never finished its run
  return outcome === CallOutcome.PENDING ? CallOutcome.FAILED : outcome;
}

/**
 * Percentage rounded to one decimal, 0 when there is nothing to divide by
 */
export function percentage(part: number, whole: number): number {
  if (whole <= 0) return 0;
  return Math.round((part / whole) * 1000) / 10;
}

export function toContactResult(tracker: AttemptTracker): ContactResult {
  const { contact, last_result } = tracker;
  return {
    sheet_index: contact.sheet_index,
    patient_name: contact.patient_name,
    phone_number: contact.phone_number,
    appointment_date: contact.appointment_date,
    appointment_time: contact.appointment_time,
    provider_name: contact.provider_name,
    office_location: contact.office_location,
    status: toFinalOutcome(tracker.outcome),
    attempts: tracker.attempts,
    duration: last_result?.duration_seconds ?? 0,
    transcript: last_result?.transcript ?? "",
    call_id: last_result?.call_id,
    voicemail_left: tracker.voicemail_attempted && tracker.outcome === CallOutcome.BUSY_VOICEMAIL,
    error: tracker.error,
  };
}

export function summarize(
  results: readonly ContactResult[],
  validationFailures: number
): CampaignSummary {
  const statusCounts = emptyOutcomeCounts();
  let totalAttempts = 0;
  let totalDuration = 0;

  for (const result of results) {
    statusCounts[result.status] += 1;
    totalAttempts += result.attempts;
    totalDuration += result.duration;
  }

  return {
    total_contacts: results.length + validationFailures,
    attempted_contacts: results.length,
    validation_failures: validationFailures,
    total_attempts: totalAttempts,
    total_duration: totalDuration,
    success_rate: percentage(statusCounts[CallOutcome.CONFIRMED], results.length),
    status_counts: statusCounts,
  };
}

/**
 * Final records for a run, in sheet order
 */
export function buildCampaignResult(run: CampaignRun): CampaignResult {
  const results = [...run.trackers]
    .sort((a, b) => a.contact.sheet_index - b.contact.sheet_index)
    .map(toContactResult);
  const now = new Date().toISOString();

  return {
    campaign_id: run.campaign_id,
    run_id: run.id,
    status: run.status,
    started_at: run.started_at ?? now,
    finished_at: run.finished_at ?? now,
    summary: summarize(results, run.validation_failures.length),
    results,
    validation_failures: [...run.validation_failures],
  };
}

export function computeAnalytics(result: CampaignResult): CampaignAnalytics {
  return {
    campaign_id: result.campaign_id,
    run_id: result.run_id,
    status: result.status,
    total_calls: result.summary.attempted_contacts,
    total_attempts: result.summary.total_attempts,
    total_duration: result.summary.total_duration,
    success_rate: result.summary.success_rate,
    status_counts: { ...result.summary.status_counts },
    validation_failures: result.summary.validation_failures,
    calls: result.results.map((r) => ({
      sheet_index: r.sheet_index,
      patient_name: r.patient_name,
      phone_number: r.phone_number,
      status: r.status,
      attempts: r.attempts,
      duration: r.duration,
      transcript: r.transcript,
    })),
  };
}

/**
 * Totals across every campaign that has a saved result
 */
export function computeDashboardMetrics(
  totalClients: number,
  totalCampaigns: number,
  results: readonly CampaignResult[]
): DashboardMetrics {
  let totalCalls = 0;
  let confirmed = 0;
  for (const result of results) {
    totalCalls += result.summary.attempted_contacts;
    confirmed += result.summary.status_counts[CallOutcome.CONFIRMED];
  }

  return {
    total_clients: totalClients,
    total_campaigns: totalCampaigns,
    total_calls: totalCalls,
    success_rate: percentage(confirmed, totalCalls),
  };
}
