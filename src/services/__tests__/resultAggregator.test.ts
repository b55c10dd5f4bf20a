import { describe, expect, it } from "vitest";
import {
  buildCampaignResult,
  computeAnalytics,
  computeDashboardMetrics,
  percentage,
} from "../resultAggregator";
import { createCampaignRun } from "../../logic/campaignOrchestrator";
import { completeWithVoicemail, recordAttempt } from "../../logic/attemptTracker";
import { resolveRunConfig } from "../campaignConfig";
import { CallOutcome, Contact } from "../../types/campaign";

function contact(sheetIndex: number): Contact {
  return {
    sheet_index: sheetIndex,
    phone_number: `+1555123000${sheetIndex}`,
    patient_name: `Patient ${sheetIndex}`,
    provider_name: "Dr. Lee",
    appointment_date: "2024-07-01",
    appointment_time: "10:00 AM",
    office_location: "Main",
  };
}

const answered = (transcript: string, duration: number) => ({
  success: true,
  call_id: `call-${duration}`,
  transcript,
  duration_seconds: duration,
  latency_ms: 1,
});

function finishedRun() {
  const run = createCampaignRun(
    "campaign-1",
    resolveRunConfig({ max_attempts: 1 }),
    [contact(2), contact(0), contact(1)],
    [{ sheet_index: 3, reason: "Missing required field(s): phone_number", row: {} }]
  );
  const [first, second, third] = run.trackers;
  if (!first || !second || !third) throw new Error("expected three trackers");

  recordAttempt(first, CallOutcome.CONFIRMED, answered("I'll be there", 40));
  recordAttempt(second, CallOutcome.BUSY_VOICEMAIL, answered("", 0));
  completeWithVoicemail(second, { success: true, call_id: "vm-1" });
  recordAttempt(third, CallOutcome.CANCELLED, answered("cancel please", 25));

  run.status = "completed";
  run.started_at = "2024-07-01T09:00:00.000Z";
  run.finished_at = "2024-07-01T09:30:00.000Z";
  return run;
}

describe("buildCampaignResult", () => {
  it("reports contacts in sheet order with their final status", () => {
    const result = buildCampaignResult(finishedRun());

    expect(result.results.map((r) => [r.sheet_index, r.status, r.voicemail_left])).toEqual([
      [0, CallOutcome.CONFIRMED, false],
      [1, CallOutcome.BUSY_VOICEMAIL, true],
      [2, CallOutcome.CANCELLED, false],
    ]);
    expect(result.results[0]).toMatchObject({ duration: 40, transcript: "I'll be there" });
    expect(result.started_at).toBe("2024-07-01T09:00:00.000Z");
  });

  it("summarizes every outcome", () => {
    expect(buildCampaignResult(finishedRun()).summary).toEqual({
      total_contacts: 4,
      attempted_contacts: 3,
      validation_failures: 1,
      total_attempts: 3,
      total_duration: 65,
      success_rate: 33.3,
      status_counts: {
        confirmed: 1,
        cancelled: 1,
        rescheduled: 0,
        not_available: 0,
        wrong_number: 0,
        busy_voicemail: 1,
        failed: 0,
      },
    });
  });

  it("reports an unfinished contact as failed", () => {
    const run = createCampaignRun("campaign-1", resolveRunConfig({}), [contact(0)]);
    expect(buildCampaignResult(run).results[0]?.status).toBe(CallOutcome.FAILED);
  });
});

describe("analytics", () => {
  it("exposes per-call details alongside the totals", () => {
    const analytics = computeAnalytics(buildCampaignResult(finishedRun()));
    expect(analytics.total_calls).toBe(3);
    expect(analytics.success_rate).toBe(33.3);
    expect(analytics.calls[2]).toEqual({
      sheet_index: 2,
      patient_name: "Patient 2",
      phone_number: "+15551230002",
      status: CallOutcome.CANCELLED,
      attempts: 1,
      duration: 25,
      transcript: "cancel please",
    });
  });

  it("aggregates the dashboard across campaigns", () => {
    const result = buildCampaignResult(finishedRun());
    expect(computeDashboardMetrics(2, 5, [result, result])).toEqual({
      total_clients: 2,
      total_campaigns: 5,
      total_calls: 6,
      success_rate: 33.3,
    });
    expect(computeDashboardMetrics(0, 0, [])).toEqual({
      total_clients: 0,
      total_campaigns: 0,
      total_calls: 0,
      success_rate: 0,
    });
  });

  it("rounds percentages to one decimal", () => {
    expect(percentage(2, 3)).toBe(66.7);
    expect(percentage(1, 8)).toBe(12.5);
    expect(percentage(1, 0)).toBe(0);
  });
});
