// ============================================================================
// Dispatcher - one batch of call attempts
// ============================================================================
//
// For each pending tracker in the batch:
//   semaphore slot -> placeCall -> settle delay -> transcript -> classify -> record
//
// Per-contact failures are recorded on the tracker and never thrown, so one
// contact cannot stall or fail the rest of the batch. Only an abort of the
// wait for a slot or for the call itself leaves a tracker untouched.

import { config, type TranscriptMode } from "../config";
import { logger } from "../utils/logger";
import { errorLogger } from "../utils/errorLogger";
import { sleep as defaultSleep, type SleepFn } from "../utils/retry";
import { Semaphore } from "../utils/semaphore";
import { GatewayError, errorMessage, isAbortError } from "../utils/errors";
import { blandService } from "../services/blandService";
import {
  CallCompletionRegistryClass,
  callCompletionRegistry,
} from "../services/callCompletionRegistry";
import { buildReminderScript, buildRequestData } from "../services/scriptBuilder";
import { classifyTranscriptDetailed, isAmbiguous } from "../services/transcriptClassifier";
import { pollForTranscript } from "./transcriptPoller";
import { isPending, recordAttempt } from "./attemptTracker";
import { AttemptTracker, CallOutcome } from "../types/campaign";
import type { CallCompletionEvent, CallGateway } from "../types/gateway";

export interface DispatcherOptions {
  gateway: CallGateway;
  sleep: SleepFn;
  settleDelayMs: number;
  transcriptMode: TranscriptMode;
  webhookWaitMs: number;
  pollIntervalMs: number;
  pollMaxAttempts: number;
  completions: CallCompletionRegistryClass;
}

function defaultOptions(): DispatcherOptions {
  return {
    gateway: blandService,
    sleep: defaultSleep,
    settleDelayMs: config.bland.settleDelayMs,
    // Webhooks need somewhere to be delivered
    transcriptMode: config.bland.webhookUrl ? config.bland.transcriptMode : "poll",
    webhookWaitMs: config.bland.webhookWaitMs,
    pollIntervalMs: config.bland.transcriptPollInterval,
    pollMaxAttempts: config.bland.transcriptPollMaxAttempts,
    completions: callCompletionRegistry,
  };
}

interface TranscriptOutcome {
  transcript: string;
  durationSeconds: number;
  error?: string;
}

export class Dispatcher {
  private readonly options: DispatcherOptions;

  constructor(options: Partial<DispatcherOptions> = {}) {
    this.options = { ...defaultOptions(), ...options };
  }

  get gateway(): CallGateway {
    return this.options.gateway;
  }

  /**
   * Run one attempt for every pending tracker in the batch, at most
   * `semaphore` permits at a time. Resolves once every attempt has settled.
   */
  async dispatch(
    campaignId: string,
    batch: readonly AttemptTracker[],
    semaphore: Semaphore,
    signal?: AbortSignal
  ): Promise<void> {
    await Promise.all(
      batch.map(async (tracker) => {
        if (!isPending(tracker)) {
          logger.debug("Skipping tracker that is not pending", {
            sheet_index: tracker.contact.sheet_index,
            outcome: tracker.outcome,
          });
          return;
        }

        try {
          await semaphore.withPermit(() => this.attempt(campaignId, tracker, signal), signal);
        } catch (error) {
          if (isAbortError(error)) {
            logger.debug("Attempt not started, campaign stopping", {
              sheet_index: tracker.contact.sheet_index,
            });
            return;
          }
          // attempt() records its own failures; anything else is a bug
          logger.error("Unexpected dispatcher error", {
            campaign_id: campaignId,
            sheet_index: tracker.contact.sheet_index,
            error: errorMessage(error),
          });
          recordAttempt(tracker, CallOutcome.FAILED, {
            success: false,
            error: errorMessage(error),
            transcript: "",
            duration_seconds: 0,
            latency_ms: 0,
          });
        }
      })
    );
  }

  /**
   * Place one call for the tracker and record the classified outcome
   */
  private async attempt(
    campaignId: string,
    tracker: AttemptTracker,
    signal?: AbortSignal
  ): Promise<void> {
    const { contact } = tracker;
    const attemptNumber = tracker.attempts + 1;
    const startedAt = Date.now();
    const useWebhook = this.options.transcriptMode === "webhook";

    // One id per attempt, so a late webhook of an earlier call cannot
    // complete this one
    const correlationId = `${tracker.correlation_id}:${attemptNumber}`;

    // Registered before the call so a fast webhook is not missed
    const completion = useWebhook
      ? this.options.completions.waitFor(correlationId, this.options.webhookWaitMs, signal)
      : null;

    let callId: string;
    try {
      const response = await this.options.gateway.placeCall(
        {
          phoneNumber: contact.phone_number,
          task: buildReminderScript(contact),
          correlationId,
          requestData: buildRequestData(contact),
        },
        signal
      );
      callId = response.callId;
    } catch (error) {
      this.options.completions.forget(correlationId);
      if (isAbortError(error)) {
        throw error;
      }

      const message = errorMessage(error);
      const latency = Date.now() - startedAt;
      recordAttempt(tracker, CallOutcome.FAILED, {
        success: false,
        error: message,
        transcript: "",
        duration_seconds: 0,
        latency_ms: latency,
      });
      errorLogger.logError(campaignId, "GATEWAY_INITIATION", message, {
        phoneNumber: contact.phone_number,
        sheetIndex: contact.sheet_index,
        attempt: attemptNumber,
        httpStatus: error instanceof GatewayError ? error.httpStatus : undefined,
        context: { error_type: error instanceof Error ? error.name : "unknown" },
      });
      this.logAttempt(tracker, attemptNumber, undefined, latency, "initiation_failed");
      return;
    }

    const fetched = await this.fetchTranscript(callId, completion, signal);
    if (fetched.error) {
      errorLogger.logError(campaignId, "TRANSCRIPT_FETCH", fetched.error, {
        phoneNumber: contact.phone_number,
        sheetIndex: contact.sheet_index,
        attempt: attemptNumber,
        context: { call_id: callId },
      });
    }

    const classification = classifyTranscriptDetailed(fetched.transcript);
    if (isAmbiguous(classification)) {
      logger.debug("Classification ambiguous", {
        sheet_index: contact.sheet_index,
        call_id: callId,
        rule: classification.rule,
        reason: classification.reason,
        outcome: classification.outcome,
      });
    }

    const latency = Date.now() - startedAt;
    recordAttempt(tracker, classification.outcome, {
      success: true,
      call_id: callId,
      transcript: fetched.transcript,
      duration_seconds: fetched.durationSeconds,
      latency_ms: latency,
    });
    this.logAttempt(tracker, attemptNumber, callId, latency, classification.rule);
  }

  /**
   * Transcript of a placed call. Never throws: a transcript that cannot be
   * had (timeout, gateway errors, abort) is reported as an empty one.
   */
  private async fetchTranscript(
    callId: string,
    completion: Promise<CallCompletionEvent | null> | null,
    signal?: AbortSignal
  ): Promise<TranscriptOutcome> {
    try {
      await this.options.sleep(this.options.settleDelayMs, signal);

      if (completion) {
        const event = await completion;
        if (event && event.callId && event.callId !== callId) {
          logger.warn("Discarding completion webhook for another call", {
            call_id: callId,
            webhook_call_id: event.callId,
            correlation_id: event.correlationId,
          });
        } else if (event) {
          return { transcript: event.transcript, durationSeconds: event.durationSeconds };
        }
        if (signal?.aborted) {
          return { transcript: "", durationSeconds: 0 };
        }
        logger.info("No completion webhook received, polling for transcript", {
          call_id: callId,
        });
      }

      const record = await pollForTranscript(this.options.gateway, callId, {
        intervalMs: this.options.pollIntervalMs,
        maxAttempts: this.options.pollMaxAttempts,
        sleep: this.options.sleep,
        signal,
      });
      return { transcript: record.transcript, durationSeconds: record.durationSeconds };
    } catch (error) {
      if (isAbortError(error)) {
        logger.debug("Transcript wait aborted", { call_id: callId });
        return { transcript: "", durationSeconds: 0 };
      }
      logger.warn("Transcript fetch failed, treating as no answer", {
        call_id: callId,
        error: errorMessage(error),
      });
      return { transcript: "", durationSeconds: 0, error: errorMessage(error) };
    }
  }

  private logAttempt(
    tracker: AttemptTracker,
    attemptNumber: number,
    callId: string | undefined,
    latencyMs: number,
    rule: string
  ): void {
    logger.info("Call attempt completed", {
      sheet_index: tracker.contact.sheet_index,
      phone: tracker.contact.phone_number,
      attempt: attemptNumber,
      max_attempts: tracker.max_attempts,
      outcome: tracker.outcome,
      call_id: callId,
      latency_ms: latencyMs,
      classifier_rule: rule,
    });
  }
}
