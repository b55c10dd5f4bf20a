// ============================================================================
// Campaign Orchestrator - rounds, batches and the voicemail fallback
// ============================================================================
//
// round 1..n:  pending trackers (sheet order) -> batches of batch_size
//              dispatch batch, sleep batch_delay between batches
//              sleep retry_interval + safety margin if anything is still pending
// then:        every exhausted tracker gets exactly one voicemail call
//
// Round n+1 never starts before round n has drained. Stopping (abort) lets
// the current batch finish, then closes every open tracker as failed.

import { randomUUID } from "crypto";
import { config, assertGatewayConfigured } from "../config";
import { logger } from "../utils/logger";
import { errorLogger } from "../utils/errorLogger";
import { Semaphore } from "../utils/semaphore";
import { sleep as defaultSleep, type SleepFn } from "../utils/retry";
import { errorMessage, isAbortError } from "../utils/errors";
import { buildCampaignResult } from "../services/resultAggregator";
import { Dispatcher } from "./dispatcher";
import { leaveVoicemail } from "./voicemailFallback";
import {
  completeWithVoicemail,
  createTracker,
  isPending,
  markStopped,
  needsVoicemailFallback,
} from "./attemptTracker";
import type {
  AttemptTracker,
  CampaignResult,
  CampaignRun,
  CampaignRunConfig,
  Contact,
  ValidationFailure,
} from "../types/campaign";
import type { CallGateway } from "../types/gateway";

export const STOPPED_BY_OPERATOR = "Campaign stopped by operator";

export interface OrchestratorOptions {
  gateway?: CallGateway;
  dispatcher?: Dispatcher;
  sleep?: SleepFn;
  retrySafetyMarginSeconds?: number;
  // Checked before the first call; off when a gateway is injected
  requireCredentials?: boolean;
}

/**
 * Fresh run with one tracker per contact, in sheet order
 */
export function createCampaignRun(
  campaignId: string,
  runConfig: Readonly<CampaignRunConfig>,
  contacts: readonly Readonly<Contact>[],
  validationFailures: readonly ValidationFailure[] = []
): CampaignRun {
  const trackers = [...contacts]
    .sort((a, b) => a.sheet_index - b.sheet_index)
    .map((contact) => createTracker(contact, runConfig.max_attempts));

  return {
    id: randomUUID(),
    campaign_id: campaignId,
    config: runConfig,
    trackers,
    validation_failures: validationFailures,
    status: "created",
    round: 0,
  };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export class CampaignOrchestrator {
  private readonly gateway: CallGateway;
  private readonly dispatcher: Dispatcher;
  private readonly sleep: SleepFn;
  private readonly retrySafetyMarginMs: number;
  private readonly requireCredentials: boolean;

  constructor(options: OrchestratorOptions = {}) {
    this.sleep = options.sleep ?? defaultSleep;
    this.dispatcher =
      options.dispatcher ??
      new Dispatcher({
        ...(options.gateway ? { gateway: options.gateway } : {}),
        sleep: this.sleep,
      });
    this.gateway = options.gateway ?? this.dispatcher.gateway;
    this.retrySafetyMarginMs =
      (options.retrySafetyMarginSeconds ?? config.campaign.retrySafetyMarginSeconds) * 1000;
    this.requireCredentials =
      options.requireCredentials ??
      (options.gateway === undefined && options.dispatcher === undefined);
  }

  /**
   * Throws ConfigurationError when a run could not place any call
   */
  preflight(): void {
    if (this.requireCredentials) {
      assertGatewayConfigured();
    }
  }

  /**
   * Drive the run to completion. Throws only ConfigurationError, before any
   * call is placed; every per-contact failure ends up in the result.
   */
  async run(run: CampaignRun, signal?: AbortSignal): Promise<CampaignResult> {
    this.preflight();

    run.status = "running";
    run.started_at = new Date().toISOString();

    logger.info("Campaign run started", {
      campaign_id: run.campaign_id,
      run_id: run.id,
      contacts: run.trackers.length,
      validation_failures: run.validation_failures.length,
      config: run.config,
    });

    try {
      const semaphore = new Semaphore(run.config.concurrency_limit);
      await this.runRounds(run, semaphore, signal);

      if (!signal?.aborted) {
        await this.runVoicemailFallbacks(run, semaphore, signal);
      }

      if (signal?.aborted) {
        this.closeOpenTrackers(run, STOPPED_BY_OPERATOR);
        run.status = "stopped";
      } else {
        run.status = "completed";
      }
    } catch (error) {
      const message = errorMessage(error);
      logger.error("Campaign run failed", {
        campaign_id: run.campaign_id,
        run_id: run.id,
        error: message,
      });
      errorLogger.logError(run.campaign_id, "CAMPAIGN_FAILED", message, {
        context: { run_id: run.id, round: run.round },
      });
      this.closeOpenTrackers(run, `Campaign failed: ${message}`);
      run.status = "failed";
    }

    run.finished_at = new Date().toISOString();
    const result = buildCampaignResult(run);

    logger.info("Campaign run finished", {
      campaign_id: run.campaign_id,
      run_id: run.id,
      status: run.status,
      rounds: run.round,
      total_attempts: result.summary.total_attempts,
      success_rate: result.summary.success_rate,
      status_counts: result.summary.status_counts,
    });

    return result;
  }

  private async runRounds(
    run: CampaignRun,
    semaphore: Semaphore,
    signal?: AbortSignal
  ): Promise<void> {
    const { batch_size, batch_delay_seconds, retry_interval_minutes } = run.config;

    while (!signal?.aborted) {
      const pending = run.trackers
        .filter(isPending)
        .sort((a, b) => a.contact.sheet_index - b.contact.sheet_index);
      if (pending.length === 0) return;

      run.round += 1;
      const batches = chunk(pending, batch_size);
      logger.info("Starting round", {
        campaign_id: run.campaign_id,
        round: run.round,
        pending: pending.length,
        batches: batches.length,
      });

      for (const [index, batch] of batches.entries()) {
        if (signal?.aborted) return;

        await this.dispatcher.dispatch(run.campaign_id, batch, semaphore, signal);

        const isLastBatch = index === batches.length - 1;
        if (!isLastBatch && !(await this.pause(batch_delay_seconds * 1000, signal))) {
          return;
        }
      }

      if (!run.trackers.some(isPending)) return;

      const retryDelayMs = retry_interval_minutes * 60 * 1000 + this.retrySafetyMarginMs;
      logger.info("Round finished, waiting before retry", {
        campaign_id: run.campaign_id,
        round: run.round,
        still_pending: run.trackers.filter(isPending).length,
        delay_ms: retryDelayMs,
      });
      if (!(await this.pause(retryDelayMs, signal))) return;
    }
  }

  private async runVoicemailFallbacks(
    run: CampaignRun,
    semaphore: Semaphore,
    signal?: AbortSignal
  ): Promise<void> {
    const exhausted = run.trackers.filter(
      (t) => needsVoicemailFallback(t) && !t.voicemail_attempted
    );
    if (exhausted.length === 0) return;

    logger.info("Leaving voicemail for exhausted contacts", {
      campaign_id: run.campaign_id,
      contacts: exhausted.length,
    });

    await Promise.all(
      exhausted.map(async (tracker) => {
        try {
          await semaphore.withPermit(() => this.fallback(run, tracker, signal), signal);
        } catch (error) {
          if (!isAbortError(error)) throw error;
        }
      })
    );
  }

  private async fallback(
    run: CampaignRun,
    tracker: AttemptTracker,
    signal?: AbortSignal
  ): Promise<void> {
    const delivery = await leaveVoicemail(tracker.contact, {
      gateway: this.gateway,
      correlationId: `${tracker.correlation_id}:voicemail`,
      signal,
    });
    completeWithVoicemail(tracker, delivery);

    if (!delivery.success) {
      errorLogger.logError(
        run.campaign_id,
        "EXHAUSTION_FAILURE",
        delivery.error ?? "Voicemail delivery failed",
        {
          phoneNumber: tracker.contact.phone_number,
          sheetIndex: tracker.contact.sheet_index,
          attempt: tracker.attempts,
        }
      );
    }
  }

  private closeOpenTrackers(run: CampaignRun, reason: string): void {
    let closed = 0;
    for (const tracker of run.trackers) {
      if (markStopped(tracker, reason)) closed++;
    }
    if (closed > 0) {
      logger.warn("Closed open contacts without a final call", {
        campaign_id: run.campaign_id,
        contacts: closed,
        reason,
      });
    }
  }

  /**
   * Cancellable sleep. Returns false when the run was stopped meanwhile.
   */
  private async pause(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (ms <= 0) return !signal?.aborted;
    try {
      await this.sleep(ms, signal);
      return true;
    } catch (error) {
      if (isAbortError(error)) return false;
      throw error;
    }
  }
}

export const campaignOrchestrator = new CampaignOrchestrator();
