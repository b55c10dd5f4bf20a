// ============================================================================
// Campaign Service - create, start, stop and report on campaigns
// ============================================================================

import { randomUUID } from "crypto";
import { z } from "zod";
import { logger } from "../utils/logger";
import { errorLogger } from "../utils/errorLogger";
import { CampaignStateError, EntityNotFoundError, errorMessage } from "../utils/errors";
import {
  CampaignOrchestrator,
  campaignOrchestrator,
  createCampaignRun,
} from "../logic/campaignOrchestrator";
import { campaignRepository, type CampaignRepository } from "../db/campaignRepository";
import { resolveRunConfig } from "./campaignConfig";
import { validateContactRows } from "./contactValidator";
import {
  computeAnalytics,
  computeDashboardMetrics,
  type CampaignAnalytics,
  type DashboardMetrics,
} from "./resultAggregator";
import type {
  Campaign,
  CampaignRun,
  CampaignStatus,
  CampaignSummary,
  ValidationFailure,
} from "../types/campaign";

export const createCampaignSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  client_id: z.string().min(1, "client_id is required"),
  config: z.record(z.unknown()).optional(),
  contacts: z.array(z.record(z.unknown())).min(1, "at least one contact row is required"),
});

export type CreateCampaignInput = z.input<typeof createCampaignSchema>;

export interface CampaignListItem {
  id: string;
  name: string;
  client_id: string;
  status: CampaignStatus;
  created_at: string;
  total_contacts: number;
  last_run_id?: string;
}

export interface CampaignProgress {
  run_id: string;
  round: number;
  total: number;
  completed: number;
  pending: number;
}

export interface CampaignStatusView extends CampaignListItem {
  validation_failures: ValidationFailure[];
  progress: CampaignProgress | null; // only while a run is active
  summary: CampaignSummary | null; // latest finished run
}

interface ActiveRun {
  run: CampaignRun;
  controller: AbortController;
  done: Promise<void>;
}

function toListItem(campaign: Campaign): CampaignListItem {
  return {
    id: campaign.id,
    name: campaign.name,
    client_id: campaign.client_id,
    status: campaign.status,
    created_at: campaign.created_at,
    total_contacts: campaign.contacts.length + campaign.validation_failures.length,
    ...(campaign.last_run_id ? { last_run_id: campaign.last_run_id } : {}),
  };
}

function progressOf(run: CampaignRun): CampaignProgress {
  const completed = run.trackers.filter((t) => t.done).length;
  return {
    run_id: run.id,
    round: run.round,
    total: run.trackers.length,
    completed,
    pending: run.trackers.length - completed,
  };
}

export class CampaignService {
  private activeRuns = new Map<string, ActiveRun>();

  constructor(
    private readonly repository: CampaignRepository,
    private readonly orchestrator: CampaignOrchestrator
  ) {}

  /**
   * Validates the run config (ZodError) and every contact row. Rejected rows
   * are kept on the campaign as validation failures.
   */
  async createCampaign(input: unknown): Promise<Campaign> {
    const { name, client_id, config, contacts: rows } = createCampaignSchema.parse(input);

    const client = await this.repository.getClient(client_id);
    if (!client) {
      throw new EntityNotFoundError("Client", client_id);
    }

    const runConfig = resolveRunConfig(config ?? {});
    const { contacts, failures } = validateContactRows(rows, runConfig.country_code);

    const campaign: Campaign = {
      id: randomUUID(),
      name,
      client_id,
      config: runConfig,
      contacts,
      validation_failures: failures,
      created_at: new Date().toISOString(),
      status: "created",
    };

    await this.repository.saveCampaign(campaign);
    logger.info("Campaign created", {
      campaign_id: campaign.id,
      client_id,
      contacts: contacts.length,
      validation_failures: failures.length,
    });
    return campaign;
  }

  /**
   * Starts a run in the background and returns once it is registered
   */
  async startCampaign(id: string): Promise<{ campaign_id: string; run_id: string }> {
    const campaign = await this.requireCampaign(id);
    if (this.activeRuns.has(id)) {
      throw new CampaignStateError(`Campaign is already running: ${id}`);
    }

    this.orchestrator.preflight();

    const run = createCampaignRun(
      campaign.id,
      campaign.config,
      campaign.contacts,
      campaign.validation_failures
    );
    const controller = new AbortController();
    const done = this.execute(campaign, run, controller.signal)
      .catch((error) => {
        logger.error("Failed to record campaign run", {
          campaign_id: id,
          run_id: run.id,
          error: errorMessage(error),
        });
      })
      .finally(() => {
        this.activeRuns.delete(id);
      });
    this.activeRuns.set(id, { run, controller, done });

    logger.info("Campaign started", { campaign_id: id, run_id: run.id });
    return { campaign_id: id, run_id: run.id };
  }

  /**
   * Aborts the active run. The current batch drains before it ends.
   */
  async stopCampaign(id: string): Promise<{ campaign_id: string; run_id: string }> {
    const active = this.activeRuns.get(id);
    if (!active) {
      await this.requireCampaign(id);
      throw new CampaignStateError(`Campaign is not running: ${id}`);
    }

    active.controller.abort();
    logger.info("Campaign stop requested", { campaign_id: id, run_id: active.run.id });
    return { campaign_id: id, run_id: active.run.id };
  }

  async getStatus(id: string): Promise<CampaignStatusView> {
    const campaign = await this.requireCampaign(id);
    const active = this.activeRuns.get(id);
    const latest = await this.repository.getLatestResult(id);

    return {
      ...toListItem(campaign),
      validation_failures: campaign.validation_failures,
      progress: active ? progressOf(active.run) : null,
      summary: latest ? latest.summary : null,
    };
  }

  async listCampaigns(clientId?: string): Promise<CampaignListItem[]> {
    const campaigns = await this.repository.listCampaigns(clientId);
    return campaigns.map(toListItem);
  }

  async getAnalytics(id: string): Promise<CampaignAnalytics> {
    await this.requireCampaign(id);
    const result = await this.repository.getLatestResult(id);
    if (!result) {
      throw new CampaignStateError(`Campaign has no finished run yet: ${id}`);
    }
    return computeAnalytics(result);
  }

  async getDashboard(): Promise<DashboardMetrics> {
    const [clients, campaigns, results] = await Promise.all([
      this.repository.listClients(),
      this.repository.listCampaigns(),
      this.repository.listLatestResults(),
    ]);
    return computeDashboardMetrics(clients.length, campaigns.length, results);
  }

  isRunning(id: string): boolean {
    return this.activeRuns.has(id);
  }

  /**
   * Resolves once the campaign's active run (if any) has been recorded
   */
  async waitForRun(id: string): Promise<void> {
    await this.activeRuns.get(id)?.done;
  }

  /**
   * Aborts every active run and waits for them to finish (shutdown)
   */
  async stopAll(): Promise<void> {
    const runs = [...this.activeRuns.values()];
    for (const active of runs) {
      active.controller.abort();
    }
    await Promise.all(runs.map((active) => active.done));
  }

  private async execute(campaign: Campaign, run: CampaignRun, signal: AbortSignal): Promise<void> {
    await this.saveCampaignStatus(campaign, "running", run.id);

    try {
      const result = await this.orchestrator.run(run, signal);
      await this.repository.saveResult(result);
      await this.saveCampaignStatus(campaign, result.status, run.id);
    } catch (error) {
      const message = errorMessage(error);
      logger.error("Campaign run aborted with an error", {
        campaign_id: campaign.id,
        run_id: run.id,
        error: message,
      });
      errorLogger.logError(campaign.id, "CAMPAIGN_FAILED", message, {
        context: { run_id: run.id },
      });
      await this.saveCampaignStatus(campaign, "failed", run.id);
    }
  }

  private async saveCampaignStatus(
    campaign: Campaign,
    status: CampaignStatus,
    runId: string
  ): Promise<void> {
    campaign.status = status;
    campaign.last_run_id = runId;
    await this.repository.saveCampaign(campaign);
  }

  private async requireCampaign(id: string): Promise<Campaign> {
    const campaign = await this.repository.getCampaign(id);
    if (!campaign) {
      throw new EntityNotFoundError("Campaign", id);
    }
    return campaign;
  }
}

export const campaignService = new CampaignService(campaignRepository, campaignOrchestrator);
