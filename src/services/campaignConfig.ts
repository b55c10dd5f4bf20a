// ============================================================================
// Campaign run configuration
// ============================================================================

import { z } from "zod";
import { config } from "../config";
import { CampaignRunConfig } from "../types/campaign";

const intInRange = (min: number, max: number) =>
  z.coerce.number().int().min(min).max(max);

/**
 * Bounds for operator-supplied settings. Missing values take the
 * environment defaults from config.campaign.
 */
export const campaignRunConfigSchema = z.object({
  max_attempts: intInRange(1, 10).default(config.campaign.maxAttempts),
  retry_interval_minutes: intInRange(5, 1440).default(
    config.campaign.retryIntervalMinutes
  ),
  concurrency_limit: intInRange(1, 10).default(config.campaign.concurrencyLimit),
  batch_size: intInRange(1, 100).default(config.campaign.batchSize),
  batch_delay_seconds: intInRange(0, 600).default(config.campaign.batchDelaySeconds),
  country_code: z
    .string()
    .trim()
    .regex(/^\+\d{1,3}$/, "country_code must look like +1 or +44")
    .default(config.campaign.countryCode),
});

export type CampaignRunConfigInput = z.input<typeof campaignRunConfigSchema>;

/**
 * Parse and freeze a run configuration. Throws ZodError on bad input.
 */
export function resolveRunConfig(input: unknown = {}): Readonly<CampaignRunConfig> {
  return Object.freeze(campaignRunConfigSchema.parse(input ?? {}));
}
