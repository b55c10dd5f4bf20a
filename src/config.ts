// ============================================================================
// Configuration Module
// ============================================================================

import dotenv from "dotenv";
import { ConfigurationError } from "./utils/errors";

// Load environment variables from .env file
dotenv.config();

export type TranscriptMode = "poll" | "webhook";

function parseTranscriptMode(value: string | undefined): TranscriptMode {
  return value === "webhook" ? "webhook" : "poll";
}

/**
 * Load and validate environment variables
 */
export const config = {
  // Server config
  port: parseInt(process.env["PORT"] || "3000"),
  nodeEnv: process.env["NODE_ENV"] || "development",

  // Bland API config
  bland: {
    apiKey: process.env["BLAND_API_KEY"] || "",
    baseUrl: process.env["BLAND_BASE_URL"] || "https://api.bland.ai",

    // Caller ID
    from: process.env["BLAND_FROM"] || "",

    // Voice and behavior settings
    voiceId: process.env["BLAND_VOICE_ID"] || "maya",
    language: process.env["BLAND_LANGUAGE"] || "en-US",
    maxDuration: parseInt(process.env["BLAND_MAX_DURATION"] || "300"),
    voicemailMaxDuration: parseInt(
      process.env["BLAND_VOICEMAIL_MAX_DURATION"] || "120"
    ),

    // Webhook configuration (push alternative to polling)
    webhookUrl: process.env["BLAND_WEBHOOK_URL"] || "",
    transcriptMode: parseTranscriptMode(process.env["BLAND_TRANSCRIPT_MODE"]),
    webhookWaitMs: parseInt(process.env["BLAND_WEBHOOK_WAIT_MS"] || "300000"), // 5 minutes

    // Transcript fetch
    settleDelayMs: parseInt(process.env["BLAND_SETTLE_DELAY_MS"] || "2000"),
    transcriptPollInterval: parseInt(
      process.env["BLAND_POLL_INTERVAL"] || "5000"
    ), // 5 seconds
    transcriptPollMaxAttempts: parseInt(
      process.env["BLAND_POLL_MAX_ATTEMPTS"] || "60"
    ), // 5 minutes max

    requestTimeoutMs: parseInt(
      process.env["BLAND_REQUEST_TIMEOUT_MS"] || "30000"
    ),
  },

  // Practice details used by the call scripts
  clinic: {
    name: process.env["CLINIC_NAME"] || "our office",
    callbackNumber: process.env["CLINIC_CALLBACK_NUMBER"] || "",
    directoryFile: process.env["CLINIC_DIRECTORY_FILE"] || "",
    cancellationFee: process.env["CANCELLATION_FEE"] || "25.00",
  },

  // Campaign defaults (overridable per campaign)
  campaign: {
    maxAttempts: parseInt(process.env["CAMPAIGN_MAX_ATTEMPTS"] || "3"),
    retryIntervalMinutes: parseInt(
      process.env["CAMPAIGN_RETRY_INTERVAL_MINUTES"] || "30"
    ),
    countryCode: process.env["CAMPAIGN_COUNTRY_CODE"] || "+1",
    concurrencyLimit: parseInt(
      process.env["CAMPAIGN_CONCURRENCY_LIMIT"] || "3"
    ),
    batchSize: parseInt(process.env["CAMPAIGN_BATCH_SIZE"] || "10"),
    batchDelaySeconds: parseInt(
      process.env["CAMPAIGN_BATCH_DELAY_SECONDS"] || "5"
    ),
    // Added on top of every retry interval
    retrySafetyMarginSeconds: parseInt(
      process.env["CAMPAIGN_RETRY_SAFETY_MARGIN_SECONDS"] || "30"
    ),
  },

  // Retry config (HTTP-level, per gateway request)
  retry: {
    maxAttempts: parseInt(process.env["RETRY_MAX_ATTEMPTS"] || "3"),
    initialDelay: parseInt(process.env["RETRY_INITIAL_DELAY"] || "1000"), // 1 second
    maxDelay: parseInt(process.env["RETRY_MAX_DELAY"] || "10000"), // 10 seconds
  },

  // Rate limiter config
  rateLimiter: {
    enabled: process.env["RATE_LIMITER_ENABLED"] !== "false", // Enabled by default
    maxCallsPerSecond: parseFloat(
      process.env["RATE_LIMITER_MAX_CALLS_PER_SECOND"] || "5"
    ),
    sameNumberIntervalMs: parseInt(
      process.env["RATE_LIMITER_SAME_NUMBER_INTERVAL_MS"] || "10000"
    ),
  },

  mongodb: {
    connectionString: process.env["MONGODB_CONNECTION_STRING"] || "",
    databaseName: process.env["MONGODB_DATABASE_NAME"] || "reminder_campaigns",
  },

  errorLog: {
    enabled: process.env["ERROR_LOG_ENABLED"] !== "false",
    dir: process.env["ERROR_LOG_DIR"] || "logs",
  },
};

/**
 * Validate required environment variables
 */
export function validateConfig(): void {
  const required = ["BLAND_API_KEY"];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    console.warn(
      `⚠️  Warning: Missing environment variables: ${missing.join(", ")}`
    );
    console.warn("⚠️  Campaigns cannot be started until they are set.");
  }

  if (config.bland.transcriptMode === "webhook" && !config.bland.webhookUrl) {
    console.warn(
      "⚠️  BLAND_TRANSCRIPT_MODE=webhook without BLAND_WEBHOOK_URL, transcripts will be polled"
    );
  }
}

/**
 * Halt before any call is placed when the gateway cannot authenticate
 */
export function assertGatewayConfigured(): void {
  if (!config.bland.apiKey) {
    throw new ConfigurationError("BLAND_API_KEY is not configured");
  }
}

/**
 * Print configuration (without sensitive data)
 */
export function printConfig(): void {
  console.log("📋 Configuration:");
  console.log(`   PORT: ${config.port}`);
  console.log(`   NODE_ENV: ${config.nodeEnv}`);
  console.log(`   BLAND_BASE_URL: ${config.bland.baseUrl}`);
  console.log(`   BLAND_API_KEY: ${config.bland.apiKey ? "✓" : "✗"}`);
  console.log(`   BLAND_TRANSCRIPT_MODE: ${config.bland.transcriptMode}`);
  console.log(`   CLINIC_NAME: ${config.clinic.name}`);
  console.log(
    `   MONGODB: ${config.mongodb.connectionString ? "✓" : "✗ (in-memory results)"}`
  );
}
