// ============================================================================
// Bland Service
// Voice Call Gateway client for the Bland AI API
// ============================================================================

import axios, { AxiosAdapter, AxiosInstance } from "axios";
import { config } from "../config";
import { logger } from "../utils/logger";
import { retry, isRetryableHttpError } from "../utils/retry";
import { CallRateLimiter, callRateLimiter } from "../utils/rateLimiter";
import {
  AuthError,
  GatewayError,
  NotFoundError,
  RateLimitedError,
  errorMessage,
  isAbortError,
} from "../utils/errors";
import {
  BlandCallDetails,
  BlandOutboundCallRequest,
  CallCompletionEvent,
  CallGateway,
  CallTranscript,
  PlaceCallRequest,
  PlaceCallResponse,
  blandCallDetailsSchema,
  blandCallResponseSchema,
} from "../types/gateway";

export interface BlandServiceOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  rateLimiter: CallRateLimiter;
  adapter?: AxiosAdapter;
}

/**
 * Map an axios failure onto the gateway error variants
 */
export function toGatewayError(error: unknown): Error {
  if (error instanceof GatewayError) return error;
  if (error instanceof Error && isAbortError(error)) return error;
  if (axios.isCancel(error)) {
    const aborted = new Error("Bland request aborted");
    aborted.name = "AbortError";
    return aborted;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const detail =
      typeof error.response?.data === "object" && error.response?.data !== null
        ? JSON.stringify(error.response.data)
        : String(error.response?.data ?? "");

    if (status === 429) return new RateLimitedError(`Bland rate limit: ${detail}`);
    if (status === 401 || status === 403) {
      return new AuthError(`Bland rejected credentials: ${detail}`, status);
    }
    if (status === 404) return new NotFoundError(`Bland call not found: ${detail}`);
    if (status !== undefined) {
      return new GatewayError(`Bland API error ${status}: ${detail}`, status);
    }
    // No response: network failure or request timeout
    return new GatewayError(`Bland request failed: ${error.code ?? error.message}`);
  }

  return new GatewayError(`Bland request failed: ${errorMessage(error)}`);
}

function toSeconds(details: BlandCallDetails): number {
  const corrected = Number(details.corrected_duration);
  if (details.corrected_duration != null && Number.isFinite(corrected)) {
    return Math.round(corrected);
  }
  // call_length is reported in minutes
  if (typeof details.call_length === "number") {
    return Math.round(details.call_length * 60);
  }
  return 0;
}

/**
 * Normalize a Bland call record (GET /v1/calls/{id} or webhook body)
 */
export function parseCallDetails(
  raw: unknown,
  fallbackCallId = ""
): CallCompletionEvent {
  const parsed = blandCallDetailsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GatewayError(`Unexpected Bland call payload: ${parsed.error.message}`);
  }

  const details = parsed.data;
  const transcript = details.concatenated_transcript ?? "";
  const status = details.status ?? "unknown";

  return {
    callId: details.call_id ?? details.c_id ?? fallbackCallId,
    transcript,
    durationSeconds: toSeconds(details),
    status,
    // Bland can report status=completed before the transcript is attached
    completed:
      details.completed === true || (status === "completed" && transcript.length > 0),
    answeredBy: details.answered_by ?? undefined,
    correlationId:
      details.metadata?.correlation_id ?? details.request_data?.correlation_id,
  };
}

export class BlandService implements CallGateway {
  private client: AxiosInstance;
  private rateLimiter: CallRateLimiter;

  constructor(options: Partial<BlandServiceOptions> = {}) {
    const apiKey = options.apiKey ?? config.bland.apiKey;
    this.rateLimiter = options.rateLimiter ?? callRateLimiter;
    this.client = axios.create({
      baseURL: options.baseUrl ?? config.bland.baseUrl,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      timeout: options.timeoutMs ?? config.bland.requestTimeoutMs,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  /**
   * Place an outbound call
   * Real Bland API: POST /v1/calls
   */
  async placeCall(
    request: PlaceCallRequest,
    signal?: AbortSignal
  ): Promise<PlaceCallResponse> {
    const waitTime = this.rateLimiter.getWaitTime(request.phoneNumber);
    if (waitTime > 0) {
      logger.info("Rate limit: waiting before call", {
        phone: request.phoneNumber,
        waitTimeMs: waitTime,
      });
    }
    await this.rateLimiter.waitForSlot(request.phoneNumber, signal);

    const requestBody: BlandOutboundCallRequest = {
      phone_number: request.phoneNumber,
      task: request.task,

      // Echoed back in the completion webhook
      request_data: {
        ...request.requestData,
        correlation_id: request.correlationId,
      },
      metadata: { correlation_id: request.correlationId },

      ...(config.bland.from ? { from: config.bland.from } : {}),

      // Voice and behavior
      voice: config.bland.voiceId,
      language: config.bland.language,
      max_duration: request.maxDuration ?? config.bland.maxDuration,
      answered_by_enabled: true,
      wait_for_greeting: true,
      record: true,
      amd: true,

      ...(request.voicemailMessage
        ? { voicemail_message: request.voicemailMessage }
        : {}),
      ...(config.bland.webhookUrl ? { webhook: config.bland.webhookUrl } : {}),

      // Don't wait for the call to complete
      wait: false,
    };

    logger.debug("Sending outbound call to Bland", {
      phone: request.phoneNumber,
      correlation_id: request.correlationId,
    });

    try {
      const data = await retry(
        async () => {
          const result = await this.client.post("/v1/calls", requestBody);
          return result.data;
        },
        {
          maxAttempts: config.retry.maxAttempts,
          initialDelay: config.retry.initialDelay,
          maxDelay: config.retry.maxDelay,
          shouldRetry: isRetryableHttpError,
          signal,
        }
      );

      const parsed = blandCallResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new GatewayError("Bland accepted the call but returned no call_id");
      }

      logger.info("Bland call initiated", {
        call_id: parsed.data.call_id,
        status: parsed.data.status,
        phone: request.phoneNumber,
      });

      return {
        callId: parsed.data.call_id,
        status: parsed.data.status ?? "success",
      };
    } catch (error) {
      const gatewayError = toGatewayError(error);
      logger.warn("Failed to place call via Bland", {
        phone: request.phoneNumber,
        error: gatewayError.message,
        error_type: gatewayError.name,
      });
      throw gatewayError;
    }
  }

  /**
   * Current state of a call
   * Real Bland API: GET /v1/calls/{call_id}
   */
  async getCallTranscript(callId: string, signal?: AbortSignal): Promise<CallTranscript> {
    try {
      const response = await this.client.get(`/v1/calls/${encodeURIComponent(callId)}`, {
        signal,
      });
      return parseCallDetails(response.data, callId);
    } catch (error) {
      throw toGatewayError(error);
    }
  }
}

export const blandService = new BlandService();
