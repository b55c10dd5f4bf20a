// ============================================================================
// Voice Call Gateway Contract
// ============================================================================

import { z } from "zod";

/**
 * What the orchestrator asks the gateway to do for one call
 */
export interface PlaceCallRequest {
  phoneNumber: string;
  task: string;
  // Echoed back by the gateway in the completion webhook
  correlationId: string;
  requestData?: Record<string, string>;
  voicemailMessage?: string;
  maxDuration?: number;
}

export interface PlaceCallResponse {
  callId: string;
  status: string;
}

export interface CallTranscript {
  callId: string;
  transcript: string;
  durationSeconds: number;
  status: string;
  completed: boolean;
  answeredBy?: string;
}

/**
 * Push notification for a finished call
 */
export interface CallCompletionEvent extends CallTranscript {
  correlationId?: string;
}

/**
 * Narrow contract the orchestrator consumes. Implementations throw
 * RateLimitedError / AuthError / GatewayError from placeCall and
 * NotFoundError from getCallTranscript while the record is not ready.
 */
export interface CallGateway {
  placeCall(request: PlaceCallRequest, signal?: AbortSignal): Promise<PlaceCallResponse>;
  getCallTranscript(callId: string, signal?: AbortSignal): Promise<CallTranscript>;
}

// ============================================================================
// Bland API wire types
// ============================================================================

/**
 * Payload to send to Bland for outbound call
 * Based on Bland API: POST /v1/calls
 */
export interface BlandOutboundCallRequest {
  phone_number: string;
  task: string;
  from?: string;
  request_data?: Record<string, string>;
  metadata?: Record<string, string>;

  // Voice and behavior
  voice?: string;
  language?: string;
  max_duration?: number;
  answered_by_enabled?: boolean;
  wait_for_greeting?: boolean;
  record?: boolean;
  amd?: boolean;
  wait?: boolean;

  // Voicemail settings
  voicemail_message?: string;

  // Bland will POST to this URL when call completes
  webhook?: string;
}

export const blandCallResponseSchema = z.object({
  call_id: z.string().min(1),
  status: z.string().optional(),
});

const correlationCarrier = z
  .object({ correlation_id: z.string().optional() })
  .passthrough();

/**
 * GET /v1/calls/{call_id} response and webhook body (same shape)
 */
export const blandCallDetailsSchema = z
  .object({
    call_id: z.string().optional(),
    c_id: z.string().optional(),
    concatenated_transcript: z.string().nullish(),
    call_length: z.number().nullish(), // minutes
    corrected_duration: z.union([z.number(), z.string()]).nullish(), // seconds
    status: z.string().nullish(),
    completed: z.boolean().nullish(),
    answered_by: z.string().nullish(),
    error_message: z.string().nullish(),
    metadata: correlationCarrier.nullish(),
    request_data: correlationCarrier.nullish(),
  })
  .passthrough();

export type BlandCallDetails = z.infer<typeof blandCallDetailsSchema>;
