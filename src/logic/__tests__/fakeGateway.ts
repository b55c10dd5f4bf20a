import { NotFoundError } from "../../utils/errors";
import type {
  CallGateway,
  CallTranscript,
  PlaceCallRequest,
  PlaceCallResponse,
} from "../../types/gateway";
import type { SleepFn } from "../../utils/retry";

/**
 * In-process stand-in for the voice gateway. Transcripts and failures are
 * queued per phone number and consumed one call at a time.
 */
export class FakeGateway implements CallGateway {
  readonly placed: PlaceCallRequest[] = [];
  readonly polled: string[] = [];
  private transcripts = new Map<string, string[]>();
  private failures = new Map<string, Error[]>();
  private records = new Map<string, CallTranscript>();
  private pendingPolls = new Map<string, number>();
  private sequence = 0;
  private inFlight = 0;
  maxInFlight = 0;
  placeDelayMs = 0;
  notReadyPolls = 0;

  respond(phone: string, ...transcripts: string[]): this {
    this.transcripts.set(phone, [...(this.transcripts.get(phone) ?? []), ...transcripts]);
    return this;
  }

  failNext(phone: string, error: Error): this {
    this.failures.set(phone, [...(this.failures.get(phone) ?? []), error]);
    return this;
  }

  callsTo(phone: string): PlaceCallRequest[] {
    return this.placed.filter((r) => r.phoneNumber === phone);
  }

  voicemails(): PlaceCallRequest[] {
    return this.placed.filter((r) => r.voicemailMessage !== undefined);
  }

  async placeCall(request: PlaceCallRequest): Promise<PlaceCallResponse> {
    this.placed.push(request);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.placeDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.placeDelayMs));
      }

      const failure = this.failures.get(request.phoneNumber)?.shift();
      if (failure) throw failure;

      const callId = `call-${++this.sequence}`;
      const transcript = this.transcripts.get(request.phoneNumber)?.shift() ?? "";
      this.records.set(callId, {
        callId,
        transcript,
        durationSeconds: 42,
        status: "completed",
        completed: true,
      });
      this.pendingPolls.set(callId, this.notReadyPolls);
      return { callId, status: "success" };
    } finally {
      this.inFlight--;
    }
  }

  async getCallTranscript(callId: string): Promise<CallTranscript> {
    this.polled.push(callId);
    const record = this.records.get(callId);
    const notReady = this.pendingPolls.get(callId) ?? 0;
    if (!record || notReady > 0) {
      this.pendingPolls.set(callId, notReady - 1);
      throw new NotFoundError(`No call ${callId}`);
    }
    return record;
  }
}

export function abortError(): Error {
  const error = new Error("aborted");
  error.name = "AbortError";
  return error;
}

/**
 * Resolves immediately, rejects like the real sleep once aborted
 */
export const noSleep: SleepFn = async (_ms, signal) => {
  if (signal?.aborted) throw abortError();
};
