// ============================================================================
// Voicemail Fallback
// ============================================================================
// One final informational call for a contact whose attempts ran out. The
// message is both the agent task and the voicemail message, so it is
// delivered whether a person or a machine answers. No transcript is fetched.
// Gateway failures resolve as { success: false }; only an abort rejects.

import { config } from "../config";
import { logger } from "../utils/logger";
import { errorMessage, isAbortError } from "../utils/errors";
import { blandService } from "../services/blandService";
import { buildRequestData, buildVoicemailScript } from "../services/scriptBuilder";
import type { Contact } from "../types/campaign";
import type { CallGateway } from "../types/gateway";

export interface VoicemailDelivery {
  success: boolean;
  call_id?: string;
  error?: string;
}

export interface VoicemailOptions {
  gateway?: CallGateway;
  correlationId?: string;
  signal?: AbortSignal;
}

export async function leaveVoicemail(
  contact: Readonly<Contact>,
  options: VoicemailOptions = {}
): Promise<VoicemailDelivery> {
  const gateway = options.gateway ?? blandService;
  const script = buildVoicemailScript(contact);

  try {
    const response = await gateway.placeCall(
      {
        phoneNumber: contact.phone_number,
        task: script,
        voicemailMessage: script,
        correlationId: options.correlationId ?? `voicemail-${contact.sheet_index}`,
        requestData: buildRequestData(contact),
        maxDuration: config.bland.voicemailMaxDuration,
      },
      options.signal
    );

    logger.info("Voicemail fallback placed", {
      sheet_index: contact.sheet_index,
      phone: contact.phone_number,
      call_id: response.callId,
    });

    return { success: true, call_id: response.callId };
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    const message = errorMessage(error);
    logger.warn("Voicemail fallback failed", {
      sheet_index: contact.sheet_index,
      phone: contact.phone_number,
      error: message,
    });
    return { success: false, error: message };
  }
}
