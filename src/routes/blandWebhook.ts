import { Router, Request, Response } from "express";
import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import { parseCallDetails } from "../services/blandService";
import { callCompletionRegistry } from "../services/callCompletionRegistry";

const router = Router();

// ============================================================================
// Bland completion callback
// ============================================================================
// Always answers 200 so Bland does not retry. The payload is matched to the
// waiting attempt by the correlation id we echoed in metadata/request_data;
// callbacks that arrive before anyone waits are buffered by the registry.
// ============================================================================

function requestIdOf(): string {
  return `bland_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

router.post("/bland-callback", (req: Request, res: Response) => {
  const requestId = requestIdOf();

  try {
    const event = parseCallDetails(req.body);
    if (!event.callId) {
      throw new Error("Missing call_id in webhook payload");
    }

    logger.info("Bland webhook received", {
      requestId,
      call_id: event.callId,
      correlation_id: event.correlationId,
      status: event.status,
      answered_by: event.answeredBy,
      duration: event.durationSeconds,
    });

    const delivered = callCompletionRegistry.resolve(event);

    res.status(200).json({
      success: true,
      message: delivered ? "Webhook delivered to waiting call" : "Webhook received",
      requestId,
      call_id: event.callId,
    });
  } catch (error) {
    logger.error("Webhook error", {
      requestId,
      error: errorMessage(error),
    });

    res.status(200).json({
      success: false,
      error: errorMessage(error),
      requestId,
      note: "Error logged, but returning 200 to prevent retry",
    });
  }
});

export default router;
