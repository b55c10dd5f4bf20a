// ============================================================================
// Main Express Application
// ============================================================================

import express, { Request, Response, NextFunction } from "express";
import { config, validateConfig, printConfig } from "./config";
import { logger } from "./utils/logger";
import { errorLogger } from "./utils/errorLogger";
import { errorMessage } from "./utils/errors";
import { callRateLimiter } from "./utils/rateLimiter";
import { mongoDBService } from "./db/mongodb";
import { campaignService } from "./services/campaignService";
import { callCompletionRegistry } from "./services/callCompletionRegistry";
import blandWebhookRouter from "./routes/blandWebhook";
import campaignRouter from "./routes/campaignRoutes";

export function createApp(): express.Express {
  const app = express();

  // ============================================================================
  // Middleware
  // ============================================================================

  // Bland callbacks carry full transcripts
  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: true, limit: "10mb" }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on("finish", () => {
      logger.info("HTTP Request", {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - start,
      });
    });

    next();
  });

  // ============================================================================
  // Routes
  // ============================================================================

  app.get("/health", async (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      service: "appointment-reminder-orchestrator",
      timestamp: new Date().toISOString(),
      storage: mongoDBService.isConfigured ? "mongodb" : "memory",
      mongodb: mongoDBService.isConfigured ? await mongoDBService.isHealthy() : undefined,
      webhooks: callCompletionRegistry.getStats(),
      rate_limiter: callRateLimiter.getStats(),
      errors_last_hour: errorLogger.getErrorStats(60 * 60 * 1000).total_errors,
    });
  });

  app.use("/webhooks", blandWebhookRouter);
  app.use("/api", campaignRouter);

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: "Not Found",
      path: req.path,
    });
  });

  // Express recognises error handlers by their four parameters
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error("Unhandled error", {
      error: err.message,
      stack: err.stack,
      path: req.path,
    });

    res.status(500).json({
      error: "Internal Server Error",
      message: err.message,
    });
  });

  return app;
}

// ============================================================================
// Start Server
// ============================================================================

function start(): void {
  validateConfig();

  const PORT = config.port;
  const server = createApp().listen(PORT, () => {
    logger.info("Appointment reminder orchestrator listening", {
      port: PORT,
      environment: config.nodeEnv,
    });
    printConfig();
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    server.close();
    campaignService
      .stopAll()
      .then(() => mongoDBService.close())
      .catch((error) => {
        logger.error("Error during shutdown", { error: errorMessage(error) });
      })
      .finally(() => {
        errorLogger.shutdown();
        process.exit(0);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

if (require.main === module) {
  start();
}
