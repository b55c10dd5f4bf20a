import { randomUUID } from "crypto";
import { Router, Request, Response } from "express";
import { z, ZodError } from "zod";
import { assertGatewayConfigured, config } from "../config";
import { logger } from "../utils/logger";
import { CampaignStateError, ConfigurationError, EntityNotFoundError, errorMessage } from "../utils/errors";
import { campaignService, type CampaignService } from "../services/campaignService";
import { clientService, type ClientService } from "../services/clientService";
import { clinicDirectory, type ClinicDirectory } from "../services/clinicDirectory";
import { validateContactRow } from "../services/contactValidator";
import { leaveVoicemail } from "../logic/voicemailFallback";
import type { CallGateway } from "../types/gateway";

// ============================================================================
// Campaign API
// ============================================================================
// POST /clients                  create a client
// GET  /clients                  list clients
// POST /campaigns                create a campaign from config + contact rows
// GET  /campaigns?client_id=     list campaigns
// GET  /campaigns/:id            status and progress
// POST /campaigns/:id/start      start a run in the background
// POST /campaigns/:id/stop       stop the active run
// GET  /campaigns/:id/analytics  analytics of the latest run
// GET  /dashboard                totals across campaigns
// GET  /clinic/locations         office locations with addresses
// GET  /clinic/providers?location=
// POST /voicemail                leave one voicemail for a single contact

/**
 * Maps service errors to status codes; anything else is a 500
 */
function sendError(res: Response, error: unknown, action: string): void {
  if (error instanceof ZodError) {
    res.status(400).json({ success: false, error: "Validation error", details: error.issues });
    return;
  }
  if (error instanceof EntityNotFoundError) {
    res.status(404).json({ success: false, error: error.message });
    return;
  }
  if (error instanceof CampaignStateError) {
    res.status(409).json({ success: false, error: error.message });
    return;
  }
  if (error instanceof ConfigurationError) {
    res.status(503).json({ success: false, error: error.message });
    return;
  }

  logger.error(`Failed to ${action}`, { error: errorMessage(error) });
  res.status(500).json({ success: false, error: errorMessage(error) });
}

// Contact row fields (aliases accepted) plus an optional country code
const voicemailRequestSchema = z
  .object({ country_code: z.string().regex(/^\+\d{1,3}$/).optional() })
  .passthrough();

export interface CampaignRouterOptions {
  campaigns?: CampaignService;
  clients?: ClientService;
  directory?: ClinicDirectory;
  // Defaults to Bland, which needs BLAND_API_KEY
  gateway?: CallGateway;
}

export function createCampaignRouter(options: CampaignRouterOptions = {}): Router {
  const campaigns = options.campaigns ?? campaignService;
  const clients = options.clients ?? clientService;
  const directory = options.directory ?? clinicDirectory;
  const router = Router();

  router.post("/clients", async (req: Request, res: Response) => {
    try {
      const client = await clients.createClient(req.body);
      res.status(201).json({ success: true, data: client });
    } catch (error) {
      sendError(res, error, "create client");
    }
  });

  router.get("/clients", async (_req: Request, res: Response) => {
    try {
      const data = await clients.listClients();
      res.json({ success: true, data, count: data.length });
    } catch (error) {
      sendError(res, error, "list clients");
    }
  });

  router.post("/campaigns", async (req: Request, res: Response) => {
    try {
      const campaign = await campaigns.createCampaign(req.body);
      res.status(201).json({
        success: true,
        data: {
          id: campaign.id,
          name: campaign.name,
          client_id: campaign.client_id,
          status: campaign.status,
          config: campaign.config,
          total_contacts: campaign.contacts.length,
          validation_failures: campaign.validation_failures,
        },
      });
    } catch (error) {
      sendError(res, error, "create campaign");
    }
  });

  router.get("/campaigns", async (req: Request, res: Response) => {
    try {
      const clientId = typeof req.query["client_id"] === "string" ? req.query["client_id"] : undefined;
      const data = await campaigns.listCampaigns(clientId);
      res.json({ success: true, data, count: data.length });
    } catch (error) {
      sendError(res, error, "list campaigns");
    }
  });

  router.get("/campaigns/:id", async (req: Request, res: Response) => {
    try {
      res.json({ success: true, data: await campaigns.getStatus(req.params["id"] ?? "") });
    } catch (error) {
      sendError(res, error, "get campaign");
    }
  });

  router.post("/campaigns/:id/start", async (req: Request, res: Response) => {
    try {
      const data = await campaigns.startCampaign(req.params["id"] ?? "");
      res.status(202).json({ success: true, message: "Campaign started", data });
    } catch (error) {
      sendError(res, error, "start campaign");
    }
  });

  router.post("/campaigns/:id/stop", async (req: Request, res: Response) => {
    try {
      const data = await campaigns.stopCampaign(req.params["id"] ?? "");
      res.json({ success: true, message: "Campaign stopping", data });
    } catch (error) {
      sendError(res, error, "stop campaign");
    }
  });

  router.get("/campaigns/:id/analytics", async (req: Request, res: Response) => {
    try {
      res.json({ success: true, data: await campaigns.getAnalytics(req.params["id"] ?? "") });
    } catch (error) {
      sendError(res, error, "get campaign analytics");
    }
  });

  router.get("/dashboard", async (_req: Request, res: Response) => {
    try {
      res.json({ success: true, data: await campaigns.getDashboard() });
    } catch (error) {
      sendError(res, error, "get dashboard metrics");
    }
  });

  router.get("/clinic/locations", (_req: Request, res: Response) => {
    const data = directory.getAllLocations();
    res.json({ success: true, data, count: data.length });
  });

  router.get("/clinic/providers", (req: Request, res: Response) => {
    const location = req.query["location"];
    const data =
      typeof location === "string" && location.trim()
        ? directory.findProvidersByLocation(location)
        : directory.getAllProviders();
    res.json({ success: true, data, count: data.length });
  });

  router.post("/voicemail", async (req: Request, res: Response) => {
    try {
      const body = voicemailRequestSchema.parse(req.body);
      const validation = validateContactRow(
        body,
        0,
        body.country_code ?? config.campaign.countryCode
      );
      if (!validation.ok) {
        res.status(400).json({ success: false, error: validation.failure.reason });
        return;
      }

      if (!options.gateway) {
        assertGatewayConfigured();
      }

      const delivery = await leaveVoicemail(validation.contact, {
        gateway: options.gateway,
        correlationId: `voicemail-${randomUUID()}`,
      });
      if (!delivery.success) {
        res.status(502).json({ success: false, error: delivery.error });
        return;
      }
      res.json({ success: true, call_id: delivery.call_id });
    } catch (error) {
      sendError(res, error, "send voicemail");
    }
  });

  return router;
}

export default createCampaignRouter();
