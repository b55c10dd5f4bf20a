import { config } from "../config";
import { logger } from "../utils/logger";
import { COLLECTIONS, mongoDBService } from "./mongodb";
import type { Campaign, CampaignResult, Client } from "../types/campaign";

/**
 * Storage for clients, campaigns and finished run results
 */
export interface CampaignRepository {
  saveClient(client: Client): Promise<void>;
  listClients(): Promise<Client[]>;
  getClient(id: string): Promise<Client | null>;

  saveCampaign(campaign: Campaign): Promise<void>;
  getCampaign(id: string): Promise<Campaign | null>;
  listCampaigns(clientId?: string): Promise<Campaign[]>;

  saveResult(result: CampaignResult): Promise<void>;
  // Most recent run of the campaign
  getLatestResult(campaignId: string): Promise<CampaignResult | null>;
  listLatestResults(): Promise<CampaignResult[]>;
}

const byCreatedDesc = (a: { created_at: string }, b: { created_at: string }) =>
  b.created_at.localeCompare(a.created_at);

export class InMemoryCampaignRepository implements CampaignRepository {
  private clients = new Map<string, Client>();
  private campaigns = new Map<string, Campaign>();
  private results = new Map<string, CampaignResult>(); // campaign_id -> latest

  async saveClient(client: Client): Promise<void> {
    this.clients.set(client.id, client);
  }

  async listClients(): Promise<Client[]> {
    return [...this.clients.values()].sort(byCreatedDesc);
  }

  async getClient(id: string): Promise<Client | null> {
    return this.clients.get(id) ?? null;
  }

  async saveCampaign(campaign: Campaign): Promise<void> {
    this.campaigns.set(campaign.id, campaign);
  }

  async getCampaign(id: string): Promise<Campaign | null> {
    return this.campaigns.get(id) ?? null;
  }

  async listCampaigns(clientId?: string): Promise<Campaign[]> {
    return [...this.campaigns.values()]
      .filter((c) => clientId === undefined || c.client_id === clientId)
      .sort(byCreatedDesc);
  }

  async saveResult(result: CampaignResult): Promise<void> {
    this.results.set(result.campaign_id, result);
  }

  async getLatestResult(campaignId: string): Promise<CampaignResult | null> {
    return this.results.get(campaignId) ?? null;
  }

  async listLatestResults(): Promise<CampaignResult[]> {
    return [...this.results.values()];
  }
}

export class MongoCampaignRepository implements CampaignRepository {
  async saveClient(client: Client): Promise<void> {
    const collection = await mongoDBService.getCollection<Client>(COLLECTIONS.clients);
    await collection.replaceOne({ id: client.id }, client, { upsert: true });
  }

  async listClients(): Promise<Client[]> {
    const collection = await mongoDBService.getCollection<Client>(COLLECTIONS.clients);
    return collection
      .find({}, { projection: { _id: 0 } })
      .sort({ created_at: -1 })
      .toArray();
  }

  async getClient(id: string): Promise<Client | null> {
    const collection = await mongoDBService.getCollection<Client>(COLLECTIONS.clients);
    return collection.findOne({ id }, { projection: { _id: 0 } });
  }

  async saveCampaign(campaign: Campaign): Promise<void> {
    const collection = await mongoDBService.getCollection<Campaign>(COLLECTIONS.campaigns);
    await collection.replaceOne({ id: campaign.id }, campaign, { upsert: true });
  }

  async getCampaign(id: string): Promise<Campaign | null> {
    const collection = await mongoDBService.getCollection<Campaign>(COLLECTIONS.campaigns);
    return collection.findOne({ id }, { projection: { _id: 0 } });
  }

  async listCampaigns(clientId?: string): Promise<Campaign[]> {
    const collection = await mongoDBService.getCollection<Campaign>(COLLECTIONS.campaigns);
    return collection
      .find(clientId === undefined ? {} : { client_id: clientId }, { projection: { _id: 0 } })
      .sort({ created_at: -1 })
      .toArray();
  }

  async saveResult(result: CampaignResult): Promise<void> {
    const collection = await mongoDBService.getCollection<CampaignResult>(COLLECTIONS.results);
    await collection.replaceOne({ run_id: result.run_id }, result, { upsert: true });
  }

  async getLatestResult(campaignId: string): Promise<CampaignResult | null> {
    const collection = await mongoDBService.getCollection<CampaignResult>(COLLECTIONS.results);
    return collection.findOne(
      { campaign_id: campaignId },
      { projection: { _id: 0 }, sort: { finished_at: -1 } }
    );
  }

  async listLatestResults(): Promise<CampaignResult[]> {
    const collection = await mongoDBService.getCollection<CampaignResult>(COLLECTIONS.results);
    return collection
      .aggregate<CampaignResult>([
        { $sort: { finished_at: -1 } },
        { $group: { _id: "$campaign_id", latest: { $first: "$$ROOT" } } },
        { $replaceRoot: { newRoot: "$latest" } },
        { $project: { _id: 0 } },
      ])
      .toArray();
  }
}

export function createCampaignRepository(): CampaignRepository {
  if (config.mongodb.connectionString) {
    logger.info("Campaign results persisted to MongoDB", {
      database: config.mongodb.databaseName,
    });
    return new MongoCampaignRepository();
  }

  logger.warn("MONGODB_CONNECTION_STRING not set, campaigns are kept in memory only");
  return new InMemoryCampaignRepository();
}

export const campaignRepository = createCampaignRepository();
