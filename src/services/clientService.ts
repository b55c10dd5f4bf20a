import { randomUUID } from "crypto";
import { z } from "zod";
import { logger } from "../utils/logger";
import { campaignRepository, type CampaignRepository } from "../db/campaignRepository";
import type { Client } from "../types/campaign";

export const createClientSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  description: z.string().default(""),
});

export type CreateClientInput = z.input<typeof createClientSchema>;

/**
 * Clinics (or other accounts) that own campaigns
 */
export class ClientService {
  constructor(private readonly repository: CampaignRepository) {}

  async createClient(input: unknown): Promise<Client> {
    const { name, description } = createClientSchema.parse(input);
    const client: Client = {
      id: randomUUID(),
      name,
      description,
      created_at: new Date().toISOString(),
    };

    await this.repository.saveClient(client);
    logger.info("Client created", { client_id: client.id, name });
    return client;
  }

  listClients(): Promise<Client[]> {
    return this.repository.listClients();
  }

  getClient(id: string): Promise<Client | null> {
    return this.repository.getClient(id);
  }
}

export const clientService = new ClientService(campaignRepository);
