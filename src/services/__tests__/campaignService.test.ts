import { beforeEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { CampaignService } from "../campaignService";
import { ClientService } from "../clientService";
import { CallCompletionRegistryClass } from "../callCompletionRegistry";
import { InMemoryCampaignRepository } from "../../db/campaignRepository";
import { CampaignOrchestrator, STOPPED_BY_OPERATOR } from "../../logic/campaignOrchestrator";
import { Dispatcher } from "../../logic/dispatcher";
import { CampaignStateError, EntityNotFoundError } from "../../utils/errors";
import { CallOutcome } from "../../types/campaign";
import { FakeGateway, noSleep } from "../../logic/__tests__/fakeGateway";

const ALICE = "+15551230001";
const BOB = "+15551230002";

const row = (phone: string, name: string) => ({
  phone,
  name,
  date: "2024-07-01",
  time: "10:00 AM",
  provider_name: "Dr. Lee",
  office_location: "Main",
});

describe("CampaignService", () => {
  let repository: InMemoryCampaignRepository;
  let gateway: FakeGateway;
  let clients: ClientService;
  let campaigns: CampaignService;
  let clientId: string;

  beforeEach(async () => {
    repository = new InMemoryCampaignRepository();
    gateway = new FakeGateway();
    const dispatcher = new Dispatcher({
      gateway,
      sleep: noSleep,
      settleDelayMs: 0,
      transcriptMode: "poll",
      pollIntervalMs: 1,
      pollMaxAttempts: 2,
      completions: new CallCompletionRegistryClass(),
    });
    campaigns = new CampaignService(
      repository,
      new CampaignOrchestrator({ gateway, dispatcher, sleep: noSleep })
    );
    clients = new ClientService(repository);
    clientId = (await clients.createClient({ name: "Downtown Clinic" })).id;
  });

  it("creates clients with an empty description by default", async () => {
    const client = await clients.createClient({ name: "  Uptown Clinic " });

    expect(client).toMatchObject({ name: "Uptown Clinic", description: "" });
    expect(await clients.getClient(client.id)).toEqual(client);
    expect((await clients.listClients()).map((c) => c.id)).toContain(client.id);
    await expect(clients.createClient({ name: " " })).rejects.toBeInstanceOf(ZodError);
  });

  it("keeps rejected rows as validation failures on the campaign", async () => {
    const campaign = await campaigns.createCampaign({
      name: "July reminders",
      client_id: clientId,
      config: { max_attempts: 2 },
      contacts: [row(ALICE, "Alice"), row("12", "Short Number")],
    });

    expect(campaign.status).toBe("created");
    expect(campaign.config.max_attempts).toBe(2);
    expect(campaign.contacts.map((c) => c.patient_name)).toEqual(["Alice"]);
    expect(campaign.validation_failures).toHaveLength(1);
    expect(campaign.validation_failures[0]?.sheet_index).toBe(1);
  });

  it("rejects an unknown client and an out-of-range config", async () => {
    await expect(
      campaigns.createCampaign({ name: "x", client_id: "missing", contacts: [row(ALICE, "A")] })
    ).rejects.toBeInstanceOf(EntityNotFoundError);

    await expect(
      campaigns.createCampaign({
        name: "x",
        client_id: clientId,
        config: { max_attempts: 11 },
        contacts: [row(ALICE, "A")],
      })
    ).rejects.toBeInstanceOf(ZodError);
  });

  it("runs a campaign in the background and saves its result", async () => {
    gateway.respond(ALICE, "Yes, I'll be there.").respond(BOB, "I need to cancel.");
    const campaign = await campaigns.createCampaign({
      name: "July reminders",
      client_id: clientId,
      config: { max_attempts: 1, batch_delay_seconds: 0 },
      contacts: [row(ALICE, "Alice"), row(BOB, "Bob")],
    });

    const started = await campaigns.startCampaign(campaign.id);
    await campaigns.waitForRun(campaign.id);

    expect(campaigns.isRunning(campaign.id)).toBe(false);
    const status = await campaigns.getStatus(campaign.id);
    expect(status).toMatchObject({
      status: "completed",
      last_run_id: started.run_id,
      total_contacts: 2,
      progress: null,
    });
    expect(status.summary?.status_counts[CallOutcome.CONFIRMED]).toBe(1);

    const analytics = await campaigns.getAnalytics(campaign.id);
    expect(analytics).toMatchObject({
      run_id: started.run_id,
      total_calls: 2,
      total_attempts: 2,
      total_duration: 84,
      success_rate: 50,
    });
    expect(analytics.calls.map((c) => c.status)).toEqual([
      CallOutcome.CONFIRMED,
      CallOutcome.CANCELLED,
    ]);

    expect(await campaigns.getDashboard()).toEqual({
      total_clients: 1,
      total_campaigns: 1,
      total_calls: 2,
      success_rate: 50,
    });
  });

  it("refuses to start a campaign twice at once", async () => {
    gateway.placeDelayMs = 20;
    const campaign = await campaigns.createCampaign({
      name: "July reminders",
      client_id: clientId,
      config: { max_attempts: 1 },
      contacts: [row(ALICE, "Alice")],
    });

    await campaigns.startCampaign(campaign.id);
    await expect(campaigns.startCampaign(campaign.id)).rejects.toBeInstanceOf(
      CampaignStateError
    );
    await campaigns.waitForRun(campaign.id);
  });

  it("stops a running campaign and closes its open contacts", async () => {
    gateway.placeDelayMs = 20;
    const campaign = await campaigns.createCampaign({
      name: "July reminders",
      client_id: clientId,
      config: { max_attempts: 1, batch_size: 1, batch_delay_seconds: 0 },
      contacts: [row(ALICE, "Alice"), row(BOB, "Bob")],
    });

    await campaigns.startCampaign(campaign.id);
    await campaigns.stopCampaign(campaign.id);
    await campaigns.waitForRun(campaign.id);

    expect((await campaigns.getStatus(campaign.id)).status).toBe("stopped");
    expect(gateway.callsTo(BOB)).toHaveLength(0);
    expect(gateway.voicemails()).toHaveLength(0);
    const result = await repository.getLatestResult(campaign.id);
    expect(result?.results.map((r) => [r.status, r.error])).toEqual([
      [CallOutcome.FAILED, STOPPED_BY_OPERATOR],
      [CallOutcome.FAILED, STOPPED_BY_OPERATOR],
    ]);
  });

  it("reports stop, status and analytics errors by kind", async () => {
    const campaign = await campaigns.createCampaign({
      name: "July reminders",
      client_id: clientId,
      contacts: [row(ALICE, "Alice")],
    });

    await expect(campaigns.stopCampaign(campaign.id)).rejects.toThrow(
      `Campaign is not running: ${campaign.id}`
    );
    await expect(campaigns.getAnalytics(campaign.id)).rejects.toBeInstanceOf(
      CampaignStateError
    );
    await expect(campaigns.getStatus("nope")).rejects.toThrow("Campaign not found: nope");
    await expect(campaigns.stopCampaign("nope")).rejects.toBeInstanceOf(EntityNotFoundError);
  });

  it("filters the campaign list by client", async () => {
    const other = await clients.createClient({ name: "Other Clinic" });
    await campaigns.createCampaign({
      name: "Mine",
      client_id: clientId,
      contacts: [row(ALICE, "Alice")],
    });
    await campaigns.createCampaign({
      name: "Theirs",
      client_id: other.id,
      contacts: [row(BOB, "Bob")],
    });

    expect((await campaigns.listCampaigns(other.id)).map((c) => c.name)).toEqual(["Theirs"]);
    expect(await campaigns.listCampaigns()).toHaveLength(2);
  });
});
