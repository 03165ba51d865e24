import { z } from 'zod';

export const ClientSchema = z.object({
  id: z.string().min(1),
  companyName: z.string().min(1),
  industry: z.string().optional(),
  createdAt: z.string().datetime(),
});
export type Client = z.infer<typeof ClientSchema>;

export const CampaignStatus = z.enum(['draft', 'active', 'paused', 'completed', 'cancelled']);
export type CampaignStatus = z.infer<typeof CampaignStatus>;

export const CampaignSchema = z.object({
  id: z.string().min(1),
  clientId: z.string().min(1),
  name: z.string().min(1),
  status: CampaignStatus.default('active'),
  createdAt: z.string().datetime(),
});
export type Campaign = z.infer<typeof CampaignSchema>;

/** Read side of the client records reporting draws on. */
export interface ClientRepository {
  list(): Promise<Client[]>;
}

export interface CampaignRepository {
  list(): Promise<Campaign[]>;
}

export class MemoryClientRepository implements ClientRepository {
  private readonly clients = new Map<string, Client>();

  add(client: z.input<typeof ClientSchema>): Client {
    const parsed = ClientSchema.parse(client);
    this.clients.set(parsed.id, parsed);
    return parsed;
  }

  async list(): Promise<Client[]> {
    return [...this.clients.values()];
  }
}

export class MemoryCampaignRepository implements CampaignRepository {
  private readonly campaigns = new Map<string, Campaign>();

  add(campaign: z.input<typeof CampaignSchema>): Campaign {
    const parsed = CampaignSchema.parse(campaign);
    this.campaigns.set(parsed.id, parsed);
    return parsed;
  }

  async list(): Promise<Campaign[]> {
    return [...this.campaigns.values()];
  }
}
