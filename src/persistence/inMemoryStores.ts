import * as crypto from 'crypto';
import { RecipientEntry } from '../ingestion';
import {
  ICampaignStore,
  CampaignRecord,
  NewCampaign,
  RecipientPage,
  assertValidPage,
} from './interfaces';

export class InMemoryCampaignStore implements ICampaignStore {
  private campaigns = new Map<string, CampaignRecord>();
  private recipients = new Map<string, RecipientEntry[]>();

  async createCampaign(campaign: NewCampaign): Promise<CampaignRecord> {
    const record: CampaignRecord = {
      guid: crypto.randomUUID(),
      createdAt: new Date().toISOString(),
      totalAmount: campaign.totalAmount,
      numberOfRecipients: campaign.recipients.length,
      decimals: campaign.decimals,
      root: null,
      cid: null,
    };
    this.campaigns.set(record.guid, record);
    this.recipients.set(record.guid, campaign.recipients.map(r => ({ ...r })));
    return { ...record };
  }

  async getCampaign(guid: string): Promise<CampaignRecord | undefined> {
    const record = this.campaigns.get(guid);
    return record ? { ...record } : undefined;
  }

  async listRecipients(guid: string, pageNumber: number, pageSize: number): Promise<RecipientPage> {
    assertValidPage(pageNumber, pageSize);
    const all = this.recipients.get(guid) ?? [];
    const offset = (pageNumber - 1) * pageSize;
    return {
      pageNumber,
      pageSize,
      total: all.length,
      entries: all
        .slice(offset, offset + pageSize)
        .map((r, i) => ({ position: offset + i, address: r.address, amount: r.amount })),
    };
  }

  async getRecipients(guid: string): Promise<RecipientEntry[]> {
    return (this.recipients.get(guid) ?? []).map(r => ({ ...r }));
  }

  async markPublished(guid: string, root: string, cid: string): Promise<CampaignRecord | undefined> {
    const record = this.campaigns.get(guid);
    if (!record || record.cid !== null) {
      return undefined;
    }
    record.root = root;
    record.cid = cid;
    return { ...record };
  }
}
