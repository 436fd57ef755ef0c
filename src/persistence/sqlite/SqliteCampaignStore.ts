/**
 * SQLite campaign store: drafts in `campaigns`, their CSV rows in `recipients`.
 * Amounts are stored as TEXT-encoded bigint base units.
 */

import * as crypto from 'crypto';
import type Database from 'better-sqlite3';
import { RecipientEntry } from '../../ingestion';
import {
  ICampaignStore,
  CampaignRecord,
  NewCampaign,
  RecipientPage,
  assertValidPage,
} from '../interfaces';

interface CampaignRow {
  guid: string;
  created_at: string;
  total_amount: string;
  number_of_recipients: number;
  decimals: number;
  root: string | null;
  cid: string | null;
}

interface RecipientRow {
  position: number;
  address: string;
  amount: string;
}

function rowToCampaign(row: CampaignRow): CampaignRecord {
  return {
    guid: row.guid,
    createdAt: row.created_at,
    totalAmount: BigInt(row.total_amount),
    numberOfRecipients: row.number_of_recipients,
    decimals: row.decimals,
    root: row.root,
    cid: row.cid,
  };
}

export class SqliteCampaignStore implements ICampaignStore {
  private stmtInsertCampaign: Database.Statement<[string, string, string, number, number]>;
  private stmtInsertRecipient: Database.Statement<[string, number, string, string]>;
  private stmtGetCampaign: Database.Statement<[string], CampaignRow>;
  private stmtPage: Database.Statement<[string, number, number], RecipientRow>;
  private stmtCount: Database.Statement<[string], { count: number }>;
  private stmtAllRecipients: Database.Statement<[string], RecipientRow>;
  private stmtPublish: Database.Statement<[string, string, string]>;
  private insertTxn: (record: CampaignRecord, recipients: RecipientEntry[]) => void;

  constructor(db: Database.Database) {
    this.stmtInsertCampaign = db.prepare<[string, string, string, number, number]>(
      `INSERT INTO campaigns (guid, created_at, total_amount, number_of_recipients, decimals, root, cid)
       VALUES (?, ?, ?, ?, ?, NULL, NULL)`
    );

    this.stmtInsertRecipient = db.prepare<[string, number, string, string]>(
      `INSERT INTO recipients (campaign_guid, position, address, amount) VALUES (?, ?, ?, ?)`
    );

    this.stmtGetCampaign = db.prepare<[string], CampaignRow>(`SELECT * FROM campaigns WHERE guid = ?`);

    this.stmtPage = db.prepare<[string, number, number], RecipientRow>(
      `SELECT position, address, amount FROM recipients
       WHERE campaign_guid = ? ORDER BY position ASC LIMIT ? OFFSET ?`
    );

    this.stmtCount = db.prepare<[string], { count: number }>(
      `SELECT COUNT(*) as count FROM recipients WHERE campaign_guid = ?`
    );

    this.stmtAllRecipients = db.prepare<[string], RecipientRow>(
      `SELECT position, address, amount FROM recipients
       WHERE campaign_guid = ? ORDER BY position ASC`
    );

    // Only the first publish wins
    this.stmtPublish = db.prepare<[string, string, string]>(
      `UPDATE campaigns SET root = ?, cid = ? WHERE guid = ? AND cid IS NULL`
    );

    this.insertTxn = db.transaction((record: CampaignRecord, recipients: RecipientEntry[]) => {
      this.stmtInsertCampaign.run(
        record.guid,
        record.createdAt,
        record.totalAmount.toString(),
        record.numberOfRecipients,
        record.decimals,
      );
      recipients.forEach((r, position) => {
        this.stmtInsertRecipient.run(record.guid, position, r.address, r.amount.toString());
      });
    });
  }

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
    this.insertTxn(record, campaign.recipients);
    return record;
  }

  async getCampaign(guid: string): Promise<CampaignRecord | undefined> {
    const row = this.stmtGetCampaign.get(guid);
    return row ? rowToCampaign(row) : undefined;
  }

  async listRecipients(guid: string, pageNumber: number, pageSize: number): Promise<RecipientPage> {
    assertValidPage(pageNumber, pageSize);
    const rows = this.stmtPage.all(guid, pageSize, (pageNumber - 1) * pageSize);
    const count = this.stmtCount.get(guid)?.count ?? 0;
    return {
      pageNumber,
      pageSize,
      total: count,
      entries: rows.map(row => ({
        position: row.position,
        address: row.address,
        amount: BigInt(row.amount),
      })),
    };
  }

  async getRecipients(guid: string): Promise<RecipientEntry[]> {
    return this.stmtAllRecipients.all(guid).map(row => ({
      address: row.address,
      amount: BigInt(row.amount),
    }));
  }

  async markPublished(guid: string, root: string, cid: string): Promise<CampaignRecord | undefined> {
    const result = this.stmtPublish.run(root, cid, guid);
    if (result.changes === 0) {
      return undefined;
    }
    return this.getCampaign(guid);
  }
}
