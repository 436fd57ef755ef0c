import { RecipientEntry } from '../ingestion';

/** Largest page GET /campaigns/:guid/entries serves */
export const MAX_PAGE_SIZE = 1000;

/**
 * A stored campaign draft. root and cid stay null until it is published.
 */
export interface CampaignRecord {
  guid: string;
  createdAt: string; // ISO string
  /** Base units */
  totalAmount: bigint;
  numberOfRecipients: number;
  decimals: number;
  root: string | null;
  cid: string | null;
}

export interface NewCampaign {
  decimals: number;
  totalAmount: bigint;
  recipients: RecipientEntry[];
}

export interface StoredRecipient extends RecipientEntry {
  /** 0-based position in the uploaded file, later the leaf index */
  position: number;
}

export interface RecipientPage {
  pageNumber: number;
  pageSize: number;
  total: number;
  entries: StoredRecipient[];
}

export interface ICampaignStore {
  createCampaign(campaign: NewCampaign): Promise<CampaignRecord>;
  getCampaign(guid: string): Promise<CampaignRecord | undefined>;
  /** pageNumber is 1-based; an empty page past the end is not an error */
  listRecipients(guid: string, pageNumber: number, pageSize: number): Promise<RecipientPage>;
  /** Every recipient in position order */
  getRecipients(guid: string): Promise<RecipientEntry[]>;
  /** Undefined when the campaign does not exist or is already published */
  markPublished(guid: string, root: string, cid: string): Promise<CampaignRecord | undefined>;
}

export function isValidPage(pageNumber: number, pageSize: number): boolean {
  return (
    Number.isInteger(pageNumber) && pageNumber >= 1 &&
    Number.isInteger(pageSize) && pageSize >= 1 && pageSize <= MAX_PAGE_SIZE
  );
}

export function assertValidPage(pageNumber: number, pageSize: number): void {
  if (!isValidPage(pageNumber, pageSize)) {
    throw new RangeError(
      `Invalid page: page_number must be >= 1 and page_size between 1 and ${MAX_PAGE_SIZE}`
    );
  }
}
