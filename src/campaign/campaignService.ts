import {
  AirdropLeaf,
  MerkleTree,
  MerkleInputError,
  EmptyTreeError,
  buildMerkleTree,
  decodeRecipient,
  dumpTree,
  getProof,
  loadTree,
} from '../merkle';
import { RecipientEntry, ValidationError, parseCampaignCsv } from '../ingestion';
import { IContentStore } from '../publication';
import { ICampaignStore, CampaignRecord } from '../persistence';
import { CampaignDocument, parseCampaignDocument } from './document';
import { AlreadyPublishedError, CampaignNotFoundError, InvalidCampaignError } from './errors';

export interface PublishedCampaign {
  root: string;
  cid: string;
  /** Base units, decimal string */
  total: string;
  recipients: number;
}

export type CreateCampaignResult =
  | { ok: true; campaign: PublishedCampaign }
  | { ok: false; errors: ValidationError[] };

export type DraftCampaignResult =
  | { ok: true; campaign: CampaignRecord }
  | { ok: false; errors: ValidationError[] };

export type EligibilityResult =
  | { eligible: true; index: number; proof: string[]; address: string; amount: string }
  | { eligible: false };

export interface ValidityResult {
  root: string;
  total: string;
  recipients: number;
  valid: boolean;
}

/**
 * Leaf i is the i-th recipient in file order
 */
export function toLeaves(records: ReadonlyArray<RecipientEntry>): AirdropLeaf[] {
  return records.map((r, index) => ({
    index,
    recipient: decodeRecipient(r.address),
    amount: r.amount,
  }));
}

/**
 * Build the tree and the document to publish for a validated recipient list
 *
 * @throws EmptyTreeError when records is empty
 */
export function assembleCampaign(records: ReadonlyArray<RecipientEntry>): {
  tree: MerkleTree;
  document: CampaignDocument;
} {
  const tree = buildMerkleTree(toLeaves(records));
  const total = records.reduce((sum, r) => sum + r.amount, 0n);

  return {
    tree,
    document: {
      root: tree.root,
      total_amount: total.toString(),
      number_of_recipients: records.length,
      merkle_tree: dumpTree(tree),
      recipients: records.map(r => ({ address: r.address, amount: r.amount.toString() })),
    },
  };
}

async function publish(
  records: ReadonlyArray<RecipientEntry>,
  contentStore: IContentStore
): Promise<PublishedCampaign> {
  const { tree, document } = assembleCampaign(records);
  const cid = await contentStore.pin(document);
  return {
    root: tree.root,
    cid,
    total: document.total_amount,
    recipients: document.number_of_recipients,
  };
}

/**
 * Parse and validate a CSV upload, then build and pin its campaign.
 *
 * @throws CsvParseError when the text is not CSV at all
 * @throws PublicationError when pinning fails
 */
export async function createCampaign(
  csvText: string,
  decimals: number,
  contentStore: IContentStore
): Promise<CreateCampaignResult> {
  const parsed = parseCampaignCsv(csvText, decimals);
  if (parsed.validationErrors.length > 0) {
    return { ok: false, errors: parsed.validationErrors };
  }
  return { ok: true, campaign: await publish(parsed.records, contentStore) };
}

async function loadDocument(cid: string, contentStore: IContentStore): Promise<CampaignDocument> {
  const value = await contentStore.fetch(cid);
  if (value === undefined) {
    throw new CampaignNotFoundError(cid);
  }
  return parseCampaignDocument(value);
}

/**
 * Look up `address` (case-insensitive) in a published campaign and return
 * its leaf index and proof.
 *
 * @throws CampaignNotFoundError when nothing is stored under cid
 * @throws InvalidCampaignError when the document or its tree is malformed
 */
export async function checkEligibility(
  cid: string,
  address: string,
  contentStore: IContentStore
): Promise<EligibilityResult> {
  const document = await loadDocument(cid, contentStore);
  const wanted = address.toLowerCase();
  const index = document.recipients.findIndex(r => r.address.toLowerCase() === wanted);
  if (index === -1) {
    return { eligible: false };
  }

  let tree: MerkleTree;
  try {
    tree = loadTree(document.merkle_tree);
  } catch (error) {
    if (error instanceof MerkleInputError) {
      throw new InvalidCampaignError(error.message);
    }
    throw error;
  }

  const proof = getProof(tree, index);
  if (!proof) {
    throw new InvalidCampaignError(`Invalid campaign document: tree has no leaf ${index}`);
  }

  const recipient = document.recipients[index];
  return { eligible: true, index, proof, address: recipient.address, amount: recipient.amount };
}

function parseStoredAmount(amount: string): bigint | undefined {
  return /^\d+$/.test(amount) ? BigInt(amount) : undefined;
}

function sameLevels(a: MerkleTree, b: MerkleTree): boolean {
  return (
    a.tree.length === b.tree.length &&
    a.tree.every((level, i) => level.length === b.tree[i].length && level.every((hash, j) => hash === b.tree[i][j]))
  );
}

/**
 * Rebuild a published campaign's tree from its recipient list and compare it
 * level by level with the stored tree and root.
 *
 * Content that does not add up yields valid: false; only a document of the
 * wrong shape throws.
 *
 * @throws CampaignNotFoundError when nothing is stored under cid
 * @throws InvalidCampaignError when the document shape is wrong
 */
export async function checkValidity(cid: string, contentStore: IContentStore): Promise<ValidityResult> {
  const document = await loadDocument(cid, contentStore);
  const result: ValidityResult = {
    root: document.root,
    total: document.total_amount,
    recipients: document.number_of_recipients,
    valid: false,
  };

  const records: RecipientEntry[] = [];
  for (const r of document.recipients) {
    const amount = parseStoredAmount(r.amount);
    if (amount === undefined) {
      return result;
    }
    records.push({ address: r.address, amount });
  }

  const total = records.reduce((sum, r) => sum + r.amount, 0n);
  if (total.toString() !== document.total_amount || records.length !== document.number_of_recipients) {
    return result;
  }

  try {
    const tree = loadTree(document.merkle_tree);
    const rebuilt = buildMerkleTree(toLeaves(records));
    result.valid =
      tree.root === document.root && rebuilt.root === document.root && sameLevels(tree, rebuilt);
  } catch (error) {
    if (!(error instanceof MerkleInputError || error instanceof EmptyTreeError)) {
      throw error;
    }
  }
  return result;
}

/**
 * Validate a CSV upload and keep it as an unpublished draft
 *
 * @throws CsvParseError when the text is not CSV at all
 */
export async function createDraft(
  csvText: string,
  decimals: number,
  campaignStore: ICampaignStore
): Promise<DraftCampaignResult> {
  const parsed = parseCampaignCsv(csvText, decimals);
  if (parsed.validationErrors.length > 0) {
    return { ok: false, errors: parsed.validationErrors };
  }
  const campaign = await campaignStore.createCampaign({
    decimals,
    totalAmount: parsed.totalAmount,
    recipients: parsed.records,
  });
  return { ok: true, campaign };
}

/**
 * Build and pin a stored draft, then record its root and cid
 *
 * @throws CampaignNotFoundError for an unknown guid
 * @throws AlreadyPublishedError when the draft already has a cid
 * @throws PublicationError when pinning fails
 */
export async function publishDraft(
  guid: string,
  campaignStore: ICampaignStore,
  contentStore: IContentStore
): Promise<PublishedCampaign> {
  const draft = await campaignStore.getCampaign(guid);
  if (!draft) {
    throw new CampaignNotFoundError(guid);
  }
  if (draft.cid !== null) {
    throw new AlreadyPublishedError(guid, draft.cid);
  }

  const published = await publish(await campaignStore.getRecipients(guid), contentStore);

  const updated = await campaignStore.markPublished(guid, published.root, published.cid);
  if (!updated) {
    const current = await campaignStore.getCampaign(guid);
    throw new AlreadyPublishedError(guid, current?.cid ?? published.cid);
  }
  return published;
}
