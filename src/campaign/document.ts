import { InvalidCampaignError } from './errors';

/**
 * Recipient as published: amount is a decimal string of base units
 */
export interface RecipientDocument {
  address: string;
  amount: string;
}

/**
 * The published campaign document. Field names are snake_case because
 * consumers read the pinned JSON directly.
 */
export interface CampaignDocument {
  root: string;
  total_amount: string;
  number_of_recipients: number;
  /** dumpTree() text of the campaign's tree */
  merkle_tree: string;
  recipients: RecipientDocument[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseRecipient(value: unknown, i: number): RecipientDocument {
  if (!isRecord(value)) {
    throw new InvalidCampaignError(`Invalid campaign document: recipient ${i} is not an object`);
  }
  const { address, amount } = value;
  if (typeof address !== 'string' || typeof amount !== 'string') {
    throw new InvalidCampaignError(
      `Invalid campaign document: recipient ${i} needs string address and amount`
    );
  }
  return { address, amount };
}

/**
 * Validate a fetched document. Tree contents are checked later, when the
 * tree is loaded.
 */
export function parseCampaignDocument(value: unknown): CampaignDocument {
  if (!isRecord(value)) {
    throw new InvalidCampaignError('Invalid campaign document: expected an object');
  }

  const { root, total_amount, number_of_recipients, merkle_tree, recipients } = value;
  if (typeof root !== 'string') {
    throw new InvalidCampaignError('Invalid campaign document: root must be a string');
  }
  if (typeof total_amount !== 'string') {
    throw new InvalidCampaignError('Invalid campaign document: total_amount must be a string');
  }
  if (typeof number_of_recipients !== 'number' || !Number.isInteger(number_of_recipients)) {
    throw new InvalidCampaignError('Invalid campaign document: number_of_recipients must be an integer');
  }
  if (typeof merkle_tree !== 'string') {
    throw new InvalidCampaignError('Invalid campaign document: merkle_tree must be a string');
  }
  if (!Array.isArray(recipients)) {
    throw new InvalidCampaignError('Invalid campaign document: recipients must be an array');
  }

  return {
    root,
    total_amount,
    number_of_recipients,
    merkle_tree,
    recipients: recipients.map((r: unknown, i) => parseRecipient(r, i)),
  };
}
