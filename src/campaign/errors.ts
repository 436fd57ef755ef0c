/**
 * Thrown when no document is stored under a content address
 */
export class CampaignNotFoundError extends Error {
  constructor(readonly ref: string) {
    super(`Campaign not found: ${ref}`);
    this.name = 'CampaignNotFoundError';
  }
}

/**
 * Thrown when a stored campaign document does not have the published shape
 * or its tree cannot be loaded
 */
export class InvalidCampaignError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCampaignError';
  }
}

/**
 * Thrown when a draft that already has a cid is published again
 */
export class AlreadyPublishedError extends Error {
  constructor(readonly guid: string, readonly cid: string) {
    super(`Campaign ${guid} is already published as ${cid}`);
    this.name = 'AlreadyPublishedError';
  }
}
