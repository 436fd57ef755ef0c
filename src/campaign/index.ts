export { CampaignDocument, RecipientDocument, parseCampaignDocument } from './document';
export { CampaignNotFoundError, InvalidCampaignError, AlreadyPublishedError } from './errors';
export {
  PublishedCampaign,
  CreateCampaignResult,
  DraftCampaignResult,
  EligibilityResult,
  ValidityResult,
  toLeaves,
  assembleCampaign,
  createCampaign,
  checkEligibility,
  checkValidity,
  createDraft,
  publishDraft,
} from './campaignService';
