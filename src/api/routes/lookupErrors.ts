import { Response } from 'express';
import { ErrorCodes } from '../types';
import { CampaignNotFoundError, InvalidCampaignError } from '../../campaign';
import { PublicationError } from '../../publication';

/**
 * Map a failure while loading a published campaign to a response
 */
export function sendLookupError(res: Response, error: unknown, context: string): void {
  if (error instanceof CampaignNotFoundError) {
    res.status(404).json({
      success: false,
      error: `No campaign found for cid: ${error.ref}`,
      code: ErrorCodes.CAMPAIGN_NOT_FOUND,
    });
    return;
  }
  if (error instanceof InvalidCampaignError) {
    res.status(502).json({
      success: false,
      error: error.message,
      code: ErrorCodes.INVALID_CAMPAIGN,
    });
    return;
  }
  if (error instanceof PublicationError) {
    console.error(`${context}:`, error);
    res.status(502).json({
      success: false,
      error: 'There was a problem processing your request: Bad CID provided',
      code: ErrorCodes.PUBLICATION_FAILED,
    });
    return;
  }
  console.error(`${context}:`, error);
  res.status(500).json({
    success: false,
    error: 'Internal server error',
    code: ErrorCodes.INTERNAL_ERROR,
  });
}
