import { Router, Request, Response } from 'express';
import { ApiState, parseDecimals } from '../state';
import { CreateResponse, ErrorCodes } from '../types';
import { createCampaign } from '../../campaign';
import { CsvParseError } from '../../ingestion';
import { PublicationError } from '../../publication';

export const DECIMALS_MESSAGE =
  'Decimals query parameter is mandatory and should be a valid integer in order to create a valid campaign!';

/**
 * Shared checks for endpoints that take a recipients CSV body.
 * Sends the 400 and returns undefined when the request is unusable.
 */
export function readCsvUpload(req: Request, res: Response): { decimals: number; csv: string } | undefined {
  const decimals = parseDecimals(req.query.decimals);
  if (decimals === undefined) {
    res.status(400).json({
      success: false,
      error: DECIMALS_MESSAGE,
      code: ErrorCodes.INVALID_DECIMALS,
    });
    return undefined;
  }

  const csv: unknown = req.body;
  if (typeof csv !== 'string' || csv.trim() === '') {
    res.status(400).json({
      success: false,
      error: 'The request did not contain a recipients csv file',
      code: ErrorCodes.MISSING_CSV,
    });
    return undefined;
  }

  return { decimals, csv };
}

export function sendCsvParseError(res: Response, error: CsvParseError): void {
  res.status(400).json({
    success: false,
    error: `There was a problem in csv file parsing process: ${error.message}`,
    code: ErrorCodes.INVALID_CSV,
  });
}

/**
 * Create router for the one-shot upload endpoint
 */
export function createCreateRouter(state: ApiState): Router {
  const router = Router();

  /**
   * POST /create?decimals=N
   * Body: recipients CSV (address,amount). Validates, builds the tree and
   * pins the campaign document.
   */
  router.post('/', async (req: Request, res: Response) => {
    const upload = readCsvUpload(req, res);
    if (!upload) {
      return;
    }

    try {
      const result = await createCampaign(upload.csv, upload.decimals, state.stores.content);

      if (!result.ok) {
        res.status(400).json({
          success: false,
          status: 'Invalid csv file.',
          error: 'Invalid csv file.',
          code: ErrorCodes.INVALID_CSV,
          errors: result.errors,
        });
        return;
      }

      const response: CreateResponse = {
        success: true,
        status: 'Upload successful',
        total: result.campaign.total,
        recipients: result.campaign.recipients.toString(),
        root: result.campaign.root,
        cid: result.campaign.cid,
      };
      res.status(200).json(response);
    } catch (error) {
      if (error instanceof CsvParseError) {
        sendCsvParseError(res, error);
        return;
      }
      if (error instanceof PublicationError) {
        console.error('Error publishing campaign:', error);
        res.status(500).json({
          success: false,
          error: 'There was an error uploading the campaign to ipfs',
          code: ErrorCodes.PUBLICATION_FAILED,
        });
        return;
      }
      console.error('Error creating campaign:', error);
      res.status(500).json({
        success: false,
        error: 'Failed to create campaign',
        code: ErrorCodes.INTERNAL_ERROR,
      });
    }
  });

  return router;
}
