import { Router, Request, Response } from 'express';
import { ApiState, queryString } from '../state';
import {
  CampaignResponse,
  CampaignResponseBody,
  EntriesResponse,
  PublishResponse,
  ErrorCodes,
} from '../types';
import { readCsvUpload, sendCsvParseError } from './create';
import {
  AlreadyPublishedError,
  CampaignNotFoundError,
  createDraft,
  publishDraft,
} from '../../campaign';
import { CampaignRecord, MAX_PAGE_SIZE, isValidPage } from '../../persistence';
import { CsvParseError } from '../../ingestion';
import { PublicationError } from '../../publication';

const DEFAULT_PAGE_SIZE = 100;

function toResponseBody(record: CampaignRecord): CampaignResponseBody {
  return {
    guid: record.guid,
    createdAt: record.createdAt,
    totalAmount: record.totalAmount.toString(),
    numberOfRecipients: record.numberOfRecipients,
    decimals: record.decimals,
    root: record.root,
    cid: record.cid,
  };
}

function readPageParam(value: unknown, fallback: number): number {
  const raw = queryString(value);
  if (raw === undefined) {
    return fallback;
  }
  return /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
}

function sendNotFound(res: Response, guid: string): void {
  res.status(404).json({
    success: false,
    error: `Campaign not found: ${guid}`,
    code: ErrorCodes.CAMPAIGN_NOT_FOUND,
  });
}

/**
 * Create router for stored campaign drafts
 */
export function createCampaignsRouter(state: ApiState): Router {
  const router = Router();

  /**
   * POST /campaigns?decimals=N
   * Validate a recipients CSV and store it unpublished
   */
  router.post('/', async (req: Request, res: Response) => {
    const upload = readCsvUpload(req, res);
    if (!upload) {
      return;
    }

    try {
      const result = await createDraft(upload.csv, upload.decimals, state.stores.campaign);

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

      const response: CampaignResponse = { success: true, campaign: toResponseBody(result.campaign) };
      res.status(201).json(response);
    } catch (error) {
      if (error instanceof CsvParseError) {
        sendCsvParseError(res, error);
        return;
      }
      console.error('Error storing campaign:', error);
      res.status(500).json({
        success: false,
        error: 'Failed to store campaign',
        code: ErrorCodes.INTERNAL_ERROR,
      });
    }
  });

  /**
   * GET /campaigns/:guid
   */
  router.get('/:guid', async (req: Request, res: Response) => {
    const { guid } = req.params;

    try {
      const record = await state.stores.campaign.getCampaign(guid);
      if (!record) {
        sendNotFound(res, guid);
        return;
      }
      const response: CampaignResponse = { success: true, campaign: toResponseBody(record) };
      res.status(200).json(response);
    } catch (error) {
      console.error('Error loading campaign:', error);
      res.status(500).json({
        success: false,
        error: 'Failed to load campaign',
        code: ErrorCodes.INTERNAL_ERROR,
      });
    }
  });

  /**
   * GET /campaigns/:guid/entries?page_number=&page_size=
   * page_number is 1-based; page_size defaults to 100, at most 1000
   */
  router.get('/:guid/entries', async (req: Request, res: Response) => {
    const { guid } = req.params;
    const pageNumber = readPageParam(req.query.page_number, 1);
    const pageSize = readPageParam(req.query.page_size, DEFAULT_PAGE_SIZE);

    if (!isValidPage(pageNumber, pageSize)) {
      res.status(400).json({
        success: false,
        error: `page_number must be >= 1 and page_size between 1 and ${MAX_PAGE_SIZE}`,
        code: ErrorCodes.INVALID_PAGINATION,
      });
      return;
    }

    try {
      if (!(await state.stores.campaign.getCampaign(guid))) {
        sendNotFound(res, guid);
        return;
      }

      const page = await state.stores.campaign.listRecipients(guid, pageNumber, pageSize);
      const response: EntriesResponse = {
        success: true,
        page: {
          pageNumber: page.pageNumber,
          pageSize: page.pageSize,
          total: page.total,
          recipients: page.entries.map(e => ({
            position: e.position,
            address: e.address,
            amount: e.amount.toString(),
          })),
        },
      };
      res.status(200).json(response);
    } catch (error) {
      console.error('Error listing recipients:', error);
      res.status(500).json({
        success: false,
        error: 'Failed to list recipients',
        code: ErrorCodes.INTERNAL_ERROR,
      });
    }
  });

  /**
   * POST /campaigns/:guid/publish
   * Build the tree for a stored draft and pin its document
   */
  router.post('/:guid/publish', async (req: Request, res: Response) => {
    const { guid } = req.params;

    try {
      const published = await publishDraft(guid, state.stores.campaign, state.stores.content);
      const response: PublishResponse = {
        success: true,
        guid,
        root: published.root,
        cid: published.cid,
      };
      res.status(200).json(response);
    } catch (error) {
      if (error instanceof CampaignNotFoundError) {
        sendNotFound(res, guid);
        return;
      }
      if (error instanceof AlreadyPublishedError) {
        res.status(409).json({
          success: false,
          error: error.message,
          code: ErrorCodes.ALREADY_PUBLISHED,
        });
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
      console.error('Error publishing campaign:', error);
      res.status(500).json({
        success: false,
        error: 'Failed to publish campaign',
        code: ErrorCodes.INTERNAL_ERROR,
      });
    }
  });

  return router;
}
