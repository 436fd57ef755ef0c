import { Router, Request, Response } from 'express';
import { ApiState, queryString } from '../state';
import { ValidityResponse, ErrorCodes } from '../types';
import { checkValidity } from '../../campaign';
import { sendLookupError } from './lookupErrors';

/**
 * Create router for campaign integrity checks
 */
export function createValidityRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /validity?cid=
   * Rebuilds the root from the published recipients and compares it
   */
  router.get('/', async (req: Request, res: Response) => {
    const cid = queryString(req.query.cid);

    if (!cid) {
      res.status(400).json({
        success: false,
        error: 'Missing required parameter: cid',
        code: ErrorCodes.MISSING_PARAMETER,
      });
      return;
    }

    try {
      const result = await checkValidity(cid, state.stores.content);
      const response: ValidityResponse = { success: true, ...result };
      res.status(200).json(response);
    } catch (error) {
      sendLookupError(res, error, 'Error checking validity');
    }
  });

  return router;
}
