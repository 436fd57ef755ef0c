import { Router, Request, Response } from 'express';
import { ApiState, queryString } from '../state';
import { EligibilityResponse, ErrorCodes } from '../types';
import { requireBearerToken } from '../middleware/bearerAuth';
import { checkEligibility } from '../../campaign';
import { sendLookupError } from './lookupErrors';

/**
 * Create router for eligibility lookups
 */
export function createEligibilityRouter(state: ApiState): Router {
  const router = Router();

  router.use(requireBearerToken(() => state.bearerToken));

  /**
   * GET /eligibility?cid=&address=
   * Returns the leaf index and proof for an address in a published campaign
   */
  router.get('/', async (req: Request, res: Response) => {
    const cid = queryString(req.query.cid);
    const address = queryString(req.query.address);

    if (!cid) {
      res.status(400).json({
        success: false,
        error: 'Missing required parameter: cid',
        code: ErrorCodes.MISSING_PARAMETER,
      });
      return;
    }

    if (!address) {
      res.status(400).json({
        success: false,
        error: 'Missing required parameter: address',
        code: ErrorCodes.MISSING_PARAMETER,
      });
      return;
    }

    try {
      const result = await checkEligibility(cid, address, state.stores.content);

      if (!result.eligible) {
        res.status(400).json({
          success: false,
          error: 'The provided address is not eligible for this campaign',
          code: ErrorCodes.NOT_ELIGIBLE,
        });
        return;
      }

      const response: EligibilityResponse = {
        success: true,
        index: result.index,
        proof: result.proof,
        address: result.address,
        amount: result.amount,
      };
      res.status(200).json(response);
    } catch (error) {
      sendLookupError(res, error, 'Error checking eligibility');
    }
  });

  return router;
}
