import express, { Express, Request, Response, NextFunction } from 'express';
import { ApiState } from './state';
import { createCreateRouter } from './routes/create';
import { createEligibilityRouter } from './routes/eligibility';
import { createValidityRouter } from './routes/validity';
import { createCampaignsRouter } from './routes/campaigns';
import { ErrorCodes } from './types';
import { DEFAULT_MAX_UPLOAD_BYTES } from '../config';

export interface AppOptions {
  /** Largest accepted CSV body */
  maxUploadBytes?: number;
}

const CSV_CONTENT_TYPES = ['text/csv', 'text/plain', 'application/csv'];

function hasStatus(err: Error, status: number): boolean {
  return 'status' in err && err.status === status;
}

/**
 * Create an Express app with all routes configured
 */
export function createApp(state: ApiState, options: AppOptions = {}): Express {
  const app = express();

  // Parse JSON bodies and raw CSV uploads
  app.use(express.json());
  app.use(express.text({
    type: CSV_CONTENT_TYPES,
    limit: options.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES,
  }));

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      storeBackend: state.storeBackend,
      publicationBackend: state.publicationBackend,
    });
  });

  // Mount routes
  app.use('/create', createCreateRouter(state));
  app.use('/eligibility', createEligibilityRouter(state));
  app.use('/validity', createValidityRouter(state));
  app.use('/campaigns', createCampaignsRouter(state));

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (hasStatus(err, 413)) {
      res.status(413).json({
        success: false,
        error: 'The csv file exceeds the upload limit',
        code: ErrorCodes.PAYLOAD_TOO_LARGE,
      });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      code: ErrorCodes.INTERNAL_ERROR,
    });
  });

  return app;
}
