import * as crypto from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ErrorCodes } from '../types';

const BEARER_PREFIX = 'Bearer ';

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Middleware that requires "Authorization: Bearer <token>"
 */
export function requireBearerToken(getToken: () => string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.header('authorization');

    if (!header || !header.startsWith(BEARER_PREFIX) || !tokensMatch(header.slice(BEARER_PREFIX.length), getToken())) {
      res.status(401).json({
        success: false,
        error: 'Bad authentication process provided.',
        code: ErrorCodes.UNAUTHORIZED,
      });
      return;
    }

    next();
  };
}
