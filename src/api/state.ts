import { ICampaignStore } from '../persistence';
import { IContentStore } from '../publication';
import { StoreBackend, PublicationBackend, DEFAULT_BEARER_TOKEN } from '../config';

/**
 * API state container for the HTTP server
 */
export interface ApiState {
  // Storage backends
  stores: {
    campaign: ICampaignStore;
    content: IContentStore;
  };

  // Reported by /health
  storeBackend: StoreBackend;
  publicationBackend: PublicationBackend;

  // Expected value of "Authorization: Bearer <token>" on /eligibility
  bearerToken: string;
}

export interface ApiStateOptions {
  storeBackend?: StoreBackend;
  publicationBackend?: PublicationBackend;
  bearerToken?: string;
}

/**
 * Create initial API state
 */
export function createApiState(
  stores: { campaign: ICampaignStore; content: IContentStore },
  options: ApiStateOptions = {}
): ApiState {
  return {
    stores,
    storeBackend: options.storeBackend ?? 'memory',
    publicationBackend: options.publicationBackend ?? 'local',
    bearerToken: options.bearerToken ?? DEFAULT_BEARER_TOKEN,
  };
}

/**
 * Read a single-valued query parameter; repeated or nested values count as absent
 */
export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Token decimals: a non-negative integer up to 255
 */
export function parseDecimals(value: unknown): number | undefined {
  const raw = queryString(value);
  if (raw === undefined || !/^\d{1,3}$/.test(raw)) {
    return undefined;
  }
  const decimals = parseInt(raw, 10);
  return decimals <= 255 ? decimals : undefined;
}
