import { ValidationError } from '../ingestion';

// ============================================================================
// Create (POST /create)
// ============================================================================

export interface CreateResponse {
  success: true;
  status: 'Upload successful';
  /** Base units, decimal string */
  total: string;
  recipients: string;
  root: string;
  cid: string;
}

export interface InvalidCsvResponse {
  success: false;
  status: 'Invalid csv file.';
  error: string;
  code: ErrorCode;
  errors: ValidationError[];
}

// ============================================================================
// Eligibility (GET /eligibility)
// ============================================================================

export interface EligibilityResponse {
  success: true;
  index: number;
  proof: string[];
  address: string;
  amount: string;
}

// ============================================================================
// Validity (GET /validity)
// ============================================================================

export interface ValidityResponse {
  success: true;
  root: string;
  total: string;
  recipients: number;
  valid: boolean;
}

// ============================================================================
// Campaign drafts (/campaigns)
// ============================================================================

export interface CampaignResponseBody {
  guid: string;
  createdAt: string;
  totalAmount: string;
  numberOfRecipients: number;
  decimals: number;
  root: string | null;
  cid: string | null;
}

export interface CampaignResponse {
  success: true;
  campaign: CampaignResponseBody;
}

export interface EntriesResponse {
  success: true;
  page: {
    pageNumber: number;
    pageSize: number;
    total: number;
    recipients: Array<{ position: number; address: string; amount: string }>;
  };
}

export interface PublishResponse {
  success: true;
  guid: string;
  root: string;
  cid: string;
}

// ============================================================================
// Error Response
// ============================================================================

export interface ErrorResponse {
  success: false;
  error: string;
  code: ErrorCode;
}

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  UNAUTHORIZED: 'UNAUTHORIZED',
  INVALID_DECIMALS: 'INVALID_DECIMALS',
  MISSING_CSV: 'MISSING_CSV',
  INVALID_CSV: 'INVALID_CSV',
  MISSING_PARAMETER: 'MISSING_PARAMETER',
  INVALID_PAGINATION: 'INVALID_PAGINATION',
  NOT_ELIGIBLE: 'NOT_ELIGIBLE',
  CAMPAIGN_NOT_FOUND: 'CAMPAIGN_NOT_FOUND',
  INVALID_CAMPAIGN: 'INVALID_CAMPAIGN',
  ALREADY_PUBLISHED: 'ALREADY_PUBLISHED',
  PUBLICATION_FAILED: 'PUBLICATION_FAILED',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
