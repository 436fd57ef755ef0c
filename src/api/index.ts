// API Types
export * from './types';

// API State
export { ApiState, ApiStateOptions, createApiState, queryString, parseDecimals } from './state';

// Express App
export { createApp, AppOptions } from './app';

// Middleware
export { requireBearerToken } from './middleware/bearerAuth';

// Routes
export { createCreateRouter } from './routes/create';
export { createEligibilityRouter } from './routes/eligibility';
export { createValidityRouter } from './routes/validity';
export { createCampaignsRouter } from './routes/campaigns';
