import * as path from 'path';
import { PinataConfig } from './publication';

export type StoreBackend = 'sqlite' | 'memory';
export type PublicationBackend = 'local' | 'pinata';

export interface AppConfig {
  port: number;
  bearerToken: string;
  /** True when MERKLE_API_BEARER_TOKEN was not set and the test default is in use */
  usingDefaultToken: boolean;
  storeBackend: StoreBackend;
  dbPath: string;
  publicationBackend: PublicationBackend;
  pinata?: PinataConfig;
  maxUploadBytes: number;
}

export const DEFAULT_BEARER_TOKEN = 'test-bearer-token';
export const DEFAULT_MAX_UPLOAD_BYTES = 100 * 1024 * 1024;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || parseInt(raw, 10) === 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function readRequired(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`${name} must be set when PUBLICATION_BACKEND=pinata`);
  }
  return value;
}

function readStoreBackend(env: Env): StoreBackend {
  const raw = env.STORE_BACKEND || 'sqlite';
  if (raw !== 'sqlite' && raw !== 'memory') {
    throw new ConfigError(`STORE_BACKEND must be "sqlite" or "memory", got "${raw}"`);
  }
  return raw;
}

function readPublicationBackend(env: Env): PublicationBackend {
  const raw = env.PUBLICATION_BACKEND || 'local';
  if (raw !== 'local' && raw !== 'pinata') {
    throw new ConfigError(`PUBLICATION_BACKEND must be "local" or "pinata", got "${raw}"`);
  }
  return raw;
}

/**
 * Read server configuration from the environment
 *
 * @throws ConfigError naming the offending variable
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const publicationBackend = readPublicationBackend(env);

  const config: AppConfig = {
    port: readPositiveInt(env, 'PORT', 3000),
    bearerToken: env.MERKLE_API_BEARER_TOKEN || DEFAULT_BEARER_TOKEN,
    usingDefaultToken: !env.MERKLE_API_BEARER_TOKEN,
    storeBackend: readStoreBackend(env),
    dbPath: env.DB_PATH || path.join(process.cwd(), 'data', 'airdrop.db'),
    publicationBackend,
    maxUploadBytes: readPositiveInt(env, 'MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES),
  };

  if (publicationBackend === 'pinata') {
    config.pinata = {
      apiServer: readRequired(env, 'PINATA_API_SERVER'),
      apiKey: readRequired(env, 'PINATA_API_KEY'),
      secretApiKey: readRequired(env, 'PINATA_SECRET_API_KEY'),
      gateway: readRequired(env, 'IPFS_GATEWAY'),
      accessToken: readRequired(env, 'PINATA_ACCESS_TOKEN'),
    };
  }

  return config;
}
