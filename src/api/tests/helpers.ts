/**
 * Test helpers for the HTTP API: in-memory stores and CSV builders.
 */

import { createApp } from '../app';
import { createApiState, ApiState } from '../state';
import { InMemoryCampaignStore } from '../../persistence';
import { IContentStore, InMemoryContentStore } from '../../publication';
import { makeAddress } from '../../merkle/tests/fixtures';

export const BEARER_TOKEN = 'test-bearer-token';

export interface TestApp {
  app: ReturnType<typeof createApp>;
  state: ApiState;
  content: InMemoryContentStore;
}

export function makeTestApp(options: { content?: IContentStore; maxUploadBytes?: number } = {}): TestApp {
  const content = new InMemoryContentStore();
  const state = createApiState({
    campaign: new InMemoryCampaignStore(),
    content: options.content ?? content,
  });
  const app = createApp(state, { maxUploadBytes: options.maxUploadBytes });
  return { app, state, content };
}

export function csvOf(rows: Array<[string, string]>): string {
  return ['address,amount', ...rows.map(([address, amount]) => `${address},${amount}`)].join('\n') + '\n';
}

/**
 * CSV with `count` recipients (seeds 1..count) of the same amount
 */
export function sampleCsv(count: number, amount = '1'): string {
  return csvOf(Array.from({ length: count }, (_, i): [string, string] => [makeAddress(i + 1), amount]));
}
