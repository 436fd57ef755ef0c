/**
 * IPFS pinning through the Pinata HTTP API.
 *
 * Upload: POST {apiServer}/pinning/pinFileToIPFS, multipart field "file"
 * holding data.json, authenticated by the pinata_api_key and
 * pinata_secret_api_key headers. The content address is the returned
 * IpfsHash.
 *
 * Download: GET {gateway}/{cid}?pinataGatewayToken={accessToken}
 */

import { IContentStore, PublicationError } from './interfaces';
import { canonicalStringify } from './contentAddress';

export interface PinataConfig {
  apiServer: string;
  apiKey: string;
  secretApiKey: string;
  gateway: string;
  accessToken: string;
}

type FetchFn = typeof fetch;

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Extract IpfsHash from a pinFileToIPFS response body
 */
export function parsePinataResponse(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'IpfsHash' in body) {
    const { IpfsHash } = body;
    if (typeof IpfsHash === 'string' && IpfsHash.length > 0) {
      return IpfsHash;
    }
  }
  throw new PublicationError('Unexpected pinning response: missing IpfsHash');
}

export class PinataContentStore implements IContentStore {
  private readonly fetchFn: FetchFn;

  constructor(private readonly config: PinataConfig, fetchFn?: FetchFn) {
    this.fetchFn = fetchFn ?? ((input, init) => fetch(input, init));
  }

  async pin(document: unknown): Promise<string> {
    const form = new FormData();
    form.append(
      'file',
      new Blob([canonicalStringify(document)], { type: 'application/json' }),
      'data.json'
    );

    const response = await this.fetchFn(`${trimSlash(this.config.apiServer)}/pinning/pinFileToIPFS`, {
      method: 'POST',
      headers: {
        pinata_api_key: this.config.apiKey,
        pinata_secret_api_key: this.config.secretApiKey,
      },
      body: form,
    });

    if (!response.ok) {
      throw new PublicationError(`Pinning failed with status ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new PublicationError('Unexpected pinning response: not JSON');
    }
    return parsePinataResponse(body);
  }

  async fetch(cid: string): Promise<unknown | undefined> {
    const url =
      `${trimSlash(this.config.gateway)}/${encodeURIComponent(cid)}` +
      `?pinataGatewayToken=${encodeURIComponent(this.config.accessToken)}`;
    const response = await this.fetchFn(url);

    if (response.status === 404) {
      return undefined;
    }
    if (!response.ok) {
      throw new PublicationError(`Gateway request failed with status ${response.status}`, response.status);
    }

    try {
      return await response.json();
    } catch {
      throw new PublicationError(`Document ${cid} is not JSON`);
    }
  }
}
