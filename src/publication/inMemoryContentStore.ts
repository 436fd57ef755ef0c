import { IContentStore } from './interfaces';
import { canonicalStringify, computeContentAddress } from './contentAddress';

export class InMemoryContentStore implements IContentStore {
  private documents = new Map<string, string>();

  async pin(document: unknown): Promise<string> {
    const cid = computeContentAddress(document);
    this.documents.set(cid, canonicalStringify(document));
    return cid;
  }

  async fetch(cid: string): Promise<unknown | undefined> {
    const body = this.documents.get(cid);
    return body !== undefined ? JSON.parse(body) as unknown : undefined;
  }

  get size(): number {
    return this.documents.size;
  }
}
