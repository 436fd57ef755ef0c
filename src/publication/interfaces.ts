/**
 * Stores documents under a content-derived address and returns them later.
 * Documents are opaque JSON values to the store.
 */
export interface IContentStore {
  /** Store a document and return its content address */
  pin(document: unknown): Promise<string>;
  /** Load a document by address; undefined when nothing is stored there */
  fetch(cid: string): Promise<unknown | undefined>;
}

/**
 * Thrown when the publication backend fails or answers unexpectedly
 */
export class PublicationError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'PublicationError';
    this.status = status;
  }
}
