export { IContentStore, PublicationError } from './interfaces';
export { canonicalStringify, computeContentAddress } from './contentAddress';
export { InMemoryContentStore } from './inMemoryContentStore';
export { SqliteContentStore } from './sqliteContentStore';
export { PinataConfig, PinataContentStore, parsePinataResponse } from './pinataContentStore';
