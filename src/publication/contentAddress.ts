import * as crypto from 'crypto';

/**
 * Canonical JSON for content addressing.
 *
 * Object keys are sorted recursively, bigints become decimal strings,
 * arrays keep their order and undefined members are omitted, so equal
 * documents always serialize to the same bytes.
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

function canonicalize(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (Array.isArray(value)) {
    return value.map(v => canonicalize(v));
  }

  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const v = canonicalize(value[key]);
      if (v !== undefined) {
        sorted[key] = v;
      }
    }
    return sorted;
  }

  return value;
}

/**
 * Content address of a document: sha256 of its canonical JSON, hex
 */
export function computeContentAddress(document: unknown): string {
  return crypto.createHash('sha256').update(canonicalStringify(document)).digest('hex');
}
