import { createHash } from 'node:crypto';
import { IdentitySource } from '../types/enums.js';
import { config } from './config.js';

export interface ResolvedIdentity {
  id: string;
  source: IdentitySource;
}

const HASH_PREFIX = 'h_';
const HASH_LENGTH = 16;
// Attribute ids that look like content hashes are moved out of the hash namespace
const ATTRIBUTE_ESCAPE_PREFIX = 'attr:';

export function normalizeText(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

/** The fixed attribute subset used by the content hash, sorted by name */
export function pickHashAttributes(element: Element): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const name of [...config.hashAttributes].sort()) {
    const value = element.getAttribute(name);
    if (value !== null) picked[name] = value.replace(/\s+/g, ' ').trim();
  }
  return picked;
}

export function contentHash(tag: string, text: string, attributes: Record<string, string>): string {
  const payload = JSON.stringify([tag, text, Object.entries(attributes)]);
  return HASH_PREFIX + createHash('sha1').update(payload).digest('hex').slice(0, HASH_LENGTH);
}

/**
 * Attribute id first, content hash second. Elements with identical tag, text
 * and hash attributes resolve to the same id.
 */
export function resolveIdentity(element: Element, idAttribute: string): ResolvedIdentity {
  const attributeId = element.getAttribute(idAttribute)?.trim();
  if (attributeId) {
    const id = attributeId.startsWith(HASH_PREFIX) ? ATTRIBUTE_ESCAPE_PREFIX + attributeId : attributeId;
    return { id, source: IdentitySource.ATTRIBUTE };
  }
  const tag = element.tagName.toLowerCase();
  const text = normalizeText(element.textContent);
  return { id: contentHash(tag, text, pickHashAttributes(element)), source: IdentitySource.CONTENT_HASH };
}
