// Id validation: separator, known prefix, 26-character Crockford body.
import { type EntityType, getEntityType } from './prefixes.js';

const BODY_REGEX = /^[0-9A-HJKMNP-TV-Z]{26}$/;

export type ValidationResult =
  | { valid: true; entityType: EntityType }
  | { valid: false; reason: string };

export function validateId(raw: string): ValidationResult {
  if (!raw) {
    return { valid: false, reason: 'Empty input' };
  }

  const sepIdx = raw.indexOf('_');
  if (sepIdx === -1) {
    return { valid: false, reason: 'Missing separator' };
  }

  const prefix = raw.substring(0, sepIdx);
  const body = raw.substring(sepIdx + 1);

  const entityType = getEntityType(prefix);
  if (!entityType) {
    return { valid: false, reason: `Unknown prefix: ${prefix}` };
  }

  if (body.length !== 26) {
    return { valid: false, reason: `Invalid body length: expected 26, got ${body.length}` };
  }

  if (!BODY_REGEX.test(body)) {
    return { valid: false, reason: 'Invalid characters in body' };
  }

  return { valid: true, entityType };
}

/** True when `raw` is a well-formed id of the given entity type. */
export function isIdOf(entityType: EntityType, raw: string): boolean {
  const result = validateId(raw);
  return result.valid && result.entityType === entityType;
}
