// Public API for @switchyard/ids
import { type EntityType, getPrefix } from './prefixes.js';
import { generateUlid } from './ulid.js';

export type { EntityType } from './prefixes.js';
export type { ValidationResult } from './validate.js';
export type { ParsedId } from './parse.js';
export { validateId, isIdOf } from './validate.js';
export { parseId } from './parse.js';
export { getPrefix, getEntityType, PREFIX_MAP } from './prefixes.js';

const ID_FORMAT_REGEX = /^[a-z]{2,3}_[0-9A-HJKMNP-TV-Z]{26}$/;

export function generateId(entityType: EntityType): string {
  const id = `${getPrefix(entityType)}_${generateUlid()}`;
  if (!ID_FORMAT_REGEX.test(id)) {
    throw new Error(`Generated ID does not match expected format: ${id}`);
  }
  return id;
}

/** Identifier of a surface process; never reused after the surface closes. */
export function generateSurfaceId(): string {
  return generateId('surface');
}

export function generateProducerId(): string {
  return generateId('producer');
}
