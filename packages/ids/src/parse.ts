// Id parsing: entity type, creation time and ULID body.
import type { EntityType } from './prefixes.js';
import { decodeTime } from './ulid.js';
import { validateId } from './validate.js';

export interface ParsedId {
  entityType: EntityType;
  createdAt: Date;
  ulid: string;
}

export function parseId(raw: string): ParsedId | null {
  const result = validateId(raw);
  if (!result.valid) {
    return null;
  }

  const body = raw.substring(raw.indexOf('_') + 1);
  return {
    entityType: result.entityType,
    createdAt: new Date(decodeTime(body.substring(0, 10))),
    ulid: body,
  };
}
