// Prefix registry: maps entity types to canonical id prefixes.
// Prefixes are 2-3 lowercase letters, unique, and frozen.

const ENTITY_TYPES = ['surface', 'producer'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const PREFIX_MAP: Readonly<Record<EntityType, string>> = Object.freeze({
  surface: 'sf',
  producer: 'pr',
});

export const REVERSE_PREFIX_MAP: ReadonlyMap<string, EntityType> = new Map<string, EntityType>(
  ENTITY_TYPES.map((entity): [string, EntityType] => [PREFIX_MAP[entity], entity]),
);

export function getPrefix(entityType: EntityType): string {
  return PREFIX_MAP[entityType];
}

export function getEntityType(prefix: string): EntityType | undefined {
  return REVERSE_PREFIX_MAP.get(prefix);
}
