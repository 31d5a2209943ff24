/**
 * Persisted layout: which secondary surfaces were open and where.
 *
 * The record is flat, keyed by layout key: the role name, with a `#n`
 * suffix for the second and later floating instances.
 */

import { z } from "zod";
import { isSurfaceRole, type SurfaceRole } from "../protocol/roles.js";
import type { Geometry } from "../protocol/payloads.js";

export const layoutEntrySchema = z.object({
  visible: z.boolean(),
  x: z.number().int(),
  y: z.number().int(),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
});

export type LayoutEntry = z.infer<typeof layoutEntrySchema>;

export type LayoutRecord = Record<string, LayoutEntry>;

const LAYOUT_KEY = /^([a-z-]+)(?:#([1-9][0-9]*))?$/;

/** Role named by a layout key, or `undefined` if the key is malformed. */
export function roleFromLayoutKey(key: string): SurfaceRole | undefined {
  const match = LAYOUT_KEY.exec(key);
  const role = match?.[1];
  return isSurfaceRole(role) ? role : undefined;
}

/** Layout key of the `index`-th (1-based) instance of `role`. */
export function layoutKeyFor(role: SurfaceRole, index = 1): string {
  return index <= 1 ? role : `${role}#${index}`;
}

export function entryToGeometry(entry: LayoutEntry): Geometry {
  return { ...entry };
}

export interface ParsedLayout {
  record: LayoutRecord;
  /** Keys dropped because the key or its entry was invalid. */
  skipped: string[];
}

/** Validate an untrusted layout document entry by entry. */
export function parseLayout(input: unknown): ParsedLayout {
  const document = z.record(z.string(), z.unknown()).safeParse(input);
  if (!document.success) {
    return { record: {}, skipped: [] };
  }

  const record: LayoutRecord = {};
  const skipped: string[] = [];
  for (const [key, value] of Object.entries(document.data)) {
    const entry = layoutEntrySchema.safeParse(value);
    if (roleFromLayoutKey(key) === undefined || !entry.success) {
      skipped.push(key);
      continue;
    }
    record[key] = entry.data;
  }
  return { record, skipped };
}
