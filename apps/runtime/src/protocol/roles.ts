/**
 * Surface roles and their static lifecycle policy.
 *
 * Exactly one `primary` surface exists per running application. Secondary
 * roles are created lazily and may be closed and recreated at will.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SecondaryKind = "debug" | "graph-view" | "terminal" | "floating";

export type SurfaceRole = "primary" | SecondaryKind;

export interface RolePolicy {
  /** Created at startup rather than on first request. */
  eager: boolean;
  /** Several live instances may coexist, each with its own SurfaceId. */
  multiInstance: boolean;
  /** A crash while ready spawns a replacement and resyncs it. */
  autoRecover: boolean;
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

export const ROLES: readonly SurfaceRole[] = [
  "primary",
  "debug",
  "graph-view",
  "terminal",
  "floating",
];

export const ROLE_POLICIES: Readonly<Record<SurfaceRole, RolePolicy>> = {
  primary: { eager: true, multiInstance: false, autoRecover: false },
  debug: { eager: false, multiInstance: false, autoRecover: true },
  "graph-view": { eager: false, multiInstance: false, autoRecover: true },
  terminal: { eager: false, multiInstance: false, autoRecover: true },
  floating: { eager: false, multiInstance: true, autoRecover: false },
};

/** Wire codes for the target-role header byte. 0 means "no explicit target". */
const ROLE_CODES: Readonly<Record<SurfaceRole, number>> = {
  primary: 1,
  debug: 2,
  "graph-view": 3,
  terminal: 4,
  floating: 5,
};

const ROLES_BY_CODE: ReadonlyMap<number, SurfaceRole> = new Map(
  ROLES.map((role) => [ROLE_CODES[role], role]),
);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isSurfaceRole(value: unknown): value is SurfaceRole {
  return typeof value === "string" && ROLES.some((role) => role === value);
}

export function isSecondary(role: SurfaceRole): role is SecondaryKind {
  return role !== "primary";
}

export function roleCode(role: SurfaceRole | null): number {
  return role === null ? 0 : ROLE_CODES[role];
}

/**
 * Resolve a header byte to a role.
 *
 * @returns `null` for code 0, `undefined` for an unassigned code.
 */
export function roleFromCode(code: number): SurfaceRole | null | undefined {
  if (code === 0) return null;
  return ROLES_BY_CODE.get(code);
}
