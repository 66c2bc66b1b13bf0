import type { FlagIdentifier } from './flag-identifier.js';

/**
 * Operations of a single-entity permission bitmask. Lets an entity type embed
 * a store instead of extending `PermissionStore`.
 */
export interface IPermissionStore {
  readonly bitMask: bigint;

  hasPermission(flag: FlagIdentifier, ...flags: FlagIdentifier[]): bigint;
  hasAllPermissions(flag: FlagIdentifier, ...flags: FlagIdentifier[]): boolean;
  getPermissions(): bigint;
  setPermission(flag: FlagIdentifier): this;
  setPermissions(flags: Iterable<FlagIdentifier>): this;
  unsetPermission(flag: FlagIdentifier): this;
  unsetPermissions(flags: Iterable<FlagIdentifier>): this;
}
