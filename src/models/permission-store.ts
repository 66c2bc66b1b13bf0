import { Gibbon } from '@icazemier/gibbons';
import type {
  FlagIdentifier,
  IntegerWidth,
  IPermissionStore,
  MaskLike,
  PermissionStoreConfig,
} from '../interfaces/index.js';
import { Utils } from '../utils.js';

/**
 * Options accepted next to the flag space when constructing a store.
 */
export interface PermissionStoreOptions {
  /** Width of the mask in bits (default: 64) */
  integerWidth?: IntegerWidth;
}

/**
 * Stores the permissions of a single entity in one bitmask.
 *
 * Flag identifiers are mapped onto bits with `flag mod flagSpace`, so
 * identifiers that are congruent modulo the flag space share a bit. With the
 * default flag space of 10, flag `10` occupies bit 0, the same bit as flag `0`.
 *
 * Extend it per entity type, or embed it and depend on `IPermissionStore`.
 *
 * @example
 * ```typescript
 * class UserPermissions extends PermissionStore {}
 *
 * const permissions = new UserPermissions()
 *   .setPermissions([1, 2, 7])
 *   .unsetPermission(2);
 *
 * permissions.hasPermission(1); // 2n
 * permissions.hasPermission(2); // 0n
 * permissions.hasPermission(2, 7); // 128n
 * ```
 */
export class PermissionStore implements IPermissionStore {
  protected mask = 0n;
  protected readonly flagSpace: bigint;
  readonly integerWidth: IntegerWidth;

  /**
   * @param flagSpace - Number of addressable flag slots (default: 10). Values
   *   above `2^integerWidth - 1` are clamped to it, values below 1 to 1.
   * @param options - Store options
   * @throws TypeError when `flagSpace` is a string that is not numeric
   */
  constructor(
    flagSpace: FlagIdentifier = 10,
    options: PermissionStoreOptions = {}
  ) {
    const { integerWidth = 64 } = options;
    this.integerWidth = integerWidth;
    this.flagSpace = Utils.clampFlagSpace(flagSpace, integerWidth);
  }

  /**
   * Creates a store from a loaded configuration.
   *
   * @example
   * ```typescript
   * const config = await ConfigLoader.load();
   * const permissions = PermissionStore.fromConfig(config);
   * ```
   */
  static fromConfig(config: PermissionStoreConfig): PermissionStore {
    return new PermissionStore(config.flagSpace, {
      integerWidth: config.integerWidth,
    });
  }

  /**
   * The current bitmask, bit `n` being flag index `n`.
   */
  get bitMask(): bigint {
    return this.mask;
  }

  /**
   * Resolves the bit index a flag identifier maps to.
   *
   * @throws TypeError when `flag` is not numeric
   */
  resolveIndex(flag: FlagIdentifier): bigint {
    return Utils.flagIndex(flag, this.flagSpace);
  }

  protected flagBit(flag: FlagIdentifier): bigint {
    return Utils.flagBit(this.resolveIndex(flag), this.integerWidth);
  }

  protected checkMask(flags: Array<FlagIdentifier>): bigint {
    return flags.reduce<bigint>(
      (checkMask, flag) => checkMask | this.flagBit(flag),
      0n
    );
  }

  /**
   * Checks for the given permission(s). The result is nonzero when at least
   * one of them is set.
   *
   * @returns The set bits among the requested ones
   *
   * @example
   * ```typescript
   * if (permissions.hasPermission(1, 2, 7)) {
   *   // any of 1, 2 or 7
   * }
   * ```
   */
  hasPermission(flag: FlagIdentifier, ...flags: FlagIdentifier[]): bigint {
    return this.mask & this.checkMask([flag, ...flags]);
  }

  /**
   * Checks that every given permission is set. Flags whose bit lies beyond
   * the integer width have no bit and never count as set.
   */
  hasAllPermissions(
    flag: FlagIdentifier,
    ...flags: FlagIdentifier[]
  ): boolean {
    return [flag, ...flags].every((each) => {
      const bit = this.flagBit(each);
      return bit !== 0n && (this.mask & bit) === bit;
    });
  }

  /**
   * Returns the configured flag space.
   *
   * Note: despite its name this does not return the bitmask, use `bitMask`
   * for that.
   */
  getPermissions(): bigint {
    return this.flagSpace;
  }

  /**
   * Turns on the given permission with a bitwise OR.
   */
  setPermission(flag: FlagIdentifier): this {
    this.mask |= this.flagBit(flag);
    return this;
  }

  /**
   * Turns on each given permission, in order.
   */
  setPermissions(flags: Iterable<FlagIdentifier>): this {
    for (const flag of flags) {
      this.setPermission(flag);
    }
    return this;
  }

  /**
   * Turns off the given permission by ANDing the complement of its bit.
   */
  unsetPermission(flag: FlagIdentifier): this {
    this.mask &= ~this.flagBit(flag);
    return this;
  }

  /**
   * Turns off each given permission, in order.
   */
  unsetPermissions(flags: Iterable<FlagIdentifier>): this {
    for (const flag of flags) {
      this.unsetPermission(flag);
    }
    return this;
  }

  /**
   * Lists the indexes of all set bits, ascending.
   */
  getActiveIndexes(): Array<number> {
    const indexes: Array<number> = [];
    for (let index = 0; index < this.integerWidth; index++) {
      if ((this.mask >> BigInt(index)) & 1n) {
        indexes.push(index);
      }
    }
    return indexes;
  }

  /**
   * Converts the mask to a Gibbon of `integerWidth / 8` bytes, for storage
   * next to the entity it belongs to. Bit index `n` becomes position `n + 1`.
   *
   * @example
   * ```typescript
   * const permissions = new PermissionStore().setPermissions([0, 4]);
   *
   * permissions.toGibbon().getPositionsArray(); // returns [1, 5]
   * ```
   */
  toGibbon(): Gibbon {
    return Gibbon.create(this.integerWidth / 8).setAllFromPositions(
      this.getActiveIndexes().map((index) => index + 1)
    );
  }

  /**
   * Replaces the mask with the given one. Bits outside the addressable range
   * (`min(flagSpace, integerWidth)` low bits) are dropped.
   *
   * @example
   * ```typescript
   * // A Buffer with 1 byte:
   * const buff = Buffer.from([0x82]); // 1000 0010 (bin)
   *
   * new PermissionStore().restore(buff).getActiveIndexes(); // returns [1, 7]
   * ```
   *
   * @param mask - Raw mask, Gibbon or encoded Gibbon
   * @returns The store, for chaining
   * @throws TypeError when `mask` is not a bigint, Gibbon or Buffer
   */
  restore(mask: MaskLike): this {
    this.mask =
      this.ensureMask(mask) &
      Utils.addressableMask(this.flagSpace, this.integerWidth);
    return this;
  }

  protected ensureMask(mask: MaskLike): bigint {
    if (typeof mask === 'bigint') {
      return BigInt.asUintN(this.integerWidth, mask);
    }
    if (mask instanceof Gibbon) {
      return this.maskFromPositions(mask.getPositionsArray());
    }
    if (Buffer.isBuffer(mask)) {
      return this.maskFromPositions(Gibbon.decode(mask).getPositionsArray());
    }
    throw new TypeError('`bigint`, `Gibbon` or `Buffer` expected');
  }

  private maskFromPositions(positions: Array<number>): bigint {
    return positions
      .filter((position) => position >= 1 && position <= this.integerWidth)
      .reduce<bigint>(
        (mask, position) => mask | (1n << BigInt(position - 1)),
        0n
      );
  }
}
