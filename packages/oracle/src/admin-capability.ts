import { randomUUID } from 'node:crypto';

const MINT_KEY: unique symbol = Symbol('admin-capability-mint');
const minted = new WeakSet<AdminCapability>();

/**
 * Authority to reconfigure one oracle's expected PCRs.
 *
 * Minted only when its oracle is created; a structural copy or a hand-built
 * object with the same ids is not a capability.
 */
export class AdminCapability {
  readonly id: string;
  readonly oracleId: string;

  constructor(mintKey: typeof MINT_KEY, oracleId: string) {
    if (mintKey !== MINT_KEY) {
      throw new Error('AdminCapability can only be minted by its oracle');
    }
    this.id = randomUUID();
    this.oracleId = oracleId;
    minted.add(this);
    Object.freeze(this);
  }

  /** True for capabilities minted here, never for copies */
  static isGenuine(value: unknown): value is AdminCapability {
    return value instanceof AdminCapability && minted.has(value);
  }
}

/** Package-internal: not re-exported from the package entry point */
export function mintAdminCapability(oracleId: string): AdminCapability {
  return new AdminCapability(MINT_KEY, oracleId);
}
