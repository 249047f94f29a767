export type OracleErrorCode =
  | 'InvalidPublicKeyLength'
  | 'InvalidCompressedPrefix'
  | 'InvalidUncompressedPrefix'
  | 'NoPublicKey'
  | 'ValueOutOfRange'
  | 'AlreadyRegistered'
  | 'NotRegistered'
  | 'PcrsNotInitialized'
  | 'DuplicateTimestamp'
  | 'InvalidPCRs'
  | 'InvalidSignature'
  | 'StalePrice'
  | 'InvalidCapability'
  | 'NoPriceAvailable'
  | 'NoPriceAtTimestamp';

export type ErrorCategory =
  | 'input'
  | 'state'
  | 'trust'
  | 'freshness'
  | 'capability'
  | 'not-found';

const CATEGORIES: Readonly<Record<OracleErrorCode, ErrorCategory>> = {
  InvalidPublicKeyLength: 'input',
  InvalidCompressedPrefix: 'input',
  InvalidUncompressedPrefix: 'input',
  NoPublicKey: 'input',
  ValueOutOfRange: 'input',
  AlreadyRegistered: 'state',
  NotRegistered: 'state',
  PcrsNotInitialized: 'state',
  DuplicateTimestamp: 'state',
  InvalidPCRs: 'trust',
  InvalidSignature: 'trust',
  StalePrice: 'freshness',
  InvalidCapability: 'capability',
  NoPriceAvailable: 'not-found',
  NoPriceAtTimestamp: 'not-found',
};

function errorCategory(code: OracleErrorCode): ErrorCategory {
  return CATEGORIES[code];
}

/**
 * The single failure reason of a registry or oracle call.
 * Thrown before any state is touched.
 */
export class OracleError extends Error {
  readonly code: OracleErrorCode;

  constructor(code: OracleErrorCode, message?: string) {
    super(message ?? code);
    this.name = 'OracleError';
    this.code = code;
  }

  get category(): ErrorCategory {
    return errorCategory(this.code);
  }
}

export function isOracleError(err: unknown, code?: OracleErrorCode): err is OracleError {
  return err instanceof OracleError && (code === undefined || err.code === code);
}
