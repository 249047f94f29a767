export * from './keys.js';
export * from './attestation.js';
export * from './oracle.js';
export * from './events.js';
export * from './errors.js';
export * from './policy.js';
