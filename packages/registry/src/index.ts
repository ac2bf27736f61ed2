/**
 * @plinth/registry
 *
 * The distribution registry built on @plinth/kernel:
 *
 * - CodeIndex: fingerprint → canonical code location, append-only
 * - Distributor: distributions, instantiation and admission hooks
 * - OwnableDistributor: Distributor with owner-gated mutation
 * - guardedCall: beforeCall / fn / afterCall in one transaction
 *
 * Like the kernel, this package performs no I/O.
 */

export { CODE_INDEX_KIND, CodeIndex, deployCodeIndex } from './code-index.js';
export type {
  CallContext,
  DistributionComponent,
  DistributorOperation,
  InstantiateResult,
} from './distributor.js';
export {
  DISTRIBUTOR_KIND,
  Distributor,
  calculateDistributorsId,
  deployDistributor,
  distributorBytecode,
} from './distributor.js';
export {
  OWNABLE_DISTRIBUTOR_KIND,
  OwnableDistributor,
  deployOwnableDistributor,
} from './ownable-distributor.js';
export type { AdmissionHooks, GuardedCall } from './admission-guard.js';
export { guardedCall } from './admission-guard.js';
export {
  AlreadyExists,
  DistributionExists,
  DistributionNotFound,
  InitializerFailedWithoutReason,
  InitializerNotFound,
  InvalidInstance,
  OwnableInvalidOwner,
  OwnableUnauthorizedAccount,
} from './errors.js';
