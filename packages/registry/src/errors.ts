/**
 * Plinth Registry — Errors
 *
 * Named reverts raised by CodeIndex, Distributor and OwnableDistributor.
 * Each carries its arguments both as typed fields and in `args`, and renders
 * as `Name(arg, ...)`.
 */

import { RevertError } from '@plinth/kernel';
import type { Address, Bytes32, Fingerprint } from '@plinth/kernel';

/** The referenced code or distribution is not registered or no longer resolves. */
export class DistributionNotFound extends RevertError {
  constructor(readonly id: Bytes32) {
    super('DistributionNotFound', [id]);
  }
}

/** The configured initializer address holds no initializer program. */
export class InitializerNotFound extends RevertError {
  constructor(readonly initializer: Address) {
    super('InitializerNotFound', [initializer]);
  }
}

export class DistributionExists extends RevertError {
  constructor(readonly distributorsId: Bytes32) {
    super('DistributionExists', [distributorsId]);
  }
}

/** Admission check failed, or a module returned an unusable instance address. */
export class InvalidInstance extends RevertError {
  constructor(readonly instance: Address) {
    super('InvalidInstance', [instance]);
  }
}

export class InitializerFailedWithoutReason extends RevertError {
  constructor() {
    super('InitializerFailedWithoutReason');
  }
}

/** A different container is already registered for this fingerprint. */
export class AlreadyExists extends RevertError {
  constructor(
    readonly fingerprint: Fingerprint,
    readonly existing: Address,
  ) {
    super('AlreadyExists', [fingerprint, existing]);
  }
}

export class OwnableUnauthorizedAccount extends RevertError {
  constructor(readonly account: Address) {
    super('OwnableUnauthorizedAccount', [account]);
  }
}

export class OwnableInvalidOwner extends RevertError {
  constructor(readonly owner: Address) {
    super('OwnableInvalidOwner', [owner]);
  }
}
