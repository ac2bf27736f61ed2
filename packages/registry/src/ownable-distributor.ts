/**
 * Plinth Registry — OwnableDistributor
 *
 * A Distributor whose mutating operations (add, remove, instantiate) are
 * restricted to a single owner address. Admission hooks and reads stay open.
 *
 * The owner lives in the Distributor's storage under `owner`, so ownership
 * survives a ledger reload like every other piece of registry state.
 */

import { ZERO_ADDRESS, isAddress } from '@plinth/kernel';
import type { Address, ExecutionHost } from '@plinth/kernel';
import type { CodeIndex } from './code-index.js';
import { Distributor, distributorBytecode } from './distributor.js';
import type { CallContext, DistributorOperation } from './distributor.js';
import { OwnableInvalidOwner, OwnableUnauthorizedAccount } from './errors.js';

export const OWNABLE_DISTRIBUTOR_KIND = 'OwnableDistributor';

const OWNER = 'owner';

export class OwnableDistributor extends Distributor {
  /** Current owner. ZERO_ADDRESS if the account was never initialized. */
  owner(): Address {
    const stored = this.storage().getString(OWNER);
    return isAddress(stored) ? stored : ZERO_ADDRESS;
  }

  /**
   * Hand ownership to `newOwner`. Only the current owner may call this.
   *
   * @throws {OwnableUnauthorizedAccount}
   * @throws {OwnableInvalidOwner} `newOwner` is ZERO_ADDRESS
   */
  transferOwnership(ctx: CallContext, newOwner: Address): void {
    this.checkOwner(ctx);
    if (newOwner === ZERO_ADDRESS) {
      throw new OwnableInvalidOwner(ZERO_ADDRESS);
    }
    this.host.transact(() => this.setOwner(newOwner));
  }

  private setOwner(newOwner: Address): void {
    writeOwner(this.host, this.address, this.owner(), newOwner);
  }

  protected override authorize(ctx: CallContext, _operation: DistributorOperation): void {
    this.checkOwner(ctx);
  }

  private checkOwner(ctx: CallContext): void {
    if (ctx.sender !== this.owner()) {
      throw new OwnableUnauthorizedAccount(ctx.sender);
    }
  }
}

/**
 * Deploy an OwnableDistributor owned by `owner`.
 *
 * @throws {OwnableInvalidOwner} `owner` is ZERO_ADDRESS
 */
export function deployOwnableDistributor(
  host: ExecutionHost,
  deployer: Address,
  codeIndex: CodeIndex,
  owner: Address,
): OwnableDistributor {
  if (owner === ZERO_ADDRESS) {
    throw new OwnableInvalidOwner(ZERO_ADDRESS);
  }
  return host.transact(() => {
    const address = host.deploy(
      { kind: 'contract', bytecode: distributorBytecode(OWNABLE_DISTRIBUTOR_KIND, codeIndex) },
      deployer,
    );
    writeOwner(host, address, ZERO_ADDRESS, owner);
    return new OwnableDistributor(host, address, codeIndex);
  });
}

function writeOwner(host: ExecutionHost, distributor: Address, previousOwner: Address, newOwner: Address): void {
  host.storage(distributor).set(OWNER, newOwner);
  host.emit(distributor, { name: 'OwnershipTransferred', previousOwner, newOwner });
}
