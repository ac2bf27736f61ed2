/**
 * Plinth Registry — CodeIndex
 *
 * Global, append-only index from a bytecode fingerprint to the one canonical
 * address holding that bytecode.
 *
 * - resolve() is a pure read and is safe inside any hook or read-only path
 * - register() is permissionless and insert-if-absent: one fingerprint maps
 *   to at most one address, and nothing is ever removed
 */

import { CodeNotFound, encodeDescriptor, isAddress } from '@plinth/kernel';
import type { AccountStorage, Address, ExecutionHost, Fingerprint } from '@plinth/kernel';
import { AlreadyExists } from './errors.js';

export const CODE_INDEX_KIND = 'CodeIndex';

const entryKey = (fingerprint: Fingerprint): string => `code/${fingerprint}`;

export class CodeIndex {
  constructor(
    private readonly host: ExecutionHost,
    readonly address: Address,
  ) {}

  /** Canonical location of `fingerprint`, or null if it was never registered. */
  resolve(fingerprint: Fingerprint): Address | null {
    const stored = this.storage().getString(entryKey(fingerprint));
    return isAddress(stored) ? stored : null;
  }

  /**
   * Index the code deployed at `container` under its fingerprint.
   *
   * Registering the same container again returns the fingerprint without
   * emitting. A different container holding identical code is rejected.
   *
   * @throws {CodeNotFound} `container` has no code
   * @throws {AlreadyExists} the fingerprint already points elsewhere
   */
  register(container: Address): Fingerprint {
    return this.host.transact(() => {
      const fingerprint = this.host.fingerprintAt(container);
      if (fingerprint === null) {
        throw new CodeNotFound(container);
      }
      const existing = this.resolve(fingerprint);
      if (existing === container) {
        return fingerprint;
      }
      if (existing !== null) {
        throw new AlreadyExists(fingerprint, existing);
      }
      this.storage().set(entryKey(fingerprint), container);
      this.host.emit(this.address, { name: 'Registered', container, fingerprint });
      return fingerprint;
    });
  }

  private storage(): AccountStorage {
    return this.host.storage(this.address);
  }
}

/** Deploy a fresh, empty CodeIndex on behalf of `deployer`. */
export function deployCodeIndex(host: ExecutionHost, deployer: Address): CodeIndex {
  const address = host.deploy(
    { kind: 'contract', bytecode: encodeDescriptor(CODE_INDEX_KIND, null) },
    deployer,
  );
  return new CodeIndex(host, address);
}
