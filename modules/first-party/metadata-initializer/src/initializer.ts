/**
 * Plinth First-Party Metadata Initializer
 *
 * Stores the instantiation args as metadata for every new instance. Runs with
 * the caller's storage (for a Distributor, the Distributor's own), so the
 * records land at `metadata/<instance>` in the caller's namespace.
 */

import { EMPTY_BYTES, RevertError, encodeDescriptor, isHex } from '@plinth/kernel';
import type { AccountStorage, Address, Hex, Initializer, Program, ProgramResolver } from '@plinth/kernel';

export const METADATA_INITIALIZER_KIND = 'MetadataInitializer';

export class MetadataRequired extends RevertError {
  constructor() {
    super('MetadataRequired');
  }
}

const metadataKey = (instance: Address): string => `metadata/${instance}`;

export const METADATA_INITIALIZER_BYTECODE: Hex = encodeDescriptor(METADATA_INITIALIZER_KIND, null);

export function metadataInitializer(): Initializer {
  return {
    kind: 'initializer',
    bytecode: METADATA_INITIALIZER_BYTECODE,
    initialize(ctx, instances, args) {
      if (args === EMPTY_BYTES) {
        throw new MetadataRequired();
      }
      for (const instance of instances) {
        ctx.storage.set(metadataKey(instance), args);
      }
    },
  };
}

/** Metadata recorded for `instance` in `storage`, if any. */
export function readMetadata(storage: AccountStorage, instance: Address): Hex | undefined {
  const value = storage.getString(metadataKey(instance));
  return isHex(value) ? value : undefined;
}

export const metadataInitializerResolver: ProgramResolver = {
  resolve(bytecode): Program | undefined {
    return bytecode === METADATA_INITIALIZER_BYTECODE ? metadataInitializer() : undefined;
  },
};
