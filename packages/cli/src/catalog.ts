/**
 * catalog.ts — the first-party program catalog.
 *
 * A persisted ledger holds bytecode only. The catalog rebuilds behaviour for
 * every program a first-party module can deploy; anything else (the CodeIndex
 * and Distributor descriptors included) comes back as a plain contract, which
 * carries identity but cannot be instantiated or used as an initializer.
 */

import type { Hex, Program, ProgramResolver } from '@plinth/kernel'
import { cloneDistributionResolver } from '@plinth/module-clone-distribution'
import { metadataInitializerResolver } from '@plinth/module-metadata-initializer'

const FIRST_PARTY: ReadonlyArray<ProgramResolver> = [
  cloneDistributionResolver,
  metadataInitializerResolver,
]

export const firstPartyCatalog: ProgramResolver = {
  resolve(bytecode: Hex): Program {
    for (const resolver of FIRST_PARTY) {
      const program = resolver.resolve(bytecode)
      if (program !== undefined) return program
    }
    return { kind: 'contract', bytecode }
  },
}
