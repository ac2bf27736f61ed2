/**
 * runtime.ts — one CLI invocation's view of a Plinth home.
 *
 * openRuntime() resolves the home and operator, reloads the ledger and binds
 * the CodeIndex and Distributor recorded in deployment.json. A home that was
 * never used is initialized first (genesis): a CodeIndex and an
 * OwnableDistributor owned by the current operator, both deployed by the
 * operator. The genesis ledger is saved immediately, so a failing first
 * command still leaves a consistent home behind.
 *
 * Commands call save() after they succeed. A failed operation has already
 * been reverted by the host, so there is nothing to roll back on disk.
 */

import { ExecutionHost } from '@plinth/kernel'
import type { Address } from '@plinth/kernel'
import { CodeIndex, OwnableDistributor, deployCodeIndex, deployOwnableDistributor } from '@plinth/registry'
import {
  FileEventSink,
  FileStateIO,
  loadDeployment,
  loadLedger,
  resolveOperator,
  resolvePlinthHome,
  saveDeployment,
  saveLedger,
} from '@plinth/runtime-host'
import type { Deployment, StateIO } from '@plinth/runtime-host'
import { firstPartyCatalog } from './catalog.js'

export interface GlobalOptions {
  readonly home?: string | undefined
  readonly as?: string | undefined
}

export interface Runtime {
  readonly home: string
  readonly io: StateIO
  readonly host: ExecutionHost
  readonly operator: Address
  readonly deployment: Deployment
  readonly codeIndex: CodeIndex
  readonly distributor: OwnableDistributor
  /** True if this invocation initialized the home. */
  readonly genesis: boolean
  save(): void
}

export function openRuntime(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): Runtime {
  const home = resolvePlinthHome({ home: options.home, env })
  const operator = resolveOperator({ as: options.as, env })
  const io = new FileStateIO(home)
  const host = new ExecutionHost({
    ledger: loadLedger(io),
    resolver: firstPartyCatalog,
    sink: new FileEventSink(io),
  })

  const existing = loadDeployment(io)
  const deployment = existing ?? genesis(host, operator)
  if (existing === undefined) {
    saveLedger(io, host.ledger)
    saveDeployment(io, deployment)
  }

  const codeIndex = new CodeIndex(host, deployment.codeIndex)
  return {
    home,
    io,
    host,
    operator,
    deployment,
    codeIndex,
    distributor: new OwnableDistributor(host, deployment.distributor, codeIndex),
    genesis: existing === undefined,
    save: () => saveLedger(io, host.ledger),
  }
}

function genesis(host: ExecutionHost, operator: Address): Deployment {
  return host.transact(() => {
    const codeIndex = deployCodeIndex(host, operator)
    const distributor = deployOwnableDistributor(host, operator, codeIndex, operator)
    return { codeIndex: codeIndex.address, distributor: distributor.address, owner: operator }
  })
}
