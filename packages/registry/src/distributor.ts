/**
 * Plinth Registry — Distributor
 *
 * Tracks which distribution (code module + optional initializer) produced
 * which live instance, and answers admission checks for those instances.
 *
 * All state lives in the Distributor's own account storage:
 *
 *   distributions             active DistributorsIds, insertion order
 *   component/<dId>           { id, initializer } of an active distribution
 *   instanceId/<address>      InstanceId assigned to an instance (absent = 0)
 *   distributionOf/<iid>      DistributorsId that produced an InstanceId
 *   numInstances              last InstanceId handed out
 *
 * instanceId/* and distributionOf/* are written once, at instantiation, and
 * never cleared. Removing a distribution only drops it from `distributions`,
 * which is what later admission checks consult.
 *
 * Mutating operations run inside ExecutionHost.transact(): a failure anywhere
 * (module, initializer, bookkeeping) discards every write and deployment the
 * operation made, and the error reaches the caller unchanged.
 *
 * Access control is left to subclasses through authorize(). The base class
 * accepts every caller.
 */

import {
  EMPTY_BYTES,
  ZERO_ADDRESS,
  addressWord,
  decodeAddress,
  encodeDescriptor,
  hasRevertPayload,
  isAddress,
  isBytes32,
  isLedgerRecord,
  sha256,
} from '@plinth/kernel';
import type {
  AccountStorage,
  Address,
  Bytes32,
  ExecutionHost,
  Fingerprint,
  Hex,
  InstantiationResult,
  Selector,
} from '@plinth/kernel';
import type { CodeIndex } from './code-index.js';
import {
  DistributionExists,
  DistributionNotFound,
  InitializerFailedWithoutReason,
  InitializerNotFound,
  InvalidInstance,
} from './errors.js';

export const DISTRIBUTOR_KIND = 'Distributor';

/** The account a call arrives from. */
export interface CallContext {
  readonly sender: Address;
}

export interface DistributionComponent {
  readonly id: Fingerprint;
  readonly initializer: Address | null;
}

export interface InstantiateResult extends InstantiationResult {
  readonly instanceId: number;
}

export type DistributorOperation = 'addDistribution' | 'removeDistribution' | 'instantiate';

const DISTRIBUTIONS = 'distributions';
const NUM_INSTANCES = 'numInstances';
const componentKey = (distributorsId: Bytes32): string => `component/${distributorsId}`;
const instanceKey = (instance: Address): string => `instanceId/${instance}`;
const distributionOfKey = (instanceId: number): string => `distributionOf/${instanceId}`;

/**
 * DistributorsId of an (id, initializer) pair:
 * sha256(id ‖ word(initializer ?? ZERO_ADDRESS)).
 */
export function calculateDistributorsId(id: Fingerprint, initializer: Address | null): Bytes32 {
  return sha256(id, addressWord(initializer ?? ZERO_ADDRESS));
}

export class Distributor {
  constructor(
    protected readonly host: ExecutionHost,
    readonly address: Address,
    readonly codeIndex: CodeIndex,
  ) {}

  // -------------------------------------------------------------------------
  // Registry mutation
  // -------------------------------------------------------------------------

  /**
   * Register a (code, initializer) pair as an instantiable distribution.
   * ZERO_ADDRESS as initializer means "no initializer".
   *
   * @throws {DistributionNotFound} `id` does not resolve in the CodeIndex
   * @throws {InitializerNotFound} `initializer` holds no initializer program
   * @throws {DistributionExists} the pair is already registered
   */
  addDistribution(ctx: CallContext, id: Fingerprint, initializer: Address | null): Bytes32 {
    this.authorize(ctx, 'addDistribution');
    const normalized = initializer === ZERO_ADDRESS ? null : initializer;
    return this.host.transact(() => {
      if (this.codeIndex.resolve(id) === null) {
        throw new DistributionNotFound(id);
      }
      if (normalized !== null && this.host.programAt(normalized)?.kind !== 'initializer') {
        throw new InitializerNotFound(normalized);
      }
      const distributorsId = calculateDistributorsId(id, normalized);
      const active = this.getDistributions();
      if (active.includes(distributorsId)) {
        throw new DistributionExists(distributorsId);
      }

      const storage = this.storage();
      storage.set(DISTRIBUTIONS, [...active, distributorsId]);
      storage.set(componentKey(distributorsId), { id, initializer: normalized });
      this.host.emit(this.address, {
        name: 'DistributionAdded',
        id,
        initializer: normalized,
        distributorsId,
      });
      return distributorsId;
    });
  }

  /**
   * Deactivate a distribution. Instances it produced keep their records but
   * no longer pass admission checks.
   *
   * @throws {DistributionNotFound} not currently active
   */
  removeDistribution(ctx: CallContext, distributorsId: Bytes32): void {
    this.authorize(ctx, 'removeDistribution');
    this.host.transact(() => {
      const active = this.getDistributions();
      if (!active.includes(distributorsId)) {
        throw new DistributionNotFound(distributorsId);
      }
      const storage = this.storage();
      storage.set(
        DISTRIBUTIONS,
        active.filter((d) => d !== distributorsId),
      );
      storage.delete(componentKey(distributorsId));
      this.host.emit(this.address, { name: 'DistributionRemoved', distributorsId });
    });
  }

  // -------------------------------------------------------------------------
  // Instantiation
  // -------------------------------------------------------------------------

  /**
   * Produce and record a new set of instances of an active distribution.
   *
   * The module runs as itself with the Distributor as sender. The initializer,
   * if any, runs with the Distributor's storage and the original caller as
   * sender. The InstanceId is taken only after both have returned, so a
   * reentrant instantiate() during either step gets its own id first and no
   * instance of this call is admitted before the records are written.
   *
   * @throws {DistributionNotFound} not active, or its code no longer resolves
   * @throws {InvalidInstance} the module returned no instances, or an address
   *   that is already recorded as an instance
   * @throws {InitializerFailedWithoutReason} the initializer failed with no payload;
   *   any other initializer failure is rethrown as-is
   */
  instantiate(ctx: CallContext, distributorsId: Bytes32, args: Hex): InstantiateResult {
    this.authorize(ctx, 'instantiate');
    return this.host.transact(() => {
      const component = this.getDistributionComponent(distributorsId);
      if (component === null) {
        throw new DistributionNotFound(distributorsId);
      }
      const moduleAddress = this.codeIndex.resolve(component.id);
      const program = moduleAddress === null ? undefined : this.host.programAt(moduleAddress);
      if (moduleAddress === null || program?.kind !== 'module') {
        throw new DistributionNotFound(component.id);
      }

      const produced = program.instantiate(this.host.context(moduleAddress, this.address), args);
      // The module may keep a handle on its array; records and the event use our own copy.
      const instances: ReadonlyArray<Address> = [...produced.instances];
      if (instances.length === 0) {
        throw new InvalidInstance(ZERO_ADDRESS);
      }

      if (component.initializer !== null) {
        this.runInitializer(ctx, component.initializer, instances, args);
      }

      const storage = this.storage();
      const instanceId = this.numInstances() + 1;
      storage.set(NUM_INSTANCES, instanceId);
      for (const instance of instances) {
        if (this.getInstanceId(instance) !== 0) {
          throw new InvalidInstance(instance);
        }
        storage.set(instanceKey(instance), instanceId);
      }
      storage.set(distributionOfKey(instanceId), distributorsId);

      this.host.emit(this.address, {
        name: 'Instantiated',
        distributorsId,
        instanceId,
        args,
        instances,
      });
      return {
        instances: [...instances],
        name: produced.name,
        version: produced.version,
        instanceId,
      };
    });
  }

  private runInitializer(
    ctx: CallContext,
    initializer: Address,
    instances: ReadonlyArray<Address>,
    args: Hex,
  ): void {
    const program = this.host.programAt(initializer);
    if (program?.kind !== 'initializer') {
      throw new InitializerNotFound(initializer);
    }
    try {
      program.initialize(this.host.context(this.address, ctx.sender), instances, args);
    } catch (err: unknown) {
      if (hasRevertPayload(err)) {
        throw err;
      }
      throw new InitializerFailedWithoutReason();
    }
  }

  // -------------------------------------------------------------------------
  // Admission hooks
  // -------------------------------------------------------------------------

  /**
   * Admit a call only if `maybeInstance` is a recorded instance of an active
   * distribution and shares its InstanceId with the target.
   *
   * The target is the address encoded in `config`, or the hook's own caller
   * when `config` is empty. Returns the instance's DistributorsId.
   *
   * @throws {InvalidInstance}
   */
  beforeCall(
    ctx: CallContext,
    config: Hex,
    selector: Selector,
    maybeInstance: Address,
    value: bigint,
    data: Hex,
  ): Bytes32 {
    const target = this.hookTarget(ctx, config);
    const instanceId = this.getInstanceId(maybeInstance);
    const distributorsId = this.distributionOf(instanceId);
    if (
      distributorsId !== null &&
      this.getInstanceId(target) === instanceId &&
      this.isActive(distributorsId)
    ) {
      return distributorsId;
    }
    throw new InvalidInstance(maybeInstance);
  }

  /**
   * Post-call check. Rejects only when the target and `maybeInstance` have
   * different InstanceIds while the distribution is still active. Unlike
   * beforeCall it does not require `maybeInstance` to be an instance at all.
   *
   * @throws {InvalidInstance}
   */
  afterCall(
    ctx: CallContext,
    config: Hex,
    selector: Selector,
    maybeInstance: Address,
    value: bigint,
    data: Hex,
    beforeCallResult: Bytes32,
  ): void {
    const target = this.hookTarget(ctx, config);
    const instanceId = this.getInstanceId(maybeInstance);
    const distributorsId = this.distributionOf(instanceId);
    if (
      this.getInstanceId(target) !== instanceId &&
      distributorsId !== null &&
      this.isActive(distributorsId)
    ) {
      throw new InvalidInstance(maybeInstance);
    }
  }

  private hookTarget(ctx: CallContext, config: Hex): Address {
    return config === EMPTY_BYTES ? ctx.sender : decodeAddress(config);
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  calculateDistributorId(id: Fingerprint, initializer: Address | null): Bytes32 {
    return calculateDistributorsId(id, initializer === ZERO_ADDRESS ? null : initializer);
  }

  getDistributions(): ReadonlyArray<Bytes32> {
    return this.storage().getStrings(DISTRIBUTIONS).filter(isBytes32);
  }

  isActive(distributorsId: Bytes32): boolean {
    return this.getDistributions().includes(distributorsId);
  }

  getDistributionComponent(distributorsId: Bytes32): DistributionComponent | null {
    const stored = this.storage().get(componentKey(distributorsId));
    if (!isLedgerRecord(stored)) return null;
    const { id, initializer } = stored;
    if (!isBytes32(id)) return null;
    return { id, initializer: isAddress(initializer) ? initializer : null };
  }

  /** InstanceId of `instance`, or 0 if it was never instantiated here. */
  getInstanceId(instance: Address): number {
    return this.storage().getNumber(instanceKey(instance));
  }

  /** DistributorsId that produced `instanceId`, kept after the distribution is removed. */
  distributionOf(instanceId: number): Bytes32 | null {
    if (instanceId === 0) return null;
    const stored = this.storage().getString(distributionOfKey(instanceId));
    return isBytes32(stored) ? stored : null;
  }

  numInstances(): number {
    return this.storage().getNumber(NUM_INSTANCES);
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  /** Access-control hook for mutating operations. Throws to deny. */
  protected authorize(_ctx: CallContext, _operation: DistributorOperation): void {}

  protected storage(): AccountStorage {
    return this.host.storage(this.address);
  }
}

/** Descriptor bytecode shared by every Distributor bound to `codeIndex`. */
export function distributorBytecode(kind: string, codeIndex: CodeIndex): Hex {
  return encodeDescriptor(kind, { codeIndex: codeIndex.address });
}

/** Deploy an open Distributor: every caller may add, remove and instantiate. */
export function deployDistributor(host: ExecutionHost, deployer: Address, codeIndex: CodeIndex): Distributor {
  const address = host.deploy(
    { kind: 'contract', bytecode: distributorBytecode(DISTRIBUTOR_KIND, codeIndex) },
    deployer,
  );
  return new Distributor(host, address, codeIndex);
}
