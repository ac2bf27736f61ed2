/**
 * Plinth Registry — Instantiation Tests
 *
 * INST-U1: instantiate records every instance under one new InstanceId and emits Instantiated
 *          (the recorded list is a copy the module cannot change afterwards)
 * INST-U2: inactive or unresolvable distributions are rejected
 * INST-U3: a failing initializer reverts everything, including module deployments
 * INST-U4: initializer errors bubble unchanged unless they carry no payload
 * INST-U5: the initializer runs with the Distributor's storage and the caller as sender
 * INST-U6: empty or already-recorded instance lists are rejected
 * INST-U7: reentrant instantiation sees the pre-instantiation registry
 * INST-E2E: add → instantiate → remove → admission fails
 */

import { describe, it, expect } from 'vitest';
import { RevertError, ZERO_ADDRESS, deriveAddress } from '@plinth/kernel';
import type { Address, Bytes32, Hex } from '@plinth/kernel';
import {
  DistributionNotFound,
  InitializerFailedWithoutReason,
  InvalidInstance,
} from '../src/index.js';
import type { Fixture } from './fixtures.js';
import { OPERATOR, SELECTOR, STRANGER, addModule, setup, testInitializer, testModule } from './fixtures.js';

const op = { sender: OPERATOR };
const ARGS: Hex = '0xc0ffee';

function withInitializer(
  fixture: Fixture,
  initialize: Parameters<typeof testInitializer>[1],
): Bytes32 {
  const initializer = fixture.host.deploy(testInitializer('init', initialize), OPERATOR);
  return fixture.distributor.addDistribution(op, fixture.moduleId, initializer);
}

// ---------------------------------------------------------------------------
// INST-U1
// ---------------------------------------------------------------------------

describe('INST-U1: successful instantiation', () => {
  it('returns the module result plus the assigned InstanceId', () => {
    const { distributor, moduleId, moduleAddress } = setup();
    const distributorsId = distributor.addDistribution(op, moduleId, null);

    const result = distributor.instantiate(op, distributorsId, ARGS);

    expect(result).toEqual({
      instances: [deriveAddress(moduleAddress, 0)],
      name: 'alpha',
      version: { major: 1, minor: 0, patch: 0 },
      instanceId: 1,
    });
  });

  it('all instances of one call share an InstanceId; the next call gets the next id', () => {
    const fixture = setup(testModule('pair', { count: 2 }));
    const distributorsId = fixture.distributor.addDistribution(op, fixture.moduleId, null);

    const first = fixture.distributor.instantiate(op, distributorsId, ARGS);
    const second = fixture.distributor.instantiate(op, distributorsId, ARGS);

    expect(first.instances).toHaveLength(2);
    for (const instance of first.instances) {
      expect(fixture.distributor.getInstanceId(instance)).toBe(1);
    }
    for (const instance of second.instances) {
      expect(fixture.distributor.getInstanceId(instance)).toBe(2);
    }
    expect(fixture.distributor.distributionOf(1)).toBe(distributorsId);
    expect(fixture.distributor.distributionOf(2)).toBe(distributorsId);
    expect(fixture.distributor.numInstances()).toBe(2);
  });

  it('emits Instantiated with the id, instance id, args and instances', () => {
    const { host, distributor, moduleId } = setup();
    const distributorsId = distributor.addDistribution(op, moduleId, null);
    const { instances } = distributor.instantiate(op, distributorsId, ARGS);

    expect(host.logs({ name: 'Instantiated' }).map((r) => r.event)).toEqual([
      { name: 'Instantiated', distributorsId, instanceId: 1, args: ARGS, instances },
    ]);
  });

  it('the recorded instance list is detached from the array the module returned', () => {
    const kept: Address[] = [];
    const fixture = setup(
      testModule('retains', {
        instances: (ctx) => {
          kept.push(ctx.deploy({ kind: 'contract', bytecode: '0x6001' }));
          return kept;
        },
      }),
    );
    const distributorsId = fixture.distributor.addDistribution(op, fixture.moduleId, null);
    const result = fixture.distributor.instantiate(op, distributorsId, ARGS);
    const [instance] = kept;

    kept.push(STRANGER);

    expect(result.instances).toEqual([instance]);
    const [record] = fixture.host.logs({ name: 'Instantiated' });
    expect(record?.event).toEqual({ name: 'Instantiated', distributorsId, instanceId: 1, args: ARGS, instances: [instance] });
    expect(fixture.distributor.getInstanceId(STRANGER)).toBe(0);
  });

  it('addresses that were never instantiated read as InstanceId 0', () => {
    const { distributor } = setup();
    expect(distributor.getInstanceId(STRANGER)).toBe(0);
    expect(distributor.distributionOf(0)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// INST-U2
// ---------------------------------------------------------------------------

describe('INST-U2: preconditions', () => {
  it('rejects an id that was never added', () => {
    const { distributor, moduleId } = setup();
    const distributorsId = distributor.calculateDistributorId(moduleId, null);
    expect(() => distributor.instantiate(op, distributorsId, ARGS)).toThrow(new DistributionNotFound(distributorsId));
  });

  it('rejects a removed distribution', () => {
    const { distributor, moduleId } = setup();
    const distributorsId = distributor.addDistribution(op, moduleId, null);
    distributor.removeDistribution(op, distributorsId);
    expect(() => distributor.instantiate(op, distributorsId, ARGS)).toThrow(DistributionNotFound);
  });

  it('rejects code that resolves to something other than a module', () => {
    const fixture = setup();
    const initializerId = fixture.codeIndex.register(
      fixture.host.deploy(testInitializer('not-a-module', () => undefined), OPERATOR),
    );
    const distributorsId = fixture.distributor.addDistribution(op, initializerId, null);
    expect(() => fixture.distributor.instantiate(op, distributorsId, ARGS)).toThrow(
      new DistributionNotFound(initializerId),
    );
  });
});

// ---------------------------------------------------------------------------
// INST-U3 / INST-U4
// ---------------------------------------------------------------------------

class Refused extends RevertError {
  constructor() {
    super('Refused', ['no']);
  }
}

describe('INST-U3: atomic instantiation', () => {
  it('leaves no instance record, counter change, event or deployment behind', () => {
    const fixture = setup();
    const distributorsId = withInitializer(fixture, (ctx) => {
      ctx.storage.set('partial', true);
      throw new Refused();
    });
    const logsBefore = fixture.host.logs().length;

    expect(() => fixture.distributor.instantiate(op, distributorsId, ARGS)).toThrow(Refused);

    const wouldBe = deriveAddress(fixture.moduleAddress, 0);
    expect(fixture.host.codeAt(wouldBe)).toBeNull();
    expect(fixture.host.nonceOf(fixture.moduleAddress)).toBe(0);
    expect(fixture.distributor.getInstanceId(wouldBe)).toBe(0);
    expect(fixture.distributor.numInstances()).toBe(0);
    expect(fixture.distributor.distributionOf(1)).toBeNull();
    expect(fixture.host.storage(fixture.distributor.address).has('partial')).toBe(false);
    expect(fixture.host.logs()).toHaveLength(logsBefore);
    expect(fixture.distributor.isActive(distributorsId)).toBe(true);
  });
});

describe('INST-U4: initializer error propagation', () => {
  it('rethrows a revert as the same object', () => {
    const fixture = setup();
    const refused = new Refused();
    const distributorsId = withInitializer(fixture, () => {
      throw refused;
    });

    let caught: unknown;
    try {
      fixture.distributor.instantiate(op, distributorsId, ARGS);
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBe(refused);
  });

  it('rethrows a plain error with a message unchanged', () => {
    const fixture = setup();
    const distributorsId = withInitializer(fixture, () => {
      throw new Error('bad metadata');
    });
    expect(() => fixture.distributor.instantiate(op, distributorsId, ARGS)).toThrow('bad metadata');
  });

  it('substitutes InitializerFailedWithoutReason for an empty error', () => {
    const fixture = setup();
    const distributorsId = withInitializer(fixture, () => {
      throw new Error();
    });
    expect(() => fixture.distributor.instantiate(op, distributorsId, ARGS)).toThrow(
      new InitializerFailedWithoutReason(),
    );
  });

  it('substitutes InitializerFailedWithoutReason for a thrown undefined', () => {
    const fixture = setup();
    const distributorsId = withInitializer(fixture, () => {
      throw undefined;
    });
    expect(() => fixture.distributor.instantiate(op, distributorsId, ARGS)).toThrow(
      'InitializerFailedWithoutReason()',
    );
  });
});

// ---------------------------------------------------------------------------
// INST-U5
// ---------------------------------------------------------------------------

describe('INST-U5: delegated initializer context', () => {
  it('writes land in the Distributor storage and the sender is the original caller', () => {
    const fixture = setup();
    const seen: { self?: Address; sender?: Address; instances?: ReadonlyArray<Address>; args?: Hex } = {};
    const distributorsId = withInitializer(fixture, (ctx, instances, args) => {
      seen.self = ctx.self;
      seen.sender = ctx.sender;
      seen.instances = instances;
      seen.args = args;
      ctx.storage.set('configured', instances.length);
    });

    const { instances } = fixture.distributor.instantiate(op, distributorsId, ARGS);

    expect(seen).toEqual({ self: fixture.distributor.address, sender: OPERATOR, instances, args: ARGS });
    expect(fixture.host.storage(fixture.distributor.address).get('configured')).toBe(1);
  });

  it('the module runs as itself with the Distributor as sender', () => {
    const seen: Address[] = [];
    const fixture = setup(
      testModule('observed', {
        before: (ctx) => {
          seen.push(ctx.self, ctx.sender);
        },
      }),
    );
    const distributorsId = fixture.distributor.addDistribution(op, fixture.moduleId, null);
    fixture.distributor.instantiate(op, distributorsId, ARGS);

    expect(seen).toEqual([fixture.moduleAddress, fixture.distributor.address]);
  });
});

// ---------------------------------------------------------------------------
// INST-U6
// ---------------------------------------------------------------------------

describe('INST-U6: instance list validation', () => {
  it('rejects a module that produces no instances', () => {
    const fixture = setup(testModule('empty', { instances: () => [] }));
    const distributorsId = fixture.distributor.addDistribution(op, fixture.moduleId, null);
    expect(() => fixture.distributor.instantiate(op, distributorsId, ARGS)).toThrow(
      new InvalidInstance(ZERO_ADDRESS),
    );
  });

  it('rejects an address that already has an InstanceId', () => {
    const fixture = setup(testModule('self', { instances: (ctx) => [ctx.self] }));
    const distributorsId = fixture.distributor.addDistribution(op, fixture.moduleId, null);
    fixture.distributor.instantiate(op, distributorsId, ARGS);

    expect(() => fixture.distributor.instantiate(op, distributorsId, ARGS)).toThrow(
      new InvalidInstance(fixture.moduleAddress),
    );
    expect(fixture.distributor.numInstances()).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// INST-U7
// ---------------------------------------------------------------------------

describe('INST-U7: reentrancy', () => {
  it('a nested instantiate during the module call takes the earlier InstanceId', () => {
    let fixture: Fixture | undefined;
    let innerId: Bytes32 | undefined;
    let nestedResult = 0;
    let admittedEarly: unknown;

    const outer = testModule('outer', {
      instances: (ctx) => {
        const instance = ctx.deploy({ kind: 'contract', bytecode: '0x0a' });
        if (fixture !== undefined && innerId !== undefined) {
          try {
            fixture.distributor.beforeCall({ sender: instance }, '0x', SELECTOR, instance, 0n, '0x');
          } catch (err: unknown) {
            admittedEarly = err;
          }
          nestedResult = fixture.distributor.instantiate({ sender: ctx.self }, innerId, '0x').instanceId;
        }
        return [instance];
      },
    });

    fixture = setup(outer);
    innerId = fixture.distributor.addDistribution(op, addModule(fixture, testModule('inner')), null);
    const outerId = fixture.distributor.addDistribution(op, fixture.moduleId, null);

    const result = fixture.distributor.instantiate(op, outerId, ARGS);

    expect(nestedResult).toBe(1);
    expect(result.instanceId).toBe(2);
    expect(fixture.distributor.distributionOf(1)).toBe(innerId);
    expect(fixture.distributor.distributionOf(2)).toBe(outerId);
    expect(admittedEarly).toBeInstanceOf(InvalidInstance);
    expect(fixture.distributor.numInstances()).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// INST-E2E
// ---------------------------------------------------------------------------

describe('INST-E2E: lifecycle', () => {
  it('add, instantiate, remove, then the instance is no longer admitted', () => {
    const { host, distributor, moduleId } = setup();

    const distributorsId = distributor.addDistribution(op, moduleId, null);
    expect(distributor.getDistributions()).toHaveLength(1);

    const { instances, instanceId } = distributor.instantiate(op, distributorsId, ARGS);
    expect(instances).toHaveLength(1);
    expect(instanceId).toBe(1);
    const [instance] = instances;
    if (instance === undefined) throw new Error('no instance');

    expect(distributor.beforeCall({ sender: instance }, '0x', SELECTOR, instance, 0n, '0x')).toBe(distributorsId);

    distributor.removeDistribution(op, distributorsId);
    expect(distributor.getDistributions()).toHaveLength(0);
    expect(distributor.getInstanceId(instance)).toBe(1);
    expect(distributor.distributionOf(1)).toBe(distributorsId);

    expect(() => distributor.beforeCall({ sender: instance }, '0x', SELECTOR, instance, 0n, '0x')).toThrow(
      `InvalidInstance(${instance})`,
    );
    expect(host.logs({ emitter: distributor.address }).map((r) => r.event.name)).toEqual([
      'DistributionAdded',
      'Instantiated',
      'DistributionRemoved',
    ]);
  });
});
