/**
 * Plinth Registry — OwnableDistributor Tests
 *
 * OWN-U1: deployment records the owner and emits OwnershipTransferred from zero
 * OWN-U2: add, remove and instantiate are owner-only
 * OWN-U3: admission hooks stay open to every caller
 * OWN-U4: transferOwnership moves the gate and rejects the zero address
 */

import { describe, it, expect } from 'vitest';
import { ExecutionHost, ZERO_ADDRESS, asAddress } from '@plinth/kernel';
import {
  OwnableInvalidOwner,
  OwnableUnauthorizedAccount,
  deployCodeIndex,
  deployOwnableDistributor,
} from '../src/index.js';
import { OPERATOR, SELECTOR, STRANGER, testModule } from './fixtures.js';

const OWNER = asAddress('0x' + 'c3'.repeat(20));

function ownable() {
  const host = new ExecutionHost();
  const codeIndex = deployCodeIndex(host, OPERATOR);
  const distributor = deployOwnableDistributor(host, OPERATOR, codeIndex, OWNER);
  const moduleId = codeIndex.register(host.deploy(testModule('owned'), OPERATOR));
  return { host, distributor, moduleId };
}

describe('OWN-U1: deployment', () => {
  it('stores the owner and emits OwnershipTransferred', () => {
    const { host, distributor } = ownable();
    expect(distributor.owner()).toBe(OWNER);
    expect(host.logs({ name: 'OwnershipTransferred' }).map((r) => r.event)).toEqual([
      { name: 'OwnershipTransferred', previousOwner: ZERO_ADDRESS, newOwner: OWNER },
    ]);
  });

  it('refuses the zero address as initial owner', () => {
    const host = new ExecutionHost();
    const codeIndex = deployCodeIndex(host, OPERATOR);
    expect(() => deployOwnableDistributor(host, OPERATOR, codeIndex, ZERO_ADDRESS)).toThrow(
      new OwnableInvalidOwner(ZERO_ADDRESS),
    );
  });
});

describe('OWN-U2: owner gating', () => {
  it('rejects addDistribution from anyone but the owner', () => {
    const { distributor, moduleId } = ownable();
    expect(() => distributor.addDistribution({ sender: STRANGER }, moduleId, null)).toThrow(
      new OwnableUnauthorizedAccount(STRANGER),
    );
    expect(distributor.getDistributions()).toEqual([]);
  });

  it('lets the owner add, instantiate and remove', () => {
    const { distributor, moduleId } = ownable();
    const owner = { sender: OWNER };
    const distributorsId = distributor.addDistribution(owner, moduleId, null);

    expect(() => distributor.instantiate({ sender: STRANGER }, distributorsId, '0x')).toThrow(
      OwnableUnauthorizedAccount,
    );
    expect(distributor.instantiate(owner, distributorsId, '0x').instanceId).toBe(1);

    expect(() => distributor.removeDistribution({ sender: STRANGER }, distributorsId)).toThrow(
      OwnableUnauthorizedAccount,
    );
    distributor.removeDistribution(owner, distributorsId);
    expect(distributor.getDistributions()).toEqual([]);
  });
});

describe('OWN-U3: hooks are unrestricted', () => {
  it('any instance may call beforeCall', () => {
    const { distributor, moduleId } = ownable();
    const distributorsId = distributor.addDistribution({ sender: OWNER }, moduleId, null);
    const [instance] = distributor.instantiate({ sender: OWNER }, distributorsId, '0x').instances;
    if (instance === undefined) throw new Error('no instance');

    expect(distributor.beforeCall({ sender: instance }, '0x', SELECTOR, instance, 0n, '0x')).toBe(distributorsId);
  });
});

describe('OWN-U4: transferOwnership', () => {
  it('moves the gate to the new owner', () => {
    const { host, distributor, moduleId } = ownable();
    distributor.transferOwnership({ sender: OWNER }, STRANGER);

    expect(distributor.owner()).toBe(STRANGER);
    expect(() => distributor.addDistribution({ sender: OWNER }, moduleId, null)).toThrow(
      new OwnableUnauthorizedAccount(OWNER),
    );
    expect(distributor.addDistribution({ sender: STRANGER }, moduleId, null)).toBe(
      distributor.calculateDistributorId(moduleId, null),
    );
    expect(host.logs({ name: 'OwnershipTransferred' }).at(-1)?.event).toEqual({
      name: 'OwnershipTransferred',
      previousOwner: OWNER,
      newOwner: STRANGER,
    });
  });

  it('only the owner may transfer', () => {
    const { distributor } = ownable();
    expect(() => distributor.transferOwnership({ sender: STRANGER }, STRANGER)).toThrow(
      new OwnableUnauthorizedAccount(STRANGER),
    );
  });

  it('rejects the zero address', () => {
    const { distributor } = ownable();
    expect(() => distributor.transferOwnership({ sender: OWNER }, ZERO_ADDRESS)).toThrow(
      new OwnableInvalidOwner(ZERO_ADDRESS),
    );
    expect(distributor.owner()).toBe(OWNER);
  });
});
