/**
 * Node naming and roster invariants
 */

import { describe, it, expect } from 'vitest';
import {
  isBaseNode,
  nextNodeName,
  parseNodeName,
  sameNodeSlot,
} from '../src/nodes/node-names.js';
import { Roster } from '../src/nodes/roster.js';
import { InvalidTransitionError, isValidTransition } from '../src/nodes/membership.js';
import { MembershipState, NodeRole } from '../src/types/node.js';
import { ValidationError } from '../src/types/errors.js';

describe('parseNodeName', () => {
  it('should parse canonical and legacy names', () => {
    expect(parseNodeName('worker-3')).toEqual({ role: NodeRole.WORKER, index: 3, legacy: false });
    expect(parseNodeName('worker3')).toEqual({ role: NodeRole.WORKER, index: 3, legacy: true });
    expect(parseNodeName('controlplane')).toEqual({
      role: NodeRole.CONTROL_PLANE,
      index: 1,
      legacy: true,
    });
  });

  it('should reject names outside the scheme', () => {
    expect(parseNodeName('worker-')).toBeNull();
    expect(parseNodeName('node-1')).toBeNull();
    expect(parseNodeName('Worker-1')).toBeNull();
  });

  it('should treat both naming variants as the same slot', () => {
    expect(sameNodeSlot('worker-4', 'worker4')).toBe(true);
    expect(sameNodeSlot('worker-4', 'worker-5')).toBe(false);
    expect(sameNodeSlot('controlplane-2', 'worker-2')).toBe(false);
  });

  it('should mark indices below the base offset as base nodes', () => {
    expect(isBaseNode('controlplane-1')).toBe(true);
    expect(isBaseNode('controlplane-2')).toBe(false);
    expect(isBaseNode('worker-2')).toBe(true);
    expect(isBaseNode('worker-3')).toBe(false);
  });
});

describe('nextNodeName', () => {
  it('should start at the base offset', () => {
    expect(nextNodeName(NodeRole.WORKER, [])).toBe('worker-3');
    expect(nextNodeName(NodeRole.CONTROL_PLANE, [])).toBe('controlplane-2');
  });

  it('should go one past the highest index of either variant', () => {
    expect(nextNodeName(NodeRole.WORKER, ['worker-3', 'worker7', 'controlplane-9'])).toBe(
      'worker-8'
    );
  });
});

describe('Roster', () => {
  it('should add nodes as planned and hand out the next name', () => {
    const roster = Roster.empty().add('worker-3', NodeRole.WORKER);

    expect(roster.find('worker3')).toEqual({
      name: 'worker-3',
      role: NodeRole.WORKER,
      state: MembershipState.PLANNED,
    });
    expect(roster.nextName(NodeRole.WORKER)).toBe('worker-4');
  });

  it('should reject base names, role mismatches and collisions', () => {
    const roster = Roster.empty().add('worker-3', NodeRole.WORKER);

    expect(() => roster.add('worker-1', NodeRole.WORKER)).toThrow(ValidationError);
    expect(() => roster.add('worker-4', NodeRole.CONTROL_PLANE)).toThrow(ValidationError);
    expect(() => roster.add('worker3', NodeRole.WORKER)).toThrow(
      "Node name 'worker3' collides with existing node 'worker-3'"
    );
  });

  it('should never reuse the name of a removed node', () => {
    const roster = Roster.empty().add('worker-3', NodeRole.WORKER).remove('worker-3');

    expect(roster.retiredNames()).toEqual(['worker-3']);
    expect(roster.nextName(NodeRole.WORKER)).toBe('worker-4');
    expect(() => roster.add('worker-3', NodeRole.WORKER)).toThrow(ValidationError);
  });

  it('should return a new roster on every change', () => {
    const empty = Roster.empty();
    const added = empty.add('controlplane-2', NodeRole.CONTROL_PLANE);

    expect(empty.size).toBe(0);
    expect(added.size).toBe(1);
  });

  it('should follow membership transitions', () => {
    const roster = Roster.empty()
      .add('worker-3', NodeRole.WORKER)
      .withState('worker-3', MembershipState.PROVISIONED)
      .withState('worker-3', MembershipState.JOINED)
      .withState('worker-3', MembershipState.READY);

    expect(roster.find('worker-3')?.state).toBe(MembershipState.READY);
    expect(() =>
      Roster.empty().add('worker-3', NodeRole.WORKER).withState('worker-3', MembershipState.READY)
    ).toThrow(InvalidTransitionError);
  });

  it('should retire a node moved to removed', () => {
    const roster = Roster.empty()
      .add('worker-3', NodeRole.WORKER)
      .withState('worker-3', MembershipState.REMOVED);

    expect(roster.has('worker-3')).toBe(false);
    expect(roster.isRetired('worker3')).toBe(true);
  });
});

describe('membership transitions', () => {
  it('should only reach joined from provisioned or ready', () => {
    expect(isValidTransition(MembershipState.PROVISIONED, MembershipState.JOINED)).toBe(true);
    expect(isValidTransition(MembershipState.READY, MembershipState.JOINED)).toBe(true);
    expect(isValidTransition(MembershipState.PLANNED, MembershipState.JOINED)).toBe(false);
    expect(isValidTransition(MembershipState.REMOVED, MembershipState.PLANNED)).toBe(false);
  });

  it('should send joined and ready nodes back to provisioned on reset', () => {
    expect(isValidTransition(MembershipState.READY, MembershipState.PROVISIONED)).toBe(true);
    expect(isValidTransition(MembershipState.JOINED, MembershipState.PROVISIONED)).toBe(true);
    expect(isValidTransition(MembershipState.PLANNED, MembershipState.READY)).toBe(false);
  });
});
