/**
 * Typed node roster for one workspace.
 *
 * Holds the additional (non-base) nodes of a workspace plus the names of
 * nodes that were removed. Every mutation returns a new Roster and checks
 * the invariants first: names are parseable, unique under both naming
 * variants, never a base slot, and never a retired slot.
 */

import { ValidationError } from '../types/errors.js';
import { MembershipState, type NodeRole, type NodeSpec } from '../types/node.js';
import { InvalidTransitionError, isValidTransition } from './membership.js';
import { isBaseNode, nextNodeName, parseNodeName, sameNodeSlot } from './node-names.js';

export class Roster {
  private constructor(
    private readonly nodes: readonly NodeSpec[],
    private readonly retired: readonly string[]
  ) {}

  static empty(): Roster {
    return new Roster([], []);
  }

  /**
   * Build a roster from decoded entries, rejecting any that break the
   * roster invariants. A stale entry whose name is also retired is kept;
   * its slot stays out of circulation either way.
   */
  static from(nodes: readonly NodeSpec[], retired: readonly string[] = []): Roster {
    let roster = new Roster([], retired);
    for (const node of nodes) {
      roster.assertAddable(node.name, node.role, true);
      roster = new Roster([...roster.nodes, { ...node }], retired);
    }
    return roster;
  }

  list(role?: NodeRole): readonly NodeSpec[] {
    return role ? this.nodes.filter(node => node.role === role) : this.nodes;
  }

  names(role?: NodeRole): string[] {
    return this.list(role).map(node => node.name);
  }

  retiredNames(): readonly string[] {
    return this.retired;
  }

  get size(): number {
    return this.nodes.length;
  }

  /**
   * Find a node by either naming variant.
   */
  find(name: string): NodeSpec | undefined {
    return this.nodes.find(node => sameNodeSlot(node.name, name));
  }

  has(name: string): boolean {
    return this.find(name) !== undefined;
  }

  isRetired(name: string): boolean {
    return this.retired.some(retiredName => sameNodeSlot(retiredName, name));
  }

  nextName(role: NodeRole): string {
    return nextNodeName(role, [...this.names(role), ...this.retired]);
  }

  add(name: string, role: NodeRole): Roster {
    this.assertAddable(name, role);
    return new Roster(
      [...this.nodes, { name, role, state: MembershipState.PLANNED }],
      this.retired
    );
  }

  /**
   * Drop a node and retire its name.
   */
  remove(name: string): Roster {
    const node = this.find(name);
    if (!node) {
      throw new ValidationError(`Node ${name} is not in the roster`, 'name');
    }
    return new Roster(
      this.nodes.filter(entry => entry !== node),
      [...this.retired, node.name]
    );
  }

  withState(name: string, state: MembershipState): Roster {
    const node = this.find(name);
    if (!node) {
      throw new ValidationError(`Node ${name} is not in the roster`, 'name');
    }
    if (node.state === state) {
      return this;
    }
    if (state === MembershipState.REMOVED) {
      return this.remove(name);
    }
    if (!isValidTransition(node.state, state)) {
      throw new InvalidTransitionError(node.name, node.state, state);
    }
    return new Roster(
      this.nodes.map(entry => (entry === node ? { ...entry, state } : entry)),
      this.retired
    );
  }

  private assertAddable(name: string, role: NodeRole, allowRetired = false): void {
    const parsed = parseNodeName(name);
    if (!parsed) {
      throw new ValidationError(
        `Invalid node name '${name}': must start with 'controlplane' or 'worker' followed by a number`,
        'name'
      );
    }
    if (parsed.role !== role) {
      throw new ValidationError(`Node name '${name}' does not match role ${role}`, 'name');
    }
    if (isBaseNode(name)) {
      throw new ValidationError(`Node name '${name}' is reserved for a base node`, 'name');
    }
    const existing = this.find(name);
    if (existing) {
      throw new ValidationError(
        `Node name '${name}' collides with existing node '${existing.name}'`,
        'name'
      );
    }
    if (!allowRetired && this.isRetired(name)) {
      throw new ValidationError(
        `Node name '${name}' belonged to a removed node and is not reused`,
        'name',
        `cpc add-node --role ${role} --name ${this.nextName(role)}`
      );
    }
  }
}
