/**
 * State machine for cluster bootstrap.
 *
 * Linear: components → control plane → networking → workers → validated.
 * Any stage may abort (entry guard) or fail.
 */

import { createLogger } from '../utils/logger.js';

const log = createLogger('bootstrap-state');

export const BootstrapState = {
  NOT_STARTED: 'not-started',
  COMPONENTS_INSTALLED: 'components-installed',
  CONTROL_PLANE_INITIALIZED: 'control-plane-initialized',
  NETWORKING_INSTALLED: 'networking-installed',
  WORKERS_JOINED: 'workers-joined',
  VALIDATED: 'validated',
  ABORTED: 'aborted',
  FAILED: 'failed',
} as const;

export type BootstrapState = (typeof BootstrapState)[keyof typeof BootstrapState];

export const BootstrapEvent = {
  COMPONENTS_INSTALLED: 'components_installed',
  CONTROL_PLANE_READY: 'control_plane_ready',
  NETWORKING_READY: 'networking_ready',
  WORKERS_JOINED: 'workers_joined',
  VALIDATION_DONE: 'validation_done',
  EXISTING_CLUSTER: 'existing_cluster',
  STEP_FAILED: 'step_failed',
} as const;

export type BootstrapEvent = (typeof BootstrapEvent)[keyof typeof BootstrapEvent];

/**
 * Maps (current state, event) -> next state
 */
const transitions: Record<BootstrapState, Partial<Record<BootstrapEvent, BootstrapState>>> = {
  [BootstrapState.NOT_STARTED]: {
    [BootstrapEvent.COMPONENTS_INSTALLED]: BootstrapState.COMPONENTS_INSTALLED,
    [BootstrapEvent.EXISTING_CLUSTER]: BootstrapState.ABORTED,
    [BootstrapEvent.STEP_FAILED]: BootstrapState.FAILED,
  },
  [BootstrapState.COMPONENTS_INSTALLED]: {
    [BootstrapEvent.CONTROL_PLANE_READY]: BootstrapState.CONTROL_PLANE_INITIALIZED,
    [BootstrapEvent.STEP_FAILED]: BootstrapState.FAILED,
  },
  [BootstrapState.CONTROL_PLANE_INITIALIZED]: {
    [BootstrapEvent.NETWORKING_READY]: BootstrapState.NETWORKING_INSTALLED,
    [BootstrapEvent.STEP_FAILED]: BootstrapState.FAILED,
  },
  [BootstrapState.NETWORKING_INSTALLED]: {
    [BootstrapEvent.WORKERS_JOINED]: BootstrapState.WORKERS_JOINED,
    [BootstrapEvent.STEP_FAILED]: BootstrapState.FAILED,
  },
  // validation problems are warnings, so there is no failure edge here
  [BootstrapState.WORKERS_JOINED]: {
    [BootstrapEvent.VALIDATION_DONE]: BootstrapState.VALIDATED,
  },
  // Terminal states - no transitions out
  [BootstrapState.VALIDATED]: {},
  [BootstrapState.ABORTED]: {},
  [BootstrapState.FAILED]: {},
};

export function isTerminalBootstrapState(state: BootstrapState): boolean {
  return (
    state === BootstrapState.VALIDATED ||
    state === BootstrapState.ABORTED ||
    state === BootstrapState.FAILED
  );
}

export function canTransition(current: BootstrapState, event: BootstrapEvent): boolean {
  return event in transitions[current];
}

/**
 * Next state, or null when the transition is invalid.
 */
export function getNextState(current: BootstrapState, event: BootstrapEvent): BootstrapState | null {
  return transitions[current][event] ?? null;
}

export class InvalidBootstrapTransitionError extends Error {
  readonly name = 'InvalidBootstrapTransitionError';

  constructor(
    readonly from: BootstrapState,
    readonly event: BootstrapEvent
  ) {
    super(`Invalid bootstrap transition: ${from} + ${event}`);
    Object.setPrototypeOf(this, InvalidBootstrapTransitionError.prototype);
  }
}

export interface BootstrapTransition {
  from: BootstrapState;
  event: BootstrapEvent;
  to: BootstrapState;
}

/**
 * Tracks the current bootstrap state and the transitions taken.
 */
export class BootstrapStateMachine {
  private state: BootstrapState = BootstrapState.NOT_STARTED;
  private readonly history: BootstrapTransition[] = [];

  constructor(private readonly workspace: string) {}

  get current(): BootstrapState {
    return this.state;
  }

  get transitions(): readonly BootstrapTransition[] {
    return this.history;
  }

  apply(event: BootstrapEvent): BootstrapState {
    const next = getNextState(this.state, event);
    if (next === null) {
      log.error({ workspace: this.workspace, currentState: this.state, event }, 'Invalid transition');
      throw new InvalidBootstrapTransitionError(this.state, event);
    }
    log.info({ workspace: this.workspace, from: this.state, event, to: next }, 'State transition');
    this.history.push({ from: this.state, event, to: next });
    this.state = next;
    return next;
  }
}
