import type { InstanceState } from '@warmbox/shared';
import { InvalidStateTransitionError } from './errors.js';
import type { SandboxInstance } from './types.js';

/**
 * Instance lifecycle events.
 */
export type InstanceEvent = 'ASSIGN' | 'RECYCLE' | 'DESTROY';

/**
 * Valid transitions: Warm -> Assigned -> (Warm | Destroyed).
 */
export const INSTANCE_TRANSITIONS: Record<InstanceState, Partial<Record<InstanceEvent, InstanceState>>> = {
  warm: {
    ASSIGN: 'assigned',
    DESTROY: 'destroyed',
  },
  assigned: {
    RECYCLE: 'warm',
    DESTROY: 'destroyed',
  },
  destroyed: {}, // Terminal state
};

export function nextInstanceState(from: InstanceState, event: InstanceEvent): InstanceState | undefined {
  return INSTANCE_TRANSITIONS[from][event];
}

/**
 * Apply an event to an instance, throwing on an edge the machine lacks.
 */
export function transitionInstance(instance: SandboxInstance, event: InstanceEvent): InstanceState {
  const to = nextInstanceState(instance.state, event);
  if (!to) {
    throw new InvalidStateTransitionError(instance.id, instance.state, event);
  }
  instance.state = to;
  return to;
}
