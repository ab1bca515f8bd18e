/**
 * Instance State Machine Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidStateTransitionError } from '../../src/sandbox/errors.js';
import { nextInstanceState, transitionInstance } from '../../src/sandbox/instance-state.js';
import type { SandboxInstance } from '../../src/sandbox/types.js';

function createInstance(state: SandboxInstance['state']): SandboxInstance {
  const now = new Date('2026-01-01T00:00:00.000Z');
  return {
    id: 'warmbox_sandbox_test',
    type: 'base',
    handle: { containerId: 'container-1', host: 'localhost' },
    port: 49152,
    baseUrl: 'http://localhost:49152',
    token: 'test-secret',
    state,
    createdAt: now,
    lastActivityAt: now,
    expiresAt: null,
    leaseSeconds: null,
    mountDir: null,
    storagePath: null,
  };
}

describe('instance state machine', () => {
  it('should allow warm -> assigned -> warm', () => {
    const instance = createInstance('warm');

    expect(transitionInstance(instance, 'ASSIGN')).toBe('assigned');
    expect(transitionInstance(instance, 'RECYCLE')).toBe('warm');
  });

  it('should allow destroying from warm and assigned', () => {
    expect(nextInstanceState('warm', 'DESTROY')).toBe('destroyed');
    expect(nextInstanceState('assigned', 'DESTROY')).toBe('destroyed');
  });

  it('should reject recycling a warm instance', () => {
    const instance = createInstance('warm');

    expect(() => transitionInstance(instance, 'RECYCLE')).toThrow(InvalidStateTransitionError);
    expect(instance.state).toBe('warm');
  });

  it('should treat destroyed as terminal', () => {
    const instance = createInstance('destroyed');

    expect(() => transitionInstance(instance, 'ASSIGN')).toThrow(
      "Cannot apply 'ASSIGN' to sandbox warmbox_sandbox_test in state 'destroyed'"
    );
    expect(nextInstanceState('destroyed', 'DESTROY')).toBeUndefined();
  });
});
