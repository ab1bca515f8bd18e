/**
 * Sandbox Registry Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { builtinImage, registerBuiltinTypes } from '../../src/sandbox/builtin-types.js';
import { SandboxRegistry, toTypeSummary } from '../../src/sandbox/registry.js';

describe('SandboxRegistry', () => {
  let registry: SandboxRegistry;

  beforeEach(() => {
    registry = new SandboxRegistry();
  });

  it('should register a type with defaults applied', () => {
    const result = registry.register({ type: 'python', image: 'example/python:3' });

    expect(result).toEqual({ success: true, replaced: false });
    expect(registry.get('python')).toEqual({
      type: 'python',
      image: 'example/python:3',
      securityLevel: 'medium',
      timeoutSeconds: 300,
      env: {},
      description: '',
      containerPort: 80,
    });
  });

  it('should report when a registration replaces an existing type', () => {
    registry.register({ type: 'python', image: 'example/python:3' });

    const result = registry.register({ type: 'python', image: 'example/python:3.12' });

    expect(result).toEqual({ success: true, replaced: true });
    expect(registry.get('python')?.image).toBe('example/python:3.12');
  });

  it('should reject an invalid type id', () => {
    const result = registry.register({ type: 'Not Valid', image: 'example/python:3' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('type: Type must be lower-case alphanumeric, "-" or "_"');
    }
    expect(registry.has('Not Valid')).toBe(false);
  });

  it('should keep the configure hook out of the wire summary', () => {
    registry.register({
      type: 'gpu',
      image: 'example/gpu:1',
      configure: (spec) => ({ ...spec, labels: { ...spec.labels, gpu: 'true' } }),
    });

    const entry = registry.get('gpu');
    expect(entry?.configure).toBeTypeOf('function');
    expect(entry && toTypeSummary(entry)).toEqual({
      type: 'gpu',
      image: 'example/gpu:1',
      securityLevel: 'medium',
      timeoutSeconds: 300,
      description: '',
      env: {},
      containerPort: 80,
    });
  });

  it('should unregister a type', () => {
    registry.register({ type: 'python', image: 'example/python:3' });

    expect(registry.unregister('python')).toBe(true);
    expect(registry.list()).toEqual([]);
  });
});

describe('built-in sandbox types', () => {
  it('should build image references from the image settings', () => {
    expect(builtinImage({ registry: '', namespace: 'warmbox', tag: 'latest' }, 'base')).toBe(
      'warmbox/runtime-sandbox-base:latest'
    );
    expect(builtinImage({ registry: 'registry.example.com/', namespace: 'team', tag: 'v2' }, 'browser')).toBe(
      'registry.example.com/team/runtime-sandbox-browser:v2'
    );
  });

  it('should register the four built-in types', () => {
    const registry = new SandboxRegistry();

    registerBuiltinTypes(registry, { registry: '', namespace: 'warmbox', tag: 'latest' });

    expect(registry.list().map((entry) => entry.type)).toEqual(['base', 'filesystem', 'browser', 'dummy']);
    expect(registry.get('dummy')?.securityLevel).toBe('low');
    expect(registry.get('browser')?.resourceLimits).toEqual({ memoryMB: 2048 });
  });
});
