import type { ImageConfig } from '../config/index.js';
import type { SandboxRegistry } from './registry.js';
import type { SandboxTypeSpec } from './types.js';

/**
 * Build the image reference for a built-in sandbox type:
 * `[registry/]namespace/runtime-sandbox-<type>:tag`
 */
export function builtinImage(images: ImageConfig, type: string): string {
  const repository = `${images.namespace}/runtime-sandbox-${type}:${images.tag}`;
  return images.registry ? `${images.registry.replace(/\/+$/, '')}/${repository}` : repository;
}

export function builtinTypeSpecs(images: ImageConfig): SandboxTypeSpec[] {
  return [
    {
      type: 'base',
      image: builtinImage(images, 'base'),
      securityLevel: 'medium',
      timeoutSeconds: 300,
      description: 'Base sandbox with a shell and a Python runtime',
    },
    {
      type: 'filesystem',
      image: builtinImage(images, 'filesystem'),
      securityLevel: 'medium',
      timeoutSeconds: 600,
      description: 'Filesystem sandbox',
    },
    {
      type: 'browser',
      image: builtinImage(images, 'browser'),
      securityLevel: 'medium',
      timeoutSeconds: 600,
      description: 'Browser sandbox',
      resourceLimits: { memoryMB: 2048 },
    },
    {
      type: 'dummy',
      image: builtinImage(images, 'dummy'),
      securityLevel: 'low',
      timeoutSeconds: 300,
      description: 'Dummy sandbox for wiring checks',
    },
  ];
}

/**
 * Install the built-in sandbox types into a registry. Types the registry
 * already holds are left as they are.
 */
export function registerBuiltinTypes(registry: SandboxRegistry, images: ImageConfig): void {
  for (const spec of builtinTypeSpecs(images)) {
    if (registry.has(spec.type)) {
      continue;
    }
    const result = registry.register(spec);
    if (!result.success) {
      throw new Error(`Built-in sandbox type ${spec.type} is invalid: ${result.error}`);
    }
  }
}
