/**
 * Health Routes Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createApp } from '../src/server/app.js';
import type { SandboxManager } from '../src/sandbox/manager.js';
import { VERSION } from '../src/version.js';
import { FakeDriver, createTestManager } from './sandbox/test-utils.js';

describe('Health Routes', () => {
  let app: FastifyInstance;
  let manager: SandboxManager;
  let driver: FakeDriver;

  beforeEach(async () => {
    ({ manager, driver } = createTestManager());
    await manager.initialize({ maintenance: false });
    app = await createApp({ manager });
  });

  afterEach(async () => {
    await app.close();
    await manager.shutdown();
  });

  describe('GET /health', () => {
    it('should report status with pool and port counts', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.success).toBe(true);
      expect(body.data.status).toBe('ok');
      expect(body.data.version).toBe(VERSION);
      expect(body.data.sandbox).toMatchObject({
        backend: 'fake',
        backendAvailable: true,
        workerId: 'worker-a',
        sharedState: false,
        portRange: [49152, 49160],
        heldPorts: 0,
        pools: [{ type: 'base', warm: 0, inflight: 0, assigned: 0 }],
        shuttingDown: false,
      });
    });

    it('should report degraded when the backend is down', async () => {
      driver.available = false;

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.status).toBe('degraded');
    });
  });

  describe('GET /health/ready', () => {
    it('should return ready when backend and shared state are reachable', async () => {
      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.data.ready).toBe(true);
      expect(body.data.checks.map((check: { name: string }) => check.name)).toEqual(['backend', 'shared-state']);
    });

    it('should return 503 when the backend is unreachable', async () => {
      driver.available = false;

      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
      const body = response.json();
      expect(body.data.ready).toBe(false);
      expect(body.data.checks[0]).toMatchObject({
        name: 'backend',
        healthy: false,
        message: 'Backend fake unreachable',
      });
    });

    it('should return 503 while shutting down', async () => {
      await manager.shutdown();

      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
    });
  });

  describe('GET /health/live', () => {
    it('should return alive', async () => {
      const response = await app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.alive).toBe(true);
    });
  });
});
