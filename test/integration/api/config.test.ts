import request from 'supertest';
import { afterEach, describe, expect, it } from 'vitest';
import { configManager } from '../../../src/config/manager.js';
import { getAuditLogger } from '../../../src/monitoring/audit-log.js';
import { createTestApp } from '../helpers/test-server.js';

describe('Config API', () => {
  afterEach(async () => {
    await configManager.set('login.maxAttempts', 3);
  });

  describe('GET /api/config', () => {
    it('returns config grouped by category', async () => {
      const res = await request(createTestApp()).get('/api/config');

      expect(res.status).toBe(200);
      expect(Object.keys(res.body).sort()).toEqual(['auth', 'broker', 'driver', 'login', 'session']);
      expect(res.body.login).toContainEqual({
        key: 'login.maxAttempts',
        value: 3,
        description: 'Full login attempts',
        source: 'db',
      });
    });

    it('shows environment overrides', async () => {
      process.env.LOGIN_HEADLESS = 'false';
      try {
        const res = await request(createTestApp()).get('/api/config');
        const headless = res.body.login.find((e: { key: string }) => e.key === 'login.headless');
        expect(headless).toMatchObject({ value: false, source: 'env' });
      } finally {
        delete process.env.LOGIN_HEADLESS;
      }
    });
  });

  describe('PUT /api/config/:key', () => {
    it('updates a config value', async () => {
      const res = await request(createTestApp())
        .put('/api/config/login.maxAttempts')
        .send({ value: 5 });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ key: 'login.maxAttempts', value: 5, updated: true });
      expect(configManager.get<number>('login.maxAttempts')).toBe(5);
      expect(getAuditLogger().getByType('config')[0].summary).toBe('Config login.maxAttempts updated');
    });

    it('rejects a value that fails validation', async () => {
      const res = await request(createTestApp())
        .put('/api/config/login.maxAttempts')
        .send({ value: 50 });

      expect(res.status).toBe(400);
      expect(res.body.error).toMatch(/^Invalid value for login\.maxAttempts: /);
      expect(configManager.get<number>('login.maxAttempts')).toBe(3);
    });

    it('rejects a request with no value', async () => {
      const res = await request(createTestApp()).put('/api/config/login.maxAttempts').send({});

      expect(res.status).toBe(400);
      expect(res.body.error).toBeDefined();
    });
  });
});
