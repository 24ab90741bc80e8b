import { Router } from 'express';
import { z } from 'zod';
import { ConfigError, serializeError } from '../auth/errors.js';
import type { SessionSnapshot } from '../auth/types.js';
import { type ConfigEntry, configManager } from '../config/manager.js';
import { getAuditLogger, isAuditEventType } from '../monitoring/audit-log.js';
import { createLogger } from '../utils/logger.js';

const configUpdateSchema = z.object({
  value: z
    .union([z.string(), z.number(), z.boolean(), z.array(z.unknown()), z.record(z.unknown())])
    .refine((v) => v !== undefined, 'Missing "value" in request body'),
});

const invalidateSchema = z
  .object({
    token: z.string().min(1).optional(),
  })
  .optional();

const auditQuerySchema = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD')
    .optional(),
  type: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

const log = createLogger('api-routes');

export interface SessionCallbacks {
  getServiceStatus: () => { startedAt: string };
  getSession: () => SessionSnapshot | null;
  getValidToken: () => Promise<string>;
  invalidate: (token?: string) => void;
  logout: () => Promise<void>;
}

let callbacks: SessionCallbacks = {
  getServiceStatus: () => ({ startedAt: new Date().toISOString() }),
  getSession: () => null,
  getValidToken: async () => {
    throw new Error('Session manager not connected');
  },
  invalidate: () => {
    /* noop */
  },
  logout: async () => {
    /* noop */
  },
};

export function registerSessionCallbacks(cb: SessionCallbacks): void {
  callbacks = cb;
}

export function createRouter(): Router {
  const router = Router();

  // ── Status (health check, never triggers a login) ───────────────────
  router.get('/api/status', (_req, res) => {
    try {
      const service = callbacks.getServiceStatus();
      const session = callbacks.getSession();
      const uptimeSeconds = Math.floor((Date.now() - new Date(service.startedAt).getTime()) / 1000);

      res.json({
        status: 'running',
        uptime: uptimeSeconds,
        startedAt: service.startedAt,
        session: session
          ? { state: session.state, expiresAt: session.expiresAt, authenticating: session.authenticating }
          : null,
        loginMode: configManager.get<string>('login.mode'),
      });
    } catch (err) {
      log.error({ err }, 'Error fetching status');
      res.status(500).json({ error: 'Failed to fetch status' });
    }
  });

  // ── Session snapshot ────────────────────────────────────────────────
  router.get('/api/session', (_req, res) => {
    const session = callbacks.getSession();
    if (!session) {
      res.status(503).json({ error: 'Session manager not ready' });
      return;
    }
    res.json(session);
  });

  // ── Token (may run the login pipeline) ──────────────────────────────
  router.post('/api/session/token', async (_req, res) => {
    try {
      const accessToken = await callbacks.getValidToken();
      const session = callbacks.getSession();
      res.json({ accessToken, expiresAt: session?.expiresAt ?? null });
    } catch (err) {
      const error = serializeError(err);
      log.error({ err: error.message }, 'Token request failed');
      getAuditLogger().logError('Token request failed', { error });
      res.status(502).json({ error });
    }
  });

  // ── Report a rejected token ─────────────────────────────────────────
  router.post('/api/session/invalidate', (req, res) => {
    const parsed = invalidateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'Invalid request body' });
      return;
    }
    callbacks.invalidate(parsed.data?.token);
    getAuditLogger().logControl('Token invalidated via API', {
      staleCheck: parsed.data?.token !== undefined,
    });
    res.json({ invalidated: true, session: callbacks.getSession() });
  });

  router.post('/api/session/logout', async (_req, res) => {
    try {
      await callbacks.logout();
      getAuditLogger().logControl('Logged out via API');
      res.json({ loggedOut: true, session: callbacks.getSession() });
    } catch (err) {
      log.error({ err }, 'Logout failed');
      res.status(500).json({ error: 'Failed to log out' });
    }
  });

  // ── Audit Log ─────────────────────────────────────────────────────
  router.get('/api/audit', (req, res) => {
    const parsed = auditQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'Invalid query' });
      return;
    }
    try {
      const audit = getAuditLogger();
      const { date, type, limit } = parsed.data;
      let entries: ReturnType<typeof audit.getRecent>;
      if (date) {
        entries = audit.getEntriesForDate(date);
      } else if (type) {
        if (!isAuditEventType(type)) {
          res.status(400).json({ error: `Unknown audit event type: ${type}` });
          return;
        }
        entries = audit.getByType(type, limit ?? 50);
      } else {
        entries = audit.getRecent(limit ?? 100);
      }
      res.json({ entries });
    } catch (err) {
      log.error({ err }, 'Error fetching audit log');
      res.status(500).json({ error: 'Failed to fetch audit log' });
    }
  });

  router.get('/api/audit/report', (req, res) => {
    const parsed = auditQuerySchema.pick({ date: true }).safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'Invalid query' });
      return;
    }
    const date = parsed.data.date ?? new Date().toISOString().slice(0, 10);
    res.type('text/plain').send(getAuditLogger().generateDailyReport(date));
  });

  // ── Config (all, grouped by category) ───────────────────────────────
  router.get('/api/config', (_req, res) => {
    try {
      const grouped: Record<string, Array<Omit<ConfigEntry, 'category'>>> = {};
      for (const { category, ...entry } of configManager.entries()) {
        if (!grouped[category]) grouped[category] = [];
        grouped[category].push(entry);
      }
      res.json(grouped);
    } catch (err) {
      log.error({ err }, 'Error fetching config');
      res.status(500).json({ error: 'Failed to fetch config' });
    }
  });

  // ── Update config key ───────────────────────────────────────────────
  router.put('/api/config/:key', async (req, res) => {
    const { key } = req.params;
    const parsed = configUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'Invalid request body' });
      return;
    }
    const { value } = parsed.data;

    try {
      await configManager.set(key, value);
      getAuditLogger().logConfig(`Config ${key} updated`, { key });
      res.json({ key, value, updated: true });
    } catch (err) {
      if (err instanceof ConfigError) {
        res.status(400).json({ error: err.message });
        return;
      }
      log.error({ err }, 'Error updating config');
      res.status(500).json({ error: 'Failed to update config' });
    }
  });

  return router;
}
