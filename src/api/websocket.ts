import type { IncomingMessage, Server } from 'node:http';
import { type WebSocket, WebSocketServer } from 'ws';
import type { SessionSnapshot, SessionStatusEvent } from '../auth/types.js';
import { createLogger } from '../utils/logger.js';
import { configuredApiKey, tokensMatch } from './middleware/auth.js';

const log = createLogger('websocket');

export interface WSEventMap {
  session_snapshot: SessionSnapshot;
  session_status: SessionStatusEvent;
  config_changed: { key: string };
}

export type WSEvent = keyof WSEventMap;

export interface WSMessage<E extends WSEvent = WSEvent> {
  event: E;
  data: WSEventMap[E];
  timestamp: string;
}

/** Reads ?token= from the upgrade request. */
export function upgradeToken(req: IncomingMessage): string | null {
  try {
    const url = new URL(req.url ?? '', `http://${req.headers.host ?? 'localhost'}`);
    return url.searchParams.get('token');
  } catch (err) {
    log.debug({ err }, 'Unparseable WebSocket upgrade URL');
    return null;
  }
}

/**
 * Pushes session state changes to dashboard clients on /ws. New clients get
 * the current snapshot first so they never wait for the next transition.
 */
export class WebSocketManager {
  private wss: WebSocketServer;
  private clients: Set<WebSocket> = new Set();
  private snapshot: () => SessionSnapshot | null = () => null;

  constructor(server: Server) {
    this.wss = new WebSocketServer({
      server,
      path: '/ws',
      verifyClient: (info, callback) => {
        const apiKey = configuredApiKey();
        if (!apiKey) {
          callback(true);
          return;
        }

        const token = upgradeToken(info.req);
        if (!token || !tokensMatch(token, apiKey)) {
          log.warn({ ip: info.req.socket.remoteAddress }, 'WebSocket connection rejected, unauthorized');
          callback(false, 4401, 'Unauthorized');
          return;
        }

        callback(true);
      },
    });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      log.info({ clientCount: this.clients.size }, 'WebSocket client connected');

      const current = this.snapshot();
      if (current) this.send(ws, 'session_snapshot', current);

      ws.on('close', () => {
        this.clients.delete(ws);
        log.debug({ clientCount: this.clients.size }, 'WebSocket client disconnected');
      });

      ws.on('error', (err) => {
        log.error({ err }, 'WebSocket error');
        this.clients.delete(ws);
      });
    });
  }

  setSnapshotProvider(provider: () => SessionSnapshot | null): void {
    this.snapshot = provider;
  }

  broadcast<E extends WSEvent>(event: E, data: WSEventMap[E]): void {
    for (const client of this.clients) {
      this.send(client, event, data);
    }
  }

  close(): void {
    for (const client of this.clients) {
      client.close();
    }
    this.clients.clear();
    this.wss.close();
  }

  getClientCount(): number {
    return this.clients.size;
  }

  private send<E extends WSEvent>(client: WebSocket, event: E, data: WSEventMap[E]): void {
    if (client.readyState !== 1) return;
    const message: WSMessage<E> = { event, data, timestamp: new Date().toISOString() };
    client.send(JSON.stringify(message));
  }
}
