import { createServer, type Server } from 'node:http';
import cors from 'cors';
import express, { type Express } from 'express';
import rateLimit from 'express-rate-limit';
import { createLogger } from '../utils/logger.js';
import { authMiddleware } from './middleware/auth.js';
import { createRouter } from './routes.js';
import { WebSocketManager } from './websocket.js';

const log = createLogger('api-server');

export interface ApiServerOptions {
  port?: number;
  /** Interface to bind. Tokens are served here, so loopback unless told otherwise. */
  host?: string;
  corsOrigins?: string[];
  /** Requests per minute on the session and config routes. */
  sessionRateLimit?: number;
}

function optionsFromEnv(): Required<ApiServerOptions> {
  return {
    port: Number(process.env.API_PORT) || 3001,
    host: process.env.API_HOST?.trim() || '127.0.0.1',
    corsOrigins: process.env.CORS_ORIGINS
      ? process.env.CORS_ORIGINS.split(',').map((s) => s.trim())
      : ['http://localhost:3000'],
    sessionRateLimit: 10,
  };
}

export class ApiServer {
  private app: Express;
  private server: Server;
  private wsManager: WebSocketManager;
  private opts: Required<ApiServerOptions>;

  constructor(options: ApiServerOptions = {}) {
    this.opts = { ...optionsFromEnv(), ...options };
    this.app = express();

    this.app.use(
      cors({
        origin: this.opts.corsOrigins,
        methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
        credentials: true,
      }),
    );
    this.app.use(express.json());
    this.app.use(authMiddleware);

    this.app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: 100,
        standardHeaders: true,
        legacyHeaders: false,
        message: { error: 'Too many requests, please try again later' },
      }),
    );

    // A token request may drive a browser login
    const sessionLimiter = rateLimit({
      windowMs: 60 * 1000,
      max: this.opts.sessionRateLimit,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many session requests, please try again later' },
    });
    this.app.use(['/api/session', '/api/config'], sessionLimiter);

    this.app.use(createRouter());

    this.server = createServer(this.app);
    this.wsManager = new WebSocketManager(this.server);
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.opts.port, this.opts.host, () => {
        this.server.off('error', reject);
        log.info({ host: this.opts.host, port: this.getPort() }, 'API server started');
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.wsManager.close();
      this.server.close((err) => {
        if (err) reject(err);
        else {
          log.info('API server stopped');
          resolve();
        }
      });
    });
  }

  /** The bound port; differs from the configured one when that was 0. */
  getPort(): number {
    const address = this.server.address();
    return address && typeof address === 'object' ? address.port : this.opts.port;
  }

  getApp(): Express {
    return this.app;
  }

  getWsManager(): WebSocketManager {
    return this.wsManager;
  }
}
