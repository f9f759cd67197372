/**
 * Web Server
 *
 * Express app exposing the quality gate as background jobs.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import type { QualityGateConfig } from '../config/gate-config';
import type { JobService } from '../jobs/job-service';
import type { GateLogger } from '../logging/gate-logger';
import { createQualityGateRoutes } from './routes/quality-gate';

export interface WebServerConfig {
  /** Port number (default: 5680) */
  port?: number;
  /** Host (default: localhost) */
  host?: string;
  jobService: JobService;
  /** Options every job starts from; requests may override a subset */
  baseConfig: QualityGateConfig;
  logger: GateLogger;
  version?: string;
}

export interface WebServerState {
  isRunning: boolean;
  port: number;
  host: string;
}

/**
 * Error response format
 */
interface ErrorResponse {
  error: string;
  message: string;
}

export function createApp(config: WebServerConfig): Express {
  const app = express();
  const { jobService, baseConfig, logger, version } = config;

  app.use(express.json({ limit: '2mb' }));

  // CORS headers for local development
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    next();
  });

  /**
   * GET /api/health
   */
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version,
      pid: process.pid,
      jobs: jobService.listJobs().length,
    });
  });

  app.use('/api', createQualityGateRoutes({ jobService, baseConfig }));

  // 404 for unknown API routes
  app.use('/api', (req: Request, res: Response) => {
    const body: ErrorResponse = { error: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` };
    res.status(404).json(body);
  });

  // Error handler; express recognises it by its four parameters
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      const body: ErrorResponse = { error: 'INVALID_JSON', message: err.message };
      res.status(400).json(body);
      return;
    }
    logger.logError('Unhandled request error', err);
    const body: ErrorResponse = {
      error: 'INTERNAL_ERROR',
      message: err instanceof Error ? err.message : String(err),
    };
    res.status(500).json(body);
  });

  return app;
}

export class WebServer {
  private readonly app: Express;
  private readonly port: number;
  private readonly host: string;
  private server: ReturnType<Express['listen']> | null = null;

  constructor(config: WebServerConfig) {
    this.port = config.port || 5680;
    this.host = config.host || 'localhost';
    this.app = createApp(config);
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.server = this.app.listen(this.port, this.host, () => {
          resolve();
        });
        this.server.on('error', reject);
      } catch (error) {
        reject(error);
      }
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => {
        if (err) {
          reject(err);
        } else {
          this.server = null;
          resolve();
        }
      });
    });
  }

  getState(): WebServerState {
    return {
      isRunning: this.server !== null,
      port: this.port,
      host: this.host,
    };
  }

  getApp(): Express {
    return this.app;
  }
}
