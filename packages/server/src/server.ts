import express from 'express';
import { createServer } from 'http';
import type { AddressInfo } from 'net';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { logger } from '@chatplug/core/logger';
import type { PluginSummary, RouteContribution } from '@chatplug/plugin-api';
import { createPluginsRouter } from './routes/plugins.js';
import type { MountedRoute } from './routes-table.js';

export interface PluginServerOptions {
  host?: string;
  port?: number;
  /** Empty list allows any origin */
  allowedOrigins?: string[];
  rateLimit?: { windowMs: number; max: number };
  getPlugins: () => PluginSummary[];
  takeOutput: (name: string) => Record<string, unknown>;
}

function normalizePrefix(prefix: string): string {
  return prefix.replace(/^\/+|\/+$/g, '');
}

export function createPluginServer(options: PluginServerOptions) {
  const { host = '0.0.0.0', port = 5000, allowedOrigins = [], getPlugins, takeOutput } = options;
  const limits = options.rateLimit ?? { windowMs: 60 * 1000, max: 100 };

  const app = express();
  const server = createServer(app);
  const routes: MountedRoute[] = [];

  // Middleware
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error('Not allowed by CORS'));
        }
      },
    }),
  );
  app.use(express.json({ limit: '1mb' }));

  // Rate limiting
  app.use(
    '/api',
    rateLimit({
      windowMs: limits.windowMs,
      max: limits.max,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many requests, please try again later' },
    }),
  );

  app.use('/api', createPluginsRouter({ pluginsProvider: getPlugins, outputTaker: takeOutput }));

  /**
   * Mount a plugin's router at /api/plugins/{pluginName}/{prefix}.
   */
  function mount(pluginName: string, contribution: RouteContribution): MountedRoute {
    const prefix = normalizePrefix(contribution.prefix);
    const path = `/api/plugins/${pluginName}${prefix ? `/${prefix}` : ''}`;
    app.use(path, contribution.createRouter());
    const route: MountedRoute = { plugin: pluginName, prefix, path };
    routes.push(route);
    logger.debug({ plugin: pluginName, path }, 'Plugin routes mounted');
    return route;
  }

  function start(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      server.once('error', onError);
      server.listen(port, host, () => {
        server.removeListener('error', onError);
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Plugin server is not listening on a TCP port'));
          return;
        }
        logger.info({ host: address.address, port: address.port }, 'Plugin server started');
        resolve(address);
      });
    });
  }

  function stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!server.listening) {
        resolve();
        return;
      }
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        logger.info('Plugin server stopped');
        resolve();
      });
    });
  }

  return {
    app,
    server,
    get routes(): ReadonlyArray<MountedRoute> {
      return [...routes];
    },
    mount,
    start,
    stop,
  };
}

export type PluginServer = ReturnType<typeof createPluginServer>;
