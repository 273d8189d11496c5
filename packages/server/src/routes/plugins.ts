import { Router } from 'express';
import { PluginNotFoundError } from '@chatplug/core';
import { getLogBuffer, logger } from '@chatplug/core/logger';
import type { PluginSummary } from '@chatplug/plugin-api';

interface PluginsRouterDeps {
  pluginsProvider: () => PluginSummary[];
  outputTaker: (name: string) => Record<string, unknown>;
}

export function createPluginsRouter(deps: PluginsRouterDeps): Router {
  const router = Router();

  // GET /api/health
  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', plugins: deps.pluginsProvider().length });
  });

  // GET /api/plugins
  router.get('/plugins', (_req, res) => {
    res.json({ data: deps.pluginsProvider() });
  });

  // GET /api/logs
  router.get('/logs', (_req, res) => {
    res.json({ data: getLogBuffer() });
  });

  // GET /api/plugins/:name/output
  router.get('/plugins/:name/output', (req, res) => {
    const { name } = req.params;
    try {
      res.json({ data: deps.outputTaker(name) });
    } catch (err) {
      if (err instanceof PluginNotFoundError) {
        res.status(404).json({ error: err.message });
        return;
      }
      logger.error({ plugin: name, err }, 'Failed to drain plugin output');
      res.status(500).json({ error: 'Failed to read plugin output' });
    }
  });

  return router;
}
