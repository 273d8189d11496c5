// @chatplug/server: express app serving operator routes and plugin routers
export { createPluginServer } from './server.js';
export type { PluginServer, PluginServerOptions } from './server.js';
export { createPluginsRouter } from './routes/plugins.js';
export { formatRoutesTable } from './routes-table.js';
export type { MountedRoute } from './routes-table.js';
