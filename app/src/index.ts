// @chatplug/app: runtime wiring: plugin manager, loaders and web server
export { ChatRuntime } from './runtime.js';
export type { ChatRuntimeOptions } from './runtime.js';
export { PluginManager } from './plugin-manager.js';
export type { PluginManagerOptions } from './plugin-manager.js';
export {
  PLUGIN_URL_PATTERN,
  defaultLoaders,
  isRemoteLocator,
  loadPluginFromLocalFile,
  loadPluginFromRemoteUrl,
  resolvePlugin,
} from './plugin-loader.js';
export type { PluginLoader, PluginLoaders } from './plugin-loader.js';
