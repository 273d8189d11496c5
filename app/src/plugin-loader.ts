/**
 * Plugin Loader
 *
 * Resolves a plugin locator string to a plugin instance. A locator is
 * either a remote URL or a local file path; neither source is implemented
 * yet, so the default loaders resolve nothing.
 */

import { logger, PluginLoadError } from '@chatplug/core';
import type { ChatPlugin } from '@chatplug/plugin-api';

export type PluginLoader = (locator: string) => Promise<ChatPlugin | null>;

export interface PluginLoaders {
  local: PluginLoader;
  remote: PluginLoader;
}

/**
 * http(s)/ftp(s) URL with a domain name, `localhost` or IPv4 host, an
 * optional port and an optional path. Case-insensitive.
 */
export const PLUGIN_URL_PATTERN =
  /^(?:http|ftp)s?:\/\/(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\.)+(?:[A-Z]{2,6}\.?|[A-Z0-9-]{2,}\.?)|localhost|\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})(?::\d+)?(?:\/?|[/?]\S+)$/i;

export function isRemoteLocator(locator: string): boolean {
  return PLUGIN_URL_PATTERN.test(locator);
}

export async function loadPluginFromLocalFile(path: string): Promise<ChatPlugin | null> {
  logger.info({ path }, 'Loading plugin from local file');
  return null;
}

export async function loadPluginFromRemoteUrl(url: string): Promise<ChatPlugin | null> {
  logger.info({ url }, 'Loading plugin from remote url');
  return null;
}

export const defaultLoaders: PluginLoaders = {
  local: loadPluginFromLocalFile,
  remote: loadPluginFromRemoteUrl,
};

/**
 * Route a locator to the remote or local loader.
 * Throws PluginLoadError when the chosen loader resolves nothing.
 */
export async function resolvePlugin(
  locator: string,
  loaders: PluginLoaders = defaultLoaders,
): Promise<ChatPlugin> {
  const remote = isRemoteLocator(locator);
  const plugin = remote ? await loaders.remote(locator) : await loaders.local(locator);
  if (!plugin) {
    throw new PluginLoadError(locator, `the ${remote ? 'remote' : 'local'} loader resolved no plugin`);
  }
  return plugin;
}
