/**
 * PluginManager: ordered plugin registry, lifecycle and event fan-out.
 *
 * Plugins are kept in registration order, which is also dispatch order.
 * Each registered name always has exactly one status.
 */

import { Router, type RequestHandler } from 'express';
import { endpointOf, logger, PluginNotFoundError } from '@chatplug/core';
import {
  EventDispatcher,
  type ChatEventKind,
  type ChatEventMap,
  type DispatchReport,
  type DispatchTarget,
} from '@chatplug/events';
import {
  isRouteContributor,
  PluginStatus,
  type ChatPlugin,
  type PluginRuntime,
  type PluginSummary,
  type RouteContribution,
} from '@chatplug/plugin-api';
import { createPluginServer, formatRoutesTable, type PluginServer } from '@chatplug/server';
import { defaultLoaders, resolvePlugin, type PluginLoaders } from './plugin-loader.js';

export interface PluginManagerOptions {
  /** Replace the loaders used for locator strings */
  loaders?: Partial<PluginLoaders>;
}

export class PluginManager implements DispatchTarget {
  private readonly plugins = new Map<string, ChatPlugin>();
  private readonly statuses = new Map<string, PluginStatus>();
  private readonly loaders: PluginLoaders;
  /** Instances already bound, initialised and mounted */
  private readonly booted = new WeakSet<ChatPlugin>();
  private started = false;

  readonly dispatcher: EventDispatcher;
  readonly server: PluginServer;

  constructor(
    private readonly runtime: PluginRuntime,
    options: PluginManagerOptions = {},
  ) {
    const { config } = runtime;
    this.loaders = { ...defaultLoaders, ...options.loaders };
    this.dispatcher = new EventDispatcher(this, {
      bufferSize: config.events.bufferSize,
      failurePolicy: config.events.failurePolicy,
    });
    this.server = createPluginServer({
      host: config.server.host,
      port: config.server.port,
      allowedOrigins: config.server.allowedOrigins,
      rateLimit: config.server.rateLimit,
      getPlugins: () => this.list(),
      takeOutput: (name) => this.takeOutput(name),
    });
  }

  // ==========================================================================
  // Registry
  // ==========================================================================

  /**
   * Register a plugin instance, or load one from a locator string.
   * A name that is already registered is logged and ignored.
   */
  async add(plugin: ChatPlugin | string): Promise<void> {
    const instance =
      typeof plugin === 'string' ? await resolvePlugin(plugin, this.loaders) : plugin;

    if (this.plugins.has(instance.name)) {
      logger.warn({ plugin: instance.name }, 'Plugin already registered, ignoring');
      return;
    }

    this.plugins.set(instance.name, instance);
    this.statuses.set(instance.name, PluginStatus.Running);
    logger.info({ plugin: instance.name }, 'Plugin registered');

    if (this.started) {
      await this.boot(instance);
    }
  }

  remove(name: string): void {
    this.require(name);
    this.plugins.delete(name);
    this.statuses.delete(name);
    logger.info({ plugin: name }, 'Plugin removed');
  }

  start(name: string): void;
  start(): Promise<void>;
  start(name?: string): void | Promise<void> {
    if (name === undefined) return this.startAll();
    logger.info({ plugin: name }, 'Starting plugin');
    this.require(name);
    this.statuses.set(name, PluginStatus.Running);
  }

  stop(name: string): void {
    logger.info({ plugin: name }, 'Stopping plugin');
    this.require(name);
    if (this.statuses.get(name) === PluginStatus.Stopped) {
      logger.warn({ plugin: name }, 'Plugin already stopped');
    }
    this.statuses.set(name, PluginStatus.Stopped);
  }

  status(name: string): PluginStatus {
    this.require(name);
    return this.statuses.get(name) ?? PluginStatus.Stopped;
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  get size(): number {
    return this.plugins.size;
  }

  /**
   * Registration-order iterator over running plugins. Status is read when
   * each plugin's turn comes, so a plugin stopped mid-dispatch is skipped.
   */
  *activePlugins(): Generator<ChatPlugin> {
    for (const [name, plugin] of this.plugins) {
      if (this.statuses.get(name) === PluginStatus.Running) {
        yield plugin;
      }
    }
  }

  list(): PluginSummary[] {
    return [...this.plugins.values()].map((plugin) => ({
      name: plugin.name,
      status: this.status(plugin.name),
      metadata: plugin.metadata,
      dependencies: plugin.dependencies,
    }));
  }

  /** Drain a plugin's output buffer. */
  takeOutput(name: string): Record<string, unknown> {
    return this.require(name).output.take();
  }

  /** Base URL of the plugin web server, e.g. `http://0.0.0.0:5000`. */
  get serverEndpoint(): string {
    const [host, port] = endpointOf(this.runtime.config);
    const prefix = host.startsWith('http') ? '' : 'http://';
    return `${prefix}${host}:${port}`;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  private async startAll(): Promise<void> {
    if (this.started) {
      logger.warn('Plugin manager already started');
      return;
    }
    logger.info({ count: this.plugins.size }, 'Starting plugins');

    for (const plugin of this.plugins.values()) {
      await this.boot(plugin);
    }
    this.started = true;

    if (this.runtime.config.server.enabled) {
      try {
        await this.server.start();
      } catch (err) {
        this.started = false;
        throw err;
      }
      logger.info({ endpoint: this.serverEndpoint }, 'Plugin web service started');
    }
    logger.info(formatRoutesTable(this.server.routes));
  }

  async close(): Promise<void> {
    await this.server.stop();
    this.started = false;
  }

  /** Bind, init and mount routes once per instance, however often it is re-added or restarted. */
  private async boot(plugin: ChatPlugin): Promise<void> {
    if (this.booted.has(plugin)) return;
    logger.info({ plugin: plugin.name }, 'Initializing plugin');
    plugin.bind(this.runtime);
    await plugin.init(this.runtime);
    this.booted.add(plugin);

    if (isRouteContributor(plugin)) {
      for (const contribution of plugin.routes) {
        this.mountRoutes(plugin, contribution);
      }
    }
  }

  /**
   * Routes answer only while this exact plugin instance is registered and
   * running; otherwise the request falls through to the next handler.
   */
  private mountRoutes(plugin: ChatPlugin, contribution: RouteContribution): void {
    const name = plugin.name;
    const guard: RequestHandler = (_req, _res, next) => {
      const active =
        this.plugins.get(name) === plugin && this.statuses.get(name) === PluginStatus.Running;
      if (active) {
        next();
      } else {
        next('router');
      }
    };

    this.server.mount(name, {
      prefix: contribution.prefix,
      createRouter: () => Router().use(guard, contribution.createRouter()),
    });
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  emit<K extends ChatEventKind>(kind: K, ...args: ChatEventMap[K]): Promise<DispatchReport>;
  emit(kind: string, ...args: unknown[]): Promise<DispatchReport>;
  emit(kind: string, ...args: unknown[]): Promise<DispatchReport> {
    return this.dispatcher.emit(kind, ...args);
  }

  private require(name: string): ChatPlugin {
    const plugin = this.plugins.get(name);
    if (!plugin) {
      throw new PluginNotFoundError(name);
    }
    return plugin;
  }
}
