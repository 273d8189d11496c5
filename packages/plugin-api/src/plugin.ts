import {
  logger,
  PluginBindingError,
  type EventErrorPayload,
  type EventHeartbeatPayload,
  type EventReadyPayload,
  type ScanStatus,
} from '@chatplug/core';
import type {
  Contact,
  Friendship,
  Message,
  Room,
  RoomInvitation,
} from '@chatplug/entities';
import type { PluginLogger, PluginRuntime, RouteContributor } from './index.js';
import { PluginOutput } from './output.js';

export interface PluginOptions {
  /** Registry key; defaults to the plugin's class name */
  name?: string;
  /** Opaque data carried for operators */
  metadata?: Record<string, unknown>;
}

export function createPluginLogger(pluginName: string): PluginLogger {
  return {
    info: (msg, data) => logger.info({ plugin: pluginName, ...data }, msg),
    warn: (msg, data) => logger.warn({ plugin: pluginName, ...data }, msg),
    error: (msg, data) => logger.error({ plugin: pluginName, ...data }, msg),
    debug: (msg, data) => logger.debug({ plugin: pluginName, ...data }, msg),
  };
}

export function isRouteContributor(plugin: ChatPlugin): plugin is ChatPlugin & RouteContributor {
  return 'routes' in plugin && Array.isArray(plugin.routes);
}

/**
 * Base class for plugins. Every event handler is a no-op by default, so a
 * plugin overrides only the events it cares about.
 *
 * A plugin is created by the application, bound to one runtime when the
 * manager boots it, and can be stopped and started any number of times
 * without being bound again.
 */
export abstract class ChatPlugin {
  readonly options: PluginOptions;
  readonly output = new PluginOutput();

  private boundRuntime: PluginRuntime | null = null;
  private pluginLogger: PluginLogger | null = null;

  constructor(options: PluginOptions = {}) {
    this.options = { ...options };
  }

  /**
   * Resolved once: an unset name becomes the class name and is stored back
   * into the options.
   */
  get name(): string {
    if (!this.options.name) {
      this.options.name = this.constructor.name;
    }
    return this.options.name;
  }

  get metadata(): Record<string, unknown> {
    return this.options.metadata ?? {};
  }

  /** Names of plugins this one expects to be registered. Reported only. */
  get dependencies(): string[] {
    return [];
  }

  get logger(): PluginLogger {
    if (!this.pluginLogger) {
      this.pluginLogger = createPluginLogger(this.name);
    }
    return this.pluginLogger;
  }

  get isBound(): boolean {
    return this.boundRuntime !== null;
  }

  get runtime(): PluginRuntime {
    if (!this.boundRuntime) {
      throw new Error(`plugin <${this.name}> is not bound to a runtime`);
    }
    return this.boundRuntime;
  }

  bind(runtime: PluginRuntime): void {
    if (this.boundRuntime === runtime) return;
    if (this.boundRuntime) {
      throw new PluginBindingError(this.name);
    }
    this.boundRuntime = runtime;
  }

  /** Called once after binding, before routes are collected. */
  async init(_runtime: PluginRuntime): Promise<void> {}

  async onError(_payload: EventErrorPayload): Promise<void> {}

  async onHeartbeat(_payload: EventHeartbeatPayload): Promise<void> {}

  async onReady(_payload: EventReadyPayload): Promise<void> {}

  async onFriendship(_friendship: Friendship): Promise<void> {}

  async onLogin(_contact: Contact): Promise<void> {}

  async onLogout(_contact: Contact): Promise<void> {}

  async onMessage(_message: Message): Promise<void> {}

  async onRoomInvite(_invitation: RoomInvitation): Promise<void> {}

  async onRoomJoin(_room: Room, _invitees: Contact[], _inviter: Contact, _date: Date): Promise<void> {}

  async onRoomLeave(_room: Room, _leavers: Contact[], _remover: Contact, _date: Date): Promise<void> {}

  async onRoomTopic(
    _room: Room,
    _newTopic: string,
    _oldTopic: string,
    _changer: Contact,
    _date: Date,
  ): Promise<void> {}

  async onScan(_qrCode: string, _status: ScanStatus, _data?: string): Promise<void> {}
}
