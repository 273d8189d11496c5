import { createConfig, setLogLevel, type Puppet, type RuntimeConfig } from '@chatplug/core';
import { Contact, Message, Room } from '@chatplug/entities';
import type { ChatEventKind, ChatEventMap, DispatchReport } from '@chatplug/events';
import type { ChatPlugin, PluginRuntime } from '@chatplug/plugin-api';
import { PluginManager, type PluginManagerOptions } from './plugin-manager.js';

export interface ChatRuntimeOptions extends PluginManagerOptions {
  puppet: Puppet;
  /** Defaults to the configuration read from the environment */
  config?: RuntimeConfig;
}

/**
 * The handle plugins are bound to. Wraps the chat backend transport and
 * owns the plugin manager that receives its events.
 */
export class ChatRuntime implements PluginRuntime {
  readonly puppet: Puppet;
  readonly config: RuntimeConfig;
  readonly plugins: PluginManager;

  constructor(options: ChatRuntimeOptions) {
    this.puppet = options.puppet;
    this.config = options.config ?? createConfig();
    if (this.config.logLevel) {
      setLogLevel(this.config.logLevel);
    }
    this.plugins = new PluginManager(this, { loaders: options.loaders });
  }

  contact(id: string): Contact {
    return new Contact(this.puppet, id);
  }

  room(id: string): Room {
    return new Room(this.puppet, id);
  }

  message(id: string): Message {
    return new Message(this.puppet, id);
  }

  /** Register plugins in order. */
  async use(...plugins: Array<ChatPlugin | string>): Promise<void> {
    for (const plugin of plugins) {
      await this.plugins.add(plugin);
    }
  }

  start(): Promise<void> {
    return this.plugins.start();
  }

  stop(): Promise<void> {
    return this.plugins.close();
  }

  emit<K extends ChatEventKind>(kind: K, ...args: ChatEventMap[K]): Promise<DispatchReport>;
  emit(kind: string, ...args: unknown[]): Promise<DispatchReport>;
  emit(kind: string, ...args: unknown[]): Promise<DispatchReport> {
    return this.plugins.emit(kind, ...args);
  }
}
