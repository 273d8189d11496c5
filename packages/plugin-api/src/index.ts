import type { Router } from 'express';
import type { Puppet, RuntimeConfig } from '@chatplug/core';
import type { Contact, Message, Room } from '@chatplug/entities';

// ============================================================================
// Runtime handle (passed to plugin lifecycle methods)
// ============================================================================

export interface PluginRuntime {
  /** Transport to the chat backend */
  readonly puppet: Puppet;
  /** Effective runtime configuration */
  readonly config: RuntimeConfig;
  /** Entity factories bound to the runtime's puppet */
  contact(id: string): Contact;
  room(id: string): Room;
  message(id: string): Message;
}

export interface PluginLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

// ============================================================================
// Route Contribution
// ============================================================================

export interface RouteContribution {
  /** Route prefix (mounted at /api/plugins/{pluginName}/{prefix}) */
  prefix: string;
  /** Express router factory */
  createRouter(): Router;
}

/** Capability of a plugin that exposes HTTP routes on the shared server. */
export interface RouteContributor {
  routes: RouteContribution[];
}

// ============================================================================
// Registry views
// ============================================================================

export const PluginStatus = {
  Running: 'running',
  Stopped: 'stopped',
} as const;

export type PluginStatus = (typeof PluginStatus)[keyof typeof PluginStatus];

/** Operator-facing snapshot of one registered plugin */
export interface PluginSummary {
  name: string;
  status: PluginStatus;
  metadata: Record<string, unknown>;
  dependencies: string[];
}

export { ChatPlugin, createPluginLogger, isRouteContributor } from './plugin.js';
export type { PluginOptions } from './plugin.js';
export { PluginOutput } from './output.js';
