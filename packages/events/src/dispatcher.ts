/**
 * EventDispatcher: validated, sequential fan-out of backend events to plugins.
 *
 * - emit() validates raw arguments against the kind's contract first
 * - plugins are awaited one after another in dispatch order
 * - whether a plugin is still running is checked when its turn comes
 * - a ring buffer retains the most recent N dispatches
 */
import { formatError, logger, type FailurePolicy } from '@chatplug/core';
import type { ChatPlugin } from '@chatplug/plugin-api';
import { parseEvent } from './contract.js';
import type { ChatEvent, ChatEventKind, ChatEventMap } from './types.js';

/** Source of plugins in dispatch order, filtered to the running ones. */
export interface DispatchTarget {
  activePlugins(): Iterable<ChatPlugin>;
}

export interface DispatchFailure {
  plugin: string;
  error: unknown;
}

export interface DispatchReport {
  kind: ChatEventKind;
  /** Plugins whose handler completed, in order */
  delivered: string[];
  /** Only populated under the isolate policy */
  failures: DispatchFailure[];
}

export interface EventRecord {
  kind: ChatEventKind;
  delivered: number;
  failed: number;
  aborted: boolean;
  timestamp: number;
}

export interface DispatcherOptions {
  /** Number of dispatches to retain in the ring buffer (default: 100) */
  bufferSize?: number;
  /** What a throwing handler does to the rest of the fan-out (default: fail-fast) */
  failurePolicy?: FailurePolicy;
}

function assertNever(event: never): never {
  throw new Error(`unhandled event: ${JSON.stringify(event)}`);
}

function deliver(plugin: ChatPlugin, event: ChatEvent): Promise<void> {
  switch (event.kind) {
    case 'error':
      return plugin.onError(...event.args);
    case 'heartbeat':
      return plugin.onHeartbeat(...event.args);
    case 'ready':
      return plugin.onReady(...event.args);
    case 'friendship':
      return plugin.onFriendship(...event.args);
    case 'login':
      return plugin.onLogin(...event.args);
    case 'logout':
      return plugin.onLogout(...event.args);
    case 'message':
      return plugin.onMessage(...event.args);
    case 'room-invite':
      return plugin.onRoomInvite(...event.args);
    case 'room-join':
      return plugin.onRoomJoin(...event.args);
    case 'room-leave':
      return plugin.onRoomLeave(...event.args);
    case 'room-topic':
      return plugin.onRoomTopic(...event.args);
    case 'scan':
      return plugin.onScan(...event.args);
    default:
      return assertNever(event);
  }
}

export class EventDispatcher {
  private buffer: EventRecord[] = [];
  private readonly bufferSize: number;
  readonly failurePolicy: FailurePolicy;

  constructor(
    private readonly target: DispatchTarget,
    options?: DispatcherOptions,
  ) {
    this.bufferSize = options?.bufferSize ?? 100;
    this.failurePolicy = options?.failurePolicy ?? 'fail-fast';
  }

  /**
   * Validate raw positional arguments and dispatch them.
   * Throws EventContractViolation before any plugin runs if they don't fit.
   */
  emit<K extends ChatEventKind>(kind: K, ...args: ChatEventMap[K]): Promise<DispatchReport>;
  emit(kind: string, ...args: unknown[]): Promise<DispatchReport>;
  async emit(kind: string, ...args: unknown[]): Promise<DispatchReport> {
    return this.dispatch(parseEvent(kind, args));
  }

  /**
   * Deliver an already-typed event to every running plugin in order.
   *
   * Under fail-fast the first handler error is rethrown and later plugins
   * do not see the event. Under isolate the error is recorded and the
   * fan-out continues.
   */
  async dispatch(event: ChatEvent): Promise<DispatchReport> {
    const report: DispatchReport = { kind: event.kind, delivered: [], failures: [] };

    for (const plugin of this.target.activePlugins()) {
      logger.debug({ plugin: plugin.name, event: event.kind }, 'Dispatching event');
      try {
        await deliver(plugin, event);
        report.delivered.push(plugin.name);
      } catch (err) {
        logger.error(
          { plugin: plugin.name, event: event.kind, err: formatError(err) },
          'Plugin handler failed',
        );
        if (this.failurePolicy === 'fail-fast') {
          this.record(report, true);
          throw err;
        }
        report.failures.push({ plugin: plugin.name, error: err });
      }
    }

    this.record(report, false);
    return report;
  }

  private record(report: DispatchReport, aborted: boolean): void {
    // Ring buffer: drop oldest if full
    if (this.buffer.length >= this.bufferSize) {
      this.buffer.shift();
    }
    this.buffer.push({
      kind: report.kind,
      delivered: report.delivered.length,
      failed: aborted ? 1 : report.failures.length,
      aborted,
      timestamp: Date.now(),
    });
  }

  /** Get a copy of the dispatch buffer. */
  getBuffer(): ReadonlyArray<EventRecord> {
    return [...this.buffer];
  }

  /** Clear the dispatch buffer. */
  clearBuffer(): void {
    this.buffer = [];
  }
}
