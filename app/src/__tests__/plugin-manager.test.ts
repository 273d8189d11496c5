import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createServer } from 'http';
import request from 'supertest';
import { Router } from 'express';
import {
  createConfig,
  EventContractViolation,
  MessageType,
  PluginBindingError,
  PluginLoadError,
  PluginNotFoundError,
  type RuntimeConfig,
} from '@chatplug/core';
import type { Message } from '@chatplug/entities';
import {
  ChatPlugin,
  type PluginRuntime,
  type RouteContribution,
  type RouteContributor,
} from '@chatplug/plugin-api';
import { FakePuppet } from '../../../__tests__/helpers/fake-puppet.js';
import { ChatRuntime } from '../runtime.js';

class NotePlugin extends ChatPlugin {
  readonly seen: string[] = [];
  initCalls = 0;

  async init(_runtime: PluginRuntime): Promise<void> {
    this.initCalls += 1;
  }

  async onMessage(message: Message): Promise<void> {
    this.seen.push(message.id);
  }
}

class StatsPlugin extends ChatPlugin implements RouteContributor {
  readonly routes: RouteContribution[] = [
    {
      prefix: 'stats',
      createRouter: () =>
        Router().get('/', (_req, res) => {
          res.json({ data: { plugin: this.name } });
        }),
    },
  ];
}

function testConfig(overrides: Partial<RuntimeConfig['server']> = {}): RuntimeConfig {
  const base = createConfig({}, {});
  return {
    ...base,
    server: { ...base.server, enabled: false, host: '127.0.0.1', port: 0, ...overrides },
  };
}

function createRuntime(config: RuntimeConfig = testConfig()): ChatRuntime {
  const puppet = new FakePuppet()
    .addMessage({ id: 'm1', text: 'hello', type: MessageType.Text, talkerId: 'someone' });
  return new ChatRuntime({ puppet, config });
}

describe('PluginManager', () => {
  let runtime: ChatRuntime;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    runtime = createRuntime();
  });

  afterEach(async () => {
    await runtime.stop();
    vi.restoreAllMocks();
  });

  describe('add', () => {
    it('registers plugins as running in registration order', async () => {
      await runtime.use(new NotePlugin({ name: 'first' }), new NotePlugin({ name: 'second' }));
      expect(runtime.plugins.list().map((p) => [p.name, p.status])).toEqual([
        ['first', 'running'],
        ['second', 'running'],
      ]);
      expect(runtime.plugins.size).toBe(2);
    });

    it('ignores a duplicate name and keeps the first instance', async () => {
      const first = new NotePlugin({ name: 'dup' });
      await runtime.plugins.add(first);
      await runtime.plugins.add(new NotePlugin({ name: 'dup' }));

      expect(runtime.plugins.size).toBe(1);
      expect(console.warn).toHaveBeenCalledWith(
        '[WARN] Plugin already registered, ignoring {"plugin":"dup"}',
      );
      expect([...runtime.plugins.activePlugins()]).toEqual([first]);
    });

    it('raises PluginLoadError for locators the loaders cannot resolve', async () => {
      await expect(runtime.plugins.add('./plugins/missing.js')).rejects.toThrow(PluginLoadError);
      await expect(runtime.plugins.add('https://example.com/plugin.js')).rejects.toThrow(
        "can't load plugin <https://example.com/plugin.js>: the remote loader resolved no plugin",
      );
      expect(runtime.plugins.size).toBe(0);
    });

    it('routes locators to the matching loader', async () => {
      const local = vi.fn(async (_locator: string) => new NotePlugin({ name: 'from-file' }));
      const remote = vi.fn(async (_locator: string) => new NotePlugin({ name: 'from-url' }));
      const custom = new ChatRuntime({
        puppet: new FakePuppet(),
        config: testConfig(),
        loaders: { local, remote },
      });

      await custom.use('./local/plugin.js', 'http://localhost:8080/plugin');

      expect(local).toHaveBeenCalledWith('./local/plugin.js');
      expect(remote).toHaveBeenCalledWith('http://localhost:8080/plugin');
      expect(custom.plugins.list().map((p) => p.name)).toEqual(['from-file', 'from-url']);
    });
  });

  describe('remove, start, stop and status', () => {
    it('raises PluginNotFoundError for unknown names', () => {
      expect(() => runtime.plugins.remove('ghost')).toThrow(PluginNotFoundError);
      expect(() => runtime.plugins.start('ghost')).toThrow('plugin <ghost> does not exist');
      expect(() => runtime.plugins.stop('ghost')).toThrow(PluginNotFoundError);
      expect(() => runtime.plugins.status('ghost')).toThrow(PluginNotFoundError);
      expect(() => runtime.plugins.takeOutput('ghost')).toThrow(PluginNotFoundError);
    });

    it('toggles the status', async () => {
      await runtime.use(new NotePlugin({ name: 'toggle' }));
      runtime.plugins.stop('toggle');
      expect(runtime.plugins.status('toggle')).toBe('stopped');
      runtime.plugins.start('toggle');
      expect(runtime.plugins.status('toggle')).toBe('running');
    });

    it('warns on a second stop and stays stopped', async () => {
      await runtime.use(new NotePlugin({ name: 'twice' }));
      runtime.plugins.stop('twice');
      runtime.plugins.stop('twice');
      expect(console.warn).toHaveBeenCalledWith('[WARN] Plugin already stopped {"plugin":"twice"}');
      expect(runtime.plugins.status('twice')).toBe('stopped');
    });

    it('forgets a removed plugin entirely', async () => {
      await runtime.use(new NotePlugin({ name: 'gone' }));
      runtime.plugins.remove('gone');
      expect(runtime.plugins.has('gone')).toBe(false);
      expect(() => runtime.plugins.status('gone')).toThrow(PluginNotFoundError);
      expect(runtime.plugins.list()).toEqual([]);
    });
  });

  describe('activePlugins', () => {
    it('skips stopped plugins', async () => {
      const a = new NotePlugin({ name: 'a' });
      const b = new NotePlugin({ name: 'b' });
      await runtime.use(a, b);
      runtime.plugins.stop('a');
      expect([...runtime.plugins.activePlugins()]).toEqual([b]);
    });

    it('skips a plugin stopped while an earlier handler runs', async () => {
      const late = new NotePlugin({ name: 'late' });
      class StopperPlugin extends ChatPlugin {
        async onMessage(): Promise<void> {
          runtime.plugins.stop('late');
        }
      }
      await runtime.use(new StopperPlugin(), late);

      const report = await runtime.emit('message', runtime.message('m1'));

      expect(late.seen).toEqual([]);
      expect(report.delivered).toEqual(['StopperPlugin']);
    });
  });

  describe('list and output', () => {
    it('summarises name, status, metadata and dependencies', async () => {
      class DependentPlugin extends ChatPlugin {
        get dependencies(): string[] {
          return ['base'];
        }
      }
      await runtime.use(new DependentPlugin({ metadata: { version: '1.0.0' } }));
      runtime.plugins.stop('DependentPlugin');

      expect(runtime.plugins.list()).toEqual([
        {
          name: 'DependentPlugin',
          status: 'stopped',
          metadata: { version: '1.0.0' },
          dependencies: ['base'],
        },
      ]);
    });

    it('drains the output buffer', async () => {
      const plugin = new NotePlugin({ name: 'out' });
      await runtime.use(plugin);
      plugin.output.set('count', 3);
      expect(runtime.plugins.takeOutput('out')).toEqual({ count: 3 });
      expect(runtime.plugins.takeOutput('out')).toEqual({});
    });
  });

  describe('serverEndpoint', () => {
    it('prefixes http:// to a bare host', () => {
      const r = createRuntime(testConfig({ host: '0.0.0.0', port: 5000 }));
      expect(r.plugins.serverEndpoint).toBe('http://0.0.0.0:5000');
    });

    it('keeps a host that already carries a scheme', () => {
      const r = createRuntime(testConfig({ host: 'https://bot.example.test', port: 8443 }));
      expect(r.plugins.serverEndpoint).toBe('https://bot.example.test:8443');
    });
  });

  describe('start', () => {
    it('binds and initialises every plugin once', async () => {
      const plugin = new NotePlugin({ name: 'init' });
      await runtime.use(plugin);
      await runtime.start();

      expect(plugin.isBound).toBe(true);
      expect(plugin.runtime).toBe(runtime);
      expect(plugin.initCalls).toBe(1);

      await runtime.start();
      expect(plugin.initCalls).toBe(1);
      expect(console.warn).toHaveBeenCalledWith('[WARN]  Plugin manager already started');
    });

    it('boots plugins added after start', async () => {
      await runtime.start();
      const plugin = new NotePlugin({ name: 'late-comer' });
      await runtime.use(plugin);
      expect(plugin.initCalls).toBe(1);
      expect(plugin.isBound).toBe(true);
    });

    it('refuses a plugin bound to another runtime', async () => {
      const plugin = new NotePlugin({ name: 'shared' });
      const other = createRuntime();
      await other.use(plugin);
      await other.start();

      await runtime.use(plugin);
      await expect(runtime.start()).rejects.toThrow(PluginBindingError);
    });

    it('mounts contributed routes under the plugin name', async () => {
      await runtime.use(new StatsPlugin({ name: 'stats-plugin' }));
      await runtime.start();

      expect(runtime.plugins.server.routes).toEqual([
        { plugin: 'stats-plugin', prefix: 'stats', path: '/api/plugins/stats-plugin/stats' },
      ]);
      const res = await request(runtime.plugins.server.app).get('/api/plugins/stats-plugin/stats');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ data: { plugin: 'stats-plugin' } });
    });

    it('stops answering routes of a stopped or removed plugin', async () => {
      await runtime.use(new StatsPlugin({ name: 'quiet' }));
      await runtime.start();
      const app = runtime.plugins.server.app;

      runtime.plugins.stop('quiet');
      expect((await request(app).get('/api/plugins/quiet/stats')).status).toBe(404);

      runtime.plugins.start('quiet');
      expect((await request(app).get('/api/plugins/quiet/stats')).status).toBe(200);

      runtime.plugins.remove('quiet');
      expect((await request(app).get('/api/plugins/quiet/stats')).status).toBe(404);
    });

    it('serves the operator routes', async () => {
      const plugin = new NotePlugin({ name: 'listed' });
      await runtime.use(plugin);
      plugin.output.set('hits', 1);
      const app = runtime.plugins.server.app;

      expect((await request(app).get('/api/health')).body).toEqual({ status: 'ok', plugins: 1 });
      expect((await request(app).get('/api/plugins')).body.data[0].name).toBe('listed');
      expect((await request(app).get('/api/plugins/listed/output')).body).toEqual({
        data: { hits: 1 },
      });
    });

    it('boots an instance once across re-adds and restarts', async () => {
      class CountedStatsPlugin extends StatsPlugin {
        initCalls = 0;

        async init(_runtime: PluginRuntime): Promise<void> {
          this.initCalls += 1;
        }
      }
      const plugin = new CountedStatsPlugin({ name: 'once' });

      await runtime.use(plugin);
      await runtime.start();
      runtime.plugins.remove('once');
      await runtime.use(plugin);
      await runtime.stop();
      await runtime.start();

      expect(plugin.initCalls).toBe(1);
      expect(runtime.plugins.server.routes).toHaveLength(1);
      const res = await request(runtime.plugins.server.app).get('/api/plugins/once/stats');
      expect(res.body).toEqual({ data: { plugin: 'once' } });
    });

    it('listens on a later start after the port was busy', async () => {
      const blocker = createServer();
      await new Promise<void>((resolve) => blocker.listen(0, '127.0.0.1', resolve));
      const address = blocker.address();
      if (address === null || typeof address === 'string') {
        throw new Error('blocker is not listening on a TCP port');
      }

      const plugin = new NotePlugin({ name: 'patient' });
      const served = createRuntime(testConfig({ enabled: true, port: address.port }));
      await served.use(plugin);

      await expect(served.start()).rejects.toThrow('EADDRINUSE');
      expect(served.plugins.server.server.listening).toBe(false);

      await new Promise<void>((resolve, reject) =>
        blocker.close((err) => (err ? reject(err) : resolve())),
      );
      await served.start();

      expect(served.plugins.server.server.listening).toBe(true);
      expect(plugin.initCalls).toBe(1);
      await served.stop();
    });

    it('listens when the server is enabled', async () => {
      const served = createRuntime(testConfig({ enabled: true }));
      await served.start();
      expect(served.plugins.server.server.listening).toBe(true);
      await served.stop();
      expect(served.plugins.server.server.listening).toBe(false);
    });
  });

  describe('emit', () => {
    it('delivers to running plugins in registration order', async () => {
      const order: string[] = [];
      class OrderedPlugin extends ChatPlugin {
        async onMessage(): Promise<void> {
          order.push(this.name);
        }
      }
      await runtime.use(
        new OrderedPlugin({ name: 'one' }),
        new OrderedPlugin({ name: 'two' }),
        new OrderedPlugin({ name: 'three' }),
      );
      runtime.plugins.stop('two');

      await runtime.emit('message', runtime.message('m1'));
      expect(order).toEqual(['one', 'three']);
    });

    it('keeps registration order across stop and start', async () => {
      const order: string[] = [];
      class OrderedPlugin extends ChatPlugin {
        async onMessage(): Promise<void> {
          order.push(this.name);
        }
      }
      await runtime.use(
        new OrderedPlugin({ name: 'one' }),
        new OrderedPlugin({ name: 'two' }),
        new OrderedPlugin({ name: 'three' }),
      );
      runtime.plugins.stop('two');
      runtime.plugins.start('two');

      await runtime.emit('message', runtime.message('m1'));
      expect(order).toEqual(['one', 'two', 'three']);
    });

    it('rejects invalid arguments before any plugin runs', async () => {
      const plugin = new NotePlugin({ name: 'strict' });
      await runtime.use(plugin);
      await expect(runtime.emit('message')).rejects.toThrow(EventContractViolation);
      await expect(runtime.emit('room-join', runtime.room('r'), runtime.contact('c'))).rejects.toThrow(
        EventContractViolation,
      );
      expect(plugin.seen).toEqual([]);
    });

    it('records dispatches in the dispatcher buffer', async () => {
      await runtime.use(new NotePlugin({ name: 'buffered' }));
      await runtime.emit('heartbeat', { data: 'tick' });
      expect(runtime.plugins.dispatcher.getBuffer()).toEqual([
        expect.objectContaining({ kind: 'heartbeat', delivered: 1, failed: 0, aborted: false }),
      ]);
    });

    it('follows the configured failure policy', async () => {
      class BrokenPlugin extends ChatPlugin {
        async onMessage(): Promise<void> {
          throw new Error('broken');
        }
      }
      const base = testConfig();
      const isolating = createRuntime({ ...base, events: { ...base.events, failurePolicy: 'isolate' } });
      const after = new NotePlugin({ name: 'after' });
      await isolating.use(new BrokenPlugin(), after);

      const report = await isolating.emit('message', isolating.message('m1'));
      expect(after.seen).toEqual(['m1']);
      expect(report.failures.map((f) => f.plugin)).toEqual(['BrokenPlugin']);

      const failing = new NotePlugin({ name: 'after' });
      await runtime.use(new BrokenPlugin(), failing);
      await expect(runtime.emit('message', runtime.message('m1'))).rejects.toThrow('broken');
      expect(failing.seen).toEqual([]);
    });
  });
});
