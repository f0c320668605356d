import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../error/configurationError.js';
import { getNotFoundError } from '../error/notFoundError.js';
import { FetchClient } from '../fetch/client.js';
import { SyncFetchClient } from '../fetch/syncClient.js';
import { FakeTransport, memoryLogger, type Route } from '../testing/transports.js';
import type { Mode } from '../utils/wrap.js';
import { ValorantClient } from './client.js';

const routes: Record<string, Route> = {
  agents: { body: { status: 200, data: [{ uuid: 'abc', displayName: 'Test' }] } },
  'agents/nonexistent-uuid': { status: 404, body: { status: 404, error: 'the requested agent was not found' } },
  ceremonies: { body: { status: 200, data: [{ uuid: 'ace', displayName: 'ACE' }] } },
  'gamemodes/equippables': { body: { status: 200, data: [{ uuid: 'snowball', displayName: 'Snowball Launcher' }] } },
};

describe('ValorantClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('construction', () => {
    it('defaults to en-US and the mode transport', () => {
      const asyncClient = new ValorantClient({ mode: 'async' });
      const syncClient = new ValorantClient({ mode: 'sync' });

      expect(asyncClient.language).toBe('en-US');
      expect(asyncClient.transport).toBeInstanceOf(FetchClient);
      expect(syncClient.transport).toBeInstanceOf(SyncFetchClient);
      expect(syncClient.mode).toBe('sync');
    });

    it('rejects an unsupported language', () => {
      // @ts-expect-error unsupported language on purpose
      expect(() => new ValorantClient({ mode: 'async', language: 'xx-XX' })).toThrow(ConfigurationError);
    });

    it('rejects an unknown mode', () => {
      // @ts-expect-error unknown mode on purpose
      expect(() => new ValorantClient({ mode: 'parallel' })).toThrow('error unknown mode parallel');
    });

    it('rejects a transport running in another mode without calling it', () => {
      const transport = new FakeTransport('async', routes);

      let error: unknown;
      try {
        new ValorantClient<Mode>({ mode: 'sync', transport });
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toHaveProperty('option', 'transport');
      expect(transport.calls).toEqual([]);
    });

    it('forwards fetchOpts to an injected transport', () => {
      const transport = new FakeTransport('sync', routes);

      new ValorantClient({ mode: 'sync', transport, fetchOpts: { timeout: 5_000 } });

      expect(transport.configs).toEqual([{ timeout: 5_000 }]);
    });
  });

  describe('endpoints', () => {
    it('exposes every resource in blocking mode', () => {
      const client = new ValorantClient({ mode: 'sync', transport: new FakeTransport('sync', routes) });

      const [err, agents] = client.agents.fetchAll();

      expect(err).toBeNull();
      expect(agents?.length).toBe(1);
      expect(agents?.[0]?.uuid).toBe('abc');
      expect(String(agents?.[0])).toBe('Test');
      expect(client.ceremonies.fetchAll()[1]?.map(String)).toEqual(['ACE']);
      expect(client.gamemodeEquippables.fetchAll()[1]?.map(String)).toEqual(['Snowball Launcher']);
    });

    it('exposes every resource in suspending mode', async () => {
      const client = new ValorantClient({ mode: 'async', transport: new FakeTransport('async', routes) });

      const [err, agent] = await client.agents.fetchFromUuid('nonexistent-uuid');

      expect(agent).toBeNull();
      expect(Number(getNotFoundError(err))).toBe(404);
    });

    it('wires all facades', () => {
      const client = new ValorantClient({ mode: 'sync', transport: new FakeTransport('sync') });

      for (const facade of [
        client.agents,
        client.buddies,
        client.bundles,
        client.ceremonies,
        client.competitiveTiers,
        client.contentTiers,
        client.contracts,
        client.currencies,
        client.events,
        client.gamemodes,
        client.gamemodeEquippables,
      ]) {
        expect(typeof facade.fetchAll).toBe('function');
        expect(typeof facade.fetchFromUuid).toBe('function');
      }
    });
  });

  describe('language', () => {
    it('applies a new language to later requests', () => {
      const transport = new FakeTransport('sync', routes);
      const client = new ValorantClient({ mode: 'sync', transport, language: 'pt-BR' });

      client.agents.fetchAll();
      client.language = 'ko-KR';
      client.agents.fetchAll();

      expect(transport.calls).toEqual(['agents?language=pt-BR', 'agents?language=ko-KR']);
    });

    it('keeps the current language when the new one is invalid', () => {
      const client = new ValorantClient({ mode: 'sync', transport: new FakeTransport('sync') });

      expect(() => {
        // @ts-expect-error unsupported language on purpose
        client.language = 'en-GB';
      }).toThrow('error unsupported language en-GB');
      expect(client.language).toBe('en-US');
    });
  });

  describe('config', () => {
    it('forwards options to the transport and cache', () => {
      const transport = new FakeTransport('sync', routes);
      const client = new ValorantClient({ mode: 'sync', transport, cacheOpts: { ttl: 1_000 } });

      client.agents.fetchAll({ cache: true });
      client.config({ language: 'es-MX', fetchOpts: { headers: { 'X-Trace': '1' } }, cacheOpts: { ttl: 2_000 } });
      client.language = 'en-US';
      client.agents.fetchAll({ cache: true });

      expect(transport.configs).toEqual([{ headers: { 'X-Trace': '1' } }]);
      expect(transport.calls).toHaveLength(2);
    });
  });

  describe('cache', () => {
    it('clearCache drops memoized results', () => {
      const transport = new FakeTransport('sync', routes);
      const client = new ValorantClient({ mode: 'sync', transport });

      client.agents.fetchAll({ cache: true });
      client.agents.fetchAll({ cache: true });
      client.clearCache();
      client.agents.fetchAll({ cache: true });

      expect(transport.calls).toHaveLength(2);
    });

    it('is owned by each client', () => {
      const transport = new FakeTransport('sync', routes);
      const first = new ValorantClient({ mode: 'sync', transport });
      const second = new ValorantClient({ mode: 'sync', transport });

      first.agents.fetchAll({ cache: true });
      second.agents.fetchAll({ cache: true });

      expect(transport.calls).toHaveLength(2);
    });
  });

  describe('dispose', () => {
    it('drops the cache and disposes the transport', () => {
      const transport = new FakeTransport('sync', routes);
      const client = new ValorantClient({ mode: 'sync', transport });

      client.agents.fetchAll({ cache: true });
      client.dispose();
      client.agents.fetchAll({ cache: true });

      expect(transport.disposed).toBe(1);
      expect(transport.calls).toHaveLength(2);
    });
  });

  describe('logging', () => {
    it('logs requests through an injected logger', () => {
      const logger = memoryLogger();
      const client = new ValorantClient({ mode: 'sync', transport: new FakeTransport('sync', routes), logger });

      client.agents.fetchAll();

      expect(logger.entries.map((entry) => entry.msg)).toEqual(['client created', 'request']);
      expect(logger.entries[1]?.data).toEqual({ operation: 'agents.fetchAll', url: 'agents?language=en-US' });
    });

    it('writes debug lines to stderr only when debug is on', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

      new ValorantClient({ mode: 'sync', transport: new FakeTransport('sync', routes) }).agents.fetchAll();
      expect(write).not.toHaveBeenCalled();

      new ValorantClient({ mode: 'sync', transport: new FakeTransport('sync', routes), debug: true }).agents.fetchAll();
      expect(write).toHaveBeenCalledTimes(2);
      expect(JSON.parse(String(write.mock.calls[1]?.[0]))).toMatchObject({
        level: 'debug',
        ns: 'valorant-api',
        msg: 'request',
        data: { operation: 'agents.fetchAll' },
      });
    });
  });
});
