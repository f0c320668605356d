import { describe, expect, it } from 'vitest';
import { CacheClient } from '../cache/client.js';
import { asyncRuntime } from '../core/runtime.js';
import { FakeTransport, memoryLogger } from '../testing/transports.js';
import { BuddiesEndpoint } from './buddies.js';

const level = { uuid: 'level-1', charmLevel: 1, displayName: 'Pocket Sage Buddy' };

describe('BuddiesEndpoint', () => {
  const transport = new FakeTransport('async', {
    buddies: { body: { data: [{ uuid: 'buddy-1', displayName: 'Pocket Sage Buddy', levels: [level] }] } },
    'buddies/levels': { body: { data: [level] } },
    'buddies/levels/level-1': { body: { data: level } },
  });
  const endpoint = new BuddiesEndpoint({
    transport,
    runtime: asyncRuntime,
    cache: new CacheClient(),
    logger: memoryLogger(),
    language: () => 'fr-FR',
  });

  it('decodes the levels nested in a buddy', async () => {
    const [, buddies] = await endpoint.fetchAll();

    expect(String(buddies?.[0]?.levels[0])).toBe('Pocket Sage Buddy');
    expect(buddies?.[0]?.levels[0]?.charmLevel).toBe(1);
  });

  it('fetches every level', async () => {
    const [err, levels] = await endpoint.fetchAllLevels();

    expect(err).toBeNull();
    expect(levels?.map((item) => item.uuid)).toEqual(['level-1']);
    expect(transport.calls.at(-1)).toBe('buddies/levels?language=fr-FR');
  });

  it('fetches one level by uuid', async () => {
    const [err, found] = await endpoint.fetchLevelFromUuid('level-1');

    expect(err).toBeNull();
    expect(String(found)).toBe('Pocket Sage Buddy');
    expect(transport.calls.at(-1)).toBe('buddies/levels/level-1?language=fr-FR');
  });
});
