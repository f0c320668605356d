import { readFileSync } from 'node:fs';
import { type ServerType, serve } from '@hono/node-server';
import { Hono } from 'hono';
import { z } from 'zod';
import { isLanguage } from '../src/types/request.js';
import { validator } from '../src/utils/validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../src/utils/wrap.js';

export type E2EServer = {
  /** Base URL to hand to the client, ending in `/v1/`. */
  url: string;
  close: () => Promise<Error | null>;
  reset: () => void;
  getCounts: () => Record<string, number>;
  /** Headers of the last request, lowercased. */
  lastHeaders: () => Record<string, string>;
};

const fixturesSchema = z.record(z.array(z.record(z.unknown())));

/** Canned resources keyed by path, e.g. `agents` or `buddies/levels`. */
export type Fixtures = z.output<typeof fixturesSchema>;

export function loadFixtures(): Fixtures {
  const [errRead, raw] = safeWrap(() => readFileSync(new URL('./fixtures.json', import.meta.url), 'utf8'));
  if (errRead) {
    throw new Error('error reading e2e fixtures', { cause: errRead });
  }

  const [errParse, fixtures] = validator(JSON.parse(raw), fixturesSchema);
  if (errParse) {
    throw errParse;
  }

  return fixtures;
}

/**
 * Starts an in-process imitation of valorant-api.com on an ephemeral port.
 *
 * - `GET /v1/<path>` answers `{ status: 200, data: [...] }`, filtered by `isPlayableCharacter`.
 * - `GET /v1/<path>/<uuid>` answers the item or a 404 body.
 * - A missing or unsupported `language` answers 400.
 * - `/v1/slow` answers after 200ms, `/v1/broken` answers 502 with a text body.
 */
export async function startE2EServer(fixtures: Fixtures): SafeWrapAsync<Error, E2EServer> {
  const counts: Record<string, number> = {};
  let lastHeaders: Record<string, string> = {};
  const app = new Hono();

  function increment(key: string) {
    counts[key] = (counts[key] ?? 0) + 1;
    return counts[key];
  }

  app.use('/v1/*', async (c, next) => {
    increment(`GET ${c.req.path}`);
    lastHeaders = c.req.header();
    await next();
  });

  app.get('/v1/slow', async (c) => {
    await new Promise((resolve) => setTimeout(resolve, 200));
    return c.json({ status: 200, data: [] });
  });

  app.get('/v1/broken', (c) => c.text('upstream exploded', 502));

  app.use('/v1/*', async (c, next) => {
    if (!isLanguage(c.req.query('language'))) {
      return c.json({ status: 400, error: 'the language parameter is invalid' }, 400);
    }

    await next();
  });

  // Deeper paths first so `buddies/levels` wins over `buddies/:uuid`.
  const paths = Object.keys(fixtures).sort((a, b) => b.split('/').length - a.split('/').length);
  for (const path of paths) {
    const items = fixtures[path] ?? [];

    app.get(`/v1/${path}`, (c) => {
      const playable = c.req.query('isPlayableCharacter');
      const data =
        playable === undefined ? items : items.filter((item) => String(item.isPlayableCharacter) === playable);
      return c.json({ status: 200, data });
    });

    app.get(`/v1/${path}/:uuid`, (c) => {
      const uuid = c.req.param('uuid');
      const item = items.find((candidate) => candidate.uuid === uuid);
      if (!item) {
        return c.json({ status: 404, error: `the requested uuid ${uuid} was not found` }, 404);
      }

      return c.json({ status: 200, data: item });
    });
  }

  const [errServer, serverAndPort] = await safeWrapAsync(
    () =>
      new Promise<[ServerType, number]>((resolve) => {
        const srv = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (serverInfo) => {
          resolve([srv, serverInfo.port]);
        });
      }),
  );

  if (errServer) {
    return [new Error('error starting server', { cause: errServer }), null];
  }

  const [server, port] = serverAndPort;

  return [
    null,
    {
      url: `http://127.0.0.1:${port}/v1/`,
      reset: () => {
        for (const k of Object.keys(counts)) {
          delete counts[k];
        }
      },
      getCounts: () => structuredClone(counts),
      lastHeaders: () => lastHeaders,
      close: () =>
        new Promise<Error | null>((resolve) =>
          server.close((err) => {
            if (err) {
              resolve(new Error('error closing server', { cause: err }));
              return;
            }

            resolve(null);
          }),
        ),
    },
  ];
}
