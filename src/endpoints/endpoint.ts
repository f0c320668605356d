import type { StandardSchemaV1 } from '@standard-schema/spec';
import { z } from 'zod';
import type { CacheClient } from '../cache/client.js';
import type { Runtime } from '../core/runtime.js';
import { list } from '../entities/shared.js';
import { ConfigurationError } from '../error/configurationError.js';
import type { Language, Payload, QueryParams, Transport } from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import type { Logger } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import type { Mode, Result, SafeWrap } from '../utils/wrap.js';

/** Everything an endpoint facade shares with its client. */
export interface EndpointContext<M extends Mode> {
  transport: Transport<M>;
  runtime: Runtime<M>;
  cache: CacheClient;
  logger: Logger;
  /** Read on every request, so language changes on the client apply immediately. */
  language: () => Language;
}

/** Options accepted by every fetch operation. */
export interface FetchOptions {
  /**
   * Serve from and store into the client's cache. A falsy value evicts
   * the entry for these arguments and requests fresh data.
   * @default false
   */
  cache?: boolean;
}

/** Description of a single GET issued by a facade. */
export interface RequestDefinition<T> {
  /** Path template relative to the base URL, e.g. `agents/{uuid}`. */
  path: string;
  pathParams?: Record<string, string>;
  /** Query parameters sent to the server, besides `language`. */
  params?: QueryParams;
  /** Arguments that shape the result without being sent; they only take part in the cache key. */
  localParams?: Record<string, unknown>;
  /** Schema for the `data` member of the response. */
  schema: StandardSchemaV1<unknown, T>;
  cache?: boolean;
  /** Applied after decoding. */
  select?: (data: T) => T;
}

/** Zod schema whose output is `T`, as produced by the entity modules. */
export type EntitySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const envelopeSchema = z.object({ data: z.unknown() });

/**
 * Base class of the endpoint facades.
 *
 * One implementation serves both execution modes: the {@link Runtime} picked
 * at construction decides whether results are tuples or promises of tuples.
 */
export abstract class Endpoint<M extends Mode> {
  /** Prefix of operation names in cache keys and logs. */
  protected abstract readonly resource: string;
  #context: EndpointContext<M>;

  constructor(context: EndpointContext<M>) {
    const { transport, runtime } = context;
    if (transport.mode !== runtime.mode) {
      throw new ConfigurationError(
        `error transport runs in ${transport.mode} mode but the endpoint expects ${runtime.mode}`,
        'transport',
      );
    }

    this.#context = context;
  }

  /**
   * Issues a GET, decodes `data` with `definition.schema` and memoizes the result when asked to.
   */
  protected request<T>(operation: string, definition: RequestDefinition<T>): Result<M, T> {
    const { runtime, cache, logger, transport } = this.#context;
    const name = `${this.resource}.${operation}`;
    const params: QueryParams = { ...definition.params, language: this.#context.language() };

    const [errUrl, url] = constructUrl(definition.path, definition.pathParams, params);
    if (errUrl) {
      return runtime.of<T>([new Error(`error constructing url for ${name}`, { cause: errUrl }), null]);
    }

    let invoked = false;
    const call = (): Result<M, T> => {
      invoked = true;
      logger.debug('request', { operation: name, url });
      return runtime.then<Payload, T>(transport.get(url), (outcome) => this.#decode(name, definition, outcome));
    };

    const key = cache.key(name, { path: definition.path, ...definition.pathParams, ...params, ...definition.localParams });
    if (!definition.cache) {
      if (cache.evict(key)) {
        logger.debug('cache evicted', { operation: name, key });
      }

      return call();
    }

    const result = cache.memoize<M, T>(runtime, key, call);
    if (!invoked) {
      logger.debug('cache hit', { operation: name, key });
    }

    return result;
  }

  #decode<T>(name: string, definition: RequestDefinition<T>, outcome: SafeWrap<Error, Payload>): SafeWrap<Error, T> {
    const [errGet, payload] = outcome;
    if (errGet) {
      return [new Error(`error requesting ${name}`, { cause: errGet }), null];
    }

    const [errEnvelope, envelope] = validator(payload, envelopeSchema);
    if (errEnvelope) {
      this.#context.logger.warn('decode failed', { operation: name, error: errEnvelope.message });
      return [new Error(`error decoding response of ${name}`, { cause: errEnvelope }), null];
    }

    const [errData, data] = validator(envelope.data, definition.schema);
    if (errData) {
      this.#context.logger.warn('decode failed', { operation: name, error: errData.message });
      return [new Error(`error decoding response of ${name}`, { cause: errData }), null];
    }

    return [null, definition.select ? definition.select(data) : data];
  }
}

/**
 * Facade for a resource with the usual pair of operations:
 * the whole collection, and one item by uuid.
 */
export abstract class CollectionEndpoint<M extends Mode, T> extends Endpoint<M> {
  /** Resource path, e.g. `agents`. */
  protected abstract readonly path: string;
  protected abstract readonly schema: EntitySchema<T>;

  /** Fetches every item of the resource. */
  public fetchAll(opts: FetchOptions = {}): Result<M, readonly T[]> {
    return this.request('fetchAll', { path: this.path, schema: list(this.schema), cache: opts.cache });
  }

  /** Fetches one item by its uuid. */
  public fetchFromUuid(uuid: string, opts: FetchOptions = {}): Result<M, T> {
    return this.request('fetchFromUuid', {
      path: `${this.path}/{uuid}`,
      pathParams: { uuid },
      schema: this.schema,
      cache: opts.cache,
    });
  }
}
