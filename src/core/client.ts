import { CacheClient } from '../cache/client.js';
import { AgentsEndpoint } from '../endpoints/agents.js';
import { BuddiesEndpoint } from '../endpoints/buddies.js';
import { BundlesEndpoint } from '../endpoints/bundles.js';
import { CeremoniesEndpoint } from '../endpoints/ceremonies.js';
import { CompetitiveTiersEndpoint } from '../endpoints/competitiveTiers.js';
import { ContentTiersEndpoint } from '../endpoints/contentTiers.js';
import { ContractsEndpoint } from '../endpoints/contracts.js';
import { CurrenciesEndpoint } from '../endpoints/currencies.js';
import type { EndpointContext } from '../endpoints/endpoint.js';
import { EventsEndpoint } from '../endpoints/events.js';
import { GamemodeEquippablesEndpoint, GamemodesEndpoint } from '../endpoints/gamemodes.js';
import { ConfigurationError } from '../error/configurationError.js';
import { FetchClient } from '../fetch/client.js';
import { SyncFetchClient } from '../fetch/syncClient.js';
import { isLanguage, type Language, type Transport, type TransportFactory } from '../types/request.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { Mode } from '../utils/wrap.js';
import { isMode, runtimes } from './runtime.js';
import type { Config, ValorantClientProps } from './types.js';

/** Base URL of the public API. */
export const DEFAULT_BASE_URL = 'https://valorant-api.com/v1/';

/** Language used when none is configured. */
export const DEFAULT_LANGUAGE: Language = 'en-US';

/** Default transport per mode. */
const transports: { [K in Mode]: TransportFactory<K> } = {
  sync: (baseUrl, opts) => new SyncFetchClient(baseUrl, opts),
  async: (baseUrl, opts) => new FetchClient(baseUrl, opts),
};

function checkLanguage(value: unknown): Language {
  if (!isLanguage(value)) {
    throw new ConfigurationError(`error unsupported language ${String(value)}`, 'language');
  }

  return value;
}

/**
 * Client for valorant-api.com that:
 * - exposes one endpoint facade per resource (`agents`, `buddies`, ...),
 * - sends the configured display language with every request,
 * - memoizes results on request through its own cache,
 * - returns error-first tuples, or promises of them in `async` mode.
 *
 * @typeParam M - Execution mode picked once at construction.
 * @example
 * const client = new ValorantClient({ mode: 'async', language: 'de-DE' });
 * const [err, agents] = await client.agents.fetchAll({ isPlayableCharacter: true, cache: true });
 */
export class ValorantClient<M extends Mode = 'async'> {
  /** Execution mode of every operation on this client. */
  public readonly mode: M;
  public readonly agents: AgentsEndpoint<M>;
  public readonly buddies: BuddiesEndpoint<M>;
  public readonly bundles: BundlesEndpoint<M>;
  public readonly ceremonies: CeremoniesEndpoint<M>;
  public readonly competitiveTiers: CompetitiveTiersEndpoint<M>;
  public readonly contentTiers: ContentTiersEndpoint<M>;
  public readonly contracts: ContractsEndpoint<M>;
  public readonly currencies: CurrenciesEndpoint<M>;
  public readonly events: EventsEndpoint<M>;
  public readonly gamemodes: GamemodesEndpoint<M>;
  public readonly gamemodeEquippables: GamemodeEquippablesEndpoint<M>;

  #transport: Transport<M>;
  #cache: CacheClient;
  #logger: Logger;
  #language: Language;

  /**
   * Creates a client, its cache and, unless one is given, the default transport of the mode.
   *
   * @throws {ConfigurationError} On an unknown mode, an unsupported language,
   *   or a transport running in another mode.
   */
  constructor({
    mode,
    language = DEFAULT_LANGUAGE,
    baseUrl = DEFAULT_BASE_URL,
    transport,
    fetchOpts,
    cacheOpts,
    debug = false,
    logger,
  }: ValorantClientProps<M>) {
    if (!isMode(mode)) {
      throw new ConfigurationError(`error unknown mode ${String(mode)}`, 'mode');
    }

    if (transport && transport.mode !== mode) {
      throw new ConfigurationError(
        `error transport runs in ${transport.mode} mode but the client was created in ${mode} mode`,
        'transport',
      );
    }

    this.mode = mode;
    this.#language = checkLanguage(language);
    this.#logger = logger ?? createLogger('valorant-api', debug ? 'debug' : 'warn');
    this.#cache = new CacheClient(cacheOpts);

    if (transport) {
      this.#transport = transport;
      if (fetchOpts) {
        transport.config(fetchOpts);
      }
    } else {
      this.#transport = transports[mode](baseUrl, fetchOpts);
    }

    const context: EndpointContext<M> = {
      transport: this.#transport,
      runtime: runtimes[mode],
      cache: this.#cache,
      logger: this.#logger,
      language: () => this.#language,
    };

    this.agents = new AgentsEndpoint(context);
    this.buddies = new BuddiesEndpoint(context);
    this.bundles = new BundlesEndpoint(context);
    this.ceremonies = new CeremoniesEndpoint(context);
    this.competitiveTiers = new CompetitiveTiersEndpoint(context);
    this.contentTiers = new ContentTiersEndpoint(context);
    this.contracts = new ContractsEndpoint(context);
    this.currencies = new CurrenciesEndpoint(context);
    this.events = new EventsEndpoint(context);
    this.gamemodes = new GamemodesEndpoint(context);
    this.gamemodeEquippables = new GamemodeEquippablesEndpoint(context);

    this.#logger.debug('client created', { mode, language: this.#language });
  }

  /** Display language sent with every request. */
  get language(): Language {
    return this.#language;
  }

  /**
   * @throws {ConfigurationError} When `value` is not a supported language.
   */
  set language(value: Language) {
    this.#language = checkLanguage(value);
  }

  /** Transport every request goes through. */
  get transport(): Transport<M> {
    return this.#transport;
  }

  /**
   * Updates language, transport and cache options at runtime and propagates them.
   * Nothing is applied when the language is invalid.
   */
  config(opts: Config) {
    const { language, fetchOpts, cacheOpts } = opts;
    if (language !== undefined) {
      this.language = language;
    }

    if (fetchOpts) {
      this.#transport.config(fetchOpts);
    }

    if (cacheOpts) {
      this.#cache.config(cacheOpts);
    }
  }

  /** Drops every memoized result. */
  clearCache() {
    this.#cache.clear();
    this.#logger.debug('cache cleared');
  }

  /**
   * Disposes resources held by this client: cached entries and the transport.
   */
  dispose() {
    this.#cache.dispose();
    this.#transport.dispose();
  }
}
