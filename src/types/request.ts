import type { Mode, Result } from '../utils/wrap.js';

/** Display languages accepted by the API's `language` parameter. */
export const LANGUAGES = [
  'ar-AE',
  'de-DE',
  'en-US',
  'es-ES',
  'es-MX',
  'fr-FR',
  'id-ID',
  'it-IT',
  'ja-JP',
  'ko-KR',
  'pl-PL',
  'pt-BR',
  'ru-RU',
  'th-TH',
  'tr-TR',
  'vi-VN',
  'zh-CN',
  'zh-TW',
] as const;

/** One of {@link LANGUAGES}. */
export type Language = (typeof LANGUAGES)[number];

/** Type guard for {@link Language}. */
export function isLanguage(value: unknown): value is Language {
  return LANGUAGES.some((language) => language === value);
}

/** Value of a single query parameter; `undefined` and `null` are left out of the URL. */
export type QueryValue = string | number | boolean | null | undefined;

/** Query parameters keyed by their wire name. */
export type QueryParams = Record<string, QueryValue>;

/** Decoded JSON body of a successful response, before schema validation. */
export type Payload = unknown;

/** Header options accepted by transports; a `null` value removes a default header. */
export type HeaderOptions = Record<string, string | null>;

/** Response as seen by a transport before status mapping. */
export interface RawResponse {
  status: number;
  body: string;
}

/** Options shared by both transports. */
export interface FetchClientOptions {
  /** Extra headers merged over `Accept: application/json`. */
  headers?: HeaderOptions;
  /**
   * Request timeout in milliseconds, `false` to disable.
   * @default 60000
   */
  timeout?: number | false;
}

/**
 * Contract for the component performing the network request.
 * `M` fixes whether `get` blocks (`sync`) or returns a promise (`async`).
 */
export interface Transport<M extends Mode> {
  readonly mode: M;
  /** Performs a GET against `endpoint`, a path plus query string relative to the base URL. */
  get(endpoint: string): Result<M, Payload>;
  /** Merges new default options. */
  config(opts: FetchClientOptions): void;
  /** Releases resources held by the transport. */
  dispose(): void;
}

/** Factory signature for constructing transports. */
export type TransportFactory<M extends Mode> = (baseUrl: string, opts?: FetchClientOptions) => Transport<M>;
