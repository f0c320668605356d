import { type Currency, currencySchema } from '../entities/currencies.js';
import type { Mode } from '../utils/wrap.js';
import { CollectionEndpoint } from './endpoint.js';

/** `currencies` endpoints. */
export class CurrenciesEndpoint<M extends Mode> extends CollectionEndpoint<M, Currency> {
  protected readonly resource = 'currencies';
  protected readonly path = 'currencies';
  protected readonly schema = currencySchema;
}
