import { type Event, eventSchema } from '../entities/events.js';
import type { Mode } from '../utils/wrap.js';
import { CollectionEndpoint } from './endpoint.js';

/** In-game events such as Night Market windows. */
export class EventsEndpoint<M extends Mode> extends CollectionEndpoint<M, Event> {
  protected readonly resource = 'events';
  protected readonly path = 'events';
  protected readonly schema = eventSchema;
}
