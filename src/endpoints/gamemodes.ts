import { type Gamemode, type GamemodeEquippable, gamemodeEquippableSchema, gamemodeSchema } from '../entities/gamemodes.js';
import type { Mode } from '../utils/wrap.js';
import { CollectionEndpoint } from './endpoint.js';

/** `gamemodes` endpoints. */
export class GamemodesEndpoint<M extends Mode> extends CollectionEndpoint<M, Gamemode> {
  protected readonly resource = 'gamemodes';
  protected readonly path = 'gamemodes';
  protected readonly schema = gamemodeSchema;
}

/** Items that only exist in particular gamemodes, e.g. the Snowball Launcher. */
export class GamemodeEquippablesEndpoint<M extends Mode> extends CollectionEndpoint<M, GamemodeEquippable> {
  protected readonly resource = 'gamemodeEquippables';
  protected readonly path = 'gamemodes/equippables';
  protected readonly schema = gamemodeEquippableSchema;
}
