import { type Agent, agentSchema } from '../entities/agents.js';
import { list } from '../entities/shared.js';
import type { Mode, Result } from '../utils/wrap.js';
import { CollectionEndpoint, type FetchOptions } from './endpoint.js';

/** Options for {@link AgentsEndpoint.fetchAll}. */
export interface AgentsFetchAllOptions extends FetchOptions {
  /** Only playable agents when `true`, only the others when `false`. Unset returns both. */
  isPlayableCharacter?: boolean;
}

/** `agents` endpoints. */
export class AgentsEndpoint<M extends Mode> extends CollectionEndpoint<M, Agent> {
  protected readonly resource = 'agents';
  protected readonly path = 'agents';
  protected readonly schema = agentSchema;

  public override fetchAll({ isPlayableCharacter, cache }: AgentsFetchAllOptions = {}): Result<M, readonly Agent[]> {
    return this.request('fetchAll', {
      path: this.path,
      params: { isPlayableCharacter },
      schema: list(this.schema),
      cache,
    });
  }
}
