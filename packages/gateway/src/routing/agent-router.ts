/**
 * AgentRouter - maps a normalized inbound message to an agent and session key
 *
 * Binding tiers are evaluated across all agents, tier by tier, in this order:
 *   1. peer     - exact peer id (or "<provider>:<peerId>")
 *   2. team     - guild/team/group id, group and thread chats only
 *   3. account  - bot account id
 *   4. channel  - provider name
 *   5. default  - first registered agent
 * Registration order breaks ties inside a tier, so exactly one agent resolves.
 */

import { NoAgentConfiguredError, ValidationError } from '@laneway/core/errors';
import type { InboundMessage } from '../ingest/message.js';
import { buildSessionKey, isScopeMode, type ScopeMode } from './session-key.js';

export interface AgentBinding {
  peers?: string[];
  teams?: string[];
  accounts?: string[];
  channels?: string[];
}

export interface AgentDefinition {
  id: string;
  /** Overrides the router-wide scope mode for this agent's DM sessions */
  scopeMode?: ScopeMode;
  bindings?: AgentBinding;
}

export type RouteMatch = 'peer' | 'team' | 'account' | 'channel' | 'default';

export interface RouteResolution {
  agentId: string;
  sessionKey: string;
  scopeMode: ScopeMode;
  matchedBy: RouteMatch;
}

export interface AgentRouterOptions {
  defaultScopeMode?: ScopeMode;
}

interface CompiledAgent {
  id: string;
  scopeMode?: ScopeMode;
  peers: Set<string>;
  teams: Set<string>;
  accounts: Set<string>;
  channels: Set<string>;
}

type TierMatcher = (agent: CompiledAgent, message: InboundMessage) => boolean;

const TIERS: ReadonlyArray<[Exclude<RouteMatch, 'default'>, TierMatcher]> = [
  [
    'peer',
    (agent, msg) =>
      agent.peers.has(msg.peerId) || agent.peers.has(`${msg.provider.toLowerCase()}:${msg.peerId}`),
  ],
  [
    'team',
    (agent, msg) =>
      (msg.chatType === 'group' || msg.chatType === 'thread') &&
      ((msg.teamId !== undefined && agent.teams.has(msg.teamId)) ||
        (msg.groupId !== undefined && agent.teams.has(msg.groupId))),
  ],
  ['account', (agent, msg) => msg.accountId !== undefined && agent.accounts.has(msg.accountId)],
  ['channel', (agent, msg) => agent.channels.has(msg.provider.toLowerCase())],
];

function compile(definition: AgentDefinition): CompiledAgent {
  const bindings = definition.bindings ?? {};
  return {
    id: definition.id.trim().toLowerCase(),
    scopeMode: definition.scopeMode,
    peers: new Set((bindings.peers ?? []).map((p) => p.trim())),
    teams: new Set((bindings.teams ?? []).map((t) => t.trim())),
    accounts: new Set((bindings.accounts ?? []).map((a) => a.trim())),
    channels: new Set((bindings.channels ?? []).map((c) => c.trim().toLowerCase())),
  };
}

export class AgentRouter {
  private agents: CompiledAgent[] = [];
  private defaultScopeMode: ScopeMode;

  constructor(agents: AgentDefinition[], options: AgentRouterOptions = {}) {
    this.defaultScopeMode = options.defaultScopeMode ?? 'per-channel-peer';
    this.update(agents, options);
  }

  /**
   * Replace the binding table (config hot-reload)
   *
   * @throws ValidationError on blank/duplicate agent ids or unknown scope modes
   */
  update(agents: AgentDefinition[], options: AgentRouterOptions = {}): void {
    const seen = new Set<string>();
    const compiled: CompiledAgent[] = [];

    for (const definition of agents) {
      if (!definition.id || !definition.id.trim()) {
        throw new ValidationError('agents[].id', 'must be a non-empty string', definition.id);
      }
      if (definition.scopeMode !== undefined && !isScopeMode(definition.scopeMode)) {
        throw new ValidationError(`agents.${definition.id}.scopeMode`, 'unknown scope mode', definition.scopeMode);
      }
      const agent = compile(definition);
      if (seen.has(agent.id)) {
        throw new ValidationError('agents[].id', `duplicate agent id "${agent.id}"`, agent.id);
      }
      seen.add(agent.id);
      compiled.push(agent);
    }

    this.agents = compiled;
    if (options.defaultScopeMode) {
      this.defaultScopeMode = options.defaultScopeMode;
    }
  }

  /**
   * Resolve the agent and session key for a message
   *
   * @throws NoAgentConfiguredError when the binding table is empty
   */
  resolve(message: InboundMessage): RouteResolution {
    if (this.agents.length === 0) {
      throw new NoAgentConfiguredError({
        provider: message.provider,
        peerId: message.peerId,
        messageId: message.messageId,
      });
    }

    let agent = this.agents[0];
    let matchedBy: RouteMatch = 'default';

    search: for (const [tier, matches] of TIERS) {
      for (const candidate of this.agents) {
        if (matches(candidate, message)) {
          agent = candidate;
          matchedBy = tier;
          break search;
        }
      }
    }

    const scopeMode = agent.scopeMode ?? this.defaultScopeMode;
    const sessionKey = buildSessionKey({
      agentId: agent.id,
      scopeMode,
      provider: message.provider,
      peerId: message.peerId,
      accountId: message.accountId,
      chatType: message.chatType,
      groupId: message.groupId,
      threadId: message.threadId,
    });

    return { agentId: agent.id, sessionKey, scopeMode, matchedBy };
  }

  /**
   * @throws NoAgentConfiguredError when the binding table is empty
   */
  defaultAgentId(): string {
    const first = this.agents[0];
    if (!first) {
      throw new NoAgentConfiguredError();
    }
    return first.id;
  }

  listAgents(): string[] {
    return this.agents.map((agent) => agent.id);
  }

  get scopeMode(): ScopeMode {
    return this.defaultScopeMode;
  }
}
