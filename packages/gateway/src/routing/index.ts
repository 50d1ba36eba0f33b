export {
  buildSessionKey,
  buildScopeKey,
  buildCronSessionKey,
  buildHookSessionKey,
  parseSessionKey,
  resolveSessionLane,
  sessionKeyFromLane,
  isScopeMode,
  SCOPE_MODES,
  DEFAULT_ACCOUNT_ID,
  SESSION_LANE_PREFIX,
  type ScopeMode,
  type SessionKeyInput,
  type ParsedSessionKey,
} from './session-key.js';

export {
  AgentRouter,
  type AgentBinding,
  type AgentDefinition,
  type AgentRouterOptions,
  type RouteMatch,
  type RouteResolution,
} from './agent-router.js';
