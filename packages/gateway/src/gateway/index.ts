export {
  Gateway,
  RESET_SWEEP_JOB_ID,
  CRON_LANE,
  HOOK_LANE,
  type GatewayOptions,
  type GatewayStats,
  type ResetOutcome,
} from './gateway.js';

export type {
  AgentExecutor,
  AgentRunRequest,
  ChannelAdapter,
  CompletionListener,
  CompletionStatus,
  CompletionSummary,
  DeliveryResult,
  DeliverySettings,
  DeliveryTarget,
  GatewaySettings,
  IngestSettings,
  ResponseBlock,
  RunUsage,
  ScheduledJobSettings,
  SendOptions,
  SubmitOptions,
  TranscriptSettings,
} from './types.js';
