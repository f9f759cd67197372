/**
 * Article Quality Gate
 *
 * Quality-gated revision loop for generated blog articles.
 */

export * from './errors';
export * from './models';
export * from './document';
export * from './capabilities';
export * from './retry';
export * from './logging';
export * from './events';
export * from './quality-gate';

export {
  DEFAULT_LLM_SETTINGS,
  DEFAULT_QUALITY_GATE_CONFIG,
  DEFAULT_RUBRIC_WEIGHTS,
  applyEnvOverrides,
  loadGateConfig,
  parseGateConfig,
  resolveGateConfig,
  type LLMSettings,
  type LoadedConfig,
  type QualityGateConfig,
} from './config/gate-config';

export {
  LLMClient,
  LLMAPIError,
  APIKeyMissingError,
  getAPIKeyFromEnv,
  isLLMProvider,
  LLM_PROVIDERS,
  type ChatMessage,
  type ChatModel,
  type FetchFn,
  type LLMClientConfig,
  type LLMProvider,
  type LLMResponse,
} from './llm/llm-client';

export { InMemoryKnowledgeStore, tokenize } from './knowledge/in-memory-knowledge-store';

export {
  JobService,
  isValidJobTransition,
  VALID_JOB_TRANSITIONS,
  type Job,
  type JobServiceOptions,
  type JobStatus,
} from './jobs/job-service';

export {
  runBatch,
  summarize,
  type BatchItemResult,
  type BatchOptions,
  type BatchResult,
  type BatchSummary,
  type ControllerFactory,
} from './batch/batch-runner';

export { createApp, WebServer, type WebServerConfig, type WebServerState } from './web/server';
