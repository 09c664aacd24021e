// @conduit/engine: session controller, execution loop and output processing

export * from './types/index.js';
export {
  engineConfigSchema,
  parseEngineConfig,
  loadEngineConfigFromEnv,
  ENGINE_ENV_BINDINGS,
  LOG_LEVELS,
  type EngineConfig,
  type EngineConfigInput,
  type LogLevel,
} from './config/config.js';
export { createLogger, silentLogger, type Logger, type LoggerConfig } from './logging/logger.js';
export { createChannel, type Channel, type Receiver, type Sender } from './channel/channel.js';
export { sendBestEffort } from './channel/send.js';
export {
  createSessionState,
  type PhaseListener,
  type SessionController,
  type SessionStateHandle,
} from './session/state.js';
export {
  createEventTranslator,
  SHELL_TOOL,
  type EventTranslator,
  type Translation,
} from './session/translator.js';
export { parseUpdatePlanArgs, planStepsToTodos, toTodoStatus, UPDATE_PLAN_TOOL } from './session/plan.js';
export { runExecutionLoop, toInputItems, waitWhilePaused, type LoopContext } from './session/loop.js';
export {
  createAgent,
  type Agent,
  type AgentOptions,
  type ExecutionHandle,
  type InteractiveSession,
  type MessageHandler,
} from './session/agent.js';
export * from './processing/index.js';
export {
  createAgentSession,
  loadAgentSession,
  type AgentSession,
  type AgentSessionOptions,
  type SessionMetrics,
} from './recorder/agent-session.js';
export {
  createMessageHistory,
  DEFAULT_HISTORY_SIZE,
  type MessageHistory,
  type MessageRole,
  type RecordedMessage,
} from './recorder/history.js';
export { sessionRecordSchema, type SessionRecord } from './recorder/record.js';
export {
  cleanAnsi,
  extractCommands,
  formatMessage,
  formatToolOutput,
  getToolName,
  isToolMessage,
  wrapText,
} from './utils/output.js';
