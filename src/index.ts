// Symposium public API
export type { AgentDefinition, PanelConfig, PanelConfigInput } from './config/schema.js';
export { AgentDefinitionSchema, PanelConfigSchema } from './config/schema.js';
export { loadEnv, requireApiKey, type RuntimeEnv } from './config/env.js';
export { loadPreset, listPresets, loadProjectConfig } from './config/loader.js';
export { DEFAULT_PRESET } from './agents/presets.js';
export { SessionError, PreconditionError, type SessionErrorKind } from './errors.js';
export { ConversationHistory, renderTranscript, type Turn, type TurnInput } from './history/store.js';
export { decodeEventStream, END_MARKER } from './providers/sse.js';
export { RequestSession, type StreamSession } from './providers/session.js';
export { streamAnswer } from './providers/ask.js';
export type { ChatMessage, ChatOptions, ChatCompletionRequest, FetchLike, SessionSettings } from './providers/types.js';
export { AsyncChannel } from './roundtable/channel.js';
export { Dispatcher, type DispatcherOptions, type SessionFactory } from './roundtable/dispatcher.js';
export { TurnCoordinator } from './roundtable/coordinator.js';
export { buildPanelistMessages } from './roundtable/context.js';
export { createPanel, createHttpSessionFactory, type Panel, type PanelOptions } from './roundtable/engine.js';
export type { StreamEvent, SessionState, AgentEvent, RoundEvent, RoundStats } from './roundtable/types.js';
export { TerminalRenderer, renderToTerminal } from './output/terminal.js';
export { makeLogger, makeNoopLogger, type Logger } from './observability/logger.js';
