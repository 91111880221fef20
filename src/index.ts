export { CorrectionLoop } from './orchestrator/correction-loop';
export type { CorrectionLoopOptions, RunOptions } from './orchestrator/correction-loop';
export type { LoopEvent, LoopEventType, EventSink, StartEvent, StatusEvent, RationaleEvent, CodeEvent, IllustrationEvent, ResultEvent, DoneEvent, ErrorEvent } from './orchestrator/events';
export { isTerminalEvent } from './orchestrator/events';
export { CollectingSink, CompositeSink, SolutionFileSink } from './orchestrator/sinks';
export { FileSessionStore } from './orchestrator/session-store';
export type { SessionSnapshot, SessionRecorder, SessionError, SessionErrorKind, AttemptRecord, IllustrationRecord } from './orchestrator/types';
export type { SessionStatus } from './orchestrator/states';

export type { Problem, Feedback, Generation, GenerationOracle, GenerationRequest } from './agents/types';
export { GeminiOracle } from './agents/gemini-oracle';
export { GeminiImageIllustrator } from './agents/illustrator';
export type { Illustrator, IllustrationContext } from './agents/illustrator';
export { OracleFault, OracleTransportError, OracleAuthenticationError, OracleQuotaError, OracleEmptyResponseError, EmptyGenerationError } from './agents/errors';

export type { ExecutionResult, IsolatedExecutor, IsolationBackend, IsolationUnit, ResourceLimits, Bundle, RunOutput } from './testing/types';
export { SandboxedExecutor } from './testing/sandbox';
export { DockerBackend } from './testing/backends/docker';
export { E2BBackend } from './testing/backends/e2b';
export { IsolationUnavailableError } from './testing/errors';
export { createBackend, createExecutor } from './testing/factory';

export { loadConfig, ConfigValidationError } from './config/loader';
export type { Config } from './config/validator';
export { ConsoleLogger, createSilentLogger } from './utils/logger';
export type { Logger } from './utils/logger';
export { FixloopError } from './utils/errors';
