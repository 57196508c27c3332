export { TurnOrchestrator, SOURCE_LABELS } from './turn-orchestrator.js';
export type { TurnOrchestratorOptions, SelectionOutcome } from './turn-orchestrator.js';
export { SelectionMachine } from './selection-machine.js';
export type { SelectionState, SelectionResult } from './selection-machine.js';
export { MoveLedger } from './move-ledger.js';
export type { ScoreRow } from './move-ledger.js';
export {
  AdvisorySession,
  DEFAULT_TRANSCRIPT_CAP,
  NOT_CONNECTED_REPLY,
} from './advisory-session.js';
export type { AdvisoryTurn, AdvisorySessionOptions } from './advisory-session.js';
export { AutoPlayer, DEFAULT_MAX_CONSECUTIVE_FAILURES } from './auto-player.js';
export type { AutoPlayerOptions, AutoPlayerState } from './auto-player.js';
export { SessionError, SessionErrorCode, classifyProviderError } from './errors.js';
export {
  DEFAULT_ENGINE_TIME_BUDGET_MS,
  DEFAULT_SESSION_CONFIG,
  SESSION_PRESETS,
} from './types.js';
export type {
  SourceKind,
  PlayerSlot,
  SessionConfig,
  ResolvedSessionConfig,
  SessionMode,
  EngineService,
  AdvisorService,
  MoveRecord,
  Accepted,
  Rejected,
  Outcome,
  MoveOutcome,
  ResetOutcome,
  LoadOutcome,
  HintOutcome,
  SessionEvent,
  SessionListener,
} from './types.js';
