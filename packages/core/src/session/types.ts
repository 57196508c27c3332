/**
 * Session types: who plays each side, provider interfaces, move records
 * and the events a session reports to its listeners
 */

import type { BoardState, GameMetadata, TerminalStatus } from '@chesslab/pgn';

import type { SessionError } from './errors.js';

/**
 * What chooses the moves for one side
 */
export type SourceKind = 'human' | 'engine' | 'advisor';

/**
 * A side of the board
 */
export type PlayerSlot = 'white' | 'black';

/**
 * Session configuration
 */
export interface SessionConfig {
  white: SourceKind;
  black: SourceKind;
  /** Start position; the standard start when unset */
  startFen?: string;
  /** Search budget handed to the engine per move */
  engineTimeBudgetMs?: number;
}

/**
 * Configuration with every default filled in
 */
export type ResolvedSessionConfig = Required<Omit<SessionConfig, 'startFen'>> &
  Pick<SessionConfig, 'startFen'>;

export const DEFAULT_ENGINE_TIME_BUDGET_MS = 1000;

export const DEFAULT_SESSION_CONFIG: ResolvedSessionConfig = {
  white: 'human',
  black: 'advisor',
  engineTimeBudgetMs: DEFAULT_ENGINE_TIME_BUDGET_MS,
};

/**
 * Named seat assignments
 */
export type SessionMode = 'practice' | 'analysis' | 'duel';

export const SESSION_PRESETS: Record<SessionMode, Pick<SessionConfig, 'white' | 'black'>> = {
  practice: { white: 'human', black: 'advisor' },
  analysis: { white: 'human', black: 'human' },
  duel: { white: 'engine', black: 'advisor' },
};

/**
 * Engine move service interface
 * (Implemented by UciEngine and GrpcEngineClient)
 */
export interface EngineService {
  /** Best move in coordinate form after searching for `timeBudgetMs` */
  bestMove(fen: string, timeBudgetMs: number): Promise<string>;
}

/**
 * Advisor text service interface
 * (Implemented by OpenAIAdvisor)
 */
export interface AdvisorService {
  generate(prompt: string): Promise<string>;
}

/**
 * One accepted move
 */
export interface MoveRecord {
  /** Zero-based position in the game */
  readonly ordinal: number;
  readonly mover: PlayerSlot;
  /** Coordinate form, e.g. "e7e8q" */
  readonly uci: string;
  readonly san: string;
  /** Full-move number the move was played on */
  readonly moveNumber: number;
  readonly fenBefore: BoardState;
  readonly fenAfter: BoardState;
}

/**
 * Result of an operation that may be refused
 */
export type Rejected = { status: 'rejected'; error: SessionError };
export type Accepted<T extends object> = { status: 'accepted' } & T;
export type Outcome<T extends object> = Accepted<T> | Rejected;

export type MoveOutcome = Outcome<{ record: MoveRecord }>;
export type ResetOutcome = Outcome<{ generation: number }>;
export type LoadOutcome = Outcome<{ metadata: GameMetadata; moveCount: number }>;
export type HintOutcome = Outcome<{ uci: string; san: string }>;

export type SessionEvent =
  | { type: 'move-applied'; record: MoveRecord; source: SourceKind }
  | { type: 'move-rejected'; candidate: string; error: SessionError }
  | { type: 'provider-failed'; slot: PlayerSlot; source: SourceKind; error: SessionError }
  | { type: 'session-reset'; generation: number; startFen: BoardState }
  | { type: 'game-loaded'; metadata: GameMetadata; moveCount: number }
  | { type: 'game-over'; status: TerminalStatus };

export type SessionListener = (event: SessionEvent) => void;
