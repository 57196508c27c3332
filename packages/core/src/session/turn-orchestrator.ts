/**
 * Turn Orchestrator
 *
 * Owns the board and the move ledger. Every board change goes through
 * submitMove or resetSession; provider calls run outside of both and
 * their results are re-checked against the board current on arrival.
 */

import {
  ChessPosition,
  IllegalMoveError,
  InvalidFenError,
  STARTING_FEN,
  chessRules,
  describeTerminalStatus,
  moveToUci,
  parsePgn,
  parseUci,
  type BoardState,
  type CoordinateMove,
  type GameMetadata,
  type ParsedGame,
  type RulesOracle,
  type TerminalStatus,
} from '@chesslab/pgn';
import { DEFAULT_HISTORY_WINDOW, buildMovePrompt, parseAdvisorMove } from '@chesslab/llm';

import { SessionError, SessionErrorCode, classifyProviderError } from './errors.js';
import { MoveLedger } from './move-ledger.js';
import { SelectionMachine, type SelectionResult } from './selection-machine.js';
import {
  DEFAULT_SESSION_CONFIG,
  type AdvisorService,
  type EngineService,
  type HintOutcome,
  type LoadOutcome,
  type MoveOutcome,
  type PlayerSlot,
  type Rejected,
  type ResetOutcome,
  type ResolvedSessionConfig,
  type SessionConfig,
  type SessionEvent,
  type SessionListener,
  type SourceKind,
} from './types.js';

export interface TurnOrchestratorOptions {
  engine?: EngineService;
  advisor?: AdvisorService;
  rules?: RulesOracle;
  /** Recent moves included in advisor move prompts (default: 10) */
  historyWindow?: number;
  /** Receives every session event */
  onEvent?: SessionListener;
  /** Receives provider failures in readable form (default: console.warn) */
  onWarning?: (message: string) => void;
}

/**
 * Label used for a seat in exported games
 */
export const SOURCE_LABELS: Record<SourceKind, string> = {
  human: 'Human',
  engine: 'Engine',
  advisor: 'Advisor',
};

/**
 * Result of feeding a square to the session's selection machine
 */
export type SelectionOutcome =
  | Exclude<SelectionResult, { kind: 'candidate' }>
  | { kind: 'candidate'; outcome: MoveOutcome };

type AutomatedSource = Exclude<SourceKind, 'human'>;

function reject(code: SessionErrorCode, message: string, cause?: Error): Rejected {
  return { status: 'rejected', error: new SessionError(message, code, cause) };
}

export class TurnOrchestrator {
  private readonly engine: EngineService | undefined;
  private readonly advisor: AdvisorService | undefined;
  private readonly rules: RulesOracle;
  private readonly historyWindow: number;
  private readonly onWarning: (message: string) => void;
  private readonly listeners = new Set<SessionListener>();
  private readonly selection: SelectionMachine;

  private settings: ResolvedSessionConfig;
  private board: BoardState;
  private ledger: MoveLedger;
  private terminal: TerminalStatus | null;
  private generationCounter = 0;
  private requestSeq = 0;
  private readonly latestRequest: Record<PlayerSlot, number> = { white: 0, black: 0 };
  private lastFailure: SessionError | undefined;

  /**
   * @throws SessionError (INVALID_IMPORTED_POSITION) if `config.startFen` is not a valid position
   */
  constructor(config: Partial<SessionConfig> = {}, options: TurnOrchestratorOptions = {}) {
    this.engine = options.engine;
    this.advisor = options.advisor;
    this.rules = options.rules ?? chessRules;
    this.historyWindow = options.historyWindow ?? DEFAULT_HISTORY_WINDOW;
    this.onWarning = options.onWarning ?? ((message) => console.warn(message));
    this.selection = new SelectionMachine(this.rules);
    if (options.onEvent) {
      this.listeners.add(options.onEvent);
    }

    this.settings = { ...DEFAULT_SESSION_CONFIG, ...config };
    const start = this.validateStart(config.startFen);
    if (start.status === 'rejected') {
      throw start.error;
    }
    this.board = start.fen;
    this.ledger = new MoveLedger(start.fen, this.rules);
    this.terminal = this.rules.terminalStatus(start.fen);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  get fen(): BoardState {
    return this.board;
  }

  get moves(): MoveLedger {
    return this.ledger;
  }

  get config(): ResolvedSessionConfig {
    return { ...this.settings };
  }

  /** Incremented by every reset and every accepted move */
  get generation(): number {
    return this.generationCounter;
  }

  get selectionState(): SelectionMachine['state'] {
    return this.selection.state;
  }

  /** Most recent provider failure, cleared by an accepted move or a reset */
  get lastProviderFailure(): SessionError | undefined {
    return this.lastFailure;
  }

  currentTurn(): PlayerSlot {
    return this.rules.sideToMove(this.board) === 'w' ? 'white' : 'black';
  }

  sourceForTurn(): SourceKind {
    return this.settings[this.currentTurn()];
  }

  isTerminal(): boolean {
    return this.terminal !== null;
  }

  terminalStatus(): TerminalStatus | null {
    return this.terminal;
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ==========================================================================
  // Board changes
  // ==========================================================================

  /**
   * Feed a selected square; a completed selection is submitted as a move
   */
  selectSquare(square: string): SelectionOutcome {
    if (this.terminal) {
      this.selection.reset();
      return { kind: 'ignored' };
    }

    const result = this.selection.select(square, this.board);
    if (result.kind !== 'candidate') {
      return result;
    }
    return { kind: 'candidate', outcome: this.submitMove(result.move) };
  }

  /**
   * Apply a move if it is legal in the current position
   *
   * The move must match a legal move exactly, promotion piece included.
   * Any armed selection is cleared whatever the outcome.
   */
  submitMove(candidate: string | CoordinateMove): MoveOutcome {
    const text = typeof candidate === 'string' ? candidate.trim() : moveToUci(candidate);
    this.selection.reset();

    if (this.terminal) {
      return this.rejectMove(text, this.gameOver());
    }

    const parsed = parseUci(text);
    const uci = parsed ? moveToUci(parsed) : text;
    if (!parsed || !this.rules.isLegal(this.board, uci)) {
      return this.rejectMove(
        text,
        reject(SessionErrorCode.ILLEGAL_MOVE, `Illegal move: ${text || '(empty)'}`),
      );
    }

    const fenBefore = this.board;
    const mover = this.currentTurn();
    const source = this.settings[mover];

    // Everything the oracle computes is settled before the board changes
    let san: string;
    let fenAfter: BoardState;
    let terminal: TerminalStatus | null;
    try {
      san = this.rules.toNotation(fenBefore, uci);
      fenAfter = this.rules.apply(fenBefore, uci);
      terminal = this.rules.terminalStatus(fenAfter, [
        ...this.ledger.earlierPositions(),
        fenBefore,
      ]);
    } catch (err) {
      if (err instanceof IllegalMoveError || err instanceof InvalidFenError) {
        return this.rejectMove(
          text,
          reject(SessionErrorCode.ILLEGAL_MOVE, `Illegal move: ${text} (${err.message})`, err),
        );
      }
      throw err;
    }

    const record = this.ledger.append({
      mover,
      uci,
      san,
      moveNumber: new ChessPosition(fenBefore).moveNumber(),
      fenBefore,
      fenAfter,
    });

    this.board = fenAfter;
    this.generationCounter++;
    this.lastFailure = undefined;
    this.terminal = terminal;

    this.emit({ type: 'move-applied', record, source });
    if (this.terminal) {
      this.emit({ type: 'game-over', status: this.terminal });
    }

    return { status: 'accepted', record };
  }

  /**
   * Ask the provider bound to the side to move for a move and apply it
   *
   * The result is dropped as STALE_RESULT if the board changed or a newer
   * request for the same side was issued while the provider was thinking.
   */
  async requestAutomatedMove(): Promise<MoveOutcome> {
    if (this.terminal) {
      return this.gameOver();
    }

    const slot = this.currentTurn();
    const source = this.settings[slot];
    if (source === 'human') {
      return reject(
        SessionErrorCode.NOT_AUTOMATED_TURN,
        `It is ${slot === 'white' ? 'White' : 'Black'}'s turn and ${slot} is played by a human`,
      );
    }

    const generation = this.generationCounter;
    const fen = this.board;
    const requestId = ++this.requestSeq;
    this.latestRequest[slot] = requestId;

    let move: string;
    try {
      move =
        source === 'engine' ? await this.askEngine(fen) : await this.askAdvisor(fen, slot);
    } catch (err) {
      if (this.isStale(generation, slot, requestId)) {
        return this.stale();
      }
      return this.providerFailed(slot, source, classifyProviderError(err, source));
    }

    if (this.isStale(generation, slot, requestId)) {
      return this.stale();
    }

    if (!this.rules.isLegal(fen, move)) {
      return this.providerFailed(
        slot,
        source,
        new SessionError(
          `${SOURCE_LABELS[source]} suggested illegal move: ${move}`,
          SessionErrorCode.MALFORMED_PROVIDER_OUTPUT,
        ),
      );
    }

    return this.submitMove(move);
  }

  /**
   * Ask the engine for the best move here without playing it
   */
  async requestHint(): Promise<HintOutcome> {
    if (this.terminal) {
      return this.gameOver();
    }

    const generation = this.generationCounter;
    const fen = this.board;

    let move: string;
    try {
      move = await this.askEngine(fen);
    } catch (err) {
      return { status: 'rejected', error: classifyProviderError(err, 'engine') };
    }

    if (generation !== this.generationCounter) {
      return this.stale();
    }
    if (!this.rules.isLegal(fen, move)) {
      return reject(
        SessionErrorCode.MALFORMED_PROVIDER_OUTPUT,
        `Engine suggested illegal move: ${move}`,
      );
    }

    return { status: 'accepted', uci: move, san: this.rules.toNotation(fen, move) };
  }

  /**
   * Start over from the standard position or `config.startFen`
   *
   * Seats and the engine budget not given keep their current values.
   * An invalid start position is rejected and the session is left as it was.
   */
  resetSession(config: Partial<SessionConfig> = {}): ResetOutcome {
    const start = this.validateStart(config.startFen);
    if (start.status === 'rejected') {
      return start;
    }

    const { startFen: _previousStart, ...seats } = this.settings;
    this.settings = { ...seats, ...config };
    this.applyStart(start.fen);

    return { status: 'accepted', generation: this.generationCounter };
  }

  /**
   * Replace the session with the first game of a PGN document
   *
   * The whole game is checked before anything changes; it is then
   * replayed move by move so each move gets a ledger record.
   */
  loadGame(pgnText: string): LoadOutcome {
    let game: ParsedGame | undefined;
    try {
      game = parsePgn(pgnText)[0];
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      return reject(SessionErrorCode.INVALID_IMPORTED_POSITION, cause.message, cause);
    }

    if (!game) {
      return reject(SessionErrorCode.INVALID_IMPORTED_POSITION, 'No game found in PGN');
    }

    const start = this.validateStart(game.startFen);
    if (start.status === 'rejected') {
      return start;
    }

    const problem = this.checkReplay(start.fen, game);
    if (problem) {
      return problem;
    }

    const { startFen: _previousStart, ...seats } = this.settings;
    this.settings = { ...seats, startFen: start.fen };
    this.applyStart(start.fen);

    for (const move of game.moves) {
      const outcome = this.submitMove(move.uci);
      if (outcome.status === 'rejected') {
        // checkReplay accepted the same moves
        return outcome;
      }
    }

    const moveCount = game.moves.length;
    this.emit({ type: 'game-loaded', metadata: game.metadata, moveCount });

    return { status: 'accepted', metadata: game.metadata, moveCount };
  }

  /**
   * PGN of the game so far; player names default to the seat labels
   */
  exportPgn(metadata: Partial<GameMetadata> = {}): string {
    return this.ledger.asPortableGameText({
      ...metadata,
      white: metadata.white ?? SOURCE_LABELS[this.settings.white],
      black: metadata.black ?? SOURCE_LABELS[this.settings.black],
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private validateStart(
    startFen: string | undefined,
  ): { status: 'accepted'; fen: BoardState } | Rejected {
    if (startFen === undefined) {
      return { status: 'accepted', fen: STARTING_FEN };
    }
    try {
      return { status: 'accepted', fen: this.rules.parsePosition(startFen) };
    } catch (err) {
      if (err instanceof InvalidFenError) {
        return reject(SessionErrorCode.INVALID_IMPORTED_POSITION, err.message, err);
      }
      throw err;
    }
  }

  private applyStart(fen: BoardState): void {
    this.board = fen;
    this.ledger = new MoveLedger(fen, this.rules);
    this.selection.reset();
    this.generationCounter++;
    this.lastFailure = undefined;
    this.terminal = this.rules.terminalStatus(fen);

    this.emit({ type: 'session-reset', generation: this.generationCounter, startFen: fen });
    if (this.terminal) {
      this.emit({ type: 'game-over', status: this.terminal });
    }
  }

  /**
   * Dry-run a parsed game against the session's own terminal rules
   */
  private checkReplay(startFen: BoardState, game: ParsedGame): Rejected | null {
    const history: BoardState[] = [];
    let state = startFen;

    for (const move of game.moves) {
      const status = this.rules.terminalStatus(state, history);
      if (status) {
        return reject(
          SessionErrorCode.INVALID_IMPORTED_POSITION,
          `Game continues after it ended (${describeTerminalStatus(status)}) at ${move.san}`,
        );
      }
      if (!this.rules.isLegal(state, move.uci)) {
        return reject(SessionErrorCode.INVALID_IMPORTED_POSITION, `Illegal move in PGN: ${move.san}`);
      }
      history.push(state);
      state = this.rules.apply(state, move.uci);
    }

    return null;
  }

  private async askEngine(fen: BoardState): Promise<string> {
    if (!this.engine) {
      throw new SessionError('Engine not configured', SessionErrorCode.PROVIDER_UNAVAILABLE);
    }

    const reply = await this.engine.bestMove(fen, this.settings.engineTimeBudgetMs);
    const parsed = parseUci(reply);
    if (!parsed) {
      throw new SessionError(
        `Engine returned no usable move: "${reply}"`,
        SessionErrorCode.MALFORMED_PROVIDER_OUTPUT,
      );
    }
    return moveToUci(parsed);
  }

  private async askAdvisor(fen: BoardState, slot: PlayerSlot): Promise<string> {
    if (!this.advisor) {
      throw new SessionError('AI not connected.', SessionErrorCode.PROVIDER_UNAVAILABLE);
    }

    const legalMoves = this.rules.legalMoves(fen);
    const prompt = buildMovePrompt({
      fen,
      side: slot,
      legalMoves,
      history: this.ledger.historyMoves(),
      historyWindow: this.historyWindow,
    });

    const reply = await this.advisor.generate(prompt);
    return parseAdvisorMove(reply, legalMoves);
  }

  private isStale(generation: number, slot: PlayerSlot, requestId: number): boolean {
    return generation !== this.generationCounter || this.latestRequest[slot] !== requestId;
  }

  private stale(): Rejected {
    return reject(
      SessionErrorCode.STALE_RESULT,
      'Position changed while waiting for the provider; result discarded',
    );
  }

  private gameOver(): Rejected {
    const detail = this.terminal ? `: ${describeTerminalStatus(this.terminal)}` : '';
    return reject(SessionErrorCode.GAME_OVER, `Game over${detail}`);
  }

  private rejectMove(candidate: string, rejection: Rejected): Rejected {
    this.emit({ type: 'move-rejected', candidate, error: rejection.error });
    return rejection;
  }

  private providerFailed(slot: PlayerSlot, source: AutomatedSource, error: SessionError): Rejected {
    this.lastFailure = error;
    this.onWarning(error.message);
    this.emit({ type: 'provider-failed', slot, source, error });
    return { status: 'rejected', error };
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
