/**
 * Move Ledger
 *
 * Append-only record of the moves accepted in a session, with the
 * score-table and PGN projections used for display and export.
 */

import {
  chessRules,
  renderPgn,
  resultToken,
  type BoardState,
  type GameMetadata,
  type MoveInfo,
  type RulesOracle,
} from '@chesslab/pgn';
import type { HistoryMove } from '@chesslab/llm';

import type { MoveRecord } from './types.js';

/**
 * One row of the score table; a side is missing when it has not moved
 */
export interface ScoreRow {
  moveNumber: number;
  white?: string;
  black?: string;
}

export class MoveLedger {
  private readonly records: MoveRecord[] = [];

  constructor(
    readonly startFen: BoardState,
    private readonly rules: RulesOracle = chessRules,
  ) {}

  /**
   * Record an accepted move. Only the orchestrator calls this.
   */
  append(entry: Omit<MoveRecord, 'ordinal'>): MoveRecord {
    const record: MoveRecord = Object.freeze({ ...entry, ordinal: this.records.length });
    this.records.push(record);
    return record;
  }

  get length(): number {
    return this.records.length;
  }

  at(ordinal: number): MoveRecord | undefined {
    return this.records[ordinal];
  }

  all(): readonly MoveRecord[] {
    return [...this.records];
  }

  /** Position after the last move */
  get currentFen(): BoardState {
    return this.records[this.records.length - 1]?.fenAfter ?? this.startFen;
  }

  /**
   * Every position before the current one, oldest first
   */
  earlierPositions(): BoardState[] {
    return this.records.map((r) => r.fenBefore);
  }

  /**
   * Moves in the shape the advisor prompts take
   */
  historyMoves(): HistoryMove[] {
    return this.records.map((r) => ({
      moveNumber: r.moveNumber,
      isWhiteMove: r.mover === 'white',
      san: r.san,
    }));
  }

  /**
   * Pair moves into (White, Black) rows keyed by full-move number
   */
  asScoreTable(): ScoreRow[] {
    const rows: ScoreRow[] = [];

    for (const record of this.records) {
      const last = rows[rows.length - 1];
      if (record.mover === 'white' || !last || last.moveNumber !== record.moveNumber) {
        rows.push({ moveNumber: record.moveNumber });
      }
      const row = rows[rows.length - 1];
      if (row) {
        row[record.mover] = record.san;
      }
    }

    return rows;
  }

  /**
   * Serialize the game as PGN by replaying every move from the start
   *
   * The result tag comes from the final position unless supplied.
   */
  asPortableGameText(metadata: Partial<GameMetadata> = {}): string {
    const moves: MoveInfo[] = [];
    const history: BoardState[] = [];
    let state = this.startFen;

    for (const record of this.records) {
      const san = this.rules.toNotation(state, record.uci);
      const fenAfter = this.rules.apply(state, record.uci);
      moves.push({
        moveNumber: record.moveNumber,
        san,
        uci: record.uci,
        isWhiteMove: record.mover === 'white',
        fenBefore: state,
        fenAfter,
      });
      history.push(state);
      state = fenAfter;
    }

    const result = metadata.result ?? resultToken(this.rules.terminalStatus(state, history));

    return renderPgn({
      metadata: {
        ...metadata,
        white: metadata.white ?? '?',
        black: metadata.black ?? '?',
        result,
      },
      startFen: this.startFen,
      moves,
    });
  }
}
