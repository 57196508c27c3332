/**
 * Interactive play loop: turns input lines into session operations
 * and renders session events
 */

import * as fs from 'node:fs';

import {
  SOURCE_LABELS,
  type AdvisorySession,
  type Outcome,
  type SessionEvent,
  type TurnOrchestrator,
} from '@chesslab/core';
import { ValidationError } from '@chesslab/llm';
import { describeTerminalStatus, renderBoard, resultToken } from '@chesslab/pgn';

import { formatMoveRecord, formatScoreTable } from '../progress/formatters.js';
import type { ReplOutput } from '../progress/types.js';

import { HELP_TEXT, parseReplCommand, type ReplCommand } from './commands.js';

export type ReplStatus = 'continue' | 'quit';

export interface PlayReplOptions {
  session: TurnOrchestrator;
  advisory: AdvisorySession;
  output: ReplOutput;
  /** Position `reset` returns to (default: the standard start) */
  startFen?: string;
  /** Writes saved games (default: fs.writeFileSync) */
  writeFile?: (file: string, text: string) => void;
}

const SIDE_NAMES = { white: 'White', black: 'Black' } as const;

export class PlayRepl {
  private readonly session: TurnOrchestrator;
  private readonly advisory: AdvisorySession;
  private readonly output: ReplOutput;
  private readonly startFen: string | undefined;
  private readonly writeFile: (file: string, text: string) => void;

  constructor(options: PlayReplOptions) {
    this.session = options.session;
    this.advisory = options.advisory;
    this.output = options.output;
    this.startFen = options.startFen;
    this.writeFile = options.writeFile ?? ((file, text) => fs.writeFileSync(file, text, 'utf-8'));
  }

  /**
   * Render session events as they happen
   * @returns Unsubscribe function
   */
  attach(): () => void {
    return this.session.subscribe((event) => this.renderEvent(event));
  }

  /**
   * Input prompt naming the side to move and who plays it
   */
  promptText(): string {
    if (this.session.isTerminal()) {
      return 'game over> ';
    }
    const slot = this.session.currentTurn();
    return `${SIDE_NAMES[slot]} (${SOURCE_LABELS[this.session.sourceForTurn()]})> `;
  }

  /**
   * Handle one input line
   */
  async handle(line: string): Promise<ReplStatus> {
    const command = parseReplCommand(line);
    if (command.kind === 'quit') {
      return 'quit';
    }
    await this.execute(command);
    return 'continue';
  }

  private async execute(command: Exclude<ReplCommand, { kind: 'quit' }>): Promise<void> {
    const { output, session } = this;

    switch (command.kind) {
      case 'empty':
        return;

      case 'select':
        this.select(command.square);
        return;

      case 'move':
        if (this.refuseAutomatedTurn()) return;
        this.reportRejection(session.submitMove(command.uci));
        return;

      case 'ask':
        await this.ask(command.question);
        return;

      case 'summary': {
        output.thinking('Advisor is looking at the position...');
        const summary = await this.advisory.summarizePosition({ record: true });
        output.print(summary);
        return;
      }

      case 'hint': {
        output.thinking('Engine is looking for a hint...');
        const hint = await session.requestHint();
        if (hint.status === 'accepted') {
          output.print(`Hint: ${hint.san} (${hint.uci})`);
        } else {
          output.error(hint.error.message);
        }
        return;
      }

      case 'board': {
        const state = session.selectionState;
        output.print(
          renderBoard(session.fen, state.kind === 'armed' ? { selected: state.origin } : {}),
        );
        return;
      }

      case 'moves': {
        const rows = session.moves.asScoreTable();
        output.print(rows.length > 0 ? formatScoreTable(rows) : 'No moves yet');
        return;
      }

      case 'pgn':
        output.print(session.exportPgn());
        return;

      case 'fen':
        output.print(session.fen);
        return;

      case 'reset':
        this.reportRejection(
          session.resetSession(this.startFen !== undefined ? { startFen: this.startFen } : {}),
        );
        return;

      case 'load':
        this.reportRejection(session.resetSession({ startFen: command.fen }));
        return;

      case 'save':
        this.save(command.file);
        return;

      case 'help':
        output.print(HELP_TEXT);
        return;

      case 'unknown':
        output.error(command.reason);
        return;
    }
  }

  private select(square: string): void {
    if (this.refuseAutomatedTurn()) return;

    const result = this.session.selectSquare(square);
    switch (result.kind) {
      case 'ignored':
        this.output.error(`Nothing to select on ${square}`);
        return;
      case 'armed':
        this.output.print(`Selected ${result.origin}; enter the destination square`);
        return;
      case 'deselected':
        this.output.print('Selection cleared');
        return;
      case 'candidate':
        this.reportRejection(result.outcome);
        return;
    }
  }

  private async ask(question: string): Promise<void> {
    try {
      this.output.thinking('Advisor is thinking...');
      const answer = await this.advisory.ask(question);
      this.output.print(this.output.colors.cyan(answer));
    } catch (err) {
      if (err instanceof ValidationError) {
        this.output.error('Usage: ask <question>');
        return;
      }
      throw err;
    }
  }

  private save(file: string): void {
    try {
      this.writeFile(file, `${this.session.exportPgn()}\n`);
      this.output.success(`Saved game to ${file}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.output.error(`Could not save ${file}: ${message}`);
    }
  }

  /**
   * Typed input only moves the side a human plays
   */
  private refuseAutomatedTurn(): boolean {
    const session = this.session;
    if (session.isTerminal()) return false;

    const source = session.sourceForTurn();
    if (source === 'human') return false;

    this.output.error(
      `It is ${SIDE_NAMES[session.currentTurn()]}'s move, played by the ${SOURCE_LABELS[source]}`,
    );
    return true;
  }

  private reportRejection(outcome: Outcome<object>): void {
    if (outcome.status === 'rejected') {
      this.output.error(outcome.error.message);
    }
  }

  private renderEvent(event: SessionEvent): void {
    const { output } = this;
    const c = output.colors;

    switch (event.type) {
      case 'move-applied':
        output.print(
          `${c.bold(formatMoveRecord(event.record))} ${c.dim(`(${SOURCE_LABELS[event.source]})`)}`,
        );
        return;
      case 'provider-failed':
        // The message itself arrives through onWarning
        output.done();
        return;
      case 'session-reset': {
        const config = this.session.config;
        output.success(
          `New game: ${SOURCE_LABELS[config.white]} (White) vs ${SOURCE_LABELS[config.black]} (Black)`,
        );
        return;
      }
      case 'game-loaded':
        output.success(`Loaded "${event.metadata.event ?? 'Unknown'}" (${event.moveCount} moves)`);
        return;
      case 'game-over':
        output.success(
          `Game over: ${describeTerminalStatus(event.status)} (${resultToken(event.status)})`,
        );
        return;
      case 'move-rejected':
        return;
    }
  }
}
