/**
 * Advisory Session
 *
 * Question-and-answer transcript with the advisor about the current
 * position. Provider failures become assistant turns instead of errors.
 */

import {
  DEFAULT_HISTORY_WINDOW,
  ValidationError,
  buildQuestionPrompt,
  buildSummaryPrompt,
  type PositionContext,
} from '@chesslab/llm';

import type { TurnOrchestrator } from './turn-orchestrator.js';
import type { AdvisorService, SessionEvent } from './types.js';

export interface AdvisoryTurn {
  readonly role: 'user' | 'assistant';
  readonly text: string;
}

export const DEFAULT_TRANSCRIPT_CAP = 50;

export const NOT_CONNECTED_REPLY = 'AI not connected.';

export interface AdvisorySessionOptions {
  /** Turns kept before the oldest are dropped (default: 50) */
  transcriptCap?: number;
  /** Recent moves included in prompts (default: 10) */
  historyWindow?: number;
  onWarning?: (message: string) => void;
}

export class AdvisorySession {
  private readonly turns: AdvisoryTurn[] = [];
  private readonly cap: number;
  private readonly historyWindow: number;
  private readonly onWarning: (message: string) => void;
  private readonly unsubscribe: () => void;
  /** Bumped by every session reset; answers from an earlier game are not recorded */
  private resets = 0;

  constructor(
    private readonly session: TurnOrchestrator,
    private readonly advisor: AdvisorService | undefined,
    options: AdvisorySessionOptions = {},
  ) {
    this.cap = Math.max(1, options.transcriptCap ?? DEFAULT_TRANSCRIPT_CAP);
    this.historyWindow = options.historyWindow ?? DEFAULT_HISTORY_WINDOW;
    this.onWarning = options.onWarning ?? ((message) => console.warn(message));
    this.unsubscribe = session.subscribe((event) => this.handleEvent(event));
  }

  get transcript(): readonly AdvisoryTurn[] {
    return [...this.turns];
  }

  /**
   * Ask about the current position
   *
   * An answer that arrives after the session was reset is returned but
   * not recorded.
   *
   * @returns The advisor's answer, or a placeholder describing the failure
   * @throws ValidationError if the question is blank
   */
  async ask(question: string): Promise<string> {
    const trimmed = question.trim();
    if (!trimmed) {
      throw new ValidationError('Question must not be empty', 'question', question);
    }

    this.append({ role: 'user', text: trimmed });
    const resetsBefore = this.resets;
    const answer = await this.generate(buildQuestionPrompt(this.context(), trimmed));
    if (this.resets === resetsBefore) {
      this.append({ role: 'assistant', text: answer });
    }
    return answer;
  }

  /**
   * Short note on the biggest threat or opportunity in the position
   *
   * Kept out of the transcript unless `record` is set.
   */
  async summarizePosition(options: { record?: boolean } = {}): Promise<string> {
    const resetsBefore = this.resets;
    const summary = await this.generate(buildSummaryPrompt(this.context()));
    if (options.record && this.resets === resetsBefore) {
      this.append({ role: 'assistant', text: summary });
    }
    return summary;
  }

  /**
   * Add an assistant note that did not come from the advisor
   */
  note(text: string): void {
    this.append({ role: 'assistant', text });
  }

  clear(): void {
    this.turns.length = 0;
  }

  /** Stop following session events */
  dispose(): void {
    this.unsubscribe();
  }

  private async generate(prompt: string): Promise<string> {
    if (!this.advisor) {
      return NOT_CONNECTED_REPLY;
    }
    try {
      return await this.advisor.generate(prompt);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.onWarning(`Advisor request failed: ${message}`);
      return `AI Error: ${message}`;
    }
  }

  private context(): PositionContext {
    return {
      fen: this.session.fen,
      history: this.session.moves.historyMoves(),
      historyWindow: this.historyWindow,
    };
  }

  private append(turn: AdvisoryTurn): void {
    this.turns.push(turn);
    while (this.turns.length > this.cap) {
      this.turns.shift();
    }
  }

  private handleEvent(event: SessionEvent): void {
    if (event.type === 'session-reset') {
      this.resets++;
      this.clear();
    } else if (event.type === 'game-loaded') {
      this.note(`Loaded PGN: ${event.metadata.event ?? 'Unknown'}`);
    }
  }
}
