/**
 * Scheduler that plays the automated sides of a session
 *
 * One request runs at a time. Failed requests leave the same side to
 * move and are retried; after too many failures in a row the player
 * pauses until a reset or a human move.
 */

import { SessionErrorCode, type SessionError } from './errors.js';
import type { TurnOrchestrator } from './turn-orchestrator.js';
import type { SessionEvent } from './types.js';

export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 3;

export type AutoPlayerState = 'stopped' | 'idle' | 'thinking' | 'paused';

export interface AutoPlayerOptions {
  /** Failures in a row before pausing (default: 3) */
  maxConsecutiveFailures?: number;
  /** Called when the player pauses, with the last failure */
  onPause?: (error: SessionError) => void;
  /** Called before each provider request */
  onThinking?: (slot: 'white' | 'black') => void;
  onWarning?: (message: string) => void;
}

export class AutoPlayer {
  private readonly maxFailures: number;
  private readonly onPause: (error: SessionError) => void;
  private readonly onThinking: (slot: 'white' | 'black') => void;
  private readonly onWarning: (message: string) => void;

  private active = false;
  private busy = false;
  private paused = false;
  private failures = 0;
  private loop: Promise<void> = Promise.resolve();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly session: TurnOrchestrator,
    options: AutoPlayerOptions = {},
  ) {
    this.maxFailures = Math.max(
      1,
      options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES,
    );
    this.onPause = options.onPause ?? (() => undefined);
    this.onThinking = options.onThinking ?? (() => undefined);
    this.onWarning = options.onWarning ?? ((message) => console.warn(message));
  }

  get state(): AutoPlayerState {
    if (!this.active) return 'stopped';
    if (this.paused) return 'paused';
    return this.busy ? 'thinking' : 'idle';
  }

  /** Failures since the last accepted move */
  get consecutiveFailures(): number {
    return this.failures;
  }

  /**
   * Follow the session and play whenever an automated side is to move
   */
  start(): void {
    if (this.active) return;
    this.active = true;
    this.unsubscribe = this.session.subscribe((event) => this.handleEvent(event));
    this.kick();
  }

  /**
   * Stop scheduling. A request already in flight finishes but nothing follows it.
   */
  stop(): void {
    this.active = false;
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Resolves once the current run of automated moves has finished
   */
  whenIdle(): Promise<void> {
    return this.loop;
  }

  private handleEvent(event: SessionEvent): void {
    const resumes =
      event.type === 'session-reset' ||
      (event.type === 'move-applied' && event.source === 'human');
    if (resumes) {
      this.paused = false;
      this.failures = 0;
    }
    this.kick();
  }

  private kick(): void {
    if (!this.active || this.paused || this.busy) return;
    this.busy = true;
    this.loop = this.run();
  }

  private shouldPlay(): boolean {
    return (
      this.active &&
      !this.paused &&
      !this.session.isTerminal() &&
      this.session.sourceForTurn() !== 'human'
    );
  }

  private async run(): Promise<void> {
    try {
      while (this.shouldPlay()) {
        this.onThinking(this.session.currentTurn());
        const outcome = await this.session.requestAutomatedMove();

        if (outcome.status === 'accepted') {
          this.failures = 0;
          continue;
        }

        const code = outcome.error.code;
        if (
          code === SessionErrorCode.STALE_RESULT ||
          code === SessionErrorCode.GAME_OVER ||
          code === SessionErrorCode.NOT_AUTOMATED_TURN
        ) {
          continue;
        }

        this.failures++;
        if (this.failures >= this.maxFailures) {
          this.paused = true;
          this.onPause(outcome.error);
        }
      }
    } catch (err) {
      this.stop();
      this.onWarning(`Auto-play stopped: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      this.busy = false;
    }
  }
}
