/**
 * Local UCI engine driven as a child process
 *
 * The process is started lazily on first use and kept alive between
 * searches. Searches are queued: a UCI engine thinks about one position
 * at a time.
 */

import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import { createInterface, type Interface } from 'readline';
import type { Readable, Writable } from 'stream';

import {
  EngineError,
  EngineProcessError,
  EngineTimeoutError,
  EngineUnavailableError,
  NoMoveError,
} from '../errors.js';
import type { EngineClient, EngineHealthCheckResponse } from '../types.js';

/**
 * The parts of a child process the engine driver talks to
 */
export interface EngineProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
}

/**
 * Starts an engine process from its executable path
 */
export type SpawnEngine = (path: string) => EngineProcess;

/**
 * Configuration for a local UCI engine
 */
export interface UciEngineConfig {
  /** Executable name or path */
  path: string;
  /** `Skill Level` option sent after the handshake (engine default when unset) */
  skillLevel?: number;
  /** Deadline for the uci/isready handshake */
  initTimeoutMs: number;
  /** Extra time allowed past the search budget before the engine is killed */
  timeoutGraceMs: number;
}

export const DEFAULT_UCI_ENGINE_CONFIG: UciEngineConfig = {
  path: 'stockfish',
  initTimeoutMs: 5000,
  timeoutGraceMs: 2000,
};

export interface UciEngineOptions {
  /** Process factory (default: child_process.spawn) */
  spawn?: SpawnEngine;
  /** Receives non-fatal problems such as unexpected engine exits */
  onWarning?: (message: string) => void;
}

interface LineWaiter {
  matches: (line: string) => boolean;
  resolve: (line: string) => void;
  reject: (err: Error) => void;
}

const defaultSpawn: SpawnEngine = (path) => spawn(path);

function isMissingExecutable(err: Error): boolean {
  return 'code' in err && err.code === 'ENOENT';
}

/**
 * Engine move provider speaking UCI over stdin/stdout
 */
export class UciEngine implements EngineClient {
  private readonly config: UciEngineConfig;
  private readonly spawnEngine: SpawnEngine;
  private readonly onWarning: (message: string) => void;

  private process: EngineProcess | null = null;
  private lines: Interface | null = null;
  private startPromise: Promise<EngineProcess> | null = null;
  private waiter: LineWaiter | null = null;
  private queue: Promise<void> = Promise.resolve();
  private engineName = 'unknown';

  constructor(config: Partial<UciEngineConfig> = {}, options: UciEngineOptions = {}) {
    this.config = { ...DEFAULT_UCI_ENGINE_CONFIG, ...config };
    this.spawnEngine = options.spawn ?? defaultSpawn;
    this.onWarning = options.onWarning ?? ((message) => console.warn(message));
  }

  /**
   * Search a position for `timeBudgetMs` and return the engine's choice
   *
   * If no answer arrives within the budget plus grace, the process is
   * killed (it is restarted on the next request) and the call fails.
   *
   * @returns Best move in UCI notation
   */
  bestMove(fen: string, timeBudgetMs: number): Promise<string> {
    return this.enqueue(async () => {
      await this.ensureStarted();

      const movetime = Math.max(1, Math.round(timeBudgetMs));
      this.send(`position fen ${fen}`);

      let reply: string;
      try {
        reply = await this.request(
          `go movetime ${movetime}`,
          (line) => line.startsWith('bestmove'),
          movetime + this.config.timeoutGraceMs,
          'bestmove',
        );
      } catch (err) {
        if (err instanceof EngineTimeoutError) {
          this.terminate();
        }
        throw err;
      }

      const move = reply.split(/\s+/)[1];
      if (!move || move === '(none)' || move === '0000') {
        throw new NoMoveError(fen, reply);
      }
      return move;
    });
  }

  /**
   * Start the engine if needed and confirm it answers `isready`
   */
  healthCheck(): Promise<EngineHealthCheckResponse> {
    return this.enqueue(async () => {
      await this.ensureStarted();
      await this.request(
        'isready',
        (line) => line === 'readyok',
        this.config.initTimeoutMs,
        'isready',
      );
      return { healthy: true, version: this.engineName };
    });
  }

  /**
   * Ask the engine to quit and release the process
   */
  close(): void {
    if (this.process) {
      this.send('quit');
    }
    this.terminate();
  }

  /** Whether an engine process is currently running */
  get running(): boolean {
    return this.process !== null;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /**
   * Ensure the process is running and past the handshake (lazy initialization)
   */
  private async ensureStarted(): Promise<EngineProcess> {
    if (this.process && !this.startPromise) {
      return this.process;
    }

    if (this.startPromise) {
      return this.startPromise;
    }

    this.startPromise = this.start();

    try {
      return await this.startPromise;
    } finally {
      this.startPromise = null;
    }
  }

  private async start(): Promise<EngineProcess> {
    let proc: EngineProcess;
    try {
      proc = this.spawnEngine(this.config.path);
    } catch (err) {
      throw new EngineUnavailableError(
        this.config.path,
        err instanceof Error ? err : new Error(String(err)),
      );
    }

    proc.on('error', (err: Error) => this.handleProcessError(proc, err));
    proc.on('exit', (code: number | null) => this.handleExit(proc, code));
    proc.stdin.on('error', (err: Error) => this.handleProcessError(proc, err));

    const lines = createInterface({ input: proc.stdout });
    lines.on('line', (line) => this.handleLine(line));

    this.process = proc;
    this.lines = lines;

    try {
      await this.request('uci', (line) => line === 'uciok', this.config.initTimeoutMs, 'uci');
      if (this.config.skillLevel !== undefined) {
        this.send(`setoption name Skill Level value ${this.config.skillLevel}`);
      }
      await this.request(
        'isready',
        (line) => line === 'readyok',
        this.config.initTimeoutMs,
        'isready',
      );
    } catch (err) {
      this.terminate();
      throw err;
    }

    return proc;
  }

  /**
   * Send a command and wait for the first output line that matches
   */
  private request(
    command: string,
    matches: (line: string) => boolean,
    timeoutMs: number,
    operation: string,
  ): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new EngineTimeoutError(operation, timeoutMs));
      }, timeoutMs);

      this.waiter = {
        matches,
        resolve: (line) => {
          clearTimeout(timer);
          resolve(line);
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      };

      this.send(command);
    });
  }

  private send(command: string): void {
    const proc = this.process;
    if (!proc) {
      this.failWaiter(new EngineProcessError(`Engine is not running (command: ${command})`));
      return;
    }
    proc.stdin.write(`${command}\n`);
  }

  private handleLine(raw: string): void {
    const line = raw.trim();
    if (line.startsWith('id name ')) {
      this.engineName = line.slice('id name '.length);
    }

    const waiter = this.waiter;
    if (waiter && waiter.matches(line)) {
      this.waiter = null;
      waiter.resolve(line);
    }
  }

  private handleProcessError(proc: EngineProcess, err: Error): void {
    if (proc !== this.process) return;

    const error: EngineError = isMissingExecutable(err)
      ? new EngineUnavailableError(this.config.path, err)
      : new EngineProcessError(`Engine process error: ${err.message}`, err.message);

    this.detach();
    this.failWaiter(error);
  }

  private handleExit(proc: EngineProcess, code: number | null): void {
    if (proc !== this.process) return;

    this.detach();
    const message = `Engine exited unexpectedly (code ${code ?? 'none'})`;
    if (this.waiter) {
      this.failWaiter(new EngineProcessError(message));
    } else {
      this.onWarning(message);
    }
  }

  private failWaiter(err: Error): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.reject(err);
    }
  }

  private detach(): void {
    this.lines?.close();
    this.lines = null;
    this.process = null;
  }

  /**
   * Kill the process; the next request starts a fresh one
   */
  private terminate(): void {
    const proc = this.process;
    this.detach();
    proc?.kill();
  }
}
