/**
 * In-process stand-in for a UCI engine executable
 *
 * Speaks enough of the protocol for UciEngine: the uci/isready handshake,
 * `position fen`, `go` and `quit`. Commands received are recorded for
 * inspection.
 */

import { EventEmitter } from 'events';
import { createInterface } from 'readline';
import { PassThrough } from 'stream';

import { vi } from 'vitest';

export interface FakeUciProcessConfig {
  /** Reply per position (FEN after `position fen`) */
  moves?: Map<string, string>;
  /** Reply when the position has no entry (default: e2e4) */
  defaultMove?: string;
  /** Never answer `go` */
  hang?: boolean;
  /** Fail like an executable that is not installed */
  missing?: boolean;
  /** Name reported in `id name` */
  name?: string;
}

export class FakeUciProcess extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly commands: string[] = [];
  killed = false;

  private fen = '';

  constructor(private readonly config: FakeUciProcessConfig = {}) {
    super();

    if (config.missing) {
      const err = Object.assign(new Error('spawn stockfish ENOENT'), { code: 'ENOENT' });
      setImmediate(() => this.emit('error', err));
      return;
    }

    createInterface({ input: this.stdin }).on('line', (line) => this.handle(line.trim()));
  }

  kill(): boolean {
    if (this.killed) return false;
    this.killed = true;
    setImmediate(() => this.emit('exit', null, 'SIGTERM'));
    return true;
  }

  /** Simulate the engine dying on its own */
  crash(code = 1): void {
    this.killed = true;
    this.emit('exit', code, null);
  }

  private reply(...lines: string[]): void {
    for (const line of lines) {
      this.stdout.write(`${line}\n`);
    }
  }

  private handle(command: string): void {
    this.commands.push(command);

    if (command === 'uci') {
      this.reply(`id name ${this.config.name ?? 'FakeFish 1.0'}`, 'id author test', 'uciok');
    } else if (command === 'isready') {
      this.reply('readyok');
    } else if (command.startsWith('position fen ')) {
      this.fen = command.slice('position fen '.length);
    } else if (command.startsWith('go')) {
      if (this.config.hang) return;
      const move = this.config.moves?.get(this.fen) ?? this.config.defaultMove ?? 'e2e4';
      this.reply('info depth 1 score cp 20', `bestmove ${move}`);
    } else if (command === 'quit') {
      this.kill();
    }
  }
}

/**
 * Spawn function handing out fake engine processes
 *
 * Every spawned process is kept in `processes` in spawn order.
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createFakeUciSpawn(config: FakeUciProcessConfig = {}) {
  const processes: FakeUciProcess[] = [];

  const spawn = vi.fn((_path: string) => {
    const proc = new FakeUciProcess(config);
    processes.push(proc);
    return proc;
  });

  return { spawn, processes };
}
