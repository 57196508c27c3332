import { AdvisorySession, TurnOrchestrator, type SessionConfig } from '@chesslab/core';
import { STARTING_FEN, renderBoard } from '@chesslab/pgn';
import { createMockAdvisor, createMockEngine } from '@chesslab/test-utils';
import { describe, it, expect, vi } from 'vitest';

import { createColorFns, type ReplOutput } from '../progress/types.js';
import { PlayRepl } from '../repl/play-repl.js';

function createRecordingOutput(): ReplOutput & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    colors: createColorFns(false),
    print: (text) => lines.push(text),
    success: (text) => lines.push(`ok: ${text}`),
    warn: (text) => lines.push(`warn: ${text}`),
    error: (text) => lines.push(`error: ${text}`),
    thinking: vi.fn(),
    done: vi.fn(),
  };
}

interface Setup {
  config?: Partial<SessionConfig>;
  engine?: ReturnType<typeof createMockEngine>;
  advisor?: ReturnType<typeof createMockAdvisor>;
  writeFile?: (file: string, text: string) => void;
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
function setup(options: Setup = {}) {
  const output = createRecordingOutput();
  const session = new TurnOrchestrator(options.config ?? { white: 'human', black: 'human' }, {
    ...(options.engine && { engine: options.engine }),
    ...(options.advisor && { advisor: options.advisor }),
    onWarning: (message) => output.warn(message),
  });
  const advisory = new AdvisorySession(session, options.advisor, {
    onWarning: (message) => output.warn(message),
  });
  const repl = new PlayRepl({
    session,
    advisory,
    output,
    ...(options.writeFile && { writeFile: options.writeFile }),
  });
  repl.attach();
  return { repl, session, advisory, output };
}

async function run(repl: PlayRepl, lines: string[]): Promise<void> {
  for (const line of lines) {
    await repl.handle(line);
  }
}

describe('PlayRepl', () => {
  describe('moves', () => {
    it('plays a typed coordinate move', async () => {
      const { repl, output, session } = setup();

      await repl.handle('e2e4');

      expect(output.lines).toEqual(['1. e4 (Human)']);
      expect(session.moves.length).toBe(1);
    });

    it('plays a move selected square by square', async () => {
      const { repl, output } = setup();

      await run(repl, ['e2', 'e4']);

      expect(output.lines).toEqual(['Selected e2; enter the destination square', '1. e4 (Human)']);
    });

    it('clears a selection when the origin is selected again', async () => {
      const { repl, output } = setup();

      await run(repl, ['g1', 'g1']);

      expect(output.lines[1]).toBe('Selection cleared');
    });

    it('reports an empty square', async () => {
      const { repl, output } = setup();

      await repl.handle('e4');

      expect(output.lines).toEqual(['error: Nothing to select on e4']);
    });

    it('reports an illegal move and leaves the board alone', async () => {
      const { repl, output, session } = setup();

      await repl.handle('e2e5');

      expect(output.lines).toEqual(['error: Illegal move: e2e5']);
      expect(session.fen).toBe(STARTING_FEN);
    });

    it('refuses typed moves for a side the advisor plays', async () => {
      const { repl, output, session } = setup({ config: { white: 'human', black: 'advisor' } });

      await run(repl, ['e2e4', 'e7e5', 'e7']);

      expect(output.lines).toEqual([
        '1. e4 (Human)',
        "error: It is Black's move, played by the Advisor",
        "error: It is Black's move, played by the Advisor",
      ]);
      expect(session.moves.length).toBe(1);
    });

    it('announces the end of the game and refuses further moves', async () => {
      const { repl, output } = setup();

      await run(repl, ['f2f3', 'e7e5', 'g2g4', 'd8h4', 'e2e4']);

      expect(output.lines.slice(-3)).toEqual([
        '2... Qh4# (Human)',
        'ok: Game over: Checkmate: Black wins (0-1)',
        'error: Game over: Checkmate: Black wins',
      ]);
      expect(repl.promptText()).toBe('game over> ');
    });
  });

  describe('prompt', () => {
    it('names the side to move and who plays it', async () => {
      const { repl } = setup({ config: { white: 'human', black: 'engine' } });

      expect(repl.promptText()).toBe('White (Human)> ');
      await repl.handle('d2d4');
      expect(repl.promptText()).toBe('Black (Engine)> ');
    });
  });

  describe('views', () => {
    it('prints the score table', async () => {
      const { repl, output } = setup();

      await run(repl, ['e2e4', 'e7e5', 'g1f3']);
      output.lines.length = 0;
      await repl.handle('moves');

      expect(output.lines).toEqual(['  1. e4       e5\n  2. Nf3']);
    });

    it('says when there are no moves', async () => {
      const { repl, output } = setup();

      await repl.handle('moves');

      expect(output.lines).toEqual(['No moves yet']);
    });

    it('prints the board with the armed square marked', async () => {
      const { repl, output } = setup();

      await run(repl, ['e2', 'board']);

      expect(output.lines[1]).toBe(renderBoard(STARTING_FEN, { selected: 'e2' }));
      expect(output.lines[1]).toContain('<P>');
    });

    it('prints the position and the game text', async () => {
      const { repl, output, session } = setup();

      await run(repl, ['e2e4', 'fen', 'pgn']);

      expect(output.lines[1]).toBe(session.fen);
      expect(output.lines[2]).toBe(session.exportPgn());
    });
  });

  describe('providers', () => {
    it('shows an engine hint without playing it', async () => {
      const engine = createMockEngine({ script: ['g1f3'] });
      const { repl, output, session } = setup({ engine });

      await repl.handle('hint');

      expect(output.lines).toEqual(['Hint: Nf3 (g1f3)']);
      expect(session.moves.length).toBe(0);
      expect(output.thinking).toHaveBeenCalledTimes(1);
    });

    it('reports a missing engine', async () => {
      const { repl, output } = setup();

      await repl.handle('hint');

      expect(output.lines).toEqual(['error: Engine not configured']);
    });

    it('prints the advisor answer', async () => {
      const advisor = createMockAdvisor({ replies: ['Develop your knights.'] });
      const { repl, output, advisory } = setup({ advisor });

      await repl.handle('ask What should I play?');

      expect(output.lines).toEqual(['Develop your knights.']);
      expect(advisory.transcript).toEqual([
        { role: 'user', text: 'What should I play?' },
        { role: 'assistant', text: 'Develop your knights.' },
      ]);
    });

    it('answers without an advisor', async () => {
      const { repl, output } = setup();

      await repl.handle('ask Is this a good opening?');

      expect(output.lines).toEqual(['AI not connected.']);
    });

    it('shows usage for an empty question', async () => {
      const advisor = createMockAdvisor();
      const { repl, output } = setup({ advisor });

      await repl.handle('ask');

      expect(output.lines).toEqual(['error: Usage: ask <question>']);
      expect(advisor.generate).not.toHaveBeenCalled();
    });

    it('records the position summary in the transcript', async () => {
      const advisor = createMockAdvisor({ replies: ['The f7 square is weak.'] });
      const { repl, output, advisory } = setup({ advisor });

      await repl.handle('summary');

      expect(output.lines).toEqual(['The f7 square is weak.']);
      expect(advisory.transcript).toEqual([{ role: 'assistant', text: 'The f7 square is weak.' }]);
    });
  });

  describe('session commands', () => {
    it('starts a new game on reset', async () => {
      const { repl, output, session } = setup();

      await run(repl, ['e2e4', 'reset']);

      expect(output.lines[1]).toBe('ok: New game: Human (White) vs Human (Black)');
      expect(session.fen).toBe(STARTING_FEN);
      expect(session.moves.length).toBe(0);
    });

    it('loads a position', async () => {
      const { repl, output, session } = setup();

      await repl.handle('load 4k3/8/8/8/8/8/4P3/4K3 w - - 0 1');

      expect(output.lines).toEqual(['ok: New game: Human (White) vs Human (Black)']);
      expect(session.fen).toBe('4k3/8/8/8/8/8/4P3/4K3 w - - 0 1');
    });

    it('announces a loaded position that is already over', async () => {
      const { repl, output } = setup();

      await repl.handle('load 7k/8/8/8/8/8/8/K7 w - - 0 1');

      expect(output.lines).toEqual([
        'ok: New game: Human (White) vs Human (Black)',
        'ok: Game over: Draw by insufficient material (1/2-1/2)',
      ]);
    });

    it('keeps the game when the position is invalid', async () => {
      const { repl, output, session } = setup();

      await run(repl, ['e2e4', 'load not a fen']);

      expect(output.lines[1]).toBe('error: Invalid FEN: not a fen');
      expect(session.moves.length).toBe(1);
    });

    it('saves the game text', async () => {
      const writeFile = vi.fn();
      const { repl, output, session } = setup({ writeFile });

      await run(repl, ['e2e4', 'save today.pgn']);

      expect(writeFile).toHaveBeenCalledWith('today.pgn', `${session.exportPgn()}\n`);
      expect(output.lines[1]).toBe('ok: Saved game to today.pgn');
    });

    it('reports a failed save', async () => {
      const writeFile = vi.fn(() => {
        throw new Error('disk full');
      });
      const { repl, output } = setup({ writeFile });

      await repl.handle('save today.pgn');

      expect(output.lines).toEqual(['error: Could not save today.pgn: disk full']);
    });

    it('stops on quit', async () => {
      const { repl } = setup();

      expect(await repl.handle('quit')).toBe('quit');
      expect(await repl.handle('help')).toBe('continue');
    });

    it('reports unknown input', async () => {
      const { repl, output } = setup();

      await repl.handle('resign');

      expect(output.lines).toEqual(['error: Unknown command: resign (type "help" for commands)']);
    });
  });
});
