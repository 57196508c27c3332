/**
 * Play command implementation
 */

import * as fs from 'node:fs';
import * as readline from 'node:readline';

import {
  AdvisorySession,
  AutoPlayer,
  SOURCE_LABELS,
  SessionError,
  TurnOrchestrator,
  type AdvisorService,
} from '@chesslab/core';
import { createEngineClient, type EngineClient } from '@chesslab/engine';
import { createOpenAIAdvisor } from '@chesslab/llm';

import { parseCliOptions, VERSION } from '../cli.js';
import { formatConfig, loadConfig } from '../config/loader.js';
import type { ChesslabConfig } from '../config/schema.js';
import { InputError, PgnError, SessionStartError, resolveAbsolutePath } from '../errors/index.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';
import { PlayRepl } from '../repl/play-repl.js';

/**
 * Read a PGN file named on the command line
 */
export function readPgnFile(file: string): string {
  const fullPath = resolveAbsolutePath(file);
  if (!fs.existsSync(fullPath)) {
    throw new InputError(`Input file not found: ${fullPath}`, 'Check the file path and try again');
  }
  return fs.readFileSync(fullPath, 'utf-8');
}

function createAdvisor(
  config: ChesslabConfig,
  reporter: ProgressReporter,
): AdvisorService | undefined {
  const { apiKey, model, temperature, timeout } = config.llm;
  if (apiKey) {
    return createOpenAIAdvisor({ apiKey, model, temperature, timeout });
  }

  const seats = config.session;
  if (seats.white === 'advisor' || seats.black === 'advisor') {
    reporter.warn('OPENAI_API_KEY is not set: the advisor cannot move or answer questions');
  }
  return undefined;
}

function createEngine(config: ChesslabConfig, reporter: ProgressReporter): EngineClient {
  const { kind, path, host, port, skillLevel } = config.engine;
  return createEngineClient(
    { kind, path, host, port, ...(skillLevel !== undefined && { skillLevel }) },
    { onWarning: (message) => reporter.warn(message) },
  );
}

/**
 * Main play command handler
 */
export async function playCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new ProgressReporter({ color: !options.noColor });

  const config = await loadConfig(options);

  // Show config and exit if requested
  if (options.showConfig) {
    console.log(formatConfigDisplay(config, reporter.colors));
    console.log('');
    console.log('Raw configuration:');
    console.log(formatConfig(config));
    return;
  }

  reporter.printHeader(VERSION);

  const pgnText = options.pgn !== undefined ? readPgnFile(options.pgn) : undefined;
  const engine = createEngine(config, reporter);
  const advisor = createAdvisor(config, reporter);

  let session: TurnOrchestrator;
  try {
    session = new TurnOrchestrator(
      {
        white: config.session.white,
        black: config.session.black,
        engineTimeBudgetMs: config.engine.timeBudgetMs,
        ...(config.session.startFen !== undefined && { startFen: config.session.startFen }),
      },
      {
        engine,
        ...(advisor && { advisor }),
        historyWindow: config.advisory.historyWindow,
        onWarning: (message) => reporter.warn(message),
      },
    );
  } catch (err) {
    engine.close();
    if (err instanceof SessionError) {
      throw new SessionStartError(err.message, 'Check the --fen value or session.startFen');
    }
    throw err;
  }

  const advisory = new AdvisorySession(session, advisor, {
    transcriptCap: config.advisory.transcriptCap,
    historyWindow: config.advisory.historyWindow,
    onWarning: (message) => reporter.warn(message),
  });

  const repl = new PlayRepl({
    session,
    advisory,
    output: reporter,
    ...(config.session.startFen !== undefined && { startFen: config.session.startFen }),
  });
  const detach = repl.attach();

  const autoPlayer = new AutoPlayer(session, {
    onThinking: () =>
      reporter.thinking(`${SOURCE_LABELS[session.sourceForTurn()]} is thinking...`),
    onPause: (error) =>
      reporter.error(`Automatic play paused after repeated failures: ${error.message}`),
    onWarning: (message) => reporter.warn(message),
  });

  const shutdown = async (): Promise<void> => {
    autoPlayer.stop();
    engine.close();
    await autoPlayer.whenIdle();
    detach();
    advisory.dispose();
  };

  if (pgnText !== undefined) {
    const loaded = session.loadGame(pgnText);
    if (loaded.status === 'rejected') {
      await shutdown();
      throw new PgnError(loaded.error.message, options.pgn);
    }
  }

  reporter.print('Type "help" for commands.');
  await runRepl(repl, session, autoPlayer);
  await shutdown();
}

/**
 * Read lines until `quit` or end of input, starting the automated sides
 */
async function runRepl(
  repl: PlayRepl,
  session: TurnOrchestrator,
  autoPlayer: AutoPlayer,
): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY === true,
  });

  const showPrompt = (): void => {
    rl.setPrompt(repl.promptText());
    rl.prompt(true);
  };

  // Automated moves arrive while we wait for input
  const unsubscribe = session.subscribe((event) => {
    if (event.type === 'move-applied' && event.source !== 'human') {
      showPrompt();
    }
  });

  showPrompt();
  autoPlayer.start();

  try {
    for await (const line of rl) {
      const status = await repl.handle(line);
      if (status === 'quit') break;
      showPrompt();
    }
  } finally {
    unsubscribe();
    rl.close();
  }
}
