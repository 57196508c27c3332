/**
 * Output formatting utilities
 */

import { SOURCE_LABELS, type MoveRecord, type ScoreRow } from '@chesslab/core';

import type { ChesslabConfig } from '../config/schema.js';

import type { ColorFunctions } from './types.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: ChesslabConfig, c: ColorFunctions): string {
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  // Session
  lines.push(c.dim('Session:'));
  lines.push(`  White: ${SOURCE_LABELS[config.session.white]}`);
  lines.push(`  Black: ${SOURCE_LABELS[config.session.black]}`);
  lines.push(`  Start: ${config.session.startFen ?? 'standard position'}`);
  lines.push('');

  // Engine
  lines.push(c.dim('Engine:'));
  if (config.engine.kind === 'uci') {
    lines.push(`  UCI executable: ${config.engine.path}`);
  } else {
    lines.push(`  Service: ${config.engine.host}:${config.engine.port}`);
  }
  lines.push(`  Time per move: ${config.engine.timeBudgetMs}ms`);
  if (config.engine.skillLevel !== undefined) {
    lines.push(`  Skill level: ${config.engine.skillLevel}`);
  }
  lines.push('');

  // LLM
  lines.push(c.dim('Advisor:'));
  lines.push(`  Model: ${config.llm.model}`);
  lines.push(`  API key: ${config.llm.apiKey ? c.green('set') : c.yellow('not set')}`);
  lines.push(`  Transcript cap: ${config.advisory.transcriptCap} turns`);
  lines.push(`  History window: ${config.advisory.historyWindow} moves`);

  return lines.join('\n');
}

/**
 * Score table, one full move per line
 *
 * ```
 *   1. e4       e5
 *   2. Nf3      Nc6
 * ```
 */
export function formatScoreTable(rows: readonly ScoreRow[]): string {
  return rows
    .map((row) => {
      const number = `${row.moveNumber}.`.padStart(4);
      const white = (row.white ?? '...').padEnd(8);
      return `${number} ${white} ${row.black ?? ''}`.trimEnd();
    })
    .join('\n');
}

/**
 * One applied move, e.g. `1. e4` or `1... e5`
 */
export function formatMoveRecord(record: MoveRecord): string {
  const separator = record.mover === 'white' ? '.' : '...';
  return `${record.moveNumber}${separator} ${record.san}`;
}
