/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const GAMES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'games');

/**
 * Read a PGN file from src/fixtures/games
 */
export function loadPgnSync(name: string): string {
  return fs.readFileSync(path.join(GAMES_DIR, name), 'utf-8');
}
