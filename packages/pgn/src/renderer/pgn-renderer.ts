import { STARTING_FEN } from '../chess/position.js';
import type { GameMetadata, MoveInfo, ParsedGame } from '../index.js';

/**
 * Default maximum line length for PGN output
 */
export const DEFAULT_MAX_LINE_LENGTH = 80;

/**
 * Options for PGN rendering
 */
export interface RenderOptions {
  /**
   * Maximum line length for move text (default: 80)
   * Set to 0 to disable line wrapping
   */
  maxLineLength?: number;
}

/**
 * Render a ParsedGame to PGN string format
 *
 * @param game - The game to render
 * @param options - Optional rendering options
 * @returns Valid PGN string
 */
export function renderPgnString(game: ParsedGame, options?: RenderOptions): string {
  const parts: string[] = [];

  parts.push(renderTags(game.metadata, game.startFen));
  parts.push('');

  if (game.gameComment) {
    parts.push(`{${escapeComment(game.gameComment)}}`);
    parts.push('');
  }

  const moveText = renderMoves(game.moves, game.metadata.result);

  const maxLineLength = options?.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  if (maxLineLength > 0) {
    parts.push(wrapMoveText(moveText, maxLineLength));
  } else {
    parts.push(moveText);
  }

  return parts.join('\n');
}

/**
 * Render the PGN tag section
 */
function renderTags(metadata: GameMetadata, startFen: string): string {
  const tags: string[] = [];

  // Seven Tag Roster (STR) - required tags in order
  tags.push(renderTag('Event', metadata.event ?? '?'));
  tags.push(renderTag('Site', metadata.site ?? '?'));
  tags.push(renderTag('Date', metadata.date ?? '????.??.??'));
  tags.push(renderTag('Round', metadata.round ?? '?'));
  tags.push(renderTag('White', metadata.white));
  tags.push(renderTag('Black', metadata.black));
  tags.push(renderTag('Result', metadata.result));

  // Games from a set-up position carry their start
  if (startFen !== STARTING_FEN) {
    tags.push(renderTag('SetUp', '1'));
    tags.push(renderTag('FEN', startFen));
  }

  return tags.join('\n');
}

/**
 * Render a single PGN tag
 */
function renderTag(name: string, value: string): string {
  // Escape backslashes and quotes in the value
  const escapedValue = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return `[${name} "${escapedValue}"]`;
}

/**
 * Render the move text section
 */
function renderMoves(moves: MoveInfo[], result: string): string {
  const parts: string[] = [];

  moves.forEach((move, index) => {
    if (move.isWhiteMove) {
      parts.push(`${move.moveNumber}.`);
    } else if (index === 0) {
      // Game starts with Black to move
      parts.push(`${move.moveNumber}...`);
    }

    parts.push(move.san);
  });

  parts.push(result);

  return parts.join(' ');
}

/**
 * Escape special characters in comments
 * PGN comments are enclosed in braces, so we need to escape closing braces
 */
function escapeComment(comment: string): string {
  return comment.replace(/\}/g, '\\}');
}

/**
 * Wrap move text to respect maximum line length
 *
 * Breaks at word boundaries and never inside a comment.
 *
 * @param text - The move text to wrap
 * @param maxLength - Maximum line length
 * @returns Wrapped text with newlines
 */
export function wrapMoveText(text: string, maxLength: number): string {
  if (!text || maxLength <= 0) {
    return text;
  }

  const tokens = tokenizeMoveText(text);
  const lines: string[] = [];
  let currentLine = '';

  for (const token of tokens) {
    const wouldExceed = currentLine.length > 0 && currentLine.length + 1 + token.length > maxLength;

    if (wouldExceed) {
      lines.push(currentLine);
      currentLine = token;
    } else if (currentLine.length > 0) {
      currentLine += ' ' + token;
    } else {
      currentLine = token;
    }
  }

  if (currentLine.length > 0) {
    lines.push(currentLine);
  }

  return lines.join('\n');
}

/**
 * Tokenize move text while preserving comments as single tokens
 */
function tokenizeMoveText(text: string): string[] {
  const tokens: string[] = [];
  let i = 0;

  while (i < text.length) {
    while (i < text.length && text[i] === ' ') {
      i++;
    }

    if (i >= text.length) break;

    if (text[i] === '{') {
      const end = findClosingBrace(text, i);
      tokens.push(text.slice(i, end + 1));
      i = end + 1;
    } else {
      let j = i;
      while (j < text.length && text[j] !== ' ' && text[j] !== '{') {
        j++;
      }
      tokens.push(text.slice(i, j));
      i = j;
    }
  }

  return tokens;
}

/**
 * Find the index of the brace closing the comment opened at `start`
 */
function findClosingBrace(text: string, start: number): number {
  for (let i = start + 1; i < text.length; i++) {
    // Skip escaped characters (for comments with \})
    if (text[i] === '\\') {
      i++;
      continue;
    }
    if (text[i] === '}') {
      return i;
    }
  }

  // If no match found, return end of string
  return text.length - 1;
}
