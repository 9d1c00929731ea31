/**
 * Terminal styling for CLI output: ANSI colors and boxed messages.
 */

import type { EnvRecord } from '../../config/index.js';

export interface DisplayOptions {
  colors: boolean;
  unicode: boolean;
}

/** Corner, edge and side characters of a box. */
interface BoxStyle {
  readonly corners: readonly [string, string, string, string];
  readonly edge: string;
  readonly side: string;
}

const UNICODE_BOX: BoxStyle = { corners: ['┌', '┐', '└', '┘'], edge: '─', side: '│' };
const ASCII_BOX: BoxStyle = { corners: ['+', '+', '+', '+'], edge: '-', side: '|' };

export const CLI_STYLES = {
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
} as const;

export type CliStyle = keyof typeof CLI_STYLES;

const RESET = '\x1b[0m';

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

/**
 * Wraps text in an ANSI style when colors are enabled.
 */
export function paint(text: string, style: CliStyle, options: DisplayOptions): string {
  return options.colors ? `${CLI_STYLES[style]}${text}${RESET}` : text;
}

/**
 * Chooses display options for a terminal. `NO_COLOR` disables colors.
 *
 * @param env - Environment variables.
 * @param isTTY - Whether output goes to a terminal.
 */
export function resolveDisplayOptions(env: EnvRecord, isTTY: boolean): DisplayOptions {
  const noColor = env.NO_COLOR !== undefined && env.NO_COLOR !== '';
  return { colors: isTTY && !noColor, unicode: isTTY };
}

/** Text without ANSI styling, for measuring visible width. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE_PATTERN, '');
}

/**
 * Draws a box around text; every line is padded to the widest.
 */
export function wrapInBox(text: string, options: DisplayOptions): string {
  const { corners, edge, side } = options.unicode ? UNICODE_BOX : ASCII_BOX;
  const [topLeft, topRight, bottomLeft, bottomRight] = corners;
  const lines = text.split('\n');
  const width = Math.max(...lines.map((line) => stripAnsi(line).length));
  const rule = edge.repeat(width + 2);

  return [
    `${topLeft}${rule}${topRight}`,
    ...lines.map((line) => `${side} ${line.padEnd(width + line.length - stripAnsi(line).length)} ${side}`),
    `${bottomLeft}${rule}${bottomRight}`,
  ].join('\n');
}
