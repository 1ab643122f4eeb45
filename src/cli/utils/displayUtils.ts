/**
 * Shared display utilities for CLI commands.
 *
 * Provides the box-drawing borders, column padding and status coloring used
 * across the CLI commands.
 */

export interface DisplayOptions {
  colors: boolean;
  unicode: boolean;
}

export interface BorderChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

export function getBorderChars(options: DisplayOptions): BorderChars {
  if (options.unicode) {
    return {
      topLeft: '┌',
      topRight: '┐',
      bottomLeft: '└',
      bottomRight: '┘',
      horizontal: '─',
      vertical: '│',
    };
  }
  return {
    topLeft: '+',
    topRight: '+',
    bottomLeft: '+',
    bottomRight: '+',
    horizontal: '-',
    vertical: '|',
  };
}

/**
 * Strips ANSI escape sequences from a string to get visible length.
 *
 * @param str - The string potentially containing ANSI codes.
 * @returns The string with ANSI codes removed.
 */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_ESCAPE_PATTERN, '');
}

/**
 * Pads a string to a visible width.
 *
 * @param str - Text, possibly colored.
 * @param width - Minimum visible width.
 * @returns The padded text.
 */
export function padVisible(str: string, width: number): string {
  const visible = stripAnsi(str).length;
  return visible >= width ? str : str + ' '.repeat(width - visible);
}

/**
 * Colors a gate or readiness status: green when passing, yellow otherwise.
 *
 * @param status - PASS, INCOMPLETE, READY or NOT_READY.
 * @param options - Display options.
 * @returns The status, colored when colors are on.
 */
export function formatGateStatus(status: string, options: DisplayOptions): string {
  if (!options.colors) {
    return status;
  }
  const code = status === 'PASS' || status === 'READY' ? '\x1b[32m' : '\x1b[33m';
  return `${code}${status}\x1b[0m`;
}

/**
 * Aligns rows into columns separated by two spaces. The last column is not
 * padded.
 *
 * @param rows - Table rows, all of the same length.
 * @returns One line per row.
 */
export function formatColumns(rows: readonly (readonly string[])[]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, stripAnsi(cell).length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, index) => (index === row.length - 1 ? cell : padVisible(cell, widths[index] ?? 0)))
      .join('  ')
  );
}

export function wrapInBox(text: string, options: DisplayOptions): string {
  const border = getBorderChars(options);
  const lines = text.split('\n');
  const maxLength = Math.max(...lines.map((line) => stripAnsi(line).length));
  const horizontalBorder = border.horizontal.repeat(maxLength + 2);

  let result = border.topLeft + horizontalBorder + border.topRight + '\n';
  for (const line of lines) {
    result += border.vertical + ' ' + padVisible(line, maxLength) + ' ' + border.vertical + '\n';
  }
  result += border.bottomLeft + horizontalBorder + border.bottomRight;

  return result;
}
