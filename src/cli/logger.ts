/**
 * CLI output helpers: colors, spinners, boxes and tables.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import Table from 'cli-table3';
import type { Row, Scalar } from '../types/utils.js';

const coolGradient = gradient(['#00F5FF', '#00D4FF', '#00B4FF']);
const successGradient = gradient(['#00ff88', '#00cc77']);
const errorGradient = gradient(['#ff4444', '#cc0000']);

/**
 * Print the verisql banner.
 */
export function printBanner(): void {
  const banner = `
╔═══════════════════════════════════════╗
║                                       ║
║   ${coolGradient('verisql')}                             ║
║   ${chalk.gray('questions in, verified SQL out')}      ║
║                                       ║
╚═══════════════════════════════════════╝
  `;
  console.log(banner);
}

export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

export function spinner(text: string): ReturnType<typeof ora> {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
}

type Tone = 'plain' | 'success' | 'error';

const tones: Record<Tone, { color: string; paint: (text: string) => string }> = {
  plain: { color: 'cyan', paint: (text) => text },
  success: { color: 'green', paint: successGradient },
  error: { color: 'red', paint: errorGradient },
};

function framed(message: string, tone: Tone, title?: string): string {
  const { color, paint } = tones[tone];
  return boxen(paint(message), {
    padding: 1,
    margin: 1,
    borderStyle: 'round',
    borderColor: color,
    title,
    titleAlignment: 'center',
  });
}

export function box(message: string, title?: string): void {
  console.log(framed(message, 'plain', title));
}

export function successBox(message: string, title?: string): void {
  console.log(framed(message, 'success', title));
}

export function errorBox(message: string, title: string = 'Error'): void {
  console.log(framed(message, 'error', title));
}

/**
 * Print code block.
 */
export function code(content: string, language?: string): void {
  const border = chalk.gray('─'.repeat(50));
  console.log(border);
  if (language) {
    console.log(chalk.gray(`# ${language}`));
  }
  console.log(chalk.cyan(content));
  console.log(border);
}

export function section(title: string): void {
  console.log('');
  console.log(coolGradient(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

export function newline(): void {
  console.log('');
}

function cell(value: Scalar): string {
  return value === null ? chalk.dim('null') : String(value);
}

/**
 * Render result rows as a table string, showing at most `limit` rows.
 */
export function formatRows(rows: Row[], limit: number = 20): string {
  if (rows.length === 0) return chalk.dim('(no rows)');
  const columns = Object.keys(rows[0]);
  const table = new Table({ head: columns.map((c) => chalk.cyan(c)) });
  for (const r of rows.slice(0, limit)) {
    table.push(columns.map((c) => cell(r[c] ?? null)));
  }
  const more = rows.length > limit ? `\n${chalk.dim(`… ${rows.length - limit} more rows`)}` : '';
  return `${table.toString()}${more}`;
}

/**
 * Render label/value pairs as a two-column table string.
 */
export function formatPairs(pairs: Array<[string, string]>): string {
  const table = new Table();
  for (const [label, value] of pairs) {
    table.push({ [chalk.bold(label)]: value });
  }
  return table.toString();
}
