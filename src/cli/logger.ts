/**
 * CLI output helpers with colors and formatting.
 */

import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import type { ProjectedResult } from '../types/models.js';
import type { Row } from '../types/utils.js';

/**
 * Print sqlcase banner.
 */
export function printBanner(): void {
  console.log(`
  ${chalk.cyan.bold('sqlcase')}
  ${chalk.gray('schema-driven use cases for your database')}
  `);
}

/**
 * Success message.
 */
export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

/**
 * Error message.
 */
export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

/**
 * Warning message.
 */
export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

/**
 * Info message.
 */
export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

/**
 * Create a spinner.
 */
export function spinner(text: string): ReturnType<typeof ora> {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
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

/**
 * Print a section header.
 */
export function section(title: string): void {
  console.log('');
  console.log(chalk.cyan.bold(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

/**
 * Print empty line.
 */
export function newline(): void {
  console.log('');
}

/**
 * Cell text for a driver value.
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Buffer.isBuffer(value)) {
    return `<${value.length} bytes>`;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Render rows as a table. Columns follow the first row.
 */
export function renderTable(rows: Row[]): string {
  const head = rows.length > 0 ? Object.keys(rows[0]) : [];
  const table = new Table({ head: head.map((column) => chalk.bold(column)) });
  for (const row of rows) {
    table.push(head.map((column) => formatCell(row[column])));
  }
  return table.toString();
}

/**
 * Print rows as a table.
 */
export function table(rows: Row[]): void {
  console.log(renderTable(rows));
}

/**
 * Print an execution envelope.
 */
export function printResult(result: ProjectedResult): void {
  if (result.useCase) {
    info(`${result.useCase.category}: ${result.useCase.description}`);
  }
  code(result.statementExecuted, 'sql');

  const bound = Object.entries(result.boundInputColumns);
  if (bound.length > 0) {
    info(`Bound: ${bound.map(([name, value]) => `${name}=${formatCell(value)}`).join(', ')}`);
  }

  const { outcome } = result;
  switch (outcome.type) {
    case 'rows':
      table(outcome.rows);
      success(result.message);
      break;
    case 'empty':
      warn(result.message);
      break;
    case 'affected':
      if (outcome.returning) {
        table(outcome.returning);
      }
      success(`${result.message} (${outcome.count} row(s) affected)`);
      break;
    case 'failure':
      error(`[${outcome.kind}] ${result.message}`, outcome.suggestedFix && `Try: ${outcome.suggestedFix}`);
      break;
  }
}
