import chalk from 'chalk';

/**
 * Output utilities for consistent CLI formatting
 */

export function info(message: string): void {
  console.log(chalk.cyan(message));
}

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function warn(message: string): void {
  console.log(chalk.yellow(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function dim(message: string): void {
  console.log(chalk.dim(message));
}

export function bold(message: string): void {
  console.log(chalk.bold(message));
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(title));
  console.log(chalk.dim('='.repeat(title.length)));
}

/**
 * Print a key-value pair
 */
export function keyValue(key: string, value: string): void {
  console.log(`${chalk.dim(key + ':')} ${value}`);
}

/**
 * Print a blank line
 */
export function blank(): void {
  console.log('');
}

/**
 * Mask a password string: show first 2 chars + asterisks
 */
export function maskPassword(password: string | undefined): string {
  if (!password) return '(empty)';
  if (password.length <= 2) return '*'.repeat(password.length);
  return password.slice(0, 2) + '*'.repeat(Math.min(password.length - 2, 8));
}

/**
 * Echo a SQL statement before it is sent
 */
export function sql(statement: string): void {
  console.log(chalk.dim(`SQL> ${statement}`));
}

/**
 * Print multi-line text in the given tone
 */
export function block(text: string, tone: 'plain' | 'success' | 'warn' | 'error' = 'plain'): void {
  const paint = {
    plain: (line: string) => line,
    success: chalk.green,
    warn: chalk.yellow,
    error: chalk.red,
  }[tone];
  for (const line of text.split('\n')) {
    console.log(paint(line));
  }
}
