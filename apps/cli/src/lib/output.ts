/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * One status row: `[OK]`/`[ERR]`, a padded label and a dimmed detail
 */
export function printStatus(ok: boolean, label: string, detail = ''): void {
  const icon = ok ? chalk.green('[OK] ') : chalk.red('[ERR]');
  console.log(`  ${icon} ${label.padEnd(8)} ${chalk.gray(detail)}`);
}

/**
 * Bulleted path list, truncated after `limit` entries
 */
export function printPathList(paths: string[], limit = Infinity): void {
  for (const path of paths.slice(0, limit)) {
    console.log(`  ${chalk.red('-')} ${path}`);
  }
  if (paths.length > limit) {
    console.log(chalk.gray(`  ... and ${paths.length - limit} more`));
  }
}
