/**
 * Hash-Password Command
 * 
 * Generate the bcrypt hash the storage service checks protected-content
 * credentials against.
 */

import bcrypt from 'bcryptjs';
import chalk from 'chalk';
import { promptHidden } from '../lib/prompt.js';
import { printError, printHeader, printInfo } from '../lib/output.js';

export const BCRYPT_ROUNDS = 10;

interface HashPasswordOptions {
  username: string;
}

export async function hashPasswordCommand(options: HashPasswordOptions): Promise<void> {
  printHeader('Protected content password');

  const password = await promptHidden('Password: ');
  if (!password) {
    printError('Password must not be empty');
    process.exit(1);
  }

  const repeated = await promptHidden('Repeat password: ');
  if (password !== repeated) {
    printError('Passwords do not match');
    process.exit(1);
  }

  const hash = await bcrypt.hash(password, BCRYPT_ROUNDS);

  printInfo('Add these lines to the storage service environment:');
  console.log();
  console.log(chalk.cyan(`PROTECTED_CONTENT_USERNAME=${options.username}`));
  console.log(chalk.cyan(`PROTECTED_CONTENT_PASSWORD_HASH=${hash}`));
  console.log();
}
