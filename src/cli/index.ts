#!/usr/bin/env node
/**
 * Assessment recommender command-line interface.
 *
 * Usage: arec <command> [options]
 */

import { VERSION } from '../version.js';
import { errorMessage, RecommenderError } from '../utils/errors.js';
import type { Command } from './types.js';
import { UsageError } from './types.js';
import { buildCommand } from './commands/build.js';
import { searchCommand } from './commands/search.js';
import { recommendCommand } from './commands/recommend.js';
import { evaluateCommand } from './commands/evaluate.js';
import { predictCommand } from './commands/predict.js';
import { statsCommand } from './commands/stats.js';
import { serveCommand } from './commands/serve.js';

export const commands: Command[] = [
  buildCommand,
  searchCommand,
  recommendCommand,
  evaluateCommand,
  predictCommand,
  statsCommand,
  serveCommand,
];

function showHelp(): void {
  console.log('Assessment Recommender');
  console.log('');
  console.log('Usage: arec <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
  console.log('');
  console.log('Run "arec <command> --help" for command-specific help.');
}

/**
 * Dispatch argv (without node and script) to a command.
 *
 * @returns process exit code
 */
export async function run(args: string[]): Promise<number> {
  if (args.includes('--version') || args.includes('-v')) {
    console.log(`arec ${VERSION}`);
    return 0;
  }

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return 0;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "arec --help" for available commands.');
    return 2;
  }

  const rest = args.slice(1);
  if (rest.includes('--help') || rest.includes('-h')) {
    console.log(command.description);
    console.log(`Usage: ${command.usage}`);
    return 0;
  }

  try {
    await command.handler(rest);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.log(`Usage: ${error.usage ?? command.usage}`);
      return 2;
    }
    if (error instanceof RecommenderError) {
      console.error(`Error: ${error.toDetailedString()}`);
    } else {
      console.error(`Error: ${errorMessage(error)}`);
    }
    return 1;
  }
}

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  },
);
