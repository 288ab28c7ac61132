/**
 * @fileoverview docqa command dispatch
 *
 * Commands:
 *   docqa ask "<question>"               - Answer a question with citations
 *   docqa utility <documentId> <action>  - Summarize, translate or checklist a document
 *   docqa eval --queries <file>          - Keyword evaluation over a test query file
 *   docqa help [command]                 - Show help
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { showHelp } from './help.js';
import { askCommand } from './commands/ask.js';
import { utilityCommand } from './commands/utility.js';
import { evalCommand } from './commands/eval.js';
import { createError, formatError, formatErrorJson, getExitCode } from './errors.js';

type Command = 'ask' | 'utility' | 'eval';

const COMMANDS: Record<Command, (args: string[]) => Promise<void>> = {
  ask: askCommand,
  utility: utilityCommand,
  eval: evalCommand,
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

function reportError(error: unknown, json: boolean): number {
  console.error(json ? formatErrorJson(error) : formatError(error));
  return getExitCode(error);
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  const jsonMode = argv.includes('--json');

  // Global pass only locates the command; each command re-parses strictly.
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      workspace: { type: 'string', short: 'w' },
      db: { type: 'string' },
      config: { type: 'string' },
      'target-language': { type: 'string' },
      queries: { type: 'string' },
      output: { type: 'string' },
      history: { type: 'string' },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version === true) {
    const { VERSION } = await import('../index.js');
    console.log(`docqa ${VERSION}`);
    return 0;
  }

  const command = positionals[0];
  if (values.help === true || !command || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : command);
    return 0;
  }

  if (!isCommand(command)) {
    return reportError(createError('UNKNOWN_COMMAND', `Unknown command: ${command}`, { command }), jsonMode);
  }

  const commandIndex = argv.indexOf(command);
  const commandArgs = argv.filter((_, index) => index !== commandIndex);
  try {
    await COMMANDS[command](commandArgs);
    return 0;
  } catch (error) {
    return reportError(error, jsonMode);
  }
}
