#!/usr/bin/env node
import { cac } from 'cac';
import { translateCommand } from '../src/cli/commands/translate.js';
import { rulesCommand } from '../src/cli/commands/rules.js';
import { selftestCommand } from '../src/cli/commands/selftest.js';
import { runCommand, type RunOptions } from '../src/cli/commands/run.js';
import { replCommand } from '../src/cli/commands/repl.js';
import { handleError } from '../src/cli/utils/error-handler.js';

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<unknown> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

async function main(): Promise<void> {
  const cli = cac('nlcode');

  cli
    .command('translate <...instruction>', 'Translate an instruction into Python code')
    .option('--json', 'Print the structured result as JSON', { default: false })
    .action(
      wrapAction(async (words: string[], options: { json?: boolean }) => {
        await translateCommand(words, { json: Boolean(options.json) });
      })
    );

  cli
    .command('rules', 'List the supported instruction templates')
    .option('--json', 'Print the catalog as JSON', { default: false })
    .action(
      wrapAction(async (options: { json?: boolean }) => {
        await rulesCommand({ json: Boolean(options.json) });
      })
    );

  cli
    .command('selftest [file]', 'Run the self-test cases (default: bundled selftest/cases.json)')
    .option('--verbose', 'Also print the generated code of passing cases', { default: false })
    .action(
      wrapAction(async (file: string | undefined, options: { verbose?: boolean }) => {
        await selftestCommand(file, { verbose: Boolean(options.verbose) });
      })
    );

  cli
    .command('run <...instruction>', 'Translate an instruction and execute the generated code')
    .option('--python <bin>', 'Python interpreter (default: $NLCODE_PYTHON or python3)')
    .option('--timeout <ms>', 'Execution timeout in milliseconds')
    .action(
      wrapAction(async (words: string[], options: Record<string, unknown>) => {
        const runOptions: RunOptions = {};
        if (typeof options.python === 'string') {
          runOptions.python = options.python;
        }
        if (typeof options.timeout === 'number' && options.timeout > 0) {
          runOptions.timeout = options.timeout;
        }
        await runCommand(words, runOptions);
      })
    );

  cli
    .command('repl', 'Start an interactive session')
    .option('--exec', 'Execute each generated snippet', { default: false })
    .option('--python <bin>', 'Python interpreter (default: $NLCODE_PYTHON or python3)')
    .action(
      wrapAction(async (options: Record<string, unknown>) => {
        await replCommand({
          exec: Boolean(options.exec),
          python: typeof options.python === 'string' ? options.python : undefined,
        });
      })
    );

  cli.help();
  cli.parse(process.argv, { run: false });
  if (!cli.matchedCommand && !cli.options.help) {
    cli.outputHelp();
    return;
  }
  await cli.runMatchedCommand();
}

main().catch(handleError);
