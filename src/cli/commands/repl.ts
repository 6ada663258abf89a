import readline from 'node:readline';
import { translateDetailed } from '../../engine/translator.js';
import { DiagnosticError, formatDiagnostic } from '../../diagnostics/diagnostics.js';
import { executeSnippet, type ProcessRunner } from '../../runtime/python-host.js';
import { code, divider, error } from '../utils/logger.js';
import { reportExecution } from './run.js';

const BANNER = `nlcode REPL
Type an instruction such as "print numbers from 1 to 5", or "help" for the command list.
Type "exit" to quit.`;

const EXIT_WORDS = new Set(['exit', 'quit', 'q']);

export interface ReplOptions {
  exec?: boolean;
  python?: string;
  runner?: ProcessRunner;
}

/**
 * 处理 REPL 中的一行输入。
 *
 * 每次执行都使用全新的 Python 进程，上一条指令创建的变量不会保留。
 *
 * @returns 'exit' 表示结束会话
 */
export async function handleReplLine(line: string, options: ReplOptions = {}): Promise<'exit' | 'continue'> {
  const trimmed = line.trim();
  if (EXIT_WORDS.has(trimmed.toLowerCase())) {
    return 'exit';
  }
  if (trimmed === '') {
    return 'continue';
  }

  let generated: string;
  let runnable: boolean;
  try {
    const result = translateDetailed(trimmed);
    generated = result.code;
    runnable = result.kind === 'code';
  } catch (e: unknown) {
    if (!(e instanceof DiagnosticError)) throw e;
    error(formatDiagnostic(e.diagnostic, trimmed.toLowerCase()));
    return 'continue';
  }

  divider();
  code(generated);
  divider();

  if (options.exec && runnable) {
    reportExecution(await executeSnippet(generated, { pythonBin: options.python, runner: options.runner }));
  }
  return 'continue';
}

export async function replCommand(options: ReplOptions = {}): Promise<void> {
  console.log(BANNER);
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
  });

  rl.prompt();
  for await (const line of rl) {
    if ((await handleReplLine(line, options)) === 'exit') {
      console.log('Goodbye!');
      break;
    }
    rl.prompt();
  }
  rl.close();
}
