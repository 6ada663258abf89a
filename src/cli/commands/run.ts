import { translateDetailed } from '../../engine/translator.js';
import {
  executeSnippet,
  lastErrorLine,
  MAX_OUTPUT_BYTES,
  type ExecutionResult,
  type ProcessRunner,
} from '../../runtime/python-host.js';
import { code, divider, error, raw, success, warn } from '../utils/logger.js';

export interface RunOptions {
  python?: string;
  timeout?: number;
  runner?: ProcessRunner;
}

/**
 * 翻译并执行指令。只有命中规则的结果才会被执行。
 *
 * @returns 执行结果；未生成代码时返回 null
 */
export async function runCommand(words: readonly string[], options: RunOptions = {}): Promise<ExecutionResult | null> {
  const result = translateDetailed(words.join(' '));
  code(result.code);
  if (result.kind !== 'code') {
    warn('Nothing to run');
    return null;
  }

  divider();
  const execution = await executeSnippet(result.code, {
    pythonBin: options.python,
    timeoutMs: options.timeout,
    runner: options.runner,
  });
  reportExecution(execution);
  if (!execution.ok) {
    process.exitCode = 1;
  }
  return execution;
}

/**
 * 输出执行结果：标准输出原样打印，失败时给出原因。
 */
export function reportExecution(execution: ExecutionResult): void {
  if (execution.ok) {
    printOutput(execution.stdout, execution.truncated);
    success('Code executed successfully');
    return;
  }
  switch (execution.reason) {
    case 'exit':
      printOutput(execution.stdout, execution.truncated);
      error(`Error: ${lastErrorLine(execution.stderr) || `exit code ${String(execution.exitCode)}`}`);
      warn('Make sure to create variables before using them');
      return;
    case 'timeout':
      printOutput(execution.stdout, execution.truncated);
      error(`Execution timed out after ${execution.timeoutMs} ms`);
      return;
    case 'spawn':
      error(`Cannot start the Python interpreter: ${execution.message}`);
      return;
  }
}

function printOutput(stdout: string, truncated: boolean): void {
  raw(stdout);
  if (truncated) {
    warn(`Output truncated to the first ${MAX_OUTPUT_BYTES} bytes`);
  }
}
