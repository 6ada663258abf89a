/**
 * @module runtime/python-host
 *
 * 生成代码的执行宿主：每次在独立的 Python 进程中运行片段。
 *
 * **隔离**：
 * - 每次执行都是新进程，命名空间预置 `my_list = []`、`my_string = ""`、`my_dict = {}`
 * - 执行失败以 `ExecutionResult` 返回，不会抛入调用方，更不会触及翻译引擎
 * - stdin 不开放，`input()` 会以 EOFError 失败
 * - stdout 与 stderr 各最多保留 `MAX_OUTPUT_BYTES` 字节，超出部分丢弃并标记 `truncated`
 */

import { spawn } from 'node:child_process';
import { ConfigService } from '../config/config-service.js';
import { createLogger } from '../utils/logger.js';

/** 预置命名空间 */
export const SANDBOX_PRELUDE = ['my_list = []', 'my_string = ""', 'my_dict = {}'].join('\n');

/** 每个输出流保留的最大字节数（1 MiB） */
export const MAX_OUTPUT_BYTES = 1024 * 1024;

export interface ProcessOutcome {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
  /** 任一输出流超过上限、尾部被丢弃 */
  readonly truncated: boolean;
}

/**
 * 进程运行器接口。默认实现基于 `child_process.spawn`，测试中可替换为进程内桩。
 */
export interface ProcessRunner {
  run(command: string, args: readonly string[], timeoutMs: number): Promise<ProcessOutcome>;
}

export type ExecutionResult =
  | { readonly ok: true; readonly stdout: string; readonly truncated: boolean }
  | {
      readonly ok: false;
      readonly reason: 'exit';
      readonly exitCode: number | null;
      readonly stdout: string;
      readonly stderr: string;
      readonly truncated: boolean;
    }
  | {
      readonly ok: false;
      readonly reason: 'timeout';
      readonly timeoutMs: number;
      readonly stdout: string;
      readonly truncated: boolean;
    }
  | { readonly ok: false; readonly reason: 'spawn'; readonly message: string };

export interface ExecuteOptions {
  readonly pythonBin?: string;
  readonly timeoutMs?: number;
  readonly runner?: ProcessRunner;
}

/**
 * 拼接预置命名空间与待执行片段。
 */
export function buildProgram(code: string): string {
  return `${SANDBOX_PRELUDE}\n${code}\n`;
}

/**
 * 有上限的字节缓冲：超过 `limit` 的数据被丢弃，只记录是否发生截断。
 *
 * 按字节累积、结束时一次解码，多字节字符不会在数据块边界被拆坏
 * （只有恰好落在上限处的字符可能不完整）。
 */
export class BoundedOutput {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private dropped = false;

  constructor(private readonly limit: number = MAX_OUTPUT_BYTES) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (chunk.length > room) {
      this.dropped = true;
      if (room <= 0) return;
      chunk = chunk.subarray(0, room);
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  get truncated(): boolean {
    return this.dropped;
  }

  get byteLength(): number {
    return this.size;
  }

  text(): string {
    return Buffer.concat(this.chunks, this.size).toString('utf8');
  }
}

export function createSpawnRunner(maxOutputBytes: number = MAX_OUTPUT_BYTES): ProcessRunner {
  return {
    run(command, args, timeoutMs) {
      return new Promise<ProcessOutcome>((resolve, reject) => {
        const proc = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
        const stdout = new BoundedOutput(maxOutputBytes);
        const stderr = new BoundedOutput(maxOutputBytes);
        let timedOut = false;
        const timer = setTimeout(() => {
          timedOut = true;
          proc.kill('SIGKILL');
        }, timeoutMs);

        proc.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
        proc.on('error', err => {
          clearTimeout(timer);
          reject(err);
        });
        proc.on('close', code => {
          clearTimeout(timer);
          resolve({
            exitCode: code,
            stdout: stdout.text(),
            stderr: stderr.text(),
            timedOut,
            truncated: stdout.truncated || stderr.truncated,
          });
        });
      });
    },
  };
}

export const spawnRunner: ProcessRunner = createSpawnRunner();

/**
 * 在独立 Python 进程中执行生成的片段。
 */
export async function executeSnippet(code: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
  const config = ConfigService.getInstance();
  const pythonBin = options.pythonBin ?? config.pythonBin;
  const timeoutMs = options.timeoutMs ?? config.execTimeoutMs;
  const runner = options.runner ?? spawnRunner;
  const logger = createLogger('python-host');

  let outcome: ProcessOutcome;
  try {
    outcome = await runner.run(pythonBin, ['-c', buildProgram(code)], timeoutMs);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn('failed to start interpreter', { pythonBin, message });
    return { ok: false, reason: 'spawn', message };
  }

  if (outcome.timedOut) {
    logger.warn('execution timed out', { timeoutMs });
    return { ok: false, reason: 'timeout', timeoutMs, stdout: outcome.stdout, truncated: outcome.truncated };
  }
  if (outcome.exitCode !== 0) {
    logger.debug('execution failed', { exitCode: outcome.exitCode });
    return {
      ok: false,
      reason: 'exit',
      exitCode: outcome.exitCode,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
      truncated: outcome.truncated,
    };
  }
  return { ok: true, stdout: outcome.stdout, truncated: outcome.truncated };
}

/**
 * 取 Python 回溯的最后一行（如 `NameError: name 'x' is not defined`）。
 */
export function lastErrorLine(stderr: string): string {
  const lines = stderr.split(/\r?\n/).filter(line => line.trim() !== '');
  return lines[lines.length - 1] ?? '';
}
