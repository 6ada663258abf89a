import { isCaseList, loadCaseFile } from '../../selftest/case-file.js';
import { runSelfTest, type SelfTestReport } from '../../selftest/harness.js';
import { createDiagnosticsError } from '../utils/error-handler.js';
import { divider, error, info, success } from '../utils/logger.js';

export interface SelfTestOptions {
  verbose?: boolean;
}

/**
 * 运行自测用例文件（缺省为随包附带的 selftest/cases.json）。
 *
 * 有失败用例时把 process.exitCode 设为 1。
 */
export async function selftestCommand(file: string | undefined, options: SelfTestOptions = {}): Promise<SelfTestReport> {
  const loaded = loadCaseFile(file);
  if (!isCaseList(loaded)) {
    throw createDiagnosticsError(loaded);
  }

  const report = runSelfTest(loaded);
  for (const outcome of report.outcomes) {
    if (outcome.passed) {
      success(outcome.instruction);
      if (options.verbose) {
        console.log(outcome.actual);
      }
      continue;
    }
    error(outcome.instruction);
    console.log(`  expected to contain: ${JSON.stringify(outcome.expected)}`);
    console.log(`  generated:           ${JSON.stringify(outcome.actual)}`);
  }

  divider();
  info(`${report.passed} passed, ${report.failed} failed`);
  if (report.failed > 0) {
    process.exitCode = 1;
  }
  return report;
}
