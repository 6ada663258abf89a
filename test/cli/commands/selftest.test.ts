import { describe, it, before, after, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { selftestCommand } from '../../../src/cli/commands/selftest.js';
import { captureOutput } from '../../helpers/console-capture.js';

describe('selftest command', { concurrency: false }, () => {
  let tmpDir: string;
  const originalExitCode = process.exitCode;

  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'nlcode-selftest-'));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  afterEach(() => {
    process.exitCode = originalExitCode;
  });

  it('随包用例全部通过且不修改退出码', async () => {
    const { result, output } = await captureOutput(() => selftestCommand(undefined));
    assert.equal(result.failed, 0);
    assert.equal(process.exitCode, originalExitCode);
    assert.ok(output.log[output.log.length - 1]?.includes(`${result.passed} passed, 0 failed`));
  });

  it('有失败用例时输出期望与实际并设置退出码', async () => {
    const file = path.join(tmpDir, 'failing.json');
    fs.writeFileSync(file, JSON.stringify([{ instruction: 'sort list', expected: 'sorted(my_list)' }]));

    const { result, output } = await captureOutput(() => selftestCommand(file));
    assert.equal(result.failed, 1);
    assert.equal(process.exitCode, 1);
    assert.ok(output.error[0]?.includes('sort list'));
    assert.ok(output.log.includes('  expected to contain: "sorted(my_list)"'));
    assert.ok(output.log.includes('  generated:           "my_list.sort()"'));
  });

  it('无效用例文件以诊断错误拒绝', async () => {
    const file = path.join(tmpDir, 'invalid.json');
    fs.writeFileSync(file, JSON.stringify([{ instruction: 1, expected: 'x' }]));

    await assert.rejects(
      () => selftestCommand(file),
      (error: unknown) => error instanceof Error && error.message === 'CLI_DIAGNOSTIC_ERROR'
    );
  });
});
