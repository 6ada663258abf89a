/**
 * 自测用例文件加载器
 *
 * 负责读取、解析并按 JSON Schema 校验用例文件（selftest/cases.json 格式）
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import AjvModule, { type ErrorObject, type SchemaObject } from 'ajv';
import { Diagnostics, type Diagnostic } from '../diagnostics/diagnostics.js';

export interface SelfTestCase {
  readonly instruction: string;
  readonly expected: string;
}

/**
 * 向上查找包含 selftest/ 目录的项目根目录。
 *
 * 源码（src/selftest）与编译产物（dist/src/selftest）所处层级不同，因此逐级查找。
 */
function findAssetDir(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'selftest');
    if (existsSync(join(candidate, 'case-file.schema.json'))) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error('Cannot locate the selftest/ asset directory');
    }
    dir = parent;
  }
}

const assetDir = findAssetDir();

/** 随包附带的默认用例文件 */
export const DEFAULT_CASE_FILE = join(assetDir, 'cases.json');

const schema: SchemaObject = JSON.parse(readFileSync(join(assetDir, 'case-file.schema.json'), 'utf-8'));
const Ajv = AjvModule.default;
const ajv = new Ajv({ strict: true, allErrors: true });
const validateCases = ajv.compile<SelfTestCase[]>(schema);

/**
 * 校验已解析的用例数据。
 *
 * @returns 校验通过的用例，或诊断错误数组
 */
export function validateCaseData(data: unknown): SelfTestCase[] | Diagnostic[] {
  if (validateCases(data)) {
    return data;
  }
  return (validateCases.errors ?? []).map(mapAjvError);
}

/**
 * 读取并校验用例文件
 *
 * @param filePath 用例文件路径，缺省为随包附带的 selftest/cases.json
 * @returns 用例数组，或诊断错误数组
 */
export function loadCaseFile(filePath: string = DEFAULT_CASE_FILE): SelfTestCase[] | Diagnostic[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (isErrno(err) && err.code === 'ENOENT') {
      return [Diagnostics.caseFileNotFound(filePath).build()];
    }
    const reason = err instanceof Error ? err.message : String(err);
    return [Diagnostics.caseFileParseError(filePath, reason).build()];
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    return [Diagnostics.caseFileParseError(filePath, reason).build()];
  }

  return validateCaseData(data);
}

/**
 * 区分加载结果：用例数组非空时第一项带 instruction 字段
 */
export function isCaseList(result: SelfTestCase[] | Diagnostic[]): result is SelfTestCase[] {
  return result.every(item => 'instruction' in item);
}

function mapAjvError(error: ErrorObject): Diagnostic {
  const path = error.instancePath || '/';
  return Diagnostics.caseFileInvalid(path, error.message ?? error.keyword).build();
}

function isErrno(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
