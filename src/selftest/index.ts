export {
  loadCaseFile,
  validateCaseData,
  isCaseList,
  DEFAULT_CASE_FILE,
  type SelfTestCase,
} from './case-file.js';
export { runSelfTest, type SelfTestOutcome, type SelfTestReport, type TranslateFn } from './harness.js';
