import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticCode, DiagnosticError, SynthesisError } from '../../diagnostics/diagnostics.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'synthesis' | 'case-file' | 'rules' | 'unknown';

interface DiagnosticCarrier extends Error {
  diagnostics?: Diagnostic[];
}

function isDiagnosticArray(value: unknown): value is Diagnostic[] {
  return (
    Array.isArray(value) &&
    value.every(item => typeof item === 'object' && item !== null && 'code' in item && typeof item.code === 'string')
  );
}

function isDiagnosticCarrier(error: unknown): error is DiagnosticCarrier {
  return error instanceof Error && 'diagnostics' in error && isDiagnosticArray(error.diagnostics);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(code: DiagnosticCode): CliErrorCategory {
  if (code.startsWith('N0')) return 'synthesis';
  if (code.startsWith('N1')) return 'case-file';
  if (code.startsWith('N2')) return 'rules';
  return 'unknown';
}

function hintFor(code: DiagnosticCode): string | null {
  if (code === DiagnosticCode.N003_InvalidVariable) {
    return 'Variable names start with a letter or underscore and are not Python keywords';
  }
  switch (classify(code)) {
    case 'synthesis':
      return "Dictionary entries are written as key:value, separated by commas";
    case 'case-file':
      return 'A case file is a JSON array of { "instruction", "expected" } objects';
    default:
      return null;
  }
}

function printDiagnostics(diags: Diagnostic[]): void {
  for (const diag of diags) {
    logError(`[${diag.code}] ${diag.message}`);
    const hint = hintFor(diag.code);
    if (hint) {
      logWarn(hint);
    }
  }
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`Permission denied: ${error.message}`);
      break;
    case 'ENOENT':
      logError(`File not found: ${error.message}`);
      break;
    default:
      logError(`File system error (${code}): ${error.message}`);
      break;
  }
}

export function createDiagnosticsError(diagnostics: Diagnostic[]): Error {
  const error: DiagnosticCarrier = new Error('CLI_DIAGNOSTIC_ERROR');
  error.diagnostics = diagnostics;
  return error;
}

export function handleError(error: unknown): void {
  if (error instanceof SynthesisError) {
    logError(`Rule '${error.ruleId}' matched but could not render the instruction`);
    printDiagnostics([error.diagnostic]);
    process.exit(1);
  }

  if (error instanceof DiagnosticError) {
    printDiagnostics([error.diagnostic]);
    process.exit(1);
  }

  if (isDiagnosticCarrier(error)) {
    printDiagnostics(error.diagnostics ?? []);
    process.exit(1);
  }

  if (isDiagnosticArray(error)) {
    printDiagnostics(error);
    process.exit(1);
  }

  if (isNodeError(error)) {
    handleNodeError(error);
    process.exit(1);
  }

  if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('An unknown error occurred');
  }

  process.exit(1);
}
