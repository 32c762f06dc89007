// packages/core/src/errors.ts
import type { RawFinding, Severity } from './index.js';

/**
 * Artifact-local failure kinds. None of them aborts a scan: each one becomes
 * exactly one finding on the artifact that raised it.
 */
export const SCAN_ERROR_KINDS = [
  'TruncatedStream',
  'UnknownOpcode',
  'ProtocolMismatch',
  'StreamTooLarge',
  'StackUnderflow',
  'NoPickleStreamFound',
  'ContainerCorrupt',
  'ScanTimeout',
] as const;
export type ScanErrorKind = (typeof SCAN_ERROR_KINDS)[number];

export class ScanError extends Error {
  readonly kind: ScanErrorKind;
  readonly offset?: number;

  constructor(kind: ScanErrorKind, message: string, options?: { offset?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ScanError';
    this.kind = kind;
    this.offset = options?.offset;
  }
}

export function isScanError(value: unknown): value is ScanError {
  return value instanceof ScanError;
}

export function scanErrorRuleId(kind: ScanErrorKind): string {
  switch (kind) {
    case 'ContainerCorrupt':
      return 'CONTAINER_CORRUPT';
    case 'NoPickleStreamFound':
      return 'NO_PICKLE_STREAM';
    case 'ScanTimeout':
      return 'SCAN_TIMEOUT';
    default:
      return 'PARSE_ERROR';
  }
}

export function scanErrorSeverity(kind: ScanErrorKind): Severity {
  return kind === 'NoPickleStreamFound' ? 'info' : 'warn';
}

const TITLES: Record<ScanErrorKind, string> = {
  TruncatedStream: 'Pickle stream is truncated',
  UnknownOpcode: 'Pickle stream contains an unknown opcode',
  ProtocolMismatch: 'Pickle stream has an invalid protocol marker',
  StreamTooLarge: 'Pickle stream exceeds the configured size limits',
  StackUnderflow: 'Pickle stream pops from an empty stack',
  NoPickleStreamFound: 'No pickle stream found in container',
  ContainerCorrupt: 'Model container is malformed',
  ScanTimeout: 'Artifact scan timed out',
};

/**
 * Converts an artifact-local error into its single finding.
 */
export function scanErrorToRawFinding(
  error: ScanError,
  args: { artifactPath: string; engineId: string; entry?: string }
): RawFinding {
  const locator: RawFinding['locator'] =
    error.offset !== undefined
      ? { kind: 'byte', offset: error.offset, ...(args.entry ? { entry: args.entry } : {}) }
      : { kind: 'artifact' };

  return {
    ruleId: scanErrorRuleId(error.kind),
    title: TITLES[error.kind],
    severity: scanErrorSeverity(error.kind),
    category: error.kind === 'ScanTimeout' ? 'scan' : 'integrity',
    engineId: args.engineId,
    artifactPath: args.artifactPath,
    locator,
    rationale:
      error.kind === 'NoPickleStreamFound'
        ? 'The container holds no embedded object-reconstruction stream, so nothing in it was classified.'
        : 'The artifact could not be fully classified; treat it as unverified until it is inspected by hand.',
    remediation: 'Re-export the artifact from a trusted source, or prefer a code-free format such as safetensors.',
    evidence: args.entry ? `${args.entry}: ${error.message}` : error.message,
    errorKind: error.kind,
  };
}
