// ═══════════════════════════════════════════════════════════════
//  Error types
// ═══════════════════════════════════════════════════════════════

/** A simulation input violates its constraint.  Caller error, not retried. */
export class InvalidParameterError extends Error {
  readonly parameter: string;
  readonly value: number;

  constructor(parameter: string, value: number, constraint: string) {
    super(`Invalid parameter ${parameter}: ${value} (${constraint})`);
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
    this.value = value;
  }
}

/** No video backend is installed.  Callers recover by skipping the video. */
export class EncodingUnavailableError extends Error {
  constructor(message = 'No video encoding backend available (ffmpeg not found on PATH)') {
    super(message);
    this.name = 'EncodingUnavailableError';
  }
}

/** The encoder ran but failed. */
export class VideoEncodingError extends Error {
  readonly exitCode: number | null;

  constructor(exitCode: number | null, detail: string) {
    super(`Video encoding failed (exit code ${exitCode ?? 'unknown'}): ${detail}`);
    this.name = 'VideoEncodingError';
    this.exitCode = exitCode;
  }
}

/** Task configuration did not validate. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid task configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
