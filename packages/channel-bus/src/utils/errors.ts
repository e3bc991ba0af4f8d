/**
 * Error raised for faults that should reach the host instead of a status pair
 */
export type PipelineErrorCode =
  | 'INVALID_CHANNEL'
  | 'ARCHIVE_WRITE_FAILED'
  | 'INFRA_WRITE_FAILED'
  | 'UNKNOWN_NODE_TYPE';

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
