export type PipelineErrorCode =
  | "MISSING_FILE"
  | "INVALID_INPUT"
  | "TOO_LARGE"
  | "ENCODING_FAILURE"
  | "INTERNAL";

export const PIPELINE_ERROR_STATUS: Record<PipelineErrorCode, number> = {
  MISSING_FILE: 400,
  INVALID_INPUT: 400,
  TOO_LARGE: 413,
  ENCODING_FAILURE: 500,
  INTERNAL: 500,
};

/**
 * Failure that escapes the analysis pipeline to a transport. `message` is
 * internal detail for logs; transports show the localised text for `code`.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }

  get httpStatus(): number {
    return PIPELINE_ERROR_STATUS[this.code];
  }
}

export const isPipelineError = (error: unknown): error is PipelineError => {
  return error instanceof PipelineError;
};

export const isClientError = (code: PipelineErrorCode): boolean => {
  return PIPELINE_ERROR_STATUS[code] < 500;
};
