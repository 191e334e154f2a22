export type SirenPipelineErrorCode =
  | "empty_context"
  | "index_unavailable"
  | "malformed_candidate"
  | "memory_sink_unavailable"
  | "memory_buffer_overflow"
  | "invalid_config";

export interface SirenPipelineErrorDetails {
  code: SirenPipelineErrorCode;
  message: string;
  // Bounded details (never full embeddings or context text)
  sessionId?: string;
  stepIndex?: number;
  tokenId?: string;
  count?: number;
  reason?: string;
}

export class SirenPipelineError extends Error {
  public readonly code: SirenPipelineErrorCode;
  public readonly details: SirenPipelineErrorDetails;

  constructor(details: SirenPipelineErrorDetails) {
    super(details.message);
    this.name = "SirenPipelineError";
    this.code = details.code;
    this.details = details;
  }

  toJSON() {
    return {
      error: this.code === "invalid_config" ? "invalid_config" : "pipeline_degraded",
      code: this.code,
      message: this.message,
      details: {
        ...this.details,
        tokenId: this.details.tokenId?.substring(0, 64),
      },
    };
  }
}

export const isSirenPipelineError = (
  error: unknown,
  code?: SirenPipelineErrorCode
): error is SirenPipelineError =>
  error instanceof SirenPipelineError && (code === undefined || error.code === code);
