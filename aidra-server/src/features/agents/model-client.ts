import {
  AnalysisCancelledError,
  AnalysisError,
  ModelUnavailableError,
} from '../../common/errors/analysis-errors';

export const MODEL_CLIENT = Symbol('MODEL_CLIENT');

export type ModelPurpose =
  | 'image_assessment'
  | 'safety_advice'
  | 'response_synthesis';

export type InlineImage = {
  data: Buffer;
  mimeType: string;
};

export type ModelRequest = {
  purpose: ModelPurpose;
  model: string;
  systemInstruction: string;
  prompt: string;
  image?: InlineImage;
  signal?: AbortSignal;
};

/**
 * Transport to the generative model. Returns the raw response text; parsing
 * and validation belong to the caller.
 */
export interface ModelClient {
  generateJson(request: ModelRequest): Promise<string>;
}

const statusOf = (error: unknown): number | undefined =>
  typeof error === 'object' &&
  error !== null &&
  'status' in error &&
  typeof error.status === 'number'
    ? error.status
    : undefined;

/**
 * Normalises anything a transport throws into the pipeline taxonomy. Rate
 * limits, server errors and network failures stay retryable; other 4xx
 * responses do not.
 */
export const toModelError = (
  error: unknown,
  signal?: AbortSignal,
): AnalysisError => {
  if (error instanceof AnalysisError) return error;
  if (signal?.aborted) {
    return new AnalysisCancelledError(
      'Analysis was cancelled while waiting for the model',
      { cause: error },
    );
  }

  const status = statusOf(error);
  const retryable = status === undefined || status === 429 || status >= 500;
  const detail = error instanceof Error ? error.message : String(error);
  return new ModelUnavailableError(`Model service request failed: ${detail}`, {
    retryable,
    status,
    cause: error,
  });
};
