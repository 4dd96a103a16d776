import type { AnalysisError } from './analysis-errors';

export type StageFailure = { ok: false; error: AnalysisError };

export type StageResult<T> = { ok: true; value: T } | StageFailure;

export const success = <T>(value: T): StageResult<T> => ({ ok: true, value });

export const failure = (error: AnalysisError): StageFailure => ({
  ok: false,
  error,
});
