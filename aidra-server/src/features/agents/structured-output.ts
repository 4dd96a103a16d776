import { z } from 'zod';

import { SchemaValidationError } from '../../common/errors/analysis-errors';
import {
  failure,
  StageResult,
  success,
} from '../../common/errors/stage-result';

const FENCED = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map(
    (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
  );

/**
 * JSON mode is best effort, so a response wrapped in a markdown fence is
 * unwrapped before parsing. Anything else that is not JSON fails.
 */
export const parseStructured = <T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string,
): StageResult<T> => {
  const text = raw.trim();
  if (text.length === 0) {
    return failure(
      new SchemaValidationError(`${label} returned an empty response`),
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(FENCED.exec(text)?.[1] ?? text);
  } catch {
    return failure(
      new SchemaValidationError(`${label} returned unparsable JSON`),
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return failure(
      new SchemaValidationError(
        `${label} output failed validation`,
        formatIssues(parsed.error),
      ),
    );
  }
  return success(parsed.data);
};
