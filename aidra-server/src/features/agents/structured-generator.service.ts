import { Inject, Injectable, Logger } from '@nestjs/common';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';

import { Semaphore } from '../../common/concurrency/semaphore';
import {
  AnalysisCancelledError,
  ModelUnavailableError,
  SchemaValidationError,
} from '../../common/errors/analysis-errors';
import { failure, StageResult } from '../../common/errors/stage-result';
import { aidraConfig, AidraConfig } from '../../config/aidra.config';
import {
  MODEL_CLIENT,
  ModelClient,
  ModelRequest,
  toModelError,
} from './model-client';
import { parseStructured } from './structured-output';

/**
 * Every model call goes through here: one shared concurrency cap, one
 * validation gate and one bounded retry policy.
 *
 * - SchemaValidationError: retried up to `schemaRetries` times, immediately.
 * - ModelUnavailableError: retried up to `unavailableRetries` times with
 *   exponential backoff, if the error is retryable.
 * - Anything else (cancellation included) is returned as is.
 */
@Injectable()
export class StructuredGenerator {
  private readonly logger = new Logger(StructuredGenerator.name);
  private readonly permits: Semaphore;

  constructor(
    @Inject(MODEL_CLIENT) private readonly client: ModelClient,
    @Inject(aidraConfig.KEY) private readonly config: AidraConfig,
  ) {
    this.permits = new Semaphore(config.model.maxConcurrency);
  }

  async generate<T>(
    request: ModelRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<StageResult<T>> {
    const { schemaRetries, unavailableRetries, retryBackoffMs } =
      this.config.model;
    let schemaFailures = 0;
    let unavailableFailures = 0;

    for (;;) {
      const result = await this.attempt(request, schema);
      if (result.ok) return result;

      const { error } = result;
      if (
        error instanceof SchemaValidationError &&
        schemaFailures < schemaRetries
      ) {
        schemaFailures += 1;
        this.logger.warn(
          `${request.purpose}: invalid model output, retrying ` +
            `(${schemaFailures}/${schemaRetries}): ${error.message}`,
        );
        continue;
      }

      if (
        error instanceof ModelUnavailableError &&
        error.retryable &&
        unavailableFailures < unavailableRetries
      ) {
        const delay = retryBackoffMs * 2 ** unavailableFailures;
        unavailableFailures += 1;
        this.logger.warn(
          `${request.purpose}: model unavailable, retrying in ${delay}ms ` +
            `(${unavailableFailures}/${unavailableRetries}): ${error.message}`,
        );
        try {
          await sleep(delay, undefined, { signal: request.signal });
        } catch (cause) {
          return failure(
            new AnalysisCancelledError(
              'Analysis was cancelled during retry backoff',
              { cause },
            ),
          );
        }
        continue;
      }

      return result;
    }
  }

  private async attempt<T>(
    request: ModelRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<StageResult<T>> {
    let raw: string;
    try {
      raw = await this.permits.use(
        () => this.client.generateJson(request),
        request.signal,
      );
    } catch (error) {
      return failure(toModelError(error, request.signal));
    }
    return parseStructured(raw, schema, request.purpose);
  }
}
