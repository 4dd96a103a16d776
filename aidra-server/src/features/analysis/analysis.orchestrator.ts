import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  AnalysisCancelledError,
  AnalysisError,
} from '../../common/errors/analysis-errors';
import { StageResult, success } from '../../common/errors/stage-result';
import { aidraConfig, AidraConfig } from '../../config/aidra.config';
import type { EmergencyReport } from '../../shared/types/schemas';
import { ImageUnderstandingAgent } from '../agents/image-understanding.agent';
import { ResponseSynthesisAgent } from '../agents/response-synthesis.agent';
import { SafetyMeasuresAgent } from '../agents/safety-measures.agent';
import { ContactsService } from '../contacts/contacts.service';
import { SessionsService } from '../sessions/sessions.service';
import {
  ActiveStage,
  AnalysisOutcome,
  AnalyzeRequest,
  NEXT_STATE,
  PipelineState,
} from './analysis.types';

export const DEFAULT_COUNTRY_CODE = 'IN';

class StageFailed extends Error {
  constructor(
    readonly stage: ActiveStage,
    readonly error: AnalysisError,
  ) {
    super(error.message);
  }
}

/**
 * Tracks one request through the pipeline and emits one log event per
 * transition.
 */
class PipelineRun {
  state: PipelineState = 'idle';
  private readonly startedAt = Date.now();

  constructor(
    private readonly logger: Logger,
    readonly requestId: string | undefined,
    readonly signal: AbortSignal,
  ) {}

  async stage<T>(
    stage: Exclude<ActiveStage, 'idle'>,
    run: () => Promise<StageResult<T>> | StageResult<T>,
  ): Promise<T> {
    this.advanceTo(stage);
    this.throwIfCancelled();

    const stageStartedAt = Date.now();
    const result = await run();
    if (!result.ok) throw new StageFailed(stage, result.error);

    this.logger.log({
      event: 'stage_succeeded',
      stage,
      request_id: this.requestId,
      duration_ms: Date.now() - stageStartedAt,
    });
    return result.value;
  }

  throwIfCancelled(): void {
    if (this.state === 'complete' || this.state === 'failed') return;
    if (this.signal.aborted) {
      throw new StageFailed(
        this.state,
        new AnalysisCancelledError(`Analysis cancelled during ${this.state}`, {
          cause: this.signal.reason,
        }),
      );
    }
  }

  complete(): void {
    this.advanceTo('complete');
  }

  fail(failed: StageFailed): void {
    this.state = 'failed';
    this.logger.warn({
      event: 'stage_failed',
      stage: failed.stage,
      request_id: this.requestId,
      error_kind: failed.error.kind,
      message: failed.error.message,
    });
  }

  get elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  private advanceTo(next: PipelineState): void {
    if (
      this.state === 'complete' ||
      this.state === 'failed' ||
      NEXT_STATE[this.state] !== next
    ) {
      throw new Error(`Illegal pipeline transition ${this.state} -> ${next}`);
    }
    this.state = next;
    if (next !== 'complete') {
      this.logger.log({
        event: 'stage_entered',
        stage: next,
        request_id: this.requestId,
      });
    }
  }
}

/**
 * Runs image analysis, safety advice, contact lookup and response synthesis
 * strictly in order. Any stage failure ends the run with a tagged failure;
 * the session store is written once, and only after a complete report.
 */
@Injectable()
export class AnalysisOrchestrator {
  private readonly logger = new Logger(AnalysisOrchestrator.name);

  constructor(
    private readonly imageAgent: ImageUnderstandingAgent,
    private readonly safetyAgent: SafetyMeasuresAgent,
    private readonly contacts: ContactsService,
    private readonly responseAgent: ResponseSynthesisAgent,
    private readonly sessions: SessionsService,
    @Inject(aidraConfig.KEY) private readonly config: AidraConfig,
  ) {}

  async analyze(request: AnalyzeRequest): Promise<AnalysisOutcome> {
    const timeout = AbortSignal.timeout(this.config.analysisTimeoutMs);
    const signal = request.signal
      ? AbortSignal.any([request.signal, timeout])
      : timeout;
    const countryCode = request.countryCode?.trim() || DEFAULT_COUNTRY_CODE;
    const sessionId = request.sessionId ?? null;
    const run = new PipelineRun(this.logger, request.requestId, signal);

    try {
      const assessment = await run.stage('image_analysis', () =>
        this.imageAgent.run(request.image, signal),
      );

      const advice = await run.stage('safety_analysis', () =>
        this.safetyAgent.run(
          {
            disaster_type: assessment.disaster_type,
            hazards: assessment.hazards,
            severity_score: assessment.severity_score,
            detailed_analysis: assessment.detailed_analysis,
          },
          signal,
        ),
      );

      const directory = await run.stage('contact_lookup', () =>
        success(this.contacts.lookup(assessment.disaster_type, countryCode)),
      );

      const report = await run.stage('response_synthesis', () =>
        this.responseAgent.run(
          {
            assessment,
            advice,
            contacts: directory.records,
            countryCode: directory.country_code,
          },
          signal,
        ),
      );

      // A cancellation after the last model call still discards the result.
      run.throwIfCancelled();

      if (sessionId) await this.record(run, sessionId, report);
      run.complete();

      this.logger.log({
        event: 'analysis_completed',
        request_id: request.requestId,
        session_id: sessionId,
        disaster_type: report.disaster_type,
        risk_level: report.risk_level,
        contacts_match: directory.match,
        latency_ms: run.elapsedMs,
      });
      return { ok: true, report, sessionId };
    } catch (thrown) {
      if (!(thrown instanceof StageFailed)) throw thrown;

      run.fail(thrown);
      this.logger.warn({
        event: 'analysis_failed',
        request_id: request.requestId,
        stage: thrown.stage,
        error_kind: thrown.error.kind,
        latency_ms: run.elapsedMs,
      });
      return {
        ok: false,
        failure: {
          kind: thrown.error.kind,
          message: thrown.error.message,
          stage: thrown.stage,
        },
      };
    }
  }

  // A cancellation seen under the session lock fails the last stage.
  private async record(
    run: PipelineRun,
    sessionId: string,
    report: EmergencyReport,
  ): Promise<void> {
    try {
      await this.sessions.recordAnalysis(sessionId, report, {
        signal: run.signal,
      });
    } catch (error) {
      if (error instanceof AnalysisCancelledError) {
        throw new StageFailed('response_synthesis', error);
      }
      throw error;
    }
  }
}
