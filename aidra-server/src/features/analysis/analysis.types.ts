import type { AnalysisErrorKind } from '../../common/errors/analysis-errors';
import type { InlineImage } from '../agents/model-client';
import type { EmergencyReport } from '../../shared/types/schemas';

export type PipelineState =
  | 'idle'
  | 'image_analysis'
  | 'safety_analysis'
  | 'contact_lookup'
  | 'response_synthesis'
  | 'complete'
  | 'failed';

export type ActiveStage = Exclude<PipelineState, 'complete' | 'failed'>;

/**
 * The only transitions besides `-> failed`, which any active stage may take.
 */
export const NEXT_STATE: Record<ActiveStage, PipelineState> = {
  idle: 'image_analysis',
  image_analysis: 'safety_analysis',
  safety_analysis: 'contact_lookup',
  contact_lookup: 'response_synthesis',
  response_synthesis: 'complete',
};

export type AnalyzeRequest = {
  image: InlineImage;
  countryCode?: string;
  /** Absent means sessionless: nothing is written to the session store. */
  sessionId?: string;
  requestId?: string;
  signal?: AbortSignal;
};

export type AnalysisFailure = {
  kind: AnalysisErrorKind;
  message: string;
  stage: ActiveStage;
};

export type AnalysisOutcome =
  | { ok: true; report: EmergencyReport; sessionId: string | null }
  | { ok: false; failure: AnalysisFailure };
