import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  EmergencyReport,
  SessionRecord,
  SessionRecordSchema,
} from '../../shared/types/schemas';
import { SESSION_STORE, SessionStore } from './session.store';

export type RecordAnalysisOptions = {
  now?: Date;
  /** Checked again once the session lock is held. */
  signal?: AbortSignal;
};

@Injectable()
export class SessionsService {
  private readonly logger = new Logger(SessionsService.name);

  constructor(@Inject(SESSION_STORE) private readonly store: SessionStore) {}

  getSession(sessionId: string): SessionRecord | undefined {
    return this.store.get(sessionId);
  }

  /**
   * Snapshot of a finished analysis. Replaces whatever the session held; only
   * the running count carries over.
   */
  async recordAnalysis(
    sessionId: string,
    report: EmergencyReport,
    { now = new Date(), signal }: RecordAnalysisOptions = {},
  ): Promise<SessionRecord> {
    const record = await this.store.update(
      sessionId,
      (current) =>
        SessionRecordSchema.parse({
          session_id: sessionId,
          last_disaster_type: report.disaster_type,
          last_risk_level: report.risk_level,
          last_lives_in_danger: report.lives_in_danger,
          analysis_count: (current?.analysis_count ?? 0) + 1,
          last_updated_timestamp: now.toISOString(),
        }),
      signal,
    );

    this.logger.debug(
      `Session ${sessionId} updated (${record.analysis_count} analyses, ` +
        `last: ${record.last_disaster_type})`,
    );
    return record;
  }
}
