import type { EmergencyReport } from '../../shared/types/schemas';
import { InMemorySessionStore } from './session.store';
import { SessionsService } from './sessions.service';

const report = (overrides: Partial<EmergencyReport> = {}): EmergencyReport => ({
  disaster_type: 'fire',
  confidence: 0.72,
  risk_level: 'high',
  lives_in_danger: false,
  analysis: 'A building is on fire.',
  hazards: ['Heavy smoke'],
  immediate_instructions: ['Leave the building'],
  safety_measures: ['Stay low'],
  emergency_contacts: [{ service_name: 'Fire Brigade', phone_number: '101' }],
  optional_script: '',
  ...overrides,
});

describe('SessionsService', () => {
  let store: InMemorySessionStore;
  let service: SessionsService;

  beforeEach(() => {
    store = new InMemorySessionStore();
    service = new SessionsService(store);
  });

  it('returns undefined for a session that has no analyses', () => {
    expect(service.getSession('sess-1')).toBeUndefined();
  });

  it('records a snapshot of the first analysis', async () => {
    const now = new Date('2024-05-01T10:00:00.000Z');

    const saved = await service.recordAnalysis('sess-1', report(), { now });

    expect(saved).toEqual({
      session_id: 'sess-1',
      last_disaster_type: 'fire',
      last_risk_level: 'high',
      last_lives_in_danger: false,
      analysis_count: 1,
      last_updated_timestamp: '2024-05-01T10:00:00.000Z',
    });
    expect(service.getSession('sess-1')).toEqual(saved);
  });

  it('replaces the snapshot and increments the count on the next analysis', async () => {
    await service.recordAnalysis('sess-1', report(), {
      now: new Date('2024-05-01T10:00:00.000Z'),
    });

    const saved = await service.recordAnalysis(
      'sess-1',
      report({
        disaster_type: 'flood',
        risk_level: 'critical',
        lives_in_danger: true,
      }),
      { now: new Date('2024-05-01T10:05:00.000Z') },
    );

    expect(saved).toEqual({
      session_id: 'sess-1',
      last_disaster_type: 'flood',
      last_risk_level: 'critical',
      last_lives_in_danger: true,
      analysis_count: 2,
      last_updated_timestamp: '2024-05-01T10:05:00.000Z',
    });
  });

  it('keeps sessions independent', async () => {
    await service.recordAnalysis('sess-1', report());
    await service.recordAnalysis('sess-2', report({ disaster_type: 'storm' }));

    expect(service.getSession('sess-1')?.last_disaster_type).toBe('fire');
    expect(service.getSession('sess-2')?.analysis_count).toBe(1);
    expect(store.size).toBe(2);
  });
});
