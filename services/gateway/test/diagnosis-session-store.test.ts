import { DiagnosisSessionStore } from '../src/services/diagnosis-session-store';

describe('DiagnosisSessionStore', () => {
  let now: number;
  let ids: number;
  let store: DiagnosisSessionStore;

  beforeEach(() => {
    now = 10_000;
    ids = 0;
    store = new DiagnosisSessionStore({
      ttlMs: 1_000,
      now: () => now,
      generateId: () => `diag-${++ids}`
    });
  });

  it('opens a session with an expiry one TTL out', () => {
    const session = store.open('client-1');
    expect(session).toEqual({
      diagnosis_id: 'diag-1',
      client_id: 'client-1',
      answers: {},
      created_at: 10_000,
      expires_at: 11_000
    });
    expect(store.get('diag-1')).toBe(session);
  });

  it('keeps the last answer per question', () => {
    store.open('client-1');
    expect(store.recordAnswer('diag-1', 'asset_1', 'Over 2M KRW')).toBe(true);
    expect(store.recordAnswer('diag-1', 'asset_1', 'Deficit or zero')).toBe(true);
    expect(store.get('diag-1')?.answers).toEqual({ asset_1: 'Deficit or zero' });
  });

  it('expires sessions lazily on access', () => {
    store.open('client-1');
    now = 11_000;
    expect(store.get('diag-1')).toBeNull();
    expect(store.size()).toBe(0);
  });

  it('refuses answers for unknown or expired sessions', () => {
    expect(store.recordAnswer('diag-404', 'asset_1', 'x')).toBe(false);
    store.open('client-1');
    now = 20_000;
    expect(store.recordAnswer('diag-1', 'asset_1', 'x')).toBe(false);
  });

  it('sweeps only expired sessions', () => {
    store.open('client-1');
    now = 10_500;
    store.open('client-2');
    now = 11_200;

    expect(store.sweepExpired()).toEqual(['diag-1']);
    expect(store.size()).toBe(1);
    expect(store.get('diag-2')?.client_id).toBe('client-2');
  });

  it('closes sessions', () => {
    store.open('client-1');
    store.close('diag-1');
    expect(store.get('diag-1')).toBeNull();
  });
});
