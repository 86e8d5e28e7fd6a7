import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Alert } from '../src/types.js';

// Mock pg module before importing the module under test
const mockQuery = vi.fn();
const mockEnd = vi.fn();
const MockPool = vi.fn(() => ({
  query: mockQuery,
  end: mockEnd,
}));

vi.mock('pg', () => ({
  default: { Pool: MockPool },
  Pool: MockPool,
}));

// Must import AFTER mock setup
import { initPgHistory, isPgActive, recordAlertPg, getAlertsPg, closePg } from '../src/store/history-pg.js';

const alert: Alert = {
  id: 'alert-1',
  revision: 2,
  category: 'sticking',
  severity: 'high',
  vote: 0.82,
  supportingAgents: ['mechanical_sticking', 'differential_sticking'],
  supportingPredictionIds: ['p1', 'p2'],
  windowTimestamp: Date.UTC(2024, 0, 1, 12, 0, 0),
  createdAt: Date.UTC(2024, 0, 1, 11, 59, 0),
  updatedAt: Date.UTC(2024, 0, 1, 12, 0, 0),
  status: 'pending',
  message: 'Stuck pipe risk 82% from Mechanical Sticking, Differential Sticking',
  recommendation: 'Work pipe',
  evidence: { mechanical_sticking: 0.85, differential_sticking: 0.8 },
};

describe('history-pg', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(async () => {
    await closePg();
    delete process.env['DRILLSENSE_HISTORY_DB'];
  });

  describe('initPgHistory', () => {
    it('returns false when DRILLSENSE_HISTORY_DB is not set', async () => {
      expect(await initPgHistory()).toBe(false);
      expect(isPgActive()).toBe(false);
      expect(MockPool).not.toHaveBeenCalled();
    });

    it('creates the pool and table when the env var is set', async () => {
      process.env['DRILLSENSE_HISTORY_DB'] = 'postgresql://localhost/test';
      mockQuery.mockResolvedValueOnce({});
      vi.spyOn(console, 'log').mockImplementation(() => {});

      expect(await initPgHistory()).toBe(true);
      expect(isPgActive()).toBe(true);
      expect(MockPool).toHaveBeenCalledWith({ connectionString: 'postgresql://localhost/test', max: 5 });
      expect(mockQuery).toHaveBeenCalledWith(expect.stringContaining('CREATE TABLE IF NOT EXISTS drillsense_alerts'));
    });

    it('handles connection failure gracefully', async () => {
      process.env['DRILLSENSE_HISTORY_DB'] = 'postgresql://bad-host/test';
      mockQuery.mockRejectedValueOnce(new Error('Connection refused'));
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      expect(await initPgHistory()).toBe(false);
      expect(isPgActive()).toBe(false);
      expect(consoleSpy).toHaveBeenCalledWith('[Drillsense Store] PostgreSQL mirror unavailable:', 'Connection refused');
      consoleSpy.mockRestore();
    });
  });

  describe('recordAlertPg', () => {
    it('is a no-op without a pool', () => {
      recordAlertPg(alert);
      expect(mockQuery).not.toHaveBeenCalled();
    });

    it('upserts the revision with ISO timestamps', async () => {
      process.env['DRILLSENSE_HISTORY_DB'] = 'postgresql://localhost/test';
      mockQuery.mockResolvedValue({});
      vi.spyOn(console, 'log').mockImplementation(() => {});
      await initPgHistory();

      recordAlertPg(alert, 'well-7');

      const [sql, params] = mockQuery.mock.calls[1] ?? [];
      expect(sql).toContain('ON CONFLICT (id) DO UPDATE');
      expect(params).toEqual([
        'alert-1',
        2,
        'well-7',
        'sticking',
        'high',
        0.82,
        'pending',
        alert.message,
        'Work pipe',
        '["mechanical_sticking","differential_sticking"]',
        '{"mechanical_sticking":0.85,"differential_sticking":0.8}',
        '2024-01-01T12:00:00.000Z',
        '2024-01-01T11:59:00.000Z',
        '2024-01-01T12:00:00.000Z',
      ]);
    });

    it('logs write errors instead of throwing', async () => {
      process.env['DRILLSENSE_HISTORY_DB'] = 'postgresql://localhost/test';
      mockQuery.mockResolvedValueOnce({}).mockRejectedValueOnce(new Error('disk full'));
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      await initPgHistory();

      recordAlertPg(alert);
      await vi.waitFor(() => {
        expect(errorSpy).toHaveBeenCalledWith('[Drillsense Store] pg write error:', 'disk full');
      });
      errorSpy.mockRestore();
    });
  });

  describe('getAlertsPg', () => {
    it('returns an empty list without a pool', async () => {
      expect(await getAlertsPg()).toEqual([]);
    });

    it('maps rows back to alerts', async () => {
      process.env['DRILLSENSE_HISTORY_DB'] = 'postgresql://localhost/test';
      vi.spyOn(console, 'log').mockImplementation(() => {});
      mockQuery.mockResolvedValueOnce({}).mockResolvedValueOnce({
        rows: [
          {
            id: 'alert-1',
            revision: 2,
            category: 'sticking',
            severity: 'high',
            vote: '0.82',
            status: 'pending',
            message: 'm',
            recommendation: 'r',
            supporting_agents: ['mechanical_sticking'],
            evidence: { mechanical_sticking: 0.85 },
            window_timestamp: new Date(alert.windowTimestamp),
            created_at: '2024-01-01T11:59:00.000Z',
            updated_at: new Date(alert.updatedAt),
          },
        ],
      });
      await initPgHistory();

      const alerts = await getAlertsPg(10, 5);

      expect(mockQuery).toHaveBeenLastCalledWith(expect.stringContaining('LIMIT $1 OFFSET $2'), [10, 5]);
      expect(alerts).toEqual([
        {
          id: 'alert-1',
          revision: 2,
          category: 'sticking',
          severity: 'high',
          vote: 0.82,
          status: 'pending',
          message: 'm',
          recommendation: 'r',
          supportingAgents: ['mechanical_sticking'],
          supportingPredictionIds: [],
          evidence: { mechanical_sticking: 0.85 },
          windowTimestamp: alert.windowTimestamp,
          createdAt: alert.createdAt,
          updatedAt: alert.updatedAt,
        },
      ]);
    });

    it('returns an empty list on a read error', async () => {
      process.env['DRILLSENSE_HISTORY_DB'] = 'postgresql://localhost/test';
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      mockQuery.mockResolvedValueOnce({}).mockRejectedValueOnce(new Error('timeout'));
      await initPgHistory();

      expect(await getAlertsPg()).toEqual([]);
      expect(errorSpy).toHaveBeenCalledWith('[Drillsense Store] pg read error:', 'timeout');
      errorSpy.mockRestore();
    });
  });

  describe('closePg', () => {
    it('ends the pool and allows re-initialization', async () => {
      process.env['DRILLSENSE_HISTORY_DB'] = 'postgresql://localhost/test';
      vi.spyOn(console, 'log').mockImplementation(() => {});
      mockQuery.mockResolvedValue({});
      await initPgHistory();

      await closePg();

      expect(mockEnd).toHaveBeenCalledTimes(1);
      expect(isPgActive()).toBe(false);
      expect(await initPgHistory()).toBe(true);
    });
  });
});
