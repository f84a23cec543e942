import { describe, it, expect } from 'vitest';

import { determineOverallStatus, evaluateReadiness, mapCheckResults } from './logic.js';
import { type HealthCheckResult } from './types.js';

describe('Health Core Logic', () => {
  describe('mapCheckResults', () => {
    it('returns values for fulfilled promises', () => {
      const input: PromiseSettledResult<HealthCheckResult>[] = [
        { status: 'fulfilled', value: { name: 'food-store', status: 'healthy' } },
        { status: 'fulfilled', value: { name: 'disk', status: 'unhealthy', critical: false } },
      ];

      expect(mapCheckResults(input)).toEqual([
        { name: 'food-store', status: 'healthy' },
        { name: 'disk', status: 'unhealthy', critical: false },
      ]);
    });

    it('maps rejected promises to critical unhealthy results', () => {
      const input: PromiseSettledResult<HealthCheckResult>[] = [
        { status: 'rejected', reason: new Error('Food store is closed') },
        { status: 'rejected', reason: 'boom' },
      ];

      expect(mapCheckResults(input)).toEqual([
        { name: 'unknown', status: 'unhealthy', message: 'Food store is closed', critical: true },
        { name: 'unknown', status: 'unhealthy', message: 'Check failed', critical: true },
      ]);
    });
  });

  describe('determineOverallStatus', () => {
    it('is ok when every check is healthy', () => {
      expect(determineOverallStatus([{ name: 'food-store', status: 'healthy' }])).toBe('ok');
    });

    it('treats checks without a critical flag as critical', () => {
      expect(determineOverallStatus([{ name: 'food-store', status: 'unhealthy' }])).toBe(
        'unhealthy'
      );
    });

    it('is degraded when only non-critical checks fail', () => {
      const checks: HealthCheckResult[] = [
        { name: 'food-store', status: 'healthy', critical: true },
        { name: 'disk', status: 'unhealthy', critical: false },
      ];

      expect(determineOverallStatus(checks)).toBe('degraded');
    });
  });

  describe('evaluateReadiness', () => {
    const timestamp = '2024-05-01T00:00:00.000Z';
    const uptime = 100;

    it('returns ok when all checks are healthy', () => {
      const checks: HealthCheckResult[] = [{ name: 'food-store', status: 'healthy' }];

      const result = evaluateReadiness(checks, uptime, timestamp);

      expect(result).toEqual({ status: 'ok', timestamp, uptime, checks });
    });

    it('returns unhealthy when a critical check fails', () => {
      const checks: HealthCheckResult[] = [
        { name: 'food-store', status: 'unhealthy', critical: true },
      ];

      expect(evaluateReadiness(checks, uptime, timestamp).status).toBe('unhealthy');
    });

    it('includes version if provided', () => {
      const result = evaluateReadiness([], uptime, timestamp, '1.0.0');
      expect(result.version).toBe('1.0.0');
    });
  });
});
