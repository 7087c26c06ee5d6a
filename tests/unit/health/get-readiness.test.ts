import { describe, expect, it } from 'vitest';

import { determineOverallStatus, getReadiness } from '@/modules/health/index.js';

import {
  makeFailingHealthChecker,
  makeHealthChecker,
  makeHealthCheckResult,
} from '../../fixtures/builders.js';

const input = { uptime: 42, timestamp: '2024-01-13T00:00:00.000Z' };

describe('getReadiness', () => {
  it('reports ok when every check passes', async () => {
    const response = await getReadiness(
      { checkers: [makeHealthChecker({ name: 'database', critical: true })] },
      input
    );

    expect(response).toEqual({
      status: 'ok',
      timestamp: '2024-01-13T00:00:00.000Z',
      uptime: 42,
      checks: [{ name: 'database', status: 'healthy', critical: true }],
    });
  });

  it('includes the version when given', async () => {
    const response = await getReadiness({ checkers: [], version: '1.2.3' }, input);

    expect(response.version).toBe('1.2.3');
    expect(response.status).toBe('ok');
  });

  it('treats a throwing checker as a critical failure', async () => {
    const response = await getReadiness(
      { checkers: [makeHealthChecker(), makeFailingHealthChecker('boom')] },
      input
    );

    expect(response.status).toBe('unhealthy');
    expect(response.checks[1]).toEqual({
      name: 'unknown',
      status: 'unhealthy',
      message: 'boom',
      critical: true,
    });
  });
});

describe('determineOverallStatus', () => {
  it('is degraded when only non-critical checks fail', () => {
    expect(
      determineOverallStatus([
        makeHealthCheckResult({ name: 'database', critical: true }),
        makeHealthCheckResult({ name: 'election-data', status: 'unhealthy', critical: false }),
      ])
    ).toBe('degraded');
  });

  it('is unhealthy when a critical check fails', () => {
    expect(
      determineOverallStatus([
        makeHealthCheckResult({ status: 'unhealthy', critical: true }),
        makeHealthCheckResult({ status: 'unhealthy', critical: false }),
      ])
    ).toBe('unhealthy');
  });

  it('treats checks without a critical flag as critical', () => {
    expect(determineOverallStatus([makeHealthCheckResult({ status: 'unhealthy' })])).toBe(
      'unhealthy'
    );
  });
});
