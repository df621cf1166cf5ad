import { describe, expect, it } from 'vitest';
import { SignerMetrics } from './metrics';

describe('SignerMetrics', () => {
  it('counts signatures and reports uptime', () => {
    let now = 1_000;
    const metrics = new SignerMetrics(() => now);

    metrics.recordSignature();
    metrics.recordSignature();
    now = 1_250;

    expect(metrics.snapshot()).toEqual({ sig_count: 2, uptime_ms: 250 });
  });

  it('answers any http request with the metrics document', () => {
    const metrics = new SignerMetrics(() => 0);
    metrics.recordSignature();

    const response = metrics.httpRequest({
      url: '/anything',
      method: 'GET',
      body: new Uint8Array(0),
      headers: [],
    });

    expect(response.status_code).toBe(200);
    expect(response.headers).toEqual([['content-type', 'application/json']]);
    expect(Buffer.from(response.body, 'hex').toString('utf8')).toBe('{"sig_count":1,"uptime_ms":0}');
  });
});
