import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import type { HttpRequest, HttpResponse } from '../../../shared/signers/wire';

export interface MetricsSnapshot {
  sig_count: number;
  uptime_ms: number;
}

/**
 * Process-lifetime service counters
 */
export class SignerMetrics {
  private sigCount = 0;
  private startedAt: number;
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.startedAt = now();
  }

  recordSignature(): void {
    this.sigCount++;
  }

  snapshot(): MetricsSnapshot {
    return {
      sig_count: this.sigCount,
      uptime_ms: this.now() - this.startedAt,
    };
  }

  /**
   * Answer a gateway-style HTTP query. Every request gets the metrics document.
   */
  httpRequest(_request: HttpRequest): HttpResponse {
    return {
      status_code: 200,
      headers: [['content-type', 'application/json']],
      body: bytesToHex(utf8ToBytes(JSON.stringify(this.snapshot()))),
    };
  }
}
