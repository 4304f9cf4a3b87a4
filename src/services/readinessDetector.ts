import type { ProbeResult, ReadinessPlan, ServerEntry } from '../types';
import type { BootTimeEstimator } from './bootTimeEstimator';
import { tcpProbe } from './tcpProbe';

export interface ReadinessDetectorOptions {
  probeTimeoutMs: number;
  pollIntervalSeconds: number;
  estimator: BootTimeEstimator;
  probe?: (host: string, port: number, timeoutMs: number) => Promise<boolean>;
}

export function statusUrlFor(serverId: number): string {
  return `/ping_status/${serverId}`;
}

/**
 * Readiness Detector
 * Servers with a monitor address are actively probed; the rest wait a fixed delay.
 */
export class ReadinessDetector {
  private readonly probeFn: (host: string, port: number, timeoutMs: number) => Promise<boolean>;

  constructor(private readonly options: ReadinessDetectorOptions) {
    this.probeFn = options.probe ?? tcpProbe;
  }

  plan(entry: ServerEntry): ReadinessPlan {
    if (!entry.monitorAddress) {
      return {
        strategy: 'fixed-delay',
        waitSeconds: entry.waitSeconds,
        redirectUrl: entry.redirectUrl,
      };
    }

    return {
      strategy: 'active-probe',
      statusUrl: statusUrlFor(entry.id),
      pollIntervalSeconds: this.options.pollIntervalSeconds,
      estimateSeconds: this.options.estimator.estimate(entry.id),
      waitSeconds: entry.waitSeconds,
      redirectUrl: entry.redirectUrl,
    };
  }

  /**
   * One connection attempt to the monitor address. Entries without one report offline.
   */
  async probe(entry: ServerEntry): Promise<ProbeResult> {
    if (!entry.monitorAddress) {
      return { online: false, redirectUrl: entry.redirectUrl };
    }

    const online = await this.probeFn(entry.monitorAddress, entry.monitorPort, this.options.probeTimeoutMs);
    return { online, redirectUrl: entry.redirectUrl };
  }
}
