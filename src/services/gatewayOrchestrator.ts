import type {
  DispatchErrorKind,
  ProbeResult,
  ReadinessPlan,
  ReadinessStrategy,
  ServerEntry,
  UnlockState,
} from '../types';
import { logger } from '../utils/logger';
import type { AccessLockManager } from './accessLockManager';
import type { BootTimeEstimator } from './bootTimeEstimator';
import type { ReadinessDetector } from './readinessDetector';
import type { WakeDispatcher } from './wakeDispatcher';

const SERVER_ID_PATTERN = /^\d+$/;

export type WakeMethod = 'read' | 'submit';

export interface WakeRequest {
  rawId: string;
  session: UnlockState;
  method: WakeMethod;
  submittedPin?: string;
}

export interface StatusRequest {
  rawId: string;
  session: UnlockState;
  elapsedSeconds?: number;
}

export type WakeOutcome =
  | { type: 'not-found'; rawId: string }
  | { type: 'pin-required'; server: ServerEntry; pinError: boolean }
  | { type: 'unlocked'; server: ServerEntry }
  | { type: 'dispatch-failed'; server: ServerEntry; kind: DispatchErrorKind; message: string }
  | { type: 'dispatched'; server: ServerEntry; via: 'command' | 'library'; plan: ReadinessPlan };

export type StatusOutcome =
  | { type: 'not-found'; rawId: string }
  | { type: 'probe-not-configured'; server: ServerEntry }
  | { type: 'locked'; server: ServerEntry }
  | { type: 'status'; server: ServerEntry; result: ProbeResult; recordedSeconds: number | null };

export interface LandingEntry {
  id: number;
  name: string;
  locked: boolean;
  unlocked: boolean;
  strategy: ReadinessStrategy;
  estimateSeconds: number | null;
  wakeUrl: string;
}

export interface ServerDirectory {
  list(): ServerEntry[];
  count(): number;
  get(id: number): ServerEntry | undefined;
}

export interface GatewayOrchestratorDeps {
  registry: ServerDirectory;
  dispatcher: Pick<WakeDispatcher, 'dispatch'>;
  readiness: Pick<ReadinessDetector, 'plan' | 'probe'>;
  estimator: BootTimeEstimator;
  locks: AccessLockManager;
}

/**
 * Gateway Orchestrator
 * Resolves the server, applies the PIN gate, dispatches the wake and picks the readiness plan.
 */
export class GatewayOrchestrator {
  constructor(private readonly deps: GatewayOrchestratorDeps) {}

  resolve(rawId: string): ServerEntry | undefined {
    if (!SERVER_ID_PATTERN.test(rawId)) {
      return undefined;
    }
    return this.deps.registry.get(Number.parseInt(rawId, 10));
  }

  serverCount(): number {
    return this.deps.registry.count();
  }

  landing(session: UnlockState): LandingEntry[] {
    const { locks, estimator } = this.deps;
    return this.deps.registry.list().map((server) => {
      const locked = locks.requiresPin(server);
      return {
        id: server.id,
        name: server.name,
        locked,
        unlocked: locked && locks.isUnlocked(session, server.id),
        strategy: server.monitorAddress ? 'active-probe' : 'fixed-delay',
        estimateSeconds: estimator.estimate(server.id),
        wakeUrl: `/wake/${server.id}`,
      };
    });
  }

  async handleWake(request: WakeRequest): Promise<WakeOutcome> {
    const server = this.resolve(request.rawId);
    if (!server) {
      logger.warn('Wake requested for unknown server', { rawId: request.rawId });
      return { type: 'not-found', rawId: request.rawId };
    }

    const { locks } = this.deps;
    if (locks.requiresPin(server) && !locks.isUnlocked(request.session, server.id)) {
      if (request.method === 'read') {
        return { type: 'pin-required', server, pinError: false };
      }

      if (!locks.verifyPin(server, request.submittedPin)) {
        logger.warn('Incorrect PIN submitted', { serverId: server.id });
        return { type: 'pin-required', server, pinError: true };
      }

      locks.unlock(request.session, server.id);
      logger.info('Server unlocked for session', { serverId: server.id });
      return { type: 'unlocked', server };
    }

    const result = await this.deps.dispatcher.dispatch(server);
    if (!result.ok) {
      return { type: 'dispatch-failed', server, kind: result.kind, message: result.message };
    }

    return { type: 'dispatched', server, via: result.via, plan: this.deps.readiness.plan(server) };
  }

  async checkStatus(request: StatusRequest): Promise<StatusOutcome> {
    const server = this.resolve(request.rawId);
    if (!server) {
      return { type: 'not-found', rawId: request.rawId };
    }

    if (!server.monitorAddress) {
      return { type: 'probe-not-configured', server };
    }

    if (!this.deps.locks.canAccess(request.session, server)) {
      return { type: 'locked', server };
    }

    const result = await this.deps.readiness.probe(server);
    let recordedSeconds: number | null = null;
    const elapsed = request.elapsedSeconds ?? 0;
    if (result.online && elapsed > 0) {
      const recorded = await this.deps.estimator.recordSample(server.id, elapsed);
      recordedSeconds = recorded ? Math.round(elapsed) : null;
    }

    return { type: 'status', server, result, recordedSeconds };
  }
}
