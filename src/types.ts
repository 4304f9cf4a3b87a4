/**
 * Type definitions for the WoL gateway
 */
import 'express-session';

export const DEFAULT_BROADCAST_ADDRESS = '255.255.255.255';
export const DEFAULT_MONITOR_PORT = 22;

/**
 * One managed machine. `id` is its position in the registry.
 */
export interface ServerEntry {
  id: number;
  name: string;
  macAddress: string;
  broadcastAddress: string;
  redirectUrl: string;
  waitSeconds: number;
  monitorAddress?: string;
  monitorPort: number;
  locked: boolean;
  pin: string;
  bootHistory: number[];
}

/**
 * Fields an operator supplies when creating or editing a server.
 */
export type ServerInput = Omit<ServerEntry, 'id' | 'bootHistory'>;

export interface RegistrySnapshot {
  port: number;
  servers: ServerEntry[];
}

/**
 * Server record as stored in the registry document.
 */
export interface StoredServer {
  NAME: string;
  WOL_MAC_ADDRESS: string;
  BROADCAST_ADDRESS: string;
  SITE_URL: string;
  WAIT_TIME_SECONDS: number;
  MONITOR_IP?: string;
  MONITOR_PORT?: number;
  LOCKED: boolean;
  PIN: string;
  BOOT_HISTORY: number[];
}

export interface RegistryDocument {
  PORT: number;
  SERVERS: StoredServer[];
}

export type FieldValidation<T> =
  | { ok: true; value: T }
  | { ok: false; field: string; reason: string };

/**
 * serverId -> unlock time in epoch milliseconds
 */
export type UnlockRecords = Record<string, number>;

/**
 * The slice of a session the lock manager reads and writes.
 */
export interface UnlockState {
  unlockedServers?: UnlockRecords;
}

declare module 'express-session' {
  interface SessionData {
    unlockedServers: UnlockRecords;
    adminUser: string;
  }
}

export type ReadinessStrategy = 'fixed-delay' | 'active-probe';

export interface FixedDelayPlan {
  strategy: 'fixed-delay';
  waitSeconds: number;
  redirectUrl: string;
}

export interface ActiveProbePlan {
  strategy: 'active-probe';
  statusUrl: string;
  pollIntervalSeconds: number;
  estimateSeconds: number | null;
  waitSeconds: number;
  redirectUrl: string;
}

export type ReadinessPlan = FixedDelayPlan | ActiveProbePlan;

export interface ProbeResult {
  online: boolean;
  redirectUrl: string;
}

export type DispatchErrorKind = 'CAPABILITY_MISSING' | 'TRANSMISSION_FAILED' | 'UNEXPECTED';

export type DispatchResult =
  | { ok: true; via: 'command' | 'library' }
  | { ok: false; kind: DispatchErrorKind; message: string };

export interface ServerSummary {
  id: number;
  name: string;
}

export interface AdminUser {
  username: string;
  passwordHash: string;
  totpEnabled: boolean;
  totpSecret: string;
  createdAt: string;
}

export type PublicAdminUser = Omit<AdminUser, 'passwordHash' | 'totpSecret'>;
