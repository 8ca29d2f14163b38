import type { BypassAttempt, PlannedCandidate } from './bypass';
import type { ProfileSource } from './profile';

export type SessionStatus = 'Success' | 'ExhaustedAllMethods' | 'Aborted' | 'DryRun';

export interface SessionError {
  code: string;
  name: string;
  message: string;
  methodName?: string;
  occurredAt: string;
}

export interface BypassSession {
  sessionId: string;
  deviceSerial: string;
  startedAt: string;
  endedAt?: string;
  dryRun: boolean;
  profileSource: ProfileSource;
  modelName: string;
  plan: PlannedCandidate[];
  attempts: BypassAttempt[];
  finalStatus?: SessionStatus;
  lastError?: SessionError;

  /** Human-readable one-liner: final status plus the last error, if any */
  summary?: string;
}

export interface AuditRecord {
  timestamp: string;
  sessionId: string;
  deviceSerial: string;
  methodName: string;
  fromState: string;
  toState: string;
  detail?: string;
}

export interface SessionStatistics {
  totalSessions: number;
  byStatus: Record<SessionStatus, number>;
  methods: Record<string, { attempts: number; successes: number }>;
  successRate: number;
}
