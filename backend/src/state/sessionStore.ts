import { createServiceLogger } from '../services/logger';
import type { BypassSession, SessionStatistics, SessionStatus } from '../types/session';

const log = createServiceLogger('sessions');

const DEFAULT_MAX_SESSIONS = 500;

/**
 * In-memory history of completed sessions, newest last.
 */
export class SessionStore {
  private readonly sessions = new Map<string, BypassSession>();

  constructor(private readonly maxSessions = DEFAULT_MAX_SESSIONS) {}

  record(session: BypassSession): void {
    if (!session.finalStatus) {
      log.warn('session_incomplete', `Refusing to store running session ${session.sessionId}`, session.sessionId);
      return;
    }

    this.sessions.set(session.sessionId, structuredClone(session));
    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
    log.debug('session_recorded', `Stored session ${session.sessionId}`, session.sessionId, {
      finalStatus: session.finalStatus
    });
  }

  get(sessionId: string): BypassSession | undefined {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : undefined;
  }

  list(deviceSerial?: string): BypassSession[] {
    return [...this.sessions.values()]
      .filter(session => deviceSerial === undefined || session.deviceSerial === deviceSerial)
      .map(session => structuredClone(session));
  }

  latestFor(deviceSerial: string): BypassSession | undefined {
    const matching = this.list(deviceSerial);
    return matching[matching.length - 1];
  }

  statistics(): SessionStatistics {
    const byStatus: Record<SessionStatus, number> = { Success: 0, ExhaustedAllMethods: 0, Aborted: 0, DryRun: 0 };
    const methods: SessionStatistics['methods'] = {};

    for (const session of this.sessions.values()) {
      if (session.finalStatus) {
        byStatus[session.finalStatus]++;
      }
      for (const attempt of session.attempts) {
        const entry = (methods[attempt.methodName] ??= { attempts: 0, successes: 0 });
        entry.attempts++;
        if (attempt.status === 'Success') entry.successes++;
      }
    }

    const executed = this.sessions.size - byStatus.DryRun;
    return {
      totalSessions: this.sessions.size,
      byStatus,
      methods,
      successRate: executed > 0 ? byStatus.Success / executed : 0
    };
  }

  clear(): void {
    this.sessions.clear();
  }
}
