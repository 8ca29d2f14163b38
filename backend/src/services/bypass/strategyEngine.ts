/**
 * Bypass Strategy Engine
 *
 * Resolves a profile for the snapshot, ranks the applicable methods once,
 * then walks the plan one attempt at a time under a single device lease.
 *
 * Session policy:
 * - Failed attempt: move on to the next candidate
 * - Error caused by a command timeout: retry the same method once
 * - Any other Error, or an Error on the retry: abort the session
 *
 * Progress is published as events (`transition`, `attemptComplete`,
 * `sessionComplete`); `runSession` resolves with the finished session.
 */

import { EventEmitter } from 'events';
import { createServiceLogger } from '../logger';
import { AttemptRecorder } from './attemptRecorder';
import { runAttempt } from './methodExecutor';
import { rankCandidates } from './ranking';
import { AuthorizationDeniedError, UnknownMethodError } from './errors';
import { AuditTrail, type AuditSink } from '../audit/auditSink';
import { generateSessionId, getCurrentTimestamp } from '../../utils/uuid';
import type { MethodRegistry } from './methodRegistry';
import type { Authorizer } from '../authorization/authorizer';
import type { ResultCache } from '../cache/resultCache';
import type { ProfileResolver } from '../profiles/profileResolver';
import type { SessionStore } from '../../state/sessionStore';
import type { ChannelLease, CommunicationManager } from '../communication/communicationManager';
import type { DeviceSnapshot } from '../../types/device';
import type { ResolvedProfile } from '../../types/profile';
import type { AttemptTransition, BypassAttempt, PlannedCandidate } from '../../types/bypass';
import type { BypassSession, SessionError } from '../../types/session';

const log = createServiceLogger('engine');

export interface EngineConfig {
  modeSwitchPenalty: number;
  cacheSuccessBonus: number;
  commandTimeoutMs: number;
  probeTimeoutMs: number;

  /** How long a session waits for the device lease before DeviceBusyError */
  acquireTimeoutMs: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  modeSwitchPenalty: 0.75,
  cacheSuccessBonus: 0.05,
  commandTimeoutMs: 30_000,
  probeTimeoutMs: 5_000,
  acquireTimeoutMs: 60_000
};

export interface EngineDependencies {
  manager: CommunicationManager;
  resolver: ProfileResolver;
  registry: MethodRegistry;
  authorizer: Authorizer;
  auditSink: AuditSink;
  cache?: ResultCache;
  sessionStore?: SessionStore;
}

export interface RunSessionOptions {
  /** Run only this registered method */
  method?: string;
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface SessionPlan extends ResolvedProfile {
  plan: PlannedCandidate[];
}

export interface TransitionEvent extends AttemptTransition {
  sessionId: string;
  deviceSerial: string;
  methodName: string;
}

export class BypassStrategyEngine extends EventEmitter {
  private readonly config: EngineConfig;

  constructor(
    private readonly deps: EngineDependencies,
    config: Partial<EngineConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
  }

  /**
   * Authorization and lease acquisition happen before the session exists;
   * their errors reach the caller as thrown errors.
   */
  async runSession(snapshot: DeviceSnapshot, options: RunSessionOptions = {}): Promise<BypassSession> {
    const { registry, authorizer } = this.deps;
    const dryRun = options.dryRun ?? false;

    if (options.method !== undefined && !registry.has(options.method)) {
      throw new UnknownMethodError(options.method);
    }

    const authorized = await authorizer.checkAuthorized(snapshot.serial);
    if (!authorized) {
      throw new AuthorizationDeniedError(snapshot.serial);
    }

    const { profile, source, plan } = this.plan(snapshot, options.method);
    const lease = dryRun ? undefined : await this.acquireLease(snapshot);

    const session: BypassSession = {
      sessionId: generateSessionId(),
      deviceSerial: snapshot.serial,
      startedAt: getCurrentTimestamp(),
      dryRun,
      profileSource: source,
      modelName: profile.modelName,
      plan,
      attempts: []
    };
    const audit = new AuditTrail(this.deps.auditSink, session.sessionId);

    log.info('session_start', `Session for ${snapshot.serial} with ${plan.length} candidate(s)`, session.sessionId, {
      dryRun,
      profileSource: source,
      plan: plan.map(candidate => `${candidate.methodName}:${candidate.weight}`)
    });

    try {
      if (lease) {
        await this.executePlan(session, snapshot, lease, audit, options.signal);
      } else {
        this.previewPlan(session, audit);
      }
    } finally {
      await lease?.release();
    }

    return this.complete(session, audit);
  }

  /**
   * Resolve the profile and rank candidates without touching the device
   */
  plan(snapshot: DeviceSnapshot, onlyMethod?: string): SessionPlan {
    const { profile, source } = this.deps.resolver.resolve(snapshot);
    const plan = rankCandidates(snapshot, profile, this.deps.registry, {
      modeSwitchPenalty: this.config.modeSwitchPenalty,
      cacheSuccessBonus: this.config.cacheSuccessBonus,
      cachedSuccesses: this.cachedSuccesses(snapshot.serial),
      onlyMethod
    });
    return { profile, source, plan };
  }

  /**
   * Dry run: each candidate goes Pending -> Preparing and stops there.
   * No lease is taken and no attempt is recorded.
   */
  private previewPlan(session: BypassSession, audit: AuditTrail): void {
    for (const candidate of session.plan) {
      const recorder = new AttemptRecorder(candidate.methodName, 1, this.transitionListener(session, audit));
      recorder.transition('Preparing', 'dry run');
      candidate.previewStatus = recorder.status;
      candidate.previewNote = candidate.requiresSwitchFrom
        ? `requires switch ${candidate.requiresSwitchFrom} -> ${candidate.requiredMode}`
        : `native to ${candidate.requiredMode}`;
    }
    session.finalStatus = 'DryRun';
  }

  private async executePlan(
    session: BypassSession,
    snapshot: DeviceSnapshot,
    lease: ChannelLease,
    audit: AuditTrail,
    signal?: AbortSignal
  ): Promise<void> {
    const listener = this.transitionListener(session, audit);

    for (const candidate of session.plan) {
      const descriptor = this.deps.registry.get(candidate.methodName);
      if (!descriptor) continue;

      for (let attemptNumber = 1; attemptNumber <= 2; attemptNumber++) {
        if (signal?.aborted) {
          this.abort(session, {
            code: 'SESSION_CANCELLED',
            name: 'AbortError',
            message: 'Session cancelled by caller',
            occurredAt: getCurrentTimestamp()
          });
          return;
        }

        const recorder = new AttemptRecorder(descriptor.name, attemptNumber, listener);
        const attempt = await runAttempt(
          descriptor,
          snapshot,
          lease,
          recorder,
          { commandTimeoutMs: this.config.commandTimeoutMs, probeTimeoutMs: this.config.probeTimeoutMs },
          session.sessionId
        );
        this.recordAttempt(session, attempt);

        if (attempt.status === 'Success') {
          session.finalStatus = 'Success';
          return;
        }
        if (attempt.status === 'Failed') {
          break;
        }

        if (attempt.errorCategory === 'timeout' && attemptNumber === 1) {
          log.info('attempt_retry', `Retrying ${descriptor.name} after timeout`, session.sessionId);
          continue;
        }

        this.abort(session, {
          code: attempt.errorCode ?? 'UNEXPECTED_ERROR',
          name: attempt.errorName ?? 'Error',
          message: attempt.errorMessage ?? 'attempt ended in Error',
          methodName: attempt.methodName,
          occurredAt: getCurrentTimestamp()
        });
        return;
      }
    }

    session.finalStatus = 'ExhaustedAllMethods';
  }

  private recordAttempt(session: BypassSession, attempt: BypassAttempt): void {
    session.attempts.push(attempt);
    if (attempt.status === 'Success' || attempt.status === 'Failed' || attempt.status === 'Error') {
      this.deps.cache?.record(session.deviceSerial, attempt.methodName, attempt.status);
    }
    log.info('attempt_complete', `${attempt.methodName} #${attempt.attemptNumber} -> ${attempt.status}`, session.sessionId, {
      durationMs: attempt.executionDurationMs,
      completedSteps: attempt.completedSteps.length,
      error: attempt.errorMessage
    });
    this.emit('attemptComplete', { sessionId: session.sessionId, attempt });
  }

  private abort(session: BypassSession, error: SessionError): void {
    session.finalStatus = 'Aborted';
    session.lastError = error;
    log.warn('session_aborted', error.message, session.sessionId, { code: error.code, methodName: error.methodName });
  }

  private async complete(session: BypassSession, audit: AuditTrail): Promise<BypassSession> {
    session.endedAt = getCurrentTimestamp();
    session.summary = summarize(session);
    await audit.drain();

    this.deps.sessionStore?.record(session);
    log.info('session_complete', session.summary, session.sessionId, {
      finalStatus: session.finalStatus,
      attempts: session.attempts.length,
      auditFailures: audit.failureCount
    });
    this.emit('sessionComplete', session);
    return session;
  }

  private async acquireLease(snapshot: DeviceSnapshot): Promise<ChannelLease> {
    const { manager } = this.deps;
    if (manager.currentMode(snapshot.serial) === undefined) {
      manager.remember(snapshot);
    }
    return manager.acquire(snapshot.serial, this.config.acquireTimeoutMs);
  }

  private cachedSuccesses(serial: string): ReadonlySet<string> {
    const { cache, registry } = this.deps;
    if (!cache) return new Set();
    return new Set(
      registry
        .all()
        .map(descriptor => descriptor.name)
        .filter(name => cache.get(serial, name)?.outcome === 'Success')
    );
  }

  private transitionListener(session: BypassSession, audit: AuditTrail) {
    return (transition: AttemptTransition, methodName: string): void => {
      const event: TransitionEvent = {
        ...transition,
        sessionId: session.sessionId,
        deviceSerial: session.deviceSerial,
        methodName
      };
      this.emit('transition', event);
      audit.emit({
        timestamp: transition.at,
        sessionId: session.sessionId,
        deviceSerial: session.deviceSerial,
        methodName,
        fromState: transition.from,
        toState: transition.to,
        detail: transition.detail
      });
    };
  }
}

export function summarize(session: BypassSession): string {
  const attempts = session.attempts;
  const last = attempts[attempts.length - 1];

  switch (session.finalStatus) {
    case 'Success':
      return `Success: ${last?.methodName ?? 'unknown method'} cleared the lock after ${attempts.length} attempt(s)`;
    case 'DryRun':
      return `DryRun: ${describePlan(session.plan)}`;
    case 'Aborted':
      return `Aborted: ${session.lastError?.name ?? 'Error'}${
        session.lastError?.methodName ? ` during ${session.lastError.methodName}` : ''
      }: ${session.lastError?.message ?? 'unknown error'}`;
    case 'ExhaustedAllMethods':
      if (attempts.length === 0) {
        return 'ExhaustedAllMethods: no applicable methods for this device';
      }
      return `ExhaustedAllMethods: ${attempts.length} attempt(s) failed; last: ${last?.methodName} (${last?.errorMessage ?? 'no detail'})`;
    default:
      return 'Session did not complete';
  }
}

function describePlan(plan: readonly PlannedCandidate[]): string {
  if (plan.length === 0) {
    return 'no applicable methods';
  }
  return `${plan.length} candidate(s), first ${plan[0].methodName}${
    plan[0].requiresSwitchFrom ? ` (requires switch to ${plan[0].requiredMode})` : ''
  }`;
}
