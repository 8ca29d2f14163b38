/**
 * Generic descriptor interpreter. Drives one attempt through Preparing,
 * Executing and Verifying against a leased channel.
 */

import { createServiceLogger } from '../logger';
import { categorizeError, errorCode, errorMessage, errorName } from './errors';
import { reachableInOneSwitch } from './ranking';
import { appliesTo } from '../profiles/profileResolver';
import { isSwitchModeStep, type BypassAttempt, type BypassMethodDescriptor, type CommandStep } from '../../types/bypass';
import type { AttemptRecorder } from './attemptRecorder';
import type { ChannelLease } from '../communication/communicationManager';
import type { DeviceSnapshot } from '../../types/device';

const log = createServiceLogger('executor');

/** The slice of a lease an attempt needs */
export type AttemptChannel = Pick<ChannelLease, 'mode' | 'execute' | 'switchMode' | 'queryLockState' | 'probe'>;

export interface ExecutorConfig {
  commandTimeoutMs: number;
  probeTimeoutMs: number;
}

type PhaseOutcome = { ok: true } | { ok: false; reason: string };

const OK: PhaseOutcome = { ok: true };
const fail = (reason: string): PhaseOutcome => ({ ok: false, reason });

/**
 * Run a single attempt to a terminal status. Device errors never escape:
 * they are recorded on the attempt, whose category drives the session policy.
 */
export async function runAttempt(
  descriptor: BypassMethodDescriptor,
  snapshot: DeviceSnapshot,
  lease: AttemptChannel,
  recorder: AttemptRecorder,
  config: ExecutorConfig,
  traceId?: string
): Promise<BypassAttempt> {
  recorder.transition('Preparing');

  try {
    const prepared = await prepare(descriptor, snapshot, lease, recorder, config);
    if (!prepared.ok) {
      recorder.fail('Failed', { message: prepared.reason });
      return recorder.finish();
    }
  } catch (error) {
    const category = categorizeError(error);
    // Only a vanished or misbehaving device is fatal this early
    const status = category === 'fatal' || category === 'unexpected' ? 'Error' : 'Failed';
    recorder.fail(status, {
      message: errorMessage(error),
      category,
      errorName: errorName(error),
      errorCode: errorCode(error)
    });
    log.warn('prepare_error', errorMessage(error), traceId, { method: descriptor.name, category });
    return recorder.finish();
  }

  recorder.transition('Executing');
  try {
    const executed = await executeSteps(descriptor, lease, recorder, config);
    if (!executed.ok) {
      recorder.fail('Failed', { message: executed.reason });
      return recorder.finish();
    }
  } catch (error) {
    return recordError(recorder, error, descriptor, traceId);
  }

  recorder.transition('Verifying');
  try {
    const lockState = await lease.queryLockState(config.commandTimeoutMs);
    recorder.verification(`lock state ${lockState}`);
    if (lockState === 'Unlocked') {
      recorder.transition('Success');
    } else {
      recorder.fail('Failed', { message: `lock persists (${lockState})` });
    }
  } catch (error) {
    return recordError(recorder, error, descriptor, traceId);
  }

  return recorder.finish();
}

function recordError(
  recorder: AttemptRecorder,
  error: unknown,
  descriptor: BypassMethodDescriptor,
  traceId?: string
): BypassAttempt {
  const category = categorizeError(error);
  recorder.fail('Error', {
    message: errorMessage(error),
    category,
    errorName: errorName(error),
    errorCode: errorCode(error)
  });
  log.warn('attempt_error', errorMessage(error), traceId, { method: descriptor.name, category });
  return recorder.finish();
}

async function prepare(
  descriptor: BypassMethodDescriptor,
  snapshot: DeviceSnapshot,
  lease: AttemptChannel,
  recorder: AttemptRecorder,
  config: ExecutorConfig
): Promise<PhaseOutcome> {
  if (!appliesTo(descriptor, snapshot)) {
    return fail(`not applicable to ${snapshot.manufacturer} at API level ${snapshot.apiLevel ?? 'unknown'}`);
  }

  if (lease.mode !== descriptor.requiredMode) {
    if (!reachableInOneSwitch(lease.mode, descriptor.requiredMode)) {
      return fail(`${descriptor.requiredMode} is not reachable from ${lease.mode}`);
    }
    recorder.note(`switching ${lease.mode} -> ${descriptor.requiredMode}`);
    const switched = await lease.switchMode(descriptor.requiredMode);
    if (!switched) {
      return fail(`device refused switch to ${descriptor.requiredMode}`);
    }
  }

  const alive = await lease.probe(config.probeTimeoutMs);
  if (!alive) {
    return fail('connectivity probe failed');
  }
  recorder.note(`probe ok in ${lease.mode}`);
  return OK;
}

async function executeSteps(
  descriptor: BypassMethodDescriptor,
  lease: AttemptChannel,
  recorder: AttemptRecorder,
  config: ExecutorConfig
): Promise<PhaseOutcome> {
  for (const step of descriptor.steps) {
    if (isSwitchModeStep(step)) {
      recorder.note(`step ${step.id}: switch to ${step.switchMode}`);
      const switched = await lease.switchMode(step.switchMode);
      if (!switched) {
        return fail(`step ${step.id}: device refused switch to ${step.switchMode}`);
      }
      recorder.stepCompleted(step.id);
      continue;
    }

    const outcome = await runCommandStep(step, lease, recorder, config);
    if (!outcome.ok) {
      return outcome;
    }
    recorder.stepCompleted(step.id);
  }
  return OK;
}

async function runCommandStep(
  step: CommandStep,
  lease: AttemptChannel,
  recorder: AttemptRecorder,
  config: ExecutorConfig
): Promise<PhaseOutcome> {
  recorder.note(`step ${step.id}: ${step.command}`);
  const result = await lease.execute(step.command, step.timeoutMs ?? config.commandTimeoutMs);
  recorder.note(`step ${step.id}: ${result.success ? 'ok' : 'failed'} in ${result.durationMs}ms`);

  if (!result.success) {
    return fail(`step ${step.id} failed: ${result.stderr || result.stdout || 'no output'}`);
  }
  if (step.expect !== undefined && !new RegExp(step.expect, 'm').test(result.stdout)) {
    return fail(`step ${step.id} output did not match /${step.expect}/`);
  }
  return OK;
}
