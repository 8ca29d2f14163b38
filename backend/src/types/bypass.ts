/**
 * Bypass Method & Attempt Types
 */

import type { DeviceMode, Manufacturer } from './device';

// ============================================================================
// Descriptors
// ============================================================================

export type MethodKind =
  | 'debug-bridge'
  | 'boot-loader'
  | 'manufacturer-download'
  | 'emergency-download'
  | 'chained';

export interface CommandStep {
  id: string;
  command: string;
  timeoutMs?: number;

  /** Pattern stdout must match for the step to count as successful */
  expect?: string;
}

export interface SwitchModeStep {
  id: string;
  switchMode: DeviceMode;
}

export type MethodStep = CommandStep | SwitchModeStep;

export interface BypassMethodDescriptor {
  readonly name: string;
  readonly kind: MethodKind;
  readonly requiredMode: DeviceMode;

  /** Lower is safer; used as the first tie-breaker */
  readonly riskTier: number;
  readonly baseWeight: number;
  readonly manufacturers?: readonly Manufacturer[];
  readonly minApiLevel?: number;
  readonly maxApiLevel?: number;
  readonly description?: string;
  readonly steps: readonly MethodStep[];
}

export function isSwitchModeStep(step: MethodStep): step is SwitchModeStep {
  return 'switchMode' in step;
}

// ============================================================================
// Attempt state machine
// ============================================================================

export type AttemptStatus = 'Pending' | 'Preparing' | 'Executing' | 'Verifying' | 'Success' | 'Failed' | 'Error';

export const TERMINAL_STATUSES: ReadonlySet<AttemptStatus> = new Set<AttemptStatus>(['Success', 'Failed', 'Error']);

/**
 * Category attached to an Error attempt; drives the session retry policy
 */
export type ErrorCategory = 'timeout' | 'channel' | 'fatal' | 'authorization' | 'unexpected';

export interface AttemptLogEntry {
  timestamp: string;
  message: string;
}

export interface AttemptTransition {
  from: AttemptStatus;
  to: AttemptStatus;
  at: string;
  detail?: string;
}

export interface BypassAttempt {
  readonly id: string;
  readonly methodName: string;
  readonly attemptNumber: number;
  readonly status: AttemptStatus;
  readonly log: readonly AttemptLogEntry[];
  readonly completedSteps: readonly string[];
  readonly transitions: readonly AttemptTransition[];
  readonly errorMessage?: string;
  readonly errorCategory?: ErrorCategory;
  readonly errorName?: string;
  readonly errorCode?: string;
  readonly executionDurationMs: number;
}

// ============================================================================
// Plan
// ============================================================================

export interface PlannedCandidate {
  methodName: string;
  weight: number;
  riskTier: number;
  requiredMode: DeviceMode;

  /** Set when the device must be switched into `requiredMode` first */
  requiresSwitchFrom?: DeviceMode;
  cacheHint: boolean;

  /** Only filled by dry runs, where every candidate stops at Preparing */
  previewStatus?: AttemptStatus;
  previewNote?: string;
}
