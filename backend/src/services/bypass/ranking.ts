/**
 * Candidate ranking. Pure: the same snapshot, profile, registry and cache
 * hints always give the same plan.
 */

import type { MethodRegistry } from './methodRegistry';
import type { DeviceMode, DeviceSnapshot } from '../../types/device';
import type { DeviceProfile } from '../../types/profile';
import type { PlannedCandidate } from '../../types/bypass';

/**
 * Modes a device can be sent to with a single reboot request from each mode.
 * Only modes some channel can talk to are listed; Normal has none.
 */
export const MODE_REACHABILITY: Readonly<Record<DeviceMode, readonly DeviceMode[]>> = {
  Normal: [],
  DebugBridge: ['BootLoader', 'Recovery', 'ManufacturerDownload', 'EmergencyDownload'],
  Recovery: ['BootLoader'],
  BootLoader: ['DebugBridge', 'Recovery', 'EmergencyDownload'],
  ManufacturerDownload: [],
  EmergencyDownload: []
};

export function reachableInOneSwitch(from: DeviceMode, to: DeviceMode): boolean {
  return from === to || MODE_REACHABILITY[from].includes(to);
}

export interface RankingOptions {
  /** Multiplier (< 1) for candidates that need a mode switch */
  modeSwitchPenalty: number;

  /** Added to the weight of methods whose last cached outcome was Success */
  cacheSuccessBonus: number;

  /** Names of methods with a cached prior Success on this device */
  cachedSuccesses?: ReadonlySet<string>;

  /** Restrict the plan to one method */
  onlyMethod?: string;
}

export function rankCandidates(
  snapshot: DeviceSnapshot,
  profile: DeviceProfile,
  registry: MethodRegistry,
  options: RankingOptions
): PlannedCandidate[] {
  const candidates = registry
    .all()
    .filter(descriptor => options.onlyMethod === undefined || descriptor.name === options.onlyMethod)
    .filter(descriptor => profile.supportedMethodNames.has(descriptor.name))
    .filter(descriptor => reachableInOneSwitch(snapshot.mode, descriptor.requiredMode))
    .map(descriptor => {
      const needsSwitch = descriptor.requiredMode !== snapshot.mode;
      const rate = profile.declaredSuccessRate.get(descriptor.name) ?? 0;
      const cacheHint = options.cachedSuccesses?.has(descriptor.name) ?? false;
      const weight =
        (rate / 100) * descriptor.baseWeight * (needsSwitch ? options.modeSwitchPenalty : 1) +
        (cacheHint ? options.cacheSuccessBonus : 0);

      const candidate: PlannedCandidate = {
        methodName: descriptor.name,
        weight: Math.round(weight * 10_000) / 10_000,
        riskTier: descriptor.riskTier,
        requiredMode: descriptor.requiredMode,
        cacheHint
      };
      if (needsSwitch) {
        candidate.requiresSwitchFrom = snapshot.mode;
      }
      return candidate;
    });

  return candidates.sort(
    (a, b) =>
      b.weight - a.weight ||
      a.riskTier - b.riskTier ||
      registry.indexOf(a.methodName) - registry.indexOf(b.methodName)
  );
}
