/**
 * Profile Resolver
 *
 * Maps a snapshot to the profile the engine ranks against. When the catalog
 * has nothing for the device, or the catalog entry does not cover the
 * device's API level, a conservative generic profile is built from the
 * registry: only methods native to the current mode, and only those in
 * the lowest risk tier among them.
 */

import { createServiceLogger } from '../logger';
import type { MethodRegistry } from '../bypass/methodRegistry';
import type { ProfileCatalog } from './profileCatalog';
import type { DeviceSnapshot } from '../../types/device';
import type { ApiRange, DeviceProfile, ResolvedProfile } from '../../types/profile';
import type { BypassMethodDescriptor } from '../../types/bypass';

const log = createServiceLogger('profiles');

export const GENERIC_MODEL_NAME = 'Generic Android device';

export function apiLevelInRange(apiLevel: number | undefined, range: ApiRange): boolean {
  if (apiLevel === undefined) return true;
  if (range.min !== undefined && apiLevel < range.min) return false;
  if (range.max !== undefined && apiLevel > range.max) return false;
  return true;
}

export function appliesTo(descriptor: BypassMethodDescriptor, snapshot: DeviceSnapshot): boolean {
  if (descriptor.manufacturers && !descriptor.manufacturers.includes(snapshot.manufacturer)) {
    return false;
  }
  return apiLevelInRange(snapshot.apiLevel, { min: descriptor.minApiLevel, max: descriptor.maxApiLevel });
}

export function buildGenericProfile(
  snapshot: DeviceSnapshot,
  registry: MethodRegistry,
  defaultRate: number
): DeviceProfile {
  const native = registry
    .all()
    .filter(descriptor => descriptor.requiredMode === snapshot.mode && appliesTo(descriptor, snapshot));
  const lowestTier = Math.min(...native.map(descriptor => descriptor.riskTier));
  const chosen = native.filter(descriptor => descriptor.riskTier === lowestTier);
  const rates = new Map(chosen.map(descriptor => [descriptor.name, defaultRate]));

  return Object.freeze({
    manufacturer: snapshot.manufacturer,
    modelName: snapshot.model ?? GENERIC_MODEL_NAME,
    supportedMethodNames: new Set(rates.keys()),
    declaredSuccessRate: rates,
    difficulty: 'expert',
    apiRange: Object.freeze({})
  });
}

export class ProfileResolver {
  constructor(
    private readonly catalog: ProfileCatalog,
    private readonly registry: MethodRegistry,
    private readonly genericSuccessRate = 50
  ) {}

  resolve(snapshot: DeviceSnapshot): ResolvedProfile {
    const found = this.catalog.findProfile(snapshot.vendorId, snapshot.productId, snapshot.model);

    if (found && apiLevelInRange(snapshot.apiLevel, found.apiRange)) {
      log.debug('profile_resolved', `Using catalog profile ${found.modelName}`, undefined, { serial: snapshot.serial });
      return { profile: found, source: 'catalog' };
    }

    if (found) {
      log.info('profile_api_mismatch', `API level ${snapshot.apiLevel} outside ${found.modelName} range`, undefined, {
        serial: snapshot.serial,
        apiRange: found.apiRange
      });
    } else {
      log.info('profile_not_found', 'No catalog profile; falling back to generic', undefined, {
        serial: snapshot.serial,
        vendorId: snapshot.vendorId,
        productId: snapshot.productId
      });
    }

    return { profile: buildGenericProfile(snapshot, this.registry, this.genericSuccessRate), source: 'generic' };
  }
}
