import type { Manufacturer } from './device';

export type DifficultyTier = 'easy' | 'medium' | 'hard' | 'expert';

export interface ApiRange {
  min?: number;
  max?: number;
}

/**
 * Read-only device profile as returned by the catalog. Never refreshed
 * while a session is running.
 */
export interface DeviceProfile {
  readonly manufacturer: Manufacturer;
  readonly modelName: string;
  readonly supportedMethodNames: ReadonlySet<string>;

  /** Declared success rate per method, 0-100 */
  readonly declaredSuccessRate: ReadonlyMap<string, number>;
  readonly difficulty: DifficultyTier;
  readonly apiRange: ApiRange;
}

export type ProfileSource = 'catalog' | 'generic';

export interface ResolvedProfile {
  profile: DeviceProfile;
  source: ProfileSource;
}
