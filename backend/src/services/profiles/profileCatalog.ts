/**
 * Device profile catalog: read-only lookup by USB ids and model hint.
 */

import { readFileSync } from 'fs';
import { CatalogError, errorMessage } from '../bypass/errors';
import { formatIssues, profileCatalogSchema, type ProfileEntry } from '../../utils/validation/catalogSchemas';
import type { DeviceProfile } from '../../types/profile';

export interface ProfileCatalog {
  findProfile(vendorId: number, productId: number, modelHint?: string): DeviceProfile | undefined;
}

const normalizeModel = (model: string): string => model.trim().toLowerCase().replace(/[\s_-]+/g, '');

export function toDeviceProfile(entry: ProfileEntry): DeviceProfile {
  const rates = new Map(Object.entries(entry.methods));
  return Object.freeze({
    manufacturer: entry.manufacturer,
    modelName: entry.modelName,
    supportedMethodNames: new Set(rates.keys()),
    declaredSuccessRate: rates,
    difficulty: entry.difficulty,
    apiRange: Object.freeze({ ...entry.apiRange })
  });
}

/**
 * Catalog backed by a JSON file. A model-hint match beats a product-id
 * match; both are restricted to the device's vendor.
 */
export class JsonProfileCatalog implements ProfileCatalog {
  private readonly entries: readonly ProfileEntry[];
  private readonly profiles: readonly DeviceProfile[];

  constructor(entries: readonly ProfileEntry[]) {
    this.entries = entries;
    this.profiles = entries.map(toDeviceProfile);
  }

  static fromFile(filePath: string): JsonProfileCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new CatalogError(
        `Cannot read profile catalog: ${errorMessage(error)}`,
        filePath
      );
    }

    const parsed = profileCatalogSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CatalogError(`Invalid profile catalog: ${formatIssues(parsed.error)}`, filePath);
    }
    return new JsonProfileCatalog(parsed.data.profiles);
  }

  get size(): number {
    return this.entries.length;
  }

  findProfile(vendorId: number, productId: number, modelHint?: string): DeviceProfile | undefined {
    const hint = modelHint ? normalizeModel(modelHint) : undefined;

    if (hint) {
      const byModel = this.entries.findIndex(
        entry =>
          entry.vendorId === vendorId &&
          [entry.modelName, ...entry.modelAliases].some(name => normalizeModel(name) === hint)
      );
      if (byModel >= 0) {
        return this.profiles[byModel];
      }
    }

    const byProduct = this.entries.findIndex(
      entry => entry.vendorId === vendorId && entry.productIds.includes(productId)
    );
    return byProduct >= 0 ? this.profiles[byProduct] : undefined;
  }
}
