import { resolve } from 'path';
import { JsonProfileCatalog } from '../profileCatalog';
import { GENERIC_MODEL_NAME, ProfileResolver, apiLevelInRange, appliesTo } from '../profileResolver';
import { MethodRegistry } from '../../bypass/methodRegistry';
import { snapshotOf } from '../../../__tests__/support/fakeDevice';

const DATA_DIR = resolve(__dirname, '../../../../../data');

describe('JsonProfileCatalog', () => {
  const catalog = JsonProfileCatalog.fromFile(resolve(DATA_DIR, 'device-profiles.json'));

  it('loads every shipped profile', () => {
    expect(catalog.size).toBe(5);
  });

  it('finds a profile by vendor and product id', () => {
    expect(catalog.findProfile(0x18d1, 0x4ee2)?.modelName).toBe('Pixel 6');
  });

  it('prefers a model hint over the product id', () => {
    // 0x685d is listed under the A52; the hint names the S10
    expect(catalog.findProfile(0x04e8, 0x685d, 'SM-G973F')?.modelName).toBe('Galaxy S10');
  });

  it('normalizes case and separators in model hints', () => {
    expect(catalog.findProfile(0x04e8, 0x0000, 'sm g973u')?.modelName).toBe('Galaxy S10');
  });

  it('never matches across vendors', () => {
    expect(catalog.findProfile(0x2717, 0x4ee2, 'oriole')).toBeUndefined();
  });

  it('exposes rates as a read-only profile', () => {
    const profile = catalog.findProfile(0x1004, 0x633a);

    expect(profile?.declaredSuccessRate.get('recovery-build-read')).toBe(50);
    expect(profile?.supportedMethodNames.has('adb-setup-state-read')).toBe(true);
    expect(profile && Object.isFrozen(profile)).toBe(true);
  });
});

describe('ProfileResolver', () => {
  const registry = MethodRegistry.fromFile(resolve(DATA_DIR, 'bypass-methods.json'));
  const catalog = JsonProfileCatalog.fromFile(resolve(DATA_DIR, 'device-profiles.json'));
  const resolver = new ProfileResolver(catalog, registry, 50);

  it('returns the catalog profile when the API level fits', () => {
    const resolved = resolver.resolve(snapshotOf({ apiLevel: 31 }));

    expect(resolved.source).toBe('catalog');
    expect(resolved.profile.modelName).toBe('Galaxy A52');
  });

  it('falls back when the API level is outside the profile range', () => {
    const resolved = resolver.resolve(snapshotOf({ apiLevel: 29 }));

    expect(resolved.source).toBe('generic');
  });

  it('builds a generic profile from the lowest-risk native methods', () => {
    const resolved = resolver.resolve(snapshotOf({ vendorId: 0x05c6, productId: 0x1234, manufacturer: 'Unknown' }));

    expect(resolved.source).toBe('generic');
    expect(resolved.profile.modelName).toBe(GENERIC_MODEL_NAME);
    expect(resolved.profile.difficulty).toBe('expert');
    expect([...resolved.profile.declaredSuccessRate]).toEqual([['adb-setup-state-read', 50]]);
  });

  it('names the generic profile after the reported model', () => {
    const resolved = resolver.resolve(snapshotOf({ productId: 0x1234, model: 'SM-X000' }));

    expect(resolved.profile.modelName).toBe('SM-X000');
  });

  it('leaves the generic profile empty when nothing is native to the mode', () => {
    const resolved = resolver.resolve(snapshotOf({ vendorId: 0x05c6, productId: 0x9008, manufacturer: 'Unknown', mode: 'EmergencyDownload' }));

    expect(resolved.profile.supportedMethodNames.size).toBe(0);
  });
});

describe('applicability', () => {
  it('treats an unknown API level as in range', () => {
    expect(apiLevelInRange(undefined, { min: 30 })).toBe(true);
  });

  it('checks both bounds', () => {
    expect(apiLevelInRange(29, { min: 30, max: 33 })).toBe(false);
    expect(apiLevelInRange(34, { min: 30, max: 33 })).toBe(false);
    expect(apiLevelInRange(33, { min: 30, max: 33 })).toBe(true);
  });

  it('honours the manufacturer filter', () => {
    const handshake = MethodRegistry.fromFile(resolve(DATA_DIR, 'bypass-methods.json')).get('samsung-download-handshake');

    expect(handshake && appliesTo(handshake, snapshotOf())).toBe(true);
    expect(handshake && appliesTo(handshake, snapshotOf({ manufacturer: 'LG' }))).toBe(false);
  });
});
