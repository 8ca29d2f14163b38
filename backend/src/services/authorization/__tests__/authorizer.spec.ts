import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileAuthorizationRegistry, StaticAuthorizer } from '../authorizer';
import { CatalogError } from '../../bypass/errors';

describe('FileAuthorizationRegistry', () => {
  const now = () => new Date('2024-06-01T12:00:00.000Z');
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'authz-'));
    file = join(dir, 'authorizations.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const write = (content: unknown) => writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));

  it('denies everything when the file is missing', async () => {
    const registry = new FileAuthorizationRegistry(file, now);

    await expect(registry.checkAuthorized('R58N12ABCDE')).resolves.toBe(false);
  });

  it('allows listed serials only', async () => {
    write({ authorizations: [{ serial: 'R58N12ABCDE', reference: 'WO-1001' }] });
    const registry = new FileAuthorizationRegistry(file, now);

    await expect(registry.checkAuthorized('R58N12ABCDE')).resolves.toBe(true);
    await expect(registry.checkAuthorized('OTHER')).resolves.toBe(false);
  });

  it('denies an expired authorization', async () => {
    write({
      authorizations: [
        { serial: 'R58N12ABCDE', reference: 'WO-1001', expiresAt: '2024-06-01T11:59:59.000Z' },
        { serial: 'ZY22FRESH', reference: 'WO-1002', expiresAt: '2024-06-02T00:00:00.000Z' }
      ]
    });
    const registry = new FileAuthorizationRegistry(file, now);

    await expect(registry.checkAuthorized('R58N12ABCDE')).resolves.toBe(false);
    await expect(registry.checkAuthorized('ZY22FRESH')).resolves.toBe(true);
  });

  it('picks up changes without a restart', async () => {
    const registry = new FileAuthorizationRegistry(file, now);
    await expect(registry.checkAuthorized('R58N12ABCDE')).resolves.toBe(false);

    write({ authorizations: [{ serial: 'R58N12ABCDE', reference: 'WO-1001' }] });

    await expect(registry.checkAuthorized('R58N12ABCDE')).resolves.toBe(true);
  });

  it('rejects entries without a reference', async () => {
    write({ authorizations: [{ serial: 'R58N12ABCDE', reference: '' }] });
    const registry = new FileAuthorizationRegistry(file, now);

    await expect(registry.checkAuthorized('R58N12ABCDE')).rejects.toThrow(
      'Invalid authorizations file: authorizations.0.reference: Authorization reference required'
    );
  });

  it('rejects unreadable JSON', async () => {
    write('{');
    const registry = new FileAuthorizationRegistry(file, now);

    await expect(registry.checkAuthorized('R58N12ABCDE')).rejects.toBeInstanceOf(CatalogError);
  });
});

describe('StaticAuthorizer', () => {
  it('allows exactly the given serials', async () => {
    const authorizer = new StaticAuthorizer(['A']);

    await expect(authorizer.checkAuthorized('A')).resolves.toBe(true);
    await expect(authorizer.checkAuthorized('B')).resolves.toBe(false);
  });
});
