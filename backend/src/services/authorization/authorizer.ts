/**
 * Authorization gate consulted before any session starts.
 */

import { existsSync, readFileSync } from 'fs';
import { createServiceLogger } from '../logger';
import { CatalogError, errorMessage } from '../bypass/errors';
import { authorizationFileSchema, formatIssues, type AuthorizationEntry } from '../../utils/validation/catalogSchemas';

const log = createServiceLogger('authorization');

export interface Authorizer {
  checkAuthorized(serial: string): Promise<boolean>;
}

/**
 * Authorizations recorded in a JSON file, one entry per serial with an
 * operator reference and an optional expiry. A missing file denies all.
 */
export class FileAuthorizationRegistry implements Authorizer {
  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async checkAuthorized(serial: string): Promise<boolean> {
    const entry = this.load().find(candidate => candidate.serial === serial);
    if (!entry) {
      log.warn('authorization_missing', `No authorization on file for ${serial}`, undefined, { serial });
      return false;
    }

    if (entry.expiresAt && new Date(entry.expiresAt).getTime() <= this.now().getTime()) {
      log.warn('authorization_expired', `Authorization ${entry.reference} expired`, undefined, {
        serial,
        expiresAt: entry.expiresAt
      });
      return false;
    }

    log.info('authorization_granted', `Authorized by ${entry.reference}`, undefined, { serial });
    return true;
  }

  private load(): AuthorizationEntry[] {
    if (!existsSync(this.filePath)) {
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf8'));
    } catch (error) {
      throw new CatalogError(
        `Cannot read authorizations: ${errorMessage(error)}`,
        this.filePath
      );
    }

    const parsed = authorizationFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CatalogError(`Invalid authorizations file: ${formatIssues(parsed.error)}`, this.filePath);
    }
    return parsed.data.authorizations;
  }
}

/**
 * Fixed allow-list, for embedding and tests
 */
export class StaticAuthorizer implements Authorizer {
  private readonly allowed: ReadonlySet<string>;

  constructor(serials: Iterable<string>) {
    this.allowed = new Set(serials);
  }

  async checkAuthorized(serial: string): Promise<boolean> {
    return this.allowed.has(serial);
  }
}
