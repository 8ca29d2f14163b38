/**
 * Audit Sink
 *
 * Every attempt transition is appended as one JSON line. Each line carries
 * an HMAC over the previous line's digest and its own payload, so removing
 * or editing a record breaks the chain from that point on.
 */

import { appendFile, mkdir, readFile } from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import { dirname } from 'path';
import { createServiceLogger, type ServiceLogger } from '../logger';
import { errorMessage } from '../communication/errors';
import { GENESIS_DIGEST, chainDigest, digestsEqual } from '../../utils/crypto';
import type { AuditRecord } from '../../types/session';

const log = createServiceLogger('audit');

export interface AuditSink {
  append(record: AuditRecord): Promise<void>;
}

interface ChainedLine {
  record: AuditRecord;
  digest: string;
}

export class JsonlAuditSink implements AuditSink {
  private lastDigest?: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly secret: string
  ) {}

  /**
   * Appends are serialized so the chain order matches the file order.
   */
  append(record: AuditRecord): Promise<void> {
    const next = this.queue.then(() => this.write(record));
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async write(record: AuditRecord): Promise<void> {
    if (this.lastDigest === undefined) {
      await mkdir(dirname(this.filePath), { recursive: true });
      this.lastDigest = this.readTailDigest();
    }

    const payload = JSON.stringify(record);
    const digest = chainDigest(this.lastDigest, payload, this.secret);
    const line: ChainedLine = { record, digest };
    await appendFile(this.filePath, `${JSON.stringify(line)}\n`, 'utf8');
    this.lastDigest = digest;
  }

  private readTailDigest(): string {
    if (!existsSync(this.filePath)) {
      return GENESIS_DIGEST;
    }
    const lines = readFileSync(this.filePath, 'utf8').split('\n').filter(Boolean);
    const tail = lines[lines.length - 1];
    return tail ? parseLine(tail).digest : GENESIS_DIGEST;
  }
}

interface ParsedLine {
  /** The record exactly as it was hashed */
  payload: string;
  digest: string;
}

function parseLine(line: string): ParsedLine {
  const parsed: unknown = JSON.parse(line);
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'digest' in parsed &&
    typeof parsed.digest === 'string' &&
    'record' in parsed &&
    typeof parsed.record === 'object' &&
    parsed.record !== null
  ) {
    return { payload: JSON.stringify(parsed.record), digest: parsed.digest };
  }
  throw new Error('Malformed audit line');
}

export interface AuditVerification {
  valid: boolean;
  records: number;

  /** 1-based line of the first broken link */
  brokenAt?: number;
}

/**
 * Walk the chain and report the first line whose digest does not match.
 */
export async function verifyAuditLog(filePath: string, secret: string): Promise<AuditVerification> {
  const lines = (await readFile(filePath, 'utf8')).split('\n').filter(Boolean);
  let previous = GENESIS_DIGEST;

  for (let index = 0; index < lines.length; index++) {
    let entry: ParsedLine;
    try {
      entry = parseLine(lines[index]);
    } catch {
      return { valid: false, records: index, brokenAt: index + 1 };
    }

    const expected = chainDigest(previous, entry.payload, secret);
    if (!digestsEqual(expected, entry.digest)) {
      return { valid: false, records: index, brokenAt: index + 1 };
    }
    previous = entry.digest;
  }

  return { valid: true, records: lines.length };
}

// ============================================================================
// Fire-and-forget delivery
// ============================================================================

/**
 * Sends records without blocking the caller. Delivery failures are logged
 * and never reach the session; `drain()` waits for everything in flight.
 */
export class AuditTrail {
  private readonly pending = new Set<Promise<void>>();
  private readonly log: ServiceLogger;
  private failures = 0;

  constructor(
    private readonly sink: AuditSink,
    traceId?: string
  ) {
    this.log = traceId ? log.withTrace(traceId) : log;
  }

  get failureCount(): number {
    return this.failures;
  }

  emit(record: AuditRecord): void {
    const delivery = Promise.resolve()
      .then(() => this.sink.append(record))
      .catch((error: unknown) => {
        this.failures++;
        this.log.warn('audit_delivery_failed', errorMessage(error), undefined, {
          methodName: record.methodName,
          toState: record.toState
        });
      })
      .finally(() => {
        this.pending.delete(delivery);
      });
    this.pending.add(delivery);
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }
}
