import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { FatalError, errnoCode, formatZodIssues, toOrchestratorError, type OrchestratorError } from '../errors/index.js';

/**
 * Durable record of side effects keyed by `conversation_id:epoch:stage`.
 * A key is claimed before the effect runs and committed afterwards, so a
 * resumed or replayed step never repeats a committed send or booking.
 */
const LedgerEntrySchema = z.object({
  key: z.string(),
  status: z.enum(['pending', 'committed', 'failed']),
  claimed_at: z.string(),
  settled_at: z.string().nullable(),
  receipt: z.object({ id: z.string(), link: z.string().nullable() }).nullable(),
  error: z.string().nullable(),
});

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

export interface DeliveryReceipt {
  id: string;
  link: string | null;
}

export type ClaimResult = { claimed: true } | { claimed: false; entry: LedgerEntry };

export interface DeliveryLedger {
  claim(key: string, at: Date): Promise<ClaimResult>;
  commit(key: string, receipt: DeliveryReceipt, at: Date): Promise<void>;
  fail(key: string, message: string, at: Date): Promise<void>;
  get(key: string): Promise<LedgerEntry | null>;
}

function pendingEntry(key: string, at: Date): LedgerEntry {
  return { key, status: 'pending', claimed_at: at.toISOString(), settled_at: null, receipt: null, error: null };
}

// ============================================
// In-memory ledger
// ============================================

export class InMemoryDeliveryLedger implements DeliveryLedger {
  private readonly entries: Map<string, LedgerEntry> = new Map();

  async claim(key: string, at: Date): Promise<ClaimResult> {
    const existing = this.entries.get(key);
    if (existing && existing.status !== 'failed') {
      return { claimed: false, entry: { ...existing } };
    }
    this.entries.set(key, pendingEntry(key, at));
    return { claimed: true };
  }

  async commit(key: string, receipt: DeliveryReceipt, at: Date): Promise<void> {
    this.entries.set(key, { ...this.require(key), status: 'committed', settled_at: at.toISOString(), receipt });
  }

  async fail(key: string, message: string, at: Date): Promise<void> {
    this.entries.set(key, { ...this.require(key), status: 'failed', settled_at: at.toISOString(), error: message });
  }

  async get(key: string): Promise<LedgerEntry | null> {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : null;
  }

  private require(key: string): LedgerEntry {
    const entry = this.entries.get(key);
    if (!entry) {
      throw new FatalError(`Ledger key ${key} was never claimed`);
    }
    return entry;
  }
}

// ============================================
// File ledger
// ============================================

export class FileDeliveryLedger implements DeliveryLedger {
  constructor(private readonly dir: string) {}

  async claim(key: string, at: Date): Promise<ClaimResult> {
    await fs.mkdir(this.dir, { recursive: true });
    const path = this.pathFor(key);
    try {
      // 'wx' fails when the file exists, which makes the claim atomic
      await fs.writeFile(path, JSON.stringify(pendingEntry(key, at)), { flag: 'wx' });
      return { claimed: true };
    } catch (error) {
      if (errnoCode(error) !== 'EEXIST') {
        throw error;
      }
    }

    const existing = await this.read(path);
    if (existing.status === 'failed') {
      await this.write(pendingEntry(key, at));
      return { claimed: true };
    }
    return { claimed: false, entry: existing };
  }

  async commit(key: string, receipt: DeliveryReceipt, at: Date): Promise<void> {
    const entry = await this.read(this.pathFor(key));
    await this.write({ ...entry, status: 'committed', settled_at: at.toISOString(), receipt });
  }

  async fail(key: string, message: string, at: Date): Promise<void> {
    const entry = await this.read(this.pathFor(key));
    await this.write({ ...entry, status: 'failed', settled_at: at.toISOString(), error: message });
  }

  async get(key: string): Promise<LedgerEntry | null> {
    try {
      return await this.read(this.pathFor(key));
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  private pathFor(key: string): string {
    const digest = createHash('sha256').update(key).digest('hex');
    return join(this.dir, `${digest}.json`);
  }

  private async read(path: string): Promise<LedgerEntry> {
    const raw: unknown = JSON.parse(await fs.readFile(path, 'utf-8'));
    const result = LedgerEntrySchema.safeParse(raw);
    if (!result.success) {
      throw new FatalError(`Corrupt ledger entry ${path}`, formatZodIssues(result.error));
    }
    return result.data;
  }

  private async write(entry: LedgerEntry): Promise<void> {
    const path = this.pathFor(entry.key);
    const tmp = `${path}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(entry));
    await fs.rename(tmp, path);
  }
}

// ============================================
// Dispatch
// ============================================

export type DispatchOutcome =
  | { kind: 'sent'; receipt: DeliveryReceipt }
  | { kind: 'replayed'; receipt: DeliveryReceipt }
  | { kind: 'unknown'; claimed_at: string }
  | { kind: 'failed'; error: OrchestratorError };

/**
 * Run a side effect at most once per key. A claim still pending from an
 * earlier run means the outcome is unknown, and the effect is not retried.
 */
export async function dispatchOnce(
  ledger: DeliveryLedger,
  key: string,
  at: Date,
  effect: () => Promise<DeliveryReceipt>,
): Promise<DispatchOutcome> {
  const claim = await ledger.claim(key, at);
  if (!claim.claimed) {
    if (claim.entry.status === 'committed' && claim.entry.receipt) {
      return { kind: 'replayed', receipt: claim.entry.receipt };
    }
    return { kind: 'unknown', claimed_at: claim.entry.claimed_at };
  }

  let receipt: DeliveryReceipt;
  try {
    receipt = await effect();
  } catch (error) {
    const cause = toOrchestratorError(error);
    await ledger.fail(key, cause.message, at);
    return { kind: 'failed', error: cause };
  }

  await ledger.commit(key, receipt, at);
  return { kind: 'sent', receipt };
}
