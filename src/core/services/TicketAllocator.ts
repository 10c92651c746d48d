import { ILedgerRepository } from '../repositories/ILedgerRepository.js';

/**
 * Mints ticket IDs as prefix + increasing integer.
 *
 * The counter is a bigint, so suffixes past Number.MAX_SAFE_INTEGER keep
 * increasing. It lives in this process only and is seeded once from the
 * highest ID already in the ledger. Not safe across processes: two
 * servers sharing a data directory would issue the same IDs.
 */
export class TicketAllocator {
  private counter: bigint;
  private initialized = false;

  constructor(
    private readonly ledger: ILedgerRepository,
    private readonly prefix: string,
    private readonly start: number
  ) {
    this.counter = BigInt(start) - 1n;
  }

  /**
   * Seed from the ledger: highest numeric suffix behind the prefix,
   * never below start - 1
   */
  async initialize(): Promise<void> {
    const records = await this.ledger.listAll();
    let max = BigInt(this.start) - 1n;

    for (const record of records) {
      const suffix = parseSuffix(record.ticketId.trim(), this.prefix);
      if (suffix !== null && suffix > max) {
        max = suffix;
      }
    }

    this.counter = max;
    this.initialized = true;
  }

  next(): string {
    if (!this.initialized) {
      throw new Error('TicketAllocator.initialize() must run before next()');
    }
    this.counter += 1n;
    return `${this.prefix}${this.counter}`;
  }
}

function parseSuffix(ticketId: string, prefix: string): bigint | null {
  if (!ticketId.startsWith(prefix)) {
    return null;
  }
  const suffix = ticketId.slice(prefix.length);
  return /^\d+$/.test(suffix) ? BigInt(suffix) : null;
}
