import { describe, it, expect } from 'vitest';
import { TicketAllocator } from './TicketAllocator.js';
import { ILedgerRepository } from '../repositories/ILedgerRepository.js';
import { ComplaintRecord } from '../entities/Complaint.js';
import { complaintRecord } from '../../testing/helpers.js';

function ledgerWith(ticketIds: string[]): ILedgerRepository {
  const records: ComplaintRecord[] = ticketIds.map(ticketId => complaintRecord({ ticketId }));
  return {
    append: async () => undefined,
    findDuplicate: async () => ({ duplicate: false, ticketId: null }),
    updateStatus: async () => false,
    findByTicketId: async () => null,
    listAll: async () => records,
    listDepartment: async () => []
  };
}

describe('TicketAllocator', () => {
  it('starts at the configured start on an empty ledger', async () => {
    const allocator = new TicketAllocator(ledgerWith([]), 'TCKT', 1001);
    await allocator.initialize();

    expect(allocator.next()).toBe('TCKT1001');
    expect(allocator.next()).toBe('TCKT1002');
  });

  it('continues after the highest ID with the prefix', async () => {
    const allocator = new TicketAllocator(
      ledgerWith(['TCKT1003', 'TCKT1005', 'ABC9999', 'TCKTabc', '', ' TCKT1004 ']),
      'TCKT',
      1001
    );
    await allocator.initialize();

    expect(allocator.next()).toBe('TCKT1006');
  });

  it('keeps counting past the largest safe integer', async () => {
    const allocator = new TicketAllocator(ledgerWith(['TCKT9007199254740993']), 'TCKT', 1001);
    await allocator.initialize();

    expect(allocator.next()).toBe('TCKT9007199254740994');
    expect(allocator.next()).toBe('TCKT9007199254740995');
  });

  it('never seeds below start - 1', async () => {
    const allocator = new TicketAllocator(ledgerWith(['TCKT42']), 'TCKT', 1001);
    await allocator.initialize();

    expect(allocator.next()).toBe('TCKT1001');
  });

  it('does not reissue IDs after a restart', async () => {
    const first = new TicketAllocator(ledgerWith([]), 'TCKT', 1001);
    await first.initialize();
    const issued = [first.next(), first.next(), first.next()];

    const restarted = new TicketAllocator(ledgerWith(issued), 'TCKT', 1001);
    await restarted.initialize();

    expect(restarted.next()).toBe('TCKT1004');
  });

  it('issues strictly increasing, unique IDs', async () => {
    const allocator = new TicketAllocator(ledgerWith([]), 'TCKT', 1);
    await allocator.initialize();

    const numbers = Array.from({ length: 50 }, () => Number(allocator.next().slice(4)));
    expect(new Set(numbers).size).toBe(50);
    numbers.slice(1).forEach((n, i) => expect(n).toBeGreaterThan(numbers[i]));
  });

  it('refuses to allocate before initialize()', () => {
    const allocator = new TicketAllocator(ledgerWith([]), 'TCKT', 1001);
    expect(() => allocator.next()).toThrow('initialize()');
  });
});
