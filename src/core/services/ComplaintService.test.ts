import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { ComplaintService, summarize } from './ComplaintService.js';
import { ComplaintClassifier } from './ComplaintClassifier.js';
import { TicketAllocator } from './TicketAllocator.js';
import { ComplaintIntake, ComplaintStatus, UrgencyLevel } from '../entities/Complaint.js';
import { Department } from '../entities/Department.js';
import { CsvLedgerRepository } from '../../infrastructure/storage/CsvLedgerRepository.js';
import { DuplicateComplaintError, ValidationError } from '../../infrastructure/errors/ComplaintDeskError.js';
import {
  InMemorySessionStore,
  makeTempDir,
  manualClock,
  removeTempDir,
  silentLogger
} from '../../testing/helpers.js';

const INTAKE: ComplaintIntake = {
  name: 'Asha',
  mobileNumber: '98765 43210',
  location: 'Ward 4',
  complaintType: 'water leakage',
  complaintDescription: 'urgent pipe burst'
};

describe('summarize', () => {
  it('keeps descriptions up to 100 characters whole', () => {
    expect(summarize('road damage', 'x'.repeat(100))).toBe(`road damage: ${'x'.repeat(100)}`);
  });

  it('cuts longer descriptions and marks the cut', () => {
    expect(summarize('road damage', 'y'.repeat(101))).toBe(`road damage: ${'y'.repeat(100)}...`);
  });
});

describe('ComplaintService', () => {
  let dir: string;
  let ledger: CsvLedgerRepository;
  let sessions: InMemorySessionStore;
  let service: ComplaintService;
  const clock = manualClock(new Date(2026, 0, 2, 10, 0, 0));

  beforeEach(async () => {
    dir = await makeTempDir();
    clock.set(new Date(2026, 0, 2, 10, 0, 0));
    ledger = new CsvLedgerRepository(join(dir, 'complaints.csv'), dir, silentLogger(), clock.now);
    sessions = new InMemorySessionStore({ username: 'alice', passwordHash: 'hash-1' });

    const allocator = new TicketAllocator(ledger, 'TCKT', 1001);
    await allocator.initialize();
    service = new ComplaintService(ledger, allocator, new ComplaintClassifier(), sessions, silentLogger(), clock.now);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('submit', () => {
    it('classifies, allocates a ticket and records the complaint', async () => {
      const ticket = await service.submit(INTAKE);

      expect(ticket).toEqual({
        ticketId: 'TCKT1001',
        citizenName: 'Asha',
        mobileNumber: '98765 43210',
        location: 'Ward 4',
        complaintCategory: 'water leakage',
        urgencyLevel: UrgencyLevel.HIGH,
        summary: 'water leakage: urgent pipe burst',
        assignedDepartment: Department.WATER,
        status: ComplaintStatus.OPEN,
        submittedAt: '2026-01-02 10:00:00'
      });
      expect(await service.getComplaint('TCKT1001')).toEqual({
        username: 'alice',
        passwordHash: 'hash-1',
        name: 'Asha',
        mobileNumber: '98765 43210',
        location: 'Ward 4',
        complaintType: 'water leakage',
        complaintDescription: 'urgent pipe burst',
        ticketId: 'TCKT1001',
        status: 'Open',
        ticketAlive: 'Yes',
        createdAt: '2026-01-02 10:00:00',
        lastUpdatedAt: '2026-01-02 10:00:00',
        assignedDepartment: 'Water Department'
      });
      expect(await service.listDepartment(Department.WATER)).toHaveLength(1);
    });

    it('refuses a second complaint of the same type from the same identity', async () => {
      await service.submit(INTAKE);

      const attempt = service.submit({ ...INTAKE, complaintType: 'Water Leakage', complaintDescription: 'still leaking' });

      await expect(attempt).rejects.toBeInstanceOf(DuplicateComplaintError);
      await expect(attempt).rejects.toThrow(
        'You have already registered a complaint of this type. Existing Ticket ID: TCKT1001'
      );
      expect(await ledger.listAll()).toHaveLength(1);
    });

    it('lets only one of two simultaneous same-type submissions through', async () => {
      const results = await Promise.allSettled([service.submit(INTAKE), service.submit(INTAKE)]);

      expect(results[0].status).toBe('fulfilled');
      expect(results[1]).toEqual({ status: 'rejected', reason: expect.any(DuplicateComplaintError) });
      expect(await ledger.listAll()).toHaveLength(1);
      expect(await service.listDepartment(Department.WATER)).toHaveLength(1);
    });

    it('issues distinct tickets to simultaneous submissions of different types', async () => {
      const types = ['water leakage', 'road damage', 'tax query', 'health camp', 'school education'];

      const tickets = await Promise.all(
        types.map(complaintType => service.submit({ ...INTAKE, complaintType }))
      );

      expect(tickets.map(ticket => ticket.ticketId)).toEqual(['TCKT1001', 'TCKT1002', 'TCKT1003', 'TCKT1004', 'TCKT1005']);
      expect((await ledger.listAll()).map(record => record.complaintType)).toEqual(types);
    });

    it('accepts a different type from the same identity', async () => {
      await service.submit(INTAKE);

      const ticket = await service.submit({ ...INTAKE, complaintType: 'road damage', complaintDescription: 'pothole' });

      expect(ticket.ticketId).toBe('TCKT1002');
      expect(ticket.assignedDepartment).toBe(Department.PUBLIC_WORKS);
      expect(ticket.urgencyLevel).toBe(UrgencyLevel.MEDIUM);
    });

    it('files under the placeholder identity when nobody is logged in', async () => {
      await sessions.clear();

      await service.submit(INTAKE);
      await service.submit(INTAKE);

      const records = await ledger.listAll();
      expect(records.map(record => [record.username, record.passwordHash, record.ticketId])).toEqual([
        ['N/A', 'N/A', 'TCKT1001'],
        ['N/A', 'N/A', 'TCKT1002']
      ]);
    });

    it('validates every field before touching the ledger', async () => {
      await expect(service.submit({ ...INTAKE, location: '  ' })).rejects.toThrow('Please provide Location.');
      await expect(service.submit({ ...INTAKE, mobileNumber: '12345' })).rejects.toBeInstanceOf(ValidationError);
      expect(await ledger.listAll()).toEqual([]);
    });
  });

  describe('updateStatus', () => {
    it('stamps a newer Last_Updated and keeps the creation time', async () => {
      await service.submit(INTAKE);
      clock.set(new Date(2026, 0, 2, 10, 5, 0));

      expect(await service.updateStatus('TCKT1001', ComplaintStatus.IN_PROGRESS)).toBe(true);

      const complaint = await service.getComplaint('TCKT1001');
      expect(complaint?.status).toBe('In Progress');
      expect(complaint?.createdAt).toBe('2026-01-02 10:00:00');
      expect(complaint?.lastUpdatedAt).toBe('2026-01-02 10:05:00');
      const [row] = await service.listDepartment(Department.WATER);
      expect(row.status).toBe('In Progress');
    });

    it('returns false for an unknown ticket', async () => {
      expect(await service.updateStatus('TCKT4242', ComplaintStatus.CLOSED)).toBe(false);
    });
  });

  it('previews classification without filing', async () => {
    expect(service.classify('electricity', 'sparks from the pole, fire risk')).toEqual({
      department: Department.ELECTRICAL,
      urgency: UrgencyLevel.HIGH
    });
    expect(await ledger.listAll()).toEqual([]);
  });
});
