import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi } from 'vitest';
import { ComplaintRecord } from '../core/entities/Complaint.js';
import { SessionIdentity } from '../core/entities/Credential.js';
import { ISessionStore } from '../core/repositories/ISessionStore.js';
import { LogSink } from '../infrastructure/logging/Logger.js';

export const TEST_SALT = 'test-salt';
export const TEST_ITERATIONS = 100_000;

export function silentLogger(): LogSink {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'complaint-desk-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Clock that only moves when told to
 */
export function manualClock(start: Date) {
  let current = start;
  return {
    now: () => current,
    set(next: Date) {
      current = next;
    }
  };
}

export function complaintRecord(overrides: Partial<ComplaintRecord> = {}): ComplaintRecord {
  return {
    username: 'alice',
    passwordHash: 'hash-1',
    name: 'Asha',
    mobileNumber: '9876543210',
    location: 'Ward 4',
    complaintType: 'water leakage',
    complaintDescription: 'urgent pipe burst',
    ticketId: 'TCKT1001',
    status: 'Open',
    ticketAlive: 'Yes',
    createdAt: '2026-01-02 10:00:00',
    lastUpdatedAt: '2026-01-02 10:00:00',
    assignedDepartment: 'Water Department',
    ...overrides
  };
}

export class InMemorySessionStore implements ISessionStore {
  constructor(private identity: SessionIdentity | null = null) {}

  async write(identity: SessionIdentity): Promise<void> {
    this.identity = identity;
  }

  async read(): Promise<SessionIdentity | null> {
    return this.identity;
  }

  async clear(): Promise<void> {
    this.identity = null;
  }
}
