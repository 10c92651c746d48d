import { join } from 'path';
import { ILedgerRepository } from '../../core/repositories/ILedgerRepository.js';
import {
  ComplaintRecord,
  DepartmentComplaintRecord,
  DuplicateCheck,
  UrgencyLevel
} from '../../core/entities/Complaint.js';
import { SessionIdentity } from '../../core/entities/Credential.js';
import { DEPARTMENT_LEDGER_FILES, Department, isDepartment } from '../../core/entities/Department.js';
import { LogSink } from '../logging/Logger.js';
import { formatTimestamp } from '../../utils/timestamp.js';
import { CsvRow, appendCsvRows, readCsv, writeCsv } from './CsvFile.js';
import { SerialQueue } from './SerialQueue.js';

export const LEDGER_HEADER = [
  'Username',
  'Password_Hash',
  'Name',
  'Mobile Number',
  'Location',
  'Complaint Type',
  'Complaint Description',
  'Ticket ID',
  'Status',
  'Ticket Alive',
  'Timestamp',
  'Last_Updated',
  'Assigned Department'
] as const;

export const DEPARTMENT_LEDGER_HEADER = [
  'Ticket ID',
  'Username',
  'Name',
  'Mobile Number',
  'Location',
  'Complaint Type',
  'Complaint Description',
  'Status',
  'Urgency Level',
  'Timestamp',
  'Last_Updated'
] as const;

type LedgerColumn = (typeof LEDGER_HEADER)[number];
type DepartmentLedgerColumn = (typeof DEPARTMENT_LEDGER_HEADER)[number];

const CREATED_COLUMN = 'Timestamp';
const UPDATED_COLUMN = 'Last_Updated';

/**
 * Flat-file ledger: one master file plus one file per department.
 *
 * Every mutation reads the whole file and rewrites it. Calls are run one
 * at a time through the repository's queue; there is no file locking, so
 * a single process must own the data directory. Master and department
 * writes are independent and are not rolled back together.
 */
export class CsvLedgerRepository implements ILedgerRepository {
  private readonly queue = new SerialQueue();

  constructor(
    private readonly masterPath: string,
    private readonly departmentDir: string,
    private readonly logger: LogSink,
    private readonly now: () => Date = () => new Date()
  ) {}

  append(record: ComplaintRecord, urgency: UrgencyLevel): Promise<void> {
    return this.queue.run(() => this.appendRecord(record, urgency));
  }

  findDuplicate(identity: SessionIdentity, complaintType: string): Promise<DuplicateCheck> {
    return this.queue.run(() => this.findDuplicateRecord(identity, complaintType));
  }

  updateStatus(ticketId: string, status: string, updatedAt: string): Promise<boolean> {
    return this.queue.run(() => this.updateRecordStatus(ticketId, status, updatedAt));
  }

  findByTicketId(ticketId: string): Promise<ComplaintRecord | null> {
    return this.queue.run(async () => {
      const records = await this.readAll();
      return records.find(record => record.ticketId.trim() === ticketId.trim()) ?? null;
    });
  }

  listAll(): Promise<ComplaintRecord[]> {
    return this.queue.run(() => this.readAll());
  }

  listDepartment(department: Department): Promise<DepartmentComplaintRecord[]> {
    return this.queue.run(async () => {
      const rows = await this.ensureHeader(this.departmentPath(department), DEPARTMENT_LEDGER_HEADER);
      return rows.map(fromDepartmentRow);
    });
  }

  private async appendRecord(record: ComplaintRecord, urgency: UrgencyLevel): Promise<void> {
    await this.loadMaster();
    await appendCsvRows(this.masterPath, [toLedgerRow(record)]);

    if (!isDepartment(record.assignedDepartment)) {
      this.logger.warn(`No department ledger for "${record.assignedDepartment}", ticket ${record.ticketId} kept in master only`);
      return;
    }

    const departmentPath = this.departmentPath(record.assignedDepartment);
    await this.ensureHeader(departmentPath, DEPARTMENT_LEDGER_HEADER);
    await appendCsvRows(departmentPath, [toDepartmentRow(projectToDepartment(record, urgency))]);
  }

  private async findDuplicateRecord(identity: SessionIdentity, complaintType: string): Promise<DuplicateCheck> {
    const username = identity.username.trim();
    const passwordHash = identity.passwordHash.trim();
    const type = complaintType.trim().toLowerCase();

    const match = (await this.readAll()).find(
      record =>
        record.username.trim() === username &&
        record.passwordHash.trim() === passwordHash &&
        record.complaintType.trim().toLowerCase() === type
    );

    return match
      ? { duplicate: true, ticketId: match.ticketId || 'Unknown' }
      : { duplicate: false, ticketId: null };
  }

  private async updateRecordStatus(ticketId: string, status: string, updatedAt: string): Promise<boolean> {
    const records = await this.readAll();
    const index = records.findIndex(record => record.ticketId.trim() === ticketId.trim());
    if (index === -1) {
      return false;
    }

    const updated: ComplaintRecord = { ...records[index], status, lastUpdatedAt: updatedAt };
    records[index] = updated;
    await writeCsv(this.masterPath, LEDGER_HEADER, records.map(toLedgerRow));

    const department = updated.assignedDepartment;
    if (!isDepartment(department)) {
      this.logger.warn(`Ticket ${ticketId} has no known department ("${department}"), master ledger updated only`);
      return true;
    }

    const departmentPath = this.departmentPath(department);
    const departmentRecords = (await this.ensureHeader(departmentPath, DEPARTMENT_LEDGER_HEADER)).map(
      fromDepartmentRow
    );
    const departmentIndex = departmentRecords.findIndex(record => record.ticketId.trim() === ticketId.trim());
    if (departmentIndex === -1) {
      this.logger.warn(`Ticket ${ticketId} missing from ${department} ledger, master ledger updated only`);
      return true;
    }

    departmentRecords[departmentIndex] = {
      ...departmentRecords[departmentIndex],
      status,
      lastUpdatedAt: updatedAt
    };
    await writeCsv(departmentPath, DEPARTMENT_LEDGER_HEADER, departmentRecords.map(toDepartmentRow));

    return true;
  }

  private async readAll(): Promise<ComplaintRecord[]> {
    return (await this.loadMaster()).map(fromLedgerRow);
  }

  private departmentPath(department: Department): string {
    return join(this.departmentDir, DEPARTMENT_LEDGER_FILES[department]);
  }

  private loadMaster(): Promise<string[][]> {
    return this.ensureHeader(this.masterPath, LEDGER_HEADER);
  }

  /**
   * Create the file with its header if missing. If the header on disk
   * differs, map the existing rows by column name into the canonical
   * header, backfill Last_Updated from Timestamp, and rewrite the file.
   *
   * @returns data rows in canonical column order
   */
  private async ensureHeader(path: string, header: CsvRow): Promise<string[][]> {
    const rows = await readCsv(path);

    if (rows === null || rows.length === 0) {
      await writeCsv(path, header, []);
      return [];
    }

    const [existingHeader, ...records] = rows;
    if (sameColumns(existingHeader, header)) {
      return records;
    }

    const fallbackTimestamp = formatTimestamp(this.now());
    const columns = existingHeader.map(column => column.trim());
    const normalized = records.map(record => {
      const byName = new Map<string, string>();
      columns.forEach((column, i) => byName.set(column, record[i] ?? ''));

      return header.map(column => {
        const value = byName.get(column) ?? '';
        if (column === UPDATED_COLUMN && !value) {
          return byName.get(CREATED_COLUMN) || fallbackTimestamp;
        }
        return value;
      });
    });

    await writeCsv(path, header, normalized);
    this.logger.warn(`Normalized ${normalized.length} rows of ${path} to the current header`, {
      previousHeader: existingHeader
    });

    return normalized;
  }
}

function sameColumns(actual: readonly string[], expected: CsvRow): boolean {
  return actual.length === expected.length && actual.every((column, i) => column === expected[i]);
}

function cell(row: readonly string[], index: number): string {
  return index < row.length ? row[index] : '';
}

function projectToDepartment(record: ComplaintRecord, urgency: UrgencyLevel): DepartmentComplaintRecord {
  return {
    ticketId: record.ticketId,
    username: record.username,
    name: record.name,
    mobileNumber: record.mobileNumber,
    location: record.location,
    complaintType: record.complaintType,
    complaintDescription: record.complaintDescription,
    status: record.status,
    urgencyLevel: urgency,
    createdAt: record.createdAt,
    lastUpdatedAt: record.lastUpdatedAt
  };
}

// Column ↔ field mapping, in header order

const LEDGER_FIELDS: Record<LedgerColumn, keyof ComplaintRecord> = {
  'Username': 'username',
  'Password_Hash': 'passwordHash',
  'Name': 'name',
  'Mobile Number': 'mobileNumber',
  'Location': 'location',
  'Complaint Type': 'complaintType',
  'Complaint Description': 'complaintDescription',
  'Ticket ID': 'ticketId',
  'Status': 'status',
  'Ticket Alive': 'ticketAlive',
  'Timestamp': 'createdAt',
  'Last_Updated': 'lastUpdatedAt',
  'Assigned Department': 'assignedDepartment'
};

const DEPARTMENT_FIELDS: Record<DepartmentLedgerColumn, keyof DepartmentComplaintRecord> = {
  'Ticket ID': 'ticketId',
  'Username': 'username',
  'Name': 'name',
  'Mobile Number': 'mobileNumber',
  'Location': 'location',
  'Complaint Type': 'complaintType',
  'Complaint Description': 'complaintDescription',
  'Status': 'status',
  'Urgency Level': 'urgencyLevel',
  'Timestamp': 'createdAt',
  'Last_Updated': 'lastUpdatedAt'
};

function toLedgerRow(record: ComplaintRecord): string[] {
  return LEDGER_HEADER.map(column => record[LEDGER_FIELDS[column]]);
}

function toDepartmentRow(record: DepartmentComplaintRecord): string[] {
  return DEPARTMENT_LEDGER_HEADER.map(column => record[DEPARTMENT_FIELDS[column]]);
}

function fromLedgerRow(row: readonly string[]): ComplaintRecord {
  return {
    username: cell(row, 0),
    passwordHash: cell(row, 1),
    name: cell(row, 2),
    mobileNumber: cell(row, 3),
    location: cell(row, 4),
    complaintType: cell(row, 5),
    complaintDescription: cell(row, 6),
    ticketId: cell(row, 7),
    status: cell(row, 8),
    ticketAlive: cell(row, 9),
    createdAt: cell(row, 10),
    lastUpdatedAt: cell(row, 11),
    assignedDepartment: cell(row, 12)
  };
}

function fromDepartmentRow(row: readonly string[]): DepartmentComplaintRecord {
  return {
    ticketId: cell(row, 0),
    username: cell(row, 1),
    name: cell(row, 2),
    mobileNumber: cell(row, 3),
    location: cell(row, 4),
    complaintType: cell(row, 5),
    complaintDescription: cell(row, 6),
    status: cell(row, 7),
    urgencyLevel: cell(row, 8),
    createdAt: cell(row, 9),
    lastUpdatedAt: cell(row, 10)
  };
}
