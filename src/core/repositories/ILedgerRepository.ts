import {
  ComplaintRecord,
  DepartmentComplaintRecord,
  DuplicateCheck,
  UrgencyLevel
} from '../entities/Complaint.js';
import { SessionIdentity } from '../entities/Credential.js';
import { Department } from '../entities/Department.js';

/**
 * Ledger Repository Interface
 * Master complaint ledger plus one mirrored ledger per department.
 * The two writes of append/updateStatus are independent: a crash
 * between them leaves the department ledger behind the master.
 */
export interface ILedgerRepository {
  /**
   * Append to the master ledger, then mirror into the department ledger
   */
  append(record: ComplaintRecord, urgency: UrgencyLevel): Promise<void>;

  /**
   * Same identity with a complaint of the same type (case-insensitive)
   */
  findDuplicate(identity: SessionIdentity, complaintType: string): Promise<DuplicateCheck>;

  /**
   * Rewrite status and last-updated in master and department ledgers
   * @returns whether the ticket was found in the master ledger
   */
  updateStatus(ticketId: string, status: string, updatedAt: string): Promise<boolean>;

  findByTicketId(ticketId: string): Promise<ComplaintRecord | null>;

  listAll(): Promise<ComplaintRecord[]>;

  listDepartment(department: Department): Promise<DepartmentComplaintRecord[]>;
}
