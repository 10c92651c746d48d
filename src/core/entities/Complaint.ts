import { Department } from './Department.js';

/**
 * Complaint Entity - one row of the master ledger
 */
export interface ComplaintRecord {
  readonly username: string;
  readonly passwordHash: string;
  readonly name: string;
  readonly mobileNumber: string;
  readonly location: string;
  readonly complaintType: string;
  readonly complaintDescription: string;
  readonly ticketId: string;
  readonly status: string;
  readonly ticketAlive: string;
  readonly createdAt: string;
  readonly lastUpdatedAt: string;
  readonly assignedDepartment: string;
}

/**
 * Department Complaint - denormalized projection kept in each department ledger
 */
export interface DepartmentComplaintRecord {
  readonly ticketId: string;
  readonly username: string;
  readonly name: string;
  readonly mobileNumber: string;
  readonly location: string;
  readonly complaintType: string;
  readonly complaintDescription: string;
  readonly status: string;
  readonly urgencyLevel: string;
  readonly createdAt: string;
  readonly lastUpdatedAt: string;
}

/**
 * The five fields collected by the intake flow
 */
export interface ComplaintIntake {
  readonly name: string;
  readonly mobileNumber: string;
  readonly location: string;
  readonly complaintType: string;
  readonly complaintDescription: string;
}

/**
 * Confirmation returned once a complaint is filed
 */
export interface Ticket {
  readonly ticketId: string;
  readonly citizenName: string;
  readonly mobileNumber: string;
  readonly location: string;
  readonly complaintCategory: string;
  readonly urgencyLevel: UrgencyLevel;
  readonly summary: string;
  readonly assignedDepartment: Department;
  readonly status: ComplaintStatus;
  readonly submittedAt: string;
}

export interface Classification {
  readonly department: Department;
  readonly urgency: UrgencyLevel;
}

export interface DuplicateCheck {
  readonly duplicate: boolean;
  readonly ticketId: string | null;
}

export enum ComplaintStatus {
  OPEN = 'Open',
  IN_PROGRESS = 'In Progress',
  RESOLVED = 'Resolved',
  CLOSED = 'Closed'
}

export enum UrgencyLevel {
  LOW = 'Low',
  MEDIUM = 'Medium',
  HIGH = 'High'
}
