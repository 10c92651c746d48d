import { ILedgerRepository } from '../repositories/ILedgerRepository.js';
import { ISessionStore } from '../repositories/ISessionStore.js';
import {
  Classification,
  ComplaintIntake,
  ComplaintRecord,
  ComplaintStatus,
  DepartmentComplaintRecord,
  Ticket
} from '../entities/Complaint.js';
import { SessionIdentity } from '../entities/Credential.js';
import { Department } from '../entities/Department.js';
import { ComplaintClassifier } from './ComplaintClassifier.js';
import { TicketAllocator } from './TicketAllocator.js';
import { INTAKE_QUESTIONS, validateAnswer } from './IntakeSession.js';
import { DuplicateComplaintError, ValidationError } from '../../infrastructure/errors/ComplaintDeskError.js';
import { LogSink } from '../../infrastructure/logging/Logger.js';
import { SerialQueue } from '../../infrastructure/storage/SerialQueue.js';
import { SUMMARY_DESCRIPTION_LIMIT, UNKNOWN_IDENTITY } from '../../constants.js';
import { formatTimestamp } from '../../utils/timestamp.js';

/**
 * Complaint Service - Business Logic Layer
 * Duplicate check, classification, ticket allocation and persistence
 */
export class ComplaintService {
  // Duplicate check, allocation and append run as one step per submission
  private readonly submissions = new SerialQueue();

  constructor(
    private readonly ledger: ILedgerRepository,
    private readonly allocator: TicketAllocator,
    private readonly classifier: ComplaintClassifier,
    private readonly sessions: ISessionStore,
    private readonly logger: LogSink,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * File a complaint under the handed-off identity
   *
   * @throws ValidationError if a field is missing or invalid
   * @throws DuplicateComplaintError if this identity already filed this complaint type
   */
  async submit(intake: ComplaintIntake): Promise<Ticket> {
    this.validate(intake);
    return this.submissions.run(() => this.file(intake));
  }

  private async file(intake: ComplaintIntake): Promise<Ticket> {
    const identity = await this.identity();
    if (identity) {
      const existing = await this.ledger.findDuplicate(identity, intake.complaintType);
      if (existing.duplicate) {
        const ticketId = existing.ticketId ?? 'Unknown';
        this.logger.info(`Duplicate "${intake.complaintType}" complaint from ${identity.username}, existing ticket ${ticketId}`);
        throw new DuplicateComplaintError(ticketId, intake.complaintType);
      }
    } else {
      this.logger.warn('No session identity; complaint filed with placeholder identity');
    }

    const { department, urgency } = this.classifier.classify(intake.complaintType, intake.complaintDescription);
    const ticketId = this.allocator.next();
    const timestamp = formatTimestamp(this.now());

    const record: ComplaintRecord = {
      username: identity ? identity.username : UNKNOWN_IDENTITY,
      passwordHash: identity ? identity.passwordHash : UNKNOWN_IDENTITY,
      name: intake.name,
      mobileNumber: intake.mobileNumber,
      location: intake.location,
      complaintType: intake.complaintType,
      complaintDescription: intake.complaintDescription,
      ticketId,
      status: ComplaintStatus.OPEN,
      ticketAlive: 'Yes',
      createdAt: timestamp,
      lastUpdatedAt: timestamp,
      assignedDepartment: department
    };

    await this.ledger.append(record, urgency);
    this.logger.info(`Filed ${ticketId} → ${department} (${urgency})`);

    return {
      ticketId,
      citizenName: intake.name,
      mobileNumber: intake.mobileNumber,
      location: intake.location,
      complaintCategory: intake.complaintType,
      urgencyLevel: urgency,
      summary: summarize(intake.complaintType, intake.complaintDescription),
      assignedDepartment: department,
      status: ComplaintStatus.OPEN,
      submittedAt: timestamp
    };
  }

  /**
   * @returns false when no complaint carries this ticket ID
   */
  async updateStatus(ticketId: string, status: ComplaintStatus): Promise<boolean> {
    const updated = await this.ledger.updateStatus(ticketId, status, formatTimestamp(this.now()));
    if (updated) {
      this.logger.info(`Ticket ${ticketId} set to ${status}`);
    } else {
      this.logger.warn(`Status update for unknown ticket ${ticketId}`);
    }
    return updated;
  }

  getComplaint(ticketId: string): Promise<ComplaintRecord | null> {
    return this.ledger.findByTicketId(ticketId);
  }

  listDepartment(department: Department): Promise<DepartmentComplaintRecord[]> {
    return this.ledger.listDepartment(department);
  }

  classify(complaintType: string, description: string): Classification {
    return this.classifier.classify(complaintType, description);
  }

  /**
   * Identity from the session handoff; an empty username counts as none
   */
  private async identity(): Promise<SessionIdentity | null> {
    const identity = await this.sessions.read();
    return identity && identity.username.trim() && identity.passwordHash.trim() ? identity : null;
  }

  private validate(intake: ComplaintIntake): void {
    for (const question of INTAKE_QUESTIONS) {
      const value = intake[question.field];
      if (!value || !value.trim()) {
        throw new ValidationError(`Please provide ${question.label}.`, question.label);
      }
      const problem = validateAnswer(question.field, value);
      if (problem) {
        throw new ValidationError(problem, question.label);
      }
    }
  }
}

/**
 * `type: description`, description cut at the summary limit
 */
export function summarize(complaintType: string, description: string): string {
  const truncated = description.length > SUMMARY_DESCRIPTION_LIMIT;
  return `${complaintType}: ${description.slice(0, SUMMARY_DESCRIPTION_LIMIT)}${truncated ? '...' : ''}`;
}
