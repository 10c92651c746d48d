import { randomUUID } from 'crypto';
import { AuthService } from '../../core/services/AuthService.js';
import { ComplaintService } from '../../core/services/ComplaintService.js';
import { IntakeSession, labelOf } from '../../core/services/IntakeSession.js';
import { ComplaintDeskError, ErrorCode, ValidationError, errorMessage } from '../../infrastructure/errors/ComplaintDeskError.js';
import { LogSink } from '../../infrastructure/logging/Logger.js';
import {
  ClassifyInput,
  GetComplaintInput,
  IntakeAnswerInput,
  IntakeResetInput,
  IntakeReviewInput,
  IntakeSubmitInput,
  IntakeUndoInput,
  ListDepartmentInput,
  LoginInput,
  SignupInput,
  SubmitComplaintInput,
  UpdateStatusInput
} from '../../schemas/index.js';

export type HandlerErrorCode = ErrorCode | 'NOT_FOUND' | 'INTERNAL';

export type HandlerResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly code: HandlerErrorCode; readonly error: string };

/**
 * MCP Tool Handlers
 * Translate tool calls into service calls. Every failure is caught here
 * and returned as a result.
 */
export class ToolHandlers {
  private readonly intakeSessions = new Map<string, IntakeSession>();

  constructor(
    private readonly auth: AuthService,
    private readonly complaints: ComplaintService,
    private readonly logger: LogSink
  ) {}

  async handleSignup(args: SignupInput) {
    return this.run('Failed to create account', async () => {
      const identity = await this.auth.signup(args.username, args.password, args.confirmPassword);
      return { username: identity.username, message: 'Account created. You can now file a complaint.' };
    });
  }

  async handleLogin(args: LoginInput) {
    return this.run('Failed to log in', async () => {
      const identity = await this.auth.login(args.username, args.password);
      return { username: identity.username, message: `Welcome, ${identity.username}!` };
    });
  }

  async handleLogout() {
    return this.run('Failed to log out', async () => {
      await this.auth.logout();
      return { message: 'Logged out.' };
    });
  }

  async handleIntakeStart() {
    return this.run('Failed to start intake', async () => {
      const sessionId = randomUUID();
      const session = new IntakeSession();
      this.intakeSessions.set(sessionId, session);
      return { sessionId, message: session.start(), progress: session.progress };
    });
  }

  async handleIntakeAnswer(args: IntakeAnswerInput) {
    return this.run('Failed to record answer', async () => {
      const session = this.intakeSession(args.sessionId);
      const turn = args.response === undefined ? session.missed() : session.answer(args.response);
      return { sessionId: args.sessionId, ...turn };
    });
  }

  async handleIntakeUndo(args: IntakeUndoInput) {
    return this.run('Failed to clear answer', async () => {
      const turn = this.intakeSession(args.sessionId).clearLast();
      return { sessionId: args.sessionId, ...turn };
    });
  }

  async handleIntakeReset(args: IntakeResetInput) {
    return this.run('Failed to reset intake', async () => {
      const session = this.intakeSession(args.sessionId);
      return { sessionId: args.sessionId, message: session.reset(), progress: session.progress };
    });
  }

  async handleIntakeReview(args: IntakeReviewInput) {
    return this.run('Failed to review intake', async () => {
      const session = this.intakeSession(args.sessionId);
      if (args.field !== undefined) {
        if (args.value === undefined) {
          throw new ValidationError(`A value is required to edit ${labelOf(args.field)}`, labelOf(args.field));
        }
        session.edit(args.field, args.value);
      }
      return { sessionId: args.sessionId, complete: session.complete, answers: session.review() };
    });
  }

  async handleIntakeSubmit(args: IntakeSubmitInput) {
    return this.run('Failed to submit complaint', async () => {
      const session = this.intakeSession(args.sessionId);
      const ticket = await this.complaints.submit(session.toIntake());
      this.intakeSessions.delete(args.sessionId);
      return { ticket, message: confirmation(ticket.ticketId, ticket.assignedDepartment, ticket.urgencyLevel) };
    });
  }

  async handleSubmitComplaint(args: SubmitComplaintInput) {
    return this.run('Failed to submit complaint', async () => {
      const ticket = await this.complaints.submit(args);
      return { ticket, message: confirmation(ticket.ticketId, ticket.assignedDepartment, ticket.urgencyLevel) };
    });
  }

  async handleUpdateStatus(args: UpdateStatusInput) {
    return this.run('Failed to update status', async () => {
      const updated = await this.complaints.updateStatus(args.ticketId, args.status);
      if (!updated) {
        throw new NotFoundError(`Ticket not found: ${args.ticketId}`);
      }
      return { ticketId: args.ticketId, status: args.status, updated };
    });
  }

  async handleGetComplaint(args: GetComplaintInput) {
    return this.run('Failed to get complaint', async () => {
      const complaint = await this.complaints.getComplaint(args.ticketId);
      if (!complaint) {
        throw new NotFoundError(`Ticket not found: ${args.ticketId}`);
      }
      // The stored hash stays on disk
      const { passwordHash: _passwordHash, ...visible } = complaint;
      return { complaint: visible };
    });
  }

  async handleListDepartment(args: ListDepartmentInput) {
    return this.run('Failed to list department complaints', async () => {
      const complaints = await this.complaints.listDepartment(args.department);
      return { department: args.department, complaints, total: complaints.length };
    });
  }

  async handleClassify(args: ClassifyInput) {
    return this.run('Failed to classify complaint', async () =>
      this.complaints.classify(args.complaintType, args.description)
    );
  }

  private intakeSession(sessionId: string): IntakeSession {
    const session = this.intakeSessions.get(sessionId);
    if (!session) {
      throw new NotFoundError(`Intake session not found: ${sessionId}. Start a new one with desk_intake_start.`);
    }
    return session;
  }

  /**
   * Run an operation and turn any thrown error into a failed result
   */
  private async run<T>(context: string, operation: () => Promise<T>): Promise<HandlerResult<T>> {
    try {
      return { success: true, data: await operation() };
    } catch (error) {
      if (error instanceof NotFoundError) {
        return { success: false, code: 'NOT_FOUND', error: error.message };
      }
      if (error instanceof ComplaintDeskError) {
        if (error.code === 'STORAGE' || error.code === 'MIGRATION') {
          this.logger.error(`${context}: ${error.message}`);
        }
        return { success: false, code: error.code, error: error.message };
      }
      this.logger.error(`${context}: unexpected error`, error);
      return { success: false, code: 'INTERNAL', error: `${context}: ${errorMessage(error)}` };
    }
  }
}

class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

function confirmation(ticketId: string, department: string, urgency: string): string {
  return (
    `Your complaint has been successfully submitted! Ticket ID: ${ticketId}. ` +
    `Status: Open. Department: ${department}. Urgency: ${urgency}. Please note your Ticket ID for future reference.`
  );
}
