import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { randomUUID } from 'crypto';
import { mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { createDesk } from '../createDesk.js';
import { HandlerResult, ToolHandlers } from './ToolHandlers.js';
import { Configuration } from '../../config/Configuration.js';
import { Logger } from '../../infrastructure/logging/Logger.js';
import { ComplaintStatus } from '../../core/entities/Complaint.js';
import { Department } from '../../core/entities/Department.js';
import { makeTempDir, manualClock, removeTempDir } from '../../testing/helpers.js';

function unwrap<T>(result: HandlerResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.code}: ${result.error}`);
  }
  return result.data;
}

describe('ToolHandlers', () => {
  let dir: string;
  let handlers: ToolHandlers;
  const clock = manualClock(new Date(2026, 0, 2, 10, 0, 0));

  beforeEach(async () => {
    dir = await makeTempDir();
    clock.set(new Date(2026, 0, 2, 10, 0, 0));
    const config = new Configuration({
      COMPLAINT_DESK_DATA_DIR: dir,
      COMPLAINT_DESK_GLOBAL_SALT: 'test-salt',
      COMPLAINT_DESK_HASH_ITERATIONS: '100000',
      LOG_LEVEL: 'error'
    });
    const desk = await createDesk(config, new Logger('error'), clock.now);
    handlers = desk.handlers;
    expect(desk.migration).toEqual({ status: 'created' });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function fileThroughIntake(answers: string[]) {
    const { sessionId } = unwrap(await handlers.handleIntakeStart());
    for (const response of answers) {
      unwrap(await handlers.handleIntakeAnswer({ sessionId, response }));
    }
    return { sessionId, result: await handlers.handleIntakeSubmit({ sessionId }) };
  }

  it('signs up, runs the intake and files a ticket', async () => {
    expect(
      unwrap(await handlers.handleSignup({ username: 'meena', password: 'Secret#123', confirmPassword: 'Secret#123' }))
    ).toEqual({ username: 'meena', message: 'Account created. You can now file a complaint.' });

    const started = unwrap(await handlers.handleIntakeStart());
    expect(started.message).toBe(
      "Hello! I am your complaint assistant. I'll ask you a few questions to file your complaint. Please say your name."
    );
    expect(started.progress).toEqual({ answered: 0, total: 5 });

    const { result } = await fileThroughIntake(['Meena', '9876543210', 'Sector 9', 'garbage', 'sanitation truck skipped our street']);
    const filed = unwrap(result);

    expect(filed.ticket.ticketId).toBe('TCKT1001');
    expect(filed.ticket.assignedDepartment).toBe(Department.SANITATION);
    expect(filed.message).toBe(
      'Your complaint has been successfully submitted! Ticket ID: TCKT1001. Status: Open. ' +
        'Department: Sanitation Department. Urgency: Medium. Please note your Ticket ID for future reference.'
    );
  });

  it('re-asks on an invalid or missing answer', async () => {
    const { sessionId } = unwrap(await handlers.handleIntakeStart());
    unwrap(await handlers.handleIntakeAnswer({ sessionId, response: 'Meena' }));

    const invalid = unwrap(await handlers.handleIntakeAnswer({ sessionId, response: 'call me' }));
    expect(invalid.accepted).toBe(false);
    expect(invalid.message).toBe('Please enter a valid mobile number. Please say your mobile number.');

    const missed = unwrap(await handlers.handleIntakeAnswer({ sessionId }));
    expect(missed.message).toBe("Sorry, I didn't catch that. Please say your mobile number.");
  });

  it('edits an answer during review', async () => {
    const { sessionId } = unwrap(await handlers.handleIntakeStart());
    unwrap(await handlers.handleIntakeAnswer({ sessionId, response: 'Meena' }));

    const reviewed = unwrap(await handlers.handleIntakeReview({ sessionId, field: 'name', value: 'Meena K' }));
    expect(reviewed.answers['Name']).toBe('Meena K');
    expect(reviewed.complete).toBe(false);

    expect(await handlers.handleIntakeReview({ sessionId, field: 'name' })).toEqual({
      success: false,
      code: 'VALIDATION',
      error: 'A value is required to edit Name'
    });
  });

  it('clears the last answer and resets the intake', async () => {
    const { sessionId } = unwrap(await handlers.handleIntakeStart());
    unwrap(await handlers.handleIntakeAnswer({ sessionId, response: 'Meena' }));
    unwrap(await handlers.handleIntakeAnswer({ sessionId, response: '9876543210' }));

    const undone = unwrap(await handlers.handleIntakeUndo({ sessionId }));
    expect(undone.accepted).toBe(true);
    expect(undone.message).toBe('Please provide your answer again. Please say your mobile number.');
    expect(undone.progress).toEqual({ answered: 1, total: 5 });

    const reset = unwrap(await handlers.handleIntakeReset({ sessionId }));
    expect(reset.progress).toEqual({ answered: 0, total: 5 });
    expect(unwrap(await handlers.handleIntakeReview({ sessionId })).answers['Name']).toBe('');
    expect(unwrap(await handlers.handleIntakeUndo({ sessionId })).message).toBe('No responses have been recorded yet.');
  });

  it('files under the placeholder identity after logout', async () => {
    unwrap(await handlers.handleSignup({ username: 'meena', password: 'Secret#123', confirmPassword: 'Secret#123' }));
    expect(unwrap(await handlers.handleLogout())).toEqual({ message: 'Logged out.' });

    const complaint = {
      name: 'Meena',
      mobileNumber: '9876543210',
      location: 'Sector 9',
      complaintType: 'road damage',
      complaintDescription: 'deep pothole'
    };
    unwrap(await handlers.handleSubmitComplaint(complaint));
    unwrap(await handlers.handleSubmitComplaint(complaint));

    const { complaint: second } = unwrap(await handlers.handleGetComplaint({ ticketId: 'TCKT1002' }));
    expect(second.username).toBe('N/A');
  });

  it('reports an unreadable ledger as a STORAGE failure and keeps serving', async () => {
    const ledgerPath = join(dir, 'complaints.csv');
    await rm(ledgerPath);
    await mkdir(ledgerPath);

    const result = await handlers.handleSubmitComplaint({
      name: 'Meena',
      mobileNumber: '9876543210',
      location: 'Sector 9',
      complaintType: 'road damage',
      complaintDescription: 'deep pothole'
    });

    expect(result).toMatchObject({
      success: false,
      code: 'STORAGE',
      error: expect.stringContaining(`Failed to read file: ${ledgerPath}`)
    });
    expect(await handlers.handleGetComplaint({ ticketId: 'TCKT1001' })).toEqual({
      success: false,
      code: 'STORAGE',
      error: expect.stringContaining('Failed to read file')
    });
    expect(unwrap(await handlers.handleClassify({ complaintType: 'road', description: '' })).department).toBe(
      Department.PUBLIC_WORKS
    );
  });

  it('refuses to submit an incomplete intake', async () => {
    const { sessionId } = unwrap(await handlers.handleIntakeStart());

    expect(await handlers.handleIntakeSubmit({ sessionId })).toEqual({
      success: false,
      code: 'VALIDATION',
      error: 'Please provide Name.'
    });
  });

  it('reports a duplicate with the existing ticket ID', async () => {
    unwrap(await handlers.handleSignup({ username: 'meena', password: 'Secret#123', confirmPassword: 'Secret#123' }));
    const complaint = {
      name: 'Meena',
      mobileNumber: '9876543210',
      location: 'Sector 9',
      complaintType: 'road damage',
      complaintDescription: 'deep pothole'
    };
    unwrap(await handlers.handleSubmitComplaint(complaint));

    expect(await handlers.handleSubmitComplaint({ ...complaint, complaintType: 'ROAD DAMAGE' })).toEqual({
      success: false,
      code: 'DUPLICATE_COMPLAINT',
      error: 'You have already registered a complaint of this type. Existing Ticket ID: TCKT1001'
    });
  });

  it('updates status and shows the complaint without its password hash', async () => {
    unwrap(await handlers.handleSignup({ username: 'meena', password: 'Secret#123', confirmPassword: 'Secret#123' }));
    unwrap(
      await handlers.handleSubmitComplaint({
        name: 'Meena',
        mobileNumber: '9876543210',
        location: 'Sector 9',
        complaintType: 'electricity',
        complaintDescription: 'street light out'
      })
    );
    clock.set(new Date(2026, 0, 2, 12, 30, 0));

    expect(unwrap(await handlers.handleUpdateStatus({ ticketId: 'TCKT1001', status: ComplaintStatus.RESOLVED }))).toEqual({
      ticketId: 'TCKT1001',
      status: 'Resolved',
      updated: true
    });

    const { complaint } = unwrap(await handlers.handleGetComplaint({ ticketId: 'TCKT1001' }));
    expect(complaint).toEqual({
      username: 'meena',
      name: 'Meena',
      mobileNumber: '9876543210',
      location: 'Sector 9',
      complaintType: 'electricity',
      complaintDescription: 'street light out',
      ticketId: 'TCKT1001',
      status: 'Resolved',
      ticketAlive: 'Yes',
      createdAt: '2026-01-02 10:00:00',
      lastUpdatedAt: '2026-01-02 12:30:00',
      assignedDepartment: 'Electrical Department'
    });

    const listed = unwrap(await handlers.handleListDepartment({ department: Department.ELECTRICAL }));
    expect(listed.total).toBe(1);
    expect(listed.complaints[0].status).toBe('Resolved');
  });

  it('reports unknown tickets and intake sessions as NOT_FOUND', async () => {
    const update = await handlers.handleUpdateStatus({ ticketId: 'TCKT9999', status: ComplaintStatus.CLOSED });
    expect(update).toEqual({ success: false, code: 'NOT_FOUND', error: 'Ticket not found: TCKT9999' });

    const lookup = await handlers.handleGetComplaint({ ticketId: 'TCKT9999' });
    expect(lookup.success).toBe(false);

    const sessionId = randomUUID();
    const answer = await handlers.handleIntakeAnswer({ sessionId, response: 'Meena' });
    expect(answer).toEqual({
      success: false,
      code: 'NOT_FOUND',
      error: `Intake session not found: ${sessionId}. Start a new one with desk_intake_start.`
    });
  });

  it('reports login failures as VALIDATION', async () => {
    expect(await handlers.handleLogin({ username: 'nobody', password: 'Secret#123' })).toEqual({
      success: false,
      code: 'VALIDATION',
      error: 'Invalid username or password'
    });
  });

  it('classifies without filing', async () => {
    expect(unwrap(await handlers.handleClassify({ complaintType: 'health', description: 'accident near clinic' }))).toEqual({
      department: Department.HEALTH,
      urgency: 'High'
    });
  });
});
