/**
 * Zod Schemas for the Civic Complaint Desk server
 *
 * Runtime input validation for every tool. Business rules (password
 * policy, mobile-number format) are enforced again by the services so
 * that every entry point gets the same messages.
 */

import { z } from 'zod';
import { ComplaintStatus } from '../core/entities/Complaint.js';
import { Department } from '../core/entities/Department.js';

// ============================================================================
// Common Schemas
// ============================================================================

export const UsernameSchema = z.string()
  .min(1, 'Username is required')
  .max(64, 'Username must not exceed 64 characters')
  .describe('Account name (case-sensitive)');

export const PasswordSchema = z.string()
  .min(1, 'Password is required')
  .max(256, 'Password must not exceed 256 characters');

export const TicketIdSchema = z.string()
  .min(1, 'Ticket ID is required')
  .max(32, 'Ticket ID must not exceed 32 characters')
  .regex(/^[A-Za-z]+\d+$/, 'Ticket ID must be a prefix followed by digits (e.g., "TCKT1001")')
  .describe('Ticket ID (e.g., "TCKT1001")');

export const IntakeSessionIdSchema = z.string()
  .uuid('Intake session ID must be a UUID')
  .describe('ID returned by desk_intake_start');

export const IntakeFieldEnum = z.enum([
  'name',
  'mobileNumber',
  'location',
  'complaintType',
  'complaintDescription'
]);

const fieldText = (label: string, max: number) =>
  z.string()
    .min(1, `${label} is required`)
    .max(max, `${label} must not exceed ${max} characters`);

// ============================================================================
// Tool Input Schemas
// ============================================================================

/**
 * desk_signup - Create an account
 */
export const SignupInputSchema = z.object({
  username: UsernameSchema,
  password: PasswordSchema.describe('At least 8 characters with upper, lower, digit and special character'),
  confirmPassword: PasswordSchema.describe('Must equal password')
}).strict();

export type SignupInput = z.infer<typeof SignupInputSchema>;

/**
 * desk_login - Verify credentials
 */
export const LoginInputSchema = z.object({
  username: UsernameSchema,
  password: PasswordSchema
}).strict();

export type LoginInput = z.infer<typeof LoginInputSchema>;

/**
 * desk_logout - No input required
 */
export const LogoutInputSchema = z.object({}).strict();

/**
 * desk_intake_start - No input required
 */
export const IntakeStartInputSchema = z.object({}).strict();

/**
 * desk_intake_answer - Answer the current question
 */
export const IntakeAnswerInputSchema = z.object({
  sessionId: IntakeSessionIdSchema,
  response: z.string()
    .max(2000, 'Response must not exceed 2000 characters')
    .optional()
    .describe('The answer. Omit when nothing was captured (timeout or unrecognised speech) to be asked again.')
}).strict();

export type IntakeAnswerInput = z.infer<typeof IntakeAnswerInputSchema>;

/**
 * desk_intake_undo - Clear the last answer
 */
export const IntakeUndoInputSchema = z.object({
  sessionId: IntakeSessionIdSchema
}).strict();

export type IntakeUndoInput = z.infer<typeof IntakeUndoInputSchema>;

/**
 * desk_intake_reset - Clear every answer and start over
 */
export const IntakeResetInputSchema = z.object({
  sessionId: IntakeSessionIdSchema
}).strict();

export type IntakeResetInput = z.infer<typeof IntakeResetInputSchema>;

/**
 * desk_intake_review - Show answers, optionally edit one
 */
export const IntakeReviewInputSchema = z.object({
  sessionId: IntakeSessionIdSchema,
  field: IntakeFieldEnum.optional().describe('Field to edit'),
  value: z.string().max(2000).optional().describe('New value for field')
}).strict();

export type IntakeReviewInput = z.infer<typeof IntakeReviewInputSchema>;

/**
 * desk_intake_submit - File the collected complaint
 */
export const IntakeSubmitInputSchema = z.object({
  sessionId: IntakeSessionIdSchema
}).strict();

export type IntakeSubmitInput = z.infer<typeof IntakeSubmitInputSchema>;

/**
 * desk_submit_complaint - File a complaint in one call
 */
export const SubmitComplaintInputSchema = z.object({
  name: fieldText('Name', 100).describe('Citizen name'),
  mobileNumber: fieldText('Mobile Number', 20).describe('10-digit mobile number; spaces, "-" and "+" are ignored'),
  location: fieldText('Location', 200).describe('Where the problem is'),
  complaintType: fieldText('Complaint Type', 100).describe('Short category, e.g. "water leakage"'),
  complaintDescription: fieldText('Complaint Description', 2000).describe('Free-text description')
}).strict();

export type SubmitComplaintInput = z.infer<typeof SubmitComplaintInputSchema>;

/**
 * desk_update_status - Change a ticket's status
 */
export const UpdateStatusInputSchema = z.object({
  ticketId: TicketIdSchema,
  status: z.nativeEnum(ComplaintStatus).describe('New status: Open, In Progress, Resolved or Closed')
}).strict();

export type UpdateStatusInput = z.infer<typeof UpdateStatusInputSchema>;

/**
 * desk_get_complaint - Look up one complaint
 */
export const GetComplaintInputSchema = z.object({
  ticketId: TicketIdSchema
}).strict();

export type GetComplaintInput = z.infer<typeof GetComplaintInputSchema>;

/**
 * desk_list_department_complaints - Rows of one department ledger
 */
export const ListDepartmentInputSchema = z.object({
  department: z.nativeEnum(Department).describe('Department name, e.g. "Water Department"')
}).strict();

export type ListDepartmentInput = z.infer<typeof ListDepartmentInputSchema>;

/**
 * desk_classify - Preview routing without filing
 */
export const ClassifyInputSchema = z.object({
  complaintType: z.string().max(100).describe('Complaint type (may be empty)'),
  description: z.string().max(2000).describe('Complaint description (may be empty)')
}).strict();

export type ClassifyInput = z.infer<typeof ClassifyInputSchema>;
