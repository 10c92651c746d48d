#!/usr/bin/env node

/**
 * Civic Complaint Desk MCP Server
 *
 * Account sign-up/login over a flat credential file, a guided complaint
 * intake, keyword classification, ticket allocation and flat-file ledgers
 * (one master ledger, one per department).
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

// Configuration
import { Configuration } from './config/Configuration.js';

// Infrastructure
import { Logger } from './infrastructure/logging/Logger.js';
import { errorMessage } from './infrastructure/errors/ComplaintDeskError.js';

// Composition
import { createDesk } from './application/createDesk.js';
import { HandlerErrorCode, HandlerResult } from './application/handlers/ToolHandlers.js';

// Schemas
import {
  SignupInputSchema,
  LoginInputSchema,
  LogoutInputSchema,
  IntakeStartInputSchema,
  IntakeAnswerInputSchema,
  IntakeUndoInputSchema,
  IntakeResetInputSchema,
  IntakeReviewInputSchema,
  IntakeSubmitInputSchema,
  SubmitComplaintInputSchema,
  UpdateStatusInputSchema,
  GetComplaintInputSchema,
  ListDepartmentInputSchema,
  ClassifyInputSchema
} from './schemas/index.js';

// Constants
import { SERVER_NAME, SERVER_VERSION } from './constants.js';

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a handler result as MCP tool output, with a hint per error category
 */
function toToolResult<T>(result: HandlerResult<T>): CallToolResult {
  if (result.success) {
    return { content: [{ type: 'text', text: JSON.stringify(result.data, null, 2) }] };
  }

  const hints: Partial<Record<HandlerErrorCode, string>> = {
    DUPLICATE_COMPLAINT: 'Check the status of the existing complaint or choose a different complaint type.',
    DUPLICATE_USERNAME: 'Choose another username or log in with desk_login.',
    STORAGE: 'Check that the data directory is readable and writable.',
    NOT_FOUND: 'Verify the ID is correct.'
  };
  const hint = hints[result.code];

  return {
    content: [{ type: 'text', text: `Error: ${result.error}${hint ? `\n\n${hint}` : ''}` }],
    isError: true
  };
}

// ============================================================================
// Server Setup
// ============================================================================

async function main(): Promise<void> {
  const config = new Configuration();
  const logger = new Logger(config.logLevel, config.logFile ?? undefined);
  logger.info('Loaded configuration', config.summary());

  const { handlers, migration } = await createDesk(config, logger);
  if (migration.status === 'migrated') {
    logger.info(`Credential file migrated (${migration.migratedRows} rows), backup at ${migration.backupPath}`);
  } else if (migration.status === 'failed') {
    logger.error(`Credential file could not be migrated: ${migration.reason}`);
  }

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  });

  // --------------------------------------------------------------------------
  // Authentication
  // --------------------------------------------------------------------------

  server.registerTool(
    'desk_signup',
    {
      title: 'Create Account',
      description: `Create an account and start a session for filing complaints.

Args:
  - username (string): Unique, case-sensitive
  - password (string): At least 8 characters, with an uppercase letter, a lowercase letter, a digit and a special character
  - confirmPassword (string): Must equal password

Error Handling:
  - "Username already exists" if the name is taken
  - "Passwords do not match" / password policy messages`,
      inputSchema: SignupInputSchema.shape,
      annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleSignup(params))
  );

  server.registerTool(
    'desk_login',
    {
      title: 'Log In',
      description: `Verify username and password and start a session for filing complaints.

Args:
  - username (string)
  - password (string)

Error Handling:
  - "Invalid username or password" on unknown user or wrong password`,
      inputSchema: LoginInputSchema.shape,
      annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleLogin(params))
  );

  server.registerTool(
    'desk_logout',
    {
      title: 'Log Out',
      description: `End the current session. Complaints filed afterwards use the configured fallback identity, or none.`,
      inputSchema: LogoutInputSchema.shape,
      annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: false }
    },
    async () => toToolResult(await handlers.handleLogout())
  );

  // --------------------------------------------------------------------------
  // Guided intake
  // --------------------------------------------------------------------------

  server.registerTool(
    'desk_intake_start',
    {
      title: 'Start Complaint Intake',
      description: `Start a guided intake. Asks, in order: name, mobile number, location, complaint type, complaint description.

Returns:
  { "sessionId": string, "message": string, "progress": { "answered": 0, "total": 5 } }`,
      inputSchema: IntakeStartInputSchema.shape,
      annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: false }
    },
    async () => toToolResult(await handlers.handleIntakeStart())
  );

  server.registerTool(
    'desk_intake_answer',
    {
      title: 'Answer Intake Question',
      description: `Answer the current intake question.

Args:
  - sessionId (string): From desk_intake_start
  - response (string, optional): The answer; omit when nothing was captured to be asked again

Returns:
  { "accepted": boolean, "message": string, "complete": boolean, "progress": {...} }
  An invalid answer (empty, malformed mobile number) is not accepted and the question is asked again.`,
      inputSchema: IntakeAnswerInputSchema.shape,
      annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleIntakeAnswer(params))
  );

  server.registerTool(
    'desk_intake_undo',
    {
      title: 'Clear Last Answer',
      description: `Drop the most recent answer and ask that question again.

Args:
  - sessionId (string)

Returns:
  { "accepted": boolean, "message": string, "complete": boolean, "progress": {...} }
  accepted is false when nothing has been answered yet.`,
      inputSchema: IntakeUndoInputSchema.shape,
      annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleIntakeUndo(params))
  );

  server.registerTool(
    'desk_intake_reset',
    {
      title: 'Reset Intake',
      description: `Clear every answer of an intake session and start again from the first question.`,
      inputSchema: IntakeResetInputSchema.shape,
      annotations: { readOnlyHint: false, destructiveHint: true, idempotentHint: true, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleIntakeReset(params))
  );

  server.registerTool(
    'desk_intake_review',
    {
      title: 'Review Intake',
      description: `Show the answers collected so far, optionally editing one answered field first.

Args:
  - sessionId (string)
  - field (string, optional): name, mobileNumber, location, complaintType or complaintDescription
  - value (string, optional): New value (required with field)`,
      inputSchema: IntakeReviewInputSchema.shape,
      annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleIntakeReview(params))
  );

  server.registerTool(
    'desk_intake_submit',
    {
      title: 'Submit Intake',
      description: `File the complaint collected by a completed intake session.

Returns the ticket: ID, assigned department, urgency, status (Open) and summary.

Error Handling:
  - Duplicate complaint: the logged-in user already filed a complaint of this type; the existing ticket ID is returned`,
      inputSchema: IntakeSubmitInputSchema.shape,
      annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleIntakeSubmit(params))
  );

  // --------------------------------------------------------------------------
  // Complaints
  // --------------------------------------------------------------------------

  server.registerTool(
    'desk_submit_complaint',
    {
      title: 'Submit Complaint',
      description: `File a complaint in one call with all five fields.

Args:
  - name, mobileNumber (10 digits), location, complaintType, complaintDescription

Examples:
  - { "name": "Asha", "mobileNumber": "98765 43210", "location": "Ward 4", "complaintType": "water leakage", "complaintDescription": "urgent pipe burst" }`,
      inputSchema: SubmitComplaintInputSchema.shape,
      annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleSubmitComplaint(params))
  );

  server.registerTool(
    'desk_update_status',
    {
      title: 'Update Complaint Status',
      description: `Set a ticket's status in the master ledger and its department ledger.

Args:
  - ticketId (string): e.g. "TCKT1001"
  - status (string): Open, In Progress, Resolved or Closed`,
      inputSchema: UpdateStatusInputSchema.shape,
      annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleUpdateStatus(params))
  );

  server.registerTool(
    'desk_get_complaint',
    {
      title: 'Get Complaint',
      description: `Get one complaint by ticket ID, with its status, created and last-updated times and department.`,
      inputSchema: GetComplaintInputSchema.shape,
      annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleGetComplaint(params))
  );

  server.registerTool(
    'desk_list_department_complaints',
    {
      title: 'List Department Complaints',
      description: `List every complaint routed to one department, with urgency level.`,
      inputSchema: ListDepartmentInputSchema.shape,
      annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleListDepartment(params))
  );

  server.registerTool(
    'desk_classify',
    {
      title: 'Classify Complaint',
      description: `Preview the department and urgency a complaint would get, without filing it.`,
      inputSchema: ClassifyInputSchema.shape,
      annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true, openWorldHint: false }
    },
    async params => toToolResult(await handlers.handleClassify(params))
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
}

main().catch((error: unknown) => {
  process.stderr.write(`Failed to start server: ${errorMessage(error)}\n`);
  process.exit(1);
});
