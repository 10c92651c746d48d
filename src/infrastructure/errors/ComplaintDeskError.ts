/**
 * Base error for the complaint desk.
 * Carries a machine-readable code so tool handlers can react to the
 * error category instead of matching on message text.
 */
export class ComplaintDeskError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ComplaintDeskError';
    this.code = code;
  }
}

export type ErrorCode =
  | 'VALIDATION'
  | 'DUPLICATE_USERNAME'
  | 'DUPLICATE_COMPLAINT'
  | 'STORAGE'
  | 'MIGRATION';

/**
 * Malformed user input (empty field, bad phone number, weak password)
 */
export class ValidationError extends ComplaintDeskError {
  public readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super('VALIDATION', message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class DuplicateUsernameError extends ComplaintDeskError {
  constructor(public readonly username: string) {
    super('DUPLICATE_USERNAME', 'Username already exists');
    this.name = 'DuplicateUsernameError';
  }
}

/**
 * Same identity already filed a complaint of this type.
 */
export class DuplicateComplaintError extends ComplaintDeskError {
  constructor(
    public readonly existingTicketId: string,
    public readonly complaintType: string
  ) {
    super(
      'DUPLICATE_COMPLAINT',
      `You have already registered a complaint of this type. Existing Ticket ID: ${existingTicketId}`
    );
    this.name = 'DuplicateComplaintError';
  }
}

/**
 * A flat file could not be read or written.
 */
export class StorageError extends ComplaintDeskError {
  constructor(
    public readonly path: string,
    message: string,
    cause?: unknown
  ) {
    super('STORAGE', `${message}: ${path}${cause instanceof Error ? ` (${cause.message})` : ''}`, { cause });
    this.name = 'StorageError';
  }
}

export class MigrationError extends ComplaintDeskError {
  constructor(message: string, cause?: unknown) {
    super('MIGRATION', message, { cause });
    this.name = 'MigrationError';
  }
}

/**
 * Extract a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
