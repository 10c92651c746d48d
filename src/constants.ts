/**
 * Shared constants for the Civic Complaint Desk server
 */

// Flat file names (relative to the data directory)
export const USERS_FILE = 'users.csv';
export const LEDGER_FILE = 'complaints.csv';
export const SESSION_FILE = 'session.json';

// Ticket numbering defaults
export const DEFAULT_TICKET_PREFIX = 'TCKT';
export const DEFAULT_TICKET_START = 1001;

// Password hashing (PBKDF2-HMAC-SHA256)
export const DEFAULT_HASH_ITERATIONS = 200_000;
export const MIN_HASH_ITERATIONS = 100_000;
export const HASH_KEY_LENGTH = 32;

// Placeholder stored when no identity was handed off
export const UNKNOWN_IDENTITY = 'N/A';

// Summary length on the ticket confirmation
export const SUMMARY_DESCRIPTION_LIMIT = 100;

// Server info
export const SERVER_NAME = 'civic-complaint-desk';
export const SERVER_VERSION = '1.0.0';
