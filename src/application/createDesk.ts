import { Configuration } from '../config/Configuration.js';
import { MigrationResult } from '../core/entities/Credential.js';
import { AuthService } from '../core/services/AuthService.js';
import { ComplaintClassifier } from '../core/services/ComplaintClassifier.js';
import { ComplaintService } from '../core/services/ComplaintService.js';
import { TicketAllocator } from '../core/services/TicketAllocator.js';
import { Logger } from '../infrastructure/logging/Logger.js';
import { PasswordHasher } from '../infrastructure/security/PasswordHasher.js';
import { FileSessionStore } from '../infrastructure/session/FileSessionStore.js';
import { CsvCredentialRepository } from '../infrastructure/storage/CsvCredentialRepository.js';
import { CsvLedgerRepository } from '../infrastructure/storage/CsvLedgerRepository.js';
import { ToolHandlers } from './handlers/ToolHandlers.js';

export interface Desk {
  readonly handlers: ToolHandlers;
  readonly auth: AuthService;
  readonly complaints: ComplaintService;
  readonly migration: MigrationResult;
}

/**
 * Wire stores, services and handlers, then open the credential file
 * and seed the ticket counter from the ledger
 */
export async function createDesk(
  config: Configuration,
  logger: Logger,
  now: () => Date = () => new Date()
): Promise<Desk> {
  const hasher = new PasswordHasher(config.globalSalt, config.hashIterations);
  const credentials = new CsvCredentialRepository(config.usersFile, hasher, logger.child('Credentials'), now);
  const ledger = new CsvLedgerRepository(config.ledgerFile, config.dataDir, logger.child('Ledger'), now);

  const fallback = config.fallbackUsername
    ? { username: config.fallbackUsername, passwordHash: config.fallbackPasswordHash }
    : null;
  const sessions = new FileSessionStore(config.sessionFile, logger.child('Session'), fallback);

  const allocator = new TicketAllocator(ledger, config.ticketPrefix, config.ticketStart);
  await allocator.initialize();

  const auth = new AuthService(credentials, sessions, logger.child('Auth'));
  const complaints = new ComplaintService(
    ledger,
    allocator,
    new ComplaintClassifier(),
    sessions,
    logger.child('Complaints'),
    now
  );

  const migration = await auth.initialize();
  const handlers = new ToolHandlers(auth, complaints, logger.child('Tools'));

  return { handlers, auth, complaints, migration };
}
