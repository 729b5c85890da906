/**
 * Repository Layer - Barrel Export
 *
 * Re-exports the repository classes and their input types. Business logic
 * works with domain models only; Drizzle stays behind these classes.
 *
 * @example
 * ```typescript
 * import {
 *   SessionRepository,
 *   SessionTurnRepository,
 *   SessionContextRepository,
 * } from '@/storage/repositories';
 *
 * const sessionRepo = new SessionRepository(db);
 * const turnRepo = new SessionTurnRepository(db);
 * ```
 */

// Base repository interface
export type { Repository } from './base';

// Session repository and types
export {
  SessionRepository,
  mapSessionRow,
  type CreateSessionInput,
  type StartSessionRecordsInput,
  type TerminalStatus,
} from './session.repository';

// Turn repository and types
export {
  SessionTurnRepository,
  mapTurnRow,
  type AppendTurnInput,
} from './session-turn.repository';

// Context snapshot repository and types
export {
  SessionContextRepository,
  mapContextRow,
  type CreateSessionContextInput,
} from './session-context.repository';
