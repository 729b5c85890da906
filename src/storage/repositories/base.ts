/**
 * Base Repository Interface for topic-tutor
 *
 * This module defines the generic repository interface for entities that
 * are created on their own (sessions). The Repository pattern keeps Drizzle queries out
 * of the session logic, which works with domain models only.
 *
 * Tutoring data is never deleted or rewritten wholesale: sessions only
 * change status, turns and context snapshots are write-once. The shared
 * contract is therefore limited to lookup and creation; lifecycle changes
 * live on the specific repositories.
 */

/**
 * Generic repository interface for write-once entities.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam CreateInput - The type for creating new entities
 * @typeParam Key - The identifier type used for lookups
 *
 * @example
 * ```typescript
 * class SessionRepository implements Repository<Session, CreateSessionInput> {
 *   async findById(id: string): Promise<Session | null> {
 *     // implementation
 *   }
 *   // ...
 * }
 * ```
 */
export interface Repository<T, CreateInput, Key = string> {
  /**
   * Retrieves an entity by its unique identifier.
   *
   * @returns The domain model if found, or null if not found
   */
  findById(id: Key): Promise<T | null>;

  /**
   * Creates a new entity and persists it to the database.
   *
   * @returns The created domain model
   */
  create(input: CreateInput): Promise<T>;
}
