/**
 * Repository Contract
 *
 * What the review service needs from a store of entities. Implementations
 * translate between Drizzle rows and domain models; callers only ever see
 * the models.
 */

/**
 * @typeParam T - Domain model handed back to callers
 * @typeParam CreateInput - Fields supplied when an entity is created
 * @typeParam UpdateInput - Fields that can change after creation
 */
export interface Repository<T, CreateInput, UpdateInput> {
  /** null when no entity has the id */
  findById(id: string): Promise<T | null>;

  findAll(): Promise<T[]>;

  create(input: CreateInput): Promise<T>;

  /** Rejects when no entity has the id */
  update(id: string, input: UpdateInput): Promise<T>;

  /** Rejects when no entity has the id */
  delete(id: string): Promise<void>;
}
