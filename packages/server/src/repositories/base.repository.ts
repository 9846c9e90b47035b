import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import pino from 'pino';
import { createLogger } from '../utils/logger.js';
import { ConflictError } from '../middleware/error-handler.js';

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

/**
 * Storage failure that is not a business-rule violation.
 * Rendered as a generic 500 by the error handler.
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * Base repository with common database operations
 */
export abstract class BaseRepository<TRow, TEntity> {
  protected logger: pino.Logger;

  constructor(
    protected supabase: SupabaseClient,
    protected tableName: string
  ) {
    this.logger = createLogger(`${this.constructor.name}`);
  }

  /**
   * Map database row to entity
   */
  protected abstract mapToEntity(row: TRow): TEntity;

  /**
   * Find a single record by a column value
   */
  protected async findOneBy(
    column: string,
    value: string | number,
    extraFilters?: Record<string, string | number | boolean | null>
  ): Promise<TEntity | null> {
    let query = this.supabase
      .from(this.tableName)
      .select('*')
      .eq(column, value);

    if (extraFilters) {
      for (const [key, filterValue] of Object.entries(extraFilters)) {
        query = filterValue === null ? query.is(key, null) : query.eq(key, filterValue);
      }
    }

    const { data, error } = await query.limit(1).maybeSingle();

    if (error) {
      this.fail(error, { column, value }, 'Error finding record');
    }

    return data ? this.mapToEntity(data as TRow) : null;
  }

  /**
   * Update a record by ID and return the stored row
   */
  protected async updateById(id: number, changes: Record<string, unknown>): Promise<TEntity> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .update(changes)
      .eq('id', id)
      .select()
      .single();

    if (error) {
      this.fail(error, { id }, 'Error updating record');
    }

    return this.mapToEntity(data as TRow);
  }

  /**
   * Delete a record by ID
   */
  protected async deleteById(id: number): Promise<void> {
    const { error } = await this.supabase
      .from(this.tableName)
      .delete()
      .eq('id', id);

    if (error) {
      this.fail(error, { id }, 'Error deleting record');
    }
  }

  /**
   * Translate a PostgREST error: constraint violations become conflicts,
   * anything else is logged and rethrown as a DatabaseError
   */
  protected fail(
    error: PostgrestError,
    context: Record<string, unknown>,
    message: string,
    conflictMessage = 'Resource already exists'
  ): never {
    if (error.code === UNIQUE_VIOLATION) {
      this.logger.warn({ ...context, detail: error.details }, 'Unique constraint violated');
      throw new ConflictError(conflictMessage);
    }
    if (error.code === FOREIGN_KEY_VIOLATION) {
      this.logger.warn({ ...context, detail: error.details }, 'Foreign key constraint violated');
      throw new ConflictError('Operation conflicts with related records');
    }

    this.logger.error({ error, ...context, table: this.tableName }, message);
    throw new DatabaseError(`${message}: ${error.message}`, error.code);
  }
}
