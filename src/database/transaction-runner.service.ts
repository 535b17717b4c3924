import { Inject, Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager, QueryFailedError } from 'typeorm';
import { ConcurrencyConflictException } from '../common/exceptions/billing.exceptions';
import { SystemLoggingService } from '../logs/system-logging.service';

export const TRANSACTION_OPTIONS = 'TRANSACTION_OPTIONS';

export interface TransactionOptions {
  /** Extra attempts after the first when a write collides with a concurrent one. */
  maxRetries: number;
}

// serialization_failure, deadlock_detected
const RETRYABLE_SQLSTATES = new Set(['40001', '40P01']);
const UNIQUE_VIOLATION = '23505';

function sqlState(error: unknown): string | undefined {
  if (!(error instanceof QueryFailedError)) return undefined;
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    return typeof driverError.code === 'string' ? driverError.code : undefined;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return sqlState(error) === UNIQUE_VIOLATION;
}

export function isRetryableConflict(error: unknown): boolean {
  if (error instanceof ConcurrencyConflictException) return true;
  const state = sqlState(error);
  return state !== undefined && RETRYABLE_SQLSTATES.has(state);
}

@Injectable()
export class TransactionRunner {
  private readonly logger = new Logger(TransactionRunner.name);

  constructor(
    private readonly dataSource: DataSource,
    @Inject(TRANSACTION_OPTIONS)
    private readonly options: TransactionOptions,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  /**
   * Runs `work` in one transaction; all of it commits or none of it does.
   * Lost races are retried from scratch with fresh reads.
   */
  async write<T>(scope: string, work: (manager: EntityManager) => Promise<T>): Promise<T> {
    const attempts = Math.max(0, this.options.maxRetries) + 1;
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.dataSource.transaction((manager) => work(manager));
      } catch (error) {
        if (!isRetryableConflict(error)) throw error;
        if (attempt >= attempts) {
          const conflict = new ConcurrencyConflictException(
            `${scope} conflicted with concurrent updates ${attempt} time(s); try again`,
            attempt,
          );
          await this.systemLoggingService.logWriteAbandoned(scope, attempt, error instanceof Error ? error : conflict);
          throw conflict;
        }
        this.logger.warn(`${scope}: concurrent update detected, retrying (${attempt}/${attempts - 1})`);
      }
    }
  }

  /** Read-only work against one consistent snapshot. */
  async read<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.dataSource.transaction('REPEATABLE READ', (manager) => work(manager));
  }
}
