import { BadRequestException, ConflictException } from '@nestjs/common';

/**
 * Raised when a command fails validation before it reaches the ledger, or when
 * stored ledger data cannot be read back as well-formed records.
 */
export class InvalidInputException extends BadRequestException {
  constructor(readonly problems: string[]) {
    super({ statusCode: 400, error: 'Invalid Input', message: problems });
  }
}

/**
 * Raised when a write lost a race with another write to the same student or
 * enrollment. The transaction runner retries these before surfacing one.
 */
export class ConcurrencyConflictException extends ConflictException {
  constructor(message: string, readonly attempts?: number) {
    super(message);
  }
}
