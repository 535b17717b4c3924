import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { InvalidInputException } from '../exceptions/billing.exceptions';

export function flattenValidationErrors(errors: ValidationError[], path = ''): string[] {
  return errors.flatMap((error) => {
    const property = path ? `${path}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) =>
      path ? `${path}.${message}` : message,
    );
    return [...own, ...flattenValidationErrors(error.children ?? [], property)];
  });
}

/**
 * Turns a caller-supplied object into a validated command instance.
 * Unknown properties are rejected so typos in optional fields do not pass silently.
 */
export function toCommand<T extends object>(cls: ClassConstructor<T>, input: T): T {
  const command = plainToInstance(cls, input);
  const errors = validateSync(command, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new InvalidInputException([...new Set(flattenValidationErrors(errors))]);
  }
  return command;
}
