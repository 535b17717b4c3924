import { Decimal } from 'decimal.js';
import { ValueTransformer } from 'typeorm';

// Ledger arithmetic. Sums and differences of amounts quantized to
// LESSON_COST_SCALE places stay exact up to 10^29.
export const Money = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_EVEN });

/** Decimal places a lesson cost is quantized to before it touches a balance. */
export const LESSON_COST_SCALE = 10;

// pg hands numeric columns back as strings; keep them exact instead of going through number.
export class DecimalTransformer implements ValueTransformer {
  to(value: Decimal | null | undefined): string | null | undefined {
    if (value === null || value === undefined) return value;
    return value.toFixed();
  }

  from(value: string | null): Decimal | null {
    return value === null ? null : new Money(value);
  }
}

export function sumDecimals(values: Decimal[]): Decimal {
  return values.reduce((total, value) => total.plus(value), new Money(0));
}
