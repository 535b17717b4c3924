import { Decimal } from 'decimal.js';
import { sumDecimals } from '../common/utils/decimal.transformer';
import { wholeMonthsBetween } from '../common/utils/date-utils';

export interface BilledEnrollment {
  courseId: string;
  courseName: string;
  cost: Decimal;
  lessonPerMonth: number;
  enrollmentDate: string;
  lessonsAttended: number;
}

export interface CourseCharge {
  enrollment: BilledEnrollment;
  monthsEnrolled: number;
  expectedLessons: number;
  owed: Decimal;
}

export interface Balance {
  totalOwed: Decimal;
  totalPaid: Decimal;
  balance: Decimal;
  owesMoney: boolean;
  debtAmount: Decimal;
  overpaidAmount: Decimal;
}

export interface DebtCalculation extends Balance {
  charges: CourseCharge[];
}

/**
 * Months billed for an enrollment as of `today`: complete calendar months
 * elapsed, never less than one. Enrolling today bills the current month.
 */
export function monthsEnrolled(enrollmentDate: string, today: string): number {
  return Math.max(1, wholeMonthsBetween(enrollmentDate, today));
}

export function chargeForEnrollment(enrollment: BilledEnrollment, today: string): CourseCharge {
  const months = monthsEnrolled(enrollment.enrollmentDate, today);
  return {
    enrollment,
    monthsEnrolled: months,
    expectedLessons: enrollment.lessonPerMonth * months,
    owed: enrollment.cost.times(months),
  };
}

export function settle(totalOwed: Decimal, totalPaid: Decimal): Balance {
  const balance = totalPaid.minus(totalOwed);
  return {
    totalOwed,
    totalPaid,
    balance,
    owesMoney: balance.lessThan(0),
    debtAmount: Decimal.max(0, balance.negated()),
    overpaidAmount: Decimal.max(0, balance),
  };
}

/**
 * Debt for one student: every enrollment billed monthly at its course's fee,
 * less everything paid. Pure; the result depends only on the inputs and `today`.
 */
export function calculateDebt(
  enrollments: BilledEnrollment[],
  payments: { amount: Decimal }[],
  today: string,
): DebtCalculation {
  const charges = enrollments.map((enrollment) => chargeForEnrollment(enrollment, today));
  return {
    charges,
    ...settle(
      sumDecimals(charges.map((charge) => charge.owed)),
      sumDecimals(payments.map((payment) => payment.amount)),
    ),
  };
}
