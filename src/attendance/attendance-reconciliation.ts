import { NotFoundException } from '@nestjs/common';
import { Decimal } from 'decimal.js';
import { InvalidInputException } from '../common/exceptions/billing.exceptions';
import { LESSON_COST_SCALE, Money } from '../common/utils/decimal.transformer';
import { AttendanceKey, AttendanceRecord, sameAttendanceKey } from '../student/entities/attendance-record';

/** The slice of a Student that attendance reconciliation reads and writes. */
export interface LedgerState {
  numLesson: number;
  totalMoney: Decimal;
  attendance: AttendanceRecord[];
}

export interface CoursePricing {
  cost: Decimal;
  lessonPerMonth: number;
}

export type AttendanceChanges = Partial<Pick<AttendanceRecord, 'isAbsent' | 'chargeMoney' | 'reason'>>;

export interface ReconciliationOutcome {
  state: LedgerState;
  record: AttendanceRecord;
  /** The record this one superseded, or null when the key was new. */
  replaced: AttendanceRecord | null;
}

interface ChargeEffect {
  money: Decimal;
  lessons: number;
}

/**
 * Per-attendance monetary unit, always derived from the course's current
 * pricing and rounded half-even to LESSON_COST_SCALE places. Never stored.
 * Every charge and reversal moves a balance by exactly this amount.
 */
export function lessonCost(course: CoursePricing): Decimal {
  if (!Number.isInteger(course.lessonPerMonth) || course.lessonPerMonth <= 0) {
    throw new InvalidInputException([
      `Course must have a positive whole number of lessons per month, got ${course.lessonPerMonth}`,
    ]);
  }
  return new Money(course.cost)
    .dividedBy(course.lessonPerMonth)
    .toDecimalPlaces(LESSON_COST_SCALE, Decimal.ROUND_HALF_EVEN);
}

/**
 * What a record does to the ledger while it is in effect: a charged lesson costs
 * one lesson cost, and counts as a lesson only when the student was present.
 */
export function chargeEffect(record: AttendanceRecord, cost: Decimal): ChargeEffect {
  if (!record.chargeMoney) {
    return { money: new Money(0), lessons: 0 };
  }
  return { money: cost.negated(), lessons: record.isAbsent ? 0 : 1 };
}

export function applyCharge(state: LedgerState, record: AttendanceRecord, cost: Decimal): LedgerState {
  const effect = chargeEffect(record, cost);
  return {
    ...state,
    numLesson: state.numLesson + effect.lessons,
    totalMoney: new Money(state.totalMoney).plus(effect.money),
  };
}

export function reverseCharge(state: LedgerState, record: AttendanceRecord, cost: Decimal): LedgerState {
  const effect = chargeEffect(record, cost);
  return {
    ...state,
    numLesson: state.numLesson - effect.lessons,
    totalMoney: new Money(state.totalMoney).minus(effect.money),
  };
}

export function findAttendanceIndex(records: AttendanceRecord[], key: AttendanceKey): number {
  return records.findIndex((record) => sameAttendanceKey(record, key));
}

// Reverse whatever the old record charged, then charge for the new one. The
// end state depends only on the new record, never on the path taken to it.
function supersede(
  state: LedgerState,
  index: number,
  next: AttendanceRecord,
  cost: Decimal,
): ReconciliationOutcome {
  const previous = state.attendance[index];
  const rebalanced = applyCharge(reverseCharge(state, previous, cost), next, cost);
  return {
    state: {
      ...rebalanced,
      attendance: state.attendance.map((record, i) => (i === index ? next : record)),
    },
    record: next,
    replaced: previous,
  };
}

/**
 * Records attendance for a key. An existing record for the same course and
 * date is overwritten, with its charge reversed first.
 */
export function applyAttendance(
  state: LedgerState,
  record: AttendanceRecord,
  cost: Decimal,
): ReconciliationOutcome {
  const index = findAttendanceIndex(state.attendance, record);
  if (index !== -1) {
    return supersede(state, index, record, cost);
  }
  return {
    state: {
      ...applyCharge(state, record, cost),
      attendance: [...state.attendance, record],
    },
    record,
    replaced: null,
  };
}

/** Merges `changes` into the existing record for `key`; fields left out keep their value. */
export function amendAttendance(
  state: LedgerState,
  key: AttendanceKey,
  changes: AttendanceChanges,
  cost: Decimal,
): ReconciliationOutcome {
  const index = findAttendanceIndex(state.attendance, key);
  if (index === -1) {
    throw new NotFoundException(`No attendance record for course ${key.courseId} on ${key.date}`);
  }
  const previous = state.attendance[index];
  const merged: AttendanceRecord = {
    ...previous,
    isAbsent: changes.isAbsent ?? previous.isAbsent,
    chargeMoney: changes.chargeMoney ?? previous.chargeMoney,
    reason: changes.reason ?? previous.reason,
  };
  return supersede(state, index, merged, cost);
}

export function sortAttendance(records: AttendanceRecord[]): AttendanceRecord[] {
  return [...records].sort(
    (a, b) => a.date.localeCompare(b.date) || a.courseId.localeCompare(b.courseId),
  );
}
