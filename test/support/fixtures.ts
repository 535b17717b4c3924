import { Decimal } from 'decimal.js';
import { Repository } from 'typeorm';
import { AttendanceService } from '../../src/attendance/attendance.service';
import { BillingService } from '../../src/billing/billing.service';
import { Clock } from '../../src/common/clock/clock';
import { Course } from '../../src/course/entities/course.entity';
import { TransactionRunner } from '../../src/database/transaction-runner.service';
import { DebtService } from '../../src/debt/debt.service';
import { Log } from '../../src/logs/logs.entity';
import { SystemLoggingService } from '../../src/logs/system-logging.service';
import { Student } from '../../src/student/entities/student.entity';
import { InMemoryDataSource } from './in-memory-data-source';

export const STUDENT_ID = '11111111-1111-4111-8111-111111111111';
export const OTHER_STUDENT_ID = '44444444-4444-4444-8444-444444444444';
export const COURSE_ID = '22222222-2222-4222-8222-222222222222';
export const OTHER_COURSE_ID = '33333333-3333-4333-8333-333333333333';
export const MISSING_ID = '99999999-9999-4999-8999-999999999999';

export class FixedClock implements Clock {
  constructor(private date: string) {}

  today(): string {
    return this.date;
  }

  set(date: string): void {
    this.date = date;
  }
}

export function aStudent(overrides: Partial<Student> = {}): Partial<Student> {
  return {
    id: STUDENT_ID,
    name: 'Test',
    surname: 'Student',
    secondName: null,
    startingDate: '2024-01-01',
    numLesson: 0,
    totalMoney: new Decimal(0),
    attendance: [],
    isArchived: false,
    version: 0,
    ...overrides,
  };
}

export function aCourse(overrides: Partial<Course> = {}): Partial<Course> {
  return {
    id: COURSE_ID,
    name: 'English B1',
    weekDays: ['Mon', 'Wed'],
    lessonPerMonth: 8,
    cost: new Decimal(160),
    ...overrides,
  };
}

/** Audit repository that keeps saved entries in memory. */
export function auditLog() {
  const entries: Partial<Log>[] = [];
  const repository = {
    create: jest.fn((entry: Partial<Log>) => entry),
    save: jest.fn(async (entry: Partial<Log>) => {
      entries.push(entry);
      return entry;
    }),
  };
  return { entries, repository, asRepository: () => repository as unknown as Repository<Log> };
}

export interface Ledger {
  db: InMemoryDataSource;
  clock: FixedClock;
  audit: ReturnType<typeof auditLog>;
  attendance: AttendanceService;
  debt: DebtService;
  billing: BillingService;
}

export function createLedger(options: { maxRetries?: number; today?: string } = {}): Ledger {
  const db = new InMemoryDataSource();
  const clock = new FixedClock(options.today ?? '2024-03-15');
  const audit = auditLog();
  const logging = new SystemLoggingService(audit.asRepository());
  const transactions = new TransactionRunner(db.asDataSource(), { maxRetries: options.maxRetries ?? 3 }, logging);
  const attendance = new AttendanceService(transactions, logging);
  const debt = new DebtService(transactions, clock);
  const billing = new BillingService(transactions, attendance, debt, logging, clock);
  return { db, clock, audit, attendance, debt, billing };
}
