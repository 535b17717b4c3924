import { ConflictException, Logger, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Decimal } from 'decimal.js';
import { DataSource } from 'typeorm';
import { AttendanceService } from '../src/attendance/attendance.service';
import { BillingService } from '../src/billing/billing.service';
import { CLOCK } from '../src/common/clock/clock';
import { ConcurrencyConflictException, InvalidInputException } from '../src/common/exceptions/billing.exceptions';
import { Course } from '../src/course/entities/course.entity';
import { TRANSACTION_OPTIONS, TransactionRunner } from '../src/database/transaction-runner.service';
import { DebtService } from '../src/debt/debt.service';
import { Enrollment } from '../src/enrollment/entities/enrollment.entity';
import { Log } from '../src/logs/logs.entity';
import { SystemLoggingService } from '../src/logs/system-logging.service';
import { Payment } from '../src/payment/entities/payment.entity';
import { Student } from '../src/student/entities/student.entity';
import {
  COURSE_ID,
  FixedClock,
  Ledger,
  MISSING_ID,
  OTHER_COURSE_ID,
  OTHER_STUDENT_ID,
  STUDENT_ID,
  aCourse,
  aStudent,
  auditLog,
  createLedger,
} from './support/fixtures';
import { InMemoryDataSource } from './support/in-memory-data-source';

function seedCatalog(ledger: Ledger) {
  ledger.db.seed(Student, aStudent(), aStudent({ id: OTHER_STUDENT_ID, name: 'Ana', surname: 'Adams' }));
  ledger.db.seed(Course, aCourse(), aCourse({ id: OTHER_COURSE_ID, name: 'German A2', cost: new Decimal(90), lessonPerMonth: 4 }));
}

function enroll(ledger: Ledger, studentId: string, courseId: string, enrollmentDate: string, lessonsAttended = 0) {
  ledger.db.seed(Enrollment, { studentId, courseId, enrollmentDate, lessonsAttended });
}

function pay(ledger: Ledger, studentId: string, courseId: string, amount: string, date = '2024-03-01') {
  ledger.db.seed(Payment, { studentId, courseId, amount: new Decimal(amount), date, description: 'Monthly payment' });
}

describe('BillingService', () => {
  let ledger: Ledger;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    ledger = createLedger({ today: '2024-03-15' });
    seedCatalog(ledger);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('enrollCourse', () => {
    it('enrolls from today when no date is given', async () => {
      const enrollment = await ledger.billing.enrollCourse({ studentId: STUDENT_ID, courseId: COURSE_ID });

      expect(enrollment).toMatchObject({ studentId: STUDENT_ID, courseId: COURSE_ID, enrollmentDate: '2024-03-15', lessonsAttended: 0 });
      expect(ledger.db.rows(Enrollment)).toHaveLength(1);
      expect(ledger.audit.entries.map((entry) => entry.action)).toEqual(['ENROLLMENT_CREATED']);
      expect(ledger.audit.entries[0].entityId).toBe(enrollment.id);
    });

    it('keeps an explicit enrollment date', async () => {
      const enrollment = await ledger.billing.enrollCourse({ studentId: STUDENT_ID, courseId: COURSE_ID, enrollmentDate: '2024-01-10' });
      expect(enrollment.enrollmentDate).toBe('2024-01-10');
    });

    it('refuses a second enrollment in the same course', async () => {
      await ledger.billing.enrollCourse({ studentId: STUDENT_ID, courseId: COURSE_ID });

      await expect(ledger.billing.enrollCourse({ studentId: STUDENT_ID, courseId: COURSE_ID })).rejects.toThrow(
        new ConflictException('Student already enrolled in this course'),
      );
      expect(ledger.db.rows(Enrollment)).toHaveLength(1);
    });

    it('fails with NotFound for an unknown student or course', async () => {
      await expect(ledger.billing.enrollCourse({ studentId: MISSING_ID, courseId: COURSE_ID })).rejects.toBeInstanceOf(NotFoundException);
      await expect(ledger.billing.enrollCourse({ studentId: STUDENT_ID, courseId: MISSING_ID })).rejects.toBeInstanceOf(NotFoundException);
      expect(ledger.db.rows(Enrollment)).toEqual([]);
    });

    it('rejects an impossible enrollment date', async () => {
      await expect(
        ledger.billing.enrollCourse({ studentId: STUDENT_ID, courseId: COURSE_ID, enrollmentDate: '2024-04-31' }),
      ).rejects.toMatchObject({ problems: ['enrollmentDate must be a valid YYYY-MM-DD date'] });
    });
  });

  describe('addLessonsAttended', () => {
    beforeEach(() => enroll(ledger, STUDENT_ID, COURSE_ID, '2024-01-10'));

    it('adjusts the course counter up and down', async () => {
      expect((await ledger.billing.addLessonsAttended({ studentId: STUDENT_ID, courseId: COURSE_ID, count: 3 })).lessonsAttended).toBe(3);
      expect((await ledger.billing.addLessonsAttended({ studentId: STUDENT_ID, courseId: COURSE_ID, count: -1 })).lessonsAttended).toBe(2);

      expect(ledger.db.rows(Enrollment)[0].lessonsAttended).toBe(2);
      expect(ledger.db.row(Student, STUDENT_ID).numLesson).toBe(0);
      expect(ledger.audit.entries[1]).toMatchObject({
        action: 'LESSONS_ADDED',
        oldValues: { lessonsAttended: 3 },
        newValues: { lessonsAttended: 2 },
      });
    });

    it('refuses to take the counter below zero', async () => {
      await ledger.billing.addLessonsAttended({ studentId: STUDENT_ID, courseId: COURSE_ID, count: 2 });

      await expect(
        ledger.billing.addLessonsAttended({ studentId: STUDENT_ID, courseId: COURSE_ID, count: -3 }),
      ).rejects.toMatchObject({ problems: ['lessonsAttended cannot go below zero (currently 2, adding -3)'] });
      expect(ledger.db.rows(Enrollment)[0].lessonsAttended).toBe(2);
    });

    it('accepts whole numbers only', async () => {
      await expect(
        ledger.billing.addLessonsAttended({ studentId: STUDENT_ID, courseId: COURSE_ID, count: 1.5 }),
      ).rejects.toBeInstanceOf(InvalidInputException);
    });

    it('fails with NotFound without an enrollment', async () => {
      await expect(
        ledger.billing.addLessonsAttended({ studentId: STUDENT_ID, courseId: OTHER_COURSE_ID, count: 1 }),
      ).rejects.toThrow(new NotFoundException('Student not enrolled in this course'));
    });

    it('recounts from the latest value when another write changed the counter', async () => {
      const [row] = ledger.db.rows(Enrollment);
      ledger.db.interfere(1, () =>
        ledger.db.mutate(Enrollment, row.id, (enrollment) => {
          enrollment.lessonsAttended += 2;
        }),
      );

      const enrollment = await ledger.billing.addLessonsAttended({ studentId: STUDENT_ID, courseId: COURSE_ID, count: 3 });

      expect(enrollment.lessonsAttended).toBe(5);
      expect(ledger.db.rows(Enrollment)[0].lessonsAttended).toBe(5);
    });
  });

  describe('recordPayment', () => {
    beforeEach(() => enroll(ledger, STUDENT_ID, COURSE_ID, '2024-01-10'));

    it('stores the payment, credits the balance and returns the refreshed debt', async () => {
      const receipt = await ledger.billing.recordPayment({ studentId: STUDENT_ID, courseId: COURSE_ID, amount: 100 });

      expect(receipt.payment).toMatchObject({ studentId: STUDENT_ID, courseId: COURSE_ID, date: '2024-03-15', description: 'Monthly payment' });
      expect(receipt.payment.amount.toFixed()).toBe('100');
      expect(receipt.debt).toEqual({
        studentId: STUDENT_ID,
        studentName: 'Test Student',
        courseBreakdown: [
          {
            courseId: COURSE_ID,
            courseName: 'English B1',
            monthlyFee: '160',
            monthsEnrolled: 2,
            lessonsAttended: 0,
            expectedLessons: 16,
            totalOwedForCourse: '320',
            enrollmentDate: '2024-01-10',
          },
        ],
        totalMonthlyOwed: '320',
        totalPaid: '100',
        balance: '-220',
        owesMoney: true,
        debtAmount: '220',
        overpaidAmount: '0',
      });
      const student = ledger.db.row(Student, STUDENT_ID);
      expect(student.totalMoney.toFixed()).toBe('100');
      expect(student.version).toBe(1);
      expect(ledger.audit.entries[0]).toMatchObject({ action: 'PAYMENT_RECORDED', entityId: receipt.payment.id });
    });

    it('keeps an explicit date and description', async () => {
      const receipt = await ledger.billing.recordPayment({
        studentId: STUDENT_ID,
        courseId: COURSE_ID,
        amount: 40.25,
        date: '2024-03-01',
        description: 'March, part one',
      });
      expect(receipt.payment.date).toBe('2024-03-01');
      expect(receipt.payment.description).toBe('March, part one');
      expect(receipt.debt.totalPaid).toBe('40.25');
    });

    it.each([0, -10, 10.005])('rejects an amount of %p', async (amount) => {
      await expect(ledger.billing.recordPayment({ studentId: STUDENT_ID, courseId: COURSE_ID, amount })).rejects.toBeInstanceOf(
        InvalidInputException,
      );
      expect(ledger.db.rows(Payment)).toEqual([]);
    });

    it('fails with NotFound for an unknown course and stores nothing', async () => {
      await expect(
        ledger.billing.recordPayment({ studentId: STUDENT_ID, courseId: MISSING_ID, amount: 50 }),
      ).rejects.toThrow(new NotFoundException('Course not found'));
      expect(ledger.db.rows(Payment)).toEqual([]);
    });

    it('rolls back the payment when the balance cannot be committed', async () => {
      ledger = createLedger({ maxRetries: 0 });
      seedCatalog(ledger);
      ledger.db.interfere(1, () =>
        ledger.db.mutate(Student, STUDENT_ID, (student) => {
          student.version += 1;
        }),
      );

      const attempt = ledger.billing.recordPayment({ studentId: STUDENT_ID, courseId: COURSE_ID, amount: 100 });

      await expect(attempt).rejects.toBeInstanceOf(ConcurrencyConflictException);
      await expect(attempt).rejects.toMatchObject({ attempts: 1 });
      expect(ledger.db.rows(Payment)).toEqual([]);
      expect(ledger.db.row(Student, STUDENT_ID).totalMoney.toFixed()).toBe('0');
      expect(ledger.audit.entries.map((entry) => entry.action)).toEqual(['WRITE_ABANDONED']);
    });
  });

  describe('computeMonthlyDebt', () => {
    it('owes nothing without enrollments', async () => {
      const report = await ledger.billing.computeMonthlyDebt(STUDENT_ID);

      expect(report).toMatchObject({
        courseBreakdown: [],
        totalMonthlyOwed: '0',
        totalPaid: '0',
        balance: '0',
        owesMoney: false,
        debtAmount: '0',
        overpaidAmount: '0',
      });
      expect(ledger.db.isolationLevels).toEqual(['REPEATABLE READ']);
    });

    it('bills an enrollment made today for one month and reports an overpayment', async () => {
      enroll(ledger, STUDENT_ID, OTHER_COURSE_ID, '2024-03-15', 1);
      pay(ledger, STUDENT_ID, OTHER_COURSE_ID, '100');

      const report = await ledger.billing.computeMonthlyDebt(STUDENT_ID);

      expect(report.courseBreakdown[0]).toMatchObject({ monthsEnrolled: 1, expectedLessons: 4, lessonsAttended: 1, totalOwedForCourse: '90' });
      expect(report.balance).toBe('10');
      expect(report.owesMoney).toBe(false);
      expect(report.overpaidAmount).toBe('10');
    });

    it('counts payments for any course against the total', async () => {
      enroll(ledger, STUDENT_ID, COURSE_ID, '2024-02-15');
      enroll(ledger, STUDENT_ID, OTHER_COURSE_ID, '2024-02-20');
      pay(ledger, STUDENT_ID, OTHER_COURSE_ID, '200');

      const report = await ledger.billing.computeMonthlyDebt(STUDENT_ID);

      expect(report.totalMonthlyOwed).toBe('250');
      expect(report.balance).toBe('-50');
      expect(report.debtAmount).toBe('50');
    });

    it('fails with NotFound for an unknown student and InvalidInput for a malformed id', async () => {
      await expect(ledger.billing.computeMonthlyDebt(MISSING_ID)).rejects.toBeInstanceOf(NotFoundException);
      await expect(ledger.billing.computeMonthlyDebt('not-a-uuid')).rejects.toBeInstanceOf(InvalidInputException);
    });

    it('writes nothing', async () => {
      enroll(ledger, STUDENT_ID, COURSE_ID, '2024-01-10');
      await ledger.billing.computeMonthlyDebt(STUDENT_ID);
      await ledger.billing.computeMonthlyDebt(STUDENT_ID);

      expect(ledger.db.row(Student, STUDENT_ID).version).toBe(0);
      expect(ledger.audit.entries).toEqual([]);
    });
  });

  describe('computeMonthlySummary', () => {
    it('lists every student by surname with the totals', async () => {
      enroll(ledger, STUDENT_ID, COURSE_ID, '2024-01-10');
      pay(ledger, STUDENT_ID, COURSE_ID, '100');
      enroll(ledger, OTHER_STUDENT_ID, OTHER_COURSE_ID, '2024-03-15');
      pay(ledger, OTHER_STUDENT_ID, OTHER_COURSE_ID, '90');

      const summary = await ledger.billing.computeMonthlySummary();

      expect(summary).toEqual({
        students: [
          { studentId: OTHER_STUDENT_ID, studentName: 'Ana Adams', monthlyOwed: '90', totalPaid: '90', debt: '0', balance: '0' },
          { studentId: STUDENT_ID, studentName: 'Test Student', monthlyOwed: '320', totalPaid: '100', debt: '220', balance: '-220' },
        ],
        totalDebtAllStudents: '220',
        studentsWithDebt: 1,
      });
    });
  });

  describe('computeCourseDebt', () => {
    it('reports each enrolled student against payments for that course only', async () => {
      enroll(ledger, STUDENT_ID, COURSE_ID, '2024-01-10', 5);
      enroll(ledger, OTHER_STUDENT_ID, COURSE_ID, '2024-03-01');
      pay(ledger, STUDENT_ID, COURSE_ID, '100');
      pay(ledger, STUDENT_ID, OTHER_COURSE_ID, '50');
      pay(ledger, OTHER_STUDENT_ID, COURSE_ID, '200');

      const report = await ledger.billing.computeCourseDebt(COURSE_ID);

      expect(report).toEqual({
        courseId: COURSE_ID,
        courseName: 'English B1',
        monthlyFee: '160',
        students: [
          {
            studentId: STUDENT_ID,
            studentName: 'Test Student',
            monthsEnrolled: 2,
            lessonsAttended: 5,
            expectedLessons: 16,
            courseOwed: '320',
            coursePayments: '100',
            balance: '-220',
            debt: '220',
          },
          {
            studentId: OTHER_STUDENT_ID,
            studentName: 'Ana Adams',
            monthsEnrolled: 1,
            lessonsAttended: 0,
            expectedLessons: 8,
            courseOwed: '160',
            coursePayments: '200',
            balance: '40',
            debt: '0',
          },
        ],
        totalCourseDebt: '220',
        studentsWithDebt: 1,
      });
    });

    it('returns an empty report for a course nobody takes', async () => {
      const report = await ledger.billing.computeCourseDebt(OTHER_COURSE_ID);
      expect(report).toEqual({
        courseId: OTHER_COURSE_ID,
        courseName: 'German A2',
        monthlyFee: '90',
        students: [],
        totalCourseDebt: '0',
        studentsWithDebt: 0,
      });
    });

    it('fails with NotFound for an unknown course', async () => {
      await expect(ledger.billing.computeCourseDebt(MISSING_ID)).rejects.toThrow(new NotFoundException('Course not found'));
    });
  });

  describe('computePaymentsByCourse', () => {
    it('sums payments per course, ordered by course name', async () => {
      pay(ledger, STUDENT_ID, OTHER_COURSE_ID, '90');
      pay(ledger, STUDENT_ID, COURSE_ID, '100');
      pay(ledger, OTHER_STUDENT_ID, COURSE_ID, '60.5');

      const report = await ledger.billing.computePaymentsByCourse();

      expect(report).toEqual({
        courses: [
          { courseId: COURSE_ID, courseName: 'English B1', paymentCount: 2, totalAmount: '160.5' },
          { courseId: OTHER_COURSE_ID, courseName: 'German A2', paymentCount: 1, totalAmount: '90' },
        ],
        totalAmount: '250.5',
      });
    });

    it('leaves out courses without payments', async () => {
      pay(ledger, STUDENT_ID, OTHER_COURSE_ID, '45');

      const report = await ledger.billing.computePaymentsByCourse();

      expect(report.courses.map((course) => course.courseId)).toEqual([OTHER_COURSE_ID]);
      expect(report.totalAmount).toBe('45');
    });

    it('reads under repeatable read', async () => {
      await ledger.billing.computePaymentsByCourse();
      expect(ledger.db.isolationLevels).toEqual(['REPEATABLE READ']);
    });
  });

  describe('computeMonthlyPayments', () => {
    it('buckets the payments of one year into twelve months', async () => {
      pay(ledger, STUDENT_ID, COURSE_ID, '100', '2024-01-15');
      pay(ledger, OTHER_STUDENT_ID, COURSE_ID, '50.25', '2024-01-31');
      pay(ledger, STUDENT_ID, OTHER_COURSE_ID, '90', '2024-03-01');
      pay(ledger, STUDENT_ID, COURSE_ID, '70', '2023-12-31');
      pay(ledger, STUDENT_ID, COURSE_ID, '30', '2025-01-01');

      const report = await ledger.billing.computeMonthlyPayments(2024);

      expect(report).toEqual({
        year: 2024,
        months: [
          { month: 1, totalAmount: '150.25' },
          { month: 2, totalAmount: '0' },
          { month: 3, totalAmount: '90' },
          { month: 4, totalAmount: '0' },
          { month: 5, totalAmount: '0' },
          { month: 6, totalAmount: '0' },
          { month: 7, totalAmount: '0' },
          { month: 8, totalAmount: '0' },
          { month: 9, totalAmount: '0' },
          { month: 10, totalAmount: '0' },
          { month: 11, totalAmount: '0' },
          { month: 12, totalAmount: '0' },
        ],
        totalAmount: '240.25',
      });
    });

    it('zero-fills a year without payments', async () => {
      pay(ledger, STUDENT_ID, COURSE_ID, '100', '2024-06-01');

      const report = await ledger.billing.computeMonthlyPayments(2022);

      expect(report.months).toHaveLength(12);
      expect(report.months.every((month) => month.totalAmount === '0')).toBe(true);
      expect(report.totalAmount).toBe('0');
    });

    it('rejects a year that is not a whole number', async () => {
      await expect(ledger.billing.computeMonthlyPayments(2024.5)).rejects.toBeInstanceOf(InvalidInputException);
    });
  });

  describe('computeTotalStudentMoney', () => {
    it('adds up every running balance', async () => {
      ledger.db.mutate(Student, STUDENT_ID, (student) => {
        student.totalMoney = new Decimal('-40.25');
      });
      ledger.db.mutate(Student, OTHER_STUDENT_ID, (student) => {
        student.totalMoney = new Decimal('100.5');
      });

      await expect(ledger.billing.computeTotalStudentMoney()).resolves.toEqual({
        studentCount: 2,
        totalStudentMoney: '60.25',
      });
    });
  });

  describe('attendance delegation', () => {
    it('records and lists attendance through the facade', async () => {
      await ledger.billing.recordAttendance({ studentId: STUDENT_ID, courseId: COURSE_ID, date: '2024-03-04' });
      await ledger.billing.recordAttendance({ studentId: STUDENT_ID, courseId: OTHER_COURSE_ID, date: '2024-03-02', isAbsent: true });
      const updated = await ledger.billing.updateAttendance({
        studentId: STUDENT_ID,
        courseId: OTHER_COURSE_ID,
        date: '2024-03-02',
        chargeMoney: false,
      });

      expect(updated.totalMoney).toBe('-20');
      expect((await ledger.billing.listAttendance(STUDENT_ID)).map((r) => r.date)).toEqual(['2024-03-02', '2024-03-04']);
      expect((await ledger.billing.listAttendance(STUDENT_ID, COURSE_ID)).map((r) => r.date)).toEqual(['2024-03-04']);
    });
  });
});

describe('BillingService wiring', () => {
  it('resolves the facade with its collaborators and runs a payment end to end', async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    const db = new InMemoryDataSource();
    const audit = auditLog();
    db.seed(Student, aStudent());
    db.seed(Course, aCourse());

    const moduleRef = await Test.createTestingModule({
      providers: [
        BillingService,
        AttendanceService,
        DebtService,
        SystemLoggingService,
        TransactionRunner,
        { provide: DataSource, useValue: db.asDataSource() },
        { provide: getRepositoryToken(Log), useValue: audit.repository },
        { provide: CLOCK, useValue: new FixedClock('2024-03-15') },
        { provide: TRANSACTION_OPTIONS, useValue: { maxRetries: 1 } },
      ],
    }).compile();

    const billing = moduleRef.get(BillingService);
    await billing.enrollCourse({ studentId: STUDENT_ID, courseId: COURSE_ID, enrollmentDate: '2024-02-15' });
    const receipt = await billing.recordPayment({ studentId: STUDENT_ID, courseId: COURSE_ID, amount: 160 });

    expect(receipt.debt.balance).toBe('0');
    expect(audit.entries.map((entry) => entry.action)).toEqual(['ENROLLMENT_CREATED', 'PAYMENT_RECORDED']);
    await moduleRef.close();
    jest.restoreAllMocks();
  });
});
