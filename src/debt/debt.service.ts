import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { IsInt, IsUUID, Max, Min } from 'class-validator';
import { Between, EntityManager, In } from 'typeorm';
import { CLOCK, Clock } from '../common/clock/clock';
import { Money, sumDecimals } from '../common/utils/decimal.transformer';
import { toCommand } from '../common/validation/command';
import { Course } from '../course/entities/course.entity';
import { TransactionRunner } from '../database/transaction-runner.service';
import { Enrollment } from '../enrollment/entities/enrollment.entity';
import { Payment } from '../payment/entities/payment.entity';
import { Student } from '../student/entities/student.entity';
import { findStudentOrFail, studentName } from '../student/student-ledger';
import { BilledEnrollment, calculateDebt, chargeForEnrollment, settle } from './debt-calculation';
import {
  AggregateDebtReport,
  CourseDebtReport,
  CoursePaymentTotal,
  CourseStudentDebt,
  DebtReport,
  MonthlyPaymentsReport,
  PaymentsByCourseReport,
  StudentDebtSummary,
  StudentMoneyTotal,
} from './dtos/debt-report.dto';

class StudentRef {
  @IsUUID()
  studentId!: string;
}

class CourseRef {
  @IsUUID()
  courseId!: string;
}

class YearRef {
  @IsInt()
  @Min(1900)
  @Max(9999)
  year!: number;
}

function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const group = groups.get(key(item));
    if (group) group.push(item);
    else groups.set(key(item), [item]);
  }
  return groups;
}

function byId<T extends { id: string }>(items: T[]): Map<string, T> {
  return new Map(items.map((item): [string, T] => [item.id, item]));
}

/**
 * Read side of the ledger. Every report reads one consistent snapshot and
 * writes nothing.
 */
@Injectable()
export class DebtService {
  constructor(
    private readonly transactions: TransactionRunner,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async computeMonthlyDebt(studentId: string): Promise<DebtReport> {
    const ref = toCommand(StudentRef, { studentId });
    const today = this.clock.today();
    return this.transactions.read((manager) => this.buildDebtReport(manager, ref.studentId, today));
  }

  /** Also used inside write transactions, so callers see their own uncommitted changes. */
  async buildDebtReport(manager: EntityManager, studentId: string, today: string): Promise<DebtReport> {
    const student = await findStudentOrFail(manager, studentId);
    const enrollments = await manager.find(Enrollment, { where: { studentId } });
    const payments = await manager.find(Payment, { where: { studentId } });
    const courses = await this.loadCourses(manager, enrollments);

    const debt = calculateDebt(this.billed(enrollments, courses), payments, today);
    return {
      studentId: student.id,
      studentName: studentName(student),
      courseBreakdown: debt.charges.map(({ enrollment, monthsEnrolled, expectedLessons, owed }) => ({
        courseId: enrollment.courseId,
        courseName: enrollment.courseName,
        monthlyFee: enrollment.cost.toFixed(),
        monthsEnrolled,
        lessonsAttended: enrollment.lessonsAttended,
        expectedLessons,
        totalOwedForCourse: owed.toFixed(),
        enrollmentDate: enrollment.enrollmentDate,
      })),
      totalMonthlyOwed: debt.totalOwed.toFixed(),
      totalPaid: debt.totalPaid.toFixed(),
      balance: debt.balance.toFixed(),
      owesMoney: debt.owesMoney,
      debtAmount: debt.debtAmount.toFixed(),
      overpaidAmount: debt.overpaidAmount.toFixed(),
    };
  }

  async computeMonthlySummary(): Promise<AggregateDebtReport> {
    const today = this.clock.today();
    return this.transactions.read(async (manager) => {
      const students = await manager.find(Student, { order: { surname: 'ASC', name: 'ASC' } });
      const enrollments = groupBy(await manager.find(Enrollment), (e) => e.studentId);
      const payments = groupBy(await manager.find(Payment), (p) => p.studentId);
      const courses = byId(await manager.find(Course));

      const summaries: StudentDebtSummary[] = students.map((student) => {
        const debt = calculateDebt(
          this.billed(enrollments.get(student.id) ?? [], courses),
          payments.get(student.id) ?? [],
          today,
        );
        return {
          studentId: student.id,
          studentName: studentName(student),
          monthlyOwed: debt.totalOwed.toFixed(),
          totalPaid: debt.totalPaid.toFixed(),
          debt: debt.debtAmount.toFixed(),
          balance: debt.balance.toFixed(),
        };
      });

      const debts = summaries.map((summary) => new Money(summary.debt));
      return {
        students: summaries,
        totalDebtAllStudents: sumDecimals(debts).toFixed(),
        studentsWithDebt: debts.filter((debt) => debt.greaterThan(0)).length,
      };
    });
  }

  /** Debt of every student enrolled in one course, counting only payments made for that course. */
  async computeCourseDebt(courseId: string): Promise<CourseDebtReport> {
    const ref = toCommand(CourseRef, { courseId });
    const today = this.clock.today();
    return this.transactions.read(async (manager) => {
      const course = await manager.findOne(Course, { where: { id: ref.courseId } });
      if (!course) throw new NotFoundException('Course not found');

      const enrollments = await manager.find(Enrollment, { where: { courseId: course.id } });
      if (enrollments.length === 0) {
        return {
          courseId: course.id,
          courseName: course.name,
          monthlyFee: course.cost.toFixed(),
          students: [],
          totalCourseDebt: '0',
          studentsWithDebt: 0,
        };
      }
      const studentIds = enrollments.map((enrollment) => enrollment.studentId);
      const students = byId(await manager.find(Student, { where: { id: In(studentIds) } }));
      const payments = groupBy(
        await manager.find(Payment, { where: { courseId: course.id, studentId: In(studentIds) } }),
        (payment) => payment.studentId,
      );

      const billed = this.billed(enrollments, byId([course]));
      const lines: CourseStudentDebt[] = [];
      enrollments.forEach((enrollment, index) => {
        const student = students.get(enrollment.studentId);
        if (!student) return;
        const charge = chargeForEnrollment(billed[index], today);
        const paid = sumDecimals((payments.get(student.id) ?? []).map((payment) => payment.amount));
        const balance = settle(charge.owed, paid);
        lines.push({
          studentId: student.id,
          studentName: studentName(student),
          monthsEnrolled: charge.monthsEnrolled,
          lessonsAttended: enrollment.lessonsAttended,
          expectedLessons: charge.expectedLessons,
          courseOwed: charge.owed.toFixed(),
          coursePayments: paid.toFixed(),
          balance: balance.balance.toFixed(),
          debt: balance.debtAmount.toFixed(),
        });
      });

      const debts = lines.map((line) => new Money(line.debt));
      return {
        courseId: course.id,
        courseName: course.name,
        monthlyFee: course.cost.toFixed(),
        students: lines,
        totalCourseDebt: sumDecimals(debts).toFixed(),
        studentsWithDebt: debts.filter((debt) => debt.greaterThan(0)).length,
      };
    });
  }

  /** Every payment ever received, per course. Courses without payments are left out. */
  async computePaymentsByCourse(): Promise<PaymentsByCourseReport> {
    return this.transactions.read(async (manager) => {
      const payments = groupBy(await manager.find(Payment), (payment) => payment.courseId);
      const courses = byId(await manager.find(Course));

      const totals: CoursePaymentTotal[] = [...payments].map(([courseId, coursePayments]) => {
        const course = courses.get(courseId);
        if (!course) throw new NotFoundException(`Course ${courseId} of a recorded payment not found`);
        return {
          courseId,
          courseName: course.name,
          paymentCount: coursePayments.length,
          totalAmount: sumDecimals(coursePayments.map((payment) => payment.amount)).toFixed(),
        };
      });
      totals.sort((a, b) => a.courseName.localeCompare(b.courseName) || a.courseId.localeCompare(b.courseId));

      return {
        courses: totals,
        totalAmount: sumDecimals(totals.map((total) => new Money(total.totalAmount))).toFixed(),
      };
    });
  }

  /** Payments received in each calendar month of `year`, by payment date; months without any are '0'. */
  async computeMonthlyPayments(year: number): Promise<MonthlyPaymentsReport> {
    const ref = toCommand(YearRef, { year });
    return this.transactions.read(async (manager) => {
      const payments = await manager.find(Payment, {
        where: { date: Between(`${ref.year}-01-01`, `${ref.year}-12-31`) },
      });
      const byMonth = groupBy(payments, (payment) => payment.date.slice(5, 7));

      const months = Array.from({ length: 12 }, (_, index) => {
        const month = index + 1;
        const inMonth = byMonth.get(String(month).padStart(2, '0')) ?? [];
        return { month, totalAmount: sumDecimals(inMonth.map((payment) => payment.amount)).toFixed() };
      });
      return {
        year: ref.year,
        months,
        totalAmount: sumDecimals(payments.map((payment) => payment.amount)).toFixed(),
      };
    });
  }

  /** Sum of every student's running balance. */
  async computeTotalStudentMoney(): Promise<StudentMoneyTotal> {
    return this.transactions.read(async (manager) => {
      const students = await manager.find(Student);
      return {
        studentCount: students.length,
        totalStudentMoney: sumDecimals(students.map((student) => student.totalMoney)).toFixed(),
      };
    });
  }

  private async loadCourses(manager: EntityManager, enrollments: Enrollment[]): Promise<Map<string, Course>> {
    if (enrollments.length === 0) return new Map();
    const courses = await manager.find(Course, {
      where: { id: In(enrollments.map((enrollment) => enrollment.courseId)) },
    });
    return byId(courses);
  }

  private billed(enrollments: Enrollment[], courses: Map<string, Course>): BilledEnrollment[] {
    return enrollments.map((enrollment) => {
      const course = courses.get(enrollment.courseId);
      if (!course) {
        // Enrollment rows cascade with their course, so this means a broken foreign key
        throw new NotFoundException(`Course ${enrollment.courseId} of enrollment ${enrollment.id} not found`);
      }
      return {
        courseId: course.id,
        courseName: course.name,
        cost: course.cost,
        lessonPerMonth: course.lessonPerMonth,
        enrollmentDate: enrollment.enrollmentDate,
        lessonsAttended: enrollment.lessonsAttended,
      };
    });
  }
}
