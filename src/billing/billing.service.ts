import { ConflictException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { AttendanceService } from '../attendance/attendance.service';
import { AttendanceResult, RecordAttendanceDto, UpdateAttendanceDto } from '../attendance/dtos/attendance.dto';
import { CLOCK, Clock } from '../common/clock/clock';
import { ConcurrencyConflictException, InvalidInputException } from '../common/exceptions/billing.exceptions';
import { Money } from '../common/utils/decimal.transformer';
import { toCommand } from '../common/validation/command';
import { TransactionRunner, isUniqueViolation } from '../database/transaction-runner.service';
import { DebtService } from '../debt/debt.service';
import {
  AggregateDebtReport,
  CourseDebtReport,
  DebtReport,
  MonthlyPaymentsReport,
  PaymentsByCourseReport,
  StudentMoneyTotal,
} from '../debt/dtos/debt-report.dto';
import { Enrollment } from '../enrollment/entities/enrollment.entity';
import { SystemLoggingService } from '../logs/system-logging.service';
import { DEFAULT_PAYMENT_DESCRIPTION, Payment } from '../payment/entities/payment.entity';
import { AttendanceRecord } from '../student/entities/attendance-record';
import { commitLedger, findCourseOrFail, findStudentOrFail } from '../student/student-ledger';
import { AddLessonsDto, EnrollCourseDto } from './dtos/enroll-course.dto';
import { PaymentReceipt, RecordPaymentDto } from './dtos/record-payment.dto';

const ALREADY_ENROLLED = 'Student already enrolled in this course';
const NOT_ENROLLED = 'Student not enrolled in this course';

/**
 * Entry point of the billing ledger. Every write runs in its own transaction and
 * is retried when it loses a race; every read sees one consistent snapshot.
 */
@Injectable()
export class BillingService {
  private readonly logger = new Logger(BillingService.name);

  constructor(
    private readonly transactions: TransactionRunner,
    private readonly attendanceService: AttendanceService,
    private readonly debtService: DebtService,
    private readonly systemLoggingService: SystemLoggingService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  recordAttendance(dto: RecordAttendanceDto): Promise<AttendanceResult> {
    return this.attendanceService.recordAttendance(dto);
  }

  updateAttendance(dto: UpdateAttendanceDto): Promise<AttendanceResult> {
    return this.attendanceService.updateAttendance(dto);
  }

  listAttendance(studentId: string, courseId?: string): Promise<AttendanceRecord[]> {
    return this.attendanceService.listAttendance(courseId === undefined ? { studentId } : { studentId, courseId });
  }

  /** Starts monthly billing of a course for a student. One enrollment per student and course. */
  async enrollCourse(dto: EnrollCourseDto): Promise<Enrollment> {
    const command = toCommand(EnrollCourseDto, dto);
    const enrollmentDate = command.enrollmentDate ?? this.clock.today();

    const enrollment = await this.transactions.write(`enrollment of student ${command.studentId}`, async (manager) => {
      await findStudentOrFail(manager, command.studentId);
      await findCourseOrFail(manager, command.courseId);

      const existing = await manager.findOne(Enrollment, {
        where: { studentId: command.studentId, courseId: command.courseId },
      });
      if (existing) throw new ConflictException(ALREADY_ENROLLED);

      try {
        return await manager.save(
          manager.create(Enrollment, {
            studentId: command.studentId,
            courseId: command.courseId,
            enrollmentDate,
            lessonsAttended: 0,
          }),
        );
      } catch (error) {
        // Lost the race against a concurrent enrollment of the same pair
        if (isUniqueViolation(error)) throw new ConflictException(ALREADY_ENROLLED);
        throw error;
      }
    });

    await this.systemLoggingService.logEnrollmentCreated(
      enrollment.id,
      enrollment.studentId,
      enrollment.courseId,
      enrollment.enrollmentDate,
    );
    return enrollment;
  }

  /**
   * Adjusts the course-scoped lesson counter used for expected-vs-actual
   * reporting. The student's billed lesson count is not touched.
   */
  async addLessonsAttended(dto: AddLessonsDto): Promise<Enrollment> {
    const command = toCommand(AddLessonsDto, dto);

    const { enrollment, previous } = await this.transactions.write(
      `lesson count of student ${command.studentId}`,
      async (manager) => {
        const found = await manager.findOne(Enrollment, {
          where: { studentId: command.studentId, courseId: command.courseId },
        });
        if (!found) throw new NotFoundException(NOT_ENROLLED);

        const before = found.lessonsAttended;
        const after = before + command.count;
        if (after < 0) {
          throw new InvalidInputException([
            `lessonsAttended cannot go below zero (currently ${before}, adding ${command.count})`,
          ]);
        }

        // Compare-and-set on the counter itself
        const result = await manager.update(
          Enrollment,
          { id: found.id, lessonsAttended: before },
          { lessonsAttended: after },
        );
        if (result.affected !== 1) {
          throw new ConcurrencyConflictException(`Enrollment ${found.id} was modified concurrently`);
        }
        found.lessonsAttended = after;
        return { enrollment: found, previous: before };
      },
    );

    await this.systemLoggingService.logLessonsAdded(enrollment.id, command.count, previous, enrollment.lessonsAttended);
    return enrollment;
  }

  /**
   * Appends a payment, credits the student's running balance and returns the
   * debt report as it stands right after the payment.
   */
  async recordPayment(dto: RecordPaymentDto): Promise<PaymentReceipt> {
    const command = toCommand(RecordPaymentDto, dto);
    const today = this.clock.today();
    const amount = new Money(command.amount);

    const receipt = await this.transactions.write(`payment of student ${command.studentId}`, async (manager) => {
      const student = await findStudentOrFail(manager, command.studentId);
      await findCourseOrFail(manager, command.courseId);

      const payment = await manager.save(
        manager.create(Payment, {
          studentId: command.studentId,
          courseId: command.courseId,
          amount,
          date: command.date ?? today,
          description: command.description ?? DEFAULT_PAYMENT_DESCRIPTION,
        }),
      );
      await commitLedger(manager, student, { totalMoney: amount.plus(student.totalMoney) });
      const debt = await this.debtService.buildDebtReport(manager, student.id, today);
      return { payment, debt };
    });

    this.logger.debug(`Student ${command.studentId} balance after payment: ${receipt.debt.balance}`);
    await this.systemLoggingService.logPaymentRecorded(
      receipt.payment.id,
      receipt.payment.studentId,
      receipt.payment.courseId,
      amount.toFixed(),
    );
    return receipt;
  }

  computeMonthlyDebt(studentId: string): Promise<DebtReport> {
    return this.debtService.computeMonthlyDebt(studentId);
  }

  computeMonthlySummary(): Promise<AggregateDebtReport> {
    return this.debtService.computeMonthlySummary();
  }

  computeCourseDebt(courseId: string): Promise<CourseDebtReport> {
    return this.debtService.computeCourseDebt(courseId);
  }

  computePaymentsByCourse(): Promise<PaymentsByCourseReport> {
    return this.debtService.computePaymentsByCourse();
  }

  computeMonthlyPayments(year: number): Promise<MonthlyPaymentsReport> {
    return this.debtService.computeMonthlyPayments(year);
  }

  computeTotalStudentMoney(): Promise<StudentMoneyTotal> {
    return this.debtService.computeTotalStudentMoney();
  }
}
