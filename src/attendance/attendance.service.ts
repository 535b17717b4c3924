import { Injectable } from '@nestjs/common';
import { Decimal } from 'decimal.js';
import { toCommand } from '../common/validation/command';
import { TransactionRunner } from '../database/transaction-runner.service';
import { LedgerSnapshot, SystemLoggingService } from '../logs/system-logging.service';
import { AttendanceRecord } from '../student/entities/attendance-record';
import { Student } from '../student/entities/student.entity';
import { commitLedger, findCourseOrFail, findStudentOrFail, ledgerOf } from '../student/student-ledger';
import {
  ReconciliationOutcome,
  amendAttendance,
  applyAttendance,
  lessonCost,
  sortAttendance,
} from './attendance-reconciliation';
import {
  AttendanceQueryDto,
  AttendanceResult,
  RecordAttendanceDto,
  UpdateAttendanceDto,
} from './dtos/attendance.dto';

interface CommittedReconciliation {
  outcome: ReconciliationOutcome;
  before: LedgerSnapshot;
  student: Student;
  cost: Decimal;
}

function snapshot(ledger: { numLesson: number; totalMoney: Decimal }): LedgerSnapshot {
  return { numLesson: ledger.numLesson, totalMoney: ledger.totalMoney.toFixed() };
}

function plainRecord(record: AttendanceRecord): AttendanceResult['record'] {
  return {
    date: record.date,
    courseId: record.courseId,
    isAbsent: record.isAbsent,
    chargeMoney: record.chargeMoney,
    reason: record.reason,
  };
}

@Injectable()
export class AttendanceService {
  constructor(
    private readonly transactions: TransactionRunner,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  /**
   * Marks a student present or absent for a course on a date and charges the
   * lesson. Recording the same course and date again replaces the earlier mark.
   */
  async recordAttendance(input: RecordAttendanceDto): Promise<AttendanceResult> {
    const command = toCommand(RecordAttendanceDto, input);
    const record: AttendanceRecord = {
      date: command.date,
      courseId: command.courseId,
      isAbsent: command.isAbsent ?? false,
      chargeMoney: command.chargeMoney ?? true,
      reason: command.reason ?? '',
    };

    const committed = await this.reconcile(command.studentId, command.courseId, (student, cost) =>
      applyAttendance(ledgerOf(student), record, cost),
    );

    const { outcome, before, student } = committed;
    await this.systemLoggingService.logAttendanceRecorded(
      student.id,
      { ...plainRecord(outcome.record) },
      before,
      snapshot(student),
      outcome.replaced !== null,
    );
    return this.toResult(committed);
  }

  /** Changes an existing attendance mark; fails with NotFound when there is none for the key. */
  async updateAttendance(input: UpdateAttendanceDto): Promise<AttendanceResult> {
    const command = toCommand(UpdateAttendanceDto, input);
    const committed = await this.reconcile(command.studentId, command.courseId, (student, cost) =>
      amendAttendance(
        ledgerOf(student),
        { courseId: command.courseId, date: command.date },
        { isAbsent: command.isAbsent, chargeMoney: command.chargeMoney, reason: command.reason },
        cost,
      ),
    );

    const { outcome, before, student } = committed;
    await this.systemLoggingService.logAttendanceUpdated(
      student.id,
      outcome.replaced ? { ...plainRecord(outcome.replaced) } : {},
      { ...plainRecord(outcome.record) },
      before,
      snapshot(student),
    );
    return this.toResult(committed);
  }

  async listAttendance(input: AttendanceQueryDto): Promise<AttendanceRecord[]> {
    const query = toCommand(AttendanceQueryDto, input);
    const student = await this.transactions.read((manager) => findStudentOrFail(manager, query.studentId));
    const records = query.courseId
      ? student.attendance.filter((record) => record.courseId === query.courseId)
      : student.attendance;
    return sortAttendance(records);
  }

  // Load, reconcile against the course's current price, write back under the
  // student's version check. Retried as a whole on conflict.
  private reconcile(
    studentId: string,
    courseId: string,
    step: (student: Student, cost: Decimal) => ReconciliationOutcome,
  ): Promise<CommittedReconciliation> {
    return this.transactions.write(`attendance for student ${studentId}`, async (manager) => {
      const student = await findStudentOrFail(manager, studentId);
      const course = await findCourseOrFail(manager, courseId);
      const cost = lessonCost(course);
      const before = snapshot(student);
      const outcome = step(student, cost);
      const saved = await commitLedger(manager, student, outcome.state);
      return { outcome, before, student: saved, cost };
    });
  }

  private toResult({ outcome, student, cost }: CommittedReconciliation): AttendanceResult {
    return {
      studentId: student.id,
      record: plainRecord(outcome.record),
      lessonCost: cost.toFixed(),
      numLesson: student.numLesson,
      totalMoney: student.totalMoney.toFixed(),
    };
  }
}
