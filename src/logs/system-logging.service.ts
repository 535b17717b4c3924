import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Log, LogLevel } from './logs.entity';

export interface LogEntry {
  action: string;
  module: string;
  level: LogLevel;
  entityId?: string;
  entityType?: string;
  oldValues?: Record<string, unknown>;
  newValues?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  errorMessage?: string;
  stackTrace?: string;
}

export interface LedgerSnapshot {
  numLesson: number;
  totalMoney: string;
}

const BILLING_MODULE = 'BILLING';

@Injectable()
export class SystemLoggingService {
  private readonly logger = new Logger(SystemLoggingService.name);

  constructor(
    @InjectRepository(Log)
    private logRepository: Repository<Log>,
  ) {}

  async logAction(logEntry: LogEntry): Promise<void> {
    try {
      const log = this.logRepository.create({
        action: logEntry.action,
        module: logEntry.module,
        level: logEntry.level,
        entityId: logEntry.entityId,
        entityType: logEntry.entityType,
        oldValues: logEntry.oldValues,
        newValues: logEntry.newValues,
        metadata: {
          ...logEntry.metadata,
          timestamp: new Date().toISOString(),
          ...(logEntry.errorMessage === undefined
            ? {}
            : { errorMessage: logEntry.errorMessage, stackTrace: logEntry.stackTrace }),
        },
      });

      await this.logRepository.save(log);

      // Also log to console based on level
      const message = `[${logEntry.module}] ${logEntry.action}`;
      const context = `${logEntry.entityType ?? 'Entity'}:${logEntry.entityId ?? '-'}`;

      switch (logEntry.level) {
        case 'error':
          this.logger.error(`${message} ${context}`, logEntry.stackTrace);
          break;
        case 'warn':
          this.logger.warn(`${message} ${context}`);
          break;
        default:
          this.logger.log(`${message} ${context}`);
      }
    } catch (error) {
      // Audit failures never change the outcome of the ledger operation
      const trace = error instanceof Error ? error.stack : String(error);
      this.logger.error(`Failed to save log entry ${logEntry.action}`, trace);
    }
  }

  async logAttendanceRecorded(
    studentId: string,
    record: Record<string, unknown>,
    before: LedgerSnapshot,
    after: LedgerSnapshot,
    overwritten: boolean,
  ) {
    await this.logAction({
      action: 'ATTENDANCE_RECORDED',
      module: BILLING_MODULE,
      // Overwriting replaces an earlier mark for the same lesson
      level: overwritten ? 'warn' : 'info',
      entityId: studentId,
      entityType: 'Student',
      oldValues: { ...before },
      newValues: { ...after, record },
      metadata: {
        overwritten,
        description: `Attendance for course ${String(record.courseId)} on ${String(record.date)} recorded`,
      },
    });
  }

  async logAttendanceUpdated(
    studentId: string,
    previous: Record<string, unknown>,
    record: Record<string, unknown>,
    before: LedgerSnapshot,
    after: LedgerSnapshot,
  ) {
    await this.logAction({
      action: 'ATTENDANCE_UPDATED',
      module: BILLING_MODULE,
      level: 'info',
      entityId: studentId,
      entityType: 'Student',
      oldValues: { ...before, record: previous },
      newValues: { ...after, record },
    });
  }

  async logEnrollmentCreated(enrollmentId: string, studentId: string, courseId: string, enrollmentDate: string) {
    await this.logAction({
      action: 'ENROLLMENT_CREATED',
      module: BILLING_MODULE,
      level: 'info',
      entityId: enrollmentId,
      entityType: 'Enrollment',
      newValues: { studentId, courseId, enrollmentDate },
    });
  }

  async logLessonsAdded(enrollmentId: string, count: number, previous: number, current: number) {
    await this.logAction({
      action: 'LESSONS_ADDED',
      module: BILLING_MODULE,
      level: 'info',
      entityId: enrollmentId,
      entityType: 'Enrollment',
      oldValues: { lessonsAttended: previous },
      newValues: { lessonsAttended: current },
      metadata: { count },
    });
  }

  async logPaymentRecorded(paymentId: string, studentId: string, courseId: string, amount: string) {
    await this.logAction({
      action: 'PAYMENT_RECORDED',
      module: BILLING_MODULE,
      level: 'info',
      entityId: paymentId,
      entityType: 'Payment',
      newValues: { studentId, courseId, amount },
      metadata: {
        description: `Payment of ${amount} recorded for student ${studentId}`,
      },
    });
  }

  async logWriteAbandoned(scope: string, attempts: number, error: Error) {
    await this.logAction({
      action: 'WRITE_ABANDONED',
      module: BILLING_MODULE,
      level: 'error',
      entityType: 'Transaction',
      metadata: { scope, attempts },
      errorMessage: error.message,
      stackTrace: error.stack,
    });
  }
}
