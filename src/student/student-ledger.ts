import { NotFoundException } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { LedgerState } from '../attendance/attendance-reconciliation';
import { ConcurrencyConflictException } from '../common/exceptions/billing.exceptions';
import { Course } from '../course/entities/course.entity';
import { Student } from './entities/student.entity';

export async function findStudentOrFail(manager: EntityManager, studentId: string): Promise<Student> {
  const student = await manager.findOne(Student, { where: { id: studentId } });
  if (!student) throw new NotFoundException('Student not found');
  return student;
}

export async function findCourseOrFail(manager: EntityManager, courseId: string): Promise<Course> {
  const course = await manager.findOne(Course, { where: { id: courseId } });
  if (!course) throw new NotFoundException('Course not found');
  return course;
}

export function ledgerOf(student: Student): LedgerState {
  return {
    numLesson: student.numLesson,
    totalMoney: student.totalMoney,
    attendance: student.attendance,
  };
}

export function studentName(student: Pick<Student, 'name' | 'surname'>): string {
  return `${student.name} ${student.surname}`;
}

/**
 * Writes the ledger fields back only if nobody else committed a change to the
 * student since it was read; otherwise the caller's transaction is aborted with
 * a ConcurrencyConflictException for the runner to retry.
 */
export async function commitLedger(
  manager: EntityManager,
  student: Student,
  state: Partial<LedgerState>,
): Promise<Student> {
  const changes = {
    numLesson: state.numLesson ?? student.numLesson,
    totalMoney: state.totalMoney ?? student.totalMoney,
    attendance: state.attendance ?? student.attendance,
    version: student.version + 1,
  };
  const result = await manager.update(Student, { id: student.id, version: student.version }, changes);
  if (result.affected !== 1) {
    throw new ConcurrencyConflictException(`Student ${student.id} was modified concurrently`);
  }
  return Object.assign(student, changes);
}
