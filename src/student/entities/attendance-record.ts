import { plainToInstance } from 'class-transformer';
import { IsBoolean, IsNotEmpty, IsString, Matches, MaxLength, validateSync } from 'class-validator';
import { InvalidInputException } from '../../common/exceptions/billing.exceptions';
import { ISO_DATE_PATTERN } from '../../common/utils/date-utils';
import { flattenValidationErrors } from '../../common/validation/command';

/**
 * One attendance mark, embedded in the student's `attendance` column.
 * Identified by (student, courseId, date); a student has at most one per key.
 */
export class AttendanceRecord {
  @Matches(ISO_DATE_PATTERN, { message: 'date must be a YYYY-MM-DD date' })
  date!: string;

  @IsString()
  @IsNotEmpty()
  courseId!: string;

  @IsBoolean()
  isAbsent = false;

  // Whether the lesson is billed. An excused absence is isAbsent && !chargeMoney.
  @IsBoolean()
  chargeMoney = true;

  @IsString()
  @MaxLength(200)
  reason = '';
}

export interface AttendanceKey {
  courseId: string;
  date: string;
}

export function sameAttendanceKey(record: AttendanceKey, key: AttendanceKey): boolean {
  return record.courseId === key.courseId && record.date === key.date;
}

/**
 * Reads the stored `jsonb` list back into typed records. Older rows written
 * before charging existed lack `chargeMoney`/`reason` and pick up the defaults.
 */
export function parseAttendanceRecords(raw: unknown): AttendanceRecord[] {
  if (raw === null || raw === undefined) return [];
  const list: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
  if (!Array.isArray(list)) {
    throw new InvalidInputException(['attendance must be a list of records']);
  }

  const records = list.map((item: unknown, index) => {
    if (typeof item !== 'object' || item === null) {
      throw new InvalidInputException([`attendance.${index} must be an object`]);
    }
    return plainToInstance(AttendanceRecord, item);
  });

  const problems = records.flatMap((record, index) =>
    flattenValidationErrors(validateSync(record), `attendance.${index}`),
  );
  if (problems.length > 0) {
    throw new InvalidInputException(problems);
  }
  return records;
}

export const attendanceTransformer = {
  to: (records: AttendanceRecord[] | undefined) =>
    records?.map(({ date, courseId, isAbsent, chargeMoney, reason }) => ({
      date,
      courseId,
      isAbsent,
      chargeMoney,
      reason,
    })),
  from: (raw: unknown) => parseAttendanceRecords(raw),
};
