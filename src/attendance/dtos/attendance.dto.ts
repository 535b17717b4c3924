import { IsBoolean, IsISO8601, IsOptional, IsString, IsUUID, Matches, MaxLength } from 'class-validator';
import { ISO_DATE_PATTERN } from '../../common/utils/date-utils';

const DATE_MESSAGE = 'date must be a valid YYYY-MM-DD date';

export class RecordAttendanceDto {
  @IsUUID()
  studentId!: string;

  @IsUUID()
  courseId!: string;

  @Matches(ISO_DATE_PATTERN, { message: DATE_MESSAGE })
  @IsISO8601({ strict: true }, { message: DATE_MESSAGE })
  date!: string;

  @IsOptional()
  @IsBoolean()
  isAbsent?: boolean;

  @IsOptional()
  @IsBoolean()
  chargeMoney?: boolean;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  reason?: string;
}

// Same key; every other field left out keeps its stored value.
export class UpdateAttendanceDto extends RecordAttendanceDto {}

export class AttendanceQueryDto {
  @IsUUID()
  studentId!: string;

  @IsOptional()
  @IsUUID()
  courseId?: string;
}

export interface AttendanceResult {
  studentId: string;
  record: {
    date: string;
    courseId: string;
    isAbsent: boolean;
    chargeMoney: boolean;
    reason: string;
  };
  lessonCost: string;
  numLesson: number;
  totalMoney: string;
}
