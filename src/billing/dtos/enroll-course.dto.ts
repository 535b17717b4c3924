import { IsISO8601, IsInt, IsOptional, IsUUID, Matches } from 'class-validator';
import { ISO_DATE_PATTERN } from '../../common/utils/date-utils';

export class EnrollCourseDto {
  @IsUUID()
  studentId!: string;

  @IsUUID()
  courseId!: string;

  // Defaults to today
  @IsOptional()
  @Matches(ISO_DATE_PATTERN, { message: 'enrollmentDate must be a valid YYYY-MM-DD date' })
  @IsISO8601({ strict: true }, { message: 'enrollmentDate must be a valid YYYY-MM-DD date' })
  enrollmentDate?: string;
}

export class AddLessonsDto {
  @IsUUID()
  studentId!: string;

  @IsUUID()
  courseId!: string;

  // May be negative to correct an earlier count, as long as the total stays >= 0
  @IsInt()
  count!: number;
}
