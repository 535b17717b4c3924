export { BillingModule } from './billing/billing.module';
export { BillingService } from './billing/billing.service';
export { AddLessonsDto, EnrollCourseDto } from './billing/dtos/enroll-course.dto';
export { PaymentReceipt, RecordPaymentDto } from './billing/dtos/record-payment.dto';
export {
  AttendanceQueryDto,
  AttendanceResult,
  RecordAttendanceDto,
  UpdateAttendanceDto,
} from './attendance/dtos/attendance.dto';
export * from './debt/dtos/debt-report.dto';
export { CLOCK, Clock } from './common/clock/clock';
export { ConcurrencyConflictException, InvalidInputException } from './common/exceptions/billing.exceptions';
export { Course } from './course/entities/course.entity';
export { Enrollment } from './enrollment/entities/enrollment.entity';
export { Payment } from './payment/entities/payment.entity';
export { Student } from './student/entities/student.entity';
export { AttendanceRecord } from './student/entities/attendance-record';
export { Log } from './logs/logs.entity';
