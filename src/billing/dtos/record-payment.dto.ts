import { IsISO8601, IsNumber, IsOptional, IsPositive, IsString, IsUUID, Matches, MaxLength } from 'class-validator';
import { ISO_DATE_PATTERN } from '../../common/utils/date-utils';
import { DebtReport } from '../../debt/dtos/debt-report.dto';
import { Payment } from '../../payment/entities/payment.entity';

export class RecordPaymentDto {
  @IsUUID()
  studentId!: string;

  @IsUUID()
  courseId!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 })
  @IsPositive()
  amount!: number;

  // Defaults to today
  @IsOptional()
  @Matches(ISO_DATE_PATTERN, { message: 'date must be a valid YYYY-MM-DD date' })
  @IsISO8601({ strict: true }, { message: 'date must be a valid YYYY-MM-DD date' })
  date?: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  description?: string;
}

export interface PaymentReceipt {
  payment: Payment;
  /** Debt report as of right after the payment was committed. */
  debt: DebtReport;
}
