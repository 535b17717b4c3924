import { Module } from '@nestjs/common';
import { AttendanceModule } from '../attendance/attendance.module';
import { ClockModule } from '../common/clock/clock.module';
import { TransactionModule } from '../database/transaction.module';
import { DebtModule } from '../debt/debt.module';
import { LogsModule } from '../logs/logs.module';
import { BillingService } from './billing.service';

// Expects a TypeORM DataSource from the importing application (see DatabaseModule).
@Module({
  imports: [TransactionModule, ClockModule, LogsModule, AttendanceModule, DebtModule],
  providers: [BillingService],
  exports: [BillingService],
})
export class BillingModule {}
