import { Module } from '@nestjs/common';
import { TransactionModule } from '../database/transaction.module';
import { LogsModule } from '../logs/logs.module';
import { AttendanceService } from './attendance.service';

@Module({
  imports: [TransactionModule, LogsModule],
  providers: [AttendanceService],
  exports: [AttendanceService],
})
export class AttendanceModule {}
