import { Module } from '@nestjs/common';
import { ClockModule } from '../common/clock/clock.module';
import { TransactionModule } from '../database/transaction.module';
import { DebtService } from './debt.service';

@Module({
  imports: [TransactionModule, ClockModule],
  providers: [DebtService],
  exports: [DebtService],
})
export class DebtModule {}
