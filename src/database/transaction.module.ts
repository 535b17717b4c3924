import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { LogsModule } from '../logs/logs.module';
import { transactionProviders } from './database.providers';
import { TransactionRunner } from './transaction-runner.service';

@Module({
  imports: [ConfigModule, LogsModule],
  providers: [...transactionProviders, TransactionRunner],
  exports: [TransactionRunner],
})
export class TransactionModule {}
