import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { BillingModule } from './billing/billing.module';

@Module({
  imports: [ConfigModule, DatabaseModule, BillingModule],
})
export class AppModule {}
