import { ConfigService } from '../config/config.service';
import { TRANSACTION_OPTIONS, TransactionOptions } from './transaction-runner.service';

export const transactionProviders = [
  {
    provide: TRANSACTION_OPTIONS,
    useFactory: (configService: ConfigService): TransactionOptions => ({
      maxRetries: configService.getInt('BILLING_MAX_RETRIES', 3),
    }),
    inject: [ConfigService],
  },
];
