import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { BillingService } from '../billing/billing.service';

async function printMonthlyDebtReport() {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });

  try {
    const summary = await app.get(BillingService).computeMonthlySummary();

    console.log(`\nMonthly debt summary (${summary.students.length} students)\n`);
    summary.students.forEach((student, index) => {
      console.log(`${index + 1}. ${student.studentName}`);
      console.log(`   Owed: ${student.monthlyOwed}  Paid: ${student.totalPaid}  Balance: ${student.balance}`);
      if (student.debt !== '0') {
        console.log(`   Debt: ${student.debt}`);
      }
    });
    console.log(`\nStudents with debt: ${summary.studentsWithDebt}`);
    console.log(`Total debt: ${summary.totalDebtAllStudents}`);
  } finally {
    await app.close();
  }
}

printMonthlyDebtReport().catch((error: unknown) => {
  new Logger('MonthlyDebtReport').error(
    'Failed to build the monthly debt report',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
