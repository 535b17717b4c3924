import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Decimal } from 'decimal.js';
import { DecimalTransformer } from '../../common/utils/decimal.transformer';
import { Course } from '../../course/entities/course.entity';
import { Student } from '../../student/entities/student.entity';

export const DEFAULT_PAYMENT_DESCRIPTION = 'Monthly payment';

// Append-only: the ledger never updates or deletes a payment.
@Entity('payments')
export class Payment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  studentId!: string;

  @Index()
  @Column({ type: 'uuid' })
  courseId!: string;

  @Column({ type: 'numeric', precision: 12, scale: 2, transformer: new DecimalTransformer() })
  amount!: Decimal;

  @Column({ type: 'date' })
  date!: string;

  @Column({ type: 'varchar', length: 200, default: DEFAULT_PAYMENT_DESCRIPTION })
  description!: string;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToOne(() => Student, (student) => student.payments, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'studentId' })
  student?: Student;

  @ManyToOne(() => Course, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'courseId' })
  course?: Course;
}
