import { Column, Entity, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { Decimal } from 'decimal.js';
import { DecimalTransformer } from '../../common/utils/decimal.transformer';
import { Enrollment } from '../../enrollment/entities/enrollment.entity';
import { Payment } from '../../payment/entities/payment.entity';
import { AttendanceRecord, attendanceTransformer } from './attendance-record';

@Entity('students')
export class Student {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 50 })
  name!: string;

  @Column({ length: 50 })
  surname!: string;

  @Column({ type: 'varchar', length: 50, nullable: true })
  secondName!: string | null;

  @Column({ type: 'date' })
  startingDate!: string;

  // Lessons billed while present, across all courses
  @Column({ type: 'int', default: 0 })
  numLesson!: number;

  // Unconstrained numeric: lesson costs are exact quotients and must reverse to the cent
  @Column({ type: 'numeric', default: 0, transformer: new DecimalTransformer() })
  totalMoney!: Decimal;

  @Column({ type: 'jsonb', default: () => "'[]'", transformer: attendanceTransformer })
  attendance!: AttendanceRecord[];

  @Column({ default: false })
  isArchived!: boolean;

  @Column({ type: 'int', default: 0 })
  version!: number;

  @OneToMany(() => Enrollment, (enrollment) => enrollment.student)
  enrollments?: Enrollment[];

  @OneToMany(() => Payment, (payment) => payment.student)
  payments?: Payment[];
}
