import { Column, Entity, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { Decimal } from 'decimal.js';
import { DecimalTransformer } from '../../common/utils/decimal.transformer';
import { Enrollment } from '../../enrollment/entities/enrollment.entity';

@Entity('courses')
export class Course {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 100 })
  name!: string;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  weekDays!: string[];

  @Column({ type: 'int' })
  lessonPerMonth!: number;

  // Monthly fee
  @Column({ type: 'numeric', precision: 12, scale: 2, transformer: new DecimalTransformer() })
  cost!: Decimal;

  @OneToMany(() => Enrollment, (enrollment) => enrollment.course)
  enrollments?: Enrollment[];
}
