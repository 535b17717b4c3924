// src/enrollment/entities/enrollment.entity.ts
import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { Course } from '../../course/entities/course.entity';
import { Student } from '../../student/entities/student.entity';

export const ENROLLMENT_UNIQUE_CONSTRAINT = 'UQ_student_course_progress_student_course';

@Entity('student_course_progress')
@Unique(ENROLLMENT_UNIQUE_CONSTRAINT, ['studentId', 'courseId'])
export class Enrollment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  studentId!: string;

  @Column({ type: 'uuid' })
  courseId!: string;

  // Monthly billing for the course starts here
  @Column({ type: 'date' })
  enrollmentDate!: string;

  // Course-scoped counter, independent of Student.numLesson
  @Column({ type: 'int', default: 0 })
  lessonsAttended!: number;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToOne(() => Student, (student) => student.enrollments, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'studentId' })
  student?: Student;

  @ManyToOne(() => Course, (course) => course.enrollments, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'courseId' })
  course?: Course;
}
