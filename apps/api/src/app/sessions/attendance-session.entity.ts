import {
  Column,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { CourseEntity } from '../courses/course.entity';

// All instants are UTC; the connection runs with timezone 'Z'.
@Entity({ name: 'attendance_sessions' })
export class AttendanceSessionEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'char', length: 36 })
  courseId!: string;

  @ManyToOne(() => CourseEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'courseId' })
  course!: CourseEntity;

  @Column({ type: 'datetime', precision: 3 })
  startTime!: Date;

  @Column({ type: 'datetime', precision: 3, nullable: true })
  endTime!: Date | null;

  @Column({ type: 'boolean', default: true })
  isOpen!: boolean;

  @Column({ type: 'char', length: 32, unique: true })
  token!: string;

  @Column({ type: 'datetime', precision: 3 })
  expiresAt!: Date;
}
