import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { UserEntity } from '../users/user.entity';
import { CourseEntity } from './course.entity';

@Entity({ name: 'course_instructors' })
@Unique(['courseId', 'userId'])
export class CourseInstructorEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'char', length: 36 })
  courseId!: string;

  @Column({ type: 'char', length: 36 })
  userId!: string;

  @ManyToOne(() => CourseEntity, (course) => course.instructors, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'courseId' })
  course!: CourseEntity;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: UserEntity;

  @CreateDateColumn({ type: 'datetime', precision: 3 })
  createdAt!: Date;
}
