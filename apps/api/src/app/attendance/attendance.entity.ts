import {
  Column,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { AttendanceSessionEntity } from '../sessions/attendance-session.entity';

@Entity({ name: 'attendance' })
@Unique(['sessionId', 'studentEmail'])
export class AttendanceEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'char', length: 36 })
  sessionId!: string;

  @ManyToOne(() => AttendanceSessionEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'sessionId' })
  session!: AttendanceSessionEntity;

  @Column({ type: 'varchar', length: 200 })
  studentName!: string;

  @Column({ type: 'varchar', length: 254 })
  studentEmail!: string;

  // Set by the ledger at acceptance, not by the database default.
  @Column({ type: 'datetime', precision: 3 })
  createdAt!: Date;
}
