import { UserRole } from '@attendance/shared';
import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ name: 'users' })
export class UserEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 200 })
  name!: string;

  // Stored trimmed and lower-cased.
  @Column({ type: 'varchar', length: 254, unique: true })
  email!: string;

  @Column({ type: 'enum', enum: UserRole })
  role!: UserRole;

  @CreateDateColumn({ type: 'datetime', precision: 3 })
  createdAt!: Date;
}
