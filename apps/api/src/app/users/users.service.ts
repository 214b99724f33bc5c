import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { AdminUser, MutationResult, UserRole } from '@attendance/shared';
import { Repository } from 'typeorm';
import { normalizeEmail, normalizePersonName } from '../common/utils/names.util';
import { UserEntity } from './user.entity';

export interface EnsureUserResult {
  user: UserEntity;
  created: boolean;
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(UserEntity)
    private readonly usersRepo: Repository<UserEntity>
  ) {}

  async findByEmail(email: string): Promise<UserEntity | null> {
    const normalized = normalizeEmail(email);
    if (!normalized) return null;
    return this.usersRepo.findOne({ where: { email: normalized } });
  }

  /** Returns the existing user for the email, or creates one. Never overwrites. */
  async ensureUser(params: {
    name: string;
    email: string;
    role: UserRole;
  }): Promise<EnsureUserResult> {
    const email = normalizeEmail(params.email);
    const existing = await this.usersRepo.findOne({ where: { email } });
    if (existing) return { user: existing, created: false };

    const created = this.usersRepo.create({
      name: normalizePersonName(params.name),
      email,
      role: params.role,
    });
    const user = await this.usersRepo.save(created);
    this.logger.log(`User created: ${email} (${params.role})`);
    return { user, created: true };
  }

  async createUser(params: {
    name: string;
    email: string;
    role: UserRole;
  }): Promise<MutationResult> {
    const { user, created } = await this.ensureUser(params);
    return {
      ok: true,
      created,
      id: user.id,
      message: created ? 'User created.' : 'User already exists.',
    };
  }

  async listUsers(): Promise<AdminUser[]> {
    const rows = await this.usersRepo.find({ order: { name: 'ASC' } });
    return rows.map((u) => ({ id: u.id, name: u.name, email: u.email, role: u.role }));
  }
}
