import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { CourseInstructorItem, CourseSummary, MutationResult } from '@attendance/shared';
import { Repository } from 'typeorm';
import { AccessPolicy } from '../access/access-policy';
import { normalizeEmail } from '../common/utils/names.util';
import { UserEntity } from '../users/user.entity';
import { CourseInstructorEntity } from './course-instructor.entity';
import { CourseEntity } from './course.entity';

function toSummary(course: CourseEntity): CourseSummary {
  return { id: course.id, code: course.code, title: course.title };
}

@Injectable()
export class CoursesService {
  private readonly logger = new Logger(CoursesService.name);

  constructor(
    @InjectRepository(CourseEntity)
    private readonly coursesRepo: Repository<CourseEntity>,
    @InjectRepository(CourseInstructorEntity)
    private readonly linksRepo: Repository<CourseInstructorEntity>,
    @InjectRepository(UserEntity)
    private readonly usersRepo: Repository<UserEntity>,
    private readonly accessPolicy: AccessPolicy
  ) {}

  async getByIdOrThrow(id: string): Promise<CourseEntity> {
    const course = await this.coursesRepo.findOne({ where: { id } });
    if (!course) throw new NotFoundException('Course not found.');
    return course;
  }

  async ensureCourse(params: { code: string; title: string }) {
    const code = params.code.trim();
    const existing = await this.coursesRepo.findOne({ where: { code } });
    if (existing) return { course: existing, created: false };

    const course = await this.coursesRepo.save(
      this.coursesRepo.create({ code, title: params.title.trim() })
    );
    this.logger.log(`Course created: ${code}`);
    return { course, created: true };
  }

  async ensureAssignment(courseId: string, userId: string) {
    const existing = await this.linksRepo.findOne({ where: { courseId, userId } });
    if (existing) return { link: existing, created: false };
    const link = await this.linksRepo.save(this.linksRepo.create({ courseId, userId }));
    return { link, created: true };
  }

  async createCourse(params: { code: string; title: string }): Promise<MutationResult> {
    const { course, created } = await this.ensureCourse(params);
    return {
      ok: true,
      created,
      id: course.id,
      message: created ? 'Course created.' : 'Course already exists.',
    };
  }

  async listCourses(): Promise<CourseSummary[]> {
    const rows = await this.coursesRepo.find({ order: { code: 'ASC' } });
    return rows.map(toSummary);
  }

  async assignInstructor(courseId: string, userId: string): Promise<MutationResult> {
    await this.getByIdOrThrow(courseId);
    const user = await this.usersRepo.findOne({ where: { id: userId } });
    if (!user) throw new NotFoundException('User not found.');

    const { link, created } = await this.ensureAssignment(courseId, userId);
    if (created) {
      this.logger.log(`Instructor ${user.email} assigned to course ${courseId}`);
    }
    return {
      ok: true,
      created,
      id: link.id,
      message: created ? 'Instructor assigned.' : 'Already assigned.',
    };
  }

  async listInstructors(courseId: string): Promise<CourseInstructorItem[]> {
    await this.getByIdOrThrow(courseId);
    const links = await this.linksRepo.find({
      where: { courseId },
      relations: { user: true },
    });
    return links
      .map((link) => ({ userId: link.userId, name: link.user.name, email: link.user.email }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Courses an instructor may run sessions for; admins get every course. */
  async listCoursesForInstructor(email: string): Promise<CourseSummary[]> {
    const normalized = normalizeEmail(email);
    if (this.accessPolicy.isAdmin(normalized)) return this.listCourses();

    const links = await this.linksRepo.find({
      where: { user: { email: normalized } },
      relations: { course: true },
    });
    return links
      .map((link) => toSummary(link.course))
      .sort((a, b) => a.code.localeCompare(b.code));
  }

  async canManageCourse(email: string, courseId: string): Promise<boolean> {
    const normalized = normalizeEmail(email);
    if (this.accessPolicy.isAdmin(normalized)) return true;
    if (!this.accessPolicy.isInstructor(normalized)) return false;
    const count = await this.linksRepo.count({
      where: { courseId, user: { email: normalized } },
    });
    return count > 0;
  }
}
