import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UsersModule } from '../users/users.module';
import { UserEntity } from '../users/user.entity';
import { CourseImportService } from './course-import.service';
import { CourseInstructorEntity } from './course-instructor.entity';
import { CourseEntity } from './course.entity';
import { CoursesController } from './courses.controller';
import { CoursesService } from './courses.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([CourseEntity, CourseInstructorEntity, UserEntity]),
    UsersModule,
  ],
  controllers: [CoursesController],
  providers: [CoursesService, CourseImportService],
  exports: [CoursesService, CourseImportService],
})
export class CoursesModule {}
