import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Post,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiConsumes, ApiTags } from '@nestjs/swagger';
import { AccessRole } from '@attendance/shared';
import { Roles } from '../common/decorators/roles.decorator';
import { RolesGuard } from '../common/guards/roles.guard';
import { CourseImportService } from './course-import.service';
import { CoursesService } from './courses.service';
import { AssignInstructorDto } from './dto/assign-instructor.dto';
import { BulkImportDto } from './dto/bulk-import.dto';
import { CreateCourseDto } from './dto/create-course.dto';

interface UploadedSpreadsheet {
  buffer: Buffer;
  originalname: string;
}

@ApiTags('admin')
@UseGuards(RolesGuard)
@Roles(AccessRole.ADMIN)
@Controller('admin/courses')
export class CoursesController {
  constructor(
    private readonly coursesService: CoursesService,
    private readonly courseImportService: CourseImportService
  ) {}

  @Get()
  list() {
    return this.coursesService.listCourses();
  }

  @Post()
  create(@Body() dto: CreateCourseDto) {
    return this.coursesService.createCourse(dto);
  }

  @Get(':courseId/instructors')
  listInstructors(@Param('courseId', ParseUUIDPipe) courseId: string) {
    return this.coursesService.listInstructors(courseId);
  }

  @Post(':courseId/instructors')
  assign(
    @Param('courseId', ParseUUIDPipe) courseId: string,
    @Body() dto: AssignInstructorDto
  ) {
    return this.coursesService.assignInstructor(courseId, dto.userId);
  }

  @Post('import')
  importRows(@Body() dto: BulkImportDto) {
    return this.courseImportService.importRows(dto.rows);
  }

  @Post('import/file')
  @ApiConsumes('multipart/form-data')
  @UseInterceptors(FileInterceptor('file'))
  importFile(@UploadedFile() file: UploadedSpreadsheet | undefined) {
    if (!file?.buffer?.length) {
      throw new BadRequestException('Upload a CSV or XLSX file in the "file" field.');
    }
    return this.courseImportService.importSpreadsheet(file.buffer);
  }
}
