import { Body, Controller, Get, Param, ParseUUIDPipe, Post, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiTags } from '@nestjs/swagger';
import { AccessRole } from '@attendance/shared';
import { ClientTimeZone } from '../common/decorators/client-time-zone.decorator';
import { Roles } from '../common/decorators/roles.decorator';
import { RolesGuard } from '../common/guards/roles.guard';
import { CoursesService } from '../courses/courses.service';
import { IdentityContextService } from '../identity/identity-context.service';
import { ExtendSessionDto } from './dto/extend-session.dto';
import { OpenSessionDto } from './dto/open-session.dto';
import { SessionsService } from './sessions.service';

@ApiTags('instructor')
@ApiHeader({ name: 'X-Time-Zone', required: false })
@UseGuards(RolesGuard)
@Roles(AccessRole.INSTRUCTOR)
@Controller('instructor')
export class SessionsController {
  constructor(
    private readonly sessionsService: SessionsService,
    private readonly coursesService: CoursesService,
    private readonly identityContext: IdentityContextService
  ) {}

  @Get('courses')
  courses() {
    return this.coursesService.listCoursesForInstructor(this.identityContext.requireEmail());
  }

  @Post('courses/:courseId/sessions')
  open(
    @Param('courseId', ParseUUIDPipe) courseId: string,
    @Body() dto: OpenSessionDto,
    @ClientTimeZone() timeZone: string | null
  ) {
    return this.sessionsService.open(
      this.identityContext.requireEmail(),
      courseId,
      dto.durationMinutes,
      timeZone
    );
  }

  @Get('courses/:courseId/sessions/active')
  active(
    @Param('courseId', ParseUUIDPipe) courseId: string,
    @ClientTimeZone() timeZone: string | null
  ) {
    return this.sessionsService.listActive(this.identityContext.requireEmail(), courseId, timeZone);
  }

  @Post('sessions/:sessionId/extend')
  extend(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @Body() dto: ExtendSessionDto,
    @ClientTimeZone() timeZone: string | null
  ) {
    return this.sessionsService.extend(
      this.identityContext.requireEmail(),
      sessionId,
      dto.minutes,
      timeZone
    );
  }

  @Post('sessions/:sessionId/close')
  close(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @ClientTimeZone() timeZone: string | null
  ) {
    return this.sessionsService.close(this.identityContext.requireEmail(), sessionId, timeZone);
  }
}
