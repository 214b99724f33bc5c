import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  GoneException,
  HttpException,
  NotFoundException,
  Post,
  Query,
  UnauthorizedException,
} from '@nestjs/common';
import { ApiHeader, ApiTags } from '@nestjs/swagger';
import type { CheckInPageResponse, CheckInRejection, CheckInResult } from '@attendance/shared';
import { ClientTimeZone } from '../common/decorators/client-time-zone.decorator';
import { IdentityContextService } from '../identity/identity-context.service';
import { AttendanceService } from './attendance.service';
import { CheckInClaim, isTruthyFlag } from './check-in.policy';
import { CheckInDto } from './dto/check-in.dto';

function rejectionToException(reason: CheckInRejection, message: string): HttpException {
  switch (reason) {
    case 'not_found':
      return new NotFoundException(message);
    case 'closed':
      return new ConflictException(message);
    case 'expired':
      return new GoneException(message);
    case 'invalid_name':
    case 'invalid_email':
      return new BadRequestException(message);
  }
}

@ApiTags('check-in')
@ApiHeader({ name: 'X-Time-Zone', required: false })
@Controller('check-in')
export class CheckInController {
  constructor(
    private readonly attendanceService: AttendanceService,
    private readonly identityContext: IdentityContextService
  ) {}

  /** Session info for the check-in page; records immediately when `autocheckin` is set. */
  @Get()
  async page(
    @Query('session') token: string | undefined,
    @Query('autocheckin') autocheckin: string | undefined,
    @ClientTimeZone() timeZone: string | null
  ): Promise<CheckInPageResponse> {
    const sessionToken = String(token ?? '').trim();
    if (!sessionToken) throw new BadRequestException('Missing session token.');

    const session = await this.attendanceService.describeSession(sessionToken, timeZone);
    if (session.validity !== 'ok' || !isTruthyFlag(autocheckin)) {
      return { session, checkIn: null };
    }

    const identity = this.identityContext.current();
    if (!identity.email) {
      throw new UnauthorizedException(
        'Authentication is required to auto check-in. Please sign in and retry.'
      );
    }
    const checkIn = await this.attendanceService.record(sessionToken, {
      email: identity.email,
      name: identity.name,
      source: 'identity',
    });
    return { session, checkIn };
  }

  @Post()
  async submit(@Body() dto: CheckInDto): Promise<CheckInResult> {
    const identity = this.identityContext.current();
    // A signed-in caller cannot check in under another address.
    const claim: CheckInClaim = identity.email
      ? { email: identity.email, name: dto.name || identity.name, source: 'identity' }
      : { email: dto.email, name: dto.name, source: 'typed' };

    const result = await this.attendanceService.record(dto.session, claim);
    if (result.status === 'rejected') {
      throw rejectionToException(result.reason, result.message);
    }
    return result;
  }
}
