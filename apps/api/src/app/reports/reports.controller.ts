import { Controller, ForbiddenException, Get, Query, StreamableFile, UseGuards } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AccessRole, ReportView } from '@attendance/shared';
import { AccessPolicy, ReportScope } from '../access/access-policy';
import { Roles } from '../common/decorators/roles.decorator';
import { RolesGuard } from '../common/guards/roles.guard';
import { IdentityContextService } from '../identity/identity-context.service';
import { ReportExportQueryDto, ReportQueryDto } from './dto/report-query.dto';
import { reportViewToCsv, reportWorkbook } from './report-export';
import { ReportsService } from './reports.service';

@ApiTags('reports')
@UseGuards(RolesGuard)
@Roles(AccessRole.ADMIN, AccessRole.SECRETARY, AccessRole.INSTRUCTOR)
@Controller('reports')
export class ReportsController {
  constructor(
    private readonly reportsService: ReportsService,
    private readonly accessPolicy: AccessPolicy,
    private readonly identityContext: IdentityContextService
  ) {}

  private scope(): ReportScope {
    const scope = this.accessPolicy.reportScopeFor(this.identityContext.requireEmail());
    if (!scope) throw new ForbiddenException('Access restricted.');
    return scope;
  }

  @Get()
  report(@Query() query: ReportQueryDto) {
    return this.reportsService.buildReport(this.scope(), query);
  }

  @Get('export')
  async export(@Query() query: ReportExportQueryDto): Promise<StreamableFile> {
    const report = await this.reportsService.buildReport(this.scope(), query);
    const stamp = report.from.slice(0, 10) + '_' + report.to.slice(0, 10);

    if (query.format === 'xlsx') {
      return new StreamableFile(reportWorkbook(report), {
        type: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
        disposition: `attachment; filename="attendance_${stamp}.xlsx"`,
      });
    }

    const view = query.view ?? ReportView.RAW;
    return new StreamableFile(Buffer.from(reportViewToCsv(report, view), 'utf8'), {
      type: 'text/csv; charset=utf-8',
      disposition: `attachment; filename="attendance_${view}_${stamp}.csv"`,
    });
  }
}
