import { Controller, Get, Param, ParseEnumPipe, ParseIntPipe, Query } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponses } from '../../common/decorators/api-error-responses.decorator';
import { TableQuery, TableRequest } from '../../common/table';
import { AuditService } from './audit.service';
import { TrackedEntityKind } from './constants/audit.constants';

@ApiTags('Activity')
@ApiErrorResponses()
@Controller('activity')
export class AuditController {
  constructor(private readonly auditService: AuditService) {}

  @Get()
  @ApiOperation({ summary: 'Activity feed, newest first' })
  @ApiQuery({ name: 'q', required: false, description: 'Search message, detail and actor' })
  @ApiQuery({ name: 'event_type', required: false, description: 'Filter by category' })
  @ApiQuery({ name: 'action', required: false, description: 'Filter by action' })
  @ApiQuery({ name: 'sort', required: false })
  @ApiQuery({ name: 'page', required: false })
  findFeed(@TableQuery() request: TableRequest) {
    return this.auditService.findFeed(request);
  }

  @Get('recent')
  @ApiOperation({ summary: 'Latest activity entries' })
  @ApiQuery({ name: 'limit', required: false })
  findRecent(@Query('limit', new ParseIntPipe({ optional: true })) limit?: number) {
    return this.auditService.findRecent(limit);
  }

  @Get(':kind/:id')
  @ApiOperation({ summary: 'History of one record, including deleted ones' })
  findForEntity(
    @Param('kind', new ParseEnumPipe(TrackedEntityKind)) kind: TrackedEntityKind,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.auditService.findForEntity({ kind, id });
  }
}
