import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponses } from '../../../common/decorators/api-error-responses.decorator';
import { TableQuery, TableRequest } from '../../../common/table';
import {
  BulkMaintenanceRecordsDto,
  CreateMaintenanceRecordDto,
  UpdateMaintenanceRecordDto,
} from '../dto/maintenance.dto';
import { MaintenanceService } from '../services/maintenance.service';

@ApiTags('Maintenance')
@ApiErrorResponses('BAD_REQUEST', 'NOT_FOUND')
@Controller('maintenance')
export class MaintenanceController {
  constructor(private readonly maintenanceService: MaintenanceService) {}

  @Post()
  @ApiOperation({ summary: 'Record maintenance done on an asset' })
  create(@Body() dto: CreateMaintenanceRecordDto) {
    return this.maintenanceService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List maintenance records' })
  @ApiQuery({ name: 'q', required: false })
  @ApiQuery({ name: 'type', required: false })
  @ApiQuery({ name: 'asset', required: false, description: 'Only records of this asset id' })
  @ApiQuery({ name: 'sort', required: false })
  @ApiQuery({ name: 'page', required: false })
  findAll(@TableQuery() request: TableRequest) {
    return this.maintenanceService.findAll(request);
  }

  @Post('bulk/delete')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Delete the selected maintenance records' })
  bulkDelete(@Body() dto: BulkMaintenanceRecordsDto) {
    return this.maintenanceService.bulkDelete(dto.ids);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a maintenance record' })
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.maintenanceService.findOne(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a maintenance record' })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateMaintenanceRecordDto) {
    return this.maintenanceService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a maintenance record' })
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.maintenanceService.remove(id);
  }
}
