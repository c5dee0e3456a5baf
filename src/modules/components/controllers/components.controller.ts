import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponses } from '../../../common/decorators/api-error-responses.decorator';
import { TableQuery, TableRequest } from '../../../common/table';
import { BulkComponentsDto, ChangeComponentStatusDto, CreateComponentDto, UpdateComponentDto } from '../dto';
import { ComponentsService } from '../services/components.service';

@ApiTags('Components')
@ApiErrorResponses('BAD_REQUEST', 'NOT_FOUND', 'CONFLICT')
@Controller('components')
export class ComponentsController {
  constructor(private readonly componentsService: ComponentsService) {}

  @Post()
  @ApiOperation({ summary: 'Create a component', description: 'Installed components need a parent asset.' })
  create(@Body() dto: CreateComponentDto) {
    return this.componentsService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List components' })
  @ApiQuery({ name: 'q', required: false })
  @ApiQuery({ name: 'status', required: false })
  @ApiQuery({ name: 'type', required: false })
  @ApiQuery({ name: 'sort', required: false })
  @ApiQuery({ name: 'page', required: false })
  findAll(@TableQuery() request: TableRequest) {
    return this.componentsService.findAll(request);
  }

  @Post('bulk/unassign')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Return the selected components to spare stock' })
  bulkUnassign(@Body() dto: BulkComponentsDto) {
    return this.componentsService.bulkUnassign(dto.ids);
  }

  @Post('bulk/delete')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Delete the selected components' })
  bulkDelete(@Body() dto: BulkComponentsDto) {
    return this.componentsService.bulkDelete(dto.ids);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a component' })
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.componentsService.findOne(id);
  }

  @Get(':id/history')
  @ApiOperation({ summary: 'Installation history of a component' })
  getHistory(@Param('id', ParseIntPipe) id: number) {
    return this.componentsService.getHistory(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a component' })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateComponentDto) {
    return this.componentsService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a component' })
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.componentsService.remove(id);
  }

  @Post(':id/status')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Change the status of a component' })
  changeStatus(@Param('id', ParseIntPipe) id: number, @Body() dto: ChangeComponentStatusDto) {
    return this.componentsService.changeStatus(id, dto);
  }

  @Post(':id/unassign')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Remove a component from its parent asset' })
  unassign(@Param('id', ParseIntPipe) id: number) {
    return this.componentsService.unassign(id);
  }
}
