import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponses } from '../../../common/decorators/api-error-responses.decorator';
import { TableQuery, TableRequest } from '../../../common/table';
import { CreateComponentTypeDto, UpdateComponentTypeDto } from '../dto';
import { ComponentTypesService } from '../services/component-types.service';

@ApiTags('Component Types')
@ApiErrorResponses('BAD_REQUEST', 'NOT_FOUND', 'CONFLICT')
@Controller('component-types')
export class ComponentTypesController {
  constructor(private readonly componentTypesService: ComponentTypesService) {}

  @Post()
  @ApiOperation({ summary: 'Create a component type' })
  create(@Body() dto: CreateComponentTypeDto) {
    return this.componentTypesService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List component types' })
  @ApiQuery({ name: 'q', required: false, description: 'Search type name' })
  @ApiQuery({ name: 'sort', required: false })
  @ApiQuery({ name: 'page', required: false })
  findAll(@TableQuery() request: TableRequest) {
    return this.componentTypesService.findAll(request);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a component type' })
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.componentTypesService.findOne(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a component type' })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateComponentTypeDto) {
    return this.componentTypesService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a component type' })
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.componentTypesService.remove(id);
  }
}
