import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponses } from '../../../common/decorators/api-error-responses.decorator';
import { TableQuery, TableRequest } from '../../../common/table';
import { CreateSparePartDto, UpdateSparePartDto } from '../dto';
import { SparePartsService } from '../services/spare-parts.service';

@ApiTags('Spare Parts')
@ApiErrorResponses('BAD_REQUEST', 'NOT_FOUND', 'CONFLICT')
@Controller('spare-parts')
export class SparePartsController {
  constructor(private readonly sparePartsService: SparePartsService) {}

  @Post()
  @ApiOperation({ summary: 'Track stock for a component type' })
  create(@Body() dto: CreateSparePartDto) {
    return this.sparePartsService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List spare stock', description: 'Quantities are re-counted before listing.' })
  @ApiQuery({ name: 'q', required: false })
  @ApiQuery({ name: 'sort', required: false })
  @ApiQuery({ name: 'page', required: false })
  findAll(@TableQuery() request: TableRequest) {
    return this.sparePartsService.findAll(request);
  }

  @Get('low-stock')
  @ApiOperation({ summary: 'Stock at or below its restock threshold' })
  findBelowThreshold() {
    return this.sparePartsService.findBelowThreshold();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a stock row with its spare components' })
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.sparePartsService.findOne(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a stock row' })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateSparePartDto) {
    return this.sparePartsService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Stop tracking a component type' })
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.sparePartsService.remove(id);
  }
}
