import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponses } from '../../../common/decorators/api-error-responses.decorator';
import { TableQuery, TableRequest } from '../../../common/table';
import { CancelRequisitionDto, CreateRequisitionDto, CreateRequisitionItemDto, UpdateRequisitionDto } from '../dto';
import { RequisitionsService } from '../services/requisitions.service';

@ApiTags('Requisitions')
@ApiErrorResponses('BAD_REQUEST', 'NOT_FOUND', 'CONFLICT')
@Controller('requisitions')
export class RequisitionsController {
  constructor(private readonly requisitionsService: RequisitionsService) {}

  @Post()
  @ApiOperation({ summary: 'Raise a requisition' })
  create(@Body() dto: CreateRequisitionDto) {
    return this.requisitionsService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List requisitions' })
  @ApiQuery({ name: 'q', required: false })
  @ApiQuery({ name: 'status', required: false })
  @ApiQuery({ name: 'priority', required: false })
  @ApiQuery({ name: 'sort', required: false })
  @ApiQuery({ name: 'page', required: false })
  findAll(@TableQuery() request: TableRequest) {
    return this.requisitionsService.findAll(request);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a requisition' })
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.requisitionsService.findOne(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a requisition' })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateRequisitionDto) {
    return this.requisitionsService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a requisition' })
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.requisitionsService.remove(id);
  }

  @Get(':id/items')
  @ApiOperation({ summary: 'Items handed out against a requisition' })
  getItems(@Param('id', ParseIntPipe) id: number) {
    return this.requisitionsService.getItems(id);
  }

  @Post(':id/items')
  @ApiOperation({ summary: 'Add an asset or component to a requisition' })
  addItem(@Param('id', ParseIntPipe) id: number, @Body() dto: CreateRequisitionItemDto) {
    return this.requisitionsService.addItem(id, dto);
  }

  @Delete(':id/items/:itemId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Remove an item from a requisition' })
  removeItem(@Param('id', ParseIntPipe) id: number, @Param('itemId', ParseIntPipe) itemId: number) {
    return this.requisitionsService.removeItem(id, itemId);
  }

  @Post(':id/fulfil')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark a pending requisition as fulfilled' })
  fulfil(@Param('id', ParseIntPipe) id: number) {
    return this.requisitionsService.fulfil(id);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel a pending requisition' })
  cancel(@Param('id', ParseIntPipe) id: number, @Body() dto: CancelRequisitionDto) {
    return this.requisitionsService.cancel(id, dto.reason);
  }
}
