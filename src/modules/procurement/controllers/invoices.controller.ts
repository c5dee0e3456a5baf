import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponses } from '../../../common/decorators/api-error-responses.decorator';
import { TableQuery, TableRequest } from '../../../common/table';
import { BulkInvoicesDto, CreateInvoiceDto, UpdateInvoiceDto } from '../dto';
import { InvoicesService } from '../services/invoices.service';

@ApiTags('Invoices')
@ApiErrorResponses('BAD_REQUEST', 'NOT_FOUND', 'CONFLICT')
@Controller('invoices')
export class InvoicesController {
  constructor(private readonly invoicesService: InvoicesService) {}

  @Post()
  @ApiOperation({ summary: 'Record a purchase invoice' })
  create(@Body() dto: CreateInvoiceDto) {
    return this.invoicesService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List purchase invoices' })
  @ApiQuery({ name: 'q', required: false })
  @ApiQuery({ name: 'payment_status', required: false })
  @ApiQuery({ name: 'vendor', required: false })
  @ApiQuery({ name: 'sort', required: false })
  @ApiQuery({ name: 'page', required: false })
  findAll(@TableQuery() request: TableRequest) {
    return this.invoicesService.findAll(request);
  }

  @Post('bulk/mark-paid')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark the selected invoices as paid' })
  bulkMarkPaid(@Body() dto: BulkInvoicesDto) {
    return this.invoicesService.bulkMarkPaid(dto.ids);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a purchase invoice' })
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.invoicesService.findOne(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a purchase invoice' })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateInvoiceDto) {
    return this.invoicesService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a purchase invoice' })
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.invoicesService.remove(id);
  }

  @Post(':id/mark-paid')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark an invoice as paid' })
  markPaid(@Param('id', ParseIntPipe) id: number) {
    return this.invoicesService.markPaid(id);
  }
}
