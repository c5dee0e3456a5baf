import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponses } from '../../../common/decorators/api-error-responses.decorator';
import { CreateLineItemDto, UpdateLineItemDto } from '../dto';
import { InvoiceLineItemsService } from '../services/invoice-line-items.service';

@ApiTags('Invoices')
@ApiErrorResponses('BAD_REQUEST', 'NOT_FOUND', 'CONFLICT')
@Controller('invoices/:invoiceId')
export class InvoiceLineItemsController {
  constructor(private readonly lineItemsService: InvoiceLineItemsService) {}

  @Get('line-items')
  @ApiOperation({ summary: 'Line items of an invoice' })
  findAll(@Param('invoiceId', ParseIntPipe) invoiceId: number) {
    return this.lineItemsService.findAll(invoiceId);
  }

  @Post('line-items')
  @ApiOperation({ summary: 'Add a line item; the invoice total follows its lines' })
  create(@Param('invoiceId', ParseIntPipe) invoiceId: number, @Body() dto: CreateLineItemDto) {
    return this.lineItemsService.create(invoiceId, dto);
  }

  @Get('line-items/:lineItemId')
  @ApiOperation({ summary: 'Get a line item' })
  findOne(
    @Param('invoiceId', ParseIntPipe) invoiceId: number,
    @Param('lineItemId', ParseIntPipe) lineItemId: number,
  ) {
    return this.lineItemsService.findOne(invoiceId, lineItemId);
  }

  @Patch('line-items/:lineItemId')
  @ApiOperation({ summary: 'Update a line item' })
  update(
    @Param('invoiceId', ParseIntPipe) invoiceId: number,
    @Param('lineItemId', ParseIntPipe) lineItemId: number,
    @Body() dto: UpdateLineItemDto,
  ) {
    return this.lineItemsService.update(invoiceId, lineItemId, dto);
  }

  @Delete('line-items/:lineItemId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a line item' })
  remove(
    @Param('invoiceId', ParseIntPipe) invoiceId: number,
    @Param('lineItemId', ParseIntPipe) lineItemId: number,
  ) {
    return this.lineItemsService.remove(invoiceId, lineItemId);
  }

  @Get('receipts')
  @ApiOperation({ summary: 'How much of each line has been received' })
  getReceipts(@Param('invoiceId', ParseIntPipe) invoiceId: number) {
    return this.lineItemsService.getReceipts(invoiceId);
  }

  @Post('receive')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Receive the invoice',
    description: 'Creates the pending assets and spare components its lines still owe. Safe to repeat.',
  })
  receive(@Param('invoiceId', ParseIntPipe) invoiceId: number) {
    return this.lineItemsService.receive(invoiceId);
  }
}
