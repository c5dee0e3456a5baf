import { ApiProperty, ApiPropertyOptional, OmitType, PartialType } from '@nestjs/swagger';
import { IsEnum, IsInt, IsNumber, IsOptional, IsString, Min } from 'class-validator';
import { LineItemType } from '../enums/procurement.enums';

export class CreateLineItemDto {
  @ApiPropertyOptional({ description: 'Next free number on the invoice when omitted' })
  @IsOptional()
  @IsInt()
  @Min(1)
  lineNumber?: number;

  @ApiPropertyOptional({ description: "Defaults to the invoice's company" })
  @IsOptional()
  @IsInt()
  companyId?: number;

  @ApiProperty()
  @IsInt()
  departmentId!: number;

  @ApiProperty({ enum: LineItemType })
  @IsEnum(LineItemType)
  itemType!: LineItemType;

  @ApiProperty({ example: 'Latitude 5540, 16GB' })
  @IsString()
  description!: string;

  @ApiPropertyOptional({ default: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  quantity?: number;

  @ApiProperty({ example: 899.0 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  itemCost!: number;

  @ApiPropertyOptional({ description: 'Model of the assets received from an asset line' })
  @IsOptional()
  @IsInt()
  assetModelId?: number | null;

  @ApiPropertyOptional({ description: 'Type of the components received from a component line' })
  @IsOptional()
  @IsInt()
  componentTypeId?: number | null;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;
}

export class UpdateLineItemDto extends PartialType(OmitType(CreateLineItemDto, ['lineNumber'] as const)) {}

export interface LineItemReceipt {
  lineItemId: number;
  lineNumber: number;
  received: number;
  remaining: number;
  complete: boolean;
}

export interface InvoiceReceipts {
  lineItemsTotal: number;
  /** Every asset and component line fully received; false without line items */
  itemsReceived: boolean;
  lines: LineItemReceipt[];
}

export interface ReceiveResult {
  createdAssets: number;
  createdComponents: number;
  /** Receivable lines that were already complete */
  skipped: number;
}
