import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsDateString,
  IsEnum,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';
import { AssetStatus } from '../enums/asset-status.enum';

export class CreateAssetDto {
  @ApiPropertyOptional({ example: 'ENG0001', description: 'Generated from the tag prefix configuration when blank' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  assetTag?: string;

  @ApiProperty()
  @IsInt()
  assetModelId!: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  companyId?: number | null;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(255)
  serialNumber?: string;

  @ApiPropertyOptional({ example: { ram: '16GB', cpu: 'i7-1165G7' } })
  @IsOptional()
  @IsObject()
  attributes?: Record<string, unknown>;

  @ApiPropertyOptional({ example: '2024-03-01' })
  @IsOptional()
  @IsDateString()
  purchaseDate?: string;

  @ApiPropertyOptional({ example: 1299.99 })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  purchaseCost?: number;

  @ApiPropertyOptional({ example: '2027-03-01' })
  @IsOptional()
  @IsDateString()
  warrantyExpiryDate?: string;

  @ApiPropertyOptional({ enum: AssetStatus, default: AssetStatus.PENDING })
  @IsOptional()
  @IsEnum(AssetStatus)
  status?: AssetStatus;

  @ApiPropertyOptional({ description: 'Mutually exclusive with assignedToId' })
  @IsOptional()
  @IsInt()
  locationId?: number | null;

  @ApiPropertyOptional({ description: 'Employee holding the asset' })
  @IsOptional()
  @IsInt()
  assignedToId?: number | null;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  requisitionId?: number | null;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  invoiceId?: number | null;

  @ApiPropertyOptional({ description: 'Invoice line this item was received from' })
  @IsOptional()
  @IsInt()
  invoiceLineItemId?: number | null;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;
}

export class UpdateAssetDto extends PartialType(CreateAssetDto) {}

export class ChangeAssetStatusDto {
  @ApiProperty({ enum: AssetStatus })
  @IsEnum(AssetStatus)
  status!: AssetStatus;
}

export class AssignAssetDto {
  @ApiProperty()
  @IsInt()
  employeeId!: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  conditionOnAssignment?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;
}

export class UnassignAssetDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  conditionOnReturn?: string;
}

export class TransferAssetDto {
  @ApiProperty({ nullable: true, description: 'Target location; null clears it' })
  @ValidateIf((_dto, value) => value !== null)
  @IsInt()
  locationId!: number | null;
}

export class BulkAssetsDto {
  @ApiProperty({ type: [Number] })
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  @Type(() => Number)
  ids!: number[];
}

export class BulkAssetStatusDto extends BulkAssetsDto {
  @ApiProperty({ enum: AssetStatus })
  @IsEnum(AssetStatus)
  status!: AssetStatus;
}

export interface BulkResult {
  count: number;
}
