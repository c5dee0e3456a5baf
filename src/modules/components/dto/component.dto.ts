import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsDateString,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { ComponentStatus } from '../enums/component-status.enum';

export class CreateComponentDto {
  @ApiPropertyOptional({ example: 'ENGC0001', description: 'Generated from the tag prefix configuration when blank' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  componentTag?: string;

  @ApiProperty()
  @IsInt()
  componentTypeId!: number;

  @ApiPropertyOptional({ description: 'Required while the component is installed' })
  @IsOptional()
  @IsInt()
  parentAssetId?: number | null;

  @ApiPropertyOptional({ example: 'Kingston' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  manufacturer?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(255)
  model?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(255)
  serialNumber?: string;

  @ApiPropertyOptional({ example: '16GB DDR4 3200' })
  @IsOptional()
  @IsString()
  specifications?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsDateString()
  purchaseDate?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsDateString()
  warrantyExpiryDate?: string;

  @ApiPropertyOptional({ enum: ComponentStatus, default: ComponentStatus.INSTALLED })
  @IsOptional()
  @IsEnum(ComponentStatus)
  status?: ComponentStatus;

  @ApiPropertyOptional()
  @IsOptional()
  @IsDateString()
  installationDate?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsDateString()
  removalDate?: string;

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

export class UpdateComponentDto extends PartialType(CreateComponentDto) {}

export class ChangeComponentStatusDto {
  @ApiProperty({ enum: ComponentStatus })
  @IsEnum(ComponentStatus)
  status!: ComponentStatus;

  @ApiPropertyOptional({ description: 'Asset to install into; required for installed' })
  @IsOptional()
  @IsInt()
  parentAssetId?: number;
}

export class BulkComponentsDto {
  @ApiProperty({ type: [Number] })
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  @Type(() => Number)
  ids!: number[];
}
