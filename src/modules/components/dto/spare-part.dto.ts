import { ApiProperty, ApiPropertyOptional, OmitType, PartialType } from '@nestjs/swagger';
import { IsDateString, IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class CreateSparePartDto {
  @ApiProperty()
  @IsInt()
  componentTypeId!: number;

  @ApiPropertyOptional()
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
  specifications?: string;

  @ApiPropertyOptional({ description: 'Restock threshold', default: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  quantityMinimum?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  locationId?: number | null;

  @ApiPropertyOptional()
  @IsOptional()
  @IsDateString()
  lastRestocked?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;
}

/** Quantity on hand is derived from spare components and never set directly. */
export class UpdateSparePartDto extends PartialType(OmitType(CreateSparePartDto, ['componentTypeId'] as const)) {}
