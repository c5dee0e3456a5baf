import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsDateString,
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { MaintenanceType } from '../enums/maintenance-type.enum';

export class CreateMaintenanceRecordDto {
  @ApiProperty()
  @IsInt()
  assetId!: number;

  @ApiProperty({ enum: MaintenanceType })
  @IsEnum(MaintenanceType)
  maintenanceType!: MaintenanceType;

  @ApiPropertyOptional({ example: 'Vendor field technician' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  performedBy?: string;

  @ApiProperty({ example: '2024-06-12' })
  @IsDateString()
  maintenanceDate!: string;

  @ApiPropertyOptional({ example: 149.5 })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  cost?: number | null;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ example: '2024-12-12' })
  @IsOptional()
  @IsDateString()
  nextMaintenanceDate?: string | null;
}

export class UpdateMaintenanceRecordDto extends PartialType(CreateMaintenanceRecordDto) {}

export class BulkMaintenanceRecordsDto {
  @ApiProperty({ type: [Number] })
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  @Type(() => Number)
  ids!: number[];
}
