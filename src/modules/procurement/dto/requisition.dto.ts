import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { IsDateString, IsEnum, IsInt, IsObject, IsOptional, IsString, MaxLength } from 'class-validator';
import { RequisitionPriority } from '../enums/procurement.enums';

export class CreateRequisitionDto {
  @ApiProperty({ example: 'REQ-2024-0007' })
  @IsString()
  @MaxLength(100)
  requisitionNumber!: string;

  @ApiProperty()
  @IsInt()
  companyId!: number;

  @ApiProperty()
  @IsInt()
  departmentId!: number;

  @ApiProperty()
  @IsInt()
  requestedById!: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  approvedById?: number | null;

  @ApiPropertyOptional({ description: 'Defaults to today' })
  @IsOptional()
  @IsDateString()
  requisitionDate?: string;

  @ApiPropertyOptional({ example: { ram: '32GB' } })
  @IsOptional()
  @IsObject()
  specifications?: Record<string, unknown>;

  @ApiPropertyOptional({ enum: RequisitionPriority, default: RequisitionPriority.NORMAL })
  @IsOptional()
  @IsEnum(RequisitionPriority)
  priority?: RequisitionPriority;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;
}

export class UpdateRequisitionDto extends PartialType(CreateRequisitionDto) {}

export class CancelRequisitionDto {
  @ApiPropertyOptional({ example: 'Budget withdrawn' })
  @IsOptional()
  @IsString()
  reason?: string;
}
