import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, IsString } from 'class-validator';

/** Exactly one of `assetId` and `componentId` must be given. */
export class CreateRequisitionItemDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  assetId?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  componentId?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;
}
