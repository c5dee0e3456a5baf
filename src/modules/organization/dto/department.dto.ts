import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { IsInt, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateDepartmentDto {
  @ApiProperty()
  @IsInt()
  companyId!: number;

  @ApiProperty({ example: 'Engineering' })
  @IsString()
  @MaxLength(255)
  name!: string;

  @ApiPropertyOptional({ description: 'Location new employees of this department default to' })
  @IsOptional()
  @IsInt()
  defaultLocationId?: number | null;
}

export class UpdateDepartmentDto extends PartialType(CreateDepartmentDto) {}
