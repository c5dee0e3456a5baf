import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { IsObject, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateComponentTypeDto {
  @ApiProperty({ example: 'RAM' })
  @IsString()
  @MaxLength(100)
  typeName!: string;

  @ApiPropertyOptional({ example: { capacity: 'string', speed: 'string' } })
  @IsOptional()
  @IsObject()
  attributes?: Record<string, unknown>;
}

export class UpdateComponentTypeDto extends PartialType(CreateComponentTypeDto) {}
