import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { IsInt, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateAssetModelDto {
  @ApiProperty()
  @IsInt()
  categoryId!: number;

  @ApiProperty({ example: 'Lenovo' })
  @IsString()
  @MaxLength(255)
  manufacturer!: string;

  @ApiProperty({ example: 'ThinkPad T14' })
  @IsString()
  @MaxLength(255)
  modelName!: string;

  @ApiPropertyOptional({ example: '20W0' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  modelNumber?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;
}

export class UpdateAssetModelDto extends PartialType(CreateAssetModelDto) {}
