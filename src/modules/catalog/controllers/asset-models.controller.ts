import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponses } from '../../../common/decorators/api-error-responses.decorator';
import { TableQuery, TableRequest } from '../../../common/table';
import { CreateAssetModelDto, UpdateAssetModelDto } from '../dto';
import { AssetModelsService } from '../services/asset-models.service';

@ApiTags('Asset Models')
@ApiErrorResponses('BAD_REQUEST', 'NOT_FOUND', 'CONFLICT')
@Controller('asset-models')
export class AssetModelsController {
  constructor(private readonly assetModelsService: AssetModelsService) {}

  @Post()
  @ApiOperation({ summary: 'Create an asset model' })
  create(@Body() dto: CreateAssetModelDto) {
    return this.assetModelsService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List asset models' })
  @ApiQuery({ name: 'q', required: false, description: 'Search manufacturer, model or category' })
  @ApiQuery({ name: 'category', required: false })
  @ApiQuery({ name: 'sort', required: false })
  @ApiQuery({ name: 'page', required: false })
  findAll(@TableQuery() request: TableRequest) {
    return this.assetModelsService.findAll(request);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an asset model' })
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.assetModelsService.findOne(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update an asset model' })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateAssetModelDto) {
    return this.assetModelsService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete an asset model' })
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.assetModelsService.remove(id);
  }
}
