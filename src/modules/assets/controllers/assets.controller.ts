import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponses } from '../../../common/decorators/api-error-responses.decorator';
import { TableQuery, TableRequest } from '../../../common/table';
import {
  AssignAssetDto,
  BulkAssetsDto,
  BulkAssetStatusDto,
  ChangeAssetStatusDto,
  CreateAssetDto,
  TransferAssetDto,
  UnassignAssetDto,
  UpdateAssetDto,
} from '../dto/asset.dto';
import { AssetsService } from '../services/assets.service';

@ApiTags('Assets')
@ApiErrorResponses('BAD_REQUEST', 'NOT_FOUND', 'CONFLICT')
@Controller('assets')
export class AssetsController {
  constructor(private readonly assetsService: AssetsService) {}

  @Post()
  @ApiOperation({
    summary: 'Create an asset',
    description: 'A blank tag is generated from the prefix configuration for the company and department.',
  })
  create(@Body() dto: CreateAssetDto) {
    return this.assetsService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List assets' })
  @ApiQuery({ name: 'q', required: false, description: 'Search tag, model, category, assignee, serial, location or status' })
  @ApiQuery({ name: 'status', required: false })
  @ApiQuery({ name: 'sort', required: false })
  @ApiQuery({ name: 'page', required: false })
  findAll(@TableQuery() request: TableRequest) {
    return this.assetsService.findAll(request);
  }

  // Bulk routes are declared ahead of ':id' so "bulk" is never read as an id.
  @Post('bulk/unassign')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Unassign the selected assets' })
  bulkUnassign(@Body() dto: BulkAssetsDto) {
    return this.assetsService.bulkUnassign(dto.ids);
  }

  @Post('bulk/delete')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Delete the selected assets' })
  bulkDelete(@Body() dto: BulkAssetsDto) {
    return this.assetsService.bulkDelete(dto.ids);
  }

  @Post('bulk/status')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Set the status of the selected assets' })
  bulkStatus(@Body() dto: BulkAssetStatusDto) {
    return this.assetsService.bulkStatus(dto.ids, dto.status);
  }

  @Get('by-tag/:assetTag')
  @ApiOperation({ summary: 'Get an asset by its tag' })
  findByTag(@Param('assetTag') assetTag: string) {
    return this.assetsService.findByTag(assetTag);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an asset' })
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.assetsService.findOne(id);
  }

  @Get(':id/assignments')
  @ApiOperation({ summary: 'Custody history of an asset' })
  getAssignments(@Param('id', ParseIntPipe) id: number) {
    return this.assetsService.getAssignments(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update an asset' })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateAssetDto) {
    return this.assetsService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete an asset' })
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.assetsService.remove(id);
  }

  @Post(':id/status')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Change the status of an asset' })
  changeStatus(@Param('id', ParseIntPipe) id: number, @Body() dto: ChangeAssetStatusDto) {
    return this.assetsService.changeStatus(id, dto.status);
  }

  @Post(':id/assign')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Assign an asset to an employee' })
  assign(@Param('id', ParseIntPipe) id: number, @Body() dto: AssignAssetDto) {
    return this.assetsService.assign(id, dto);
  }

  @Post(':id/unassign')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Return an asset from its current holder' })
  unassign(@Param('id', ParseIntPipe) id: number, @Body() dto: UnassignAssetDto) {
    return this.assetsService.unassign(id, dto);
  }

  @Post(':id/duplicate')
  @ApiOperation({ summary: 'Duplicate an asset as a pending copy' })
  duplicate(@Param('id', ParseIntPipe) id: number) {
    return this.assetsService.duplicate(id);
  }

  @Post(':id/transfer')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Move an asset to another location' })
  transfer(@Param('id', ParseIntPipe) id: number, @Body() dto: TransferAssetDto) {
    return this.assetsService.transfer(id, dto);
  }
}
