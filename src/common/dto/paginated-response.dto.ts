import { ApiProperty } from '@nestjs/swagger';

export class PaginationMetaDto {
  @ApiProperty({ description: 'Current page number (1-indexed)' })
  page!: number;

  @ApiProperty({ description: 'Rows per page' })
  pageSize!: number;

  @ApiProperty({ description: 'Rows matching the search and filters' })
  totalItems!: number;

  @ApiProperty({ description: 'Number of pages, at least 1' })
  totalPages!: number;

  @ApiProperty()
  hasNextPage!: boolean;

  @ApiProperty()
  hasPreviousPage!: boolean;
}

/** An empty result still has one (empty) page. */
export function buildPaginationMeta(total: number, page: number, pageSize: number): PaginationMetaDto {
  const totalPages = Math.max(1, Math.ceil(total / pageSize));
  return {
    page,
    pageSize,
    totalItems: total,
    totalPages,
    hasNextPage: page < totalPages,
    hasPreviousPage: page > 1,
  };
}
