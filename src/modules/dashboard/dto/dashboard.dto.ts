import { ApiProperty } from '@nestjs/swagger';
import { AuditEntry } from '../../audit/entities/audit-entry.entity';
import { SparePartsInventory } from '../../components/entities/spare-parts-inventory.entity';

export class StatusCountsDto {
  @ApiProperty({ example: 42 })
  total!: number;

  @ApiProperty({ example: { active: 30, pending: 4, in_repair: 2 } })
  byStatus!: Record<string, number>;
}

export class DashboardSummaryDto {
  @ApiProperty({ type: StatusCountsDto })
  assets!: StatusCountsDto;

  @ApiProperty({ type: StatusCountsDto })
  components!: StatusCountsDto;

  @ApiProperty({ example: 18 })
  activeEmployees!: number;

  @ApiProperty({ description: 'Assets whose warranty has run out' })
  warrantyExpired!: number;

  @ApiProperty()
  unpaidInvoices!: number;

  @ApiProperty()
  pendingRequisitions!: number;

  @ApiProperty({ type: [SparePartsInventory], description: 'Spare stock at or below its threshold' })
  lowStock!: SparePartsInventory[];

  @ApiProperty({ type: [AuditEntry] })
  recentActivity!: AuditEntry[];
}
