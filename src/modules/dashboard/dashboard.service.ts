import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { LessThan, Not, ObjectLiteral, Repository } from 'typeorm';
import { Asset } from '../assets/entities/asset.entity';
import { AssetStatus } from '../assets/enums/asset-status.enum';
import { AuditService } from '../audit/audit.service';
import { Component } from '../components/entities/component.entity';
import { ComponentStatus } from '../components/enums/component-status.enum';
import { SparePartsService } from '../components/services/spare-parts.service';
import { Employee, EmployeeStatus } from '../organization/entities/employee.entity';
import { PurchaseInvoice } from '../procurement/entities/purchase-invoice.entity';
import { Requisition } from '../procurement/entities/requisition.entity';
import { PaymentStatus, RequisitionStatus } from '../procurement/enums/procurement.enums';
import { DashboardSummaryDto, StatusCountsDto } from './dto/dashboard.dto';

const RECENT_ACTIVITY_LIMIT = 10;
const LOW_STOCK_LIMIT = 10;

interface StatusCountRow {
  status: string;
  count: number | string;
}

@Injectable()
export class DashboardService {
  constructor(
    @InjectRepository(Asset)
    private readonly assetRepository: Repository<Asset>,
    @InjectRepository(Component)
    private readonly componentRepository: Repository<Component>,
    @InjectRepository(Employee)
    private readonly employeeRepository: Repository<Employee>,
    @InjectRepository(PurchaseInvoice)
    private readonly invoiceRepository: Repository<PurchaseInvoice>,
    @InjectRepository(Requisition)
    private readonly requisitionRepository: Repository<Requisition>,
    private readonly sparePartsService: SparePartsService,
    private readonly auditService: AuditService,
  ) {}

  async getSummary(): Promise<DashboardSummaryDto> {
    const today = new Date().toISOString().slice(0, 10);

    const [assets, components, activeEmployees, warrantyExpired, unpaidInvoices, pendingRequisitions] =
      await Promise.all([
        this.countByStatus(this.assetRepository, Object.values(AssetStatus)),
        this.countByStatus(this.componentRepository, Object.values(ComponentStatus)),
        this.employeeRepository.countBy({ status: EmployeeStatus.ACTIVE }),
        this.assetRepository.countBy({ warrantyExpiryDate: LessThan(today) }),
        this.invoiceRepository.countBy({ paymentStatus: Not(PaymentStatus.PAID) }),
        this.requisitionRepository.countBy({ status: RequisitionStatus.PENDING }),
      ]);

    const [lowStock, recentActivity] = await Promise.all([
      this.sparePartsService.findBelowThreshold(LOW_STOCK_LIMIT),
      this.auditService.findRecent(RECENT_ACTIVITY_LIMIT),
    ]);

    return {
      assets,
      components,
      activeEmployees,
      warrantyExpired,
      unpaidInvoices,
      pendingRequisitions,
      lowStock,
      recentActivity,
    };
  }

  /** One grouped query; statuses without rows report zero. */
  private async countByStatus<T extends ObjectLiteral>(
    repository: Repository<T>,
    statuses: string[],
  ): Promise<StatusCountsDto> {
    const rows = await repository
      .createQueryBuilder('row')
      .select('row.status', 'status')
      .addSelect('COUNT(row.id)', 'count')
      .groupBy('row.status')
      .getRawMany<StatusCountRow>();

    const byStatus: Record<string, number> = Object.fromEntries(statuses.map((status) => [status, 0]));
    let total = 0;
    for (const row of rows) {
      const count = Number(row.count);
      byStatus[row.status] = count;
      total += count;
    }
    return { total, byStatus };
  }
}
