import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Not } from 'typeorm';
import { createMockRepository } from '../../../test/helpers/mock-factories';
import { Asset } from '../assets/entities/asset.entity';
import { AuditService } from '../audit/audit.service';
import { Component } from '../components/entities/component.entity';
import { SparePartsService } from '../components/services/spare-parts.service';
import { Employee, EmployeeStatus } from '../organization/entities/employee.entity';
import { PurchaseInvoice } from '../procurement/entities/purchase-invoice.entity';
import { Requisition } from '../procurement/entities/requisition.entity';
import { PaymentStatus, RequisitionStatus } from '../procurement/enums/procurement.enums';
import { DashboardService } from './dashboard.service';

function groupedQueryBuilder(rows: Array<{ status: string; count: string }>) {
  return {
    select: jest.fn().mockReturnThis(),
    addSelect: jest.fn().mockReturnThis(),
    groupBy: jest.fn().mockReturnThis(),
    getRawMany: jest.fn().mockResolvedValue(rows),
  };
}

describe('DashboardService', () => {
  let service: DashboardService;
  const assetRepo = createMockRepository<Asset>();
  const componentRepo = createMockRepository<Component>();
  const employeeRepo = createMockRepository<Employee>();
  const invoiceRepo = createMockRepository<PurchaseInvoice>();
  const requisitionRepo = createMockRepository<Requisition>();
  const sparePartsService = { findBelowThreshold: jest.fn() };
  const auditService = { findRecent: jest.fn() };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DashboardService,
        { provide: getRepositoryToken(Asset), useValue: assetRepo },
        { provide: getRepositoryToken(Component), useValue: componentRepo },
        { provide: getRepositoryToken(Employee), useValue: employeeRepo },
        { provide: getRepositoryToken(PurchaseInvoice), useValue: invoiceRepo },
        { provide: getRepositoryToken(Requisition), useValue: requisitionRepo },
        { provide: SparePartsService, useValue: sparePartsService },
        { provide: AuditService, useValue: auditService },
      ],
    }).compile();

    service = module.get<DashboardService>(DashboardService);
  });

  it('aggregates counts, low stock and recent activity', async () => {
    assetRepo.createQueryBuilder?.mockReturnValue(
      groupedQueryBuilder([
        { status: 'active', count: '3' },
        { status: 'in_repair', count: '1' },
      ]),
    );
    componentRepo.createQueryBuilder?.mockReturnValue(groupedQueryBuilder([{ status: 'spare', count: '5' }]));
    employeeRepo.countBy?.mockResolvedValue(7);
    assetRepo.countBy?.mockResolvedValue(2);
    invoiceRepo.countBy?.mockResolvedValue(4);
    requisitionRepo.countBy?.mockResolvedValue(1);
    sparePartsService.findBelowThreshold.mockResolvedValue([{ id: 9 }]);
    auditService.findRecent.mockResolvedValue([{ id: 11 }]);

    const summary = await service.getSummary();

    expect(summary.assets.total).toBe(4);
    expect(summary.assets.byStatus).toEqual({
      pending: 0,
      active: 3,
      in_repair: 1,
      retired: 0,
      disposed: 0,
      inactive: 0,
    });
    expect(summary.components).toEqual({
      total: 5,
      byStatus: expect.objectContaining({ spare: 5, installed: 0 }),
    });
    expect(summary.activeEmployees).toBe(7);
    expect(summary.warrantyExpired).toBe(2);
    expect(summary.unpaidInvoices).toBe(4);
    expect(summary.pendingRequisitions).toBe(1);
    expect(summary.lowStock).toEqual([{ id: 9 }]);
    expect(summary.recentActivity).toEqual([{ id: 11 }]);

    expect(employeeRepo.countBy).toHaveBeenCalledWith({ status: EmployeeStatus.ACTIVE });
    expect(invoiceRepo.countBy).toHaveBeenCalledWith({ paymentStatus: Not(PaymentStatus.PAID) });
    expect(requisitionRepo.countBy).toHaveBeenCalledWith({ status: RequisitionStatus.PENDING });
    expect(sparePartsService.findBelowThreshold).toHaveBeenCalledWith(10);
    expect(auditService.findRecent).toHaveBeenCalledWith(10);
  });

  it('reports zero totals on an empty registry', async () => {
    assetRepo.createQueryBuilder?.mockReturnValue(groupedQueryBuilder([]));
    componentRepo.createQueryBuilder?.mockReturnValue(groupedQueryBuilder([]));
    employeeRepo.countBy?.mockResolvedValue(0);
    assetRepo.countBy?.mockResolvedValue(0);
    invoiceRepo.countBy?.mockResolvedValue(0);
    requisitionRepo.countBy?.mockResolvedValue(0);
    sparePartsService.findBelowThreshold.mockResolvedValue([]);
    auditService.findRecent.mockResolvedValue([]);

    const summary = await service.getSummary();

    expect(summary.assets.total).toBe(0);
    expect(summary.components.total).toBe(0);
    expect(Object.values(summary.assets.byStatus).every((count) => count === 0)).toBe(true);
  });
});
