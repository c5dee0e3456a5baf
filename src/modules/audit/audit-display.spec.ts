import { MaintenanceRecord } from '../assets/entities/maintenance-record.entity';
import { MaintenanceType } from '../assets/enums/maintenance-type.enum';
import { SparePartsInventory } from '../components/entities/spare-parts-inventory.entity';
import { Employee } from '../organization/entities/employee.entity';
import { detailFor, linkFor, shortLabel, titleize, truncate } from './audit-display';
import { TrackedEntityKind } from './constants/audit.constants';

describe('audit display helpers', () => {
  describe('shortLabel', () => {
    it('should prefer attributes in priority order', () => {
      expect(shortLabel({ id: 1, name: 'Laptop', assetTag: 'ENG0001' })).toBe('ENG0001');
      expect(shortLabel({ id: 2, vendorName: 'Contoso', employeeId: 'E-1' })).toBe('Contoso');
    });

    it('should skip empty attributes', () => {
      expect(shortLabel({ id: 3, assetTag: '', name: 'Spare monitor' })).toBe('Spare monitor');
    });

    it('should fall back to an overridden toString', () => {
      class AssetModelLike {
        id = 4;
        manufacturer = 'Dell';
        modelName = 'XPS 13';
        toString(): string {
          return `${this.manufacturer} ${this.modelName}`;
        }
      }

      expect(shortLabel(new AssetModelLike(), TrackedEntityKind.ASSET_MODEL)).toBe('Dell XPS 13');
    });

    it('should fall back to kind and id', () => {
      expect(shortLabel({ id: 5 }, TrackedEntityKind.ASSET_MODEL)).toBe('Asset Model #5');
    });

    it('should survive a failing toString', () => {
      class Broken {
        id = 6;
        toString(): string {
          throw new Error('relation not loaded');
        }
      }

      expect(shortLabel(new Broken(), TrackedEntityKind.ASSIGNMENT)).toBe('Assignment #6');
    });

    it('should label registry entities without a naming attribute by their toString', () => {
      const stock = Object.assign(new SparePartsInventory(), {
        id: 8,
        componentTypeId: 2,
        manufacturer: '',
        quantityAvailable: 3,
      });
      const record = Object.assign(new MaintenanceRecord(), {
        id: 9,
        assetId: 12,
        maintenanceType: MaintenanceType.UPGRADE,
        maintenanceDate: '2024-07-01',
      });

      expect(shortLabel(stock, TrackedEntityKind.SPARE_PART)).toBe('Component Type #2 - Generic (3 available)');
      expect(shortLabel(record, TrackedEntityKind.MAINTENANCE)).toBe('Asset #12 - upgrade on 2024-07-01');
    });

    it('should render an employee with the staff number', () => {
      const employee = Object.assign(new Employee(), { id: 3, name: 'Jane Doe', employeeId: 'E-1001' });

      expect(employee.toString()).toBe('Jane Doe (E-1001)');
    });

    it('should skip a naming attribute whose getter throws', () => {
      const entity = {
        id: 7,
        get assetTag(): string {
          throw new Error('relation not loaded');
        },
        name: 'Docking station',
      };

      expect(shortLabel(entity, TrackedEntityKind.ASSET)).toBe('Docking station');
    });
  });

  describe('detailFor', () => {
    it('should use the first available accessor', () => {
      expect(
        detailFor({
          getPaymentStatusDisplay: () => 'Partially Paid',
          getActionDisplay: () => 'Installed',
        }),
      ).toBe('Partially Paid');
    });

    it('should skip an accessor that throws and try the next one', () => {
      expect(
        detailFor({
          getStatusDisplay: () => {
            throw new Error('boom');
          },
          getActionDisplay: () => 'Removed',
        }),
      ).toBe('Removed');
    });

    it('should return an empty string when nothing is available', () => {
      expect(detailFor({ status: 'active' })).toBe('');
    });
  });

  describe('linkFor', () => {
    it('should build the detail path from the route table', () => {
      expect(linkFor(TrackedEntityKind.ASSET, { id: 12 })).toBe('/api/v1/assets/12');
    });

    it('should link assignments to their asset', () => {
      expect(linkFor(TrackedEntityKind.ASSIGNMENT, { id: 3, assetId: 12 })).toBe('/api/v1/assets/12');
    });

    it('should link item records to their parent documents', () => {
      expect(linkFor(TrackedEntityKind.LINE_ITEM, { id: 3, invoiceId: 9 })).toBe('/api/v1/invoices/9');
      expect(linkFor(TrackedEntityKind.REQUISITION_ITEM, { id: 4, requisitionId: 2 })).toBe('/api/v1/requisitions/2');
      expect(linkFor(TrackedEntityKind.COMPONENT_HISTORY, { id: 5, componentId: 7 })).toBe('/api/v1/components/7');
      expect(linkFor(TrackedEntityKind.MAINTENANCE, { id: 6 })).toBe('/api/v1/maintenance/6');
    });

    it('should return an empty string when the attribute is missing', () => {
      expect(linkFor(TrackedEntityKind.ASSIGNMENT, { id: 3 })).toBe('');
    });

    it('should return an empty string when the attribute getter throws', () => {
      const entity = {
        get id(): number {
          throw new Error('detached');
        },
      };

      expect(linkFor(TrackedEntityKind.ASSET, entity)).toBe('');
    });
  });

  it('should titleize kinds', () => {
    expect(titleize('component_type')).toBe('Component Type');
  });

  it('should truncate long values', () => {
    expect(truncate('abcdef', 4)).toBe('abcd');
    expect(truncate('abc', 4)).toBe('abc');
  });
});
