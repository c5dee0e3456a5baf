import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { RecordNotFoundError } from '../../../common/exceptions';
import {
  ReusableTable,
  TableColumn,
  TableContext,
  TablePreferencesService,
  TableRequest,
  urlPattern,
} from '../../../common/table';
import { AuditService } from '../../audit/audit.service';
import { CreateVendorDto, UpdateVendorDto } from '../dto';
import { Vendor } from '../entities/vendor.entity';

@Injectable()
export class VendorsService {
  constructor(
    @InjectRepository(Vendor)
    private readonly vendorRepository: Repository<Vendor>,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  create(dto: CreateVendorDto): Promise<Vendor> {
    return this.vendorRepository.save(this.vendorRepository.create(dto));
  }

  findAll(request: TableRequest): Promise<TableContext<Vendor>> {
    const columns = [
      new TableColumn<Vendor>('vendor_name', 'Vendor', 'vendorName', {
        linkPattern: urlPattern('vendors.detail', { id: 'id' }),
      }),
      new TableColumn<Vendor>('contact_person', 'Contact', 'contactPerson'),
      new TableColumn<Vendor>('email', 'Email', 'email'),
      new TableColumn<Vendor>('phone', 'Phone', 'phone', { sortable: false }),
      new TableColumn<Vendor>('website', 'Website', 'website', { sortable: false, defaultVisible: false }),
    ];

    return new ReusableTable<Vendor>(request, this.vendorRepository.createQueryBuilder('vendor'), columns, {
      tableId: 'vendors',
      defaultSort: 'vendorName',
      searchFields: ['vendorName', 'contactPerson', 'email', 'phone'],
      showBulkSelect: false,
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<Vendor> {
    const vendor = await this.vendorRepository.findOneBy({ id });
    if (!vendor) {
      throw new RecordNotFoundError('Vendor', id);
    }
    return vendor;
  }

  async update(id: number, dto: UpdateVendorDto): Promise<Vendor> {
    const vendor = await this.findOne(id);
    this.vendorRepository.merge(vendor, dto);
    return this.auditService.saveExisting(this.vendorRepository, vendor);
  }

  async remove(id: number): Promise<void> {
    await this.vendorRepository.remove(await this.findOne(id));
  }
}
