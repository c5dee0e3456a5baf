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
import { CreateLocationDto, UpdateLocationDto } from '../dto';
import { Location } from '../entities/location.entity';

@Injectable()
export class LocationsService {
  constructor(
    @InjectRepository(Location)
    private readonly locationRepository: Repository<Location>,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  create(dto: CreateLocationDto): Promise<Location> {
    return this.locationRepository.save(this.locationRepository.create(dto));
  }

  findAll(request: TableRequest): Promise<TableContext<Location>> {
    const qb = this.locationRepository.createQueryBuilder('location');
    const columns = [
      new TableColumn<Location>('name', 'Name', 'name', { linkPattern: urlPattern('locations.detail', { id: 'id' }) }),
      new TableColumn<Location>('city', 'City', 'city'),
      new TableColumn<Location>('zipcode', 'ZIP', 'zipcode', { defaultVisible: false }),
      new TableColumn<Location>('country', 'Country', 'country'),
    ];

    return new ReusableTable<Location>(request, qb, columns, {
      tableId: 'locations',
      defaultSort: 'name',
      searchFields: ['name', 'city', 'country'],
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<Location> {
    const location = await this.locationRepository.findOneBy({ id });
    if (!location) {
      throw new RecordNotFoundError('Location', id);
    }
    return location;
  }

  async update(id: number, dto: UpdateLocationDto): Promise<Location> {
    const location = await this.findOne(id);
    this.locationRepository.merge(location, dto);
    return this.auditService.saveExisting(this.locationRepository, location);
  }

  async remove(id: number): Promise<void> {
    const location = await this.findOne(id);
    await this.locationRepository.remove(location);
  }
}
