import { Column, Entity } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';

@TrackedEntity(TrackedEntityKind.VENDOR)
@Entity('vendors')
export class Vendor extends BaseRecordEntity {
  @Column({ name: 'vendor_name', type: 'varchar', length: 255 })
  vendorName!: string;

  @Column({ name: 'contact_person', type: 'varchar', length: 255, default: '' })
  contactPerson!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;

  @Column({ type: 'varchar', length: 50, default: '' })
  phone!: string;

  @Column({ type: 'text', nullable: true })
  address!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  website!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;
}
