import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TaggedRepository, tagPrefixCondition } from '../../tagging/tagged-repository';
import { Asset } from '../entities/asset.entity';

/** Asset tags as a sequence source for tag generation. */
@Injectable()
export class AssetRepository implements TaggedRepository {
  constructor(
    @InjectRepository(Asset)
    private readonly repository: Repository<Asset>,
  ) {}

  async findTagsWithPrefix(prefix: string, limit: number): Promise<string[]> {
    const rows = await this.repository.find({
      select: { id: true, assetTag: true },
      where: { assetTag: tagPrefixCondition(prefix) },
      order: { assetTag: 'DESC' },
      take: limit,
    });
    return rows.map((row) => row.assetTag);
  }

  tagExists(tag: string): Promise<boolean> {
    return this.repository.exists({ where: { assetTag: tag } });
  }
}
