import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TaggedRepository, tagPrefixCondition } from '../../tagging/tagged-repository';
import { Component } from '../entities/component.entity';

@Injectable()
export class ComponentRepository implements TaggedRepository {
  constructor(
    @InjectRepository(Component)
    private readonly repository: Repository<Component>,
  ) {}

  async findTagsWithPrefix(prefix: string, limit: number): Promise<string[]> {
    const rows = await this.repository.find({
      select: { id: true, componentTag: true },
      where: { componentTag: tagPrefixCondition(prefix) },
      order: { componentTag: 'DESC' },
      take: limit,
    });
    return rows.map((row) => row.componentTag);
  }

  tagExists(tag: string): Promise<boolean> {
    return this.repository.exists({ where: { componentTag: tag } });
  }
}
