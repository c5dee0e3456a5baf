import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { RecordNotFoundError } from '../../../common/exceptions';
import { CreateUserDto, UpdateUserDto } from '../dto/user.dto';
import { User } from '../entities/user.entity';

@Injectable()
export class UsersService {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async create(dto: CreateUserDto): Promise<User> {
    const user = this.userRepository.create({
      username: dto.username,
      firstName: dto.firstName ?? '',
      lastName: dto.lastName ?? '',
      email: dto.email ?? null,
      employeeId: dto.employeeId ?? null,
    });
    return this.userRepository.save(user);
  }

  findAll(): Promise<User[]> {
    return this.userRepository.find({
      relations: { employee: true },
      order: { username: 'ASC' },
    });
  }

  async findOne(id: number): Promise<User> {
    const user = await this.userRepository.findOne({
      where: { id },
      relations: { employee: true },
    });
    if (!user) {
      throw new RecordNotFoundError('User', id);
    }
    return user;
  }

  async update(id: number, dto: UpdateUserDto): Promise<User> {
    const user = await this.findOne(id);
    this.userRepository.merge(user, dto);
    if (dto.employeeId !== undefined) {
      user.employee = undefined;
    }
    await this.userRepository.save(user);
    return this.findOne(id);
  }

  /**
   * Active account for a username, with its employee loaded.
   * Reads through `manager` when given, so it joins the caller's transaction.
   */
  findActiveByUsername(username: string, manager?: EntityManager): Promise<User | null> {
    const repo = manager ? manager.getRepository(User) : this.userRepository;
    return repo.findOne({
      where: { username, isActive: true },
      relations: { employee: true },
    });
  }
}
