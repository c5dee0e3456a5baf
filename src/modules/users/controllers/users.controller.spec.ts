import { Test, TestingModule } from '@nestjs/testing';
import { UsersService } from '../services/users.service';
import { UsersController } from './users.controller';

describe('UsersController', () => {
  let controller: UsersController;
  const usersService = {
    create: jest.fn(),
    findAll: jest.fn(),
    findOne: jest.fn(),
    update: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [UsersController],
      providers: [{ provide: UsersService, useValue: usersService }],
    }).compile();

    controller = module.get<UsersController>(UsersController);
  });

  it('creates an account', async () => {
    usersService.create.mockResolvedValue({ id: 1, username: 'jdoe' });

    await expect(controller.create({ username: 'jdoe' })).resolves.toEqual({ id: 1, username: 'jdoe' });
    expect(usersService.create).toHaveBeenCalledWith({ username: 'jdoe' });
  });

  it('updates an account by id', async () => {
    usersService.update.mockResolvedValue({ id: 4, isActive: false });

    await controller.update(4, { isActive: false });

    expect(usersService.update).toHaveBeenCalledWith(4, { isActive: false });
  });
});
