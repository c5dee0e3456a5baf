import { Test, TestingModule } from '@nestjs/testing';
import { DashboardController } from './dashboard.controller';
import { DashboardService } from './dashboard.service';

describe('DashboardController', () => {
  let controller: DashboardController;
  const dashboardService = { getSummary: jest.fn() };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [DashboardController],
      providers: [{ provide: DashboardService, useValue: dashboardService }],
    }).compile();

    controller = module.get<DashboardController>(DashboardController);
  });

  it('returns the summary from the service', async () => {
    const summary = { activeEmployees: 3 };
    dashboardService.getSummary.mockResolvedValue(summary);

    await expect(controller.getSummary()).resolves.toBe(summary);
  });
});
