import { Test, TestingModule } from '@nestjs/testing';
import { HealthCheckService } from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { HealthController } from '../health.controller';
import { SchedulerHealthIndicator } from '../scheduler.health';

describe('HealthController', () => {
  let controller: HealthController;
  let healthCheckService: jest.Mocked<HealthCheckService>;
  let schedulerHealthIndicator: jest.Mocked<SchedulerHealthIndicator>;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        {
          provide: HealthCheckService,
          useValue: {
            check: jest.fn(),
          },
        },
        {
          provide: SchedulerHealthIndicator,
          useValue: {
            isHealthy: jest.fn(),
          },
        },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
    healthCheckService = module.get(HealthCheckService);
    schedulerHealthIndicator = module.get(SchedulerHealthIndicator);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('should return the health check result', async () => {
    const result: HealthCheckResult = {
      status: 'ok',
      info: { server: { status: 'up' }, scheduler: { status: 'up' } },
      error: {},
      details: { server: { status: 'up' }, scheduler: { status: 'up' } },
    };
    healthCheckService.check.mockResolvedValue(result);

    await expect(controller.check()).resolves.toBe(result);
    expect(healthCheckService.check).toHaveBeenCalledWith([expect.any(Function), expect.any(Function)]);
  });

  it('should report the server as up', async () => {
    await controller.check();

    const [serverCheck] = healthCheckService.check.mock.calls[0][0];
    await expect(serverCheck()).resolves.toEqual({ server: { status: 'up' } });
  });

  it('should ask the scheduler indicator', async () => {
    schedulerHealthIndicator.isHealthy.mockResolvedValue({
      scheduler: { status: 'up', running: true, roundTripInFlight: false, spamScoreInFlight: false },
    });
    await controller.check();

    const [, schedulerCheck] = healthCheckService.check.mock.calls[0][0];
    await expect(schedulerCheck()).resolves.toEqual({
      scheduler: { status: 'up', running: true, roundTripInFlight: false, spamScoreInFlight: false },
    });
    expect(schedulerHealthIndicator.isHealthy).toHaveBeenCalledWith('scheduler');
  });
});
