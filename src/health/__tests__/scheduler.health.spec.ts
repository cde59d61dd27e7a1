import { HealthIndicatorService } from '@nestjs/terminus';
import { Test, TestingModule } from '@nestjs/testing';
import { SchedulerHealthIndicator } from '../scheduler.health';
import { ProbeSchedulerService } from '../../scheduler/probe-scheduler.service';

describe('SchedulerHealthIndicator', () => {
  let indicator: SchedulerHealthIndicator;
  let scheduler: jest.Mocked<ProbeSchedulerService>;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SchedulerHealthIndicator,
        HealthIndicatorService,
        {
          provide: ProbeSchedulerService,
          useValue: {
            isRunning: jest.fn(),
            isCheckInFlight: jest.fn().mockReturnValue(false),
          },
        },
      ],
    }).compile();

    indicator = module.get<SchedulerHealthIndicator>(SchedulerHealthIndicator);
    scheduler = module.get(ProbeSchedulerService);
  });

  it('should be up while both loops are scheduled', async () => {
    scheduler.isRunning.mockReturnValue(true);
    scheduler.isCheckInFlight.mockImplementation((kind) => kind === 'round-trip');

    await expect(indicator.isHealthy('scheduler')).resolves.toEqual({
      scheduler: { status: 'up', running: true, roundTripInFlight: true, spamScoreInFlight: false },
    });
  });

  it('should be down once the loops are stopped', async () => {
    scheduler.isRunning.mockReturnValue(false);

    await expect(indicator.isHealthy('scheduler')).resolves.toEqual({
      scheduler: { status: 'down', running: false, roundTripInFlight: false, spamScoreInFlight: false },
    });
  });
});
