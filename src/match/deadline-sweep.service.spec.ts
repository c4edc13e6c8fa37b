import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { DeadlineSweepService } from './deadline-sweep.service';
import { DeadlineService } from './deadline.service';

describe('DeadlineSweepService', () => {
  let service: DeadlineSweepService;
  let deadlineService: jest.Mocked<Pick<DeadlineService, 'latchDueMatches'>>;
  let schedulerEnabled: boolean;

  beforeEach(async () => {
    schedulerEnabled = true;
    deadlineService = { latchDueMatches: jest.fn().mockResolvedValue(2) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DeadlineSweepService,
        { provide: DeadlineService, useValue: deadlineService },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => (key === 'scheduler.enabled' ? schedulerEnabled : undefined)) },
        },
      ],
    }).compile();

    service = module.get<DeadlineSweepService>(DeadlineSweepService);
  });

  it('should return the number of latched matches', async () => {
    await expect(service.sweep()).resolves.toBe(2);
  });

  it('should skip the cron run when the scheduler is disabled', async () => {
    schedulerEnabled = false;

    await service.handleSweep();

    expect(deadlineService.latchDueMatches).not.toHaveBeenCalled();
  });

  it('should run from cron when the scheduler is enabled', async () => {
    await service.handleSweep();

    expect(deadlineService.latchDueMatches).toHaveBeenCalledTimes(1);
  });

  it('should not overlap runs', async () => {
    let finish: (latched: number) => void = () => undefined;
    deadlineService.latchDueMatches.mockReturnValueOnce(
      new Promise<number>((resolve) => {
        finish = resolve;
      }),
    );

    const first = service.sweep();
    const second = await service.sweep();
    finish(1);

    expect(second).toBe(0);
    await expect(first).resolves.toBe(1);
    expect(deadlineService.latchDueMatches).toHaveBeenCalledTimes(1);
  });

  it('should swallow and log failures so the next run can proceed', async () => {
    deadlineService.latchDueMatches.mockRejectedValueOnce(new Error('connection reset'));

    await expect(service.sweep()).resolves.toBe(0);
    await expect(service.sweep()).resolves.toBe(2);
  });
});
