import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { RatioAlertRepository } from './ratio-alert.repository.js';
import { DatabaseService } from '../../common/database.service.js';

function queryChain(result: unknown) {
  const chain = {
    sort: vi.fn(),
    limit: vi.fn(),
    lean: vi.fn(),
    exec: vi.fn().mockResolvedValue(result),
  };
  chain.sort.mockReturnValue(chain);
  chain.limit.mockReturnValue(chain);
  chain.lean.mockReturnValue(chain);
  return chain;
}

describe('RatioAlertRepository', () => {
  let repo: RatioAlertRepository;
  const mockDb = {
    ratioAlerts: {
      create: vi.fn(),
      find: vi.fn(),
      deleteMany: vi.fn(),
    },
  };

  const alert = {
    pairName: 'BTC/ETH',
    ratio: 1.06,
    baselineRatio: 1,
    changePct: 6,
    threshold: 5,
    windowSecs: 300,
    delivered: true,
    timestamp: new Date('2026-03-01T12:00:00Z'),
  };

  beforeEach(async () => {
    vi.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RatioAlertRepository,
        { provide: DatabaseService, useValue: mockDb },
      ],
    }).compile();

    repo = module.get<RatioAlertRepository>(RatioAlertRepository);
  });

  it('should create an alert record', async () => {
    mockDb.ratioAlerts.create.mockResolvedValue(alert);

    await repo.create(alert);

    expect(mockDb.ratioAlerts.create).toHaveBeenCalledWith(alert);
  });

  it('should find alerts by pair with default limit 50', async () => {
    const chain = queryChain([alert]);
    mockDb.ratioAlerts.find.mockReturnValue(chain);

    const result = await repo.findByPair('BTC/ETH');

    expect(mockDb.ratioAlerts.find).toHaveBeenCalledWith({
      pairName: 'BTC/ETH',
    });
    expect(chain.limit).toHaveBeenCalledWith(50);
    expect(result).toEqual([alert]);
  });

  it('should find recent alerts across all pairs', async () => {
    const chain = queryChain([alert]);
    mockDb.ratioAlerts.find.mockReturnValue(chain);

    await repo.findRecent(10);

    expect(mockDb.ratioAlerts.find).toHaveBeenCalledWith();
    expect(chain.sort).toHaveBeenCalledWith({ timestamp: -1 });
    expect(chain.limit).toHaveBeenCalledWith(10);
  });

  it('should delete alerts older than a cutoff', async () => {
    mockDb.ratioAlerts.deleteMany.mockReturnValue({
      exec: vi.fn().mockResolvedValue({ deletedCount: 2 }),
    });

    const deleted = await repo.deleteOlderThan(new Date('2026-01-01'));

    expect(deleted).toBe(2);
  });
});
