import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RedisService } from './redis.service';
import Redis from 'ioredis';

jest.mock('ioredis');

describe('RedisService', () => {
  let service: RedisService;
  let configService: ConfigService;

  const mockRedisClient = {
    get: jest.fn(),
    setex: jest.fn(),
    del: jest.fn(),
    incr: jest.fn(),
    expire: jest.fn(),
    set: jest.fn(),
    eval: jest.fn(),
    quit: jest.fn(),
    on: jest.fn(),
  };

  const mockConfigService = {
    get: jest.fn((key: string) => {
      const config: Record<string, string | number | undefined> = {
        'redis.host': 'localhost',
        'redis.port': 6379,
        'redis.password': undefined,
      };
      return config[key];
    }),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    (Redis as jest.MockedClass<typeof Redis>).mockImplementation(
      () => mockRedisClient as unknown as Redis,
    );

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RedisService,
        {
          provide: ConfigService,
          useValue: mockConfigService,
        },
      ],
    }).compile();

    service = module.get<RedisService>(RedisService);
    configService = module.get<ConfigService>(ConfigService);

    await service.onModuleInit();
  });

  afterEach(async () => {
    mockRedisClient.quit.mockResolvedValue('OK');
    await service.onModuleDestroy();
  });

  describe('onModuleInit', () => {
    it('should initialize Redis client with correct config', () => {
      expect(Redis).toHaveBeenCalledWith(
        expect.objectContaining({
          host: 'localhost',
          port: 6379,
          password: undefined,
          maxRetriesPerRequest: 3,
        }),
      );
    });

    it('should setup event listeners', () => {
      expect(mockRedisClient.on).toHaveBeenCalledWith('error', expect.any(Function));
      expect(mockRedisClient.on).toHaveBeenCalledWith('connect', expect.any(Function));
      expect(mockRedisClient.on).toHaveBeenCalledWith('close', expect.any(Function));
    });
  });

  describe('onModuleDestroy', () => {
    it('should close Redis connection gracefully', async () => {
      mockRedisClient.quit.mockResolvedValue('OK');

      await service.onModuleDestroy();

      expect(mockRedisClient.quit).toHaveBeenCalledTimes(1);
    });

    it('should not throw when closing fails', async () => {
      mockRedisClient.quit.mockRejectedValueOnce(new Error('Connection error'));

      await expect(service.onModuleDestroy()).resolves.toBeUndefined();
    });
  });

  describe('get', () => {
    it('should get value from Redis', async () => {
      mockRedisClient.get.mockResolvedValue('test-value');

      await expect(service.get('test-key')).resolves.toBe('test-value');
      expect(mockRedisClient.get).toHaveBeenCalledWith('test-key');
    });

    it('should propagate errors', async () => {
      mockRedisClient.get.mockRejectedValue(new Error('Redis error'));

      await expect(service.get('test-key')).rejects.toThrow('Redis error');
    });

    it('should throw when the client was never initialized', async () => {
      const uninitialized = new RedisService(configService);

      await expect(uninitialized.get('test-key')).rejects.toThrow('Redis client not initialized');
    });
  });

  describe('setex', () => {
    it('should set value with expiry', async () => {
      mockRedisClient.setex.mockResolvedValue('OK');

      await expect(service.setex('test-key', 3600, 'test-value')).resolves.toBe('OK');
      expect(mockRedisClient.setex).toHaveBeenCalledWith('test-key', 3600, 'test-value');
    });
  });

  describe('incr and expire', () => {
    it('should increment counter', async () => {
      mockRedisClient.incr.mockResolvedValue(1);

      await expect(service.incr('counter')).resolves.toBe(1);
    });

    it('should set expiry on key', async () => {
      mockRedisClient.expire.mockResolvedValue(1);

      await expect(service.expire('counter', 60)).resolves.toBe(1);
      expect(mockRedisClient.expire).toHaveBeenCalledWith('counter', 60);
    });
  });

  describe('getJson', () => {
    it('should parse a stored JSON value', async () => {
      mockRedisClient.get.mockResolvedValue('{"groupId":"g1","entries":[]}');

      await expect(service.getJson('leaderboard:arena:g1')).resolves.toEqual({
        groupId: 'g1',
        entries: [],
      });
    });

    it('should return null for a missing key', async () => {
      mockRedisClient.get.mockResolvedValue(null);

      await expect(service.getJson('missing')).resolves.toBeNull();
      expect(mockRedisClient.del).not.toHaveBeenCalled();
    });

    it('should drop an unreadable payload and report a miss', async () => {
      mockRedisClient.get.mockResolvedValue('{not json');
      mockRedisClient.del.mockResolvedValue(1);

      await expect(service.getJson('broken')).resolves.toBeNull();
      expect(mockRedisClient.del).toHaveBeenCalledWith('broken');
    });
  });

  describe('setJson', () => {
    it('should serialize the value with expiry', async () => {
      mockRedisClient.setex.mockResolvedValue('OK');

      await service.setJson('key', 30, { a: 1 });

      expect(mockRedisClient.setex).toHaveBeenCalledWith('key', 30, '{"a":1}');
    });
  });

  describe('acquireLock', () => {
    it('should set the lock only if absent, with an expiry', async () => {
      mockRedisClient.set.mockResolvedValue('OK');

      const token = await service.acquireLock('lock:g1', 5000);

      expect(token).toEqual(expect.any(String));
      expect(mockRedisClient.set).toHaveBeenCalledWith('lock:g1', token, 'PX', 5000, 'NX');
    });

    it('should return null while the lock is held', async () => {
      mockRedisClient.set.mockResolvedValue(null);

      await expect(service.acquireLock('lock:g1', 5000)).resolves.toBeNull();
    });
  });

  describe('releaseLock', () => {
    it('should release through a token check', async () => {
      mockRedisClient.eval.mockResolvedValue(1);

      await expect(service.releaseLock('lock:g1', 'token-1')).resolves.toBe(true);
      expect(mockRedisClient.eval).toHaveBeenCalledWith(expect.any(String), 1, 'lock:g1', 'token-1');
    });

    it('should report a lock that another holder owns by now', async () => {
      mockRedisClient.eval.mockResolvedValue(0);

      await expect(service.releaseLock('lock:g1', 'token-1')).resolves.toBe(false);
    });
  });
});
