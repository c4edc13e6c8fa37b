const intFromEnv = (name: string, fallback: number): number =>
  parseInt(process.env[name] ?? '', 10) || fallback;

/**
 * Reads a non-negative integer where 0 is a meaningful value (e.g. points for a miss).
 */
const countFromEnv = (name: string, fallback: number): number => {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default () => ({
  port: intFromEnv('PORT', 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  database: {
    host: process.env.DATABASE_HOST || 'localhost',
    port: intFromEnv('DATABASE_PORT', 5432),
    username: process.env.DATABASE_USERNAME || 'postgres',
    password: process.env.DATABASE_PASSWORD || 'postgres',
    database: process.env.DATABASE_NAME || 'prediction_league',
    poolSize: intFromEnv('DATABASE_POOL_SIZE', 20),
    connectionTimeoutMillis: intFromEnv('DATABASE_TIMEOUT', 5000),
  },
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: intFromEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD,
    ttl: intFromEnv('REDIS_TTL', 3600),
  },
  rabbitmq: {
    url: process.env.RABBITMQ_URL || 'amqp://localhost:5672',
    eventsQueue: process.env.RABBITMQ_EVENTS_QUEUE || 'betting.events',
  },
  betting: {
    deadlineOffsetMinutes: intFromEnv('BETTING_DEADLINE_OFFSET_MINUTES', 60),
    maxConcurrencyRetries: Math.min(countFromEnv('BETTING_MAX_CONCURRENCY_RETRIES', 3), 10),
    finalizationWindowHours: intFromEnv('BETTING_FINALIZATION_WINDOW_HOURS', 48),
    leaderboardCacheTtlSeconds: intFromEnv('LEADERBOARD_CACHE_TTL_SECONDS', 86400),
    points: {
      exactScore: countFromEnv('POINTS_EXACT_SCORE', 3),
      correctWinner: countFromEnv('POINTS_CORRECT_WINNER', 1),
      miss: countFromEnv('POINTS_MISS', 0),
    },
  },
  audit: {
    historyPageSize: Math.min(Math.max(intFromEnv('AUDIT_HISTORY_PAGE_SIZE', 100), 1), 1000),
  },
  scheduler: {
    enabled: process.env.SCHEDULER_ENABLED === 'true',
  },
  rateLimit: {
    windowSeconds: intFromEnv('RATE_LIMIT_WINDOW_SECONDS', 60),
    maxRequests: intFromEnv('RATE_LIMIT_MAX_REQUESTS', 100),
  },
});
