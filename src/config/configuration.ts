const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default () => ({
  port: toInt(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
  // Rate limiting for write requests (GET is never throttled)
  throttle: {
    shortTtl: toInt(process.env.THROTTLE_SHORT_TTL, 1000), // 1 second
    shortLimit: toInt(process.env.THROTTLE_SHORT_LIMIT, 10),
    mediumTtl: toInt(process.env.THROTTLE_MEDIUM_TTL, 10000), // 10 seconds
    mediumLimit: toInt(process.env.THROTTLE_MEDIUM_LIMIT, 50),
    longTtl: toInt(process.env.THROTTLE_LONG_TTL, 60000), // 1 minute
    longLimit: toInt(process.env.THROTTLE_LONG_LIMIT, 200),
  },
  // Comma-separated list, e.g. CORS_ORIGINS=https://example.com,https://app.example.com
  cors: {
    origins: process.env.CORS_ORIGINS || 'http://localhost:3000',
  },
});
