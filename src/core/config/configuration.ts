export default () => ({
  // Application Configuration
  app: {
    name: process.env.APP_NAME || 'Shift Scheduling Backend',
    version: process.env.APP_VERSION || '1.0.0',
    port: parseInt(process.env.PORT || '3000', 10),
    env: process.env.NODE_ENV || 'development',
    apiPrefix: process.env.API_PREFIX || 'api/v1',
    corsOrigins: process.env.CORS_ORIGINS?.split(',') || [
      'http://localhost:3000',
    ],
  },

  // Database Configuration
  database: {
    mongodb: {
      uri:
        process.env.MONGODB_URI ||
        'mongodb://localhost:27017/shift-scheduling',
    },
    redis: {
      url: process.env.REDIS_URL,
      host: process.env.REDIS_HOST,
      port: parseInt(process.env.REDIS_PORT || '6379', 10),
      password: process.env.REDIS_PASSWORD,
      db: parseInt(process.env.REDIS_DB || '0', 10),
      keyPrefix: process.env.REDIS_KEY_PREFIX || 'shift-scheduling:',
    },
  },

  // Security Configuration
  security: {
    rateLimit: {
      ttl: parseInt(process.env.RATE_LIMIT_TTL || '60000', 10), // 1 minute
      limit: parseInt(process.env.RATE_LIMIT_LIMIT || '100', 10),
    },
  },

  // Scheduling Configuration
  scheduling: {
    lock: {
      ttlSeconds: parseInt(process.env.SHIFT_LOCK_TTL || '10', 10),
      retries: parseInt(process.env.SHIFT_LOCK_RETRIES || '20', 10),
      retryDelayMs: parseInt(process.env.SHIFT_LOCK_RETRY_DELAY_MS || '50', 10),
    },
  },

  // Billing Configuration
  billing: {
    // Consultation fee before the specialization premium, in cents
    baseAmountCents: Math.round(
      parseFloat(process.env.BILLING_BASE_AMOUNT || '100.00') * 100,
    ),
  },

  // Audit Configuration
  audit: {
    enabled: process.env.AUDIT_ENABLED !== 'false',
    retention: {
      dataAccess: parseInt(
        process.env.AUDIT_DATA_ACCESS_RETENTION || '3653',
        10,
      ), // 10 years in days
    },
  },
});
