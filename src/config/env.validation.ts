import Joi from 'joi';

const httpUrl = Joi.string().uri({ scheme: ['http', 'https'] });

export const envValidationSchema = Joi.object({
  PORT: Joi.number().port().default(3000),
  LOG_LEVEL: Joi.string().valid('fatal', 'error', 'warn', 'info', 'debug', 'trace').default('info'),
  // Full completion endpoint URL, path included.
  UPSTREAM_API_URL: httpUrl.required(),
  UPSTREAM_API_KEY: Joi.string().required(),
  // Seconds; fractional values are allowed.
  UPSTREAM_TIMEOUT: Joi.number().positive().default(6),
  // Default timeout in ms for every other outbound call (Telegram).
  HTTP_CLIENT_TIMEOUT: Joi.number().integer().min(100).default(10000),
  HTTP_CLIENT_CONNECTIONS: Joi.number().integer().min(1).default(20),
  STORE_REDIS_URL: Joi.string().uri({ scheme: ['redis', 'rediss'] }).required(),
  // Namespaces every stored key, so several deployments can share one Redis.
  STORE_DB_NAME: Joi.string()
    .pattern(/^[A-Za-z0-9_-]+$/)
    .default('alice'),
  KEY_DEFAULT_LIFETIME_DAYS: Joi.number().integer().positive().default(30),
  TELEGRAM_TOKEN: Joi.string().required(),
  TELEGRAM_API_BASE_URL: httpUrl.default('https://api.telegram.org'),
  // Empty string means the webhook does not check the secret header.
  TELEGRAM_WEBHOOK_SECRET: Joi.string().allow('').default(''),
  ADMIN_ID: Joi.number().integer().required(),
  PUBLIC_BASE_URL: httpUrl.default('http://localhost:3000'),
});
