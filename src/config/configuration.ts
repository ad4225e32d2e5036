import { AppConfig } from '@/common/types/config.type';

/**
 * Configuration factory loaded by ConfigModule.forRoot({ load: [configuration] }).
 */
export default (): AppConfig => ({
  // ─── Application ───────────────────────────────────────────────────────────
  app: {
    name: process.env.APP_NAME ?? 'site-cms-api',
    port: parseInt(process.env.PORT ?? '3000', 10),
    env: process.env.NODE_ENV ?? 'development',
  },

  // ─── Internationalisation ──────────────────────────────────────────────────
  i18n: {
    defaultLanguage: process.env.FALLBACK_LANGUAGE ?? 'zh',
  },

  // ─── Database ──────────────────────────────────────────────────────────────
  database: {
    host: process.env.DB_HOST ?? '127.0.0.1',
    port: parseInt(process.env.DB_PORT ?? '3306', 10),
    username: process.env.DB_USERNAME ?? 'root',
    password: process.env.DB_PASSWORD ?? '',
    name: process.env.DB_NAME ?? 'site_cms',
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.DB_LOGGING === 'true',
  },

  // ─── JWT ───────────────────────────────────────────────────────────────────
  jwt: {
    secret: process.env.JWT_SECRET ?? 'my-jwt-secret',
    expiresIn: parseInt(process.env.TOKEN_EXPIRE_TIME ?? '86400', 10),
  },

  // ─── Mail ──────────────────────────────────────────────────────────────────
  mail: {
    host: process.env.MAIL_HOST ?? '',
    port: parseInt(process.env.MAIL_PORT ?? '465', 10),
    user: process.env.MAIL_USER ?? '',
    password: process.env.MAIL_PASSWORD ?? '',
    from: process.env.MAIL_FROM ?? process.env.MAIL_USER ?? '',
  },

  // ─── Cache ─────────────────────────────────────────────────────────────────
  cache: {
    ttl: parseInt(process.env.CACHE_TTL ?? '300', 10),
    max: parseInt(process.env.CACHE_MAX_ITEMS ?? '1000', 10),
    cleanupInterval: parseInt(
      process.env.CACHE_CLEANUP_INTERVAL ?? String(5 * 60 * 1000),
      10,
    ),
    redis: {
      enabled: process.env.REDIS_ENABLED === 'true',
      url: process.env.REDIS_URL || null,
    },
  },

  // ─── Captcha ───────────────────────────────────────────────────────────────
  captcha: {
    length: parseInt(process.env.CAPTCHA_LENGTH ?? '4', 10),
    noise: parseInt(process.env.CAPTCHA_NOISE ?? '2', 10),
    ttl: parseInt(process.env.CAPTCHA_TTL ?? '300', 10),
    caseSensitive: process.env.CAPTCHA_CASE_SENSITIVE === 'true',
  },

  // ─── Password-reset verification codes ─────────────────────────────────────
  verification: {
    ttlSeconds: parseInt(process.env.VERIFY_CODE_TTL ?? '900', 10),
    consumeOnReset: process.env.VERIFY_CODE_CONSUME_ON_RESET === 'true',
  },
});
