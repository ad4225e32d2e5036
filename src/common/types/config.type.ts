/**
 * AppConfig
 *
 * Every configuration key used in the application. Each field maps 1-to-1 to
 * a key returned by configuration.ts and consumed via
 * ConfigService.get<T>('section.key').
 *
 * Keep in sync with:
 *  - src/config/configuration.ts   (the factory)
 *  - .env.example                  (the env reference)
 */

export type AppConfig = {
  // ─── Application ───────────────────────────────────────────────────────────
  app: {
    /** Human-readable application name, shown in the startup log. */
    name: string;
    /** HTTP port the server listens on. */
    port: number;
    /** Runtime environment: 'development' | 'staging' | 'production' */
    env: string;
  };

  // ─── Internationalisation ──────────────────────────────────────────────────
  i18n: {
    /** Language used when no resolver matches, e.g. 'zh'. */
    defaultLanguage: string;
  };

  // ─── Database ──────────────────────────────────────────────────────────────
  database: {
    host: string;
    port: number;
    username: string;
    password: string;
    /** Schema (database) name. */
    name: string;
    /** Let TypeORM create/alter tables on boot. Never enable in production. */
    synchronize: boolean;
    logging: boolean;
  };

  // ─── JWT ───────────────────────────────────────────────────────────────────
  jwt: {
    /** Signing secret for bearer tokens. */
    secret: string;
    /** Bearer token lifetime in seconds. Default: 86400 (1 day). */
    expiresIn: number;
  };

  // ─── Mail ──────────────────────────────────────────────────────────────────
  /**
   * Fallback SMTP transport. The SMTP settings group stored in the database
   * takes precedence when it is complete.
   */
  mail: {
    /** SMTP host, e.g. 'smtp.qq.com'. */
    host: string;
    /** SMTP port: 465 (SSL) or 587 (STARTTLS). */
    port: number;
    user: string;
    password: string;
    /** From header; defaults to the SMTP account. */
    from: string;
  };

  // ─── Cache ─────────────────────────────────────────────────────────────────
  cache: {
    /** Default TTL in seconds for cache entries. Default: 300. */
    ttl: number;
    /** Maximum number of items held in the in-memory LRU cache. */
    max: number;
    /** Milliseconds between sweeps of expired in-memory entries. */
    cleanupInterval: number;
    redis: {
      /**
       * Set to true to use Redis as the primary cache in staging/production.
       * When false (or Redis is unreachable) the in-memory cache is used.
       */
      enabled: boolean;
      /** e.g. 'redis://localhost:6379'. Null disables Redis. */
      url: string | null;
    };
  };

  // ─── Captcha ───────────────────────────────────────────────────────────────
  captcha: {
    /** Number of characters in a challenge. */
    length: number;
    /** Number of noise lines drawn over the text. */
    noise: number;
    /** Seconds a challenge stays answerable. */
    ttl: number;
    /** When false, answers are compared case-insensitively. */
    caseSensitive: boolean;
  };

  // ─── Password-reset verification codes ─────────────────────────────────────
  verification: {
    /** Seconds a code stays valid. Default: 900 (15 min). */
    ttlSeconds: number;
    /** Drop the cached code once a reset succeeds. Default: false. */
    consumeOnReset: boolean;
  };
};
