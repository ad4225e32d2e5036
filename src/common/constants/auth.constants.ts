export const AUTH_CONSTANTS = {
  VERIFY_CODE_LENGTH: 6,
  VERIFY_CODE_ALPHABET:
    'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789',
};

/** Settings-group names as stored in sys_settings.name. */
export const SETTING_GROUPS = {
  SITE: '网站设置',
  SMTP: '邮件服务',
};

export const CACHE_KEYS = {
  VERIFY_CODE: (email: string): string => `verify-code:${email}`,
  CAPTCHA: (id: string): string => `captcha:${id}`,
};
