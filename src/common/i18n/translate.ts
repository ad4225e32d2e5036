import { I18nService } from 'nestjs-i18n';

export interface MessageOptions {
  lang?: string;
  args?: Record<string, unknown>;
}

/**
 * Resolves a catalogue key to a caller-facing string. Falls back to the key
 * itself when the catalogue holds a non-string node.
 */
export const translate = (
  i18n: I18nService,
  key: string,
  options?: MessageOptions,
): string => {
  const value: unknown = i18n.translate(key, options);
  return typeof value === 'string' ? value : key;
};
