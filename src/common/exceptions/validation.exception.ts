import { ValidationError } from 'class-validator';
import { I18nService } from 'nestjs-i18n';
import { translate } from '../i18n/translate';

type FormattedErrors = Record<string, string[]>;

type ConstraintFormatter = (message: string, error: ValidationError) => string;

const keepMessage: ConstraintFormatter = (message) => message;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Flattens nested class-validator errors into `{ 'a.b': [messages] }`.
 */
export const flattenValidationErrors = (
  errors: ValidationError[],
  format: ConstraintFormatter = keepMessage,
): FormattedErrors => {
  const result: FormattedErrors = {};

  const walk = (errs: ValidationError[], parentPath = ''): void => {
    errs.forEach((error: ValidationError) => {
      const path = parentPath
        ? `${parentPath}.${error.property}`
        : error.property;

      if (error.constraints) {
        result[path] = Object.values(error.constraints).map((message) =>
          format(message, error),
        );
      }

      if (error.children?.length) {
        walk(error.children, path);
      }
    });
  };

  walk(errors);

  return result;
};

/** The first constraint message, in field order. */
export const firstValidationMessage = (
  errors: ValidationError[],
  format: ConstraintFormatter = keepMessage,
  fallback = 'Bad Request',
): string => {
  for (const messages of Object.values(
    flattenValidationErrors(errors, format),
  )) {
    if (messages.length > 0) return messages[0];
  }
  return fallback;
};

const parseMessageArgs = (raw: string): Record<string, unknown> => {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
};

/**
 * Translates a constraint written by `i18nValidationMessage`, whose form is
 * `<key>|<json args>`. The failing property and value are passed as args.
 */
export const translateConstraint = (
  i18n: I18nService,
  message: string,
  error: ValidationError,
  lang?: string,
): string => {
  const separator = message.indexOf('|');
  const key = separator < 0 ? message : message.slice(0, separator);
  const args =
    separator < 0 ? {} : parseMessageArgs(message.slice(separator + 1));

  return translate(i18n, key, {
    lang,
    args: { property: error.property, value: error.value, ...args },
  });
};
