/** Escapes LIKE wildcards so user input matches literally (MySQL `\` escape). */
export const escapeLike = (value: string): string =>
  value.replace(/[\\%_]/g, '\\$&');
