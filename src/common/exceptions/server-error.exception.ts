import { InternalServerErrorException } from '@nestjs/common';

/**
 * An internal failure whose message is safe to show to the caller, such as
 * an SMTP delivery error. Anything else that escapes a handler is reported
 * with the generic server-error message.
 */
export class ServerErrorException extends InternalServerErrorException {
  constructor(
    message: string,
    readonly detail?: unknown,
  ) {
    super(message);
  }
}
