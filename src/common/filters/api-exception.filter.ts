import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { Request, Response } from 'express';
import {
  I18nContext,
  I18nService,
  I18nValidationException,
} from 'nestjs-i18n';
import {
  firstValidationMessage,
  translateConstraint,
} from '../exceptions/validation.exception';
import { ServerErrorException } from '../exceptions/server-error.exception';
import { translate } from '../i18n/translate';
import { ApiResult, ResultCode } from '../types/api-result.type';

/**
 * Renders every thrown error as an `ApiResult` envelope with HTTP 200.
 *
 *  • validation / business-rule failures → REQUEST_ERROR, message as thrown
 *  • missing or invalid bearer token     → UNAUTHORIZED
 *  • ServerErrorException                → SERVER_ERROR, message as thrown
 *  • anything else                       → SERVER_ERROR, generic message
 *
 * Server-side failures are logged with their detail; the caller never sees it.
 */
@Catch()
@Injectable()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  constructor(private readonly i18n: I18nService) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<Response>();
    const request = http.getRequest<Request>();
    const lang = I18nContext.current(host)?.lang;

    const result = this.toResult(
      exception,
      lang,
      `${request.method} ${request.url}`,
    );

    response.status(HttpStatus.OK).json(result);
  }

  toResult(
    exception: unknown,
    lang: string | undefined,
    route: string,
  ): ApiResult<null> {
    if (exception instanceof I18nValidationException) {
      return this.fail(
        ResultCode.REQUEST_ERROR,
        firstValidationMessage(
          exception.errors,
          (message, error) =>
            translateConstraint(this.i18n, message, error, lang),
          exception.message,
        ),
      );
    }

    if (exception instanceof UnauthorizedException) {
      return this.fail(
        ResultCode.UNAUTHORIZED,
        translate(this.i18n, 'auth.errors.loginRequired', { lang }),
      );
    }

    if (exception instanceof ServerErrorException) {
      this.logger.error(
        `${route} failed: ${exception.message}`,
        this.describe(exception.detail),
      );
      return this.fail(ResultCode.SERVER_ERROR, exception.message);
    }

    if (
      exception instanceof HttpException &&
      exception.getStatus() < HttpStatus.INTERNAL_SERVER_ERROR
    ) {
      return this.fail(ResultCode.REQUEST_ERROR, exception.message);
    }

    this.logger.error(
      `${route} failed unexpectedly`,
      this.describe(exception),
    );
    return this.fail(
      ResultCode.SERVER_ERROR,
      translate(this.i18n, 'common.errors.server', { lang }),
    );
  }

  private fail(code: ResultCode, msg: string): ApiResult<null> {
    return { code, msg, data: null };
  }

  private describe(error: unknown): string {
    if (error instanceof Error) return error.stack ?? error.message;
    return String(error);
  }
}
