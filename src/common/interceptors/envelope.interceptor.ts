import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { map, Observable } from 'rxjs';
import {
  ApiResult,
  ResultCode,
  ServiceResult,
} from '../types/api-result.type';

@Injectable()
export class EnvelopeInterceptor<T>
  implements NestInterceptor<ServiceResult<T>, ApiResult<T>>
{
  intercept(
    _context: ExecutionContext,
    next: CallHandler<ServiceResult<T>>,
  ): Observable<ApiResult<T>> {
    return next.handle().pipe(
      map((result) => ({
        code: ResultCode.SUCCESS,
        msg: result.message,
        data: result.data ?? null,
      })),
    );
  }
}
