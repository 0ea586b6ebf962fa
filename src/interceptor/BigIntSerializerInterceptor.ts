import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { map, Observable } from 'rxjs';
import { safeStringify } from '../utils/bigintSerializer';

/** Renders bigint and ethers BigNumber values as decimal strings. */
@Injectable()
export class BigIntSerializerInterceptor implements NestInterceptor {
  intercept(_context: ExecutionContext, next: CallHandler): Observable<unknown> {
    return next
      .handle()
      .pipe(map((data: unknown): unknown => JSON.parse(safeStringify(data))));
  }
}
