import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';

export const CALLER_HEADER = 'x-caller-address';

/** Raw value of the caller header; the keyring decides whether it may act. */
export const CallerAddress = createParamDecorator((_data: unknown, context: ExecutionContext): string | undefined =>
  context.switchToHttp().getRequest<Request>().header(CALLER_HEADER),
);
