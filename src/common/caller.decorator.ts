import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';

export const CALLER_HEADER = 'x-account-id';

/** Resolves the acting account from the `x-account-id` request header. */
export const Caller = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string => {
    const request = context.switchToHttp().getRequest<Request>();
    const caller = request.header(CALLER_HEADER)?.trim();

    if (!caller) {
      throw new UnauthorizedException(
        `The ${CALLER_HEADER} header is required.`,
      );
    }

    return caller;
  },
);
