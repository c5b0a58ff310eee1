import { HttpException, HttpStatus } from '@nestjs/common';

export type CompositionErrorKind =
  | 'INVALID_INPUT'
  | 'UNAUTHORIZED'
  | 'INVALID_STATE'
  | 'OWNER_MISMATCH'
  | 'NOT_FOUND';

const STATUS_BY_KIND: Record<CompositionErrorKind, HttpStatus> = {
  INVALID_INPUT: HttpStatus.BAD_REQUEST,
  UNAUTHORIZED: HttpStatus.FORBIDDEN,
  INVALID_STATE: HttpStatus.CONFLICT,
  OWNER_MISMATCH: HttpStatus.UNPROCESSABLE_ENTITY,
  NOT_FOUND: HttpStatus.NOT_FOUND,
};

export class CompositionException extends HttpException {
  constructor(
    readonly kind: CompositionErrorKind,
    message: string,
  ) {
    super(
      { statusCode: STATUS_BY_KIND[kind], error: kind, message },
      STATUS_BY_KIND[kind],
    );
  }
}

export const invalidInput = (message: string) =>
  new CompositionException('INVALID_INPUT', message);

export const unauthorized = (message: string) =>
  new CompositionException('UNAUTHORIZED', message);

export const invalidState = (message: string) =>
  new CompositionException('INVALID_STATE', message);

export const ownerMismatch = (message: string) =>
  new CompositionException('OWNER_MISMATCH', message);

export const notFound = (message: string) =>
  new CompositionException('NOT_FOUND', message);
