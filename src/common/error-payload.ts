import { HttpException } from '@nestjs/common';

export type ErrorPayload = {
  message?: string | string[];
  error?: string;
  errorCode?: string;
};

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

/** The `{ message, error, errorCode }` part of an HttpException response. */
export function readErrorPayload(
  exception: HttpException,
): ErrorPayload | string {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return response;
  }
  const payload: ErrorPayload = {};
  if ('message' in response) {
    const { message } = response;
    if (typeof message === 'string' || isStringArray(message)) {
      payload.message = message;
    }
  }
  if ('error' in response && typeof response.error === 'string') {
    payload.error = response.error;
  }
  if ('errorCode' in response && typeof response.errorCode === 'string') {
    payload.errorCode = response.errorCode;
  }
  return payload;
}

export function errorCodeOf(error: unknown): string | null {
  if (!(error instanceof HttpException)) {
    return null;
  }
  const payload = readErrorPayload(error);
  return typeof payload === 'string' ? null : payload.errorCode ?? null;
}
