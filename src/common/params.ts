import { BadRequestException } from '@nestjs/common';

export function requireId(value: unknown, label: string): number {
  const id = typeof value === 'string' ? Number(value) : value;
  if (typeof id !== 'number' || !Number.isSafeInteger(id) || id <= 0) {
    throw new BadRequestException(`${label} must be a positive integer id.`);
  }
  return id;
}

export function parseOptionalId(value: string | undefined, label: string) {
  return value ? requireId(value, label) : undefined;
}

export function parseOptionalInt(value: string | undefined, label: string) {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new BadRequestException(`${label} must be an integer.`);
  }
  return parsed;
}

export function parseOptionalDate(value: string | undefined, label: string) {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new BadRequestException(`Invalid ${label} date.`);
  }
  return date;
}
