import { BadRequestException } from '@nestjs/common';

export type PaginationQuery = {
  limit?: string;
  cursor?: string;
};

export type PaginationResult = {
  take: number;
  cursor?: number;
};

export type PaginatedResponse<T> = {
  items: T[];
  nextCursor: string | null;
  total?: number;
};

export function parsePagination(
  query: PaginationQuery,
  defaultLimit = 25,
  maxLimit = 100,
): PaginationResult {
  const requested = parseInt(query.limit ?? `${defaultLimit}`, 10);
  const limit = Math.min(
    Math.max(Number.isFinite(requested) ? requested : defaultLimit, 1),
    maxLimit,
  );
  if (!query.cursor) {
    return { take: limit };
  }
  const cursor = parseInt(query.cursor, 10);
  if (!Number.isSafeInteger(cursor) || cursor <= 0) {
    throw new BadRequestException('Invalid pagination cursor.');
  }
  return { take: limit, cursor };
}

export function buildPaginatedResponse<T extends { id: number }>(
  items: T[],
  limit: number,
  total?: number,
): PaginatedResponse<T> {
  const last = items[items.length - 1];
  const nextCursor = items.length >= limit && last ? String(last.id) : null;
  return { items, nextCursor, total };
}
