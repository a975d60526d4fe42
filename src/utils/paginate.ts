import { InvalidArgumentError } from '../errors';
import { Page } from '../types';

export interface PageRequest {
  limit: number;
  offset: number;
}

/**
 * Reject page requests outside `1 <= limit <= maxLimit` and `offset >= 0`.
 */
export const validatePageRequest = ({ limit, offset }: PageRequest, maxLimit: number): void => {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError(`limit must be a positive integer, got ${limit}`);
  }
  if (limit > maxLimit) {
    throw new InvalidArgumentError(`limit must not exceed ${maxLimit}, got ${limit}`);
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidArgumentError(`offset must be a non-negative integer, got ${offset}`);
  }
};

/** One page of `items`; an offset past the end yields an empty page with the full total. */
export const paginate = <T>(items: readonly T[], { limit, offset }: PageRequest): Page<T> => ({
  total: items.length,
  limit,
  offset,
  items: items.slice(offset, offset + limit)
});
