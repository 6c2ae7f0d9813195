/**
 * Page/offset contract shared by the sent and received listings.
 * Pages are 1-indexed and ordered newest grant first.
 */

import { ValidationError } from '../errors';
import { Paginated } from '../types';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 50;

export interface PageRequest {
  page?: number;
  pageSize?: number;
}

export interface PageWindow {
  page: number;
  pageSize: number;
  limit: number;
  offset: number;
}

/**
 * Resolve a page request into LIMIT/OFFSET. Omitted values take defaults;
 * supplied values are never clamped, so page 0 is an error rather than
 * silently becoming page 1.
 */
export function toPageWindow(request: PageRequest = {}): PageWindow {
  const page = request.page ?? DEFAULT_PAGE;
  const pageSize = request.pageSize ?? DEFAULT_PAGE_SIZE;

  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError('Page must be a positive integer');
  }

  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new ValidationError(`Page size must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }

  return {
    page,
    pageSize,
    limit: pageSize,
    offset: (page - 1) * pageSize
  };
}

export function toPaginated<T>(items: T[], totalCount: number, window: PageWindow): Paginated<T> {
  return {
    items,
    totalCount,
    page: window.page,
    pageSize: window.pageSize,
    totalPages: Math.ceil(totalCount / window.pageSize)
  };
}
