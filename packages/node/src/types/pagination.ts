/**
 * Offset pagination.
 *
 * List endpoints take `skip` and `limit` and return
 * { data, pagination: { skip, limit, total, hasMore } }.
 */

export interface PaginationQuery {
  readonly skip: number;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly skip: number;
  readonly limit: number;
  readonly total: number;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

/**
 * Slice an already ordered list.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
): PaginatedResponse<T> {
  const data = items.slice(query.skip, query.skip + query.limit);
  return {
    data,
    pagination: {
      skip: query.skip,
      limit: query.limit,
      total: items.length,
      hasMore: query.skip + data.length < items.length,
    },
  };
}
