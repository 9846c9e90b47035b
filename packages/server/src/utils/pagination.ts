export interface PageInfo {
  page: number;
  per_page: number;
  has_next: boolean;
  has_prev: boolean;
}

/**
 * Page metadata for skip/limit listings
 */
export function offsetPageInfo(skip: number, limit: number, total: number): PageInfo {
  return {
    page: Math.floor(skip / limit) + 1,
    per_page: limit,
    has_next: skip + limit < total,
    has_prev: skip > 0,
  };
}

/**
 * Page metadata for 1-based page/per_page listings
 */
export function numberedPageInfo(page: number, perPage: number, total: number): PageInfo {
  return {
    page,
    per_page: perPage,
    has_next: page * perPage < total,
    has_prev: page > 1,
  };
}
