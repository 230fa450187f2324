export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface PageQuery {
  page?: number;
  limit?: number;
}

export interface PageWindow {
  page: number;
  limit: number;
  skip: number;
}

export interface Paginated<T> {
  data: T[];
  meta: { total: number; page: number; limit: number; totalPages: number };
}

export function pageWindow(query: PageQuery = {}): PageWindow {
  const page = Math.max(1, Math.floor(query.page ?? 1));
  const limit = Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(query.limit ?? DEFAULT_PAGE_SIZE)));
  return { page, limit, skip: (page - 1) * limit };
}

export function toPage<T>(data: T[], total: number, window: PageWindow): Paginated<T> {
  return {
    data,
    meta: {
      total,
      page: window.page,
      limit: window.limit,
      totalPages: Math.ceil(total / window.limit),
    },
  };
}
