// --- Pagination ---
// Handlers only ever see Page<T>, whatever dialect the backend answered in.

export interface Page<T> {
  items: T[];
  page: number;
  totalPages: number;
  total: number;
}

export interface PageRequest {
  page: number;
  pageSize: number;
}

/** Page/perPage (Mealie), offset/limit or DRF count/results. */
export interface PaginatedEnvelope<T> {
  items?: T[];
  results?: T[];
  page?: number;
  per_page?: number;
  perPage?: number;
  total?: number;
  count?: number;
  total_pages?: number;
  totalPages?: number;
  offset?: number;
  limit?: number;
}

export type RawPage<T> = T[] | PaginatedEnvelope<T>;

function pageCount(total: number, pageSize: number): number {
  if (total <= 0) return 0;
  // Mealie answers per_page -1 when asked for everything.
  if (pageSize <= 0) return 1;
  return Math.ceil(total / pageSize);
}

export function normalizePage<T>(raw: RawPage<T>, request: PageRequest): Page<T> {
  if (Array.isArray(raw)) {
    return { items: raw, page: 1, totalPages: raw.length > 0 ? 1 : 0, total: raw.length };
  }

  const items = raw.items ?? raw.results ?? [];
  const total = raw.total ?? raw.count ?? items.length;
  const pageSize = raw.per_page ?? raw.perPage ?? raw.limit ?? request.pageSize;

  let page = raw.page ?? request.page;
  if (raw.page === undefined && raw.offset !== undefined && raw.limit) {
    page = Math.floor(raw.offset / raw.limit) + 1;
  }

  return {
    items,
    page,
    totalPages: raw.total_pages ?? raw.totalPages ?? pageCount(total, pageSize),
    total,
  };
}
