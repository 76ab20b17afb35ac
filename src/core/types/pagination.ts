/**
 * Offset pagination. Page numbers are 1-based.
 */

export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 100;

export interface PageParams {
  readonly page: number;
  readonly limit: number;
}

export interface PageMeta extends PageParams {
  /** Number of items on this page */
  readonly count: number;
}

const parsePositive = (raw: string | number | null | undefined): number | null => {
  if (raw === null || raw === undefined) return null;
  const n = typeof raw === "number" ? Math.trunc(raw) : Number.parseInt(raw, 10);
  return Number.isFinite(n) && n >= 1 ? n : null;
};

/** Largest page whose offset is still a safe integer for this limit */
export const maxPage = (limit: number): number => Math.floor(Number.MAX_SAFE_INTEGER / limit) + 1;

/**
 * Default missing or non-positive values and clamp both. A page beyond
 * `maxPage` is still past the end of any table, so it lists nothing.
 *
 *   normalizePage("0", "500") → { page: 1, limit: 100 }
 */
export const normalizePage = (
  page: string | number | null | undefined,
  limit: string | number | null | undefined,
): PageParams => {
  const size = Math.min(parsePositive(limit) ?? DEFAULT_LIMIT, MAX_LIMIT);
  return {
    page: Math.min(parsePositive(page) ?? DEFAULT_PAGE, maxPage(size)),
    limit: size,
  };
};

export const toOffset = (params: PageParams): number => (params.page - 1) * params.limit;
