import { Pagination } from '../types';

export interface Page<T> {
    items: T[];
    pagination: Pagination;
}

export function paginate<T>(all: T[], limit: number, offset: number): Page<T> {
    const total = all.length;
    const hasNext = offset + limit < total;
    return {
        items: all.slice(offset, offset + limit),
        pagination: {
            total,
            limit,
            offset,
            has_next: hasNext,
            has_previous: offset > 0,
            next_offset: hasNext ? offset + limit : null,
            previous_offset: offset > 0 ? Math.max(0, offset - limit) : null,
        },
    };
}

/** Pagination block for a request that produced no result set at all. */
export function emptyPagination(limit: number, offset: number): Pagination {
    return {
        total: 0,
        limit,
        offset,
        has_next: false,
        has_previous: false,
        next_offset: null,
        previous_offset: null,
    };
}
