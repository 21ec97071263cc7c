// src/services/repositories/memory/ordering.ts

import type { PageRequest } from '@/types/api';
import type { ListOrder } from '../types';

interface Ordered {
    id: string;
    createdAt: string;
}

function compareKeys(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Sort on (createdAt, id), the same key the Firestore queries order by
 */
export function sortByCreation<T extends Ordered>(items: T[], order: ListOrder): T[] {
    const direction = order === 'asc' ? 1 : -1;
    return [...items].sort(
        (a, b) => direction * (compareKeys(a.createdAt, b.createdAt) || compareKeys(a.id, b.id))
    );
}

export function paginate<T>(items: T[], page: PageRequest): T[] {
    return items.slice(page.offset, page.offset + page.limit);
}
