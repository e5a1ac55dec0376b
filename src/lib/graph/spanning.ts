import type { Relationship } from '@/lib/relationships/types';
import { compareRelationships } from './DocumentGraph';
import { UnionFind } from './UnionFind';

/**
 * Kruskal over descending confidence: the strongest edges that still connect
 * every component. Its weakest edge is the weakest link any path through the
 * component has to cross.
 */
export function maximumSpanningForest(
    documentIds: Iterable<string>,
    relationships: readonly Relationship[]
): Relationship[] {
    const sets = new UnionFind<string>(documentIds);
    const forest: Relationship[] = [];

    for (const rel of [...relationships].sort(compareRelationships)) {
        if (!sets.has(rel.sourceId) || !sets.has(rel.targetId)) continue;
        if (sets.union(rel.sourceId, rel.targetId)) {
            forest.push(rel);
        }
    }

    return forest;
}
