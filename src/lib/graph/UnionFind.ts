/**
 * Disjoint-set forest with path compression and union by rank
 */
export class UnionFind<T> {
    private parent = new Map<T, T>();
    private rank = new Map<T, number>();

    constructor(items: Iterable<T> = []) {
        for (const item of items) this.add(item);
    }

    add(item: T): void {
        if (this.parent.has(item)) return;
        this.parent.set(item, item);
        this.rank.set(item, 0);
    }

    has(item: T): boolean {
        return this.parent.has(item);
    }

    find(item: T): T {
        const parent = this.parent.get(item);
        if (parent === undefined) {
            throw new Error(`UnionFind: unknown item ${String(item)}`);
        }
        if (parent === item) return item;

        const root = this.find(parent);
        this.parent.set(item, root);
        return root;
    }

    /**
     * Merge the sets of a and b. Returns false when they were already joined.
     */
    union(a: T, b: T): boolean {
        const rootA = this.find(a);
        const rootB = this.find(b);
        if (rootA === rootB) return false;

        const rankA = this.rank.get(rootA) ?? 0;
        const rankB = this.rank.get(rootB) ?? 0;

        if (rankA < rankB) {
            this.parent.set(rootA, rootB);
        } else if (rankA > rankB) {
            this.parent.set(rootB, rootA);
        } else {
            this.parent.set(rootB, rootA);
            this.rank.set(rootA, rankA + 1);
        }
        return true;
    }

    connected(a: T, b: T): boolean {
        return this.find(a) === this.find(b);
    }

    /**
     * Sets in first-insertion order of their earliest member
     */
    groups(): T[][] {
        const byRoot = new Map<T, T[]>();
        for (const item of this.parent.keys()) {
            const root = this.find(item);
            let group = byRoot.get(root);
            if (!group) {
                group = [];
                byRoot.set(root, group);
            }
            group.push(item);
        }
        return [...byRoot.values()];
    }
}
