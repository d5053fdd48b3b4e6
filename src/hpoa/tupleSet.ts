/**
 * Set of plain records compared by value. Two records with the same
 * fields in the same order collapse into one.
 */
export class TupleSet<T extends object> implements Iterable<T> {
    private entries = new Map<string, T>();

    /** Returns false when an equal record was already present */
    add(value: T): boolean {
        const key = JSON.stringify(Object.values(value));
        if (this.entries.has(key)) return false;
        this.entries.set(key, value);
        return true;
    }

    has(value: T): boolean {
        return this.entries.has(JSON.stringify(Object.values(value)));
    }

    get size(): number {
        return this.entries.size;
    }

    values(): IterableIterator<T> {
        return this.entries.values();
    }

    [Symbol.iterator](): IterableIterator<T> {
        return this.values();
    }
}
