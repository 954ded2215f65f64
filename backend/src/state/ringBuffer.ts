// Fixed-capacity FIFO; pushing past capacity overwrites the oldest entry
export class RingBuffer<T> {
    private readonly items: T[] = [];
    private start = 0;
    private count = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
        }
    }

    get length(): number {
        return this.count;
    }

    push(item: T): void {
        if (this.count < this.capacity) {
            this.items[(this.start + this.count) % this.capacity] = item;
            this.count += 1;
            return;
        }
        this.items[this.start] = item;
        this.start = (this.start + 1) % this.capacity;
    }

    last(): T | undefined {
        if (this.count === 0) return undefined;
        return this.items[(this.start + this.count - 1) % this.capacity];
    }

    toArray(): T[] {
        const out: T[] = [];
        for (let i = 0; i < this.count; i++) {
            out.push(this.items[(this.start + i) % this.capacity]);
        }
        return out;
    }

    clear(): void {
        this.items.length = 0;
        this.start = 0;
        this.count = 0;
    }
}
