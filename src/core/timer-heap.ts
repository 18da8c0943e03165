/**
 * Deadline heap: min-heap ordered by (deadline, sequence)
 *
 * Entries remember their slot so a cancelled timed wait can be removed in
 * O(log n) instead of lingering until its deadline.
 */

export interface HeapEntry {
    deadline: number;
    sequence: number;
    /** Slot in the backing array, -1 once removed */
    index: number;
}

function before(a: HeapEntry, b: HeapEntry): boolean {
    if (a.deadline !== b.deadline) {
        return a.deadline < b.deadline;
    }
    return a.sequence < b.sequence;
}

export class TimerHeap<E extends HeapEntry> {
    private heap: E[] = [];

    get size(): number {
        return this.heap.length;
    }

    push(entry: E): void {
        entry.index = this.heap.length;
        this.heap.push(entry);
        this.bubbleUp(entry.index);
    }

    peek(): E | undefined {
        return this.heap[0];
    }

    pop(): E | undefined {
        const top = this.heap[0];
        if (top === undefined) return undefined;
        this.removeAt(0);
        return top;
    }

    /**
     * Remove an entry wherever it sits; false if it is no longer in the heap
     */
    remove(entry: E): boolean {
        const idx = entry.index;
        if (idx < 0 || this.heap[idx] !== entry) return false;
        this.removeAt(idx);
        return true;
    }

    clear(): void {
        for (const entry of this.heap) {
            entry.index = -1;
        }
        this.heap = [];
    }

    private removeAt(idx: number): void {
        const removed = this.heap[idx];
        const last = this.heap.pop();
        if (removed !== undefined) {
            removed.index = -1;
        }
        if (last === undefined || last === removed) return;

        this.heap[idx] = last;
        last.index = idx;
        this.bubbleUp(idx);
        this.bubbleDown(last.index);
    }

    private swap(i: number, j: number): void {
        const a = this.heap[i];
        const b = this.heap[j];
        if (a === undefined || b === undefined) return;
        this.heap[i] = b;
        this.heap[j] = a;
        b.index = i;
        a.index = j;
    }

    private bubbleUp(idx: number): void {
        while (idx > 0) {
            const parentIdx = Math.floor((idx - 1) / 2);
            const parent = this.heap[parentIdx];
            const node = this.heap[idx];
            if (parent === undefined || node === undefined || !before(node, parent)) break;
            this.swap(idx, parentIdx);
            idx = parentIdx;
        }
    }

    private bubbleDown(idx: number): void {
        while (true) {
            let smallest = idx;
            for (const childIdx of [2 * idx + 1, 2 * idx + 2]) {
                const child = this.heap[childIdx];
                const current = this.heap[smallest];
                if (child !== undefined && current !== undefined && before(child, current)) {
                    smallest = childIdx;
                }
            }
            if (smallest === idx) break;
            this.swap(idx, smallest);
            idx = smallest;
        }
    }
}
