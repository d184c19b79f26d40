type HeapEntry<T> = {
    item: T
    priority: number
    seq: number
}

/**
 * Min binary heap, equal priorities pop in insertion order
 */
export class BinaryHeap<T> {
    entries: HeapEntry<T>[] = []
    seqCounter = 0

    get size() {
        return this.entries.length
    }

    isEmpty() {
        return this.entries.length === 0
    }

    push(item: T, priority: number) {
        this.entries.push({ item, priority, seq: this.seqCounter++ })
        this.siftUp(this.entries.length - 1)
    }

    pop(): T | undefined {
        const { entries } = this
        const top = entries[0]
        const last = entries.pop()
        if (top && last && entries.length > 0) {
            entries[0] = last
            this.siftDown(0)
        }
        return top?.item
    }

    private before(i: number, j: number) {
        const a = this.entries[i]
        const b = this.entries[j]
        if (!a || !b) return false
        return a.priority < b.priority || (a.priority === b.priority && a.seq < b.seq)
    }

    private swap(i: number, j: number) {
        const { entries } = this
        const tmp = entries[i]
        const other = entries[j]
        if (tmp && other) {
            entries[i] = other
            entries[j] = tmp
        }
    }

    private siftUp(index: number) {
        let i = index
        while (i > 0) {
            const parent = (i - 1) >> 1
            if (!this.before(i, parent)) break
            this.swap(i, parent)
            i = parent
        }
    }

    private siftDown(index: number) {
        const count = this.entries.length
        let i = index
        for (;;) {
            const left = 2 * i + 1
            const right = left + 1
            let smallest = i
            if (left < count && this.before(left, smallest)) smallest = left
            if (right < count && this.before(right, smallest)) smallest = right
            if (smallest === i) break
            this.swap(i, smallest)
            i = smallest
        }
    }
}
