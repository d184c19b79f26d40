import { Vector2, Box2 } from 'three'

import { ColumnCell } from '../utils/common_types.js'

/**
 * Generic read-only grid of world columns over a half-open rect
 */
export abstract class ColumnGrid<T> {
    readonly bounds: Box2
    readonly dimensions: Vector2

    constructor(bounds: Box2) {
        this.bounds = bounds.clone()
        this.dimensions = bounds.isEmpty() ? new Vector2() : bounds.getSize(new Vector2())
    }

    abstract readCell(index: number): T

    get size() {
        return this.dimensions.x * this.dimensions.y
    }

    get isEmpty() {
        return this.size === 0
    }

    getIndex(localPos: Vector2) {
        return localPos.y * this.dimensions.x + localPos.x
    }

    getLocalPosFromIndex(index: number) {
        const y = Math.floor(index / this.dimensions.x)
        const x = index % this.dimensions.x
        return new Vector2(x, y)
    }

    toLocalPos(globalPos: Vector2) {
        const origin = this.bounds.min.clone()
        return globalPos.clone().sub(origin)
    }

    toWorldPos(localPos: Vector2) {
        const origin = this.bounds.min.clone()
        return origin.add(localPos)
    }

    inWorldRange(globalPos: Vector2) {
        return (
            globalPos.x >= this.bounds.min.x &&
            globalPos.x < this.bounds.max.x &&
            globalPos.y >= this.bounds.min.y &&
            globalPos.y < this.bounds.max.y
        )
    }

    /**
     * @returns cell data, undefined outside grid domain
     */
    read(globalPos: Vector2): T | undefined {
        return this.inWorldRange(globalPos) ? this.readCell(this.getIndex(this.toLocalPos(globalPos))) : undefined
    }

    hasSameDomain(other: ColumnGrid<unknown>) {
        return this.bounds.equals(other.bounds)
    }

    /**
     * iterates whole grid rows by rows, or the part overlapping input bounds
     */
    *iterCells(globalBounds?: Box2): Generator<ColumnCell<T>> {
        if (this.isEmpty) return
        const overlapBounds = globalBounds ? globalBounds.clone().intersect(this.bounds) : this.bounds
        if (overlapBounds.isEmpty()) return
        const globalMin = overlapBounds.min
        const globalMax = overlapBounds.max
        const localMin = this.toLocalPos(globalMin)

        for (let yGlobal = globalMin.y, yLocal = localMin.y; yGlobal < globalMax.y; yGlobal++, yLocal++) {
            for (let xGlobal = globalMin.x, xLocal = localMin.x; xGlobal < globalMax.x; xGlobal++, xLocal++) {
                const localPos = new Vector2(xLocal, yLocal)
                const index = this.getIndex(localPos)
                yield {
                    index,
                    pos: new Vector2(xGlobal, yGlobal),
                    localPos,
                    data: this.readCell(index),
                }
            }
        }
    }
}
