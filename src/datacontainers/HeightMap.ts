import { Box2, Vector2 } from 'three'

import { HeightBounds, HeightMode } from '../utils/common_types.js'

import { ColumnGrid } from './ColumnGrid.js'

/**
 * Point-in-time elevation snapshot of a rect of columns.
 * Never updated after creation: rescan once the world changed.
 */
export class HeightMap extends ColumnGrid<number> {
    readonly mode: HeightMode
    private readonly rawData: Int32Array

    constructor(bounds: Box2, mode: HeightMode, sampler: (pos: Vector2) => number) {
        super(bounds)
        this.mode = mode
        this.rawData = new Int32Array(this.size)
        for (let index = 0; index < this.size; index++) {
            const globalPos = this.toWorldPos(this.getLocalPosFromIndex(index))
            this.rawData[index] = sampler(globalPos)
        }
    }

    readCell(index: number) {
        return this.rawData[index] ?? Number.NaN
    }

    getHeight(pos: Vector2) {
        return this.read(pos)
    }

    /**
     * Inclusive extent derived from the map's columns and elevations
     * @returns undefined for an empty map
     */
    getBounds(): HeightBounds | undefined {
        if (this.isEmpty) return undefined
        const { min, max } = this.bounds
        let minY = Number.POSITIVE_INFINITY
        let maxY = Number.NEGATIVE_INFINITY
        for (const height of this.rawData) {
            minY = Math.min(minY, height)
            maxY = Math.max(maxY, height)
        }
        return {
            minX: min.x,
            maxX: max.x - 1,
            minZ: min.y,
            maxZ: max.y - 1,
            minY,
            maxY,
        }
    }
}
