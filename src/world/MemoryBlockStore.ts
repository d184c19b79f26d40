import { Box3, Vector3 } from 'three'

import { AIR, Material, MaterialProperties } from '../utils/common_types.js'
import { serializeVoxelPos } from '../utils/convert.js'
import { LoadError } from '../utils/errors.js'

import { BlockStore } from './BlockStore.js'

/**
 * Sparse in-memory block store, every unset block reads as air.
 * When resident bounds are given, access outside them throws `LoadError`.
 */
export class MemoryBlockStore implements BlockStore {
    blocks: Record<string, Map<string, Material>> = {}
    residentBounds: Box3 | undefined
    writeCount = 0

    constructor(residentBounds?: Box3) {
        this.residentBounds = residentBounds?.clone()
    }

    assertResident(pos: Vector3, dimension: string) {
        const { residentBounds } = this
        if (residentBounds && !isInside(residentBounds, pos)) {
            throw new LoadError(pos, dimension)
        }
    }

    getLayer(dimension: string) {
        this.blocks[dimension] = this.blocks[dimension] || new Map()
        return this.blocks[dimension]
    }

    get(pos: Vector3, dimension: string): Material {
        this.assertResident(pos, dimension)
        return this.getLayer(dimension).get(serializeVoxelPos(pos)) ?? { name: AIR }
    }

    set(pos: Vector3, dimension: string, name: string, properties?: MaterialProperties) {
        this.assertResident(pos, dimension)
        const key = serializeVoxelPos(pos)
        const layer = this.getLayer(dimension)
        if (name === AIR) {
            layer.delete(key)
        } else {
            layer.set(key, properties ? { name, properties: { ...properties } } : { name })
        }
        this.writeCount++
    }

    /**
     * fills whole column from bottom to top level included
     */
    fillColumn(x: number, z: number, bottom: number, top: number, dimension: string, name: string) {
        for (let y = bottom; y <= top; y++) {
            this.set(new Vector3(x, y, z), dimension, name)
        }
        return this
    }
}

// half-open containment, Box3.containsPoint includes max faces
const isInside = (bounds: Box3, pos: Vector3) =>
    pos.x >= bounds.min.x &&
    pos.y >= bounds.min.y &&
    pos.z >= bounds.min.z &&
    pos.x < bounds.max.x &&
    pos.y < bounds.max.y &&
    pos.z < bounds.max.z
