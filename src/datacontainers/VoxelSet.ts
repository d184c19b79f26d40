import { Box3, Vector3 } from 'three'

import { AIR, Material, Voxel, VoxelKey } from '../utils/common_types.js'
import { serializeVoxelPos } from '../utils/convert.js'

const copyMaterial = ({ name, properties }: Material): Material =>
    properties ? { name, properties: { ...properties } } : { name }

export const sameMaterial = (m1: Material, m2: Material) => {
    if (m1.name !== m2.name) return false
    const p1 = m1.properties ?? {}
    const p2 = m2.properties ?? {}
    const keys = Object.keys(p1)
    return keys.length === Object.keys(p2).length && keys.every(key => p1[key] === p2[key])
}

/**
 * Coordinate indexed voxels, one material per coordinate: last write wins
 */
export class VoxelSet {
    voxels = new Map<VoxelKey, Voxel>()

    static fromVoxels(voxels: Iterable<Voxel>) {
        const voxelSet = new VoxelSet()
        for (const { pos, material } of voxels) voxelSet.add(pos, material)
        return voxelSet
    }

    get size() {
        return this.voxels.size
    }

    add(pos: Vector3, material: Material) {
        this.voxels.set(serializeVoxelPos(pos), { pos: pos.clone(), material: copyMaterial(material) })
        return this
    }

    /**
     * writes every voxel of other set over this one
     */
    merge(other: VoxelSet) {
        for (const { pos, material } of other) this.add(pos, material)
        return this
    }

    get(pos: Vector3) {
        return this.voxels.get(serializeVoxelPos(pos))?.material
    }

    has(pos: Vector3) {
        return this.voxels.has(serializeVoxelPos(pos))
    }

    [Symbol.iterator]() {
        return this.voxels.values()
    }

    positions() {
        return [...this.voxels.values()].map(({ pos }) => pos)
    }

    countMaterial(name: string) {
        let count = 0
        for (const { material } of this) count += material.name === name ? 1 : 0
        return count
    }

    withoutAir() {
        return VoxelSet.fromVoxels([...this].filter(({ material }) => material.name !== AIR))
    }

    /**
     * @returns half-open bounding box, empty box when no voxel
     */
    getBounds() {
        const bounds = new Box3()
        for (const { pos } of this) bounds.expandByPoint(pos)
        if (!bounds.isEmpty()) bounds.max.addScalar(1)
        return bounds
    }

    translate(offset: Vector3) {
        return VoxelSet.fromVoxels([...this].map(({ pos, material }) => ({ pos: pos.clone().add(offset), material })))
    }
}
