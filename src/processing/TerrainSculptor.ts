import { Box2, Vector2, Vector3 } from 'three'

import { debugLog, SculptEnvSettings } from '../config/EditorEnv.js'
import { VoxelSet } from '../datacontainers/VoxelSet.js'
import { AIR, HeightMode } from '../utils/common_types.js'
import { isEmptyRect } from '../utils/convert.js'
import { InvalidArgument } from '../utils/errors.js'
import { distanceToRect, isNonNegativeInteger, lerp, roundToward } from '../utils/math_utils.js'

import { HeightMapScanner } from './HeightMapScanner.js'

const AIR_BLOCK = { name: AIR }

/**
 * Target elevation of a column lying outside the flattened rect:
 * linear ramp from target at the rect boundary to original at blend radius.
 *
 * @returns undefined when the column is beyond blending range
 */
export const blendedHeight = (distance: number, original: number, targetY: number, blendRadius: number) => {
    if (blendRadius <= 0 || distance <= 0 || distance > blendRadius) return undefined
    const interpolated = lerp(targetY, original, distance / blendRadius)
    return roundToward(interpolated, original)
}

/**
 * Computes voxel operations reshaping terrain, nothing is written to the store
 */
export class TerrainSculptor {
    scanner: HeightMapScanner
    sculptEnv: SculptEnvSettings

    constructor(scanner: HeightMapScanner, sculptEnv: SculptEnvSettings) {
        this.scanner = scanner
        this.sculptEnv = sculptEnv
    }

    /**
     * Moves column ground to new height: fills below, clears everything above
     * up to its surface. The new ground block is always the top material.
     */
    reshapeColumn(voxels: VoxelSet, pos: Vector2, ground: number, surface: number, newHeight: number) {
        if (newHeight === ground) return
        const { fill, top } = this.sculptEnv
        for (let y = Math.min(ground + 1, newHeight); y <= newHeight; y++) {
            voxels.add(new Vector3(pos.x, y, pos.y), y === newHeight ? top : fill)
        }
        for (let y = newHeight + 1; y <= Math.max(ground, surface); y++) {
            voxels.add(new Vector3(pos.x, y, pos.y), AIR_BLOCK)
        }
    }

    flatten(rect: Box2, targetY: number, blendRadius = 0) {
        if (!Number.isInteger(targetY)) throw new InvalidArgument(`target level must be an integer, got ${targetY}`)
        if (!isNonNegativeInteger(blendRadius)) {
            throw new InvalidArgument(`blend radius must be a non negative integer, got ${blendRadius}`)
        }
        const voxels = new VoxelSet()
        if (isEmptyRect(rect)) return voxels
        const scannedRect = rect.clone().expandByScalar(blendRadius)
        const groundMap = this.scanner.scanRect(scannedRect, HeightMode.Ground)
        const surfaceMap = this.scanner.scanRect(scannedRect, HeightMode.Surface)
        let blendedCount = 0
        for (const { pos, data: ground, index } of groundMap.iterCells()) {
            const surface = surfaceMap.readCell(index)
            const distance = distanceToRect(pos, rect)
            const newHeight = distance === 0 ? targetY : blendedHeight(distance, ground, targetY, blendRadius)
            if (newHeight !== undefined) {
                blendedCount += distance > 0 && newHeight !== ground ? 1 : 0
                this.reshapeColumn(voxels, pos, ground, surface, newHeight)
            }
        }
        debugLog(`flatten at ${targetY}: ${voxels.size} voxels, ${blendedCount} blended columns`)
        return voxels
    }

    /**
     * removes vegetation standing on ground, terrain below stays untouched
     */
    clearVegetation(rect: Box2) {
        const voxels = new VoxelSet()
        if (isEmptyRect(rect)) return voxels
        const { store, dimension, classifier } = this.scanner
        const groundMap = this.scanner.scanRect(rect, HeightMode.Ground)
        const surfaceMap = this.scanner.scanRect(rect, HeightMode.Surface)
        for (const { pos, data: ground, index } of groundMap.iterCells()) {
            const surface = surfaceMap.readCell(index)
            for (let y = ground + 1; y <= surface; y++) {
                const blockPos = new Vector3(pos.x, y, pos.y)
                classifier.isVegetation(store.get(blockPos, dimension)) && voxels.add(blockPos, AIR_BLOCK)
            }
        }
        debugLog(`vegetation clearing: ${voxels.size} voxels`)
        return voxels
    }
}
