import { Vector2, Vector3 } from 'three'
import { describe, expect, it } from 'vitest'

import { TerrainSculptor, blendedHeight } from '../src/processing/TerrainSculptor.js'
import { AIR } from '../src/utils/common_types.js'
import { rectFromCorners } from '../src/utils/convert.js'
import { InvalidArgument } from '../src/utils/errors.js'
import { MemoryBlockStore } from '../src/world/MemoryBlockStore.js'

import { getEditorTestEnv, TEST_DIMENSION } from './configs/editor_test_setup.js'
import { setupFlatWorld, setupScanner } from './utils/tests_common.js'

const setupSculptor = (store: MemoryBlockStore) => new TerrainSculptor(setupScanner(store), getEditorTestEnv().sculptEnv)

describe('blendedHeight', () => {
    it('ramps linearly from target to original', () => {
        expect(blendedHeight(2, 10, 2, 4)).toBe(6)
        expect(blendedHeight(1, 10, 2, 4)).toBe(4)
        expect(blendedHeight(4, 10, 2, 4)).toBe(10)
    })

    it('rounds toward the original elevation', () => {
        // 2 + 8 / 3
        expect(blendedHeight(1, 10, 2, 3)).toBe(5)
        // 10 - 7 / 3
        expect(blendedHeight(1, 3, 10, 3)).toBe(7)
    })

    it('leaves columns outside the blending ring alone', () => {
        expect(blendedHeight(0, 10, 2, 4)).toBeUndefined()
        expect(blendedHeight(4.5, 10, 2, 4)).toBeUndefined()
        expect(blendedHeight(1, 10, 2, 0)).toBeUndefined()
    })
})

describe('TerrainSculptor', () => {
    it('raises a rect with fill and top materials', () => {
        const sculptor = setupSculptor(setupFlatWorld({ x: 0, z: 0 }, { x: 9, z: 0 }, 5))
        const rect = rectFromCorners(new Vector2(2, 0), new Vector2(4, 0))
        const voxels = sculptor.flatten(rect, 8)

        expect(voxels.size).toBe(9)
        expect(voxels.get(new Vector3(3, 6, 0))).toEqual({ name: 'dirt' })
        expect(voxels.get(new Vector3(3, 8, 0))).toEqual({ name: 'grass_block', properties: { snowy: 'false' } })
        expect(voxels.has(new Vector3(1, 6, 0))).toBe(false)
        expect(voxels.has(new Vector3(5, 6, 0))).toBe(false)
    })

    it('lowers a rect by clearing above the target and resurfacing it', () => {
        const sculptor = setupSculptor(setupFlatWorld({ x: 0, z: 0 }, { x: 9, z: 0 }, 5))
        const rect = rectFromCorners(new Vector2(2, 0), new Vector2(4, 0))
        const voxels = sculptor.flatten(rect, 3)

        expect(voxels.size).toBe(9)
        expect(voxels.countMaterial(AIR)).toBe(6)
        expect(voxels.countMaterial('grass_block')).toBe(3)
        expect(voxels.get(new Vector3(2, 3, 0))).toEqual({ name: 'grass_block', properties: { snowy: 'false' } })
        expect(voxels.has(new Vector3(2, 2, 0))).toBe(false)
        expect(voxels.get(new Vector3(2, 4, 0))).toEqual({ name: AIR })
    })

    it('clears vegetation above a raised column up to its surface', () => {
        const store = setupFlatWorld({ x: 0, z: 0 }, { x: 0, z: 0 }, 5)
        store.fillColumn(0, 0, 6, 9, TEST_DIMENSION, 'oak_log')
        const voxels = setupSculptor(store).flatten(rectFromCorners(new Vector2(0, 0), new Vector2(0, 0)), 7)

        expect(voxels.get(new Vector3(0, 7, 0))?.name).toBe('grass_block')
        expect(voxels.get(new Vector3(0, 8, 0))).toEqual({ name: AIR })
        expect(voxels.get(new Vector3(0, 9, 0))).toEqual({ name: AIR })
        expect(voxels.size).toBe(4)
    })

    it('blends the surroundings by distance to the rect', () => {
        const sculptor = setupSculptor(setupFlatWorld({ x: -4, z: -4 }, { x: 4, z: 4 }, 10))
        const voxels = sculptor.flatten(rectFromCorners(new Vector2(0, 0), new Vector2(0, 0)), 2, 4)
        const isCleared = (x: number, y: number, z: number) => voxels.get(new Vector3(x, y, z))?.name === AIR
        const isTop = (x: number, y: number, z: number) => voxels.get(new Vector3(x, y, z))?.name === 'grass_block'

        // inside: new top at 2
        expect(isCleared(0, 3, 0)).toBe(true)
        expect(isTop(0, 2, 0)).toBe(true)
        // distance 1: 4, distance 2: 6, distance 3: 8
        expect(isTop(1, 4, 0)).toBe(true)
        expect(isCleared(1, 5, 0)).toBe(true)
        expect(isTop(-2, 6, 0)).toBe(true)
        expect(isCleared(-2, 7, 0)).toBe(true)
        expect(isTop(0, 8, 3)).toBe(true)
        expect(isCleared(0, 9, 3)).toBe(true)
        // diagonal distance √2: 4.83 rounded up to 5
        expect(isTop(1, 5, 1)).toBe(true)
        expect(isCleared(1, 6, 1)).toBe(true)
        // distance 4 keeps original, beyond is untouched
        expect(voxels.has(new Vector3(4, 10, 0))).toBe(false)
        expect(voxels.has(new Vector3(4, 10, 4))).toBe(false)
    })

    it('keeps a hard edge without blend radius', () => {
        const sculptor = setupSculptor(setupFlatWorld({ x: -2, z: -2 }, { x: 2, z: 2 }, 10))
        const voxels = sculptor.flatten(rectFromCorners(new Vector2(0, 0), new Vector2(0, 0)), 2)

        expect(voxels.size).toBe(9)
        expect(voxels.positions().every(pos => pos.x === 0 && pos.z === 0)).toBe(true)
    })

    it('rejects invalid levels and radii', () => {
        const sculptor = setupSculptor(setupFlatWorld({ x: 0, z: 0 }, { x: 1, z: 1 }, 5))
        const rect = rectFromCorners(new Vector2(0, 0), new Vector2(1, 1))

        expect(() => sculptor.flatten(rect, 2.5)).toThrow(InvalidArgument)
        expect(() => sculptor.flatten(rect, 2, -1)).toThrow(InvalidArgument)
        expect(() => sculptor.flatten(rect, 2, 1.5)).toThrow(InvalidArgument)
    })

    it('clears vegetation above ground only', () => {
        const store = setupFlatWorld({ x: 0, z: 0 }, { x: 2, z: 0 }, 3)
        store.set(new Vector3(0, 4, 0), TEST_DIMENSION, 'short_grass')
        store.fillColumn(1, 0, 4, 6, TEST_DIMENSION, 'oak_log')
        store.set(new Vector3(1, 7, 0), TEST_DIMENSION, 'oak_leaves')
        store.set(new Vector3(2, 4, 0), TEST_DIMENSION, 'glass')
        const voxels = setupSculptor(store).clearVegetation(rectFromCorners(new Vector2(0, 0), new Vector2(2, 0)))

        expect(voxels.size).toBe(5)
        expect(voxels.countMaterial(AIR)).toBe(5)
        expect(voxels.has(new Vector3(0, 4, 0))).toBe(true)
        expect(voxels.has(new Vector3(1, 7, 0))).toBe(true)
        expect(voxels.has(new Vector3(2, 4, 0))).toBe(false)
        expect(voxels.has(new Vector3(1, 3, 0))).toBe(false)
    })
})
