import { Box2, Vector2, Vector3 } from 'three'
import { describe, expect, it } from 'vitest'

import { EditorGlobals, EditorLocals } from '../src/config/EditorEnv.js'
import { VoxelSet } from '../src/datacontainers/VoxelSet.js'
import { boxFromCorners, rectAround, rectFromCorners } from '../src/utils/convert.js'
import { distanceToRect, roundToward } from '../src/utils/math_utils.js'
import { getColumnNeighbours, lateralStep, ColumnSides } from '../src/utils/spatial_utils.js'

describe('geometry helpers', () => {
    it('builds half-open rects from inclusive corners', () => {
        const rect = rectFromCorners(new Vector2(3, -1), new Vector2(1, 2))

        expect(rect.min.toArray()).toEqual([1, -1])
        expect(rect.max.toArray()).toEqual([4, 3])
        expect(rectAround(new Vector2(5, 5), 2)).toEqual(new Box2(new Vector2(3, 3), new Vector2(8, 8)))
        expect(boxFromCorners({ x: 0, y: 5, z: 0 }, { x: 1, y: 5, z: 1 }).max.toArray()).toEqual([2, 6, 2])
    })

    it('measures distance to the nearest rect column', () => {
        const rect = rectFromCorners(new Vector2(0, 0), new Vector2(2, 2))

        expect(distanceToRect(new Vector2(1, 1), rect)).toBe(0)
        expect(distanceToRect(new Vector2(5, 2), rect)).toBe(3)
        expect(distanceToRect(new Vector2(3, 3), rect)).toBeCloseTo(Math.SQRT2)
    })

    it('rounds toward a reference', () => {
        expect(roundToward(4.2, 10)).toBe(5)
        expect(roundToward(4.8, 2)).toBe(4)
        expect(roundToward(4, 10)).toBe(4)
    })

    it('lists edge neighbours before corners', () => {
        const neighbours = getColumnNeighbours(new Vector2(0, 0), ColumnSides.ALL).map(pos => `${pos.x}:${pos.y}`)

        expect(neighbours).toEqual(['-1:0', '1:0', '0:-1', '0:1', '-1:-1', '1:-1', '-1:1', '1:1'])
    })

    it('steps sideways from a direction', () => {
        const step = lateralStep(new Vector2(0, 3))

        expect(`${step.x}:${step.y}`).toBe('-1:0')
    })
})

describe('VoxelSet', () => {
    it('keeps the last written material per coordinate', () => {
        const voxels = new VoxelSet().add(new Vector3(0, 0, 0), { name: 'stone' }).add(new Vector3(0, 0, 0), { name: 'dirt' })

        expect(voxels.size).toBe(1)
        expect(voxels.get(new Vector3(0, 0, 0))).toEqual({ name: 'dirt' })
    })

    it('gives half-open bounds and drops air on request', () => {
        const voxels = new VoxelSet().add(new Vector3(-1, 0, 2), { name: 'stone' }).add(new Vector3(1, 3, 2), { name: 'air' })
        const bounds = voxels.getBounds()

        expect(bounds.min.toArray()).toEqual([-1, 0, 2])
        expect(bounds.max.toArray()).toEqual([2, 4, 3])
        expect(voxels.withoutAir().size).toBe(1)
        expect(new VoxelSet().getBounds().isEmpty()).toBe(true)
    })
})

describe('EditorLocals', () => {
    it('merges stub sections over defaults', () => {
        const env = new EditorLocals().fromStub({ path: { clearance: 2 }, scan: { topY: 100 } })

        expect(env.pathEnv.clearance).toBe(2)
        expect(env.pathEnv.elevationPenalty).toBe(2)
        expect(env.scanEnv).toEqual({ topY: 100, bottomY: -64 })
    })

    it('imports debug settings into globals', () => {
        const globals = new EditorGlobals()
        globals.import({ debug: { logs: true } })

        expect(globals.export()).toEqual({ debug: { logs: true } })
    })

    it('resets debug settings when a later stub has none', () => {
        const globals = new EditorGlobals()
        globals.import({ debug: { logs: true } })
        globals.import({})

        expect(globals.export()).toEqual({ debug: { logs: false } })
    })
})
