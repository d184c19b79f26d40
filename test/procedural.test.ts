import { Vector2, Vector3 } from 'three'
import { describe, expect, it } from 'vitest'

import { HeightMapScanner } from '../src/processing/HeightMapScanner.js'
import { AIR, HeightMode } from '../src/utils/common_types.js'
import { LoadError } from '../src/utils/errors.js'
import { CatalogBlockClassifier } from '../src/world/CatalogBlockClassifier.js'
import { ProceduralBlockStore } from '../src/world/ProceduralBlockStore.js'

import { getEditorTestEnv, TEST_DIMENSION } from './configs/editor_test_setup.js'

const setupProceduralStore = (seed = 'test-seed', seaLevel = 0) => {
    const env = getEditorTestEnv().fromStub({ procedural: { seed, seaLevel } })
    return new ProceduralBlockStore(env.proceduralEnv)
}

describe('ProceduralBlockStore', () => {
    it('generates the same world for the same seed', () => {
        const first = setupProceduralStore()
        const second = setupProceduralStore()
        const samples = [new Vector3(0, 60, 0), new Vector3(-7, 66, 12), new Vector3(15, 70, -16), new Vector3(3, 64, 3)]

        expect(samples.map(pos => first.get(pos, TEST_DIMENSION))).toEqual(samples.map(pos => second.get(pos, TEST_DIMENSION)))
        expect([...first.treeAnchors.keys()]).toEqual([...second.treeAnchors.keys()])
    })

    it('stacks stone, dirt and a top block on each column', () => {
        const store = setupProceduralStore()
        const ground = store.groundLevel(5, -3)

        expect(store.get(new Vector3(5, ground - 4, -3), TEST_DIMENSION).name).toBe('stone')
        expect(store.get(new Vector3(5, ground - 1, -3), TEST_DIMENSION).name).toBe('dirt')
        expect(store.get(new Vector3(5, ground, -3), TEST_DIMENSION).name).toBe('grass_block')
    })

    it('fills water up to sea level over sand', () => {
        const store = setupProceduralStore('test-seed', 200)
        const ground = store.groundLevel(0, 0)

        expect(store.get(new Vector3(0, ground, 0), TEST_DIMENSION).name).toBe('sand')
        expect(store.get(new Vector3(0, 200, 0), TEST_DIMENSION)).toEqual({ name: 'water', properties: { level: '0' } })
        expect(store.get(new Vector3(0, 201, 0), TEST_DIMENSION).name).toBe('air')
        expect(store.treeAnchors.size).toBe(0)
    })

    it('grows tree trunks on anchors', () => {
        const store = setupProceduralStore()

        expect(store.treeAnchors.size).toBeGreaterThan(0)
        for (const anchor of store.treeAnchors.values()) {
            const ground = store.groundLevel(anchor.x, anchor.y)
            expect(store.get(new Vector3(anchor.x, ground + 1, anchor.y), TEST_DIMENSION).name).toBe('oak_log')
            expect(store.get(new Vector3(anchor.x, ground + 4, anchor.y), TEST_DIMENSION).name).toBe('oak_log')
        }
    })

    it('throws outside the resident region', () => {
        const store = setupProceduralStore()

        expect(() => store.get(new Vector3(16, 64, -16), TEST_DIMENSION)).not.toThrow()
        expect(() => store.get(new Vector3(17, 64, 0), TEST_DIMENSION)).toThrow(LoadError)
        expect(() => store.set(new Vector3(0, 64, -17), TEST_DIMENSION, 'stone')).toThrow(LoadError)
    })

    it('keeps edits over generated content', () => {
        const store = setupProceduralStore()
        const pos = new Vector3(2, store.groundLevel(2, 2), 2)
        store.set(pos, TEST_DIMENSION, 'cobblestone')

        expect(store.get(pos, TEST_DIMENSION)).toEqual({ name: 'cobblestone' })
        expect(setupProceduralStore().get(pos, TEST_DIMENSION).name).toBe('grass_block')
    })

    it('keeps edits within their dimension', () => {
        const store = setupProceduralStore()
        const pos = new Vector3(0, 100, 0)
        store.set(pos, TEST_DIMENSION, 'gold_block')

        expect(store.get(pos, TEST_DIMENSION)).toEqual({ name: 'gold_block' })
        expect(store.get(pos, 'test:nether')).toEqual({ name: AIR })
    })

    it('scans ground below tree trunks', () => {
        const store = setupProceduralStore()
        const env = getEditorTestEnv().fromStub({ scan: { topY: 100, bottomY: 30 } })
        const classifier = new CatalogBlockClassifier(store, TEST_DIMENSION, env.obstaclesEnv.deepWaterDepth)
        const scanner = new HeightMapScanner(store, TEST_DIMENSION, classifier, env.scanEnv)
        const [anchor] = store.treeAnchors.values()
        const column = anchor ?? new Vector2(0, 0)
        const heightMap = scanner.scan(column, 0, HeightMode.Ground)

        expect(heightMap.getHeight(column)).toBe(store.groundLevel(column.x, column.y))
    })
})
