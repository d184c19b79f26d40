import { Box3, Vector3 } from 'three'
import { describe, expect, it } from 'vitest'

import { ColumnClass } from '../src/utils/common_types.js'
import { LoadError } from '../src/utils/errors.js'
import { AliasNameResolver, passthroughResolver } from '../src/world/AliasNameResolver.js'
import { CatalogBlockClassifier } from '../src/world/CatalogBlockClassifier.js'
import { MemoryBlockStore } from '../src/world/MemoryBlockStore.js'

import { TEST_DIMENSION } from './configs/editor_test_setup.js'

describe('MemoryBlockStore', () => {
    it('reads unset blocks as air and keeps dimensions apart', () => {
        const store = new MemoryBlockStore()
        store.set(new Vector3(1, 2, 3), TEST_DIMENSION, 'oak_stairs', { facing: 'east' })

        expect(store.get(new Vector3(1, 2, 3), TEST_DIMENSION)).toEqual({ name: 'oak_stairs', properties: { facing: 'east' } })
        expect(store.get(new Vector3(1, 2, 3), 'test:nether')).toEqual({ name: 'air' })
    })

    it('drops blocks overwritten with air', () => {
        const store = new MemoryBlockStore()
        store.fillColumn(0, 0, 0, 2, TEST_DIMENSION, 'stone')
        store.set(new Vector3(0, 2, 0), TEST_DIMENSION, 'air')

        expect(store.getLayer(TEST_DIMENSION).size).toBe(2)
        expect(store.writeCount).toBe(4)
    })

    it('guards resident bounds on both reads and writes', () => {
        const store = new MemoryBlockStore(new Box3(new Vector3(0, 0, 0), new Vector3(4, 4, 4)))

        expect(() => store.get(new Vector3(3, 3, 3), TEST_DIMENSION)).not.toThrow()
        expect(() => store.get(new Vector3(4, 0, 0), TEST_DIMENSION)).toThrow(LoadError)
        expect(() => store.set(new Vector3(0, -1, 0), TEST_DIMENSION, 'stone')).toThrowError(
            `region not resident at (0, -1, 0) in ${TEST_DIMENSION}`,
        )
    })
})

describe('CatalogBlockClassifier', () => {
    it('recognizes namespaced names', () => {
        const classifier = new CatalogBlockClassifier(new MemoryBlockStore(), TEST_DIMENSION, 2)

        expect(classifier.isVegetation({ name: 'minecraft:poppy' })).toBe(true)
        expect(classifier.isVegetation({ name: 'stone' })).toBe(false)
        expect(classifier.isStructure({ name: 'minecraft:glass_pane' })).toBe(true)
    })

    it('needs enough water depth to block a column', () => {
        const store = new MemoryBlockStore().fillColumn(0, 0, 0, 4, TEST_DIMENSION, 'water')
        const shallow = new CatalogBlockClassifier(store, TEST_DIMENSION, 6)
        const deep = new CatalogBlockClassifier(store, TEST_DIMENSION, 5)

        expect(shallow.classify(new Vector3(0, 4, 0))).toBe(ColumnClass.Open)
        expect(deep.classify(new Vector3(0, 4, 0))).toBe(ColumnClass.Water)
    })
})

describe('AliasNameResolver', () => {
    const resolver = new AliasNameResolver()

    it('maps aliases after normalizing case, namespace and separators', () => {
        expect(resolver.correct('Grass')).toBe('short_grass')
        expect(resolver.correct('minecraft:Grass Path')).toBe('dirt_path')
        expect(resolver.correct('thin-glass')).toBe('glass_pane')
    })

    it('passes unknown names through unchanged', () => {
        expect(resolver.correct('Polished Granite')).toBe('Polished Granite')
        expect(passthroughResolver.correct('grass')).toBe('grass')
    })

    it('takes a custom alias table', () => {
        expect(new AliasNameResolver({ 'Lamp Post': 'lantern' }).correct('lamp_post')).toBe('lantern')
    })
})
