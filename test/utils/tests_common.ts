import { HeightMapScanner } from '../../src/processing/HeightMapScanner.js'
import { Vect3Stub } from '../../src/utils/common_types.js'
import { serializeVoxelPos } from '../../src/utils/convert.js'
import { CatalogBlockClassifier } from '../../src/world/CatalogBlockClassifier.js'
import { MemoryBlockStore } from '../../src/world/MemoryBlockStore.js'
import { VoxelSet } from '../../src/datacontainers/VoxelSet.js'

import { getEditorTestEnv, TEST_DIMENSION } from '../configs/editor_test_setup.js'

/**
 * stone terrain with every column of the inclusive range topped at `height`
 */
export const setupFlatWorld = (from: { x: number; z: number }, to: { x: number; z: number }, height: number) => {
    const store = new MemoryBlockStore()
    for (let x = from.x; x <= to.x; x++) {
        for (let z = from.z; z <= to.z; z++) {
            store.fillColumn(x, z, 0, height, TEST_DIMENSION, 'stone')
        }
    }
    return store
}

export const setupScanner = (store: MemoryBlockStore) => {
    const env = getEditorTestEnv()
    const classifier = new CatalogBlockClassifier(store, TEST_DIMENSION, env.obstaclesEnv.deepWaterDepth)
    return new HeightMapScanner(store, TEST_DIMENSION, classifier, env.scanEnv)
}

// -0 and 0 share the same key
export const voxelKeys = (voxels: VoxelSet | Iterable<Vect3Stub>) => {
    const positions = voxels instanceof VoxelSet ? voxels.positions() : [...voxels]
    return positions.map(pos => serializeVoxelPos(pos)).sort()
}
