import { Box2, Vector2, Vector3 } from 'three'

import { debugLog, ScanEnvSettings } from '../config/EditorEnv.js'
import { HeightMap } from '../datacontainers/HeightMap.js'
import { AIR, HeightMode, Material } from '../utils/common_types.js'
import { rectAround } from '../utils/convert.js'
import { BlockClassifier, BlockStore } from '../world/BlockStore.js'

/**
 * Samples columns of the block store into height maps.
 * Store failures (`LoadError`) propagate as is.
 */
export class HeightMapScanner {
    store: BlockStore
    dimension: string
    classifier: BlockClassifier
    scanEnv: ScanEnvSettings

    constructor(store: BlockStore, dimension: string, classifier: BlockClassifier, scanEnv: ScanEnvSettings) {
        this.store = store
        this.dimension = dimension
        this.classifier = classifier
        this.scanEnv = scanEnv
    }

    get emptyColumnLevel() {
        return this.scanEnv.bottomY - 1
    }

    isTopBlock(material: Material, mode: HeightMode) {
        if (material.name === AIR) return false
        return mode === HeightMode.Surface || !this.classifier.isVegetation(material)
    }

    /**
     * @returns level of first qualifying block probing downward, `bottomY - 1` if none
     */
    probeColumn(pos: Vector2, mode: HeightMode) {
        const { topY, bottomY } = this.scanEnv
        const probe = new Vector3(pos.x, topY, pos.y)
        for (; probe.y >= bottomY; probe.y--) {
            if (this.isTopBlock(this.store.get(probe, this.dimension), mode)) return probe.y
        }
        return this.emptyColumnLevel
    }

    /**
     * scans square of columns center±radius, empty map for negative radius
     */
    scan(center: Vector2, radius: number, mode = HeightMode.Surface) {
        return this.scanRect(rectAround(center, radius), mode)
    }

    scanRect(rect: Box2, mode = HeightMode.Surface) {
        const heightMap = new HeightMap(rect, mode, pos => this.probeColumn(pos, mode))
        debugLog(`scanned ${heightMap.size} columns (${mode})`)
        return heightMap
    }
}
