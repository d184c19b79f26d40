import { Vector3 } from 'three'

import { ColumnClass, Material } from '../utils/common_types.js'

import { BlockClassifier, BlockStore } from './BlockStore.js'

export type BlockCatalog = {
    vegetation: string[]
    structure: string[]
    water: string[]
}

export const defaultBlockCatalog = (): BlockCatalog => ({
    vegetation: [
        'short_grass',
        'tall_grass',
        'fern',
        'large_fern',
        'dandelion',
        'poppy',
        'azure_bluet',
        'oxeye_daisy',
        'cornflower',
        'sunflower',
        'lilac',
        'rose_bush',
        'peony',
        'sweet_berry_bush',
        'oak_leaves',
        'birch_leaves',
        'spruce_leaves',
        'jungle_leaves',
        'acacia_leaves',
        'dark_oak_leaves',
        'oak_log',
        'birch_log',
        'spruce_log',
        'vine',
    ],
    structure: [
        'cobblestone',
        'stone_bricks',
        'bricks',
        'oak_planks',
        'spruce_planks',
        'glass',
        'glass_pane',
        'iron_block',
        'smooth_stone',
        'deepslate_bricks',
        'oak_door',
        'oak_fence',
    ],
    water: ['water'],
})

const stripNamespace = (name: string) => name.slice(name.indexOf(':') + 1)

/**
 * Classification backed by block name catalogs.
 * A water column counts as an obstacle only from the configured depth.
 */
export class CatalogBlockClassifier implements BlockClassifier {
    store: BlockStore
    dimension: string
    deepWaterDepth: number
    vegetation: Set<string>
    structure: Set<string>
    water: Set<string>

    constructor(store: BlockStore, dimension: string, deepWaterDepth: number, catalog = defaultBlockCatalog()) {
        this.store = store
        this.dimension = dimension
        this.deepWaterDepth = deepWaterDepth
        this.vegetation = new Set(catalog.vegetation)
        this.structure = new Set(catalog.structure)
        this.water = new Set(catalog.water)
    }

    isVegetation = (material: Material) => this.vegetation.has(stripNamespace(material.name))

    isWater = (material: Material) => this.water.has(stripNamespace(material.name))

    isStructure = (material: Material) => this.structure.has(stripNamespace(material.name))

    waterDepth(pos: Vector3) {
        let depth = 0
        const probe = pos.clone()
        while (depth < this.deepWaterDepth && this.isWater(this.store.get(probe, this.dimension))) {
            depth++
            probe.y--
        }
        return depth
    }

    classify = (pos: Vector3) => {
        const material = this.store.get(pos, this.dimension)
        if (this.isStructure(material)) return ColumnClass.Structure
        if (this.isWater(material) && this.waterDepth(pos) >= this.deepWaterDepth) return ColumnClass.Water
        return ColumnClass.Open
    }
}
