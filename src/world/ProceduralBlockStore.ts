import alea from 'alea'
import PoissonDiskSampling from 'poisson-disk-sampling'
import { createNoise2D, NoiseFunction2D } from 'simplex-noise'
import { Box3, Vector2, Vector3 } from 'three'

import { ProceduralWorldSettings } from '../config/EditorEnv.js'
import { AIR, Material, MaterialProperties, VoxelKey } from '../utils/common_types.js'
import { serializeColumnPos, serializeVoxelPos } from '../utils/convert.js'
import { LoadError } from '../utils/errors.js'

import { BlockStore } from './BlockStore.js'

const TRUNK_HEIGHT = 4
const FOLIAGE_RADIUS = 2
const WORLD_BOTTOM = -64
const WORLD_TOP = 320

/**
 * Seeded noise terrain with scattered trees and water below sea level.
 * Writes go to a per dimension overlay, generated content is never modified.
 */
export class ProceduralBlockStore implements BlockStore {
    settings: ProceduralWorldSettings
    residentBounds: Box3
    noise: NoiseFunction2D
    treeAnchors = new Map<string, Vector2>()
    overlays: Record<string, Map<VoxelKey, Material>> = {}

    constructor(settings: ProceduralWorldSettings) {
        this.settings = settings
        const { residentRadius, seed } = settings
        this.residentBounds = new Box3(
            new Vector3(-residentRadius, WORLD_BOTTOM, -residentRadius),
            new Vector3(residentRadius + 1, WORLD_TOP, residentRadius + 1),
        )
        this.noise = createNoise2D(alea(`${seed}:heightmap`))
        this.populateTrees()
    }

    populateTrees() {
        const { residentRadius, treesSpacing, seed } = this.settings
        const extent = 2 * residentRadius
        const sampler = new PoissonDiskSampling(
            {
                shape: [extent, extent],
                minDistance: treesSpacing,
                maxDistance: treesSpacing * 2,
                tries: 20,
            },
            alea(`${seed}:trees`),
        )
        for (const [px = 0, pz = 0] of sampler.fill()) {
            const anchor = new Vector2(Math.round(px) - residentRadius, Math.round(pz) - residentRadius)
            this.groundLevel(anchor.x, anchor.y) > this.settings.seaLevel &&
                this.treeAnchors.set(serializeColumnPos(anchor), anchor)
        }
    }

    groundLevel(x: number, z: number) {
        const { baseLevel, amplitude, spreading } = this.settings
        return Math.floor(baseLevel + amplitude * this.noise(x * spreading, z * spreading))
    }

    treeBlock(pos: Vector3): Material | undefined {
        const anchor = this.treeAnchors.get(serializeColumnPos(new Vector2(pos.x, pos.z)))
        const ground = anchor && this.groundLevel(anchor.x, anchor.y)
        if (ground !== undefined && pos.y > ground && pos.y <= ground + TRUNK_HEIGHT) return { name: 'oak_log' }
        for (let dz = -FOLIAGE_RADIUS; dz <= FOLIAGE_RADIUS; dz++) {
            for (let dx = -FOLIAGE_RADIUS; dx <= FOLIAGE_RADIUS; dx++) {
                const neighbour = this.treeAnchors.get(serializeColumnPos(new Vector2(pos.x + dx, pos.z + dz)))
                if (!neighbour) continue
                const crown = new Vector3(neighbour.x, this.groundLevel(neighbour.x, neighbour.y) + TRUNK_HEIGHT + 1, neighbour.y)
                if (crown.distanceTo(pos) <= FOLIAGE_RADIUS) return { name: 'oak_leaves', properties: { persistent: 'false' } }
            }
        }
        return undefined
    }

    generate(pos: Vector3): Material {
        const { seaLevel } = this.settings
        const ground = this.groundLevel(pos.x, pos.z)
        if (pos.y < ground - 3) return { name: 'stone' }
        if (pos.y < ground) return { name: 'dirt' }
        if (pos.y === ground) return { name: ground < seaLevel ? 'sand' : 'grass_block' }
        if (pos.y <= seaLevel) return { name: 'water', properties: { level: '0' } }
        return this.treeBlock(pos) ?? { name: AIR }
    }

    assertResident(pos: Vector3, dimension: string) {
        const { min, max } = this.residentBounds
        const isResident =
            pos.x >= min.x && pos.y >= min.y && pos.z >= min.z && pos.x < max.x && pos.y < max.y && pos.z < max.z
        if (!isResident) throw new LoadError(pos, dimension)
    }

    getOverlay(dimension: string) {
        this.overlays[dimension] = this.overlays[dimension] || new Map()
        return this.overlays[dimension]
    }

    get(pos: Vector3, dimension: string): Material {
        this.assertResident(pos, dimension)
        return this.getOverlay(dimension).get(serializeVoxelPos(pos)) ?? this.generate(pos)
    }

    set(pos: Vector3, dimension: string, name: string, properties?: MaterialProperties) {
        this.assertResident(pos, dimension)
        const material = properties ? { name, properties: { ...properties } } : { name }
        this.getOverlay(dimension).set(serializeVoxelPos(pos), material)
    }
}
