import { Box2, Box3, Vector2, Vector3 } from 'three'

import { debugLog, EditorGlobals, EditorLocals, EditorLocalStub } from './config/EditorEnv.js'
import { ObstacleGrid } from './datacontainers/ObstacleGrid.js'
import { VoxelSet } from './datacontainers/VoxelSet.js'
import { HeightMapScanner } from './processing/HeightMapScanner.js'
import { PathPlanner } from './processing/PathPlanner.js'
import { TerrainSculptor } from './processing/TerrainSculptor.js'
import { ShapeDescriptorInput } from './tools/ShapeDescriptors.js'
import { VoxelRasterizer } from './tools/VoxelRasterizer.js'
import { AIR, HeightMode, PlannedPath } from './utils/common_types.js'
import { rectFromCorners } from './utils/convert.js'
import { InvalidArgument } from './utils/errors.js'
import { BlockClassifier, BlockStore, NameResolver, PersistenceLayer, WorldSession } from './world/BlockStore.js'
import { CatalogBlockClassifier } from './world/CatalogBlockClassifier.js'
import { passthroughResolver } from './world/AliasNameResolver.js'

export type PlacementOptions = {
    flushEvery: number
    onFlush: (placedCount: number) => void
    skipAir: boolean
}

export type WorldEditorModules = {
    store: BlockStore
    classifier?: BlockClassifier
    resolver?: NameResolver
    env?: EditorLocalStub
}

/**
 * Entry point gathering scanning, sculpting, planning and rasterization
 * over one block store. Every operation computes a full voxel set before
 * `place` writes anything.
 */
export class WorldEditor {
    store: BlockStore
    classifier: BlockClassifier
    resolver: NameResolver
    env: EditorLocals
    scanner: HeightMapScanner
    sculptor: TerrainSculptor
    planner: PathPlanner

    constructor(modules: WorldEditorModules) {
        this.env = new EditorLocals().fromStub(modules.env ?? {})
        EditorGlobals.instance.import(this.env.globalEnv)
        const { dimension } = this.env.placementEnv
        this.store = modules.store
        this.classifier =
            modules.classifier ?? new CatalogBlockClassifier(this.store, dimension, this.env.obstaclesEnv.deepWaterDepth)
        this.resolver = modules.resolver ?? passthroughResolver
        this.scanner = new HeightMapScanner(this.store, dimension, this.classifier, this.env.scanEnv)
        this.sculptor = new TerrainSculptor(this.scanner, this.env.sculptEnv)
        this.planner = new PathPlanner(this.env.pathEnv)
    }

    get dimension() {
        return this.env.placementEnv.dimension
    }

    scan(center: Vector2, radius: number, mode = HeightMode.Surface) {
        return this.scanner.scan(center, radius, mode)
    }

    flatten(rect: Box2, targetY: number, blendRadius = 0) {
        return this.sculptor.flatten(rect, targetY, blendRadius)
    }

    clearVegetation(rect: Box2) {
        return this.sculptor.clearVegetation(rect)
    }

    /**
     * Scans the endpoints' bounding rect widened by the search margin, then
     * routes on a fresh obstacle grid.
     */
    plan(start: Vector2, end: Vector2, width = 1): PlannedPath {
        const rect = rectFromCorners(start, end).expandByScalar(this.env.pathEnv.searchMargin)
        const heightMap = this.scanner.scanRect(rect, HeightMode.Ground)
        const grid = ObstacleGrid.build(heightMap, this.classifier, this.env.obstaclesEnv.maxStep)
        return this.planner.plan(start, end, grid, heightMap, width)
    }

    /**
     * path footprint as placeable voxels replacing the ground top block
     */
    pathVoxels(path: PlannedPath) {
        const { material, clearance } = this.env.pathEnv
        return VoxelSet.fromVoxels(path.footprint.map(pos => ({ pos: pos.clone().setY(pos.y - clearance), material })))
    }

    rasterize(descriptor: ShapeDescriptorInput) {
        return VoxelRasterizer.rasterize(descriptor)
    }

    /**
     * reads every block of a box, air excluded
     */
    capture(box: Box3) {
        const voxels = new VoxelSet()
        for (let x = box.min.x; x < box.max.x; x++) {
            for (let y = box.min.y; y < box.max.y; y++) {
                for (let z = box.min.z; z < box.max.z; z++) {
                    const pos = new Vector3(x, y, z)
                    const material = this.store.get(pos, this.dimension)
                    material.name !== AIR && voxels.add(pos, material)
                }
            }
        }
        return voxels
    }

    /**
     * Writes voxels to the store with corrected material names.
     * `onFlush` is called every `flushEvery` writes and once at the end.
     */
    place(voxels: VoxelSet, options: Partial<PlacementOptions> = {}) {
        const { flushEvery = this.env.placementEnv.flushEvery, onFlush, skipAir = false } = options
        if (!Number.isInteger(flushEvery) || flushEvery < 1) {
            throw new InvalidArgument(`flush interval must be a positive integer, got ${flushEvery}`)
        }
        let placedCount = 0
        let unflushed = 0
        for (const { pos, material } of voxels) {
            if (skipAir && material.name === AIR) continue
            const name = this.resolver.correct(material.name)
            name !== material.name && console.warn(`material ${material.name} corrected to ${name}`)
            this.store.set(pos, this.dimension, name, material.properties)
            placedCount++
            unflushed++
            if (unflushed === flushEvery) {
                onFlush?.(placedCount)
                unflushed = 0
            }
        }
        unflushed > 0 && onFlush?.(placedCount)
        debugLog(`placed ${placedCount} voxels`)
        return placedCount
    }

    /**
     * Opens a session, runs the edit, saves then closes even on failure.
     * Nothing is saved when the edit throws.
     */
    static withSession<S extends WorldSession, T>(
        persistence: PersistenceLayer<S>,
        path: string,
        edit: (editor: WorldEditor, session: S) => T,
        modules: Omit<WorldEditorModules, 'store'> = {},
    ) {
        const session = persistence.open(path)
        try {
            const result = edit(new WorldEditor({ ...modules, store: session.store }), session)
            persistence.save(session)
            return result
        } finally {
            persistence.close(session)
        }
    }
}
