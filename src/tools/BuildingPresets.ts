import { Vector3 } from 'three'

import { VoxelSet } from '../datacontainers/VoxelSet.js'
import { AIR, Facing, HorizontalAxis, Material } from '../utils/common_types.js'
import { InvalidShapeParams } from '../utils/errors.js'

import { VoxelRasterizer } from './VoxelRasterizer.js'

const block = (name: string, properties?: Record<string, string>): Material => (properties ? { name, properties } : { name })

const TOP_SLAB = { type: 'top', waterlogged: 'false' }

const facingOffsets: Record<Facing, Vector3> = {
    [Facing.East]: new Vector3(1, 0, 0),
    [Facing.West]: new Vector3(-1, 0, 0),
    [Facing.North]: new Vector3(0, 0, -1),
    [Facing.South]: new Vector3(0, 0, 1),
}

const requireSizes = (sizes: Record<string, number>, min: number) => {
    const issues = Object.entries(sizes)
        .filter(([, size]) => !Number.isInteger(size) || size < min)
        .map(([key, size]) => ({ path: [key], message: `expected integer >= ${min}, got ${size}` }))
    if (issues.length > 0) throw new InvalidShapeParams(issues)
}

/**
 * two blocks high door, lower half at pos
 */
export const door = (pos: Vector3, material = 'oak', facing = Facing.West) => {
    const voxels = new VoxelSet()
    const properties = { facing, hinge: 'left', open: 'false', powered: 'false' }
    voxels.add(pos, block(`${material}_door`, { half: 'lower', ...properties }))
    voxels.add(pos.clone().setY(pos.y + 1), block(`${material}_door`, { half: 'upper', ...properties }))
    return voxels
}

/**
 * bed from foot at pos to head one block toward facing
 */
export const bed = (pos: Vector3, facing = Facing.East, color = 'red') => {
    const voxels = new VoxelSet()
    const properties = { facing, occupied: 'false' }
    voxels.add(pos, block(`${color}_bed`, { part: 'foot', ...properties }))
    voxels.add(pos.clone().add(facingOffsets[facing]), block(`${color}_bed`, { part: 'head', ...properties }))
    return voxels
}

/**
 * glass panes every `spacing` blocks along the four walls of a box, corners excluded
 */
export const windows = (corner1: Vector3, corner2: Vector3, spacing = 3, pane = 'glass_pane') => {
    requireSizes({ spacing }, 1)
    const voxels = new VoxelSet()
    const min = corner1.clone().min(corner2)
    const max = corner1.clone().max(corner2)
    for (let y = min.y; y <= max.y; y++) {
        for (let x = min.x + 1; x < max.x; x++) {
            if ((x - min.x) % spacing !== 0) continue
            voxels.add(new Vector3(x, y, min.z), block(pane))
            voxels.add(new Vector3(x, y, max.z), block(pane))
        }
        for (let z = min.z + 1; z < max.z; z++) {
            if ((z - min.z) % spacing !== 0) continue
            voxels.add(new Vector3(min.x, y, z), block(pane))
            voxels.add(new Vector3(max.x, y, z), block(pane))
        }
    }
    return voxels
}

export type HouseOptions = {
    width: number
    height: number
    depth: number
    pitchedRoof: boolean
}

/**
 * Small wooden cabin, floor level at origin.y, door on the west wall
 */
export const simpleHouse = (origin: Vector3, options: Partial<HouseOptions> = {}) => {
    const { width: w = 7, height: h = 5, depth: d = 7, pitchedRoof = false } = options
    requireSizes({ width: w, depth: d }, 5)
    requireSizes({ height: h }, 4)
    const { x: bx, y: by, z: bz } = origin
    const voxels = new VoxelSet()
    const from = { x: bx, z: bz }
    const to = { x: bx + w - 1, z: bz + d - 1 }
    const midX = bx + Math.floor(w / 2)
    const midZ = bz + Math.floor(d / 2)

    // foundation and floor
    voxels.merge(VoxelRasterizer.rasterize({ shape: 'floor', y: by - 1, from, to, material: block('cobblestone') }))
    voxels.merge(VoxelRasterizer.rasterize({ shape: 'floor', y: by, from, to, material: block('oak_planks') }))
    // walls, cleared inside
    voxels.merge(
        VoxelRasterizer.rasterize({
            shape: 'walls',
            corner1: { x: bx, y: by + 1, z: bz },
            corner2: { x: bx + w - 1, y: by + h - 1, z: bz + d - 1 },
            corner: block('oak_log'),
            material: block('oak_planks'),
        }),
    )
    voxels.merge(
        VoxelRasterizer.rasterize({
            shape: 'box',
            corner1: { x: bx + 1, y: by + 1, z: bz + 1 },
            corner2: { x: bx + w - 2, y: by + h - 1, z: bz + d - 2 },
            material: block(AIR),
        }),
    )
    // roof
    if (pitchedRoof) {
        voxels.merge(
            VoxelRasterizer.rasterize({
                shape: 'pitched_roof',
                origin: { x: bx, y: by + h, z: bz },
                axis: HorizontalAxis.Z,
                span: w,
                length: d,
                material: block('oak_stairs'),
                ridge: block('oak_slab'),
            }),
        )
    } else {
        voxels.merge(VoxelRasterizer.rasterize({ shape: 'floor', y: by + h, from, to, material: block('oak_slab', TOP_SLAB) }))
    }
    // openings
    voxels.merge(door(new Vector3(bx, by + 1, midZ), 'oak', Facing.West))
    for (const wy of [by + 2, by + 3]) {
        voxels.add(new Vector3(bx, wy, midZ + 1), block('glass_pane'))
        voxels.add(new Vector3(bx, wy, midZ - 1), block('glass_pane'))
        voxels.add(new Vector3(bx + w - 1, wy, midZ), block('glass_pane'))
        voxels.add(new Vector3(midX, wy, bz), block('glass_pane'))
        voxels.add(new Vector3(midX, wy, bz + d - 1), block('glass_pane'))
    }
    // furniture
    voxels.add(new Vector3(bx + w - 2, by + 1, bz + 1), block('crafting_table'))
    voxels.add(new Vector3(bx + w - 2, by + 1, bz + 2), block('furnace', { facing: Facing.West, lit: 'false' }))
    voxels.add(
        new Vector3(bx + w - 2, by + 1, bz + d - 2),
        block('chest', { facing: Facing.West, type: 'single', waterlogged: 'false' }),
    )
    voxels.merge(bed(new Vector3(bx + 1, by + 1, bz + d - 2), Facing.East, 'red'))
    voxels.add(new Vector3(midX, by + h - 1, midZ), block('glowstone'))
    // doorstep
    voxels.add(
        new Vector3(bx - 1, by, midZ),
        block('oak_stairs', { facing: Facing.East, half: 'bottom', shape: 'straight', waterlogged: 'false' }),
    )
    return voxels
}

export type SkyscraperOptions = {
    width: number
    depth: number
    floors: number
    floorHeight: number
}

const GLASS_COLORS = ['light_blue_stained_glass', 'white_stained_glass', 'light_gray_stained_glass', 'cyan_stained_glass']

const skyscraperStorey = (voxels: VoxelSet, origin: Vector3, floor: number, options: SkyscraperOptions) => {
    const { width: w, depth: d, floorHeight } = options
    const { x: bx, y: by, z: bz } = origin
    const fy = by + floor * floorHeight
    const glass = GLASS_COLORS[floor % GLASS_COLORS.length] ?? 'glass'
    for (let ry = 0; ry < floorHeight; ry++) {
        const y = fy + ry
        for (let x = bx; x < bx + w; x++) {
            for (let z = bz; z < bz + d; z++) {
                const isEdgeX = x === bx || x === bx + w - 1
                const isEdgeZ = z === bz || z === bz + d - 1
                const pos = new Vector3(x, y, z)
                if (!isEdgeX && !isEdgeZ) {
                    if (ry === 0) voxels.add(pos, block((x + z) % 2 === 0 ? 'polished_diorite' : 'polished_andesite'))
                    else if (ry === floorHeight - 1) voxels.add(pos, block('smooth_stone'))
                    else voxels.add(pos, block(AIR))
                } else if (isEdgeX && isEdgeZ) {
                    voxels.add(pos, block('iron_block'))
                } else if (ry === 0 || ry === floorHeight - 1 || ry > 3) {
                    voxels.add(pos, block('smooth_stone'))
                } else {
                    const along = isEdgeX ? z - bz : x - bx
                    voxels.add(pos, block(along % 4 === 0 ? 'iron_block' : glass))
                }
            }
        }
    }
    // ceiling lights
    for (const lx of [bx + 3, bx + w - 4]) {
        for (const lz of [bz + 3, bz + d - 4]) {
            voxels.add(new Vector3(lx, fy + floorHeight - 1, lz), block('sea_lantern'))
        }
    }
}

/**
 * Glass curtain wall tower, ground floor at origin.y, entrance on the west side
 */
export const skyscraper = (origin: Vector3, options: Partial<SkyscraperOptions> = {}) => {
    const settings: SkyscraperOptions = { width: 15, depth: 15, floors: 12, floorHeight: 5, ...options }
    const { width: w, depth: d, floors, floorHeight } = settings
    requireSizes({ width: w, depth: d }, 9)
    requireSizes({ floors }, 1)
    requireSizes({ floorHeight }, 5)
    const { x: bx, y: by, z: bz } = origin
    const voxels = new VoxelSet()

    // foundation
    voxels.merge(
        VoxelRasterizer.rasterize({
            shape: 'box',
            corner1: { x: bx - 1, y: by - 3, z: bz - 1 },
            corner2: { x: bx + w, y: by - 1, z: bz + d },
            material: block('deepslate_bricks'),
        }),
    )
    for (let floor = 0; floor < floors; floor++) {
        skyscraperStorey(voxels, origin, floor, settings)
    }

    // entrance
    const midZ = bz + Math.floor(d / 2)
    for (let dz = -2; dz <= 2; dz++) {
        for (let y = by + 1; y < by + 4; y++) voxels.add(new Vector3(bx, y, midZ + dz), block(AIR))
        voxels.add(new Vector3(bx, by, midZ + dz), block('polished_blackstone'))
    }
    for (const dz of [-3, 3]) {
        for (let y = by; y < by + 5; y++) voxels.add(new Vector3(bx - 1, y, midZ + dz), block('quartz_pillar', { axis: 'y' }))
        voxels.add(new Vector3(bx - 1, by + 5, midZ + dz), block('sea_lantern'))
    }
    for (let dz = -3; dz <= 3; dz++) voxels.add(new Vector3(bx - 1, by + 4, midZ + dz), block('polished_blackstone'))
    for (let dz = -2; dz <= 2; dz++) {
        voxels.add(
            new Vector3(bx - 1, by, midZ + dz),
            block('polished_blackstone_stairs', { facing: Facing.East, half: 'bottom', shape: 'straight', waterlogged: 'false' }),
        )
    }

    // rooftop
    const topY = by + floors * floorHeight
    voxels.merge(
        VoxelRasterizer.rasterize({
            shape: 'floor',
            y: topY,
            from: { x: bx - 1, z: bz - 1 },
            to: { x: bx + w, z: bz + d },
            material: block('smooth_stone_slab', TOP_SLAB),
        }),
    )
    const parapet = block('stone_brick_wall', {
        up: 'true',
        north: 'none',
        south: 'none',
        east: 'none',
        west: 'none',
        waterlogged: 'false',
    })
    voxels.merge(
        VoxelRasterizer.rasterize({
            shape: 'walls',
            corner1: { x: bx, y: topY + 1, z: bz },
            corner2: { x: bx + w - 1, y: topY + 1, z: bz + d - 1 },
            material: parapet,
        }),
    )
    const mastX = bx + Math.floor(w / 2)
    const mastZ = bz + Math.floor(d / 2)
    for (let y = topY + 1; y < topY + 8; y++) voxels.add(new Vector3(mastX, y, mastZ), block('iron_block'))
    voxels.add(new Vector3(mastX, topY + 8, mastZ), block('sea_lantern'))
    voxels.add(new Vector3(mastX, topY + 9, mastZ), block('lightning_rod'))
    return voxels
}

export enum BuildingPreset {
    House = 'house',
    Skyscraper = 'skyscraper',
}

export const BuildingPresets: Record<BuildingPreset, (origin: Vector3) => VoxelSet> = {
    [BuildingPreset.House]: origin => simpleHouse(origin),
    [BuildingPreset.Skyscraper]: origin => skyscraper(origin),
}
