import { Box3, Vector2, Vector3 } from 'three'

import { VoxelSet } from '../datacontainers/VoxelSet.js'
import { Facing, HorizontalAxis, Material, MaterialProperties } from '../utils/common_types.js'
import { boxFromCorners, parseVect3Stub } from '../utils/convert.js'
import { InvalidShapeParams } from '../utils/errors.js'

import { ShapeDescriptorInput, shapeDescriptorSchema, ShapeKind, ShapeOf } from './ShapeDescriptors.js'

type ShapeRasterizer<K extends ShapeKind> = (descriptor: ShapeOf<K>) => VoxelSet

const withProperties = (material: Material, properties: MaterialProperties): Material => ({
    name: material.name,
    properties: { ...material.properties, ...properties },
})

const stairsProperties = (facing: Facing) => ({
    facing,
    half: 'bottom',
    shape: 'straight',
    waterlogged: 'false',
})

/**
 * (x,z) offsets of a ring (radius±0.5) or a filled disk (≤ radius)
 */
export const circleOffsets = (radius: number, fill: boolean) => {
    const offsets: Vector2[] = []
    const range = Math.ceil(radius + 0.5)
    for (let dz = -range; dz <= range; dz++) {
        for (let dx = -range; dx <= range; dx++) {
            const dist = Math.sqrt(dx * dx + dz * dz)
            const isInside = fill ? dist <= radius : dist >= radius - 0.5 && dist <= radius + 0.5
            isInside && offsets.push(new Vector2(dx, dz))
        }
    }
    return offsets
}

const stackCircle = (voxels: VoxelSet, center: Vector3, radius: number, fill: boolean, material: Material) => {
    for (const offset of circleOffsets(radius, fill)) {
        voxels.add(new Vector3(center.x + offset.x, center.y, center.z + offset.y), material)
    }
    return voxels
}

const CircleGen: ShapeRasterizer<'circle'> = ({ center, radius, fill, material }) =>
    stackCircle(new VoxelSet(), parseVect3Stub(center), radius, fill, material)

const CylinderGen: ShapeRasterizer<'cylinder'> = ({ center, y0, y1, radius, hollow, material }) => {
    const voxels = new VoxelSet()
    for (let y = y0; y <= y1; y++) {
        stackCircle(voxels, new Vector3(center.x, y, center.z), radius, !hollow, material)
    }
    return voxels
}

const ConeGen: ShapeRasterizer<'cone'> = ({ center, y0, height, radius, hollow, material }) => {
    const voxels = new VoxelSet()
    for (let i = 0; i < height; i++) {
        const levelRadius = (radius * (height - i)) / height
        stackCircle(voxels, new Vector3(center.x, y0 + i, center.z), levelRadius, !hollow, material)
    }
    return voxels
}

const ellipseVal = (u: number, v: number, a: number, b: number) => (u / a) ** 2 + (v / b) ** 2

const ArchGen: ShapeRasterizer<'arch'> = ({ origin, axis, span, height, depth, thickness, material }) => {
    const voxels = new VoxelSet()
    const a = span / 2
    const b = height
    const innerA = a - thickness
    const innerB = b - thickness
    const isSolid = innerA <= 0 || innerB <= 0
    const base = parseVect3Stub(origin)
    for (let i = 0; i < span; i++) {
        const u = i - (span - 1) / 2
        for (let v = 0; v < height; v++) {
            // block centers sit half a block above base
            const isInOuter = ellipseVal(u, v + 0.5, a, b) <= 1
            const isInInner = !isSolid && ellipseVal(u, v + 0.5, innerA, innerB) <= 1
            if (!isInOuter || isInInner) continue
            for (let d = 0; d < depth; d++) {
                const offset = axis === HorizontalAxis.X ? new Vector3(i, v, d) : new Vector3(d, v, i)
                voxels.add(offset.add(base), material)
            }
        }
    }
    return voxels
}

const PitchedRoofGen: ShapeRasterizer<'pitched_roof'> = ({ origin, axis, span, length, material, ridge }) => {
    const voxels = new VoxelSet()
    const half = Math.floor((span - 1) / 2)
    const hasRidgeRow = (span - 1) % 2 === 0
    const base = parseVect3Stub(origin)
    const [ascending, descending] = axis === HorizontalAxis.Z ? [Facing.East, Facing.West] : [Facing.South, Facing.North]
    // (across, level, along) in roof frame to world position
    const toWorld = (across: number, rise: number, along: number) =>
        (axis === HorizontalAxis.Z ? new Vector3(across, rise, along) : new Vector3(along, rise, across)).add(base)

    for (let i = 0; i <= half; i++) {
        for (let l = 0; l < length; l++) {
            if (i === half && hasRidgeRow) {
                voxels.add(toWorld(i, i, l), withProperties(ridge, { type: 'top', waterlogged: 'false' }))
            } else {
                voxels.add(toWorld(i, i, l), withProperties(material, stairsProperties(ascending)))
                voxels.add(toWorld(span - 1 - i, i, l), withProperties(material, stairsProperties(descending)))
            }
        }
    }
    return voxels
}

const BoxGen: ShapeRasterizer<'box'> = ({ corner1, corner2, hollow, interior, material }) => {
    const voxels = new VoxelSet()
    const { min, max } = boxFromCorners(corner1, corner2)
    for (let x = min.x; x < max.x; x++) {
        for (let y = min.y; y < max.y; y++) {
            for (let z = min.z; z < max.z; z++) {
                const isOnFace =
                    x === min.x || x === max.x - 1 || y === min.y || y === max.y - 1 || z === min.z || z === max.z - 1
                if (!hollow || isOnFace) {
                    voxels.add(new Vector3(x, y, z), material)
                } else if (interior) {
                    voxels.add(new Vector3(x, y, z), interior)
                }
            }
        }
    }
    return voxels
}

const WallsGen: ShapeRasterizer<'walls'> = ({ corner1, corner2, corner, material }) => {
    const voxels = new VoxelSet()
    const { min, max } = boxFromCorners(corner1, corner2)
    for (let y = min.y; y < max.y; y++) {
        for (let x = min.x; x < max.x; x++) {
            for (let z = min.z; z < max.z; z++) {
                const isEdgeX = x === min.x || x === max.x - 1
                const isEdgeZ = z === min.z || z === max.z - 1
                if (isEdgeX && isEdgeZ) {
                    voxels.add(new Vector3(x, y, z), corner ?? material)
                } else if (isEdgeX || isEdgeZ) {
                    voxels.add(new Vector3(x, y, z), material)
                }
            }
        }
    }
    return voxels
}

const FloorGen: ShapeRasterizer<'floor'> = ({ y, from, to, checkerboard, material }) => {
    const voxels = new VoxelSet()
    const { min, max } = boxFromCorners({ x: from.x, y, z: from.z }, { x: to.x, y, z: to.z })
    for (let x = min.x; x < max.x; x++) {
        for (let z = min.z; z < max.z; z++) {
            const isOddCell = Math.abs((x + z) % 2) === 1
            voxels.add(new Vector3(x, y, z), checkerboard && isOddCell ? checkerboard : material)
        }
    }
    return voxels
}

const ShapeRasterizers: { [K in ShapeKind]: ShapeRasterizer<K> } = {
    circle: CircleGen,
    cylinder: CylinderGen,
    cone: ConeGen,
    arch: ArchGen,
    pitched_roof: PitchedRoofGen,
    box: BoxGen,
    walls: WallsGen,
    floor: FloorGen,
}

const dispatch = <K extends ShapeKind>(shape: K, descriptor: ShapeOf<K>) => {
    const rasterizer: ShapeRasterizer<K> = ShapeRasterizers[shape]
    return rasterizer(descriptor)
}

/**
 * Pure parametric voxelization: no world access, same input same output
 */
export class VoxelRasterizer {
    /**
     * @throws InvalidShapeParams before any voxel is produced
     */
    static parse(input: unknown) {
        const result = shapeDescriptorSchema.safeParse(input)
        if (!result.success) {
            throw new InvalidShapeParams(result.error.issues.map(({ path, message }) => ({ path, message })))
        }
        return result.data
    }

    static rasterize(input: ShapeDescriptorInput) {
        const descriptor = VoxelRasterizer.parse(input)
        return dispatch(descriptor.shape, descriptor)
    }

    /**
     * @returns half-open box every voxel of the shape lies in
     */
    static getBounds(input: ShapeDescriptorInput) {
        const descriptor = VoxelRasterizer.parse(input)
        switch (descriptor.shape) {
            case 'circle': {
                const { center, radius } = descriptor
                const range = Math.floor(radius + 0.5)
                const min = new Vector3(center.x - range, center.y, center.z - range)
                const max = new Vector3(center.x + range + 1, center.y + 1, center.z + range + 1)
                return new Box3(min, max)
            }
            case 'cylinder':
            case 'cone': {
                const { center, y0, radius } = descriptor
                const top = descriptor.shape === 'cylinder' ? descriptor.y1 : y0 + descriptor.height - 1
                const range = Math.floor(radius + 0.5)
                return boxFromCorners({ x: center.x - range, y: y0, z: center.z - range }, { x: center.x + range, y: top, z: center.z + range })
            }
            case 'arch': {
                const { origin, axis, span, height, depth } = descriptor
                const extent = axis === HorizontalAxis.X ? new Vector3(span, height, depth) : new Vector3(depth, height, span)
                const min = parseVect3Stub(origin)
                return new Box3(min, min.clone().add(extent))
            }
            case 'pitched_roof': {
                const { origin, axis, span, length } = descriptor
                const rise = Math.floor((span - 1) / 2) + 1
                const extent = axis === HorizontalAxis.Z ? new Vector3(span, rise, length) : new Vector3(length, rise, span)
                const min = parseVect3Stub(origin)
                return new Box3(min, min.clone().add(extent))
            }
            case 'box':
            case 'walls':
                return boxFromCorners(descriptor.corner1, descriptor.corner2)
            case 'floor': {
                const { y, from, to } = descriptor
                return boxFromCorners({ x: from.x, y, z: from.z }, { x: to.x, y, z: to.z })
            }
        }
    }
}
