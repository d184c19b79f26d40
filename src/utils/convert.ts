import { Box2, Box3, Vector2, Vector3 } from 'three'

import { ColumnKey, Vect2Stub, Vect3Stub, VoxelKey } from './common_types.js'

const asVect2 = (v3: Vect3Stub) => {
    return new Vector2(v3.x, v3.z)
}

const asVect3 = (v2: Vect2Stub, yVal = 0) => {
    return new Vector3(v2.x, yVal, v2.y)
}

const parseVect3Stub = (stub: Vect3Stub) => new Vector3(stub.x, stub.y, stub.z)

const serializeColumnPos = (pos: Vect2Stub): ColumnKey => `${pos.x}:${pos.y}`

const serializeVoxelPos = (pos: Vect3Stub): VoxelKey => `${pos.x}:${pos.y}:${pos.z}`

/**
 * @returns half-open column rect covering both inclusive corners
 */
const rectFromCorners = (corner1: Vect2Stub, corner2: Vect2Stub) => {
    const min = new Vector2(Math.min(corner1.x, corner2.x), Math.min(corner1.y, corner2.y))
    const max = new Vector2(Math.max(corner1.x, corner2.x), Math.max(corner1.y, corner2.y)).addScalar(1)
    return new Box2(min, max)
}

/**
 * @returns half-open box covering both inclusive corners
 */
const boxFromCorners = (corner1: Vect3Stub, corner2: Vect3Stub) => {
    const min = new Vector3(
        Math.min(corner1.x, corner2.x),
        Math.min(corner1.y, corner2.y),
        Math.min(corner1.z, corner2.z),
    )
    const max = new Vector3(
        Math.max(corner1.x, corner2.x),
        Math.max(corner1.y, corner2.y),
        Math.max(corner1.z, corner2.z),
    ).addScalar(1)
    return new Box3(min, max)
}

/**
 * square of columns within radius around center, center included
 */
const rectAround = (center: Vect2Stub, radius: number) => {
    const min = new Vector2(center.x - radius, center.y - radius)
    const max = new Vector2(center.x + radius + 1, center.y + radius + 1)
    return new Box2(min, max)
}

const isEmptyRect = (rect: Box2) => rect.max.x <= rect.min.x || rect.max.y <= rect.min.y

export {
    asVect2,
    asVect3,
    parseVect3Stub,
    serializeColumnPos,
    serializeVoxelPos,
    rectFromCorners,
    boxFromCorners,
    rectAround,
    isEmptyRect,
}
