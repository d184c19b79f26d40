import { Vector2, Vector3 } from 'three'

export const AIR = 'air'

export type MaterialProperties = Record<string, string>

export type Material = {
    name: string
    properties?: MaterialProperties
}

export type Voxel = {
    pos: Vector3
    material: Material
}

/**
 * Column convention
 *
 *     _ _ _ x (cols)
 *    |
 *    |
 *    |
 *    z (as y) rows
 *
 * A column is addressed with a Vector2 where `y` holds the world z coordinate.
 */
export type Vect2Stub = {
    x: number
    y: number
}

export type Vect3Stub = {
    x: number
    y: number
    z: number
}

export type ColumnPos = Vector2
export type ColumnKey = string
export type VoxelKey = string

export type ColumnCell<T> = {
    pos: ColumnPos
    index: number
    localPos: Vector2
    data: T
}

export enum HeightMode {
    Surface = 'surface',
    Ground = 'ground',
}

export enum ColumnClass {
    Open = 'open',
    Structure = 'structure',
    Water = 'water',
    Steep = 'steep',
}

export type ColumnClassifier = (pos: Vector3) => ColumnClass

export enum HorizontalAxis {
    X = 'x',
    Z = 'z',
}

export type Rotation = 90 | 180 | 270

/**
 * Cardinal directions, as written in block facing properties
 */
export enum Facing {
    North = 'north',
    East = 'east',
    South = 'south',
    West = 'west',
}

/**
 * Inclusive elevation extent of a height map
 */
export type HeightBounds = {
    minX: number
    maxX: number
    minZ: number
    maxZ: number
    minY: number
    maxY: number
}

export type PlannedPath = {
    centerline: Vector3[]
    footprint: Vector3[]
}
