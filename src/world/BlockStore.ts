import { Vector3 } from 'three'

import { ColumnClass, Material, MaterialProperties } from '../utils/common_types.js'

/**
 * Block read/write access to a persisted world.
 * Both calls throw `LoadError` when the position lies in an unresident region.
 */
export interface BlockStore {
    get(pos: Vector3, dimension: string): Material
    set(pos: Vector3, dimension: string, name: string, properties?: MaterialProperties): void
}

export interface WorldSession {
    path: string
    store: BlockStore
}

export interface PersistenceLayer<S extends WorldSession = WorldSession> {
    open(path: string): S
    save(session: S): void
    close(session: S): void
}

export interface NameResolver {
    /**
     * @returns canonical material name, or the input unchanged when unknown
     */
    correct(materialName: string): string
}

export interface BlockClassifier {
    classify(pos: Vector3): ColumnClass
    isVegetation(material: Material): boolean
}
