import { Vector2, Vector3 } from 'three'

export class VoxelsmithError extends Error {
    constructor(message: string) {
        super(message)
        this.name = new.target.name
    }
}

/**
 * Queried block lies in a region the store has not loaded
 */
export class LoadError extends VoxelsmithError {
    pos: Vector3
    dimension: string

    constructor(pos: Vector3, dimension: string) {
        super(`region not resident at (${pos.x}, ${pos.y}, ${pos.z}) in ${dimension}`)
        this.pos = pos.clone()
        this.dimension = dimension
    }
}

export class NoPathFound extends VoxelsmithError {
    start: Vector2
    end: Vector2
    explored: number

    constructor(start: Vector2, end: Vector2, explored: number) {
        super(`no path from ${start.x}:${start.y} to ${end.x}:${end.y} (${explored} cells explored)`)
        this.start = start.clone()
        this.end = end.clone()
        this.explored = explored
    }
}

export class OutOfBounds extends VoxelsmithError {
    pos: Vector2

    constructor(pos: Vector2, label = 'endpoint') {
        super(`${label} ${pos.x}:${pos.y} lies outside the scanned domain`)
        this.pos = pos.clone()
    }
}

export type ParamIssue = {
    path: (string | number)[]
    message: string
}

export class InvalidShapeParams extends VoxelsmithError {
    issues: ParamIssue[]

    constructor(issues: ParamIssue[]) {
        const details = issues.map(({ path, message }) => `${path.join('.') || 'shape'}: ${message}`)
        super(`invalid shape parameters: ${details.join('; ')}`)
        this.issues = issues
    }
}

export class TemplateFormatError extends VoxelsmithError {
    source: string

    constructor(message: string, source = 'template') {
        super(`${source}: ${message}`)
        this.source = source
    }
}

export class InvalidArgument extends VoxelsmithError {}
