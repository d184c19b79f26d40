import { Vector2 } from 'three'

import { debugLog, PathEnvSettings } from '../config/EditorEnv.js'
import { BinaryHeap } from '../datacontainers/BinaryHeap.js'
import { HeightMap } from '../datacontainers/HeightMap.js'
import { ObstacleGrid } from '../datacontainers/ObstacleGrid.js'
import { ColumnKey, PlannedPath } from '../utils/common_types.js'
import { asVect3, serializeColumnPos } from '../utils/convert.js'
import { InvalidArgument, NoPathFound, OutOfBounds } from '../utils/errors.js'
import { getColumnOffsets, lateralStep } from '../utils/spatial_utils.js'

type SearchNode = {
    pos: Vector2
    cost: number
    parent: SearchNode | undefined
}

const DEFAULT_DIRECTION = new Vector2(1, 0)

export type PathPlannerSettings = Pick<PathEnvSettings, 'elevationPenalty' | 'clearance'>

/**
 * A* search across an obstacle grid, 8 directional moves. Only the target
 * cell of a move has to be passable.
 *
 * Step cost is 1 (orthogonal) or √2 (diagonal) plus a penalty on elevation
 * change. The Euclidean heuristic ignores that penalty: routes favour gentle
 * slopes over strict shortest length.
 */
export class PathPlanner {
    settings: PathPlannerSettings

    constructor(settings: PathPlannerSettings) {
        this.settings = settings
    }

    stepCost(from: Vector2, to: Vector2, heightMap: HeightMap) {
        const isDiagonal = from.x !== to.x && from.y !== to.y
        const base = isDiagonal ? Math.SQRT2 : 1
        const climb = Math.abs((heightMap.getHeight(to) ?? 0) - (heightMap.getHeight(from) ?? 0))
        return base + this.settings.elevationPenalty * climb
    }

    /**
     * @returns centerline columns from start to end
     */
    search(start: Vector2, end: Vector2, grid: ObstacleGrid, heightMap: HeightMap) {
        for (const [label, pos] of [['start', start], ['end', end]] as const) {
            if (!grid.inWorldRange(pos) || !heightMap.inWorldRange(pos)) throw new OutOfBounds(pos, label)
        }
        if (!grid.isPassable(start) || !grid.isPassable(end)) throw new NoPathFound(start, end, 0)

        const offsets = getColumnOffsets()
        const frontier = new BinaryHeap<SearchNode>()
        const bestCosts = new Map<ColumnKey, number>()
        const closed = new Set<ColumnKey>()
        const startNode: SearchNode = { pos: start.clone(), cost: 0, parent: undefined }
        bestCosts.set(serializeColumnPos(start), 0)
        frontier.push(startNode, start.distanceTo(end))

        for (let node = frontier.pop(); node; node = frontier.pop()) {
            const key = serializeColumnPos(node.pos)
            if (closed.has(key)) continue
            closed.add(key)
            if (node.pos.equals(end)) {
                debugLog(`path found after exploring ${closed.size} cells`)
                return reconstruct(node)
            }
            for (const offset of offsets) {
                const next = node.pos.clone().add(offset)
                if (!grid.isPassable(next)) continue
                const nextKey = serializeColumnPos(next)
                if (closed.has(nextKey)) continue
                const cost = node.cost + this.stepCost(node.pos, next, heightMap)
                const knownCost = bestCosts.get(nextKey)
                if (knownCost !== undefined && knownCost <= cost) continue
                bestCosts.set(nextKey, cost)
                frontier.push({ pos: next, cost, parent: node }, cost + next.distanceTo(end))
            }
        }
        throw new NoPathFound(start, end, closed.size)
    }

    /**
     * Lateral widening of the centerline, each side cell takes the elevation
     * of the centerline cell it was projected from. Side cells out of grid
     * domain are dropped.
     */
    widen(centerline: Vector2[], grid: ObstacleGrid, heightMap: HeightMap, width: number) {
        const half = Math.floor((width - 1) / 2)
        const { clearance } = this.settings
        const visited = new Set<ColumnKey>()
        const centerLift = centerline.map(pos => asVect3(pos, (heightMap.getHeight(pos) ?? 0) + clearance))
        centerline.forEach(pos => visited.add(serializeColumnPos(pos)))
        const footprint = centerLift.map(pos => pos.clone())

        centerline.forEach((pos, i) => {
            const prev = centerline[Math.max(i - 1, 0)] ?? pos
            const next = centerline[Math.min(i + 1, centerline.length - 1)] ?? pos
            const direction = next.clone().sub(prev)
            // single cell route: widen across x
            const lateral = lateralStep(direction.x === 0 && direction.y === 0 ? DEFAULT_DIRECTION : direction)
            const level = centerLift[i]?.y ?? clearance
            for (let k = 1; k <= half; k++) {
                for (const side of [1, -1]) {
                    const sidePos = lateral.clone().multiplyScalar(k * side).add(pos)
                    const sideKey = serializeColumnPos(sidePos)
                    if (!grid.inWorldRange(sidePos) || visited.has(sideKey)) continue
                    visited.add(sideKey)
                    footprint.push(asVect3(sidePos, level))
                }
            }
        })
        return footprint
    }

    plan(start: Vector2, end: Vector2, grid: ObstacleGrid, heightMap: HeightMap, width = 1): PlannedPath {
        if (!Number.isInteger(width) || width < 1) throw new InvalidArgument(`path width must be a positive integer, got ${width}`)
        if (!grid.hasSameDomain(heightMap)) throw new InvalidArgument('obstacle grid and height map domains differ')
        const centerline = this.search(start, end, grid, heightMap)
        const footprint = this.widen(centerline, grid, heightMap, width)
        const { clearance } = this.settings
        return {
            centerline: centerline.map(pos => asVect3(pos, (heightMap.getHeight(pos) ?? 0) + clearance)),
            footprint,
        }
    }
}

const reconstruct = (goal: SearchNode) => {
    const columns: Vector2[] = []
    for (let node: SearchNode | undefined = goal; node; node = node.parent) {
        columns.push(node.pos)
    }
    return columns.reverse()
}
