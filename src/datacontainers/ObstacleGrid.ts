import { Vector2 } from 'three'

import { ColumnClass, ColumnClassifier } from '../utils/common_types.js'
import { asVect3 } from '../utils/convert.js'
import { ColumnSides, getColumnNeighbours } from '../utils/spatial_utils.js'
import { InvalidArgument } from '../utils/errors.js'
import { BlockClassifier } from '../world/BlockStore.js'

import { ColumnGrid } from './ColumnGrid.js'
import { HeightMap } from './HeightMap.js'

/**
 * Per-column passability snapshot sharing its height map domain.
 * Built fresh for each request, the world may have changed in between.
 */
export class ObstacleGrid extends ColumnGrid<ColumnClass> {
    private readonly rawData: ColumnClass[]

    private constructor(heightMap: HeightMap, rawData: ColumnClass[]) {
        super(heightMap.bounds)
        this.rawData = rawData
    }

    static build(heightMap: HeightMap, classifier: BlockClassifier | ColumnClassifier, maxStep: number) {
        if (!(maxStep >= 0)) throw new InvalidArgument(`max step must be non negative, got ${maxStep}`)
        const classify = typeof classifier === 'function' ? classifier : classifier.classify.bind(classifier)
        const rawData: ColumnClass[] = []
        for (const { pos, data: height } of heightMap.iterCells()) {
            const columnClass = classify(asVect3(pos, height))
            rawData.push(
                columnClass === ColumnClass.Open && ObstacleGrid.isSteep(heightMap, pos, height, maxStep)
                    ? ColumnClass.Steep
                    : columnClass,
            )
        }
        return new ObstacleGrid(heightMap, rawData)
    }

    static isSteep(heightMap: HeightMap, pos: Vector2, height: number, maxStep: number) {
        return getColumnNeighbours(pos, ColumnSides.EDGES).some(neighbour => {
            const neighbourHeight = heightMap.getHeight(neighbour)
            return neighbourHeight !== undefined && Math.abs(neighbourHeight - height) > maxStep
        })
    }

    readCell(index: number) {
        return this.rawData[index] ?? ColumnClass.Structure
    }

    isPassable(pos: Vector2) {
        return this.read(pos) === ColumnClass.Open
    }

    countByClass() {
        const counts: Record<ColumnClass, number> = {
            [ColumnClass.Open]: 0,
            [ColumnClass.Structure]: 0,
            [ColumnClass.Water]: 0,
            [ColumnClass.Steep]: 0,
        }
        this.rawData.forEach(columnClass => counts[columnClass]++)
        return counts
    }
}
