import { Vector2 } from 'three'

export enum ColumnSides {
    EDGES = 'edge',
    CORNERS = 'corner',
    ALL = 'all',
}

// or SurfaceNeighbour
export enum ColumnOffsetId {
    XmY0, // left
    XpY0, // right
    X0Ym, // bottom
    X0Yp, // top
    XmYm, // bottom-left
    XpYm, // bottom-right
    XmYp, // top-left
    XpYp, // top-right
}

const columnOffsetsMapping: Record<ColumnOffsetId, Vector2> = {
    [ColumnOffsetId.XmY0]: new Vector2(-1, 0),
    [ColumnOffsetId.XpY0]: new Vector2(1, 0),
    [ColumnOffsetId.X0Ym]: new Vector2(0, -1),
    [ColumnOffsetId.X0Yp]: new Vector2(0, 1),
    [ColumnOffsetId.XmYm]: new Vector2(-1, -1),
    [ColumnOffsetId.XpYm]: new Vector2(1, -1),
    [ColumnOffsetId.XmYp]: new Vector2(-1, 1),
    [ColumnOffsetId.XpYp]: new Vector2(1, 1),
}

const columnEdges = () => [ColumnOffsetId.XmY0, ColumnOffsetId.XpY0, ColumnOffsetId.X0Ym, ColumnOffsetId.X0Yp]
const columnCorners = () => [ColumnOffsetId.XmYm, ColumnOffsetId.XpYm, ColumnOffsetId.XmYp, ColumnOffsetId.XpYp]

const getColumnSides = (columnSides = ColumnSides.ALL) => {
    switch (columnSides) {
        case ColumnSides.EDGES:
            return columnEdges()
        case ColumnSides.CORNERS:
            return columnCorners()
        case ColumnSides.ALL:
            return [...columnEdges(), ...columnCorners()]
    }
}

export const getColumnOffsets = (columnSides = ColumnSides.ALL) =>
    getColumnSides(columnSides).map(offsetId => columnOffsetsMapping[offsetId].clone())

/**
 * Neighbours in a fixed order: edges (left, right, bottom, top) then corners
 */
export const getColumnNeighbours = (pos: Vector2, columnSides = ColumnSides.ALL): Vector2[] => {
    return getColumnOffsets(columnSides).map(offset => offset.add(pos))
}

/**
 * unit lateral step perpendicular to a (non zero) grid direction,
 * diagonal directions give a diagonal lateral step
 */
export const lateralStep = (direction: Vector2) => new Vector2(-Math.sign(direction.y), Math.sign(direction.x))
