// Editor
export { WorldEditor, type PlacementOptions, type WorldEditorModules } from './WorldEditor.js'
// Processing
export { HeightMapScanner } from './processing/HeightMapScanner.js'
export { TerrainSculptor, blendedHeight } from './processing/TerrainSculptor.js'
export { PathPlanner, type PathPlannerSettings } from './processing/PathPlanner.js'
// Data structures
export { ColumnGrid } from './datacontainers/ColumnGrid.js'
export { HeightMap } from './datacontainers/HeightMap.js'
export { ObstacleGrid } from './datacontainers/ObstacleGrid.js'
export { VoxelSet, sameMaterial } from './datacontainers/VoxelSet.js'
export { BlockTemplate, TEMPLATE_FORMAT, TEMPLATE_VERSION, type TemplateDocument } from './datacontainers/BlockTemplate.js'
export { BinaryHeap } from './datacontainers/BinaryHeap.js'
// Tools
export { VoxelRasterizer, circleOffsets } from './tools/VoxelRasterizer.js'
export {
    shapeDescriptorSchema,
    type ShapeDescriptor,
    type ShapeDescriptorInput,
    type ShapeKind,
    type ShapeOf,
} from './tools/ShapeDescriptors.js'
export { TemplateLoader } from './tools/TemplateLoader.js'
export { BuildingPreset, BuildingPresets, simpleHouse, skyscraper, door, bed, windows } from './tools/BuildingPresets.js'
// World collaborators
export type { BlockStore, BlockClassifier, NameResolver, PersistenceLayer, WorldSession } from './world/BlockStore.js'
export { MemoryBlockStore } from './world/MemoryBlockStore.js'
export { ProceduralBlockStore } from './world/ProceduralBlockStore.js'
export { CatalogBlockClassifier, defaultBlockCatalog, type BlockCatalog } from './world/CatalogBlockClassifier.js'
export { AliasNameResolver, defaultMaterialAliases, passthroughResolver } from './world/AliasNameResolver.js'
// Env
export { EditorLocals, EditorGlobals, type EditorLocalStub, type EditorLocalSettings } from './config/EditorEnv.js'
// Utils
export { asVect2, asVect3, rectFromCorners, boxFromCorners, rectAround, serializeVoxelPos } from './utils/convert.js'
// Errors
export {
    VoxelsmithError,
    LoadError,
    NoPathFound,
    OutOfBounds,
    InvalidShapeParams,
    TemplateFormatError,
    InvalidArgument,
} from './utils/errors.js'
// Types
export {
    AIR,
    HeightMode,
    ColumnClass,
    HorizontalAxis,
    Facing,
    type Material,
    type Voxel,
    type Rotation,
    type HeightBounds,
    type PlannedPath,
} from './utils/common_types.js'
