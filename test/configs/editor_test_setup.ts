import { EditorLocals } from '../../src/config/EditorEnv.js'

export const TEST_DIMENSION = 'test:overworld'

/**
 * short scan range and placement in a dedicated dimension, keeps column probing cheap
 */
export const getEditorTestEnv = () => {
    const editorLocalEnv = new EditorLocals()
    const { rawSettings } = editorLocalEnv
    rawSettings.scan.topY = 24
    rawSettings.scan.bottomY = 0
    rawSettings.placement.dimension = TEST_DIMENSION
    rawSettings.path.searchMargin = 2
    rawSettings.procedural.residentRadius = 16
    return editorLocalEnv
}
