import { Material } from '../utils/common_types.js'

export type ScanEnvSettings = {
    topY: number // first probed level, inclusive
    bottomY: number // last probed level, inclusive
}

export type SculptEnvSettings = {
    fill: Material
    top: Material
}

export type ObstaclesEnvSettings = {
    maxStep: number
    deepWaterDepth: number
}

export type PathEnvSettings = {
    elevationPenalty: number
    clearance: number
    searchMargin: number
    material: Material
}

export type PlacementEnvSettings = {
    dimension: string
    flushEvery: number
}

export type ProceduralWorldSettings = {
    seed: string
    seaLevel: number
    baseLevel: number
    amplitude: number
    spreading: number
    treesSpacing: number
    // half extent of resident region around origin
    residentRadius: number
}

export type DebugEnvSettings = {
    logs: boolean
}

type EditorGlobalsStub = {
    debug?: DebugEnvSettings
}

export class EditorGlobals {
    // eslint-disable-next-line no-use-before-define
    static singleton: EditorGlobals
    static get instance() {
        this.singleton = this.singleton || new EditorGlobals()
        return this.singleton
    }

    debug: DebugEnvSettings = {
        logs: false,
    }

    // absent debug settings reset to silent
    import(editorGlobalsStub: EditorGlobalsStub) {
        const { debug } = editorGlobalsStub
        this.debug = debug ?? { logs: false }
    }

    export(): EditorGlobalsStub {
        const { debug } = this
        return { debug }
    }
}

/**
 * debug trace, silent unless enabled in globals
 */
export const debugLog = (message: string) => {
    EditorGlobals.instance.debug.logs && console.log(message)
}

export type EditorLocalSettings = {
    scan: ScanEnvSettings
    sculpt: SculptEnvSettings
    obstacles: ObstaclesEnvSettings
    path: PathEnvSettings
    placement: PlacementEnvSettings
    procedural: ProceduralWorldSettings
    globals: EditorGlobalsStub
}

export type EditorLocalStub = {
    [K in keyof EditorLocalSettings]?: Partial<EditorLocalSettings[K]>
}

export class EditorLocals {
    rawSettings: EditorLocalSettings = {
        scan: {
            topY: 319,
            bottomY: -64,
        },

        sculpt: {
            fill: { name: 'dirt' },
            top: { name: 'grass_block', properties: { snowy: 'false' } },
        },

        obstacles: {
            maxStep: 1,
            deepWaterDepth: 2,
        },

        path: {
            elevationPenalty: 2,
            clearance: 1,
            searchMargin: 16,
            material: { name: 'dirt_path' },
        },

        placement: {
            dimension: 'minecraft:overworld',
            flushEvery: 4096,
        },

        procedural: {
            seed: 'voxelsmith',
            seaLevel: 62,
            baseLevel: 64,
            amplitude: 12,
            spreading: 0.02,
            treesSpacing: 9,
            residentRadius: 128,
        },

        globals: {},
    }

    // Shortcuts for modules' environment access
    get scanEnv() {
        return this.rawSettings.scan
    }

    get sculptEnv() {
        return this.rawSettings.sculpt
    }

    get obstaclesEnv() {
        return this.rawSettings.obstacles
    }

    get pathEnv() {
        return this.rawSettings.path
    }

    get placementEnv() {
        return this.rawSettings.placement
    }

    get proceduralEnv() {
        return this.rawSettings.procedural
    }

    get globalEnv() {
        return this.rawSettings.globals
    }

    // Export/import
    fromStub = (envStub: EditorLocalStub) => {
        const { rawSettings } = this
        rawSettings.scan = { ...rawSettings.scan, ...envStub.scan }
        rawSettings.sculpt = { ...rawSettings.sculpt, ...envStub.sculpt }
        rawSettings.obstacles = { ...rawSettings.obstacles, ...envStub.obstacles }
        rawSettings.path = { ...rawSettings.path, ...envStub.path }
        rawSettings.placement = { ...rawSettings.placement, ...envStub.placement }
        rawSettings.procedural = { ...rawSettings.procedural, ...envStub.procedural }
        rawSettings.globals = { ...rawSettings.globals, ...envStub.globals }
        return this
    }

    toStub() {
        return this.rawSettings
    }
}
