#!/usr/bin/env node
/**
 * voxelsmith command line
 *  - shape <descriptor.json> <out.json>: rasterize a shape into a template
 *  - preset <house|skyscraper> <out.json>: save a building preset as template
 *  - demo [seed]: scan, flatten, plan and place on a procedural world
 */

import { readFile } from 'node:fs/promises'

import { Vector2, Vector3 } from 'three'

import { EditorLocals } from '../config/EditorEnv.js'
import { BlockTemplate } from '../datacontainers/BlockTemplate.js'
import { BuildingPreset, BuildingPresets, simpleHouse } from '../tools/BuildingPresets.js'
import { TemplateLoader } from '../tools/TemplateLoader.js'
import { VoxelRasterizer } from '../tools/VoxelRasterizer.js'
import { HeightMode } from '../utils/common_types.js'
import { rectAround } from '../utils/convert.js'
import { InvalidArgument, NoPathFound } from '../utils/errors.js'
import { WorldEditor } from '../WorldEditor.js'
import { AliasNameResolver } from '../world/AliasNameResolver.js'
import { ProceduralBlockStore } from '../world/ProceduralBlockStore.js'

const USAGE = `usage:
  voxelsmith shape <descriptor.json> <out.json>
  voxelsmith preset <${Object.values(BuildingPreset).join('|')}> <out.json>
  voxelsmith demo [seed]`

const requireArg = (args: string[], index: number, label: string) => {
    const arg = args[index]
    if (arg === undefined) throw new InvalidArgument(`missing ${label}\n${USAGE}`)
    return arg
}

const templateSummary = (template: BlockTemplate, out: string) => {
    const size = template.getBounds().getSize(new Vector3())
    return { out, blocks: template.size, sizeX: size.x, sizeY: size.y, sizeZ: size.z }
}

const shapeCommand = async (args: string[]) => {
    const descriptorFile = requireArg(args, 0, 'descriptor file')
    const out = requireArg(args, 1, 'output file')
    const rawDescriptor: unknown = JSON.parse(await readFile(descriptorFile, 'utf8'))
    const descriptor = VoxelRasterizer.parse(rawDescriptor)
    const template = BlockTemplate.fromVoxelSet(VoxelRasterizer.rasterize(descriptor))
    await TemplateLoader.save(out, template)
    console.table([{ shape: descriptor.shape, ...templateSummary(template, out) }])
}

const presetCommand = async (args: string[]) => {
    const presetName = requireArg(args, 0, 'preset name')
    const out = requireArg(args, 1, 'output file')
    const preset = Object.values(BuildingPreset).find(value => value === presetName)
    if (!preset) throw new InvalidArgument(`unknown preset ${presetName}\n${USAGE}`)
    const origin = new Vector3()
    const template = BlockTemplate.fromVoxelSet(BuildingPresets[preset](origin), origin)
    await TemplateLoader.save(out, template)
    console.table([{ preset, ...templateSummary(template, out) }])
}

const demoCommand = (args: string[]) => {
    const env = new EditorLocals()
    const seed = args[0] ?? env.proceduralEnv.seed
    env.fromStub({ procedural: { seed }, scan: { topY: 120, bottomY: 0 } })
    const store = new ProceduralBlockStore(env.proceduralEnv)
    const editor = new WorldEditor({ store, resolver: new AliasNameResolver(), env: env.toStub() })
    const report: Record<string, string | number>[] = []

    const heightMap = editor.scan(new Vector2(), 8, HeightMode.Ground)
    const heightBounds = heightMap.getBounds()
    const targetY = heightBounds ? Math.max(heightBounds.minY, env.proceduralEnv.seaLevel + 1) : env.proceduralEnv.baseLevel
    report.push({ step: 'scan', columns: heightMap.size, minY: heightBounds?.minY ?? '-', maxY: heightBounds?.maxY ?? '-' })

    const plot = rectAround(new Vector2(), 6)
    const cleared = editor.place(editor.clearVegetation(plot.clone().expandByScalar(3)))
    report.push({ step: 'clear vegetation', voxels: cleared })
    const flattened = editor.place(editor.flatten(plot, targetY, 3))
    report.push({ step: 'flatten', voxels: flattened, targetY })
    const house = editor.place(simpleHouse(new Vector3(-3, targetY, -3), { pitchedRoof: true }))
    report.push({ step: 'house', voxels: house })

    try {
        const path = editor.plan(new Vector2(-6, 0), new Vector2(-40, 30), 3)
        const paved = editor.place(editor.pathVoxels(path))
        report.push({ step: 'path', centerline: path.centerline.length, voxels: paved })
    } catch (error) {
        if (!(error instanceof NoPathFound)) throw error
        console.warn(error.message)
        report.push({ step: 'path', explored: error.explored, voxels: 0 })
    }
    console.table(report)
}

const run = async (argv: string[]) => {
    const [command, ...args] = argv
    switch (command) {
        case 'shape':
            return shapeCommand(args)
        case 'preset':
            return presetCommand(args)
        case 'demo':
            return demoCommand(args)
        default:
            throw new InvalidArgument(`unknown command ${command ?? ''}\n${USAGE}`)
    }
}

run(process.argv.slice(2)).catch((error: unknown) => {
    console.error(error instanceof Error ? `${error.name}: ${error.message}` : error)
    process.exitCode = 1
})
