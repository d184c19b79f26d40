import { Vector3 } from 'three'
import { z } from 'zod'

import { HorizontalAxis, Material, Rotation } from '../utils/common_types.js'
import { TemplateFormatError } from '../utils/errors.js'

import { sameMaterial, VoxelSet } from './VoxelSet.js'

export const TEMPLATE_FORMAT = 'voxelsmith-template'
export const TEMPLATE_VERSION = 1

const materialEntrySchema = z.object({
    name: z.string().min(1),
    properties: z.record(z.string()).optional(),
})

const templateDocumentSchema = z.object({
    format: z.literal(TEMPLATE_FORMAT),
    version: z.literal(TEMPLATE_VERSION),
    size: z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative(), z.number().int().nonnegative()]),
    palette: z.array(materialEntrySchema),
    blocks: z.array(z.tuple([z.number().int(), z.number().int(), z.number().int(), z.number().int().nonnegative()])),
})

export type TemplateDocument = z.infer<typeof templateDocumentSchema>

const rotateY = (pos: Vector3, rotation: Rotation) => {
    switch (rotation) {
        case 90:
            return new Vector3(-pos.z, pos.y, pos.x)
        case 180:
            return new Vector3(-pos.x, pos.y, -pos.z)
        case 270:
            return new Vector3(pos.z, pos.y, -pos.x)
    }
}

/**
 * Reusable voxel region, positions relative to an anchor at (0,0,0).
 * Transforms only move positions, materials and properties are kept as is.
 */
export class BlockTemplate {
    readonly voxels: VoxelSet

    constructor(voxels = new VoxelSet()) {
        this.voxels = voxels
    }

    /**
     * @param origin world position becoming the anchor, defaults to voxels min corner
     */
    static fromVoxelSet(voxelSet: VoxelSet, origin?: Vector3) {
        const anchor = origin ?? voxelSet.getBounds().min
        return new BlockTemplate(voxelSet.size > 0 ? voxelSet.translate(anchor.clone().negate()) : new VoxelSet())
    }

    get size() {
        return this.voxels.size
    }

    getBounds() {
        return this.voxels.getBounds()
    }

    transform(mapper: (pos: Vector3) => Vector3) {
        return new BlockTemplate(
            VoxelSet.fromVoxels([...this.voxels].map(({ pos, material }) => ({ pos: mapper(pos), material }))),
        )
    }

    /**
     * quarter turns around the vertical axis through the anchor,
     * 90 maps (x, z) to (-z, x)
     */
    rotate(rotation: Rotation) {
        return this.transform(pos => rotateY(pos, rotation))
    }

    mirror(axis: HorizontalAxis) {
        return this.transform(pos => (axis === HorizontalAxis.X ? new Vector3(-pos.x, pos.y, pos.z) : new Vector3(pos.x, pos.y, -pos.z)))
    }

    /**
     * @returns voxels at world position, anchor placed at origin
     */
    placeAt(origin: Vector3) {
        return this.voxels.translate(origin)
    }

    toDocument(): TemplateDocument {
        const palette: Material[] = []
        const blocks: TemplateDocument['blocks'] = []
        const paletteIndex = (material: Material) => {
            const index = palette.findIndex(entry => sameMaterial(entry, material))
            if (index >= 0) return index
            palette.push(material)
            return palette.length - 1
        }
        for (const { pos, material } of this.voxels) {
            blocks.push([pos.x, pos.y, pos.z, paletteIndex(material)])
        }
        const bounds = this.getBounds()
        const size = bounds.isEmpty() ? new Vector3() : bounds.getSize(new Vector3())
        return {
            format: TEMPLATE_FORMAT,
            version: TEMPLATE_VERSION,
            size: [size.x, size.y, size.z],
            palette,
            blocks,
        }
    }

    toJSON() {
        return this.toDocument()
    }

    serialize() {
        return JSON.stringify(this.toDocument(), null, 2)
    }

    /**
     * @throws TemplateFormatError on malformed document, nothing is partially loaded
     */
    static fromDocument(rawDocument: unknown, source?: string) {
        const result = templateDocumentSchema.safeParse(rawDocument)
        if (!result.success) {
            const [issue] = result.error.issues
            const location = issue?.path.join('.') || 'document'
            throw new TemplateFormatError(`${location}: ${issue?.message ?? 'invalid document'}`, source)
        }
        const { palette, blocks } = result.data
        const voxels = new VoxelSet()
        for (const [x, y, z, index] of blocks) {
            const material = palette[index]
            if (!material) throw new TemplateFormatError(`unknown palette index ${index}`, source)
            voxels.add(new Vector3(x, y, z), material)
        }
        return new BlockTemplate(voxels)
    }

    static deserialize(content: string, source?: string) {
        let rawDocument: unknown
        try {
            rawDocument = JSON.parse(content)
        } catch (error) {
            throw new TemplateFormatError(error instanceof Error ? error.message : String(error), source)
        }
        return BlockTemplate.fromDocument(rawDocument, source)
    }
}
