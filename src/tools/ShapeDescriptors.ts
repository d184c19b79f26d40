import { z } from 'zod'

import { HorizontalAxis } from '../utils/common_types.js'

const coord = z.number().int()
const level = coord
const length = z.number().int().min(1)

export const vect3Schema = z.object({ x: coord, y: coord, z: coord })
export const columnSchema = z.object({ x: coord, z: coord })

export const materialSchema = z.object({
    name: z.string().min(1),
    properties: z.record(z.string()).optional(),
})

const radius = z.number().finite().nonnegative()
const axis = z.nativeEnum(HorizontalAxis)

const circleSchema = z.object({
    shape: z.literal('circle'),
    center: vect3Schema,
    radius,
    fill: z.boolean().default(true),
    material: materialSchema,
})

const cylinderSchema = z.object({
    shape: z.literal('cylinder'),
    center: columnSchema,
    y0: level,
    y1: level,
    radius,
    hollow: z.boolean().default(false),
    material: materialSchema,
})

const coneSchema = z.object({
    shape: z.literal('cone'),
    center: columnSchema,
    y0: level,
    height: length,
    radius,
    hollow: z.boolean().default(false),
    material: materialSchema,
})

/**
 * Half ellipse profile spanning `span` blocks along axis, `height` blocks high,
 * extruded `depth` blocks along the other horizontal axis. Origin is the min corner.
 */
const archSchema = z.object({
    shape: z.literal('arch'),
    origin: vect3Schema,
    axis,
    span: length,
    height: length,
    depth: length.default(1),
    thickness: length.default(1),
    material: materialSchema,
})

/**
 * Ridge runs along axis, `span` blocks across slopes, `length` blocks along ridge.
 * Origin is the min corner at eave level.
 */
const pitchedRoofSchema = z.object({
    shape: z.literal('pitched_roof'),
    origin: vect3Schema,
    axis,
    span: length,
    length,
    material: materialSchema,
    ridge: materialSchema,
})

const boxSchema = z.object({
    shape: z.literal('box'),
    corner1: vect3Schema,
    corner2: vect3Schema,
    hollow: z.boolean().default(false),
    interior: materialSchema.optional(),
    material: materialSchema,
})

const wallsSchema = z.object({
    shape: z.literal('walls'),
    corner1: vect3Schema,
    corner2: vect3Schema,
    corner: materialSchema.optional(),
    material: materialSchema,
})

const floorSchema = z.object({
    shape: z.literal('floor'),
    y: level,
    from: columnSchema,
    to: columnSchema,
    checkerboard: materialSchema.optional(),
    material: materialSchema,
})

export const shapeDescriptorSchema = z
    .discriminatedUnion('shape', [
        circleSchema,
        cylinderSchema,
        coneSchema,
        archSchema,
        pitchedRoofSchema,
        boxSchema,
        wallsSchema,
        floorSchema,
    ])
    .superRefine((descriptor, ctx) => {
        if (descriptor.shape === 'cylinder' && descriptor.y1 < descriptor.y0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['y1'],
                message: `top level ${descriptor.y1} below bottom level ${descriptor.y0}`,
            })
        }
    })

// descriptor as written by callers, defaults not yet applied
export type ShapeDescriptorInput = z.input<typeof shapeDescriptorSchema>
export type ShapeDescriptor = z.output<typeof shapeDescriptorSchema>
export type ShapeKind = ShapeDescriptor['shape']
export type ShapeOf<K extends ShapeKind> = Extract<ShapeDescriptor, { shape: K }>
