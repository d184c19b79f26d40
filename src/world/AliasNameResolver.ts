import { NameResolver } from './BlockStore.js'

export const defaultMaterialAliases = (): Record<string, string> => ({
    grass: 'short_grass',
    wood: 'oak_planks',
    planks: 'oak_planks',
    log: 'oak_log',
    brick: 'bricks',
    stonebrick: 'stone_bricks',
    glasspane: 'glass_pane',
    thin_glass: 'glass_pane',
    path: 'dirt_path',
    grass_path: 'dirt_path',
    slab: 'oak_slab',
    lantern_block: 'sea_lantern',
})

const normalizeName = (name: string) =>
    name
        .trim()
        .toLowerCase()
        .replace(/^minecraft:/, '')
        .replace(/[\s-]+/g, '_')

/**
 * Alias table lookup on normalized names, unknown names pass through unchanged
 */
export class AliasNameResolver implements NameResolver {
    aliases: Map<string, string>

    constructor(aliases = defaultMaterialAliases()) {
        this.aliases = new Map(Object.entries(aliases).map(([alias, canonical]) => [normalizeName(alias), canonical]))
    }

    correct(materialName: string) {
        return this.aliases.get(normalizeName(materialName)) ?? materialName
    }
}

export const passthroughResolver: NameResolver = {
    correct: (materialName: string) => materialName,
}
