import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import { BlockTemplate } from '../datacontainers/BlockTemplate.js'
import { debugLog } from '../config/EditorEnv.js'

export class TemplateLoader {
    static async load(path: string) {
        const content = await readFile(path, 'utf8')
        const template = BlockTemplate.deserialize(content, path)
        debugLog(`loaded template ${path}: ${template.size} blocks`)
        return template
    }

    static async save(path: string, template: BlockTemplate) {
        await mkdir(dirname(path), { recursive: true })
        await writeFile(path, template.serialize() + '\n', 'utf8')
        debugLog(`saved template ${path}: ${template.size} blocks`)
    }
}
