import { mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'

export type PathKind = 'file' | 'directory' | 'missing'

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON<T>(path: string): Promise<T>
    writeText(path: string, content: string): Promise<void>
    writeJSON(path: string, data: unknown): Promise<void>
    writeBytes(path: string, data: Uint8Array): Promise<void>
    exists(path: string): Promise<boolean>
    kind(path: string): Promise<PathKind>
    size(path: string): Promise<number>
    /** Every file below `dir`, recursively, as absolute paths. */
    listFiles(dir: string): Promise<string[]>
    mkdir(path: string): Promise<void>
    remove(path: string): Promise<void>
}

export class NodeFileSystem implements FileSystem {
    async readText(filePath: string): Promise<string> {
        return readFile(filePath, 'utf8')
    }

    async readJSON<T>(filePath: string): Promise<T> {
        return JSON.parse(await this.readText(filePath)) as T
    }

    async writeText(filePath: string, content: string): Promise<void> {
        await mkdir(path.dirname(filePath), { recursive: true })
        await writeFile(filePath, content, 'utf8')
    }

    async writeJSON(filePath: string, data: unknown): Promise<void> {
        await this.writeText(filePath, JSON.stringify(data, null, 2))
    }

    async writeBytes(filePath: string, data: Uint8Array): Promise<void> {
        await mkdir(path.dirname(filePath), { recursive: true })
        await writeFile(filePath, data)
    }

    async exists(filePath: string): Promise<boolean> {
        return (await this.kind(filePath)) !== 'missing'
    }

    async kind(filePath: string): Promise<PathKind> {
        try {
            const info = await stat(filePath)
            return info.isDirectory() ? 'directory' : 'file'
        } catch {
            return 'missing'
        }
    }

    async size(filePath: string): Promise<number> {
        return (await stat(filePath)).size
    }

    async listFiles(dir: string): Promise<string[]> {
        const root = path.resolve(dir)
        const entries = await readdir(root, { recursive: true, withFileTypes: true })
        return entries.filter((e) => e.isFile()).map((e) => path.join(e.parentPath ?? e.path, e.name))
    }

    async mkdir(dirPath: string): Promise<void> {
        await mkdir(dirPath, { recursive: true })
    }

    async remove(filePath: string): Promise<void> {
        await rm(filePath, { recursive: true, force: true })
    }
}

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string | Uint8Array>()

    async readText(filePath: string): Promise<string> {
        const content = this.files.get(filePath)
        if (content === undefined) throw new Error(`ENOENT: ${filePath}`)
        return typeof content === 'string' ? content : new TextDecoder().decode(content)
    }

    async readJSON<T>(filePath: string): Promise<T> {
        return JSON.parse(await this.readText(filePath)) as T
    }

    async writeText(filePath: string, content: string): Promise<void> {
        this.files.set(filePath, content)
    }

    async writeJSON(filePath: string, data: unknown): Promise<void> {
        this.files.set(filePath, JSON.stringify(data, null, 2))
    }

    async writeBytes(filePath: string, data: Uint8Array): Promise<void> {
        this.files.set(filePath, data)
    }

    async exists(filePath: string): Promise<boolean> {
        return (await this.kind(filePath)) !== 'missing'
    }

    async kind(filePath: string): Promise<PathKind> {
        if (this.files.has(filePath)) return 'file'
        const prefix = filePath.endsWith('/') ? filePath : `${filePath}/`
        for (const key of this.files.keys()) {
            if (key.startsWith(prefix)) return 'directory'
        }
        return 'missing'
    }

    async size(filePath: string): Promise<number> {
        const content = this.files.get(filePath)
        if (content === undefined) throw new Error(`ENOENT: ${filePath}`)
        return typeof content === 'string' ? Buffer.byteLength(content) : content.byteLength
    }

    async listFiles(dir: string): Promise<string[]> {
        const prefix = dir.endsWith('/') ? dir : `${dir}/`
        return [...this.files.keys()].filter((k) => k.startsWith(prefix))
    }

    async mkdir(_path: string): Promise<void> {}

    async remove(filePath: string): Promise<void> {
        this.files.delete(filePath)
    }

    setFile(filePath: string, content: string): void {
        this.files.set(filePath, content)
    }

    getFile(filePath: string): string | Uint8Array | undefined {
        return this.files.get(filePath)
    }
}
