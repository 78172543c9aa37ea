import { appendFile, mkdir, readFile, stat, writeFile } from 'node:fs/promises'

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON(path: string): Promise<unknown>
    writeText(path: string, content: string): Promise<void>
    appendText(path: string, content: string): Promise<void>
    exists(path: string): Promise<boolean>
    mkdir(path: string): Promise<void>
}

export class NodeFileSystem implements FileSystem {
    async readText(path: string): Promise<string> {
        return readFile(path, 'utf8')
    }

    async readJSON(path: string): Promise<unknown> {
        return JSON.parse(await this.readText(path))
    }

    async writeText(path: string, content: string): Promise<void> {
        await writeFile(path, content, 'utf8')
    }

    async appendText(path: string, content: string): Promise<void> {
        await appendFile(path, content, 'utf8')
    }

    async exists(path: string): Promise<boolean> {
        try {
            await stat(path)
            return true
        } catch {
            return false
        }
    }

    async mkdir(path: string): Promise<void> {
        await mkdir(path, { recursive: true })
    }
}

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()
    private dirs = new Set<string>()

    async readText(path: string): Promise<string> {
        const content = this.files.get(path)
        if (content === undefined) throw new Error(`ENOENT: ${path}`)
        return content
    }

    async readJSON(path: string): Promise<unknown> {
        return JSON.parse(await this.readText(path))
    }

    async writeText(path: string, content: string): Promise<void> {
        this.files.set(path, content)
    }

    async appendText(path: string, content: string): Promise<void> {
        this.files.set(path, (this.files.get(path) ?? '') + content)
    }

    async exists(path: string): Promise<boolean> {
        return this.files.has(path) || this.dirs.has(path)
    }

    async mkdir(path: string): Promise<void> {
        this.dirs.add(path)
    }

    setFile(path: string, content: string): void {
        this.files.set(path, content)
    }

    getFile(path: string): string | undefined {
        return this.files.get(path)
    }

    getFiles(): Map<string, string> {
        return new Map(this.files)
    }
}
