import * as fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';

/**
 * Byte-oriented input. `read` fills up to `target.length` bytes and returns
 * the count; 0 means the source is exhausted.
 */
export interface ByteSource {
    readonly isOpen: boolean;
    read(target: Uint8Array): Promise<number>;
}

export interface ByteSink {
    readonly isOpen: boolean;
    write(data: Uint8Array): Promise<void>;
}

/**
 * Reads until `target` is full or the source is exhausted.
 */
export async function readFully(source: ByteSource, target: Uint8Array): Promise<number> {
    let filled = 0;
    while (filled < target.length) {
        const n = await source.read(target.subarray(filled));
        if (n === 0) break;
        filled += n;
    }
    return filled;
}

export class MemorySource implements ByteSource {
    private pos = 0;
    private closed = false;

    constructor(private readonly data: Uint8Array) { }

    get isOpen(): boolean {
        return !this.closed;
    }

    async read(target: Uint8Array): Promise<number> {
        const n = Math.min(target.length, this.data.length - this.pos);
        target.set(this.data.subarray(this.pos, this.pos + n));
        this.pos += n;
        return n;
    }

    close(): void {
        this.closed = true;
    }
}

export class MemorySink implements ByteSink {
    private readonly chunks: Uint8Array[] = [];
    private length = 0;
    private closed = false;

    get isOpen(): boolean {
        return !this.closed;
    }

    get byteLength(): number {
        return this.length;
    }

    async write(data: Uint8Array): Promise<void> {
        if (this.closed) throw new Error('MemorySink is closed');
        this.chunks.push(data.slice());
        this.length += data.length;
    }

    close(): void {
        this.closed = true;
    }

    toUint8Array(): Uint8Array {
        const out = new Uint8Array(this.length);
        let offset = 0;
        for (const chunk of this.chunks) {
            out.set(chunk, offset);
            offset += chunk.length;
        }
        return out;
    }
}

/**
 * Sequential reader over a FileHandle. A closed handle reports fd -1.
 */
export class FileSource implements ByteSource {
    constructor(private readonly handle: FileHandle) { }

    static async open(filePath: string): Promise<FileSource> {
        return new FileSource(await fs.open(filePath, 'r'));
    }

    get isOpen(): boolean {
        return this.handle.fd !== -1;
    }

    async read(target: Uint8Array): Promise<number> {
        const { bytesRead } = await this.handle.read(target, 0, target.length, null);
        return bytesRead;
    }

    async close(): Promise<void> {
        await this.handle.close();
    }
}

export class FileSink implements ByteSink {
    constructor(private readonly handle: FileHandle) { }

    static async open(filePath: string): Promise<FileSink> {
        return new FileSink(await fs.open(filePath, 'w'));
    }

    get isOpen(): boolean {
        return this.handle.fd !== -1;
    }

    async write(data: Uint8Array): Promise<void> {
        let offset = 0;
        while (offset < data.length) {
            const { bytesWritten } = await this.handle.write(data, offset, data.length - offset, null);
            offset += bytesWritten;
        }
    }

    async close(): Promise<void> {
        await this.handle.close();
    }
}
