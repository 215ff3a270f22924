import { ZstdCodec } from 'zstd-codec';
import type { ZstdModule } from 'zstd-codec';

let zstdInstance: ZstdModule | null = null;

async function getZstd(): Promise<ZstdModule> {
    if (zstdInstance) return zstdInstance;
    return new Promise((resolve) => {
        ZstdCodec.run((zstd) => {
            zstdInstance = zstd;
            resolve(zstd);
        });
    });
}

/**
 * Downstream byte compressor used to measure how well a transformed stream
 * compresses. The codec itself never applies it to its output.
 */
export async function zstdCompress(data: Uint8Array, level: number = 3): Promise<Uint8Array> {
    const zstd = await getZstd();
    const simple = new zstd.Simple();
    const compressed = simple.compress(data, level);
    if (!compressed) throw new Error('Zstd compression failed');
    return compressed;
}
