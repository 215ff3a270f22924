/**
 * CLI: Block transform
 *
 * Usage:  tsx tools/bwt.ts <encode|decode> <input> <output>
 *                          [--mtf] [--block-size N] [--preset name]
 *                          [--byte-order LE|BE] [--stats]
 */

import {
    transform,
    reverseTransform,
    FileSource,
    FileSink,
    BLOCK_PRESET_NAMES,
    type BlockPreset,
    type ByteOrder,
    type Logger,
    type Options,
} from '../src/index.js';

const USAGE = 'Usage: tsx tools/bwt.ts <encode|decode> <input> <output> [--mtf] [--block-size N] [--preset name] [--byte-order LE|BE] [--stats]';

// --- CLI args ---
const args = process.argv.slice(2);
const VALUE_FLAGS = new Set(['--block-size', '--preset', '--byte-order']);

function getArg(name: string): string | undefined {
    const idx = args.indexOf(`--${name}`);
    return idx !== -1 ? args[idx + 1] : undefined;
}

function hasFlag(name: string): boolean {
    return args.includes(`--${name}`);
}

function positionals(): string[] {
    const out: string[] = [];
    for (let i = 0; i < args.length; i++) {
        if (VALUE_FLAGS.has(args[i])) {
            i++;
        } else if (!args[i].startsWith('--')) {
            out.push(args[i]);
        }
    }
    return out;
}

function parsePreset(value: string | undefined): BlockPreset | undefined {
    if (value === undefined) return undefined;
    const preset = BLOCK_PRESET_NAMES.find(p => p === value);
    if (!preset) throw new Error(`Unknown preset: ${value} (expected ${BLOCK_PRESET_NAMES.join(', ')})`);
    return preset;
}

function parseByteOrder(value: string | undefined): ByteOrder | undefined {
    if (value === undefined) return undefined;
    if (value === 'LE' || value === 'BE') return value;
    throw new Error(`Unknown byte order: ${value}`);
}

const logger: Logger = {
    info: (msg) => console.log(msg),
    warn: (msg) => console.warn(msg),
    error: (msg) => console.error(msg),
};

// --- Main ---
async function main() {
    const [command, inputPath, outputPath] = positionals();
    if ((command !== 'encode' && command !== 'decode') || !inputPath || !outputPath) {
        console.error(USAGE);
        process.exit(2);
    }

    const blockSize = getArg('block-size');
    const options: Options = {
        useMTF: hasFlag('mtf'),
        preset: parsePreset(getArg('preset')),
        blockSize: blockSize === undefined ? undefined : Number(blockSize),
        byteOrder: parseByteOrder(getArg('byte-order')),
        collectStats: hasFlag('stats'),
        logger,
    };

    const input = await FileSource.open(inputPath);
    try {
        const output = await FileSink.open(outputPath);
        try {
            const run = command === 'encode' ? transform : reverseTransform;
            const report = await run(input, output, options);
            for (const s of report.blockStats ?? []) {
                console.log(
                    `  block ${s.index}: ${s.inputBytes} -> ${s.outputBytes} bytes, ` +
                    `index=${s.primaryIndex} entropy=${s.entropy.toFixed(3)} runs=${s.runs} zero=${(s.zeroRatio * 100).toFixed(1)}%`
                );
            }
        } finally {
            await output.close();
        }
    } finally {
        await input.close();
    }
}

try {
    await main();
} catch (err: unknown) {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    process.exit(1);
}
