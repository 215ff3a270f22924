/**
 * CLI: Transform Profiler
 *
 * Usage:  tsx tools/profile.ts <file> [--mode quick|deep]
 *
 * Runs the TransformProfiler against a file and prints the recommended
 * block size and method with the full trial matrix.
 */

import { readFile } from 'node:fs/promises';
import { TransformProfiler, XformMethod, type ProfileMode, type ProfileResult } from '../src/index.js';

// --- CLI args ---
const args = process.argv.slice(2);

function getArg(name: string, fallback: string): string {
    const idx = args.indexOf(`--${name}`);
    return idx !== -1 && args[idx + 1] ? args[idx + 1] : fallback;
}

function parseMode(value: string): ProfileMode {
    if (value === 'quick' || value === 'deep') return value;
    throw new Error(`Unknown mode: ${value}`);
}

const methodLabel = (m: XformMethod) => (m === XformMethod.WITH_MTF ? 'BWT+MTF' : 'BWT');

// --- Formatting ---
function printResult(label: string, result: ProfileResult) {
    console.log(`\n${'='.repeat(60)}`);
    console.log(`  ${label}`);
    console.log(`${'='.repeat(60)}`);
    console.log(`  Recommended: method=${methodLabel(result.method)}, blockSize=${result.blockSize}`);
    console.log(`  Preset:      ${result.preset ?? '(custom)'}`);
    console.log(`  Best ratio:  ${result.bestRatio.toFixed(2)}x (zstd alone: ${result.baselineRatio.toFixed(2)}x)`);
    console.log(`  Encode time: ${result.bestEncodeMs.toFixed(1)}ms`);
    console.log(`  Sample hash: ${result.meta.sampleHash}`);
    console.log();

    const blocks = [...new Set(result.trials.map(t => t.blockSize))].sort((a, b) => a - b);

    const header = ['Method', ...blocks.map(b => `B${b}`)];
    console.log(`  ${header.map(h => h.padStart(10)).join('')}`);

    for (const method of [XformMethod.WITHOUT_MTF, XformMethod.WITH_MTF]) {
        const row = [methodLabel(method)];
        for (const bs of blocks) {
            const t = result.trials.find(tr => tr.method === method && tr.blockSize === bs);
            row.push(t ? `${t.ratio.toFixed(1)}x` : '-');
        }
        console.log(`  ${row.map(c => c.padStart(10)).join('')}`);
    }
}

// --- Main ---
async function main() {
    const file = args.find((a, i) => !a.startsWith('--') && args[i - 1] !== '--mode');
    if (!file) {
        console.error('Usage: tsx tools/profile.ts <file> [--mode quick|deep]');
        process.exit(2);
    }
    const mode = parseMode(getArg('mode', 'quick'));

    console.log(`BWT Transform Profiler`);
    console.log(`Mode: ${mode} | File: ${file}`);

    const sample = new Uint8Array(await readFile(file));
    const result = await TransformProfiler.profile(sample, mode);
    printResult(`${file} (${sample.length} bytes)`, result);

    console.log(`\nDone.`);
}

try {
    await main();
} catch (err: unknown) {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
}
