import { PRIMARY_INDEX_SIZE, XformMethod } from './format.js';
import { BwtError, IncompleteDataError, StreamError } from './errors.js';
import { forwardTransform } from './forward.js';
import { inverseTransform } from './inverse.js';
import { mtfDecode, mtfEncode } from './mtf.js';
import { decodePrimaryIndex, encodeRecord } from './record.js';
import { readFully } from './io.js';
import type { ByteSink, ByteSource } from './io.js';
import { calculateBlockStats } from './metrics.js';
import type { BlockStats } from './metrics.js';
import { resolveOptions } from './types.js';
import type { BwtOptions, ResolvedBwtOptions, TransformReport } from './types.js';

type OptionsArg = BwtOptions | boolean;

function toOptions(arg: OptionsArg): BwtOptions {
    return typeof arg === 'boolean' ? { useMTF: arg } : arg;
}

function methodName(method: XformMethod): string {
    return method === XformMethod.WITH_MTF ? 'bwt+mtf' : 'bwt';
}

function assertStreamsOpen(op: string, input: ByteSource, output: ByteSink, opts: ResolvedBwtOptions): void {
    if (input.isOpen && output.isOpen) return;
    const msg = `[BWT] ${op}: invalid stream provided (input ${input.isOpen ? 'open' : 'closed'}, output ${output.isOpen ? 'open' : 'closed'})`;
    opts.logger?.error?.(msg);
    throw new StreamError(msg);
}

async function readChecked(op: string, input: ByteSource, target: Uint8Array, opts: ResolvedBwtOptions): Promise<number> {
    if (!input.isOpen) {
        const msg = `[BWT] ${op}: input stream closed mid-run`;
        opts.logger?.error?.(msg);
        throw new StreamError(msg);
    }
    try {
        return await readFully(input, target);
    } catch (err) {
        if (err instanceof BwtError) throw err;
        const msg = `[BWT] ${op}: input stream read failed`;
        opts.logger?.error?.(`${msg}: ${String(err)}`);
        throw new StreamError(msg, err);
    }
}

async function writeChecked(op: string, output: ByteSink, data: Uint8Array, opts: ResolvedBwtOptions): Promise<void> {
    if (!output.isOpen) {
        const msg = `[BWT] ${op}: output stream closed mid-run`;
        opts.logger?.error?.(msg);
        throw new StreamError(msg);
    }
    try {
        await output.write(data);
    } catch (err) {
        if (err instanceof BwtError) throw err;
        const msg = `[BWT] ${op}: output stream write failed`;
        opts.logger?.error?.(`${msg}: ${String(err)}`);
        throw new StreamError(msg, err);
    }
}

function finish(op: string, report: TransformReport, stats: BlockStats[], opts: ResolvedBwtOptions): TransformReport {
    if (opts.collectStats) report.blockStats = stats;
    opts.logger?.info?.(
        `[BWT] ${op} (${methodName(report.method)}): ${report.blocks} blocks, ${report.bytesIn} -> ${report.bytesOut} bytes`
    );
    return report;
}

/**
 * Forward pass: one record per block of up to `blockSize` input bytes.
 *
 * Both streams must be open on entry; nothing is read or written otherwise.
 */
export async function transform(input: ByteSource, output: ByteSink, options: OptionsArg = {}): Promise<TransformReport> {
    const opts = resolveOptions(toOptions(options));
    assertStreamsOpen('transform', input, output, opts);

    const report: TransformReport = {
        method: opts.method,
        blockSize: opts.blockSize,
        blocks: 0,
        bytesIn: 0,
        bytesOut: 0,
    };
    const stats: BlockStats[] = [];

    for (;;) {
        const buffer = new Uint8Array(opts.blockSize);
        const n = await readChecked('transform', input, buffer, opts);
        if (n === 0) break;

        const { primaryIndex, lastColumn } = forwardTransform(buffer.subarray(0, n));
        const column = opts.method === XformMethod.WITH_MTF ? mtfEncode(lastColumn) : lastColumn;
        const record = encodeRecord(primaryIndex, column, opts.byteOrder);
        await writeChecked('transform', output, record, opts);

        if (opts.collectStats) {
            stats.push(calculateBlockStats(report.blocks, n, record.length, primaryIndex, column));
        }
        report.blocks++;
        report.bytesIn += n;
        report.bytesOut += record.length;

        if (n < opts.blockSize) break;
    }

    return finish('transform', report, stats, opts);
}

/**
 * Reverse pass: reads records until the input is exhausted.
 *
 * `blockSize` must match the value used on the forward pass, since a
 * record's length is implied by how many column bytes follow its index.
 */
export async function reverseTransform(input: ByteSource, output: ByteSink, options: OptionsArg = {}): Promise<TransformReport> {
    const opts = resolveOptions(toOptions(options));
    assertStreamsOpen('reverseTransform', input, output, opts);

    const report: TransformReport = {
        method: opts.method,
        blockSize: opts.blockSize,
        blocks: 0,
        bytesIn: 0,
        bytesOut: 0,
    };
    const stats: BlockStats[] = [];

    for (;;) {
        const header = new Uint8Array(PRIMARY_INDEX_SIZE);
        const h = await readChecked('reverseTransform', input, header, opts);
        if (h === 0) break;
        if (h < PRIMARY_INDEX_SIZE) {
            truncated(opts, `Truncated primary index after block ${report.blocks} (${h} of ${PRIMARY_INDEX_SIZE} bytes)`);
            break;
        }
        const primaryIndex = decodePrimaryIndex(header, opts.byteOrder);

        const buffer = new Uint8Array(opts.blockSize);
        const n = await readChecked('reverseTransform', input, buffer, opts);
        if (n === 0) {
            truncated(opts, `Record ${report.blocks} has a primary index but no column bytes`);
            break;
        }

        const column = buffer.subarray(0, n);
        const lastColumn = opts.method === XformMethod.WITH_MTF ? mtfDecode(column) : column;
        const original = inverseTransform({ primaryIndex, lastColumn });
        await writeChecked('reverseTransform', output, original, opts);

        if (opts.collectStats) {
            stats.push(calculateBlockStats(report.blocks, PRIMARY_INDEX_SIZE + n, n, primaryIndex, column));
        }
        report.blocks++;
        report.bytesIn += PRIMARY_INDEX_SIZE + n;
        report.bytesOut += n;

        if (n < opts.blockSize) break;
    }

    return finish('reverseTransform', report, stats, opts);
}

function truncated(opts: ResolvedBwtOptions, message: string): void {
    if (opts.integrityMode === 'strict') {
        throw new IncompleteDataError(message);
    }
    opts.logger?.warn?.(`[BWT] ${message}; stopping at the last complete record`);
}
