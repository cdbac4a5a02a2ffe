import { gunzipSync } from 'node:zlib';
import { ZstdCodec, type ZstdModule } from 'zstd-codec';
import { GZIP_MAGIC, ZSTD_MAGIC, OuterCodecId, TagKind } from './format.js';
import { TransportError, TruncatedInputError } from './errors.js';
import type { EnvelopeMode } from './types.js';

export interface OuterCodec {
    id: OuterCodecId;
    name: string;
    decompress(data: Uint8Array, maxSize: number): Promise<Uint8Array>;
}

/**
 * Identity codec for raw, uncompressed tag streams.
 */
export const OuterCodecNone: OuterCodec = {
    id: OuterCodecId.NONE,
    name: 'NONE',
    async decompress(data: Uint8Array, maxSize: number) {
        checkSizeLimit(data.length, maxSize);
        return data;
    },
};

function hasCode(err: unknown): err is { code: unknown } {
    return typeof err === 'object' && err !== null && 'code' in err;
}

export const OuterCodecGzip: OuterCodec = {
    id: OuterCodecId.GZIP,
    name: 'GZIP',
    async decompress(data: Uint8Array, maxSize: number) {
        let out: Buffer;
        try {
            out = gunzipSync(data, { maxOutputLength: maxSize });
        } catch (err) {
            if (hasCode(err) && err.code === 'Z_BUF_ERROR') {
                throw new TruncatedInputError('Gzip stream ended unexpectedly');
            }
            if (hasCode(err) && err.code === 'ERR_BUFFER_TOO_LARGE') {
                throw new TransportError(`Decompressed size limit exceeded (limit: ${maxSize})`, { cause: err });
            }
            throw new TransportError('Gzip decompression failed', { cause: err });
        }
        checkSizeLimit(out.length, maxSize);
        return new Uint8Array(out.buffer, out.byteOffset, out.byteLength);
    },
};

// Shared by concurrent callers; cleared when loading fails so a later decode can retry.
let zstdLoading: Promise<ZstdModule> | null = null;

function loadZstd(): Promise<ZstdModule> {
    if (zstdLoading) return zstdLoading;
    zstdLoading = new Promise<ZstdModule>((resolve, reject) => {
        try {
            ZstdCodec.run(resolve);
        } catch (err) {
            reject(new TransportError('Zstd codec failed to initialise', { cause: err }));
        }
    }).catch((err: unknown) => {
        zstdLoading = null;
        throw err;
    });
    return zstdLoading;
}

export const OuterCodecZstd: OuterCodec = {
    id: OuterCodecId.ZSTD,
    name: 'ZSTD',
    async decompress(data: Uint8Array, maxSize: number) {
        const zstd = await loadZstd();
        const simple = new zstd.Simple();
        let decompressed: Uint8Array | null;
        try {
            decompressed = simple.decompress(data);
        } catch (err) {
            throw new TransportError('Zstd decompression failed', { cause: err });
        }
        if (!decompressed) throw new TransportError('Zstd decompression failed');
        checkSizeLimit(decompressed.length, maxSize);
        return decompressed;
    },
};

/**
 * Outer codecs keyed by id; every `OuterCodecId` has an entry.
 */
export const OUTER_CODECS: Readonly<Record<OuterCodecId, OuterCodec>> = {
    [OuterCodecId.NONE]: OuterCodecNone,
    [OuterCodecId.GZIP]: OuterCodecGzip,
    [OuterCodecId.ZSTD]: OuterCodecZstd,
};

export function getOuterCodec(id: OuterCodecId): OuterCodec {
    return OUTER_CODECS[id];
}

function startsWith(data: Uint8Array, magic: Uint8Array): boolean {
    if (data.length < magic.length) return false;
    for (let i = 0; i < magic.length; i++) {
        if (data[i] !== magic[i]) return false;
    }
    return true;
}

/**
 * Sniffs the envelope from the leading bytes. A raw stream must open with
 * the root Compound kind byte.
 */
export function detectEnvelope(data: Uint8Array): OuterCodecId {
    if (data.length === 0) {
        throw new TransportError('Empty input');
    }
    if (startsWith(data, GZIP_MAGIC)) return OuterCodecId.GZIP;
    if (startsWith(data, ZSTD_MAGIC)) return OuterCodecId.ZSTD;
    if (data[0] === TagKind.COMPOUND) return OuterCodecId.NONE;
    throw new TransportError(
        `Unrecognized envelope (leading byte 0x${data[0].toString(16).padStart(2, '0')})`
    );
}

const MODE_TO_CODEC: Record<Exclude<EnvelopeMode, 'auto'>, OuterCodecId> = {
    none: OuterCodecId.NONE,
    gzip: OuterCodecId.GZIP,
    zstd: OuterCodecId.ZSTD,
};

export function resolveEnvelope(data: Uint8Array, mode: EnvelopeMode): OuterCodec {
    return getOuterCodec(mode === 'auto' ? detectEnvelope(data) : MODE_TO_CODEC[mode]);
}

function checkSizeLimit(len: number, maxSize: number): void {
    if (len > maxSize) {
        throw new TransportError(`Decompressed size limit exceeded (${len} > ${maxSize})`);
    }
}
