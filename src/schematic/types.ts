import {
    DEFAULT_MAX_ARRAY_LENGTH,
    DEFAULT_MAX_DECOMPRESSED_SIZE,
    DEFAULT_MAX_DEPTH,
} from './format.js';

export type SchematicLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
};

export type EnvelopeMode = 'auto' | 'gzip' | 'zstd' | 'none';

/**
 * How members inside entity compounds are handled.
 *
 * - `strict` (default): no entity member is recognised, so any member fails the decode
 * - `skip`: an `id` String is kept, every other member is skipped and reported via `logger.warn`
 */
export type EntityMode = 'strict' | 'skip';

export type SchematicDecoderOptions = {
    /** Compression envelope around the tag stream. `auto` sniffs the magic bytes. */
    envelope?: EnvelopeMode;
    entityMode?: EntityMode;
    /** Largest ByteArray length prefix accepted. Default 64MB. */
    maxArrayLength?: number;
    /** Largest decompressed tag stream accepted. Default 256MB. */
    maxDecompressedSize?: number;
    /** Nesting limit when skipping unknown payloads. */
    maxDepth?: number;
    /** Optional logger hook; nothing in src/ writes to console. */
    logger?: SchematicLogger | null;
};

export const DEFAULT_DECODER_OPTIONS: Required<SchematicDecoderOptions> = {
    envelope: 'auto',
    entityMode: 'strict',
    maxArrayLength: DEFAULT_MAX_ARRAY_LENGTH,
    maxDecompressedSize: DEFAULT_MAX_DECOMPRESSED_SIZE,
    maxDepth: DEFAULT_MAX_DEPTH,
    logger: null,
};

export function resolveDecoderOptions(options: SchematicDecoderOptions = {}): Required<SchematicDecoderOptions> {
    return { ...DEFAULT_DECODER_OPTIONS, ...options };
}
