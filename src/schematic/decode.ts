import { resolveEnvelope } from './envelope.js';
import { parseSchematic } from './parser.js';
import { resolveDecoderOptions, type SchematicDecoderOptions } from './types.js';
import type { Schematic } from './volume.js';

/**
 * Decodes a complete `.schematic` byte source: unwraps the compression
 * envelope, then parses the tag stream. All-or-nothing; the first error
 * is thrown unchanged.
 */
export class SchematicDecoder {
    private readonly data: Uint8Array;
    private readonly options: Required<SchematicDecoderOptions>;

    constructor(data: Uint8Array, options: SchematicDecoderOptions = {}) {
        this.data = data;
        this.options = resolveDecoderOptions(options);
    }

    async decode(): Promise<Schematic> {
        const raw = await this.unwrap();
        return parseSchematic(raw, this.options);
    }

    /**
     * Returns the decompressed tag stream without parsing it.
     */
    async unwrap(): Promise<Uint8Array> {
        const codec = resolveEnvelope(this.data, this.options.envelope);
        const raw = await codec.decompress(this.data, this.options.maxDecompressedSize);
        this.options.logger?.info?.(`${codec.name} envelope: ${this.data.length} -> ${raw.length} bytes`);
        return raw;
    }
}
