/**
 * Schematic volume reader public API
 *
 * @module schematic
 */

import { readFile } from 'node:fs/promises';
import { SchematicDecoder } from './schematic/decode.js';
import { parseSchematic } from './schematic/parser.js';
import { TransportError } from './schematic/errors.js';
import type { Schematic } from './schematic/volume.js';
import type { SchematicDecoderOptions } from './schematic/types.js';

export { Schematic } from './schematic/volume.js';
export type { Entity, SchematicInit } from './schematic/volume.js';
export { SchematicDecoder } from './schematic/decode.js';
export { SchematicParser, parseSchematic } from './schematic/parser.js';
export type { ParserState } from './schematic/parser.js';
export { TagReader } from './schematic/tag-reader.js';
export type { TagReaderOptions } from './schematic/tag-reader.js';
export { TagKind, OuterCodecId, SCHEMATIC_ROOT_NAME, SUPPORTED_MATERIALS } from './schematic/format.js';
export type { TagHeader } from './schematic/format.js';
export { detectEnvelope, getOuterCodec } from './schematic/envelope.js';
export type { OuterCodec } from './schematic/envelope.js';
export {
    SchematicError,
    TransportError,
    TruncatedInputError,
    SchemaViolationError,
    MalformedLengthError,
    ParserStateError,
} from './schematic/errors.js';
export type { SchematicErrorKind } from './schematic/errors.js';
export { DEFAULT_DECODER_OPTIONS } from './schematic/types.js';
export type {
    SchematicDecoderOptions as DecoderOptions,
    SchematicLogger as Logger,
    EnvelopeMode,
    EntityMode,
} from './schematic/types.js';

export const Schematics = {
    /**
     * Decodes a compressed (or raw) schematic byte source.
     */
    read: async (data: Uint8Array, options?: SchematicDecoderOptions): Promise<Schematic> => {
        return new SchematicDecoder(data, options).decode();
    },

    /**
     * Reads and decodes a schematic file from disk.
     */
    readFile: async (path: string, options?: SchematicDecoderOptions): Promise<Schematic> => {
        let data: Uint8Array;
        try {
            data = await readFile(path);
        } catch (err) {
            throw new TransportError(`Cannot read ${path}`, { cause: err });
        }
        return new SchematicDecoder(data, options).decode();
    },

    /**
     * Parses an already-decompressed tag stream.
     */
    parse: (raw: Uint8Array, options?: SchematicDecoderOptions): Schematic => parseSchematic(raw, options),

    /**
     * Decoder class for callers that need the unwrapped stream too.
     */
    Decoder: SchematicDecoder,
};

export default Schematics;
