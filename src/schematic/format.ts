/**
 * NBT tag kinds. Only kinds 0-10 are understood; anything else in a kind
 * byte is rejected by the tag reader.
 */
export enum TagKind {
    END = 0,
    BYTE = 1,
    SHORT = 2,
    INT = 3,
    LONG = 4,
    FLOAT = 5,
    DOUBLE = 6,
    BYTE_ARRAY = 7,
    STRING = 8,
    LIST = 9,
    COMPOUND = 10,
}

export const TAG_KIND_NAMES: Record<TagKind, string> = {
    [TagKind.END]: 'End',
    [TagKind.BYTE]: 'Byte',
    [TagKind.SHORT]: 'Short',
    [TagKind.INT]: 'Int',
    [TagKind.LONG]: 'Long',
    [TagKind.FLOAT]: 'Float',
    [TagKind.DOUBLE]: 'Double',
    [TagKind.BYTE_ARRAY]: 'ByteArray',
    [TagKind.STRING]: 'String',
    [TagKind.LIST]: 'List',
    [TagKind.COMPOUND]: 'Compound',
};

export function isTagKind(value: number): value is TagKind {
    return Number.isInteger(value) && value >= TagKind.END && value <= TagKind.COMPOUND;
}

export type TagHeader =
    | { kind: TagKind.END }
    | { kind: Exclude<TagKind, TagKind.END>; name: string };

export const SCHEMATIC_ROOT_NAME = 'Schematic';
export const SUPPORTED_MATERIALS = 'Alpha';

export const GZIP_MAGIC = new Uint8Array([0x1f, 0x8b]);
export const ZSTD_MAGIC = new Uint8Array([0x28, 0xb5, 0x2f, 0xfd]);

export enum OuterCodecId {
    NONE = 0,
    GZIP = 1,
    ZSTD = 2,
}

// Limits
export const DEFAULT_MAX_ARRAY_LENGTH = 64 * 1024 * 1024;
export const DEFAULT_MAX_DECOMPRESSED_SIZE = 256 * 1024 * 1024;
export const DEFAULT_MAX_DEPTH = 64;
