import { TagKind, TAG_KIND_NAMES, isTagKind, type TagHeader } from './format.js';
import { MalformedLengthError, SchemaViolationError, TruncatedInputError } from './errors.js';

export interface TagReaderOptions {
    maxArrayLength: number;
    maxDepth: number;
}

/**
 * Forward-only cursor over a decompressed NBT stream. All values are big-endian.
 */
export class TagReader {
    private readonly data: Uint8Array;
    private readonly view: DataView;
    private readonly textDecoder = new TextDecoder('utf-8');
    private pos: number = 0;

    constructor(data: Uint8Array, private readonly options: TagReaderOptions) {
        this.data = data;
        this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    }

    get offset(): number {
        return this.pos;
    }

    get remaining(): number {
        return this.data.length - this.pos;
    }

    get atEnd(): boolean {
        return this.pos >= this.data.length;
    }

    readByte(): number {
        this.require(1, 'byte');
        return this.data[this.pos++];
    }

    /** Unsigned 16-bit; used for string length prefixes. */
    readU16(): number {
        this.require(2, 'u16');
        const val = this.view.getUint16(this.pos, false);
        this.pos += 2;
        return val;
    }

    readShort(): number {
        this.require(2, 'short');
        const val = this.view.getInt16(this.pos, false);
        this.pos += 2;
        return val;
    }

    readInt(): number {
        this.require(4, 'int');
        const val = this.view.getInt32(this.pos, false);
        this.pos += 4;
        return val;
    }

    readString(): string {
        const len = this.readU16();
        this.require(len, 'string payload');
        const bytes = this.data.subarray(this.pos, this.pos + len);
        this.pos += len;
        return this.textDecoder.decode(bytes);
    }

    readByteArray(): Uint8Array {
        const lengthOffset = this.pos;
        const len = this.readInt();
        if (len < 0) {
            throw new MalformedLengthError(`Negative byte array length ${len}`, lengthOffset);
        }
        if (len > this.options.maxArrayLength) {
            throw new MalformedLengthError(
                `Byte array length ${len} exceeds limit of ${this.options.maxArrayLength}`,
                lengthOffset
            );
        }
        this.require(len, 'byte array payload');
        const bytes = this.data.slice(this.pos, this.pos + len);
        this.pos += len;
        return bytes;
    }

    readTagKind(): TagKind {
        const kindOffset = this.pos;
        const kind = this.readByte();
        if (!isTagKind(kind)) {
            throw new SchemaViolationError(`Unknown tag kind ${kind}`, { offset: kindOffset, tagKind: kind });
        }
        return kind;
    }

    readTagHeader(): TagHeader {
        const kind = this.readTagKind();
        if (kind === TagKind.END) {
            return { kind };
        }
        return { kind, name: this.readString() };
    }

    /**
     * Skips the payload of a tag whose header has already been read.
     * Lists use the standard layout: element kind, Int count, payloads.
     */
    skipPayload(kind: TagKind, depth: number = 0): void {
        if (depth > this.options.maxDepth) {
            throw new SchemaViolationError(`Tag nesting exceeds depth limit of ${this.options.maxDepth}`, {
                offset: this.pos,
                tagKind: kind,
            });
        }
        switch (kind) {
            case TagKind.END:
                return;
            case TagKind.BYTE:
                this.skip(1, TAG_KIND_NAMES[kind]);
                return;
            case TagKind.SHORT:
                this.skip(2, TAG_KIND_NAMES[kind]);
                return;
            case TagKind.INT:
            case TagKind.FLOAT:
                this.skip(4, TAG_KIND_NAMES[kind]);
                return;
            case TagKind.LONG:
            case TagKind.DOUBLE:
                this.skip(8, TAG_KIND_NAMES[kind]);
                return;
            case TagKind.BYTE_ARRAY:
                this.readByteArray();
                return;
            case TagKind.STRING:
                this.skip(this.readU16(), 'string payload');
                return;
            case TagKind.LIST:
                this.skipList(depth);
                return;
            case TagKind.COMPOUND:
                for (let header = this.readTagHeader(); header.kind !== TagKind.END; header = this.readTagHeader()) {
                    this.skipPayload(header.kind, depth + 1);
                }
                return;
            default: {
                const unreachable: never = kind;
                throw new SchemaViolationError(`Unhandled tag kind ${String(unreachable)}`, { offset: this.pos });
            }
        }
    }

    private skipList(depth: number): void {
        const elementKind = this.readTagKind();
        const countOffset = this.pos;
        const count = this.readInt();
        if (count < 0) {
            throw new MalformedLengthError(`Negative list length ${count}`, countOffset);
        }
        if (elementKind === TagKind.END && count > 0) {
            throw new SchemaViolationError(`List of End tags with ${count} elements`, { offset: countOffset });
        }
        for (let i = 0; i < count; i++) {
            this.skipPayload(elementKind, depth + 1);
        }
    }

    private skip(n: number, what: string): void {
        this.require(n, what);
        this.pos += n;
    }

    private require(n: number, what: string): void {
        if (this.data.length - this.pos < n) {
            throw new TruncatedInputError(
                `Unexpected end of data (${what}: need ${n}, have ${this.data.length - this.pos})`,
                this.pos
            );
        }
    }
}
