import { TagKind } from './format.js';
import { SchemaViolationError } from './errors.js';

export interface Entity {
    readonly id: string;
}

export interface SchematicInit {
    width: number;
    length: number;
    height: number;
    offsetX: number;
    offsetY: number;
    offsetZ: number;
    materials: string;
    blocks: Uint8Array;
    data: Uint8Array | null;
    entities: Entity[];
}

/**
 * Decoded Schematic volume. Read-only after construction.
 *
 * Cells are stored y-major, then z, then x:
 * `index = y * (width * length) + z * width + x`.
 * X spans `width`, Y spans `height` and Z spans `length`.
 *
 * The constructor rejects negative dimensions and buffers whose length is
 * not `width * length * height`, and keeps private copies of both buffers.
 */
export class Schematic {
    readonly width: number;
    readonly length: number;
    readonly height: number;
    /** WorldEdit origin offsets (`WEOffsetX/Y/Z`). */
    readonly offsetX: number;
    readonly offsetY: number;
    readonly offsetZ: number;
    readonly materials: string;
    readonly entities: readonly Entity[];
    readonly #blocks: Uint8Array;
    readonly #data: Uint8Array | null;

    constructor(init: SchematicInit) {
        for (const [name, value] of [['Width', init.width], ['Length', init.length], ['Height', init.height]] as const) {
            if (!Number.isInteger(value) || value < 0) {
                const rule = Number.isInteger(value) ? 'must not be negative' : 'must be an integer';
                throw new SchemaViolationError(`${name} ${rule}, got ${value}`, {
                    tagName: name,
                    tagKind: TagKind.SHORT,
                });
            }
        }
        const volume = init.width * init.length * init.height;
        if (init.blocks.length !== volume) {
            throw new SchemaViolationError(
                `Blocks length ${init.blocks.length} does not match volume ${init.width}x${init.length}x${init.height} = ${volume}`,
                { tagName: 'Blocks', tagKind: TagKind.BYTE_ARRAY }
            );
        }
        if (init.data !== null && init.data.length !== volume) {
            throw new SchemaViolationError(
                `Data length ${init.data.length} does not match volume ${volume}`,
                { tagName: 'Data', tagKind: TagKind.BYTE_ARRAY }
            );
        }

        this.width = init.width;
        this.length = init.length;
        this.height = init.height;
        this.offsetX = init.offsetX;
        this.offsetY = init.offsetY;
        this.offsetZ = init.offsetZ;
        this.materials = init.materials;
        this.#blocks = init.blocks.slice();
        this.#data = init.data === null ? null : init.data.slice();
        this.entities = Object.freeze(init.entities.map((e) => Object.freeze({ ...e })));
    }

    /** Copy of the low byte of each cell's material code. */
    get blocks(): Uint8Array {
        return this.#blocks.slice();
    }

    /** Copy of the high byte of each cell's material code, when the document carried `Data`. */
    get data(): Uint8Array | null {
        return this.#data === null ? null : this.#data.slice();
    }

    get hasExtension(): boolean {
        return this.#data !== null;
    }

    xLen(): number {
        return this.width;
    }

    yLen(): number {
        return this.height;
    }

    zLen(): number {
        return this.length;
    }

    get volume(): number {
        return this.width * this.length * this.height;
    }

    contains(x: number, y: number, z: number): boolean {
        return (
            Number.isInteger(x) && Number.isInteger(y) && Number.isInteger(z) &&
            x >= 0 && y >= 0 && z >= 0 &&
            x < this.xLen() && y < this.yLen() && z < this.zLen()
        );
    }

    /** Flattened buffer index of a cell, or -1 outside the volume. */
    indexOf(x: number, y: number, z: number): number {
        if (!this.contains(x, y, z)) return -1;
        return y * this.width * this.length + z * this.width + x;
    }

    /** 16-bit material code of a cell; 0 means empty and is returned outside the volume. */
    materialAt(x: number, y: number, z: number): number {
        const index = this.indexOf(x, y, z);
        if (index < 0) return 0;
        const low = this.#blocks[index];
        if (this.#data === null) return low;
        return ((this.#data[index] << 8) | low) & 0xffff;
    }

    isFilled(x: number, y: number, z: number): boolean {
        return this.materialAt(x, y, z) !== 0;
    }
}
