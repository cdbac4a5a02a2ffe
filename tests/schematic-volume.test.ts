import { describe, it, expect } from 'vitest';
import { Schematic, type SchematicInit } from '../src/schematic/volume.js';
import { SchemaViolationError } from '../src/schematic/errors.js';
import { captureError } from './helpers/capture.js';

const makeVolume = (data: Uint8Array | null = null) => {
    // width 3, length 2, height 4; cell value = index + 1
    const blocks = new Uint8Array(24);
    for (let i = 0; i < blocks.length; i++) blocks[i] = i + 1;
    return new Schematic({
        width: 3,
        length: 2,
        height: 4,
        offsetX: 0,
        offsetY: 0,
        offsetZ: 0,
        materials: 'Alpha',
        blocks,
        data,
        entities: [{ id: 'Arrow' }],
    });
};

describe('Schematic volume queries', () => {
    it('maps axes to width, height and length', () => {
        const volume = makeVolume();
        expect(volume.xLen()).toBe(3);
        expect(volume.yLen()).toBe(4);
        expect(volume.zLen()).toBe(2);
        expect(volume.volume).toBe(24);
    });

    it('flattens y-major, then z, then x', () => {
        const volume = makeVolume();
        expect(volume.indexOf(0, 0, 0)).toBe(0);
        expect(volume.indexOf(1, 0, 0)).toBe(1);
        expect(volume.indexOf(0, 0, 1)).toBe(3);
        expect(volume.indexOf(0, 1, 0)).toBe(6);
        expect(volume.indexOf(2, 3, 1)).toBe(23);
    });

    it('returns the presence byte for every in-bounds cell', () => {
        const volume = makeVolume();
        for (let y = 0; y < 4; y++) {
            for (let z = 0; z < 2; z++) {
                for (let x = 0; x < 3; x++) {
                    const expected = y * 6 + z * 3 + x + 1;
                    expect(volume.materialAt(x, y, z)).toBe(expected);
                    expect(volume.materialAt(x, y, z)).toBe(expected);
                    expect(volume.isFilled(x, y, z)).toBe(true);
                }
            }
        }
    });

    it('returns 0 and false outside the volume', () => {
        const volume = makeVolume();
        const outside: Array<[number, number, number]> = [
            [-1, 0, 0], [0, -1, 0], [0, 0, -1],
            [3, 0, 0], [0, 4, 0], [0, 0, 2],
            [100, 100, 100], [0.5, 0, 0],
        ];
        for (const [x, y, z] of outside) {
            expect(volume.indexOf(x, y, z)).toBe(-1);
            expect(volume.contains(x, y, z)).toBe(false);
            expect(volume.materialAt(x, y, z)).toBe(0);
            expect(volume.isFilled(x, y, z)).toBe(false);
        }
    });

    it('widens material codes with the extension buffer', () => {
        const data = new Uint8Array(24);
        data[0] = 0x12;
        data[23] = 0xff;
        const volume = makeVolume(data);
        expect(volume.materialAt(0, 0, 0)).toBe(0x1201);
        expect(volume.materialAt(2, 3, 1)).toBe(0xff18);
        expect(volume.materialAt(1, 0, 0)).toBe(2);
    });

    it('treats a zero presence byte with a high byte as filled', () => {
        const volume = new Schematic({
            width: 1, length: 1, height: 1,
            offsetX: 0, offsetY: 0, offsetZ: 0,
            materials: 'Alpha',
            blocks: new Uint8Array(1),
            data: Uint8Array.from([1]),
            entities: [],
        });
        expect(volume.materialAt(0, 0, 0)).toBe(256);
        expect(volume.isFilled(0, 0, 0)).toBe(true);
    });

    it('freezes the entity list', () => {
        const volume = makeVolume();
        expect(Object.isFrozen(volume.entities)).toBe(true);
        expect(Object.isFrozen(volume.entities[0])).toBe(true);
        expect(volume.entities[0].id).toBe('Arrow');
    });
});

const init = (overrides: Partial<SchematicInit>): SchematicInit => ({
    width: 2,
    length: 1,
    height: 1,
    offsetX: 0,
    offsetY: 0,
    offsetZ: 0,
    materials: 'Alpha',
    blocks: new Uint8Array(2),
    data: null,
    entities: [],
    ...overrides,
});

describe('Schematic construction', () => {
    it('rejects a Blocks buffer shorter than the volume', () => {
        const err = captureError(() => new Schematic(init({ blocks: new Uint8Array(1) })));
        expect(err).toBeInstanceOf(SchemaViolationError);
        expect(err).toMatchObject({
            message: 'Blocks length 1 does not match volume 2x1x1 = 2',
            tagName: 'Blocks',
        });
    });

    it('rejects a Data buffer whose length differs from the volume', () => {
        const err = captureError(() => new Schematic(init({ data: new Uint8Array(3) })));
        expect(err).toBeInstanceOf(SchemaViolationError);
        expect(err).toMatchObject({ message: 'Data length 3 does not match volume 2', tagName: 'Data' });
    });

    it('rejects negative and fractional dimensions', () => {
        expect(() => new Schematic(init({ height: -1 }))).toThrow('Height must not be negative, got -1');
        expect(() => new Schematic(init({ width: 1.5 }))).toThrow('Width must be an integer, got 1.5');
    });
});

describe('Schematic buffers', () => {
    it('hands out copies that do not alter the volume', () => {
        const volume = makeVolume(new Uint8Array(24));
        const blocks = volume.blocks;
        blocks[0] = 0;
        const data = volume.data;
        expect(data).not.toBeNull();
        if (data !== null) data[1] = 0x12;

        expect(volume.materialAt(0, 0, 0)).toBe(1);
        expect(volume.materialAt(1, 0, 0)).toBe(2);
        expect(volume.isFilled(0, 0, 0)).toBe(true);
        expect(volume.blocks[0]).toBe(1);
    });

    it('is not affected by later writes to the buffers it was built from', () => {
        const blocks = Uint8Array.from([5, 0]);
        const data = Uint8Array.from([0, 0]);
        const volume = new Schematic(init({ blocks, data }));
        blocks[1] = 9;
        data[0] = 1;

        expect(volume.materialAt(0, 0, 0)).toBe(5);
        expect(volume.isFilled(1, 0, 0)).toBe(false);
    });

    it('reports whether the high-byte buffer is present', () => {
        expect(makeVolume().hasExtension).toBe(false);
        expect(makeVolume().data).toBeNull();
        expect(makeVolume(new Uint8Array(24)).hasExtension).toBe(true);
    });
});
