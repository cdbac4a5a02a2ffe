import { TagKind, TAG_KIND_NAMES, SCHEMATIC_ROOT_NAME, SUPPORTED_MATERIALS } from './format.js';
import { ParserStateError, SchemaViolationError } from './errors.js';
import { TagReader } from './tag-reader.js';
import { Schematic, type Entity } from './volume.js';
import { resolveDecoderOptions, type SchematicDecoderOptions } from './types.js';

interface SchematicDraft {
    width: number;
    length: number;
    height: number;
    offsetX: number;
    offsetY: number;
    offsetZ: number;
    materials: string;
    blocks: Uint8Array | null;
    data: Uint8Array | null;
    entities: Entity[];
}

interface EntityDraft {
    id: string;
}

interface RootField {
    kind: TagKind;
    read(reader: TagReader, draft: SchematicDraft, parser: SchematicParser): void;
}

interface EntityField {
    kind: TagKind;
    read(reader: TagReader, entity: EntityDraft): void;
}

/** Members of the root `Schematic` compound. Anything else is rejected. */
const ROOT_FIELDS: ReadonlyMap<string, RootField> = new Map<string, RootField>([
    ['Width', { kind: TagKind.SHORT, read: (r, d) => { d.width = r.readShort(); } }],
    ['Length', { kind: TagKind.SHORT, read: (r, d) => { d.length = r.readShort(); } }],
    ['Height', { kind: TagKind.SHORT, read: (r, d) => { d.height = r.readShort(); } }],
    ['Materials', { kind: TagKind.STRING, read: (r, d) => { d.materials = r.readString(); } }],
    ['Blocks', { kind: TagKind.BYTE_ARRAY, read: (r, d) => { d.blocks = r.readByteArray(); } }],
    ['Data', { kind: TagKind.BYTE_ARRAY, read: (r, d) => { d.data = r.readByteArray(); } }],
    ['WEOffsetX', { kind: TagKind.INT, read: (r, d) => { d.offsetX = r.readInt(); } }],
    ['WEOffsetY', { kind: TagKind.INT, read: (r, d) => { d.offsetY = r.readInt(); } }],
    ['WEOffsetZ', { kind: TagKind.INT, read: (r, d) => { d.offsetZ = r.readInt(); } }],
    ['Entities', { kind: TagKind.LIST, read: (_r, d, p) => { d.entities = p.parseEntityList(); } }],
]);

// No entity member is recognised in strict mode.
const STRICT_ENTITY_FIELDS: ReadonlyMap<string, EntityField> = new Map();

const LENIENT_ENTITY_FIELDS: ReadonlyMap<string, EntityField> = new Map<string, EntityField>([
    ['id', { kind: TagKind.STRING, read: (r, e) => { e.id = r.readString(); } }],
]);

export type ParserState = 'expect-root' | 'reading-fields' | 'expect-variant-check' | 'done' | 'failed';

/**
 * Recursive-descent parser for the Schematic document. Single use: one
 * parser consumes one tag stream.
 */
export class SchematicParser {
    private readonly options: Required<SchematicDecoderOptions>;
    private readonly entityFields: ReadonlyMap<string, EntityField>;
    private currentState: ParserState = 'expect-root';

    constructor(private readonly reader: TagReader, options: SchematicDecoderOptions = {}) {
        this.options = resolveDecoderOptions(options);
        this.entityFields = this.options.entityMode === 'skip' ? LENIENT_ENTITY_FIELDS : STRICT_ENTITY_FIELDS;
    }

    get state(): ParserState {
        return this.currentState;
    }

    parseDocument(): Schematic {
        if (this.currentState !== 'expect-root') {
            throw new ParserStateError(`SchematicParser already used (state: ${this.currentState})`);
        }
        try {
            const schematic = this.parseRoot();
            this.currentState = 'done';
            return schematic;
        } catch (err) {
            this.currentState = 'failed';
            throw err;
        }
    }

    parseEntityList(): Entity[] {
        const entities: Entity[] = [];
        for (;;) {
            const kindOffset = this.reader.offset;
            const kind = this.reader.readTagKind();
            if (kind === TagKind.END) break;
            if (kind !== TagKind.COMPOUND) {
                throw new SchemaViolationError(
                    `Entity list element must be Compound, got ${TAG_KIND_NAMES[kind]}`,
                    { offset: kindOffset, tagKind: kind }
                );
            }
            entities.push(this.parseEntity());
        }
        return entities;
    }

    parseEntity(): Entity {
        const entity: EntityDraft = { id: '' };
        for (;;) {
            const headerOffset = this.reader.offset;
            const header = this.reader.readTagHeader();
            if (header.kind === TagKind.END) break;

            const field = this.entityFields.get(header.name);
            if (field !== undefined && field.kind === header.kind) {
                field.read(this.reader, entity);
                continue;
            }
            if (this.options.entityMode === 'strict') {
                throw new SchemaViolationError(`Unknown entity field: ${header.name}`, {
                    offset: headerOffset,
                    tagName: header.name,
                    tagKind: header.kind,
                });
            }
            this.options.logger?.warn?.(
                `Skipping entity field ${header.name} (${TAG_KIND_NAMES[header.kind]}) at offset ${headerOffset}`
            );
            this.reader.skipPayload(header.kind, 1);
        }
        return entity;
    }

    private parseRoot(): Schematic {
        const root = this.reader.readTagHeader();
        if (root.kind !== TagKind.COMPOUND) {
            throw new SchemaViolationError(`Top level tag must be Compound, got ${TAG_KIND_NAMES[root.kind]}`, {
                offset: 0,
                tagKind: root.kind,
            });
        }
        if (root.name !== SCHEMATIC_ROOT_NAME) {
            throw new SchemaViolationError(`Unexpected root tag name: ${root.name}, want: ${SCHEMATIC_ROOT_NAME}`, {
                offset: 0,
                tagName: root.name,
                tagKind: root.kind,
            });
        }

        this.currentState = 'reading-fields';
        const draft: SchematicDraft = {
            width: 0,
            length: 0,
            height: 0,
            offsetX: 0,
            offsetY: 0,
            offsetZ: 0,
            materials: '',
            blocks: null,
            data: null,
            entities: [],
        };

        for (;;) {
            const headerOffset = this.reader.offset;
            const header = this.reader.readTagHeader();
            if (header.kind === TagKind.END) break;

            const field = ROOT_FIELDS.get(header.name);
            if (field === undefined) {
                throw new SchemaViolationError(
                    `Unexpected tag: ${TAG_KIND_NAMES[header.kind]}, name: ${header.name}`,
                    { offset: headerOffset, tagName: header.name, tagKind: header.kind }
                );
            }
            if (field.kind !== header.kind) {
                throw new SchemaViolationError(
                    `Field ${header.name} must be ${TAG_KIND_NAMES[field.kind]}, got ${TAG_KIND_NAMES[header.kind]}`,
                    { offset: headerOffset, tagName: header.name, tagKind: header.kind }
                );
            }
            field.read(this.reader, draft, this);
        }

        this.currentState = 'expect-variant-check';
        if (!this.reader.atEnd) {
            throw new SchemaViolationError(`${this.reader.remaining} trailing bytes after root compound`, {
                offset: this.reader.offset,
            });
        }
        return this.finish(draft);
    }

    private finish(draft: SchematicDraft): Schematic {
        if (draft.materials !== SUPPORTED_MATERIALS) {
            throw new SchemaViolationError(
                `Materials must have '${SUPPORTED_MATERIALS}' value, got: '${draft.materials}'`,
                { tagName: 'Materials', tagKind: TagKind.STRING }
            );
        }
        // Dimension and buffer length checks live in the Schematic constructor.
        return new Schematic({
            width: draft.width,
            length: draft.length,
            height: draft.height,
            offsetX: draft.offsetX,
            offsetY: draft.offsetY,
            offsetZ: draft.offsetZ,
            materials: draft.materials,
            blocks: draft.blocks ?? new Uint8Array(0),
            data: draft.data,
            entities: draft.entities,
        });
    }
}

/**
 * Parses an already-decompressed tag stream into a Schematic.
 */
export function parseSchematic(raw: Uint8Array, options: SchematicDecoderOptions = {}): Schematic {
    const resolved = resolveDecoderOptions(options);
    const reader = new TagReader(raw, { maxArrayLength: resolved.maxArrayLength, maxDepth: resolved.maxDepth });
    return new SchematicParser(reader, resolved).parseDocument();
}
