/**
 * Outline Serializer
 *
 * Writes an OutlineFile as pretty JSON with a fixed key order and reads it
 * back through zod. Wire nodes carry no discriminant; the strict schemas
 * below keep the container and terminal shapes disjoint, which is what
 * makes the shape alone decisive. Adding an optional field shared by both
 * shapes would break that.
 */

import { z } from 'zod';
import { OutlineError } from '../common/errors';
import {
    ByteSpan,
    LocationSpan,
    OUTLINE_FORMAT_VERSION,
    OutlineFile,
    OutlineNode,
    ParsingError,
} from './types';

// ============================================================================
// Wire Schemas
// ============================================================================

const LinePointSchema = z.tuple([z.number().int(), z.number().int()]);
const ByteSpanSchema = z.tuple([z.number().int(), z.number().int()]);

const LocationSpanSchema = z.object({
    start: LinePointSchema,
    end: LinePointSchema,
}).strict();

const ParsingErrorSchema = z.object({
    location: LocationSpanSchema,
    message: z.string(),
}).strict();

interface WireContainer {
    type: string;
    name: string;
    locationSpan: LocationSpan;
    headerSpan: ByteSpan;
    footerSpan: ByteSpan;
    children: WireNode[];
}

interface WireTerminal {
    type: string;
    name: string;
    locationSpan: LocationSpan;
    span: ByteSpan;
}

type WireNode = WireContainer | WireTerminal;

const WireTerminalSchema: z.ZodType<WireTerminal> = z.object({
    type: z.string(),
    name: z.string(),
    locationSpan: LocationSpanSchema,
    span: ByteSpanSchema,
}).strict();

const WireContainerSchema: z.ZodType<WireContainer> = z.lazy(() => z.object({
    type: z.string(),
    name: z.string(),
    locationSpan: LocationSpanSchema,
    headerSpan: ByteSpanSchema,
    footerSpan: ByteSpanSchema,
    children: z.array(WireNodeSchema),
}).strict());

const WireNodeSchema: z.ZodType<WireNode> = z.lazy(() =>
    z.union([WireContainerSchema, WireTerminalSchema])
);

export const OutlineFileSchema = z.object({
    type: z.literal('file'),
    name: z.string(),
    locationSpan: LocationSpanSchema,
    footerSpan: ByteSpanSchema,
    parsingErrorsDetected: z.boolean(),
    children: z.array(WireNodeSchema),
    parsingError: ParsingErrorSchema.nullable(),
    formatVersion: z.literal(OUTLINE_FORMAT_VERSION),
}).strict();

// ============================================================================
// Model <-> Wire
// ============================================================================

function copyLocation(span: LocationSpan): LocationSpan {
    return {
        start: [span.start[0], span.start[1]],
        end: [span.end[0], span.end[1]],
    };
}

function copyByteSpan(span: ByteSpan): ByteSpan {
    return [span[0], span[1]];
}

function copyParsingError(error: ParsingError): ParsingError {
    return { location: copyLocation(error.location), message: error.message };
}

function toWire(node: OutlineNode): WireNode {
    if (node.variant === 'container') {
        return {
            type: node.type,
            name: node.name,
            locationSpan: copyLocation(node.locationSpan),
            headerSpan: copyByteSpan(node.headerSpan),
            footerSpan: copyByteSpan(node.footerSpan),
            children: node.children.map(toWire),
        };
    }
    return {
        type: node.type,
        name: node.name,
        locationSpan: copyLocation(node.locationSpan),
        span: copyByteSpan(node.span),
    };
}

function fromWire(node: WireNode): OutlineNode {
    if ('children' in node) {
        return {
            variant: 'container',
            type: node.type,
            name: node.name,
            locationSpan: copyLocation(node.locationSpan),
            headerSpan: copyByteSpan(node.headerSpan),
            footerSpan: copyByteSpan(node.footerSpan),
            children: node.children.map(fromWire),
        };
    }
    return {
        variant: 'terminal',
        type: node.type,
        name: node.name,
        locationSpan: copyLocation(node.locationSpan),
        span: copyByteSpan(node.span),
    };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Render an outline as a pretty-printed JSON document.
 */
export function serializeOutline(file: OutlineFile): string {
    const wire = {
        type: file.type,
        name: file.name,
        locationSpan: copyLocation(file.locationSpan),
        footerSpan: copyByteSpan(file.footerSpan),
        parsingErrorsDetected: file.parsingErrorsDetected,
        children: file.children.map(toWire),
        parsingError: file.parsingError ? copyParsingError(file.parsingError) : null,
        formatVersion: file.formatVersion,
    };
    return JSON.stringify(wire, null, 2);
}

/**
 * Parse and validate a document produced by serializeOutline.
 *
 * @throws OutlineError InvalidOutlineDocument
 */
export function deserializeOutline(text: string): OutlineFile {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new OutlineError('InvalidOutlineDocument', 'document is not valid JSON', error);
    }

    const parsed = OutlineFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new OutlineError('InvalidOutlineDocument', `Validation failed: ${issues.join(', ')}`, parsed.error);
    }

    const doc = parsed.data;
    return {
        type: doc.type,
        name: doc.name,
        locationSpan: copyLocation(doc.locationSpan),
        footerSpan: copyByteSpan(doc.footerSpan),
        parsingErrorsDetected: doc.parsingErrorsDetected,
        children: doc.children.map(fromWire),
        parsingError: doc.parsingError ? copyParsingError(doc.parsingError) : null,
        formatVersion: doc.formatVersion,
    };
}
