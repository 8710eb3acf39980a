/**
 * Source Text
 *
 * tree-sitter's Node binding reports indices and columns in UTF-16 code
 * units, while outlines carry UTF-8 byte offsets. SourceText keeps the
 * encoded bytes of one input and translates between the two.
 */

const decoder = new TextDecoder('utf-8', { fatal: true });

export class SourceText {
    /** UTF-16 index -> byte offset, null when the text is pure ASCII */
    private readonly offsets: Uint32Array | null;

    private constructor(
        readonly text: string,
        private readonly bytes: Buffer,
    ) {
        this.offsets = bytes.length === text.length ? null : buildOffsetTable(text);
    }

    static fromString(text: string): SourceText {
        return new SourceText(text, Buffer.from(text, 'utf8'));
    }

    get byteLength(): number {
        return this.bytes.length;
    }

    /**
     * Byte offset of a UTF-16 index. Indices past the end clamp to the
     * byte length.
     */
    byteOffset(utf16Index: number): number {
        if (utf16Index <= 0) return 0;
        if (utf16Index >= this.text.length) return this.bytes.length;
        return this.offsets ? this.offsets[utf16Index] : utf16Index;
    }

    /**
     * Byte column of a position, given its absolute UTF-16 index and its
     * UTF-16 column within the line.
     */
    byteColumn(utf16Index: number, utf16Column: number): number {
        return this.byteOffset(utf16Index) - this.byteOffset(utf16Index - utf16Column);
    }

    /**
     * Decode the bytes in [start, end). Out-of-range bounds and slices that
     * split a multi-byte sequence yield "".
     */
    sliceBytes(start: number, end: number): string {
        if (start < 0 || end > this.bytes.length || start > end) {
            return '';
        }
        try {
            return decoder.decode(this.bytes.subarray(start, end));
        } catch {
            return '';
        }
    }
}

function buildOffsetTable(text: string): Uint32Array {
    const table = new Uint32Array(text.length + 1);
    let bytes = 0;
    for (let i = 0; i < text.length; i++) {
        table[i] = bytes;
        const unit = text.charCodeAt(i);
        if (unit < 0x80) {
            bytes += 1;
        } else if (unit < 0x800) {
            bytes += 2;
        } else if (unit >= 0xd800 && unit <= 0xdbff && isLowSurrogate(text.charCodeAt(i + 1))) {
            // Surrogate pair: 4 bytes, the low half maps inside the sequence
            table[i + 1] = bytes + 2;
            bytes += 4;
            i++;
        } else {
            bytes += 3;
        }
    }
    table[text.length] = bytes;
    return table;
}

function isLowSurrogate(unit: number): boolean {
    return unit >= 0xdc00 && unit <= 0xdfff;
}
