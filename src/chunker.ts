import type { Chunk } from "./chunk.js";
import { type ChunkingOptions, DEFAULT_CHUNKING_OPTIONS } from "./chunkOptions.js";
import { ConfigurationError } from "./errors.js";

const SENTENCE_TERMINATOR = ".";

function assertWindow(size: number, overlap: number): void {
    if (!Number.isInteger(size) || size <= 0) {
        throw new ConfigurationError(`Chunk size must be a positive integer, got ${size}.`);
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
        throw new ConfigurationError(`Chunk overlap must be a non-negative integer, got ${overlap}.`);
    }
    if (overlap >= size) {
        throw new ConfigurationError(`Chunk overlap (${overlap}) must be smaller than chunk size (${size}).`);
    }
}

/**
 * Splits text into overlapping windows of at most `size` characters.
 * Characters are code points, so a window never cuts a surrogate pair.
 * A window that stops short of the end of the text is pulled back to just after
 * its last sentence terminator, provided that terminator sits in the second half
 * of the window.
 * @throws {ConfigurationError} When `size` or `overlap` are out of range.
 */
export function splitText(text: string, size: number, overlap: number): Chunk[] {
    assertWindow(size, overlap);

    const chars = Array.from(text);
    const chunks: Chunk[] = [];
    const length = chars.length;
    let start = 0;

    while (start < length) {
        let end = Math.min(start + size, length);

        if (end < length) {
            const lastTerminator = chars.slice(start, end).lastIndexOf(SENTENCE_TERMINATOR);
            if (lastTerminator >= Math.floor(size / 2)) {
                end = start + lastTerminator + 1;
            }
        }

        const piece = chars.slice(start, end).join("").trim();
        if (piece.length > 0) {
            chunks.push({ text: piece, index: chunks.length });
        }

        if (end >= length) {
            break;
        }

        const next = end - overlap;
        // Near the end of the text the overlap can swallow the whole step.
        start = next > start ? next : end;
    }

    return chunks;
}

/**
 * Applies the document chunking policy: short documents are kept whole,
 * long ones are split with {@link splitText}.
 */
export class Chunker {
    private readonly options: ChunkingOptions;

    /**
     * @param options Overrides for {@link DEFAULT_CHUNKING_OPTIONS}.
     * @throws {ConfigurationError} When the resulting window is invalid.
     */
    constructor(options: Partial<ChunkingOptions> = {}) {
        this.options = { ...DEFAULT_CHUNKING_OPTIONS, ...options };
        assertWindow(this.options.size, this.options.overlap);
        if (!Number.isInteger(this.options.threshold) || this.options.threshold < 0) {
            throw new ConfigurationError(`Chunking threshold must be a non-negative integer, got ${this.options.threshold}.`);
        }
    }

    /** Splits `text` using this chunker's window. */
    chunk(text: string): Chunk[] {
        return splitText(text, this.options.size, this.options.overlap);
    }

    /**
     * Returns the chunks to store for one extracted document.
     * Text at or below the threshold becomes a single chunk.
     */
    prepare(text: string): Chunk[] {
        const length = Array.from(text).length;
        if (length <= this.options.threshold) {
            const trimmed = text.trim();
            return trimmed.length > 0 ? [{ text: trimmed, index: 0 }] : [];
        }

        const chunks = this.chunk(text);
        console.log(`Text is long (${length} chars), split into ${chunks.length} chunks.`);
        return chunks;
    }
}
