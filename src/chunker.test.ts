import { describe, expect, it } from "vitest";
import { Chunker, splitText } from "./chunker.js";
import { ConfigurationError } from "./errors.js";

const SENTENCES = "Sentence one. Sentence two. Sentence three.";

describe("splitText", () => {
    it("returns one trimmed chunk for text shorter than the window", () => {
        expect(splitText("  hello world  ", 100, 10)).toEqual([{ text: "hello world", index: 0 }]);
    });

    it("ends windows on a sentence boundary in their second half", () => {
        const chunks = splitText(SENTENCES, 20, 5);

        expect(chunks.map((chunk) => chunk.text)).toEqual([
            "Sentence one.",
            "one. Sentence two.",
            "two. Sentence three",
            "three.",
        ]);
        expect(chunks.map((chunk) => chunk.index)).toEqual([0, 1, 2, 3]);
    });

    it("accepts a terminator exactly at the window midpoint", () => {
        expect(splitText("abcde.ghijklmnopq", 10, 0).map((chunk) => chunk.text)).toEqual([
            "abcde.",
            "ghijklmnop",
            "q",
        ]);
    });

    it("ignores a terminator in the first half of the window", () => {
        expect(splitText("ab. cdefghijklmnop", 10, 0).map((chunk) => chunk.text)).toEqual([
            "ab. cdefgh",
            "ijklmnop",
        ]);
    });

    it("cuts at the window size when there is no terminator", () => {
        const chunks = splitText("a".repeat(25), 10, 2);
        expect(chunks.map((chunk) => chunk.text.length)).toEqual([10, 10, 9]);
    });

    it("counts characters outside the basic plane as one and never splits them", () => {
        expect(splitText("😀".repeat(6), 3, 0).map((chunk) => chunk.text)).toEqual(["😀😀😀", "😀😀😀"]);
        expect(splitText("a😀b😀c", 2, 0).map((chunk) => chunk.text)).toEqual(["a😀", "b😀", "c"]);
        expect(splitText("😀😀😀😀", 3, 1).map((chunk) => chunk.text)).toEqual(["😀😀😀", "😀😀"]);
    });

    it("drops empty and whitespace-only pieces", () => {
        expect(splitText("", 10, 0)).toEqual([]);
        expect(splitText("     ", 10, 0)).toEqual([]);
    });

    it("terminates with bounded chunks for any valid window", () => {
        const text = "Lorem ipsum dolor sit amet. Consectetur adipiscing elit sed do. ".repeat(40);
        for (const [size, overlap] of [[1, 0], [7, 6], [50, 0], [64, 63], [200, 100], [5000, 10]] as const) {
            const chunks = splitText(text, size, overlap);
            expect(chunks.length).toBeGreaterThan(0);
            for (const chunk of chunks) {
                expect(chunk.text.length).toBeLessThanOrEqual(size);
                expect(chunk.text.trim()).toBe(chunk.text);
            }
        }
    });

    it("rejects invalid windows before doing any work", () => {
        expect(() => splitText(SENTENCES, 10, 10)).toThrow(ConfigurationError);
        expect(() => splitText(SENTENCES, 10, 20)).toThrow(ConfigurationError);
        expect(() => splitText(SENTENCES, 0, 0)).toThrow(ConfigurationError);
        expect(() => splitText(SENTENCES, 10, -1)).toThrow(ConfigurationError);
    });
});

describe("Chunker", () => {
    it("keeps documents at or below the threshold whole", () => {
        const chunker = new Chunker({ size: 20, overlap: 5, threshold: 100 });
        expect(chunker.prepare(`  ${SENTENCES}`)).toEqual([{ text: SENTENCES, index: 0 }]);
    });

    it("measures the threshold in characters", () => {
        const chunker = new Chunker({ size: 2, overlap: 0, threshold: 3 });
        expect(chunker.prepare("😀😀😀")).toEqual([{ text: "😀😀😀", index: 0 }]);
    });

    it("splits documents above the threshold", () => {
        const chunker = new Chunker({ size: 20, overlap: 5, threshold: 30 });
        expect(chunker.prepare(SENTENCES)).toHaveLength(4);
    });

    it("returns nothing for a blank document", () => {
        expect(new Chunker().prepare("   \n ")).toEqual([]);
    });

    it("rejects an overlap that is not smaller than the size", () => {
        expect(() => new Chunker({ size: 100, overlap: 100 })).toThrow(ConfigurationError);
    });
});
