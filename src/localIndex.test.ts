import { describe, expect, it } from "vitest";
import { ConfigurationError } from "./errors.js";
import { LocalIndex } from "./localIndex.js";
import { cosineSimilarity, normalize } from "./vectorMath.js";
import type { VectorRecord } from "./vectorRecord.js";

const record = (id: string, vector: number[], metadata: VectorRecord["metadata"] = {}): VectorRecord => ({
    id,
    vector,
    text: `text ${id}`,
    metadata,
});

describe("LocalIndex", () => {
    it("ranks by cosine similarity", () => {
        const index = new LocalIndex(3);
        index.insertMany([record("A", [1, 0, 0]), record("B", [0, 1, 0]), record("C", [0.9, 0.1, 0])]);

        const results = index.search([1, 0, 0], 2);

        expect(results.map((result) => result.text)).toEqual(["text A", "text C"]);
        expect(results[0]?.score).toBeCloseTo(1, 10);
        expect(results[1]?.score).toBeCloseTo(0.9 / Math.sqrt(0.82), 10);
        expect(results[1]?.score).toBeCloseTo(0.994, 3);
    });

    it("finds a record first when queried with its own vector", () => {
        const index = new LocalIndex(4);
        index.insert(record("x", [0.2, 0.4, 0.1, 0.9], { source: "notes.md", type: "file" }));
        index.insert(record("y", [0.9, 0.1, 0.3, 0.0]));

        const [best] = index.search([0.2, 0.4, 0.1, 0.9], 1);

        expect(best?.text).toBe("text x");
        expect(best?.score).toBeCloseTo(1, 10);
        expect(best?.metadata).toEqual({ source: "notes.md", type: "file" });
    });

    it("breaks ties by insertion order", () => {
        const index = new LocalIndex(2);
        index.insertMany([record("first", [1, 0]), record("second", [2, 0]), record("other", [0, 1])]);

        expect(index.search([5, 0], 3).map((result) => result.text)).toEqual(["text first", "text second", "text other"]);
    });

    it("reports negative similarity for opposite vectors", () => {
        const index = new LocalIndex(2);
        index.insert(record("a", [1, 0]));
        expect(index.search([-3, 0], 1)[0]?.score).toBeCloseTo(-1, 10);
    });

    it("returns an empty list when empty", () => {
        expect(new LocalIndex(3).search([1, 0, 0], 5)).toEqual([]);
    });

    it("rejects a dimension mismatch without changing the index", () => {
        const index = new LocalIndex(3);
        index.insert(record("ok", [1, 0, 0]));

        expect(() => index.insert(record("short", [1, 0]))).toThrow(ConfigurationError);
        expect(() => index.insertMany([record("fine", [0, 1, 0]), record("long", [1, 0, 0, 0])])).toThrow(ConfigurationError);
        expect(index.size).toBe(1);
        expect(index.has("fine")).toBe(false);
    });

    it("rejects zero vectors and duplicate ids", () => {
        const index = new LocalIndex(2);
        index.insert(record("a", [1, 1]));

        expect(() => index.insert(record("zero", [0, 0]))).toThrow(ConfigurationError);
        expect(() => index.insert(record("a", [1, 0]))).toThrow(ConfigurationError);
        expect(index.size).toBe(1);
    });

    it("validates the query", () => {
        const index = new LocalIndex(2);
        index.insert(record("a", [1, 1]));

        expect(() => index.search([1, 1, 1], 1)).toThrow(ConfigurationError);
        expect(() => index.search([0, 0], 1)).toThrow(ConfigurationError);
        expect(() => index.search([1, 1], 0)).toThrow(ConfigurationError);
    });

    it("looks records up by id and clears", () => {
        const index = new LocalIndex(2);
        index.insert(record("a", [1, 2]));

        expect(index.get("a")?.vector).toEqual([1, 2]);
        expect(index.get("missing")).toBeUndefined();

        index.clear();
        expect(index.size).toBe(0);
        expect(index.has("a")).toBe(false);
        expect(index.search([1, 2], 1)).toEqual([]);
    });

    it("keeps its own copy of inserted vectors", () => {
        const index = new LocalIndex(2);
        const vector = [1, 0];
        index.insert(record("a", vector));
        vector[0] = 0;
        vector[1] = 1;

        expect(index.search([1, 0], 1)[0]?.score).toBeCloseTo(1, 10);
    });

    it("rejects a non-positive dimension", () => {
        expect(() => new LocalIndex(0)).toThrow(ConfigurationError);
    });
});

describe("vector math", () => {
    it("normalizes to unit length", () => {
        expect(normalize([3, 4])).toEqual([0.6, 0.8]);
        expect(() => normalize([0, 0, 0])).toThrow(ConfigurationError);
    });

    it("refuses to compare vectors of different lengths", () => {
        expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(ConfigurationError);
    });
});
