import { describe, it, expect } from "vitest";
import { parseData, parseErrorCorrection, parseQuietZone, parseQrRequest } from "./validation.js";

describe("parseData", () => {
    it("requires non-empty data", () => {
        expect(parseData(undefined)).toEqual({ error: 'Missing data. Pass the text to encode as "data".' });
        expect(parseData("")).toEqual({ error: 'Missing data. Pass the text to encode as "data".' });
    });

    it("limits data length", () => {
        expect(parseData("x".repeat(2048))).toEqual({ data: "x".repeat(2048) });
        expect(parseData("x".repeat(2049))).toEqual({ error: "Data too long: 2049 characters. Maximum is 2048." });
    });
});

describe("parseErrorCorrection", () => {
    it("defaults to M and accepts either case", () => {
        expect(parseErrorCorrection(undefined)).toEqual({ errorCorrectionLevel: "M" });
        expect(parseErrorCorrection("q")).toEqual({ errorCorrectionLevel: "Q" });
    });

    it("rejects unknown levels", () => {
        expect(parseErrorCorrection("X")).toEqual({
            error: 'Invalid error correction level: "X". Must be one of L, M, Q, H.',
        });
    });
});

describe("parseQuietZone", () => {
    it("defaults to four modules", () => {
        expect(parseQuietZone(undefined)).toEqual({ quietZone: 4 });
    });

    it("accepts integers 0-16", () => {
        expect(parseQuietZone("0")).toEqual({ quietZone: 0 });
        expect(parseQuietZone("16")).toEqual({ quietZone: 16 });
    });

    it.each(["17", "-1", "1.5", "two"])("rejects %s", (raw) => {
        expect(parseQuietZone(raw)).toEqual({ error: `Invalid quiet zone: "${raw}". Must be an integer 0-16.` });
    });
});

describe("parseQrRequest", () => {
    it("combines all parameters", () => {
        expect(parseQrRequest({ data: "hi", ec: "h", quiet: "2" })).toEqual({
            request: { data: "hi", errorCorrectionLevel: "H", quietZone: 2 },
        });
    });

    it("reports the first invalid parameter", () => {
        expect(parseQrRequest({ data: "hi", ec: "Z", quiet: "99" })).toEqual({
            error: 'Invalid error correction level: "Z". Must be one of L, M, Q, H.',
        });
    });
});
