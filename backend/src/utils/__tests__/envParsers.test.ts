import { parseEnvInt } from "../envParsers";

describe("parseEnvInt", () => {
    it("parses base-10 integers", () => {
        expect(parseEnvInt("42", 1)).toBe(42);
        expect(parseEnvInt(" 7 ", 1)).toBe(7);
        expect(parseEnvInt("08", 1)).toBe(8);
    });

    it("falls back on empty or non-numeric values", () => {
        expect(parseEnvInt(undefined, 5)).toBe(5);
        expect(parseEnvInt("   ", 5)).toBe(5);
        expect(parseEnvInt("abc", 5)).toBe(5);
    });
});
