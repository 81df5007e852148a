import { describe, expect, it } from "vitest";
import { InvalidRequestError } from "../errors";
import { parseSeeds, parseSeedToken } from "./seeds";

describe("parseSeedToken", () => {
    it("reads kind:id tokens, URIs and share links", () => {
        expect(parseSeedToken("track:abc123")).toEqual({ kind: "track", id: "abc123" });
        expect(parseSeedToken("TRACK:abc123")).toEqual({ kind: "track", id: "abc123" });
        expect(parseSeedToken("spotify:artist:XYZ789")).toEqual({ kind: "artist", id: "XYZ789" });
        expect(parseSeedToken("https://open.spotify.com/playlist/37i9dQZF1DX?si=abc")).toEqual({
            kind: "playlist",
            id: "37i9dQZF1DX",
        });
        expect(parseSeedToken("https://open.spotify.com/intl-de/track/abc")).toEqual({ kind: "track", id: "abc" });
    });

    it("returns undefined for anything else", () => {
        expect(parseSeedToken("album:abc")).toBeUndefined();
        expect(parseSeedToken("track:")).toBeUndefined();
        expect(parseSeedToken("   ")).toBeUndefined();
    });
});

describe("parseSeeds", () => {
    it("accepts comma lists, JSON arrays and repeated params", () => {
        expect(parseSeeds("track:a1, artist:b2")).toEqual([
            { kind: "track", id: "a1" },
            { kind: "artist", id: "b2" },
        ]);
        expect(parseSeeds('["track:a1","playlist:p1"]')).toEqual([
            { kind: "track", id: "a1" },
            { kind: "playlist", id: "p1" },
        ]);
        expect(parseSeeds(["track:a1", "track:a1", "artist:b2"])).toEqual([
            { kind: "track", id: "a1" },
            { kind: "artist", id: "b2" },
        ]);
    });

    it("returns nothing for missing or empty input", () => {
        expect(parseSeeds(undefined)).toEqual([]);
        expect(parseSeeds(",,")).toEqual([]);
    });

    it("names the token it cannot read", () => {
        expect(() => parseSeeds("track:a1,nonsense")).toThrow(
            new InvalidRequestError("seeds: cannot read 'nonsense' (use track:ID, artist:ID or playlist:ID)")
        );
    });

    it("rejects malformed JSON arrays", () => {
        expect(() => parseSeeds("[not json")).toThrow("seeds: malformed JSON array");
        expect(() => parseSeeds("[1,2]")).toThrow("seeds: expected an array of strings");
    });

    it("caps the number of seeds", () => {
        const many = Array.from({ length: 51 }, (_, i) => `track:t${i}`).join(",");
        expect(() => parseSeeds(many)).toThrow("seeds: at most 50 allowed");
    });
});
