import { describe, expect, it } from "vitest";
import { cleanSearchText, slug, songArtistKey } from "./text";

describe("slug", () => {
    it("drops bracketed credits and normalizes ampersands", () => {
        expect(slug("Sorry (feat. X) & Co")).toBe("sorry and co");
    });

    it("collapses punctuation and whitespace", () => {
        expect(slug("  Don't   Stop!! ")).toBe("don t stop");
    });
});

describe("songArtistKey", () => {
    it("treats re-releases with different decorations as the same song", () => {
        expect(songArtistKey("Blue Hour (Remastered)", "The Band")).toBe(songArtistKey("Blue Hour", "the band"));
        expect(songArtistKey("Hello!", "The Band")).toBe("hello||the band");
    });
});

describe("cleanSearchText", () => {
    it("strips featuring credits and bracketed tags", () => {
        expect(cleanSearchText("Song (feat. Someone) [Remastered 2011]")).toBe("Song");
        expect(cleanSearchText("Two  Words (Live)")).toBe("Two Words (Live)");
    });
});
