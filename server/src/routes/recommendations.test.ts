import { describe, expect, it } from "vitest";
import { InvalidRequestError } from "../errors";
import { playlistSeedRequest, playlistTrackIds, toSeedRequest } from "./recommendations";

describe("toSeedRequest", () => {
    it("defaults to auto without seeds", () => {
        expect(toSeedRequest({ limit: 20 })).toEqual({ mode: "auto" });
    });

    it("switches to manual when seeds are given", () => {
        expect(toSeedRequest({ seeds: "artist:A1,track:T1", limit: 20 })).toEqual({
            mode: "manual",
            seeds: [
                { kind: "artist", id: "A1" },
                { kind: "track", id: "T1" },
            ],
        });
    });

    it("refuses seeds in auto mode", () => {
        expect(() => toSeedRequest({ mode: "auto", seeds: "artist:A1", limit: 20 })).toThrow(InvalidRequestError);
    });

    it("passes an explicit empty manual request through for the aggregator to reject", () => {
        expect(toSeedRequest({ mode: "manual", limit: 20 })).toEqual({ mode: "manual", seeds: [] });
    });
});

describe("playlistSeedRequest", () => {
    it("accepts bare ids, URIs and links", () => {
        const expected = { mode: "manual", seeds: [{ kind: "playlist", id: "37i9dQZF1DX" }] };
        expect(playlistSeedRequest("37i9dQZF1DX")).toEqual(expected);
        expect(playlistSeedRequest("spotify:playlist:37i9dQZF1DX")).toEqual(expected);
        expect(playlistSeedRequest("https://open.spotify.com/playlist/37i9dQZF1DX?si=x")).toEqual(expected);
    });

    it("rejects non-playlist references", () => {
        expect(() => playlistSeedRequest("track:T1")).toThrow("playlist_id: cannot read 'track:T1'");
        expect(() => playlistSeedRequest("not a playlist!")).toThrow(InvalidRequestError);
    });
});

describe("playlistTrackIds", () => {
    it("reads ids, URIs and links, skipping other kinds and collapsing repeats", () => {
        expect(
            playlistTrackIds([
                "4uLU6hMCjMI75M1A2tKUQC",
                "spotify:track:t2",
                "https://open.spotify.com/track/t3?si=x",
                "artist:A1",
                "not valid!",
                "t3",
            ])
        ).toEqual({ trackIds: ["4uLU6hMCjMI75M1A2tKUQC", "t2", "t3"], skipped: ["artist:A1", "not valid!"] });
    });
});
