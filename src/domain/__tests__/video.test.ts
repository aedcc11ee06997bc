import { describe, it, expect } from "vitest";
import { normalizeVideo, parseRawVideo, unixSecondsToIso } from "../video";

describe("parseRawVideo", () => {
  it("keeps numeric identifiers as digit strings", () => {
    const record = parseRawVideo({ id: 42, create_time: 0, music_id: "7123456789012345678" });

    expect(record.id).toBe("42");
    expect(record.music_id).toBe("7123456789012345678");
  });

  it("requires create_time", () => {
    expect(() => parseRawVideo({ id: "1" })).toThrow();
  });
});

describe("normalizeVideo", () => {
  it("fills absent fields with null and converts create_time", () => {
    const video = normalizeVideo(parseRawVideo({ id: "1", create_time: 1700000000, username: "someone" }));

    expect(video.scalars).toEqual({
      create_time: "2023-11-14T22:13:20.000Z",
      username: "someone",
      region_code: null,
      video_description: null,
      music_id: null,
      like_count: null,
      comment_count: null,
      share_count: null,
      view_count: null,
      playlist_id: null,
      voice_to_text: null,
    });
    expect([...video.presentColumns].sort()).toEqual(["create_time", "username"]);
    expect(video.hashtagNames).toEqual([]);
    expect(video.effectIds).toEqual([]);
    expect(video.extraData).toBeNull();
  });

  it("deduplicates relation lists in first-seen order", () => {
    const video = normalizeVideo(
      parseRawVideo({
        id: "2",
        create_time: 0,
        hashtag_names: ["b", "a", "b"],
        effect_ids: ["101", 202, "101"],
      }),
    );

    expect(video.hashtagNames).toEqual(["b", "a"]);
    expect(video.effectIds).toEqual(["101", "202"]);
  });

  it("collects unknown keys into extraData", () => {
    const video = normalizeVideo(parseRawVideo({ id: "3", create_time: 0, is_stem_verified: true, favorites_count: 5 }));

    expect(video.extraData).toEqual({ is_stem_verified: true, favorites_count: 5 });
  });

  it("counts explicit nulls as present", () => {
    const video = normalizeVideo(parseRawVideo({ id: "4", create_time: 0, like_count: null }));

    expect(video.presentColumns.has("like_count")).toBe(true);
    expect(video.presentColumns.has("view_count")).toBe(false);
  });
});

describe("unixSecondsToIso", () => {
  it("formats epoch seconds as UTC", () => {
    expect(unixSecondsToIso(0)).toBe("1970-01-01T00:00:00.000Z");
  });
});
