/**
 * Query builder tests
 *
 * Covers include/exclude list translation, value normalization, field
 * validation and the JSON form sent to the API.
 */

import { describe, it, expect } from "vitest";
import {
  generateQuery,
  InvalidQueryError,
  makeCondition,
  makeQuery,
  normalizeHashtags,
  normalizeUsernames,
  parseQueryJson,
  serializeQuery,
} from "../query";

describe("generateQuery", () => {
  it("turns an any-list into one sorted, deduplicated IN condition", () => {
    const query = generateQuery({ includeAnyHashtags: ["#Cats", "dogs", "cats"] });

    expect(query).toEqual({
      and: [{ operation: "IN", field_name: "hashtag_name", field_values: ["cats", "dogs"] }],
    });
  });

  it("turns an all-list into one EQ condition per value", () => {
    const query = generateQuery({ includeAllKeywords: ["Zebra", "apple"] });

    expect(query.and).toEqual([
      { operation: "EQ", field_name: "keyword", field_values: ["apple"] },
      { operation: "EQ", field_name: "keyword", field_values: ["zebra"] },
    ]);
  });

  it("prefers the any-list when both are given for a field", () => {
    const query = generateQuery({ includeAnyHashtags: ["a"], includeAllHashtags: ["b", "c"] });

    expect(query.and).toEqual([{ operation: "IN", field_name: "hashtag_name", field_values: ["a"] }]);
  });

  it("puts exclusions under not", () => {
    const query = generateQuery({
      includeAnyKeywords: ["election"],
      excludeAnyHashtags: ["#Spam"],
      excludeFromUsernames: ["@Bot"],
    });

    expect(query.and).toEqual([{ operation: "IN", field_name: "keyword", field_values: ["election"] }]);
    expect(query.not).toEqual([
      { operation: "IN", field_name: "hashtag_name", field_values: ["spam"] },
      { operation: "IN", field_name: "username", field_values: ["bot"] },
    ]);
  });

  it("upper-cases region codes into an IN condition", () => {
    const query = generateQuery({ includeAnyKeywords: ["news"], regionCodes: ["us", "ca", "US"] });

    expect(query.and?.[1]).toEqual({ operation: "IN", field_name: "region_code", field_values: ["CA", "US"] });
  });

  it("rejects unknown region codes", () => {
    expect(() => generateQuery({ regionCodes: ["QQ"] })).toThrow(InvalidQueryError);
  });

  it("rejects a query with no conditions", () => {
    expect(() => generateQuery({})).toThrow(InvalidQueryError);
  });
});

describe("normalizers", () => {
  it("strips leading # from hashtags", () => {
    expect(normalizeHashtags(["##Tag", "tag", "Other"])).toEqual(["other", "tag"]);
  });

  it("strips @ from both ends of usernames", () => {
    expect(normalizeUsernames(["@Alice@", "bob", "@@bob"])).toEqual(["alice", "bob"]);
  });
});

describe("makeCondition", () => {
  it("wraps a single value in a list", () => {
    expect(makeCondition("video_length", "SHORT", "EQ")).toEqual({
      operation: "EQ",
      field_name: "video_length",
      field_values: ["SHORT"],
    });
  });

  it("rejects an unknown video length", () => {
    expect(() => makeCondition("video_length", "TINY", "EQ")).toThrow('Invalid value "TINY" for field video_length');
  });

  it("rejects create dates that are not calendar days", () => {
    expect(() => makeCondition("create_date", ["20240230"], "GTE")).toThrow(InvalidQueryError);
  });

  it("rejects an empty value list", () => {
    expect(() => makeCondition("keyword", [], "IN")).toThrow("Condition on keyword has no values");
  });
});

describe("serializeQuery", () => {
  it("writes keys in API order and leaves out absent lists", () => {
    const query = makeQuery({
      or: [{ field_values: ["x"], field_name: "keyword", operation: "IN" }],
    });

    expect(serializeQuery(query)).toBe('{"or":[{"operation":"IN","field_name":"keyword","field_values":["x"]}]}');
  });
});

describe("parseQueryJson", () => {
  it("validates and normalizes a query file", () => {
    const query = parseQueryJson(
      JSON.stringify({
        and: [{ operation: "EQ", field_name: "region_code", field_values: "US" }],
        not: [],
      }),
    );

    expect(query).toEqual({
      and: [{ operation: "EQ", field_name: "region_code", field_values: ["US"] }],
    });
  });

  it("rejects unknown operations", () => {
    expect(() =>
      parseQueryJson('{"and":[{"operation":"LIKE","field_name":"keyword","field_values":["x"]}]}'),
    ).toThrow();
  });
});
