// Keys whose values are 64-bit integers on the wire and exceed Number precision.
const RESPONSE_IDENTIFIER_KEYS = ["id", "video_id", "music_id", "playlist_id", "parent_comment_id", "search_id"];
const REQUEST_IDENTIFIER_KEYS = ["video_id"];

const UNQUOTED_IDENTIFIER = new RegExp(
  `"(${RESPONSE_IDENTIFIER_KEYS.join("|")})"(\\s*):(\\s*)(-?\\d+)(?=\\s*[,}\\]])`,
  "g",
);
const QUOTED_IDENTIFIER = new RegExp(`"(${REQUEST_IDENTIFIER_KEYS.join("|")})":"(\\d+)"`, "g");

/**
 * Parses an API body with identifier values turned into digit strings before
 * JSON.parse can round them. Throws SyntaxError for bodies that are not JSON.
 */
export function parseApiJson(text: string): unknown {
  return JSON.parse(text.replace(UNQUOTED_IDENTIFIER, '"$1"$2:$3"$4"'));
}

/** Request-side counterpart: digit-string video ids go out as JSON numbers. */
export function stringifyApiJson(value: unknown): string {
  return JSON.stringify(value).replace(QUOTED_IDENTIFIER, '"$1":$2');
}
