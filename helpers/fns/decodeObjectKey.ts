const utf8 = new TextDecoder("utf-8");

/**
 * S3 notifications percent-encode object keys and send spaces as `+`.
 * Never throws: escapes that are not valid UTF-8 become U+FFFD and a `%`
 * not followed by two hex digits is kept as it is.
 */
export function decodeObjectKey(encodedKey: string) {
  return encodedKey
    .replace(/\+/g, " ")
    .replace(/(?:%[0-9a-fA-F]{2})+/g, (escapes) => {
      const bytes = escapes
        .slice(1)
        .split("%")
        .map((hex) => parseInt(hex, 16));

      return utf8.decode(Uint8Array.from(bytes));
    });
}
