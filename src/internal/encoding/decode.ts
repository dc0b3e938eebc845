export type BomEncoding = "utf-8" | "utf-16le" | "utf-16be";

export interface DecodeResult {
  readonly text: string;
  readonly encoding: BomEncoding;
  readonly source: "bom" | "default";
}

function detectBom(bytes: Uint8Array): { readonly encoding: BomEncoding; readonly length: number } | null {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return { encoding: "utf-8", length: 3 };
  }

  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return { encoding: "utf-16be", length: 2 };
  }

  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return { encoding: "utf-16le", length: 2 };
  }

  return null;
}

/**
 * Decodes a complete document. A byte order mark picks the decoder and is
 * dropped; everything else is read as UTF-8 with replacement characters for
 * invalid sequences.
 */
export function decodeHtmlBytes(bytes: Uint8Array): DecodeResult {
  const bom = detectBom(bytes);
  if (bom) {
    return {
      text: new TextDecoder(bom.encoding, { ignoreBOM: true }).decode(bytes.subarray(bom.length)),
      encoding: bom.encoding,
      source: "bom"
    };
  }

  return {
    text: new TextDecoder("utf-8").decode(bytes),
    encoding: "utf-8",
    source: "default"
  };
}
