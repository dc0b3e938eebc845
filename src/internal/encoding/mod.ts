export { decodeHtmlBytes } from "./decode.js";

export type { BomEncoding, DecodeResult } from "./decode.js";
