import { Buffer } from "buffer";

/** `data` datarefs travel base64-encoded; the decoded text has its NUL padding stripped. */
export function decodeDataValue(encoded: string): string {
  return Buffer.from(encoded, "base64").toString("ascii").replace(/\u0000/g, "");
}

export function encodeDataValue(text: string): string {
  return Buffer.from(text, "ascii").toString("base64");
}
