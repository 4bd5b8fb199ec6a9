// src/utility/udpframe.ts

import { Buffer } from "buffer";

const RREF_PATH_SIZE = 400;
const DREF_PATH_SIZE = 500;
const CMND_PATH_SIZE = 500;
const RREF_ANSWER_HEADER = Buffer.from("RREF,", "ascii");
const RREF_VALUE_SIZE = 8;

export interface RrefValue {
  index: number;
  value: number;
}

/**
 * Writes `str` into a fixed-size field, NUL padded. The field always keeps a
 * terminating NUL, so the string is clipped to `size - 1` bytes.
 */
function writePadded(frame: Buffer, str: string, offset: number, size: number): void {
  const bytes = Buffer.from(str, "utf8").subarray(0, size - 1);
  bytes.copy(frame, offset);
}

/** Asks the simulator to stream `path` at `frequency` Hz under `index`; frequency 0 stops it. */
export function encodeRref(frequency: number, index: number, path: string): Buffer {
  const frame = Buffer.alloc(5 + 4 + 4 + RREF_PATH_SIZE);
  frame.write("RREF\0", 0, "ascii");
  frame.writeInt32LE(frequency, 5);
  frame.writeInt32LE(index, 9);
  writePadded(frame, path, 13, RREF_PATH_SIZE);
  return frame;
}

export function encodeDref(value: number, path: string): Buffer {
  const frame = Buffer.alloc(5 + 4 + DREF_PATH_SIZE);
  frame.write("DREF\0", 0, "ascii");
  frame.writeFloatLE(value, 5);
  writePadded(frame, path, 9, DREF_PATH_SIZE);
  return frame;
}

export function encodeCmnd(path: string): Buffer {
  const frame = Buffer.alloc(5 + CMND_PATH_SIZE);
  frame.write("CMND\0", 0, "ascii");
  writePadded(frame, path, 5, CMND_PATH_SIZE);
  return frame;
}

/**
 * Decodes an RREF answer into (index, value) pairs. Returns null when the
 * packet is not an RREF answer. Tiny negative values are reported as 0.
 */
export function decodeRrefAnswer(packet: Buffer): RrefValue[] | null {
  if (
    packet.length < RREF_ANSWER_HEADER.length ||
    !packet.subarray(0, RREF_ANSWER_HEADER.length).equals(RREF_ANSWER_HEADER)
  ) {
    return null;
  }

  const values: RrefValue[] = [];
  const count = Math.floor(
    (packet.length - RREF_ANSWER_HEADER.length) / RREF_VALUE_SIZE
  );
  for (let i = 0; i < count; i++) {
    const offset = RREF_ANSWER_HEADER.length + i * RREF_VALUE_SIZE;
    const index = packet.readInt32LE(offset);
    let value = packet.readFloatLE(offset + 4);
    if (value < 0.0 && value > -0.001) {
      value = 0.0;
    }
    values.push({ index, value });
  }
  return values;
}
