import { Buffer } from "buffer";
import { describe, expect, it } from "vitest";
import { decodeRrefAnswer, encodeCmnd, encodeDref, encodeRref } from "./udpframe";

function rrefAnswer(pairs: [number, number][]): Buffer {
  const packet = Buffer.alloc(5 + pairs.length * 8);
  packet.write("RREF,", 0, "ascii");
  pairs.forEach(([index, value], i) => {
    packet.writeInt32LE(index, 5 + i * 8);
    packet.writeFloatLE(value, 9 + i * 8);
  });
  return packet;
}

describe("udp frames", () => {
  it("builds a 413 byte RREF request", () => {
    const frame = encodeRref(5, 12, "sim/cockpit/autopilot/heading");
    expect(frame.length).toBe(413);
    expect(frame.subarray(0, 5).toString("ascii")).toBe("RREF\0");
    expect(frame.readInt32LE(5)).toBe(5);
    expect(frame.readInt32LE(9)).toBe(12);
    expect(frame.subarray(13, 13 + 29).toString("utf8")).toBe("sim/cockpit/autopilot/heading");
    expect(frame[13 + 29]).toBe(0);
  });

  it("builds a 509 byte DREF write", () => {
    const frame = encodeDref(2.5, "sim/x");
    expect(frame.length).toBe(509);
    expect(frame.subarray(0, 5).toString("ascii")).toBe("DREF\0");
    expect(frame.readFloatLE(5)).toBe(2.5);
    expect(frame.subarray(9, 14).toString("utf8")).toBe("sim/x");
  });

  it("builds a 505 byte CMND", () => {
    const frame = encodeCmnd("sim/operation/pause_toggle");
    expect(frame.length).toBe(505);
    expect(frame.subarray(0, 5).toString("ascii")).toBe("CMND\0");
    expect(frame.subarray(5, 31).toString("utf8")).toBe("sim/operation/pause_toggle");
  });

  it("decodes RREF answers and folds tiny negatives to zero", () => {
    const values = decodeRrefAnswer(rrefAnswer([[0, 1.5], [3, -0.0001], [4, -2]]));
    expect(values).toEqual([
      { index: 0, value: 1.5 },
      { index: 3, value: 0 },
      { index: 4, value: -2 },
    ]);
  });

  it("returns null for other packets", () => {
    expect(decodeRrefAnswer(Buffer.from("BECN\0abc", "ascii"))).toBeNull();
    expect(decodeRrefAnswer(Buffer.from("RR", "ascii"))).toBeNull();
  });
});
