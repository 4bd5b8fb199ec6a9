// src/utility/beaconframe.ts

import { Buffer } from "buffer";
import { BeaconData } from "../dataset/beacon";
import { BeaconDecodeError, UnsupportedBeaconVersionError } from "./errors";

export const BEACON_MAGIC = Buffer.from("BECN\0", "ascii");

const HEADER_SIZE = 5;
const RECORD_SIZE = 16; // <BBiiIH
const HOSTNAME_OFFSET = HEADER_SIZE + RECORD_SIZE;

const SUPPORTED_MAJOR_VERSION = 1;
const MAX_SUPPORTED_MINOR_VERSION = 2;
const SIMULATOR_HOST_ID = 1; // 2 would be the aircraft editor

export interface BeaconFrameParams {
  majorVersion?: number;
  minorVersion?: number;
  hostId?: number;
  simulatorVersion: number;
  role: number;
  port: number;
  hostname: string;
}

/**
 * Builds a beacon packet as the simulator multicasts it.
 *
 * Layout (little-endian): "BECN\0", uint8 major, uint8 minor, int32 hostId,
 * int32 simulatorVersion, uint32 role, uint16 port, NUL-terminated hostname.
 */
export function encodeBeacon(params: BeaconFrameParams): Buffer {
  const hostname = Buffer.from(params.hostname, "utf8");
  const frame = Buffer.alloc(HOSTNAME_OFFSET + hostname.length + 1);

  let offset = 0;
  BEACON_MAGIC.copy(frame, offset);
  offset += HEADER_SIZE;

  frame.writeUInt8(params.majorVersion ?? SUPPORTED_MAJOR_VERSION, offset);
  offset += 1;
  frame.writeUInt8(params.minorVersion ?? MAX_SUPPORTED_MINOR_VERSION, offset);
  offset += 1;
  frame.writeInt32LE(params.hostId ?? SIMULATOR_HOST_ID, offset);
  offset += 4;
  frame.writeInt32LE(params.simulatorVersion, offset);
  offset += 4;
  frame.writeUInt32LE(params.role, offset);
  offset += 4;
  frame.writeUInt16LE(params.port, offset);
  offset += 2;

  hostname.copy(frame, offset);
  // trailing byte is already 0

  return frame;
}

/**
 * Decodes a beacon packet received from `senderHost`.
 *
 * @throws BeaconDecodeError when the packet is not a beacon
 * @throws UnsupportedBeaconVersionError when the beacon layout version is not handled
 */
export function decodeBeacon(packet: Buffer, senderHost: string): BeaconData {
  if (packet.length < HOSTNAME_OFFSET) {
    throw new BeaconDecodeError(
      `Beacon packet too short: ${packet.length} bytes from ${senderHost}`
    );
  }

  if (!packet.subarray(0, HEADER_SIZE).equals(BEACON_MAGIC)) {
    throw new BeaconDecodeError(
      `Unknown packet from ${senderHost}, ${packet.length} bytes: ${packet.toString("hex")}`
    );
  }

  let offset = HEADER_SIZE;
  const majorVersion = packet.readUInt8(offset);
  offset += 1;
  const minorVersion = packet.readUInt8(offset);
  offset += 1;
  const hostId = packet.readInt32LE(offset);
  offset += 4;
  const simulatorVersion = packet.readInt32LE(offset);
  offset += 4;
  const role = packet.readUInt32LE(offset);
  offset += 4;
  const port = packet.readUInt16LE(offset);

  if (
    majorVersion !== SUPPORTED_MAJOR_VERSION ||
    minorVersion > MAX_SUPPORTED_MINOR_VERSION ||
    hostId !== SIMULATOR_HOST_ID
  ) {
    throw new UnsupportedBeaconVersionError(majorVersion, minorVersion, hostId);
  }

  const nameBytes = packet.subarray(HOSTNAME_OFFSET);
  const terminator = nameBytes.indexOf(0);
  const hostname = (
    terminator === -1 ? nameBytes : nameBytes.subarray(0, terminator)
  ).toString("utf8");

  return Object.freeze({
    host: senderHost,
    port,
    hostname,
    simulatorVersion,
    role,
  });
}
