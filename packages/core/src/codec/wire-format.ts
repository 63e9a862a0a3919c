/**
 * Binary framing for encoded responses.
 *
 * Layout (big-endian):
 *   0..3   ASCII marker "AGRS"
 *   4..5   uint16 format version
 *   6..9   uint32 body length
 *   10..   UTF-8 JSON body
 */

import { CorruptPayloadError, UnsupportedVersionError } from "@agentic-wire/sdk";

export const WIRE_MAGIC = "AGRS";
export const FORMAT_VERSION = 1;
export const MIN_SUPPORTED_VERSION = 1;
export const MAX_SUPPORTED_VERSION = 1;
export const HEADER_LENGTH = 10;

export interface Frame {
  version: number;
  body: Uint8Array;
}

export function writeFrame(body: Uint8Array, version = FORMAT_VERSION): Uint8Array {
  const frame = Buffer.alloc(HEADER_LENGTH + body.byteLength);
  frame.write(WIRE_MAGIC, 0, "ascii");
  frame.writeUInt16BE(version, 4);
  frame.writeUInt32BE(body.byteLength, 6);
  frame.set(body, HEADER_LENGTH);
  return frame;
}

/**
 * Split a frame into version and body.
 *
 * @throws CorruptPayloadError on a short header, wrong marker or length mismatch
 * @throws UnsupportedVersionError when the version is outside the supported range
 */
export function readFrame(bytes: Uint8Array): Frame {
  if (bytes.byteLength < HEADER_LENGTH) {
    throw new CorruptPayloadError(
      `${bytes.byteLength} byte(s) is shorter than the ${HEADER_LENGTH}-byte header`,
    );
  }

  const view = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (view.toString("ascii", 0, 4) !== WIRE_MAGIC) {
    throw new CorruptPayloadError(`missing "${WIRE_MAGIC}" marker`);
  }

  const version = view.readUInt16BE(4);
  if (version < MIN_SUPPORTED_VERSION || version > MAX_SUPPORTED_VERSION) {
    throw new UnsupportedVersionError(version, MIN_SUPPORTED_VERSION, MAX_SUPPORTED_VERSION);
  }

  const declared = view.readUInt32BE(6);
  const actual = bytes.byteLength - HEADER_LENGTH;
  if (declared !== actual) {
    throw new CorruptPayloadError(`header declares a ${declared}-byte body, found ${actual}`);
  }

  return { version, body: view.subarray(HEADER_LENGTH) };
}
