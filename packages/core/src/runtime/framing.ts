/**
 * Length-prefixed frames for the worker backend: uint32 big-endian byte
 * length, then the UTF-8 payload.
 */

import { FRAME_HEADER_BYTES, MAX_FRAME_BYTES } from './protocol.js';

export function encodeFrame(payload: string): Buffer {
  const body = Buffer.from(payload, 'utf-8');
  if (body.length > MAX_FRAME_BYTES) {
    throw new RangeError(`Frame payload of ${body.length} bytes exceeds ${MAX_FRAME_BYTES}`);
  }
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32BE(body.length, 0);
  return Buffer.concat([header, body]);
}

/**
 * Incremental decoder: feed it chunks as they arrive, get back every frame
 * completed so far.
 */
export class FrameReader {
  private buffer: Buffer = Buffer.alloc(0);

  get pendingBytes(): number {
    return this.buffer.length;
  }

  push(chunk: Buffer): string[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: string[] = [];

    while (this.buffer.length >= FRAME_HEADER_BYTES) {
      const length = this.buffer.readUInt32BE(0);
      if (this.buffer.length < FRAME_HEADER_BYTES + length) {
        break;
      }
      frames.push(this.buffer.toString('utf-8', FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + length));
      this.buffer = this.buffer.subarray(FRAME_HEADER_BYTES + length);
    }

    return frames;
  }
}
