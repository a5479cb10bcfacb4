import { addAbortSignal, type Readable } from 'node:stream';
import type { ChunkSource } from '@tfscope/core';

function toBytes(data: unknown): Uint8Array {
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  if (data instanceof Uint8Array) return data;
  throw new TypeError(`Unexpected chunk type: ${typeof data}`);
}

/**
 * Pipe-mode input. Bytes are decoded as UTF-8 across chunk boundaries;
 * invalid sequences become U+FFFD rather than failing the read. Aborting
 * destroys the stream so a blocked read ends.
 */
export function createStreamSource(input: Readable): ChunkSource {
  return {
    async *chunks(signal: AbortSignal): AsyncIterable<string> {
      addAbortSignal(signal, input);
      const decoder = new TextDecoder('utf-8');
      for await (const data of input) {
        const text = decoder.decode(toBytes(data), { stream: true });
        if (text !== '') yield text;
      }
      const rest = decoder.decode();
      if (rest !== '') yield rest;
    },
  };
}
