// Line-oriented input and output for CityJSONSeq streams

import fs from 'fs';
import { once } from 'events';
import type { Readable, Writable } from 'stream';
import { StringDecoder } from 'string_decoder';
import { CjseqError } from './errors.js';

// Custom line reader: lines can be very long (one feature per line)
export async function* readLines(
  stream: AsyncIterable<string | Buffer>
): AsyncGenerator<string> {
  let buffer = '';
  for await (const chunk of decodeChunks(stream)) {
    buffer += chunk;
    let newline = buffer.indexOf('\n');
    while (newline !== -1) {
      const line = stripCR(buffer.slice(0, newline));
      buffer = buffer.slice(newline + 1);
      if (line.trim()) yield line;
      newline = buffer.indexOf('\n');
    }
  }
  const last = stripCR(buffer);
  if (last.trim()) yield last;
}

export async function readText(stream: AsyncIterable<string | Buffer>): Promise<string> {
  let text = '';
  for await (const chunk of decodeChunks(stream)) {
    text += chunk;
  }
  return text;
}

// A multi-byte character may be split across two buffers
async function* decodeChunks(
  stream: AsyncIterable<string | Buffer>
): AsyncGenerator<string> {
  const decoder = new StringDecoder('utf8');
  for await (const chunk of stream) {
    yield typeof chunk === 'string' ? chunk : decoder.write(chunk);
  }
  const rest = decoder.end();
  if (rest) yield rest;
}

function stripCR(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

export function openInput(file?: string): Readable {
  if (!file || file === '-') {
    process.stdin.setEncoding('utf8');
    return process.stdin;
  }
  if (!fs.existsSync(file)) {
    throw new CjseqError(`Input file not found: ${file}`);
  }
  return fs.createReadStream(file, {
    encoding: 'utf8',
    highWaterMark: 64 * 1024, // 64KB buffer
  });
}

export async function writeLine(out: Writable, line: string): Promise<void> {
  if (!out.write(line + '\n')) {
    await once(out, 'drain');
  }
}
