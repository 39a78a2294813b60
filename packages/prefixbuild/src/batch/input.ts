import { BatchInputError } from '../errors.js';
import type { BatchEntry } from '../types.js';

/**
 * Parse batch input: one `<name> <version> <path>` per line,
 * whitespace-separated. Blank lines are skipped. Any other field
 * count rejects the whole input.
 */
export function parseBatchInput(text: string): BatchEntry[] {
  const entries: BatchEntry[] = [];
  const lines = text.split(/\r?\n/);

  for (const [i, raw] of lines.entries()) {
    const line = raw.trim();
    if (line === '') continue;
    const fields = line.split(/\s+/);
    if (fields.length !== 3) {
      throw new BatchInputError(i + 1, line);
    }
    const [name, version, path] = fields;
    entries.push({ name, version, path, line: i + 1 });
  }

  return entries;
}

export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}
