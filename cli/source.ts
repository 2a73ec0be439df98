import * as fs from 'fs';
import { InputSourceError } from '../src/errors';

export function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];

    stream.on('data', (data: Buffer | string) => {
      chunks.push(typeof data === 'string' ? Buffer.from(data, 'utf-8') : data);
    });
    stream.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    stream.on('error', reject);
  });
}

/** Read the whole text once: the named file, or standard input for null. */
export async function readSource(
  source: string | null,
  stdin: NodeJS.ReadableStream = process.stdin
): Promise<string> {
  try {
    if (source === null) {
      return await readStream(stdin);
    }
    return await fs.promises.readFile(source, 'utf-8');
  } catch (err) {
    const label = source ?? 'standard input';
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputSourceError(`Cannot read ${label}: ${reason}`, { cause: err });
  }
}
