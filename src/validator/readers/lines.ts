import fs from "node:fs";
import readline from "node:readline";

export interface PhysicalLine {
  text: string;
  /** bytes pulled from disk so far (read-ahead included) */
  bytesRead: number;
}

/**
 * Yields every line of a file, terminators stripped. Invalid UTF-8 is
 * replaced rather than rejected. The handle is closed when the consumer
 * finishes, breaks out early or throws.
 */
export async function* readLines(path: string): AsyncGenerator<PhysicalLine> {
  const handle = await fs.promises.open(path, "r");
  const input = handle.createReadStream({ encoding: "utf8", autoClose: false });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const text of rl) {
      yield { text, bytesRead: input.bytesRead };
    }
  } finally {
    rl.close();
    input.destroy();
    await handle.close();
  }
}

export async function readSample(path: string, limit: number): Promise<string[]> {
  const sample: string[] = [];
  if (limit <= 0) return sample;
  for await (const { text } of readLines(path)) {
    sample.push(text);
    if (sample.length >= limit) break;
  }
  return sample;
}
