import path from 'node:path';
import { tmpdir } from 'node:os';
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import type { DestinationStream } from 'pino';

export async function createTempDir(prefix = 'cmake-util-recipe-test-'): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), prefix));
  return dir;
}

export async function writeSourceTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content, 'utf8');
  }
}

export type CapturedLog = {
  level: number;
  msg: string;
  [key: string]: unknown;
};

export function captureLogs(): { destination: DestinationStream; records: CapturedLog[] } {
  const records: CapturedLog[] = [];
  return {
    records,
    destination: {
      write(message: string) {
        records.push(JSON.parse(message));
      }
    }
  };
}
