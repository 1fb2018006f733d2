import path from 'node:path';
import { tmpdir } from 'node:os';
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';

export async function createTempDir(prefix = 'cmake-util-cli-test-'): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), prefix));
  return dir;
}

export async function writeRecipeSource(root: string): Promise<void> {
  const files: Record<string, string> = {
    LICENSE: 'Apache License\n',
    'cmake/build.cmake': '# build\n',
    'cmake/build_outputs.cmake': '# outputs\n',
    'cmake/colors.cmake': '# colors\n',
    'cmake/optimize_debug_build.cmake': '# -Og\n'
  };
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content, 'utf8');
  }
}
