import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

/**
 * Write a file tree (relative path → content) under a fresh temporary directory
 */
export async function createPackageFixture(files: Record<string, string | Buffer>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'reexport-mapper-test-'));

  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }

  return root;
}

export async function removePackageFixture(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}
