import * as fsAsync from 'node:fs/promises';

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  try {
    await fsAsync.access(dirPath);
  } catch {
    await fsAsync.mkdir(dirPath, { recursive: true, mode: 0o700 });
  }
}

export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await fsAsync.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const data = await readTextFile(filePath);
  return data === null ? null : JSON.parse(data);
}

export async function writeJsonFile(
  filePath: string,
  data: unknown,
): Promise<void> {
  await fsAsync.writeFile(filePath, JSON.stringify(data, null, 2), {
    mode: 0o600,
  });
}

export async function writeTextFile(
  filePath: string,
  data: string,
): Promise<void> {
  await fsAsync.writeFile(filePath, data, { mode: 0o600 });
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === 'ENOENT'
  );
}
