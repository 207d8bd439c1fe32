import { promises as fs } from 'node:fs';
import path from 'node:path';

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/** Removes everything under `dirPath` except the entries named in `keep`. */
export async function emptyDir(dirPath: string, keep: string[] = []): Promise<void> {
  for (const entry of await fs.readdir(dirPath)) {
    if (keep.includes(entry)) {
      continue;
    }
    await fs.rm(path.join(dirPath, entry), { recursive: true, force: true });
  }
}

export async function copyDir(sourceDir: string, targetDir: string): Promise<void> {
  await fs.cp(sourceDir, targetDir, { recursive: true, force: true });
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, 'utf8');
  return JSON.parse(raw);
}

export async function readJsonFileOrDefault(filePath: string, fallback: unknown): Promise<unknown> {
  if (!(await exists(filePath))) {
    return fallback;
  }
  return readJsonFile(filePath);
}

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.${Math.random().toString(16).slice(2)}.tmp`;
  await fs.writeFile(tmpPath, content, 'utf8');
  try {
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(data, null, 2)}\n`);
}

export async function appendNdjson(filePath: string, event: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.appendFile(filePath, `${JSON.stringify(event)}\n`, 'utf8');
}

export async function readNdjson(filePath: string): Promise<unknown[]> {
  if (!(await exists(filePath))) {
    return [];
  }
  const raw = await fs.readFile(filePath, 'utf8');
  if (!raw.trim()) {
    return [];
  }
  return raw
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line): unknown => JSON.parse(line));
}
