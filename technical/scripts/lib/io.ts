import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

export const CORPUS_DIR_ENV = 'FRAMEWORK_CORPUS_DIR';

export interface RunOptions {
  check: boolean;
  quiet: boolean;
}

export function getRunOptions(argv: string[]): RunOptions {
  return {
    check: argv.includes('--check'),
    quiet: argv.includes('--quiet')
  };
}

export function positionalArgs(argv: string[]): string[] {
  return argv.filter((arg) => !arg.startsWith('--'));
}

export function corpusRoot(): string {
  const configured = process.env[CORPUS_DIR_ENV]?.trim();
  return configured ? path.resolve(configured) : process.cwd();
}

export function corpusPath(...parts: string[]): string {
  return path.join(corpusRoot(), ...parts);
}

export function frameworksDir(): string {
  return corpusPath('frameworks');
}

export function toPosixRelative(filePath: string): string {
  return path.relative(corpusRoot(), filePath).split(path.sep).join('/');
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
}

export function stableJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export function stableText(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

export interface WriteResult {
  changed: boolean;
  wrote: boolean;
}

// Temp sibling + rename, so an interrupted run leaves either the old or the new file.
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.tmp-${process.pid}-${Date.now()}`
  );

  try {
    await fs.writeFile(tmpPath, content, 'utf8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.remove(tmpPath);
    throw error;
  }
}

async function writeIfChanged(
  filePath: string,
  next: string,
  options: Pick<RunOptions, 'check'>
): Promise<WriteResult> {
  let current: string | null = null;

  if (await fs.pathExists(filePath)) {
    current = await fs.readFile(filePath, 'utf8');
  }

  if (current === next) {
    return { changed: false, wrote: false };
  }

  if (options.check) {
    return { changed: true, wrote: false };
  }

  await ensureParentDir(filePath);
  await atomicWriteFile(filePath, next);
  return { changed: true, wrote: true };
}

export async function writeJsonFile(
  filePath: string,
  data: unknown,
  options: Pick<RunOptions, 'check'>
): Promise<WriteResult> {
  return writeIfChanged(filePath, stableJson(data), options);
}

export async function writeTextFile(
  filePath: string,
  content: string,
  options: Pick<RunOptions, 'check'>
): Promise<WriteResult> {
  return writeIfChanged(filePath, stableText(content), options);
}

/** Writes `content` exactly as given; used where the bytes outside a fix must not move. */
export async function writeRawTextFile(
  filePath: string,
  content: string,
  options: Pick<RunOptions, 'check'>
): Promise<WriteResult> {
  return writeIfChanged(filePath, content, options);
}

export async function listYamlFiles(rootDir: string): Promise<string[]> {
  if (!(await fs.pathExists(rootDir))) {
    return [];
  }

  const files = await fg(['**/*.yml', '**/*.yaml'], {
    cwd: rootDir,
    absolute: true,
    dot: false,
    onlyFiles: true
  });

  return files.sort((a, b) => a.localeCompare(b));
}

/** Category of a document is the name of the directory that holds it. */
export function categoryFromPath(filePath: string): string {
  return path.basename(path.dirname(filePath));
}

export function documentIdFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}
