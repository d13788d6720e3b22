import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';

import { CORPUS_DIR_ENV } from '../lib/io.js';

/** Runs `run` with a fresh temp directory as cwd and corpus root. */
export async function withTempCwd(
  prefix: string,
  run: (root: string) => Promise<void>
): Promise<void> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const realRoot = await fs.realpath(root);
  const originalCwd = process.cwd();
  const originalCorpusDir = process.env[CORPUS_DIR_ENV];

  try {
    delete process.env[CORPUS_DIR_ENV];
    process.chdir(realRoot);
    await run(realRoot);
  } finally {
    process.chdir(originalCwd);
    if (originalCorpusDir === undefined) {
      delete process.env[CORPUS_DIR_ENV];
    } else {
      process.env[CORPUS_DIR_ENV] = originalCorpusDir;
    }
    await fs.remove(realRoot);
  }
}

export async function writeFixtureFile(
  root: string,
  relativePath: string,
  content: string
): Promise<string> {
  const absolutePath = path.join(root, relativePath);
  await fs.ensureDir(path.dirname(absolutePath));
  const normalized = `${content.trim()}\n`;
  await fs.writeFile(absolutePath, normalized, 'utf8');
  return absolutePath;
}

/** Like writeFixtureFile, byte for byte. */
export async function writeRawFixtureFile(
  root: string,
  relativePath: string,
  content: string
): Promise<string> {
  const absolutePath = path.join(root, relativePath);
  await fs.ensureDir(path.dirname(absolutePath));
  await fs.writeFile(absolutePath, content, 'utf8');
  return absolutePath;
}

export interface CapturedOutput {
  logs: string[];
  errors: string[];
}

export async function captureConsole<T>(run: () => Promise<T>): Promise<{ result: T; output: CapturedOutput }> {
  const output: CapturedOutput = { logs: [], errors: [] };
  const originalLog = console.log;
  const originalError = console.error;

  console.log = (...args: unknown[]) => {
    output.logs.push(args.map(String).join(' '));
  };
  console.error = (...args: unknown[]) => {
    output.errors.push(args.map(String).join(' '));
  };

  try {
    const result = await run();
    return { result, output };
  } finally {
    console.log = originalLog;
    console.error = originalError;
  }
}
