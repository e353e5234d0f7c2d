/**
 * ZIP extraction module for ChatGPT exports
 * Handles the archive ChatGPT sends, with conversations.json at any depth
 */

import { createWriteStream } from 'fs';
import { mkdir, rm, readdir } from 'fs/promises';
import { join, dirname, basename, resolve, sep } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { pipeline } from 'stream/promises';
import yauzl from 'yauzl';
import { ExportFormatError } from '../../errors.js';

export const CONVERSATIONS_FILENAME = 'conversations.json';

/**
 * Extraction result
 */
export interface ExtractionResult {
  tempDir: string;
  fileCount: number;
  conversationsJsonPath: string | null;
}

/**
 * Create a temporary directory for extraction
 */
export async function createTempDir(): Promise<string> {
  const tempDir = join(tmpdir(), `chatgpt-clean-${randomUUID()}`);
  await mkdir(tempDir, { recursive: true });
  return tempDir;
}

/**
 * Remove a temporary directory and everything in it
 */
export async function cleanupTempDir(tempDir: string): Promise<void> {
  await rm(tempDir, { recursive: true, force: true });
}

function openZipFile(zipPath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolvePromise, reject) => {
    yauzl.open(zipPath, { lazyEntries: true }, (err, zipFile) => {
      if (err) reject(err);
      else if (zipFile) resolvePromise(zipFile);
      else reject(new Error('Failed to open ZIP file'));
    });
  });
}

function extractEntry(
  zipFile: yauzl.ZipFile,
  entry: yauzl.Entry,
  destPath: string
): Promise<void> {
  return new Promise((resolvePromise, reject) => {
    zipFile.openReadStream(entry, (err, readStream) => {
      if (err) {
        reject(err);
        return;
      }
      if (!readStream) {
        reject(new Error('Failed to open read stream'));
        return;
      }

      mkdir(dirname(destPath), { recursive: true })
        .then(() => pipeline(readStream, createWriteStream(destPath)))
        .then(() => resolvePromise(), reject);
    });
  });
}

/**
 * Resolve an entry name inside the extraction directory, or null if it
 * would land outside of it
 */
export function resolveEntryPath(rootDir: string, entryName: string): string | null {
  const root = resolve(rootDir);
  const destPath = resolve(root, entryName);
  return destPath.startsWith(root + sep) ? destPath : null;
}

/**
 * Extract a ZIP file to a fresh temporary directory
 */
export async function extractZip(zipPath: string): Promise<ExtractionResult> {
  const tempDir = await createTempDir();
  let fileCount = 0;
  let conversationsJsonPath: string | null = null;

  let zipFile: yauzl.ZipFile;
  try {
    zipFile = await openZipFile(zipPath);
  } catch (err) {
    await cleanupTempDir(tempDir);
    throw err;
  }

  const done = new Promise<ExtractionResult>((resolvePromise, reject) => {
    zipFile.on('error', reject);

    zipFile.on('entry', (entry: yauzl.Entry) => {
      const fileName = entry.fileName;

      // Directories, macOS metadata and dot-files
      if (
        fileName.endsWith('/') ||
        fileName.includes('__MACOSX') ||
        basename(fileName).startsWith('.')
      ) {
        zipFile.readEntry();
        return;
      }

      const destPath = resolveEntryPath(tempDir, fileName);
      if (!destPath) {
        zipFile.close();
        reject(new ExportFormatError(`ZIP entry escapes extraction directory: ${fileName}`));
        return;
      }

      extractEntry(zipFile, entry, destPath).then(() => {
        fileCount++;
        if (conversationsJsonPath === null && basename(fileName) === CONVERSATIONS_FILENAME) {
          conversationsJsonPath = destPath;
        }
        zipFile.readEntry();
      }, reject);
    });

    zipFile.on('end', () => {
      resolvePromise({ tempDir, fileCount, conversationsJsonPath });
    });

    zipFile.readEntry();
  });

  try {
    return await done;
  } catch (err) {
    await cleanupTempDir(tempDir);
    throw err;
  }
}

/**
 * Find conversations.json in a directory (handles nested structures)
 */
export async function findConversationsJson(dir: string): Promise<string | null> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    if (entry.isFile() && entry.name === CONVERSATIONS_FILENAME) {
      return join(dir, entry.name);
    }
  }

  for (const entry of entries) {
    if (entry.isDirectory() && !entry.name.startsWith('.')) {
      const found = await findConversationsJson(join(dir, entry.name));
      if (found) return found;
    }
  }

  return null;
}

/**
 * Check if a file is a ZIP file by extension
 */
export function isZipFile(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.zip');
}

/**
 * Extract ZIP and find conversations.json
 * Returns the path to conversations.json and a cleanup function
 */
export async function extractAndFindConversations(
  zipPath: string
): Promise<{
  conversationsPath: string;
  tempDir: string;
  cleanup: () => Promise<void>;
}> {
  const result = await extractZip(zipPath);

  const conversationsPath =
    result.conversationsJsonPath ?? (await findConversationsJson(result.tempDir));

  if (!conversationsPath) {
    await cleanupTempDir(result.tempDir);
    throw new ExportFormatError(`${CONVERSATIONS_FILENAME} not found in ZIP file`);
  }

  return {
    conversationsPath,
    tempDir: result.tempDir,
    cleanup: () => cleanupTempDir(result.tempDir),
  };
}
