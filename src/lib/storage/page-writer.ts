/**
 * Page Writer
 * Stores fetched page content as markdown files under an output directory
 */

import * as fs from 'fs/promises';
import * as path from 'path';

export const DEFAULT_FILENAME_MAX_LENGTH = 100;

export interface PageWriter {
  /**
   * Write `content` to `relativePath`, creating parent directories as needed
   */
  write(relativePath: string, content: string): Promise<void>;
}

/**
 * Turn a page title into a safe filename ending in `.md`.
 * Returns null when nothing usable is left after cleaning.
 */
export function sanitizeFilename(
  title: string,
  maxLength: number = DEFAULT_FILENAME_MAX_LENGTH
): string | null {
  let name = title
    .normalize('NFC')
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/\s+/g, '_');

  if (name.length > maxLength) {
    name = name.substring(0, maxLength);
  }

  name = name.replace(/^_+|_+$/g, '');
  return name ? `${name}.md` : null;
}

/**
 * Filename derived from the URL path, e.g. `/guide/setup` -> `guide_setup`
 */
export function filenameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split('#')[0].split('?')[0];
  }

  const name = pathname.replace(/^\/+|\/+$/g, '').replace(/\//g, '_');
  return name || 'index';
}

/**
 * Pick the filename for a page: its title when usable, otherwise its URL path
 */
export function deriveFilename(
  title: string | undefined,
  url: string,
  maxLength: number = DEFAULT_FILENAME_MAX_LENGTH
): string {
  const fromTitle = title ? sanitizeFilename(title, maxLength) : null;
  return fromTitle ?? sanitizeFilename(filenameFromUrl(url), maxLength) ?? 'index.md';
}

/**
 * Hands out filenames unique within one crawl run, so concurrent writers
 * never share a file. Repeats get `-2`, `-3`, ... before the extension.
 */
export class FilenameAllocator {
  private taken: Set<string> = new Set();

  allocate(filename: string): string {
    const ext = path.extname(filename);
    const base = filename.slice(0, filename.length - ext.length);

    let candidate = filename;
    let suffix = 2;
    while (this.taken.has(candidate.toLowerCase())) {
      candidate = `${base}-${suffix}${ext}`;
      suffix++;
    }

    this.taken.add(candidate.toLowerCase());
    return candidate;
  }
}

export class FilePageWriter implements PageWriter {
  constructor(private readonly outputDir: string) {}

  async write(relativePath: string, content: string): Promise<void> {
    const filePath = path.resolve(this.outputDir, relativePath);
    const root = path.resolve(this.outputDir);
    if (filePath !== root && !filePath.startsWith(root + path.sep)) {
      throw new Error(`Refusing to write outside output directory: ${relativePath}`);
    }

    // recursive mkdir is a no-op when the directory already exists
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }
}
