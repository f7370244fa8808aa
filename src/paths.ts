import path from 'node:path';
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Maximum number of characters preserved in a sanitised filename. */
const MAX_FILENAME_LENGTH = 120;

/**
 * Raised when an artefact path would land outside the directory it belongs
 * to. Scope identifiers come from the dataset, so every file name derived from
 * them goes through {@link resolveWithin}.
 */
export class PathResolutionError extends Error {
  public readonly code = 'E-PATHS-ESCAPE';
  public readonly hint = 'keep artefact paths within the run directory';
  /** Absolute path that the caller attempted to use. */
  public readonly attemptedPath: string;
  public readonly rootDirectory: string;
  public readonly details: { attemptedPath: string; rootDirectory: string; relative: string };

  constructor(message: string, attemptedPath: string, rootDirectory: string, relative: string) {
    super(message);
    this.name = 'PathResolutionError';
    this.attemptedPath = attemptedPath;
    this.rootDirectory = rootDirectory;
    this.details = { attemptedPath, rootDirectory, relative };
  }
}

/**
 * Resolves `segments` against `rootDir` and checks that the result stays in it.
 *
 * @throws {PathResolutionError} When the resulting path escapes the root.
 */
export function resolveWithin(rootDir: string, ...segments: string[]): string {
  const absoluteRoot = path.resolve(rootDir);
  const targetPath = path.resolve(absoluteRoot, ...segments);
  const relative = path.relative(absoluteRoot, targetPath);

  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathResolutionError('path escapes base directory', targetPath, absoluteRoot, relative);
  }

  return targetPath;
}

/**
 * Turns an identifier into a file name component. Separators, control
 * characters and whitespace become underscores; letters, digits, `.`, `_` and
 * `-` are kept so `commodity_ELC` stays readable. Empty results fall back to
 * `unnamed`.
 */
export function sanitizeFilename(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    return 'unnamed';
  }

  const withoutControl = trimmed.normalize('NFC').replace(/[\0-\x1F\x7F]/g, '');
  const withoutTraversal = withoutControl.replace(/\.\./g, '');

  const sanitised = withoutTraversal
    .replace(/[\\/:*?"<>|]/g, '_')
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}._-]+/gu, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');

  const limited = sanitised.length > MAX_FILENAME_LENGTH ? sanitised.slice(0, MAX_FILENAME_LENGTH) : sanitised;
  return limited.length > 0 ? limited : 'unnamed';
}

const STEM_SAFE_CHARACTER = /^[A-Za-z0-9.-]$/;

/**
 * Reversible counterpart of {@link sanitizeFilename} for scope identifiers:
 * every character outside `[A-Za-z0-9.-]` becomes `%XX` per UTF-8 byte, `%`
 * and `_` included. Distinct identifiers therefore never share an encoding,
 * and `_` stays free to separate the parts of a composite stem.
 */
export function encodeFilenameComponent(value: string): string {
  let encoded = '';
  for (const character of value) {
    if (STEM_SAFE_CHARACTER.test(character)) {
      encoded += character;
      continue;
    }
    for (const byte of Buffer.from(character, 'utf8')) {
      encoded += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return encoded;
}

/** File name without directory and last extension (`data/utopia.json` → `utopia`). */
export function baseNameWithoutExtension(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}
