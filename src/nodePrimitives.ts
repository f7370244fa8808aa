/**
 * Errno-flavoured error as raised by `node:fs` and `node:child_process`. Only
 * the properties inspected in this codebase are listed.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}
