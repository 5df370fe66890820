import type { FsError } from '../../ports/file-opener.port.js';

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT' || code === 'ENOTDIR') return { code: 'FS_NOT_FOUND', message: `No such file: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  if (code === 'EISDIR') return { code: 'FS_IS_DIRECTORY', message: `Is a directory: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${errorMessage(e)}` };
}
