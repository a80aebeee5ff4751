import fs from 'fs';
import { InputUnreadableError } from '../../shared/errors';

/**
 * Read a game log from disk. Splitting into records is left to the engine's
 * `splitRecords`.
 *
 * @throws InputUnreadableError when the file is missing, is a directory, or
 *   cannot be read for any other reason.
 */
export function readGameLogText(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    const code = getErrnoCode(err);
    throw new InputUnreadableError(filePath, code ?? (err instanceof Error ? err.message : String(err)), {
      errno: code,
    });
  }
}

function getErrnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
