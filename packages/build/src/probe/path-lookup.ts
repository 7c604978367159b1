/**
 * Executable lookup on the search path
 */

import { access, stat } from 'fs/promises';
import { constants } from 'fs';
import { posix, win32 } from 'path';

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

export type ExecutableLookup = (command: string, env: NodeJS.ProcessEnv) => Promise<string | undefined>;

/** Decides whether a candidate path is a runnable file */
export type ExecutableCheck = (candidate: string) => Promise<boolean>;

export async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    await access(candidate, constants.X_OK);
    return (await stat(candidate)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve a command name to the first matching executable on PATH. On
 * Windows each PATHEXT extension is tried as well.
 */
export async function findExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  isExecutable: ExecutableCheck = isExecutableFile
): Promise<string | undefined> {
  const isWindows = platform === 'win32';
  const pathModule = isWindows ? win32 : posix;

  if (command.includes('/') || (isWindows && command.includes('\\'))) {
    return (await isExecutable(command)) ? command : undefined;
  }

  const searchPath = env.PATH ?? env.Path ?? '';
  const directories = searchPath.split(pathModule.delimiter).filter(dir => dir.length > 0);
  const extensions = isWindows
    ? ['', ...(env.PATHEXT ?? DEFAULT_PATHEXT).split(';').filter(ext => ext.length > 0)]
    : [''];

  for (const directory of directories) {
    for (const extension of extensions) {
      const candidate = pathModule.join(directory, command + extension);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }

  return undefined;
}
