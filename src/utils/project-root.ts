import * as fs from 'fs';
import * as path from 'path';

const MAX_SEARCH_DEPTH = 10;

/**
 * Find the project root directory by searching upwards for package.json.
 *
 * Works from the TypeScript sources (ts-jest), from compiled code in dist/
 * and from an installed package, since all of them keep package.json above
 * the module directory.
 *
 * @throws Error if no package.json is found within ten levels
 */
export function findProjectRoot(startDir: string = __dirname): string {
  let currentDir = startDir;
  let depth = 0;

  while (depth < MAX_SEARCH_DEPTH) {
    if (fs.existsSync(path.join(currentDir, 'package.json'))) {
      return currentDir;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }

    currentDir = parentDir;
    depth++;
  }

  throw new Error(
    `Could not find project root (package.json) by walking up from ${startDir}. ` +
      `Searched ${depth} levels up the directory tree.`
  );
}

/**
 * Resolve a path relative to the project root, e.g. bundled config files.
 */
export function resolveProjectPath(...segments: string[]): string {
  return path.join(findProjectRoot(), ...segments);
}
