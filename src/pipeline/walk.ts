import { glob } from 'glob';

const SIDECAR_GLOB = '**/*.[jJ][sS][oO][nN]';

/**
 * Every `.json` file under `rootDir` (any case, hidden paths included), as sorted absolute paths
 */
export async function findSidecars(rootDir: string): Promise<string[]> {
  const paths = await glob(SIDECAR_GLOB, {
    cwd: rootDir,
    absolute: true,
    nodir: true,
    dot: true
  });
  return paths.sort();
}
