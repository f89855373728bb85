import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";

export type SiteFiles = Record<string, string | Uint8Array>;

export interface TempSite {
  dir: string;
  cleanup: () => Promise<void>;
}

/**
 * Create a throwaway directory populated with the given files.
 * Keys are paths relative to the site root; a key ending in "/" creates an
 * empty directory.
 *
 * @example
 * ```typescript
 * const site = await createTempSite({
 *   "index.html": "<h1>hi</h1>",
 *   "assets/app.css": "body {}",
 *   "empty/": "",
 * });
 * // ...
 * await site.cleanup();
 * ```
 */
export async function createTempSite(files: SiteFiles = {}): Promise<TempSite> {
  const dir = await mkdtemp(join(tmpdir(), "file-serve-"));

  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(dir, relativePath);
    if (relativePath.endsWith("/")) {
      await mkdir(target, { recursive: true });
      continue;
    }
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }

  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
