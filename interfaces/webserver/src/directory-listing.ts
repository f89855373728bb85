import { readdir } from "fs/promises";
import { html } from "hono/html";

type RenderedHtml = ReturnType<typeof html>;

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
  isSymbolicLink: boolean;
}

/**
 * Read a directory's entries, sorted case-insensitively by name
 */
export async function readDirectoryEntries(
  dirPath: string,
): Promise<DirectoryEntry[]> {
  const dirents = await readdir(dirPath, { withFileTypes: true });

  return dirents
    .map((dirent) => ({
      name: dirent.name,
      isDirectory: dirent.isDirectory(),
      isSymbolicLink: dirent.isSymbolicLink(),
    }))
    .sort((a, b) => {
      const left = a.name.toLowerCase();
      const right = b.name.toLowerCase();
      if (left === right) return 0;
      return left > right ? 1 : -1;
    });
}

function displayName(entry: DirectoryEntry): string {
  if (entry.isDirectory) return `${entry.name}/`;
  if (entry.isSymbolicLink) return `${entry.name}@`;
  return entry.name;
}

function linkTarget(entry: DirectoryEntry): string {
  const encoded = encodeURIComponent(entry.name);
  return entry.isDirectory ? `${encoded}/` : encoded;
}

/**
 * Render the HTML page listing a directory. Interpolated values are escaped
 * by hono's html helper.
 */
export function renderDirectoryListing(
  urlPath: string,
  entries: DirectoryEntry[],
): RenderedHtml {
  const title = `Directory listing for ${urlPath}`;
  const items = entries.map(
    (entry) =>
      html`<li><a href="${linkTarget(entry)}">${displayName(entry)}</a></li>\n`,
  );

  return html`<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${title}</title>
</head>
<body>
<h1>${title}</h1>
<hr>
<ul>
${items}</ul>
<hr>
</body>
</html>
`;
}
