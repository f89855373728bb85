import { isAbsolute, relative, resolve, sep } from "path";

export interface RequestTarget {
  /** Decoded request path, always starting with "/" */
  urlPath: string;
  /** Absolute filesystem path inside the served root */
  filePath: string;
}

export type ResolvedRequestPath =
  | { status: "ok"; target: RequestTarget }
  | { status: "malformed"; reason: string }
  | { status: "outside-root" };

const hasParentSegment = (path: string): boolean =>
  path.split(/[\\/]/).includes("..");

/**
 * Map a raw (still percent-encoded) URL pathname onto a file below rootDir.
 * rootDir must already be absolute.
 */
export function resolveRequestPath(
  rootDir: string,
  rawPathname: string,
): ResolvedRequestPath {
  if (!rawPathname.startsWith("/")) {
    return { status: "malformed", reason: "path must start with /" };
  }

  let urlPath: string;
  try {
    urlPath = decodeURIComponent(rawPathname);
  } catch {
    return { status: "malformed", reason: "invalid percent-encoding" };
  }

  if (urlPath.includes("\0")) {
    return { status: "malformed", reason: "path contains a null byte" };
  }

  if (hasParentSegment(rawPathname) || hasParentSegment(urlPath)) {
    return { status: "outside-root" };
  }

  const filePath = resolve(rootDir, `.${urlPath}`);
  const fromRoot = relative(rootDir, filePath);
  if (
    fromRoot === ".." ||
    fromRoot.startsWith(`..${sep}`) ||
    isAbsolute(fromRoot)
  ) {
    return { status: "outside-root" };
  }

  return { status: "ok", target: { urlPath, filePath } };
}
