/**
 * @file-serve/webserver - Static file serving
 *
 * Serves a directory over HTTP: files, index.html for directories, a listing
 * otherwise, and 404 for anything missing or outside the root.
 */

export {
  fileServerConfigSchema,
  defaultFileServerConfig,
  type FileServerConfig,
  type FileServerConfigInput,
} from "./config";

export { ServerManager } from "./server-manager";
export type { ServerManagerOptions, ServerAddress } from "./server-manager";

export { createFileServerApp } from "./file-server-app";
export type { FileServerAppOptions, FileServerEnv } from "./file-server-app";

export {
  resolveRequestPath,
  type RequestTarget,
  type ResolvedRequestPath,
} from "./request-path";

export {
  readDirectoryEntries,
  renderDirectoryListing,
  type DirectoryEntry,
} from "./directory-listing";

export { ServerStartupError } from "./errors";
