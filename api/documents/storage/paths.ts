import path from "node:path";

export class PathTraversalError extends Error {
  constructor(requested: string) {
    super(`Path escapes the upload directory: ${requested}`);
    this.name = "PathTraversalError";
  }
}

export function resolveUploadDir(configured: string): string {
  return path.resolve(configured);
}

export function safeJoin(rootDir: string, ...parts: string[]): string {
  const full = path.resolve(rootDir, ...parts);
  const root = path.resolve(rootDir) + path.sep;
  if (!full.startsWith(root)) {
    throw new PathTraversalError(parts.join("/"));
  }
  return full;
}
