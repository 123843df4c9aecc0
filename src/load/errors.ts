import type { LoadError } from "./types.js";

export class SourceParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SourceParseError";
  }
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function detailOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function classifyLoadError(err: unknown, filePath: string): LoadError {
  if (errnoCode(err) === "ENOENT") {
    return { kind: "not_found", path: filePath, message: `File not found at ${filePath}` };
  }
  // Anything without an errno code came from the parser, not the filesystem.
  if (err instanceof SourceParseError || errnoCode(err) === undefined) {
    return {
      kind: "empty",
      path: filePath,
      message: `The file ${filePath} is empty or could not be parsed: ${detailOf(err)}`
    };
  }
  return {
    kind: "io",
    path: filePath,
    message: `I/O error occurred while accessing ${filePath}: ${detailOf(err)}`
  };
}

export function reportLoadError(err: unknown, filePath: string): LoadError {
  const error = classifyLoadError(err, filePath);
  console.error(`Error: ${error.message}`);
  return error;
}
