/**
 * Include Resolver
 *
 * Expands psql `\i` directives. A path ending in `/` includes every `.sql`
 * file below that folder in sorted order; any other path includes one file,
 * relative to the file holding the directive. Every include must stay inside
 * the root file's directory.
 */
import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import {
  FileReadFailed,
  IncludeCycle,
  IncludeKindMismatch,
  IncludeNotFound,
  IncludeOutsideBase,
  type IncludeError,
} from "../errors.js";

const DIRECTIVE = /^\s*\\i\s+(\S+?)\s*;?\s*$/;

/** Content lines of one file between directives */
export interface TextSegment {
  readonly kind: "text";
  readonly file: string;
  /** Line of the first content line */
  readonly line: number;
  readonly text: string;
}

/** A directive and the files it pulled in */
export interface IncludeSegment {
  readonly kind: "include";
  readonly file: string;
  readonly line: number;
  /** Directive line as written, without its line break */
  readonly directive: string;
  readonly target: string;
  /** Whether the directive line ended in a line break */
  readonly lineBreak: boolean;
  readonly files: readonly FileSegment[];
}

export interface FileSegment {
  readonly kind: "file";
  readonly path: string;
  readonly segments: readonly Segment[];
}

export type Segment = TextSegment | IncludeSegment;

export interface ExpandedSchema {
  readonly root: FileSegment;
  /** Concatenated schema text */
  readonly text: string;
  /** Every file read, in inclusion order */
  readonly files: readonly string[];
}

type Env = FileSystem.FileSystem | Path.Path;

/** Split into lines, each keeping its line break */
const splitLines = (text: string): string[] => (text === "" ? [] : text.split(/(?<=\n)/));

/** Text of a file segment with every directive replaced */
export function segmentText(file: FileSegment): string {
  let out = "";
  for (const segment of file.segments) {
    if (segment.kind === "text") {
      out += segment.text;
      continue;
    }
    const folder = segment.target.endsWith("/");
    const included = segment.files
      .map(f => {
        const text = segmentText(f);
        return folder && text !== "" && !text.endsWith("\n") ? `${text}\n` : text;
      })
      .join("");
    out += included;
    // the directive's own line break, unless the included text already ends in one;
    // an include that yields nothing drops the directive line entirely
    if (segment.lineBreak && included !== "" && !included.endsWith("\n")) out += "\n";
  }
  return out;
}

class Resolver {
  readonly files: string[] = [];

  constructor(
    private readonly fs: FileSystem.FileSystem,
    private readonly path: Path.Path,
    private readonly baseDir: string,
  ) {}

  readFile(file: string, includedFrom: string): Effect.Effect<string, IncludeError> {
    return this.fs.readFileString(file).pipe(
      Effect.mapError(
        cause =>
          new FileReadFailed({
            message: `Failed to read ${file}${includedFrom ? ` (included from ${includedFrom})` : ""}`,
            path: file,
            cause,
          }),
      ),
    );
  }

  /** Resolve directive path `target` written in `from` */
  resolveTarget(target: string, from: string): Effect.Effect<string, IncludeOutsideBase> {
    const path = this.path;
    const baseDir = this.baseDir;
    return Effect.gen(function* () {
      if (target.split(/[\\/]/).includes("..")) {
        return yield* Effect.fail(
          new IncludeOutsideBase({
            message: `Include path ${target} in ${from} may not contain '..'`,
            path: target,
            baseDir,
          }),
        );
      }
      const resolved = path.resolve(path.dirname(from), target);
      const relative = path.relative(baseDir, resolved);
      if (relative.startsWith("..") || path.isAbsolute(relative)) {
        return yield* Effect.fail(
          new IncludeOutsideBase({
            message: `Include path ${target} in ${from} resolves outside ${baseDir}`,
            path: resolved,
            baseDir,
          }),
        );
      }
      return resolved;
    });
  }

  /** Every `.sql` file below a folder, depth first in sorted order */
  listFolder(folder: string): Effect.Effect<string[], IncludeError> {
    const self = this;
    return Effect.gen(function* () {
      const entries = yield* self.fs.readDirectory(folder).pipe(
        Effect.mapError(cause => new FileReadFailed({ message: `Failed to list ${folder}`, path: folder, cause })),
      );
      const out: string[] = [];
      for (const entry of [...entries].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))) {
        const full = self.path.join(folder, entry);
        const info = yield* self.fs.stat(full).pipe(
          Effect.mapError(cause => new FileReadFailed({ message: `Failed to stat ${full}`, path: full, cause })),
        );
        if (info.type === "Directory") out.push(...(yield* self.listFolder(full)));
        else if (info.type === "File" && entry.endsWith(".sql")) out.push(full);
      }
      return out;
    });
  }

  include(
    directive: string,
    target: string,
    from: string,
    line: number,
    lineBreak: boolean,
    stack: readonly string[],
  ): Effect.Effect<IncludeSegment, IncludeError> {
    const self = this;
    return Effect.gen(function* () {
      const folder = target.endsWith("/");
      const resolved = yield* self.resolveTarget(target, from);
      const exists = yield* self.fs.exists(resolved).pipe(
        Effect.mapError(cause => new FileReadFailed({ message: `Failed to stat ${resolved}`, path: resolved, cause })),
      );
      if (!exists) {
        return yield* Effect.fail(
          new IncludeNotFound({
            message: `Included ${folder ? "folder" : "file"} ${target} not found (included from ${from}:${line})`,
            path: resolved,
            includedFrom: from,
          }),
        );
      }
      const info = yield* self.fs.stat(resolved).pipe(
        Effect.mapError(cause => new FileReadFailed({ message: `Failed to stat ${resolved}`, path: resolved, cause })),
      );
      if (folder && info.type !== "Directory") {
        return yield* Effect.fail(
          new IncludeKindMismatch({
            message: `${target} in ${from}:${line} is a file; drop the trailing '/' to include it`,
            path: resolved,
            expected: "directory",
          }),
        );
      }
      if (!folder && info.type === "Directory") {
        return yield* Effect.fail(
          new IncludeKindMismatch({
            message: `${target} in ${from}:${line} is a folder; add a trailing '/' to include it`,
            path: resolved,
            expected: "file",
          }),
        );
      }

      const targets = folder ? yield* self.listFolder(resolved) : [resolved];
      const files: FileSegment[] = [];
      for (const file of targets) files.push(yield* self.expand(file, [...stack], from));
      return { kind: "include", file: from, line, directive, target, lineBreak, files } satisfies IncludeSegment;
    });
  }

  expand(file: string, stack: readonly string[], includedFrom = ""): Effect.Effect<FileSegment, IncludeError> {
    const self = this;
    return Effect.gen(function* () {
      if (stack.includes(file)) {
        const chain = [...stack.slice(stack.indexOf(file)), file];
        return yield* Effect.fail(new IncludeCycle({ message: `Include cycle: ${chain.join(" -> ")}`, chain }));
      }
      const source = yield* self.readFile(file, includedFrom);
      return yield* self.expandSource(source, file, [...stack, file]);
    });
  }

  expandSource(source: string, file: string, stack: readonly string[]): Effect.Effect<FileSegment, IncludeError> {
    const self = this;
    return Effect.gen(function* () {
      self.files.push(file);
      yield* Effect.logDebug(`Expanding ${file}`);
      const segments: Segment[] = [];
      let buffer = "";
      let bufferLine = 1;

      const lines = splitLines(source);
      for (const [i, raw] of lines.entries()) {
        const content = raw.endsWith("\n") ? raw.slice(0, raw.endsWith("\r\n") ? -2 : -1) : raw;
        const match = DIRECTIVE.exec(content);
        const target = match?.[1];
        if (target === undefined) {
          if (buffer === "") bufferLine = i + 1;
          buffer += raw;
          continue;
        }
        if (buffer !== "") segments.push({ kind: "text", file, line: bufferLine, text: buffer });
        buffer = "";
        segments.push(yield* self.include(content, target, file, i + 1, raw.endsWith("\n"), stack));
      }
      if (buffer !== "") segments.push({ kind: "text", file, line: bufferLine, text: buffer });
      return { kind: "file", path: file, segments } satisfies FileSegment;
    });
  }
}

/**
 * Expand the schema rooted at `file`.
 */
export const expandFile = (file: string): Effect.Effect<ExpandedSchema, IncludeError, Env> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const absolute = path.resolve(file);
    const resolver = new Resolver(fs, path, path.dirname(absolute));
    const root = yield* resolver.expand(absolute, []);
    return { root, text: segmentText(root), files: resolver.files };
  });

/**
 * Expand in-memory text whose includes are relative to `baseDir`.
 */
export const expandText = (
  text: string,
  baseDir: string,
  name = "<input>",
): Effect.Effect<ExpandedSchema, IncludeError, Env> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const base = path.resolve(baseDir);
    const resolver = new Resolver(fs, path, base);
    const root = yield* resolver.expandSource(text, path.join(base, name), []);
    return { root, text: segmentText(root), files: resolver.files };
  });
