/**
 * Dump formatter
 *
 * Turns steps into file text: one file with a banner, or one file per
 * object plus a main file that includes them.
 */
import type { OutputFile } from "../services/file-writer.js";
import { isHeaderless, type Step } from "./ddl.js";

export interface FormatOptions {
  /** Target schema, named in the banner */
  readonly schema: string;
  /** Write the banner */
  readonly header: boolean;
  /** Write `-- Name: ...` headers */
  readonly comments: boolean;
}

export const banner = (schema: string): string =>
  `--\n-- pgfold schema dump\n--\n\n-- Dumped from schema: ${schema}\n\n\n`;

export const stepHeader = (step: Step): string =>
  `--\n-- Name: ${step.name}; Type: ${step.type}; Schema: ${step.schema}; Owner: -\n--\n\n`;

function renderStep(step: Step, comments: boolean): string {
  const header = comments && !isHeaderless(step) ? stepHeader(step) : "";
  return header + step.statements.map(s => `${s}\n`).join("");
}

/** Steps one after the other, separated by a blank line */
export const formatSteps = (steps: readonly Step[], comments: boolean): string =>
  steps.map(step => renderStep(step, comments)).join("\n");

export function formatSingleFile(steps: readonly Step[], options: FormatOptions): string {
  return (options.header ? banner(options.schema) : "") + formatSteps(steps, options.comments);
}

/** Lower-case file name made of `[a-z0-9_-]` only */
export const sanitizeFileName = (name: string): string =>
  name.toLowerCase().replace(/[^a-z0-9_-]/g, "_") || "_";

/**
 * Split a dump into one file per top-level object. The main file (named
 * `mainFile`, the other paths relative to its directory) includes the
 * object files in the order their first step appears.
 */
export function formatMultiFile(steps: readonly Step[], mainFile: string, options: FormatOptions): OutputFile[] {
  const files = new Map<string, Step[]>();
  for (const step of steps) {
    const qualified = step.schema === "-" ? step.owner.name : `${step.schema}.${step.owner.name}`;
    const path = `${step.owner.group}/${sanitizeFileName(qualified)}.sql`;
    const existing = files.get(path);
    if (existing) existing.push(step);
    else files.set(path, [step]);
  }

  const includes = [...files.keys()].map(path => `\\i ${path}\n`).join("");
  return [
    { path: mainFile, content: (options.header ? banner(options.schema) : "") + includes },
    ...[...files.entries()].map(([path, fileSteps]) => ({ path, content: formatSteps(fileSteps, options.comments) })),
  ];
}
