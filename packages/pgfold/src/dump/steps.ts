/**
 * Step planning
 *
 * Decides which steps a dump or a fold writes, and in what order.
 */
import type { BuildResult, ObjectRef } from "../ir/builder.js";
import { emptyIgnoreRules, isIgnored, type IgnoreRules } from "../ir/ignore.js";
import {
  orderedSchemas,
  routineArgTypes,
  type DbSchema,
  type FunctionDef,
  type ProcedureDef,
  type SchemaIR,
  type Sequence,
  type Table,
  type TypeDef,
  type View,
} from "../ir/schema-ir.js";
import { topologicalSort } from "../ir/topological.js";
import { qualifiedName } from "../sql/ident.js";
import {
  routineSteps,
  sequenceOwnershipStep,
  sequenceSteps,
  tableSteps,
  triggerSteps,
  typeSteps,
  viewSteps,
  type RenderContext,
  type Step,
} from "./ddl.js";
import { detachedSteps } from "./detached.js";

export interface PlanOptions {
  readonly ignore?: IgnoreRules;
}

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Type text as written in a column or field, without modifiers or array bounds */
const baseTypeName = (dataType: string): string => dataType.replace(/\[\]/g, "").replace(/\(.*\)$/, "");

class Visible {
  constructor(
    private readonly ir: SchemaIR,
    private readonly ignore: IgnoreRules,
  ) {}

  types(schema: DbSchema): TypeDef[] {
    return [...schema.types.values()].filter(t => !isIgnored(this.ignore, "types", t.name));
  }

  sequences(schema: DbSchema): Sequence[] {
    return [...schema.sequences.values()].filter(s => !s.implicit && !isIgnored(this.ignore, "sequences", s.name));
  }

  tables(schema: DbSchema): Table[] {
    return [...schema.tables.values()].filter(t => !isIgnored(this.ignore, "tables", t.name));
  }

  views(schema: DbSchema): View[] {
    return [...schema.views.values()].filter(v => !isIgnored(this.ignore, "views", v.name));
  }

  functions(schema: DbSchema): FunctionDef[] {
    return [...schema.functions.values()].filter(f => !isIgnored(this.ignore, "functions", f.name));
  }

  procedures(schema: DbSchema): ProcedureDef[] {
    return [...schema.procedures.values()].filter(p => !isIgnored(this.ignore, "procedures", p.name));
  }

  table(schemaName: string, name: string): Table | undefined {
    const table = this.ir.schemas.get(schemaName)?.tables.get(name);
    return table && !isIgnored(this.ignore, "tables", table.name) ? table : undefined;
  }
}

// ============================================================================
// Whole-schema dump
// ============================================================================

/** Order items by their dependencies, ties by name */
function sortByDependencies<T>(items: readonly T[], keyOf: (item: T) => string, depsOf: (item: T) => readonly string[]): T[] {
  const byKey = new Map(items.map(item => [keyOf(item), item] as const));
  const keys = [...byKey.keys()].sort(byName);
  return topologicalSort(keys, key => {
    const item = byKey.get(key);
    return item === undefined ? [] : depsOf(item);
  }).flatMap(key => {
    const item = byKey.get(key);
    return item === undefined ? [] : [item];
  });
}

function sortTypes(types: readonly TypeDef[], ctx: RenderContext): TypeDef[] {
  const key = (t: TypeDef) => qualifiedName(t.schema, t.name, ctx.targetSchema);
  const deps = (t: TypeDef): string[] =>
    t.kind === "composite" ? t.fields.map(f => baseTypeName(f.dataType)) : t.kind === "domain" ? [baseTypeName(t.baseType)] : [];
  const plain = sortByDependencies(
    types.filter(t => t.kind !== "domain"),
    key,
    deps,
  );
  const domains = sortByDependencies(
    types.filter(t => t.kind === "domain"),
    key,
    deps,
  );
  return [...plain, ...domains];
}

function sortTables(tables: readonly Table[]): Table[] {
  const key = (t: Table) => `${t.schema}.${t.name}`;
  return sortByDependencies(tables, key, t =>
    [...t.constraints.values()].flatMap(c => (c.references ? [`${c.references.schema}.${c.references.table}`] : [])),
  );
}

const escapeRegExp = (text: string): string => text.replace(/[$.*+?^()[\]{}|\\]/g, "\\$&");

/** Functions in body-reference order */
function sortRoutines<T extends FunctionDef | ProcedureDef>(routines: readonly T[]): T[] {
  const key = (r: T) => `${r.schema}.${r.name}(${r.parameters.map(p => p.dataType).join(",")})`;
  return sortByDependencies(routines, key, r =>
    routines
      .filter(other => other !== r && new RegExp(`\\b${escapeRegExp(other.name)}\\s*\\(`, "i").test(r.body))
      .map(key),
  );
}

function sortViews(views: readonly View[]): View[] {
  const names = new Set(views.map(v => v.name));
  return sortByDependencies(
    views,
    v => `${v.schema}.${v.name}`,
    v => v.relations.filter(r => names.has(r)).flatMap(r => views.filter(o => o.name === r).map(o => `${o.schema}.${o.name}`)),
  );
}

/** Whether a table calls a schema function from a default, generated column or check */
function callsFunction(table: Table, functionNames: ReadonlySet<string>): boolean {
  return (
    table.columns.some(c => c.calls.some(call => functionNames.has(call))) ||
    [...table.constraints.values()].some(c => c.calls.some(call => functionNames.has(call)))
  );
}

/**
 * Steps of a whole-schema dump:
 * types, sequences, tables, functions, procedures, function-dependent
 * tables, triggers, views.
 */
export function dumpSteps(ir: SchemaIR, options: PlanOptions = {}): Step[] {
  const ctx: RenderContext = { targetSchema: ir.targetSchema };
  const visible = new Visible(ir, options.ignore ?? emptyIgnoreRules);
  const schemas = orderedSchemas(ir);
  const steps: Step[] = [];

  const types = sortTypes(schemas.flatMap(s => visible.types(s)), ctx);
  for (const type of types) steps.push(...typeSteps(type, ctx));

  const sequences = schemas.flatMap(s => visible.sequences(s).sort((a, b) => byName(a.name, b.name)));
  const ownedBy = new Map<Table, Sequence[]>();
  for (const sequence of sequences) {
    steps.push(...sequenceSteps(sequence, ctx));
    const owner = sequence.ownedBy && visible.table(sequence.ownedBy.schema, sequence.ownedBy.table);
    if (owner) {
      ownedBy.set(owner, [...(ownedBy.get(owner) ?? []), sequence]);
    } else {
      const step = sequenceOwnershipStep(sequence, { group: "sequences", name: sequence.name }, ctx);
      if (step) steps.push(step);
    }
  }

  const functions = schemas.flatMap(s => visible.functions(s));
  const functionNames = new Set(functions.map(f => f.name));
  const tables = sortTables(schemas.flatMap(s => visible.tables(s)));
  const early = tables.filter(t => !callsFunction(t, functionNames));
  const late = tables.filter(t => callsFunction(t, functionNames));

  for (const table of early) steps.push(...tableSteps(table, ctx, ownedBy.get(table)));
  for (const fn of sortRoutines(functions)) steps.push(...routineSteps(fn, ctx));
  for (const procedure of sortRoutines(schemas.flatMap(s => visible.procedures(s)))) {
    steps.push(...routineSteps(procedure, ctx));
  }
  for (const table of late) steps.push(...tableSteps(table, ctx, ownedBy.get(table)));
  for (const table of [...early, ...late]) steps.push(...triggerSteps(table, ctx));

  for (const view of sortViews(schemas.flatMap(s => visible.views(s)))) {
    steps.push(...viewSteps(view, ctx), ...triggerSteps(view, ctx));
  }

  for (const statement of ir.passthrough) {
    steps.push({
      name: statement.sql,
      type: "STATEMENT",
      schema: "-",
      statements: [`${statement.sql};`],
      owner: { group: "tables", name: "statements" },
    });
  }
  return steps;
}

// ============================================================================
// Fold
// ============================================================================

function lookup(ir: SchemaIR, ref: ObjectRef) {
  const schema = ir.schemas.get(ref.schema);
  switch (ref.kind) {
    case "type":
      return schema?.types.get(ref.key);
    case "sequence":
      return schema?.sequences.get(ref.key);
    case "table":
      return schema?.tables.get(ref.key);
    case "view":
      return schema?.views.get(ref.key);
    case "function":
      return schema?.functions.get(ref.key);
    case "procedure":
      return schema?.procedures.get(ref.key);
  }
}

/**
 * Steps for one run of statements, in source order. Each object comes with
 * everything the same run attached to it.
 */
export function foldSteps(result: BuildResult, options: PlanOptions = {}): Step[] {
  const ir = result.ir;
  const ctx: RenderContext = { targetSchema: ir.targetSchema };
  const ignore = options.ignore ?? emptyIgnoreRules;
  const visible = new Visible(ir, ignore);

  // a sequence's ownership goes after whichever of sequence and table comes last
  const position = new Map<string, number>();
  for (const entry of result.timeline) {
    if (entry.kind === "object") position.set(`${entry.ref.kind}:${entry.ref.schema}.${entry.ref.key}`, entry.index);
  }
  const ownedBy = new Map<Table, Sequence[]>();
  const ownershipWithSequence = new Set<Sequence>();
  for (const schema of ir.schemas.values()) {
    for (const sequence of visible.sequences(schema)) {
      const owner = sequence.ownedBy && visible.table(sequence.ownedBy.schema, sequence.ownedBy.table);
      const tableAt = owner ? position.get(`table:${owner.schema}.${owner.name}`) : undefined;
      const sequenceAt = position.get(`sequence:${sequence.schema}.${sequence.name}`) ?? 0;
      if (owner && tableAt !== undefined && tableAt > sequenceAt) {
        ownedBy.set(owner, [...(ownedBy.get(owner) ?? []), sequence]);
      } else {
        ownershipWithSequence.add(sequence);
      }
    }
  }

  const steps: Step[] = [];
  for (const entry of result.timeline) {
    if (entry.kind === "detached") {
      steps.push(...detachedSteps(entry.command, ctx));
      continue;
    }
    if (entry.kind === "passthrough") {
      steps.push({
        name: entry.sql,
        type: "STATEMENT",
        schema: "-",
        statements: [`${entry.sql};`],
        owner: { group: "tables", name: "statements" },
      });
      continue;
    }

    const object = lookup(ir, entry.ref);
    if (object === undefined) continue;
    switch (object.kind) {
      case "enum":
      case "composite":
      case "domain":
        if (!isIgnored(ignore, "types", object.name)) steps.push(...typeSteps(object, ctx));
        break;
      case "sequence":
        if (object.implicit || isIgnored(ignore, "sequences", object.name)) break;
        steps.push(...sequenceSteps(object, ctx));
        if (ownershipWithSequence.has(object)) {
          const step = sequenceOwnershipStep(object, { group: "sequences", name: object.name }, ctx);
          if (step) steps.push(step);
        }
        break;
      case "table":
        if (isIgnored(ignore, "tables", object.name)) break;
        steps.push(...tableSteps(object, ctx, ownedBy.get(object)), ...triggerSteps(object, ctx));
        break;
      case "view":
        if (isIgnored(ignore, "views", object.name)) break;
        steps.push(...viewSteps(object, ctx), ...triggerSteps(object, ctx));
        break;
      case "function":
        if (!isIgnored(ignore, "functions", object.name)) steps.push(...routineSteps(object, ctx));
        break;
      case "procedure":
        if (!isIgnored(ignore, "procedures", object.name)) steps.push(...routineSteps(object, ctx));
        break;
    }
  }
  return steps;
}

// ============================================================================
// Per-object rendering
// ============================================================================

/**
 * Canonical text of every top-level object, keyed `kind:schema.name`.
 * Sub-objects (indexes, policies, triggers, comments) are part of their
 * parent's text.
 */
export function objectRenderings(ir: SchemaIR, options: PlanOptions = {}): Map<string, string> {
  const ctx: RenderContext = { targetSchema: ir.targetSchema };
  const visible = new Visible(ir, options.ignore ?? emptyIgnoreRules);
  const text = (steps: readonly Step[]) => steps.flatMap(s => s.statements).join("\n");
  const out = new Map<string, string>();

  for (const schema of orderedSchemas(ir)) {
    for (const type of visible.types(schema)) out.set(`type:${schema.name}.${type.name}`, text(typeSteps(type, ctx)));
    for (const sequence of visible.sequences(schema)) {
      const ownership = sequenceOwnershipStep(sequence, { group: "sequences", name: sequence.name }, ctx);
      out.set(`sequence:${schema.name}.${sequence.name}`, text([...sequenceSteps(sequence, ctx), ...(ownership ? [ownership] : [])]));
    }
    for (const table of visible.tables(schema)) {
      out.set(`table:${schema.name}.${table.name}`, text([...tableSteps(table, ctx), ...triggerSteps(table, ctx)]));
    }
    for (const fn of visible.functions(schema)) {
      out.set(`function:${schema.name}.${fn.name}(${routineArgTypes(fn.parameters)})`, text(routineSteps(fn, ctx)));
    }
    for (const procedure of visible.procedures(schema)) {
      out.set(`procedure:${schema.name}.${procedure.name}(${routineArgTypes(procedure.parameters)})`, text(routineSteps(procedure, ctx)));
    }
    for (const view of visible.views(schema)) {
      out.set(`view:${schema.name}.${view.name}`, text([...viewSteps(view, ctx), ...triggerSteps(view, ctx)]));
    }
  }
  return out;
}
