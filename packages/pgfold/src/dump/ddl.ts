/**
 * Canonical DDL
 *
 * Renders IR objects as canonical statements, grouped into steps: one step
 * per dumped object, each with the header information the formatter writes
 * above it.
 */
import type {
  Column,
  CompositeType,
  Constraint,
  DomainType,
  EnumType,
  ForeignKeyTarget,
  FunctionDef,
  Index,
  IndexElement,
  Parameter,
  Policy,
  ProcedureDef,
  Sequence,
  Table,
  Trigger,
  TypeDef,
  View,
} from "../ir/schema-ir.js";
import { routineArgTypes } from "../ir/schema-ir.js";
import { qualifiedName, quoteIdent, quoteLiteral } from "../sql/ident.js";

// ============================================================================
// Steps
// ============================================================================

export type StepType =
  | "TYPE"
  | "DOMAIN"
  | "SEQUENCE"
  | "SEQUENCE OWNED BY"
  | "TABLE"
  | "CONSTRAINT"
  | "INDEX"
  | "POLICY"
  | "TRIGGER"
  | "FUNCTION"
  | "PROCEDURE"
  | "VIEW"
  | "MATERIALIZED VIEW"
  | "COMMENT"
  | "STATEMENT";

/** Directory a step lands in when the dump is split into files */
export type StepGroup =
  | "types"
  | "domains"
  | "sequences"
  | "functions"
  | "procedures"
  | "tables"
  | "views"
  | "materialized_views";

export interface Step {
  /** Name written in the header */
  readonly name: string;
  readonly type: StepType;
  /** `-` for the target schema */
  readonly schema: string;
  readonly statements: readonly string[];
  /** Top-level object the step belongs to */
  readonly owner: { readonly group: StepGroup; readonly name: string };
}

/** COMMENT ON and passed-through statements are written without a header */
export const isHeaderless = (step: Step): boolean => step.type === "COMMENT" || step.type === "STATEMENT";

export interface RenderContext {
  readonly targetSchema: string;
}

export const headerSchema = (schema: string, ctx: RenderContext): string => (schema === ctx.targetSchema ? "-" : schema);

const qualify = (schema: string, name: string, ctx: RenderContext): string => qualifiedName(schema, name, ctx.targetSchema);

function commentStep(
  label: string,
  target: string,
  text: string,
  schema: string,
  owner: Step["owner"],
  ctx: RenderContext,
): Step {
  return {
    name: target,
    type: "COMMENT",
    schema: headerSchema(schema, ctx),
    statements: [`COMMENT ON ${label} ${target} IS ${quoteLiteral(text)};`],
    owner,
  };
}

// ============================================================================
// Types
// ============================================================================

function renderEnum(type: EnumType, ctx: RenderContext): string {
  const name = qualify(type.schema, type.name, ctx);
  if (type.values.length === 0) return `CREATE TYPE ${name} AS ENUM ();`;
  return `CREATE TYPE ${name} AS ENUM (\n${type.values.map(v => `    ${quoteLiteral(v)}`).join(",\n")}\n);`;
}

function renderComposite(type: CompositeType, ctx: RenderContext): string {
  const fields = type.fields.map(f => `${quoteIdent(f.name)} ${f.dataType}`).join(", ");
  return `CREATE TYPE ${qualify(type.schema, type.name, ctx)} AS (${fields});`;
}

function renderDomain(domain: DomainType, ctx: RenderContext): string[] {
  const name = qualify(domain.schema, domain.name, ctx);
  const lines = [`CREATE DOMAIN ${name} AS ${domain.baseType}${domain.collation ? ` COLLATE ${domain.collation}` : ""}`];
  if (domain.default !== undefined) lines.push(`  DEFAULT ${domain.default}`);
  if (domain.notNull) lines.push("  NOT NULL");
  for (const c of domain.constraints.filter(c => !c.notValid)) {
    lines.push(`  CONSTRAINT ${quoteIdent(c.name)} CHECK (${c.check})`);
  }
  const statements = [`${lines.join("\n")};`];
  for (const c of domain.constraints.filter(c => c.notValid)) {
    statements.push(`ALTER DOMAIN ${name} ADD CONSTRAINT ${quoteIdent(c.name)} CHECK (${c.check}) NOT VALID;`);
  }
  return statements;
}

export function typeSteps(type: TypeDef, ctx: RenderContext): Step[] {
  const schema = headerSchema(type.schema, ctx);
  const isDomain = type.kind === "domain";
  const owner = { group: isDomain ? "domains" : "types", name: type.name } as const;
  const statements =
    type.kind === "enum" ? [renderEnum(type, ctx)] : type.kind === "composite" ? [renderComposite(type, ctx)] : renderDomain(type, ctx);
  const steps: Step[] = [{ name: type.name, type: isDomain ? "DOMAIN" : "TYPE", schema, statements, owner }];
  if (type.comment !== undefined) {
    steps.push(commentStep(isDomain ? "DOMAIN" : "TYPE", qualify(type.schema, type.name, ctx), type.comment, type.schema, owner, ctx));
  }
  return steps;
}

// ============================================================================
// Sequences
// ============================================================================

const TYPE_LIMITS: Readonly<Record<string, { readonly min: string; readonly max: string }>> = {
  smallint: { min: "-32768", max: "32767" },
  integer: { min: "-2147483648", max: "2147483647" },
  bigint: { min: "-9223372036854775808", max: "9223372036854775807" },
};

/** Sequence options that differ from what the data type implies */
export function sequenceOptions(sequence: Sequence): string {
  const dataType = sequence.dataType ?? "bigint";
  const limits = TYPE_LIMITS[dataType] ?? TYPE_LIMITS.bigint;
  const increment = sequence.increment ?? "1";
  const ascending = !increment.startsWith("-");
  const defaultMin = ascending ? "1" : limits?.min;
  const defaultMax = ascending ? limits?.max : "-1";

  let options = "";
  if (dataType !== "bigint") options += ` AS ${dataType}`;
  if (increment !== "1") options += ` INCREMENT BY ${increment}`;
  if (sequence.minValue !== undefined && sequence.minValue !== defaultMin) options += ` MINVALUE ${sequence.minValue}`;
  if (sequence.maxValue !== undefined && sequence.maxValue !== defaultMax) options += ` MAXVALUE ${sequence.maxValue}`;
  if (sequence.cache !== undefined && sequence.cache !== "1") options += ` CACHE ${sequence.cache}`;
  if (sequence.cycle) options += " CYCLE";
  return options;
}

export function sequenceSteps(sequence: Sequence, ctx: RenderContext): Step[] {
  const name = qualify(sequence.schema, sequence.name, ctx);
  const owner = { group: "sequences", name: sequence.name } as const;
  const steps: Step[] = [
    {
      name: sequence.name,
      type: "SEQUENCE",
      schema: headerSchema(sequence.schema, ctx),
      statements: [`CREATE SEQUENCE IF NOT EXISTS ${name}${sequenceOptions(sequence)};`],
      owner,
    },
  ];
  if (sequence.comment !== undefined) {
    steps.push(commentStep("SEQUENCE", name, sequence.comment, sequence.schema, owner, ctx));
  }
  return steps;
}

/** `ALTER SEQUENCE ... OWNED BY`, filed with whichever object it follows */
export function sequenceOwnershipStep(sequence: Sequence, owner: Step["owner"], ctx: RenderContext): Step | undefined {
  if (sequence.ownedBy === undefined) return undefined;
  const table = qualify(sequence.ownedBy.schema, sequence.ownedBy.table, ctx);
  return {
    name: sequence.name,
    type: "SEQUENCE OWNED BY",
    schema: headerSchema(sequence.schema, ctx),
    statements: [
      `ALTER SEQUENCE ${qualify(sequence.schema, sequence.name, ctx)} OWNED BY ${table}.${quoteIdent(sequence.ownedBy.column)};`,
    ],
    owner,
  };
}

// ============================================================================
// Tables
// ============================================================================

export function renderReferences(ref: ForeignKeyTarget, ctx: RenderContext): string {
  const columns = ref.columns.length > 0 ? `(${ref.columns.map(quoteIdent).join(", ")})` : "";
  let out = `REFERENCES ${qualify(ref.schema, ref.table, ctx)}${columns}`;
  if (ref.match === "FULL") out += " MATCH FULL";
  if (ref.onUpdate !== undefined && ref.onUpdate !== "NO ACTION") out += ` ON UPDATE ${ref.onUpdate}`;
  if (ref.onDelete !== undefined && ref.onDelete !== "NO ACTION") out += ` ON DELETE ${ref.onDelete}`;
  return out;
}

const deferral = (c: { readonly deferrable: boolean; readonly initiallyDeferred: boolean }): string =>
  c.deferrable ? ` DEFERRABLE${c.initiallyDeferred ? " INITIALLY DEFERRED" : ""}` : "";

/** Constraint body after `CONSTRAINT name` */
export function renderConstraintBody(constraint: Constraint, ctx: RenderContext): string {
  const columns = constraint.columns.map(quoteIdent).join(", ");
  switch (constraint.kind) {
    case "PRIMARY KEY":
      return `PRIMARY KEY (${columns})${deferral(constraint)}`;
    case "UNIQUE":
      return `UNIQUE (${columns})${deferral(constraint)}`;
    case "FOREIGN KEY": {
      const references = constraint.references ? ` ${renderReferences(constraint.references, ctx)}` : "";
      return `FOREIGN KEY (${columns})${references}${deferral(constraint)}`;
    }
    case "CHECK":
      return `CHECK (${constraint.check ?? ""})${constraint.noInherit ? " NO INHERIT" : ""}`;
  }
}

const CONSTRAINT_ORDER: Readonly<Record<Constraint["kind"], number>> = {
  "PRIMARY KEY": 0,
  UNIQUE: 1,
  "FOREIGN KEY": 2,
  CHECK: 3,
};

/** NOT VALID only applies to foreign keys and checks */
const isDeferredValidation = (c: Constraint): boolean =>
  c.notValid && (c.kind === "FOREIGN KEY" || c.kind === "CHECK");

/** Whether a constraint is written on its column's line */
export function isInlineConstraint(table: Table, c: Constraint): boolean {
  const column = c.columns[0];
  if (c.columns.length !== 1 || column === undefined || c.deferrable || isDeferredValidation(c)) return false;
  switch (c.kind) {
    case "PRIMARY KEY":
      return c.name === `${table.name}_pkey`;
    case "UNIQUE":
      return c.name === `${table.name}_${column}_key`;
    case "FOREIGN KEY":
      return c.name === `${table.name}_${column}_fkey` && (c.references?.columns.length ?? 0) <= 1;
    case "CHECK":
      return c.name === `${table.name}_${column}_check` && !c.noInherit;
  }
}

function renderColumn(column: Column, inline: readonly Constraint[], primaryKey: ReadonlySet<string>, ctx: RenderContext): string {
  let line = `${quoteIdent(column.name)} ${column.dataType}`;
  if (column.collation !== undefined) line += ` COLLATE ${column.collation}`;
  const find = (kind: Constraint["kind"]) => inline.find(c => c.kind === kind);
  if (find("PRIMARY KEY")) line += " PRIMARY KEY";
  if (column.identity !== undefined) line += ` GENERATED ${column.identity} AS IDENTITY`;
  if (column.generated !== undefined) line += ` GENERATED ALWAYS AS (${column.generated}) STORED`;
  if (column.default !== undefined) line += ` DEFAULT ${column.default}`;
  if (column.notNull && !primaryKey.has(column.name)) line += " NOT NULL";
  if (find("UNIQUE")) line += " UNIQUE";
  const fk = find("FOREIGN KEY");
  if (fk?.references) line += ` ${renderReferences(fk.references, ctx)}`;
  const check = find("CHECK");
  if (check) line += ` CHECK (${check.check ?? ""})`;
  return line;
}

export function renderTable(table: Table, ctx: RenderContext): string {
  const constraints = [...table.constraints.values()].filter(c => !isDeferredValidation(c));
  const inline = constraints.filter(c => isInlineConstraint(table, c));
  const separate = constraints
    .filter(c => !inline.includes(c))
    .sort((a, b) => CONSTRAINT_ORDER[a.kind] - CONSTRAINT_ORDER[b.kind] || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const primaryKey = new Set(constraints.find(c => c.kind === "PRIMARY KEY")?.columns ?? []);

  const lines = [
    ...table.columns.map(column =>
      renderColumn(
        column,
        inline.filter(c => c.columns[0] === column.name),
        primaryKey,
        ctx,
      ),
    ),
    ...separate.map(c => `CONSTRAINT ${quoteIdent(c.name)} ${renderConstraintBody(c, ctx)}`),
  ];
  const body = lines.length > 0 ? `${lines.map(l => `    ${l}`).join(",\n")}\n` : "";
  return `CREATE ${table.unlogged ? "UNLOGGED " : ""}TABLE IF NOT EXISTS ${qualify(table.schema, table.name, ctx)} (\n${body});`;
}

export function renderIndexElement(element: IndexElement): string {
  let out = element.expression;
  if (element.opclass !== undefined) out += ` ${element.opclass}`;
  if (element.descending) out += " DESC";
  // NULLS LAST is the default for ASC, NULLS FIRST for DESC
  if (element.nulls === "FIRST" && !element.descending) out += " NULLS FIRST";
  if (element.nulls === "LAST" && element.descending) out += " NULLS LAST";
  return out;
}

export function renderIndex(index: Index, ctx: RenderContext): string {
  const method = index.method === "btree" ? "" : ` USING ${index.method}`;
  const include = index.include.length > 0 ? ` INCLUDE (${index.include.map(quoteIdent).join(", ")})` : "";
  const where = index.where !== undefined ? ` WHERE ${index.where}` : "";
  const elements = index.elements.map(renderIndexElement).join(", ");
  return `CREATE ${index.unique ? "UNIQUE " : ""}INDEX IF NOT EXISTS ${quoteIdent(index.name)} ON ${qualify(index.schema, index.table, ctx)}${method} (${elements})${include}${where};`;
}

export function renderPolicy(policy: Policy, schema: string, ctx: RenderContext): string {
  let out = `CREATE POLICY ${quoteIdent(policy.name)} ON ${qualify(schema, policy.table, ctx)}`;
  if (!policy.permissive) out += " AS RESTRICTIVE";
  if (policy.command !== "ALL") out += ` FOR ${policy.command}`;
  out += ` TO ${[...policy.roles].sort().join(", ")}`;
  if (policy.using !== undefined) out += ` USING (${policy.using})`;
  if (policy.withCheck !== undefined) out += ` WITH CHECK (${policy.withCheck})`;
  return `${out};`;
}

const EVENT_ORDER = ["INSERT", "UPDATE", "DELETE", "TRUNCATE"] as const;

export function renderTrigger(trigger: Trigger, schema: string, ctx: RenderContext): string {
  const events = EVENT_ORDER.filter(e => trigger.events.includes(e))
    .map(e => (e === "UPDATE" && trigger.updateColumns.length > 0 ? `UPDATE OF ${trigger.updateColumns.map(quoteIdent).join(", ")}` : e))
    .join(" OR ");
  const lines = [
    trigger.constraint ? `CREATE CONSTRAINT TRIGGER ${quoteIdent(trigger.name)}` : `CREATE OR REPLACE TRIGGER ${quoteIdent(trigger.name)}`,
    `    ${trigger.timing} ${events}`,
    `    ON ${qualify(schema, trigger.table, ctx)}`,
  ];
  if (trigger.constraint) {
    lines.push(
      trigger.deferrable
        ? `    DEFERRABLE INITIALLY ${trigger.initiallyDeferred ? "DEFERRED" : "IMMEDIATE"}`
        : "    NOT DEFERRABLE INITIALLY IMMEDIATE",
    );
  }
  if (trigger.oldTable !== undefined || trigger.newTable !== undefined) {
    const parts = [
      trigger.oldTable !== undefined ? `OLD TABLE AS ${quoteIdent(trigger.oldTable)}` : "",
      trigger.newTable !== undefined ? `NEW TABLE AS ${quoteIdent(trigger.newTable)}` : "",
    ].filter(p => p !== "");
    lines.push(`    REFERENCING ${parts.join(" ")}`);
  }
  lines.push(`    FOR EACH ${trigger.level}`);
  if (trigger.when !== undefined) lines.push(`    WHEN (${trigger.when})`);
  lines.push(`    EXECUTE FUNCTION ${trigger.functionName}(${trigger.args.join(", ")});`);
  return lines.join("\n");
}

/** Sub-objects of a table, in dump order */
export function tableSteps(table: Table, ctx: RenderContext, ownedSequences: readonly Sequence[] = []): Step[] {
  const schema = headerSchema(table.schema, ctx);
  const owner = { group: "tables", name: table.name } as const;
  const name = qualify(table.schema, table.name, ctx);
  const byName = <T extends { readonly name: string }>(items: Iterable<T>): T[] =>
    [...items].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const steps: Step[] = [{ name: table.name, type: "TABLE", schema, statements: [renderTable(table, ctx)], owner }];
  if (table.comment !== undefined) steps.push(commentStep("TABLE", name, table.comment, table.schema, owner, ctx));
  for (const column of table.columns) {
    if (column.comment !== undefined) {
      steps.push(commentStep("COLUMN", `${name}.${quoteIdent(column.name)}`, column.comment, table.schema, owner, ctx));
    }
  }
  for (const c of byName(table.constraints.values())) {
    if (c.comment !== undefined) {
      steps.push(commentStep("CONSTRAINT", `${quoteIdent(c.name)} ON ${name}`, c.comment, table.schema, owner, ctx));
    }
  }

  for (const sequence of ownedSequences) {
    const step = sequenceOwnershipStep(sequence, owner, ctx);
    if (step) steps.push(step);
  }

  for (const c of byName([...table.constraints.values()].filter(isDeferredValidation))) {
    steps.push({
      name: `${table.name} ${c.name}`,
      type: "CONSTRAINT",
      schema,
      statements: [`ALTER TABLE ${name} ADD CONSTRAINT ${quoteIdent(c.name)} ${renderConstraintBody(c, ctx)} NOT VALID;`],
      owner,
    });
  }

  steps.push(...indexSteps(table.indexes.values(), owner, ctx));

  const rls: string[] = [];
  if (table.rlsEnabled) rls.push(`ALTER TABLE ${name} ENABLE ROW LEVEL SECURITY;`);
  if (table.rlsForced) rls.push(`ALTER TABLE ${name} FORCE ROW LEVEL SECURITY;`);
  if (rls.length > 0) steps.push({ name: table.name, type: "TABLE", schema, statements: rls, owner });

  for (const policy of byName(table.policies.values())) {
    steps.push({
      name: `${table.name} ${policy.name}`,
      type: "POLICY",
      schema,
      statements: [renderPolicy(policy, table.schema, ctx)],
      owner,
    });
    if (policy.comment !== undefined) {
      steps.push(commentStep("POLICY", `${quoteIdent(policy.name)} ON ${name}`, policy.comment, table.schema, owner, ctx));
    }
  }
  return steps;
}

export function indexSteps(indexes: Iterable<Index>, owner: Step["owner"], ctx: RenderContext): Step[] {
  const steps: Step[] = [];
  const sorted = [...indexes].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const index of sorted) {
    steps.push({
      name: index.name,
      type: "INDEX",
      schema: headerSchema(index.schema, ctx),
      statements: [renderIndex(index, ctx)],
      owner,
    });
    if (index.comment !== undefined) {
      steps.push(commentStep("INDEX", qualify(index.schema, index.name, ctx), index.comment, index.schema, owner, ctx));
    }
  }
  return steps;
}

/** Triggers of a table or view, by name */
export function triggerSteps(owner: Table | View, ctx: RenderContext): Step[] {
  const group = owner.kind === "table" ? "tables" : owner.materialized ? "materialized_views" : "views";
  const stepOwner = { group, name: owner.name } as const;
  const name = qualify(owner.schema, owner.name, ctx);
  const steps: Step[] = [];
  const sorted = [...owner.triggers.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const trigger of sorted) {
    steps.push({
      name: `${owner.name} ${trigger.name}`,
      type: "TRIGGER",
      schema: headerSchema(owner.schema, ctx),
      statements: [renderTrigger(trigger, owner.schema, ctx)],
      owner: stepOwner,
    });
    if (trigger.comment !== undefined) {
      steps.push(commentStep("TRIGGER", `${quoteIdent(trigger.name)} ON ${name}`, trigger.comment, owner.schema, stepOwner, ctx));
    }
  }
  return steps;
}

// ============================================================================
// Routines
// ============================================================================

/** Pick a dollar-quote tag that does not occur in the body */
export function dollarQuote(body: string, tag = "function"): string {
  if (!body.includes("$$")) return `$$${body}$$`;
  let candidate = `$${tag}$`;
  for (let i = 1; body.includes(candidate); i++) candidate = `$${tag}${i}$`;
  return `${candidate}${body}${candidate}`;
}

function renderParameter(p: Parameter): string {
  const mode = p.mode === "IN" ? "" : `${p.mode} `;
  const name = p.name !== undefined ? `${quoteIdent(p.name)} ` : "";
  const defaultValue = p.default !== undefined ? ` DEFAULT ${p.default}` : "";
  return `${mode}${name}${p.dataType}${defaultValue}`;
}

function renderParameters(parameters: readonly Parameter[]): string {
  if (parameters.length === 0) return "()";
  return `(\n${parameters.map(p => `    ${renderParameter(p)}`).join(",\n")}\n)`;
}

const renderSettings = (settings: FunctionDef["settings"]): string[] =>
  settings.map(([name, value]) => (value === "FROM CURRENT" ? `SET ${name} FROM CURRENT` : `SET ${name} ${value}`));

export function renderFunction(fn: FunctionDef, ctx: RenderContext): string {
  const lines = [
    `CREATE OR REPLACE FUNCTION ${qualify(fn.schema, fn.name, ctx)}${renderParameters(fn.parameters)}`,
    `RETURNS ${fn.returns}`,
    `LANGUAGE ${fn.language}`,
    `SECURITY ${fn.security}`,
    fn.volatility,
  ];
  if (fn.strict) lines.push("STRICT");
  if (fn.leakproof) lines.push("LEAKPROOF");
  if (fn.parallel !== undefined) lines.push(`PARALLEL ${fn.parallel}`);
  if (fn.cost !== undefined) lines.push(`COST ${fn.cost}`);
  if (fn.rows !== undefined) lines.push(`ROWS ${fn.rows}`);
  lines.push(...renderSettings(fn.settings));
  lines.push(`AS ${dollarQuote(fn.body)};`);
  return lines.join("\n");
}

export function renderProcedure(procedure: ProcedureDef, ctx: RenderContext): string {
  return [
    `CREATE OR REPLACE PROCEDURE ${qualify(procedure.schema, procedure.name, ctx)}${renderParameters(procedure.parameters)}`,
    `LANGUAGE ${procedure.language}`,
    `SECURITY ${procedure.security}`,
    ...renderSettings(procedure.settings),
    `AS ${dollarQuote(procedure.body, "procedure")};`,
  ].join("\n");
}

export function routineSteps(routine: FunctionDef | ProcedureDef, ctx: RenderContext): Step[] {
  const isFunction = routine.kind === "function";
  const owner = { group: isFunction ? "functions" : "procedures", name: routine.name } as const;
  const steps: Step[] = [
    {
      name: routine.name,
      type: isFunction ? "FUNCTION" : "PROCEDURE",
      schema: headerSchema(routine.schema, ctx),
      statements: [routine.kind === "function" ? renderFunction(routine, ctx) : renderProcedure(routine, ctx)],
      owner,
    },
  ];
  if (routine.comment !== undefined) {
    const target = `${qualify(routine.schema, routine.name, ctx)}(${routineArgTypes(routine.parameters)})`;
    steps.push(commentStep(isFunction ? "FUNCTION" : "PROCEDURE", target, routine.comment, routine.schema, owner, ctx));
  }
  return steps;
}

// ============================================================================
// Views
// ============================================================================

export function renderView(view: View, ctx: RenderContext): string {
  const name = qualify(view.schema, view.name, ctx);
  const columns = view.columns.length > 0 ? ` (${view.columns.map(quoteIdent).join(", ")})` : "";
  if (view.materialized) {
    return `CREATE MATERIALIZED VIEW IF NOT EXISTS ${name}${columns} AS\n${view.query}${view.withData ? "" : "\n  WITH NO DATA"};;`;
  }
  const check = view.checkOption !== undefined ? `\n  WITH ${view.checkOption} CHECK OPTION` : "";
  return `CREATE OR REPLACE VIEW ${name}${columns} AS\n${view.query}${check};;`;
}

export function viewSteps(view: View, ctx: RenderContext): Step[] {
  const type = view.materialized ? "MATERIALIZED VIEW" : "VIEW";
  const owner = { group: view.materialized ? "materialized_views" : "views", name: view.name } as const;
  const steps: Step[] = [
    { name: view.name, type, schema: headerSchema(view.schema, ctx), statements: [renderView(view, ctx)], owner },
  ];
  if (view.comment !== undefined) {
    steps.push(commentStep(type, qualify(view.schema, view.name, ctx), view.comment, view.schema, owner, ctx));
  }
  steps.push(...indexSteps(view.indexes.values(), owner, ctx));
  return steps;
}
