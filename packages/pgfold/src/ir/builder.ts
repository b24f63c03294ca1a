/**
 * Schema IR Builder
 *
 * Applies parsed commands, in order, to an empty SchemaIR. Statements that
 * attach to another object (indexes, policies, triggers, comments, ALTERs)
 * wait until their target exists: a first pass applies what it can, the
 * deferred ones are retried once every object has been created.
 */
import { Effect } from "effect";
import {
  DuplicateObject,
  ObjectNotFound,
  UnsupportedStatement,
  isSchemaBuildError,
  type SchemaBuildError,
} from "../errors.js";
import type { AlterTableAction, ColumnDef, Command, CommentTarget, ConstraintDef, Located, QName, SequenceOptions } from "../sql/ast.js";
import { quoteIdent } from "../sql/ident.js";
import {
  createSchemaIR,
  getOrCreateSchema,
  routineArgTypes,
  routineKey,
  type Column,
  type Constraint,
  type DbSchema,
  type DomainType,
  type Index,
  type SchemaIR,
  type Sequence,
  type Table,
  type View,
} from "./schema-ir.js";

// ============================================================================
// Types
// ============================================================================

export interface BuildOptions {
  readonly targetSchema: string;
  /** Fail on statements the parser does not understand */
  readonly strict: boolean;
  /** Return attachments whose target never appears instead of failing */
  readonly detachMissing?: boolean;
}

export type ObjectKind = "type" | "sequence" | "table" | "view" | "function" | "procedure";

/** Points at a top-level object: `key` is its map key inside the schema */
export interface ObjectRef {
  readonly kind: ObjectKind;
  readonly schema: string;
  readonly key: string;
}

/** What the input produced, by position of the producing statement */
export type TimelineEntry =
  | { readonly kind: "object"; readonly index: number; readonly ref: ObjectRef }
  | { readonly kind: "detached"; readonly index: number; readonly command: Located }
  | { readonly kind: "passthrough"; readonly index: number; readonly sql: string };

export interface BuildResult {
  readonly ir: SchemaIR;
  readonly timeline: readonly TimelineEntry[];
  /** Session statements and meta-commands that carry no schema */
  readonly skipped: readonly Located[];
}

interface Commentable {
  comment?: string;
}

/** An attachment's target is not there (yet) */
class Missing {
  constructor(
    readonly kind: string,
    readonly name: string,
  ) {}
}

const display = (q: QName): string => `${q.schema}.${q.name}`;

/** First free name among `base`, `base1`, `base2`, ... */
export function chooseName(base: string, taken: (name: string) => boolean): string {
  if (!taken(base)) return base;
  for (let i = 1; ; i++) {
    const candidate = `${base}${i}`;
    if (!taken(candidate)) return candidate;
  }
}

/** Name PostgreSQL gives an unnamed table constraint */
export function defaultConstraintName(table: string, kind: Constraint["kind"], columns: readonly string[]): string {
  switch (kind) {
    case "PRIMARY KEY":
      return `${table}_pkey`;
    case "UNIQUE":
      return `${table}_${columns.join("_")}_key`;
    case "FOREIGN KEY":
      return `${table}_${columns.join("_")}_fkey`;
    case "CHECK":
      return columns.length === 1 ? `${table}_${columns[0]}_check` : `${table}_check`;
  }
}

/** Column part of a default index name: the column, the called function, or `expr` */
function indexNamePart(expression: string): string {
  const plain = /^"?([^"(]+)"?$/.exec(expression);
  if (plain?.[1] !== undefined) return plain[1];
  const call = /^([a-z_][a-z0-9_]*)\(/.exec(expression);
  return call?.[1] ?? "expr";
}

/** Name PostgreSQL gives an unnamed index, before collisions are resolved */
export const defaultIndexName = (table: string, elements: readonly { readonly expression: string }[]): string =>
  `${table}_${elements.map(e => indexNamePart(e.expression)).join("_")}_idx`;

// ============================================================================
// Builder
// ============================================================================

class SchemaState {
  readonly ir: SchemaIR;
  readonly timeline: TimelineEntry[] = [];
  readonly skipped: Located[] = [];
  private index = 0;
  private location: Located["location"] | undefined;

  constructor(private readonly options: BuildOptions) {
    this.ir = createSchemaIR(options.targetSchema);
  }

  build(commands: readonly Located[]): void {
    let deferred: { index: number; command: Located; missing: Missing }[] = [];
    commands.forEach((command, index) => {
      this.index = index;
      this.location = command.location;
      const missing = this.apply(command);
      if (missing) deferred.push({ index, command, missing });
    });

    // retry until a pass makes no progress
    let progress = true;
    while (progress && deferred.length > 0) {
      progress = false;
      const remaining: typeof deferred = [];
      for (const entry of deferred) {
        this.index = entry.index;
        this.location = entry.command.location;
        const missing = this.apply(entry.command);
        if (missing) remaining.push({ ...entry, missing });
        else progress = true;
      }
      deferred = remaining;
    }

    for (const entry of deferred) {
      if (this.options.detachMissing === true) {
        this.timeline.push({ kind: "detached", index: entry.index, command: entry.command });
        continue;
      }
      // ALTER TABLE IF EXISTS on an absent table is a no-op
      if (entry.command.kind === "alter_table" && entry.command.ifExists) continue;
      const { file, line } = entry.command.location;
      throw new ObjectNotFound({
        message: `${entry.missing.kind} ${entry.missing.name} not found (referenced at ${file}:${line})`,
        kind: entry.missing.kind,
        name: entry.missing.name,
        referencedBy: `${file}:${line}`,
      });
    }

    this.resolveForeignKeys();
    this.timeline.sort((a, b) => a.index - b.index);
  }

  private apply(command: Located): Missing | undefined {
    switch (command.kind) {
      case "create_enum":
      case "create_composite":
      case "create_domain":
        this.createType(command);
        return undefined;
      case "create_sequence":
        this.createSequence(command.name, command.ifNotExists, command.options);
        return undefined;
      case "alter_sequence":
        return this.alterSequence(command.name, command.options);
      case "create_table":
        this.createTable(command);
        return undefined;
      case "alter_table":
        return this.alterTable(command.name, command.actions);
      case "create_index":
        return this.createIndex(command);
      case "create_policy":
        return this.createPolicy(command);
      case "create_trigger":
        return this.createTrigger(command);
      case "comment":
        return this.comment(command.target, command.text);
      case "create_function":
      case "create_procedure":
        this.createRoutine(command);
        return undefined;
      case "create_view":
        this.createView(command);
        return undefined;
      case "alter_type_add_value":
        return this.addEnumValue(command);
      case "alter_domain":
        return this.alterDomain(command);
      case "skip":
        this.skipped.push(command);
        return undefined;
      case "unsupported":
        if (this.options.strict) {
          const { file, line } = command.location;
          throw new UnsupportedStatement({
            message: `Unsupported statement ${command.reason} at ${file}:${line}`,
            file,
            line,
            statement: command.sql.split("\n")[0] ?? command.sql,
          });
        }
        this.ir.passthrough.push({ sql: command.sql, file: command.location.file, line: command.location.line });
        this.timeline.push({ kind: "passthrough", index: this.index, sql: command.sql });
        return undefined;
    }
  }

  // ==========================================================================
  // Lookups
  // ==========================================================================

  private schema(name: string): DbSchema {
    return getOrCreateSchema(this.ir, name);
  }

  private record(kind: ObjectKind, schema: string, key: string): void {
    this.timeline.push({ kind: "object", index: this.index, ref: { kind, schema, key } });
  }

  private duplicate(kind: string, name: string): DuplicateObject {
    return new DuplicateObject({ message: `${kind} ${name} already exists`, kind, name });
  }

  private notFound(kind: string, name: string): ObjectNotFound {
    const here = this.location ? `${this.location.file}:${this.location.line}` : "<input>";
    return new ObjectNotFound({ message: `${kind} ${name} not found (referenced at ${here})`, kind, name, referencedBy: here });
  }

  /** Tables, views, sequences and indexes share one namespace per schema */
  private relationNameTaken(schema: DbSchema, name: string): boolean {
    if (schema.tables.has(name) || schema.views.has(name) || schema.sequences.has(name)) return true;
    for (const table of schema.tables.values()) {
      if (table.indexes.has(name)) return true;
      for (const c of table.constraints.values()) {
        if ((c.kind === "PRIMARY KEY" || c.kind === "UNIQUE") && c.name === name) return true;
      }
    }
    for (const view of schema.views.values()) {
      if (view.indexes.has(name)) return true;
    }
    return false;
  }

  private findIndex(schema: DbSchema, name: string): Index | undefined {
    for (const owner of [...schema.tables.values(), ...schema.views.values()]) {
      const index = owner.indexes.get(name);
      if (index) return index;
    }
    return undefined;
  }

  // ==========================================================================
  // Types
  // ==========================================================================

  private createType(
    command: Extract<Command, { kind: "create_enum" | "create_composite" | "create_domain" }>,
  ): void {
    const schema = this.schema(command.name.schema);
    const name = command.name.name;
    if (schema.types.has(name)) throw this.duplicate("type", display(command.name));

    if (command.kind === "create_enum") {
      schema.types.set(name, { kind: "enum", schema: schema.name, name, values: [...command.values] });
    } else if (command.kind === "create_composite") {
      schema.types.set(name, { kind: "composite", schema: schema.name, name, fields: command.fields });
    } else {
      const domain: DomainType = {
        kind: "domain",
        schema: schema.name,
        name,
        baseType: command.baseType,
        default: command.default?.text,
        notNull: command.notNull,
        collation: command.collation,
        constraints: [],
      };
      for (const constraint of command.constraints) {
        this.addDomainConstraint(domain, constraint.name, constraint.check.text, false);
      }
      schema.types.set(name, domain);
    }
    this.record("type", schema.name, name);
  }

  private addDomainConstraint(domain: DomainType, name: string | undefined, check: string, notValid: boolean): void {
    const taken = (n: string) => domain.constraints.some(c => c.name === n);
    const constraintName = name ?? chooseName(`${domain.name}_check`, taken);
    if (taken(constraintName)) throw this.duplicate("constraint", `${constraintName} on domain ${domain.name}`);
    domain.constraints.push({ name: constraintName, check, notValid });
  }

  private addEnumValue(command: Extract<Command, { kind: "alter_type_add_value" }>): Missing | undefined {
    const type = this.schema(command.name.schema).types.get(command.name.name);
    if (type === undefined) return new Missing("type", display(command.name));
    if (type.kind !== "enum") throw this.notFound("enum type", display(command.name));
    if (type.values.includes(command.value)) {
      if (command.ifNotExists) return undefined;
      throw this.duplicate("enum value", `'${command.value}' of ${display(command.name)}`);
    }
    if (command.position === undefined) {
      type.values.push(command.value);
      return undefined;
    }
    const at = type.values.indexOf(command.position.neighbor);
    if (at === -1) throw this.notFound("enum value", `'${command.position.neighbor}' of ${display(command.name)}`);
    type.values.splice(command.position.before ? at : at + 1, 0, command.value);
    return undefined;
  }

  private alterDomain(command: Extract<Command, { kind: "alter_domain" }>): Missing | undefined {
    const domain = this.schema(command.name.schema).types.get(command.name.name);
    if (domain === undefined) return new Missing("domain", display(command.name));
    if (domain.kind !== "domain") throw this.notFound("domain", display(command.name));
    const action = command.action;
    switch (action.kind) {
      case "add_constraint":
        this.addDomainConstraint(domain, action.name, action.check.text, action.notValid);
        break;
      case "drop_constraint": {
        const at = domain.constraints.findIndex(c => c.name === action.name);
        if (at === -1) throw this.notFound("constraint", `${action.name} on domain ${domain.name}`);
        domain.constraints.splice(at, 1);
        break;
      }
      case "set_default":
        domain.default = action.expr.text;
        break;
      case "drop_default":
        domain.default = undefined;
        break;
      case "set_not_null":
        domain.notNull = true;
        break;
      case "drop_not_null":
        domain.notNull = false;
        break;
    }
    return undefined;
  }

  // ==========================================================================
  // Sequences
  // ==========================================================================

  private createSequence(name: QName, ifNotExists: boolean, options: SequenceOptions, implicit = false): Sequence | undefined {
    const schema = this.schema(name.schema);
    if (this.relationNameTaken(schema, name.name)) {
      if (ifNotExists && schema.sequences.has(name.name)) return undefined;
      throw this.duplicate("relation", display(name));
    }
    const sequence: Sequence = { kind: "sequence", schema: schema.name, name: name.name, cycle: false, implicit };
    this.applySequenceOptions(sequence, options);
    schema.sequences.set(name.name, sequence);
    if (!implicit) this.record("sequence", schema.name, name.name);
    return sequence;
  }

  private applySequenceOptions(sequence: Sequence, options: SequenceOptions): void {
    if (options.dataType !== undefined) sequence.dataType = options.dataType;
    if (options.increment !== undefined) sequence.increment = options.increment;
    if (options.minValue !== undefined) sequence.minValue = options.minValue ?? undefined;
    if (options.maxValue !== undefined) sequence.maxValue = options.maxValue ?? undefined;
    if (options.start !== undefined) sequence.start = options.start;
    if (options.cache !== undefined) sequence.cache = options.cache;
    if (options.cycle !== undefined) sequence.cycle = options.cycle;
    if (options.ownedBy === null) {
      sequence.ownedBy = undefined;
    } else if (options.ownedBy !== undefined) {
      sequence.ownedBy = {
        schema: options.ownedBy.table.schema,
        table: options.ownedBy.table.name,
        column: options.ownedBy.column,
      };
    }
  }

  private alterSequence(name: QName, options: SequenceOptions): Missing | undefined {
    const sequence = this.schema(name.schema).sequences.get(name.name);
    if (sequence === undefined) return new Missing("sequence", display(name));
    this.applySequenceOptions(sequence, options);
    return undefined;
  }

  // ==========================================================================
  // Tables
  // ==========================================================================

  private createTable(command: Extract<Command, { kind: "create_table" }>): void {
    const schema = this.schema(command.name.schema);
    if (this.relationNameTaken(schema, command.name.name)) {
      if (command.ifNotExists && schema.tables.has(command.name.name)) return;
      throw this.duplicate("relation", display(command.name));
    }
    const table: Table = {
      kind: "table",
      schema: schema.name,
      name: command.name.name,
      unlogged: command.unlogged,
      columns: [],
      constraints: new Map(),
      indexes: new Map(),
      policies: new Map(),
      triggers: new Map(),
      rlsEnabled: false,
      rlsForced: false,
    };
    schema.tables.set(table.name, table);
    this.record("table", schema.name, table.name);

    for (const column of command.columns) this.addColumn(table, column);
    for (const constraint of command.constraints) this.addConstraint(table, constraint);
  }

  private addColumn(table: Table, def: ColumnDef): void {
    if (table.columns.some(c => c.name === def.name)) {
      throw this.duplicate("column", `${def.name} of ${table.schema}.${table.name}`);
    }
    const column: Column = {
      name: def.name,
      dataType: def.dataType,
      notNull: def.notNull,
      default: def.default?.text,
      serial: def.serial,
      identity: def.identity,
      generated: def.generated?.text,
      collation: def.collation,
      calls: [...(def.default?.calls ?? []), ...(def.generated?.calls ?? [])],
    };
    table.columns.push(column);

    if (def.serial) {
      const schema = this.schema(table.schema);
      const name = chooseName(`${table.name}_${def.name}_seq`, n => this.relationNameTaken(schema, n));
      this.createSequence(
        { schema: table.schema, name },
        false,
        { ownedBy: { table: { schema: table.schema, name: table.name }, column: def.name } },
        true,
      );
    }

    for (const constraint of def.constraints) {
      this.addConstraint(table, constraint.kind === "CHECK" ? constraint : { ...constraint, columns: [def.name] });
    }
  }

  private addConstraint(table: Table, def: ConstraintDef): void {
    const columnNames = new Set(table.columns.map(c => c.name));
    const columns =
      def.kind === "CHECK" ? (def.check?.refs ?? []).filter(ref => columnNames.has(ref)) : def.columns;
    const schema = this.schema(table.schema);
    const indexBacked = def.kind === "PRIMARY KEY" || def.kind === "UNIQUE";
    const taken = (n: string) => table.constraints.has(n) || (indexBacked && this.relationNameTaken(schema, n));
    const name = def.name ?? chooseName(defaultConstraintName(table.name, def.kind, columns), taken);
    if (table.constraints.has(name)) {
      throw this.duplicate("constraint", `${name} on ${table.schema}.${table.name}`);
    }
    if (def.kind === "PRIMARY KEY" && [...table.constraints.values()].some(c => c.kind === "PRIMARY KEY")) {
      throw this.duplicate("primary key", `on ${table.schema}.${table.name}`);
    }

    const constraint: Constraint = {
      name,
      kind: def.kind,
      columns,
      check: def.check?.text,
      references: def.references && {
        schema: def.references.table.schema,
        table: def.references.table.name,
        columns: def.references.columns,
        onDelete: def.references.onDelete,
        onUpdate: def.references.onUpdate,
        match: def.references.match,
      },
      deferrable: def.deferrable,
      initiallyDeferred: def.initiallyDeferred,
      notValid: def.notValid,
      noInherit: def.noInherit,
      calls: def.check?.calls ?? [],
    };
    table.constraints.set(name, constraint);
  }

  private alterTable(name: QName, actions: readonly AlterTableAction[]): Missing | undefined {
    const table = this.schema(name.schema).tables.get(name.name);
    if (table === undefined) return new Missing("table", display(name));
    for (const action of actions) this.alterTableAction(table, action);
    return undefined;
  }

  private requireColumn(table: Table, name: string): Column {
    const column = table.columns.find(c => c.name === name);
    if (column === undefined) throw this.notFound("column", `${name} of ${table.schema}.${table.name}`);
    return column;
  }

  private alterTableAction(table: Table, action: AlterTableAction): void {
    switch (action.kind) {
      case "add_column":
        if (action.ifNotExists && table.columns.some(c => c.name === action.column.name)) return;
        this.addColumn(table, action.column);
        return;
      case "drop_column": {
        const at = table.columns.findIndex(c => c.name === action.column);
        if (at === -1) {
          if (action.ifExists) return;
          throw this.notFound("column", `${action.column} of ${table.schema}.${table.name}`);
        }
        table.columns.splice(at, 1);
        for (const [key, constraint] of table.constraints) {
          if (constraint.columns.includes(action.column)) table.constraints.delete(key);
        }
        const quoted = quoteIdent(action.column);
        for (const [key, index] of table.indexes) {
          if (index.elements.some(e => e.expression === quoted)) table.indexes.delete(key);
        }
        return;
      }
      case "set_default": {
        const column = this.requireColumn(table, action.column);
        column.default = action.expr.text;
        column.calls = action.expr.calls;
        return;
      }
      case "drop_default": {
        const column = this.requireColumn(table, action.column);
        column.default = undefined;
        column.calls = [];
        return;
      }
      case "set_not_null":
        this.requireColumn(table, action.column).notNull = true;
        return;
      case "drop_not_null":
        this.requireColumn(table, action.column).notNull = false;
        return;
      case "set_type":
        this.requireColumn(table, action.column).dataType = action.dataType;
        return;
      case "add_constraint":
        this.addConstraint(table, action.constraint);
        return;
      case "drop_constraint":
        if (!table.constraints.delete(action.name) && !action.ifExists) {
          throw this.notFound("constraint", `${action.name} on ${table.schema}.${table.name}`);
        }
        return;
      case "rls":
        if (action.enabled !== undefined) table.rlsEnabled = action.enabled;
        if (action.forced !== undefined) table.rlsForced = action.forced;
        return;
      case "owner":
        return;
    }
  }

  // ==========================================================================
  // Attachments
  // ==========================================================================

  private createIndex(command: Extract<Command, { kind: "create_index" }>): Missing | undefined {
    const schema = this.schema(command.table.schema);
    const owner = schema.tables.get(command.table.name) ?? schema.views.get(command.table.name);
    if (owner === undefined || (owner.kind === "view" && !owner.materialized)) {
      return new Missing("table", display(command.table));
    }
    const base = defaultIndexName(owner.name, command.elements);
    const name = command.name ?? chooseName(base, n => this.relationNameTaken(schema, n));
    if (this.relationNameTaken(schema, name)) {
      if (command.ifNotExists) return undefined;
      throw this.duplicate("relation", `${schema.name}.${name}`);
    }
    owner.indexes.set(name, {
      schema: schema.name,
      name,
      table: owner.name,
      unique: command.unique,
      method: command.method,
      elements: command.elements,
      include: command.include,
      where: command.where?.text,
    });
    return undefined;
  }

  private createPolicy(command: Extract<Command, { kind: "create_policy" }>): Missing | undefined {
    const table = this.schema(command.table.schema).tables.get(command.table.name);
    if (table === undefined) return new Missing("table", display(command.table));
    if (table.policies.has(command.name)) {
      throw this.duplicate("policy", `${command.name} on ${display(command.table)}`);
    }
    table.policies.set(command.name, {
      name: command.name,
      table: table.name,
      permissive: command.permissive,
      command: command.command,
      roles: command.roles.length === 0 ? ["PUBLIC"] : command.roles,
      using: command.using?.text,
      withCheck: command.withCheck?.text,
    });
    return undefined;
  }

  private createTrigger(command: Extract<Command, { kind: "create_trigger" }>): Missing | undefined {
    const schema = this.schema(command.table.schema);
    const owner = schema.tables.get(command.table.name) ?? schema.views.get(command.table.name);
    if (owner === undefined) return new Missing("table", display(command.table));
    const existing = owner.triggers.get(command.name);
    if (existing && !command.orReplace) {
      throw this.duplicate("trigger", `${command.name} on ${display(command.table)}`);
    }
    owner.triggers.set(command.name, {
      name: command.name,
      table: owner.name,
      timing: command.timing,
      events: command.events,
      updateColumns: command.updateColumns,
      level: command.level,
      when: command.when?.text,
      functionName: command.functionName,
      args: command.args,
      constraint: command.constraint,
      deferrable: command.deferrable,
      initiallyDeferred: command.initiallyDeferred,
      oldTable: command.oldTable,
      newTable: command.newTable,
      comment: existing?.comment,
    });
    return undefined;
  }

  private comment(target: CommentTarget, text: string | null): Missing | undefined {
    const object = this.commentable(target);
    if (object instanceof Missing) return object;
    object.comment = text ?? undefined;
    return undefined;
  }

  private commentable(target: CommentTarget): Commentable | Missing {
    const schema = this.schema(target.name.schema);
    const name = target.name.name;
    const qualified = display(target.name);
    switch (target.kind) {
      case "TABLE":
        return schema.tables.get(name) ?? new Missing("table", qualified);
      case "VIEW":
      case "MATERIALIZED VIEW":
        return schema.views.get(name) ?? new Missing("view", qualified);
      case "SEQUENCE":
        return schema.sequences.get(name) ?? new Missing("sequence", qualified);
      case "TYPE":
      case "DOMAIN":
        return schema.types.get(name) ?? new Missing("type", qualified);
      case "INDEX":
        return this.findIndex(schema, name) ?? new Missing("index", qualified);
      case "COLUMN": {
        const table = schema.tables.get(name);
        if (table === undefined) return new Missing("table", qualified);
        return this.requireColumn(table, target.member ?? "");
      }
      case "TRIGGER": {
        const owner = schema.tables.get(name) ?? schema.views.get(name);
        if (owner === undefined) return new Missing("table", qualified);
        const trigger = owner.triggers.get(target.member ?? "");
        if (trigger === undefined) throw this.notFound("trigger", `${target.member ?? ""} on ${qualified}`);
        return trigger;
      }
      case "POLICY":
      case "CONSTRAINT": {
        const table = schema.tables.get(name);
        if (table === undefined) return new Missing("table", qualified);
        const member = target.member ?? "";
        const found = target.kind === "POLICY" ? table.policies.get(member) : table.constraints.get(member);
        if (found === undefined) throw this.notFound(target.kind.toLowerCase(), `${member} on ${qualified}`);
        return found;
      }
      case "FUNCTION":
      case "PROCEDURE": {
        const routines: ReadonlyMap<string, Commentable> =
          target.kind === "FUNCTION" ? schema.functions : schema.procedures;
        const kind = target.kind.toLowerCase();
        if (target.argTypes !== undefined) {
          return routines.get(`${name}(${target.argTypes})`) ?? new Missing(kind, `${qualified}(${target.argTypes})`);
        }
        const matches = [...routines.keys()].filter(key => key.startsWith(`${name}(`));
        const only = matches.length === 1 && matches[0] !== undefined ? routines.get(matches[0]) : undefined;
        if (matches.length > 1) throw this.notFound(kind, `${qualified} (name is not unique)`);
        return only ?? new Missing(kind, qualified);
      }
    }
  }

  // ==========================================================================
  // Routines and views
  // ==========================================================================

  private createRoutine(command: Extract<Command, { kind: "create_function" | "create_procedure" }>): void {
    const def = command.def;
    const schema = this.schema(def.name.schema);
    const key = routineKey(def.name.name, def.parameters);
    const routines: ReadonlyMap<string, Commentable> = command.kind === "create_function" ? schema.functions : schema.procedures;
    const existing = routines.get(key);
    if (existing && !command.orReplace) {
      throw this.duplicate(command.kind === "create_function" ? "function" : "procedure", `${display(def.name)}(${routineArgTypes(def.parameters)})`);
    }

    const base = {
      schema: schema.name,
      name: def.name.name,
      parameters: def.parameters,
      language: def.language,
      security: def.security,
      settings: def.settings,
      body: def.body,
      comment: existing?.comment,
    };
    if (command.kind === "create_function") {
      const fn = command.def;
      schema.functions.set(key, {
        ...base,
        kind: "function",
        returns: fn.returns,
        volatility: fn.volatility,
        strict: fn.strict,
        leakproof: fn.leakproof,
        parallel: fn.parallel,
        cost: fn.cost,
        rows: fn.rows,
      });
    } else {
      schema.procedures.set(key, { ...base, kind: "procedure" });
    }
    if (!existing) this.record(command.kind === "create_function" ? "function" : "procedure", schema.name, key);
  }

  private createView(command: Extract<Command, { kind: "create_view" }>): void {
    const schema = this.schema(command.name.schema);
    const existing = schema.views.get(command.name.name);
    if (existing && command.ifNotExists) return;
    if (this.relationNameTaken(schema, command.name.name) && !(existing && command.orReplace)) {
      throw this.duplicate("relation", display(command.name));
    }
    const view: View = {
      kind: "view",
      schema: schema.name,
      name: command.name.name,
      materialized: command.materialized,
      columns: command.columns,
      query: command.query,
      relations: command.relations,
      calls: command.calls,
      withData: command.withData,
      checkOption: command.checkOption,
      indexes: existing?.indexes ?? new Map(),
      triggers: existing?.triggers ?? new Map(),
      comment: existing?.comment,
    };
    schema.views.set(view.name, view);
    if (!existing) this.record("view", schema.name, view.name);
  }

  // ==========================================================================
  // Finishing
  // ==========================================================================

  /** `REFERENCES t` without columns points at t's primary key */
  private resolveForeignKeys(): void {
    for (const schema of this.ir.schemas.values()) {
      for (const table of schema.tables.values()) {
        for (const [key, constraint] of table.constraints) {
          const references = constraint.references;
          if (references === undefined || references.columns.length > 0) continue;
          const target = this.ir.schemas.get(references.schema)?.tables.get(references.table);
          const primaryKey = target && [...target.constraints.values()].find(c => c.kind === "PRIMARY KEY");
          if (primaryKey) {
            table.constraints.set(key, { ...constraint, references: { ...references, columns: primaryKey.columns } });
          }
        }
      }
    }
  }
}

/**
 * Build the IR without effects. Throws the tagged schema errors.
 */
export function buildSchemaIR(commands: readonly Located[], options: BuildOptions): BuildResult {
  const state = new SchemaState(options);
  state.build(commands);
  return { ir: state.ir, timeline: state.timeline, skipped: state.skipped };
}

/**
 * Build the IR, logging skipped and passed-through statements.
 */
export const buildSchema = (
  commands: readonly Located[],
  options: BuildOptions,
): Effect.Effect<BuildResult, SchemaBuildError> =>
  Effect.try({ try: () => buildSchemaIR(commands, options), catch: error => error }).pipe(
    Effect.catchAll(error => (isSchemaBuildError(error) ? Effect.fail(error) : Effect.die(error))),
    Effect.tap(result =>
      Effect.forEach(result.skipped, command =>
        Effect.logDebug(
          `Skipped ${command.kind === "skip" ? command.reason : "statement"} at ${command.location.file}:${command.location.line}`,
        ),
      ),
    ),
    Effect.tap(result =>
      Effect.forEach(result.ir.passthrough, statement =>
        Effect.logWarning(`Passing through unsupported statement at ${statement.file}:${statement.line}`),
      ),
    ),
  );
