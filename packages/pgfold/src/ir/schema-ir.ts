/**
 * Schema IR
 *
 * In-memory model of a schema rebuilt from DDL text. Objects are plain
 * mutable records owned by the builder; everything downstream (canonical
 * rendering, comparison, fingerprinting) only reads them.
 */

// ============================================================================
// Table parts
// ============================================================================

export interface Column {
  readonly name: string;
  dataType: string;
  notNull: boolean;
  default?: string;
  /** Declared as serial/bigserial/smallserial */
  serial: boolean;
  identity?: "ALWAYS" | "BY DEFAULT";
  /** Expression of a GENERATED ALWAYS AS (...) STORED column */
  generated?: string;
  collation?: string;
  /** Functions called by the default or generation expression */
  calls: readonly string[];
  comment?: string;
}

export type ConstraintKind = "PRIMARY KEY" | "UNIQUE" | "FOREIGN KEY" | "CHECK";

export type ReferentialAction = "NO ACTION" | "RESTRICT" | "CASCADE" | "SET NULL" | "SET DEFAULT";

export interface ForeignKeyTarget {
  readonly schema: string;
  readonly table: string;
  /** Empty when the referenced table's primary key is meant */
  readonly columns: readonly string[];
  readonly onDelete?: ReferentialAction;
  readonly onUpdate?: ReferentialAction;
  readonly match?: "FULL" | "SIMPLE";
}

export interface Constraint {
  readonly name: string;
  readonly kind: ConstraintKind;
  readonly columns: readonly string[];
  readonly check?: string;
  readonly references?: ForeignKeyTarget;
  readonly deferrable: boolean;
  readonly initiallyDeferred: boolean;
  readonly notValid: boolean;
  readonly noInherit: boolean;
  /** Functions called by a CHECK expression */
  readonly calls: readonly string[];
  comment?: string;
}

export interface IndexElement {
  /** Column name, or a parenthesized expression */
  readonly expression: string;
  readonly opclass?: string;
  readonly descending: boolean;
  readonly nulls?: "FIRST" | "LAST";
}

export interface Index {
  readonly schema: string;
  readonly name: string;
  /** Owning table or materialized view */
  readonly table: string;
  readonly unique: boolean;
  readonly method: string;
  readonly elements: readonly IndexElement[];
  readonly include: readonly string[];
  readonly where?: string;
  comment?: string;
}

export type PolicyCommand = "ALL" | "SELECT" | "INSERT" | "UPDATE" | "DELETE";

export interface Policy {
  readonly name: string;
  readonly table: string;
  readonly permissive: boolean;
  readonly command: PolicyCommand;
  readonly roles: readonly string[];
  readonly using?: string;
  readonly withCheck?: string;
  comment?: string;
}

export type TriggerEvent = "INSERT" | "UPDATE" | "DELETE" | "TRUNCATE";

export interface Trigger {
  readonly name: string;
  readonly table: string;
  readonly timing: "BEFORE" | "AFTER" | "INSTEAD OF";
  readonly events: readonly TriggerEvent[];
  readonly updateColumns: readonly string[];
  readonly level: "ROW" | "STATEMENT";
  readonly when?: string;
  readonly functionName: string;
  readonly args: readonly string[];
  readonly constraint: boolean;
  readonly deferrable: boolean;
  readonly initiallyDeferred: boolean;
  readonly oldTable?: string;
  readonly newTable?: string;
  comment?: string;
}

export interface Table {
  readonly kind: "table";
  readonly schema: string;
  readonly name: string;
  readonly unlogged: boolean;
  columns: Column[];
  readonly constraints: Map<string, Constraint>;
  readonly indexes: Map<string, Index>;
  readonly policies: Map<string, Policy>;
  readonly triggers: Map<string, Trigger>;
  rlsEnabled: boolean;
  rlsForced: boolean;
  comment?: string;
}

// ============================================================================
// Types, sequences
// ============================================================================

export interface EnumType {
  readonly kind: "enum";
  readonly schema: string;
  readonly name: string;
  values: string[];
  comment?: string;
}

export interface CompositeField {
  readonly name: string;
  readonly dataType: string;
}

export interface CompositeType {
  readonly kind: "composite";
  readonly schema: string;
  readonly name: string;
  readonly fields: readonly CompositeField[];
  comment?: string;
}

export interface DomainConstraint {
  readonly name: string;
  readonly check: string;
  readonly notValid: boolean;
}

export interface DomainType {
  readonly kind: "domain";
  readonly schema: string;
  readonly name: string;
  readonly baseType: string;
  default?: string;
  notNull: boolean;
  collation?: string;
  readonly constraints: DomainConstraint[];
  comment?: string;
}

export type TypeDef = EnumType | CompositeType | DomainType;

export interface Sequence {
  readonly kind: "sequence";
  readonly schema: string;
  readonly name: string;
  dataType?: string;
  increment?: string;
  minValue?: string;
  maxValue?: string;
  start?: string;
  cache?: string;
  cycle: boolean;
  ownedBy?: { readonly schema: string; readonly table: string; readonly column: string };
  /** Backing sequence of a serial column, never written out */
  readonly implicit: boolean;
  comment?: string;
}

// ============================================================================
// Routines, views
// ============================================================================

export type ParameterMode = "IN" | "OUT" | "INOUT" | "VARIADIC";

export interface Parameter {
  readonly mode: ParameterMode;
  readonly name?: string;
  readonly dataType: string;
  readonly default?: string;
}

export type Volatility = "VOLATILE" | "STABLE" | "IMMUTABLE";

export interface Routine {
  readonly schema: string;
  readonly name: string;
  readonly parameters: readonly Parameter[];
  readonly language: string;
  readonly security: "INVOKER" | "DEFINER";
  /** `SET name = value` clauses, value already rendered */
  readonly settings: readonly (readonly [string, string])[];
  readonly body: string;
  comment?: string;
}

export interface FunctionDef extends Routine {
  readonly kind: "function";
  readonly returns: string;
  readonly volatility: Volatility;
  readonly strict: boolean;
  readonly leakproof: boolean;
  readonly parallel?: "SAFE" | "RESTRICTED" | "UNSAFE";
  readonly cost?: string;
  readonly rows?: string;
}

export interface ProcedureDef extends Routine {
  readonly kind: "procedure";
}

export interface View {
  readonly kind: "view";
  readonly schema: string;
  readonly name: string;
  readonly materialized: boolean;
  readonly columns: readonly string[];
  /** Canonical query text, leading space included */
  readonly query: string;
  readonly relations: readonly string[];
  readonly calls: readonly string[];
  readonly withData: boolean;
  readonly checkOption?: "CASCADED" | "LOCAL";
  readonly indexes: Map<string, Index>;
  /** INSTEAD OF triggers */
  readonly triggers: Map<string, Trigger>;
  comment?: string;
}

// ============================================================================
// Schema
// ============================================================================

export interface DbSchema {
  readonly name: string;
  readonly types: Map<string, TypeDef>;
  readonly sequences: Map<string, Sequence>;
  readonly tables: Map<string, Table>;
  readonly views: Map<string, View>;
  /** Keyed by `name(argtypes)` */
  readonly functions: Map<string, FunctionDef>;
  /** Keyed by `name(argtypes)` */
  readonly procedures: Map<string, ProcedureDef>;
}

/** A statement carried through verbatim when strict mode is off */
export interface PassthroughStatement {
  readonly sql: string;
  readonly file: string;
  readonly line: number;
}

export interface SchemaIR {
  /** Schema whose objects are written unqualified */
  readonly targetSchema: string;
  readonly schemas: Map<string, DbSchema>;
  readonly passthrough: PassthroughStatement[];
}

export const createSchemaIR = (targetSchema: string): SchemaIR => ({
  targetSchema,
  schemas: new Map(),
  passthrough: [],
});

export function getOrCreateSchema(ir: SchemaIR, name: string): DbSchema {
  const existing = ir.schemas.get(name);
  if (existing) return existing;
  const schema: DbSchema = {
    name,
    types: new Map(),
    sequences: new Map(),
    tables: new Map(),
    views: new Map(),
    functions: new Map(),
    procedures: new Map(),
  };
  ir.schemas.set(name, schema);
  return schema;
}

/** Argument type list used in routine keys and COMMENT ON FUNCTION */
export const routineArgTypes = (parameters: readonly Parameter[]): string =>
  parameters
    .filter(p => p.mode !== "OUT")
    .map(p => p.dataType)
    .join(", ");

export const routineKey = (name: string, parameters: readonly Parameter[]): string =>
  `${name}(${routineArgTypes(parameters)})`;

/** Schemas in a stable order: the target schema first, then by name */
export const orderedSchemas = (ir: SchemaIR): DbSchema[] =>
  [...ir.schemas.values()].sort((a, b) => {
    if (a.name === ir.targetSchema) return -1;
    if (b.name === ir.targetSchema) return 1;
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  });
