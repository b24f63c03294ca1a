/**
 * Parsed DDL commands
 *
 * One command per supported statement. Names are already resolved against
 * the target schema and expressions are already normalized.
 */
import type { SqlExpr } from "./expr.js";
import type {
  CompositeField,
  ConstraintKind,
  IndexElement,
  Parameter,
  PolicyCommand,
  ReferentialAction,
  TriggerEvent,
  Volatility,
} from "../ir/schema-ir.js";

export interface QName {
  readonly schema: string;
  readonly name: string;
}

export interface Location {
  readonly file: string;
  readonly line: number;
}

// ============================================================================
// Tables
// ============================================================================

export interface ReferencesDef {
  readonly table: QName;
  readonly columns: readonly string[];
  readonly onDelete?: ReferentialAction;
  readonly onUpdate?: ReferentialAction;
  readonly match?: "FULL" | "SIMPLE";
}

export interface ConstraintDef {
  readonly name?: string;
  readonly kind: ConstraintKind;
  /** Empty for column constraints until the column is known */
  readonly columns: readonly string[];
  readonly check?: SqlExpr;
  readonly references?: ReferencesDef;
  readonly deferrable: boolean;
  readonly initiallyDeferred: boolean;
  readonly notValid: boolean;
  readonly noInherit: boolean;
}

export interface ColumnDef {
  readonly name: string;
  readonly dataType: string;
  readonly serial: boolean;
  readonly notNull: boolean;
  readonly default?: SqlExpr;
  readonly identity?: "ALWAYS" | "BY DEFAULT";
  readonly generated?: SqlExpr;
  readonly collation?: string;
  readonly constraints: readonly ConstraintDef[];
}

export type AlterTableAction =
  | { readonly kind: "add_column"; readonly column: ColumnDef; readonly ifNotExists: boolean }
  | { readonly kind: "drop_column"; readonly column: string; readonly ifExists: boolean }
  | { readonly kind: "set_default"; readonly column: string; readonly expr: SqlExpr }
  | { readonly kind: "drop_default"; readonly column: string }
  | { readonly kind: "set_not_null"; readonly column: string }
  | { readonly kind: "drop_not_null"; readonly column: string }
  | { readonly kind: "set_type"; readonly column: string; readonly dataType: string }
  | { readonly kind: "add_constraint"; readonly constraint: ConstraintDef }
  | { readonly kind: "drop_constraint"; readonly name: string; readonly ifExists: boolean }
  | { readonly kind: "rls"; readonly enabled?: boolean; readonly forced?: boolean }
  | { readonly kind: "owner" };

// ============================================================================
// Comments
// ============================================================================

export type CommentObjectKind =
  | "TABLE"
  | "VIEW"
  | "MATERIALIZED VIEW"
  | "INDEX"
  | "SEQUENCE"
  | "TYPE"
  | "DOMAIN"
  | "COLUMN"
  | "FUNCTION"
  | "PROCEDURE"
  | "TRIGGER"
  | "POLICY"
  | "CONSTRAINT";

export interface CommentTarget {
  readonly kind: CommentObjectKind;
  /** Object name; for COLUMN the table, for TRIGGER/POLICY/CONSTRAINT the table too */
  readonly name: QName;
  /** Column, trigger, policy or constraint name */
  readonly member?: string;
  /** Argument types of a function or procedure */
  readonly argTypes?: string;
}

// ============================================================================
// Commands
// ============================================================================

export interface SequenceOptions {
  readonly dataType?: string;
  readonly increment?: string;
  readonly minValue?: string | null;
  readonly maxValue?: string | null;
  readonly start?: string;
  readonly cache?: string;
  readonly cycle?: boolean;
  /** `null` for OWNED BY NONE */
  readonly ownedBy?: { readonly table: QName; readonly column: string } | null;
}

export interface RoutineDef {
  readonly name: QName;
  readonly parameters: readonly Parameter[];
  readonly language: string;
  readonly security: "INVOKER" | "DEFINER";
  readonly settings: readonly (readonly [string, string])[];
  readonly body: string;
}

export interface FunctionCommandDef extends RoutineDef {
  readonly returns: string;
  readonly volatility: Volatility;
  readonly strict: boolean;
  readonly leakproof: boolean;
  readonly parallel?: "SAFE" | "RESTRICTED" | "UNSAFE";
  readonly cost?: string;
  readonly rows?: string;
}

export type DomainAction =
  | { readonly kind: "add_constraint"; readonly name?: string; readonly check: SqlExpr; readonly notValid: boolean }
  | { readonly kind: "drop_constraint"; readonly name: string }
  | { readonly kind: "set_default"; readonly expr: SqlExpr }
  | { readonly kind: "drop_default" }
  | { readonly kind: "set_not_null" }
  | { readonly kind: "drop_not_null" };

export type Command =
  | { readonly kind: "create_enum"; readonly name: QName; readonly values: readonly string[] }
  | { readonly kind: "create_composite"; readonly name: QName; readonly fields: readonly CompositeField[] }
  | {
      readonly kind: "create_domain";
      readonly name: QName;
      readonly baseType: string;
      readonly default?: SqlExpr;
      readonly notNull: boolean;
      readonly collation?: string;
      readonly constraints: readonly { readonly name?: string; readonly check: SqlExpr }[];
    }
  | {
      readonly kind: "create_sequence";
      readonly name: QName;
      readonly ifNotExists: boolean;
      readonly options: SequenceOptions;
    }
  | { readonly kind: "alter_sequence"; readonly name: QName; readonly options: SequenceOptions }
  | {
      readonly kind: "create_table";
      readonly name: QName;
      readonly ifNotExists: boolean;
      readonly unlogged: boolean;
      readonly columns: readonly ColumnDef[];
      readonly constraints: readonly ConstraintDef[];
    }
  | { readonly kind: "alter_table"; readonly name: QName; readonly ifExists: boolean; readonly actions: readonly AlterTableAction[] }
  | {
      readonly kind: "create_index";
      readonly name?: string;
      readonly table: QName;
      readonly ifNotExists: boolean;
      readonly unique: boolean;
      readonly method: string;
      readonly elements: readonly IndexElement[];
      readonly include: readonly string[];
      readonly where?: SqlExpr;
    }
  | {
      readonly kind: "create_policy";
      readonly name: string;
      readonly table: QName;
      readonly permissive: boolean;
      readonly command: PolicyCommand;
      readonly roles: readonly string[];
      readonly using?: SqlExpr;
      readonly withCheck?: SqlExpr;
    }
  | { readonly kind: "comment"; readonly target: CommentTarget; readonly text: string | null }
  | { readonly kind: "create_function"; readonly orReplace: boolean; readonly def: FunctionCommandDef }
  | { readonly kind: "create_procedure"; readonly orReplace: boolean; readonly def: RoutineDef }
  | {
      readonly kind: "create_view";
      readonly name: QName;
      readonly orReplace: boolean;
      readonly ifNotExists: boolean;
      readonly materialized: boolean;
      readonly columns: readonly string[];
      readonly query: string;
      readonly relations: readonly string[];
      readonly calls: readonly string[];
      readonly withData: boolean;
      readonly checkOption?: "CASCADED" | "LOCAL";
    }
  | {
      readonly kind: "create_trigger";
      readonly name: string;
      readonly table: QName;
      readonly orReplace: boolean;
      readonly timing: "BEFORE" | "AFTER" | "INSTEAD OF";
      readonly events: readonly TriggerEvent[];
      readonly updateColumns: readonly string[];
      readonly level: "ROW" | "STATEMENT";
      readonly when?: SqlExpr;
      readonly functionName: string;
      readonly args: readonly string[];
      readonly constraint: boolean;
      readonly deferrable: boolean;
      readonly initiallyDeferred: boolean;
      readonly oldTable?: string;
      readonly newTable?: string;
    }
  | {
      readonly kind: "alter_type_add_value";
      readonly name: QName;
      readonly value: string;
      readonly ifNotExists: boolean;
      readonly position?: { readonly before: boolean; readonly neighbor: string };
    }
  | { readonly kind: "alter_domain"; readonly name: QName; readonly action: DomainAction }
  | { readonly kind: "skip"; readonly reason: string }
  | { readonly kind: "unsupported"; readonly reason: string };

/** A command together with where it came from */
export type Located<C extends Command = Command> = C & { readonly location: Location; readonly sql: string };
