/**
 * DDL Parser
 *
 * Recursive descent parser for the PostgreSQL DDL subset that schema files
 * are written in. Works one statement at a time on the tokens produced by
 * the statement splitter and returns a typed command.
 */
import { SqlSyntaxError } from "../errors.js";
import type {
  CompositeField,
  ConstraintKind,
  IndexElement,
  Parameter,
  ParameterMode,
  PolicyCommand,
  ReferentialAction,
  TriggerEvent,
  Volatility,
} from "../ir/schema-ir.js";
import { routineArgTypes } from "../ir/schema-ir.js";
import type {
  AlterTableAction,
  ColumnDef,
  Command,
  CommentObjectKind,
  CommentTarget,
  ConstraintDef,
  DomainAction,
  FunctionCommandDef,
  Located,
  QName,
  ReferencesDef,
  RoutineDef,
  SequenceOptions,
} from "./ast.js";
import { formatExpr, type SqlExpr } from "./expr.js";
import { qualifiedName, quoteIdent } from "./ident.js";
import type { Token } from "./lexer.js";
import type { SourceStatement } from "./statements.js";
import { readTypeName } from "./types.js";
import { formatViewDefinition } from "./viewdef.js";

export interface ParserOptions {
  /** Schema that unqualified names belong to */
  readonly targetSchema: string;
}

const SESSION_STATEMENTS = new Set([
  "set",
  "reset",
  "begin",
  "commit",
  "start",
  "end",
  "rollback",
  "savepoint",
  "release",
  "grant",
  "revoke",
  "analyze",
  "vacuum",
  "discard",
]);

// Words that end a DEFAULT expression inside a column definition
const COLUMN_CONSTRAINT_WORDS = new Set([
  "not",
  "null",
  "default",
  "constraint",
  "primary",
  "unique",
  "references",
  "check",
  "generated",
  "collate",
]);

const ROUTINE_ATTRIBUTE_WORDS = new Set([
  "language",
  "immutable",
  "stable",
  "volatile",
  "strict",
  "called",
  "returns",
  "security",
  "external",
  "leakproof",
  "not",
  "parallel",
  "cost",
  "rows",
  "set",
  "as",
  "window",
  "support",
]);

const TYPE_CONTINUATIONS: Readonly<Record<string, readonly string[]>> = {
  double: ["precision"],
  character: ["varying"],
  char: ["varying"],
  bit: ["varying"],
  national: ["character"],
  timestamp: ["with", "without"],
  time: ["with", "without"],
};

/**
 * Parser for one DDL statement at a time.
 */
export class DdlParser {
  private tokens: readonly Token[] = [];
  private current = 0;
  private file = "<input>";
  private eof: Token = { kind: "punct", value: "", text: "", start: 0, end: 0, line: 1, column: 1 };

  constructor(private readonly options: ParserOptions) {}

  parse(statement: SourceStatement): Command {
    this.tokens = statement.tokens;
    this.current = 0;
    this.file = statement.file;
    const last = statement.tokens[statement.tokens.length - 1];
    this.eof = {
      kind: "punct",
      value: "",
      text: "end of statement",
      start: last?.end ?? 0,
      end: last?.end ?? 0,
      line: last?.line ?? statement.line,
      column: (last?.column ?? 0) + (last?.text.length ?? 0),
    };

    const command = this.statement();
    if (command.kind !== "skip" && command.kind !== "unsupported" && !this.isAtEnd()) {
      throw this.error(this.peek(), `Unexpected '${this.peek().text}' after end of statement`);
    }
    return command;
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  private statement(): Command {
    const head = this.peek();
    if (head.kind === "meta") return { kind: "skip", reason: `psql meta-command ${head.text}` };
    if (head.kind !== "word") return this.unsupported();

    if (head.value === "create") return this.create();
    if (head.value === "alter") return this.alter();
    if (head.value === "comment") return this.comment();
    if (SESSION_STATEMENTS.has(head.value)) {
      return { kind: "skip", reason: `${head.value.toUpperCase()} statement` };
    }
    if (head.value === "select" && this.tokens.some(t => t.kind === "word" && t.value === "set_config")) {
      return { kind: "skip", reason: "set_config call" };
    }
    return this.unsupported();
  }

  private unsupported(): Command {
    const words = this.tokens
      .slice(0, 3)
      .filter(t => t.kind === "word")
      .map(t => t.value.toUpperCase());
    return { kind: "unsupported", reason: words.join(" ") || this.peek().text };
  }

  private create(): Command {
    this.expectWord("create");
    const orReplace = this.matchWords("or", "replace");

    if (this.matchWord("unique")) return this.createIndex(true);
    if (this.checkWord("index")) return this.createIndex(false);

    const unlogged = this.matchWord("unlogged");
    if (this.matchWord("temp") || this.matchWord("temporary")) return this.unsupported();
    if (this.matchWord("table")) return this.createTable(unlogged);
    if (this.matchWord("type")) return this.createType();
    if (this.matchWord("domain")) return this.createDomain();
    if (this.matchWord("sequence")) return this.createSequence();
    if (this.matchWord("policy")) return this.createPolicy();
    if (this.matchWord("function")) return this.createFunction(orReplace);
    if (this.matchWord("procedure")) return this.createProcedure(orReplace);
    if (this.matchWords("materialized", "view")) return this.createView(orReplace, true);
    this.matchWord("recursive");
    if (this.matchWord("view")) return this.createView(orReplace, false);
    if (this.matchWord("constraint")) {
      this.expectWord("trigger");
      return this.createTrigger(orReplace, true);
    }
    if (this.matchWord("trigger")) return this.createTrigger(orReplace, false);
    if (this.checkWord("schema", "extension")) {
      return { kind: "skip", reason: `CREATE ${this.peek().value.toUpperCase()}` };
    }
    return this.unsupported();
  }

  private alter(): Command {
    this.expectWord("alter");
    if (this.matchWord("table")) return this.alterTable();
    if (this.matchWord("type")) return this.alterType();
    if (this.matchWord("domain")) return this.alterDomain();
    if (this.matchWord("sequence")) return this.alterSequence();
    if (this.tokens.some((t, i) => t.kind === "word" && t.value === "owner" && this.tokens[i + 1]?.value === "to")) {
      return { kind: "skip", reason: "ownership change" };
    }
    return this.unsupported();
  }

  // ==========================================================================
  // Types and domains
  // ==========================================================================

  private createType(): Command {
    const name = this.qname();
    this.expectWord("as");
    if (this.matchWord("enum")) {
      this.expectPunct("(");
      const values: string[] = [];
      if (!this.checkPunct(")")) {
        do {
          values.push(this.stringLiteral());
        } while (this.matchPunct(","));
      }
      this.expectPunct(")");
      return { kind: "create_enum", name, values };
    }
    if (this.checkPunct("(")) {
      this.expectPunct("(");
      const fields: CompositeField[] = [];
      if (!this.checkPunct(")")) {
        do {
          const fieldName = this.identifier();
          const dataType = this.typeName();
          if (this.matchWord("collate")) this.identifier();
          fields.push({ name: fieldName, dataType: dataType.text });
        } while (this.matchPunct(","));
      }
      this.expectPunct(")");
      return { kind: "create_composite", name, fields };
    }
    throw this.error(this.peek(), "Only enum and composite types are supported");
  }

  private createDomain(): Command {
    const name = this.qname();
    this.matchWord("as");
    const baseType = this.typeName().text;
    let defaultExpr: SqlExpr | undefined;
    let notNull = false;
    let collation: string | undefined;
    const constraints: { name?: string; check: SqlExpr }[] = [];

    while (!this.isAtEnd()) {
      const constraintName = this.matchWord("constraint") ? this.identifier() : undefined;
      if (this.matchWord("check")) {
        constraints.push({ name: constraintName, check: this.domainExpr(this.parenTokens()) });
      } else if (this.matchWords("not", "null")) {
        notNull = true;
      } else if (this.matchWord("null")) {
        notNull = false;
      } else if (constraintName !== undefined) {
        throw this.error(this.peek(), "Expected CHECK or NOT NULL after constraint name");
      } else if (this.matchWord("default")) {
        defaultExpr = this.expr(this.collectUntil(t => this.isWordIn(t, COLUMN_CONSTRAINT_WORDS) || this.checkPunctToken(t, ","), 1));
      } else if (this.matchWord("collate")) {
        collation = quoteIdent(this.identifier());
      } else {
        throw this.error(this.peek(), `Unexpected '${this.peek().text}' in domain definition`);
      }
    }
    return { kind: "create_domain", name, baseType, default: defaultExpr, notNull, collation, constraints };
  }

  private alterType(): Command {
    const name = this.qname();
    if (this.matchWords("add", "value")) {
      const ifNotExists = this.ifNotExists();
      const value = this.stringLiteral();
      let position: { before: boolean; neighbor: string } | undefined;
      if (this.matchWord("before")) position = { before: true, neighbor: this.stringLiteral() };
      else if (this.matchWord("after")) position = { before: false, neighbor: this.stringLiteral() };
      return { kind: "alter_type_add_value", name, value, ifNotExists, position };
    }
    if (this.matchWords("owner", "to")) {
      this.current = this.tokens.length;
      return { kind: "skip", reason: "ownership change" };
    }
    return this.unsupported();
  }

  private alterDomain(): Command {
    const name = this.qname();
    let action: DomainAction;
    if (this.matchWord("add")) {
      const constraintName = this.matchWord("constraint") ? this.identifier() : undefined;
      this.expectWord("check");
      const check = this.domainExpr(this.parenTokens());
      action = { kind: "add_constraint", name: constraintName, check, notValid: this.matchWords("not", "valid") };
    } else if (this.matchWords("drop", "constraint")) {
      this.matchWords("if", "exists");
      action = { kind: "drop_constraint", name: this.identifier() };
      if (!this.matchWord("cascade")) this.matchWord("restrict");
    } else if (this.matchWords("set", "default")) {
      action = { kind: "set_default", expr: this.expr(this.collectUntil(() => false)) };
    } else if (this.matchWords("drop", "default")) {
      action = { kind: "drop_default" };
    } else if (this.matchWords("set", "not", "null")) {
      action = { kind: "set_not_null" };
    } else if (this.matchWords("drop", "not", "null")) {
      action = { kind: "drop_not_null" };
    } else if (this.matchWords("owner", "to")) {
      this.current = this.tokens.length;
      return { kind: "skip", reason: "ownership change" };
    } else {
      return this.unsupported();
    }
    return { kind: "alter_domain", name, action };
  }

  // ==========================================================================
  // Sequences
  // ==========================================================================

  private createSequence(): Command {
    const ifNotExists = this.ifNotExists();
    const name = this.qname();
    return { kind: "create_sequence", name, ifNotExists, options: this.sequenceOptions() };
  }

  private alterSequence(): Command {
    this.matchWords("if", "exists");
    const name = this.qname();
    if (this.matchWords("owner", "to")) {
      this.current = this.tokens.length;
      return { kind: "skip", reason: "ownership change" };
    }
    return { kind: "alter_sequence", name, options: this.sequenceOptions() };
  }

  private sequenceOptions(): SequenceOptions {
    const options: {
      -readonly [K in keyof SequenceOptions]: SequenceOptions[K];
    } = {};
    while (!this.isAtEnd()) {
      if (this.matchWord("as")) {
        options.dataType = this.typeName().text;
      } else if (this.matchWord("increment")) {
        this.matchWord("by");
        options.increment = this.signedNumber();
      } else if (this.matchWords("no", "minvalue")) {
        options.minValue = null;
      } else if (this.matchWords("no", "maxvalue")) {
        options.maxValue = null;
      } else if (this.matchWords("no", "cycle")) {
        options.cycle = false;
      } else if (this.matchWord("minvalue")) {
        options.minValue = this.signedNumber();
      } else if (this.matchWord("maxvalue")) {
        options.maxValue = this.signedNumber();
      } else if (this.matchWord("start")) {
        this.matchWord("with");
        options.start = this.signedNumber();
      } else if (this.matchWord("restart")) {
        if (this.matchWord("with") || this.check("number") || this.checkOperator("-")) this.signedNumber();
      } else if (this.matchWord("cache")) {
        options.cache = this.signedNumber();
      } else if (this.matchWord("cycle")) {
        options.cycle = true;
      } else if (this.matchWords("owned", "by")) {
        if (this.matchWord("none")) {
          options.ownedBy = null;
        } else {
          const parts = this.dottedName();
          const column = parts.pop();
          if (column === undefined || parts.length === 0) {
            throw this.error(this.previous(), "OWNED BY needs table.column");
          }
          options.ownedBy = { table: this.toQName(parts), column };
        }
      } else {
        throw this.error(this.peek(), `Unexpected '${this.peek().text}' in sequence options`);
      }
    }
    return options;
  }

  // ==========================================================================
  // Tables
  // ==========================================================================

  private createTable(unlogged: boolean): Command {
    const ifNotExists = this.ifNotExists();
    const name = this.qname();
    this.expectPunct("(");
    const columns: ColumnDef[] = [];
    const constraints: ConstraintDef[] = [];
    if (!this.checkPunct(")")) {
      do {
        if (this.checkWord("constraint", "primary", "unique", "foreign", "check", "exclude")) {
          constraints.push(this.tableConstraint());
        } else {
          columns.push(this.columnDef());
        }
      } while (this.matchPunct(","));
    }
    this.expectPunct(")");
    if (!this.isAtEnd()) {
      throw this.error(this.peek(), `Unsupported table option '${this.peek().text}'`);
    }
    return { kind: "create_table", name, ifNotExists, unlogged, columns, constraints };
  }

  private columnDef(): ColumnDef {
    const name = this.identifier();
    const type = this.typeName();
    let notNull = false;
    let defaultExpr: SqlExpr | undefined;
    let identity: "ALWAYS" | "BY DEFAULT" | undefined;
    let generated: SqlExpr | undefined;
    let collation: string | undefined;
    const constraints: ConstraintDef[] = [];

    for (;;) {
      const constraintName = this.matchWord("constraint") ? this.identifier() : undefined;
      const constraint = (kind: ConstraintKind, extra: Partial<ConstraintDef> = {}): ConstraintDef => ({
        name: constraintName,
        kind,
        columns: [name],
        deferrable: false,
        initiallyDeferred: false,
        notValid: false,
        noInherit: false,
        ...extra,
      });

      if (this.matchWords("not", "null")) {
        notNull = true;
      } else if (this.matchWord("null")) {
        notNull = false;
      } else if (this.matchWord("default")) {
        defaultExpr = this.expr(this.collectUntil(t => this.isWordIn(t, COLUMN_CONSTRAINT_WORDS) || this.checkPunctToken(t, ","), 1));
      } else if (this.matchWord("collate")) {
        collation = quoteIdent(this.identifier());
      } else if (this.matchWords("primary", "key")) {
        constraints.push(constraint("PRIMARY KEY", this.deferrable()));
      } else if (this.matchWord("unique")) {
        constraints.push(constraint("UNIQUE", this.deferrable()));
      } else if (this.matchWord("references")) {
        const references = this.references();
        constraints.push(constraint("FOREIGN KEY", { references, ...this.deferrable() }));
      } else if (this.matchWord("check")) {
        const check = this.expr(this.parenTokens());
        constraints.push(constraint("CHECK", { check, columns: [], noInherit: this.matchWords("no", "inherit") }));
      } else if (this.matchWord("generated")) {
        if (this.matchWords("by", "default")) {
          this.expectWord("as");
          this.expectWord("identity");
          identity = "BY DEFAULT";
          if (this.checkPunct("(")) this.parenTokens();
        } else {
          this.expectWord("always");
          this.expectWord("as");
          if (this.matchWord("identity")) {
            identity = "ALWAYS";
            if (this.checkPunct("(")) this.parenTokens();
          } else {
            generated = this.expr(this.parenTokens());
            this.expectWord("stored");
          }
        }
      } else if (constraintName !== undefined) {
        throw this.error(this.peek(), "Expected a constraint after constraint name");
      } else {
        break;
      }
    }

    return {
      name,
      dataType: type.text,
      serial: type.serial,
      notNull,
      default: defaultExpr,
      identity,
      generated,
      collation,
      constraints,
    };
  }

  private tableConstraint(): ConstraintDef {
    const name = this.matchWord("constraint") ? this.identifier() : undefined;
    let kind: ConstraintKind;
    let columns: string[] = [];
    let check: SqlExpr | undefined;
    let references: ReferencesDef | undefined;
    let noInherit = false;

    if (this.matchWords("primary", "key")) {
      kind = "PRIMARY KEY";
      columns = this.identList();
    } else if (this.matchWord("unique")) {
      kind = "UNIQUE";
      columns = this.identList();
    } else if (this.matchWords("foreign", "key")) {
      kind = "FOREIGN KEY";
      columns = this.identList();
      this.expectWord("references");
      references = this.references();
    } else if (this.matchWord("check")) {
      kind = "CHECK";
      check = this.expr(this.parenTokens());
      noInherit = this.matchWords("no", "inherit");
    } else {
      throw this.error(this.peek(), `Unsupported constraint '${this.peek().text}'`);
    }
    if (this.matchWord("include")) this.identList();

    const deferral = this.deferrable();
    const notValid = this.matchWords("not", "valid");
    return { name, kind, columns, check, references, noInherit, notValid, ...deferral };
  }

  private references(): ReferencesDef {
    const table = this.qname();
    const columns = this.checkPunct("(") ? this.identList() : [];
    let onDelete: ReferentialAction | undefined;
    let onUpdate: ReferentialAction | undefined;
    let match: "FULL" | "SIMPLE" | undefined;
    for (;;) {
      if (this.matchWord("match")) {
        if (this.matchWord("full")) match = "FULL";
        else if (this.matchWord("simple")) match = "SIMPLE";
        else throw this.error(this.peek(), "Expected FULL or SIMPLE after MATCH");
      } else if (this.matchWords("on", "delete")) {
        onDelete = this.referentialAction();
      } else if (this.matchWords("on", "update")) {
        onUpdate = this.referentialAction();
      } else {
        break;
      }
    }
    return { table, columns, onDelete, onUpdate, match };
  }

  private referentialAction(): ReferentialAction {
    if (this.matchWord("cascade")) return "CASCADE";
    if (this.matchWord("restrict")) return "RESTRICT";
    if (this.matchWords("no", "action")) return "NO ACTION";
    if (this.matchWords("set", "null")) return "SET NULL";
    if (this.matchWords("set", "default")) return "SET DEFAULT";
    throw this.error(this.peek(), "Expected a referential action");
  }

  private deferrable(): { deferrable: boolean; initiallyDeferred: boolean } {
    let deferrable = false;
    let initiallyDeferred = false;
    for (;;) {
      if (this.matchWords("not", "deferrable")) deferrable = false;
      else if (this.matchWord("deferrable")) deferrable = true;
      else if (this.matchWords("initially", "deferred")) initiallyDeferred = true;
      else if (this.matchWords("initially", "immediate")) initiallyDeferred = false;
      else break;
    }
    return { deferrable, initiallyDeferred };
  }

  private alterTable(): Command {
    const ifExists = this.matchWords("if", "exists");
    this.matchWord("only");
    const name = this.qname();
    const actions: AlterTableAction[] = [];
    do {
      actions.push(this.alterTableAction());
    } while (this.matchPunct(","));
    return { kind: "alter_table", name, ifExists, actions };
  }

  private alterTableAction(): AlterTableAction {
    if (this.matchWord("add")) {
      if (this.checkWord("constraint", "primary", "unique", "foreign", "check", "exclude")) {
        return { kind: "add_constraint", constraint: this.tableConstraint() };
      }
      this.matchWord("column");
      const ifNotExists = this.ifNotExists();
      return { kind: "add_column", column: this.columnDef(), ifNotExists };
    }
    if (this.matchWord("drop")) {
      if (this.matchWord("constraint")) {
        const ifExists = this.matchWords("if", "exists");
        const constraintName = this.identifier();
        if (!this.matchWord("cascade")) this.matchWord("restrict");
        return { kind: "drop_constraint", name: constraintName, ifExists };
      }
      this.matchWord("column");
      const ifExists = this.matchWords("if", "exists");
      const column = this.identifier();
      if (!this.matchWord("cascade")) this.matchWord("restrict");
      return { kind: "drop_column", column, ifExists };
    }
    if (this.matchWord("alter")) {
      this.matchWord("column");
      const column = this.identifier();
      if (this.matchWords("set", "default")) {
        return { kind: "set_default", column, expr: this.expr(this.collectUntil(t => this.checkPunctToken(t, ","))) };
      }
      if (this.matchWords("drop", "default")) return { kind: "drop_default", column };
      if (this.matchWords("set", "not", "null")) return { kind: "set_not_null", column };
      if (this.matchWords("drop", "not", "null")) return { kind: "drop_not_null", column };
      if (this.matchWords("set", "data", "type") || this.matchWord("type")) {
        const dataType = this.typeName().text;
        if (this.matchWord("using")) this.collectUntil(t => this.checkPunctToken(t, ","));
        return { kind: "set_type", column, dataType };
      }
      throw this.error(this.peek(), `Unsupported ALTER COLUMN action '${this.peek().text}'`);
    }
    if (this.matchWords("enable", "row", "level", "security")) return { kind: "rls", enabled: true };
    if (this.matchWords("disable", "row", "level", "security")) return { kind: "rls", enabled: false };
    if (this.matchWords("force", "row", "level", "security")) return { kind: "rls", forced: true };
    if (this.matchWords("no", "force", "row", "level", "security")) return { kind: "rls", forced: false };
    if (this.matchWords("owner", "to")) {
      this.identifier();
      return { kind: "owner" };
    }
    throw this.error(this.peek(), `Unsupported ALTER TABLE action '${this.peek().text}'`);
  }

  // ==========================================================================
  // Indexes, policies
  // ==========================================================================

  private createIndex(unique: boolean): Command {
    this.expectWord("index");
    this.matchWord("concurrently");
    const ifNotExists = this.ifNotExists();
    const name = this.checkWord("on") ? undefined : this.identifier();
    this.expectWord("on");
    this.matchWord("only");
    const table = this.qname();
    const method = this.matchWord("using") ? this.identifier() : "btree";

    this.expectPunct("(");
    const elements: IndexElement[] = [];
    do {
      elements.push(this.indexElement(this.collectUntil(t => this.checkPunctToken(t, ","))));
    } while (this.matchPunct(","));
    this.expectPunct(")");

    const include = this.matchWord("include") ? this.identList() : [];
    if (this.matchWord("with")) this.parenTokens();
    if (this.matchWord("tablespace")) this.identifier();
    const where = this.matchWord("where") ? this.expr(this.collectUntil(() => false)) : undefined;

    return { kind: "create_index", name, table, ifNotExists, unique, method, elements, include, where };
  }

  private indexElement(tokens: Token[]): IndexElement {
    let rest = tokens;
    let nulls: "FIRST" | "LAST" | undefined;
    let descending = false;
    const lastWord = (value: string) => {
      const t = rest[rest.length - 1];
      return t?.kind === "word" && t.value === value;
    };

    if (rest.length > 2 && rest[rest.length - 2]?.value === "nulls" && (lastWord("first") || lastWord("last"))) {
      nulls = lastWord("first") ? "FIRST" : "LAST";
      rest = rest.slice(0, -2);
    }
    if (lastWord("desc")) {
      descending = true;
      rest = rest.slice(0, -1);
    } else if (lastWord("asc")) {
      rest = rest.slice(0, -1);
    }

    let opclass: string | undefined;
    const last = rest[rest.length - 1];
    const beforeLast = rest[rest.length - 2];
    if (
      rest.length >= 2 &&
      last?.kind === "word" &&
      beforeLast !== undefined &&
      (beforeLast.kind === "word" || beforeLast.kind === "quoted" || this.checkPunctToken(beforeLast, ")"))
    ) {
      opclass = last.value;
      rest = rest.slice(0, -1);
    }

    const only = rest[0];
    if (rest.length === 0 || only === undefined) throw this.error(this.peek(), "Empty index element");
    const expression =
      rest.length === 1 && (only.kind === "word" || only.kind === "quoted")
        ? quoteIdent(only.value)
        : this.expr(rest).text;
    return { expression, opclass, descending, nulls };
  }

  private createPolicy(): Command {
    const name = this.identifier();
    this.expectWord("on");
    const table = this.qname();
    let permissive = true;
    if (this.matchWord("as")) {
      if (this.matchWord("restrictive")) permissive = false;
      else this.expectWord("permissive");
    }
    let command: PolicyCommand = "ALL";
    if (this.matchWord("for")) {
      const word = this.advance();
      const upper = word.value.toUpperCase();
      if (upper !== "ALL" && upper !== "SELECT" && upper !== "INSERT" && upper !== "UPDATE" && upper !== "DELETE") {
        throw this.error(word, `Unknown policy command '${word.text}'`);
      }
      command = upper;
    }
    const roles: string[] = [];
    if (this.matchWord("to")) {
      do {
        roles.push(this.roleName());
      } while (this.matchPunct(","));
    }
    const using = this.matchWord("using") ? this.expr(this.parenTokens()) : undefined;
    const withCheck = this.matchWords("with", "check") ? this.expr(this.parenTokens()) : undefined;
    return { kind: "create_policy", name, table, permissive, command, roles, using, withCheck };
  }

  private roleName(): string {
    const t = this.advance();
    if (t.kind === "word") {
      if (t.value === "public" || t.value === "current_user" || t.value === "session_user" || t.value === "current_role") {
        return t.value.toUpperCase();
      }
      return t.value;
    }
    if (t.kind === "quoted") return quoteIdent(t.value);
    throw this.error(t, "Expected a role name");
  }

  // ==========================================================================
  // Comments
  // ==========================================================================

  private comment(): Command {
    this.expectWord("comment");
    this.expectWord("on");
    let kind: CommentObjectKind;
    if (this.matchWords("materialized", "view")) {
      kind = "MATERIALIZED VIEW";
    } else {
      const word = this.advance();
      const upper = word.value.toUpperCase();
      switch (upper) {
        case "TABLE":
        case "VIEW":
        case "INDEX":
        case "SEQUENCE":
        case "TYPE":
        case "DOMAIN":
        case "COLUMN":
        case "FUNCTION":
        case "PROCEDURE":
        case "TRIGGER":
        case "POLICY":
        case "CONSTRAINT":
          kind = upper;
          break;
        default:
          return this.unsupported();
      }
    }

    let target: CommentTarget;
    if (kind === "COLUMN") {
      const parts = this.dottedName();
      const member = parts.pop();
      if (member === undefined || parts.length === 0) throw this.error(this.previous(), "Expected table.column");
      target = { kind, name: this.toQName(parts), member };
    } else if (kind === "TRIGGER" || kind === "POLICY" || kind === "CONSTRAINT") {
      const member = this.identifier();
      this.expectWord("on");
      if (this.checkWord("domain")) return this.unsupported();
      target = { kind, name: this.qname(), member };
    } else if (kind === "FUNCTION" || kind === "PROCEDURE") {
      const name = this.qname();
      const argTypes = this.checkPunct("(") ? routineArgTypes(this.parameters()) : undefined;
      target = { kind, name, argTypes };
    } else {
      target = { kind, name: this.qname() };
    }

    this.expectWord("is");
    const text = this.matchWord("null") ? null : this.stringLiteral();
    return { kind: "comment", target, text };
  }

  // ==========================================================================
  // Functions and procedures
  // ==========================================================================

  private createFunction(orReplace: boolean): Command {
    const name = this.qname();
    const parameters = this.parameters();
    this.expectWord("returns");
    let returns: string;
    if (this.matchWord("table")) {
      this.expectPunct("(");
      const columns: string[] = [];
      do {
        const column = this.identifier();
        columns.push(`${quoteIdent(column)} ${this.typeName().text}`);
      } while (this.matchPunct(","));
      this.expectPunct(")");
      returns = `TABLE(${columns.join(", ")})`;
    } else if (this.matchWord("setof")) {
      returns = `SETOF ${this.typeName().text}`;
    } else {
      returns = this.typeName().text;
    }

    const attrs = this.routineAttributes(true);
    const def: FunctionCommandDef = {
      name,
      parameters,
      returns,
      language: attrs.language,
      security: attrs.security,
      settings: attrs.settings,
      body: attrs.body,
      volatility: attrs.volatility,
      strict: attrs.strict,
      leakproof: attrs.leakproof,
      parallel: attrs.parallel,
      cost: attrs.cost,
      rows: attrs.rows,
    };
    return { kind: "create_function", orReplace, def };
  }

  private createProcedure(orReplace: boolean): Command {
    const name = this.qname();
    const parameters = this.parameters();
    const attrs = this.routineAttributes(false);
    const def: RoutineDef = {
      name,
      parameters,
      language: attrs.language,
      security: attrs.security,
      settings: attrs.settings,
      body: attrs.body,
    };
    return { kind: "create_procedure", orReplace, def };
  }

  private routineAttributes(isFunction: boolean) {
    let language: string | undefined;
    let body: string | undefined;
    let volatility: Volatility = "VOLATILE";
    let security: "INVOKER" | "DEFINER" = "INVOKER";
    let strict = false;
    let leakproof = false;
    let parallel: "SAFE" | "RESTRICTED" | "UNSAFE" | undefined;
    let cost: string | undefined;
    let rows: string | undefined;
    const settings: (readonly [string, string])[] = [];

    while (!this.isAtEnd()) {
      const t = this.peek();
      if (this.matchWord("language")) {
        const lang = this.advance();
        language = lang.value.toLowerCase();
      } else if (isFunction && this.matchWord("immutable")) {
        volatility = "IMMUTABLE";
      } else if (isFunction && this.matchWord("stable")) {
        volatility = "STABLE";
      } else if (isFunction && this.matchWord("volatile")) {
        volatility = "VOLATILE";
      } else if (isFunction && this.matchWord("strict")) {
        strict = true;
      } else if (isFunction && this.matchWords("called", "on", "null", "input")) {
        strict = false;
      } else if (isFunction && this.matchWords("returns", "null", "on", "null", "input")) {
        strict = true;
      } else if (this.matchWords("security", "definer") || this.matchWords("external", "security", "definer")) {
        security = "DEFINER";
      } else if (this.matchWords("security", "invoker") || this.matchWords("external", "security", "invoker")) {
        security = "INVOKER";
      } else if (isFunction && this.matchWords("not", "leakproof")) {
        leakproof = false;
      } else if (isFunction && this.matchWord("leakproof")) {
        leakproof = true;
      } else if (isFunction && this.matchWord("parallel")) {
        const mode = this.advance().value.toUpperCase();
        if (mode !== "SAFE" && mode !== "RESTRICTED" && mode !== "UNSAFE") {
          throw this.error(this.previous(), `Unknown PARALLEL mode '${mode}'`);
        }
        parallel = mode;
      } else if (isFunction && this.matchWord("cost")) {
        cost = this.signedNumber();
      } else if (isFunction && this.matchWord("rows")) {
        rows = this.signedNumber();
      } else if (this.matchWord("set")) {
        settings.push(this.routineSetting());
      } else if (this.matchWord("as")) {
        const literal = this.advance();
        if (literal.kind !== "dollar" && literal.kind !== "string") {
          throw this.error(literal, "Expected a function body");
        }
        body = literal.value;
        // C functions name a link symbol after the library
        if (this.matchPunct(",")) this.stringLiteral();
      } else {
        throw this.error(t, `Unexpected '${t.text}' in ${isFunction ? "function" : "procedure"} definition`);
      }
    }

    if (language === undefined) throw this.error(this.eof, "Missing LANGUAGE clause");
    if (body === undefined) throw this.error(this.eof, "Missing AS clause with the routine body");
    return { language, body, volatility, security, strict, leakproof, parallel, cost, rows, settings };
  }

  private routineSetting(): readonly [string, string] {
    const name = this.dottedName().join(".");
    if (this.matchWords("from", "current")) return [name, "FROM CURRENT"];
    if (!this.matchWord("to")) this.expectOperator("=");
    const value = this.collectUntil(t => this.isWordIn(t, ROUTINE_ATTRIBUTE_WORDS));
    const rendered = value
      .filter(t => !this.checkPunctToken(t, ","))
      .map(t => (t.kind === "string" ? `'${t.value.replace(/'/g, "''")}'` : t.kind === "word" ? t.value : t.text))
      .join(", ");
    return [name, `= ${rendered}`];
  }

  private parameters(): Parameter[] {
    this.expectPunct("(");
    const parameters: Parameter[] = [];
    if (this.matchPunct(")")) return parameters;
    do {
      parameters.push(this.parameter(this.collectUntil(t => this.checkPunctToken(t, ","))));
    } while (this.matchPunct(","));
    this.expectPunct(")");
    return parameters;
  }

  private parameter(tokens: Token[]): Parameter {
    let i = 0;
    let mode: ParameterMode = "IN";
    const first = tokens[0];
    if (first?.kind === "word" && ["in", "out", "inout", "variadic"].includes(first.value)) {
      mode = first.value === "in" ? "IN" : first.value === "out" ? "OUT" : first.value === "inout" ? "INOUT" : "VARIADIC";
      i++;
    }

    const head = tokens[i];
    const second = tokens[i + 1];
    const continuesType =
      head?.kind === "word" && second?.kind === "word" && (TYPE_CONTINUATIONS[head.value] ?? []).includes(second.value);
    let name: string | undefined;
    const startsDefault = second !== undefined && ((second.kind === "word" && second.value === "default") || second.text === "=");
    if (!continuesType && !startsDefault && head !== undefined && (head.kind === "word" || head.kind === "quoted")) {
      const typeAfterName = readTypeName(tokens, i + 1, this.options.targetSchema);
      if (typeAfterName !== undefined) {
        name = head.value;
        i++;
      }
    }

    const type = readTypeName(tokens, i, this.options.targetSchema);
    if (type === undefined) throw this.error(tokens[i] ?? this.peek(), "Expected a parameter type");
    i = type.next;

    let defaultValue: string | undefined;
    const marker = tokens[i];
    if (marker !== undefined && ((marker.kind === "word" && marker.value === "default") || marker.text === "=")) {
      defaultValue = this.expr(tokens.slice(i + 1)).text;
    } else if (marker !== undefined) {
      throw this.error(marker, `Unexpected '${marker.text}' in parameter`);
    }
    return { mode, name, dataType: type.text, default: defaultValue };
  }

  // ==========================================================================
  // Views, triggers
  // ==========================================================================

  private createView(orReplace: boolean, materialized: boolean): Command {
    const ifNotExists = this.ifNotExists();
    const name = this.qname();
    const columns = this.checkPunct("(") ? this.identList() : [];
    if (this.matchWord("with")) this.parenTokens();
    this.expectWord("as");

    let end = this.tokens.length;
    const wordAt = (i: number, value: string) => this.tokens[i]?.kind === "word" && this.tokens[i]?.value === value;
    let withData = true;
    let checkOption: "CASCADED" | "LOCAL" | undefined;
    if (wordAt(end - 3, "with") && wordAt(end - 2, "no") && wordAt(end - 1, "data")) {
      withData = false;
      end -= 3;
    } else if (wordAt(end - 2, "with") && wordAt(end - 1, "data")) {
      end -= 2;
    } else if (wordAt(end - 2, "check") && wordAt(end - 1, "option")) {
      if (wordAt(end - 3, "with")) {
        checkOption = "CASCADED";
        end -= 3;
      } else if (wordAt(end - 4, "with") && (wordAt(end - 3, "cascaded") || wordAt(end - 3, "local"))) {
        checkOption = wordAt(end - 3, "local") ? "LOCAL" : "CASCADED";
        end -= 4;
      }
    }

    const queryTokens = this.tokens.slice(this.current, end);
    if (queryTokens.length === 0) throw this.error(this.peek(), "Expected a query after AS");
    this.current = this.tokens.length;
    const definition = formatViewDefinition(queryTokens, { targetSchema: this.options.targetSchema });
    return {
      kind: "create_view",
      name,
      orReplace,
      ifNotExists,
      materialized,
      columns,
      query: definition.text,
      relations: definition.relations,
      calls: definition.calls,
      withData,
      checkOption,
    };
  }

  private createTrigger(orReplace: boolean, constraint: boolean): Command {
    const name = this.identifier();
    let timing: "BEFORE" | "AFTER" | "INSTEAD OF";
    if (this.matchWord("before")) timing = "BEFORE";
    else if (this.matchWord("after")) timing = "AFTER";
    else if (this.matchWords("instead", "of")) timing = "INSTEAD OF";
    else throw this.error(this.peek(), "Expected BEFORE, AFTER or INSTEAD OF");

    const events: TriggerEvent[] = [];
    let updateColumns: string[] = [];
    do {
      if (this.matchWord("insert")) events.push("INSERT");
      else if (this.matchWord("delete")) events.push("DELETE");
      else if (this.matchWord("truncate")) events.push("TRUNCATE");
      else if (this.matchWord("update")) {
        events.push("UPDATE");
        if (this.matchWord("of")) {
          updateColumns = [];
          do {
            updateColumns.push(this.identifier());
          } while (this.matchPunct(","));
        }
      } else throw this.error(this.peek(), "Expected a trigger event");
    } while (this.matchWord("or"));

    this.expectWord("on");
    const table = this.qname();
    if (this.matchWord("from")) this.qname();
    const deferral = this.deferrable();

    let oldTable: string | undefined;
    let newTable: string | undefined;
    if (this.matchWord("referencing")) {
      while (this.checkWord("old", "new")) {
        const which = this.advance().value;
        this.expectWord("table");
        this.matchWord("as");
        if (which === "old") oldTable = this.identifier();
        else newTable = this.identifier();
      }
    }

    let level: "ROW" | "STATEMENT" = "STATEMENT";
    if (this.matchWord("for")) {
      this.matchWord("each");
      if (this.matchWord("row")) level = "ROW";
      else this.expectWord("statement");
    }
    const when = this.matchWord("when") ? this.expr(this.parenTokens()) : undefined;

    this.expectWord("execute");
    if (!this.matchWord("function")) this.expectWord("procedure");
    const fn = this.qname();
    const args = this.parenTokens();
    const argList =
      args.length === 0
        ? []
        : this.splitCommas(args).map(arg => {
            const only = arg[0];
            // trigger arguments are stored as strings
            return arg.length === 1 && only !== undefined && only.kind !== "string"
              ? `'${only.kind === "word" ? only.value : only.text}'`
              : this.expr(arg).text;
          });

    return {
      kind: "create_trigger",
      name,
      table,
      orReplace,
      timing,
      events,
      updateColumns,
      level,
      when,
      functionName: qualifiedName(fn.schema, fn.name, this.options.targetSchema),
      args: argList,
      constraint,
      deferrable: deferral.deferrable,
      initiallyDeferred: deferral.initiallyDeferred,
      oldTable,
      newTable,
    };
  }

  // ==========================================================================
  // Building blocks
  // ==========================================================================

  private ifNotExists(): boolean {
    return this.matchWords("if", "not", "exists");
  }

  private identifier(): string {
    const t = this.peek();
    if (t.kind === "word" || t.kind === "quoted") {
      this.current++;
      return t.value;
    }
    throw this.error(t, `Expected an identifier but found '${t.text}'`);
  }

  private dottedName(): string[] {
    const parts = [this.identifier()];
    while (this.matchPunct(".")) parts.push(this.identifier());
    return parts;
  }

  private toQName(parts: readonly string[]): QName {
    const name = parts[parts.length - 1];
    if (name === undefined) throw this.error(this.peek(), "Expected a name");
    const schema = parts.length > 1 ? parts[parts.length - 2] : undefined;
    return { schema: schema ?? this.options.targetSchema, name };
  }

  private qname(): QName {
    const parts = this.dottedName();
    if (parts.length > 2) throw this.error(this.previous(), "Cross-database references are not supported");
    return this.toQName(parts);
  }

  private identList(): string[] {
    this.expectPunct("(");
    const names: string[] = [];
    do {
      names.push(this.identifier());
    } while (this.matchPunct(","));
    this.expectPunct(")");
    return names;
  }

  private typeName() {
    const type = readTypeName(this.tokens, this.current, this.options.targetSchema);
    if (type === undefined) throw this.error(this.peek(), `Expected a type name but found '${this.peek().text}'`);
    this.current = type.next;
    return type;
  }

  private stringLiteral(): string {
    const t = this.peek();
    if (t.kind !== "string") throw this.error(t, `Expected a string literal but found '${t.text}'`);
    this.current++;
    return t.value;
  }

  private signedNumber(): string {
    const negative = this.matchOperator("-");
    const t = this.peek();
    if (t.kind !== "number") throw this.error(t, `Expected a number but found '${t.text}'`);
    this.current++;
    return negative ? `-${t.text}` : t.text;
  }

  private expr(tokens: readonly Token[]): SqlExpr {
    if (tokens.length === 0) throw this.error(this.peek(), "Expected an expression");
    return formatExpr(tokens, { targetSchema: this.options.targetSchema });
  }

  private domainExpr(tokens: readonly Token[]): SqlExpr {
    if (tokens.length === 0) throw this.error(this.peek(), "Expected an expression");
    return formatExpr(tokens, { targetSchema: this.options.targetSchema, domain: true });
  }

  /** Consume `( ... )` and return the tokens between the parentheses */
  private parenTokens(): Token[] {
    this.expectPunct("(");
    const inner = this.collectUntil(() => false);
    this.expectPunct(")");
    return inner;
  }

  /**
   * Collect tokens until `stop` holds at nesting depth zero, a closing
   * parenthesis of an enclosing group, or the end of the statement.
   * @param min - tokens taken before `stop` is consulted
   */
  private collectUntil(stop: (t: Token) => boolean, min = 0): Token[] {
    const out: Token[] = [];
    let depth = 0;
    let caseDepth = 0;
    while (!this.isAtEnd()) {
      const t = this.peek();
      if (depth === 0 && caseDepth === 0 && out.length >= min && stop(t)) break;
      if (this.checkPunctToken(t, "(") || this.checkPunctToken(t, "[")) depth++;
      else if (this.checkPunctToken(t, ")") || this.checkPunctToken(t, "]")) {
        if (depth === 0) break;
        depth--;
      } else if (t.kind === "word" && t.value === "case") caseDepth++;
      else if (t.kind === "word" && t.value === "end" && caseDepth > 0) caseDepth--;
      out.push(this.advance());
    }
    return out;
  }

  private splitCommas(tokens: readonly Token[]): Token[][] {
    const parts: Token[][] = [[]];
    let depth = 0;
    for (const t of tokens) {
      if (this.checkPunctToken(t, "(")) depth++;
      else if (this.checkPunctToken(t, ")")) depth--;
      if (depth === 0 && this.checkPunctToken(t, ",")) {
        parts.push([]);
        continue;
      }
      parts[parts.length - 1]?.push(t);
    }
    return parts;
  }

  // ==========================================================================
  // Token helpers
  // ==========================================================================

  private isAtEnd(): boolean {
    return this.current >= this.tokens.length;
  }

  private peek(offset = 0): Token {
    return this.tokens[this.current + offset] ?? this.eof;
  }

  private previous(): Token {
    return this.tokens[this.current - 1] ?? this.eof;
  }

  private advance(): Token {
    const t = this.peek();
    if (!this.isAtEnd()) this.current++;
    return t;
  }

  private check(kind: Token["kind"]): boolean {
    return !this.isAtEnd() && this.peek().kind === kind;
  }

  private checkWord(...words: string[]): boolean {
    const t = this.peek();
    return t.kind === "word" && words.includes(t.value);
  }

  private isWordIn(t: Token, words: ReadonlySet<string>): boolean {
    return t.kind === "word" && words.has(t.value);
  }

  private matchWord(word: string): boolean {
    if (!this.checkWord(word)) return false;
    this.current++;
    return true;
  }

  /** Match a run of words, consuming nothing unless all of them match */
  private matchWords(...words: string[]): boolean {
    const matches = words.every((word, i) => {
      const t = this.peek(i);
      return t.kind === "word" && t.value === word;
    });
    if (matches) this.current += words.length;
    return matches;
  }

  private expectWord(word: string): void {
    if (!this.matchWord(word)) {
      throw this.error(this.peek(), `Expected ${word.toUpperCase()} but found '${this.peek().text}'`);
    }
  }

  private checkPunctToken(t: Token, value: string): boolean {
    return t.kind === "punct" && t.value === value;
  }

  private checkPunct(value: string): boolean {
    return !this.isAtEnd() && this.checkPunctToken(this.peek(), value);
  }

  private matchPunct(value: string): boolean {
    if (!this.checkPunct(value)) return false;
    this.current++;
    return true;
  }

  private expectPunct(value: string): void {
    if (!this.matchPunct(value)) {
      throw this.error(this.peek(), `Expected '${value}' but found '${this.peek().text}'`);
    }
  }

  private checkOperator(value: string): boolean {
    const t = this.peek();
    return t.kind === "operator" && t.value === value;
  }

  private matchOperator(value: string): boolean {
    if (!this.checkOperator(value)) return false;
    this.current++;
    return true;
  }

  private expectOperator(value: string): void {
    if (!this.matchOperator(value)) {
      throw this.error(this.peek(), `Expected '${value}' but found '${this.peek().text}'`);
    }
  }

  private error(token: Token, message: string): SqlSyntaxError {
    return new SqlSyntaxError({
      message: `${message} at ${this.file}:${token.line}:${token.column}`,
      file: this.file,
      line: token.line,
      column: token.column,
    });
  }
}

/** Parse one statement */
export const parseStatement = (statement: SourceStatement, options: ParserOptions): Command =>
  new DdlParser(options).parse(statement);

/** Parse statements in order, keeping where each came from. Throws {@link SqlSyntaxError}. */
export const parseStatements = (statements: readonly SourceStatement[], options: ParserOptions): Located[] => {
  const parser = new DdlParser(options);
  return statements.map(statement => ({
    ...parser.parse(statement),
    location: { file: statement.file, line: statement.line },
    sql: statement.text,
  }));
};
