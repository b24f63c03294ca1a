/**
 * Detached statements
 *
 * Attachments (indexes, policies, triggers, comments, ALTERs) whose target
 * lives in another file. A fold writes them on their own, in canonical
 * form, since there is no object to merge them into.
 */
import type { AlterTableAction, ColumnDef, CommentTarget, ConstraintDef, DomainAction, Located, QName, SequenceOptions } from "../sql/ast.js";
import { qualifiedName, quoteIdent, quoteLiteral } from "../sql/ident.js";
import { defaultIndexName } from "../ir/builder.js";
import type { Constraint } from "../ir/schema-ir.js";
import {
  headerSchema,
  renderConstraintBody,
  renderIndex,
  renderPolicy,
  renderTrigger,
  type RenderContext,
  type Step,
  type StepGroup,
  type StepType,
} from "./ddl.js";

const SERIAL_NAMES: Readonly<Record<string, string>> = {
  integer: "serial",
  bigint: "bigserial",
  smallint: "smallserial",
};

const qualify = (name: QName, ctx: RenderContext): string => qualifiedName(name.schema, name.name, ctx.targetSchema);

function step(type: StepType, name: string, schema: string, statements: readonly string[], group: StepGroup, owner: string, ctx: RenderContext): Step {
  return { name, type, schema: headerSchema(schema, ctx), statements, owner: { group, name: owner } };
}

/** A parsed constraint as the IR would hold it, `name` left empty when none was given */
const toConstraint = (def: ConstraintDef): Constraint => ({
  name: def.name ?? "",
  kind: def.kind,
  columns: def.columns,
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
});

function renderAddConstraint(def: ConstraintDef, ctx: RenderContext): string {
  const named = def.name !== undefined ? `CONSTRAINT ${quoteIdent(def.name)} ` : "";
  return `ADD ${named}${renderConstraintBody(toConstraint(def), ctx)}${def.notValid ? " NOT VALID" : ""}`;
}

function renderColumnDef(def: ColumnDef, ctx: RenderContext): string {
  const type = def.serial ? (SERIAL_NAMES[def.dataType] ?? def.dataType) : def.dataType;
  let out = `${quoteIdent(def.name)} ${type}`;
  if (def.collation !== undefined) out += ` COLLATE ${def.collation}`;
  if (def.identity !== undefined) out += ` GENERATED ${def.identity} AS IDENTITY`;
  if (def.generated !== undefined) out += ` GENERATED ALWAYS AS (${def.generated.text}) STORED`;
  if (def.default !== undefined) out += ` DEFAULT ${def.default.text}`;
  if (def.notNull) out += " NOT NULL";
  for (const c of def.constraints) {
    const named = c.name !== undefined ? `CONSTRAINT ${quoteIdent(c.name)} ` : "";
    switch (c.kind) {
      case "PRIMARY KEY":
        out += ` ${named}PRIMARY KEY`;
        break;
      case "UNIQUE":
        out += ` ${named}UNIQUE`;
        break;
      case "FOREIGN KEY": {
        const body = renderConstraintBody(toConstraint(c), ctx);
        out += ` ${named}${body.slice(body.indexOf("REFERENCES"))}`;
        break;
      }
      case "CHECK":
        out += ` ${named}CHECK (${c.check?.text ?? ""})`;
        break;
    }
  }
  return out;
}

function renderTableAction(action: AlterTableAction, ctx: RenderContext): string | undefined {
  switch (action.kind) {
    case "add_column":
      return `ADD COLUMN ${action.ifNotExists ? "IF NOT EXISTS " : ""}${renderColumnDef(action.column, ctx)}`;
    case "drop_column":
      return `DROP COLUMN ${action.ifExists ? "IF EXISTS " : ""}${quoteIdent(action.column)}`;
    case "set_default":
      return `ALTER COLUMN ${quoteIdent(action.column)} SET DEFAULT ${action.expr.text}`;
    case "drop_default":
      return `ALTER COLUMN ${quoteIdent(action.column)} DROP DEFAULT`;
    case "set_not_null":
      return `ALTER COLUMN ${quoteIdent(action.column)} SET NOT NULL`;
    case "drop_not_null":
      return `ALTER COLUMN ${quoteIdent(action.column)} DROP NOT NULL`;
    case "set_type":
      return `ALTER COLUMN ${quoteIdent(action.column)} TYPE ${action.dataType}`;
    case "add_constraint":
      return renderAddConstraint(action.constraint, ctx);
    case "drop_constraint":
      return `DROP CONSTRAINT ${action.ifExists ? "IF EXISTS " : ""}${quoteIdent(action.name)}`;
    case "rls":
      if (action.forced !== undefined) return `${action.forced ? "FORCE" : "NO FORCE"} ROW LEVEL SECURITY`;
      return `${action.enabled === false ? "DISABLE" : "ENABLE"} ROW LEVEL SECURITY`;
    case "owner":
      return undefined;
  }
}

function renderSequenceOptions(options: SequenceOptions, ctx: RenderContext): string {
  let out = "";
  if (options.dataType !== undefined) out += ` AS ${options.dataType}`;
  if (options.increment !== undefined) out += ` INCREMENT BY ${options.increment}`;
  if (options.minValue === null) out += " NO MINVALUE";
  else if (options.minValue !== undefined) out += ` MINVALUE ${options.minValue}`;
  if (options.maxValue === null) out += " NO MAXVALUE";
  else if (options.maxValue !== undefined) out += ` MAXVALUE ${options.maxValue}`;
  if (options.cache !== undefined) out += ` CACHE ${options.cache}`;
  if (options.cycle !== undefined) out += options.cycle ? " CYCLE" : " NO CYCLE";
  if (options.ownedBy === null) out += " OWNED BY NONE";
  else if (options.ownedBy !== undefined) {
    out += ` OWNED BY ${qualify(options.ownedBy.table, ctx)}.${quoteIdent(options.ownedBy.column)}`;
  }
  return out;
}

function renderDomainAction(action: DomainAction): string {
  switch (action.kind) {
    case "add_constraint": {
      const named = action.name !== undefined ? `CONSTRAINT ${quoteIdent(action.name)} ` : "";
      return `ADD ${named}CHECK (${action.check.text})${action.notValid ? " NOT VALID" : ""}`;
    }
    case "drop_constraint":
      return `DROP CONSTRAINT ${quoteIdent(action.name)}`;
    case "set_default":
      return `SET DEFAULT ${action.expr.text}`;
    case "drop_default":
      return "DROP DEFAULT";
    case "set_not_null":
      return "SET NOT NULL";
    case "drop_not_null":
      return "DROP NOT NULL";
  }
}

function commentObject(target: CommentTarget, ctx: RenderContext): string {
  const name = qualify(target.name, ctx);
  switch (target.kind) {
    case "COLUMN":
      return `${name}.${quoteIdent(target.member ?? "")}`;
    case "FUNCTION":
    case "PROCEDURE":
      return `${name}(${target.argTypes ?? ""})`;
    case "TRIGGER":
    case "POLICY":
    case "CONSTRAINT":
      return `${quoteIdent(target.member ?? "")} ON ${name}`;
    default:
      return name;
  }
}

function commentGroup(target: CommentTarget): StepGroup {
  switch (target.kind) {
    case "TYPE":
      return "types";
    case "DOMAIN":
      return "domains";
    case "SEQUENCE":
      return "sequences";
    case "FUNCTION":
      return "functions";
    case "PROCEDURE":
      return "procedures";
    case "VIEW":
      return "views";
    case "MATERIALIZED VIEW":
      return "materialized_views";
    default:
      return "tables";
  }
}

/**
 * Canonical statements for an attachment whose target is not in the IR.
 */
export function detachedSteps(command: Located, ctx: RenderContext): Step[] {
  switch (command.kind) {
    case "create_index": {
      const name = command.name ?? defaultIndexName(command.table.name, command.elements);
      const sql = renderIndex(
        {
          schema: command.table.schema,
          name,
          table: command.table.name,
          unique: command.unique,
          method: command.method,
          elements: command.elements,
          include: command.include,
          where: command.where?.text,
        },
        ctx,
      );
      return [step("INDEX", name, command.table.schema, [sql], "tables", command.table.name, ctx)];
    }
    case "create_policy": {
      const sql = renderPolicy(
        {
          name: command.name,
          table: command.table.name,
          permissive: command.permissive,
          command: command.command,
          roles: command.roles.length === 0 ? ["PUBLIC"] : command.roles,
          using: command.using?.text,
          withCheck: command.withCheck?.text,
        },
        command.table.schema,
        ctx,
      );
      return [step("POLICY", `${command.table.name} ${command.name}`, command.table.schema, [sql], "tables", command.table.name, ctx)];
    }
    case "create_trigger": {
      const sql = renderTrigger(
        {
          name: command.name,
          table: command.table.name,
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
        },
        command.table.schema,
        ctx,
      );
      return [step("TRIGGER", `${command.table.name} ${command.name}`, command.table.schema, [sql], "tables", command.table.name, ctx)];
    }
    case "comment": {
      const object = commentObject(command.target, ctx);
      const text = command.text === null ? "NULL" : quoteLiteral(command.text);
      const sql = `COMMENT ON ${command.target.kind} ${object} IS ${text};`;
      return [step("COMMENT", object, command.target.name.schema, [sql], commentGroup(command.target), command.target.name.name, ctx)];
    }
    case "alter_table": {
      const name = qualify(command.name, ctx);
      const prefix = `ALTER TABLE ${command.ifExists ? "IF EXISTS " : ""}${name}`;
      return command.actions.flatMap(action => {
        const rendered = renderTableAction(action, ctx);
        if (rendered === undefined) return [];
        const isConstraint = action.kind === "add_constraint";
        const stepName =
          isConstraint && action.constraint.name !== undefined ? `${command.name.name} ${action.constraint.name}` : command.name.name;
        return [
          step(isConstraint ? "CONSTRAINT" : "TABLE", stepName, command.name.schema, [`${prefix} ${rendered};`], "tables", command.name.name, ctx),
        ];
      });
    }
    case "alter_sequence": {
      const sql = `ALTER SEQUENCE ${qualify(command.name, ctx)}${renderSequenceOptions(command.options, ctx)};`;
      return [step("SEQUENCE", command.name.name, command.name.schema, [sql], "sequences", command.name.name, ctx)];
    }
    case "alter_type_add_value": {
      const position = command.position
        ? ` ${command.position.before ? "BEFORE" : "AFTER"} ${quoteLiteral(command.position.neighbor)}`
        : "";
      const sql = `ALTER TYPE ${qualify(command.name, ctx)} ADD VALUE IF NOT EXISTS ${quoteLiteral(command.value)}${position};`;
      return [step("TYPE", command.name.name, command.name.schema, [sql], "types", command.name.name, ctx)];
    }
    case "alter_domain": {
      const sql = `ALTER DOMAIN ${qualify(command.name, ctx)} ${renderDomainAction(command.action)};`;
      return [step("DOMAIN", command.name.name, command.name.schema, [sql], "domains", command.name.name, ctx)];
    }
    default:
      return [];
  }
}
