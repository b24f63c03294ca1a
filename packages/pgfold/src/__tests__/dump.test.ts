/**
 * Canonical Dump Tests
 *
 * Rendering of each object kind, dump ordering and the single and
 * multi-file formatters.
 */
import { describe, it, expect } from "@effect/vitest"
import { dollarQuote } from "../dump/ddl.js"
import { formatMultiFile, formatSingleFile, formatSteps, sanitizeFileName } from "../dump/formatter.js"
import { dumpSteps, objectRenderings } from "../dump/steps.js"
import { emptyIgnoreRules } from "../ir/ignore.js"
import { build } from "./fixtures/index.js"

const dump = (sql: string) => dumpSteps(build(sql).ir)
const statements = (sql: string) => dump(sql).flatMap(step => step.statements)

describe("canonical statements", () => {
  it("writes single-column constraints inline when they carry the default name", () => {
    expect(statements("CREATE TABLE users (id serial PRIMARY KEY, email varchar(255) NOT NULL UNIQUE);")).toEqual([
      [
        "CREATE TABLE IF NOT EXISTS users (",
        "    id integer PRIMARY KEY,",
        "    email varchar(255) NOT NULL UNIQUE",
        ");",
      ].join("\n"),
    ])
  })

  it("writes other constraints after the columns", () => {
    const sql = [
      "CREATE TABLE line_items (",
      "  order_id int NOT NULL,",
      "  line int NOT NULL,",
      "  sku text CONSTRAINT sku_present CHECK (sku <> ''),",
      "  PRIMARY KEY (order_id, line),",
      "  FOREIGN KEY (order_id) REFERENCES orders (id) ON DELETE CASCADE",
      ");",
    ].join("\n")
    expect(statements(sql)).toEqual([
      [
        "CREATE TABLE IF NOT EXISTS line_items (",
        "    order_id integer REFERENCES orders(id) ON DELETE CASCADE,",
        "    line integer,",
        "    sku text,",
        "    CONSTRAINT line_items_pkey PRIMARY KEY (order_id, line),",
        "    CONSTRAINT sku_present CHECK (sku <> '')",
        ");",
      ].join("\n"),
    ])
  })

  it("writes enums one value per line and composites on one line", () => {
    expect(statements("CREATE TYPE mood AS ENUM ('sad', 'happy');\nCREATE TYPE pair AS (a int, b text);")).toEqual([
      "CREATE TYPE mood AS ENUM (\n    'sad',\n    'happy'\n);",
      "CREATE TYPE pair AS (a integer, b text);",
    ])
  })

  it("writes LIKE as ~~ in domain checks but not in table checks", () => {
    const sql = [
      "CREATE DOMAIN email_address AS text CHECK (VALUE LIKE '%@%');",
      "CREATE TABLE contacts (email text CHECK (email LIKE '%@%'));",
    ].join("\n")
    expect(statements(sql)).toEqual([
      "CREATE DOMAIN email_address AS text\n  CONSTRAINT email_address_check CHECK (VALUE ~~ '%@%');",
      "CREATE TABLE IF NOT EXISTS contacts (\n    email text CHECK (email LIKE '%@%')\n);",
    ])
  })

  it("names domain checks and puts each clause on its own line", () => {
    expect(statements("CREATE DOMAIN email AS text NOT NULL CHECK (value ~* '^.+@.+$');")).toEqual([
      "CREATE DOMAIN email AS text\n  NOT NULL\n  CONSTRAINT email_check CHECK (VALUE ~* '^.+@.+$');",
    ])
  })

  it("drops the start value and options equal to the type defaults", () => {
    expect(statements("CREATE SEQUENCE s AS integer START WITH 100 MAXVALUE 2147483647 CACHE 10;")).toEqual([
      "CREATE SEQUENCE IF NOT EXISTS s AS integer CACHE 10;",
    ])
  })

  it("writes functions with one parameter per line", () => {
    expect(
      statements("CREATE FUNCTION app_add(a int, b int DEFAULT 1) RETURNS int LANGUAGE sql STABLE STRICT AS $$ SELECT a + b $$;"),
    ).toEqual([
      [
        "CREATE OR REPLACE FUNCTION app_add(",
        "    a integer,",
        "    b integer DEFAULT 1",
        ")",
        "RETURNS integer",
        "LANGUAGE sql",
        "SECURITY INVOKER",
        "STABLE",
        "STRICT",
        "AS $$ SELECT a + b $$;",
      ].join("\n"),
    ])
  })

  it("picks a dollar quote the body does not contain", () => {
    expect(dollarQuote(" SELECT 1 ")).toBe("$$ SELECT 1 $$")
    expect(dollarQuote("a $$ b")).toBe("$function$a $$ b$function$")
    expect(dollarQuote("$function$ $$")).toBe("$function1$$function$ $$$function1$")
  })

  it("writes policies with sorted roles after row level security", () => {
    const sql = [
      "CREATE TABLE t (owner text);",
      "ALTER TABLE t ENABLE ROW LEVEL SECURITY;",
      "CREATE POLICY p ON t AS RESTRICTIVE FOR UPDATE TO b_role, a_role USING (true) WITH CHECK (owner = current_user);",
    ].join("\n")
    expect(dump(sql).map(step => [step.type, step.name, step.statements])).toEqual([
      ["TABLE", "t", ["CREATE TABLE IF NOT EXISTS t (\n    owner text\n);"]],
      ["TABLE", "t", ["ALTER TABLE t ENABLE ROW LEVEL SECURITY;"]],
      [
        "POLICY",
        "t p",
        ["CREATE POLICY p ON t AS RESTRICTIVE FOR UPDATE TO a_role, b_role USING (true) WITH CHECK (owner = CURRENT_USER);"],
      ],
    ])
  })

  it("writes views and materialized views", () => {
    expect(
      statements(
        "CREATE VIEW v AS SELECT id FROM t;\nCREATE MATERIALIZED VIEW mv AS SELECT id FROM t WITH NO DATA;",
      ),
    ).toEqual([
      "CREATE MATERIALIZED VIEW IF NOT EXISTS mv AS\n SELECT id\n   FROM t\n  WITH NO DATA;;",
      "CREATE OR REPLACE VIEW v AS\n SELECT id\n   FROM t;;",
    ])
  })
})

describe("dumpSteps ordering", () => {
  it("orders tables, functions, triggers and views by dependency", () => {
    const sql = [
      "CREATE VIEW active_orders AS SELECT id FROM orders WHERE NOT archived;",
      "CREATE TABLE orders (id int PRIMARY KEY, customer_id int REFERENCES customers (id), archived boolean DEFAULT false, code text DEFAULT make_code());",
      "CREATE TABLE customers (id int PRIMARY KEY);",
      "CREATE FUNCTION make_code() RETURNS text LANGUAGE sql AS 'SELECT ''x''';",
      "CREATE TRIGGER trg AFTER INSERT ON customers FOR EACH ROW EXECUTE FUNCTION make_code();",
    ].join("\n")
    const steps = dump(sql)
    expect(steps.map(step => [step.type, step.name])).toEqual([
      ["TABLE", "customers"],
      ["FUNCTION", "make_code"],
      ["TABLE", "orders"],
      ["TRIGGER", "customers trg"],
      ["VIEW", "active_orders"],
    ])
    expect(steps[2]?.statements).toEqual([
      [
        "CREATE TABLE IF NOT EXISTS orders (",
        "    id integer PRIMARY KEY,",
        "    customer_id integer REFERENCES customers(id),",
        "    archived boolean DEFAULT false,",
        "    code text DEFAULT make_code()",
        ");",
      ].join("\n"),
    ])
    expect(steps[3]?.statements).toEqual([
      [
        "CREATE OR REPLACE TRIGGER trg",
        "    AFTER INSERT",
        "    ON customers",
        "    FOR EACH ROW",
        "    EXECUTE FUNCTION make_code();",
      ].join("\n"),
    ])
  })

  it("writes composite types before the types that use them and domains last", () => {
    const steps = dump(
      "CREATE DOMAIN a_dom AS int;\nCREATE TYPE outer_t AS (v inner_t);\nCREATE TYPE inner_t AS (x int);",
    )
    expect(steps.map(step => step.name)).toEqual(["inner_t", "outer_t", "a_dom"])
  })

  it("writes sequence ownership after the owning table", () => {
    const steps = dump(
      "CREATE SEQUENCE s;\nCREATE TABLE t (id bigint DEFAULT nextval('s'));\nALTER SEQUENCE s OWNED BY t.id;",
    )
    expect(steps.map(step => [step.type, step.name])).toEqual([
      ["SEQUENCE", "s"],
      ["TABLE", "t"],
      ["SEQUENCE OWNED BY", "s"],
    ])
    expect(steps[2]?.statements).toEqual(["ALTER SEQUENCE s OWNED BY t.id;"])
  })

  it("leaves out ignored objects", () => {
    const ir = build("CREATE TABLE tmp_a (id int);\nCREATE TABLE tmp_keep (id int);\nCREATE TABLE users (id int);").ir
    const steps = dumpSteps(ir, { ignore: { ...emptyIgnoreRules, tables: ["tmp_*", "!tmp_keep"] } })
    expect(steps.map(step => step.name)).toEqual(["tmp_keep", "users"])
  })

  it("appends passed-through statements", () => {
    const steps = dumpSteps(build("CREATE TABLE t (id int);\nINSERT INTO t VALUES (1);", { strict: false }).ir)
    expect(steps.map(step => [step.type, step.statements])).toEqual([
      ["TABLE", ["CREATE TABLE IF NOT EXISTS t (\n    id integer\n);"]],
      ["STATEMENT", ["INSERT INTO t VALUES (1);"]],
    ])
  })
})

describe("formatter", () => {
  it("writes a banner, object headers and headerless comments", () => {
    const sql = [
      "CREATE TYPE mood AS ENUM ('sad', 'happy');",
      "CREATE TABLE users (id serial PRIMARY KEY, mood mood DEFAULT 'happy');",
      "CREATE INDEX ON users (lower(mood::text));",
      "COMMENT ON TABLE users IS 'People';",
    ].join("\n")
    const text = formatSingleFile(dump(sql), { schema: "public", header: true, comments: true })
    expect(text).toBe(
      [
        "--",
        "-- pgfold schema dump",
        "--",
        "",
        "-- Dumped from schema: public",
        "",
        "",
        "--",
        "-- Name: mood; Type: TYPE; Schema: -; Owner: -",
        "--",
        "",
        "CREATE TYPE mood AS ENUM (",
        "    'sad',",
        "    'happy'",
        ");",
        "",
        "--",
        "-- Name: users; Type: TABLE; Schema: -; Owner: -",
        "--",
        "",
        "CREATE TABLE IF NOT EXISTS users (",
        "    id integer PRIMARY KEY,",
        "    mood mood DEFAULT 'happy'",
        ");",
        "",
        "COMMENT ON TABLE users IS 'People';",
        "",
        "--",
        "-- Name: users_lower_idx; Type: INDEX; Schema: -; Owner: -",
        "--",
        "",
        "CREATE INDEX IF NOT EXISTS users_lower_idx ON users (lower(mood::text));",
        "",
      ].join("\n"),
    )
  })

  it("leaves out the banner and headers when asked", () => {
    const steps = dump("CREATE TABLE t (id int);\nCREATE INDEX ON t (id);")
    expect(formatSteps(steps, false)).toBe(
      "CREATE TABLE IF NOT EXISTS t (\n    id integer\n);\n\nCREATE INDEX IF NOT EXISTS t_id_idx ON t (id);\n",
    )
    expect(formatSingleFile(steps, { schema: "public", header: false, comments: false })).toBe(formatSteps(steps, false))
  })

  it("sanitizes file names", () => {
    expect(sanitizeFileName("Order Items")).toBe("order_items")
    expect(sanitizeFileName("app.users")).toBe("app_users")
    expect(sanitizeFileName("")).toBe("_")
  })

  it("splits a dump into one file per object", () => {
    const steps = dump(
      "CREATE TYPE mood AS ENUM ('ok');\nCREATE TABLE u (m mood);\nCREATE INDEX ON u (m);\nCREATE TABLE app.t (id int);",
    )
    const files = formatMultiFile(steps, "main.sql", { schema: "public", header: false, comments: false })
    expect(files).toEqual([
      { path: "main.sql", content: "\\i types/mood.sql\n\\i tables/app_t.sql\n\\i tables/u.sql\n" },
      { path: "types/mood.sql", content: "CREATE TYPE mood AS ENUM (\n    'ok'\n);\n" },
      { path: "tables/app_t.sql", content: "CREATE TABLE IF NOT EXISTS app.t (\n    id integer\n);\n" },
      {
        path: "tables/u.sql",
        content: "CREATE TABLE IF NOT EXISTS u (\n    m mood\n);\n\nCREATE INDEX IF NOT EXISTS u_m_idx ON u (m);\n",
      },
    ])
  })
})

describe("objectRenderings", () => {
  it("keys each top-level object and folds its sub-objects into its text", () => {
    const renderings = objectRenderings(build("CREATE TABLE t (id int);\nCREATE INDEX ON t (id);\nCREATE VIEW v AS SELECT 1;").ir)
    expect([...renderings.keys()]).toEqual(["table:public.t", "view:public.v"])
    expect(renderings.get("table:public.t")).toBe(
      "CREATE TABLE IF NOT EXISTS t (\n    id integer\n);\nCREATE INDEX IF NOT EXISTS t_id_idx ON t (id);",
    )
  })
})
