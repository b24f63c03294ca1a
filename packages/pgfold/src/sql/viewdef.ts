/**
 * View definition formatter
 *
 * Lays a SELECT out the way the server prints stored view definitions:
 *
 * ```
 *  SELECT u.id,
 *     u.name
 *    FROM users u
 *      JOIN orders o ON u.id = o.user_id
 *   WHERE ...
 *   GROUP BY ...
 * ```
 *
 * Queries outside that shape (CTEs, window clauses, locking clauses) are
 * normalized on a single line instead.
 */
import type { Token } from "./lexer.js";
import { formatExpr, unwrapParens, type ExprOptions } from "./expr.js";

export interface ViewDefinition {
  readonly text: string;
  /** Relations named in FROM and JOIN clauses, subqueries included */
  readonly relations: readonly string[];
  /** Functions called anywhere in the query */
  readonly calls: readonly string[];
}

const CLAUSES = ["select", "from", "where", "group", "having", "order", "limit", "offset"] as const;
type Clause = (typeof CLAUSES)[number];

const SET_OPERATORS = new Set(["union", "intersect", "except"]);
const UNSUPPORTED = new Set(["with", "window", "fetch", "for", "into", "values", "table"]);
const JOIN_WORDS = new Set(["join", "inner", "left", "right", "full", "cross", "natural"]);

const isWord = (t: Token | undefined, value: string): boolean => t?.kind === "word" && t.value === value;
const isPunct = (t: Token | undefined, value: string): boolean => t?.kind === "punct" && t.value === value;

class Unsupported extends Error {}

/** Split tokens at top-level positions where `isSplit` holds */
function splitTopLevel(tokens: readonly Token[], isSplit: (t: Token, i: number) => boolean): Token[][] {
  const parts: Token[][] = [[]];
  let depth = 0;
  tokens.forEach((t, i) => {
    if (isPunct(t, "(") || isPunct(t, "[")) depth++;
    else if (isPunct(t, ")") || isPunct(t, "]")) depth--;
    if (depth === 0 && isSplit(t, i)) {
      parts.push([t]);
      return;
    }
    parts[parts.length - 1]?.push(t);
  });
  return parts.filter(p => p.length > 0);
}

const splitCommas = (tokens: readonly Token[]): Token[][] =>
  splitTopLevel(tokens, t => isPunct(t, ",")).map(part => (isPunct(part[0], ",") ? part.slice(1) : part));

/** Break one SELECT into its clauses */
function clausesOf(tokens: readonly Token[]): Map<Clause, Token[]> {
  const clauses = new Map<Clause, Token[]>();
  let depth = 0;
  let current: Clause | undefined;
  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    if (t === undefined) continue;
    if (isPunct(t, "(") || isPunct(t, "[")) depth++;
    else if (isPunct(t, ")") || isPunct(t, "]")) depth--;

    if (depth === 0 && t.kind === "word") {
      if (UNSUPPORTED.has(t.value)) throw new Unsupported(t.value);
      const clause = CLAUSES.find(c => c === t.value);
      const startsClause =
        clause !== undefined &&
        ((clause !== "group" && clause !== "order") || isWord(tokens[i + 1], "by"));
      if (clause !== undefined && startsClause) {
        if (clauses.has(clause)) throw new Unsupported(clause);
        current = clause;
        clauses.set(clause, []);
        if (clause === "group" || clause === "order") i++;
        continue;
      }
    }
    if (current === undefined) throw new Unsupported("leading tokens");
    clauses.get(current)?.push(t);
  }
  return clauses;
}

function formatTarget(tokens: readonly Token[], options: ExprOptions): string {
  const asIndex = tokens.length >= 2 && isWord(tokens[tokens.length - 2], "as") ? tokens.length - 2 : -1;
  if (asIndex > 0) {
    const alias = formatExpr(tokens.slice(asIndex + 1), options).text;
    return `${formatExpr(tokens.slice(0, asIndex), options).text} AS ${alias}`;
  }
  return formatExpr(tokens, options).text;
}

/** `users AS u` prints as `users u`; the target schema qualifier is dropped */
function formatFromItem(tokens: readonly Token[], options: ExprOptions): string {
  let items = tokens.filter(t => !isWord(t, "as"));
  if (
    options.targetSchema !== undefined &&
    items[0]?.kind === "word" &&
    items[0].value === options.targetSchema &&
    isPunct(items[1], ".")
  ) {
    items = items.slice(2);
  }
  return formatExpr(items, options).text;
}

function formatJoin(tokens: readonly Token[], options: ExprOptions): string {
  let i = 0;
  const words: string[] = [];
  for (let t = tokens[i]; t?.kind === "word" && (JOIN_WORDS.has(t.value) || t.value === "outer"); t = tokens[i]) {
    words.push(t.value);
    i++;
  }
  // INNER JOIN prints as JOIN, LEFT OUTER JOIN as LEFT JOIN
  const kind = words
    .filter(w => w !== "inner" && w !== "outer")
    .map(w => w.toUpperCase())
    .join(" ");

  const rest = tokens.slice(i);
  const onIndex = rest.findIndex((t, idx) => (isWord(t, "on") || isWord(t, "using")) && depthAt(rest, idx) === 0);
  if (onIndex === -1) return `${kind} ${formatFromItem(rest, options)}`;

  const item = formatFromItem(rest.slice(0, onIndex), options);
  const keyword = rest[onIndex]?.value === "on" ? "ON" : "USING";
  const condition = rest.slice(onIndex + 1);
  const conditionText =
    keyword === "ON" ? formatExpr(unwrapParens(condition), options).text : formatExpr(condition, options).text;
  return `${kind} ${item} ${keyword} ${conditionText}`;
}

function depthAt(tokens: readonly Token[], index: number): number {
  let depth = 0;
  for (let i = 0; i < index; i++) {
    if (isPunct(tokens[i], "(")) depth++;
    else if (isPunct(tokens[i], ")")) depth--;
  }
  return depth;
}

function formatFrom(tokens: readonly Token[], options: ExprOptions): string {
  const items = splitCommas(tokens);
  return items
    .map(item => {
      const joins = splitTopLevel(item, (t, i) => {
        if (t.kind !== "word" || !JOIN_WORDS.has(t.value)) return false;
        // start a join segment only at the first word of the join keyword run
        const prev = item[i - 1];
        return !(prev?.kind === "word" && (JOIN_WORDS.has(prev.value) || prev.value === "outer"));
      });
      const [first, ...rest] = joins;
      const head = first === undefined ? "" : formatFromItem(first, options);
      return [head, ...rest.map(j => `\n     ${formatJoin(j, options)}`)].join("");
    })
    .join(",\n    ");
}

function formatSelect(tokens: readonly Token[], options: ExprOptions): string {
  const clauses = clausesOf(tokens);
  const select = clauses.get("select");
  if (select === undefined) throw new Unsupported("no SELECT");

  let targets = select;
  let distinct = "";
  if (isWord(targets[0], "distinct")) {
    distinct = "DISTINCT ";
    targets = targets.slice(1);
  } else if (isWord(targets[0], "all")) {
    targets = targets.slice(1);
  }

  let out = ` SELECT ${distinct}${splitCommas(targets)
    .map(t => formatTarget(t, options))
    .join(",\n    ")}`;

  const from = clauses.get("from");
  if (from !== undefined) out += `\n   FROM ${formatFrom(from, options)}`;
  const where = clauses.get("where");
  if (where !== undefined) out += `\n  WHERE ${formatExpr(where, options).text}`;
  const group = clauses.get("group");
  if (group !== undefined) {
    out += `\n  GROUP BY ${splitCommas(group)
      .map(g => formatExpr(g, options).text)
      .join(", ")}`;
  }
  const having = clauses.get("having");
  if (having !== undefined) out += `\n HAVING ${formatExpr(having, options).text}`;
  const order = clauses.get("order");
  if (order !== undefined) {
    out += `\n  ORDER BY ${splitCommas(order)
      .map(o => formatExpr(o, options).text)
      .join(", ")}`;
  }
  const limit = clauses.get("limit");
  if (limit !== undefined) out += `\n LIMIT ${formatExpr(limit, options).text}`;
  const offset = clauses.get("offset");
  if (offset !== undefined) out += `\n OFFSET ${formatExpr(offset, options).text}`;
  return out;
}

/** Relations that follow FROM, JOIN or a comma inside a FROM list */
function collectRelations(tokens: readonly Token[]): string[] {
  const relations: string[] = [];
  tokens.forEach((t, i) => {
    if (!(isWord(t, "from") || isWord(t, "join"))) return;
    let j = i + 1;
    let name: string | undefined;
    while (tokens[j]?.kind === "word" || tokens[j]?.kind === "quoted") {
      name = tokens[j]?.value;
      if (!isPunct(tokens[j + 1], ".")) break;
      j += 2;
    }
    if (name !== undefined && !relations.includes(name)) relations.push(name);
  });
  return relations;
}

/** Format a view query (the tokens after `AS`) */
export function formatViewDefinition(tokens: readonly Token[], options: ExprOptions = {}): ViewDefinition {
  const query = unwrapParens(tokens);
  const relations = collectRelations(query);
  const calls = formatExpr(query, options).calls;

  try {
    const branches = splitTopLevel(query, t => t.kind === "word" && SET_OPERATORS.has(t.value));
    const parts = branches.map(branch => {
      const head = branch[0];
      if (head !== undefined && head.kind === "word" && SET_OPERATORS.has(head.value)) {
        const all = isWord(branch[1], "all");
        const op = `${head.value.toUpperCase()}${all ? " ALL" : ""}`;
        return `\n${op}\n${formatSelect(branch.slice(all ? 2 : 1), options)}`;
      }
      return formatSelect(branch, options);
    });
    return { text: parts.join(""), relations, calls };
  } catch (error) {
    if (error instanceof Unsupported) {
      return { text: ` ${formatExpr(query, options).text}`, relations, calls };
    }
    throw error;
  }
}
