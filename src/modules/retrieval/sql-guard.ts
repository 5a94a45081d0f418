import { SqlGuardError } from "../../errors.js";

export interface SqlGuardOptions {
  allowedTables: readonly string[];
  maxRows: number;
}

export interface GuardedSql {
  /** Statement as generated, without trailing semicolons. */
  statement: string;
  /** Statement wrapped with the row cap; this is what gets executed. */
  executable: string;
  tables: string[];
}

const FORBIDDEN_KEYWORDS = new Set([
  "insert",
  "update",
  "delete",
  "merge",
  "drop",
  "alter",
  "create",
  "truncate",
  "grant",
  "revoke",
  "copy",
  "vacuum",
  "reindex",
  "cluster",
  "call",
  "execute",
  "prepare",
  "listen",
  "notify",
  "lock",
  "refresh",
  "into",
  "begin",
  "commit",
  "rollback",
  "savepoint"
]);

// Anything called like a function must be one of these. Functions that take SQL text
// (query_to_xml, dblink, ...) would hide table references inside literals.
const ALLOWED_FUNCTIONS = new Set([
  "count",
  "sum",
  "avg",
  "min",
  "max",
  "stddev",
  "variance",
  "string_agg",
  "array_agg",
  "bool_and",
  "bool_or",
  "percentile_cont",
  "percentile_disc",
  "mode",
  "rank",
  "dense_rank",
  "row_number",
  "ntile",
  "lag",
  "lead",
  "first_value",
  "last_value",
  "extract",
  "date_part",
  "date_trunc",
  "to_char",
  "to_date",
  "to_timestamp",
  "now",
  "age",
  "make_date",
  "coalesce",
  "nullif",
  "greatest",
  "least",
  "round",
  "floor",
  "ceil",
  "ceiling",
  "abs",
  "trunc",
  "lower",
  "upper",
  "length",
  "char_length",
  "substring",
  "substr",
  "trim",
  "btrim",
  "ltrim",
  "rtrim",
  "position",
  "strpos",
  "replace",
  "concat",
  "concat_ws",
  "left",
  "right",
  "split_part",
  "cast",
  "numeric",
  "decimal",
  "varchar"
]);

// Keywords that may be followed by a parenthesis without being a function call.
const PARENTHESIZED_SYNTAX = new Set([
  "select",
  "from",
  "join",
  "lateral",
  "in",
  "exists",
  "any",
  "all",
  "some",
  "as",
  "over",
  "filter",
  "group",
  "by",
  "where",
  "having",
  "and",
  "or",
  "not",
  "on",
  "using",
  "case",
  "when",
  "then",
  "else",
  "between",
  "like",
  "ilike",
  "distinct",
  "union",
  "intersect",
  "except",
  "values"
]);

// Functions whose argument syntax uses FROM without naming a table.
const FROM_ARGUMENT_FUNCTIONS = new Set(["extract", "substring", "trim", "overlay", "position"]);

const CLAUSE_KEYWORDS = new Set([
  "where",
  "group",
  "order",
  "limit",
  "offset",
  "fetch",
  "having",
  "window",
  "union",
  "intersect",
  "except",
  "join",
  "inner",
  "left",
  "right",
  "full",
  "cross",
  "natural",
  "on",
  "using",
  "lateral",
  "tablesample",
  "for"
]);

const TOKEN_PATTERN = /"(?:[^"]|"")*"|[a-z_][a-z0-9_$]*(?:\.[a-z_][a-z0-9_$]*|\."(?:[^"]|"")*")*|[(),]|\S/g;
const WORD_PATTERN = /^[a-z_"]/;

const IDENTIFIER_CHAR = /[A-Za-z0-9_$]/;
const DOLLAR_QUOTE_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;

const unterminated = (): SqlGuardError => new SqlGuardError("Unterminated string literal or comment.");

/** Index just past the closing quote; a doubled quote is an escaped one. */
const skipQuoted = (sql: string, start: number, quote: string, backslashEscapes: boolean): number => {
  let index = start;
  while (index < sql.length) {
    const char = sql.charAt(index);
    if (backslashEscapes && char === "\\") {
      index += 2;
      continue;
    }
    if (char === quote) {
      if (sql.charAt(index + 1) !== quote) {
        return index + 1;
      }
      index += 2;
      continue;
    }
    index += 1;
  }
  throw unterminated();
};

/** Block comments nest in PostgreSQL. */
const skipBlockComment = (sql: string, start: number): number => {
  let depth = 0;
  let index = start;
  while (index < sql.length) {
    const pair = sql.slice(index, index + 2);
    if (pair === "/*") {
      depth += 1;
      index += 2;
    } else if (pair === "*/") {
      depth -= 1;
      index += 2;
      if (depth === 0) {
        return index;
      }
    } else {
      index += 1;
    }
  }
  throw unterminated();
};

/**
 * Replaces string literals (plain, E'' and dollar-quoted) with '' and comments with a space,
 * scanning left to right so quotes inside comments and comment markers inside literals are inert.
 * Quoted identifiers are kept.
 */
export const maskLiteralsAndComments = (sql: string): string => {
  let output = "";
  let index = 0;
  while (index < sql.length) {
    const char = sql.charAt(index);
    const next = sql.charAt(index + 1);
    const startsToken = index === 0 || !IDENTIFIER_CHAR.test(sql.charAt(index - 1));
    const dollarTag = char === "$" && startsToken ? DOLLAR_QUOTE_TAG.exec(sql.slice(index))?.[0] : undefined;

    if (char === "-" && next === "-") {
      const end = sql.indexOf("\n", index);
      output += " ";
      index = end === -1 ? sql.length : end;
    } else if (char === "/" && next === "*") {
      output += " ";
      index = skipBlockComment(sql, index);
    } else if (char === '"') {
      const end = skipQuoted(sql, index + 1, '"', false);
      output += sql.slice(index, end);
      index = end;
    } else if (char === "'") {
      output += "''";
      index = skipQuoted(sql, index + 1, "'", false);
    } else if ((char === "e" || char === "E") && next === "'" && startsToken) {
      output += "''";
      index = skipQuoted(sql, index + 2, "'", true);
    } else if (dollarTag !== undefined) {
      const end = sql.indexOf(dollarTag, index + dollarTag.length);
      if (end === -1) {
        throw unterminated();
      }
      output += "''";
      index = end + dollarTag.length;
    } else {
      output += char;
      index += 1;
    }
  }
  return output;
};

const unquote = (identifier: string): string =>
  identifier
    .split(".")
    .map((part) => (part.startsWith('"') && part.endsWith('"') ? part.slice(1, -1).replace(/""/g, '"') : part))
    .join(".");

const isWord = (token: string | undefined): token is string => token !== undefined && WORD_PATTERN.test(token);

/**
 * Removes markdown fences and a leading `sql` language tag from model output.
 */
export const stripSqlFences = (raw: string): string => {
  const fenced = /```(?:sql)?\s*([\s\S]*?)```/i.exec(raw);
  let text = (fenced?.[1] ?? raw).trim().replace(/^`+|`+$/g, "").trim();
  if (text.toLowerCase().startsWith("sql")) {
    text = text.slice(3).trim();
  }
  return text;
};

const collectCteNames = (tokens: readonly string[]): Set<string> => {
  const names = new Set<string>();
  for (let index = 1; index < tokens.length - 2; index += 1) {
    const previous = tokens[index - 1];
    const name = tokens[index];
    if (
      (previous === "with" || previous === "recursive" || previous === ",") &&
      isWord(name) &&
      tokens[index + 1] === "as" &&
      tokens[index + 2] === "("
    ) {
      names.add(unquote(name));
    }
  }
  return names;
};

const collectReferencedTables = (tokens: readonly string[]): string[] => {
  const tables: string[] = [];
  const openers: string[] = [];

  const readTableList = (startIndex: number): void => {
    let index = startIndex;
    while (index < tokens.length) {
      const candidate = tokens[index];
      if (!isWord(candidate) || candidate === "lateral") {
        return;
      }
      tables.push(unquote(candidate));
      index += 1;
      if (tokens[index] === "as") {
        index += 1;
      }
      const alias = tokens[index];
      if (isWord(alias) && !CLAUSE_KEYWORDS.has(alias)) {
        index += 1;
      }
      if (tokens[index] !== ",") {
        return;
      }
      index += 1;
    }
  };

  tokens.forEach((token, index) => {
    if (token === "(") {
      const previous = tokens[index - 1];
      openers.push(isWord(previous) ? previous : "");
      return;
    }
    if (token === ")") {
      openers.pop();
      return;
    }
    if (token === "from" || token === "join") {
      const enclosing = openers[openers.length - 1];
      if (token === "from" && enclosing !== undefined && FROM_ARGUMENT_FUNCTIONS.has(enclosing)) {
        return;
      }
      // IS [NOT] DISTINCT FROM compares values.
      if (token === "from" && tokens[index - 1] === "distinct") {
        return;
      }
      readTableList(index + 1);
    }
  });

  return tables;
};

const isAllowedTable = (table: string, allowed: ReadonlySet<string>): boolean => {
  if (allowed.has(table)) {
    return true;
  }
  const [schema, name, ...rest] = table.split(".");
  return schema === "public" && name !== undefined && rest.length === 0 && allowed.has(name);
};

/**
 * Accepts exactly one SELECT (or WITH ... SELECT) statement over allow-listed tables and
 * returns it wrapped with a row cap. Throws SqlGuardError otherwise.
 */
export const guardSql = (sql: string, options: SqlGuardOptions): GuardedSql => {
  const statement = sql.trim().replace(/;+\s*$/, "").trim();
  if (statement.length === 0) {
    throw new SqlGuardError("Generated SQL is empty.");
  }

  const analyzed = maskLiteralsAndComments(statement).toLowerCase();
  if (analyzed.includes(";")) {
    throw new SqlGuardError("Only a single SQL statement is allowed.");
  }

  const tokens = analyzed.match(TOKEN_PATTERN) ?? [];
  const firstToken = tokens[0];
  if (firstToken !== "select" && firstToken !== "with") {
    throw new SqlGuardError("Only SELECT statements are allowed.");
  }

  const cteNames = collectCteNames(tokens);
  tokens.forEach((token, index) => {
    if (FORBIDDEN_KEYWORDS.has(token)) {
      throw new SqlGuardError(`Forbidden SQL keyword: ${token.toUpperCase()}.`);
    }
    if (isWord(token) && tokens[index + 1] === "(") {
      const name = unquote(token);
      if (!ALLOWED_FUNCTIONS.has(name) && !PARENTHESIZED_SYNTAX.has(name) && !cteNames.has(name)) {
        throw new SqlGuardError(`Forbidden SQL function: ${name}.`);
      }
    }
  });

  const allowed = new Set(options.allowedTables.map((table) => table.toLowerCase()));
  const tables = collectReferencedTables(tokens).filter((table) => !cteNames.has(table));
  if (tables.length === 0) {
    throw new SqlGuardError("Statement does not read from an allowed table.");
  }

  const disallowed = tables.filter((table) => !isAllowedTable(table, allowed));
  if (disallowed.length > 0) {
    throw new SqlGuardError(`Table not allowed: ${[...new Set(disallowed)].join(", ")}.`);
  }

  return {
    statement,
    executable: `SELECT * FROM (\n${statement}\n) AS limited_result LIMIT ${Math.max(1, Math.floor(options.maxRows))}`,
    tables: [...new Set(tables)]
  };
};
