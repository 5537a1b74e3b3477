// src/testing/fakePostgrest.ts
// A PostgREST stand-in served through the Supabase client's `fetch` option.
// Covers the subset of the protocol the stores use: filtered selects with range,
// upserts with on_conflict, and counted deletes.

export type Row = Record<string, unknown>;

export interface FakePostgrest {
  fetch: typeof fetch;
  tables: Map<string, Row[]>;
  requests: { method: string; table: string }[];
  /** Makes the next request against `table` answer with a 500. */
  failNext(table: string, message?: string): void;
}

const RESERVED_PARAMS = new Set(["select", "order", "limit", "offset", "on_conflict", "columns"]);

function matches(value: unknown, filter: string): boolean {
  const [op = "", ...rest] = filter.split(".");
  const operand = rest.join(".");
  const text = value === null || value === undefined ? null : String(value);
  switch (op) {
    case "eq":
      return text === operand;
    case "neq":
      return text !== operand;
    case "lt":
      return text !== null && text < operand;
    case "lte":
      return text !== null && text <= operand;
    case "gt":
      return text !== null && text > operand;
    case "gte":
      return text !== null && text >= operand;
    case "is":
      return operand === "null" ? text === null : text === operand;
    case "in":
      return text !== null && operand.replace(/^\(|\)$/g, "").split(",").includes(text);
    case "not":
      return !matches(value, operand);
    default:
      throw new Error(`fakePostgrest: unsupported filter "${filter}"`);
  }
}

function applyFilters(rows: Row[], params: URLSearchParams): Row[] {
  let result = rows;
  for (const [column, filter] of params) {
    if (RESERVED_PARAMS.has(column)) continue;
    result = result.filter(row => matches(row[column], filter));
  }
  return result;
}

function project(row: Row, select: string | null): Row {
  if (!select || select === "*") return { ...row };
  const projected: Row = {};
  for (const column of select.split(",").map(c => c.trim())) {
    projected[column] = row[column] ?? null;
  }
  return projected;
}

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

export function createFakePostgrest(seed: Record<string, Row[]> = {}): FakePostgrest {
  const tables = new Map<string, Row[]>(Object.entries(seed).map(([name, rows]) => [name, rows.map(row => ({ ...row }))]));
  const requests: { method: string; table: string }[] = [];
  const failures = new Map<string, string>();

  const table = (name: string): Row[] => {
    const rows = tables.get(name) ?? [];
    tables.set(name, rows);
    return rows;
  };

  const fakeFetch: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const name = decodeURIComponent(url.pathname.replace(/^\/rest\/v1\//, ""));
    const method = (init?.method ?? "GET").toUpperCase();
    const headers = new Headers(init?.headers);
    const prefer = headers.get("Prefer") ?? "";
    const params = url.searchParams;
    requests.push({ method, table: name });

    const failure = failures.get(name);
    if (failure !== undefined) {
      failures.delete(name);
      return json({ message: failure, code: "XX000", details: null, hint: null }, 500);
    }

    if (method === "GET") {
      const offset = Number(params.get("offset") ?? 0);
      const limit = params.has("limit") ? Number(params.get("limit")) : Infinity;
      const rows = applyFilters(table(name), params).slice(offset, offset + limit);
      return json(rows.map(row => project(row, params.get("select"))));
    }

    if (method === "POST") {
      const body: unknown = JSON.parse(String(init?.body ?? "[]"));
      const incoming = (Array.isArray(body) ? body : [body]).filter(isRow);
      const conflict = (params.get("on_conflict") ?? "").split(",").filter(Boolean);
      const rows = table(name);
      for (const row of incoming) {
        const existing = conflict.length > 0 ? rows.find(r => conflict.every(c => String(r[c]) === String(row[c]))) : undefined;
        if (!existing) rows.push({ ...row });
        else if (prefer.includes("resolution=merge-duplicates")) Object.assign(existing, row);
        else if (!prefer.includes("resolution=ignore-duplicates")) {
          return json({ message: "duplicate key value violates unique constraint", code: "23505", details: null, hint: null }, 409);
        }
      }
      return new Response(null, { status: 201 });
    }

    if (method === "DELETE") {
      const rows = table(name);
      const doomed = new Set(applyFilters(rows, params));
      tables.set(
        name,
        rows.filter(row => !doomed.has(row)),
      );
      const responseHeaders = new Headers();
      if (prefer.includes("count=exact")) responseHeaders.set("Content-Range", `*/${doomed.size}`);
      return new Response(null, { status: 204, headers: responseHeaders });
    }

    return json({ message: `fakePostgrest: unsupported method ${method}` }, 405);
  };

  return {
    fetch: fakeFetch,
    tables,
    requests,
    failNext(tableName, message = "database unavailable") {
      failures.set(tableName, message);
    },
  };
}
