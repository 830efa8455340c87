import fetch, { Response } from "node-fetch";
import { StoreUnavailableError } from "../shared/errors";

export interface SupabaseRestClientConfig {
  url: string;
  serviceRoleKey: string;
  timeoutMs?: number;
}

export type FilterValue =
  | string
  | number
  | { in: ReadonlyArray<string | number> }
  | { lt: string }
  | { isNull: true };

export type Filters = Record<string, FilterValue>;

export class SupabaseRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(message);
    this.name = "SupabaseRequestError";
  }
}

export class SupabaseRestClient {
  private readonly baseUrl: string;

  constructor(private readonly config: SupabaseRestClientConfig) {
    this.baseUrl = config.url.replace(/\/+$/, "");
  }

  async insert<T>(table: string, payload: object): Promise<T[]> {
    const response = await this.send(`/rest/v1/${table}`, {
      method: "POST",
      headers: this.baseHeaders({
        accept: "application/json",
        prefer: "return=representation",
      }),
      body: JSON.stringify(payload),
    });
    await this.assertOk(response, `insert ${table}`);
    return this.readRows<T>(response);
  }

  async upsert(
    table: string,
    payload: object,
    options: { onConflict: string },
  ): Promise<void> {
    const response = await this.send(
      `/rest/v1/${table}?on_conflict=${encodeURIComponent(options.onConflict)}`,
      {
        method: "POST",
        headers: this.baseHeaders({
          prefer: "resolution=merge-duplicates,return=minimal",
        }),
        body: JSON.stringify(payload),
      },
    );
    await this.assertOk(response, `upsert ${table}`);
  }

  /** Updates matching rows and returns them; an empty result means no row matched. */
  async patch<T>(table: string, filters: Filters, payload: object): Promise<T[]> {
    const query = buildFilterQuery(filters);
    const response = await this.send(`/rest/v1/${table}?${query.toString()}`, {
      method: "PATCH",
      headers: this.baseHeaders({
        accept: "application/json",
        prefer: "return=representation",
      }),
      body: JSON.stringify(payload),
    });
    await this.assertOk(response, `patch ${table}`);
    return this.readRows<T>(response);
  }

  async selectOne<T>(table: string, filters: Filters, columns = "*"): Promise<T | null> {
    const rows = await this.selectMany<T>(table, filters, columns, { limit: 1 });
    return rows[0] ?? null;
  }

  async selectMany<T>(
    table: string,
    filters: Filters,
    columns = "*",
    options?: { limit?: number; order?: string },
  ): Promise<T[]> {
    const query = buildFilterQuery(filters);
    query.set("select", columns);
    if (options?.limit) {
      query.set("limit", String(options.limit));
    }
    if (options?.order) {
      query.set("order", options.order);
    }

    const response = await this.send(`/rest/v1/${table}?${query.toString()}`, {
      method: "GET",
      headers: this.baseHeaders({
        accept: "application/json",
      }),
    });
    await this.assertOk(response, `select ${table}`);
    return this.readRows<T>(response);
  }

  async rpc<TResult>(fnName: string, payload: object): Promise<TResult[]> {
    const response = await this.send(`/rest/v1/rpc/${fnName}`, {
      method: "POST",
      headers: this.baseHeaders({
        accept: "application/json",
      }),
      body: JSON.stringify(payload),
    });
    await this.assertOk(response, `rpc ${fnName}`);
    return this.readRows<TResult>(response);
  }

  async deleteMany(table: string, filters: Filters): Promise<number> {
    const query = buildFilterQuery(filters);
    const response = await this.send(`/rest/v1/${table}?${query.toString()}`, {
      method: "DELETE",
      headers: this.baseHeaders({
        accept: "application/json",
        prefer: "return=representation",
      }),
    });
    await this.assertOk(response, `delete ${table}`);
    const rows = await this.readRows<unknown>(response);
    return rows.length;
  }

  private async send(
    path: string,
    init: { method: string; headers: Record<string, string>; body?: string },
  ): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}${path}`, {
        ...init,
        timeout: this.config.timeoutMs ?? 10_000,
      });
    } catch (error) {
      throw new StoreUnavailableError(
        `Supabase is unreachable: ${error instanceof Error ? error.message : "Unknown error"}`,
        { path: path.split("?")[0] },
      );
    }
  }

  private async assertOk(response: Response, operation: string): Promise<void> {
    if (response.ok) {
      return;
    }
    const body = await response.text();
    const message = `Supabase ${operation} failed: HTTP ${response.status} - ${body.slice(0, 300)}`;
    if (response.status >= 500 || response.status === 429) {
      throw new StoreUnavailableError(message, { operation, status: response.status });
    }
    throw new SupabaseRequestError(message, response.status, body);
  }

  private async readRows<T>(response: Response): Promise<T[]> {
    const text = await response.text();
    if (!text.trim()) {
      return [];
    }
    const rows: unknown = JSON.parse(text);
    return Array.isArray(rows) ? (rows as T[]) : [];
  }

  private baseHeaders(extraHeaders?: Record<string, string>): Record<string, string> {
    return {
      apikey: this.config.serviceRoleKey,
      authorization: `Bearer ${this.config.serviceRoleKey}`,
      "content-type": "application/json",
      ...(extraHeaders ?? {}),
    };
  }
}

export function buildFilterQuery(filters: Filters): URLSearchParams {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(filters)) {
    if (typeof value === "string" || typeof value === "number") {
      query.set(key, `eq.${value}`);
    } else if ("in" in value) {
      query.set(key, `in.(${value.in.map((item) => formatInItem(item)).join(",")})`);
    } else if ("lt" in value) {
      query.set(key, `lt.${value.lt}`);
    } else {
      query.set(key, "is.null");
    }
  }
  return query;
}

function formatInItem(item: string | number): string {
  if (typeof item === "number") {
    return String(item);
  }
  return `"${item.replace(/"/g, '\\"')}"`;
}
