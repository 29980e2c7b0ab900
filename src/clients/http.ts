export interface HttpResult {
  status: number;
  ok: boolean;
  text: string;
  // Parsed JSON body; null when the body is empty or not JSON
  json: unknown;
}

export type FetchFn = typeof fetch;

export function parseJsonBody(text: string): unknown {
  if (!text.trim()) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export async function postJson(
  fetchFn: FetchFn,
  url: string,
  body: unknown,
  headers: Record<string, string> = {}
): Promise<HttpResult> {
  const response = await fetchFn(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
  const text = await response.text();
  return {
    status: response.status,
    ok: response.ok,
    text,
    json: parseJsonBody(text),
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a string-or-number field as a string id.
 */
export function idField(value: unknown, field: string): string | null {
  if (!isRecord(value)) {
    return null;
  }
  const raw = value[field];
  if (typeof raw === "string" && raw.length > 0) {
    return raw;
  }
  if (typeof raw === "number") {
    return String(raw);
  }
  return null;
}

export function truncate(text: string, max = 500): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
