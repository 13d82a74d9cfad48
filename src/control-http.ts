import type { IncomingMessage, ServerResponse } from "node:http";

export class HttpRequestError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "HttpRequestError";
    this.statusCode = statusCode;
  }
}

export function parsePositiveInteger(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
      return undefined;
    }
    const parsed = Number.parseInt(trimmed, 10);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }
  return undefined;
}

export function writeJsonResponse(res: ServerResponse, statusCode: number, payload: Record<string, unknown>): void {
  const body = JSON.stringify(payload);
  res.writeHead(statusCode, {
    "content-type": "application/json; charset=utf-8",
    "cache-control": "no-store",
    "content-length": Buffer.byteLength(body, "utf8").toString(),
  });
  res.end(body);
}

/** Without a configured token every request is allowed (loopback-only deployments). */
export function isControlRequestAuthorized(req: IncomingMessage, bearerToken?: string): boolean {
  const token = bearerToken?.trim();
  if (!token) {
    return true;
  }
  const header = req.headers.authorization;
  if (!header) {
    return false;
  }
  const [scheme, value] = header.split(/\s+/, 2);
  if (scheme?.toLowerCase() !== "bearer") {
    return false;
  }
  return (value ?? "").trim() === token;
}

export function readHttpRequestBody(req: IncomingMessage, maxBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    let settled = false;

    const fail = (error: Error): void => {
      if (settled) {
        return;
      }
      settled = true;
      reject(error);
    };

    req.on("data", (chunk: Buffer | string) => {
      if (settled) {
        return;
      }
      const bufferChunk = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      total += bufferChunk.length;
      if (total > maxBytes) {
        req.destroy();
        fail(new HttpRequestError(413, `request body exceeds ${maxBytes} bytes`));
        return;
      }
      chunks.push(bufferChunk);
    });

    req.on("end", () => {
      if (settled) {
        return;
      }
      settled = true;
      resolve(Buffer.concat(chunks).toString("utf8"));
    });

    req.on("error", (error) => {
      fail(error instanceof Error ? error : new Error(String(error)));
    });
  });
}

/** Empty bodies read as {}; anything but a JSON object is a 400. */
export async function readJsonObject(req: IncomingMessage, maxBytes: number): Promise<Record<string, unknown>> {
  const raw = await readHttpRequestBody(req, maxBytes);
  if (!raw.trim()) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new HttpRequestError(400, "request body is not valid JSON");
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new HttpRequestError(400, "request body must be a JSON object");
  }
  return { ...parsed };
}

/** Matches "/api/schedules/:id/toggle" style patterns; returns the captured params. */
/** Null when the path has another shape; a 400 when a captured segment is not valid percent-encoding. */
export function matchPath(pattern: string, pathname: string): Record<string, string> | null {
  const patternParts = pattern.split("/").filter(Boolean);
  const pathParts = pathname.split("/").filter(Boolean);
  if (patternParts.length !== pathParts.length) {
    return null;
  }
  const params: Record<string, string> = {};
  for (let index = 0; index < patternParts.length; index += 1) {
    const expected = patternParts[index] ?? "";
    const actual = pathParts[index] ?? "";
    if (expected.startsWith(":")) {
      try {
        params[expected.slice(1)] = decodeURIComponent(actual);
      } catch {
        throw new HttpRequestError(400, `malformed path segment: ${actual}`);
      }
      continue;
    }
    if (expected !== actual) {
      return null;
    }
  }
  return params;
}
