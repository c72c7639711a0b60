/**
 * Shared plumbing for the HTTP collaborator clients.
 *
 * Status handling:
 * - 408, 425, 429 and 5xx → `TransientError` (retried by the resilience wrapper)
 * - anything a client does not map to an outcome → `CollaboratorError` (definitive)
 */

import type { z } from "zod";
import { FulfillmentError, TransientError, describeError } from "@orderflow/core";

export const CollaboratorError = FulfillmentError.forContext<
  "UNEXPECTED_STATUS" | "INVALID_RESPONSE"
>("Collaborator");

const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 425, 429]);

export function isTransientStatus(status: number): boolean {
  return status >= 500 || TRANSIENT_STATUSES.has(status);
}

export interface JsonRequest {
  method: "GET" | "POST";
  url: string;
  signal: AbortSignal;
  body?: unknown;
  headers?: Record<string, string> | undefined;
}

/**
 * Send a request and return the response unless its status is transient.
 * Network failures propagate with their socket error as `cause`, which
 * `isTransientError` recognises.
 */
export async function sendJson(request: JsonRequest): Promise<Response> {
  const headers: Record<string, string> = { Accept: "application/json", ...request.headers };
  const init: RequestInit = { method: request.method, headers, signal: request.signal };
  if (request.body !== undefined) {
    headers["Content-Type"] = "application/json";
    init.body = JSON.stringify(request.body);
  }

  const response = await fetch(request.url, init);
  if (isTransientStatus(response.status)) {
    await discardBody(response);
    throw new TransientError(
      `${request.method} ${request.url} responded ${response.status}`
    );
  }
  return response;
}

/**
 * Parse and validate a JSON body.
 *
 * @throws CollaboratorError INVALID_RESPONSE when the body does not match
 */
export async function readJson<S extends z.ZodTypeAny>(
  response: Response,
  schema: S,
  what: string
): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new CollaboratorError("INVALID_RESPONSE", `${what}: body is not JSON`, {
      status: response.status,
      error: describeError(error),
    });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new CollaboratorError("INVALID_RESPONSE", `${what}: unexpected response shape`, {
      status: response.status,
      issues: parsed.error.issues.map(
        (issue: z.ZodIssue) => `${issue.path.join(".")}: ${issue.message}`
      ),
    });
  }
  return parsed.data;
}

/**
 * Best-effort reason from an error body (`{ "error": ... }` or
 * `{ "message": ... }`), falling back to the status line.
 */
export async function readReason(response: Response): Promise<string> {
  const fallback = `HTTP ${response.status}`;
  let text: string;
  try {
    text = await response.text();
  } catch {
    return fallback;
  }
  if (text === "") return fallback;

  try {
    const body: unknown = JSON.parse(text);
    if (typeof body === "object" && body !== null) {
      if ("error" in body && typeof body.error === "string") return body.error;
      if ("message" in body && typeof body.message === "string") return body.message;
    }
  } catch {
    return text.slice(0, 200);
  }
  return fallback;
}

/** Cancel an unread body so the connection goes back to the pool */
export async function discardBody(response: Response): Promise<void> {
  if (!response.bodyUsed) {
    await response.body?.cancel();
  }
}

export async function unexpectedStatus(what: string, response: Response): Promise<never> {
  await discardBody(response);
  throw new CollaboratorError("UNEXPECTED_STATUS", `${what}: unexpected status ${response.status}`, {
    status: response.status,
  });
}

