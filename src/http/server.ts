import http from "node:http";
import { randomUUID } from "node:crypto";

import { FrequentElementsError } from "../core/index.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError } from "./problem.js";
import { asBoolean, asInt, asPolicy, isRecord, pushErr, readItems } from "./validation.js";
import { createAnalyzer, type Analyzer } from "./analyzer.js";

const SERVICE = "freq_summary";
const VERSION = "0.1.0";

export const DEFAULT_MAX_ITEMS = 100_000;
export const MAX_K = 10_000;

export interface ServerOptions {
  port?: number;
  /** upper bound on `items` per request */
  maxItems?: number;
  analyzer?: Analyzer;
}

class MalformedJsonError extends Error {}

/** Reads a positive item limit; anything else falls back to `DEFAULT_MAX_ITEMS`. */
export function maxItemsFrom(raw: string | number | undefined): number {
  const n = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  return typeof n === "number" && Number.isSafeInteger(n) && n > 0 ? n : DEFAULT_MAX_ITEMS;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const analyzer = opts.analyzer ?? createAnalyzer();
  const maxItems = maxItemsFrom(opts.maxItems);

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const instance = url.pathname;

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
        });
      }

      if (req.method === "POST" && (url.pathname === "/frequent" || url.pathname === "/majority")) {
        if (!isJson(req)) {
          return sendProblem(res, 415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance, requestId }));
        }

        const started = Date.now();
        const body = await readJson(req);
        if (!isRecord(body)) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance, requestId }));
        }

        const errors: FieldError[] = [];
        const items = readItems(body.items, maxItems, errors);

        if (url.pathname === "/majority") {
          if (errors.length || !items) {
            return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance, requestId, errors }));
          }
          const r = analyzer.majority(items);
          return sendJson(res, 200, { ...r, tookMs: Date.now() - started });
        }

        const k = asInt(body.k);
        if (k === undefined) pushErr(errors, "$.k", "must be an integer");
        else if (k < 1 || k > MAX_K) pushErr(errors, "$.k", `must be between 1 and ${MAX_K}`);

        const policy = body.policy == null ? "group-decrement" : asPolicy(body.policy);
        if (!policy) pushErr(errors, "$.policy", "must be one of: group-decrement, single-evict");

        const requireResult = body.requireResult == null ? false : asBoolean(body.requireResult);
        if (requireResult === undefined) pushErr(errors, "$.requireResult", "must be a boolean");

        if (errors.length || !items || k === undefined || !policy || requireResult === undefined) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance, requestId, errors }));
        }

        const r = analyzer.frequent({ items, k, policy, requireResult });
        return sendJson(res, 200, { ...r, tookMs: Date.now() - started });
      }

      return sendProblem(res, 404, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance, requestId }));
    } catch (e) {
      if (e instanceof MalformedJsonError) {
        return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body is not valid JSON", instance, requestId }));
      }
      if (e instanceof FrequentElementsError) {
        const status = e.code === "INVALID_ARGUMENT" ? 400 : 422;
        return sendProblem(res, status, problem({ status, code: e.code, detail: e.message, instance, requestId }));
      }
      console.error(`[${requestId}] ${req.method ?? "?"} ${instance} failed:`, e);
      return sendProblem(res, 500, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? Number(process.env.PORT ?? 3000);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return null;
  try {
    return JSON.parse(raw);
  } catch {
    throw new MalformedJsonError("malformed JSON body");
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
