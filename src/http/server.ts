import http from "node:http";
import { randomUUID } from "node:crypto";

import { SpellChecker } from "../core/impl/index.js";
import { PROBLEM_CONTENT_TYPE, problem, type Problem } from "./problem.js";
import { createRouter, type ApiResponse } from "./router.js";

export interface ServerOptions {
  port?: number;
  metricsEnabled?: boolean;
  checker?: SpellChecker;
}

const BODY_METHODS = new Set(["POST", "PUT", "PATCH"]);

export function createServer(opts: ServerOptions = {}): http.Server {
  const route = createRouter({
    checker: opts.checker ?? new SpellChecker(),
    startedAt: Date.now(),
    metricsEnabled: opts.metricsEnabled ?? false,
  });

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    try {
      let body: unknown;
      if (BODY_METHODS.has(method)) {
        if (!isJson(req)) {
          return sendProblem(res, 415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }
        try {
          body = await readJson(req);
        } catch {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body is not valid JSON", instance: url.pathname, requestId }));
        }
      }

      return send(res, route({ method, url, requestId, body }));
    } catch (e) {
      console.error(`[${requestId}] ${method} ${url.pathname} failed`, e);
      return sendProblem(res, 500, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function isJson(req: http.IncomingMessage): boolean {
  const [mediaType = ""] = (req.headers["content-type"] ?? "").split(";");
  return mediaType.trim().toLowerCase() === "application/json";
}

/** Whole body as JSON; an empty body reads as `null`. */
async function readJson(req: http.IncomingMessage): Promise<unknown> {
  let raw = "";
  req.setEncoding("utf8");
  for await (const chunk of req) raw += String(chunk);
  return raw.length ? JSON.parse(raw) : null;
}

function send(res: http.ServerResponse, r: ApiResponse): void {
  if ("text" in r) return write(res, r.status, "text/plain; version=0.0.4", r.text);
  if (r.problem) return sendProblem(res, r.status, r.body);
  write(res, r.status, "application/json", JSON.stringify(r.body));
}

function sendProblem(res: http.ServerResponse, status: number, body: Problem): void {
  write(res, status, PROBLEM_CONTENT_TYPE, JSON.stringify(body));
}

function write(res: http.ServerResponse, status: number, contentType: string, data: string): void {
  res.statusCode = status;
  res.setHeader("content-type", contentType);
  res.end(data);
}
