import * as http from "node:http";
import { MethodNotAllowedError, NotFoundError, toServiceError } from "../errors";
import { log } from "../utils/log";
import { applyCors, sendError } from "./responses";
import {
  handleConvert,
  handleDownload,
  handleFormats,
  handleHealth,
  handleIndex,
  handleSystemCheck,
  type RouteHandler,
} from "./routes";
import type { Service } from "./service";

type Method = "GET" | "POST";

interface Route {
  pattern: RegExp;
  handlers: Partial<Record<Method, RouteHandler>>;
}

const ROUTES: Route[] = [
  { pattern: /^\/$/, handlers: { GET: handleIndex } },
  { pattern: /^\/health$/, handlers: { GET: handleHealth } },
  { pattern: /^\/api\/formats$/, handlers: { GET: handleFormats } },
  { pattern: /^\/api\/system-check$/, handlers: { GET: handleSystemCheck } },
  { pattern: /^\/api\/convert$/, handlers: { POST: handleConvert } },
  // The raw (still percent-encoded) segment is validated by the handler.
  { pattern: /^\/api\/download\/([^/]+)$/, handlers: { GET: handleDownload } },
];

function isMethod(value: string | undefined): value is Method {
  return value === "GET" || value === "POST";
}

function pathnameOf(req: http.IncomingMessage): string {
  const raw = req.url ?? "/";
  const end = raw.search(/[?#]/);
  return end === -1 ? raw : raw.slice(0, end);
}

async function dispatch(req: http.IncomingMessage, res: http.ServerResponse, service: Service) {
  const pathname = pathnameOf(req);
  for (const route of ROUTES) {
    const match = route.pattern.exec(pathname);
    if (!match) continue;
    const handler = isMethod(req.method) ? route.handlers[req.method] : undefined;
    if (!handler) throw new MethodNotAllowedError(Object.keys(route.handlers));
    await handler(req, res, service, match.slice(1));
    return;
  }
  throw new NotFoundError("Not found");
}

/**
 * HTTP front end. Every response carries the CORS headers; preflight
 * requests are answered before routing.
 */
export function createServer(service: Service): http.Server {
  return http.createServer((req, res) => {
    applyCors(res);
    if (req.method === "OPTIONS") {
      res.statusCode = 204;
      res.end();
      return;
    }

    const started = Date.now();
    void dispatch(req, res, service)
      .catch((err: unknown) => {
        const failure = toServiceError(err);
        if (failure.status >= 500) {
          log.error("server", `${req.method} ${req.url} failed: ${failure.detail ?? failure.message}`);
        } else {
          log.debug("server", `${req.method} ${req.url} -> ${failure.status} ${failure.message}`);
        }
        if (res.headersSent) {
          res.destroy();
          return;
        }
        res.removeHeader("Content-Disposition");
        if (failure instanceof MethodNotAllowedError) {
          res.setHeader("Allow", [...failure.allowed, "OPTIONS"].join(", "));
        }
        if (!req.complete) {
          // Discard whatever is left of the body so the reply can be read.
          res.setHeader("Connection", "close");
          req.resume();
        }
        sendError(res, failure);
      })
      .finally(() => {
        log.debug("server", `${req.method} ${req.url} ${res.statusCode} ${Date.now() - started}ms`);
      });
  });
}
