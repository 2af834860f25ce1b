import http from "node:http";
import { ZodError } from "zod";
import { createOrderSchema, orderIdParam, proposalIdParam } from "@ordergate/shared";
import type { AppContext } from "../state/appContext.js";
import {
  describeError,
  InvalidOrderTransitionError,
  OrderGateError,
  OrderNotFoundError,
  ProposalNotFoundError,
  ServiceUnavailableError,
} from "../errors.js";

const CORS_HEADERS = { "Access-Control-Allow-Origin": "*" };
const MAX_BODY_BYTES = 64 * 1024;

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

function json(res: http.ServerResponse, status: number, body: unknown) {
  const data = JSON.stringify(body);
  res.writeHead(status, { "Content-Type": "application/json", ...CORS_HEADERS });
  res.end(data);
}

function notFound(res: http.ServerResponse) {
  json(res, 404, { error: "Not found" });
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new BadRequestError("Request body too large");
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString("utf-8").trim();
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new BadRequestError("Request body is not valid JSON");
  }
}

export function errorStatus(err: unknown): number {
  if (err instanceof ZodError || err instanceof BadRequestError) return 400;
  if (err instanceof OrderNotFoundError || err instanceof ProposalNotFoundError) return 404;
  if (err instanceof InvalidOrderTransitionError) return 409;
  if (err instanceof ServiceUnavailableError) return 503;
  return 500;
}

function errorBody(err: unknown) {
  if (err instanceof ZodError) {
    return { error: "Invalid request", code: "VALIDATION", issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })) };
  }
  if (err instanceof OrderGateError) return { error: err.message, code: err.code };
  return { error: describeError(err) };
}

const PROPOSAL_ROUTE = /^\/api\/proposals\/([^/]+)$/;
const ORDER_ROUTE = /^\/api\/orders\/([^/]+)(?:\/(approval|governance|submit|cancel|audit))?$/;

/**
 * Order API.
 *
 * Endpoints:
 * - GET  /api/health
 * - GET  /api/orders, POST /api/orders
 * - GET  /api/orders/:id, GET /api/orders/:id/audit
 * - POST /api/orders/:id/approval | governance | submit | cancel
 * - GET  /api/proposals/:id
 * - POST /api/chain/nonce/resync
 * - GET  /api/audit?lines=200
 */
export function createApiServer(ctx: AppContext): http.Server {
  const route = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const { pathname, searchParams } = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";

    if (method === "OPTIONS") {
      res.writeHead(204, {
        ...CORS_HEADERS,
        "Access-Control-Allow-Methods": "GET,POST,OPTIONS",
        "Access-Control-Allow-Headers": "Content-Type",
      });
      return res.end();
    }

    if (pathname === "/api/health" && method === "GET") {
      return json(res, 200, { ok: true, ts: ctx.clock.nowIso(), chain: ctx.chainStatus });
    }

    if (pathname === "/api/audit" && method === "GET") {
      const requested = Number(searchParams.get("lines") ?? 200);
      const lines = Number.isFinite(requested) ? Math.max(1, Math.min(5000, Math.floor(requested))) : 200;
      return json(res, 200, { lines, items: ctx.audit.tail(lines) });
    }

    if (pathname === "/api/chain/nonce/resync" && method === "POST") {
      const chain = ctx.chain();
      const previous = chain.getNonce();
      const nonce = await chain.resyncNonce();
      ctx.audit.append("nonce_resync", { previous, nonce });
      return json(res, 200, { previous, nonce });
    }

    const proposal = PROPOSAL_ROUTE.exec(pathname);
    if (proposal && method === "GET") {
      return json(res, 200, ctx.governance.getProposal(proposalIdParam.parse(proposal[1])));
    }

    if (pathname === "/api/orders") {
      if (method === "GET") return json(res, 200, { orders: ctx.orchestrator().listOrders() });
      if (method === "POST") {
        const orchestrator = ctx.orchestrator();
        const input = createOrderSchema.parse(await readJsonBody(req));
        const order = await orchestrator.createLimitOrder(input);
        return json(res, 201, order);
      }
      return notFound(res);
    }

    const match = ORDER_ROUTE.exec(pathname);
    if (!match) return notFound(res);
    const orderId = orderIdParam.parse(match[1]);
    const action = match[2];
    const orchestrator = ctx.orchestrator();

    if (method === "GET" && action === undefined) return json(res, 200, orchestrator.getOrder(orderId));
    if (method === "GET" && action === "audit") return json(res, 200, await orchestrator.getAuditDetails(orderId));
    if (method !== "POST") return notFound(res);

    switch (action) {
      case "approval":
        return json(res, 200, await orchestrator.retryApproval(orderId));
      case "governance":
        return json(res, 200, await orchestrator.initiateGovernanceApproval(orderId));
      case "submit":
        return json(res, 200, await orchestrator.submitAndExecute(orderId));
      case "cancel":
        return json(res, 200, orchestrator.cancel(orderId));
      default:
        return notFound(res);
    }
  };

  return http.createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      const status = errorStatus(err);
      if (status >= 500) ctx.logger.error(`${req.method} ${req.url} failed: ${describeError(err)}`);
      else ctx.logger.debug(`${req.method} ${req.url} -> ${status}: ${describeError(err)}`);
      if (res.headersSent) {
        res.end();
        return;
      }
      json(res, status, errorBody(err));
    });
  });
}

export function startApiServer(ctx: AppContext, port = ctx.config.apiPort): http.Server {
  const server = createApiServer(ctx);
  server.listen(port, () => {
    ctx.logger.info(`[api] listening on http://localhost:${port}`);
  });
  return server;
}
