import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import type { Logger } from 'pino';
import { getLogger } from '../observability/logger.js';
import { isExpenseError } from '../expenses/errors.js';
import { parsePeriodFilter } from '../expenses/input.js';
import type { ExpenseLedger } from '../expenses/ledger.js';

// ============================================================================
// HTTP API
// ============================================================================

export interface ExpenseApiOptions {
  ledger: ExpenseLedger;
  /** Largest accepted request body */
  maxBodyBytes?: number;
  logger?: Logger;
}

/**
 * API response
 */
export interface ApiResponse {
  statusCode: number;
  body: unknown;
  headers: Record<string, string>;
}

class RequestError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

const JSON_HEADERS = { 'Content-Type': 'application/json' };

function json(statusCode: number, body: unknown, headers: Record<string, string> = {}): ApiResponse {
  return { statusCode, body, headers: { ...JSON_HEADERS, ...headers } };
}

/**
 * Create the request handler for the expense API
 */
export function createExpenseHandler(options: ExpenseApiOptions): (
  req: IncomingMessage,
  res: ServerResponse
) => Promise<void> {
  const { ledger } = options;
  const maxBodyBytes = options.maxBodyBytes ?? 64 * 1024;
  const logger = options.logger ?? getLogger().child({ module: 'HttpApi' });

  return async (req, res) => {
    const start = Date.now();
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname.replace(/\/+$/, '') || '/';

    let response: ApiResponse;

    try {
      response = await route(method, path, url, req);
    } catch (error) {
      response = errorResponse(error, logger);
    }

    sendResponse(res, response);
    logger.info(
      { method, path, status: response.statusCode, duration: Date.now() - start },
      'Request handled'
    );
  };

  async function route(
    method: string,
    path: string,
    url: URL,
    req: IncomingMessage
  ): Promise<ApiResponse> {
    switch (path) {
      case '/health':
        requireMethod(method, 'GET');
        return json(200, { status: 'ok' }, { 'Cache-Control': 'no-cache, no-store, must-revalidate' });

      case '/api/options':
        requireMethod(method, 'GET');
        return json(200, ledger.options());

      case '/api/view':
        requireMethod(method, 'GET');
        return json(200, await ledger.view(parsePeriodFilter(url.searchParams)));

      case '/api/expenses':
        if (method === 'POST') {
          const expense = await ledger.record(await readBody(req, maxBodyBytes));
          return json(201, { expense });
        }
        requireMethod(method, 'GET');
        return json(200, await ledger.summarize(parsePeriodFilter(url.searchParams)));

      default:
        return json(404, { error: 'Not found' });
    }
  }
}

function requireMethod(method: string, allowed: string): void {
  if (method !== allowed) {
    throw new RequestError(405, `Method ${method} not allowed`);
  }
}

function errorResponse(error: unknown, logger: Logger): ApiResponse {
  if (isExpenseError(error)) {
    if (error.httpStatus >= 500) {
      logger.error({ err: error }, 'Expense operation failed');
    }
    return json(error.httpStatus, error.toJSON());
  }
  if (error instanceof RequestError) {
    return json(error.statusCode, { error: error.message });
  }
  logger.error({ err: error }, 'Unhandled request error');
  return json(500, { error: 'Internal server error' });
}

/**
 * Read a JSON or form-urlencoded body into a plain object
 */
async function readBody(req: IncomingMessage, maxBytes: number): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > maxBytes) {
      req.resume();
      throw new RequestError(413, 'Request body too large');
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString('utf8');
  const contentType = (req.headers['content-type'] ?? '').split(';')[0].trim().toLowerCase();

  if (contentType === 'application/x-www-form-urlencoded') {
    return Object.fromEntries(new URLSearchParams(text));
  }

  if (contentType === 'application/json' || contentType === '') {
    if (text.trim() === '') {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new RequestError(400, 'Malformed JSON body');
    }
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new RequestError(400, 'Request body must be an object');
    }
    return { ...parsed };
  }

  throw new RequestError(415, `Unsupported content type ${contentType}`);
}

/**
 * Send HTTP response
 */
function sendResponse(res: ServerResponse, response: ApiResponse): void {
  res.writeHead(response.statusCode, response.headers);
  res.end(JSON.stringify(response.body));
}

/**
 * Create an HTTP server for the expense API. The caller listens on it.
 */
export function createExpenseServer(options: ExpenseApiOptions): Server {
  const handler = createExpenseHandler(options);
  const logger = options.logger ?? getLogger().child({ module: 'HttpApi' });

  return createServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      logger.error({ err: error }, 'Failed to write response');
      res.destroy();
    });
  });
}
