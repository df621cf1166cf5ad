import express from 'express';
import cors from 'cors';
import type { Logger } from 'pino';
import type { ZodError } from 'zod';
import {
  type SignerAdapter,
  SignerErrorCode,
  type SignerErrorCodeType,
  isSignerError,
} from '../../../shared/signers';
import {
  HttpRequestBody,
  SchnorrPublicKeyBody,
  SignWithSchnorrBody,
  encodePublicKeyResult,
  encodeSignResult,
  errorCodeToWire,
} from '../../../shared/signers/wire';
import type { SignerMetrics } from './metrics';

export interface AppOptions {
  signer: SignerAdapter;
  metrics: SignerMetrics;
  log: Logger;
  authToken?: string;
  allowedOrigins?: string[];
  bodyLimit?: string;
  trustProxy?: boolean;
}

const STATUS_BY_CODE: Record<SignerErrorCodeType, number> = {
  [SignerErrorCode.UNKNOWN_KEY]: 404,
  [SignerErrorCode.UNSUPPORTED_ALGORITHM]: 400,
  [SignerErrorCode.INVALID_DERIVATION_PATH]: 400,
  [SignerErrorCode.COMPUTATION_FAILURE]: 500,
};

function isAlgorithmIssue(error: ZodError): boolean {
  return error.issues.some((issue) => issue.path[0] === 'key_id' && issue.path[1] === 'algorithm');
}

function callerOf(req: express.Request): string | undefined {
  return req.header('x-caller-id') || undefined;
}

export function createApp(options: AppOptions): express.Express {
  const { signer, metrics, log } = options;
  const app = express();

  if (options.trustProxy) {
    app.set('trust proxy', true);
  }

  // Security: CORS configuration
  const allowedOrigins = options.allowedOrigins ?? ['*'];
  app.use(cors({
    origin: (origin, callback) => {
      if (allowedOrigins.includes('*') || !origin || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-API-Key', 'X-Caller-Id'],
  }));

  // Security: Body parsing with size limit
  app.use(express.json({ limit: options.bodyLimit ?? '1mb' }));

  // Security: Security headers middleware
  app.use((req, res, next) => {
    if (req.secure || req.headers['x-forwarded-proto'] === 'https') {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'no-referrer');
    res.setHeader('Cache-Control', 'no-store');
    next();
  });

  app.use((req, res, next) => {
    if (options.authToken) {
      const k = req.header('x-api-key') || '';
      if (k !== options.authToken) {
        return res.status(401).json({ error: 'unauthorized', message: 'Missing or invalid x-api-key header' });
      }
    }
    next();
  });

  function sendError(res: express.Response, error: unknown, route: string) {
    if (isSignerError(error)) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) {
        log.error({ code: error.code, error: error.message, cause: error.cause, route }, 'signer computation failed');
      } else {
        log.warn({ code: error.code, error: error.message, route }, 'signer request rejected');
      }
      return res.status(status).json({ error: errorCodeToWire(error.code), message: error.message });
    }
    log.error({
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      route,
    }, 'unexpected signer error');
    return res.status(500).json({ error: 'internal_error' });
  }

  function sendValidationError(res: express.Response, error: ZodError, route: string) {
    log.warn({ errors: error.errors, route }, 'request validation failed');
    const code = isAlgorithmIssue(error) ? errorCodeToWire(SignerErrorCode.UNSUPPORTED_ALGORITHM) : 'bad_request';
    return res.status(400).json({ error: code, message: error.issues.map((issue) => issue.message).join('; ') });
  }

  app.post('/schnorr_public_key', async (req: express.Request, res: express.Response) => {
    const parse = SchnorrPublicKeyBody.safeParse(req.body);
    if (!parse.success) {
      return sendValidationError(res, parse.error, 'schnorr_public_key');
    }

    try {
      const result = await signer.schnorrPublicKey(parse.data, { caller: callerOf(req) });
      return res.json(encodePublicKeyResult(result));
    } catch (error) {
      return sendError(res, error, 'schnorr_public_key');
    }
  });

  app.post('/sign_with_schnorr', async (req: express.Request, res: express.Response) => {
    const parse = SignWithSchnorrBody.safeParse(req.body);
    if (!parse.success) {
      return sendValidationError(res, parse.error, 'sign_with_schnorr');
    }

    try {
      const result = await signer.signWithSchnorr(parse.data, { caller: callerOf(req) });
      log.debug({ keyId: parse.data.keyId, pathLength: parse.data.derivationPath.length }, 'message signed');
      return res.json(encodeSignResult(result));
    } catch (error) {
      return sendError(res, error, 'sign_with_schnorr');
    }
  });

  app.post('/http_request', (req: express.Request, res: express.Response) => {
    const parse = HttpRequestBody.safeParse(req.body);
    if (!parse.success) {
      return sendValidationError(res, parse.error, 'http_request');
    }
    return res.json(metrics.httpRequest(parse.data));
  });

  app.get('/metrics', (_req: express.Request, res: express.Response) => {
    res.json(metrics.snapshot());
  });

  app.get('/health', (_req: express.Request, res: express.Response) => res.json({ ok: true }));

  app.use((_req: express.Request, res: express.Response) => {
    res.status(404).json({ error: 'not_found' });
  });

  // Body parser failures (malformed JSON, oversized payloads) land here
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' && err.status < 500) {
      log.warn({ status: err.status, path: req.path }, 'request rejected by body parser');
      return res.status(err.status).json({ error: 'bad_request' });
    }
    return sendError(res, err, req.path);
  });

  return app;
}
