import express from 'express';
import { Server } from 'http';
import { ValidateFunction } from 'ajv';

import ajv from './ajv';
import { Bridge } from './bridge';
import {
  AuthenticationError,
  BridgeError,
  errorMessage,
  InvalidRecipientError,
  InvalidRequestError,
  MappingNotFoundError,
} from './error';
import { IMappingRequest, toMappingResponse } from './mapping';
import { IPushNotifyRequest, IPushTokenRecord, IPushTokenStore } from './push';
import {
  IFetchMessagesRequest,
  IPushTokenReportRequest,
  ISendMessageRequest,
  ISendMessageResponse,
} from './softphone_api';
import { getLogger } from './log';

const log = getLogger('httpserver');

export const ADMIN_TOKEN_HEADER = 'X-Super-Admin-Token';

const LOOPBACK_ADDRESSES = ['127.0.0.1', '::1', '::ffff:127.0.0.1'];

export function isLoopbackAddress(address: string | undefined): boolean {
  return !!address && LOOPBACK_ADDRESSES.includes(address);
}

export interface IHTTPServerOpts {
  port: number;
  bindAddress: string;
  adminToken: string;
}

/**
 * Picks the response status for an error thrown by a bridge operation.
 */
export function statusForError(e: unknown): number {
  if (e instanceof AuthenticationError) {
    return 401;
  }
  if (e instanceof InvalidRecipientError || e instanceof InvalidRequestError) {
    return 400;
  }
  if (e instanceof MappingNotFoundError) {
    return 404;
  }
  return 500;
}

function parseBody<T>(validate: ValidateFunction<T>, body: unknown): T {
  if (!validate(body)) {
    throw new InvalidRequestError(`Invalid request: ${ajv.errorsText(validate.errors)}`);
  }
  return body;
}

function pushTokenResponse(record: IPushTokenRecord): object {
  return {
    selector: record.selector,
    token_msgs: record.tokenMsgs,
    appid_msgs: record.appIdMsgs,
    token_calls: record.tokenCalls,
    appid_calls: record.appIdCalls,
    created_at: record.createdAt.toISOString(),
    updated_at: record.updatedAt.toISOString(),
  };
}

type AsyncHandler = (req: express.Request, res: express.Response, signal: AbortSignal) => Promise<void>;

/**
 * Runs an async route, aborting its signal if the client goes away first.
 */
function route(fn: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort(new Error('Client disconnected'));
      }
    });
    fn(req, res, controller.signal).catch(next);
  };
}

/**
 * The softphone-facing HTTP API, plus the push gateway the homeserver calls
 * and a few admin routes.
 */
export class BridgeHTTPServer {
  readonly app = express();

  constructor(
    protected readonly opts: IHTTPServerOpts,
    protected readonly bridge: Bridge,
    protected readonly pushTokens: IPushTokenStore,
  ) {
    const app = this.app;
    app.use(express.json({ limit: '1mb' }));

    app.get('/health', (req, res) => {
      res.json({ status: 'ok' });
    });

    app.post('/api/client/send_message', route(async (req, res, signal) => {
      const body = parseBody(ISendMessageRequest.validate, req.body);
      const result = await bridge.sendMessage(body, signal);
      const response: ISendMessageResponse = { message_id: result.messageId };
      res.json(response);
    }));

    app.post('/api/client/fetch_messages', route(async (req, res, signal) => {
      const body = parseBody(IFetchMessagesRequest.validate, req.body);
      res.json(await bridge.fetchMessages(body, signal));
    }));

    app.post('/api/client/push_token_report', route(async (req, res, signal) => {
      const body = parseBody(IPushTokenReportRequest.validate, req.body);
      await bridge.reportPushToken(body, signal);
      res.json({});
    }));

    app.post('/_matrix/push/v1/notify', route(async (req, res, signal) => {
      const body = parseBody(IPushNotifyRequest.validate, req.body);
      res.json({ rejected: await bridge.notify(body.notification, signal) });
    }));

    const admin = express.Router();
    admin.use((req, res, next) => this.checkAdmin(req, res, next));
    admin.get('/mappings', (req, res) => {
      const number = typeof req.query.number === 'string' ? req.query.number : null;
      if (number) {
        res.json(toMappingResponse(bridge.mappings.lookup(number)));
        return;
      }
      res.json(bridge.mappings.list().map(toMappingResponse));
    });
    admin.post('/mappings', (req, res) => {
      const body = parseBody(IMappingRequest.validate, req.body);
      res.json(toMappingResponse(bridge.mappings.upsert(IMappingRequest.toInput(body))));
    });
    admin.get('/push_tokens', route(async (req, res) => {
      res.json((await pushTokens.list()).map(pushTokenResponse));
    }));
    admin.delete('/push_tokens', route(async (req, res) => {
      await pushTokens.reset();
      res.json({});
    }));
    app.use('/api/internal', admin);

    app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      // Malformed JSON from the body parser
      if (typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed') {
        res.status(400).json({ error: 'Invalid JSON body' });
        return;
      }
      const status = statusForError(err);
      if (status >= 500) {
        log.error(`${req.method} ${req.path} failed: ${errorMessage(err)}`);
      } else {
        log.info(`${req.method} ${req.path} answered ${status}: ${errorMessage(err)}`);
      }
      res.status(status).json({
        error: status >= 500 && !(err instanceof BridgeError) ? 'Internal server error' : errorMessage(err),
      });
    });
  }

  protected checkAdmin(req: express.Request, res: express.Response, next: express.NextFunction): void {
    const address = req.socket.remoteAddress;
    if (!isLoopbackAddress(address)) {
      log.warn(`Refused admin request from ${address || 'an unknown address'}`);
      res.status(403).json({ error: 'Forbidden' });
      return;
    }
    if (!this.opts.adminToken || req.get(ADMIN_TOKEN_HEADER) !== this.opts.adminToken) {
      res.status(401).json({ error: 'Invalid admin token' });
      return;
    }
    next();
  }

  listen(): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.opts.port, this.opts.bindAddress, () => {
        log.info(`Listening on ${this.opts.bindAddress}:${this.opts.port}`);
        resolve(server);
      });
      server.once('error', reject);
    });
  }
}
