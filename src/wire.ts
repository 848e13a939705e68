import { Appservice, MatrixClient } from 'matrix-bot-sdk';

import { IRoomMessageContent } from './content';
import { WireError } from './error';
import { getLogger } from './log';

const log = getLogger('wire');

export interface IRoomEvent {
  event_id: string;
  type: string;
  sender: string;
  origin_server_ts: number;
  room_id?: string;
  content: unknown;
}

export interface ISyncResponse {
  next_batch: string;
  rooms?: {
    join?: Record<string, {
      timeline?: { events?: IRoomEvent[] };
    }>;
  };
}

export interface IPusher {
  app_id: string;
  app_display_name: string;
  device_display_name: string;
  pushkey: string;
  kind: 'http';
  lang: string;
  append: boolean;
  data: { url: string; format: 'event_id_only' };
}

/**
 * Calls into the Matrix homeserver. Every call made on behalf of a user takes
 * that user's ID as its first argument; no call depends on who acted last.
 *
 * Failures are rejected as `WireError`.
 */
export interface IWireClient {
  sendMessage(as: string, room: string, content: IRoomMessageContent): Promise<string>;
  /**
   * Incremental sync. A `null` token syncs from the beginning.
   */
  sync(as: string, since: string | null): Promise<ISyncResponse>;
  /**
   * Creates a direct room owned by `as`, inviting `invitee`, with the alias
   * `#<alias>:<homeserver>`.
   */
  createDirectRoom(as: string, invitee: string, alias: string): Promise<string>;
  joinRoom(as: string, room: string): Promise<string>;
  /**
   * Resolves `#<alias>:<homeserver>`.
   * @returns The room ID, or `null` if the alias doesn't exist.
   */
  resolveAlias(alias: string): Promise<string | null>;
  getRoomAliases(as: string, room: string): Promise<string[]>;
  getJoinedMembers(as: string, room: string): Promise<string[]>;
  /**
   * Uploads to the content repository.
   * @returns The `mxc://` URI.
   */
  uploadMedia(as: string, data: Buffer, content_type: string, filename?: string): Promise<string>;
  /**
   * Turns an `mxc://` URI into a URL a client can download from.
   * @returns The URL, or `null` if `mxc` is not a valid content URI.
   */
  mxcToHttp(mxc: string): string | null;
  setPusher(as: string, pusher: IPusher): Promise<void>;
}

/**
 * Normalizes a rejection from `matrix-bot-sdk` into a `WireError`. Depending
 * on the SDK version, that's either an error with `errcode` and `statusCode`
 * or the raw HTTP response with the parsed error in `body`.
 */
export function toWireError(e: unknown): WireError {
  if (e instanceof WireError) {
    return e;
  }
  let errcode: string | null = null;
  let status: number | null = null;
  let message = e instanceof Error ? e.message : '';

  if (typeof e === 'object' && e !== null) {
    if ('statusCode' in e && typeof e.statusCode === 'number') {
      status = e.statusCode;
    }
    if ('errcode' in e && typeof e.errcode === 'string') {
      errcode = e.errcode;
    }
    const body = 'body' in e ? e.body : null;
    if (typeof body === 'object' && body !== null) {
      if (!errcode && 'errcode' in body && typeof body.errcode === 'string') {
        errcode = body.errcode;
      }
      if ('error' in body && typeof body.error === 'string') {
        message = message || body.error;
      }
    }
    if (!message && 'error' in e && typeof e.error === 'string') {
      message = e.error;
    }
  }

  if (!message) {
    message = errcode || (status !== null ? `HTTP ${status}` : String(e));
  }
  return new WireError(errcode ? `${errcode}: ${message}` : message, errcode, status);
}

async function wire<T>(what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    const err = toWireError(e);
    log.debug(`${what} failed: ${err.message}`);
    throw err;
  }
}

/**
 * The part of `MatrixClient` the bridge uses.
 */
export type IMatrixApi = Pick<
  MatrixClient,
  | 'sendMessage'
  | 'createRoom'
  | 'joinRoom'
  | 'resolveRoom'
  | 'getJoinedRoomMembers'
  | 'uploadContent'
  | 'mxcToHttp'
  | 'doRequest'
>;

export interface IMatrixWireClientOpts {
  homeserverName: string;
  /** Client impersonating a user. */
  clientFor(user: string): IMatrixApi;
  /** Client acting as the bridge itself. */
  botClient: IMatrixApi;
}

/**
 * How many timeline events a single sync returns per room.
 */
const SYNC_TIMELINE_LIMIT = 100;

/**
 * `IWireClient` over `matrix-bot-sdk`, impersonating users through the
 * application service.
 */
export class MatrixWireClient implements IWireClient {
  protected readonly sync_filter = JSON.stringify({
    room: {
      timeline: { types: ['m.room.message'], limit: SYNC_TIMELINE_LIMIT },
    },
  });

  constructor(protected readonly opts: IMatrixWireClientOpts) {}

  static fromAppservice(appservice: Appservice, homeserverName: string): MatrixWireClient {
    return new MatrixWireClient({
      homeserverName,
      clientFor: (user) => appservice.getIntentForUserId(user).underlyingClient,
      botClient: appservice.botClient,
    });
  }

  protected fullAlias(alias: string): string {
    return `#${alias}:${this.opts.homeserverName}`;
  }

  sendMessage(as: string, room: string, content: IRoomMessageContent): Promise<string> {
    return wire('sendMessage', () => this.opts.clientFor(as).sendMessage(room, content));
  }

  sync(as: string, since: string | null): Promise<ISyncResponse> {
    const qs: Record<string, string | number> = { filter: this.sync_filter, timeout: 0 };
    if (since) {
      qs.since = since;
    }
    return wire('sync', () => this.opts.clientFor(as).doRequest('GET', '/_matrix/client/v3/sync', qs));
  }

  createDirectRoom(as: string, invitee: string, alias: string): Promise<string> {
    return wire('createRoom', () => this.opts.clientFor(as).createRoom({
      preset: 'trusted_private_chat',
      is_direct: true,
      invite: [invitee],
      room_alias_name: alias,
    }));
  }

  joinRoom(as: string, room: string): Promise<string> {
    // Federated rooms need a server to join through
    const server = room.slice(room.indexOf(':') + 1);
    const via = room.includes(':') && server && server !== this.opts.homeserverName ? [server] : undefined;
    return wire('joinRoom', () => this.opts.clientFor(as).joinRoom(room, via));
  }

  async resolveAlias(alias: string): Promise<string | null> {
    try {
      return await wire('resolveAlias', () => this.opts.botClient.resolveRoom(this.fullAlias(alias)));
    } catch (e) {
      if (e instanceof WireError && (e.hasCode('M_NOT_FOUND') || e.status === 404)) {
        return null;
      }
      throw e;
    }
  }

  async getRoomAliases(as: string, room: string): Promise<string[]> {
    const resp: unknown = await wire('getRoomAliases', () => this.opts.clientFor(as).doRequest(
      'GET',
      `/_matrix/client/v3/rooms/${encodeURIComponent(room)}/aliases`,
    ));
    if (typeof resp === 'object' && resp !== null && 'aliases' in resp && Array.isArray(resp.aliases)) {
      return resp.aliases.filter((a: unknown): a is string => typeof a === 'string');
    }
    return [];
  }

  getJoinedMembers(as: string, room: string): Promise<string[]> {
    return wire('getJoinedMembers', () => this.opts.clientFor(as).getJoinedRoomMembers(room));
  }

  uploadMedia(as: string, data: Buffer, content_type: string, filename?: string): Promise<string> {
    return wire('uploadMedia', () => this.opts.clientFor(as).uploadContent(data, content_type, filename));
  }

  mxcToHttp(mxc: string): string | null {
    if (!mxc.startsWith('mxc://')) {
      return null;
    }
    return this.opts.botClient.mxcToHttp(mxc);
  }

  async setPusher(as: string, pusher: IPusher): Promise<void> {
    await wire('setPusher', () => this.opts.clientFor(as).doRequest(
      'POST',
      '/_matrix/client/v3/pushers/set',
      null,
      pusher,
    ));
  }
}
