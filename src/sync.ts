import {
  decodeMessageContent,
  FILE_TRANSFER_CONTENT_TYPE,
  mediaToFileTransfer,
  TEXT_CONTENT_TYPE,
} from './content';
import { errorMessage, mapWireError, WireError } from './error';
import { IdentityMappingStore } from './mapping';
import { OtherParticipantResolver, throwIfAborted } from './rooms';
import { IRoomEvent, ISyncResponse, IWireClient } from './wire';
import { getLogger } from './log';

const log = getLogger('sync');

/**
 * A message as the softphone sees it.
 */
export interface IExternalMessage {
  message_id: string;
  /** RFC 3339, UTC, seconds precision */
  sending_date: string;
  sender: string;
  recipient: string;
  message_text: string;
  content_type: string;
  /** The room the message was sent in */
  stream_id: string;
}

export interface ISyncPosition {
  token: string;
  observedAt: Date;
}

/**
 * Where each user's incremental sync left off.
 */
export class SyncPositionStore {
  protected readonly positions = new Map<string, ISyncPosition>();

  constructor(protected readonly now: () => Date = () => new Date()) {}

  get(matrixID: string): ISyncPosition | null {
    const pos = this.positions.get(matrixID.toLowerCase());
    return pos ? { ...pos } : null;
  }

  set(matrixID: string, token: string): void {
    this.positions.set(matrixID.toLowerCase(), { token, observedAt: this.now() });
  }

  clear(matrixID: string): void {
    this.positions.delete(matrixID.toLowerCase());
  }
}

export interface IFetchResult {
  sent: IExternalMessage[];
  received: IExternalMessage[];
  /** The token the sync was made from, `null` for a full sync */
  since: string | null;
  next: string;
}

/**
 * Formats a timestamp the way the softphone expects:
 * `2024-01-02T03:04:05Z`.
 */
export function formatSendingDate(ts: number | Date): string {
  return new Date(ts).toISOString().replace(/\.\d+Z$/, 'Z');
}

function isUnknownTokenError(e: unknown): boolean {
  return e instanceof WireError && (
    e.hasCode('M_UNKNOWN') || e.message.includes('Invalid stream token')
  );
}

/**
 * Fetches new messages for a user and translates them for the softphone.
 */
export class SyncEngine {
  constructor(
    protected readonly wire: IWireClient,
    protected readonly mappings: IdentityMappingStore,
    protected readonly positions: SyncPositionStore,
    protected readonly participants: OtherParticipantResolver,
  ) {}

  /**
   * Syncs `matrixID` from its stored position. The new position is stored
   * before any event is translated.
   * @throws AuthenticationError if the homeserver rejects the user's token.
   * @throws UpstreamError on any other sync failure.
   */
  async fetchSince(matrixID: string, signal?: AbortSignal): Promise<IFetchResult> {
    let since = this.positions.get(matrixID)?.token || null;

    let resp: ISyncResponse;
    try {
      throwIfAborted(signal);
      try {
        resp = await this.wire.sync(matrixID, since);
      } catch (e) {
        if (!since || !isUnknownTokenError(e)) {
          throw e;
        }
        log.warn(`Sync token for ${matrixID} was rejected, doing a full sync: ${errorMessage(e)}`);
        this.positions.clear(matrixID);
        since = null;
        throwIfAborted(signal);
        resp = await this.wire.sync(matrixID, null);
      }
    } catch (e) {
      log.error(`Sync failed for ${matrixID}: ${errorMessage(e)}`);
      throw mapWireError('sync messages', e);
    }

    if (resp.next_batch) {
      this.positions.set(matrixID, resp.next_batch);
    }

    const result: IFetchResult = { sent: [], received: [], since, next: resp.next_batch };
    const me = matrixID.toLowerCase();
    const my_identifier = this.mappings.reverseResolve(matrixID);

    for (const [room, joined] of Object.entries(resp.rooms?.join || {})) {
      for (const event of joined.timeline?.events || []) {
        if (event.type !== 'm.room.message') {
          continue;
        }
        const room_id = event.room_id || room;
        const msg: IExternalMessage = {
          message_id: event.event_id,
          sending_date: formatSendingDate(event.origin_server_ts),
          sender: this.mappings.reverseResolve(event.sender),
          recipient: '',
          stream_id: room_id,
          ...this.translateContent(event),
        };

        if (event.sender.toLowerCase() === me) {
          msg.recipient = await this.participants.resolve(room_id, matrixID, signal) || '';
          result.sent.push(msg);
        } else {
          msg.recipient = my_identifier;
          result.received.push(msg);
        }
      }
    }

    log.debug(
      `Fetched ${result.received.length} received and ${result.sent.length} sent messages for ${matrixID}`,
    );
    return result;
  }

  /**
   * Converts event content to the softphone's text or file-transfer form.
   * Media that can't be converted is shown as its text body.
   */
  protected translateContent(event: IRoomEvent): Pick<IExternalMessage, 'message_text' | 'content_type'> {
    const decoded = decodeMessageContent(event.content);
    const text = { message_text: decoded.body, content_type: TEXT_CONTENT_TYPE };
    if (decoded.kind === 'text' || decoded.kind === 'unrecognized') {
      return text;
    }

    try {
      const url = decoded.media.url && this.wire.mxcToHttp(decoded.media.url);
      if (!url) {
        log.warn(`Media event ${event.event_id} has no usable URL, sending as text`);
        return text;
      }
      const thumbnail_url = decoded.media.thumbnail_url
        ? this.wire.mxcToHttp(decoded.media.thumbnail_url)
        : null;
      const envelope = mediaToFileTransfer(decoded.kind, decoded.body, url, decoded.media, thumbnail_url);
      return { message_text: JSON.stringify(envelope), content_type: FILE_TRANSFER_CONTENT_TYPE };
    } catch (e) {
      log.warn(`Could not convert media event ${event.event_id}, sending as text: ${errorMessage(e)}`);
      return text;
    }
  }
}
