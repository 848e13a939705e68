import axios from 'axios';
import { fromBuffer } from 'file-type';

import {
  fileTransferToMatrixContent,
  IFileTransferMessage,
  IRoomMessageContent,
  isFileTransferContentType,
  mediaKindForMimetype,
} from './content';
import {
  errorMessage,
  InvalidRecipientError,
  InvalidRequestError,
  InvalidSenderError,
  mapWireError,
} from './error';
import { IdentityMappingStore } from './mapping';
import { DirectRoomManager, throwIfAborted } from './rooms';
import { IWireClient } from './wire';
import { getLogger } from './log';

const log = getLogger('send');

/** Largest attachment downloaded from the softphone's storage */
export const MAX_ATTACHMENT_BYTES = 100 * 1024 * 1024;
export const ATTACHMENT_TIMEOUT_MS = 30 * 1000;

export interface IMediaFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<Buffer>;
}

/**
 * Downloads attachments over HTTP(S).
 */
export class HttpMediaFetcher implements IMediaFetcher {
  constructor(
    protected readonly max_bytes = MAX_ATTACHMENT_BYTES,
    protected readonly timeout = ATTACHMENT_TIMEOUT_MS,
  ) {}

  async fetch(url: string, signal?: AbortSignal): Promise<Buffer> {
    const resp = await axios.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      maxContentLength: this.max_bytes,
      timeout: this.timeout,
      signal,
    });
    return Buffer.from(resp.data);
  }
}

/**
 * Detects a MIME type from file contents.
 * @returns The type, or `null` if the contents aren't recognized.
 */
export type ContentSniffer = (data: Buffer) => Promise<string | null>;

export const sniffContentType: ContentSniffer = async (data) => {
  const result = await fromBuffer(data);
  return result ? result.mime : null;
};

export type Delivery =
  | { delivery: 'text' }
  | { delivery: 'media' }
  | { delivery: 'text-fallback'; reason: string };

export type SendResult = Delivery & { messageId: string; room: string };

/**
 * Picks the type to upload an attachment as. A recognized image type always
 * wins; other recognized types only replace a missing or generic declared
 * type.
 */
export function correctMimetype(declared: string | undefined, sniffed: string | null): string {
  const generic = !declared || declared === 'application/octet-stream';
  if (sniffed && (sniffed.startsWith('image/') || generic)) {
    return sniffed;
  }
  return declared || 'application/octet-stream';
}

export class SendEngine {
  constructor(
    protected readonly wire: IWireClient,
    protected readonly mappings: IdentityMappingStore,
    protected readonly rooms: DirectRoomManager,
    protected readonly fetcher: IMediaFetcher,
    protected readonly sniff: ContentSniffer = sniffContentType,
  ) {}

  /**
   * Sends a message from a softphone user. `to` is a room ID, a Matrix user
   * ID or a mapped number.
   * @throws InvalidSenderError
   * @throws InvalidRecipientError
   * @throws InvalidRequestError if a file transfer body can't be parsed.
   */
  async send(
    from: string,
    to: string,
    body: string,
    content_type: string | null,
    signal?: AbortSignal,
  ): Promise<SendResult> {
    const sender = this.mappings.resolve(from);
    if (!sender) {
      throw new InvalidSenderError(from);
    }

    const recipient = to.trim();
    if (!recipient) {
      throw new InvalidRecipientError(to);
    }

    let room: string;
    try {
      if (recipient.startsWith('!')) {
        room = recipient;
      } else {
        const target = this.mappings.resolve(recipient);
        if (!target) {
          throw new InvalidRecipientError(recipient);
        }
        room = await this.rooms.ensureRoom(sender, target, signal);
      }

      throwIfAborted(signal);
      // The sender may have missed the join when the room was made
      await this.wire.joinRoom(sender, room);
    } catch (e) {
      throw mapWireError('send message', e);
    }

    let content: IRoomMessageContent = { msgtype: 'm.text', body };
    let delivery: Delivery = { delivery: 'text' };
    if (isFileTransferContentType(content_type)) {
      [content, delivery] = await this.buildFileTransfer(sender, body, signal);
    }

    let messageId: string;
    try {
      throwIfAborted(signal);
      messageId = await this.wire.sendMessage(sender, room, content);
    } catch (e) {
      log.error(`Failed to send message from ${sender} to ${room}: ${errorMessage(e)}`);
      throw mapWireError('send message', e);
    }
    log.debug(`Sent ${messageId} from ${sender} to ${room} as ${delivery.delivery}`);
    return { ...delivery, messageId, room };
  }

  protected async buildFileTransfer(
    sender: string,
    body: string,
    signal?: AbortSignal,
  ): Promise<[IRoomMessageContent, Delivery]> {
    const envelope = IFileTransferMessage.parse(body);
    if (!envelope) {
      throw new InvalidRequestError('Invalid file transfer message');
    }
    const text: IRoomMessageContent = { msgtype: 'm.text', body: envelope.body || '' };

    const content = fileTransferToMatrixContent(envelope);
    if (!content) {
      return [text, { delivery: 'text' }];
    }
    const source = content.url;
    if (!source) {
      return [text, { delivery: 'text-fallback', reason: 'Attachment has no content URL' }];
    }

    let data: Buffer;
    try {
      data = await this.fetcher.fetch(source, signal);
    } catch (e) {
      log.warn(`Failed to download ${source}, sending as text: ${errorMessage(e)}`);
      return [text, { delivery: 'text-fallback', reason: `Download failed: ${errorMessage(e)}` }];
    }

    let mimetype = content.info.mimetype;
    try {
      mimetype = correctMimetype(mimetype, await this.sniff(data));
    } catch (e) {
      log.debug(`Could not detect the type of ${source}: ${errorMessage(e)}`);
    }
    const info = { ...content.info, size: data.length };
    if (mimetype) {
      info.mimetype = mimetype;
    }

    let url: string;
    try {
      throwIfAborted(signal);
      url = await this.wire.uploadMedia(sender, data, info.mimetype || 'application/octet-stream', content.filename);
    } catch (e) {
      log.warn(`Failed to upload ${source}, sending as text: ${errorMessage(e)}`);
      return [text, { delivery: 'text-fallback', reason: `Upload failed: ${errorMessage(e)}` }];
    }

    return [
      {
        ...content,
        msgtype: mimetype ? `m.${mediaKindForMimetype(mimetype)}` : content.msgtype,
        url,
        info,
      },
      { delivery: 'media' },
    ];
  }
}
