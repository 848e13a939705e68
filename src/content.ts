import { JSONSchemaType } from 'ajv';

import ajv from './ajv';

/**
 * Content type of the softphone's structured attachment messages.
 */
export const FILE_TRANSFER_CONTENT_TYPE = 'application/x-acro-filetransfer+json';
export const TEXT_CONTENT_TYPE = 'text/plain';

export function isFileTransferContentType(content_type: string | null | undefined): boolean {
  return (content_type || '').trim().toLowerCase() === FILE_TRANSFER_CONTENT_TYPE;
}

export interface IAttachmentPreview {
  'content-type'?: string;
  /** Base64 image data, or a URL the client fetches. */
  content: string;
}

export interface IAttachment {
  /** image/jpeg when absent. */
  'content-type'?: string;
  'content-url': string;
  'content-size'?: number;
  filename?: string;
  description?: string;
  'encryption-key'?: string;
  hash?: string;
  preview?: IAttachmentPreview;
}

/**
 * The softphone's envelope for a message carrying attachments.
 */
export interface IFileTransferMessage {
  body?: string;
  /** Missing or `null` means no attachments. */
  attachments?: IAttachment[] | null;
}
export namespace IFileTransferMessage {
  export const JSON: JSONSchemaType<IFileTransferMessage> = {
    type: 'object',
    properties: {
      body: { type: 'string', nullable: true },
      attachments: {
        type: 'array',
        nullable: true,
        items: {
          type: 'object',
          properties: {
            'content-type': { type: 'string', nullable: true },
            'content-url': { type: 'string' },
            'content-size': { type: 'number', nullable: true },
            filename: { type: 'string', nullable: true },
            description: { type: 'string', nullable: true },
            'encryption-key': { type: 'string', nullable: true },
            hash: { type: 'string', nullable: true },
            preview: {
              type: 'object',
              properties: {
                'content-type': { type: 'string', nullable: true },
                content: { type: 'string' },
              },
              required: ['content'],
              nullable: true,
            },
          },
          required: ['content-url'],
        },
      },
    },
    required: [],
  };
  export const validate = ajv.compile(JSON);

  /**
   * Parses an envelope from message text.
   * @returns The envelope, or `null` if the text is not a valid envelope.
   */
  export function parse(text: string): IFileTransferMessage | null {
    let data: unknown;
    try {
      data = globalThis.JSON.parse(text);
    } catch (e) {
      return null;
    }
    return validate(data) ? data : null;
  }
}

const IMAGE_TYPES = ['image/jpeg', 'image/jpg', 'image/png', 'image/gif', 'image/webp', 'image/bmp', 'image/tiff'];
const VIDEO_TYPES = ['video/mp4', 'video/webm', 'video/ogg', 'video/quicktime', 'video/x-msvideo'];
const AUDIO_TYPES = ['audio/mpeg', 'audio/mp3', 'audio/ogg', 'audio/wav', 'audio/webm', 'audio/aac', 'audio/flac'];

export type MediaKind = 'image' | 'video' | 'audio' | 'file';
export type MediaMsgType = `m.${MediaKind}`;

/**
 * Picks the media kind for a MIME type. Types outside the known image, video
 * and audio lists are generic files.
 */
export function mediaKindForMimetype(mimetype: string): MediaKind {
  const mt = mimetype.trim().toLowerCase();
  if (IMAGE_TYPES.includes(mt)) {
    return 'image';
  } else if (VIDEO_TYPES.includes(mt)) {
    return 'video';
  } else if (AUDIO_TYPES.includes(mt)) {
    return 'audio';
  }
  return 'file';
}

const DEFAULT_MIMETYPES: Record<MediaKind, string> = {
  image: 'image/jpeg',
  video: 'video/mp4',
  audio: 'audio/mpeg',
  file: 'application/octet-stream',
};

export interface IMediaInfo {
  mimetype?: string;
  size?: number;
  thumbnail_url?: string;
  thumbnail_info?: { mimetype?: string };
}

/**
 * `m.room.message` content as sent to the homeserver.
 */
export interface IRoomMessageContent {
  msgtype: 'm.text' | MediaMsgType;
  body: string;
  url?: string;
  filename?: string;
  info?: IMediaInfo;
}

export interface IMediaRef {
  /** `mxc://` URI of the media, if any. */
  url: string | null;
  filename: string | null;
  mimetype: string | null;
  size: number | null;
  thumbnail_url: string | null;
  thumbnail_mimetype: string | null;
}

/**
 * The known shapes of `m.room.message` content, produced by
 * `decodeMessageContent`.
 */
export type DecodedContent =
  | { kind: 'text'; body: string }
  | { kind: MediaKind; body: string; media: IMediaRef }
  | { kind: 'unrecognized'; msgtype: string | null; body: string };

function str(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function num(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function obj(value: unknown): object | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? value : null;
}

function prop(value: object | null, key: string): unknown {
  return value === null ? undefined : Object.getOwnPropertyDescriptor(value, key)?.value;
}

/**
 * Decodes free-form event content into a `DecodedContent` variant.
 */
export function decodeMessageContent(content: unknown): DecodedContent {
  const c = obj(content);
  const msgtype = str(prop(c, 'msgtype'));
  const body = str(prop(c, 'body')) ?? '';

  switch (msgtype) {
    case 'm.text':
    case 'm.notice':
    case 'm.emote':
      return { kind: 'text', body };
    case 'm.image':
    case 'm.video':
    case 'm.audio':
    case 'm.file': {
      const info = obj(prop(c, 'info'));
      const thumbnail_info = obj(prop(info, 'thumbnail_info'));
      return {
        kind: msgtype === 'm.image' ? 'image'
          : msgtype === 'm.video' ? 'video'
          : msgtype === 'm.audio' ? 'audio'
          : 'file',
        body,
        media: {
          url: str(prop(c, 'url')) || null,
          filename: str(prop(c, 'filename')) || null,
          mimetype: str(prop(info, 'mimetype')) || null,
          size: num(prop(info, 'size')),
          thumbnail_url: str(prop(info, 'thumbnail_url')) || null,
          thumbnail_mimetype: str(prop(thumbnail_info, 'mimetype')) || null,
        },
      };
    }
    default:
      return { kind: 'unrecognized', msgtype, body };
  }
}

/**
 * Builds the single-attachment envelope the softphone receives for a Matrix
 * media message.
 * @param url - HTTP(S) URL the client downloads the media from.
 * @param thumbnail_url - HTTP(S) URL of the thumbnail, if any.
 */
export function mediaToFileTransfer(
  kind: MediaKind,
  body: string,
  url: string,
  media: IMediaRef,
  thumbnail_url: string | null,
): IFileTransferMessage {
  const attachment: IAttachment = {
    'content-type': media.mimetype || DEFAULT_MIMETYPES[kind],
    'content-url': url,
  };
  if (media.size && media.size > 0) {
    attachment['content-size'] = media.size;
  }
  const filename = media.filename || body;
  if (filename) {
    attachment.filename = filename;
  }
  if (body) {
    attachment.description = body;
  }
  if (thumbnail_url) {
    attachment.preview = {
      'content-type': media.thumbnail_mimetype || 'image/jpeg',
      content: thumbnail_url,
    };
  }

  const envelope: IFileTransferMessage = { attachments: [attachment] };
  if (body) {
    envelope.body = body;
  }
  return envelope;
}

const URL_PREVIEW_RE = /^(https?|mxc):\/\//;

/**
 * Converts the first attachment of an envelope into Matrix media content. The
 * `url` still points at the softphone's storage; callers replace it with the
 * uploaded `mxc://` URI.
 */
export function fileTransferToMatrixContent(
  envelope: IFileTransferMessage,
): IRoomMessageContent & { msgtype: MediaMsgType; info: IMediaInfo } | null {
  const att = (envelope.attachments || [])[0];
  if (!att) {
    return null;
  }
  const mimetype = att['content-type'] || 'image/jpeg';
  const info: IMediaInfo = { mimetype };
  if (att['content-size'] && att['content-size'] > 0) {
    info.size = att['content-size'];
  }
  if (att.preview && URL_PREVIEW_RE.test(att.preview.content)) {
    info.thumbnail_url = att.preview.content;
    if (att.preview['content-type']) {
      info.thumbnail_info = { mimetype: att.preview['content-type'] };
    }
  }

  const content: IRoomMessageContent & { msgtype: MediaMsgType; info: IMediaInfo } = {
    msgtype: `m.${mediaKindForMimetype(mimetype)}`,
    body: att.filename || envelope.body || 'attachment',
    url: att['content-url'],
    info,
  };
  if (att.filename) {
    content.filename = att.filename;
  }
  return content;
}
