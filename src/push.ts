import axios from 'axios';

import ajv from './ajv';
import { errorMessage, PushDeliveryError, PushTokenInvalidError } from './error';
import { getLogger } from './log';

const log = getLogger('push');

export const DEFAULT_PUSH_GATEWAY_URL = 'https://pnm.cloudsoftphone.com/pnm2/send';

export interface IPushTokenRecord {
  selector: string;
  tokenMsgs: string | null;
  appIdMsgs: string | null;
  tokenCalls: string | null;
  appIdCalls: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type IPushTokenInput = Omit<IPushTokenRecord, 'createdAt' | 'updatedAt'>;

export interface IPushTokenStore {
  getBySelector(selector: string): Promise<IPushTokenRecord | null>;
  /**
   * Finds the record holding `pushkey` as either its message or call token.
   */
  getByPushkey(pushkey: string): Promise<IPushTokenRecord | null>;
  /**
   * Creates or replaces the record for a selector.
   */
  save(record: IPushTokenInput): Promise<void>;
  list(): Promise<IPushTokenRecord[]>;
  delete(selector: string): Promise<void>;
  /**
   * Deletes every record.
   */
  reset(): Promise<void>;
}

export interface IPushDevice {
  app_id: string;
  pushkey: string;
  pushkey_ts?: number;
  data?: Record<string, unknown>;
  tweaks?: Record<string, unknown>;
}

/**
 * A notification from the homeserver's pusher, as received on
 * `/_matrix/push/v1/notify`.
 */
export interface IPushNotification {
  event_id?: string;
  room_id?: string;
  type?: string;
  sender?: string;
  sender_display_name?: string;
  room_name?: string;
  prio?: string;
  content?: Record<string, unknown>;
  counts?: { unread?: number; missed_calls?: number };
  devices: IPushDevice[];
}

export interface IPushNotifyRequest {
  notification: IPushNotification;
}
export namespace IPushNotifyRequest {
  export const validate = ajv.compile<IPushNotifyRequest>({
    type: 'object',
    properties: {
      notification: {
        type: 'object',
        properties: {
          event_id: { type: 'string' },
          room_id: { type: 'string' },
          type: { type: 'string' },
          sender: { type: 'string' },
          sender_display_name: { type: 'string' },
          room_name: { type: 'string' },
          prio: { type: 'string' },
          content: { type: 'object' },
          counts: {
            type: 'object',
            properties: {
              unread: { type: 'integer' },
              missed_calls: { type: 'integer' },
            },
          },
          devices: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                app_id: { type: 'string' },
                pushkey: { type: 'string' },
                pushkey_ts: { type: 'integer' },
                data: { type: 'object' },
                tweaks: { type: 'object' },
              },
              required: ['app_id', 'pushkey'],
            },
          },
        },
        required: ['devices'],
      },
    },
    required: ['notification'],
  });
}

/**
 * The push service's request body.
 */
export interface IPushMessage {
  verb: 'NotifyTextMessage';
  AppId: string;
  DeviceToken: string;
  Selector: string;
  Message: string;
  ContentType: string;
  Badge: number;
  UserDisplayName: string;
  UserName: string;
  Id: string;
  ThreadId: string;
  Sound: string;
}

export interface IPushGateway {
  /**
   * @throws PushTokenInvalidError if the service no longer knows the device.
   * @throws PushDeliveryError on any other failure.
   */
  send(msg: IPushMessage, signal?: AbortSignal): Promise<void>;
}

/**
 * Posts notifications to the softphone vendor's push service.
 */
export class PnmPushGateway implements IPushGateway {
  constructor(
    protected readonly url = DEFAULT_PUSH_GATEWAY_URL,
    protected readonly timeout = 30 * 1000,
  ) {}

  async send(msg: IPushMessage, signal?: AbortSignal): Promise<void> {
    let data: unknown;
    try {
      const resp = await axios.post<unknown>(this.url, msg, {
        timeout: this.timeout,
        signal,
        // The service reports failures in the body
        validateStatus: () => true,
      });
      data = resp.data;
    } catch (e) {
      throw new PushDeliveryError(`Push request failed: ${errorMessage(e)}`, { cause: e });
    }

    if (typeof data !== 'object' || data === null || !('code' in data) || typeof data.code !== 'number') {
      throw new PushDeliveryError(`Unexpected push service response: ${JSON.stringify(data)}`);
    }
    const response = 'response' in data && typeof data.response === 'string' ? data.response : '';
    log.debug(`Push service answered ${data.code} ${response}`);
    if (data.code === 200) {
      return;
    }
    if (data.code === 404 || response.includes('404')) {
      throw new PushTokenInvalidError(msg.DeviceToken);
    }
    throw new PushDeliveryError(`Push service answered code=${data.code}, response=${response}`);
  }
}

/**
 * Builds the push service message for one device.
 */
export function toPushMessage(
  notification: IPushNotification,
  device: IPushDevice,
  token: IPushTokenRecord,
): IPushMessage {
  const content = notification.content || {};
  const sound = device.tweaks?.sound;
  return {
    verb: 'NotifyTextMessage',
    AppId: token.appIdMsgs || '',
    DeviceToken: token.tokenMsgs || '',
    Selector: token.selector,
    Message: typeof content.body === 'string' ? content.body : '',
    ContentType: typeof content.msgtype === 'string' ? content.msgtype : '',
    Badge: notification.counts?.unread ?? 0,
    UserDisplayName: notification.sender_display_name || notification.sender || '',
    UserName: notification.sender || '',
    Id: notification.event_id || '',
    ThreadId: notification.room_id || '',
    Sound: typeof sound === 'string' && sound ? sound : 'default',
  };
}

export class PushService {
  constructor(
    protected readonly tokens: IPushTokenStore,
    protected readonly gateway: IPushGateway,
  ) {}

  /**
   * Forwards a notification to each of its devices.
   * @returns The push keys the homeserver should stop notifying.
   */
  async translate(notification: IPushNotification, signal?: AbortSignal): Promise<string[]> {
    const rejected: string[] = [];

    for (const device of notification.devices) {
      let token: IPushTokenRecord | null;
      try {
        token = await this.tokens.getByPushkey(device.pushkey);
      } catch (e) {
        log.error(`Failed to look up push key ${device.pushkey}: ${errorMessage(e)}`);
        rejected.push(device.pushkey);
        continue;
      }
      if (!token) {
        log.warn(`No push token for push key ${device.pushkey}, rejecting it`);
        rejected.push(device.pushkey);
        continue;
      }

      try {
        await this.gateway.send(toPushMessage(notification, device, token), signal);
        log.info(`Push for ${notification.event_id || '(no event)'} sent to ${token.selector}`);
      } catch (e) {
        if (e instanceof PushTokenInvalidError) {
          log.warn(`Push service no longer accepts the token of ${token.selector}`);
          rejected.push(device.pushkey);
        } else {
          log.error(`Failed to push to ${token.selector}: ${errorMessage(e)}`);
        }
      }
    }

    return rejected;
  }
}
