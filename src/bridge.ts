import { ICredentialValidator } from './auth';
import { AuthenticationError, errorMessage, InvalidRequestError, InvalidSenderError } from './error';
import { IdentityMappingStore } from './mapping';
import { IPushNotification, IPushTokenStore, PushService } from './push';
import { SendEngine, SendResult } from './send';
import {
  IFetchMessagesRequest,
  IFetchMessagesResponse,
  IPushTokenReportRequest,
  ISendMessageRequest,
} from './softphone_api';
import { formatSendingDate, SyncEngine } from './sync';
import { IWireClient } from './wire';
import { getLogger } from './log';

const log = getLogger('bridge');

export const PUSH_NOTIFY_PATH = '_matrix/push/v1/notify';

export interface IBridgeOptions {
  wire: IWireClient;
  mappings: IdentityMappingStore;
  sender: SendEngine;
  sync: SyncEngine;
  push: PushService;
  pushTokens: IPushTokenStore;
  /** Without one, only users that are already mapped can sign in. */
  credentials: ICredentialValidator | null;
  /** Base URL the homeserver reaches the bridge's push gateway on, ending in `/` */
  publicBaseURL: string;
  now?: () => Date;
}

/**
 * The operations behind the softphone API. Every entry point signs the user
 * in first: a known identity passes through, an unknown one is checked with
 * the credential validator and the mappings it returns are stored.
 */
export class Bridge {
  protected readonly now: () => Date;

  constructor(protected readonly opts: IBridgeOptions) {
    this.now = opts.now || (() => new Date());
  }

  get mappings(): IdentityMappingStore {
    return this.opts.mappings;
  }

  /**
   * Makes sure `identifier` can be resolved, asking the credential validator
   * when it can't be yet.
   * @throws AuthenticationError
   */
  protected async signIn(identifier: string, password: string | undefined, signal?: AbortSignal): Promise<string> {
    const id = identifier.trim();
    if (id.startsWith('@')) {
      return id;
    }
    const known = this.opts.mappings.resolve(id);
    if (known) {
      return known;
    }

    const secret = (password || '').trim();
    if (!secret || !this.opts.credentials) {
      log.warn(`${id} is not mapped and can't be signed in`);
      throw new AuthenticationError(`${id} is not a known user`);
    }
    await this.validateCredentials(id, secret, signal);

    const resolved = this.opts.mappings.resolve(id);
    if (!resolved) {
      throw new AuthenticationError(`${id} is not a known user`);
    }
    return resolved;
  }

  /**
   * Checks credentials and stores the mappings that come back. A mapping that
   * can't be stored fails the whole sign in.
   */
  protected async validateCredentials(username: string, password: string, signal?: AbortSignal): Promise<void> {
    if (!this.opts.credentials) {
      throw new AuthenticationError('No credential validator is configured');
    }
    const result = await this.opts.credentials.validate(username, password, signal);
    if (!result.ok) {
      log.warn(`Credentials of ${username} were rejected: ${result.reason}`);
      throw new AuthenticationError(`Credentials of ${username} were rejected`);
    }
    for (const mapping of result.mappings) {
      this.opts.mappings.upsert(mapping);
    }
    if (result.mappings.length) {
      log.info(`Stored ${result.mappings.length} mappings from the sign in of ${username}`);
    }
  }

  async sendMessage(req: ISendMessageRequest, signal?: AbortSignal): Promise<SendResult> {
    if (!req.from.trim()) {
      throw new InvalidSenderError(req.from);
    }
    await this.signIn(req.from, req.password, signal);
    return this.opts.sender.send(req.from, req.to, req.body, req.content_type || null, signal);
  }

  async fetchMessages(req: IFetchMessagesRequest, signal?: AbortSignal): Promise<IFetchMessagesResponse> {
    const user = await this.signIn(req.username, req.password, signal);
    const result = await this.opts.sync.fetchSince(user, signal);
    return {
      date: formatSendingDate(this.now()),
      received_messages: result.received,
      sent_messages: result.sent,
    };
  }

  /**
   * Stores a device's push tokens and, when it has a message token,
   * registers a pusher for the user so the homeserver notifies the bridge.
   */
  async reportPushToken(req: IPushTokenReportRequest, signal?: AbortSignal): Promise<void> {
    const username = req.username.trim();
    const selector = req.selector.trim();
    const password = req.password.trim();
    if (!username || !selector || !password) {
      throw new InvalidRequestError('username, selector and password are required');
    }
    await this.validateCredentials(username, password, signal);

    await this.opts.pushTokens.save({
      selector,
      tokenMsgs: req.token_msgs || null,
      appIdMsgs: req.appid_msgs || null,
      tokenCalls: req.token_calls || null,
      appIdCalls: req.appid_calls || null,
    });
    log.info(`Saved push tokens for ${selector}`);

    if (!req.token_msgs) {
      return;
    }
    const user = this.opts.mappings.resolve(username);
    if (!user) {
      log.warn(`Could not resolve ${username} to register a pusher for ${selector}`);
      return;
    }
    try {
      await this.opts.wire.setPusher(user, {
        app_id: req.appid_msgs || '',
        app_display_name: req.appid_msgs || '',
        device_display_name: 'Softphone',
        pushkey: req.token_msgs,
        kind: 'http',
        lang: 'en',
        append: false,
        data: { url: `${this.opts.publicBaseURL}${PUSH_NOTIFY_PATH}`, format: 'event_id_only' },
      });
      log.info(`Registered pusher for ${user}`);
    } catch (e) {
      log.error(`Failed to register pusher for ${user}: ${errorMessage(e)}`);
    }
  }

  notify(notification: IPushNotification, signal?: AbortSignal): Promise<string[]> {
    return this.opts.push.translate(notification, signal);
  }
}
