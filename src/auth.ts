import axios from 'axios';

import ajv from './ajv';
import { TtlCache } from './cache';
import { errorMessage, UpstreamError } from './error';
import { IMappingInput } from './mapping';
import { getLogger } from './log';

const log = getLogger('auth');

export type ValidationResult =
  | { ok: true; mappings: IMappingInput[] }
  | { ok: false; reason: string };

/**
 * Checks a softphone user's credentials against the PBX.
 */
export interface ICredentialValidator {
  /**
   * @returns Whether the credentials were accepted, with the mappings the
   * service knows about when they were.
   * @throws UpstreamError if the service couldn't be asked.
   */
  validate(username: string, password: string, signal?: AbortSignal): Promise<ValidationResult>;
}

export interface IChatUser {
  user_name: string;
  main_extension: string;
  sub_extensions?: string[] | null;
}
export interface IChatUsersResponse {
  users: IChatUser[];
}
export namespace IChatUsersResponse {
  export const validate = ajv.compile<IChatUsersResponse>({
    type: 'object',
    properties: {
      users: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            user_name: { type: 'string' },
            main_extension: { type: 'string' },
            sub_extensions: { type: 'array', nullable: true, items: { type: 'string' } },
          },
          required: ['user_name', 'main_extension'],
        },
      },
    },
    required: ['users'],
  });
}

export const DEFAULT_CHAT_CLAIM = 'nethvoice_cti.chat';

export interface IHttpCredentialValidatorOpts {
  /** Base URL of the PBX API */
  url: string;
  homeserverName: string;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Name of the JWT claim granting chat access */
  chatClaim?: string;
  /** Successful logins are remembered here */
  cache: TtlCache<boolean>;
}

/**
 * Reads the claims of a JWT without verifying it. The token comes straight
 * from the PBX over the connection we opened.
 */
export function decodeJwtClaims(token: string): Record<string, unknown> | null {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return null;
  }
  try {
    const claims: unknown = JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf8'));
    if (typeof claims !== 'object' || claims === null || Array.isArray(claims)) {
      return null;
    }
    return Object.fromEntries(Object.entries(claims));
  } catch (e) {
    log.debug(`Could not decode JWT claims: ${e}`);
    return null;
  }
}

function parseExtension(value: string): number | null {
  const v = value.trim();
  return /^\d+$/.test(v) ? parseInt(v, 10) : null;
}

/**
 * Converts the PBX's user list to mapping entries. Users with no name or
 * a main extension that isn't a number are skipped.
 */
export function chatUsersToMappings(users: IChatUser[], homeserverName: string): IMappingInput[] {
  const mappings: IMappingInput[] = [];
  for (const user of users) {
    const number = parseExtension(user.main_extension);
    const name = user.user_name.trim().toLowerCase();
    if (number === null || !name) {
      log.warn(`Skipping PBX user '${user.user_name}' with extension '${user.main_extension}'`);
      continue;
    }
    const alts: number[] = [];
    for (const sub of user.sub_extensions || []) {
      const alt = parseExtension(sub);
      if (alt !== null) {
        alts.push(alt);
      }
    }
    mappings.push({
      number,
      matrixID: `@${name}:${homeserverName}`,
      altNumbers: alts,
    });
  }
  return mappings;
}

/**
 * Logs into the PBX's HTTP API and reads its chat user directory.
 */
export class HttpCredentialValidator implements ICredentialValidator {
  protected readonly claim: string;
  protected readonly base_url: string;

  constructor(protected readonly opts: IHttpCredentialValidatorOpts) {
    this.claim = opts.chatClaim || DEFAULT_CHAT_CLAIM;
    this.base_url = opts.url.replace(/\/+$/, '');
  }

  async validate(username: string, password: string, signal?: AbortSignal): Promise<ValidationResult> {
    let user = username.trim();
    const at = user.indexOf('@');
    if (at > 0) {
      user = user.slice(0, at);
    }

    const cache_key = `${user}|${this.opts.homeserverName}`;
    if (this.opts.cache.get(cache_key)) {
      log.debug(`Using cached login of ${user}`);
      return { ok: true, mappings: [] };
    }

    const login = await this.request('login', () => axios.post<unknown>(
      `${this.base_url}/api/login`,
      { username: user, password },
      { timeout: this.opts.timeout, signal, validateStatus: () => true },
    ));
    if (login.status === 401 || login.status === 403) {
      return { ok: false, reason: `Login rejected with status ${login.status}` };
    }
    if (login.status !== 200) {
      throw new UpstreamError(`PBX login failed with status ${login.status}`);
    }

    const body = login.data;
    const token = typeof body === 'object' && body !== null && 'token' in body && typeof body.token === 'string'
      ? body.token
      : null;
    const claims = token && decodeJwtClaims(token);
    if (!token || !claims) {
      throw new UpstreamError('PBX login returned no usable token');
    }
    const access = claims[this.claim];
    if (access !== true && !(typeof access === 'string' && access.toLowerCase() === 'true')) {
      log.warn(`${user} has no chat access`);
      return { ok: false, reason: 'User does not have chat access' };
    }

    const users = await this.request('user list', () => axios.get<unknown>(
      `${this.base_url}/api/chat`,
      {
        params: { users: 1 },
        headers: { Authorization: `Bearer ${token}` },
        timeout: this.opts.timeout,
        signal,
        validateStatus: () => true,
      },
    ));
    if (users.status !== 200) {
      throw new UpstreamError(`PBX user list failed with status ${users.status}`);
    }
    if (!IChatUsersResponse.validate(users.data)) {
      throw new UpstreamError(
        `Invalid PBX user list: ${ajv.errorsText(IChatUsersResponse.validate.errors)}`,
      );
    }

    this.opts.cache.set(cache_key, true);
    const mappings = chatUsersToMappings(users.data.users, this.opts.homeserverName);
    log.debug(`${user} logged in; PBX listed ${mappings.length} users`);
    return { ok: true, mappings };
  }

  protected async request<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw new UpstreamError(`PBX ${what} request failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
