import * as YAML from 'yaml';
import * as fs from 'fs';
import { JSONSchemaType } from 'ajv';
import * as Str from '@supercharge/strings';
import { IAppserviceRegistration } from 'matrix-bot-sdk';

import ajv from './ajv';
import { LogLevelName } from './log';
import { DEFAULT_PUSH_GATEWAY_URL } from './push';
import { DEFAULT_CHAT_CLAIM } from './auth';

export interface IConfigData {
  bridge: {
    port: number;
    bindAddress: string;
    homeserverName: string;
    homeserverUrl: string;
  };
  httpserver: {
    port: number;
    bindAddress: string;
    publicBaseURL: string;
  };
  database: { filename: string };
  cache?: { ttlSeconds?: number };
  auth?: { url: string; timeoutSeconds?: number; chatClaim?: string };
  push?: { gatewayUrl?: string };
  admin?: { token?: string };
  mappings?: { file?: string };
  logging?: { level?: LogLevelName };
}

/**
 * The config with every default filled in. `auth` stays optional: without it
 * only mapped users can sign in.
 */
export interface ICompleteConfig {
  bridge: IConfigData['bridge'];
  httpserver: IConfigData['httpserver'];
  database: IConfigData['database'];
  cache: { ttlSeconds: number };
  auth: { url: string; timeoutSeconds: number; chatClaim: string } | null;
  push: { gatewayUrl: string };
  admin: { token: string | null };
  mappings: { file: string | null };
  logging: { level: LogLevelName };
}

export namespace IConfigData {
  export const JSON: JSONSchemaType<IConfigData> = {
    $id: 'src/config.ts/IConfigData',
    type: 'object',
    properties: {
      bridge: {
        type: 'object',
        properties: {
          port: { type: 'number' },
          bindAddress: { type: 'string' },
          homeserverName: { type: 'string' },
          homeserverUrl: { type: 'string' },
        },
        required: ['port', 'bindAddress', 'homeserverName', 'homeserverUrl'],
      },
      httpserver: {
        type: 'object',
        properties: {
          port: { type: 'number' },
          bindAddress: { type: 'string' },
          publicBaseURL: { type: 'string' },
        },
        required: ['port', 'bindAddress', 'publicBaseURL'],
      },
      database: {
        type: 'object',
        properties: {
          filename: { type: 'string' },
        },
        required: ['filename'],
      },
      cache: {
        type: 'object',
        properties: {
          ttlSeconds: { type: 'number', nullable: true },
        },
        required: [],
        nullable: true,
      },
      auth: {
        type: 'object',
        properties: {
          url: { type: 'string' },
          timeoutSeconds: { type: 'number', nullable: true },
          chatClaim: { type: 'string', nullable: true },
        },
        required: ['url'],
        nullable: true,
      },
      push: {
        type: 'object',
        properties: {
          gatewayUrl: { type: 'string', nullable: true },
        },
        required: [],
        nullable: true,
      },
      admin: {
        type: 'object',
        properties: {
          token: { type: 'string', nullable: true },
        },
        required: [],
        nullable: true,
      },
      mappings: {
        type: 'object',
        properties: {
          file: { type: 'string', nullable: true },
        },
        required: [],
        nullable: true,
      },
      logging: {
        type: 'object',
        properties: {
          level: {
            type: 'string',
            enum: ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR'],
            nullable: true,
          },
        },
        required: [],
        nullable: true,
      },
    },
    required: ['bridge', 'httpserver', 'database'],
  };
  export const validate = ajv.compile(JSON);
}

export function parseConfig(text: string): ICompleteConfig {
  const config: unknown = YAML.parse(text);

  if (!IConfigData.validate(config)) {
    throw new TypeError(`Invalid config: ${ajv.errorsText(IConfigData.validate.errors)}`);
  }

  let pburl = config.httpserver.publicBaseURL;
  if (!pburl.startsWith('http://') && !pburl.startsWith('https://')) {
    throw new TypeError('Public base URL for the HTTP server must be HTTP or HTTPS');
  }
  if (!pburl.endsWith('/')) {
    pburl += '/';
  }

  return {
    bridge: config.bridge,
    httpserver: { ...config.httpserver, publicBaseURL: pburl },
    database: config.database,
    cache: { ttlSeconds: config.cache?.ttlSeconds ?? 3600 },
    auth: config.auth ? {
      url: config.auth.url,
      timeoutSeconds: config.auth.timeoutSeconds ?? 5,
      chatClaim: config.auth.chatClaim || DEFAULT_CHAT_CLAIM,
    } : null,
    push: { gatewayUrl: config.push?.gatewayUrl || DEFAULT_PUSH_GATEWAY_URL },
    admin: { token: config.admin?.token || null },
    mappings: { file: config.mappings?.file || null },
    logging: { level: config.logging?.level || 'INFO' },
  };
}

export function loadConfig(path: string): ICompleteConfig {
  return parseConfig(fs.readFileSync(path, 'utf8'));
}

export interface IRegOpts {
  id: string;
  url: string;
  localpart: string;
  homeserverName: string;
}

/**
 * Builds an application service registration. The bridge acts for users it
 * doesn't own, so its user namespace is not exclusive.
 */
export function createRegistration(opts: IRegOpts): IAppserviceRegistration {
  const regex_safe_domain = opts.homeserverName.replace(/\./g, '\\.');
  return {
    id: opts.id,
    url: opts.url,
    as_token: Str.random(64),
    hs_token: Str.random(64),
    sender_localpart: opts.localpart,
    namespaces: {
      users: [{ exclusive: false, regex: `@.*:${regex_safe_domain}` }],
      aliases: [],
      rooms: [],
    },
    protocols: [],
    rate_limited: false,
  };
}

export interface IRegTokens {
  as_token: string;
  hs_token: string;
}

export function loadRegTokens(path: string): IRegTokens {
  const config: unknown = YAML.parse(fs.readFileSync(path, 'utf8'));
  if (
    typeof config !== 'object' ||
    config === null ||
    !('as_token' in config) ||
    !('hs_token' in config) ||
    typeof config.as_token !== 'string' ||
    typeof config.hs_token !== 'string'
  ) {
    throw new TypeError('Invalid registration file');
  }
  return { as_token: config.as_token, hs_token: config.hs_token };
}
