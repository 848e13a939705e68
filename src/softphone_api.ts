import { JSONSchemaType } from 'ajv';

import ajv from './ajv';
import { IExternalMessage } from './sync';

export interface ISendMessageRequest {
  from: string;
  password?: string;
  to: string;
  body: string;
  content_type?: string;
  disposition_notification?: string;
}
export namespace ISendMessageRequest {
  export const JSON: JSONSchemaType<ISendMessageRequest> = {
    type: 'object',
    properties: {
      from: { type: 'string' },
      password: { type: 'string', nullable: true },
      to: { type: 'string' },
      body: { type: 'string' },
      content_type: { type: 'string', nullable: true },
      disposition_notification: { type: 'string', nullable: true },
    },
    required: ['from', 'to', 'body'],
  };
  export const validate = ajv.compile(JSON);
}

export interface ISendMessageResponse {
  message_id: string;
}

export interface IFetchMessagesRequest {
  username: string;
  password?: string;
  last_id?: string;
  last_sent_id?: string;
  device?: string;
}
export namespace IFetchMessagesRequest {
  export const JSON: JSONSchemaType<IFetchMessagesRequest> = {
    type: 'object',
    properties: {
      username: { type: 'string' },
      password: { type: 'string', nullable: true },
      last_id: { type: 'string', nullable: true },
      last_sent_id: { type: 'string', nullable: true },
      device: { type: 'string', nullable: true },
    },
    required: ['username'],
  };
  export const validate = ajv.compile(JSON);
}

export interface IFetchMessagesResponse {
  date: string;
  received_messages: IExternalMessage[];
  sent_messages: IExternalMessage[];
}

export interface IPushTokenReportRequest {
  username: string;
  password: string;
  selector: string;
  token_msgs?: string;
  appid_msgs?: string;
  token_calls?: string;
  appid_calls?: string;
}
export namespace IPushTokenReportRequest {
  export const JSON: JSONSchemaType<IPushTokenReportRequest> = {
    type: 'object',
    properties: {
      username: { type: 'string' },
      password: { type: 'string' },
      selector: { type: 'string' },
      token_msgs: { type: 'string', nullable: true },
      appid_msgs: { type: 'string', nullable: true },
      token_calls: { type: 'string', nullable: true },
      appid_calls: { type: 'string', nullable: true },
    },
    required: ['username', 'password', 'selector'],
  };
  export const validate = ajv.compile(JSON);
}
