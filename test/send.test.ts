import { expect } from 'chai';

import { TtlCache } from '../src/cache';
import { FILE_TRANSFER_CONTENT_TYPE } from '../src/content';
import {
  AuthenticationError,
  InvalidRecipientError,
  InvalidRequestError,
  InvalidSenderError,
  WireError,
} from '../src/error';
import { IdentityMappingStore } from '../src/mapping';
import { DirectRoomManager } from '../src/rooms';
import { correctMimetype, IMediaFetcher, SendEngine } from '../src/send';
import { FakeWire, rejection } from './fakes';

class FakeFetcher implements IMediaFetcher {
  urls: string[] = [];
  failure: Error | null = null;

  constructor(public data = Buffer.from('png-bytes')) {}

  async fetch(url: string): Promise<Buffer> {
    this.urls.push(url);
    if (this.failure) {
      throw this.failure;
    }
    return this.data;
  }
}

function envelope(attachments: object[], body?: string): string {
  return JSON.stringify(body === undefined ? { attachments } : { body, attachments });
}

describe('SendEngine', () => {
  let wire: FakeWire;
  let fetcher: FakeFetcher;
  let sniffed: string | null;
  let engine: SendEngine;

  beforeEach(() => {
    wire = new FakeWire();
    fetcher = new FakeFetcher();
    sniffed = 'image/png';
    const mappings = new IdentityMappingStore();
    mappings.upsert({ number: '201', matrixID: '@alice:srv', altNumbers: ['91201'] });
    mappings.upsert({ number: '202', matrixID: '@bob:srv' });
    const rooms = new DirectRoomManager(wire, new TtlCache<string>({ ttl: 60 * 1000 }));
    engine = new SendEngine(wire, mappings, rooms, fetcher, async () => sniffed);
  });

  it('sends text to the direct room as the sender', async () => {
    const result = await engine.send('91201', '202', 'hello', null);

    expect(result).to.deep.equal({ delivery: 'text', messageId: '$e1', room: '!r1:srv' });
    expect(wire.sent).to.deep.equal([
      { as: '@alice:srv', room: '!r1:srv', content: { msgtype: 'm.text', body: 'hello' } },
    ]);
    expect(wire.argsOf('joinRoom')).to.deep.equal([['@bob:srv', '!r1:srv'], ['@alice:srv', '!r1:srv']]);
  });

  it('uses a room ID recipient as is', async () => {
    await engine.send('201', '!lobby:srv', 'hello', 'text/plain');

    expect(wire.count('createDirectRoom')).to.equal(0);
    expect(wire.argsOf('joinRoom')).to.deep.equal([['@alice:srv', '!lobby:srv']]);
    expect(wire.sent[0].room).to.equal('!lobby:srv');
  });

  it('rejects senders and recipients that resolve to nothing', async () => {
    expect(await rejection(engine.send('999', '202', 'hi', null))).to.be.instanceOf(InvalidSenderError);
    expect(await rejection(engine.send('201', '999', 'hi', null))).to.be.instanceOf(InvalidRecipientError);
    expect(await rejection(engine.send('201', '  ', 'hi', null))).to.be.instanceOf(InvalidRecipientError);
    expect(wire.calls).to.deep.equal([]);
  });

  it('sends an envelope without attachments as its body text', async () => {
    const result = await engine.send('201', '202', envelope([], 'just words'), FILE_TRANSFER_CONTENT_TYPE);

    expect(result.delivery).to.equal('text');
    expect(wire.sent[0].content).to.deep.equal({ msgtype: 'm.text', body: 'just words' });
  });

  it('sends an envelope without an attachment list as text', async () => {
    const result = await engine.send('201', '202', '{"body":"just words"}', FILE_TRANSFER_CONTENT_TYPE);

    expect(result.delivery).to.equal('text');
    expect(wire.sent[0].content).to.deep.equal({ msgtype: 'm.text', body: 'just words' });
  });

  it('rejects a body that is not an envelope', async () => {
    const err = await rejection(engine.send('201', '202', 'not json', FILE_TRANSFER_CONTENT_TYPE));
    expect(err).to.be.instanceOf(InvalidRequestError);
    expect(wire.count('sendMessage')).to.equal(0);
  });

  it('uploads the attachment and sends it as media', async () => {
    const body = envelope([{
      'content-type': 'application/octet-stream',
      'content-url': 'https://files.example/x',
      filename: 'pic',
    }]);

    const result = await engine.send('201', '202', body, FILE_TRANSFER_CONTENT_TYPE);

    expect(result).to.deep.equal({ delivery: 'media', messageId: '$e1', room: '!r1:srv' });
    expect(fetcher.urls).to.deep.equal(['https://files.example/x']);
    expect(wire.argsOf('uploadMedia')).to.deep.equal([['@alice:srv', 'image/png', 'pic']]);
    expect(wire.sent[0].content).to.deep.equal({
      msgtype: 'm.image',
      body: 'pic',
      url: 'mxc://srv/up1',
      filename: 'pic',
      info: { mimetype: 'image/png', size: 9 },
    });
  });

  it('keeps a specific declared type the sniffer does not see as an image', async () => {
    sniffed = 'application/zip';
    const body = envelope([{
      'content-type': 'video/mp4',
      'content-url': 'https://files.example/clip',
      'content-size': 1234,
      preview: { 'content-type': 'image/png', content: 'https://files.example/clip.png' },
    }], 'watch this');

    await engine.send('201', '202', body, FILE_TRANSFER_CONTENT_TYPE);

    expect(wire.sent[0].content).to.deep.equal({
      msgtype: 'm.video',
      body: 'watch this',
      url: 'mxc://srv/up1',
      info: {
        mimetype: 'video/mp4',
        size: 9,
        thumbnail_url: 'https://files.example/clip.png',
        thumbnail_info: { mimetype: 'image/png' },
      },
    });
  });

  it('falls back to text when the download fails', async () => {
    fetcher.failure = new Error('connect ECONNREFUSED');
    const body = envelope([{ 'content-url': 'https://files.example/x' }], 'caption');

    const result = await engine.send('201', '202', body, FILE_TRANSFER_CONTENT_TYPE);

    expect(result).to.deep.equal({
      delivery: 'text-fallback',
      reason: 'Download failed: connect ECONNREFUSED',
      messageId: '$e1',
      room: '!r1:srv',
    });
    expect(wire.sent[0].content).to.deep.equal({ msgtype: 'm.text', body: 'caption' });
  });

  it('falls back to text when the upload fails', async () => {
    wire.uploadFailure = new WireError('M_TOO_LARGE: too big', 'M_TOO_LARGE', 413);
    const body = envelope([{ 'content-url': 'https://files.example/x' }], 'caption');

    const result = await engine.send('201', '202', body, FILE_TRANSFER_CONTENT_TYPE);

    expect(result.delivery).to.equal('text-fallback');
    expect(wire.sent[0].content).to.deep.equal({ msgtype: 'm.text', body: 'caption' });
  });

  it('falls back to text when the attachment has no URL', async () => {
    const body = envelope([{ 'content-url': '' }], 'caption');

    const result = await engine.send('201', '202', body, FILE_TRANSFER_CONTENT_TYPE);

    expect(result.delivery).to.equal('text-fallback');
    expect(fetcher.urls).to.deep.equal([]);
  });

  it('reports rejected access tokens as authentication failures', async () => {
    wire.sendFailure = new WireError('M_UNKNOWN_TOKEN: bad token', 'M_UNKNOWN_TOKEN', 401);

    const err = await rejection(engine.send('201', '202', 'hello', null));
    expect(err).to.be.instanceOf(AuthenticationError);
  });
});

describe('correctMimetype', () => {
  it('prefers a sniffed image type', () => {
    expect(correctMimetype('application/pdf', 'image/jpeg')).to.equal('image/jpeg');
  });

  it('replaces only missing or generic types with other sniffed types', () => {
    expect(correctMimetype('application/octet-stream', 'application/pdf')).to.equal('application/pdf');
    expect(correctMimetype(undefined, 'audio/mpeg')).to.equal('audio/mpeg');
    expect(correctMimetype('audio/ogg', 'application/zip')).to.equal('audio/ogg');
    expect(correctMimetype(undefined, null)).to.equal('application/octet-stream');
  });
});
