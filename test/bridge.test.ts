import { expect } from 'chai';

import { Bridge } from '../src/bridge';
import { TtlCache } from '../src/cache';
import { AuthenticationError, InvalidRequestError, InvalidSenderError } from '../src/error';
import { IdentityMappingStore } from '../src/mapping';
import { PushService } from '../src/push';
import { DirectRoomManager, OtherParticipantResolver } from '../src/rooms';
import { SendEngine } from '../src/send';
import { SyncEngine, SyncPositionStore } from '../src/sync';
import { FakeCredentialValidator, FakePushGateway, FakeWire, MemoryPushTokenStore, rejection } from './fakes';

describe('Bridge', () => {
  let wire: FakeWire;
  let mappings: IdentityMappingStore;
  let tokens: MemoryPushTokenStore;
  let credentials: FakeCredentialValidator;
  let bridge: Bridge;

  function makeBridge(validator: FakeCredentialValidator | null): Bridge {
    const ttl = 60 * 1000;
    const participants = new OtherParticipantResolver(
      wire,
      mappings,
      new TtlCache<string[]>({ ttl }),
      new TtlCache<string>({ ttl }),
    );
    return new Bridge({
      wire,
      mappings,
      sender: new SendEngine(
        wire,
        mappings,
        new DirectRoomManager(wire, new TtlCache<string>({ ttl })),
        { fetch: async () => Buffer.from('') },
        async () => null,
      ),
      sync: new SyncEngine(wire, mappings, new SyncPositionStore(), participants),
      push: new PushService(tokens, new FakePushGateway()),
      pushTokens: tokens,
      credentials: validator,
      publicBaseURL: 'https://bridge.example/',
      now: () => new Date('2024-05-01T10:00:00.500Z'),
    });
  }

  beforeEach(() => {
    wire = new FakeWire();
    mappings = new IdentityMappingStore();
    mappings.upsert({ number: '201', matrixID: '@alice:srv' });
    tokens = new MemoryPushTokenStore();
    credentials = new FakeCredentialValidator({
      ok: true,
      mappings: [{ number: '203', matrixID: '@carol:srv' }],
    });
    bridge = makeBridge(credentials);
  });

  describe('fetchMessages', () => {
    it('syncs a mapped user without checking credentials', async () => {
      const resp = await bridge.fetchMessages({ username: '201' });

      expect(resp).to.deep.equal({ date: '2024-05-01T10:00:00Z', received_messages: [], sent_messages: [] });
      expect(wire.argsOf('sync')).to.deep.equal([['@alice:srv', null]]);
      expect(credentials.calls).to.deep.equal([]);
    });

    it('signs in an unknown user and stores the returned mappings', async () => {
      await bridge.fetchMessages({ username: '203', password: 'test-secret' });

      expect(credentials.calls).to.deep.equal([{ username: '203', password: 'test-secret' }]);
      expect(mappings.resolve('203')).to.equal('@carol:srv');
      expect(wire.argsOf('sync')).to.deep.equal([['@carol:srv', null]]);
    });

    it('rejects rejected credentials', async () => {
      credentials.result = { ok: false, reason: 'bad password' };

      const err = await rejection(bridge.fetchMessages({ username: '203', password: 'wrong' }));
      expect(err).to.be.instanceOf(AuthenticationError);
      expect(wire.count('sync')).to.equal(0);
    });

    it('rejects an unknown user without a password', async () => {
      const err = await rejection(bridge.fetchMessages({ username: '203' }));
      expect(err).to.be.instanceOf(AuthenticationError);
      expect(credentials.calls).to.deep.equal([]);
    });

    it('rejects an unknown user when no validator is configured', async () => {
      bridge = makeBridge(null);
      const err = await rejection(bridge.fetchMessages({ username: '203', password: 'test-secret' }));
      expect(err).to.be.instanceOf(AuthenticationError);
    });

    it('passes Matrix IDs through', async () => {
      await bridge.fetchMessages({ username: '@dave:srv' });
      expect(wire.argsOf('sync')).to.deep.equal([['@dave:srv', null]]);
    });
  });

  describe('sendMessage', () => {
    it('rejects an empty sender', async () => {
      const err = await rejection(bridge.sendMessage({ from: ' ', to: '201', body: 'hi' }));
      expect(err).to.be.instanceOf(InvalidSenderError);
    });

    it('sends as the mapped user', async () => {
      mappings.upsert({ number: '202', matrixID: '@bob:srv' });
      const result = await bridge.sendMessage({ from: '201', to: '202', body: 'hi' });

      expect(result.messageId).to.equal('$e1');
      expect(wire.sent).to.deep.equal([
        { as: '@alice:srv', room: result.room, content: { msgtype: 'm.text', body: 'hi' } },
      ]);
    });
  });

  describe('reportPushToken', () => {
    const report = {
      username: '201',
      password: 'test-secret',
      selector: 'sel-201',
      token_msgs: 'msg-token',
      appid_msgs: 'com.example.softphone',
    };

    it('saves the tokens and registers a pusher', async () => {
      credentials.result = { ok: true, mappings: [] };
      await bridge.reportPushToken(report);

      expect(tokens.records).to.deep.equal([{
        selector: 'sel-201',
        tokenMsgs: 'msg-token',
        appIdMsgs: 'com.example.softphone',
        tokenCalls: null,
        appIdCalls: null,
        createdAt: new Date(0),
        updatedAt: new Date(0),
      }]);
      expect(wire.pushers).to.deep.equal([{
        as: '@alice:srv',
        pusher: {
          app_id: 'com.example.softphone',
          app_display_name: 'com.example.softphone',
          device_display_name: 'Softphone',
          pushkey: 'msg-token',
          kind: 'http',
          lang: 'en',
          append: false,
          data: { url: 'https://bridge.example/_matrix/push/v1/notify', format: 'event_id_only' },
        },
      }]);
    });

    it('always checks credentials', async () => {
      credentials.result = { ok: false, reason: 'bad password' };
      const err = await rejection(bridge.reportPushToken(report));

      expect(err).to.be.instanceOf(AuthenticationError);
      expect(tokens.records).to.deep.equal([]);
    });

    it('requires a password', async () => {
      const err = await rejection(bridge.reportPushToken({ ...report, password: ' ' }));
      expect(err).to.be.instanceOf(InvalidRequestError);
      expect(credentials.calls).to.deep.equal([]);
    });

    it('skips the pusher without a message token', async () => {
      await bridge.reportPushToken({ ...report, token_msgs: undefined, token_calls: 'call-token' });

      expect(tokens.records.map((r) => r.tokenCalls)).to.deep.equal(['call-token']);
      expect(wire.count('setPusher')).to.equal(0);
    });

    it('keeps the saved tokens when the pusher fails', async () => {
      wire.pusherFailure = new Error('homeserver down');
      await bridge.reportPushToken(report);

      expect(tokens.records).to.have.lengthOf(1);
      expect(wire.count('setPusher')).to.equal(1);
      expect(wire.pushers).to.deep.equal([]);
    });
  });
});
