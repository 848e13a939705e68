import { expect } from 'chai';

import { TtlCache } from '../src/cache';
import { WireError } from '../src/error';
import { IdentityMappingStore } from '../src/mapping';
import { DirectRoomManager, OtherParticipantResolver, pairKey, parsePairKey } from '../src/rooms';
import { FakeWire, rejection } from './fakes';

describe('pairKey', () => {
  it('is order independent and normalized', () => {
    expect(pairKey('@Alice:srv', '@bob:other')).to.equal('alice|bob');
    expect(pairKey('@bob:other', '@Alice:srv')).to.equal('alice|bob');
  });

  it('parses back into both sides', () => {
    expect(parsePairKey('#alice|bob:srv')).to.deep.equal(['alice', 'bob']);
    expect(parsePairKey('#general:srv')).to.equal(null);
  });
});

describe('DirectRoomManager', () => {
  let wire: FakeWire;

  const manager = (ttl = 60 * 1000) => new DirectRoomManager(wire, new TtlCache<string>({ ttl }));

  beforeEach(() => {
    wire = new FakeWire();
  });

  it('creates the room once and finds it in either order', async () => {
    const rooms = manager();
    const first = await rooms.ensureRoom('@alice:srv', '@bob:srv');
    const second = await rooms.ensureRoom('@bob:srv', '@alice:srv');

    expect(first).to.equal('!r1:srv');
    expect(second).to.equal('!r1:srv');
    expect(wire.count('createDirectRoom')).to.equal(1);
    expect(wire.argsOf('createDirectRoom')).to.deep.equal([['@alice:srv', '@bob:srv', 'alice|bob']]);
    expect(wire.argsOf('joinRoom')).to.deep.equal([['@bob:srv', '!r1:srv']]);
  });

  it('answers from the cache after the first call', async () => {
    const rooms = manager();
    await rooms.ensureRoom('@alice:srv', '@bob:srv');
    await rooms.ensureRoom('@bob:srv', '@alice:srv');
    expect(wire.count('resolveAlias')).to.equal(1);
  });

  it('finds the room through its alias when caching is off', async () => {
    const rooms = manager(0);
    await rooms.ensureRoom('@alice:srv', '@bob:srv');
    const again = await rooms.ensureRoom('@bob:srv', '@alice:srv');

    expect(again).to.equal('!r1:srv');
    expect(wire.count('resolveAlias')).to.equal(2);
    expect(wire.count('createDirectRoom')).to.equal(1);
  });

  it('makes one room for concurrent first calls', async () => {
    const rooms = manager();
    const results = await Promise.all([
      rooms.ensureRoom('@alice:srv', '@bob:srv'),
      rooms.ensureRoom('@bob:srv', '@alice:srv'),
      rooms.ensureRoom('@alice:srv', '@bob:srv'),
    ]);

    expect(results).to.deep.equal(['!r1:srv', '!r1:srv', '!r1:srv']);
    expect(wire.count('createDirectRoom')).to.equal(1);
  });

  it('treats an alias taken by another instance as success', async () => {
    // Two managers stand in for two bridge processes sharing a homeserver
    const [a, b] = await Promise.all([
      manager().ensureRoom('@alice:srv', '@bob:srv'),
      manager().ensureRoom('@bob:srv', '@alice:srv'),
    ]);

    expect(a).to.equal('!r1:srv');
    expect(b).to.equal('!r1:srv');
    expect(wire.aliases.size).to.equal(1);
    expect(wire.count('resolveAlias')).to.equal(3);
  });

  it('fails when the invitee cannot join', async () => {
    const failure = new WireError('M_FORBIDDEN: not allowed', 'M_FORBIDDEN', 403);
    wire.joinFailures.set('@bob:srv', failure);

    const err = await rejection(manager().ensureRoom('@alice:srv', '@bob:srv'));
    expect(err).to.equal(failure);
  });

  it('passes other creation failures through unchanged', async () => {
    const failure = new WireError('M_LIMIT_EXCEEDED: slow down', 'M_LIMIT_EXCEEDED', 429);
    wire.createFailure = failure;

    const err = await rejection(manager().ensureRoom('@alice:srv', '@bob:srv'));
    expect(err).to.equal(failure);
    expect(wire.count('joinRoom')).to.equal(0);
  });

  it('finishes the room for later callers when the first one gives up', async () => {
    const controller = new AbortController();
    const create = wire.createDirectRoom.bind(wire);
    wire.createDirectRoom = async (as, invitee, alias) => {
      const room = await create(as, invitee, alias);
      controller.abort(new Error('client went away'));
      return room;
    };
    const rooms = manager();

    const err = await rejection(rooms.ensureRoom('@alice:srv', '@bob:srv', controller.signal));
    const again = await rooms.ensureRoom('@alice:srv', '@bob:srv');

    expect(err).to.be.instanceOf(Error).with.property('message', 'client went away');
    expect(again).to.equal('!r1:srv');
    expect(wire.members.get('!r1:srv')).to.deep.equal(['@alice:srv', '@bob:srv']);
    expect(wire.count('createDirectRoom')).to.equal(1);
  });

  it('joins the invitee to a room left behind by a failed join', async () => {
    const rooms = manager();
    wire.joinFailures.set('@bob:srv', new WireError('M_UNKNOWN: try later', 'M_UNKNOWN', 500));
    await rejection(rooms.ensureRoom('@alice:srv', '@bob:srv'));

    wire.joinFailures.clear();
    const room = await rooms.ensureRoom('@alice:srv', '@bob:srv');

    expect(room).to.equal('!r1:srv');
    expect(wire.count('createDirectRoom')).to.equal(1);
    expect(wire.count('resolveAlias')).to.equal(2);
    expect(wire.argsOf('joinRoom')).to.deep.equal([['@bob:srv', '!r1:srv'], ['@bob:srv', '!r1:srv']]);
    expect(wire.members.get('!r1:srv')).to.deep.equal(['@alice:srv', '@bob:srv']);
  });

  it('keeps serving other callers when one of them aborts', async () => {
    const rooms = manager();
    const controller = new AbortController();

    const first = rooms.ensureRoom('@alice:srv', '@bob:srv', controller.signal);
    const second = rooms.ensureRoom('@bob:srv', '@alice:srv');
    controller.abort(new Error('client A went away'));

    const err = await rejection(first);
    expect(err).to.be.instanceOf(Error).with.property('message', 'client A went away');
    expect(await second).to.equal('!r1:srv');
    expect(wire.count('createDirectRoom')).to.equal(1);
  });

  it('stops before calling the homeserver once aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('gone'));

    const err = await rejection(manager().ensureRoom('@alice:srv', '@bob:srv', controller.signal));
    expect(err).to.be.instanceOf(Error).with.property('message', 'gone');
    expect(wire.calls).to.deep.equal([]);
  });
});

describe('OtherParticipantResolver', () => {
  let wire: FakeWire;
  let mappings: IdentityMappingStore;
  let resolver: OtherParticipantResolver;

  beforeEach(() => {
    wire = new FakeWire();
    mappings = new IdentityMappingStore();
    mappings.upsert({ number: '201', matrixID: '@alice:srv' });
    mappings.upsert({ number: '202', matrixID: '@bob:srv', altNumbers: ['91202'] });
    resolver = new OtherParticipantResolver(
      wire,
      mappings,
      new TtlCache<string[]>({ ttl: 60 * 1000 }),
      new TtlCache<string>({ ttl: 60 * 1000 }),
    );
  });

  it('reads the other side from the pair key alias', async () => {
    wire.roomAliases.set('!r1:srv', ['#alice|bob:srv']);

    expect(await resolver.resolve('!r1:srv', '@alice:srv')).to.equal('202');
    expect(await resolver.resolve('!r1:srv', '@bob:srv')).to.equal('201');
  });

  it('caches the answer per room and viewer', async () => {
    wire.roomAliases.set('!r1:srv', ['#alice|bob:srv']);

    await resolver.resolve('!r1:srv', '@alice:srv');
    await resolver.resolve('!r1:srv', '@alice:srv');
    expect(wire.count('getRoomAliases')).to.equal(1);
  });

  it('shows the bare localpart of an unmapped user', async () => {
    wire.roomAliases.set('!r1:srv', ['#alice|zed:srv']);
    expect(await resolver.resolve('!r1:srv', '@alice:srv')).to.equal('zed');
  });

  it('falls back to the joined members for rooms without a pair key alias', async () => {
    wire.roomAliases.set('!m1:srv', ['#lobby:srv']);
    wire.members.set('!m1:srv', ['@alice:srv', '@bob:srv']);

    expect(await resolver.resolve('!m1:srv', '@alice:srv')).to.equal('202');
  });

  it('returns null when nobody else is in the room', async () => {
    wire.members.set('!m2:srv', ['@alice:srv']);

    expect(await resolver.resolve('!m2:srv', '@alice:srv')).to.equal(null);
    expect(await resolver.resolve('!m2:srv', '@alice:srv')).to.equal(null);
    expect(wire.count('getJoinedMembers')).to.equal(2);
  });
});
