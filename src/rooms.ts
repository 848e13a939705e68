import { TtlCache } from './cache';
import { IdentityMappingStore, normalizeLocalpart } from './mapping';
import { IWireClient } from './wire';
import { WireError } from './error';
import { getLogger } from './log';

const log = getLogger('rooms');

const PAIR_SEPARATOR = '|';

/**
 * Computes the order-independent key for a conversation between two users.
 * It doubles as the localpart of the room's alias.
 */
export function pairKey(a: string, b: string): string {
  return [normalizeLocalpart(a), normalizeLocalpart(b)].sort().join(PAIR_SEPARATOR);
}

/**
 * Splits an alias following the pair key convention into its two localparts.
 * @returns The two sides, or `null` if the alias isn't a pair key.
 */
export function parsePairKey(alias: string): [string, string] | null {
  const parts = normalizeLocalpart(alias).split(PAIR_SEPARATOR);
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return null;
  }
  return [parts[0], parts[1]];
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal && signal.aborted) {
    throw abortReason(signal);
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Operation aborted');
}

/**
 * Waits for `work` unless `signal` aborts first. The work itself carries on.
 */
export function untilAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return work;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (e) => {
        signal.removeEventListener('abort', onAbort);
        reject(e);
      },
    );
  });
}

/**
 * Finds or creates the one direct room for each pair of users.
 *
 * The homeserver's alias registry decides which room is canonical; the cache
 * only saves alias lookups. A room is cached once its invitee has joined.
 */
export class DirectRoomManager {
  protected readonly in_flight = new Map<string, Promise<string>>();

  constructor(
    protected readonly wire: IWireClient,
    protected readonly cache: TtlCache<string>,
  ) {}

  /**
   * Returns the direct room of `a` and `b`, creating it as `a` if it doesn't
   * exist yet. `b` is always joined to the room before this returns.
   *
   * Aborting `signal` only stops this caller from waiting: the lookup is
   * shared with other callers for the same pair and runs to completion.
   */
  async ensureRoom(a: string, b: string, signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal);
    const key = pairKey(a, b);

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    let pending = this.in_flight.get(key);
    if (!pending) {
      const started = this.discoverOrCreate(key, a, b);
      pending = started;
      this.in_flight.set(key, started);
      started
        .finally(() => {
          if (this.in_flight.get(key) === started) {
            this.in_flight.delete(key);
          }
        })
        .catch((e) => log.debug(`Room lookup for ${key} failed: ${e}`));
    }
    return untilAborted(pending, signal);
  }

  protected async discoverOrCreate(key: string, a: string, b: string): Promise<string> {
    let room = await this.wire.resolveAlias(key);
    if (room) {
      log.debug(`Found existing room ${room} for ${key}`);
    } else {
      room = await this.create(key, a, b);
    }

    await this.wire.joinRoom(b, room);
    this.cache.set(key, room);
    return room;
  }

  protected async create(key: string, a: string, b: string): Promise<string> {
    try {
      const room = await this.wire.createDirectRoom(a, b, key);
      log.info(`Created room ${room} for ${key}`);
      return room;
    } catch (e) {
      if (!(e instanceof WireError && e.hasCode('M_ROOM_IN_USE'))) {
        throw e;
      }
      log.debug(`Alias for ${key} was taken concurrently, resolving again`);
      const winner = await this.wire.resolveAlias(key);
      if (!winner) {
        throw e;
      }
      return winner;
    }
  }
}

/**
 * Works out who a user is talking to in a direct room, for display.
 */
export class OtherParticipantResolver {
  constructor(
    protected readonly wire: IWireClient,
    protected readonly mappings: IdentityMappingStore,
    protected readonly aliases: TtlCache<string[]>,
    protected readonly answers: TtlCache<string>,
  ) {}

  /**
   * Returns the display identifier of the member of `room` that isn't
   * `viewer`, or `null` if there's no such member.
   */
  async resolve(room: string, viewer: string, signal?: AbortSignal): Promise<string | null> {
    const answer_key = `${room}|${viewer.toLowerCase()}`;
    const cached = this.answers.get(answer_key);
    if (cached !== undefined) {
      return cached;
    }

    const answer = await this.fromAliases(room, viewer, signal)
      ?? await this.fromMembers(room, viewer, signal);
    if (answer) {
      this.answers.set(answer_key, answer);
    }
    return answer;
  }

  protected async fromAliases(room: string, viewer: string, signal?: AbortSignal): Promise<string | null> {
    let aliases = this.aliases.get(room);
    if (aliases === undefined) {
      throwIfAborted(signal);
      try {
        aliases = await this.wire.getRoomAliases(viewer, room);
      } catch (e) {
        log.debug(`Could not list aliases of ${room}: ${e}`);
        return null;
      }
      if (aliases.length) {
        this.aliases.set(room, aliases);
      }
    }

    const me = normalizeLocalpart(viewer);
    for (const alias of aliases) {
      const sides = parsePairKey(alias);
      if (!sides || !sides.includes(me)) {
        continue;
      }
      const other = sides[0] === me ? sides[1] : sides[0];
      const entry = this.mappings.findByLocalpart(other);
      if (entry) {
        return entry.number || entry.displayName || entry.matrixID;
      }
      return other;
    }
    return null;
  }

  // Rooms that weren't made by `DirectRoomManager` have no pair key alias
  protected async fromMembers(room: string, viewer: string, signal?: AbortSignal): Promise<string | null> {
    throwIfAborted(signal);
    let members: string[];
    try {
      members = await this.wire.getJoinedMembers(viewer, room);
    } catch (e) {
      log.debug(`Could not list members of ${room}: ${e}`);
      return null;
    }
    const me = viewer.toLowerCase();
    const other = members.find((m) => m.toLowerCase() !== me);
    return other ? this.mappings.reverseResolve(other) : null;
  }
}
