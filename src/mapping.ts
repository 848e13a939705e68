import * as fs from 'fs';
import { JSONSchemaType } from 'ajv';

import ajv from './ajv';
import { getLogger } from './log';
import { InvalidRequestError, MappingNotFoundError } from './error';

const log = getLogger('mapping');

/**
 * One external participant: a canonical number plus the alternate numbers
 * (secondary lines) that resolve to the same Matrix user.
 */
export interface IMappingEntry {
  number: string;
  matrixID: string;
  displayName: string | null;
  altNumbers: string[];
  updatedAt: Date;
}

export interface IMappingInput {
  number: string | number;
  matrixID: string;
  displayName?: string | null;
  altNumbers?: (string | number)[];
}

/**
 * The JSON form of a mapping, used by the admin API and the preload file.
 */
export interface IMappingRequest {
  number: number;
  matrix_id: string;
  display_name?: string;
  sub_numbers?: number[];
}
export namespace IMappingRequest {
  export const JSON: JSONSchemaType<IMappingRequest> = {
    type: 'object',
    properties: {
      number: { type: 'integer' },
      matrix_id: { type: 'string' },
      display_name: { type: 'string', nullable: true },
      sub_numbers: { type: 'array', items: { type: 'integer' }, nullable: true },
    },
    required: ['number', 'matrix_id'],
  };
  export const validate = ajv.compile(JSON);
  export const validateList = ajv.compile<IMappingRequest[]>({
    type: 'array',
    items: JSON,
  });

  export function toInput(req: IMappingRequest): IMappingInput {
    return {
      number: req.number,
      matrixID: req.matrix_id,
      displayName: req.display_name ?? null,
      altNumbers: req.sub_numbers ?? [],
    };
  }
}

export interface IMappingResponse {
  number: string;
  matrix_id: string;
  display_name?: string;
  sub_numbers: string[];
  updated_at: string;
}
export function toMappingResponse(entry: IMappingEntry): IMappingResponse {
  const resp: IMappingResponse = {
    number: entry.number,
    matrix_id: entry.matrixID,
    sub_numbers: [...entry.altNumbers],
    updated_at: entry.updatedAt.toISOString(),
  };
  if (entry.displayName) {
    resp.display_name = entry.displayName;
  }
  return resp;
}

const MXID_RE = /^@[^:\s]+:\S+$/;

/**
 * Checks whether `value` is already a full Matrix user ID (`@local:domain`).
 */
export function isMatrixUserId(value: string): boolean {
  return MXID_RE.test(value);
}

function normalizeNumber(value: string | number | undefined | null): string {
  if (value === undefined || value === null || value === 0) {
    return '';
  }
  return String(value).trim();
}

function copyEntry(entry: IMappingEntry): IMappingEntry {
  return {
    ...entry,
    altNumbers: [...entry.altNumbers],
    updatedAt: new Date(entry.updatedAt.getTime()),
  };
}

/**
 * The table of known number <-> Matrix user associations.
 *
 * The primary map and the alternate-number index are only ever changed
 * together inside a single synchronous call, so no reader can see one updated
 * without the other.
 */
export class IdentityMappingStore {
  /** Canonical number -> entry */
  protected readonly entries = new Map<string, IMappingEntry>();
  /** Alternate number -> canonical number */
  protected readonly alt_index = new Map<string, string>();

  constructor(protected readonly now: () => Date = () => new Date()) {}

  /**
   * Resolves an identifier to a Matrix user ID. Full Matrix IDs are returned
   * unchanged; otherwise the identifier is looked up as a canonical number,
   * then as an alternate number.
   * @returns The Matrix user ID, or `null` if nothing matches.
   */
  resolve(identifier: string): string | null {
    const id = identifier.trim();
    if (isMatrixUserId(id)) {
      return id;
    }

    const entry = this.entries.get(id);
    if (entry && entry.matrixID) {
      log.debug(`Resolved ${id} to ${entry.matrixID}`);
      return entry.matrixID;
    }

    const owner = this.alt_index.get(id);
    const alt_entry = owner === undefined ? undefined : this.entries.get(owner);
    if (alt_entry && alt_entry.matrixID) {
      log.debug(`Resolved alternate number ${id} to ${alt_entry.matrixID}`);
      return alt_entry.matrixID;
    }

    log.debug(`Could not resolve ${id} to a Matrix user`);
    return null;
  }

  /**
   * Finds the identifier to show for a Matrix user: the canonical number of
   * its entry (never an alternate number), else the entry's display name,
   * else the Matrix ID itself.
   */
  reverseResolve(matrixID: string): string {
    const mxid = matrixID.trim();
    const entry = this.findByMatrixId(mxid);
    if (entry) {
      if (entry.number) {
        return entry.number;
      }
      if (entry.displayName) {
        return entry.displayName;
      }
    }
    return mxid;
  }

  /**
   * Finds the entry for a Matrix user, comparing IDs case-insensitively.
   */
  findByMatrixId(matrixID: string): IMappingEntry | null {
    const wanted = matrixID.trim().toLowerCase();
    for (const entry of this.entries.values()) {
      if (entry.matrixID.toLowerCase() === wanted) {
        return copyEntry(entry);
      }
    }
    return null;
  }

  /**
   * Finds the entry whose Matrix user has the given (normalized) localpart.
   */
  findByLocalpart(localpart: string): IMappingEntry | null {
    for (const entry of this.entries.values()) {
      if (normalizeLocalpart(entry.matrixID) === localpart) {
        return copyEntry(entry);
      }
    }
    return null;
  }

  /**
   * Administrative lookup by canonical number, then alternate number.
   * @throws MappingNotFoundError
   */
  lookup(key: string): IMappingEntry {
    const k = key.trim();
    const entry = this.entries.get(k) || this.entries.get(this.alt_index.get(k) ?? '');
    if (!entry) {
      throw new MappingNotFoundError(k);
    }
    return copyEntry(entry);
  }

  list(): IMappingEntry[] {
    return [...this.entries.values()].map(copyEntry);
  }

  /**
   * Stores an entry, replacing any entry with the same canonical number. The
   * old entry's alternate numbers are retracted before the new ones are
   * installed. An alternate number claimed by another entry moves to this one.
   * @throws InvalidRequestError if the canonical number is missing.
   */
  upsert(input: IMappingInput): IMappingEntry {
    const number = normalizeNumber(input.number);
    if (!number) {
      throw new InvalidRequestError('Mapping number is required');
    }
    const alts = [...new Set(
      (input.altNumbers || []).map(normalizeNumber).filter((n) => n && n !== number),
    )];

    const old = this.entries.get(number);
    if (old) {
      for (const alt of old.altNumbers) {
        this.alt_index.delete(alt);
      }
    }

    for (const alt of alts) {
      const prev_owner = this.alt_index.get(alt);
      const prev = prev_owner === undefined ? undefined : this.entries.get(prev_owner);
      if (prev && prev_owner !== number) {
        log.warn(`Alternate number ${alt} moved from ${prev.number} to ${number}`);
        prev.altNumbers = prev.altNumbers.filter((n) => n !== alt);
      }
      this.alt_index.set(alt, number);
    }

    const entry: IMappingEntry = {
      number,
      matrixID: input.matrixID.trim(),
      displayName: input.displayName?.trim() || null,
      altNumbers: alts,
      updatedAt: this.now(),
    };
    this.entries.set(number, entry);
    log.debug(`Stored mapping ${number} -> ${entry.matrixID}`);
    return copyEntry(entry);
  }

  /**
   * Upserts every entry of a batch. Entries that cannot be stored are logged
   * and skipped.
   * @returns The number of entries stored.
   */
  bulkLoad(inputs: IMappingInput[]): number {
    let stored = 0;
    for (const input of inputs) {
      try {
        this.upsert(input);
        stored++;
      } catch (e) {
        log.warn(`Skipping mapping for ${input.matrixID || '(no Matrix ID)'}: ${e}`);
      }
    }
    return stored;
  }

  /**
   * Loads a JSON array of mapping requests from a file into the store.
   */
  loadFile(path: string): number {
    const data: unknown = JSON.parse(fs.readFileSync(path, 'utf8'));
    if (!IMappingRequest.validateList(data)) {
      throw new InvalidRequestError(
        `Invalid mapping file ${path}: ${ajv.errorsText(IMappingRequest.validateList.errors)}`,
      );
    }
    const stored = this.bulkLoad(data.map(IMappingRequest.toInput));
    log.info(`Loaded ${stored} of ${data.length} mappings from ${path}`);
    return stored;
  }
}

/**
 * Reduces a Matrix user ID or room alias to its lowercased localpart:
 * `#Alice|Bob:example.com` -> `alice|bob`.
 */
export function normalizeLocalpart(value: string): string {
  let v = value.trim();
  if (v.startsWith('#') || v.startsWith('@')) {
    v = v.slice(1);
  }
  const colon = v.indexOf(':');
  if (colon !== -1) {
    v = v.slice(0, colon);
  }
  return v.trim().toLowerCase();
}
