/**
 * Journey persistence: the state store and the append-only audit log.
 *
 * {@link FileJourneyStore} keeps one directory per user:
 *
 * ```
 * <root>/<user_id>/state.json          current UserState (atomic replace)
 * <root>/<user_id>/transitions.jsonl   StateTransition, one per line
 * <root>/<user_id>/conversation.jsonl  ConversationLogEntry, one per line
 * <root>/<user_id>/artifacts.jsonl     ArtifactRecord, one per line
 * ```
 *
 * Every write has reached the disk when its promise resolves, so a reply
 * sent after the commit never describes state that a crash could lose.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import {
  appendLineDurable,
  resolveWithin,
  safeMkdir,
  safeReadFileIfExists,
  writeFileAtomic,
} from '../utils/safe-fs.js';
import { createSchemaCheck } from '../utils/schema.js';
import {
  createUserState,
  isArtifactKind,
  isJourneyPhase,
  type ArtifactKind,
  type ArtifactRecord,
  type ConversationLogEntry,
  type StateTransition,
  type UserState,
} from './types.js';

/**
 * Error type for journey persistence operations.
 */
export type JourneyPersistenceErrorType =
  | 'parse_error'
  | 'schema_error'
  | 'io_error'
  | 'corruption_error'
  | 'conflict_error';

/**
 * Error thrown by journey stores.
 */
export class JourneyPersistenceError extends Error {
  /** The type of persistence error. */
  public readonly errorType: JourneyPersistenceErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    errorType: JourneyPersistenceErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'JourneyPersistenceError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Durable key-value store of user state records.
 */
export interface StateStore {
  /** Resolves to undefined for an unknown user. */
  get(userId: string): Promise<UserState | undefined>;
  /**
   * Creates and persists the initial record of a new user.
   *
   * @throws JourneyPersistenceError with `conflict_error` if the user exists.
   */
  create(userId: string, now?: Date): Promise<UserState>;
  /**
   * Replaces a user's record. `state.version` must be one more than the
   * stored version.
   *
   * @throws JourneyPersistenceError with `conflict_error` on a version mismatch.
   */
  save(state: UserState): Promise<void>;
}

/**
 * Append-only per-user records.
 */
export interface AuditLog {
  appendTransition(transition: StateTransition): Promise<void>;
  appendConversation(userId: string, entry: ConversationLogEntry): Promise<void>;
  appendArtifact(record: ArtifactRecord): Promise<void>;
  listTransitions(userId: string): Promise<readonly StateTransition[]>;
  listConversation(userId: string): Promise<readonly ConversationLogEntry[]>;
  /** Every stored artifact version, oldest first, optionally of one kind. */
  listArtifacts(userId: string, kind?: ArtifactKind): Promise<readonly ArtifactRecord[]>;
}

/**
 * A store providing both halves of persistence.
 */
export interface JourneyStore extends StateStore, AuditLog {}

/**
 * Current format version of `state.json`.
 */
export const STATE_FILE_VERSION = '1.0.0';

export const USER_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Checks a user id before it is used as a path segment.
 *
 * @throws JourneyPersistenceError with `schema_error` for an invalid id.
 */
export function assertValidUserId(userId: string): void {
  if (!USER_ID_PATTERN.test(userId)) {
    throw new JourneyPersistenceError(`Invalid user id "${userId}"`, 'schema_error', {
      details: 'User ids are 1-128 characters of letters, digits, "_" or "-"',
    });
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function assertNextVersion(state: UserState, stored: UserState | undefined): void {
  const expected = (stored?.version ?? -1) + 1;
  if (state.version !== expected) {
    throw new JourneyPersistenceError(
      `Version conflict for user "${state.user_id}": expected ${String(expected)}, got ${String(state.version)}`,
      'conflict_error'
    );
  }
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

interface StateFile {
  readonly format_version: string;
  readonly persisted_at: string;
  readonly state: unknown;
}

const checkStateFile = createSchemaCheck<StateFile>('state-file');
const checkUserState = createSchemaCheck<UserState>('user-state');

/**
 * Serializes a state record to the `state.json` format.
 */
export function serializeUserState(state: UserState, now: Date = new Date()): string {
  const file: StateFile = {
    format_version: STATE_FILE_VERSION,
    persisted_at: now.toISOString(),
    state,
  };
  return JSON.stringify(file, null, 2);
}

/**
 * Parses and validates the content of a `state.json` file.
 *
 * @throws JourneyPersistenceError describing why the content is unusable.
 */
export function deserializeUserState(json: string): UserState {
  if (json.trim() === '') {
    throw new JourneyPersistenceError('State file is empty', 'corruption_error', {
      details: 'The file exists but contains no data',
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const cause = toError(error);
    throw new JourneyPersistenceError(
      `Failed to parse state JSON: ${cause.message}`,
      'parse_error',
      { cause, details: 'The file does not contain valid JSON' }
    );
  }

  const file = checkStateFile(data);
  if (!file.valid) {
    throw new JourneyPersistenceError('Invalid state file format', 'schema_error', {
      details: file.errors.join('; '),
    });
  }

  const state = checkUserState(file.value.state);
  if (!state.valid) {
    throw new JourneyPersistenceError('Invalid user state', 'schema_error', {
      details: state.errors.join('; '),
    });
  }
  return state.value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTransition(value: unknown): value is StateTransition {
  return (
    isRecord(value) &&
    typeof value['user_id'] === 'string' &&
    isJourneyPhase(value['from_state']) &&
    isJourneyPhase(value['to_state']) &&
    typeof value['timestamp'] === 'string' &&
    typeof value['accepted'] === 'boolean' &&
    typeof value['reason'] === 'string'
  );
}

function isConversationEntry(value: unknown): value is ConversationLogEntry {
  return (
    isRecord(value) &&
    typeof value['timestamp'] === 'string' &&
    (value['actor'] === 'user' || value['actor'] === 'agent') &&
    typeof value['kind'] === 'string' &&
    typeof value['payload'] === 'string' &&
    isJourneyPhase(value['state_at_time'])
  );
}

function isArtifactRecord(value: unknown): value is ArtifactRecord {
  return (
    isRecord(value) &&
    typeof value['artifact_id'] === 'string' &&
    typeof value['user_id'] === 'string' &&
    isArtifactKind(value['kind']) &&
    typeof value['version'] === 'number' &&
    typeof value['revision_cycle'] === 'number' &&
    typeof value['created_at'] === 'string' &&
    'content' in value
  );
}

/**
 * Parses a JSONL log, checking every record.
 *
 * @throws JourneyPersistenceError with `corruption_error` naming the first bad line.
 */
export function parseJsonLines<T>(
  content: string,
  guard: (value: unknown) => value is T,
  label: string
): T[] {
  const records: T[] = [];
  const lines = content.split('\n');
  for (const [index, line] of lines.entries()) {
    if (line.trim() === '') {
      continue;
    }
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      throw new JourneyPersistenceError(
        `Corrupt ${label} log at line ${String(index + 1)}`,
        'corruption_error',
        { cause: toError(error) }
      );
    }
    if (!guard(value)) {
      throw new JourneyPersistenceError(
        `Corrupt ${label} log at line ${String(index + 1)}: unexpected record shape`,
        'corruption_error'
      );
    }
    records.push(value);
  }
  return records;
}

// ---------------------------------------------------------------------------
// File store
// ---------------------------------------------------------------------------

const STATE_FILE = 'state.json';
const TRANSITIONS_FILE = 'transitions.jsonl';
const CONVERSATION_FILE = 'conversation.jsonl';
const ARTIFACTS_FILE = 'artifacts.jsonl';

/**
 * Journey store on the local filesystem.
 *
 * Callers serialize writes per user (the orchestrator holds a per-user lock);
 * the store itself does not lock.
 *
 * @example
 * ```typescript
 * const store = new FileJourneyStore('.waypoint/users');
 * const state = (await store.get('user_42')) ?? (await store.create('user_42'));
 * ```
 */
export class FileJourneyStore implements JourneyStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  /**
   * Directory holding a user's files.
   */
  userDir(userId: string): string {
    assertValidUserId(userId);
    return resolveWithin(this.root, userId);
  }

  async get(userId: string): Promise<UserState | undefined> {
    const filePath = path.join(this.userDir(userId), STATE_FILE);
    const content = await this.io(`read state of "${userId}"`, () =>
      safeReadFileIfExists(filePath)
    );
    if (content === undefined) {
      return undefined;
    }
    try {
      return deserializeUserState(content);
    } catch (error) {
      if (error instanceof JourneyPersistenceError) {
        throw new JourneyPersistenceError(
          `Error loading state from "${filePath}": ${error.message}`,
          error.errorType,
          { cause: error.cause, details: error.details }
        );
      }
      throw error;
    }
  }

  async create(userId: string, now: Date = new Date()): Promise<UserState> {
    const existing = await this.get(userId);
    if (existing !== undefined) {
      throw new JourneyPersistenceError(`User "${userId}" already exists`, 'conflict_error');
    }
    const state = createUserState(userId, now);
    await this.writeState(state, now);
    return state;
  }

  async save(state: UserState): Promise<void> {
    assertNextVersion(state, await this.get(state.user_id));
    await this.writeState(state, new Date());
  }

  async appendTransition(transition: StateTransition): Promise<void> {
    await this.append(transition.user_id, TRANSITIONS_FILE, transition);
  }

  async appendConversation(userId: string, entry: ConversationLogEntry): Promise<void> {
    await this.append(userId, CONVERSATION_FILE, entry);
  }

  async appendArtifact(record: ArtifactRecord): Promise<void> {
    await this.append(record.user_id, ARTIFACTS_FILE, record);
  }

  async listTransitions(userId: string): Promise<readonly StateTransition[]> {
    return parseJsonLines(await this.readLog(userId, TRANSITIONS_FILE), isTransition, 'transition');
  }

  async listConversation(userId: string): Promise<readonly ConversationLogEntry[]> {
    return parseJsonLines(
      await this.readLog(userId, CONVERSATION_FILE),
      isConversationEntry,
      'conversation'
    );
  }

  async listArtifacts(userId: string, kind?: ArtifactKind): Promise<readonly ArtifactRecord[]> {
    const records = parseJsonLines(
      await this.readLog(userId, ARTIFACTS_FILE),
      isArtifactRecord,
      'artifact'
    );
    return kind === undefined ? records : records.filter((record) => record.kind === kind);
  }

  private async writeState(state: UserState, now: Date): Promise<void> {
    const dir = this.userDir(state.user_id);
    await this.io(`write state of "${state.user_id}"`, async () => {
      await safeMkdir(dir);
      await writeFileAtomic(path.join(dir, STATE_FILE), serializeUserState(state, now));
    });
  }

  private async append(userId: string, fileName: string, record: object): Promise<void> {
    const dir = this.userDir(userId);
    await this.io(`append to ${fileName} of "${userId}"`, async () => {
      await safeMkdir(dir);
      await appendLineDurable(path.join(dir, fileName), JSON.stringify(record));
    });
  }

  private async readLog(userId: string, fileName: string): Promise<string> {
    const filePath = path.join(this.userDir(userId), fileName);
    const content = await this.io(`read ${fileName} of "${userId}"`, () =>
      safeReadFileIfExists(filePath)
    );
    return content ?? '';
  }

  private async io<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof JourneyPersistenceError) {
        throw error;
      }
      const cause = toError(error);
      throw new JourneyPersistenceError(`Failed to ${action}: ${cause.message}`, 'io_error', {
        cause,
      });
    }
  }
}

// ---------------------------------------------------------------------------
// In-memory store
// ---------------------------------------------------------------------------

interface UserRecords {
  state: UserState | undefined;
  readonly transitions: StateTransition[];
  readonly conversation: ConversationLogEntry[];
  readonly artifacts: ArtifactRecord[];
}

/**
 * Journey store held in process memory. Records are copied on the way in and
 * out so callers never share references with the store.
 */
export class InMemoryJourneyStore implements JourneyStore {
  private readonly users = new Map<string, UserRecords>();

  async get(userId: string): Promise<UserState | undefined> {
    assertValidUserId(userId);
    const state = this.users.get(userId)?.state;
    return state === undefined ? undefined : structuredClone(state);
  }

  async create(userId: string, now: Date = new Date()): Promise<UserState> {
    assertValidUserId(userId);
    const records = this.records(userId);
    if (records.state !== undefined) {
      throw new JourneyPersistenceError(`User "${userId}" already exists`, 'conflict_error');
    }
    const state = createUserState(userId, now);
    records.state = structuredClone(state);
    return state;
  }

  async save(state: UserState): Promise<void> {
    assertValidUserId(state.user_id);
    const records = this.records(state.user_id);
    assertNextVersion(state, records.state);
    records.state = structuredClone(state);
  }

  async appendTransition(transition: StateTransition): Promise<void> {
    this.records(transition.user_id).transitions.push(structuredClone(transition));
  }

  async appendConversation(userId: string, entry: ConversationLogEntry): Promise<void> {
    this.records(userId).conversation.push(structuredClone(entry));
  }

  async appendArtifact(record: ArtifactRecord): Promise<void> {
    this.records(record.user_id).artifacts.push(structuredClone(record));
  }

  async listTransitions(userId: string): Promise<readonly StateTransition[]> {
    return structuredClone(this.users.get(userId)?.transitions ?? []);
  }

  async listConversation(userId: string): Promise<readonly ConversationLogEntry[]> {
    return structuredClone(this.users.get(userId)?.conversation ?? []);
  }

  async listArtifacts(userId: string, kind?: ArtifactKind): Promise<readonly ArtifactRecord[]> {
    const records = this.users.get(userId)?.artifacts ?? [];
    return structuredClone(kind === undefined ? records : records.filter((r) => r.kind === kind));
  }

  private records(userId: string): UserRecords {
    let records = this.users.get(userId);
    if (records === undefined) {
      records = { state: undefined, transitions: [], conversation: [], artifacts: [] };
      this.users.set(userId, records);
    }
    return records;
  }
}
