/**
 * Error taxonomy for the campaign engine. Every error carries a stable `code`
 * so callers can branch without string matching.
 */
export type CampaignErrorCode =
  | 'INVALID_TURN_ORDER'
  | 'COMPRESSION_FAILED'
  | 'INVALID_BEAT_TRANSITION'
  | 'INVALID_ENTITY'
  | 'SCENE_ALREADY_TERMINATED'
  | 'SCHEMA_VERSION_MISMATCH'
  | 'MALFORMED_SAVE'
  | 'MERGE_CONFLICT'
  | 'INVALID_STATE_TRANSITION'
  | 'COLLABORATOR_FAILED';

export abstract class CampaignError extends Error {
  abstract readonly code: CampaignErrorCode;
}

export class InvalidTurnOrder extends CampaignError {
  readonly code = 'INVALID_TURN_ORDER';

  constructor(
    public readonly timestamp: number,
    public readonly lastTimestamp: number
  ) {
    super(`Turn timestamp ${String(timestamp)} is not after the last turn (${String(lastTimestamp)})`);
    this.name = 'InvalidTurnOrder';
  }
}

export class CompressionFailed extends CampaignError {
  readonly code = 'COMPRESSION_FAILED';

  constructor(message: string, cause?: unknown) {
    super(`Compression failed: ${message}`, { cause });
    this.name = 'CompressionFailed';
  }
}

export class InvalidBeatTransition extends CampaignError {
  readonly code = 'INVALID_BEAT_TRANSITION';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidBeatTransition';
  }
}

/** An entity with a blank name, or two entities sharing a name in one collection. */
export class InvalidEntity extends CampaignError {
  readonly code = 'INVALID_ENTITY';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidEntity';
  }
}

export class SceneAlreadyTerminated extends CampaignError {
  readonly code = 'SCENE_ALREADY_TERMINATED';

  constructor(public readonly sceneId: string, status: string) {
    super(`Scene ${sceneId} no longer accepts turns (status: ${status})`);
    this.name = 'SceneAlreadyTerminated';
  }
}

export class SchemaVersionMismatch extends CampaignError {
  readonly code = 'SCHEMA_VERSION_MISMATCH';

  constructor(
    public readonly found: number,
    public readonly supported: number
  ) {
    super(`Save schema version ${String(found)} is newer than supported version ${String(supported)}`);
    this.name = 'SchemaVersionMismatch';
  }
}

export class MalformedSave extends CampaignError {
  readonly code = 'MALFORMED_SAVE';

  constructor(message: string, public readonly line?: number) {
    super(line === undefined ? `Malformed save: ${message}` : `Malformed save (line ${String(line)}): ${message}`);
    this.name = 'MalformedSave';
  }
}

export class MergeConflict extends CampaignError {
  readonly code = 'MERGE_CONFLICT';

  constructor(public readonly sceneId: string, reason: string) {
    super(`Merge of scene ${sceneId} rejected: ${reason}`);
    this.name = 'MergeConflict';
  }
}

export class InvalidStateTransition extends CampaignError {
  readonly code = 'INVALID_STATE_TRANSITION';

  constructor(
    public readonly from: string,
    public readonly action: string
  ) {
    super(`Cannot ${action} while ${from}`);
    this.name = 'InvalidStateTransition';
  }
}

export class CollaboratorError extends CampaignError {
  readonly code = 'COLLABORATOR_FAILED';

  constructor(
    public readonly collaborator: string,
    public readonly retryable: boolean,
    message: string,
    cause?: unknown
  ) {
    super(`${collaborator} failed: ${message}`, { cause });
    this.name = 'CollaboratorError';
  }
}

// HTTP statuses worth offering the player a retry for (network, rate limit, temporary server errors)
const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];
const RETRYABLE_NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT'];

function readField(error: unknown, field: string): unknown {
  if (!error || typeof error !== 'object') return undefined;
  const value: unknown = Reflect.get(error, field);
  return value;
}

export function isRetryableError(error: unknown): boolean {
  if (!error) return false;
  if (error instanceof CollaboratorError) return error.retryable;

  const code = readField(error, 'code');
  if (typeof code === 'string' && RETRYABLE_NETWORK_CODES.includes(code)) return true;

  const status = readField(error, 'status') ?? readField(readField(error, 'response'), 'status');
  return typeof status === 'number' && RETRYABLE_STATUS_CODES.includes(status);
}

/** Wraps any failure from an external collaborator, keeping the original as `cause`. */
export function classifyCollaboratorError(collaborator: string, error: unknown): CollaboratorError {
  if (error instanceof CollaboratorError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CollaboratorError(collaborator, isRetryableError(error), message, error);
}
