export class SyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends SyncError {
  readonly missing: string[];

  constructor(missing: string[], envPath: string) {
    super(`Missing environment variables: ${missing.join(', ')}. Set them in ${envPath}`);
    this.missing = missing;
  }
}

export class SourceQueryError extends SyncError {}

export class TargetConnectionError extends SyncError {}

export class TargetRpcError extends SyncError {
  readonly remoteMessage: string;

  constructor(operation: string, remoteMessage: string) {
    super(`${operation} failed: ${remoteMessage}`);
    this.remoteMessage = remoteMessage;
  }
}

export class AnchorNotFoundError extends SyncError {
  constructor(model: string, description: string) {
    super(`Default anchor not found in ${model}: ${description}`);
  }
}

export class MissingKeyFieldError extends SyncError {
  constructor(model: string, candidates: readonly string[]) {
    super(
      `${model} has no external code field (tried ${candidates.join(', ')}); refusing to match records by label`
    );
  }
}

export class EmptyCodeError extends SyncError {
  constructor(column: string) {
    super(`${column} is empty`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
