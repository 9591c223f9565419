import { FailureStatusCode, HttpStatusCode } from './http-status';

/**
 * Base class for expected failures of the provision and deletion workflows.
 * Carries the HTTP class the failure is reported with.
 */
export abstract class ProvisionApiError extends Error {
  abstract readonly status: FailureStatusCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bad or missing input, or a worker join that fails the token check. */
export class ValidationError extends ProvisionApiError {
  readonly status = HttpStatusCode.BadRequest;
}

/** A transient file could not be created, written or closed. */
export class StagingError extends ProvisionApiError {
  readonly status = HttpStatusCode.InternalServerError;
}

/** Ignite sub-commands the adapter runs. */
export type IgniteAction = 'run' | 'ps' | 'stop' | 'rm';

export interface ProvisionerErrorDetails {
  action: IgniteAction;
  stdout?: string;
  stderr?: string;
  /** Exit code, or null when the process was killed by a signal or never started. */
  exitCode?: number | null;
  cause?: unknown;
}

/** The Ignite CLI exited non-zero or could not be launched. */
export class ProvisionerError extends ProvisionApiError {
  readonly status = HttpStatusCode.InternalServerError;
  readonly action: IgniteAction;
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number | null;

  constructor(message: string, details: ProvisionerErrorDetails) {
    super(message, { cause: details.cause });
    this.action = details.action;
    this.stdout = details.stdout ?? '';
    this.stderr = details.stderr ?? '';
    this.exitCode = details.exitCode ?? null;
  }
}

/** `ignite ps` output had no usable line for the node. */
export class IpNotFoundError extends ProvisionApiError {
  readonly status = HttpStatusCode.InternalServerError;

  constructor(readonly nodeName: string) {
    super(`IP address for node '${nodeName}' not found`);
  }
}

/** The ledger file could not be read or appended to. */
export class StoreError extends ProvisionApiError {
  readonly status = HttpStatusCode.InternalServerError;
}

/** Message of an unknown thrown value, for wrapping into a domain error. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
