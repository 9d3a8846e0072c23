export class HostPulseError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HostPulseError';
    this.code = code;
  }
}

export class ConfigValidationError extends HostPulseError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * A host read for one sub-metric failed. The cycle degrades that field and continues.
 */
export class CollectionError extends HostPulseError {
  public readonly metric: string;

  constructor(metric: string, cause: unknown) {
    super(`Failed to collect ${metric}: ${describeCause(cause)}`, 'COLLECTION_ERROR', { cause });
    this.name = 'CollectionError';
    this.metric = metric;
  }
}

export class InconsistentCounterShapeError extends HostPulseError {
  public readonly previousLength: number;
  public readonly currentLength: number;

  constructor(previousLength: number, currentLength: number) {
    super(
      `CPU tick vector changed shape: ${previousLength} -> ${currentLength}`,
      'INCONSISTENT_COUNTER_SHAPE',
    );
    this.name = 'InconsistentCounterShapeError';
    this.previousLength = previousLength;
    this.currentLength = currentLength;
  }
}

export class ProcessGoneError extends HostPulseError {
  public readonly pid: number;

  constructor(pid: number, cause?: unknown) {
    super(`Process ${pid} could not be read`, 'PROCESS_GONE', { cause });
    this.name = 'ProcessGoneError';
    this.pid = pid;
  }
}

export class PublishError extends HostPulseError {
  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'PublishError';
  }
}

export class BadStatusError extends PublishError {
  public readonly status: number;

  constructor(status: number) {
    super(`Backend responded with status ${status}`, 'PUBLISH_BAD_STATUS');
    this.name = 'BadStatusError';
    this.status = status;
  }
}

export class TransportError extends PublishError {
  public readonly timedOut: boolean;

  constructor(cause: unknown, timedOut: boolean = false) {
    super(
      timedOut ? 'Request to backend timed out' : `Request to backend failed: ${describeCause(cause)}`,
      'PUBLISH_TRANSPORT',
      { cause },
    );
    this.name = 'TransportError';
    this.timedOut = timedOut;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
