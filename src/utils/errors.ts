// Error kinds that the monitoring loop logs and counts. None of them stop the loop.
export type MonitorErrorKind = 'source_fetch' | 'malformed_thread' | 'delivery' | 'storage';

export class MonitorError extends Error {
  readonly kind: MonitorErrorKind;

  constructor(kind: MonitorErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class SourceFetchError extends MonitorError {
  readonly status?: number;
  readonly source: string;

  constructor(source: string, message: string, status?: number, options?: { cause?: unknown }) {
    super('source_fetch', message, options);
    this.source = source;
    this.status = status;
  }
}

export class MalformedThreadError extends MonitorError {
  readonly missingFields: string[];

  constructor(threadId: string, missingFields: string[]) {
    super('malformed_thread', `Thread ${threadId} is missing ${missingFields.join(', ')}`);
    this.missingFields = missingFields;
  }
}

export class DeliveryError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('delivery', message, options);
  }
}

export class DuplicateRecordError extends MonitorError {
  readonly threadId: string;

  constructor(threadId: string) {
    super('storage', `Thread ${threadId} has already been stored`);
    this.threadId = threadId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
