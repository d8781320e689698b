/**
 * Custom exceptions for asset pipeline operations.
 */

export class FingerprintFailedException extends Error {
  path: string;

  constructor(path: string, message?: string) {
    super(message ?? `Fingerprint failed: ${path}`);
    this.name = "FingerprintFailedException";
    this.path = path;
  }
}

export class ReconcileFailedException extends Error {
  constructor(message?: string) {
    super(message ? `Reconcile failed: ${message}` : "Reconcile failed");
    this.name = "ReconcileFailedException";
  }
}

export class InvalidStageTransitionError extends Error {
  from: string;
  to: string;

  constructor(from: string, to: string) {
    super(`Invalid pipeline stage transition: ${from} -> ${to}`);
    this.name = "InvalidStageTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class ScanRootNotFoundError extends Error {
  constructor(root: string) {
    super(`Directory not found: ${root}`);
    this.name = "ScanRootNotFoundError";
  }
}

export class UnsupportedBackendError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedBackendError";
  }
}
