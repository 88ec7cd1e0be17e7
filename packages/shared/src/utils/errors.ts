import type { ValidationIssue } from '../types/procedure.js';

export class SinewError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SinewError';
  }
}

export class ValidationError extends SinewError {
  constructor(public readonly issues: ValidationIssue[]) {
    super(`Procedure validation failed: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'ValidationError';
  }
}

export class ConstructionError extends SinewError {
  constructor(message: string) {
    super(`Construction failed: ${message}`);
    this.name = 'ConstructionError';
  }
}

export class StorageError extends SinewError {
  constructor(
    public readonly operation: string,
    public readonly detail: string,
  ) {
    super(`Storage ${operation} failed: ${detail}`);
    this.name = 'StorageError';
  }
}

export class NotFoundError extends SinewError {
  constructor(
    public readonly entityType: string,
    public readonly uuid: string,
  ) {
    super(`${entityType} not found: ${uuid}`);
    this.name = 'NotFoundError';
  }
}

export class ConfigError extends SinewError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
