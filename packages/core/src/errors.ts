// ============================================================================
// @bytepair/core: Error Types
// ============================================================================

import type { Pair, SymbolId } from './types.js';

/**
 * Base error class for all bytepair errors.
 */
export class BpeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BpeError';
  }
}

// ---------------------------------------------------------------------------
// Validation Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a caller-supplied argument or setting is out of range.
 */
export class BpeValidationError extends BpeError {
  public readonly field?: string;
  public readonly reason?: string;
  public readonly value?: unknown;

  constructor(message: string, options?: { field?: string; reason?: string; value?: unknown }) {
    super(message);
    this.name = 'BpeValidationError';
    this.field = options?.field;
    this.reason = options?.reason;
    this.value = options?.value;
  }
}

// ---------------------------------------------------------------------------
// Merge Table Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a merge table breaks its invariants: a duplicated pair,
 * a non-increasing id, or a reference to an id that no earlier entry defines.
 */
export class MalformedMergeTableError extends BpeError {
  public readonly entryIndex: number;
  public readonly pair?: Pair;

  constructor(entryIndex: number, message: string, pair?: Pair) {
    super(`Malformed merge table at entry ${entryIndex}: ${message}`);
    this.name = 'MalformedMergeTableError';
    this.entryIndex = entryIndex;
    this.pair = pair;
  }
}

/**
 * Thrown when a serialized merge table is not valid JSON or has the wrong shape.
 */
export class MergeTableParseError extends BpeError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'MergeTableParseError';
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Decode Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a token id has no vocabulary entry. The stream was produced
 * with a different merge table.
 */
export class UnknownTokenError extends BpeError {
  public readonly id: SymbolId;
  public readonly position: number;

  constructor(id: SymbolId, position: number) {
    super(`Unknown token id ${id} at position ${position}. Was it encoded with another merge table?`);
    this.name = 'UnknownTokenError';
    this.id = id;
    this.position = position;
  }
}

// ---------------------------------------------------------------------------
// Model Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a requested model is not registered.
 */
export class ModelNotFoundError extends BpeError {
  public readonly modelId: string;
  public readonly availableModels: string[];

  constructor(modelId: string, availableModels: string[] = []) {
    super(
      `Model "${modelId}" not found. Available: ${availableModels.slice(0, 10).join(', ')}${availableModels.length > 10 ? '...' : ''}`,
    );
    this.name = 'ModelNotFoundError';
    this.modelId = modelId;
    this.availableModels = availableModels;
  }
}
