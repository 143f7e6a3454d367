/**
 * Error types
 */

import type { ZodIssue } from 'zod';
import type { NodeKind } from './ast-types.js';
import { DomErrorCode } from './parser-interfaces.js';

/**
 * Base class of every error the library raises
 */
export class MarkdownDomError extends Error {
  constructor(message: string, readonly code: DomErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No node class is registered for the kind */
export class UnknownKindError extends MarkdownDomError {
  constructor(readonly kind: unknown) {
    super(`No node class registered for kind ${String(kind)}`, DomErrorCode.UNKNOWN_KIND);
  }
}

/** Details do not match the kind's vocabulary */
export class MalformedDetailsError extends MarkdownDomError {
  constructor(readonly kind: NodeKind, readonly issues: readonly ZodIssue[]) {
    const summary = issues
      .map(issue => (issue.path.length ? `${issue.path.join('.')}: ` : '') + issue.message)
      .join('; ');
    super(`Malformed details for ${kind}: ${summary}`, DomErrorCode.MALFORMED_DETAILS);
  }
}

/** Text and binary content mixed in one tree */
export class EncodingMismatchError extends MarkdownDomError {
  constructor(message: string) {
    super(message, DomErrorCode.ENCODING_MISMATCH);
  }
}

/** A leave event with nothing open, or events left open at the end */
export class UnbalancedEventError extends MarkdownDomError {
  constructor(message: string) {
    super(message, DomErrorCode.UNBALANCED_EVENTS);
  }
}

/** A leave event for a kind other than the innermost open node (strict nesting only) */
export class MismatchedCloseError extends MarkdownDomError {
  constructor(readonly expected: NodeKind, readonly actual: NodeKind) {
    super(`Leave event for ${actual} while ${expected} is open`, DomErrorCode.MISMATCHED_CLOSE);
  }
}

/** A child added under a node that cannot hold children */
export class InvalidNestingError extends MarkdownDomError {
  constructor(readonly parentKind: NodeKind, readonly childKind: NodeKind) {
    super(`${parentKind} cannot contain ${childKind}`, DomErrorCode.INVALID_NESTING);
  }
}

export class ReentrantParseError extends MarkdownDomError {
  constructor() {
    super('Parser is already running; use a separate instance per parse', DomErrorCode.REENTRANT_PARSE);
  }
}

/** The engine failed for a reason outside this library */
export class ParseError extends MarkdownDomError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, DomErrorCode.PARSE_FAILED, options);
  }
}

/**
 * Thrown from a callback to end the parse early.
 * Engines catch it and return false.
 */
export class StopParsing extends Error {
  constructor() {
    super('Parsing stopped');
    this.name = 'StopParsing';
  }
}
