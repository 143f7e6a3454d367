/**
 * Parser Object
 *
 * Base class for event consumers. Every callback is a no-op, so a subclass
 * overrides only the events it cares about.
 */

import type { BlockKind, Payload, SpanKind, TextKind } from './ast-types.js';
import type { BlockDetailsMap, SpanDetailsMap } from './ast-details.js';
import type { ParseCallbacks, ParseEngine } from './parser-interfaces.js';
import { MarkdownDomError, ParseError } from './errors.js';

export abstract class ParserObject implements ParseCallbacks {
  constructor(protected readonly engine: ParseEngine) {}

  enterBlock<K extends BlockKind>(kind: K, details: BlockDetailsMap[K]): void {}

  leaveBlock(kind: BlockKind): void {}

  enterSpan<K extends SpanKind>(kind: K, details: SpanDetailsMap[K]): void {}

  leaveSpan(kind: SpanKind): void {}

  text(kind: TextKind, text: Payload): void {}

  /**
   * Feed a document through the engine into this object's callbacks.
   * Here the result is the engine's completion flag (false when a callback
   * stopped the parse early); subclasses narrow it to what they build.
   */
  parse(markdown: Payload): unknown {
    return this.run(markdown);
  }

  protected run(markdown: Payload): boolean {
    try {
      return this.engine.parse(markdown, this);
    } catch (error) {
      if (error instanceof MarkdownDomError) throw error;
      throw new ParseError(`Parse engine failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }
  }
}
