/**
 * Result builders for the inline dispatch engine.
 *
 * A builder is owned by exactly one engine call and collects literal text
 * chunks and nested elements in input order. Nothing it holds is visible
 * before `result()`.
 */

import { isPlainText, text, templateString } from "./elements.js";
import type { Retraction, Span, TemplateSpan } from "./elements.js";

export interface ResultBuilder<Elem, To> {
  /** Wrap a literal text chunk as an element. */
  fromString(str: string): Elem;
  append(item: Elem): void;
  result(): To;
}

/**
 * Produces a list of spans. The last element is held back in a pending
 * slot so that adjacent plain text can be merged and a retraction can still
 * shorten the preceding text.
 */
export class SpanBuilder implements ResultBuilder<Span, Span[]> {
  private readonly buffer: Span[] = [];
  private pending: Span | undefined;

  fromString(str: string): Span {
    return text(str);
  }

  append(item: Span): void {
    if (item.type === "retraction") {
      this.retract(item);
      return;
    }
    const last = this.pending;
    if (last !== undefined && isPlainText(last) && isPlainText(item)) {
      this.pending = text(last.content + item.content);
      return;
    }
    if (last !== undefined) this.buffer.push(last);
    this.pending = item;
  }

  result(): Span[] {
    if (this.pending !== undefined) {
      this.buffer.push(this.pending);
      this.pending = undefined;
    }
    return [...this.buffer];
  }

  private retract(r: Retraction): void {
    const last = this.pending;
    if (last !== undefined && isPlainText(last) && last.content.length >= r.dropLength) {
      const kept = last.content.slice(0, last.content.length - r.dropLength);
      this.pending = kept === "" ? undefined : text(kept);
      this.append(r.replacement);
    } else {
      this.append(r.fallback);
    }
  }
}

/** Produces a single string; every element is already text. */
export class TextBuilder implements ResultBuilder<string, string> {
  private readonly chunks: string[] = [];

  fromString(str: string): string {
    return str;
  }

  append(item: string): void {
    this.chunks.push(item);
  }

  result(): string {
    return this.chunks.join("");
  }
}

/** Produces template spans, merging adjacent template strings. */
export class TemplateSpanBuilder implements ResultBuilder<TemplateSpan, TemplateSpan[]> {
  private readonly buffer: TemplateSpan[] = [];

  fromString(str: string): TemplateSpan {
    return templateString(str);
  }

  append(item: TemplateSpan): void {
    const last = this.buffer[this.buffer.length - 1];
    if (last !== undefined && last.type === "templateString" && item.type === "templateString") {
      this.buffer[this.buffer.length - 1] = templateString(last.content + item.content);
      return;
    }
    this.buffer.push(item);
  }

  result(): TemplateSpan[] {
    return [...this.buffer];
  }
}
