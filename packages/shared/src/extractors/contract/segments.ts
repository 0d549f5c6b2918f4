/**
 * Markdown Segment Normalization
 *
 * Document-understanding engines return markdown either as a plain string
 * or as a container object ({ markdown_text } or { markdown }). Everything
 * downstream works on plain strings.
 */

import { UnsupportedSegmentTypeError } from '../../errors';
import type { MarkdownContainer, MarkdownSegment } from '../../types';

/**
 * Plain objects only; arrays, buffers, maps and class instances are not containers.
 */
export function isMarkdownContainer(value: unknown): value is MarkdownContainer {
  if (typeof value !== 'object' || value === null) return false;
  // Compared structurally so plain objects built in another realm still qualify
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || Object.getPrototypeOf(proto) === null;
}

/**
 * Text carried by a single segment, or null for a container without a
 * string under either recognised key.
 */
export function segmentText(segment: unknown): string | null {
  if (typeof segment === 'string') return segment;

  if (isMarkdownContainer(segment)) {
    if (typeof segment.markdown_text === 'string') return segment.markdown_text;
    if (typeof segment.markdown === 'string') return segment.markdown;
    return null;
  }

  throw new UnsupportedSegmentTypeError(segment);
}

/**
 * Flatten segments into plain text blocks, preserving order.
 *
 * @throws UnsupportedSegmentTypeError for anything that is not a string or container
 */
export function normalizeMarkdownSegments(segments: readonly unknown[]): string[] {
  const texts: string[] = [];
  for (const segment of segments) {
    const text = segmentText(segment);
    if (text !== null) {
      texts.push(text);
    }
  }
  return texts;
}

/**
 * Type guard for callers that want to validate a payload up front.
 */
export function isMarkdownSegment(value: unknown): value is MarkdownSegment {
  return typeof value === 'string' || isMarkdownContainer(value);
}
