/**
 * Repairs for common damage in rewritten text.
 */

import { placeholderPattern } from '../preservation/Placeholder';
import type { RestorationMap } from '../preservation/RestorationMap';

/**
 * Removes placeholder-shaped tokens the restoration map does not know, so a
 * best-effort restore can go ahead.
 */
export function stripUnknownPlaceholders(text: string, map: RestorationMap): string {
  return text.replace(placeholderPattern(), (token: string): string =>
    Object.prototype.hasOwnProperty.call(map, token) ? token : '');
}

/**
 * Removes `<<<` / `>>>` delimiter lines echoed back by the rewriter. A marker glued
 * to a heading leaves the heading in place.
 */
export function stripPromptMarkers(text: string): string {
  return text
    .replace(/^[ \t]*(<<<|>>>)\s*$\n?/gm, '')
    .replace(/^[ \t]*(<<<|>>>)\s*(#+\s*)/gm, '$2');
}

/**
 * Moves a heading that got glued onto a rule, blockquote or list line back onto
 * its own line.
 */
export function fixHeadingCollisions(text: string): string {
  return text
    .replace(/^([=]{3,}|[-]{3,})\s*(#{1,6}\s+)/gm, '$1\n$2')
    .replace(/^(>[^\n]*?)(#{1,6}\s+)/gm, '$1\n$2')
    .replace(/^([ \t]*[-*+]\s+[^\n]*?)(#{1,6}\s+)/gm, '$1\n$2')
    .replace(/^([ \t]*\d+[.)]\s+[^\n]*?)(#{1,6}\s+)/gm, '$1\n$2');
}
