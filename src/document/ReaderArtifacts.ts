/**
 * Cleanup for Markdown produced by web-page readers before it is planned.
 */

const EMPTY_ANCHOR = /\[]\(https?:\/\/[^)]+\)\s*/g;
const DOUBLE_FENCE = /^(`{6,}|~{6,})$/gm;

/**
 * Drops empty-label anchors such as `[](https://host/#section)` and splits a
 * doubled fence line (a closing and an opening fence glued together) in two.
 */
export function cleanReaderArtifacts(content: string): string {
  return content
    .replace(EMPTY_ANCHOR, '')
    .replace(DOUBLE_FENCE, (run: string): string => {
      const half = run.slice(0, Math.floor(run.length / 2));
      return `${half}\n${half}`;
    });
}
