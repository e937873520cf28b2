/**
 * line-wrap-config.ts
 * Configuration for the line-wrap indentation verifier.
 */

/**
 * Enforcement mode for continuation lines.
 * - strict: the token must sit exactly at the required column.
 * - minimum: the token must sit at or beyond the required column.
 */
export interface LineWrapConfig {
  /** Extra columns a continuation line needs over the header's base column. */
  wrapIndentWidth: number;
  /** true: exact column match; false: at-least match. */
  strictMode: boolean;
}

export const DEFAULT_LINE_WRAP_CONFIG: Readonly<LineWrapConfig> = {
  wrapIndentWidth: 4,
  strictMode: false,
};
