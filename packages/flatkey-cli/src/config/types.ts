/**
 * Configuration types for the flatkey command line.
 */

import { FlattenMode, PrintMode } from 'flatkey';

/**
 * Full CLI configuration.
 */
export interface FlatkeyConfig {
  /** Descend into arrays (normal) or store them whole (keep-arrays) */
  flattenMode: FlattenMode;
  /** Escape policy name: default, all-slashes, all-unicodes or all */
  escapePolicy: string;
  /** Joins member names in keys */
  separator: string;
  /** Opens array indices and fenced names */
  leftBracket: string;
  /** Closes array indices and fenced names */
  rightBracket: string;
  /** Layout of the printed JSON */
  printMode: PrintMode;
  /** Defer parsing until the first flatten */
  lazy: boolean;
}

export type PartialFlatkeyConfig = Partial<FlatkeyConfig>;

export const DEFAULT_CONFIG: FlatkeyConfig = {
  flattenMode: FlattenMode.NORMAL,
  escapePolicy: 'default',
  separator: '.',
  leftBracket: '[',
  rightBracket: ']',
  printMode: PrintMode.MINIMAL,
  lazy: false,
};
