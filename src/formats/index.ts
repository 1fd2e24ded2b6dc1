import type { FormatWriters } from './types.js';
import { writeXml } from './writeXml.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without touching the filesystem.
 */
export const defaultFormatWriters: FormatWriters = {
  writeXml,
};
