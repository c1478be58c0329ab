/**
 * Emitter module types
 */

/**
 * One generated file, identified by its path relative to the output root
 */
export interface EmissionUnit {
  path: string;
  code: string;
}

export interface WriteResult {
  written: number;
  destination: string;
  paths: string[];
}
