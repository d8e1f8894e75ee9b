/**
 * Type definitions for CLI
 */

import type { MappingOptions } from "@semport/mapper";
import type { EmitterOptions } from "@semport/emitter";

export type { Result } from "@semport/frontend";

/**
 * Configuration file (semport.json)
 */
export type SemportConfig = {
  readonly $schema?: string;
  /** Source documents, relative to the config file */
  readonly sources?: readonly string[];
  readonly outputDirectory?: string;
  readonly rootPackage?: string;
  readonly releaseMethodName?: string;
  readonly releaseGuardName?: string;
  readonly indent?: number;
  /** JSON report path written by `map` */
  readonly report?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  rootPackage?: string;
  releaseMethod?: string;
  report?: string;
};

export type ParsedArgs = {
  readonly command: string;
  readonly files: readonly string[];
  readonly options: CliOptions;
};

/**
 * Combined configuration (from file + CLI args); paths are absolute
 */
export type ResolvedConfig = {
  readonly projectRoot: string;
  readonly sources: readonly string[];
  readonly outputDirectory: string;
  readonly report: string | undefined;
  readonly mapping: Partial<MappingOptions>;
  readonly emitter: EmitterOptions;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
