/**
 * Core emitter types
 */

import type { TargetDeclaration } from "@semport/mapper";

/**
 * Options for Java code generation
 */
export type EmitterOptions = {
  /** Package prefixed to every namespace-derived package (`com.example`) */
  readonly rootPackage?: string;
  /** Indentation style (spaces) */
  readonly indent?: number;
  /** Include timestamp in generated files */
  readonly includeTimestamp?: boolean;
  /** Fixed timestamp, mostly for reproducible output */
  readonly timestamp?: string;
};

/**
 * Context threaded through emission
 */
export type EmitterContext = {
  readonly indentLevel: number;
  readonly options: EmitterOptions;
  /** Declaration whose members are being emitted */
  readonly declaration?: TargetDeclaration;
};

/**
 * One emitted Java source file
 */
export type JavaFile = {
  /** Path relative to the output directory (`com/example/geometry/Shape.java`) */
  readonly path: string;
  readonly packageName?: string;
  readonly code: string;
};
