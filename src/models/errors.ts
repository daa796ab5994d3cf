/**
 * Base class of every failure the analysis reports on purpose.
 * Anything else reaching the CLI is treated as an internal defect.
 */
export class P4GraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed or cyclic control flow met while building the dependency graph.
 * No partial graph is ever returned alongside it.
 */
export class StructuralError extends P4GraphError {}

/**
 * No topological order exists at scheduling time. The builder never produces a
 * cyclic graph, so this marks a broken internal invariant.
 */
export class CycleError extends P4GraphError {
  constructor(
    message: string,
    readonly remaining: string[] = []
  ) {
    super(message);
  }
}

/** Invalid destination directory, flags or primitive definitions. */
export class ConfigurationError extends P4GraphError {}

/** The HLIR snapshot could not be read or references something it never declares. */
export class IrLoadError extends P4GraphError {}

/**
 * The external renderer is missing or failed for every requested format.
 * The textual graph stays valid and on disk.
 */
export class RenderingUnavailable extends P4GraphError {
  constructor(
    message: string,
    readonly attempts: Array<{ format: string; reason: string }> = []
  ) {
    super(message);
  }
}

export function isP4GraphError(err: unknown): err is P4GraphError {
  return err instanceof P4GraphError;
}
