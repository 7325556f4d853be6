/**
 * Thrown when an operation addresses a node id the graph does not contain.
 * Extends the built-in ReferenceError so callers can catch either.
 */
export class NodeReferenceError extends ReferenceError {
  constructor(public readonly nodeId: string) {
    super(`Node ${nodeId} doesn't exist`);
    this.name = 'NodeReferenceError';
  }
}

/**
 * Thrown by operations that need a DAG when the graph contains a cycle.
 * `cycle` starts and ends on the same node id when a path was found.
 */
export class CycleError extends Error {
  constructor(public readonly cycle: readonly string[]) {
    super(
      cycle.length > 0
        ? `Circular dependency detected: ${cycle.join(' -> ')}`
        : 'Circular dependency detected'
    );
    this.name = 'CycleError';
  }
}

/**
 * Thrown when an interchange payload fails validation.
 */
export class GraphFormatError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'GraphFormatError';
  }
}
