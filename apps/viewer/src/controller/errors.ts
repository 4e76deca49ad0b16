// ============================================================================
// Error Types
// ============================================================================

/**
 * A controller (or one of its parts) was used after dispose()
 */
export class ControllerDisposedError extends Error {
  constructor(
    public readonly component: string,
    public readonly operation: string
  ) {
    super(`${component} was used after dispose: '${operation}'`);
    this.name = 'ControllerDisposedError';
  }
}

/**
 * A value was pushed into a closed stream
 */
export class StreamClosedError extends Error {
  constructor(public readonly operation: string) {
    super(`Cannot ${operation} on a closed stream`);
    this.name = 'StreamClosedError';
  }
}
