/** The cache or the aggregate sink could not be written: fatal to the run. */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export class CachePersistenceError extends PersistenceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CachePersistenceError";
  }
}

export class SinkPersistenceError extends PersistenceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SinkPersistenceError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
